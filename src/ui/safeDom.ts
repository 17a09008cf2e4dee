/**
 * Tiny DOM safety helpers.
 *
 * The scene host and HUD are required; bootstrapping fails at startup
 * instead of on the first frame when the page is missing one.
 */

/**
 * Query an element and throw a friendly error if missing.
 */
export function requireEl<T extends Element>(selector: string, root: ParentNode = document): T {
  const found = root.querySelector<T>(selector);
  if (!found) {
    throw new Error(`Missing required element: ${selector}`);
  }
  return found;
}
