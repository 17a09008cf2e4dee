/**
 * Immutable 2D value used for both positions and velocities.
 * Updates never alias: every helper returns a fresh value.
 */
export type Coordinates = Readonly<{ x: number; y: number }>;

export function coords(x: number, y: number): Coordinates {
  return { x, y };
}

export function withX(c: Coordinates, x: number): Coordinates {
  return { x, y: c.y };
}

export function withY(c: Coordinates, y: number): Coordinates {
  return { x: c.x, y };
}

export function distance(a: Coordinates, b: Coordinates): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function magnitude(c: Coordinates): number {
  return Math.sqrt(c.x * c.x + c.y * c.y);
}
