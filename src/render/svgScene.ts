import type { RenderPort } from '../app/AppContext';
import { GAME_CONFIG } from '../config/appConfig';
import type { GameState } from '../sim/game';

const SVG_NS = 'http://www.w3.org/2000/svg';

function svgEl<K extends keyof SVGElementTagNameMap>(
  doc: Document,
  tag: K,
  attrs: Record<string, string | number>,
): SVGElementTagNameMap[K] {
  const node = doc.createElementNS(SVG_NS, tag);
  for (const [name, value] of Object.entries(attrs)) node.setAttribute(name, String(value));
  return node;
}

/**
 * Draws the game into a single viewBox-scaled <svg>. The scene is rebuilt on
 * every render; it only holds a handful of nodes.
 */
export class SvgRenderPort implements RenderPort<GameState> {
  readonly svg: SVGSVGElement;
  private readonly doc: Document;

  constructor(host: HTMLElement) {
    this.doc = host.ownerDocument;
    const size = GAME_CONFIG.MAP_SIZE;
    this.svg = svgEl(this.doc, 'svg', { viewBox: `0 0 ${size} ${size}`, width: '100%', height: '100%' });
    host.appendChild(this.svg);
  }

  dispose(): void {
    this.svg.remove();
  }

  render(state: GameState): void {
    const size = GAME_CONFIG.MAP_SIZE;
    const background = svgEl(this.doc, 'rect', {
      x: 0,
      y: 0,
      width: size,
      height: size,
      fill: GAME_CONFIG.COLOR_BACKGROUND,
    });

    if (state.isGameOver) {
      this.svg.replaceChildren(
        background,
        this.text('Game Over', size / 2, size / 2, 12, 'banner'),
        this.text('Press Enter to restart', size / 2, size / 2 + 12, 5, 'hint'),
      );
      return;
    }

    const asteroids = state.asteroids.map(a =>
      svgEl(this.doc, 'circle', {
        class: 'asteroid',
        cx: a.position.x,
        cy: a.position.y,
        r: GAME_CONFIG.ASTEROID_DRAW_RADIUS,
        fill: GAME_CONFIG.COLOR_ASTEROID,
      }),
    );
    const player = svgEl(this.doc, 'circle', {
      class: 'player',
      cx: state.player.position.x,
      cy: state.player.position.y,
      r: GAME_CONFIG.PLAYER_DRAW_RADIUS,
      fill: GAME_CONFIG.COLOR_PLAYER,
    });
    this.svg.replaceChildren(background, ...asteroids, player);
  }

  private text(content: string, x: number, y: number, fontSize: number, cls: string): SVGTextElement {
    const t = svgEl(this.doc, 'text', {
      class: cls,
      x,
      y,
      'font-size': fontSize,
      'text-anchor': 'middle',
      fill: GAME_CONFIG.COLOR_BANNER,
    });
    t.textContent = content;
    return t;
  }
}
