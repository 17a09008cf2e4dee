export const GAME_CONFIG = {
  // Side of the square, toroidal map. Also the velocity bound on each axis.
  MAP_SIZE: 100,

  // Acceleration from a held direction key, units per second squared.
  THRUST: 100,
  // Damping with no key held on an axis is THRUST / DAMPING_DIVISOR.
  DAMPING_DIVISOR: 10,

  // Game over when the player is strictly closer than this to an asteroid.
  COLLISION_RADIUS: 10,

  PLAYER_START: { x: 10, y: 10 },
  ASTEROID_POSITIONS: [
    { x: 70, y: 30 },
    { x: 20, y: 50 },
  ],

  // Upper bound for a single frame's elapsed time (backgrounded tabs).
  MAX_FRAME_DT_SEC: 0.1,

  // Rendering only.
  PLAYER_DRAW_RADIUS: 2,
  ASTEROID_DRAW_RADIUS: 8,
  COLOR_BACKGROUND: '#0b0d12',
  COLOR_PLAYER: '#facc15',
  COLOR_ASTEROID: '#94a3b8',
  COLOR_BANNER: '#ef4444',

  LOG_PREFIX: '[dot-drift]',
} as const;
