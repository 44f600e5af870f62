export * from './enums.js';
export * from './base-stats.js';
export * from './status-effect.js';
export * from './encounter-state.js';
export * from './player-progress.js';
