export { playerProgress } from './player-progress.js';
export { encounters } from './encounters.js';
