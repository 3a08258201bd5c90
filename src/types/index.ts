export type * from './game.js';
