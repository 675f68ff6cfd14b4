/**
 * Render barrel export.
 */
export { renderSingleLine, joinLines } from './single-line.js';
