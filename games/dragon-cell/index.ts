/**
 * Dragon Cell -- public API.
 *
 * The rules engine, the headless session and the text shell pieces.
 */

export * from './DragonCellState';
export * from './DragonCellRules';
export * from './IllegalMoveError';
export * from './GameTranscript';
export * from './DragonCellSession';
export * from './CommandParser';
export * from './TextRenderer';
