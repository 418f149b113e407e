export * from './enums.js';
export * from './move.js';
export * from './combatant.js';
export * from './battle-result.js';
export * from './battle-config.js';
