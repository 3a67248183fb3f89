export * from './enums.js';
export * from './world-state.js';
export * from './state-diff.js';
export * from './action.js';
export * from './combat.js';
export * from './action-result.js';
export * from './collaborators.js';
