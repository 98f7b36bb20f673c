export * from './badges.js';
export * from './stockTargets.js';
