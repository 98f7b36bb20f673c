export * from './stockEngine.js';
export * from './furniture.js';
export * from './foam.js';
export * from './stockedItems.js';
export * from './views.js';
