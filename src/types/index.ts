export * from './config.js';
export * from './delivery.js';
export * from './store.js';
export * from './events.js';
