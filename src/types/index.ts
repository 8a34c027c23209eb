export * from './enums.js';
export * from './bot-config.js';
export * from './bot-state.js';
export * from './image.js';
