export * from './enums.js';
export * from './domain.js';
export * from './api.js';
