export * from './artifacts.js';
export * from './config.js';
export * from './galaxy.js';
export * from './runner.js';
