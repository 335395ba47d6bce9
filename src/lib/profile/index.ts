export * from './profile.js';
export * from './display.js';
