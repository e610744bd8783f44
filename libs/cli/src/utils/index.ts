export * from './parse.js';
export * from './paths.js';
