export * from './env.js';
export * from './errors.js';
export * from './model-shape.js';
export * from './categories.js';
