export * from './classification-cache.js';
