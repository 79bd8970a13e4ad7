export * from './classification-prompt.js';
export * from './few-shot-examples.js';
