// Transport types
export * from './types.js';

// OpenAI model API
export * from './openai/index.js';
