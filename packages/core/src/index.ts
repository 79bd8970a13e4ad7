// Domain types
export * from './types/index.js';

// Prompt construction
export * from './prompts/index.js';

// Result cache
export * from './cache/index.js';

// Label naming
export * from './labels/index.js';

// Services
export * from './services/index.js';

// Wiring
export * from './pipeline.js';
