// Service interfaces
export * from './classifier.js';
export * from './batch.js';
export * from './mailbox.js';
export * from './orchestrator.js';

// Service implementations
export * from './impl/index.js';
