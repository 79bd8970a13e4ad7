export * from './email.js';
export * from './classification.js';
export * from './taxonomy.js';
