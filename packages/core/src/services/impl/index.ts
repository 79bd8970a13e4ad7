// Service implementations
export { ClassifierService, createClassifierService } from './classifier-service.js';
export { BatchClassifier, createBatchClassifier, summarizeBatch } from './batch-classifier.js';
export {
  type OrchestratorSettings,
  ClassificationOrchestrator,
  createClassificationOrchestrator,
} from './orchestrator-service.js';
export { RESPONSE_SCHEMA_NAME, JSON_OBJECT_INSTRUCTION, buildModelRequest, flattenMessages } from './request-builder.js';
export {
  applyPriorityBoost,
  clampPriority,
  extractContent,
  parseClassification,
  resolveCategory,
} from './classification-output.js';
