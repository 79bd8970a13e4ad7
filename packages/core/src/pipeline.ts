import { loadCategoriesFile, type AppConfig, type CategoriesConfig } from '@inbox-classifier/config';
import { ModelTransport, OpenAIClient } from '@inbox-classifier/integrations';
import { setLogLevel } from '@inbox-classifier/utils';
import { Taxonomy, createTaxonomy } from './types/taxonomy.js';
import { ClassificationCache } from './cache/classification-cache.js';
import { Mailbox } from './services/mailbox.js';
import { ClassifierService } from './services/impl/classifier-service.js';
import { BatchClassifier } from './services/impl/batch-classifier.js';
import { ClassificationOrchestrator } from './services/impl/orchestrator-service.js';

export interface ClassificationPipeline {
  taxonomy: Taxonomy;
  cache: ClassificationCache;
  classifier: ClassifierService;
  batchClassifier: BatchClassifier;
  orchestrator: ClassificationOrchestrator;
}

/**
 * Wires the pipeline from loaded configuration. Every call builds a fresh set
 * of services; one transport is shared by all classification tasks.
 */
export function createClassificationPipeline(
  config: AppConfig,
  categories: CategoriesConfig,
  mailbox: Mailbox,
  transport: ModelTransport = new OpenAIClient(config.openai)
): ClassificationPipeline {
  setLogLevel(config.logLevel);

  const taxonomy = createTaxonomy(categories.categories);
  const cache = new ClassificationCache(config.classification.cacheMaxSize);
  const classifier = new ClassifierService(transport, taxonomy, config.openai);
  const batchClassifier = new BatchClassifier(classifier, cache, config.classification.concurrency);
  const orchestrator = new ClassificationOrchestrator(taxonomy, batchClassifier, mailbox, mailbox, {
    concurrency: config.classification.concurrency,
    maxEmailsPerRun: config.classification.maxEmailsPerRun,
    autoApplyLabels: categories.autoApplyLabels,
    applyExtraLabels: categories.applyExtraLabels,
  });

  return { taxonomy, cache, classifier, batchClassifier, orchestrator };
}

/**
 * Entry point for a run from configuration alone: the taxonomy and run
 * settings come from the configured categories file.
 */
export function loadClassificationPipeline(
  config: AppConfig,
  mailbox: Mailbox,
  transport?: ModelTransport
): ClassificationPipeline {
  const categories = loadCategoriesFile(config.classification.categoriesFile);
  return createClassificationPipeline(config, categories, mailbox, transport);
}
