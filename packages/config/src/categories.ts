import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { ConfigError } from './errors.js';

// Category entry as written in the categories file
const categoryEntrySchema = z.object({
  name: z.string().trim().min(1, 'Category name must not be empty'),
  description: z.string().default(''),
  keywords: z.array(z.string()).default([]),
  priority_boost: z.number().int().default(0),
});

const categoriesFileSchema = z.object({
  categories: z.array(categoryEntrySchema).min(1, 'At least one category is required'),
  auto_apply_labels: z.boolean().default(true),
  apply_extra_labels: z.boolean().default(false),
});

export interface CategoryDefinitionInput {
  name: string;
  description: string;
  keywords: string[];
  priorityBoost: number;
}

export interface CategoriesConfig {
  categories: CategoryDefinitionInput[];
  // Write the category label back to the mailbox
  autoApplyLabels: boolean;
  // Also write the model's extra labels
  applyExtraLabels: boolean;
}

export function parseCategoriesYaml(content: string, source = 'categories file'): CategoriesConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (e) {
    throw new ConfigError(`Failed to parse ${source}`, [e instanceof Error ? e.message : String(e)]);
  }

  const result = categoriesFileSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigError.fromZod(`Invalid ${source}`, result.error);
  }

  return {
    categories: result.data.categories.map((entry) => ({
      name: entry.name,
      description: entry.description,
      keywords: entry.keywords,
      priorityBoost: entry.priority_boost,
    })),
    autoApplyLabels: result.data.auto_apply_labels,
    applyExtraLabels: result.data.apply_extra_labels,
  };
}

export function loadCategoriesFile(filePath: string): CategoriesConfig {
  const resolved = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Categories file not found at ${resolved}`);
  }

  return parseCategoriesYaml(fs.readFileSync(resolved, 'utf-8'), resolved);
}
