export interface CategoryDefinition {
  readonly name: string;
  readonly description: string;
  readonly keywords: readonly string[];
  readonly priorityBoost: number;
}

export const TaxonomyErrorCode = {
  EMPTY: 'EMPTY',
  BLANK_NAME: 'BLANK_NAME',
  DUPLICATE_NAME: 'DUPLICATE_NAME',
  INVALID_BOOST: 'INVALID_BOOST',
} as const;
export type TaxonomyErrorCode = (typeof TaxonomyErrorCode)[keyof typeof TaxonomyErrorCode];

export class TaxonomyError extends Error {
  constructor(
    readonly code: TaxonomyErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

const keyOf = (name: string): string => name.toLowerCase();

/**
 * Ordered, validated set of categories. The first entry is the fallback when
 * the model names a category that does not exist. Lookups ignore case.
 */
export class Taxonomy {
  private readonly byKey: ReadonlyMap<string, CategoryDefinition>;

  private constructor(
    readonly categories: readonly CategoryDefinition[],
    readonly defaultCategory: CategoryDefinition
  ) {
    this.byKey = new Map(categories.map((category) => [keyOf(category.name), category]));
  }

  static create(definitions: readonly CategoryDefinition[]): Taxonomy {
    const seen = new Set<string>();
    const categories = definitions.map((definition, index) => {
      if (definition.name.trim().length === 0) {
        throw new TaxonomyError(TaxonomyErrorCode.BLANK_NAME, `Category at index ${index} has a blank name`);
      }
      if (!Number.isInteger(definition.priorityBoost)) {
        throw new TaxonomyError(
          TaxonomyErrorCode.INVALID_BOOST,
          `Category "${definition.name}" has a non-integer priority boost`
        );
      }
      const key = keyOf(definition.name);
      if (seen.has(key)) {
        throw new TaxonomyError(TaxonomyErrorCode.DUPLICATE_NAME, `Duplicate category name "${definition.name}"`);
      }
      seen.add(key);

      return Object.freeze({
        name: definition.name,
        description: definition.description,
        keywords: Object.freeze([...definition.keywords]),
        priorityBoost: definition.priorityBoost,
      });
    });

    const [first] = categories;
    if (!first) {
      throw new TaxonomyError(TaxonomyErrorCode.EMPTY, 'Taxonomy must contain at least one category');
    }

    return new Taxonomy(Object.freeze(categories), first);
  }

  get names(): string[] {
    return this.categories.map((category) => category.name);
  }

  find(name: string): CategoryDefinition | undefined {
    return this.byKey.get(keyOf(name));
  }

  has(name: string): boolean {
    return this.byKey.has(keyOf(name));
  }
}

export function createTaxonomy(definitions: readonly CategoryDefinition[]): Taxonomy {
  return Taxonomy.create(definitions);
}
