import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { parseCategoriesYaml, loadCategoriesFile } from './categories.js';
import { ConfigError } from './errors.js';

const bundledCategories = fileURLToPath(new URL('../../../config/categories.yaml', import.meta.url));

describe('Categories configuration', () => {
  describe('parseCategoriesYaml', () => {
    it('maps file entries to category definitions with defaults', () => {
      const config = parseCategoriesYaml(`
categories:
  - name: "Security & 2FA"
    description: "Verification codes"
    keywords: ["code", "verify"]
    priority_boost: 3
  - name: "Newsletters & Reading"
`);

      expect(config.categories).toEqual([
        {
          name: 'Security & 2FA',
          description: 'Verification codes',
          keywords: ['code', 'verify'],
          priorityBoost: 3,
        },
        {
          name: 'Newsletters & Reading',
          description: '',
          keywords: [],
          priorityBoost: 0,
        },
      ]);
      expect(config.autoApplyLabels).toBe(true);
      expect(config.applyExtraLabels).toBe(false);
    });

    it('reads the label settings', () => {
      const config = parseCategoriesYaml(`
auto_apply_labels: false
apply_extra_labels: true
categories:
  - name: Work
`);
      expect(config.autoApplyLabels).toBe(false);
      expect(config.applyExtraLabels).toBe(true);
    });

    it('rejects a file without categories', () => {
      expect(() => parseCategoriesYaml('categories: []')).toThrow(
        'Invalid categories file: categories: At least one category is required'
      );
    });

    it('rejects a blank category name', () => {
      expect(() => parseCategoriesYaml('categories:\n  - name: "   "\n')).toThrow(
        'Invalid categories file: categories.0.name: Category name must not be empty'
      );
    });

    it('rejects a fractional priority boost', () => {
      expect(() =>
        parseCategoriesYaml('categories:\n  - name: Work\n    priority_boost: 1.5\n')
      ).toThrow(/categories\.0\.priority_boost/);
    });

    it('wraps YAML syntax errors', () => {
      expect(() => parseCategoriesYaml('categories: [unclosed')).toThrow(ConfigError);
    });
  });

  describe('loadCategoriesFile', () => {
    it('loads the bundled taxonomy', () => {
      const config = loadCategoriesFile(bundledCategories);

      expect(config.categories).toHaveLength(8);
      expect(config.categories[0]?.name).toBe('Personal & Social');
      expect(config.categories.find((c) => c.name === 'Security & 2FA')?.priorityBoost).toBe(2);
    });

    it('throws for a missing file', () => {
      expect(() => loadCategoriesFile('config/does-not-exist.yaml')).toThrow(
        /^Categories file not found at /
      );
    });
  });
});
