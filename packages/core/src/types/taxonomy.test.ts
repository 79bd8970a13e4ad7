import { describe, it, expect } from 'vitest';
import { Taxonomy, TaxonomyError, TaxonomyErrorCode, createTaxonomy, type CategoryDefinition } from './taxonomy.js';

const definitions: CategoryDefinition[] = [
  { name: 'Personal & Social', description: 'Friends and family', keywords: ['family'], priorityBoost: 0 },
  { name: 'Security & 2FA', description: 'Verification codes', keywords: ['otp', 'verify'], priorityBoost: 2 },
  { name: 'Promotions & Junk', description: 'Marketing', keywords: [], priorityBoost: -2 },
];

function expectTaxonomyError(fn: () => unknown, code: TaxonomyErrorCode): void {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(TaxonomyError);
    if (e instanceof TaxonomyError) {
      expect(e.code).toBe(code);
    }
    return;
  }
  throw new Error('expected a TaxonomyError');
}

describe('Taxonomy', () => {
  describe('create', () => {
    it('keeps categories in order with the first as default', () => {
      const taxonomy = createTaxonomy(definitions);

      expect(taxonomy.names).toEqual(['Personal & Social', 'Security & 2FA', 'Promotions & Junk']);
      expect(taxonomy.defaultCategory.name).toBe('Personal & Social');
    });

    it('rejects an empty taxonomy', () => {
      expectTaxonomyError(() => Taxonomy.create([]), TaxonomyErrorCode.EMPTY);
    });

    it('rejects a blank name', () => {
      const valid = { name: 'Work', description: '', keywords: [], priorityBoost: 0 };
      const blank = { name: '   ', description: '', keywords: [], priorityBoost: 0 };
      expect(() => Taxonomy.create([valid, blank])).toThrow(
        'Category at index 1 has a blank name'
      );
    });

    it('rejects names that differ only by case', () => {
      const duplicate = { name: 'SECURITY & 2fa', description: '', keywords: [], priorityBoost: 0 };
      expectTaxonomyError(() => Taxonomy.create([...definitions, duplicate]), TaxonomyErrorCode.DUPLICATE_NAME);
    });

    it('rejects a fractional boost', () => {
      const fractional = { name: 'Odd', description: '', keywords: [], priorityBoost: 0.5 };
      expectTaxonomyError(() => Taxonomy.create([fractional]), TaxonomyErrorCode.INVALID_BOOST);
    });

    it('is not affected by later changes to the input', () => {
      const keywords = ['invoice'];
      const taxonomy = createTaxonomy([{ name: 'Finance', description: '', keywords, priorityBoost: 0 }]);

      keywords.push('receipt');

      expect(taxonomy.find('Finance')?.keywords).toEqual(['invoice']);
      expect(Object.isFrozen(taxonomy.categories)).toBe(true);
    });
  });

  describe('find', () => {
    const taxonomy = createTaxonomy(definitions);

    it('matches names case-insensitively', () => {
      expect(taxonomy.find('security & 2fa')?.name).toBe('Security & 2FA');
      expect(taxonomy.has('PROMOTIONS & JUNK')).toBe(true);
    });

    it('returns undefined for unknown names', () => {
      expect(taxonomy.find('phishing-alert')).toBeUndefined();
      expect(taxonomy.has('Security')).toBe(false);
    });
  });
});
