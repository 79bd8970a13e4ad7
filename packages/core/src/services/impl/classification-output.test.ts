import { describe, it, expect } from 'vitest';
import {
  applyPriorityBoost,
  clampPriority,
  extractContent,
  parseClassification,
  resolveCategory,
} from './classification-output.js';
import { createTaxonomy } from '../../types/taxonomy.js';
import type { Classification } from '../../types/classification.js';

const taxonomy = createTaxonomy([
  { name: 'Personal & Social', description: '', keywords: [], priorityBoost: 0 },
  { name: 'Security & 2FA', description: '', keywords: [], priorityBoost: 2 },
  { name: 'Promotions & Junk', description: '', keywords: [], priorityBoost: -2 },
]);

const base: Classification = {
  category: 'Security & 2FA',
  priority: 3,
  labels: ['security'],
  reasoning: 'Login verification code from a known service.',
  confidence: 0.9,
};

describe('extractContent', () => {
  it('returns standard content', () => {
    const result = extractContent({ shape: 'standard', content: '{"a":1}' });
    expect(result).toEqual({ ok: true, value: '{"a":1}' });
  });

  it('returns reasoning output when completed', () => {
    const result = extractContent({
      shape: 'reasoning_compact',
      status: 'completed',
      incompleteReason: null,
      outputText: '{"a":1}',
    });
    expect(result).toEqual({ ok: true, value: '{"a":1}' });
  });

  it('rejects an incomplete reasoning response even with partial output', () => {
    const result = extractContent({
      shape: 'reasoning_compact',
      status: 'incomplete',
      incompleteReason: 'max_output_tokens',
      outputText: '{"category": "Sec',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INCOMPLETE_RESPONSE');
      expect(result.error.message).toBe('Model response incomplete: max_output_tokens');
    }
  });

  it('rejects empty and whitespace content', () => {
    for (const content of [null, '', '  \n']) {
      const result = extractContent({ shape: 'standard', content });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('EMPTY_RESPONSE');
      }
    }
  });
});

describe('parseClassification', () => {
  it('parses a well-formed object without loss', () => {
    const result = parseClassification(JSON.stringify(base));
    expect(result).toEqual({ ok: true, value: base });
  });

  it('fills in missing labels and confidence', () => {
    const result = parseClassification(
      '{"category":"Security & 2FA","priority":2,"reasoning":"Sign-in code from the bank."}'
    );

    expect(result).toEqual({
      ok: true,
      value: {
        category: 'Security & 2FA',
        priority: 2,
        labels: [],
        reasoning: 'Sign-in code from the bank.',
        confidence: 0.8,
      },
    });
  });

  it('keeps only the first three labels', () => {
    const result = parseClassification(JSON.stringify({ ...base, labels: ['a', 'b', 'c', 'd'] }));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.labels).toEqual(['a', 'b', 'c']);
    }
  });

  it('rejects invalid JSON', () => {
    const result = parseClassification('category: Work');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR');
      expect(result.error.message.startsWith('Model response is not valid JSON: ')).toBe(true);
    }
  });

  it.each([
    ['priority out of range', { ...base, priority: 6 }],
    ['fractional priority', { ...base, priority: 2.5 }],
    ['reasoning too short', { ...base, reasoning: 'short' }],
    ['reasoning too long', { ...base, reasoning: 'x'.repeat(501) }],
    ['confidence above one', { ...base, confidence: 1.2 }],
    ['labels that are not strings', { ...base, labels: [1, 2] }],
    ['missing category', { priority: 3, labels: [], reasoning: base.reasoning, confidence: 0.5 }],
  ])('rejects %s', (_name, value) => {
    const result = parseClassification(JSON.stringify(value));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR');
      expect(result.error.message).toBe('Model response does not match the classification schema');
    }
  });
});

describe('clampPriority', () => {
  it('keeps the result within 1..5 for any boost in -10..10', () => {
    for (let priority = 1; priority <= 5; priority++) {
      for (let boost = -10; boost <= 10; boost++) {
        const clamped = clampPriority(priority + boost);
        expect(clamped).toBeGreaterThanOrEqual(1);
        expect(clamped).toBeLessThanOrEqual(5);
      }
    }
    expect(clampPriority(0)).toBe(1);
    expect(clampPriority(8)).toBe(5);
    expect(clampPriority(3)).toBe(3);
  });
});

describe('applyPriorityBoost', () => {
  it('adds the category boost', () => {
    expect(applyPriorityBoost(base, taxonomy).priority).toBe(5);
  });

  it('clamps a boosted priority', () => {
    expect(applyPriorityBoost({ ...base, priority: 5 }, taxonomy).priority).toBe(5);
    expect(applyPriorityBoost({ ...base, category: 'Promotions & Junk', priority: 2 }, taxonomy).priority).toBe(1);
  });

  it('matches the category case-insensitively', () => {
    expect(applyPriorityBoost({ ...base, category: 'security & 2fa' }, taxonomy).priority).toBe(5);
  });

  it('returns the input unchanged for zero boost or unknown category', () => {
    const personal = { ...base, category: 'Personal & Social' };
    const unknown = { ...base, category: 'phishing-alert' };

    expect(applyPriorityBoost(personal, taxonomy)).toBe(personal);
    expect(applyPriorityBoost(unknown, taxonomy)).toBe(unknown);
  });

  it('does not mutate the input', () => {
    applyPriorityBoost(base, taxonomy);
    expect(base.priority).toBe(3);
  });
});

describe('resolveCategory', () => {
  it('keeps an exact match', () => {
    const resolution = resolveCategory(base, taxonomy);
    expect(resolution.classification).toBe(base);
    expect(resolution.replaced).toBeNull();
  });

  it('rewrites a case variant to the canonical name', () => {
    const resolution = resolveCategory({ ...base, category: 'SECURITY & 2FA' }, taxonomy);
    expect(resolution.classification.category).toBe('Security & 2FA');
    expect(resolution.replaced).toBeNull();
  });

  it('substitutes the default category for an unknown name', () => {
    const resolution = resolveCategory({ ...base, category: 'phishing-alert' }, taxonomy);
    expect(resolution.classification.category).toBe('Personal & Social');
    expect(resolution.replaced).toBe('phishing-alert');
  });
});
