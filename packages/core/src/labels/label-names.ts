import { Email } from '../types/email.js';
import { Taxonomy } from '../types/taxonomy.js';

export const MAX_LABEL_LENGTH = 50;

/**
 * Mailbox label for a category: underscores become spaces and every word is
 * title-cased. A letter counts as a word start when it follows anything that
 * is not a letter, so "Security & 2FA" becomes "Security & 2Fa".
 */
export function toLabelName(category: string): string {
  return category
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

// Lowercase, hyphenated, alphanumeric-only labels; empties are dropped
export function sanitizeLabels(labels: readonly string[]): string[] {
  return labels
    .map((label) => {
      const clean = label
        .toLowerCase()
        .replace(/ /g, '-')
        .replace(/[^\p{L}\p{N}-]/gu, '');
      // Cap by code point so astral characters are never split
      return Array.from(clean).slice(0, MAX_LABEL_LENGTH).join('');
    })
    .filter((label) => label.length > 0);
}

export function isAlreadyClassified(email: Email, taxonomy: Taxonomy): boolean {
  const known = new Set<string>();
  for (const name of taxonomy.names) {
    known.add(name.toLowerCase());
    known.add(toLabelName(name).toLowerCase());
  }
  return email.existingLabels.some((label) => known.has(label.trim().toLowerCase()));
}
