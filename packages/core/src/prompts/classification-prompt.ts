import type { ChatMessage } from '@inbox-classifier/integrations';
import type { Email } from '../types/email.js';
import type { Taxonomy } from '../types/taxonomy.js';
import {
  MAX_LABELS,
  MAX_REASONING_LENGTH,
  MIN_REASONING_LENGTH,
} from '../types/classification.js';
import { FEW_SHOT_EXAMPLES } from './few-shot-examples.js';

// Fields of an email that reach the prompt
export interface EmailPromptView {
  subject: string;
  sender: string;
  senderName: string | null;
  timestamp: Date;
  hasAttachments: boolean;
  existingLabels: readonly string[];
  body: string;
}

export function toPromptView(email: Email): EmailPromptView {
  return {
    subject: email.subject,
    sender: email.sender,
    senderName: email.senderName,
    timestamp: email.timestamp,
    hasAttachments: email.hasAttachments,
    existingLabels: email.existingLabels,
    body: email.bodyFull ? email.bodyFull : email.bodyPreview,
  };
}

/** Formats as `YYYY-MM-DD HH:mm:ss` in UTC. */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return 'unknown';
  }
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function buildSystemPrompt(taxonomy: Taxonomy): string {
  const categoryNames = taxonomy.names.map((name) => `"${name}"`).join(', ');

  const categoryDetails = taxonomy.categories
    .map((category) => `- ${category.name}: ${category.description || 'No description'}`)
    .join('\n');

  const keywordsReference = taxonomy.categories
    .map((category) => {
      const keywords = category.keywords.length > 0 ? category.keywords.join(', ') : 'N/A';
      return `  ${category.name}: ${keywords}`;
    })
    .join('\n');

  return `You are an expert email classifier. Classify emails quickly and accurately.

## Available Categories (USE EXACT NAMES)

${categoryNames}

## Category Details

${categoryDetails}

## Keywords Reference

${keywordsReference}

## Priority Scale

1=Low (newsletters), 2=Normal (regular), 3=Moderate (action soon), 4=High (urgent), 5=Critical (immediate)

## How to Classify

1. Identify the MOST appropriate single category from the exact list above
2. Set priority 1-5 based on urgency
3. Add 0-${MAX_LABELS} descriptive labels (lowercase, hyphenated)
4. Brief reasoning: 1-2 sentences, ${MIN_REASONING_LENGTH}-${MAX_REASONING_LENGTH} chars
5. Confidence: 0.5-1.0

## Key Signals

- Sender (domain, noreply, company name)
- Subject keywords (urgent, verify, meeting, etc.)
- Body urgency (expires, immediate, confirm, etc.)
- Time sensitivity (deadline, today, expiry time)
- Action needed (click, approve, respond, confirm)

## CRITICAL: Category Name Rules

- You MUST use one of these EXACT category names (case-sensitive, including spaces and special characters):
  ${categoryNames}
- Do NOT shorten or abbreviate category names
- Do NOT invent new category names
- If unsure, choose the closest match from the list above

## Important

- Priority: integer 1-5
- Labels: at most ${MAX_LABELS}, lowercase and hyphenated (e.g. "action-required")
- Reasoning: ${MIN_REASONING_LENGTH}-${MAX_REASONING_LENGTH} characters
- Confidence: decimal 0.5-1.0
- Return VALID JSON only`;
}

export function buildUserPrompt(view: EmailPromptView): string {
  const senderInfo = view.senderName ? `${view.senderName} <${view.sender}>` : view.sender;
  const attachmentsInfo = view.hasAttachments ? ' [Has attachments]' : '';
  const labelsInfo =
    view.existingLabels.length > 0 ? `\n**Labels:** ${view.existingLabels.join(', ')}` : '';

  return `Classify this email:

**Subject:** ${view.subject}
**From:** ${senderInfo}
**Date:** ${formatTimestamp(view.timestamp)}${attachmentsInfo}${labelsInfo}

**Body:**
${view.body}

---

Analyze and classify. Return JSON with exactly these fields: category, priority, labels, reasoning, confidence.`;
}

export function buildFewShotMessages(): ChatMessage[] {
  return FEW_SHOT_EXAMPLES.flatMap((example) => [
    { role: 'user' as const, content: buildUserPrompt(example.email) },
    { role: 'assistant' as const, content: JSON.stringify(example.classification, null, 2) },
  ]);
}

/**
 * Build the role-tagged turns for one classification: system instructions,
 * optional few-shot pairs, then the email itself. Pure and deterministic.
 */
export function buildClassificationMessages(
  email: Email,
  taxonomy: Taxonomy,
  includeExamples = true
): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(taxonomy) },
    ...(includeExamples ? buildFewShotMessages() : []),
    { role: 'user', content: buildUserPrompt(toPromptView(email)) },
  ];
}
