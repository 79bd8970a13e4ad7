import type { Classification } from '../types/classification.js';
import type { EmailPromptView } from './classification-prompt.js';

export interface FewShotExample {
  email: EmailPromptView;
  classification: Classification;
}

// Anchors output format and category granularity; kept small to save tokens
export const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
  {
    email: {
      subject: 'Your order #123-4567890 has shipped',
      sender: 'shipment-tracking@shop.example',
      senderName: 'Example Shop',
      timestamp: new Date('2025-01-15T09:23:15Z'),
      hasAttachments: false,
      existingLabels: [],
      body: 'Your order has been shipped and will arrive by January 18.\n\nTrack your package: [link]\n\nOrder: Wireless Mouse ($25.99), USB-C Cable ($12.99)',
    },
    classification: {
      category: 'Shipping & Delivery',
      priority: 2,
      labels: ['shopping', 'tracking'],
      reasoning:
        'Order shipment confirmation with tracking info. Standard shipping notification, no immediate action needed.',
      confidence: 0.94,
    },
  },
  {
    email: {
      subject: 'Your verification code: 987654',
      sender: 'no-reply@accounts.example',
      senderName: null,
      timestamp: new Date('2025-01-15T14:22:11Z'),
      hasAttachments: false,
      existingLabels: [],
      body: 'Your verification code is: 987654\nThis code expires in 10 minutes.',
    },
    classification: {
      category: 'Security & 2FA',
      priority: 5,
      labels: ['security', 'time-sensitive'],
      reasoning: 'Time-sensitive security verification code requiring immediate action before expiration.',
      confidence: 0.99,
    },
  },
  {
    email: {
      subject: 'Weekly Tech Digest - Issue #42',
      sender: 'newsletter@techblog.example',
      senderName: null,
      timestamp: new Date('2025-01-15T16:45:00Z'),
      hasAttachments: false,
      existingLabels: [],
      body: "Here's this week's roundup of technology news and updates for your reading.",
    },
    classification: {
      category: 'Newsletters & Reading',
      priority: 1,
      labels: ['read-later'],
      reasoning: 'Regular newsletter subscription with non-urgent informational content for leisure reading.',
      confidence: 0.97,
    },
  },
];
