// Email as supplied by a mailbox collaborator; treated as an immutable value

export const EmailProvider = {
  GMAIL: 'gmail',
  OUTLOOK: 'outlook',
} as const;
export type EmailProvider = (typeof EmailProvider)[keyof typeof EmailProvider];

export interface Email {
  readonly id: string;
  readonly provider: EmailProvider;
  readonly subject: string;
  readonly sender: string;
  readonly senderName: string | null;
  readonly recipient: string;
  readonly timestamp: Date;
  readonly bodyPreview: string;
  readonly bodyFull: string | null;
  readonly isRead: boolean;
  readonly hasAttachments: boolean;
  readonly existingLabels: readonly string[];
}
