import { Email } from '../types/email.js';

// Provider-specific query narrowing what fetchRecent returns, e.g. a Gmail search string
export type MailboxFilter = string;

export interface MailboxFetcher {
  /**
   * Most recent messages first. May return fewer than `limit`.
   */
  fetchRecent(limit: number, filter?: MailboxFilter): Promise<Email[]>;
}

export interface MailboxLabeler {
  // Resolves false when the mailbox refused the write
  applyLabel(emailId: string, labelName: string): Promise<boolean>;
}

export type Mailbox = MailboxFetcher & MailboxLabeler;
