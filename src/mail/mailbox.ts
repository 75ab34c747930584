export interface MailMessage {
  id: string;
  subject: string;
  from: string;
  receivedAt: Date;
  /** Plain-text body, or the HTML body with tags stripped. */
  text: string;
  html?: string;
}

export interface MailQuery {
  since: Date;
  from?: string;
}

export interface MailboxClient {
  /** Messages received at or after `since`, in any order. */
  listMessages(query: MailQuery): Promise<MailMessage[]>;
}
