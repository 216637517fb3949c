export interface EmailRecipient {
  address: string;
  name?: string;
}

export interface EmailContent {
  subject: string;
  html: string;
  text?: string;
}

export interface SentEmail {
  messageId: string;
}

export interface Notifier {
  sendSummaryEmail(recipient: EmailRecipient, content: EmailContent): Promise<SentEmail>;
}
