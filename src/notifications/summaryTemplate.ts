import type { EmailContent } from './types';

export interface SummaryEmailInput {
  referenceId: string;
  clientId: string;
  clientName: string;
  clientEmail: string;
  summary: string;
  supportEmail: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderSummaryEmail(input: SummaryEmailInput): EmailContent {
  const name = escapeHtml(input.clientName);
  const clientId = escapeHtml(input.clientId);
  const email = escapeHtml(input.clientEmail);
  const summary = escapeHtml(input.summary).replace(/\r?\n/g, '<br>');
  const support = escapeHtml(input.supportEmail);
  const subject = `Conversation Summary ${input.referenceId}`;

  const html = `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <title>${escapeHtml(subject)}</title>
</head>
<body style="font-family: Arial, sans-serif; color: #333; line-height: 1.6;">
    <p>Dear <strong>${name}</strong>,</p>
    <p>Thank you for contacting us. Please find below a summary of our conversation today for your reference.</p>
    <h3 style="color: #005f75;">Client Details:</h3>
    <ul>
        <li><strong>Client ID:</strong> ${clientId}</li>
        <li><strong>Name:</strong> ${name}</li>
        <li><strong>Email:</strong> ${email}</li>
    </ul>
    <h3 style="color: #005f75;">Conversation Summary:</h3>
    <div style="background-color: #f9f9f9; padding: 15px; border-left: 4px solid #005f75;">
        ${summary}
    </div>
    <p>If you have any additional questions, you can reach us at <a href="mailto:${support}">${support}</a>.</p>
    <p>Best regards,<br><strong>The Support Team</strong></p>
</body>
</html>`;

  const text = [
    `Dear ${input.clientName},`,
    '',
    'Thank you for contacting us. Here is a summary of our conversation today.',
    '',
    `Client ID: ${input.clientId}`,
    '',
    input.summary,
    '',
    `Questions? Write to ${input.supportEmail}.`,
  ].join('\n');

  return { subject, html, text };
}
