import assert from 'node:assert/strict';
import { afterEach, mock, test } from 'node:test';
import nodemailer from 'nodemailer';
import { setTestEnv } from './testEnv';

process.env.SMTP_PORT = '465';
setTestEnv();

afterEach(() => {
  mock.restoreAll();
});

const settings = { host: 'localhost', port: 587, secure: false, from: 'donotreply@example.com' };

test('sendSummaryEmail addresses the named recipient and returns the message id', async () => {
  const { SmtpNotifier } = await import('../src/notifications/emailNotifier');
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = mock.method(transporter, 'sendMail');
  const notifier = new SmtpNotifier(settings, transporter);

  const sent = await notifier.sendSummaryEmail(
    { address: 'ana@example.com', name: 'Ana Test' },
    { subject: 'Call summary', html: '<p>hi</p>', text: 'hi' },
  );

  assert.equal(sendMail.mock.callCount(), 1);
  assert.deepEqual(sendMail.mock.calls[0]?.arguments[0], {
    from: 'donotreply@example.com',
    to: { name: 'Ana Test', address: 'ana@example.com' },
    subject: 'Call summary',
    html: '<p>hi</p>',
    text: 'hi',
  });
  assert.equal(typeof sent.messageId, 'string');
  assert.ok(sent.messageId.length > 0);
});

test('sendSummaryEmail uses the bare address when no name is given', async () => {
  const { SmtpNotifier } = await import('../src/notifications/emailNotifier');
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = mock.method(transporter, 'sendMail');
  const notifier = new SmtpNotifier(settings, transporter);

  await notifier.sendSummaryEmail({ address: 'support@example.com' }, { subject: 'Case 42', html: '<p>x</p>' });

  assert.equal(sendMail.mock.calls[0]?.arguments[0]?.to, 'support@example.com');
});

test('smtpSettingsFromEnv turns on TLS for port 465', async () => {
  const { smtpSettingsFromEnv } = await import('../src/notifications/emailNotifier');

  const parsed = smtpSettingsFromEnv();

  assert.equal(parsed.port, 465);
  assert.equal(parsed.secure, true);
  assert.equal(parsed.from, 'donotreply@example.com');
});
