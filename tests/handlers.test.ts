import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fakeCollaborators } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function run(name: string, args: Record<string, unknown>, collaborators = fakeCollaborators()) {
  const { createToolRegistry } = await import('../src/tools/handlers');
  const tool = createToolRegistry().get(name);
  assert.ok(tool, `tool ${name} is registered`);
  return tool.execute(args, {
    callId: 'call-1',
    requestId: 'r1',
    signal: new AbortController().signal,
    collaborators,
  });
}

test('lookup_client returns the client with products and open cases', async () => {
  const outcome = await run('lookup_client', { client_id: ' 12345678A ' });

  assert.deepEqual(outcome, {
    ok: true,
    payload: {
      client_id: '12345678A',
      client_name: 'Ana Test',
      email: 'ana@example.com',
      products: [{ name: 'Fiber 600', type: 'internet' }],
      open_cases: [{ id: 7, description: 'Slow connection', status: 'open', created_date: '2025-01-02 10:00:00' }],
    },
  });
});

test('lookup_client reports a missing client as NotFound', async () => {
  assert.deepEqual(await run('lookup_client', { client_id: '999' }), {
    ok: false,
    error: { code: 'NotFound', message: 'Client with ID 999 not found' },
  });
});

test('arguments are validated before the tool runs', async () => {
  assert.deepEqual(await run('lookup_client', {}), {
    ok: false,
    error: { code: 'InvalidArguments', message: 'client_id: Required' },
  });
  assert.deepEqual(await run('create_support_case', { client_id: '  ', description: 'x' }), {
    ok: false,
    error: { code: 'InvalidArguments', message: 'client_id: client_id is required' },
  });
});

test('create_support_case opens a case for the client', async () => {
  const collaborators = fakeCollaborators();
  const outcome = await run(
    'create_support_case',
    { client_id: '12345678A', description: 'Router keeps rebooting' },
    collaborators,
  );

  assert.deepEqual(outcome, {
    ok: true,
    payload: {
      case_id: 42,
      client_name: 'Ana Test',
      description: 'Router keeps rebooting',
      status: 'open',
      message: 'Support case #42 created successfully for Ana Test',
    },
  });
  assert.deepEqual(collaborators.clients.created, [{ clientId: '12345678A', description: 'Router keeps rebooting' }]);
});

test('send_conversation_summary emails an escaped summary', async () => {
  const collaborators = fakeCollaborators();
  const outcome = await run(
    'send_conversation_summary',
    { client_id: '12345678A', conversation_summary: 'Fix <router>\nCall back' },
    collaborators,
  );

  assert.ok(outcome.ok);
  const referenceId = outcome.payload.reference_id;
  assert.equal(typeof referenceId, 'string');
  assert.equal(String(referenceId).length, 13);
  assert.equal(outcome.payload.message, 'Summary sent successfully to Ana Test (ana@example.com)');
  assert.equal(outcome.payload.message_id, 'msg-1');

  const [email] = collaborators.notifier.sent;
  assert.ok(email);
  assert.deepEqual(email.recipient, { address: 'ana@example.com', name: 'Ana Test' });
  assert.equal(email.content.subject, `Conversation Summary ${String(referenceId)}`);
  assert.ok(email.content.html.includes('Fix &lt;router&gt;<br>Call back'));
});

test('send_conversation_summary needs a client with an email', async () => {
  const collaborators = fakeCollaborators();
  collaborators.clients.clients.set('B1', { id: 2, clientId: 'B1', name: 'No Mail', email: '' });

  assert.deepEqual(await run('send_conversation_summary', { client_id: 'B1', conversation_summary: 'hi' }, collaborators), {
    ok: false,
    error: { code: 'NotFound', message: 'Client with ID B1 not found or no email registered' },
  });
  assert.equal(collaborators.notifier.sent.length, 0);
});

test('summary text and html escaping', async () => {
  const { escapeHtml, renderSummaryEmail } = await import('../src/notifications/summaryTemplate');
  assert.equal(escapeHtml(`<a href="x">'&'</a>`), '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');

  const content = renderSummaryEmail({
    referenceId: 'ref-1',
    clientId: 'C1',
    clientName: 'Ana',
    clientEmail: 'ana@example.com',
    summary: 'All good',
    supportEmail: 'support@example.com',
  });
  assert.equal(
    content.text,
    [
      'Dear Ana,',
      '',
      'Thank you for contacting us. Here is a summary of our conversation today.',
      '',
      'Client ID: C1',
      '',
      'All good',
      '',
      'Questions? Write to support@example.com.',
    ].join('\n'),
  );
});
