import assert from 'node:assert/strict';
import crypto from 'node:crypto';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const NOW = 1_760_000_000;
const body = Buffer.from(JSON.stringify({ data: { event_type: 'call.initiated', payload: { call_control_id: 'c1' } } }));

function signEd25519(privateKey: crypto.KeyObject, timestamp: string, rawBody: Buffer): string {
  return crypto.sign(null, Buffer.concat([Buffer.from(`${timestamp}|`), rawBody]), privateKey).toString('base64');
}

test('accepts a valid ed25519 signature with a PEM key', async () => {
  const { verifyTelnyxSignature } = await import('../src/telnyx/telnyxVerify');
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  const pem = publicKey.export({ type: 'spki', format: 'pem' }).toString();
  const timestamp = String(NOW);

  const result = verifyTelnyxSignature({
    rawBody: body,
    signature: signEd25519(privateKey, timestamp, body),
    timestamp,
    publicKey: pem,
    nowEpochSeconds: NOW + 10,
  });
  assert.deepEqual(result, { ok: true, skipped: false });
});

test('accepts the raw 32-byte key form', async () => {
  const { verifyTelnyxSignature } = await import('../src/telnyx/telnyxVerify');
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  const der = publicKey.export({ type: 'spki', format: 'der' });
  const timestamp = String(NOW);

  const result = verifyTelnyxSignature({
    rawBody: body,
    signature: signEd25519(privateKey, timestamp, body),
    timestamp,
    publicKey: der.subarray(der.length - 32).toString('base64'),
    nowEpochSeconds: NOW,
  });
  assert.equal(result.ok, true);
});

test('rejects a tampered body, a stale timestamp and missing headers', async () => {
  const { verifyTelnyxSignature } = await import('../src/telnyx/telnyxVerify');
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  const pem = publicKey.export({ type: 'spki', format: 'pem' }).toString();
  const timestamp = String(NOW);
  const signature = signEd25519(privateKey, timestamp, body);

  const tampered = verifyTelnyxSignature({
    rawBody: Buffer.from(`${body.toString()} `),
    signature,
    timestamp,
    publicKey: pem,
    nowEpochSeconds: NOW,
  });
  const stale = verifyTelnyxSignature({ rawBody: body, signature, timestamp, publicKey: pem, nowEpochSeconds: NOW + 301 });
  const missing = verifyTelnyxSignature({ rawBody: body, signature: '', timestamp, publicKey: pem, nowEpochSeconds: NOW });

  assert.deepEqual(tampered, { ok: false, skipped: false });
  assert.deepEqual(stale, { ok: false, skipped: false });
  assert.deepEqual(missing, { ok: false, skipped: false });
});

test('verifies hmac-sha256 signatures against the shared secret', async () => {
  const { verifyTelnyxSignature } = await import('../src/telnyx/telnyxVerify');
  const timestamp = String(NOW * 1000);
  const signature = crypto
    .createHmac('sha256', 'test-secret')
    .update(Buffer.concat([Buffer.from(`${timestamp}|`), body]))
    .digest('hex');

  const good = verifyTelnyxSignature({
    rawBody: body,
    signature,
    timestamp,
    scheme: 'hmac-sha256',
    hmacSecret: 'test-secret',
    nowEpochSeconds: NOW,
  });
  const wrongSecret = verifyTelnyxSignature({
    rawBody: body,
    signature,
    timestamp,
    scheme: 'hmac-sha256',
    hmacSecret: 'other-secret',
    nowEpochSeconds: NOW,
  });

  assert.deepEqual(good, { ok: true, skipped: false });
  assert.deepEqual(wrongSecret, { ok: false, skipped: false });
});

test('extracts event metadata from webhook payloads', async () => {
  const { extractTelnyxEventMeta, extractTelnyxEventMetaFromRawBody } = await import('../src/telnyx/telnyxVerify');

  assert.deepEqual(
    extractTelnyxEventMeta({
      data: { event_type: 'call.hangup', payload: { call_control_id: 'c1', direction: 'incoming', hangup_cause: 'normal_clearing' } },
    }),
    { eventType: 'call.hangup', callControlId: 'c1', direction: 'incoming', hangupCause: 'normal_clearing' },
  );
  assert.deepEqual(extractTelnyxEventMetaFromRawBody(Buffer.from('not json')), {});
  assert.equal(extractTelnyxEventMetaFromRawBody(body).callControlId, 'c1');
});
