import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';

const originalEnv = { ...process.env };

function restoreEnv() {
  Object.keys(process.env).forEach((key) => {
    if (!(key in originalEnv)) delete process.env[key];
  });
  Object.assign(process.env, originalEnv);
}

describe('email client transport selection', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    restoreEnv();
    vi.resetModules();
  });

  it('returns the SMTP transport when fully configured', async () => {
    process.env.EMAIL_TRANSPORT = 'smtp';
    process.env.EMAIL_HOST = 'smtp.example.test';
    process.env.EMAIL_HOST_USER = 'mailer@example.test';
    process.env.EMAIL_HOST_PASSWORD = 'test-secret';
    const { getEmailClient, resetEmailClientForTests } = await import('../../src/notifications/email/email_client');
    resetEmailClientForTests();
    const client = getEmailClient();
    expect(client.constructor.name).toBe('SmtpEmailClient');
    expect(client.configured).toBe(true);
  }, 10000);

  it('falls back to the noop client when SMTP credentials are missing', async () => {
    process.env.EMAIL_TRANSPORT = 'smtp';
    process.env.EMAIL_HOST = 'smtp.example.test';
    process.env.EMAIL_HOST_USER = '';
    process.env.EMAIL_HOST_PASSWORD = '';
    const { getEmailClient, resetEmailClientForTests } = await import('../../src/notifications/email/email_client');
    resetEmailClientForTests();
    const client = getEmailClient();
    expect(client.constructor.name).toBe('NoopEmailClient');
    expect(client.configured).toBe(false);
    await expect(client.send({ to: 'someone@example.test', subject: 's', text: 't' })).resolves.toBeUndefined();
  }, 10000);

  it('uses the noop client when the transport is disabled', async () => {
    process.env.EMAIL_TRANSPORT = 'none';
    const { getEmailClient, resetEmailClientForTests } = await import('../../src/notifications/email/email_client');
    resetEmailClientForTests();
    expect(getEmailClient().constructor.name).toBe('NoopEmailClient');
  }, 10000);

  it('caches the client until reset', async () => {
    const { getEmailClient, resetEmailClientForTests } = await import('../../src/notifications/email/email_client');
    const first = getEmailClient();
    expect(getEmailClient()).toBe(first);
    resetEmailClientForTests();
    expect(getEmailClient()).not.toBe(first);
  }, 10000);

  it('normalizes recipients', async () => {
    const { normalizeRecipients } = await import('../../src/notifications/email/email_client');
    expect(normalizeRecipients([' a@example.test ', '', 'b@example.test'])).toEqual(['a@example.test', 'b@example.test']);
    expect(normalizeRecipients('solo@example.test')).toEqual(['solo@example.test']);
  });
});
