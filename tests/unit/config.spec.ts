import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';

const originalEnv = { ...process.env };

function restoreEnv() {
  Object.keys(process.env).forEach((key) => {
    if (!(key in originalEnv)) delete process.env[key];
  });
  Object.assign(process.env, originalEnv);
}

async function loadConfig() {
  return import('../../src/config/secrets');
}

describe('configuration', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    restoreEnv();
    vi.resetModules();
  });

  it('applies defaults', async () => {
    delete process.env.MINIMUM_STAKE;
    delete process.env.CONFIDENCE_POLICY;
    delete process.env.ATTESTATION_AUTHORITY_ORG_ID;
    delete process.env.FIELD_MATCH_THRESHOLD;
    const { config, validateConfigAtStartup, resolveConfidencePolicy } = await loadConfig();
    expect(config.authorityOrgId).toBe('ATTESTATION_AUTHORITY');
    expect(config.minimumStake).toBe(1000);
    expect(config.fieldMatchThreshold).toBe(0.8);
    expect(resolveConfidencePolicy()).toBe('average');
    expect(() => validateConfigAtStartup()).not.toThrow();
  });

  it('reads the confidence policy case-insensitively', async () => {
    process.env.CONFIDENCE_POLICY = ' Weighted ';
    const { resolveConfidencePolicy } = await loadConfig();
    expect(resolveConfidencePolicy()).toBe('weighted');
  });

  it('rejects an unknown confidence policy at startup', async () => {
    process.env.CONFIDENCE_POLICY = 'median';
    const { validateConfigAtStartup } = await loadConfig();
    expect(() => validateConfigAtStartup()).toThrow('CONFIDENCE_POLICY must be "average" or "weighted", got "median"');
  });

  it('rejects a field match threshold outside the unit interval', async () => {
    process.env.FIELD_MATCH_THRESHOLD = '1.5';
    const { validateConfigAtStartup } = await loadConfig();
    expect(() => validateConfigAtStartup()).toThrow('FIELD_MATCH_THRESHOLD must be within [0, 1], got 1.5');
  });

  it('keeps the decision threshold fixed whatever the environment says', async () => {
    process.env.VERIFICATION_THRESHOLD = '0.99';
    const { config, validateConfigAtStartup } = await loadConfig();
    const { VERIFICATION_THRESHOLD } = await import('../../src/services/verificationService');
    expect(VERIFICATION_THRESHOLD).toBe(0.8);
    expect('verificationThreshold' in config).toBe(false);
    expect(() => validateConfigAtStartup()).not.toThrow();
  });

  it('rejects a non-numeric minimum stake', async () => {
    process.env.MINIMUM_STAKE = 'lots';
    const { validateConfigAtStartup } = await loadConfig();
    expect(() => validateConfigAtStartup()).toThrow('MINIMUM_STAKE must be a non-negative number, got NaN');
  });

  it('only reports SMTP as configured with host and credentials', async () => {
    process.env.EMAIL_TRANSPORT = 'smtp';
    process.env.EMAIL_HOST = 'smtp.example.test';
    process.env.EMAIL_HOST_USER = 'mailer@example.test';
    delete process.env.EMAIL_HOST_PASSWORD;
    const { isEmailConfigured } = await loadConfig();
    expect(isEmailConfigured()).toBe(false);
  });
});
