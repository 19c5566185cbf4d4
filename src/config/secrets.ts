import 'dotenv/config';

export type EmailTransport = 'smtp' | 'none';
export type ConfidencePolicy = 'average' | 'weighted';

function parseBoolean(value: string | undefined, defaultValue: boolean) {
  if (value === undefined || value === '') return defaultValue;
  const normalized = value.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

function parseNumber(value: string | undefined, defaultValue: number) {
  if (value === undefined || value.trim() === '') return defaultValue;
  return Number(value);
}

function parseTransport(value: string | undefined): EmailTransport {
  return (value || 'none').trim().toLowerCase() === 'smtp' ? 'smtp' : 'none';
}

// Left as a string so an unsupported value reaches validateConfigAtStartup.
function parsePolicy(value: string | undefined): string {
  return (value || 'average').trim().toLowerCase();
}

export const config = {
  authorityOrgId: process.env.ATTESTATION_AUTHORITY_ORG_ID || 'ATTESTATION_AUTHORITY',
  minimumStake: parseNumber(process.env.MINIMUM_STAKE, 1000),
  fieldMatchThreshold: parseNumber(process.env.FIELD_MATCH_THRESHOLD, 0.8),
  confidencePolicy: parsePolicy(process.env.CONFIDENCE_POLICY),
  logLevel: process.env.LOG_LEVEL || 'info',
  email: {
    transport: parseTransport(process.env.EMAIL_TRANSPORT),
    fromName: process.env.EMAIL_FROM_NAME || process.env.APP_NAME || 'Degree Attestation',
    fromAddress: process.env.EMAIL_FROM_ADDRESS || '',
    smtp: {
      host: process.env.EMAIL_HOST || '',
      port: parseNumber(process.env.EMAIL_PORT, 587),
      secure: parseBoolean(process.env.EMAIL_SECURE, false),
      user: process.env.EMAIL_HOST_USER || '',
      password: process.env.EMAIL_HOST_PASSWORD || ''
    },
    adminEmail: process.env.ADMIN_EMAIL || '',
    appName: process.env.APP_NAME || 'Degree Attestation'
  }
};

export function isConfidencePolicy(value: string): value is ConfidencePolicy {
  return value === 'average' || value === 'weighted';
}

function isUnitInterval(value: number) {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export function validateConfigAtStartup() {
  if (!config.authorityOrgId.trim()) {
    throw new Error('ATTESTATION_AUTHORITY_ORG_ID must not be blank');
  }
  if (!Number.isFinite(config.minimumStake) || config.minimumStake < 0) {
    throw new Error(`MINIMUM_STAKE must be a non-negative number, got ${config.minimumStake}`);
  }
  if (!isUnitInterval(config.fieldMatchThreshold)) {
    throw new Error(`FIELD_MATCH_THRESHOLD must be within [0, 1], got ${config.fieldMatchThreshold}`);
  }
  if (!isConfidencePolicy(config.confidencePolicy)) {
    throw new Error(`CONFIDENCE_POLICY must be "average" or "weighted", got "${config.confidencePolicy}"`);
  }
}

export function isEmailConfigured(): boolean {
  const emailCfg = config.email;
  switch (emailCfg.transport) {
    case 'smtp':
      return Boolean(emailCfg.smtp.host && emailCfg.smtp.user && emailCfg.smtp.password);
    default:
      return false;
  }
}

export function resolveConfidencePolicy(): ConfidencePolicy {
  return isConfidencePolicy(config.confidencePolicy) ? config.confidencePolicy : 'average';
}
