import { config } from '../../config/secrets';
import { moduleLogger, type Logger } from '../../infra/logging';
import type { RegistryEventMap, RegistryEvents } from '../events';
import { getEmailClient, type EmailClient } from './email_client';
import { buildRevokedTemplate, buildVerificationRejectedTemplate, type EmailTemplate } from './email_templates';

export interface EmailNotifierOptions {
  client?: EmailClient;
  adminEmail?: string;
  logger?: Logger;
}

function uniqueEmails(values: Array<string | null | undefined>): string[] {
  const set = new Set<string>();
  values
    .filter((value): value is string => Boolean(value && value.includes('@')))
    .forEach((value) => set.add(value.trim()));
  return Array.from(set);
}

/** Emails issuers and the admin about revocations and rejected verifications. */
export class EmailNotifier {
  private client: EmailClient;
  private adminEmail: string;
  private log: Logger;

  constructor(options: EmailNotifierOptions = {}) {
    this.client = options.client ?? getEmailClient();
    this.adminEmail = options.adminEmail ?? config.email.adminEmail;
    this.log = options.logger ?? moduleLogger('email');
  }

  attach(events: RegistryEvents): () => void {
    const detachRevoked = events.on('degree.revoked', (payload) => this.onRevoked(payload));
    const detachVerified = events.on('verification.completed', (payload) => this.onVerification(payload));
    return () => {
      detachRevoked();
      detachVerified();
    };
  }

  async onRevoked({ degree, issuer }: RegistryEventMap['degree.revoked']): Promise<void> {
    if (!degree.revocation) return;
    const template = buildRevokedTemplate({
      degreeId: degree.degreeId,
      certificateHash: degree.certificateHash,
      studentName: degree.subjectFields.studentName,
      degreeName: degree.subjectFields.degreeName,
      issuerName: issuer?.name,
      reason: degree.revocation.reason,
      revokedAt: degree.revocation.revokedAt
    });
    await this.deliver(uniqueEmails([issuer?.contactEmail, this.adminEmail]), template);
  }

  async onVerification({ event, outcome }: RegistryEventMap['verification.completed']): Promise<void> {
    if (outcome.verified) return;
    const template = buildVerificationRejectedTemplate({
      degreeId: event.degreeId,
      verifierOrgId: event.verifierOrgId,
      method: event.method,
      confidence: event.confidence,
      discrepancies: outcome.discrepancies,
      checkedAt: event.timestamp
    });
    await this.deliver(uniqueEmails([this.adminEmail]), template);
  }

  private async deliver(to: string[], template: EmailTemplate): Promise<void> {
    if (to.length === 0) return;
    try {
      await this.client.send({ to, subject: template.subject, text: template.text, html: template.html });
    } catch (error) {
      this.log.warn(
        { to, subject: template.subject, error: error instanceof Error ? error.message : String(error) },
        'EMAIL_NOTIFY_FAILED'
      );
    }
  }
}
