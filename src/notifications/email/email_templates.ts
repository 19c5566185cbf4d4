import { config } from '../../config/secrets';
import type { KeyField, VerificationMethod } from '../../domain/entities';

export interface EmailTemplate {
  subject: string;
  text: string;
  html: string;
}

export interface RevokedTemplateInput {
  degreeId: string;
  certificateHash: string;
  studentName?: string | null;
  degreeName?: string | null;
  issuerName?: string | null;
  reason: string;
  revokedAt: string;
}

export interface VerificationRejectedTemplateInput {
  degreeId: string;
  verifierOrgId: string;
  method: VerificationMethod;
  confidence: number;
  discrepancies: KeyField[];
  checkedAt: string;
}

const FIELD_LABELS: Record<KeyField, string> = {
  studentName: 'Student name',
  degreeName: 'Degree',
  institutionName: 'Institution',
  issuanceDate: 'Issuance date',
  certificateNumber: 'Certificate number'
};

function safe(value: string | null | undefined, fallback = 'n/a'): string {
  if (!value || value.trim().length === 0) return fallback;
  return value;
}

function shortHex(value: string, length = 16): string {
  if (value.length <= length) return value;
  return `${value.slice(0, length / 2)}…${value.slice(-length / 2)}`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderText(intro: string[], rows: Array<[string, string]>, outro: string[]): string {
  const body = rows.map(([label, val]) => `${label}: ${val}`);
  return [...intro, '', ...body, '', ...outro].join('\n');
}

function renderHtml(title: string, intro: string[], rows: Array<[string, string]>, outro: string[]): string {
  const rowHtml = rows
    .map(
      ([label, val]) =>
        `<tr><td style="padding:4px 0;font-weight:600;color:#111827;">${escapeHtml(label)}</td><td style="padding:4px 0;color:#111827;">${escapeHtml(val)}</td></tr>`
    )
    .join('');
  const introHtml = intro.map((line) => `<p style="margin:0 0 12px 0;color:#111827;">${escapeHtml(line)}</p>`).join('');
  const outroHtml = outro.map((line) => `<p style="margin:12px 0 0 0;color:#111827;">${escapeHtml(line)}</p>`).join('');
  return `<!DOCTYPE html><html><body style="font-family:Arial,Helvetica,sans-serif;background-color:#f3f4f6;padding:24px;">
    <div style="max-width:520px;margin:0 auto;background-color:#ffffff;border-radius:8px;padding:24px;">
      <h2 style="margin-top:0;color:#111827;font-size:20px;">${escapeHtml(title)}</h2>
      ${introHtml}
      <table style="width:100%;border-collapse:collapse;">${rowHtml}</table>
      ${outroHtml}
      <p style="margin-top:24px;color:#6b7280;font-size:12px;">${escapeHtml(config.email.appName)}</p>
    </div>
  </body></html>`;
}

export function buildRevokedTemplate(input: RevokedTemplateInput): EmailTemplate {
  const subject = `[${config.email.appName}] Degree Revoked: ${input.degreeId}`;
  const intro = [
    `The degree "${safe(input.degreeName, 'Untitled degree')}" issued to ${safe(input.studentName, 'an unnamed student')} has been revoked.`,
    'Any further verification of this certificate will fail.'
  ];
  const rows: Array<[string, string]> = [
    ['Degree ID', input.degreeId],
    ['Issuer', safe(input.issuerName, 'Unknown issuer')],
    ['Certificate hash', shortHex(input.certificateHash)],
    ['Revoked at', input.revokedAt],
    ['Reason', input.reason]
  ];
  const outro = ['If this revocation was unexpected, please contact the attestation authority.'];
  return {
    subject,
    text: renderText(intro, rows, outro),
    html: renderHtml('Degree Revoked', intro, rows, outro)
  };
}

export function buildVerificationRejectedTemplate(input: VerificationRejectedTemplateInput): EmailTemplate {
  const subject = `[${config.email.appName}] Verification Rejected: ${input.degreeId}`;
  const intro =
    input.method === 'DEGREE_REVOKED'
      ? [`${input.verifierOrgId} presented a certificate whose degree has been revoked.`]
      : [`${input.verifierOrgId} presented a certificate whose fields do not match the registered degree.`];
  const rows: Array<[string, string]> = [
    ['Degree ID', input.degreeId],
    ['Method', input.method],
    ['Confidence', input.confidence.toFixed(2)],
    ['Checked at', input.checkedAt]
  ];
  if (input.discrepancies.length > 0) {
    rows.push(['Mismatched fields', input.discrepancies.map((field) => FIELD_LABELS[field]).join(', ')]);
  }
  const outro = ['Review the verification history for this degree before taking further action.'];
  return {
    subject,
    text: renderText(intro, rows, outro),
    html: renderHtml('Verification Rejected', intro, rows, outro)
  };
}
