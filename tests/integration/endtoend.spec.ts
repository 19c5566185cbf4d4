import { describe, it, expect } from 'vitest';
import { createAttestationCore } from '../../src';
import type { EmailClient, EmailSendParams } from '../../src/notifications/email';
import { steppingClock } from '../support/core';

class InboxEmailClient implements EmailClient {
  configured = true;
  inbox: EmailSendParams[] = [];

  async send(payload: EmailSendParams): Promise<void> {
    this.inbox.push(payload);
  }
}

describe('attestation flow', () => {
  it('onboards an issuer, attests a degree, verifies it and revokes it', async () => {
    const mail = new InboxEmailClient();
    const core = await createAttestationCore({
      authorityOrgId: 'REGISTRY',
      minimumStake: 500,
      email: mail,
      now: steppingClock()
    });

    await expect(core.getOrganization('REGISTRY')).resolves.toMatchObject({ status: 'ACTIVE', stake: 0 });

    await core.registerOrganization('UNIV-A', { name: 'University A', contactEmail: 'registrar@univ-a.test' }, 500);
    await expect(core.submitDegree('UNIV-A', 'f'.repeat(64), {})).rejects.toMatchObject({ code: 'ISSUER_NOT_ELIGIBLE' });
    await core.approveOrganization('UNIV-A', 'REGISTRY');

    const document = Buffer.from('Jane Doe, Bachelor of Science, 2024');
    const hash = core.computeCertificateHash(document);
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(core.computeCertificateHash(Buffer.from('Jane Doe, Bachelor of Science, 2024'))).toBe(hash);

    const degree = await core.submitDegree('UNIV-A', hash, {
      studentName: 'Jane Doe',
      degreeName: 'Bachelor of Science',
      issuanceDate: '2024-06-01'
    });

    const accepted = await core.verify(hash, { studentName: 'JANE DOE', issuanceDate: '2024-06-01' }, 'EMPLOYER-1');
    expect(accepted).toMatchObject({ verified: true, confidence: 1, method: 'HASH_AND_FIELDS', degreeId: degree.degreeId });

    await core.revoke(degree.degreeId, 'Degree rescinded', 'REGISTRY');
    const refused = await core.verify(hash, undefined, 'EMPLOYER-2');
    expect(refused).toMatchObject({ verified: false, confidence: 0, method: 'DEGREE_REVOKED' });

    const stored = await core.getDegree(hash);
    expect(stored).toMatchObject({ status: 'REVOKED', verificationCount: 1 });

    const history = await core.getVerificationHistory(degree.degreeId);
    expect(history.map((event) => [event.verifierOrgId, event.verified])).toEqual([
      ['EMPLOYER-2', false],
      ['EMPLOYER-1', true]
    ]);
    await expect(core.getVerificationHistory('unknown')).rejects.toMatchObject({ code: 'DEGREE_NOT_FOUND' });

    expect(await core.getOrganizationStatistics('UNIV-A')).toEqual({
      issuerOrgId: 'UNIV-A',
      totalDegrees: 1,
      activeDegrees: 0,
      revokedDegrees: 1,
      totalVerifications: 1
    });

    await core.events.drain();
    expect(mail.inbox.map((message) => message.subject)).toEqual([`[Degree Attestation] Degree Revoked: ${degree.degreeId}`]);
  });

  it('keeps degrees from a blacklisted issuer verifiable until revoked', async () => {
    const core = await createAttestationCore({ authorityOrgId: 'REGISTRY', minimumStake: 500, email: false });
    await core.registerOrganization('MILL-U', { name: 'Mill University' }, 600);
    await core.approveOrganization('MILL-U', 'REGISTRY');
    const degree = await core.submitDegree('MILL-U', 'e'.repeat(64), { studentName: 'Sam Roe' });

    await core.blacklistOrganization('MILL-U', 'Diploma mill', 'REGISTRY');

    await expect(core.verify('e'.repeat(64), undefined, 'EMPLOYER-1')).resolves.toMatchObject({ verified: true });
    await expect(core.submitDegree('MILL-U', 'd'.repeat(64), {})).rejects.toMatchObject({ code: 'ISSUER_NOT_ELIGIBLE' });
    await core.revoke(degree.degreeId, 'Issuer blacklisted', 'REGISTRY');
    await expect(core.verify('e'.repeat(64), undefined, 'EMPLOYER-1')).resolves.toMatchObject({ verified: false });
  });

  it('verifies in bulk and reports per verifier', async () => {
    const core = await createAttestationCore({ authorityOrgId: 'REGISTRY', minimumStake: 500, email: false, now: steppingClock() });
    await core.registerOrganization('UNIV-A', { name: 'University A' }, 500);
    await core.approveOrganization('UNIV-A', 'REGISTRY');
    const first = await core.submitDegree('UNIV-A', '1'.repeat(64), { studentName: 'Jane Doe' });
    const second = await core.submitDegree('UNIV-A', '2'.repeat(64), { studentName: 'John Roe' });

    const results = await core.verifyBatch([
      { certificateHash: '1'.repeat(64), ocrFields: { studentName: 'Jane Doe' }, verifierOrgId: 'EMPLOYER-1' },
      { certificateHash: '2'.repeat(64), ocrFields: { studentName: 'Zzzz Qqqq' }, verifierOrgId: 'EMPLOYER-1' },
      { certificateHash: '3'.repeat(64), verifierOrgId: 'EMPLOYER-1' }
    ]);
    expect(results.map((result) => result.verified)).toEqual([true, false, false]);

    const history = await core.getVerifierHistory('EMPLOYER-1');
    expect(history.total).toBe(2);
    expect(history.items.map((event) => event.degreeId).sort()).toEqual([first.degreeId, second.degreeId].sort());

    const stats = await core.getVerifierStatistics('EMPLOYER-1');
    expect(stats).toMatchObject({ totalVerifications: 2, successfulVerifications: 1, failedVerifications: 1, successRate: 0.5 });
    expect(await core.getVerifierStatistics('EMPLOYER-2')).toMatchObject({ totalVerifications: 0, lastVerificationAt: null });
  });
});
