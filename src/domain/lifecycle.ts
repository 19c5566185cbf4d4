import type { DegreeStatus, OrganizationStatus } from './entities';
import { AppError, ErrorCodes } from '../utils/errors';

const DEGREE_TRANSITIONS: Record<DegreeStatus, readonly DegreeStatus[]> = {
  ACTIVE: ['REVOKED'],
  REVOKED: []
};

const ORGANIZATION_TRANSITIONS: Record<OrganizationStatus, readonly OrganizationStatus[]> = {
  PENDING: ['ACTIVE', 'BLACKLISTED'],
  ACTIVE: ['SUSPENDED', 'BLACKLISTED'],
  SUSPENDED: ['ACTIVE', 'BLACKLISTED'],
  BLACKLISTED: []
};

export function canTransitionDegree(from: DegreeStatus, to: DegreeStatus): boolean {
  return DEGREE_TRANSITIONS[from].includes(to);
}

export function canTransitionOrganization(from: OrganizationStatus, to: OrganizationStatus): boolean {
  return ORGANIZATION_TRANSITIONS[from].includes(to);
}

export function isTerminalDegreeStatus(status: DegreeStatus): boolean {
  return DEGREE_TRANSITIONS[status].length === 0;
}

export function assertDegreeTransition(degreeId: string, from: DegreeStatus, to: DegreeStatus): void {
  if (canTransitionDegree(from, to)) return;
  if (from === 'REVOKED') {
    throw new AppError(ErrorCodes.ALREADY_REVOKED, `Degree ${degreeId} is already revoked`, { degreeId });
  }
  throw new AppError(ErrorCodes.INVALID_STATUS, `Degree ${degreeId} cannot move from ${from} to ${to}`, { degreeId, from, to });
}

export function assertOrganizationTransition(orgId: string, from: OrganizationStatus, to: OrganizationStatus): void {
  if (canTransitionOrganization(from, to)) return;
  throw new AppError(ErrorCodes.INVALID_STATUS, `Organization ${orgId} cannot move from ${from} to ${to}`, { orgId, from, to });
}
