import type { Organization, OrganizationStatus } from '../domain/entities';
import { assertOrganizationTransition } from '../domain/lifecycle';
import type { LedgerStore } from '../adapters/ledgerStore';
import { config } from '../config/secrets';
import { moduleLogger, type Logger } from '../infra/logging';
import type { RegistryEvents } from '../notifications/events';
import { AppError, ErrorCodes, guardStore } from '../utils/errors';
import { KeyedLock } from '../utils/keyedLock';
import {
  ActorIdSchema,
  OrgIdSchema,
  OrganizationMetadataSchema,
  ReasonSchema,
  StakeSchema,
  parseOrThrow,
  type OrganizationMetadata
} from '../utils/validation';

export interface OrganizationDirectoryOptions {
  authorityOrgId?: string;
  minimumStake?: number;
  events?: RegistryEvents;
  logger?: Logger;
  now?: () => Date;
}

export class OrganizationDirectory {
  readonly authorityOrgId: string;
  readonly minimumStake: number;
  private locks = new KeyedLock();
  private events?: RegistryEvents;
  private log: Logger;
  private now: () => Date;

  constructor(private store: LedgerStore, options: OrganizationDirectoryOptions = {}) {
    this.authorityOrgId = options.authorityOrgId ?? config.authorityOrgId;
    this.minimumStake = options.minimumStake ?? config.minimumStake;
    this.events = options.events;
    this.log = options.logger ?? moduleLogger('organizations');
    this.now = options.now ?? (() => new Date());
  }

  /** Creates the attestation authority record if it is not there yet. */
  async initialize(): Promise<Organization> {
    const timestamp = this.now().toISOString();
    const authority: Organization = {
      orgId: this.authorityOrgId,
      name: 'Degree Attestation Authority',
      contactEmail: config.email.adminEmail || null,
      country: null,
      status: 'ACTIVE',
      stake: 0,
      statusReason: null,
      joinedAt: timestamp,
      updatedAt: timestamp
    };
    const inserted = await guardStore('organizations.putIfAbsent', () =>
      this.store.organizations.putIfAbsent(authority.orgId, authority)
    );
    if (inserted) this.log.info({ orgId: authority.orgId }, 'attestation authority initialized');
    return this.require(this.authorityOrgId);
  }

  async register(orgId: string, metadata: OrganizationMetadata, stake: number): Promise<Organization> {
    const id = parseOrThrow(OrgIdSchema, orgId, 'orgId');
    const meta = parseOrThrow(OrganizationMetadataSchema, metadata, 'metadata');
    const amount = parseOrThrow(StakeSchema, stake, 'stake');
    if (amount < this.minimumStake) {
      throw new AppError(ErrorCodes.INSUFFICIENT_STAKE, `Stake ${amount} is below the minimum of ${this.minimumStake}`, {
        orgId: id,
        stake: amount,
        minimumStake: this.minimumStake
      });
    }

    const timestamp = this.now().toISOString();
    const organization: Organization = {
      orgId: id,
      name: meta.name,
      contactEmail: meta.contactEmail ?? null,
      country: meta.country ?? null,
      status: 'PENDING',
      stake: amount,
      statusReason: null,
      joinedAt: timestamp,
      updatedAt: timestamp
    };
    const inserted = await guardStore('organizations.putIfAbsent', () => this.store.organizations.putIfAbsent(id, organization));
    if (!inserted) {
      throw new AppError(ErrorCodes.DUPLICATE_ORGANIZATION, `Organization ${id} is already registered`, { orgId: id });
    }
    this.log.info({ orgId: id, stake: amount }, 'organization registered');
    this.events?.emit('organization.status_changed', { organization, previousStatus: null });
    return organization;
  }

  approve(orgId: string, actingOrgId: string): Promise<Organization> {
    return this.transition(orgId, actingOrgId, 'ACTIVE', null, ['PENDING']);
  }

  async suspend(orgId: string, reason: string, actingOrgId: string): Promise<Organization> {
    this.requireAuthority(actingOrgId, 'suspend organizations');
    return this.transition(orgId, actingOrgId, 'SUSPENDED', parseOrThrow(ReasonSchema, reason, 'reason'));
  }

  reinstate(orgId: string, actingOrgId: string): Promise<Organization> {
    return this.transition(orgId, actingOrgId, 'ACTIVE', null, ['SUSPENDED']);
  }

  /** Prior degrees stay valid; only an explicit revoke invalidates them. */
  async blacklist(orgId: string, reason: string, actingOrgId: string): Promise<Organization> {
    this.requireAuthority(actingOrgId, 'blacklist organizations');
    const why = parseOrThrow(ReasonSchema, reason, 'reason');
    if (orgId === this.authorityOrgId) {
      throw new AppError(ErrorCodes.INVALID_STATUS, 'The attestation authority cannot be blacklisted', { orgId });
    }
    return this.transition(orgId, actingOrgId, 'BLACKLISTED', why);
  }

  async get(orgId: string): Promise<Organization | null> {
    const row = await guardStore('organizations.get', () => this.store.organizations.get(orgId));
    return row ? row.value : null;
  }

  async list(status?: OrganizationStatus): Promise<Organization[]> {
    const all = await guardStore('organizations.values', () => this.store.organizations.values());
    return all.filter((org) => !status || org.status === status).sort((a, b) => a.orgId.localeCompare(b.orgId));
  }

  async isEligibleIssuer(orgId: string): Promise<boolean> {
    const org = await this.get(orgId);
    return org?.status === 'ACTIVE';
  }

  isAuthority(orgId: string): boolean {
    return orgId === this.authorityOrgId;
  }

  /** Throws UNAUTHORIZED unless `actingOrgId` is the attestation authority. */
  requireAuthority(actingOrgId: string, action: string): void {
    const actor = parseOrThrow(ActorIdSchema, actingOrgId, 'actingOrgId');
    if (!this.isAuthority(actor)) {
      throw new AppError(ErrorCodes.UNAUTHORIZED, `Only the attestation authority may ${action}`, { actingOrgId: actor, action });
    }
  }

  private async require(orgId: string): Promise<Organization> {
    const org = await this.get(orgId);
    if (!org) throw new AppError(ErrorCodes.ORGANIZATION_NOT_FOUND, `Organization ${orgId} not found`, { orgId });
    return org;
  }

  private async transition(
    orgId: string,
    actingOrgId: string,
    to: OrganizationStatus,
    reason: string | null,
    allowedFrom?: OrganizationStatus[]
  ): Promise<Organization> {
    this.requireAuthority(actingOrgId, `change organization status to ${to}`);
    const updated = await this.locks.run(orgId, async () => {
      const row = await guardStore('organizations.get', () => this.store.organizations.get(orgId));
      if (!row) throw new AppError(ErrorCodes.ORGANIZATION_NOT_FOUND, `Organization ${orgId} not found`, { orgId });
      const current = row.value;
      if (allowedFrom && !allowedFrom.includes(current.status)) {
        throw new AppError(ErrorCodes.INVALID_STATUS, `Organization ${orgId} is ${current.status}, expected ${allowedFrom.join(' or ')}`, {
          orgId,
          status: current.status
        });
      }
      assertOrganizationTransition(orgId, current.status, to);

      const next: Organization = { ...current, status: to, statusReason: reason, updatedAt: this.now().toISOString() };
      const swapped = await guardStore('organizations.compareAndSwap', () =>
        this.store.organizations.compareAndSwap(orgId, row.version, next)
      );
      if (!swapped) {
        throw new AppError(ErrorCodes.INTERNAL_ERROR, `Organization ${orgId} was modified concurrently`, { orgId });
      }
      return { next, previousStatus: current.status };
    });

    this.log.info({ orgId, from: updated.previousStatus, to, actingOrgId }, 'organization status changed');
    this.events?.emit('organization.status_changed', { organization: updated.next, previousStatus: updated.previousStatus });
    return updated.next;
  }
}
