import type { DegreeRecord, Organization, OrganizationStatus, VerificationEvent, VerificationOutcome } from '../domain/entities';
import { moduleLogger, type Logger } from '../infra/logging';

export interface RegistryEventMap {
  'degree.submitted': { degree: DegreeRecord };
  'degree.revoked': { degree: DegreeRecord; issuer: Organization | null };
  'verification.completed': { event: VerificationEvent; outcome: VerificationOutcome; degree: DegreeRecord };
  'organization.status_changed': { organization: Organization; previousStatus: OrganizationStatus | null };
}

export type RegistryEventType = keyof RegistryEventMap;

export type RegistryEventListener<K extends RegistryEventType> = (payload: RegistryEventMap[K]) => void | Promise<void>;

type ListenerSets = { [K in RegistryEventType]: Set<RegistryEventListener<K>> };

/**
 * Notification channel for collaborators outside the core. Published only
 * after the change it describes has been committed. `emit` starts every
 * listener and returns without waiting for them; listener failures are
 * logged and never reach the publishing operation.
 */
export class RegistryEvents {
  private listeners: ListenerSets = {
    'degree.submitted': new Set(),
    'degree.revoked': new Set(),
    'verification.completed': new Set(),
    'organization.status_changed': new Set()
  };
  private pending = new Set<Promise<void>>();
  private log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? moduleLogger('events');
  }

  on<K extends RegistryEventType>(type: K, listener: RegistryEventListener<K>): () => void {
    const set: Set<RegistryEventListener<K>> = this.listeners[type];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  listenerCount(type: RegistryEventType): number {
    return this.listeners[type].size;
  }

  emit<K extends RegistryEventType>(type: K, payload: RegistryEventMap[K]): void {
    const set: Set<RegistryEventListener<K>> = this.listeners[type];
    for (const listener of set) {
      const delivery = this.deliver(type, listener, payload);
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
  }

  /** Resolves once every delivery started so far has finished. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  get inFlight(): number {
    return this.pending.size;
  }

  private async deliver<K extends RegistryEventType>(
    type: K,
    listener: RegistryEventListener<K>,
    payload: RegistryEventMap[K]
  ): Promise<void> {
    try {
      await listener(payload);
    } catch (err) {
      this.log.warn({ err, type }, 'event listener failed');
    }
  }
}
