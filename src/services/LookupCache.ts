import type { ServiceOptions } from '../types/config';
import type { LookupResult } from '../types/lookup';
import { hashObject } from '../utils/hash';
import { ExtensionLogger } from '../utils/logger';
import type { LookupTask } from './LookupTask';

export const MIN_HEARTBEAT_INTERVAL_MS = 20;

export interface LookupCacheKey {
  langFrom: string;
  langTo: string;
  text: string;
  fingerprint: string;
}

export interface LookupCacheOptions {
  maxEntries?: number;
  heartbeatIntervalMs?: number;
  onHeartbeat?: () => void;
}

export class LookupCache {
  private readonly entries = new Map<string, LookupResult>();
  private readonly inFlight = new Map<string, Promise<LookupResult>>();
  private readonly maxEntries: number;
  readonly heartbeatIntervalMs: number;
  private readonly onHeartbeat?: () => void;

  constructor(
    private readonly logger: ExtensionLogger,
    options?: LookupCacheOptions,
  ) {
    this.maxEntries = Math.max(1, options?.maxEntries ?? 64);
    this.heartbeatIntervalMs = Math.max(MIN_HEARTBEAT_INTERVAL_MS, options?.heartbeatIntervalMs ?? 1000);
    this.onHeartbeat = options?.onHeartbeat;
  }

  static fingerprint(serviceName: string, options: ServiceOptions): string {
    return hashObject({ service: serviceName, options });
  }

  get size(): number {
    return this.entries.size;
  }

  peek(key: LookupCacheKey): LookupResult | undefined {
    return this.entries.get(this.buildKey(key));
  }

  clear(): void {
    this.entries.clear();
  }

  async getOrCompute(key: LookupCacheKey, factory: () => LookupTask): Promise<LookupResult> {
    const id = this.buildKey(key);
    const cached = this.entries.get(id);

    if (cached) {
      this.entries.delete(id);
      this.entries.set(id, cached);
      return cached;
    }

    const pending = this.inFlight.get(id);

    if (pending) {
      return pending;
    }

    const computation = this.compute(id, factory);
    this.inFlight.set(id, computation);

    try {
      return await computation;
    } finally {
      if (this.inFlight.get(id) === computation) {
        this.inFlight.delete(id);
      }
    }
  }

  private async compute(id: string, factory: () => LookupTask): Promise<LookupResult> {
    const task = factory();
    task.start();

    const heartbeat = setInterval(() => this.beat(), this.heartbeatIntervalMs);
    let result: LookupResult;

    try {
      result = await task.join();
    } finally {
      clearInterval(heartbeat);
    }

    if (result.error) {
      this.logger.warn(`Lookup failed, clearing ${this.entries.size} cached entries.`);
      this.clear();
      return result;
    }

    this.entries.set(id, result);
    this.enforceCapacity();
    return result;
  }

  private beat(): void {
    try {
      this.onHeartbeat?.();
    } catch (error) {
      this.logger.error('Lookup heartbeat failed.', error);
    }
  }

  private enforceCapacity(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();

      if (oldest.done) {
        return;
      }

      this.entries.delete(oldest.value);
    }
  }

  private buildKey(key: LookupCacheKey): string {
    return JSON.stringify([key.langFrom, key.langTo, key.text, key.fingerprint]);
  }
}
