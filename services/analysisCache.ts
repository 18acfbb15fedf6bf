import { EventEmitter } from 'events';
import { logger } from './logger';

export const ETL_COMPLETED = 'etl:completed';

/** Raised by the load process when new NF-e data lands in the store. */
export const etlEvents = new EventEmitter();

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface AnalysisCacheOptions {
  ttlSeconds: number;
  events?: EventEmitter;
  clock?: () => number;
}

/**
 * Keyed results with a time-to-live. Concurrent lookups for the same key share one computation.
 * Everything is dropped when the ETL announces new data.
 */
export class AnalysisCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private pending = new Map<string, Promise<T>>();
  private generation = 0;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly events?: EventEmitter;
  private readonly onEtlCompleted = () => this.invalidate();

  constructor(options: AnalysisCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.clock ?? Date.now;
    this.events = options.events;
    this.events?.on(ETL_COMPLETED, this.onEtlCompleted);
  }

  get size() {
    return this.entries.size;
  }

  peek(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async getOrCompute(key: string, compute: () => Promise<T>, shouldCache: (value: T) => boolean = () => true): Promise<T> {
    const cached = this.peek(key);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const generation = this.generation;
    const promise = compute()
      .then((value) => {
        if (shouldCache(value) && generation === this.generation) {
          this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });
        }
        return value;
      })
      .finally(() => {
        if (this.pending.get(key) === promise) {
          this.pending.delete(key);
        }
      });
    this.pending.set(key, promise);
    return promise;
  }

  invalidate(key?: string) {
    if (key === undefined) {
      this.entries.clear();
      this.pending.clear();
      this.generation += 1;
      logger.log('AnalysisCache', 'INFO', 'Cache de análise invalidado.', undefined, { scope: 'backend' });
      return;
    }
    this.entries.delete(key);
    this.pending.delete(key);
  }

  dispose() {
    this.events?.off(ETL_COMPLETED, this.onEtlCompleted);
    this.entries.clear();
    this.pending.clear();
  }
}
