import { z } from 'zod';
import type { KeyValueStore, RecordSchema } from '../lib/kv-store';
import type { Logger } from '../lib/logger';
import type { ExtractionResult } from '../types/permit';

export const extractionResultSchema: RecordSchema<ExtractionResult> = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), fields: z.record(z.unknown()) }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

/**
 * Content-hash keyed cache of extractor output.
 *
 * - Concurrent calls for the same hash share a single in-flight extraction.
 * - Successful results are stored and never expire; only `clear()` removes them.
 * - Error markers are returned but not stored, so a resubmission extracts again.
 * - An unreadable entry is treated as a miss.
 */
export class ExtractionCache {
  private readonly inFlight = new Map<string, Promise<ExtractionResult>>();

  constructor(
    private readonly store: KeyValueStore<ExtractionResult>,
    private readonly logger: Logger
  ) {}

  async getOrExtract(contentHash: string, extract: () => Promise<ExtractionResult>): Promise<ExtractionResult> {
    const pending = this.inFlight.get(contentHash);
    if (pending) {
      return pending;
    }

    const lookup = this.resolve(contentHash, extract).finally(() => {
      this.inFlight.delete(contentHash);
    });
    this.inFlight.set(contentHash, lookup);
    return lookup;
  }

  /**
   * Removes every cached result and resolves with how many were removed.
   */
  async clear(): Promise<number> {
    return this.store.clear();
  }

  async size(): Promise<number> {
    return this.store.size();
  }

  private async resolve(
    contentHash: string,
    extract: () => Promise<ExtractionResult>
  ): Promise<ExtractionResult> {
    const cached = await this.read(contentHash);
    if (cached) {
      return cached;
    }

    const result = await extract();
    if (result.ok) {
      await this.write(contentHash, result);
    }
    return result;
  }

  private async read(contentHash: string): Promise<ExtractionResult | null> {
    try {
      return await this.store.get(contentHash);
    } catch (err) {
      this.logger.warn({ err, contentHash }, 'Unreadable extraction cache entry, extracting again');
      return null;
    }
  }

  private async write(contentHash: string, result: ExtractionResult): Promise<void> {
    try {
      const inserted = await this.store.insert(contentHash, result);
      // A corrupt entry under the same hash is replaced
      if (!inserted) {
        await this.store.update(contentHash, result);
      }
    } catch (err) {
      this.logger.warn({ err, contentHash }, 'Could not write extraction cache entry');
    }
  }
}
