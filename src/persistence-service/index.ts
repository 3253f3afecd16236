import { z } from 'zod';
import { DraftNotFoundError, DuplicateDraftError } from '../lib/errors';
import { KeyedLock } from '../lib/keyed-lock';
import type { KeyValueStore, RecordSchema } from '../lib/kv-store';
import type { CanonicalRecord, DocumentPaths, Draft } from '../types/permit';

const canonicalRecordSchema: RecordSchema<CanonicalRecord> = z.object({
  applicantName: z.string().nullable(),
  companyId: z.string().nullable(),
  contactDetails: z.string().nullable(),
  purposeOfUse: z.string().nullable(),
  location: z.string().nullable(),
  durationText: z.string().nullable(),
  durationDays: z.number().int().nonnegative(),
  durationResolved: z.boolean(),
  areaSqm: z.number().nonnegative(),
  feeCzk: z.number().int().nonnegative(),
  variableSymbol: z.string().regex(/^\d{10}$/),
});

export const draftSchema: RecordSchema<Draft> = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  record: canonicalRecordSchema,
  documentPaths: z.record(z.string()),
  status: z.enum(['pending_approval', 'approved']),
  approvedAt: z.string().optional(),
});

export interface ApprovalResult {
  draft: Draft;
  changed: boolean;
}

/**
 * Lifecycle store for drafts. A draft is created once as `pending_approval`
 * and can only move to `approved`.
 *
 * Approving an already approved draft is a no-op that returns the stored
 * draft with its original `approvedAt`.
 */
export class DraftStore {
  private readonly approvals = new KeyedLock();

  constructor(
    private readonly store: KeyValueStore<Draft>,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Throws DuplicateDraftError when a draft with this id already exists.
   */
  async create(id: string, record: CanonicalRecord, documentPaths: DocumentPaths): Promise<Draft> {
    const draft: Draft = {
      id,
      createdAt: this.clock().toISOString(),
      record,
      documentPaths: { ...documentPaths },
      status: 'pending_approval',
    };

    const inserted = await this.store.insert(id, draft);
    if (!inserted) {
      throw new DuplicateDraftError(id);
    }
    return draft;
  }

  async get(id: string): Promise<Draft | null> {
    return this.store.get(id);
  }

  /**
   * Throws DraftNotFoundError, leaving the store untouched, when the id is unknown.
   * `changed` is true only for the call that moved the draft to `approved`.
   */
  async approve(id: string): Promise<ApprovalResult> {
    return this.approvals.runExclusive(id, async () => {
      const draft = await this.store.get(id);
      if (!draft) {
        throw new DraftNotFoundError(id);
      }
      if (draft.status === 'approved') {
        return { draft, changed: false };
      }

      const approved: Draft = { ...draft, status: 'approved', approvedAt: this.clock().toISOString() };
      const updated = await this.store.update(id, approved);
      if (!updated) {
        throw new DraftNotFoundError(id);
      }
      return { draft: approved, changed: true };
    });
  }

  /**
   * All drafts, newest first.
   */
  async list(): Promise<Draft[]> {
    const drafts = await this.store.list();
    return drafts.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async size(): Promise<number> {
    return this.store.size();
  }

  /**
   * Administrative purge. Resolves with the number of drafts removed.
   */
  async deleteAll(): Promise<number> {
    return this.store.clear();
  }

  async getDocumentPath(id: string, docType: string): Promise<string> {
    const draft = await this.store.get(id);
    if (!draft) {
      throw new DraftNotFoundError(id);
    }
    const documentPath = Object.hasOwn(draft.documentPaths, docType) ? draft.documentPaths[docType] : undefined;
    if (documentPath === undefined) {
      throw new DraftNotFoundError(id, docType);
    }
    return documentPath;
  }
}
