import type { ExtractionCache } from '../extraction-cache';
import { assessRecord } from '../fees';
import type { Ingestion } from '../ingestion';
import { RenderFailureError } from '../lib/errors';
import type { EntityExtractor } from '../lib/extractor';
import type { Logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import { normalize } from '../normalizer';
import type { Notifier } from '../notifier';
import type { DraftStore } from '../persistence-service';
import { DOCUMENT_TYPES, type DocumentRenderer } from '../rendering';
import type {
  CanonicalRecord,
  DocumentPaths,
  Draft,
  ExtractionResult,
  PipelineOutcome,
  PipelineStage,
  PermitRequest,
  SubmissionSource,
} from '../types/permit';
import { validate } from '../validation-service';

export interface PipelineSettings {
  ratePerSqmDay: number;
  fallbackDurationDays: number;
  extractionTimeoutMs: number;
}

export interface PipelineDependencies {
  ingestion: Ingestion;
  extractor: EntityExtractor;
  cache: ExtractionCache;
  renderer: DocumentRenderer;
  drafts: DraftStore;
  notifier: Notifier;
  logger: Logger;
  settings: PipelineSettings;
}

export interface ResetSummary {
  drafts: number;
  cacheEntries: number;
  uploads: number;
  documents: number;
}

/**
 * Runs one submission through ingestion, extraction, normalization,
 * validation, fee assessment, rendering and draft creation.
 *
 * Rejected and incomplete submissions are returned as outcomes. Faults
 * (unsupported input, a throwing extractor, a renderer or store failure) are
 * thrown, and no draft exists for the request afterwards. Safe to call
 * concurrently from uploads and the folder monitor.
 */
export class PermitPipeline {
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDependencies) {
    this.log = deps.logger.child({ component: 'pipeline' });
  }

  async processFile(fileName: string, content: Buffer, source: SubmissionSource = 'upload'): Promise<PipelineOutcome> {
    const { request } = await this.deps.ingestion.accept(fileName, content);
    const requestId = request.id;
    this.emit('ingested', requestId, { fileName: request.fileName, mediaKind: request.mediaKind, source });

    let stage: PipelineStage = 'ingested';
    try {
      const extraction = await this.extract(request, content);
      stage = 'extracted';
      this.emit(stage, requestId, { ok: extraction.ok, contentHash: request.contentHash });

      const candidate = normalize(extraction, { fallbackDurationDays: this.deps.settings.fallbackDurationDays });
      stage = 'normalized';
      this.emit(stage, requestId, { signal: candidate.signal.kind });

      const validation = validate(candidate);
      stage = 'validated';
      this.emit(stage, requestId, {
        recognized: validation.isRecognizedDocument,
        complete: validation.isComplete,
      });

      if (!validation.isRecognizedDocument) {
        this.emit('rejected', requestId, { message: validation.message });
        return { status: 'validation_failed', requestId, validation };
      }
      if (!validation.isComplete) {
        this.emit('incomplete', requestId, { missing: validation.missingRequired });
        return { status: 'incomplete_data', requestId, validation, fields: candidate.fields };
      }

      const record = assessRecord(candidate.fields, requestId, this.deps.settings.ratePerSqmDay);
      stage = 'ready';
      this.emit(stage, requestId, { feeCzk: record.feeCzk, durationDays: record.durationDays });

      const documentPaths = await this.render(record, requestId);
      stage = 'rendered';
      this.emit(stage, requestId, { documents: Object.keys(documentPaths) });

      const draft = await this.deps.drafts.create(requestId, record, documentPaths);
      stage = 'drafted';
      this.emit(stage, requestId, { status: draft.status });

      this.notify('draftCreated', draft);
      return { status: 'draft_created', requestId, validation, draft };
    } catch (err) {
      this.log.error({ err, requestId, stage }, 'Processing failed');
      throw err;
    }
  }

  async listDrafts(): Promise<Draft[]> {
    return this.deps.drafts.list();
  }

  async getDraft(id: string): Promise<Draft | null> {
    return this.deps.drafts.get(id);
  }

  /**
   * Approves a draft and, on the first approval, e-mails the applicant.
   */
  async approveDraft(id: string): Promise<Draft> {
    const { draft, changed } = await this.deps.drafts.approve(id);
    if (changed) {
      this.log.info({ requestId: id, approvedAt: draft.approvedAt }, 'Draft approved');
      this.notify('draftApproved', draft);
    }
    return draft;
  }

  async getDocumentPath(id: string, docType: string): Promise<string> {
    return this.deps.drafts.getDocumentPath(id, docType);
  }

  /**
   * Clears the extraction cache only.
   */
  async clearCache(): Promise<number> {
    const cleared = await this.deps.cache.clear();
    this.log.info({ cleared }, 'Extraction cache cleared');
    return cleared;
  }

  /**
   * Administrative reset: drafts, cached extractions, stored uploads and
   * rendered documents.
   */
  async resetAll(): Promise<ResetSummary> {
    const summary: ResetSummary = {
      drafts: await this.deps.drafts.deleteAll(),
      cacheEntries: await this.deps.cache.clear(),
      uploads: await this.deps.ingestion.purge(),
      documents: await this.deps.renderer.purge(),
    };
    this.log.warn(summary, 'All drafts and stored files removed');
    return summary;
  }

  private async extract(request: PermitRequest, content: Buffer): Promise<ExtractionResult> {
    const { extractor, cache, settings } = this.deps;
    return cache.getOrExtract(request.contentHash, async () => {
      const timed = await withTimeout(
        (signal) =>
          extractor.extract({ content, mediaKind: request.mediaKind, fileName: request.fileName }, { signal }),
        settings.extractionTimeoutMs,
        (err) => this.log.debug({ err, requestId: request.id }, 'Extractor failed after its deadline')
      );
      if (timed.timedOut) {
        this.log.warn({ requestId: request.id, timeoutMs: settings.extractionTimeoutMs }, 'Extraction timed out');
        return { ok: false, error: `Extraction timed out after ${settings.extractionTimeoutMs} ms` };
      }
      return timed.value;
    });
  }

  private async render(record: CanonicalRecord, requestId: string): Promise<DocumentPaths> {
    let paths: DocumentPaths;
    try {
      paths = await this.deps.renderer.render(record, requestId);
    } catch (error) {
      throw new RenderFailureError(requestId, error);
    }

    const missing = DOCUMENT_TYPES.find((docType) => !Object.hasOwn(paths, docType) || paths[docType].length === 0);
    if (missing) {
      throw new RenderFailureError(requestId, new Error(`renderer returned no ${missing} document`));
    }
    return paths;
  }

  private emit(stage: PipelineStage, requestId: string, details: Record<string, unknown>): void {
    this.log.info({ requestId, stage, ...details }, `Request ${stage}`);
  }

  private notify(event: keyof Notifier, draft: Draft): void {
    this.deps.notifier[event](draft).catch((err: unknown) => {
      this.log.warn({ err, requestId: draft.id, event }, 'Notification failed');
    });
  }
}
