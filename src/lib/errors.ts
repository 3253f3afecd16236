/**
 * Infrastructure and programming faults. Business outcomes (a rejected or
 * incomplete submission) are returned as values and never appear here.
 */
export class PermitServiceError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Unsupported or unreadable input. Nothing is stored for the request.
 */
export class IngestionError extends PermitServiceError {
  constructor(message: string) {
    super(message, 'INGESTION_FAILED', 400);
  }
}

export class DraftNotFoundError extends PermitServiceError {
  constructor(readonly draftId: string, docType?: string) {
    super(
      docType ? `Document ${docType} not found for draft ${draftId}` : `Draft ${draftId} not found`,
      'DRAFT_NOT_FOUND',
      404
    );
  }
}

/**
 * Ids are generated per request, so a second create under the same id is a bug.
 */
export class DuplicateDraftError extends PermitServiceError {
  constructor(readonly draftId: string) {
    super(`Draft ${draftId} already exists`, 'DUPLICATE_DRAFT', 409);
  }
}

export class RenderFailureError extends PermitServiceError {
  constructor(requestId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rendering documents for request ${requestId} failed: ${reason}`, 'RENDER_FAILED', 502, { cause });
  }
}

/**
 * A stored value that no longer matches its schema.
 */
export class CorruptRecordError extends PermitServiceError {
  constructor(key: string, reason: string) {
    super(`Stored record ${key} is unreadable: ${reason}`, 'CORRUPT_RECORD', 500);
  }
}
