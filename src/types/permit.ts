/**
 * Kinds of submission the intake accepts, derived from the file extension.
 */
export type MediaKind = "pdf" | "image" | "docx" | "text";

/**
 * Where a submission came from. Both sources are processed identically.
 */
export type SubmissionSource = "upload" | "folder";

/**
 * A single accepted submission. Created once by ingestion and never changed.
 */
export interface PermitRequest {
  id: string; // UUID v4, also the id of the draft created for this request
  fileName: string; // Original (sanitized) file name
  mediaKind: MediaKind;
  contentHash: string; // SHA-256 hex digest of the submitted bytes
  receivedAt: string; // ISO 8601
}

/**
 * Loosely structured output of the entity extractor. Keys follow whatever
 * naming the extractor chose.
 */
export type ExtractedFields = Record<string, unknown>;

/**
 * What the extractor produced for a given content hash: either a field map or
 * an explicit error marker.
 */
export type ExtractionResult =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; error: string };

/**
 * Permit fields after alias resolution. Text fields are null when the
 * extractor did not supply a usable value.
 */
export interface PermitFields {
  applicantName: string | null;
  companyId: string | null;
  contactDetails: string | null;
  purposeOfUse: string | null;
  location: string | null;
  durationText: string | null; // Duration as the applicant wrote it
  durationDays: number; // Inclusive day count, fallback applied
  durationResolved: boolean; // False when durationDays is the fallback
  areaSqm: number;
}

/**
 * How the extractor output should be read before completeness is checked.
 */
export type ExtractionSignal =
  | { kind: "fields" }
  | { kind: "error"; message: string }
  | { kind: "unstructured"; text: string };

export interface RecordCandidate {
  fields: PermitFields;
  signal: ExtractionSignal;
}

/**
 * Normalized permit record with the computed fee and payment reference.
 */
export interface CanonicalRecord extends PermitFields {
  feeCzk: number;
  variableSymbol: string; // 10 digits
}

export type FieldValue = string | number;

export interface ValidationResult {
  isRecognizedDocument: boolean;
  isComplete: boolean;
  missingRequired: string[];
  missingOptional: string[];
  foundFields: Record<string, FieldValue>;
  message: string | null;
}

export type DraftStatus = "pending_approval" | "approved";

export type DocumentType = "consent" | "payment";

/**
 * Rendered artifacts of a draft, keyed by document type.
 */
export type DocumentPaths = Record<string, string>;

/**
 * A rendered permit packet awaiting (or past) clerk approval.
 */
export interface Draft {
  id: string;
  createdAt: string;
  record: CanonicalRecord;
  documentPaths: DocumentPaths;
  status: DraftStatus;
  approvedAt?: string;
}

/**
 * Stages a request passes through, in order. Rejected and incomplete
 * requests stop at the validation boundary.
 */
export type PipelineStage =
  | "ingested"
  | "extracted"
  | "normalized"
  | "validated"
  | "rejected"
  | "incomplete"
  | "ready"
  | "rendered"
  | "drafted";

export type PipelineOutcome =
  | { status: "validation_failed"; requestId: string; validation: ValidationResult }
  | {
      status: "incomplete_data";
      requestId: string;
      validation: ValidationResult;
      fields: PermitFields;
    }
  | {
      status: "draft_created";
      requestId: string;
      validation: ValidationResult;
      draft: Draft;
    };
