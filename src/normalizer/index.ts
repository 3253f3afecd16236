import type {
  ExtractedFields,
  ExtractionResult,
  ExtractionSignal,
  PermitFields,
  RecordCandidate,
} from '../types/permit';
import { isPlainObject } from '../lib/model-reply';
import {
  AREA_ALIASES,
  DURATION_ALIASES,
  DURATION_END_KEYS,
  DURATION_START_KEYS,
  ERROR_KEYS,
  PLACEHOLDER_VALUES,
  RAW_RESPONSE_KEYS,
  TEXT_FIELD_ALIASES,
  type TextField,
} from './aliases';
import { daysInRange, inclusiveDays, parseCalendarDate } from './dates';

export interface NormalizerOptions {
  /** Day count used when no date range can be read. */
  fallbackDurationDays: number;
}

/** Extractor keys lower-cased; the first spelling of a key wins. */
type FieldIndex = ReadonlyMap<string, unknown>;

function indexFields(fields: ExtractedFields): FieldIndex {
  const index = new Map<string, unknown>();
  for (const [key, value] of Object.entries(fields)) {
    const normalizedKey = key.trim().toLowerCase();
    if (!index.has(normalizedKey)) {
      index.set(normalizedKey, value);
    }
  }
  return index;
}

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_VALUES.has(value.trim().toLowerCase());
}

/**
 * Reads a value as display text. Objects and arrays are flattened into their
 * usable parts; placeholders and empty values become null.
 */
export function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return isPlaceholder(value) ? null : value.trim();
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  const parts = Array.isArray(value) ? value : isPlainObject(value) ? Object.values(value) : [];
  const texts = parts.map(toText).filter((part): part is string => part !== null);
  return texts.length > 0 ? texts.join(', ') : null;
}

/**
 * Reads an area in square metres. Accepts numbers and strings such as
 * "12,5 m²" or "1 200 m2"; negative values count as zero.
 */
export function toArea(value: unknown): number | null {
  let area: number | null = null;
  if (typeof value === 'number') {
    area = Number.isFinite(value) ? value : null;
  } else if (typeof value === 'string' && !isPlaceholder(value)) {
    const match = value
      .replace(/(\d)\s+(?=\d)/g, '$1')
      .replace(',', '.')
      .match(/-?\d+(?:\.\d+)?/);
    area = match ? Number.parseFloat(match[0]) : null;
  }
  return area === null ? null : Math.max(0, area);
}

/**
 * Walks `aliases` in order and returns the first value `read` accepts.
 */
export function resolveAlias<T>(
  index: FieldIndex,
  aliases: readonly string[],
  read: (value: unknown) => T | null
): T | null {
  for (const alias of aliases) {
    const key = alias.toLowerCase();
    if (!index.has(key)) {
      continue;
    }
    const value = read(index.get(key));
    if (value !== null) {
      return value;
    }
  }
  return null;
}

interface ResolvedDuration {
  text: string | null;
  days: number | null;
}

function durationFromBounds(bounds: FieldIndex): ResolvedDuration | null {
  const startText = resolveAlias(bounds, DURATION_START_KEYS, toText);
  const endText = resolveAlias(bounds, DURATION_END_KEYS, toText);
  if (startText === null && endText === null) {
    return null;
  }

  const text = [startText, endText].filter((part): part is string => part !== null).join(' - ');
  const start = startText === null ? null : parseCalendarDate(startText);
  const end = endText === null ? null : parseCalendarDate(endText);
  return { text, days: start && end ? inclusiveDays(start, end) : null };
}

function readDuration(value: unknown): ResolvedDuration | null {
  if (isPlainObject(value)) {
    return durationFromBounds(indexFields(value));
  }
  const text = toText(value);
  return text === null ? null : { text, days: daysInRange(text) };
}

function resolveDuration(index: FieldIndex): ResolvedDuration {
  return (
    resolveAlias(index, DURATION_ALIASES, readDuration) ??
    durationFromBounds(index) ?? { text: null, days: null }
  );
}

function detectSignal(raw: ExtractionResult, index: FieldIndex): ExtractionSignal {
  if (!raw.ok) {
    return { kind: 'error', message: raw.error };
  }
  const error = resolveAlias(index, ERROR_KEYS, toText);
  if (error !== null) {
    return { kind: 'error', message: error };
  }
  const rawResponse = resolveAlias(index, RAW_RESPONSE_KEYS, toText);
  if (rawResponse !== null) {
    return { kind: 'unstructured', text: rawResponse };
  }
  return { kind: 'fields' };
}

/**
 * Maps extractor output onto the canonical permit fields. Never throws:
 * malformed values degrade to null, 0 or the fallback duration and are left
 * for the validator to report.
 */
export function normalize(raw: ExtractionResult, options: NormalizerOptions): RecordCandidate {
  const index = indexFields(raw.ok ? raw.fields : {});
  const signal = detectSignal(raw, index);

  const text = (field: TextField) => resolveAlias(index, TEXT_FIELD_ALIASES[field], toText);
  const duration = resolveDuration(index);

  const fields: PermitFields = {
    applicantName: text('applicantName'),
    companyId: text('companyId'),
    contactDetails: text('contactDetails'),
    purposeOfUse: text('purposeOfUse'),
    location: text('location'),
    durationText: duration.text,
    durationDays: duration.days ?? options.fallbackDurationDays,
    durationResolved: duration.days !== null,
    areaSqm: resolveAlias(index, AREA_ALIASES, toArea) ?? 0,
  };

  return { fields, signal };
}
