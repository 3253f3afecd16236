import type { FieldValue, PermitFields, RecordCandidate, ValidationResult } from '../types/permit';

/**
 * Field labels as shown to applicants and clerks. The order of each list is
 * the order missing fields are reported in.
 */
export const REQUIRED_FIELD_LABELS = ['Jméno žadatele', 'Účel užívání', 'Místo/lokace'] as const;
export const OPTIONAL_FIELD_LABELS = ['IČO', 'Kontaktní údaje', 'Doba užívání', 'Výměra'] as const;

export type RequiredFieldLabel = (typeof REQUIRED_FIELD_LABELS)[number];
export type OptionalFieldLabel = (typeof OPTIONAL_FIELD_LABELS)[number];

export const MESSAGES = {
  extractionFailed: 'Dokument neobsahuje žádné rozpoznatelné ZUVP údaje.',
  notPermitDocument:
    'Nahraný dokument není ZUVP žádost. Nahrajte prosím správný formulář žádosti o zvláštní užívání veřejného prostranství.',
  noRecognizedFields:
    'Dokument neobsahuje rozpoznatelné ZUVP údaje. Zkontrolujte, zda jste nahráli správný formulář.',
  missingRequired: (labels: readonly string[]) => `Chybí povinné údaje: ${labels.join(', ')}`,
  missingOptional: (labels: readonly string[]) => `Chybí nepovinné údaje: ${labels.join(', ')}`,
} as const;

// Phrases an extractor uses when it has looked at the document and decided it is something else
const NOT_PERMIT_MARKERS = ['not a zuvp', 'není zuvp', 'not a permit application'];

type LabelReader = (fields: PermitFields) => FieldValue | null;

const FIELD_READERS: Record<RequiredFieldLabel | OptionalFieldLabel, LabelReader> = {
  'Jméno žadatele': (fields) => fields.applicantName,
  'Účel užívání': (fields) => fields.purposeOfUse,
  'Místo/lokace': (fields) => fields.location,
  'IČO': (fields) => fields.companyId,
  'Kontaktní údaje': (fields) => fields.contactDetails,
  'Doba užívání': (fields) => fields.durationText,
  'Výměra': (fields) => (fields.areaSqm > 0 ? fields.areaSqm : null),
};

function rejected(message: string): ValidationResult {
  return {
    isRecognizedDocument: false,
    isComplete: false,
    missingRequired: [...REQUIRED_FIELD_LABELS],
    missingOptional: [...OPTIONAL_FIELD_LABELS],
    foundFields: {},
    message,
  };
}

function saysNotPermit(text: string): boolean {
  const lower = text.toLowerCase();
  return NOT_PERMIT_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Classifies a normalized submission.
 *
 * Recognition comes first: an extraction error, an extractor reply saying the
 * document is something else, or a submission without a single usable field
 * is rejected with a fixed message. A recognized submission is then checked
 * for completeness; it is complete when every required field is present.
 * Duration and area are optional. The message reports, in order of
 * precedence, the rejection, the missing required fields, or the missing
 * optional fields.
 */
export function validate(candidate: RecordCandidate): ValidationResult {
  const { signal, fields } = candidate;

  if (signal.kind === 'error') {
    return rejected(MESSAGES.extractionFailed);
  }
  if (signal.kind === 'unstructured' && saysNotPermit(signal.text)) {
    return rejected(MESSAGES.notPermitDocument);
  }

  const foundFields: Record<string, FieldValue> = {};
  const missing = (labels: readonly (RequiredFieldLabel | OptionalFieldLabel)[]): string[] =>
    labels.filter((label) => {
      const value = FIELD_READERS[label](fields);
      if (value === null) {
        return true;
      }
      foundFields[label] = value;
      return false;
    });

  const missingRequired = missing(REQUIRED_FIELD_LABELS);
  const missingOptional = missing(OPTIONAL_FIELD_LABELS);

  if (Object.keys(foundFields).length === 0) {
    return rejected(MESSAGES.noRecognizedFields);
  }

  const isComplete = missingRequired.length === 0;
  let message: string | null = null;
  if (!isComplete) {
    message = MESSAGES.missingRequired(missingRequired);
  } else if (missingOptional.length > 0) {
    message = MESSAGES.missingOptional(missingOptional);
  }

  return {
    isRecognizedDocument: true,
    isComplete,
    missingRequired,
    missingOptional,
    foundFields,
    message,
  };
}
