/**
 * Accepted extractor keys per canonical field, in order of precedence.
 * Matching is case-insensitive, so each label is listed once.
 */
export const TEXT_FIELD_ALIASES = {
  applicantName: ['applicant_name', 'Applicant name', 'applicant', 'applicant_full_name', 'name', 'žadatel', 'jméno žadatele'],
  companyId: ['company_id', 'Company ID (IČO)', 'Company ID', 'ico', 'ičo', 'company_ico'],
  contactDetails: ['contact_details', 'Contact details', 'contact', 'contact_info', 'kontaktní údaje'],
  purposeOfUse: ['purpose_of_use', 'Purpose of use', 'purpose', 'účel užívání', 'účel'],
  location: ['specific_location', 'location', 'Specific location', 'address', 'place', 'místo'],
} as const;

export type TextField = keyof typeof TEXT_FIELD_ALIASES;

export const DURATION_ALIASES = [
  'duration',
  'Duration (dates)',
  'duration_dates',
  'dates',
  'period',
  'doba užívání',
] as const;

/** Keys of a duration object, or top-level keys when no duration alias is present. */
export const DURATION_START_KEYS = ['start_date', 'start', 'from', 'date_from'] as const;
export const DURATION_END_KEYS = ['end_date', 'end', 'to', 'date_to'] as const;

export const AREA_ALIASES = [
  'area_sqm',
  'area_in_square_meters',
  'Area in square meters',
  'area_m2',
  'area',
  'výměra',
] as const;

export const ERROR_KEYS = ['error'] as const;
export const RAW_RESPONSE_KEYS = ['raw_response'] as const;

/** Values an extractor uses to say "nothing here". Compared trimmed and lower-cased. */
export const PLACEHOLDER_VALUES: ReadonlySet<string> = new Set(['', 'n/a', 'none', 'null']);
