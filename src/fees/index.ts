import { createHash } from 'node:crypto';
import type { CanonicalRecord, PermitFields } from '../types/permit';

const VARIABLE_SYMBOL_DIGITS = 10;

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Statutory fee for the special use of public space, in whole CZK:
 * floor(area × days × rate). Zero area or zero days is a zero fee.
 */
export function computeFee(areaSqm: number, durationDays: number, ratePerSqmDay: number): number {
  return Math.floor(nonNegative(areaSqm) * nonNegative(durationDays) * nonNegative(ratePerSqmDay));
}

/**
 * Ten-digit payment reference derived only from the request id, used to match
 * incoming bank transfers to the permit.
 */
export function variableSymbolFor(requestId: string): string {
  const digest = createHash('sha256').update(requestId, 'utf8').digest('hex');
  const modulus = 10n ** BigInt(VARIABLE_SYMBOL_DIGITS);
  return (BigInt(`0x${digest}`) % modulus).toString().padStart(VARIABLE_SYMBOL_DIGITS, '0');
}

/**
 * Completes validated permit fields with the fee and the variable symbol.
 */
export function assessRecord(fields: PermitFields, requestId: string, ratePerSqmDay: number): CanonicalRecord {
  return {
    ...fields,
    feeCzk: computeFee(fields.areaSqm, fields.durationDays, ratePerSqmDay),
    variableSymbol: variableSymbolFor(requestId),
  };
}
