import test from 'node:test';
import assert from 'node:assert/strict';

import type { PermitFields } from '../../types/permit';
import { assessRecord, computeFee, variableSymbolFor } from '../index';

test('computeFee: area × days × rate, floored', () => {
  assert.equal(computeFee(12.5, 14, 10), 1750);
  assert.equal(computeFee(2.5, 3, 10), 75);
  assert.equal(computeFee(2.75, 1, 1), 2);
  assert.equal(computeFee(1, 1, 0.99), 0);
});

test('computeFee: zero or invalid inputs give a zero fee', () => {
  assert.equal(computeFee(0, 14, 10), 0);
  assert.equal(computeFee(10, 0, 10), 0);
  assert.equal(computeFee(-4, 5, 10), 0);
  assert.equal(computeFee(Number.NaN, 5, 10), 0);
});

test('variableSymbolFor: ten digits, stable per request id', () => {
  const symbol = variableSymbolFor('3f0c1a9e-2b4d-4c8e-9a71-5d6e7f809a1b');

  assert.match(symbol, /^\d{10}$/);
  assert.equal(variableSymbolFor('3f0c1a9e-2b4d-4c8e-9a71-5d6e7f809a1b'), symbol);
  assert.notEqual(variableSymbolFor('another-request'), symbol);
});

test('assessRecord: adds fee and variable symbol to the fields', () => {
  const fields: PermitFields = {
    applicantName: 'Jan Novák',
    companyId: null,
    contactDetails: null,
    purposeOfUse: 'Předzahrádka',
    location: 'Náměstí Míru 1',
    durationText: null,
    durationDays: 7,
    durationResolved: false,
    areaSqm: 20,
  };

  const record = assessRecord(fields, 'request-1', 10);

  assert.equal(record.feeCzk, 1400);
  assert.equal(record.variableSymbol, variableSymbolFor('request-1'));
  assert.equal(record.applicantName, 'Jan Novák');
  assert.equal(record.durationDays, 7);
});
