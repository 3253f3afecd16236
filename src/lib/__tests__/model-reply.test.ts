import test from 'node:test';
import assert from 'node:assert/strict';

import { isPlainObject, parseModelReply, stripCodeFence } from '../model-reply';

test('stripCodeFence: removes a json fence', () => {
  assert.equal(stripCodeFence('```json\n{"a": 1}\n```'), '{"a": 1}');
});

test('stripCodeFence: leaves unfenced text trimmed', () => {
  assert.equal(stripCodeFence('  {"a": 1}  '), '{"a": 1}');
});

test('parseModelReply: fenced JSON object becomes the field map', () => {
  const reply = '```json\n{"applicant_name": "Jan Novák", "area_sqm": 12}\n```';
  assert.deepEqual(parseModelReply(reply), { applicant_name: 'Jan Novák', area_sqm: 12 });
});

test('parseModelReply: prose is kept under raw_response', () => {
  assert.deepEqual(parseModelReply('Not a ZUVP document'), { raw_response: 'Not a ZUVP document' });
});

test('parseModelReply: a JSON array is not a field map', () => {
  assert.deepEqual(parseModelReply('[1, 2]'), { raw_response: '[1, 2]' });
});

test('isPlainObject', () => {
  assert.equal(isPlainObject({}), true);
  assert.equal(isPlainObject([]), false);
  assert.equal(isPlainObject(null), false);
  assert.equal(isPlainObject('x'), false);
});
