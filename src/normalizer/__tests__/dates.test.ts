import test from 'node:test';
import assert from 'node:assert/strict';

import { daysInRange, findDates, inclusiveDays, parseCalendarDate } from '../dates';

const utc = (year: number, month: number, day: number) => new Date(Date.UTC(year, month - 1, day));

test('findDates: reads ISO, dotted and slashed notations in order', () => {
  assert.deepEqual(findDates('2025-06-01, 15. 6. 2025 a 30/06/2025'), [
    utc(2025, 6, 1),
    utc(2025, 6, 15),
    utc(2025, 6, 30),
  ]);
});

test('findDates: impossible calendar dates become null', () => {
  assert.deepEqual(findDates('31.02.2025'), [null]);
  assert.deepEqual(findDates('2025-13-01'), [null]);
});

test('parseCalendarDate: first date or null', () => {
  assert.deepEqual(parseCalendarDate('od 1.7.2025'), utc(2025, 7, 1));
  assert.equal(parseCalendarDate('next summer'), null);
});

test('inclusiveDays: counts both ends', () => {
  assert.equal(inclusiveDays(utc(2025, 6, 1), utc(2025, 6, 1)), 1);
  assert.equal(inclusiveDays(utc(2025, 6, 1), utc(2025, 6, 30)), 30);
  assert.equal(inclusiveDays(utc(2025, 2, 28), utc(2025, 3, 1)), 2);
  assert.equal(inclusiveDays(utc(2025, 6, 2), utc(2025, 6, 1)), null);
});

test('daysInRange: needs two valid dates', () => {
  assert.equal(daysInRange('1.6.2025 - 14.6.2025'), 14);
  assert.equal(daysInRange('2025-06-01 to 2025-06-10'), 10);
  assert.equal(daysInRange('1.6.2025'), null);
  assert.equal(daysInRange('31.02.2025 - 10.03.2025'), null);
  assert.equal(daysInRange('10.06.2025 - 01.06.2025'), null);
});
