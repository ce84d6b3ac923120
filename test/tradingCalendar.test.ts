import test from 'node:test';
import assert from 'node:assert/strict';

import { TradingCalendar } from '../server/services/tradingCalendar.js';
import { addDaysToDateKey } from '../server/lib/dateUtils.js';

const calendar = new TradingCalendar({ timeZone: 'Asia/Kolkata', cutoffTime: '15:30', holidays: ['2025-08-15'] });

test('weekends and listed holidays are not trading days', () => {
  assert.equal(calendar.isTradingDay('2025-08-14'), true);
  assert.equal(calendar.isTradingDay('2025-08-15'), false);
  assert.equal(calendar.isTradingDay('2025-08-16'), false);
  assert.equal(calendar.isTradingDay('2025-08-17'), false);
  assert.equal(calendar.isTradingDay('garbage'), false);
});

test('next and previous trading day skip closures', () => {
  assert.equal(calendar.nextTradingDay('2025-08-14'), '2025-08-18');
  assert.equal(calendar.previousTradingDay('2025-08-18'), '2025-08-14');
  assert.equal(calendar.previousTradingDay('2025-08-13'), '2025-08-12');
});

test('latestCompletedSession switches to today at the cutoff', () => {
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-13T09:00:00Z')), '2025-08-12');
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-13T09:59:00Z')), '2025-08-12');
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-13T10:00:00Z')), '2025-08-13');
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-13T10:30:00Z')), '2025-08-13');
});

test('latestCompletedSession on a closed day is the previous session', () => {
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-15T12:00:00Z')), '2025-08-14');
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-16T12:00:00Z')), '2025-08-14');
  // 01:00 IST Monday, before that day's cutoff.
  assert.equal(calendar.latestCompletedSession(new Date('2025-08-17T19:30:00Z')), '2025-08-14');
});

test('isPastCutoff compares exchange-local minutes', () => {
  assert.equal(calendar.isPastCutoff(new Date('2025-08-13T09:59:00Z')), false);
  assert.equal(calendar.isPastCutoff(new Date('2025-08-13T10:00:00Z')), true);
});

test('cutoffUtcMs applies the offset in exchange-local time', () => {
  assert.equal(calendar.cutoffUtcMs('2025-08-13'), Date.UTC(2025, 7, 13, 10, 0));
  assert.equal(calendar.cutoffUtcMs('2025-08-13', 5), Date.UTC(2025, 7, 13, 10, 5));
});

test('nextTradingDay gives up after a month of closures', () => {
  const holidays: string[] = [];
  for (let day = '2025-01-02'; day <= '2025-02-15'; day = addDaysToDateKey(day, 1)) holidays.push(day);
  const closed = new TradingCalendar({ timeZone: 'Asia/Kolkata', cutoffTime: '15:30', holidays });
  assert.throws(() => closed.nextTradingDay('2025-01-01'), /No trading day within 30 days after 2025-01-01/);
});

test('invalid cutoff strings are rejected at construction', () => {
  assert.throws(() => new TradingCalendar({ timeZone: 'Asia/Kolkata', cutoffTime: '3pm' }), /Invalid cutoff time: 3pm/);
});
