import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  formatContentRange,
  formatUnsatisfiedRange,
  parseRangeHeader,
  rangeLength
} from '../src/http/range';

test('parses an explicit start-end range', () => {
  assert.deepEqual(parseRangeHeader('bytes=0-9', 100), { kind: 'satisfiable', range: { start: 0, end: 9 } });
  assert.deepEqual(parseRangeHeader('bytes=5-5', 100), { kind: 'satisfiable', range: { start: 5, end: 5 } });
});

test('treats a missing end as open-ended', () => {
  assert.deepEqual(parseRangeHeader('bytes=10-', 100), { kind: 'satisfiable', range: { start: 10, end: 99 } });
});

test('computes suffix ranges from the end of the resource', () => {
  assert.deepEqual(parseRangeHeader('bytes=-5', 100), { kind: 'satisfiable', range: { start: 95, end: 99 } });
  assert.deepEqual(parseRangeHeader('bytes=-500', 100), { kind: 'satisfiable', range: { start: 0, end: 99 } });
});

test('clamps an end that overshoots the resource', () => {
  assert.deepEqual(parseRangeHeader('bytes=90-1000', 100), { kind: 'satisfiable', range: { start: 90, end: 99 } });
});

test('accepts a case-insensitive unit and surrounding whitespace', () => {
  assert.deepEqual(parseRangeHeader('  BYTES=1-2 ', 10), { kind: 'satisfiable', range: { start: 1, end: 2 } });
  assert.deepEqual(parseRangeHeader('bytes= 3 - 4', 10), { kind: 'satisfiable', range: { start: 3, end: 4 } });
});

test('only honours the first range of a multi-range header', () => {
  assert.deepEqual(parseRangeHeader('bytes=0-1, 5-9', 100), { kind: 'satisfiable', range: { start: 0, end: 1 } });
  assert.deepEqual(parseRangeHeader('bytes=500-600,0-1', 100), { kind: 'unsatisfiable' });
});

test('reports starts at or past the end as unsatisfiable', () => {
  assert.deepEqual(parseRangeHeader('bytes=100-', 100), { kind: 'unsatisfiable' });
  assert.deepEqual(parseRangeHeader('bytes=1000-', 100), { kind: 'unsatisfiable' });
  assert.deepEqual(parseRangeHeader('bytes=1000-2000', 100), { kind: 'unsatisfiable' });
});

test('reports an end before the start as unsatisfiable', () => {
  assert.deepEqual(parseRangeHeader('bytes=9-3', 100), { kind: 'unsatisfiable' });
  assert.deepEqual(parseRangeHeader('bytes=5--3', 100), { kind: 'unsatisfiable' });
});

test('nothing is satisfiable on an empty resource', () => {
  assert.deepEqual(parseRangeHeader('bytes=0-', 0), { kind: 'unsatisfiable' });
  assert.deepEqual(parseRangeHeader('bytes=-5', 0), { kind: 'unsatisfiable' });
});

test('flags unreadable headers as malformed', () => {
  const malformed = [
    'items=0-9',
    'bytes',
    'bytes=abc',
    'bytes=a-9',
    'bytes=0-z',
    'bytes=-',
    'bytes=-0',
    'bytes=--5',
    'bytes=1.5-3',
    ''
  ];
  for (const header of malformed) {
    assert.deepEqual(parseRangeHeader(header, 100), { kind: 'malformed' }, header);
  }
});

test('formats range headers', () => {
  const range = { start: 95, end: 99 };
  assert.equal(rangeLength(range), 5);
  assert.equal(formatContentRange(range, 100), 'bytes 95-99/100');
  assert.equal(formatUnsatisfiedRange(100), 'bytes */100');
});
