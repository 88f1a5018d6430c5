import { describe, it, expect } from 'vitest';
import { parseCsvLine, splitLines } from '../../src/ingest/csv.js';

describe('parseCsvLine', () => {
  it('splits on commas', () => {
    expect(parseCsvLine('1,What is it?,A thing')).toEqual(['1', 'What is it?', 'A thing']);
  });

  it('keeps commas inside quotes and drops the quotes', () => {
    expect(parseCsvLine('2,"Can I cancel, then rebook?",Yes')).toEqual([
      '2',
      'Can I cancel, then rebook?',
      'Yes',
    ]);
  });

  it('keeps empty fields', () => {
    expect(parseCsvLine('3,,')).toEqual(['3', '', '']);
  });

  it('returns one field for a line without commas', () => {
    expect(parseCsvLine('lonely')).toEqual(['lonely']);
  });

  it('toggles quoting on doubled quotes instead of escaping them', () => {
    expect(parseCsvLine('4,"say ""hi""",ok')).toEqual(['4', 'say hi', 'ok']);
  });
});

describe('splitLines', () => {
  it('accepts LF and CRLF endings', () => {
    expect(splitLines('a\nb\r\nc')).toEqual(['a', 'b', 'c']);
  });
});
