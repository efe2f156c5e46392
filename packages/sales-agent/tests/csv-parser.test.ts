import { describe, it, expect } from 'vitest';
import { decodeSource, parseCsv } from '../utils/csv-parser.js';
import { DataLoadError } from '../utils/errors.js';

describe('decodeSource', () => {
  it('uses utf-8 when the bytes are valid', () => {
    const result = decodeSource(new TextEncoder().encode('Zoë'));
    expect(result).toEqual({ text: 'Zoë', encoding: 'utf-8', lossy: false });
  });

  it('falls through to latin1 on invalid utf-8', () => {
    const result = decodeSource(Uint8Array.from([0x5a, 0x6f, 0xeb]));
    expect(result.encoding).toBe('latin1');
    expect(result.text).toBe('Zoë');
  });

  it('substitutes undecodable bytes when every encoding fails', () => {
    const result = decodeSource(Uint8Array.from([0x41, 0xff]), ['utf-8']);
    expect(result.lossy).toBe(true);
    expect(result.text).toBe('A\uFFFD');
  });

  it('skips unknown encoding labels', () => {
    const result = decodeSource(new TextEncoder().encode('ok'), ['no-such-encoding', 'utf-8']);
    expect(result.encoding).toBe('utf-8');
  });
});

describe('parseCsv', () => {
  it('splits headers and rows', () => {
    expect(parseCsv(' A , B \n1,2\n3,4')).toEqual({
      headers: ['A', 'B'],
      rows: [
        ['1', '2'],
        ['3', '4'],
      ],
    });
  });

  it('handles quoted fields with delimiters, doubled quotes and newlines', () => {
    const { rows } = parseCsv('NAME,NOTE\r\n"Smith, J","said ""hi""\nthen left"\r\n');
    expect(rows).toEqual([['Smith, J', 'said "hi"\nthen left']]);
  });

  it('skips blank lines and keeps empty trailing fields', () => {
    const { rows } = parseCsv('A,B,C\n\n1,,\n');
    expect(rows).toEqual([['1', '', '']]);
  });

  it('returns an empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ headers: [], rows: [] });
  });

  it('reports the line of an unterminated quote', () => {
    try {
      parseCsv('A,B\n1,2\n"open,3');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(DataLoadError);
      if (err instanceof DataLoadError) expect(err.detail).toEqual({ line: 3 });
    }
  });
});
