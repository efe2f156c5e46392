// CSV decoding and parsing for transaction exports
// Quote-aware: handles doubled quotes, CRLF and newlines inside quoted fields

import { DataLoadError } from './errors.js';

/** Tried in order; the first one that decodes without error wins */
export const SOURCE_ENCODINGS = ['utf-8', 'latin1', 'iso-8859-1', 'windows-1252'] as const;

export interface DecodedSource {
  text: string;
  encoding: string;
  /** true when the final attempt had to substitute undecodable bytes */
  lossy: boolean;
}

export function decodeSource(bytes: Uint8Array, encodings: readonly string[] = SOURCE_ENCODINGS): DecodedSource {
  for (const encoding of encodings) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      return { text, encoding, lossy: false };
    } catch {
      // unsupported label or invalid byte sequence: try the next encoding
      continue;
    }
  }
  // Last resort substitutes U+FFFD rather than failing
  return { text: new TextDecoder('utf-8').decode(bytes), encoding: 'utf-8', lossy: true };
}

export interface CsvTable {
  headers: string[];
  rows: string[][];
}

export function parseCsv(text: string, delimiter = ','): CsvTable {
  const records: string[][] = [];
  let field = '';
  let record: string[] = [];
  let inQuotes = false;
  let quoteOpenedAtLine = 0;
  let line = 1;

  const endRecord = () => {
    record.push(field);
    field = '';
    // Skip blank lines
    if (!(record.length === 1 && record[0].trim() === '')) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field.trim() === '') {
      field = '';
      inQuotes = true;
      quoteOpenedAtLine = line;
    } else if (ch === delimiter) {
      record.push(field);
      field = '';
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
      line++;
    } else if (ch === '\n') {
      endRecord();
      line++;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new DataLoadError('Unterminated quoted field in CSV source', { line: quoteOpenedAtLine });
  }
  if (field !== '' || record.length > 0) endRecord();

  if (records.length === 0) return { headers: [], rows: [] };

  const [headerRow, ...rows] = records;
  return { headers: headerRow.map((h) => h.trim()), rows };
}
