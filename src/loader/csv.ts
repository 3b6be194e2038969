/**
 * Minimal RFC 4180 reader: comma separated, double-quoted cells with `""`
 * escapes, quoted cells may span lines. Unquoted cells are trimmed.
 */

export interface CsvRecord {
  /** 1-based line the record starts on. */
  line: number;
  cells: string[];
}

export class CsvParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(`Line ${line}: ${message}`);
    this.name = 'CsvParseError';
  }
}

export function parseCsv(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let cells: string[] = [];
  let current = '';
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let pending = false;

  const endCell = () => {
    cells.push(quoted ? current : current.trim());
    current = '';
    quoted = false;
  };
  const endRecord = () => {
    endCell();
    if (!(cells.length === 1 && cells[0] === '')) records.push({ line: recordLine, cells });
    cells = [];
    pending = false;
  };

  const src = text.startsWith('\uFEFF') ? text.slice(1) : text;
  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (current.trim() !== '') throw new CsvParseError('Unexpected quote inside unquoted cell', line);
      current = '';
      quoted = true;
      inQuotes = true;
      pending = true;
    } else if (ch === ',') {
      endCell();
      pending = true;
    } else if (ch === '\r' && src[i + 1] === '\n') {
      continue;
    } else if (ch === '\n') {
      endRecord();
      line++;
      recordLine = line;
    } else {
      if (quoted && ch.trim() !== '') throw new CsvParseError('Unexpected character after closing quote', line);
      if (!quoted) current += ch;
      pending = true;
    }
  }

  if (inQuotes) throw new CsvParseError('Unterminated quoted cell', recordLine);
  if (pending || current !== '') endRecord();
  return records;
}
