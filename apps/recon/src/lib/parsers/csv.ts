/**
 * CSV reading for channel exports
 *
 * Handles quoted values (including embedded delimiters, quotes and line
 * breaks), CRLF line endings and a leading byte-order mark.
 */

export interface CsvRow {
  /** 1-based line number of the row's first line in the file */
  line: number;
  values: string[];
}

export interface CsvTable {
  headers: string[];
  rows: CsvRow[];
}

export interface CsvOptions {
  /** Lines to drop before the header row (report preambles) */
  skipLines?: number;
  delimiter?: string;
}

/**
 * Split content into records, respecting quoted line breaks
 */
function splitRecords(content: string, delimiter: string): CsvRow[] {
  const records: CsvRow[] = [];
  let values: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordStart = 1;

  const endRecord = () => {
    values.push(current);
    records.push({ line: recordStart, values });
    values = [];
    current = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        if (char === '\n') line++;
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      values.push(current);
      current = '';
    } else if (char === '\r' && nextChar === '\n') {
      // CRLF: handled by the \n branch
    } else if (char === '\n') {
      endRecord();
      line++;
      recordStart = line;
    } else {
      current += char;
    }
  }

  if (current.length > 0 || values.length > 0) {
    endRecord();
  }

  return records;
}

function isBlank(row: CsvRow): boolean {
  return row.values.every((value) => value.trim() === '');
}

/**
 * Parse CSV content into a header row and data rows.
 * Blank lines are dropped; values are trimmed.
 */
export function parseCsv(content: string, options: CsvOptions = {}): CsvTable {
  const delimiter = options.delimiter ?? ',';
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  const records = splitRecords(text, delimiter)
    .filter((record) => record.line > (options.skipLines ?? 0))
    .filter((record) => !isBlank(record))
    .map((record) => ({ line: record.line, values: record.values.map((value) => value.trim()) }));

  if (records.length === 0) {
    return { headers: [], rows: [] };
  }

  const [header, ...rows] = records;
  return { headers: header.values, rows };
}

/**
 * Normalize a header for lookup: case-insensitive, single-spaced
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, ' ');
}
