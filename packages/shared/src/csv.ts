/**
 * CSV Reading
 *
 * RFC 4180 style parsing: quoted fields may contain delimiters, doubled quotes
 * and line breaks. Rows come back keyed by the header line.
 */

export type CsvRow = Record<string, string>;

/**
 * Split CSV content into records of raw field values.
 */
export function parseCsvRecords(content: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  // Strip a UTF-8 BOM
  if (content.charCodeAt(0) === 0xfeff) {
    i = 1;
  }

  const endRecord = () => {
    record.push(field);
    field = '';
    // Skip blank lines
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
  };

  for (; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(field);
      field = '';
    } else if (char === '\r') {
      if (content[i + 1] === '\n') {
        i++;
      }
      endRecord();
    } else if (char === '\n') {
      endRecord();
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV content into header-keyed rows. Header names are trimmed; missing
 * trailing cells become empty strings and surplus cells are dropped.
 */
export function parseCsv(content: string, delimiter = ','): { headers: string[]; rows: CsvRow[] } {
  const [headerRecord, ...dataRecords] = parseCsvRecords(content, delimiter);
  if (!headerRecord) {
    return { headers: [], rows: [] };
  }

  const headers = headerRecord.map((header) => header.trim());
  const rows = dataRecords.map((values) => {
    const row: CsvRow = {};
    headers.forEach((header, index) => {
      row[header] = values[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}
