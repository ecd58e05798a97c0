/**
 * Minimal CSV support for the advisory dataset.
 *
 * Writing quotes every field and doubles embedded quotes. Reading accepts
 * quoted and unquoted fields, "" escapes, and LF or CRLF line endings.
 */

export type CsvValue = string | number | null | undefined;

function quote(value: CsvValue): string {
  return `"${(value ?? '').toString().replace(/"/g, '""')}"`;
}

export function toCSV(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(row.map(quote).join(','));
  }
  return lines.join('\n') + '\n';
}

export function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

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
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // Blank lines carry no data
  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text into objects keyed by the header row.
 * Missing trailing cells become empty strings.
 */
export function parseCSVRecords(text: string): Record<string, string>[] {
  const [header, ...body] = parseCSV(text);
  if (!header) return [];

  return body.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((name, i) => {
      record[name.trim()] = cells[i] ?? '';
    });
    return record;
  });
}
