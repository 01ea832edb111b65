/**
 * Minimal RFC 4180 reader/writer: quoted fields, doubled quotes inside quotes,
 * embedded line breaks, LF or CRLF row endings. Blank lines yield no row.
 */

/** Split CSV text into rows of raw cell strings */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  // Set once the current row holds a delimiter or a quoted field, so that `""` is not a blank line
  let touched = false;

  const endField = () => {
    row.push(field);
    field = '';
  };

  const endRow = () => {
    if (touched || field !== '') {
      endField();
      rows.push(row);
    }
    row = [];
    field = '';
    touched = false;
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
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        if (field === '') {
          inQuotes = true;
          touched = true;
        } else {
          field += ch;
        }
        break;
      case ',':
        endField();
        touched = true;
        break;
      case '\r':
        if (text[i + 1] === '\n') i++;
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        field += ch;
    }
  }
  endRow();

  return rows;
}

/** Quote a cell when it holds a delimiter, a quote or a line break */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function formatCsvRow(values: readonly string[]): string {
  return values.map(escapeCsvField).join(',');
}
