/**
 * Minimal CSV reader for the knowledge files: quoted fields, doubled quotes,
 * separators and line breaks inside quotes, CRLF or LF endings.
 * Blank lines are skipped; a row of empty cells (",,,") is kept.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let rowHasContent = false;

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endField = () => {
    row.push(field);
    field = "";
  };

  const endRow = () => {
    endField();
    if (rowHasContent) {
      rows.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
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
        inQuotes = true;
        rowHasContent = true;
        break;
      case ",":
        endField();
        rowHasContent = true;
        break;
      case "\r":
        if (source[i + 1] === "\n") i++;
        endRow();
        break;
      case "\n":
        endRow();
        break;
      default:
        field += ch;
        rowHasContent = true;
    }
  }

  if (field || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

/** Header row plus records keyed by column name; missing trailing cells read as "". */
export function csvRecords(text: string): { header: string[]; records: Record<string, string>[] } {
  const [headerRow, ...body] = parseCsv(text);
  if (!headerRow) {
    return { header: [], records: [] };
  }
  const header = headerRow.map((name) => name.trim());
  const records = body.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((name, index) => {
      record[name] = cells[index] ?? "";
    });
    return record;
  });
  return { header, records };
}
