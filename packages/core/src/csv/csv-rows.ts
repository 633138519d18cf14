import { AppError, err, ok, type Result } from '@rowlog/shared';

export interface CsvRow {
  /** 1-based line the row starts on; quoted line breaks push later rows down. */
  line: number;
  cells: string[];
}

export function isBlankCsvRow(cells: readonly string[]): boolean {
  return cells.every((cell) => cell.trim().length === 0);
}

/**
 * Splits comma-separated text into rows. Quoted fields may hold commas, doubled
 * quotes and line breaks. A leading BOM and trailing blank rows are dropped.
 */
export function splitCsvRows(source: string): Result<CsvRow[], AppError> {
  const text = source.charCodeAt(0) === 0xfeff ? source.slice(1) : source;
  const rows: CsvRow[] = [];
  let cells: string[] = [];
  let field = '';
  let quoted = false;
  let line = 1;
  let rowLine = 1;

  const endRow = (): void => {
    cells.push(field);
    rows.push({ line: rowLine, cells });
    cells = [];
    field = '';
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index] ?? '';
    const next = text[index + 1];

    if (char === '"') {
      if (quoted && next === '"') {
        field += '"';
        index += 1;
      } else {
        quoted = !quoted;
      }
      continue;
    }

    if (quoted) {
      if (char === '\n' || (char === '\r' && next !== '\n')) {
        line += 1;
      }
      field += char;
      continue;
    }

    if (char === ',') {
      cells.push(field);
      field = '';
      continue;
    }

    if (char === '\n' || char === '\r') {
      if (char === '\r' && next === '\n') {
        index += 1;
      }
      endRow();
      line += 1;
      rowLine = line;
      continue;
    }

    field += char;
  }

  if (quoted) {
    return err(
      AppError.create('CSV_IMPORT_PARSE_FAILED', 'CSV zawiera niedomknięty cudzysłów.', 'error', { line: rowLine }),
    );
  }
  endRow();

  while (rows.length > 0 && isBlankCsvRow(rows[rows.length - 1]?.cells ?? [])) {
    rows.pop();
  }
  return ok(rows);
}
