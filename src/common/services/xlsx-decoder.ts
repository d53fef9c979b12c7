/**
 * Table decoding via SheetJS
 *
 * Turns uploaded CSV / Excel bytes into a Table using the xlsx library.
 * The first sheet is used; its first row supplies the column names.
 */

import * as XLSX from 'xlsx';
import type { CellValue, Table, TableRow } from '../types.js';

export interface DecodedTable {
  table: Table;
  sheetNames: string[];
  warnings: string[];
}

export interface TableDecoder {
  decode(bytes: Buffer, fileName: string): Promise<DecodedTable>;
}

export class XlsxTableDecoder implements TableDecoder {
  async decode(bytes: Buffer, fileName: string): Promise<DecodedTable> {
    const workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
      throw new Error(`${fileName} contains no sheets`);
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
      header: 1,
      defval: null,
      blankrows: false,
      raw: true,
    });

    const warnings: string[] = [];
    if (workbook.SheetNames.length > 1) {
      warnings.push(`Only the first sheet ("${sheetName}") was loaded; ${workbook.SheetNames.length - 1} other sheet(s) ignored.`);
    }

    const [header = [], ...body] = grid;
    const columns = normalizeHeader(header, warnings);

    let truncatedRows = 0;
    const rows: TableRow[] = body.map((cells) => {
      if (cells.length > columns.length) truncatedRows++;
      const row: Record<string, CellValue> = {};
      columns.forEach((column, index) => {
        row[column] = toCellValue(cells[index]);
      });
      return row;
    });

    if (truncatedRows > 0) {
      warnings.push(`${truncatedRows} row(s) had more cells than header columns; extra cells were dropped.`);
    }

    return {
      table: { columns, rows },
      sheetNames: [...workbook.SheetNames],
      warnings,
    };
  }
}

/**
 * Column names from the header row: blanks become column_N, duplicates get a suffix
 */
export function normalizeHeader(header: readonly unknown[], warnings: string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((cell, index) => {
    let name = cell === null || cell === undefined ? '' : String(cell).trim();
    if (name === '') {
      name = `column_${index + 1}`;
      warnings.push(`Column ${index + 1} has no header; named "${name}".`);
    }

    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    if (count > 0) {
      const renamed = `${name}_${count + 1}`;
      warnings.push(`Duplicate column "${name}" renamed to "${renamed}".`);
      return renamed;
    }
    return name;
  });
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  return String(value);
}
