import dayjs from 'dayjs';
import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { ComparableAttribute, ComparisonResult, DiffEntry, OnlyInEntry } from '../types/comparison.js';
import { ColumnAttributes } from '../types/index.js';
import { logger } from './logger.js';

export const SHEET_NAMES = {
  diffColumns: 'DiffColumns',
  onlyInPrimary: 'OnlyInDB1',
  onlyInSecondary: 'OnlyInDB2',
  summary: 'Summary',
} as const;

const HIGHLIGHT_ARGB = 'FFFFFF00';

type Cell = string | number | null;

const ATTRIBUTE_KEYS: Record<ComparableAttribute, string> = {
  dataType: 'data_type',
  maxLength: 'data_length',
  dataPrecision: 'data_precision',
  dataScale: 'data_scale',
  nullable: 'nullable',
};

const ATTRIBUTES: ComparableAttribute[] = ['dataType', 'maxLength', 'dataPrecision', 'dataScale', 'nullable'];

export const COLUMN_HEADERS = ['table_name', 'column_name', ...ATTRIBUTES.map(a => ATTRIBUTE_KEYS[a]), 'column_id'];

export const DIFF_HEADERS = [
  'table_name',
  'column_name',
  ...ATTRIBUTES.flatMap(a => [`${ATTRIBUTE_KEYS[a]}_db1`, `${ATTRIBUTE_KEYS[a]}_db2`]),
  'mismatched',
];

export type ReportRow = Record<string, Cell>;

export interface ReportRows {
  diffColumns: ReportRow[];
  onlyInPrimary: ReportRow[];
  onlyInSecondary: ReportRow[];
}

function attributeValue(column: ColumnAttributes, attribute: ComparableAttribute): Cell {
  const value = column[attribute];
  if (typeof value === 'boolean') return value ? 'Y' : 'N';
  return value;
}

function diffRow(entry: DiffEntry): ReportRow {
  const row: ReportRow = { table_name: entry.table, column_name: entry.column };
  for (const attribute of ATTRIBUTES) {
    row[`${ATTRIBUTE_KEYS[attribute]}_db1`] = attributeValue(entry.primary, attribute);
    row[`${ATTRIBUTE_KEYS[attribute]}_db2`] = attributeValue(entry.secondary, attribute);
  }
  row.mismatched = entry.mismatches.map(m => ATTRIBUTE_KEYS[m.attribute]).join(', ');
  return row;
}

function columnRow(entry: OnlyInEntry): ReportRow {
  const row: ReportRow = { table_name: entry.table, column_name: entry.column };
  for (const attribute of ATTRIBUTES) {
    row[ATTRIBUTE_KEYS[attribute]] = attributeValue(entry.attributes, attribute);
  }
  row.column_id = entry.attributes.ordinalPosition;
  return row;
}

export function formatColumnType(column: ColumnAttributes): string {
  let type = column.dataType.toUpperCase();
  if (column.dataPrecision !== null) {
    type += column.dataScale !== null ? `(${column.dataPrecision},${column.dataScale})` : `(${column.dataPrecision})`;
  } else if (column.maxLength !== null && type.includes('CHAR')) {
    type += `(${column.maxLength})`;
  }
  return column.nullable ? type : `${type} NOT NULL`;
}

/** Flat rows per report section; booleans become 'Y' / 'N' as catalogs print them. */
export function toReportRows(result: ComparisonResult): ReportRows {
  return {
    diffColumns: result.diffColumns.map(diffRow),
    onlyInPrimary: result.onlyInPrimary.map(columnRow),
    onlyInSecondary: result.onlyInSecondary.map(columnRow),
  };
}

export class SchemaExporter {
  static async export(result: ComparisonResult, outputPath: string) {
    await fs.ensureDir(path.dirname(outputPath));
    const ext = path.extname(outputPath).toLowerCase();

    if (ext === '.csv') {
      await this.exportToCSV(result, outputPath);
    } else if (ext === '.json') {
      await fs.writeJson(outputPath, result, { spaces: 2 });
      logger.info(`Comparison results exported to JSON: ${outputPath}`);
    } else {
      await this.exportToExcel(result, outputPath);
    }
  }

  private static addSheet(workbook: ExcelJS.Workbook, name: string, headers: string[], rows: ReportRow[]) {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = headers.map(header => ({ header, key: header, width: Math.max(14, header.length + 2) }));

    sheet.getRow(1).font = { bold: true };
    sheet.getRow(1).fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' },
    };

    for (const row of rows) sheet.addRow(row);
    return sheet;
  }

  private static async exportToExcel(result: ComparisonResult, outputPath: string) {
    const rows = toReportRows(result);
    const workbook = new ExcelJS.Workbook();

    const diffSheet = this.addSheet(workbook, SHEET_NAMES.diffColumns, DIFF_HEADERS, rows.diffColumns);
    this.addSheet(workbook, SHEET_NAMES.onlyInPrimary, COLUMN_HEADERS, rows.onlyInPrimary);
    this.addSheet(workbook, SHEET_NAMES.onlyInSecondary, COLUMN_HEADERS, rows.onlyInSecondary);

    // Highlight only the cells of attributes that actually differ
    result.diffColumns.forEach((entry, index) => {
      const excelRow = diffSheet.getRow(index + 2);
      for (const mismatch of entry.mismatches) {
        for (const suffix of ['_db1', '_db2']) {
          excelRow.getCell(`${ATTRIBUTE_KEYS[mismatch.attribute]}${suffix}`).fill = {
            type: 'pattern',
            pattern: 'solid',
            fgColor: { argb: HIGHLIGHT_ARGB },
          };
        }
      }
    });

    const summary = workbook.addWorksheet(SHEET_NAMES.summary);
    summary.columns = [
      { header: 'Item', key: 'item', width: 30 },
      { header: 'Value', key: 'value', width: 40 },
    ];
    summary.getRow(1).font = { bold: true };
    summary.addRows([
      { item: 'Primary (DB1)', value: result.primary },
      { item: 'Secondary (DB2)', value: result.secondary },
      { item: 'Generated', value: dayjs().format('YYYY-MM-DD HH:mm:ss') },
      { item: 'Tables compared', value: result.summary.tablesCompared },
      { item: 'Tables only in DB1', value: result.summary.tablesOnlyInPrimary },
      { item: 'Tables only in DB2', value: result.summary.tablesOnlyInSecondary },
      { item: 'Differing columns', value: result.summary.diffColumns },
      { item: 'Columns only in DB1', value: result.summary.onlyInPrimary },
      { item: 'Columns only in DB2', value: result.summary.onlyInSecondary },
    ]);

    await workbook.xlsx.writeFile(outputPath);
    logger.info(`Comparison results exported to Excel: ${outputPath}`);
  }

  private static async exportToCSV(result: ComparisonResult, outputPath: string) {
    const rows = toReportRows(result);
    const workbook = new ExcelJS.Workbook();
    const headers = ['category', ...DIFF_HEADERS];

    const combined: ReportRow[] = [
      ...rows.diffColumns.map(row => ({ category: 'DIFF', ...row })),
      ...rows.onlyInPrimary.map(row => ({ category: 'ONLY_IN_PRIMARY', ...suffixed(row, '_db1') })),
      ...rows.onlyInSecondary.map(row => ({ category: 'ONLY_IN_SECONDARY', ...suffixed(row, '_db2') })),
    ];
    this.addSheet(workbook, 'Schema Comparison', headers, combined);

    await workbook.csv.writeFile(outputPath);
    logger.info(`Comparison results exported to CSV: ${outputPath}`);
  }
}

function suffixed(row: ReportRow, suffix: '_db1' | '_db2'): ReportRow {
  const out: ReportRow = { table_name: row.table_name, column_name: row.column_name };
  for (const attribute of ATTRIBUTES) {
    const key = ATTRIBUTE_KEYS[attribute];
    out[`${key}${suffix}`] = row[key];
  }
  return out;
}
