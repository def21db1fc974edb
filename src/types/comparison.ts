import { ColumnAttributes } from './index.js';

export type ComparisonCategory = 'DIFF' | 'ONLY_IN_PRIMARY' | 'ONLY_IN_SECONDARY';

export type ComparableAttribute = 'dataType' | 'maxLength' | 'dataPrecision' | 'dataScale' | 'nullable';

export interface AttributeMismatch {
  attribute: ComparableAttribute;
  primary: string | number | boolean | null;
  secondary: string | number | boolean | null;
}

export type ColumnComparison =
  | { equal: true }
  | { equal: false; mismatches: AttributeMismatch[] };

export interface DiffEntry {
  category: 'DIFF';
  table: string;
  column: string;
  mismatches: readonly AttributeMismatch[];
  primary: ColumnAttributes;
  secondary: ColumnAttributes;
}

export interface OnlyInEntry {
  category: 'ONLY_IN_PRIMARY' | 'ONLY_IN_SECONDARY';
  table: string;
  column: string;
  attributes: ColumnAttributes;
}

export type ComparisonEntry = DiffEntry | OnlyInEntry;

export interface ComparisonSummary {
  tablesCompared: number;
  tablesOnlyInPrimary: number;
  tablesOnlyInSecondary: number;
  diffColumns: number;
  onlyInPrimary: number;
  onlyInSecondary: number;
  totalFindings: number;
}

export interface ComparisonResult {
  primary: string;
  secondary: string;
  diffColumns: readonly DiffEntry[];
  onlyInPrimary: readonly OnlyInEntry[];
  onlyInSecondary: readonly OnlyInEntry[];
  summary: ComparisonSummary;
}
