/**
 * Factory for column-based statement exports (CSV and friends).
 *
 * Each source declares its delimiter, the exact header row it expects and which
 * header maps to which RawRecord field. Papa Parse handles quoting.
 */

import Papa from 'papaparse';
import { MalformedStatementError, type RawRecord, type SourceId } from '@ledger/types';
import type { ExtractedStatement, NormalizationRules, StatementInput, StatementSource } from './types.js';

export interface DelimitedColumns {
  date: string;
  description: string;
  amount: string;
  type?: string;
  category?: string;
}

export interface DelimitedSourceConfig {
  id: SourceId;
  label: string;
  delimiter: string;
  header: readonly string[];
  columns: DelimitedColumns;
  rules: NormalizationRules;
}

export function normalizeHeaderCell(cell: string): string {
  return cell.replace(/^\uFEFF/, '').replace(/^"|"$/g, '').trim().normalize('NFC').toLowerCase();
}

function stripBom(content: string): string {
  return content.replace(/^\uFEFF/, '');
}

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell.trim() === '');
}

function headerMatches(row: readonly string[], header: readonly string[]): boolean {
  if (row.length !== header.length) return false;
  return header.every((expected, i) => normalizeHeaderCell(row[i] ?? '') === normalizeHeaderCell(expected));
}

export function createDelimitedSource(config: DelimitedSourceConfig): StatementSource {
  const columnIndex = (name: string): number => {
    const index = config.header.findIndex((h) => h.toLowerCase() === name.toLowerCase());
    if (index < 0) {
      throw new Error(`Source ${config.id}: column "${name}" is not part of the header`);
    }
    return index;
  };

  const dateIdx = columnIndex(config.columns.date);
  const descriptionIdx = columnIndex(config.columns.description);
  const amountIdx = columnIndex(config.columns.amount);
  const typeIdx = config.columns.type !== undefined ? columnIndex(config.columns.type) : null;
  const categoryIdx = config.columns.category !== undefined ? columnIndex(config.columns.category) : null;

  function detect(input: StatementInput): boolean {
    const firstLine = stripBom(input.content).split(/\r?\n/).find((line) => line.trim() !== '');
    if (firstLine === undefined) return false;
    return headerMatches(firstLine.split(config.delimiter), config.header);
  }

  function extract(input: StatementInput): ExtractedStatement {
    const parsed = Papa.parse<string[]>(stripBom(input.content), {
      delimiter: config.delimiter,
      skipEmptyLines: false,
    });

    const quoteError = parsed.errors.find((e) => e.type === 'Quotes');
    if (quoteError !== undefined) {
      throw new MalformedStatementError(config.id, quoteError.message, (quoteError.row ?? 0) + 1);
    }

    const rows = parsed.data;
    const headerRowIndex = rows.findIndex((row) => !isBlankRow(row));
    const headerRow = headerRowIndex >= 0 ? rows[headerRowIndex] : undefined;

    if (headerRow === undefined || !headerMatches(headerRow, config.header)) {
      throw new MalformedStatementError(
        config.id,
        `Missing expected header row: ${config.header.join(config.delimiter)}`,
        headerRowIndex >= 0 ? headerRowIndex + 1 : null
      );
    }

    const records: RawRecord[] = [];
    const warnings: string[] = [];

    for (let i = headerRowIndex + 1; i < rows.length; i++) {
      const row = rows[i];
      if (row === undefined || isBlankRow(row)) continue;

      const lineNumber = i + 1;
      if (row.length !== config.header.length) {
        throw new MalformedStatementError(
          config.id,
          `Expected ${config.header.length} columns, found ${row.length}`,
          lineNumber
        );
      }

      const type = typeIdx !== null ? row[typeIdx] : undefined;
      const category = categoryIdx !== null ? row[categoryIdx]?.trim() : undefined;

      records.push({
        sourceId: config.id,
        lineNumber,
        date: row[dateIdx] ?? '',
        description: row[descriptionIdx] ?? '',
        amount: row[amountIdx] ?? '',
        ...(type !== undefined ? { type } : {}),
        ...(category !== undefined && category !== '' ? { category } : {}),
        originalText: row.join(config.delimiter),
      });
    }

    if (records.length === 0) {
      warnings.push('Statement has a header but no transactions');
    }

    return { records, expectedTotal: null, warnings };
  }

  return {
    id: config.id,
    label: config.label,
    format: 'delimited',
    rules: config.rules,
    detect,
    extract,
  };
}
