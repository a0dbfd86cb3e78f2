import type {
  DateFormat,
  DecimalSeparator,
  RawRecord,
  SignConvention,
  SourceId,
} from '@ledger/types';

export interface StatementInput {
  fileName: string;
  content: string;
}

/**
 * Per-source rules the normalizer applies to every RawRecord of that source.
 */
export interface NormalizationRules {
  dateFormat: DateFormat;
  decimalSeparator: DecimalSeparator;
  signConvention: SignConvention;
  /** Lower-case, accent-free values of the type column that mean money out */
  debitTypes?: readonly string[];
  creditTypes?: readonly string[];
}

export interface ExtractedStatement {
  records: RawRecord[];
  /** Total printed on the statement, when the layout has one */
  expectedTotal: number | null;
  warnings: string[];
}

export interface StatementSource {
  readonly id: SourceId;
  readonly label: string;
  readonly format: 'delimited' | 'text';
  readonly rules: NormalizationRules;
  detect(input: StatementInput): boolean;
  extract(input: StatementInput): ExtractedStatement;
}

export interface ParsedStatement {
  sourceId: SourceId;
  fileName: string;
  records: RawRecord[];
  expectedTotal: number | null;
  /** Sum of raw amounts as printed, before sign normalization */
  capturedTotal: number;
  warnings: string[];
}
