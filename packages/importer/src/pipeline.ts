import {
  MalformedStatementError,
  NormalizationError,
  UnsupportedSourceError,
  computeFingerprint,
  type Transaction,
  type TransactionStore,
} from '@ledger/types';
import {
  checkStatementTotals,
  defaultRegistry,
  normalizeAll,
  readStatementFile,
  type ParserRegistry,
  type ReconciliationCheck,
  type StatementFile,
} from '@ledger/parsers';
import { HistoryCategorizer, type CategorizerOptions, type MatchKind } from '@ledger/categorizer';

export type ImportFailureKind = 'unsupported-source' | 'malformed-statement' | 'normalization' | 'io';

export interface ImportFailure {
  fileName: string;
  filePath: string;
  kind: ImportFailureKind;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface FileImport {
  fileName: string;
  filePath: string;
  sourceId: string;
  transactions: number;
  reconciliation: ReconciliationCheck;
  warnings: string[];
}

export interface ImportSummary {
  filesFound: number;
  filesSucceeded: number;
  filesFailed: number;
  transactionsParsed: number;
  duplicatesSkipped: number;
  categorized: Record<Exclude<MatchKind, 'none'>, number>;
  uncategorized: number;
  appended: number;
}

export interface ImportResult {
  /** New transactions after dedupe and categorization, in file order */
  transactions: Transaction[];
  files: FileImport[];
  failures: ImportFailure[];
  /** Range the store reported for the appended rows */
  appendedRange: string | null;
  dryRun: boolean;
  summary: ImportSummary;
}

export interface ImportOptions {
  /** Parse every file as this source instead of detecting it */
  sourceId?: string;
  owner?: string;
  registry?: ParserRegistry;
  categorizer?: CategorizerOptions;
  /** Drop transactions already in history or in an earlier file of the batch (default true) */
  skipDuplicates?: boolean;
  /** Fail a file whose captured total differs from the printed total (default false) */
  strict?: boolean;
  /** Parse and categorize without writing to the store (default false) */
  dryRun?: boolean;
  onProgress?: (current: number, total: number, fileName: string) => void;
  onError?: (failure: ImportFailure) => void;
  onWarning?: (message: string) => void;
}

function toFileRef(file: string | StatementFile): StatementFile {
  if (typeof file !== 'string') return file;
  const fileName = file.split(/[\\/]/).pop() ?? file;
  return { filePath: file, fileName };
}

export function failureKind(error: unknown): ImportFailureKind {
  if (error instanceof UnsupportedSourceError) return 'unsupported-source';
  if (error instanceof MalformedStatementError) return 'malformed-statement';
  if (error instanceof NormalizationError) return 'normalization';
  return 'io';
}

function createFailure(file: StatementFile, error: unknown): ImportFailure {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    fileName: file.fileName,
    filePath: file.filePath,
    kind: failureKind(error),
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Identical rows inside one statement are separate purchases (two coffees on the
 * same day). A statement's n-th copy of a fingerprint is a duplicate only when
 * history, or an earlier file of the batch, already holds n copies.
 */
function countFingerprints(transactions: readonly Transaction[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const tx of transactions) {
    const fingerprint = computeFingerprint(tx);
    counts.set(fingerprint, (counts.get(fingerprint) ?? 0) + 1);
  }
  return counts;
}

function describeMismatch(check: ReconciliationCheck): string {
  return `Totals do not match: captured ${check.capturedTotal.toFixed(2)}, statement ${check.expectedTotal?.toFixed(2) ?? 'n/a'} (difference ${check.difference?.toFixed(2) ?? 'n/a'})`;
}

async function importFile(
  file: StatementFile,
  registry: ParserRegistry,
  options: ImportOptions
): Promise<{ file: FileImport; transactions: Transaction[] }> {
  const input = await readStatementFile(file);
  const sourceId = options.sourceId ?? registry.detect(input);
  const parsed = registry.parseStatement(input, sourceId);
  const reconciliation = checkStatementTotals(parsed);

  const warnings = [...parsed.warnings];
  if (reconciliation.status === 'mismatch') {
    if (options.strict === true) {
      throw new MalformedStatementError(sourceId, describeMismatch(reconciliation));
    }
    warnings.push(describeMismatch(reconciliation));
  }

  const transactions = normalizeAll(parsed.records, sourceId, { registry, owner: options.owner ?? null });

  return {
    file: {
      fileName: file.fileName,
      filePath: file.filePath,
      sourceId,
      transactions: transactions.length,
      reconciliation,
      warnings,
    },
    transactions,
  };
}

/**
 * Imports statement files into the store.
 *
 * Files are processed sequentially. A file that cannot be read, detected, parsed
 * or normalized is recorded as a failure and the run moves on. Store failures
 * (reading history, the single append) propagate.
 */
export async function runImport(
  files: ReadonlyArray<string | StatementFile>,
  store: TransactionStore,
  options: ImportOptions = {}
): Promise<ImportResult> {
  const registry = options.registry ?? defaultRegistry;
  const skipDuplicates = options.skipDuplicates ?? true;
  const dryRun = options.dryRun ?? false;

  const history = await store.readHistory();
  const categorizer = HistoryCategorizer.fromHistory(history, options.categorizer);

  const imported: FileImport[] = [];
  const failures: ImportFailure[] = [];
  const perFile: Transaction[][] = [];

  for (let i = 0; i < files.length; i++) {
    const entry = files[i];
    if (entry === undefined) continue;
    const file = toFileRef(entry);

    options.onProgress?.(i + 1, files.length, file.fileName);

    try {
      const result = await importFile(file, registry, options);
      imported.push(result.file);
      perFile.push(result.transactions);
      for (const warning of result.file.warnings) {
        options.onWarning?.(`${file.fileName}: ${warning}`);
      }
    } catch (error) {
      const failure = createFailure(file, error);
      failures.push(failure);
      options.onError?.(failure);
    }
  }

  const parsedTransactions = perFile.flat();
  let fresh = parsedTransactions;
  let duplicatesSkipped = 0;
  if (skipDuplicates) {
    fresh = [];
    const known = countFingerprints(history);
    for (const transactions of perFile) {
      const inFile = new Map<string, number>();
      for (const tx of transactions) {
        const fingerprint = computeFingerprint(tx);
        const occurrence = (inFile.get(fingerprint) ?? 0) + 1;
        inFile.set(fingerprint, occurrence);
        if (occurrence <= (known.get(fingerprint) ?? 0)) {
          duplicatesSkipped++;
          continue;
        }
        known.set(fingerprint, occurrence);
        fresh.push(tx);
      }
    }
  }

  const outcomes = categorizer.categorizeAll(fresh);
  const categorized = { exact: 0, fuzzy: 0, preset: 0, source: 0 };
  let uncategorized = 0;
  for (const { match } of outcomes) {
    if (match.kind === 'none') {
      uncategorized++;
    } else {
      categorized[match.kind]++;
    }
  }
  const transactions = outcomes.map((outcome) => outcome.transaction);

  let appended = 0;
  let appendedRange: string | null = null;
  if (!dryRun && transactions.length > 0) {
    const result = await store.appendTransactions(transactions);
    appended = result.appended;
    appendedRange = result.range;
  }

  return {
    transactions,
    files: imported,
    failures,
    appendedRange,
    dryRun,
    summary: {
      filesFound: files.length,
      filesSucceeded: imported.length,
      filesFailed: failures.length,
      transactionsParsed: parsedTransactions.length,
      duplicatesSkipped,
      categorized,
      uncategorized,
      appended,
    },
  };
}
