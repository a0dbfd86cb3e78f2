/**
 * Human-readable run summaries. The CLI prints these lines; nothing here writes
 * to the console.
 */

import type { ReconciliationCheck } from '@ledger/parsers';
import type { ImportResult } from '@ledger/importer';

function money(amount: number): string {
  return `R$ ${amount.toFixed(2)}`;
}

export function formatReconciliation(check: ReconciliationCheck): string {
  const captured = `captured ${money(check.capturedTotal)}`;
  switch (check.status) {
    case 'no-total':
      return `${check.fileName}: ${captured}, no statement total`;
    case 'matched':
      return `${check.fileName}: ${captured}, statement ${money(check.expectedTotal ?? 0)}, totals match`;
    case 'mismatch':
      return `${check.fileName}: ${captured}, statement ${money(check.expectedTotal ?? 0)}, difference ${money(check.difference ?? 0)}`;
  }
}

export function formatImportSummary(result: ImportResult): string[] {
  const { summary } = result;
  const categorizedTotal =
    summary.categorized.exact + summary.categorized.fuzzy + summary.categorized.preset + summary.categorized.source;

  const lines = [
    `Files: ${summary.filesSucceeded}/${summary.filesFound} imported, ${summary.filesFailed} failed`,
    `Transactions parsed: ${summary.transactionsParsed}`,
    `Duplicates skipped: ${summary.duplicatesSkipped}`,
    `Categorized: ${categorizedTotal} (exact ${summary.categorized.exact}, fuzzy ${summary.categorized.fuzzy}, preset ${summary.categorized.preset}, source ${summary.categorized.source})`,
    `Uncategorized: ${summary.uncategorized}`,
    result.dryRun ? 'Dry run: nothing written' : `Appended: ${summary.appended}${result.appendedRange !== null ? ` (${result.appendedRange})` : ''}`,
  ];

  for (const failure of result.failures) {
    lines.push(`Failed ${failure.fileName} [${failure.kind}]: ${failure.error}`);
  }

  return lines;
}
