#!/usr/bin/env tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir, access, constants } from 'fs/promises';
import { resolve } from 'path';
import { LEDGER_VERSION, errorMessage, type TransactionStore } from '@ledger/types';
import {
  defaultRegistry,
  listSources,
  selectStatementFiles,
  type StatementFile,
} from '@ledger/parsers';
import { buildCategoryRules, findCategoryConflicts, toReferenceTable } from '@ledger/categorizer';
import { createSpreadsheetApi, getSheetsConfig, GoogleSheetsTransactionStore, testConnection } from '@ledger/sheets';
import { runImport, type ImportFailure } from '@ledger/importer';
import { exportCsv, formatImportSummary, formatReconciliation } from '@ledger/output';
import { envBool, generateEnvTemplate, parseAmountFormat, parseMinMatch, parseThreshold } from './options.js';

const program = new Command();

interface ImportCliOptions {
  inputDir?: string;
  source?: string;
  owner?: string;
  threshold?: string;
  minMatch?: string;
  dedupe: boolean;
  sourceCategories: boolean;
  strict: boolean;
  dryRun: boolean;
  out?: string;
  amountFormat?: string;
  verbose: boolean;
}

async function openStore(verbose: boolean): Promise<GoogleSheetsTransactionStore> {
  const config = getSheetsConfig();
  const api = createSpreadsheetApi(config);
  if (verbose) {
    console.error(`[INFO] Spreadsheet: ${config.spreadsheetId}`);
    console.error(`[INFO] Worksheet: ${config.worksheet}`);
    const connection = await testConnection(api);
    if (connection.success) {
      console.error(`[INFO] Connected to "${connection.title ?? ''}"`);
    } else {
      console.error(`[WARN] Connection check failed: ${connection.error ?? 'unknown error'}`);
    }
  }
  return new GoogleSheetsTransactionStore(api, {
    worksheet: config.worksheet,
    referenceWorksheet: config.referenceWorksheet,
    onWarning: (message) => console.error(`[WARN] ${message}`),
  });
}

async function collectFiles(files: string[], inputDir: string | undefined, verbose: boolean): Promise<StatementFile[]> {
  const selection = await selectStatementFiles(files, inputDir);
  if (verbose) {
    if (selection.directory !== null) {
      console.error(`[INFO] Found ${selection.files.length} statement file(s) in ${selection.directory}`);
    } else if (inputDir !== undefined) {
      console.error(`[INFO] Files were named; not scanning ${inputDir}`);
    }
    for (const skip of selection.skipped) {
      console.error(`[INFO] Skipped ${skip.fileName}: ${skip.reason}`);
    }
  }
  return selection.files;
}

program
  .name('ledger')
  .description('Import bank and card statements into a Google Sheets ledger')
  .version(LEDGER_VERSION);

program
  .command('import')
  .description('Parse, categorize and append statement files to the ledger sheet')
  .argument('[files...]', 'Statement files (.csv or .txt)')
  .option('-d, --input-dir <directory>', 'Directory containing statement files', process.env['LEDGER_INPUT_DIR'])
  .option('-s, --source <id>', 'Parse every file as this source instead of detecting it', process.env['LEDGER_SOURCE'])
  .option('--owner <name>', 'Who made the expenses in these statements', process.env['LEDGER_OWNER'])
  .option('--threshold <n>', 'Fuzzy match threshold, 0..1', process.env['LEDGER_THRESHOLD'])
  .option('--min-match <n>', 'Minimum common substring length for a fuzzy match', process.env['LEDGER_MIN_MATCH'])
  .option('--no-dedupe', 'Append transactions even when the sheet already has them')
  .option('--source-categories', 'Use the category printed by the statement when history has no match', envBool('LEDGER_SOURCE_CATEGORIES', false))
  .option('--strict', 'Fail statements whose captured total differs from the printed total', envBool('LEDGER_STRICT', false))
  .option('--dry-run', 'Parse and categorize without writing to the sheet', envBool('LEDGER_DRY_RUN', false))
  .option('-o, --out <file>', 'Also write the categorized transactions to a CSV file', process.env['LEDGER_OUTPUT_FILE'])
  .option('--amount-format <format>', 'CSV amount format: decimal or brl', process.env['LEDGER_AMOUNT_FORMAT'])
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGER_VERBOSE', false))
  .action(async (files: string[], options: ImportCliOptions) => {
    try {
      const threshold = parseThreshold(options.threshold);
      const minMatchLength = parseMinMatch(options.minMatch);
      const amountFormat = parseAmountFormat(options.amountFormat);

      if (options.source !== undefined && !defaultRegistry.has(options.source)) {
        const known = listSources().map((source) => source.id).join(', ');
        console.error(`[ERROR] Unknown source "${options.source}". Known sources: ${known}`);
        process.exit(1);
      }

      const statementFiles = await collectFiles(files, options.inputDir, options.verbose);
      if (statementFiles.length === 0) {
        console.error('[ERROR] No statement files to import');
        process.exit(1);
      }

      if (options.verbose) {
        console.error(`[INFO] Ledger version: ${LEDGER_VERSION}`);
        console.error(`[INFO] Threshold: ${threshold}, min match: ${minMatchLength}`);
        console.error(`[INFO] Deduplication: ${options.dedupe ? 'enabled' : 'disabled'}`);
        console.error(`[INFO] Strict mode: ${options.strict ? 'enabled' : 'disabled'}`);
        if (options.dryRun) console.error('[INFO] Dry run: the sheet will not be written');
      }

      const store: TransactionStore = await openStore(options.verbose);
      const result = await runImport(statementFiles, store, {
        sourceId: options.source,
        owner: options.owner,
        categorizer: {
          threshold,
          minMatchLength,
          fallbackToSourceCategory: options.sourceCategories,
        },
        skipDuplicates: options.dedupe,
        strict: options.strict,
        dryRun: options.dryRun,
        onProgress: (current, total, fileName) => {
          if (options.verbose) console.error(`[INFO] Parsing ${current}/${total}: ${fileName}`);
        },
        onError: (failure: ImportFailure) => {
          console.error(`[ERROR] Failed to import ${failure.fileName}: ${failure.error}`);
        },
        onWarning: (message) => console.error(`[WARN] ${message}`),
      });

      if (options.verbose) {
        for (const file of result.files) {
          console.error(`[INFO] ${file.sourceId}: ${formatReconciliation(file.reconciliation)}`);
        }
      }

      if (options.out !== undefined) {
        const outPath = resolve(options.out);
        await writeFile(outPath, exportCsv(result.transactions, { includeTotal: true, amountFormat }) + '\n', 'utf-8');
        console.error(`[INFO] CSV written to: ${outPath}`);
      } else if (options.dryRun && result.transactions.length > 0) {
        console.log(exportCsv(result.transactions, { amountFormat }));
      }

      console.error('');
      console.error('=== Import Summary ===');
      for (const line of formatImportSummary(result)) {
        console.error(line);
      }
      console.error('======================');

      if (result.summary.filesSucceeded === 0 && result.summary.filesFailed > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error(`[ERROR] ${errorMessage(error)}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program
  .command('references')
  .description('Build category rules from the sheet history and report conflicting keys')
  .option('--write', 'Write the rules to the reference worksheet', false)
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGER_VERBOSE', false))
  .action(async (options: { write: boolean; verbose: boolean }) => {
    try {
      const store = await openStore(options.verbose);
      const history = await store.readHistory();
      const rules = buildCategoryRules(history);
      const conflicts = findCategoryConflicts(history);

      console.error(`[INFO] History rows: ${history.length}`);
      console.error(`[INFO] Category rules: ${rules.length}`);

      for (const conflict of conflicts) {
        const counts = conflict.categories.map(({ category, count }) => `${category} x${count}`).join(', ');
        console.error(`[WARN] "${conflict.key}" has more than one category: ${counts}`);
      }

      if (options.write) {
        const written = await store.writeReferenceTable(toReferenceTable(rules));
        console.error(`[INFO] Wrote ${written} row(s) to ${store.referenceWorksheet}`);
      }
    } catch (error) {
      console.error(`[ERROR] ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('sources')
  .description('List the statement sources the importer understands')
  .action(() => {
    for (const source of listSources()) {
      console.log(`${source.id.padEnd(18)} ${source.format.padEnd(10)} ${source.label}`);
    }
  });

// Init command - initialize project with required files
program
  .command('init')
  .description('Create a .env template and a statements directory')
  .option('--force', 'Overwrite existing files', false)
  .action(async (options: { force: boolean }) => {
    const cwd = process.cwd();
    let filesCreated = 0;
    let filesSkipped = 0;

    console.log('Initializing ledger...\n');

    const envPath = resolve(cwd, '.env');
    if ((await fileExists(envPath)) && !options.force) {
      console.log('  [SKIP] .env already exists (use --force to overwrite)');
      filesSkipped++;
    } else {
      await writeFile(envPath, generateEnvTemplate(), 'utf-8');
      console.log('  [CREATE] .env');
      filesCreated++;
    }

    const statementsDir = resolve(cwd, 'statements');
    if (!(await fileExists(statementsDir))) {
      await mkdir(statementsDir, { recursive: true });
      console.log('  [CREATE] statements/ (place your statement exports here)');
      filesCreated++;
    }

    console.log(`\n✓ Initialization complete!`);
    console.log(`  Files created: ${filesCreated}`);
    console.log(`  Files skipped: ${filesSkipped}`);
    console.log(`\nNext steps:`);
    console.log(`  1. Set SPREADSHEET_ID and GOOGLE_SHEETS_CREDENTIALS in .env`);
    console.log(`  2. Place your statement files in ./statements/`);
    console.log(`  3. Run: ledger import --input-dir ./statements --dry-run`);
  });

// Helper to check if file exists
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

await program.parseAsync();
