/**
 * Parser registry: source id → statement source.
 *
 * Adding a bank or card format means registering one more StatementSource;
 * the normalizer and categorizer never branch on source ids.
 */

import { basename } from 'path';
import {
  MalformedStatementError,
  UnsupportedSourceError,
  parseAmount,
  sumAmounts,
  type RawRecord,
  type SourceId,
} from '@ledger/types';
import type { ParsedStatement, StatementInput, StatementSource } from './types.js';
import { BUILTIN_SOURCES } from './sources/index.js';

export class ParserRegistry {
  private readonly sources = new Map<SourceId, StatementSource>();

  constructor(sources: readonly StatementSource[] = []) {
    for (const source of sources) {
      this.register(source);
    }
  }

  register(source: StatementSource): this {
    if (this.sources.has(source.id)) {
      throw new Error(`Source already registered: ${source.id}`);
    }
    this.sources.set(source.id, source);
    return this;
  }

  has(sourceId: string): boolean {
    return this.sources.has(sourceId);
  }

  get(sourceId: string): StatementSource {
    const source = this.sources.get(sourceId);
    if (source === undefined) {
      throw new UnsupportedSourceError(sourceId);
    }
    return source;
  }

  list(): StatementSource[] {
    return Array.from(this.sources.values());
  }

  /**
   * A source id in the file name wins (longest id first, so `card-csv` never
   * shadows a longer id). Otherwise the first source whose layout check accepts
   * the content, in registration order.
   */
  detect(input: StatementInput): SourceId {
    const fileName = basename(input.fileName).toLowerCase();
    const byName = this.list()
      .map((source) => source.id)
      .sort((a, b) => b.length - a.length)
      .find((id) => fileName.includes(id));
    if (byName !== undefined) {
      return byName;
    }

    for (const source of this.sources.values()) {
      if (source.detect(input)) {
        return source.id;
      }
    }

    throw new UnsupportedSourceError(null, `Unable to detect statement source for ${fileName}`);
  }

  parseStatement(input: StatementInput, sourceId: string): ParsedStatement {
    const source = this.get(sourceId);
    const extracted = source.extract(input);

    const foreign = extracted.records.find((record) => record.sourceId !== source.id);
    if (foreign !== undefined) {
      throw new MalformedStatementError(source.id, `Record tagged with foreign source ${foreign.sourceId}`, foreign.lineNumber);
    }

    return {
      sourceId: source.id,
      fileName: input.fileName,
      records: extracted.records,
      expectedTotal: extracted.expectedTotal,
      capturedTotal: capturedTotal(extracted.records, source),
      warnings: extracted.warnings,
    };
  }

  parse(input: StatementInput, sourceId: string): RawRecord[] {
    return this.parseStatement(input, sourceId).records;
  }
}

// Unparsable amounts surface later as NormalizationError; they count as zero here.
function capturedTotal(records: RawRecord[], source: StatementSource): number {
  return sumAmounts(
    records.map((record) => {
      try {
        return parseAmount(record.amount, source.rules.decimalSeparator);
      } catch {
        return 0;
      }
    })
  );
}

export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry(BUILTIN_SOURCES);
}

export const defaultRegistry = createDefaultRegistry();

export function parse(input: StatementInput, sourceId: string, registry: ParserRegistry = defaultRegistry): RawRecord[] {
  return registry.parse(input, sourceId);
}

export function parseStatement(
  input: StatementInput,
  sourceId: string,
  registry: ParserRegistry = defaultRegistry
): ParsedStatement {
  return registry.parseStatement(input, sourceId);
}

export function detectSource(input: StatementInput, registry: ParserRegistry = defaultRegistry): SourceId {
  return registry.detect(input);
}

export function listSources(registry: ParserRegistry = defaultRegistry): StatementSource[] {
  return registry.list();
}
