import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('instrumentRegistry');

const SYMBOL_COLUMN = 'SYMBOL';
// Index summary rows that sit in the constituent lists next to real symbols.
const EXCLUDED_SYMBOLS = new Set(['NIFTY TOTAL MARKET']);

const CsvRowsSchema = z.array(z.record(z.string()));

export function normalizeSymbol(raw: string): string {
  return String(raw || '')
    .trim()
    .replace(/^"+|"+$/g, '')
    .trim()
    .toUpperCase();
}

/**
 * The fixed universe of instruments for the life of the process. Symbols are
 * upper-case, unique and kept in file order.
 */
export class InstrumentRegistry {
  private readonly symbols: readonly string[];
  private readonly index: ReadonlySet<string>;

  constructor(symbols: Iterable<string>) {
    const unique: string[] = [];
    const seen = new Set<string>();
    for (const raw of symbols) {
      const symbol = normalizeSymbol(raw);
      if (!symbol || EXCLUDED_SYMBOLS.has(symbol) || seen.has(symbol)) continue;
      seen.add(symbol);
      unique.push(symbol);
    }
    this.symbols = Object.freeze(unique);
    this.index = seen;
  }

  /** Parses a reference list with a SYMBOL header column. */
  static fromCsv(content: string): InstrumentRegistry {
    const parsed = CsvRowsSchema.safeParse(
      parse(content, {
        columns: (header: string[]) => header.map((name) => name.trim().toUpperCase()),
        skip_empty_lines: true,
        trim: true,
        bom: true,
        relax_column_count: true,
      }),
    );
    if (!parsed.success) {
      throw new Error(`Instrument list is not a table of text columns: ${parsed.error.message}`);
    }
    const rows = parsed.data;
    if (rows.length > 0 && !(SYMBOL_COLUMN in rows[0])) {
      throw new Error(`Instrument list has no ${SYMBOL_COLUMN} column`);
    }
    return new InstrumentRegistry(rows.map((row) => row[SYMBOL_COLUMN] ?? ''));
  }

  instruments(): readonly string[] {
    return this.symbols;
  }

  has(symbol: string): boolean {
    return this.index.has(normalizeSymbol(symbol));
  }

  get size(): number {
    return this.symbols.length;
  }
}

export async function loadInstrumentRegistry(filePath: string): Promise<InstrumentRegistry> {
  const content = await fs.readFile(filePath, 'utf-8');
  const registry = InstrumentRegistry.fromCsv(content);
  log.info({ filePath, instruments: registry.size }, 'Loaded instrument universe');
  return registry;
}
