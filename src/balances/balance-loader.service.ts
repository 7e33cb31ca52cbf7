import { Injectable, Logger } from '@nestjs/common';
import fs from 'node:fs';
import path from 'node:path';
import { SymbolBalances } from '../rebalance/entities/allocation.entity';
import { parseNonNegative } from '../common/utils/decimal.util';
import { FileNotFoundError, MalformedNumberError } from '../common/errors/rebalance.errors';

export const DEFAULT_CASH_SYMBOL = 'VMFXX';
export const LOCAL_BALANCE_FILE = 'balances_local.csv';
export const FALLBACK_BALANCE_FILE = 'balances.csv';

// Brokerage position export columns (0-based)
const SYMBOL_COLUMN = 2;
const BALANCE_COLUMN = 5;

export interface BalanceFileOptions {
  explicitPath?: string;           // used as-is, no fallback
  directory?: string;              // searched for the local override, then the fallback
}

/** Splits one CSV line; quoted fields may contain commas and `""` escapes */
export function parseCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }
    if (ch === ',' && !inQuotes) {
      out.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  out.push(current);
  return out.map((s) => s.trim());
}

// Reads per-security market values from a brokerage CSV export.
// The export lists positions first, then a blank line and unrelated
// sections (transactions), so reading stops at the first blank row.
@Injectable()
export class BalanceLoaderService {
  private readonly logger = new Logger(BalanceLoaderService.name);

  /**
   * Picks the balance file: the explicit path if given, otherwise
   * `balances_local.csv` when present, otherwise `balances.csv`.
   * @throws FileNotFoundError naming every path tried
   */
  resolveBalanceFile(options: BalanceFileOptions = {}): string {
    const candidates = options.explicitPath
      ? [options.explicitPath]
      : [LOCAL_BALANCE_FILE, FALLBACK_BALANCE_FILE].map((file) =>
          path.join(options.directory ?? '.', file),
        );

    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (!found) {
      throw new FileNotFoundError('Balance file', candidates);
    }
    this.logger.debug(`Using balance file ${found}`);
    return found;
  }

  load(filePath: string, cashSymbol = DEFAULT_CASH_SYMBOL): SymbolBalances {
    if (!fs.existsSync(filePath)) {
      throw new FileNotFoundError('Balance file', [filePath]);
    }
    const balances = this.parse(fs.readFileSync(filePath, 'utf8'), cashSymbol, filePath);
    this.logger.log(`Loaded ${balances.size} securities from ${filePath}`);
    return balances;
  }

  /**
   * Parses CSV text: header skipped, symbol in column 3, value in column 6.
   * Rows for the cash-equivalent symbol are dropped; when a symbol repeats,
   * the last row wins.
   * @throws MalformedNumberError on a short row or an unparseable or negative value
   */
  parse(text: string, cashSymbol = DEFAULT_CASH_SYMBOL, source = 'balances'): SymbolBalances {
    const balances: SymbolBalances = new Map();
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

    for (let index = 1; index < lines.length; index++) {
      const line = lines[index];
      if (line.trim() === '') {
        break;
      }

      const rowLabel = `${source} row ${index + 1}`;
      const cells = parseCsvLine(line);
      if (cells.length <= BALANCE_COLUMN) {
        throw new MalformedNumberError(line, rowLabel, `has no value in column ${BALANCE_COLUMN + 1}`);
      }

      const symbol = cells[SYMBOL_COLUMN];
      if (symbol === cashSymbol) {
        this.logger.debug(`Skipping cash-equivalent ${symbol} in ${rowLabel}`);
        continue;
      }

      const balance = parseNonNegative(cells[BALANCE_COLUMN], rowLabel);
      const previous = balances.get(symbol);
      if (previous) {
        this.logger.debug(
          `${rowLabel} replaces ${symbol} balance ${previous.toString()} with ${balance.toString()}`,
        );
      }
      balances.set(symbol, balance);
    }

    return balances;
  }
}
