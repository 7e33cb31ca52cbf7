import { Injectable, Logger } from '@nestjs/common';
import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { AllocationConfig } from './entities/allocation-config.entity';
import { CategoryMembers, TargetAllocation } from '../rebalance/entities/allocation.entity';
import { parseDecimal, sum } from '../common/utils/decimal.util';
import {
  ConfigMissingKeyError,
  FileNotFoundError,
  InvalidConfigError,
} from '../common/errors/rebalance.errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Loads and validates the allocation configuration:
//
//   categories:
//     Stocks: [VTI, VXUS]
//     Bonds: [BND]
//   target_allocation:
//     Stocks: "0.6"
//     Bonds: "0.4"
//   cash_symbol: VMFXX        # optional
//
// The same rules apply to configuration arriving in an HTTP request body.
@Injectable()
export class AllocationConfigService {
  private readonly logger = new Logger(AllocationConfigService.name);

  /** @throws FileNotFoundError when the file does not exist */
  load(path: string): AllocationConfig {
    if (!fs.existsSync(path)) {
      throw new FileNotFoundError('Configuration file', [path]);
    }
    const config = this.parse(fs.readFileSync(path, 'utf8'), path);
    this.logger.log(`Loaded ${config.categories.size} categories from ${path}`);
    return config;
  }

  parse(text: string, source = 'configuration'): AllocationConfig {
    let document: unknown;
    try {
      document = parseYaml(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidConfigError(`${source} is not valid YAML: ${reason}`);
    }
    return this.fromObject(document, source);
  }

  /**
   * Validates an already-parsed document.
   * @throws ConfigMissingKeyError, InvalidConfigError, MalformedNumberError
   */
  fromObject(raw: unknown, source = 'configuration'): AllocationConfig {
    if (!isRecord(raw)) {
      throw new InvalidConfigError(`${source} must be a mapping`);
    }

    const categories = this.readCategories(raw.categories);
    const targetAllocation = this.readTargets(raw.target_allocation);

    for (const category of categories.keys()) {
      if (!targetAllocation.has(category)) {
        throw new ConfigMissingKeyError(`target_allocation.${category}`);
      }
    }
    for (const category of targetAllocation.keys()) {
      if (!categories.has(category)) {
        throw new ConfigMissingKeyError(`categories.${category}`);
      }
    }

    const targetSum = sum(targetAllocation.values());
    if (!targetSum.equals(1)) {
      this.logger.warn(`Target allocation in ${source} sums to ${targetSum.toString()}, expected 1`);
    }

    return {
      categories,
      targetAllocation,
      cashSymbol: this.readCashSymbol(raw.cash_symbol),
    };
  }

  private readCategories(value: unknown): CategoryMembers {
    if (value === undefined || value === null) {
      throw new ConfigMissingKeyError('categories');
    }
    if (!isRecord(value)) {
      throw new InvalidConfigError('categories must map each category name to a list of symbols');
    }

    const categories: CategoryMembers = new Map();
    for (const [name, members] of Object.entries(value)) {
      // an empty YAML entry (`Cash:`) is an empty category
      if (members === null || members === undefined) {
        categories.set(name, []);
        continue;
      }
      if (!Array.isArray(members) || !members.every((m): m is string => typeof m === 'string')) {
        throw new InvalidConfigError(`categories.${name} must be a list of symbols`);
      }
      categories.set(name, members.map((symbol) => symbol.trim()));
    }
    return categories;
  }

  private readTargets(value: unknown): TargetAllocation {
    if (value === undefined || value === null) {
      throw new ConfigMissingKeyError('target_allocation');
    }
    if (!isRecord(value)) {
      throw new InvalidConfigError('target_allocation must map each category name to a fraction');
    }

    const targets: TargetAllocation = new Map();
    for (const [name, fraction] of Object.entries(value)) {
      if (fraction === null || fraction === undefined) {
        throw new ConfigMissingKeyError(`target_allocation.${name}`);
      }
      const text = typeof fraction === 'string' || typeof fraction === 'number'
        ? String(fraction)
        : JSON.stringify(fraction);
      const target = parseDecimal(text, `target_allocation.${name}`);
      if (target.lessThan(0) || target.greaterThan(1)) {
        throw new InvalidConfigError(
          `target_allocation.${name} must be between 0 and 1, got ${target.toString()}`,
        );
      }
      targets.set(name, target);
    }
    return targets;
  }

  private readCashSymbol(value: unknown): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InvalidConfigError('cash_symbol must be a non-empty string');
    }
    return value.trim();
  }
}
