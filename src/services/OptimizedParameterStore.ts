/**
 * Per-symbol strategy parameters produced by an offline optimization run
 */

import { promises as fs } from 'fs';
import { StrategyParameters } from '../strategies/Strategy';
import { ConsoleLogger, LoggerService } from '../utils/Logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * stop_loss_pct -> stopLossPct; camelCase names pass through unchanged
 */
export function toParameterName(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

export class OptimizedParameterStore {
  private readonly parameters: Map<string, StrategyParameters>;

  constructor(entries: Record<string, StrategyParameters> = {}) {
    this.parameters = new Map(Object.entries(entries).map(([symbol, params]) => [symbol, { ...params }]));
  }

  /**
   * Reads `{ "<symbol>": { "<param>": number } }` from disk. A missing file gives an empty store;
   * entries that are not objects of finite numbers are skipped.
   */
  static async load(filePath: string, logger: LoggerService = new ConsoleLogger('OptimizedParameterStore')): Promise<OptimizedParameterStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.warn('No optimized parameter file found, using strategy defaults', { filePath });
        return new OptimizedParameterStore();
      }
      throw error;
    }

    return OptimizedParameterStore.fromJson(raw, logger);
  }

  static fromJson(raw: string, logger: LoggerService = new ConsoleLogger('OptimizedParameterStore')): OptimizedParameterStore {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      logger.warn('Optimized parameter file is not an object, ignoring it');
      return new OptimizedParameterStore();
    }

    const entries: Record<string, StrategyParameters> = {};
    for (const [symbol, value] of Object.entries(parsed)) {
      const params = OptimizedParameterStore.parseEntry(value);
      if (params) {
        entries[symbol] = params;
      } else {
        logger.warn('Skipping malformed optimized parameters', { symbol });
      }
    }

    logger.info('Loaded optimized parameters', { symbols: Object.keys(entries).length });
    return new OptimizedParameterStore(entries);
  }

  get(symbol: string): StrategyParameters | undefined {
    const params = this.parameters.get(symbol);
    return params ? { ...params } : undefined;
  }

  has(symbol: string): boolean {
    return this.parameters.has(symbol);
  }

  symbols(): string[] {
    return Array.from(this.parameters.keys());
  }

  get size(): number {
    return this.parameters.size;
  }

  private static parseEntry(value: unknown): StrategyParameters | null {
    if (!isRecord(value)) {
      return null;
    }

    const params: StrategyParameters = {};
    for (const [key, param] of Object.entries(value)) {
      if (typeof param !== 'number' || !Number.isFinite(param)) {
        return null;
      }
      params[toParameterName(key)] = param;
    }
    return Object.keys(params).length > 0 ? params : null;
  }
}
