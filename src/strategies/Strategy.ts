/**
 * Strategy capability shared by the backtest and live loops
 */

import { Bar, Signal } from '../models/MarketData';
import { InvalidSignalError, InvalidStrategyParametersError } from '../utils/TradingErrors';

export type StrategyKind = 'simple_ma' | 'rsi_ma' | 'combined';

export type StrategyParameters = Record<string, number>;

export interface Strategy {
  readonly kind: StrategyKind;
  readonly name: string;
  readonly parameters: Readonly<StrategyParameters>;
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  requiredParameters(): string[];
  generateSignals(bars: readonly Bar[]): Signal;
}

/**
 * Parameter validation and indicator alignment common to the bundled strategies
 */
export abstract class BaseStrategy implements Strategy {
  abstract readonly kind: StrategyKind;
  readonly name: string;
  readonly parameters: Readonly<StrategyParameters>;

  protected constructor(name: string, parameters: StrategyParameters) {
    this.name = name;
    this.parameters = Object.freeze({ ...parameters });
    this.validateParameters();
  }

  abstract requiredParameters(): string[];

  protected abstract computeSignals(closes: number[]): Signal;

  get stopLossPct(): number {
    return this.param('stopLossPct');
  }

  get takeProfitPct(): number {
    return this.param('takeProfitPct');
  }

  generateSignals(bars: readonly Bar[]): Signal {
    const signal = this.computeSignals(bars.map(bar => bar.close));
    if (signal.entries.length !== bars.length || signal.exits.length !== bars.length) {
      throw new InvalidSignalError(this.name, bars.length, signal.entries.length, signal.exits.length);
    }
    return signal;
  }

  protected param(name: string): number {
    const value = this.parameters[name];
    if (value === undefined) {
      throw new InvalidStrategyParametersError(this.name, [name]);
    }
    return value;
  }

  /**
   * Parameters that must be whole periods of at least one bar
   */
  protected periodParameters(): string[] {
    return [];
  }

  private validateParameters(): void {
    const missing = this.requiredParameters().filter(name => this.parameters[name] === undefined);
    if (missing.length > 0) {
      throw new InvalidStrategyParametersError(this.name, missing);
    }

    for (const name of this.requiredParameters()) {
      if (!Number.isFinite(this.parameters[name])) {
        throw new InvalidStrategyParametersError(this.name, [], `Parameter ${name} of ${this.name} must be a finite number`);
      }
    }

    for (const name of this.periodParameters()) {
      const value = this.param(name);
      if (!Number.isInteger(value) || value < 1) {
        throw new InvalidStrategyParametersError(this.name, [], `Parameter ${name} of ${this.name} must be a positive integer, got ${value}`);
      }
    }

    for (const name of ['stopLossPct', 'takeProfitPct']) {
      const value = this.param(name);
      if (value <= 0 || value >= 1) {
        throw new InvalidStrategyParametersError(this.name, [], `Parameter ${name} of ${this.name} must be between 0 and 1, got ${value}`);
      }
    }
  }
}

/**
 * Right-aligns an indicator series to the bar count, padding the warm-up with NaN
 */
export function alignToBars(series: readonly number[], length: number): number[] {
  if (series.length >= length) {
    return series.slice(series.length - length);
  }
  return [...new Array<number>(length - series.length).fill(Number.NaN), ...series];
}

export function crossedAbove(fast: readonly number[], slow: readonly number[], index: number): boolean {
  return index > 0 && fast[index] > slow[index] && fast[index - 1] <= slow[index - 1];
}

export function crossedBelow(fast: readonly number[], slow: readonly number[], index: number): boolean {
  return index > 0 && fast[index] < slow[index] && fast[index - 1] >= slow[index - 1];
}
