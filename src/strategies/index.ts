import { CombinedStrategy } from './CombinedStrategy';
import { RSIMAStrategy } from './RSIMAStrategy';
import { SimpleMAStrategy } from './SimpleMAStrategy';
import { Strategy, StrategyKind, StrategyParameters } from './Strategy';

export * from './Strategy';
export { SimpleMAStrategy, RSIMAStrategy, CombinedStrategy };

export const STRATEGY_KINDS: readonly StrategyKind[] = ['simple_ma', 'rsi_ma', 'combined'];

export const DEFAULT_STRATEGY_PARAMETERS: Readonly<Record<StrategyKind, Readonly<StrategyParameters>>> = {
  simple_ma: {
    maFast: 10,
    maSlow: 30,
    stopLossPct: 0.02,
    takeProfitPct: 0.04
  },
  rsi_ma: {
    maSlow: 50,
    rsiPeriod: 14,
    rsiOversold: 30,
    rsiOverbought: 70,
    stopLossPct: 0.03,
    takeProfitPct: 0.06
  },
  combined: {
    maFast: 10,
    maSlow: 30,
    rsiPeriod: 14,
    rsiOversold: 30,
    rsiOverbought: 70,
    bollingerPeriod: 20,
    bollingerStd: 2.0,
    macdFast: 12,
    macdSlow: 26,
    macdSignal: 9,
    stopLossPct: 0.02,
    takeProfitPct: 0.04
  }
};

export function isStrategyKind(value: string): value is StrategyKind {
  return STRATEGY_KINDS.some(kind => kind === value);
}

/**
 * Builds a strategy from its kind; overrides are layered on the kind's defaults
 */
export function createStrategy(kind: StrategyKind, overrides: StrategyParameters = {}): Strategy {
  const parameters = { ...DEFAULT_STRATEGY_PARAMETERS[kind], ...overrides };

  switch (kind) {
    case 'simple_ma':
      return new SimpleMAStrategy(parameters);
    case 'rsi_ma':
      return new RSIMAStrategy(parameters);
    case 'combined':
      return new CombinedStrategy(parameters);
  }
}

/**
 * Same strategy kind with some parameters replaced, e.g. per-symbol optimized values
 */
export function withParameters(strategy: Strategy, overrides: StrategyParameters): Strategy {
  return createStrategy(strategy.kind, { ...strategy.parameters, ...overrides });
}
