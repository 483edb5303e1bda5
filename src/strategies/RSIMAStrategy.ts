import { RSI, SMA } from 'technicalindicators';
import { Signal } from '../models/MarketData';
import { alignToBars, BaseStrategy, StrategyParameters } from './Strategy';

/**
 * Buys oversold dips inside an uptrend (close above the slow average);
 * exits when overbought or when the trend breaks
 */
export class RSIMAStrategy extends BaseStrategy {
  readonly kind = 'rsi_ma';

  constructor(parameters: StrategyParameters) {
    super('RSIMAStrategy', parameters);
  }

  requiredParameters(): string[] {
    return ['maSlow', 'rsiPeriod', 'rsiOversold', 'rsiOverbought', 'stopLossPct', 'takeProfitPct'];
  }

  protected periodParameters(): string[] {
    return ['maSlow', 'rsiPeriod'];
  }

  protected computeSignals(closes: number[]): Signal {
    const slow = alignToBars(SMA.calculate({ period: this.param('maSlow'), values: closes }), closes.length);
    const rsi = alignToBars(RSI.calculate({ period: this.param('rsiPeriod'), values: closes }), closes.length);
    const oversold = this.param('rsiOversold');
    const overbought = this.param('rsiOverbought');

    return {
      entries: closes.map((close, i) => rsi[i] < oversold && close > slow[i]),
      exits: closes.map((close, i) => rsi[i] > overbought || close < slow[i])
    };
  }
}
