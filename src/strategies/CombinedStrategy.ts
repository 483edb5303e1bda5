import { BollingerBands, MACD, RSI, SMA } from 'technicalindicators';
import { Signal } from '../models/MarketData';
import { alignToBars, BaseStrategy, StrategyParameters } from './Strategy';

/**
 * Trend, momentum and mean-reversion confluence.
 * Entry needs fast MA above slow MA, MACD above its signal, and either an oversold RSI
 * or a close below the lower band. Any opposing condition exits.
 */
export class CombinedStrategy extends BaseStrategy {
  readonly kind = 'combined';

  constructor(parameters: StrategyParameters) {
    super('CombinedStrategy', parameters);
  }

  requiredParameters(): string[] {
    return [
      'maFast',
      'maSlow',
      'rsiPeriod',
      'rsiOversold',
      'rsiOverbought',
      'bollingerPeriod',
      'bollingerStd',
      'macdFast',
      'macdSlow',
      'macdSignal',
      'stopLossPct',
      'takeProfitPct'
    ];
  }

  protected periodParameters(): string[] {
    return ['maFast', 'maSlow', 'rsiPeriod', 'bollingerPeriod', 'macdFast', 'macdSlow', 'macdSignal'];
  }

  protected computeSignals(closes: number[]): Signal {
    const length = closes.length;
    const fast = alignToBars(SMA.calculate({ period: this.param('maFast'), values: closes }), length);
    const slow = alignToBars(SMA.calculate({ period: this.param('maSlow'), values: closes }), length);
    const rsi = alignToBars(RSI.calculate({ period: this.param('rsiPeriod'), values: closes }), length);

    const bands = BollingerBands.calculate({
      period: this.param('bollingerPeriod'),
      stdDev: this.param('bollingerStd'),
      values: closes
    });
    const upper = alignToBars(bands.map(band => band.upper), length);
    const lower = alignToBars(bands.map(band => band.lower), length);

    const macdOutput = MACD.calculate({
      values: closes,
      fastPeriod: this.param('macdFast'),
      slowPeriod: this.param('macdSlow'),
      signalPeriod: this.param('macdSignal'),
      SimpleMAOscillator: false,
      SimpleMASignal: false
    });
    const macd = alignToBars(macdOutput.map(point => point.MACD ?? Number.NaN), length);
    const signal = alignToBars(macdOutput.map(point => point.signal ?? Number.NaN), length);

    const oversold = this.param('rsiOversold');
    const overbought = this.param('rsiOverbought');

    return {
      entries: closes.map((close, i) =>
        fast[i] > slow[i] && macd[i] > signal[i] && (rsi[i] < oversold || close < lower[i])
      ),
      exits: closes.map((close, i) =>
        fast[i] < slow[i] || macd[i] < signal[i] || rsi[i] > overbought || close > upper[i]
      )
    };
  }
}
