import { SMA } from 'technicalindicators';
import { Signal } from '../models/MarketData';
import { alignToBars, BaseStrategy, crossedAbove, crossedBelow, StrategyParameters } from './Strategy';
import { InvalidStrategyParametersError } from '../utils/TradingErrors';

/**
 * Enters when the fast moving average crosses above the slow one, exits on the opposite cross
 */
export class SimpleMAStrategy extends BaseStrategy {
  readonly kind = 'simple_ma';

  constructor(parameters: StrategyParameters) {
    super('SimpleMAStrategy', parameters);
    if (this.param('maFast') >= this.param('maSlow')) {
      throw new InvalidStrategyParametersError(this.name, [], 'maFast must be shorter than maSlow');
    }
  }

  requiredParameters(): string[] {
    return ['maFast', 'maSlow', 'stopLossPct', 'takeProfitPct'];
  }

  protected periodParameters(): string[] {
    return ['maFast', 'maSlow'];
  }

  protected computeSignals(closes: number[]): Signal {
    const fast = alignToBars(SMA.calculate({ period: this.param('maFast'), values: closes }), closes.length);
    const slow = alignToBars(SMA.calculate({ period: this.param('maSlow'), values: closes }), closes.length);

    return {
      entries: closes.map((_, i) => crossedAbove(fast, slow, i)),
      exits: closes.map((_, i) => crossedBelow(fast, slow, i))
    };
  }
}
