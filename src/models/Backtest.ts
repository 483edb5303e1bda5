/**
 * Backtest run models
 */

export type ExitReason = 'signal' | 'stop_loss' | 'take_profit';

export interface BacktestTrade {
  symbol: string;
  side: 'long';
  entryTime: Date;
  exitTime: Date;
  entryPrice: number;
  exitPrice: number;
  quantity: number;
  pnl: number;
  pnlPct: number;
  commission: number;
  reason: ExitReason;
}

export interface EquityPoint {
  timestamp: Date;
  equity: number;
}

export interface DrawdownPoint {
  timestamp: Date;
  drawdown: number;
  drawdownPct: number;
}

export interface BacktestOptions {
  initialCapital: number;
  commissionPct: number;
  slippagePct: number;
  riskPerTrade: number;
  maxPositionPct: number;
  riskFreeRate: number;
  minBars: number;
  periodsPerYear: number;
  startDate?: Date;
  endDate?: Date;
}

export interface PerformanceMetrics {
  totalReturn: number;
  totalReturnPct: number;
  sharpeRatio: number;
  sortinoRatio: number;
  calmarRatio: number;
  maxDrawdown: number;
  maxDrawdownPct: number;
  recoveryFactor: number;
  volatility: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  averageWin: number;
  averageLoss: number;
  profitFactor: number;
  expectancy: number;
  averageTradeDurationHours: number;
  maxTradeDurationHours: number;
  totalCommission: number;
}

export interface BacktestResult extends PerformanceMetrics {
  symbol: string;
  strategy: string;
  parameters: Record<string, number>;
  initialCapital: number;
  finalCapital: number;
  startDate: Date;
  endDate: Date;
  barsProcessed: number;
  equityCurve: EquityPoint[];
  drawdownCurve: DrawdownPoint[];
  trades: BacktestTrade[];
}
