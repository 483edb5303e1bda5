/**
 * Position, closed trade and portfolio snapshot models
 */

export interface Position {
  symbol: string;
  quantity: number;
  averageEntryPrice: number;
  currentPrice: number;
  marketValue: number;
  costBasis: number;
  unrealizedPnl: number;
  unrealizedPnlPct: number;
  openedAt: Date;
  updatedAt: Date;
}

/**
 * Immutable record of a closing fill
 */
export interface ClosedTrade {
  readonly symbol: string;
  readonly quantity: number;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly realizedPnl: number;
  readonly realizedPnlPct: number;
  readonly commission: number;
  readonly openedAt: Date;
  readonly closedAt: Date;
}

export interface PortfolioSummary {
  portfolioValue: number;
  cashBalance: number;
  initialCapital: number;
  totalPnl: number;
  realizedPnl: number;
  unrealizedPnl: number;
  returnPct: number;
  openPositions: number;
  totalTrades: number;
  winRate: number;
}

export interface PortfolioStatistics extends PortfolioSummary {
  positionsValue: number;
  winningTrades: number;
  losingTrades: number;
  averageWin: number;
  averageLoss: number;
  totalCommission: number;
}
