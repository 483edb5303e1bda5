export * from './OrderManager';
export * from './PortfolioManager';
export * from './RiskManager';
export * from './TradingEngine';
export * from './PerformanceAnalyzer';
export * from './BacktestEngine';
export * from './OptimizedParameterStore';
export * from './StrategyRunner';
export * from './TradingSession';
export * from './AuditService';
export * from './ConfigurationService';
