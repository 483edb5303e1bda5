export * from './Order';
export * from './Position';
export * from './MarketData';
export * from './AuditEvent';
export * from './Backtest';
