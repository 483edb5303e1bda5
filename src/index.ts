/**
 * Paper-trading and backtest execution engine
 * Simulated order execution, portfolio accounting and risk control, driven by
 * a historical replay loop or a periodic live strategy loop
 */

export * from './models';
export * from './services';
export * from './strategies';
export * from './connectors/PriceFeed';
export * from './config/ConfigurationManager';
export * from './utils/ErrorHandler';
export * from './utils/TradingErrors';
export * from './utils/Result';
export * from './utils/Logger';
export * from './utils/SerialExecutor';

// Application version and metadata
export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Paper Trade Engine';
