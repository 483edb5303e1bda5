/**
 * Typed rejections raised by the execution and accounting core
 */

import { ApplicationError, ErrorCategory, ErrorContext, ErrorSeverity } from './ErrorHandler';

export type RiskRule = 'position_size' | 'total_exposure' | 'daily_loss' | 'portfolio_value';

export type RunnerStateCode = 'RUNNER_ALREADY_RUNNING' | 'RUNNER_NOT_RUNNING' | 'SESSION_STOPPED';

function contextFor(operation: string, component: string, metadata?: Record<string, unknown>): ErrorContext {
  return {
    operation,
    component,
    timestamp: new Date(),
    metadata
  };
}

export class InvalidOrderError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(
      message,
      'INVALID_ORDER',
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      contextFor('createOrder', 'OrderManager', metadata),
      { isRetryable: false }
    );
    this.name = 'InvalidOrderError';
  }
}

export class InsufficientCashError extends ApplicationError {
  public readonly required: number;
  public readonly available: number;

  constructor(required: number, available: number, symbol?: string) {
    super(
      `Insufficient cash: required ${required.toFixed(2)}, available ${available.toFixed(2)}`,
      'INSUFFICIENT_CASH',
      ErrorCategory.BUSINESS_LOGIC,
      ErrorSeverity.MEDIUM,
      contextFor('openOrAdd', 'PortfolioManager', { symbol, required, available }),
      { isRetryable: false }
    );
    this.name = 'InsufficientCashError';
    this.required = required;
    this.available = available;
  }
}

export class NoPositionError extends ApplicationError {
  public readonly symbol: string;

  constructor(symbol: string) {
    super(
      `No open position for ${symbol}`,
      'NO_POSITION',
      ErrorCategory.BUSINESS_LOGIC,
      ErrorSeverity.LOW,
      contextFor('closeOrReduce', 'PortfolioManager', { symbol }),
      { isRetryable: false }
    );
    this.name = 'NoPositionError';
    this.symbol = symbol;
  }
}

export class OverCloseError extends ApplicationError {
  public readonly requested: number;
  public readonly held: number;

  constructor(symbol: string, requested: number, held: number) {
    super(
      `Cannot close ${requested} of ${symbol}: only ${held} held`,
      'OVER_CLOSE',
      ErrorCategory.BUSINESS_LOGIC,
      ErrorSeverity.LOW,
      contextFor('closeOrReduce', 'PortfolioManager', { symbol, requested, held }),
      { isRetryable: false }
    );
    this.name = 'OverCloseError';
    this.requested = requested;
    this.held = held;
  }
}

export class RiskViolationError extends ApplicationError {
  public readonly rule: RiskRule;
  public readonly limit: number;
  public readonly measured: number;

  constructor(reason: string, rule: RiskRule, limit: number, measured: number) {
    super(
      reason,
      'RISK_VIOLATION',
      ErrorCategory.BUSINESS_LOGIC,
      ErrorSeverity.MEDIUM,
      contextFor('checkOrder', 'RiskManager', { rule, limit, measured }),
      { isRetryable: false }
    );
    this.name = 'RiskViolationError';
    this.rule = rule;
    this.limit = limit;
    this.measured = measured;
  }
}

export class InsufficientDataError extends ApplicationError {
  public readonly required: number;
  public readonly actual: number;

  constructor(required: number, actual: number, symbol?: string) {
    super(
      `Insufficient data: ${actual} usable bars, at least ${required} required`,
      'INSUFFICIENT_DATA',
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      contextFor('runBacktest', 'BacktestEngine', { symbol, required, actual }),
      { isRetryable: false }
    );
    this.name = 'InsufficientDataError';
    this.required = required;
    this.actual = actual;
  }
}

export class DataUnavailableError extends ApplicationError {
  public readonly symbol: string;

  constructor(symbol: string, detail = 'no data returned', operation = 'fetchMarketData') {
    super(
      `Market data unavailable for ${symbol}: ${detail}`,
      'DATA_UNAVAILABLE',
      ErrorCategory.EXTERNAL_SERVICE,
      ErrorSeverity.MEDIUM,
      contextFor(operation, 'PriceFeed', { symbol }),
      { isRetryable: true }
    );
    this.name = 'DataUnavailableError';
    this.symbol = symbol;
  }
}

export class InvalidSignalError extends ApplicationError {
  constructor(strategy: string, expected: number, entries: number, exits: number) {
    super(
      `Strategy ${strategy} produced ${entries} entries and ${exits} exits for ${expected} bars`,
      'INVALID_SIGNAL',
      ErrorCategory.VALIDATION,
      ErrorSeverity.HIGH,
      contextFor('generateSignals', 'Strategy', { strategy, expected, entries, exits }),
      { isRetryable: false }
    );
    this.name = 'InvalidSignalError';
  }
}

export class InvalidStrategyParametersError extends ApplicationError {
  public readonly missing: string[];

  constructor(strategy: string, missing: string[], detail?: string) {
    super(
      detail ?? `Strategy ${strategy} is missing required parameters: ${missing.join(', ')}`,
      'INVALID_STRATEGY_PARAMETERS',
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      contextFor('createStrategy', 'Strategy', { strategy, missing }),
      { isRetryable: false }
    );
    this.name = 'InvalidStrategyParametersError';
    this.missing = missing;
  }
}

export class RunnerStateError extends ApplicationError {
  constructor(code: RunnerStateCode, message: string) {
    super(
      message,
      code,
      ErrorCategory.BUSINESS_LOGIC,
      ErrorSeverity.LOW,
      contextFor(code === 'RUNNER_NOT_RUNNING' ? 'stop' : 'start', 'StrategyRunner'),
      { isRetryable: false }
    );
    this.name = 'RunnerStateError';
  }
}

export type OrderError = InvalidOrderError | InsufficientCashError | NoPositionError | OverCloseError;

export type PlaceOrderError = OrderError | RiskViolationError | DataUnavailableError;
