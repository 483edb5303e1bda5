/**
 * Trading Session
 * Explicit handle for one paper-trading session: owns its engine, the single-writer executor
 * every engine call goes through, and the live strategy runner
 */

import { randomUUID } from 'crypto';
import { ApplicationConfig } from '../config/ConfigurationManager';
import { PriceFeed } from '../connectors/PriceFeed';
import { AuditSink } from '../models/AuditEvent';
import { BacktestOptions, BacktestResult } from '../models/Backtest';
import { Bar } from '../models/MarketData';
import { Order, OrderStatus } from '../models/Order';
import { PortfolioSummary, Position } from '../models/Position';
import { createStrategy } from '../strategies';
import { Strategy } from '../strategies/Strategy';
import { ErrorHandler } from '../utils/ErrorHandler';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, Result } from '../utils/Result';
import { SerialExecutor } from '../utils/SerialExecutor';
import { PlaceOrderError, RunnerStateError } from '../utils/TradingErrors';
import { AuditService } from './AuditService';
import { BacktestEngine, BacktestError } from './BacktestEngine';
import { OptimizedParameterStore } from './OptimizedParameterStore';
import { RunnerStatus, StrategyRunner, StrategyRunnerConfig, SweepSummary } from './StrategyRunner';
import { EngineStatus, PlaceOrderRequest, TradingEngine, TradingEngineConfig } from './TradingEngine';

export type SessionState = 'created' | 'running' | 'stopped';

export interface TradingSessionOptions {
  engine?: Partial<TradingEngineConfig>;
  runner?: Partial<StrategyRunnerConfig>;
  backtest?: Partial<BacktestOptions>;
}

export interface TradingSessionDependencies {
  priceFeed: PriceFeed;
  strategy: Strategy;
  auditSink?: AuditSink;
  optimizedParameters?: OptimizedParameterStore;
  errorHandler?: ErrorHandler;
  logger?: LoggerService;
  now?: () => Date;
}

export interface SessionStatus {
  sessionId: string;
  state: SessionState;
  engine: EngineStatus;
  runner: RunnerStatus;
}

export class TradingSession {
  readonly sessionId: string;
  private readonly engine: TradingEngine;
  private readonly runner: StrategyRunner;
  private readonly executor: SerialExecutor;
  private readonly backtestOptions: Partial<BacktestOptions>;
  private readonly strategy: Strategy;
  private readonly logger: LoggerService;
  private state: SessionState = 'created';

  constructor(options: TradingSessionOptions, dependencies: TradingSessionDependencies, sessionId: string = randomUUID()) {
    this.sessionId = sessionId;
    this.logger = dependencies.logger ?? new ConsoleLogger('TradingSession');
    this.strategy = dependencies.strategy;
    this.backtestOptions = options.backtest ?? {};
    this.executor = new SerialExecutor();
    const errorHandler = dependencies.errorHandler ?? new ErrorHandler({ logger: this.logger });

    this.engine = new TradingEngine(options.engine ?? {}, {
      logger: this.logger,
      auditSink: dependencies.auditSink,
      priceFeed: dependencies.priceFeed,
      errorHandler,
      now: dependencies.now
    });

    this.runner = new StrategyRunner(this.engine, dependencies.strategy, options.runner ?? {}, {
      priceFeed: dependencies.priceFeed,
      optimizedParameters: dependencies.optimizedParameters,
      executor: this.executor,
      errorHandler,
      logger: this.logger,
      now: dependencies.now
    });

    this.logger.info('Trading session created', { sessionId, strategy: dependencies.strategy.name });
  }

  /**
   * Builds a session from loaded configuration: strategy kind, engine and risk settings, runner
   * settings, the optimized parameter file when enabled, and a signed audit trail when enabled
   */
  static async fromConfiguration(
    config: ApplicationConfig,
    priceFeed: PriceFeed,
    overrides: Partial<Omit<TradingSessionDependencies, 'priceFeed'>> = {}
  ): Promise<TradingSession> {
    const sessionId = randomUUID();
    const logger = overrides.logger ?? new ConsoleLogger('TradingSession', config.logLevel);
    const { strategy: strategyKind, ...runner } = config.runner;

    const optimizedParameters =
      overrides.optimizedParameters ??
      (runner.useOptimizedParams ? await OptimizedParameterStore.load(runner.optimizedParamsPath, logger) : undefined);

    const auditSink =
      overrides.auditSink ?? (config.audit.enabled ? new AuditService(undefined, sessionId, overrides.now) : undefined);

    return new TradingSession(
      {
        engine: { ...config.engine, risk: config.risk },
        runner,
        backtest: config.backtest
      },
      {
        priceFeed,
        strategy: overrides.strategy ?? createStrategy(strategyKind),
        auditSink,
        optimizedParameters,
        errorHandler: overrides.errorHandler,
        logger,
        now: overrides.now
      },
      sessionId
    );
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Starts the live loop. A stopped session cannot be restarted.
   */
  start(): Result<void, RunnerStateError> {
    if (this.state === 'stopped') {
      return err(new RunnerStateError('SESSION_STOPPED', `Session ${this.sessionId} has been stopped`));
    }

    const started = this.runner.start();
    if (started.success) {
      this.state = 'running';
    }
    return started;
  }

  /**
   * Stops the live loop and waits for any sweep in progress and queued engine calls to finish
   */
  async stop(): Promise<Result<void, RunnerStateError>> {
    const stopped = await this.runner.stop();
    if (stopped.success) {
      await this.executor.drain();
      this.state = 'stopped';
      this.logger.info('Trading session stopped', { sessionId: this.sessionId });
    }
    return stopped;
  }

  runOnce(): Promise<SweepSummary> {
    return this.runner.runOnce();
  }

  placeOrder(request: PlaceOrderRequest): Promise<Result<Order, PlaceOrderError>> {
    return this.executor.run(() => this.engine.placeOrder(request));
  }

  cancelOrder(orderId: string): Promise<boolean> {
    return this.executor.run(() => this.engine.cancelOrder(orderId));
  }

  updateMarketData(symbol: string, price: number, timestamp?: Date): Promise<Order[]> {
    return this.executor.run(() => this.engine.updateMarketData(symbol, price, timestamp));
  }

  getPositions(): Promise<Position[]> {
    return this.executor.run(() => this.engine.getPositions());
  }

  getPosition(symbol: string): Promise<Position | undefined> {
    return this.executor.run(() => this.engine.getPosition(symbol));
  }

  getOrders(status?: OrderStatus): Promise<Order[]> {
    return this.executor.run(() => this.engine.getOrders(status));
  }

  getPortfolioSummary(): Promise<PortfolioSummary> {
    return this.executor.run(() => this.engine.getPortfolioSummary());
  }

  getStatus(): Promise<SessionStatus> {
    return this.executor.run(() => ({
      sessionId: this.sessionId,
      state: this.state,
      engine: this.engine.getStatus(),
      runner: this.runner.getStatus()
    }));
  }

  /**
   * Replays bars on a fresh backtest engine; the session's own portfolio is never touched
   */
  runBacktest(bars: readonly Bar[], symbol: string, strategy: Strategy = this.strategy): Result<BacktestResult, BacktestError> {
    const backtester = new BacktestEngine(this.backtestOptions, this.logger);
    return backtester.runBacktest(bars, strategy, symbol);
  }
}
