/**
 * Configuration Manager for engine, risk, backtest and live-loop settings
 * Sources in precedence order: defaults, JSON file, environment variables
 */

import { promises as fs } from 'fs';
import { BacktestOptions } from '../models/Backtest';
import { DEFAULT_BACKTEST_OPTIONS } from '../services/BacktestEngine';
import { DEFAULT_RISK_LIMITS, RiskLimits } from '../services/RiskManager';
import { DEFAULT_RUNNER_CONFIG, StrategyRunnerConfig, SymbolPair } from '../services/StrategyRunner';
import { isStrategyKind, StrategyKind } from '../strategies';
import { isLogLevel, LogLevel } from '../utils/Logger';

export type Environment = 'development' | 'staging' | 'production';

export interface EngineSettings {
  initialCapital: number;
  commissionPct: number;
  slippagePct: number;
  enableRiskManagement: boolean;
}

export type BacktestSettings = Omit<BacktestOptions, 'startDate' | 'endDate'>;

export interface RunnerSettings extends StrategyRunnerConfig {
  strategy: StrategyKind;
}

export interface AuditSettings {
  enabled: boolean;
}

export interface ApplicationConfig {
  environment: Environment;
  version: string;
  logLevel: LogLevel;
  engine: EngineSettings;
  risk: RiskLimits;
  backtest: BacktestSettings;
  runner: RunnerSettings;
  audit: AuditSettings;
}

export type ConfigSection = 'engine' | 'risk' | 'backtest' | 'runner' | 'audit';

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  LOG_LEVEL?: string;
  INITIAL_CAPITAL?: string;
  COMMISSION_PCT?: string;
  SLIPPAGE_PCT?: string;
  RISK_MAX_POSITION_PCT?: string;
  RISK_MAX_DAILY_LOSS_PCT?: string;
  RUNNER_SYMBOLS?: string;
  RUNNER_INTERVAL_MS?: string;
  [key: string]: string | undefined;
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some(environment => environment === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function readStringArray(source: Record<string, unknown>, key: string, fallback: string[]): string[] {
  const value = source[key];
  if (!Array.isArray(value)) {
    return [...fallback];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function readPairs(source: Record<string, unknown>, fallback: SymbolPair[]): SymbolPair[] {
  const value = source.pairs;
  if (!Array.isArray(value)) {
    return fallback.map(pair => ({ ...pair }));
  }

  const pairs: SymbolPair[] = [];
  for (const item of value) {
    if (isRecord(item) && typeof item.primary === 'string' && typeof item.secondary === 'string') {
      pairs.push({ primary: item.primary, secondary: item.secondary });
    }
  }
  return pairs;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function isFraction(value: number): boolean {
  return value >= 0 && value <= 1;
}

export class ConfigurationManager {
  private config: ApplicationConfig;
  private readonly configFilePath: string;
  private readonly env: EnvironmentVariables;

  constructor(configFilePath: string = './config/app.json', env: EnvironmentVariables = process.env) {
    this.configFilePath = configFilePath;
    this.env = env;
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<void> {
    try {
      const fileConfig = await this.loadConfigurationFromFile();
      const merged = this.applyEnvironment(fileConfig);

      const validation = this.validateConfiguration(merged);
      if (!validation.isValid) {
        throw new Error(`Configuration validation failed: ${this.describe(validation.errors)}`);
      }

      this.config = merged;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }
  }

  /**
   * Gets a deep copy of the current configuration
   */
  getConfiguration(): ApplicationConfig {
    return structuredClone(this.config);
  }

  getConfigSection<T extends ConfigSection>(name: T): ApplicationConfig[T] {
    return structuredClone(this.config[name]);
  }

  /**
   * Updates a configuration section; an update that would leave the configuration invalid is refused
   */
  updateConfigSection<T extends ConfigSection>(name: T, updates: Partial<ApplicationConfig[T]>): void {
    const candidate = this.getConfiguration();
    candidate[name] = { ...candidate[name], ...updates };

    const validation = this.validateConfiguration(candidate);
    if (!validation.isValid) {
      throw new Error(`Configuration update failed validation: ${this.describe(validation.errors)}`);
    }

    this.config = candidate;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: ApplicationConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!isEnvironment(config.environment)) {
      errors.push({
        path: 'environment',
        message: 'Environment must be development, staging, or production',
        value: config.environment
      });
    }

    if (!isLogLevel(config.logLevel)) {
      errors.push({ path: 'logLevel', message: 'Log level must be debug, info, warn, or error', value: config.logLevel });
    }

    errors.push(...this.validateEngineConfig(config.engine));
    errors.push(...this.validateRiskConfig(config.risk));
    errors.push(...this.validateBacktestConfig(config.backtest));
    errors.push(...this.validateRunnerConfig(config.runner));

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Reloads configuration from sources
   */
  async reloadConfiguration(): Promise<void> {
    await this.loadConfiguration();
  }

  getConfigFilePath(): string {
    return this.configFilePath;
  }

  static getDefaultConfiguration(): ApplicationConfig {
    return {
      environment: 'development',
      version: '1.0.0',
      logLevel: 'info',
      engine: {
        initialCapital: 10000,
        commissionPct: 0.001,
        slippagePct: 0.0005,
        enableRiskManagement: true
      },
      risk: { ...DEFAULT_RISK_LIMITS },
      backtest: {
        initialCapital: DEFAULT_BACKTEST_OPTIONS.initialCapital,
        commissionPct: DEFAULT_BACKTEST_OPTIONS.commissionPct,
        slippagePct: DEFAULT_BACKTEST_OPTIONS.slippagePct,
        riskPerTrade: DEFAULT_BACKTEST_OPTIONS.riskPerTrade,
        maxPositionPct: DEFAULT_BACKTEST_OPTIONS.maxPositionPct,
        riskFreeRate: DEFAULT_BACKTEST_OPTIONS.riskFreeRate,
        minBars: DEFAULT_BACKTEST_OPTIONS.minBars,
        periodsPerYear: DEFAULT_BACKTEST_OPTIONS.periodsPerYear
      },
      runner: {
        ...DEFAULT_RUNNER_CONFIG,
        symbols: [...DEFAULT_RUNNER_CONFIG.symbols],
        pairs: [...DEFAULT_RUNNER_CONFIG.pairs],
        strategy: 'simple_ma'
      },
      audit: {
        enabled: true
      }
    };
  }

  /**
   * Reads the JSON file over the defaults; a missing file leaves the defaults in place
   */
  private async loadConfigurationFromFile(): Promise<ApplicationConfig> {
    const defaults = ConfigurationManager.getDefaultConfiguration();

    let raw: string;
    try {
      raw = await fs.readFile(this.configFilePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return defaults;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new Error(`${this.configFilePath} must contain a JSON object`);
    }
    return this.mergeConfiguration(defaults, parsed);
  }

  private mergeConfiguration(base: ApplicationConfig, source: Record<string, unknown>): ApplicationConfig {
    const environment = readString(source, 'environment', base.environment);
    const logLevel = readString(source, 'logLevel', base.logLevel);
    const engine = section(source, 'engine');
    const risk = section(source, 'risk');
    const backtest = section(source, 'backtest');
    const runner = section(source, 'runner');
    const audit = section(source, 'audit');
    const strategy = readString(runner, 'strategy', base.runner.strategy);

    if (!isEnvironment(environment)) {
      throw new Error(`Unknown environment "${environment}"`);
    }
    if (!isLogLevel(logLevel)) {
      throw new Error(`Unknown log level "${logLevel}"`);
    }
    if (!isStrategyKind(strategy)) {
      throw new Error(`Unknown strategy "${strategy}"`);
    }

    return {
      environment,
      version: readString(source, 'version', base.version),
      logLevel,
      engine: {
        initialCapital: readNumber(engine, 'initialCapital', base.engine.initialCapital),
        commissionPct: readNumber(engine, 'commissionPct', base.engine.commissionPct),
        slippagePct: readNumber(engine, 'slippagePct', base.engine.slippagePct),
        enableRiskManagement: readBoolean(engine, 'enableRiskManagement', base.engine.enableRiskManagement)
      },
      risk: {
        maxPositionSizePct: readNumber(risk, 'maxPositionSizePct', base.risk.maxPositionSizePct),
        maxTotalExposurePct: readNumber(risk, 'maxTotalExposurePct', base.risk.maxTotalExposurePct),
        maxDrawdownPct: readNumber(risk, 'maxDrawdownPct', base.risk.maxDrawdownPct),
        maxDailyLossPct: readNumber(risk, 'maxDailyLossPct', base.risk.maxDailyLossPct),
        maxLossPerTradePct: readNumber(risk, 'maxLossPerTradePct', base.risk.maxLossPerTradePct),
        enableDailyLimit: readBoolean(risk, 'enableDailyLimit', base.risk.enableDailyLimit)
      },
      backtest: {
        initialCapital: readNumber(backtest, 'initialCapital', base.backtest.initialCapital),
        commissionPct: readNumber(backtest, 'commissionPct', base.backtest.commissionPct),
        slippagePct: readNumber(backtest, 'slippagePct', base.backtest.slippagePct),
        riskPerTrade: readNumber(backtest, 'riskPerTrade', base.backtest.riskPerTrade),
        maxPositionPct: readNumber(backtest, 'maxPositionPct', base.backtest.maxPositionPct),
        riskFreeRate: readNumber(backtest, 'riskFreeRate', base.backtest.riskFreeRate),
        minBars: readNumber(backtest, 'minBars', base.backtest.minBars),
        periodsPerYear: readNumber(backtest, 'periodsPerYear', base.backtest.periodsPerYear)
      },
      runner: {
        strategy,
        symbols: readStringArray(runner, 'symbols', base.runner.symbols),
        updateIntervalMs: readNumber(runner, 'updateIntervalMs', base.runner.updateIntervalMs),
        dataPeriod: readString(runner, 'dataPeriod', base.runner.dataPeriod),
        dataInterval: readString(runner, 'dataInterval', base.runner.dataInterval),
        minBars: readNumber(runner, 'minBars', base.runner.minBars),
        maxPositionPct: readNumber(runner, 'maxPositionPct', base.runner.maxPositionPct),
        maxCashUsagePct: readNumber(runner, 'maxCashUsagePct', base.runner.maxCashUsagePct),
        pairs: readPairs(runner, base.runner.pairs),
        pairLookback: readNumber(runner, 'pairLookback', base.runner.pairLookback),
        pairZScoreThreshold: readNumber(runner, 'pairZScoreThreshold', base.runner.pairZScoreThreshold),
        useOptimizedParams: readBoolean(runner, 'useOptimizedParams', base.runner.useOptimizedParams),
        optimizedParamsPath: readString(runner, 'optimizedParamsPath', base.runner.optimizedParamsPath),
        fetchRetries: readNumber(runner, 'fetchRetries', base.runner.fetchRetries),
        fetchBackoffMs: readNumber(runner, 'fetchBackoffMs', base.runner.fetchBackoffMs),
        autoProtectiveExits: readBoolean(runner, 'autoProtectiveExits', base.runner.autoProtectiveExits)
      },
      audit: {
        enabled: readBoolean(audit, 'enabled', base.audit.enabled)
      }
    };
  }

  /**
   * Environment variables take precedence over the file
   */
  private applyEnvironment(base: ApplicationConfig): ApplicationConfig {
    const env = this.env;
    const config = structuredClone(base);

    if (env.NODE_ENV && isEnvironment(env.NODE_ENV)) {
      config.environment = env.NODE_ENV;
    }

    if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) {
      config.logLevel = env.LOG_LEVEL;
    }

    if (env.INITIAL_CAPITAL) {
      config.engine.initialCapital = parseFloat(env.INITIAL_CAPITAL);
      config.backtest.initialCapital = config.engine.initialCapital;
    }

    if (env.COMMISSION_PCT) {
      config.engine.commissionPct = parseFloat(env.COMMISSION_PCT);
      config.backtest.commissionPct = config.engine.commissionPct;
    }

    if (env.SLIPPAGE_PCT) {
      config.engine.slippagePct = parseFloat(env.SLIPPAGE_PCT);
      config.backtest.slippagePct = config.engine.slippagePct;
    }

    if (env.RISK_MAX_POSITION_PCT) {
      config.risk.maxPositionSizePct = parseFloat(env.RISK_MAX_POSITION_PCT);
    }

    if (env.RISK_MAX_DAILY_LOSS_PCT) {
      config.risk.maxDailyLossPct = parseFloat(env.RISK_MAX_DAILY_LOSS_PCT);
    }

    if (env.RUNNER_SYMBOLS) {
      config.runner.symbols = env.RUNNER_SYMBOLS.split(',').map(symbol => symbol.trim()).filter(Boolean);
    }

    if (env.RUNNER_INTERVAL_MS) {
      config.runner.updateIntervalMs = parseInt(env.RUNNER_INTERVAL_MS, 10);
    }

    return config;
  }

  private validateEngineConfig(config: EngineSettings): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!(config.initialCapital > 0)) {
      errors.push({ path: 'engine.initialCapital', message: 'Initial capital must be positive', value: config.initialCapital });
    }

    if (!isFraction(config.commissionPct)) {
      errors.push({ path: 'engine.commissionPct', message: 'Commission must be a fraction between 0 and 1', value: config.commissionPct });
    }

    if (!isFraction(config.slippagePct)) {
      errors.push({ path: 'engine.slippagePct', message: 'Slippage must be a fraction between 0 and 1', value: config.slippagePct });
    }

    return errors;
  }

  private validateRiskConfig(config: RiskLimits): ConfigValidationError[] {
    const fractions: Array<keyof Omit<RiskLimits, 'enableDailyLimit'>> = [
      'maxPositionSizePct',
      'maxTotalExposurePct',
      'maxDrawdownPct',
      'maxDailyLossPct',
      'maxLossPerTradePct'
    ];

    return fractions
      .filter(key => !isFraction(config[key]))
      .map(key => ({ path: `risk.${key}`, message: 'Risk limits must be fractions between 0 and 1', value: config[key] }));
  }

  private validateBacktestConfig(config: BacktestSettings): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!(config.initialCapital > 0)) {
      errors.push({ path: 'backtest.initialCapital', message: 'Initial capital must be positive', value: config.initialCapital });
    }

    for (const key of ['commissionPct', 'slippagePct', 'riskPerTrade', 'maxPositionPct'] as const) {
      if (!isFraction(config[key])) {
        errors.push({ path: `backtest.${key}`, message: 'Must be a fraction between 0 and 1', value: config[key] });
      }
    }

    if (!Number.isInteger(config.minBars) || config.minBars < 1) {
      errors.push({ path: 'backtest.minBars', message: 'Minimum bars must be a positive integer', value: config.minBars });
    }

    if (!(config.periodsPerYear > 0)) {
      errors.push({ path: 'backtest.periodsPerYear', message: 'Periods per year must be positive', value: config.periodsPerYear });
    }

    return errors;
  }

  private validateRunnerConfig(config: RunnerSettings): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!isStrategyKind(config.strategy)) {
      errors.push({ path: 'runner.strategy', message: 'Unknown strategy', value: config.strategy });
    }

    if (config.symbols.some(symbol => symbol.trim().length === 0)) {
      errors.push({ path: 'runner.symbols', message: 'Symbols must be non-empty', value: config.symbols });
    }

    if (!(config.updateIntervalMs >= 1000)) {
      errors.push({ path: 'runner.updateIntervalMs', message: 'Update interval must be at least 1000ms', value: config.updateIntervalMs });
    }

    if (!Number.isInteger(config.minBars) || config.minBars < 1) {
      errors.push({ path: 'runner.minBars', message: 'Minimum bars must be a positive integer', value: config.minBars });
    }

    for (const key of ['maxPositionPct', 'maxCashUsagePct'] as const) {
      if (!isFraction(config[key])) {
        errors.push({ path: `runner.${key}`, message: 'Must be a fraction between 0 and 1', value: config[key] });
      }
    }

    if (!Number.isInteger(config.pairLookback) || config.pairLookback < 2) {
      errors.push({ path: 'runner.pairLookback', message: 'Pair lookback must be an integer of at least 2', value: config.pairLookback });
    }

    if (!(config.pairZScoreThreshold > 0)) {
      errors.push({ path: 'runner.pairZScoreThreshold', message: 'Z-score threshold must be positive', value: config.pairZScoreThreshold });
    }

    if (!Number.isInteger(config.fetchRetries) || config.fetchRetries < 0) {
      errors.push({ path: 'runner.fetchRetries', message: 'Fetch retries must be a non-negative integer', value: config.fetchRetries });
    }

    if (!(config.fetchBackoffMs >= 0)) {
      errors.push({ path: 'runner.fetchBackoffMs', message: 'Fetch backoff must be non-negative', value: config.fetchBackoffMs });
    }

    return errors;
  }

  private describe(errors: ConfigValidationError[]): string {
    return errors.map(e => `${e.path}: ${e.message}`).join(', ');
  }
}
