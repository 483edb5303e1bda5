/**
 * Error model and recovery handling
 * Application errors carry category, severity and operation context; the handler retries
 * retryable failures with backoff and trips a circuit breaker per operation and symbol
 */

import { CircuitBreaker, CircuitBreakerOptions, CircuitBreakerState } from './CircuitBreaker';
import { LoggerService, silentLogger } from './Logger';

export type { CircuitBreakerState } from './CircuitBreaker';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  VALIDATION = 'validation',
  BUSINESS_LOGIC = 'business_logic',
  SYSTEM = 'system',
  EXTERNAL_SERVICE = 'external_service'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  FALLBACK = 'fallback',
  FAIL_FAST = 'fail_fast'
}

export interface ErrorContext {
  operation: string;
  component: string;
  symbol?: string;
  orderId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface RecoveryPolicy {
  strategy: RecoveryStrategy;
  maxAttempts?: number;
  backoffMs?: number;
}

export interface RecoveryAction<T> extends RecoveryPolicy {
  fallbackFunction?: () => Promise<T>;
}

interface HandlingOutcome {
  recoveryAttempts: number;
  strategyUsed: RecoveryStrategy;
  userMessage: string;
  technicalMessage: string;
}

export type ErrorHandlingResult<T> =
  | (HandlingOutcome & { success: true; result: T })
  | (HandlingOutcome & { success: false; error: ApplicationError });

export interface ErrorMetric {
  count: number;
  lastOccurrence: Date;
}

export interface ErrorHandlerOptions {
  logger?: LoggerService;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_BACKOFF_MS = 30000;

const CATEGORY_GUIDANCE: Record<ErrorCategory, { userMessage: string; suggestedActions: string[] }> = {
  [ErrorCategory.NETWORK]: {
    userMessage: 'Network connection issue. Please try again.',
    suggestedActions: ['Check connectivity to the market data provider', 'Retry the operation']
  },
  [ErrorCategory.VALIDATION]: {
    userMessage: 'Invalid request. Please check the order parameters and try again.',
    suggestedActions: ['Review the order fields', 'Ensure prices are supplied for limit and stop orders']
  },
  [ErrorCategory.BUSINESS_LOGIC]: {
    userMessage: 'The operation was rejected by account or risk rules.',
    suggestedActions: ['Review cash balance and open positions', 'Check the configured risk limits']
  },
  [ErrorCategory.EXTERNAL_SERVICE]: {
    userMessage: 'Market data is temporarily unavailable. Please try again later.',
    suggestedActions: ['Wait for the next update cycle', 'Verify the symbol is quoted by the provider']
  },
  [ErrorCategory.SYSTEM]: {
    userMessage: 'An internal error occurred while processing the request.',
    suggestedActions: ['Retry the operation', 'Inspect the service logs']
  }
};

interface MessageRule {
  keywords: string[];
  category: ErrorCategory;
  code: string;
  severity: ErrorSeverity;
  isRetryable: boolean;
}

// First match wins
const MESSAGE_RULES: MessageRule[] = [
  {
    keywords: ['network', 'timeout', 'connection'],
    category: ErrorCategory.NETWORK,
    code: 'NETWORK_ERROR',
    severity: ErrorSeverity.MEDIUM,
    isRetryable: true
  },
  {
    keywords: ['invalid', 'validation', 'format'],
    category: ErrorCategory.VALIDATION,
    code: 'VALIDATION_ERROR',
    severity: ErrorSeverity.LOW,
    isRetryable: false
  },
  {
    keywords: ['insufficient', 'limit', 'position'],
    category: ErrorCategory.BUSINESS_LOGIC,
    code: 'BUSINESS_LOGIC_ERROR',
    severity: ErrorSeverity.MEDIUM,
    isRetryable: false
  },
  {
    keywords: ['unavailable', 'api', 'service'],
    category: ErrorCategory.EXTERNAL_SERVICE,
    code: 'EXTERNAL_SERVICE_ERROR',
    severity: ErrorSeverity.MEDIUM,
    isRetryable: true
  }
];

/**
 * Application error with recovery context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;
  public readonly suggestedActions: string[];

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
      suggestedActions?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? ApplicationError.defaultRetryability(category, severity);
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? CATEGORY_GUIDANCE[category].userMessage;
    this.suggestedActions = options.suggestedActions ?? [...CATEGORY_GUIDANCE[category].suggestedActions];
  }

  private static defaultRetryability(category: ErrorCategory, severity: ErrorSeverity): boolean {
    switch (category) {
      case ErrorCategory.NETWORK:
      case ErrorCategory.EXTERNAL_SERVICE:
        return true;
      case ErrorCategory.SYSTEM:
        return severity !== ErrorSeverity.CRITICAL;
      default:
        return false;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage,
      technicalMessage: this.technicalMessage,
      suggestedActions: this.suggestedActions
    };
  }
}

/**
 * Runs collaborator calls with retry, fallback and circuit breaking.
 *
 * Breakers are keyed by operation and, when the context names one, by symbol, so a
 * symbol the provider never quotes does not block fetches for the others.
 */
export class ErrorHandler {
  private readonly recoveryStrategies: Map<string, RecoveryPolicy> = new Map();
  private readonly errorMetrics: Map<string, ErrorMetric> = new Map();
  private readonly circuitBreaker: CircuitBreaker;
  private readonly logger: LoggerService;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ErrorHandlerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.circuitBreaker = new CircuitBreaker(options.circuitBreaker);
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.initializeDefaultStrategies();
  }

  /**
   * Executes an operation, applying the recovery strategy registered for context.operation
   * unless one is passed explicitly
   */
  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    recoveryAction?: RecoveryAction<T>
  ): Promise<ErrorHandlingResult<T>> {
    const strategy: RecoveryAction<T> = recoveryAction ?? this.getRecoveryStrategy(context.operation);
    const maxAttempts = strategy.maxAttempts ?? 3;
    const breakerKey = context.symbol ? `${context.operation}:${context.symbol}` : context.operation;

    if (this.circuitBreaker.isOpen(breakerKey)) {
      return {
        success: false,
        error: new ApplicationError(
          `Circuit breaker is open for ${breakerKey}`,
          'CIRCUIT_BREAKER_OPEN',
          ErrorCategory.SYSTEM,
          ErrorSeverity.HIGH,
          context,
          {
            isRetryable: false,
            userMessage: 'This operation is temporarily unavailable due to repeated failures.'
          }
        ),
        recoveryAttempts: 0,
        strategyUsed: RecoveryStrategy.FAIL_FAST,
        userMessage: 'Operation temporarily unavailable. Please try again later.',
        technicalMessage: 'Circuit breaker is open'
      };
    }

    let lastError: ApplicationError | undefined;
    let recoveryAttempts = 0;

    while (recoveryAttempts <= maxAttempts) {
      try {
        const result = await operation();
        this.circuitBreaker.recordSuccess(breakerKey);

        return {
          success: true,
          result,
          recoveryAttempts,
          strategyUsed: strategy.strategy,
          userMessage: 'Operation completed successfully',
          technicalMessage: 'Operation completed successfully'
        };
      } catch (error) {
        recoveryAttempts++;
        lastError = this.wrapError(error, context);
        this.recordErrorMetrics(lastError);

        if (this.circuitBreaker.recordFailure(breakerKey)) {
          this.logger.warn('Circuit breaker opened', { key: breakerKey, error: lastError.message });
        }

        if (!lastError.isRetryable || recoveryAttempts > maxAttempts || strategy.strategy !== RecoveryStrategy.RETRY) {
          break;
        }

        const delay = this.calculateBackoffDelay(recoveryAttempts, strategy.backoffMs ?? 1000);
        this.logger.debug('Retrying operation', { key: breakerKey, attempt: recoveryAttempts, delayMs: Math.round(delay) });
        await this.sleep(delay);
      }
    }

    const failure =
      lastError ??
      new ApplicationError(`Operation ${context.operation} did not run`, 'NOT_EXECUTED', ErrorCategory.SYSTEM, ErrorSeverity.LOW, context, {
        isRetryable: false
      });

    if (strategy.fallbackFunction) {
      try {
        const fallbackResult = await strategy.fallbackFunction();
        return {
          success: true,
          result: fallbackResult,
          recoveryAttempts,
          strategyUsed: RecoveryStrategy.FALLBACK,
          userMessage: 'Operation completed using alternative method',
          technicalMessage: `Fallback succeeded after: ${failure.message}`
        };
      } catch (fallbackError) {
        const wrapped = this.wrapError(fallbackError, context);
        this.recordErrorMetrics(wrapped);
        this.logger.warn('Fallback failed', { key: breakerKey, error: wrapped.message });
      }
    }

    return {
      success: false,
      error: failure,
      recoveryAttempts,
      strategyUsed: strategy.strategy,
      userMessage: failure.userMessage,
      technicalMessage: failure.technicalMessage
    };
  }

  /**
   * Wraps raw throwables into ApplicationError, classifying by message keywords
   */
  wrapError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const lower = message.toLowerCase();
    const rule = error instanceof Error ? MESSAGE_RULES.find(candidate => candidate.keywords.some(k => lower.includes(k))) : undefined;

    return new ApplicationError(
      message,
      rule?.code ?? 'UNKNOWN_ERROR',
      rule?.category ?? ErrorCategory.SYSTEM,
      rule?.severity ?? ErrorSeverity.MEDIUM,
      context,
      {
        originalError: error instanceof Error ? error : undefined,
        isRetryable: rule?.isRetryable ?? false
      }
    );
  }

  /**
   * Exponential backoff with up to 10% jitter
   */
  private calculateBackoffDelay(attempt: number, baseDelay: number): number {
    const jitter = Math.random() * 0.1;
    const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), MAX_BACKOFF_MS);
    return delay * (1 + jitter);
  }

  private getRecoveryStrategy(operation: string): RecoveryPolicy {
    return this.recoveryStrategies.get(operation) ?? {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: 3,
      backoffMs: 1000
    };
  }

  private recordErrorMetrics(error: ApplicationError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key);

    this.errorMetrics.set(key, {
      count: (existing?.count ?? 0) + 1,
      lastOccurrence: new Date()
    });
  }

  /**
   * Registers a recovery strategy for an operation name
   */
  registerRecoveryStrategy(operation: string, action: RecoveryPolicy): void {
    this.recoveryStrategies.set(operation, action);
  }

  getErrorMetrics(): Map<string, ErrorMetric> {
    return new Map(this.errorMetrics);
  }

  getCircuitBreakerStatus(): Map<string, CircuitBreakerState> {
    return this.circuitBreaker.snapshot();
  }

  private initializeDefaultStrategies(): void {
    // Market data pulls: one retry, short backoff
    this.recoveryStrategies.set('fetchMarketData', {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: 1,
      backoffMs: 500
    });

    this.recoveryStrategies.set('fetchCurrentPrice', {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: 1,
      backoffMs: 250
    });

    // Order placement is local and deterministic
    this.recoveryStrategies.set('placeOrder', {
      strategy: RecoveryStrategy.FAIL_FAST,
      maxAttempts: 0
    });
  }
}
