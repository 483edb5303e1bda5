/**
 * Failure counters per key; a key opens after a run of consecutive failures and
 * closes again once the reset window has elapsed since its last failure
 */

export interface CircuitBreakerState {
  isOpen: boolean;
  failures: number;
  lastFailure: Date;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
  now: () => Date;
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 5 * 60 * 1000,
  now: () => new Date()
};

export class CircuitBreaker {
  private readonly options: CircuitBreakerOptions;
  private readonly states: Map<string, CircuitBreakerState> = new Map();

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options };
  }

  isOpen(key: string): boolean {
    const state = this.states.get(key);
    if (!state) return false;

    const elapsed = this.options.now().getTime() - state.lastFailure.getTime();
    if (state.isOpen && elapsed > this.options.resetTimeoutMs) {
      state.isOpen = false;
      state.failures = 0;
    }

    return state.isOpen;
  }

  /**
   * Returns true when this failure opened the breaker
   */
  recordFailure(key: string): boolean {
    const state = this.states.get(key) ?? { isOpen: false, failures: 0, lastFailure: this.options.now() };
    const wasOpen = state.isOpen;

    state.failures++;
    state.lastFailure = this.options.now();
    if (state.failures >= this.options.failureThreshold) {
      state.isOpen = true;
    }

    this.states.set(key, state);
    return state.isOpen && !wasOpen;
  }

  recordSuccess(key: string): void {
    const state = this.states.get(key);
    if (state) {
      state.isOpen = false;
      state.failures = 0;
    }
  }

  snapshot(): Map<string, CircuitBreakerState> {
    return new Map(Array.from(this.states.entries()).map(([key, state]) => [key, { ...state }]));
  }
}
