import { CircuitBreakerOpenError, RecoveryError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export enum CircuitState {
  CLOSED = "CLOSED", // Normal operation
  OPEN = "OPEN", // Failing, reject all calls
  HALF_OPEN = "HALF_OPEN", // One trial call allowed
}

export interface CircuitBreakerOptions {
  failureThreshold?: number; // Consecutive failures before opening
  resetTimeout?: number; // Time in ms before a trial call is allowed
  now?: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState, name: string) => void;
  logger?: Logger;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  failureThreshold: number;
  resetTimeout: number;
  lastFailure: string | null;
  lastSuccess: string | null;
  /** Calls offered to the breaker, admitted or not. */
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  /** Calls rejected without reaching the dependency. */
  shortCircuitedCalls: number;
  /** Milliseconds since the last state change. */
  timeInCurrentState: number;
}

const DEFAULT_CIRCUIT_OPTIONS = {
  failureThreshold: 5,
  resetTimeout: 60_000,
};

function iso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

/**
 * Three-state breaker. Every admitted call carries the epoch it was admitted
 * under; a transition bumps the epoch, so an outcome arriving after a
 * transition it did not cause is dropped.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private epoch = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private lastFailure: number | null = null;
  private lastSuccess: number | null = null;
  private stateChangedAt: number;
  private totalCalls = 0;
  private successfulCalls = 0;
  private failedCalls = 0;
  private shortCircuitedCalls = 0;
  private readonly failureThreshold: number;
  private readonly resetTimeout: number;
  private readonly now: () => number;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState, name: string) => void;
  private readonly log: Logger;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_CIRCUIT_OPTIONS.failureThreshold);
    this.resetTimeout = Math.max(0, options.resetTimeout ?? DEFAULT_CIRCUIT_OPTIONS.resetTimeout);
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
    this.log = options.logger ?? createLogger("circuit-breaker");
    this.stateChangedAt = this.now();
  }

  /**
   * Execute a function through the circuit breaker
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const ticket = this.admit();
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.onFailure(ticket);
      throw error;
    }
    this.onSuccess(ticket);
    return result;
  }

  private admit(): number {
    this.totalCalls++;
    if (this.state === CircuitState.OPEN) {
      if (this.now() - this.openedAt < this.resetTimeout) {
        this.shortCircuitedCalls++;
        throw new CircuitBreakerOpenError(this.name);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }
    if (this.state === CircuitState.HALF_OPEN) {
      if (this.trialInFlight) {
        this.shortCircuitedCalls++;
        throw new CircuitBreakerOpenError(this.name);
      }
      this.trialInFlight = true;
    }
    return this.epoch;
  }

  private onSuccess(ticket: number): void {
    this.successfulCalls++;
    this.lastSuccess = this.now();
    if (ticket !== this.epoch) return;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.CLOSED);
    } else {
      this.failureCount = 0;
    }
  }

  private onFailure(ticket: number): void {
    this.failedCalls++;
    this.lastFailure = this.now();
    if (ticket !== this.epoch) return;

    this.failureCount++;
    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(newState: CircuitState, listenerErrors: "log" | "throw" = "log"): void {
    const oldState = this.state;
    this.state = newState;
    this.epoch++;
    this.trialInFlight = false;

    if (newState === CircuitState.OPEN) {
      this.openedAt = this.now();
    } else if (newState === CircuitState.CLOSED) {
      this.failureCount = 0;
    }

    if (oldState === newState) return;
    this.stateChangedAt = this.now();
    this.log.info(`Circuit '${this.name}' state changed`, { from: oldState, to: newState });

    if (!this.onStateChange) return;
    try {
      this.onStateChange(oldState, newState, this.name);
    } catch (err) {
      if (listenerErrors === "throw") throw err;
      this.log.warn(`State listener for '${this.name}' threw`, { error: errorMessage(err) });
    }
  }

  /** Get current circuit state */
  getState(): CircuitState {
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    return {
      state: this.state,
      failureCount: this.failureCount,
      failureThreshold: this.failureThreshold,
      resetTimeout: this.resetTimeout,
      lastFailure: iso(this.lastFailure),
      lastSuccess: iso(this.lastSuccess),
      totalCalls: this.totalCalls,
      successfulCalls: this.successfulCalls,
      failedCalls: this.failedCalls,
      shortCircuitedCalls: this.shortCircuitedCalls,
      timeInCurrentState: this.now() - this.stateChangedAt,
    };
  }

  /**
   * Manually close the breaker. Outcomes of calls admitted before the reset
   * are ignored. A throwing state listener propagates.
   */
  reset(): void {
    this.transitionTo(CircuitState.CLOSED, "throw");
  }
}

/**
 * Named breakers shared by the components of one service instance.
 * Pass one in rather than relying on module state, so tests stay isolated.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly defaults: CircuitBreakerOptions = {}) {}

  /** The breaker registered under `name`, created with these options on first use. */
  get(name: string, options: CircuitBreakerOptions = {}): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, { ...this.defaults, ...options });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  status(): Record<string, CircuitBreakerStatus> {
    const out: Record<string, CircuitBreakerStatus> = {};
    for (const [name, breaker] of this.breakers) out[name] = breaker.getStatus();
    return out;
  }

  /** Reset one breaker, or all of them when no name is given. Returns the names reset. */
  reset(name?: string): string[] {
    if (name !== undefined) {
      const breaker = this.breakers.get(name);
      if (!breaker) throw new RecoveryError(`Unknown circuit breaker '${name}'`, { breaker: name });
      this.resetOne(breaker);
      return [name];
    }
    for (const breaker of this.breakers.values()) this.resetOne(breaker);
    return [...this.breakers.keys()];
  }

  private resetOne(breaker: CircuitBreaker): void {
    try {
      breaker.reset();
    } catch (err) {
      throw new RecoveryError(`Failed to reset circuit breaker '${breaker.name}'`, { breaker: breaker.name }, { cause: err });
    }
  }
}
