/**
 * Per-service circuit breakers for profile enrichment.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
  type CircuitBreakerPolicy
} from "cockatiel";
import { Logger } from "./logger.js";
import { CIRCUIT_COOLDOWN_MS, CIRCUIT_FAILURE_THRESHOLD } from "./constants.js";

const logger = new Logger("resilience");

export interface CircuitBreakerOptions {
  /** Failures in a row before the circuit opens */
  failureThreshold?: number;
  /** Wait before a half-open trial call (ms) */
  cooldownMs?: number;
}

/**
 * Breaker that opens after `failureThreshold` straight failures of `service`.
 * Every state change is logged, at warn level when the circuit opens.
 */
export function createCircuitBreaker(
  service: string,
  { failureThreshold = CIRCUIT_FAILURE_THRESHOLD, cooldownMs = CIRCUIT_COOLDOWN_MS }: CircuitBreakerOptions = {}
): CircuitBreakerPolicy {
  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: cooldownMs,
    breaker: new ConsecutiveBreaker(failureThreshold)
  });

  breaker.onStateChange((state) => {
    const data = { service, state: CircuitState[state] };
    if (state === CircuitState.Open) {
      logger.warn(`Circuit opened for ${service}`, { ...data, cooldownMs });
    } else {
      logger.info(`Circuit for ${service} is now ${CircuitState[state]}`, data);
    }
  });

  return breaker;
}

/**
 * Whether a call was refused by an open circuit rather than failing itself.
 */
export function isCircuitOpenError(error: unknown): boolean {
  return error instanceof BrokenCircuitError;
}
