import type { Attributes } from '@opentelemetry/api';
import { logger } from './logger';
import { measureExecution, telemetry, type IntegrationScope } from './telemetry';

interface CircuitState {
  openUntil: number;
  failureCount: number;
  consecutiveRetries: number;
}

export interface ResilienceOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  failureThreshold?: number;
  cooldownMs?: number;
  correlationId?: string;
  attributes?: Attributes;
}

export class CircuitOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

const states: Record<string, CircuitState> = {};

function getState(scope: IntegrationScope, name: string): CircuitState {
  const key = `${scope}:${name}`;
  if (!states[key]) {
    states[key] = { openUntil: 0, failureCount: 0, consecutiveRetries: 0 };
  }
  return states[key];
}

export function resetCircuitBreakers() {
  Object.keys(states).forEach((key) => delete states[key]);
}

async function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export async function executeWithResilience<T>(
  scope: IntegrationScope,
  name: string,
  operation: () => Promise<T>,
  options: ResilienceOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 400,
    failureThreshold = 5,
    cooldownMs = 30000,
    correlationId,
    attributes,
  } = options;

  const state = getState(scope, name);
  const now = Date.now();

  if (state.openUntil > now) {
    const message = `Circuito aberto para ${scope}.${name} até ${new Date(state.openUntil).toISOString()}`;
    logger.log('Resilience', 'WARN', message, { scope, name }, { correlationId, scope: 'backend' });
    throw new CircuitOpenError(message);
  }

  let attempt = 0;
  let lastError: unknown = null;

  while (attempt < maxAttempts) {
    attempt += 1;
    try {
      const result = await measureExecution(
        scope,
        `${name}.attempt.${attempt}`,
        operation,
        {
          correlationId,
          attributes: { ...attributes, attempt },
        }
      );

      state.failureCount = 0;
      state.consecutiveRetries = 0;

      if (attempt > 1) {
        logger.log(
          'Resilience',
          'INFO',
          `Operação ${name} recuperou após ${attempt - 1} retries`,
          { scope, attempt },
          { correlationId, scope: 'backend' }
        );
      }

      return result;
    } catch (error) {
      lastError = error;
      telemetry.recordRetry(scope, name, { attempt });
      state.failureCount += 1;
      state.consecutiveRetries += 1;
      await telemetry.evaluateThresholds(scope, { retries: state.consecutiveRetries });

      logger.log(
        'Resilience',
        'WARN',
        `Erro na tentativa ${attempt} para ${name}: ${messageOf(error)}`,
        { scope, attempt },
        { correlationId, scope: 'backend' }
      );

      if (state.failureCount >= failureThreshold) {
        state.openUntil = Date.now() + cooldownMs;
        logger.log(
          'Resilience',
          'ERROR',
          `Circuito aberto para ${name} por ${cooldownMs}ms após ${state.failureCount} falhas consecutivas.`,
          { scope, failureThreshold, cooldownMs },
          { correlationId, scope: 'backend' }
        );
        break;
      }

      if (attempt < maxAttempts) {
        const delayMs = initialDelayMs * Math.pow(2, attempt - 1);
        await delay(delayMs);
      }
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Operação ${name} falhou após ${maxAttempts} tentativas.`);
}
