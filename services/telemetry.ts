import {
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
  metrics,
  trace,
  SpanStatusCode,
  type Attributes,
  type Counter,
  type Histogram,
  type UpDownCounter,
} from '@opentelemetry/api';
import { logs } from '@opentelemetry/api-logs';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { LoggerProvider, BatchLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { v4 as uuid } from 'uuid';
import { telemetryConfig } from '../telemetry/config';
import { sendAlert } from './telemetryAlerts';
import type { LogEntry } from './logger';

diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN);

export type IntegrationScope = 'llm' | 'database';
export type TelemetryScope = IntegrationScope | 'agent' | 'backend';

export interface TelemetrySpanOptions {
  attributes?: Attributes;
  scope?: TelemetryScope;
  correlationId?: string;
}

export interface ThresholdStats {
  latencyMs?: number;
  errorRate?: number;
  throughput?: number;
  retries?: number;
}

const isIntegrationScope = (scope: TelemetryScope): scope is IntegrationScope =>
  scope === 'llm' || scope === 'database';

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** `OTLP_HEADERS` is a comma-separated `key=value` list; values may contain `=`. */
export const parseOtlpHeaders = (raw?: string): Record<string, string> | undefined => {
  const entries = (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry): [string, string] => {
      const [key, ...rest] = entry.split('=');
      return [key, rest.join('=')];
    });
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
};

/** Breach descriptions for one measurement against the scope's configured thresholds. */
export const findThresholdBreaches = (scope: IntegrationScope, stats: ThresholdStats): string[] => {
  const limits = telemetryConfig.thresholds[scope];
  const breaches: string[] = [];
  if (stats.latencyMs && stats.latencyMs > limits.latencyMs) {
    breaches.push(`latência ${stats.latencyMs.toFixed(0)}ms > ${limits.latencyMs}ms`);
  }
  if (stats.errorRate && stats.errorRate > limits.errorRate) {
    breaches.push(`taxa de erro ${(stats.errorRate * 100).toFixed(1)}% > ${(limits.errorRate * 100).toFixed(1)}%`);
  }
  if (stats.throughput !== undefined && stats.throughput < limits.throughputMin) {
    breaches.push(`throughput ${stats.throughput} < ${limits.throughputMin}`);
  }
  if (stats.retries && stats.retries >= limits.consecutiveRetries) {
    breaches.push(`retries consecutivos ${stats.retries} >= ${limits.consecutiveRetries}`);
  }
  return breaches;
};

class TelemetryService {
  private tracerProvider?: NodeTracerProvider;
  private meterProvider?: MeterProvider;
  private loggerProvider?: LoggerProvider;
  private initialized = false;
  private latency = new Map<string, Histogram>();
  private counters = new Map<string, Counter>();
  private throughput = new Map<string, UpDownCounter>();

  /**
   * Registers the OTLP exporters. With telemetry disabled the global no-op providers stay in place,
   * so spans, metrics and log records are dropped without network traffic.
   */
  init() {
    if (this.initialized) return;
    this.initialized = true;
    if (!telemetryConfig.enabled) return;

    const resource = new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: telemetryConfig.serviceName,
      [SemanticResourceAttributes.SERVICE_VERSION]: telemetryConfig.serviceVersion,
      'deployment.environment': telemetryConfig.environment,
    });
    const headers = parseOtlpHeaders(telemetryConfig.otlpHeaders);
    const endpoint = (signal: string) => ({ url: `${telemetryConfig.otlpEndpoint}/v1/${signal}`, headers });

    this.tracerProvider = new NodeTracerProvider({
      resource,
      spanProcessors: [new BatchSpanProcessor(new OTLPTraceExporter(endpoint('traces')))],
    });
    this.tracerProvider.register();

    this.meterProvider = new MeterProvider({
      resource,
      readers: [
        new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter(endpoint('metrics')),
          exportIntervalMillis: 10000,
        }),
      ],
    });
    metrics.setGlobalMeterProvider(this.meterProvider);

    this.loggerProvider = new LoggerProvider({ resource });
    this.loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(new OTLPLogExporter(endpoint('logs'))));
    logs.setGlobalLoggerProvider(this.loggerProvider);
  }

  async shutdown(): Promise<void> {
    await Promise.all([
      this.tracerProvider?.shutdown(),
      this.meterProvider?.shutdown(),
      this.loggerProvider?.shutdown(),
    ]);
  }

  createCorrelationId(scope: TelemetryScope, parent?: string) {
    return parent ? `${parent}:${scope}:${uuid()}` : `${scope}:${uuid()}`;
  }

  runWithSpan<T>(name: string, fn: () => Promise<T> | T, options: TelemetrySpanOptions = {}): Promise<T> {
    this.init();
    const correlationId = options.correlationId || this.createCorrelationId(options.scope || 'backend');

    return trace.getTracer(telemetryConfig.serviceName).startActiveSpan(
      name,
      {
        attributes: {
          'app.scope': options.scope,
          'correlation.id': correlationId,
          ...options.attributes,
        },
      },
      async (span) => {
        try {
          const result = await fn();
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          span.recordException(error instanceof Error ? error : String(error));
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  recordLatency(scope: TelemetryScope, name: string, durationMs: number, attributes?: Attributes) {
    this.init();
    const key = `${scope}.${name}`;
    let histogram = this.latency.get(key);
    if (!histogram) {
      histogram = metrics.getMeter(scope).createHistogram('latency_ms', { description: 'Tempo de resposta em milissegundos' });
      this.latency.set(key, histogram);
    }
    histogram.record(durationMs, { scope, target: name, ...attributes });
  }

  recordThroughput(scope: TelemetryScope, name: string, delta: number, attributes?: Attributes) {
    this.init();
    const key = `${scope}.${name}`;
    let counter = this.throughput.get(key);
    if (!counter) {
      counter = metrics.getMeter(scope).createUpDownCounter('throughput', { description: 'Itens processados por etapa' });
      this.throughput.set(key, counter);
    }
    counter.add(delta, { scope, target: name, ...attributes });
  }

  recordError(scope: TelemetryScope, name: string, attributes?: Attributes) {
    this.count('error_rate', 'Número de erros registrados', scope, name, attributes);
  }

  recordRetry(scope: TelemetryScope, name: string, attributes?: Attributes) {
    this.count('retries', 'Número de tentativas de retry realizadas', scope, name, attributes);
  }

  emitLog(entry: LogEntry) {
    this.init();
    logs.getLogger(entry.agent || telemetryConfig.serviceName).emit({
      severityText: entry.level,
      body: entry.message,
      attributes: {
        ...entry.metadata,
        timestamp: entry.timestamp,
        correlationId: entry.correlationId,
        scope: entry.scope,
      },
    });
  }

  async evaluateThresholds(scope: IntegrationScope, stats: ThresholdStats) {
    const breaches = findThresholdBreaches(scope, stats);
    if (breaches.length > 0) {
      await sendAlert(scope, breaches);
    }
  }

  private count(metric: string, description: string, scope: TelemetryScope, name: string, attributes?: Attributes) {
    this.init();
    const key = `${metric}:${scope}.${name}`;
    let counter = this.counters.get(key);
    if (!counter) {
      counter = metrics.getMeter(scope).createCounter(metric, { description });
      this.counters.set(key, counter);
    }
    counter.add(1, { scope, target: name, ...attributes });
  }
}

export const telemetry = new TelemetryService();

export async function measureExecution<T>(scope: TelemetryScope, name: string, fn: () => Promise<T> | T, options: TelemetrySpanOptions = {}) {
  const start = performance.now();
  try {
    const result = await telemetry.runWithSpan(name, fn, { ...options, scope });
    const elapsed = performance.now() - start;
    telemetry.recordLatency(scope, name, elapsed, options.attributes);
    telemetry.recordThroughput(scope, name, 1, options.attributes);
    if (isIntegrationScope(scope)) {
      await telemetry.evaluateThresholds(scope, { latencyMs: elapsed, throughput: 1 });
    }
    return result;
  } catch (error) {
    const elapsed = performance.now() - start;
    telemetry.recordError(scope, name, { error: errorMessage(error) });
    if (isIntegrationScope(scope)) {
      await telemetry.evaluateThresholds(scope, { latencyMs: elapsed, errorRate: 1 });
    }
    throw error;
  }
}

export function enrichWithCorrelation(entry: LogEntry, correlationId?: string, scope: TelemetryScope = 'agent'): LogEntry {
  return {
    ...entry,
    correlationId: correlationId || telemetry.createCorrelationId(scope),
    scope,
  };
}
