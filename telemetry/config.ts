import { env, envFlag } from '../utils/env';

type ThresholdConfig = {
  latencyMs: number;
  errorRate: number;
  throughputMin: number;
  consecutiveRetries: number;
};

export interface TelemetryConfig {
  enabled: boolean;
  serviceName: string;
  serviceVersion: string;
  environment: string;
  otlpEndpoint: string;
  otlpHeaders?: string;
  alertWebhooks: {
    slack?: string;
    discord?: string;
  };
  thresholds: {
    llm: ThresholdConfig;
    database: ThresholdConfig;
  };
}

export const telemetryConfig: TelemetryConfig = {
  enabled: envFlag('TELEMETRY_ENABLED', env('NODE_ENV') !== 'test'),
  serviceName: env('TELEMETRY_SERVICE', 'fiscal-insights-backend'),
  serviceVersion: env('APP_VERSION', '1.0.0'),
  environment: env('APP_ENV', 'development'),
  otlpEndpoint: env('OTLP_ENDPOINT', 'http://localhost:4318'),
  otlpHeaders: env('OTLP_HEADERS', ''),
  alertWebhooks: {
    slack: env('SLACK_WEBHOOK') || undefined,
    discord: env('DISCORD_WEBHOOK') || undefined,
  },
  thresholds: {
    llm: {
      latencyMs: Number(env('LLM_LATENCY_THRESHOLD', '8000')),
      errorRate: Number(env('LLM_ERROR_THRESHOLD', '0.1')),
      throughputMin: Number(env('LLM_THROUGHPUT_MIN', '1')),
      consecutiveRetries: Number(env('LLM_RETRY_THRESHOLD', '3')),
    },
    database: {
      latencyMs: Number(env('DB_LATENCY_THRESHOLD', '3000')),
      errorRate: Number(env('DB_ERROR_THRESHOLD', '0.05')),
      throughputMin: Number(env('DB_THROUGHPUT_MIN', '1')),
      consecutiveRetries: Number(env('DB_RETRY_THRESHOLD', '2')),
    },
  },
};
