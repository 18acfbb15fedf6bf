import type { Attributes } from '@opentelemetry/api';
import { enrichWithCorrelation, telemetry, type TelemetryScope } from './telemetry';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  agent: string;
  level: LogLevel;
  message: string;
  metadata?: Attributes;
  correlationId: string;
  scope: TelemetryScope;
}

interface LogOptions {
  correlationId?: string;
  scope?: TelemetryScope;
}

type LogSubscriber = (logs: LogEntry[]) => void;

class LoggerService {
  private logs: LogEntry[] = [];
  private subscribers: LogSubscriber[] = [];
  private readonly MAX_LOGS = 500;

  log(agent: string, level: LogLevel, message: string, metadata?: Attributes, options?: LogOptions) {
    const baseEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      agent,
      level,
      message,
      metadata,
      correlationId: options?.correlationId || '',
      scope: options?.scope || 'agent',
    };

    const entry = enrichWithCorrelation(baseEntry, options?.correlationId, options?.scope);

    if (this.logs.length >= this.MAX_LOGS) {
      this.logs.shift();
    }
    this.logs.push(entry);

    const line = `[${entry.level}] (${entry.agent}) [${entry.correlationId}]: ${entry.message}`;
    if (entry.level === 'ERROR') {
      console.error(line, entry.metadata || '');
    } else if (entry.level === 'WARN') {
      console.warn(line, entry.metadata || '');
    } else {
      console.log(line, entry.metadata || '');
    }

    telemetry.emitLog(entry);

    this.notifySubscribers();
  }

  getLogs = (limit?: number): LogEntry[] => {
    return limit === undefined ? this.logs : this.logs.slice(-limit);
  };

  subscribe = (callback: LogSubscriber) => {
    this.subscribers.push(callback);
    callback(this.logs);
  };

  unsubscribe = (callback: LogSubscriber) => {
    this.subscribers = this.subscribers.filter((cb) => cb !== callback);
  };

  clear = () => {
    this.logs = [];
    this.log('Logger', 'INFO', 'Log cache cleared.', undefined, { scope: 'backend' });
  };

  private notifySubscribers() {
    this.subscribers.forEach((cb) => cb([...this.logs]));
  }
}

export const logger = new LoggerService();
