import { telemetryConfig } from '../telemetry/config';
import { logger } from './logger';
import type { IntegrationScope } from './telemetry';

export interface AlertPayload {
  text: string;
  scope: IntegrationScope;
  breaches: string[];
  timestamp: string;
}

const configuredWebhooks = () =>
  [telemetryConfig.alertWebhooks.slack, telemetryConfig.alertWebhooks.discord].filter(
    (url): url is string => Boolean(url),
  );

async function deliver(url: string, payload: AlertPayload) {
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      logger.log('Alerting', 'WARN', `Webhook de alerta respondeu ${response.status}.`, { url }, { scope: 'backend' });
    }
  } catch (error) {
    logger.log('Alerting', 'ERROR', 'Falha ao enviar alerta para webhook.', {
      error: error instanceof Error ? error.message : String(error),
      url,
    }, { scope: 'backend' });
  }
}

/** Logs the breach and posts it to every configured webhook. Delivery failures are logged, never thrown. */
export async function sendAlert(scope: IntegrationScope, breaches: string[]) {
  const payload: AlertPayload = {
    text: `Alerta de telemetria (${scope.toUpperCase()}): ${breaches.join('; ')}`,
    scope,
    breaches,
    timestamp: new Date().toISOString(),
  };

  await Promise.all(configuredWebhooks().map((url) => deliver(url, payload)));

  logger.log('Alerting', 'WARN', 'Threshold de telemetria excedido.', { scope, breaches }, { scope: 'backend' });
}
