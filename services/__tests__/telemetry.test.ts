import { findThresholdBreaches, parseOtlpHeaders, telemetry } from '../telemetry';
import { sendAlert } from '../telemetryAlerts';
import { logger } from '../logger';

describe('parseOtlpHeaders', () => {
  it('splits key=value pairs and keeps "=" inside values', () => {
    expect(parseOtlpHeaders('api-key=test-secret, x-tenant=a=b')).toEqual({ 'api-key': 'test-secret', 'x-tenant': 'a=b' });
  });

  it('returns undefined when nothing is configured', () => {
    expect(parseOtlpHeaders('')).toBeUndefined();
    expect(parseOtlpHeaders(undefined)).toBeUndefined();
  });
});

describe('findThresholdBreaches', () => {
  it('describes every limit a measurement crosses', () => {
    expect(findThresholdBreaches('llm', { latencyMs: 9000.4, errorRate: 0.5, throughput: 0, retries: 3 })).toEqual([
      'latência 9000ms > 8000ms',
      'taxa de erro 50.0% > 10.0%',
      'throughput 0 < 1',
      'retries consecutivos 3 >= 3',
    ]);
  });

  it('reports nothing inside the limits', () => {
    expect(findThresholdBreaches('database', { latencyMs: 10, throughput: 1, retries: 1 })).toEqual([]);
  });
});

describe('alerting', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.clear();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs the breaches without posting when no webhook is configured', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch');

    await sendAlert('database', ['retries consecutivos 2 >= 2']);

    expect(fetchSpy).not.toHaveBeenCalled();
    expect(logger.getLogs()).toContainEqual(expect.objectContaining({
      agent: 'Alerting',
      level: 'WARN',
      message: 'Threshold de telemetria excedido.',
      metadata: { scope: 'database', breaches: ['retries consecutivos 2 >= 2'] },
    }));
  });

  it('raises an alert from evaluateThresholds only on a breach', async () => {
    await telemetry.evaluateThresholds('database', { retries: 1 });
    await telemetry.evaluateThresholds('database', { retries: 2 });

    const alerts = logger.getLogs().filter((entry) => entry.agent === 'Alerting');
    expect(alerts).toHaveLength(1);
    expect(alerts[0].metadata).toEqual({ scope: 'database', breaches: ['retries consecutivos 2 >= 2'] });
  });
});
