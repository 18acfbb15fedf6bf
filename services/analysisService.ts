import type { AnalysisContext, FiscalDataset } from '../types';
import { runTaxEnrichment } from '../agents/taxEnricher';
import { runAudit } from '../agents/auditorAgent';
import { buildDashboardSummary } from '../agents/accountantAgent';
import type { CfopCatalog } from './cfopCatalog';
import { logger } from './logger';
import { measureExecution, telemetry } from './telemetry';

export interface AnalysisOptions {
  cfopCatalog?: CfopCatalog;
  trackDataQuality?: boolean;
  topN?: number;
  correlationId?: string;
  now?: () => Date;
}

export interface DatasetSource {
  loadDataset(correlationId?: string): Promise<FiscalDataset>;
}

/**
 * Enrichment, audit and aggregation over one dataset. Pure and synchronous;
 * every call builds its own result.
 */
export const analyzeDataset = (dataset: FiscalDataset, options: AnalysisOptions = {}): AnalysisContext => {
  const enriched = runTaxEnrichment(dataset, {
    cfopCatalog: options.cfopCatalog,
    trackDataQuality: options.trackDataQuality,
  });
  if (enriched.status === 'no-data') {
    return enriched;
  }

  const { headers, items, qualityFlags } = enriched;
  return {
    status: 'ok',
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    correlationId: options.correlationId ?? '',
    headers,
    items,
    audit: runAudit(headers, items),
    summary: buildDashboardSummary(headers, items, { topN: options.topN }),
    qualityFlags,
  };
};

export async function runAnalysisPass(dataset: FiscalDataset, options: AnalysisOptions = {}): Promise<AnalysisContext> {
  const correlationId = options.correlationId || telemetry.createCorrelationId('agent');

  const context = await measureExecution('agent', 'AnalysisService.runAnalysisPass', () =>
    analyzeDataset(dataset, { ...options, correlationId }), { correlationId });

  if (context.status === 'no-data') {
    logger.log('AnalysisService', 'WARN', `Análise sem dados: ${context.reason}`, undefined, { correlationId, scope: 'agent' });
    return context;
  }

  if (context.qualityFlags.length > 0) {
    logger.log('AnalysisService', 'WARN', `${context.qualityFlags.length} valor(es) numérico(s) convertidos para 0.`, {
      flags: context.qualityFlags.length,
    }, { correlationId, scope: 'agent' });
  }

  logger.log('AnalysisService', 'INFO', 'Análise fiscal concluída.', {
    documents: context.headers.length,
    items: context.items.length,
    auditStatus: context.audit.status,
  }, { correlationId, scope: 'agent' });

  return context;
}

export async function loadAndAnalyze(source: DatasetSource, options: AnalysisOptions = {}): Promise<AnalysisContext> {
  const correlationId = options.correlationId || telemetry.createCorrelationId('agent');
  const dataset = await source.loadDataset(correlationId);
  return runAnalysisPass(dataset, { ...options, correlationId });
}
