import dayjs from 'dayjs';
import type {
  DashboardKpis,
  DashboardSummary,
  EnrichedHeader,
  EnrichedItem,
  MonthlyRollupRow,
  OutlierReport,
  RankingEntry,
  StateFlowCell,
} from '../types';

export interface SummaryOptions {
  /** Size of the top rankings. Defaults to 5. */
  topN?: number;
}

const ANOMALY_PATTERN = /cancelada|rejeitada/i;
const DISTRIBUTION_LIMIT = 10;
const GENERAL_SALES_LABEL = 'VENDAS GERAIS';

const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

const mean = (values: readonly number[]): number => (values.length === 0 ? 0 : sum(values) / values.length);

const sampleStdDev = (values: readonly number[]): number | null => {
  if (values.length < 2) return null;
  const avg = mean(values);
  const variance = values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
};

const groupSum = <T>(rows: readonly T[], keyOf: (row: T) => string | null | undefined, valueOf: (row: T) => number) => {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null || key === undefined) continue;
    totals.set(key, (totals.get(key) ?? 0) + valueOf(row));
  }
  return totals;
};

const countBy = <T>(rows: readonly T[], keyOf: (row: T) => string | null | undefined) => groupSum(rows, keyOf, () => 1);

/** Largest values first; equal values keep label order. */
const rank = (totals: ReadonlyMap<string, number>, limit?: number): RankingEntry[] => {
  const entries = Array.from(totals.entries())
    .map(([label, value]) => ({ label, value }))
    .sort((a, b) => b.value - a.value || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
  return limit === undefined ? entries : entries.slice(0, limit);
};

const itemCountByAccessKey = (items: readonly EnrichedItem[]) => countBy(items, item => item.accessKey);

export const computeKpis = (headers: readonly EnrichedHeader[], items: readonly EnrichedItem[]): DashboardKpis => {
  const values = headers.map(header => header.declaredTotalValue);
  const totalInvoiced = sum(values);
  const documentCount = headers.length;
  const anomalies = headers.filter(header => ANOMALY_PATTERN.test(header.mostRecentEvent ?? '')).length;

  const valuesOf = (type: EnrichedHeader['operationType']) =>
    headers.filter(header => header.operationType === type).map(header => header.declaredTotalValue);

  return {
    totalInvoiced,
    documentCount,
    averageValue: documentCount > 0 ? totalInvoiced / documentCount : 0,
    averageValueInternal: mean(valuesOf('Interna')),
    averageValueInterstate: mean(valuesOf('Interestadual')),
    averageItemsPerDocument: mean(Array.from(itemCountByAccessKey(items).values())),
    totalTax: sum(headers.map(header => header.totalTaxAmount)),
    anomalyPercentage: documentCount > 0 ? (anomalies / documentCount) * 100 : 0,
  };
};

/**
 * Per ingestion period, newest first. Documents without items weigh 0 in the item average.
 */
export const computeMonthlyRollup = (headers: readonly EnrichedHeader[], items: readonly EnrichedItem[]): MonthlyRollupRow[] => {
  const itemCounts = itemCountByAccessKey(items);
  const periods = new Map<string, EnrichedHeader[]>();
  for (const header of headers) {
    const group = periods.get(header.periodKey) ?? [];
    group.push(header);
    periods.set(header.periodKey, group);
  }

  return Array.from(periods.entries())
    .map(([periodKey, group]) => ({
      periodKey,
      documentCount: group.length,
      totalValue: sum(group.map(header => header.declaredTotalValue)),
      averageItemsPerDocument: mean(group.map(header => itemCounts.get(header.accessKey) ?? 0)),
    }))
    .sort((a, b) => (a.periodKey < b.periodKey ? 1 : a.periodKey > b.periodKey ? -1 : 0));
};

/** Invoiced value per issue month (YYYY-MM), oldest first. Unparsable dates are left out. */
export const computeMonthlyEvolution = (headers: readonly EnrichedHeader[]): RankingEntry[] => {
  const totals = groupSum(
    headers,
    header => {
      if (header.issueDate === null) return null;
      const issued = dayjs(header.issueDate);
      return issued.isValid() ? issued.format('YYYY-MM') : null;
    },
    header => header.declaredTotalValue,
  );
  return Array.from(totals.entries())
    .map(([label, value]) => ({ label, value }))
    .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
};

export const foldOperationNature = (nature: string): string => {
  const upper = nature.toUpperCase();
  return upper.includes('VENDA') ? GENERAL_SALES_LABEL : upper;
};

export const computeStateFlows = (headers: readonly EnrichedHeader[]): StateFlowCell[] => {
  const cells = new Map<string, StateFlowCell>();
  for (const header of headers) {
    const key = `${header.emitterState}|${header.recipientState}`;
    const cell = cells.get(key) ?? { emitterState: header.emitterState, recipientState: header.recipientState, value: 0 };
    cell.value += header.declaredTotalValue;
    cells.set(key, cell);
  }
  return Array.from(cells.values()).sort(
    (a, b) => a.emitterState.localeCompare(b.emitterState) || a.recipientState.localeCompare(b.recipientState),
  );
};

/** Documents above mean + 3 sample standard deviations of the declared value. */
export const findOutliers = (headers: readonly EnrichedHeader[]): OutlierReport => {
  const values = headers.map(header => header.declaredTotalValue);
  const stdDev = sampleStdDev(values);
  if (stdDev === null) {
    return { threshold: null, documents: [] };
  }
  const threshold = mean(values) + 3 * stdDev;
  return {
    threshold,
    documents: headers
      .filter(header => header.declaredTotalValue > threshold)
      .map(header => ({ accessKey: header.accessKey, number: header.number, value: header.declaredTotalValue })),
  };
};

/**
 * Everything the managerial dashboard shows, computed by plain grouping and summation.
 * Empty groups report 0; nothing here divides by zero or throws.
 */
export const buildDashboardSummary = (
  headers: readonly EnrichedHeader[],
  items: readonly EnrichedItem[],
  options: SummaryOptions = {},
): DashboardSummary => {
  const topN = options.topN ?? 5;

  return {
    kpis: computeKpis(headers, items),
    rankings: {
      recipientsByValue: rank(groupSum(headers, h => h.recipientName, h => h.declaredTotalValue), topN),
      recipientsByTax: rank(groupSum(headers, h => h.recipientName, h => h.totalTaxAmount), topN),
      productsByValue: rank(groupSum(items, i => i.description, i => i.totalValue), topN),
      productsByQuantity: rank(groupSum(items, i => i.description, i => i.quantity), topN),
    },
    monthlyRollup: computeMonthlyRollup(headers, items),
    monthlyEvolution: computeMonthlyEvolution(headers),
    operationTypes: rank(countBy(headers, h => h.operationType)),
    operationNatures: rank(
      countBy(headers, h => (h.operationNature ? foldOperationNature(h.operationNature) : null)),
      DISTRIBUTION_LIMIT,
    ),
    cfopDistribution: rank(countBy(items, i => i.cfopDescription), DISTRIBUTION_LIMIT),
    stateFlows: computeStateFlows(headers),
    valueByEmitterState: rank(groupSum(headers, h => h.emitterState, h => h.declaredTotalValue)),
    taxByEmitterState: rank(groupSum(headers, h => h.emitterState, h => h.totalTaxAmount)),
    outliers: findOutliers(headers),
  };
};
