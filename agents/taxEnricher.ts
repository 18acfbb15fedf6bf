import type {
  DataQualityFlag,
  EnrichedHeader,
  EnrichedItem,
  EnrichmentResult,
  FiscalDataset,
  NoDataResult,
  NumericInput,
  QualityTable,
  TaxBreakdown,
} from '../types';
import { describeRaw, parseNumeric } from '../utils/parsingUtils';
import { buildRateIndex, resolvePisCofinsRate } from '../utils/rateNormalizer';
import { rawCodeCatalog, type CfopCatalog } from '../services/cfopCatalog';
import { runClassification } from './classifierAgent';

export interface TaxRates {
  pisCofins: number;
  icmsByState: ReadonlyMap<string, number>;
  ipiByNcm: ReadonlyMap<number, number>;
}

export interface EnrichmentOptions {
  /** Collect a flag for every numeric field coerced to 0. Defaults to true. */
  trackDataQuality?: boolean;
  cfopCatalog?: CfopCatalog;
}

interface TaxableHeader {
  accessKey: string;
  emitterState: string;
  declaredTotalValue: number;
}

class QualityTracker {
  readonly flags: DataQualityFlag[] = [];

  constructor(private readonly enabled: boolean) {}

  read(table: QualityTable, field: string, raw: NumericInput, accessKey?: string): number {
    const parsed = parseNumeric(raw);
    if (parsed.issue && this.enabled) {
      this.flags.push({ table, accessKey, field, rawValue: describeRaw(raw), reason: parsed.issue });
    }
    return parsed.value;
  }

  /** Like `read`, but absent values yield `null` so callers can skip them. */
  readOptional(table: QualityTable, field: string, raw: NumericInput): number | null {
    const parsed = parseNumeric(raw);
    if (!parsed.issue) return parsed.value;
    if (this.enabled) {
      this.flags.push({ table, field, rawValue: describeRaw(raw), reason: parsed.issue });
    }
    return null;
  }
}

export const noData = (reason: string): NoDataResult => ({ status: 'no-data', reason });

/** Integer form of an NCM code, so "01012100", 1012100 and "1012100.0" share one key. */
export const ncmKey = (raw: NumericInput): number => Math.trunc(parseNumeric(raw).value);

export const resolveTaxRates = (
  dataset: Pick<FiscalDataset, 'pisCofinsRates' | 'icmsRates' | 'ncmTaxRates'>,
  tracker: QualityTracker = new QualityTracker(false),
): TaxRates => {
  const pisValues = (dataset.pisCofinsRates ?? [])
    .map(row => tracker.readOptional('pisCofins', 'value', row.value))
    .filter((value): value is number => value !== null);

  return {
    pisCofins: resolvePisCofinsRate(pisValues),
    icmsByState: buildRateIndex(dataset.icmsRates, row => row.stateCode, row => tracker.read('icms', 'rate', row.rate)),
    ipiByNcm: buildRateIndex(dataset.ncmTaxRates, row => ncmKey(row.ncmCode), row => tracker.read('ncm', 'rate', row.rate)),
  };
};

/**
 * Tax components of one document. IPI comes from the item-level amounts already summed per access key.
 */
export const computeHeaderTaxes = (
  header: TaxableHeader,
  ipiByKey: ReadonlyMap<string, number>,
  rates: TaxRates,
): TaxBreakdown => {
  const pisCofinsAmount = header.declaredTotalValue * rates.pisCofins;
  const icmsAmount = header.declaredTotalValue * (rates.icmsByState.get(header.emitterState) ?? 0);
  const ipiAmount = ipiByKey.get(header.accessKey) ?? 0;
  return {
    pisCofinsAmount,
    icmsAmount,
    ipiAmount,
    totalTaxAmount: pisCofinsAmount + icmsAmount + ipiAmount,
  };
};

export const sumIpiByAccessKey = (items: readonly Pick<EnrichedItem, 'accessKey' | 'ipiAmount'>[]): Map<string, number> => {
  const totals = new Map<string, number>();
  for (const item of items) {
    totals.set(item.accessKey, (totals.get(item.accessKey) ?? 0) + item.ipiAmount);
  }
  return totals;
};

/**
 * Joins headers and items against the rate tables and produces the tax-enriched dataset.
 * Bad numbers never stop the pass; only a missing or empty header/item table does,
 * and then the result is the no-data sentinel instead of a zero-filled table.
 */
export const runTaxEnrichment = (dataset: FiscalDataset, options: EnrichmentOptions = {}): EnrichmentResult => {
  if (!dataset.headers || dataset.headers.length === 0) {
    return noData('Tabela de cabeçalhos de NF-e ausente ou vazia.');
  }
  if (!dataset.items || dataset.items.length === 0) {
    return noData('Tabela de itens de NF-e ausente ou vazia.');
  }

  const tracker = new QualityTracker(options.trackDataQuality ?? true);
  const catalog = options.cfopCatalog ?? rawCodeCatalog;
  const rates = resolveTaxRates(dataset, tracker);

  const items: EnrichedItem[] = dataset.items.map(item => {
    const totalValue = tracker.read('item', 'totalValue', item.totalValue, item.accessKey);
    const ipiRate = rates.ipiByNcm.get(ncmKey(item.ncmCode)) ?? 0;
    return {
      ...item,
      quantity: tracker.read('item', 'quantity', item.quantity, item.accessKey),
      unitValue: tracker.read('item', 'unitValue', item.unitValue, item.accessKey),
      totalValue,
      ipiAmount: totalValue * ipiRate,
      cfopDescription: catalog.describe(item.cfopCode),
    };
  });

  const ipiByKey = sumIpiByAccessKey(items);

  const taxed = dataset.headers.map(header => {
    const declaredTotalValue = tracker.read('header', 'declaredTotalValue', header.declaredTotalValue, header.accessKey);
    const { totalTaxAmount } = computeHeaderTaxes({ ...header, declaredTotalValue }, ipiByKey, rates);
    return { ...header, declaredTotalValue, totalTaxAmount };
  });

  const headers: EnrichedHeader[] = runClassification(taxed);

  return { status: 'ok', headers, items, qualityFlags: tracker.flags };
};
