// types.ts

/** Raw numeric value as it arrives from the store: parsed by the core, never trusted. */
export type NumericInput = number | string | null | undefined;

// --- Source tables ---

export interface InvoiceHeader {
  accessKey: string;
  number: string;
  series: string;
  issueDate: string | Date | null;
  emitterTaxId: string;
  emitterName: string;
  emitterState: string;
  emitterRegistrationId: NumericInput;
  recipientTaxId: string;
  recipientName: string;
  recipientState: string;
  declaredTotalValue: NumericInput;
  mostRecentEvent: string | null;
  periodKey: string; // YYYYMM
  operationNature?: string | null;
}

export interface InvoiceItem {
  accessKey: string;
  productNumber: string;
  description: string;
  ncmCode: NumericInput;
  cfopCode: NumericInput;
  quantity: NumericInput;
  unitValue: NumericInput;
  totalValue: NumericInput;
}

export interface PisCofinsRate {
  value: NumericInput;
}

export interface IcmsRate {
  stateCode: string;
  rate: NumericInput;
}

export interface NcmTaxRate {
  ncmCode: NumericInput;
  rate: NumericInput;
}

/** Everything one analysis pass reads. A `null` table means the source could not provide it. */
export interface FiscalDataset {
  headers: InvoiceHeader[] | null;
  items: InvoiceItem[] | null;
  pisCofinsRates: PisCofinsRate[] | null;
  icmsRates: IcmsRate[] | null;
  ncmTaxRates: NcmTaxRate[] | null;
}

// --- Enrichment ---

export type OperationType = 'Interna' | 'Interestadual';

export interface TaxBreakdown {
  pisCofinsAmount: number;
  icmsAmount: number;
  ipiAmount: number;
  totalTaxAmount: number;
}

export interface EnrichedHeader extends Omit<InvoiceHeader, 'declaredTotalValue'> {
  declaredTotalValue: number;
  totalTaxAmount: number;
  operationType: OperationType;
}

export interface EnrichedItem extends Omit<InvoiceItem, 'quantity' | 'unitValue' | 'totalValue'> {
  quantity: number;
  unitValue: number;
  totalValue: number;
  ipiAmount: number;
  cfopDescription: string;
}

export type QualityTable = 'header' | 'item' | 'pisCofins' | 'icms' | 'ncm';

export interface DataQualityFlag {
  table: QualityTable;
  accessKey?: string;
  field: string;
  rawValue: string;
  reason: 'missing' | 'unparsable';
}

export interface NoDataResult {
  status: 'no-data';
  reason: string;
}

export interface EnrichedDataset {
  status: 'ok';
  headers: EnrichedHeader[];
  items: EnrichedItem[];
  qualityFlags: DataQualityFlag[];
}

export type EnrichmentResult = EnrichedDataset | NoDataResult;

// --- Audit ---

export type AuditStatus = 'OK' | 'ALERTA' | 'ERRO';

export interface AuditRule {
  code: string;
  message: string;
  explanation: string;
  severity: 'ERRO' | 'ALERTA' | 'INFO';
}

export interface ValueMismatch {
  accessKey: string;
  number: string;
  declaredValue: number;
  itemsValue: number;
  difference: number;
}

export interface DuplicateKeyRow {
  accessKey: string;
  number: string;
  emitterName: string;
}

export interface MissingRegistrationRow {
  number: string;
  emitterName: string;
  emitterState: string;
}

export interface MultiStateRecipientRow {
  recipientTaxId: string;
  recipientName: string;
  recipientState: string;
}

export interface AuditCheckResult<Row> {
  rule: AuditRule;
  rows: Row[];
  count: number;
}

export interface AuditFindings {
  status: AuditStatus;
  valueMismatches: AuditCheckResult<ValueMismatch>;
  duplicateAccessKeys: AuditCheckResult<DuplicateKeyRow>;
  missingEmitterRegistration: AuditCheckResult<MissingRegistrationRow>;
  multiStateRecipients: AuditCheckResult<MultiStateRecipientRow>;
}

// --- Aggregation ---

export interface RankingEntry {
  label: string;
  value: number;
}

export interface DashboardKpis {
  totalInvoiced: number;
  documentCount: number;
  averageValue: number;
  averageValueInternal: number;
  averageValueInterstate: number;
  averageItemsPerDocument: number;
  totalTax: number;
  anomalyPercentage: number;
}

export interface MonthlyRollupRow {
  periodKey: string;
  documentCount: number;
  totalValue: number;
  averageItemsPerDocument: number;
}

export interface StateFlowCell {
  emitterState: string;
  recipientState: string;
  value: number;
}

export interface OutlierReport {
  /** mean + 3 sample standard deviations; null with fewer than two documents. */
  threshold: number | null;
  documents: { accessKey: string; number: string; value: number }[];
}

export interface DashboardSummary {
  kpis: DashboardKpis;
  rankings: {
    recipientsByValue: RankingEntry[];
    recipientsByTax: RankingEntry[];
    productsByValue: RankingEntry[];
    productsByQuantity: RankingEntry[];
  };
  monthlyRollup: MonthlyRollupRow[];
  monthlyEvolution: RankingEntry[];
  operationTypes: RankingEntry[];
  operationNatures: RankingEntry[];
  cfopDistribution: RankingEntry[];
  stateFlows: StateFlowCell[];
  valueByEmitterState: RankingEntry[];
  taxByEmitterState: RankingEntry[];
  outliers: OutlierReport;
}

// --- Analysis pass ---

export interface AnalysisSnapshot {
  status: 'ok';
  generatedAt: string;
  correlationId: string;
  headers: EnrichedHeader[];
  items: EnrichedItem[];
  audit: AuditFindings;
  summary: DashboardSummary;
  qualityFlags: DataQualityFlag[];
}

export type AnalysisContext = AnalysisSnapshot | NoDataResult;

// --- Query agent ---

export interface ChartDataPoint {
  label: string;
  value: number;
}

export type AgentAnswer =
  | { kind: 'text'; text: string }
  | { kind: 'chart'; title: string; data: ChartDataPoint[] };

export interface ConversationTurn {
  question: string;
  answer: string;
}
