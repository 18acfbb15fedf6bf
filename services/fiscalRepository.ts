import type { QueryResultRow } from 'pg';
import type {
  FiscalDataset,
  IcmsRate,
  InvoiceHeader,
  InvoiceItem,
  NcmTaxRate,
  NumericInput,
  PisCofinsRate,
} from '../types';
import { appConfig, type TableNames } from './config';
import { logger } from './logger';
import { assertIdentifier, postgresClient, type QueryExecutor } from './postgresClient';
import { measureExecution } from './telemetry';

type RawRow = QueryResultRow;

const text = (row: RawRow, column: string): string => {
  const value: unknown = row[column];
  if (value === null || value === undefined) return '';
  return String(value).trim();
};

const numeric = (row: RawRow, column: string): NumericInput => {
  const value: unknown = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  return String(value);
};

const dateValue = (row: RawRow, column: string): string | Date | null => {
  const value: unknown = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return null;
};

export const mapHeaderRow = (row: RawRow): InvoiceHeader | null => {
  const accessKey = text(row, 'chave_de_acesso');
  if (!accessKey) return null;
  const nature = text(row, 'natureza_da_operacao');
  return {
    accessKey,
    number: text(row, 'numero'),
    series: text(row, 'serie'),
    issueDate: dateValue(row, 'data_emissao'),
    emitterTaxId: text(row, 'cnpj_emitente'),
    emitterName: text(row, 'razao_social_emitente'),
    emitterState: text(row, 'uf_emitente'),
    emitterRegistrationId: numeric(row, 'insc_estadual_emitente'),
    recipientTaxId: text(row, 'cnpj_destinatario'),
    recipientName: text(row, 'nome_destinatario'),
    recipientState: text(row, 'uf_destinatario'),
    declaredTotalValue: numeric(row, 'valor_nota_fiscal'),
    mostRecentEvent: text(row, 'evento_recente') || null,
    periodKey: text(row, 'ano_mes'),
    operationNature: nature || null,
  };
};

export const mapItemRow = (row: RawRow): InvoiceItem | null => {
  const accessKey = text(row, 'chave_de_acesso');
  if (!accessKey) return null;
  return {
    accessKey,
    productNumber: text(row, 'numero_produto'),
    description: text(row, 'descricao_produto_servico'),
    ncmCode: numeric(row, 'codigo_ncm_sh'),
    cfopCode: numeric(row, 'cfop'),
    quantity: numeric(row, 'quantidade'),
    unitValue: numeric(row, 'valor_unitario'),
    totalValue: numeric(row, 'valor_total'),
  };
};

export const mapPisCofinsRow = (row: RawRow): PisCofinsRate => ({ value: numeric(row, 'valor') });

export const mapIcmsRow = (row: RawRow): IcmsRate | null => {
  const stateCode = text(row, 'sigla');
  return stateCode ? { stateCode, rate: numeric(row, 'aliquota') } : null;
};

export const mapNcmRow = (row: RawRow): NcmTaxRate => ({ ncmCode: numeric(row, 'ncm'), rate: numeric(row, 'aliquota') });

interface TableSpec<T> {
  name: string;
  requiredColumns: string[];
  map: (row: RawRow) => T | null;
}

/**
 * Data source for the analysis pass. Typing and validation of the raw rows happen here,
 * so the core only ever sees typed records or an absent (`null`) table.
 */
export class FiscalRepository {
  constructor(
    private readonly db: QueryExecutor = postgresClient,
    private readonly tables: TableNames = appConfig.tables,
  ) {}

  async loadDataset(correlationId?: string): Promise<FiscalDataset> {
    return measureExecution('database', 'FiscalRepository.loadDataset', async () => {
      const [headers, items, pisCofinsRates, icmsRates, ncmTaxRates] = await Promise.all([
        this.loadTable({ name: this.tables.headers, requiredColumns: ['chave_de_acesso', 'valor_nota_fiscal'], map: mapHeaderRow }, correlationId),
        this.loadTable({ name: this.tables.items, requiredColumns: ['chave_de_acesso', 'valor_total'], map: mapItemRow }, correlationId),
        this.loadTable({ name: this.tables.pisCofins, requiredColumns: ['valor'], map: mapPisCofinsRow }, correlationId),
        this.loadTable({ name: this.tables.icms, requiredColumns: ['sigla', 'aliquota'], map: mapIcmsRow }, correlationId),
        this.loadTable({ name: this.tables.ncm, requiredColumns: ['ncm', 'aliquota'], map: mapNcmRow }, correlationId),
      ]);
      return { headers, items, pisCofinsRates, icmsRates, ncmTaxRates };
    }, { correlationId });
  }

  private async loadTable<T>(spec: TableSpec<T>, correlationId?: string): Promise<T[] | null> {
    let rows: RawRow[];
    try {
      const result = await this.db.query(`SELECT * FROM ${assertIdentifier(spec.name)}`);
      rows = result.rows;
    } catch (error) {
      logger.log('FiscalRepository', 'ERROR', `Falha ao carregar a tabela ${spec.name}.`, {
        table: spec.name,
        error: error instanceof Error ? error.message : String(error),
      }, { correlationId, scope: 'database' });
      return null;
    }

    const missing = rows.length > 0 ? spec.requiredColumns.filter(column => !(column in rows[0])) : [];
    if (missing.length > 0) {
      logger.log('FiscalRepository', 'ERROR', `Tabela ${spec.name} sem colunas obrigatórias.`, {
        table: spec.name,
        missing,
      }, { correlationId, scope: 'database' });
      return null;
    }

    const mapped = rows.map(spec.map).filter((row): row is T => row !== null);
    if (mapped.length < rows.length) {
      logger.log('FiscalRepository', 'WARN', `${rows.length - mapped.length} linha(s) de ${spec.name} descartadas sem chave.`, {
        table: spec.name,
      }, { correlationId, scope: 'database' });
    }
    return mapped;
  }
}

export const fiscalRepository = new FiscalRepository();
