import type { QueryResultRow } from 'pg';
import { FiscalRepository, mapHeaderRow, mapIcmsRow, mapItemRow } from '../fiscalRepository';
import type { QueryExecutor } from '../postgresClient';
import type { TableNames } from '../config';
import { logger } from '../logger';

const tables: TableNames = {
  headers: 'nfe_cabecalho',
  items: 'nfe_itens',
  pisCofins: 'pis_cofins',
  icms: 'icms',
  ncm: 'ncm_tpi',
};

class InMemoryExecutor implements QueryExecutor {
  readonly statements: string[] = [];

  constructor(private readonly data: Record<string, QueryResultRow[] | Error>) {}

  async query(sql: string): Promise<{ rows: QueryResultRow[] }> {
    this.statements.push(sql);
    const table = sql.replace('SELECT * FROM ', '');
    const rows = this.data[table];
    if (rows instanceof Error) throw rows;
    return { rows: rows ?? [] };
  }
}

const headerRow = {
  chave_de_acesso: '35240111111111000191550010000010011000000011',
  numero: 1001,
  serie: '1',
  data_emissao: new Date('2024-01-15T00:00:00.000Z'),
  cnpj_emitente: '11111111000191',
  razao_social_emitente: 'Emitente Teste Ltda',
  insc_estadual_emitente: null,
  uf_emitente: 'SP',
  cnpj_destinatario: '22222222000191',
  nome_destinatario: 'Cliente A',
  uf_destinatario: 'RJ',
  valor_nota_fiscal: '1000.00',
  evento_recente: '',
  natureza_da_operacao: 'VENDA',
  ano_mes: '202401',
};

const itemRow = {
  chave_de_acesso: headerRow.chave_de_acesso,
  numero_produto: '1',
  descricao_produto_servico: 'Produto X',
  codigo_ncm_sh: '12345678',
  cfop: '6102',
  quantidade: '2',
  valor_unitario: '500.0000',
  valor_total: '1000.00',
};

describe('row mappers', () => {
  it('maps header columns to typed fields', () => {
    expect(mapHeaderRow(headerRow)).toEqual({
      accessKey: '35240111111111000191550010000010011000000011',
      number: '1001',
      series: '1',
      issueDate: new Date('2024-01-15T00:00:00.000Z'),
      emitterTaxId: '11111111000191',
      emitterName: 'Emitente Teste Ltda',
      emitterState: 'SP',
      emitterRegistrationId: null,
      recipientTaxId: '22222222000191',
      recipientName: 'Cliente A',
      recipientState: 'RJ',
      declaredTotalValue: '1000.00',
      mostRecentEvent: null,
      periodKey: '202401',
      operationNature: 'VENDA',
    });
  });

  it('maps item columns and keeps numeric text for the core to parse', () => {
    const item = mapItemRow(itemRow);
    expect(item?.totalValue).toBe('1000.00');
    expect(item?.cfopCode).toBe('6102');
  });

  it('drops rows without a key', () => {
    expect(mapHeaderRow({ ...headerRow, chave_de_acesso: '  ' })).toBeNull();
    expect(mapIcmsRow({ estado: 'São Paulo', sigla: null, aliquota: 18 })).toBeNull();
  });
});

describe('FiscalRepository', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.clear();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads the five tables as typed records', async () => {
    const executor = new InMemoryExecutor({
      nfe_cabecalho: [headerRow],
      nfe_itens: [itemRow],
      pis_cofins: [{ imposto: 'PIS/COFINS', valor: '9.25', regra: 'Não cumulativo' }],
      icms: [{ estado: 'São Paulo', sigla: 'SP', aliquota: '18' }],
      ncm_tpi: [{ ncm: '12345678', descricao: 'Teste', aliquota: 5 }],
    });

    const dataset = await new FiscalRepository(executor, tables).loadDataset('test-correlation');

    expect(executor.statements).toEqual([
      'SELECT * FROM nfe_cabecalho',
      'SELECT * FROM nfe_itens',
      'SELECT * FROM pis_cofins',
      'SELECT * FROM icms',
      'SELECT * FROM ncm_tpi',
    ]);
    expect(dataset.headers).toHaveLength(1);
    expect(dataset.items).toHaveLength(1);
    expect(dataset.pisCofinsRates).toEqual([{ value: '9.25' }]);
    expect(dataset.icmsRates).toEqual([{ stateCode: 'SP', rate: '18' }]);
    expect(dataset.ncmTaxRates).toEqual([{ ncmCode: '12345678', rate: 5 }]);
  });

  it('reports a table that fails to load as absent', async () => {
    const executor = new InMemoryExecutor({
      nfe_cabecalho: new Error('relation "nfe_cabecalho" does not exist'),
      nfe_itens: [itemRow],
    });

    const dataset = await new FiscalRepository(executor, tables).loadDataset();

    expect(dataset.headers).toBeNull();
    expect(dataset.items).toHaveLength(1);
    expect(dataset.icmsRates).toEqual([]);
    const errors = logger.getLogs().filter(entry => entry.level === 'ERROR');
    expect(errors.map(entry => entry.message)).toEqual(['Falha ao carregar a tabela nfe_cabecalho.']);
  });

  it('reports a table without its required columns as absent', async () => {
    const executor = new InMemoryExecutor({
      nfe_cabecalho: [headerRow],
      nfe_itens: [{ chave_de_acesso: 'A1', descricao_produto_servico: 'Sem valor' }],
    });

    const dataset = await new FiscalRepository(executor, tables).loadDataset();

    expect(dataset.items).toBeNull();
  });

  it('discards keyless rows with a warning', async () => {
    const executor = new InMemoryExecutor({
      nfe_cabecalho: [headerRow, { ...headerRow, chave_de_acesso: null }],
    });

    const dataset = await new FiscalRepository(executor, tables).loadDataset();

    expect(dataset.headers).toHaveLength(1);
    expect(logger.getLogs().some(entry => entry.message === '1 linha(s) de nfe_cabecalho descartadas sem chave.')).toBe(true);
  });

  it('rejects table names that are not plain identifiers', async () => {
    const executor = new InMemoryExecutor({});
    const repository = new FiscalRepository(executor, { ...tables, headers: 'nfe; DROP TABLE x' });

    const dataset = await repository.loadDataset();

    expect(dataset.headers).toBeNull();
    expect(executor.statements).not.toContain('SELECT * FROM nfe; DROP TABLE x');
  });
});
