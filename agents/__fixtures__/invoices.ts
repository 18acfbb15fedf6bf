import type { EnrichedHeader, EnrichedItem, FiscalDataset, InvoiceHeader, InvoiceItem } from '../../types';

export const buildHeader = (overrides: Partial<InvoiceHeader> = {}): InvoiceHeader => ({
  accessKey: 'A1',
  number: '1001',
  series: '1',
  issueDate: '2024-01-15',
  emitterTaxId: '11111111000191',
  emitterName: 'Emitente Teste Ltda',
  emitterState: 'SP',
  emitterRegistrationId: '110042490114',
  recipientTaxId: '22222222000191',
  recipientName: 'Cliente A',
  recipientState: 'SP',
  declaredTotalValue: 1000,
  mostRecentEvent: 'Autorização de Uso',
  periodKey: '202401',
  operationNature: 'VENDA DE MERCADORIA',
  ...overrides,
});

export const buildItem = (overrides: Partial<InvoiceItem> = {}): InvoiceItem => ({
  accessKey: 'A1',
  productNumber: '1',
  description: 'Produto X',
  ncmCode: '1234',
  cfopCode: '5102',
  quantity: 1,
  unitValue: 1000,
  totalValue: 1000,
  ...overrides,
});

export const buildDataset = (overrides: Partial<FiscalDataset> = {}): FiscalDataset => ({
  headers: [buildHeader()],
  items: [buildItem()],
  pisCofinsRates: [{ value: 9.25 }],
  icmsRates: [{ stateCode: 'SP', rate: 18.0 }],
  ncmTaxRates: [{ ncmCode: '1234', rate: 5.0 }],
  ...overrides,
});

export const buildEnrichedHeader = (overrides: Partial<EnrichedHeader> = {}): EnrichedHeader => ({
  ...buildHeader(),
  declaredTotalValue: 1000,
  totalTaxAmount: 0,
  operationType: 'Interna',
  ...overrides,
});

export const buildEnrichedItem = (overrides: Partial<EnrichedItem> = {}): EnrichedItem => ({
  ...buildItem(),
  quantity: 1,
  unitValue: 1000,
  totalValue: 1000,
  ipiAmount: 0,
  cfopDescription: '5102',
  ...overrides,
});
