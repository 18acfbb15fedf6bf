import path from 'path';
import { CFOP_NOT_FOUND, loadCfopCatalog, normalizeCfopCode, parseCfopCatalog, rawCodeCatalog } from '../cfopCatalog';
import { logger } from '../logger';

describe('parseCfopCatalog', () => {
  const csv = [
    'CFOP;DESCRICAO',
    '5102;Venda de mercadoria adquirida ou recebida de terceiros',
    '6102;Venda interestadual',
    'linha inválida',
    '',
  ].join('\n');

  it('truncates descriptions to 40 characters and marks the cut', () => {
    const catalog = parseCfopCatalog(csv);

    expect(catalog.size).toBe(2);
    expect(catalog.describe('5102')).toBe('Venda de mercadoria adquirida ou recebid...');
    expect(catalog.describe(6102)).toBe('Venda interestadual...');
  });

  it('matches codes written as decimals', () => {
    expect(parseCfopCatalog(csv).describe('5102.0')).toBe('Venda de mercadoria adquirida ou recebid...');
  });

  it('reports unknown codes', () => {
    expect(parseCfopCatalog(csv).describe('1234')).toBe(CFOP_NOT_FOUND);
  });
});

describe('normalizeCfopCode', () => {
  it('renders codes as integers', () => {
    expect(normalizeCfopCode(5102)).toBe('5102');
    expect(normalizeCfopCode('5102.0')).toBe('5102');
    expect(normalizeCfopCode(null)).toBe('0');
  });
});

describe('loadCfopCatalog', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.clear();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads the bundled CFOP table', () => {
    const catalog = loadCfopCatalog(path.resolve(__dirname, '../../data/cfop.csv'));

    expect(catalog.size).toBe(28);
    expect(catalog.describe('6102')).toBe('Venda de mercadoria adquirida ou recebid...');
  });

  it('falls back to the raw code when the file is missing', () => {
    const catalog = loadCfopCatalog(path.resolve(__dirname, 'missing-cfop.csv'));

    expect(catalog).toBe(rawCodeCatalog);
    expect(catalog.describe('5102')).toBe('5102');
    expect(logger.getLogs().at(-1)?.level).toBe('WARN');
  });
});
