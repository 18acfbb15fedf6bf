import { computeHeaderTaxes, ncmKey, resolveTaxRates, runTaxEnrichment, sumIpiByAccessKey } from '../taxEnricher';
import { runAudit } from '../auditorAgent';
import { parseCfopCatalog } from '../../services/cfopCatalog';
import type { EnrichmentResult } from '../../types';
import { buildDataset, buildHeader, buildItem } from '../__fixtures__/invoices';

const expectOk = (result: EnrichmentResult) => {
  if (result.status !== 'ok') {
    throw new Error(`expected an enriched dataset, got: ${result.reason}`);
  }
  return result;
};

describe('runTaxEnrichment', () => {
  it('computes every tax component for a single document', () => {
    const dataset = buildDataset();
    const rates = resolveTaxRates(dataset);
    const result = expectOk(runTaxEnrichment(dataset));

    const breakdown = computeHeaderTaxes(
      { accessKey: 'A1', emitterState: 'SP', declaredTotalValue: 1000 },
      sumIpiByAccessKey(result.items),
      rates,
    );

    expect(breakdown.pisCofinsAmount).toBeCloseTo(92.5, 2);
    expect(breakdown.icmsAmount).toBeCloseTo(180, 2);
    expect(breakdown.ipiAmount).toBeCloseTo(50, 2);
    expect(breakdown.totalTaxAmount).toBeCloseTo(322.5, 2);
    expect(breakdown.totalTaxAmount).toBe(breakdown.pisCofinsAmount + breakdown.icmsAmount + breakdown.ipiAmount);

    expect(result.headers[0].totalTaxAmount).toBeCloseTo(322.5, 2);
    expect(result.headers[0].operationType).toBe('Interna');
    expect(result.items[0].ipiAmount).toBeCloseTo(50, 2);
    expect(result.qualityFlags).toEqual([]);
    expect(runAudit(result.headers, result.items).valueMismatches.count).toBe(0);
  });

  it('returns the no-data sentinel when the header table is empty or absent', () => {
    const reason = 'Tabela de cabeçalhos de NF-e ausente ou vazia.';
    expect(runTaxEnrichment(buildDataset({ headers: [] }))).toEqual({ status: 'no-data', reason });
    expect(runTaxEnrichment(buildDataset({ headers: null }))).toEqual({ status: 'no-data', reason });
  });

  it('returns the no-data sentinel when the item table is empty or absent', () => {
    const noItems = { status: 'no-data', reason: 'Tabela de itens de NF-e ausente ou vazia.' };
    expect(runTaxEnrichment(buildDataset({ items: [] }))).toEqual(noItems);
    expect(runTaxEnrichment(buildDataset({ items: null }))).toEqual(noItems);
  });

  it('coerces unparsable values to 0 without stopping the other documents', () => {
    const dataset = buildDataset({
      headers: [buildHeader(), buildHeader({ accessKey: 'B1', declaredTotalValue: 'abc' })],
    });

    const result = expectOk(runTaxEnrichment(dataset));

    expect(result.headers).toHaveLength(2);
    expect(result.headers[0].totalTaxAmount).toBeCloseTo(322.5, 2);
    expect(result.headers[1].declaredTotalValue).toBe(0);
    expect(result.headers[1].totalTaxAmount).toBe(0);
    expect(result.qualityFlags).toEqual([
      { table: 'header', accessKey: 'B1', field: 'declaredTotalValue', rawValue: 'abc', reason: 'unparsable' },
    ]);
  });

  it('skips quality flags when tracking is turned off', () => {
    const dataset = buildDataset({ headers: [buildHeader({ declaredTotalValue: null })] });

    const result = expectOk(runTaxEnrichment(dataset, { trackDataQuality: false }));

    expect(result.qualityFlags).toEqual([]);
    expect(result.headers[0].declaredTotalValue).toBe(0);
  });

  it('gives IPI 0 to documents without items', () => {
    const dataset = buildDataset({
      headers: [buildHeader(), buildHeader({ accessKey: 'A2', declaredTotalValue: 100 })],
    });

    const result = expectOk(runTaxEnrichment(dataset));

    // 100 * 0.0925 + 100 * 0.18
    expect(result.headers[1].totalTaxAmount).toBeCloseTo(27.25, 2);
  });

  it('sums item-level IPI per access key', () => {
    const dataset = buildDataset({
      items: [
        buildItem({ totalValue: 600 }),
        buildItem({ productNumber: '2', totalValue: 400, ncmCode: '99999999' }),
      ],
    });

    const result = expectOk(runTaxEnrichment(dataset));

    expect(result.items.map(item => item.ipiAmount)).toEqual([30, 0]);
    expect(result.headers[0].totalTaxAmount).toBeCloseTo(92.5 + 180 + 30, 2);
  });

  it('applies a zero ICMS rate to states missing from the rate table', () => {
    const dataset = buildDataset({ headers: [buildHeader({ emitterState: 'AM', recipientState: 'SP' })] });

    const result = expectOk(runTaxEnrichment(dataset));

    expect(result.headers[0].totalTaxAmount).toBeCloseTo(142.5, 2);
    expect(result.headers[0].operationType).toBe('Interestadual');
  });

  it('falls back to the flat PIS/COFINS rate without a rate table', () => {
    const rates = resolveTaxRates(buildDataset({ pisCofinsRates: null }));
    expect(rates.pisCofins).toBe(0.0925);
  });

  it('leaves unparsable PIS/COFINS rows out of the mean and flags them', () => {
    const dataset = buildDataset({ pisCofinsRates: [{ value: 'n/d' }, { value: 1.65 }] });

    const result = expectOk(runTaxEnrichment(dataset));

    // 1000 * 0.0165 + 180 + 50
    expect(result.headers[0].totalTaxAmount).toBeCloseTo(246.5, 2);
    expect(result.qualityFlags).toEqual([
      { table: 'pisCofins', field: 'value', rawValue: 'n/d', reason: 'unparsable' },
    ]);
  });

  it('matches NCM codes by their integer value', () => {
    const dataset = buildDataset({ items: [buildItem({ ncmCode: '01234' })], ncmTaxRates: [{ ncmCode: 1234.0, rate: '5' }] });

    const result = expectOk(runTaxEnrichment(dataset));

    expect(result.items[0].ipiAmount).toBeCloseTo(50, 2);
  });

  it('describes CFOP codes through the catalog', () => {
    const catalog = parseCfopCatalog('CFOP;DESCRICAO\n5102;Venda de mercadoria adquirida ou recebida de terceiros\n');
    const dataset = buildDataset({ items: [buildItem(), buildItem({ productNumber: '2', cfopCode: 9999, totalValue: 0 })] });

    const result = expectOk(runTaxEnrichment(dataset, { cfopCatalog: catalog }));

    expect(result.items.map(item => item.cfopDescription)).toEqual([
      'Venda de mercadoria adquirida ou recebid...',
      'CFOP Não Encontrado',
    ]);
  });

  it('does not mutate the input tables', () => {
    const dataset = buildDataset({ headers: [buildHeader({ declaredTotalValue: '1.000,00' })] });

    const result = expectOk(runTaxEnrichment(dataset));

    expect(result.headers[0].declaredTotalValue).toBe(1000);
    expect(dataset.headers?.[0].declaredTotalValue).toBe('1.000,00');
    expect(dataset.items?.[0]).not.toHaveProperty('ipiAmount');
  });
});

describe('ncmKey', () => {
  it('reads NCM codes as integers', () => {
    expect(ncmKey('01012100')).toBe(1012100);
    expect(ncmKey('1012100.0')).toBe(1012100);
    expect(ncmKey(1012100)).toBe(1012100);
    expect(ncmKey(null)).toBe(0);
  });
});
