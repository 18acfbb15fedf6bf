import fs from 'fs';
import Papa from 'papaparse';
import type { NumericInput } from '../types';
import { parseSafeFloat } from '../utils/parsingUtils';
import { appConfig } from './config';
import { logger } from './logger';

export const CFOP_NOT_FOUND = 'CFOP Não Encontrado';
const DESCRIPTION_LIMIT = 40;

export interface CfopCatalog {
  readonly size: number;
  describe(code: NumericInput): string;
}

/** CFOP codes are compared as integers rendered back to text ("5102", 5102 and "5102.0" match). */
export const normalizeCfopCode = (code: NumericInput): string => String(Math.trunc(parseSafeFloat(code)));

/** Fallback when no catalog is available: the item shows its own code. */
export const rawCodeCatalog: CfopCatalog = {
  size: 0,
  describe: (code) => normalizeCfopCode(code),
};

/**
 * Parses a `CFOP;DESCRICAO` table (first line is the header). Lines with a different
 * number of fields are skipped. Descriptions are cut to 40 characters for chart labels.
 */
export const parseCfopCatalog = (csv: string): CfopCatalog => {
  const parsed = Papa.parse<string[]>(csv, {
    delimiter: ';',
    quoteChar: '"',
    skipEmptyLines: true,
  });

  const descriptions = new Map<string, string>();
  for (const row of parsed.data.slice(1)) {
    if (row.length !== 2) continue;
    const [code, description] = row;
    descriptions.set(code.trim(), `${description.trim().slice(0, DESCRIPTION_LIMIT)}...`);
  }

  return {
    size: descriptions.size,
    describe: (code) => descriptions.get(normalizeCfopCode(code)) ?? CFOP_NOT_FOUND,
  };
};

/**
 * Reads the catalog from disk. A missing file is not an error: items then carry their raw code.
 */
export const loadCfopCatalog = (filePath: string = appConfig.cfopCatalogPath): CfopCatalog => {
  if (!fs.existsSync(filePath)) {
    logger.log('CfopCatalog', 'WARN', 'Tabela CFOP não encontrada; usando o código como descrição.', { filePath }, { scope: 'backend' });
    return rawCodeCatalog;
  }
  const catalog = parseCfopCatalog(fs.readFileSync(filePath, 'utf8'));
  logger.log('CfopCatalog', 'INFO', `Tabela CFOP carregada com ${catalog.size} códigos.`, { filePath }, { scope: 'backend' });
  return catalog;
};
