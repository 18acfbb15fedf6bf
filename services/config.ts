import path from 'path';
import { env, envNumber } from '../utils/env';

export interface TableNames {
    headers: string;
    items: string;
    pisCofins: string;
    icms: string;
    ncm: string;
}

export interface AppConfig {
    port: number;
    databaseUrl?: string;
    tables: TableNames;
    cfopCatalogPath: string;
    analysisCacheTtlSeconds: number;
    gemini: {
        apiKey: string;
        model: string;
    };
    agent: {
        maxIterations: number;
        memoryWindow: number;
        rowLimit: number;
    };
}

export const appConfig: AppConfig = {
    port: envNumber('PORT', 4000),
    databaseUrl: env('DATABASE_URL') || undefined,
    tables: {
        headers: env('TABLE_CABECALHO', 'nfe_cabecalho'),
        items: env('TABLE_ITENS', 'nfe_itens'),
        pisCofins: env('TABLE_PIS_COFINS', 'pis_cofins'),
        icms: env('TABLE_ICMS', 'icms'),
        ncm: env('TABLE_NCM_TPI', 'ncm_tpi'),
    },
    cfopCatalogPath: env('CFOP_CATALOG_PATH', path.resolve(process.cwd(), 'data', 'cfop.csv')),
    analysisCacheTtlSeconds: envNumber('ANALYSIS_CACHE_TTL_SECONDS', 3600),
    gemini: {
        apiKey: env('GEMINI_API_KEY'),
        model: env('GEMINI_MODEL', 'gemini-2.5-flash'),
    },
    agent: {
        maxIterations: envNumber('AGENT_MAX_ITERATIONS', 5),
        memoryWindow: envNumber('AGENT_MEMORY_WINDOW', 5),
        rowLimit: envNumber('AGENT_ROW_LIMIT', 200),
    },
};
