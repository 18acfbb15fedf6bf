import express from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import type { Express, Request, Response } from 'express';
import type { EventEmitter } from 'events';
import type { Server } from 'node:http';
import type { AnalysisContext } from '../types';
import { createQueryAgent, type FiscalQueryAgent } from '../agents/queryAgent';
import { AnalysisCache, etlEvents } from '../services/analysisCache';
import { loadAndAnalyze, type DatasetSource } from '../services/analysisService';
import { loadCfopCatalog, type CfopCatalog } from '../services/cfopCatalog';
import { appConfig } from '../services/config';
import { fiscalRepository } from '../services/fiscalRepository';
import { generateText } from '../services/llmService';
import { logger } from '../services/logger';
import { bootstrapPostgres, postgresClient } from '../services/postgresClient';
import { telemetry } from '../services/telemetry';

export const DASHBOARD_CACHE_KEY = 'dashboard';

export interface ServerDeps {
    source: DatasetSource;
    agent: FiscalQueryAgent;
    events?: EventEmitter;
    cache?: AnalysisCache<AnalysisContext>;
    cfopCatalog?: CfopCatalog;
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const parseLimit = (raw: unknown): number | undefined => {
    if (typeof raw !== 'string') return undefined;
    const limit = Number.parseInt(raw, 10);
    return Number.isFinite(limit) && limit > 0 ? limit : undefined;
};

export const createApp = (deps: ServerDeps): Express => {
    const events = deps.events ?? etlEvents;
    const cache = deps.cache ?? new AnalysisCache<AnalysisContext>({ ttlSeconds: appConfig.analysisCacheTtlSeconds, events });

    const app = express();
    app.use(cors());
    app.use(bodyParser.json());

    app.get('/api/dashboard', async (_req: Request, res: Response) => {
        const correlationId = telemetry.createCorrelationId('backend');
        try {
            const context = await cache.getOrCompute(
                DASHBOARD_CACHE_KEY,
                () => loadAndAnalyze(deps.source, { cfopCatalog: deps.cfopCatalog, correlationId }),
                (result) => result.status === 'ok',
            );
            if (context.status === 'no-data') {
                res.status(404).json({ error: 'no-data', reason: context.reason });
                return;
            }
            res.json(context);
        } catch (error) {
            logger.log('Server', 'ERROR', 'Falha ao montar o painel fiscal.', { error: errorMessage(error) }, {
                correlationId,
                scope: 'backend',
            });
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    app.post('/api/dashboard/refresh', (_req: Request, res: Response) => {
        cache.invalidate();
        res.status(202).json({ status: 'invalidated' });
    });

    app.post('/api/agent/query', async (req: Request, res: Response) => {
        const question: unknown = req.body?.question;
        if (typeof question !== 'string' || question.trim() === '') {
            res.status(400).json({ error: 'question is required' });
            return;
        }
        const correlationId = telemetry.createCorrelationId('agent');
        const answer = await deps.agent.ask(question, correlationId);
        res.json(answer);
    });

    app.get('/api/logs', (req: Request, res: Response) => {
        res.json(logger.getLogs(parseLimit(req.query.limit)));
    });

    return app;
};

export const startServer = async (): Promise<Server> => {
    telemetry.init();
    await bootstrapPostgres();

    const agent = createQueryAgent({
        generate: generateText,
        runQuery: (sql) => postgresClient.runReadOnly(sql),
        tableNames: Object.values(appConfig.tables),
        maxIterations: appConfig.agent.maxIterations,
        memoryWindow: appConfig.agent.memoryWindow,
        rowLimit: appConfig.agent.rowLimit,
    });
    const app = createApp({ source: fiscalRepository, agent, cfopCatalog: loadCfopCatalog() });

    const server = await new Promise<Server>((resolve) => {
        const listening = app.listen(appConfig.port, () => {
            logger.log('Server', 'INFO', `Servidor de análise fiscal na porta ${appConfig.port}`, undefined, { scope: 'backend' });
            resolve(listening);
        });
    });

    process.once('SIGTERM', () => {
        server.close();
        Promise.all([postgresClient.end(), telemetry.shutdown()]).catch((error: unknown) => {
            logger.log('Server', 'ERROR', 'Falha ao encerrar recursos.', { error: errorMessage(error) }, { scope: 'backend' });
        });
    });

    return server;
};

if (require.main === module) {
    startServer().catch((error: unknown) => {
        logger.log('Server', 'ERROR', 'Falha ao iniciar o servidor.', { error: errorMessage(error) }, { scope: 'backend' });
        process.exitCode = 1;
    });
}
