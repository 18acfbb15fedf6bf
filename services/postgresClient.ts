import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import { appConfig, type TableNames } from './config';
import { logger } from './logger';

export interface PostgresConfig extends PoolConfig {
    connectionString?: string;
    readOnlyStatementTimeoutMs?: number;
}

export interface QueryExecutor {
    query(sql: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

/** The part of a pooled pg client a read-only session needs. */
export interface PooledConnection {
    query(sql: string): Promise<{ rows: QueryResultRow[] }>;
    release(err?: Error | boolean): void;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/** Table names come from configuration and end up inside SQL text, so only plain identifiers pass. */
export const assertIdentifier = (name: string): string => {
    if (!IDENTIFIER.test(name)) {
        throw new Error(`Nome de tabela inválido: "${name}"`);
    }
    return name;
};

export class PostgresClient implements QueryExecutor {
    private pool: Pool;
    private readonly statementTimeoutMs: number;

    constructor(config: PostgresConfig = {}) {
        const { connectionString, readOnlyStatementTimeoutMs, ...rest } = config;
        this.statementTimeoutMs = readOnlyStatementTimeoutMs ?? 15_000;
        this.pool = new Pool({
            connectionString: connectionString ?? appConfig.databaseUrl,
            max: 10,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 5_000,
            ...rest,
        });
    }

    async getClient(): Promise<PooledConnection> {
        return this.pool.connect();
    }

    async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
        return this.pool.query<T>(sql, params);
    }

    /**
     * Runs a statement inside a read-only transaction that is always rolled back.
     * A client whose ROLLBACK fails is released with the error so the pool destroys it.
     */
    async runReadOnly(sql: string): Promise<QueryResultRow[]> {
        const client = await this.getClient();
        try {
            await client.query('BEGIN TRANSACTION READ ONLY');
            await client.query(`SET LOCAL statement_timeout = ${Math.trunc(this.statementTimeoutMs)}`);
            const result = await client.query(sql);
            return result.rows;
        } finally {
            let rollbackError: Error | undefined;
            try {
                await client.query('ROLLBACK');
            } catch (error) {
                rollbackError = error instanceof Error ? error : new Error(String(error));
                logger.log('PostgresClient', 'ERROR', 'Falha ao desfazer transação somente leitura.', {
                    error: rollbackError.message,
                }, { scope: 'backend' });
            } finally {
                client.release(rollbackError);
            }
        }
    }

    async migrate(tables: TableNames = appConfig.tables): Promise<void> {
        await this.query(`
            CREATE TABLE IF NOT EXISTS ${assertIdentifier(tables.headers)} (
                chave_de_acesso VARCHAR(44) NOT NULL,
                numero VARCHAR(20),
                serie VARCHAR(10),
                data_emissao DATE,
                cnpj_emitente VARCHAR(20),
                razao_social_emitente TEXT,
                insc_estadual_emitente VARCHAR(20),
                uf_emitente CHAR(2),
                cnpj_destinatario VARCHAR(20),
                nome_destinatario TEXT,
                uf_destinatario CHAR(2),
                valor_nota_fiscal NUMERIC(18, 2),
                evento_recente TEXT,
                natureza_da_operacao TEXT,
                ano_mes CHAR(6) NOT NULL
            );
        `);

        await this.query(`
            CREATE TABLE IF NOT EXISTS ${assertIdentifier(tables.items)} (
                chave_de_acesso VARCHAR(44) NOT NULL,
                numero_produto VARCHAR(20),
                descricao_produto_servico TEXT,
                codigo_ncm_sh VARCHAR(10),
                cfop VARCHAR(4),
                quantidade TEXT,
                valor_unitario NUMERIC(18, 4),
                valor_total NUMERIC(18, 2)
            );
        `);

        await this.query(`
            CREATE TABLE IF NOT EXISTS ${assertIdentifier(tables.pisCofins)} (
                imposto VARCHAR(20),
                valor NUMERIC(8, 4),
                regra TEXT
            );
        `);

        await this.query(`
            CREATE TABLE IF NOT EXISTS ${assertIdentifier(tables.icms)} (
                estado TEXT,
                sigla CHAR(2) PRIMARY KEY,
                aliquota NUMERIC(8, 4)
            );
        `);

        await this.query(`
            CREATE TABLE IF NOT EXISTS ${assertIdentifier(tables.ncm)} (
                ncm VARCHAR(10) PRIMARY KEY,
                descricao TEXT,
                aliquota NUMERIC(8, 4)
            );
        `);
    }

    async end(): Promise<void> {
        await this.pool.end();
    }
}

export const postgresClient = new PostgresClient();

export const bootstrapPostgres = async () => {
    try {
        await postgresClient.migrate();
    } catch (error) {
        console.error('[PostgresClient] Failed to run migrations', error);
        throw error;
    }
};
