import Papa from 'papaparse';
import { Type } from '@google/genai';
import type { AgentAnswer, ChartDataPoint, ConversationTurn } from '../types';
import type { GenerateRequest, ResponseSchema } from '../services/llmService';
import { logger } from '../services/logger';
import { measureExecution } from '../services/telemetry';
import { parseNumeric } from '../utils/parsingUtils';

export class SqlGuardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SqlGuardError';
  }
}

export class AgentIterationLimitError extends Error {
  constructor(public readonly iterations: number) {
    super(`Agent stopped after ${iterations} iterations without a final answer`);
    this.name = 'AgentIterationLimitError';
  }
}

export class AgentOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentOutputError';
  }
}

export type QueryRow = Record<string, unknown>;

export interface QueryAgentDeps {
  generate: (request: GenerateRequest) => Promise<string>;
  runQuery: (sql: string) => Promise<QueryRow[]>;
  tableNames: string[];
  maxIterations?: number;
  memoryWindow?: number;
  rowLimit?: number;
}

export interface FiscalQueryAgent {
  ask(question: string, correlationId?: string): Promise<AgentAnswer>;
  history(): ConversationTurn[];
  reset(): void;
}

const FORBIDDEN_SQL =
  /\b(INSERT|UPDATE|DELETE|MERGE|UPSERT|DROP|ALTER|CREATE|TRUNCATE|GRANT|REVOKE|COPY|CALL|EXECUTE|VACUUM|LOCK|COMMIT|ROLLBACK|BEGIN|SET)\b/i;

const stripStringLiterals = (sql: string) => sql.replace(/'(?:[^']|'')*'/g, "''");

/**
 * Accepts exactly one SELECT (or WITH ... SELECT) statement and returns it without the trailing semicolon.
 */
export const assertReadOnlySql = (sql: string): string => {
  const statement = sql.trim().replace(/;+\s*$/, '').trim();
  if (statement === '') {
    throw new SqlGuardError('Consulta SQL vazia.');
  }
  const bare = stripStringLiterals(statement);
  if (bare.includes(';')) {
    throw new SqlGuardError('Apenas uma instrução SQL por consulta é permitida.');
  }
  if (!/^(SELECT|WITH)\b/i.test(bare)) {
    throw new SqlGuardError('Apenas consultas SELECT são permitidas.');
  }
  const forbidden = FORBIDDEN_SQL.exec(bare);
  if (forbidden) {
    throw new SqlGuardError(`Comando não permitido na consulta: ${forbidden[1].toUpperCase()}.`);
  }
  return statement;
};

export const limitRows = (statement: string, rowLimit: number): string =>
  `SELECT * FROM (${statement}) AS agent_query LIMIT ${Math.max(1, Math.trunc(rowLimit))}`;

export const stripCodeFences = (output: string): string => {
  const fenced = /^\s*```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(output);
  return (fenced ? fenced[1] : output).trim();
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParseJson = (text: string): unknown => {
  if (!/^[[{]/.test(text)) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.log('QueryAgent', 'INFO', 'Saída final não é JSON; tratada como texto.', {
      error: error instanceof Error ? error.message : String(error),
    }, { scope: 'agent' });
    return undefined;
  }
};

const toChartData = (records: unknown[]): ChartDataPoint[] | null => {
  if (records.length === 0) return null;
  const points: ChartDataPoint[] = [];
  for (const record of records) {
    if (!isRecord(record)) return null;
    const values = Object.values(record);
    if (values.length < 2) return null;
    const parsed = parseNumeric(values[1]);
    if (parsed.issue) return null;
    points.push({ label: String(values[0]), value: parsed.value });
  }
  return points;
};

/**
 * Turns the model's final output into an answer. `{"graph_data": [...]}` or a bare array of
 * records becomes a chart: first column is the label, second the value.
 */
export const interpretAgentOutput = (output: string, question: string): AgentAnswer => {
  const body = stripCodeFences(output);
  const parsed = tryParseJson(body);
  const records = isRecord(parsed) && Array.isArray(parsed.graph_data)
    ? parsed.graph_data
    : Array.isArray(parsed) ? parsed : null;

  const data = records ? toChartData(records) : null;
  if (data) {
    return { kind: 'chart', title: `Visualização de Dados Fiscais: ${question}`, data };
  }
  return { kind: 'text', text: body };
};

type AgentStep = { action: 'query'; sql: string } | { action: 'answer'; answer: string };

export const parseAgentStep = (raw: string): AgentStep => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    throw new AgentOutputError(`Invalid JSON from model: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (isRecord(parsed)) {
    if (parsed.action === 'query' && typeof parsed.sql === 'string' && parsed.sql.trim() !== '') {
      return { action: 'query', sql: parsed.sql };
    }
    if (parsed.action === 'answer' && typeof parsed.answer === 'string') {
      return { action: 'answer', answer: parsed.answer };
    }
  }
  throw new AgentOutputError('Invalid JSON from model: expected an action of "query" or "answer".');
};

export const translateAgentError = (error: unknown): string => {
  if (error instanceof AgentIterationLimitError) {
    return (
      `O agente excedeu o número máximo de etapas permitidas (máximo ${error.iterations}) para processar esta consulta. ` +
      'Isso geralmente acontece quando a pergunta é muito complexa ou ambígua. ' +
      'Por favor, tente simplificar ou reformular sua pergunta.'
    );
  }
  if (error instanceof AgentOutputError) {
    return (
      'O agente gerou uma resposta inválida ou incompleta (formato JSON incorreto). ' +
      'Por favor, tente novamente.'
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return (
    'Ocorreu um erro inesperado ao executar sua análise fiscal. ' +
    `Erro original: ${message.slice(0, 100)}...`
  );
};

const agentStepSchema: ResponseSchema = {
  type: Type.OBJECT,
  properties: {
    action: { type: Type.STRING, enum: ['query', 'answer'], description: 'query para executar SQL, answer para responder.' },
    sql: { type: Type.STRING, description: 'Uma única consulta SELECT (PostgreSQL).' },
    answer: { type: Type.STRING, description: 'Resposta final em Markdown ou JSON com graph_data.' },
  },
  required: ['action'],
};

const buildSystemInstruction = (tableNames: string[], rowLimit: number) => `
Você é um consultor fiscal sênior especializado em dados de NF-e no Brasil.
Tabelas disponíveis (PostgreSQL): ${tableNames.join(', ')}.
Cabeçalhos: chave_de_acesso, numero, data_emissao, cnpj_emitente, razao_social_emitente, insc_estadual_emitente,
uf_emitente, cnpj_destinatario, nome_destinatario, uf_destinatario, valor_nota_fiscal, evento_recente,
natureza_da_operacao, ano_mes. Itens: chave_de_acesso, descricao_produto_servico, codigo_ncm_sh, cfop,
quantidade, valor_unitario, valor_total. Apoio: pis_cofins (imposto, valor, regra), icms (estado, sigla, aliquota),
ncm_tpi (ncm, descricao, aliquota).
Responda sempre com JSON: {"action": "query", "sql": "..."} para consultar ou {"action": "answer", "answer": "..."} para concluir.
Use apenas SELECT; resultados são limitados a ${rowLimit} linhas. Converta colunas de valor com CAST(coluna AS NUMERIC).
Se a consulta gerar erro, corrija-a e tente novamente.
Responda em português do Brasil, em Markdown, com valores em reais (R$ 1.234,56).
Se a pergunta pedir gráfico, ranking ou "top X", a resposta final deve ser apenas
{"graph_data": [{"categoria": "...", "valor": 0}]} com a categoria na primeira coluna e o valor na segunda.
Nunca invente dados que não estejam no banco.`;

const formatRows = (rows: QueryRow[]): string => (rows.length === 0 ? '(nenhuma linha)' : Papa.unparse(rows));

interface Observation {
  sql: string;
  result: string;
}

const buildPrompt = (question: string, memory: ConversationTurn[], observations: Observation[]) => {
  const parts: string[] = [];
  if (memory.length > 0) {
    parts.push('Histórico recente:');
    memory.forEach(turn => parts.push(`Usuário: ${turn.question}\nAgente: ${turn.answer}`));
  }
  parts.push(`Pergunta: ${question}`);
  observations.forEach((observation, index) => {
    parts.push(`Consulta ${index + 1}:\n${observation.sql}\nResultado:\n${observation.result}`);
  });
  return parts.join('\n\n');
};

const answerSummary = (answer: AgentAnswer) => (answer.kind === 'text' ? answer.text : answer.title);

export function createQueryAgent(deps: QueryAgentDeps): FiscalQueryAgent {
  const maxIterations = deps.maxIterations ?? 5;
  const memoryWindow = deps.memoryWindow ?? 5;
  const rowLimit = deps.rowLimit ?? 200;
  const systemInstruction = buildSystemInstruction(deps.tableNames, rowLimit);
  let memory: ConversationTurn[] = [];

  const observe = async (sql: string, correlationId?: string): Promise<string> => {
    try {
      const rows = await deps.runQuery(limitRows(assertReadOnlySql(sql), rowLimit));
      return formatRows(rows);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.log('QueryAgent', 'WARN', `Consulta do agente rejeitada ou falhou: ${message}`, { sql }, {
        correlationId,
        scope: 'agent',
      });
      return `ERRO: ${message}`;
    }
  };

  const solve = async (question: string, correlationId?: string): Promise<string> => {
    const observations: Observation[] = [];
    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      const raw = await deps.generate({
        systemInstruction,
        prompt: buildPrompt(question, memory, observations),
        schema: agentStepSchema,
        correlationId,
      });
      const step = parseAgentStep(raw);
      if (step.action === 'answer') {
        return step.answer;
      }
      observations.push({ sql: step.sql, result: await observe(step.sql, correlationId) });
    }
    throw new AgentIterationLimitError(maxIterations);
  };

  return {
    async ask(question, correlationId) {
      const trimmed = question.trim();
      try {
        const output = await measureExecution('agent', 'QueryAgent.ask', () => solve(trimmed, correlationId), {
          correlationId,
        });
        const answer = interpretAgentOutput(output, trimmed);
        memory = [...memory, { question: trimmed, answer: answerSummary(answer) }].slice(-memoryWindow);
        logger.log('QueryAgent', 'INFO', 'Pergunta respondida.', { kind: answer.kind }, { correlationId, scope: 'agent' });
        return answer;
      } catch (error) {
        logger.log('QueryAgent', 'ERROR', 'Falha ao responder pergunta.', {
          error: error instanceof Error ? error.message : String(error),
        }, { correlationId, scope: 'agent' });
        return { kind: 'text', text: translateAgentError(error) };
      }
    },
    history() {
      return [...memory];
    },
    reset() {
      memory = [];
    },
  };
}
