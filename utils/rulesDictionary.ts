import type { AuditRule } from '../types';

export const AUDIT_RULES = {
    VALOR_CABECALHO_DIVERGENTE: {
        code: 'VAL-ERR-01',
        message: 'Valor da nota difere da soma dos itens.',
        explanation: 'O valor total declarado no cabeçalho da NF-e diverge em mais de R$ 0,01 da soma do valor total dos itens. Isso pode indicar itens não importados, descontos ou frete não informados, ou erro de digitação.',
        severity: 'ERRO',
    },
    CHAVE_ACESSO_DUPLICADA: {
        code: 'KEY-ERR-01',
        message: 'Chave de acesso presente em mais de um documento.',
        explanation: 'A chave de acesso identifica unicamente uma NF-e. A repetição indica carga em duplicidade do mesmo período ou documentos distintos com a mesma chave, o que distorce faturamento e impostos.',
        severity: 'ERRO',
    },
    IE_EMITENTE_AUSENTE: {
        code: 'IE-WARN-01',
        message: 'Nota emitida sem Inscrição Estadual do emitente.',
        explanation: 'A Inscrição Estadual do emitente está vazia ou zerada. Contribuintes do ICMS devem informá-la; a ausência pode indicar emitente não contribuinte ou falha de cadastro.',
        severity: 'ALERTA',
    },
    CNPJ_DESTINATARIO_MULTIPLAS_UF: {
        code: 'UF-WARN-01',
        message: 'CNPJ destinatário associado a mais de uma UF.',
        explanation: 'O mesmo CNPJ de destinatário aparece com UFs diferentes. Pode haver filiais cadastradas com o CNPJ da matriz ou erro no endereço, com risco de Inscrição Estadual incorreta e alíquota de ICMS errada.',
        severity: 'ALERTA',
    },
} satisfies Record<string, AuditRule>;
