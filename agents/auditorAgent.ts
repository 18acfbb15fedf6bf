import type {
  AuditCheckResult,
  AuditFindings,
  AuditRule,
  AuditStatus,
  DuplicateKeyRow,
  EnrichedHeader,
  EnrichedItem,
  MissingRegistrationRow,
  MultiStateRecipientRow,
  NumericInput,
  ValueMismatch,
} from '../types';
import { AUDIT_RULES } from '../utils/rulesDictionary';
import { parseNumeric } from '../utils/parsingUtils';

/** Absolute tolerance, in reais, between the declared total and the sum of the items. */
export const VALUE_TOLERANCE = 0.01;

type Rows<T> = readonly T[] | null | undefined;

const byText = <T>(keyOf: (row: T) => string) => (a: T, b: T): number => {
  const left = keyOf(a);
  const right = keyOf(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

const checkResult = <Row>(rule: AuditRule, rows: Row[], count: number = rows.length): AuditCheckResult<Row> => ({
  rule,
  rows,
  count,
});

/**
 * Flags every header whose declared value differs from the sum of its items by more than R$ 0,01.
 * Headers without items are compared against 0.
 */
export const findValueMismatches = (
  headers: Rows<Pick<EnrichedHeader, 'accessKey' | 'number' | 'declaredTotalValue'>>,
  items: Rows<Pick<EnrichedItem, 'accessKey' | 'totalValue'>>,
): AuditCheckResult<ValueMismatch> => {
  const itemTotals = new Map<string, number>();
  for (const item of items ?? []) {
    itemTotals.set(item.accessKey, (itemTotals.get(item.accessKey) ?? 0) + item.totalValue);
  }

  const rows: ValueMismatch[] = [];
  for (const header of headers ?? []) {
    const itemsValue = itemTotals.get(header.accessKey) ?? 0;
    const difference = Math.abs(header.declaredTotalValue - itemsValue);
    if (difference > VALUE_TOLERANCE) {
      rows.push({
        accessKey: header.accessKey,
        number: header.number,
        declaredValue: header.declaredTotalValue,
        itemsValue,
        difference,
      });
    }
  }
  return checkResult(AUDIT_RULES.VALOR_CABECALHO_DIVERGENTE, rows);
};

/**
 * Every row whose access key appears more than once, ordered by key. `count` is the number of distinct repeated keys.
 */
export const findDuplicateAccessKeys = (
  headers: Rows<Pick<EnrichedHeader, 'accessKey' | 'number' | 'emitterName'>>,
): AuditCheckResult<DuplicateKeyRow> => {
  const occurrences = new Map<string, number>();
  for (const header of headers ?? []) {
    occurrences.set(header.accessKey, (occurrences.get(header.accessKey) ?? 0) + 1);
  }

  const rows = (headers ?? [])
    .filter(header => (occurrences.get(header.accessKey) ?? 0) > 1)
    .map(({ accessKey, number, emitterName }) => ({ accessKey, number, emitterName }))
    .sort(byText(row => row.accessKey));

  const distinctKeys = new Set(rows.map(row => row.accessKey)).size;
  return checkResult(AUDIT_RULES.CHAVE_ACESSO_DUPLICADA, rows, distinctKeys);
};

/** Null, blank and numerically zero registrations count as absent; free text such as "ISENTO" does not. */
export const isRegistrationMissing = (registration: NumericInput): boolean => {
  const parsed = parseNumeric(registration);
  if (parsed.issue === 'missing') return true;
  return parsed.issue === undefined && parsed.value === 0;
};

export const findMissingEmitterRegistration = (
  headers: Rows<Pick<EnrichedHeader, 'number' | 'emitterName' | 'emitterState' | 'emitterRegistrationId'>>,
): AuditCheckResult<MissingRegistrationRow> => {
  const rows = (headers ?? [])
    .filter(header => isRegistrationMissing(header.emitterRegistrationId))
    .map(({ number, emitterName, emitterState }) => ({ number, emitterName, emitterState }));
  return checkResult(AUDIT_RULES.IE_EMITENTE_AUSENTE, rows);
};

/**
 * Recipient tax IDs seen with more than one UF. Rows of every flagged ID are returned ordered by tax ID;
 * `count` is the number of flagged IDs. Blank tax IDs and blank states are not grouped.
 */
export const findMultiStateRecipients = (
  headers: Rows<Pick<EnrichedHeader, 'recipientTaxId' | 'recipientName' | 'recipientState'>>,
): AuditCheckResult<MultiStateRecipientRow> => {
  const statesByTaxId = new Map<string, Set<string>>();
  for (const header of headers ?? []) {
    if (!header.recipientTaxId) continue;
    const states = statesByTaxId.get(header.recipientTaxId) ?? new Set<string>();
    if (header.recipientState) states.add(header.recipientState);
    statesByTaxId.set(header.recipientTaxId, states);
  }

  const flagged = new Set(
    Array.from(statesByTaxId.entries())
      .filter(([, states]) => states.size > 1)
      .map(([taxId]) => taxId),
  );

  const rows = (headers ?? [])
    .filter(header => flagged.has(header.recipientTaxId))
    .map(({ recipientTaxId, recipientName, recipientState }) => ({ recipientTaxId, recipientName, recipientState }))
    .sort(byText(row => row.recipientTaxId));

  return checkResult(AUDIT_RULES.CNPJ_DESTINATARIO_MULTIPLAS_UF, rows, flagged.size);
};

const deriveStatus = (results: AuditCheckResult<unknown>[]): AuditStatus => {
  const triggered = results.filter(result => result.count > 0);
  if (triggered.some(result => result.rule.severity === 'ERRO')) return 'ERRO';
  if (triggered.some(result => result.rule.severity === 'ALERTA')) return 'ALERTA';
  return 'OK';
};

/**
 * Runs the four consistency checks over the enriched tables. Findings are advisory data;
 * nothing here throws, and absent tables produce empty results.
 */
export const runAudit = (headers: Rows<EnrichedHeader>, items: Rows<EnrichedItem>): AuditFindings => {
  const valueMismatches = findValueMismatches(headers, items);
  const duplicateAccessKeys = findDuplicateAccessKeys(headers);
  const missingEmitterRegistration = findMissingEmitterRegistration(headers);
  const multiStateRecipients = findMultiStateRecipients(headers);

  return {
    status: deriveStatus([valueMismatches, duplicateAccessKeys, missingEmitterRegistration, multiStateRecipients]),
    valueMismatches,
    duplicateAccessKeys,
    missingEmitterRegistration,
    multiStateRecipients,
  };
};
