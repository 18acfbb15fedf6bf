import type { OperationType } from '../types';

interface StatePair {
  emitterState: string;
  recipientState: string;
}

/**
 * Internal when emitter and recipient share the same UF (exact, case-sensitive), interstate otherwise.
 */
export const classifyOperation = (emitterState: string, recipientState: string): OperationType =>
  emitterState === recipientState ? 'Interna' : 'Interestadual';

/**
 * Annotates each row with its operation type. Rows are copied, never mutated.
 */
export const runClassification = <T extends StatePair>(rows: readonly T[]): (T & { operationType: OperationType })[] =>
  rows.map(row => ({
    ...row,
    operationType: classifyOperation(row.emitterState, row.recipientState),
  }));
