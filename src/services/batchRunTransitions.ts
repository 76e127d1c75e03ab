export type BatchRunState =
  | 'idle'
  | 'loading'
  | 'generating'
  | 'aggregating'
  | 'writing'
  | 'done'
  | 'failed';

const ALLOWED_TRANSITIONS: Record<BatchRunState, readonly BatchRunState[]> = {
  idle: ['loading'],
  loading: ['generating', 'failed'],
  generating: ['aggregating', 'failed'],
  aggregating: ['writing', 'failed'],
  writing: ['done', 'failed'],
  done: [],
  failed: [],
};

export function canTransition(from: BatchRunState, to: BatchRunState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: BatchRunState, to: BatchRunState): BatchRunState {
  if (!canTransition(from, to)) {
    throw new Error(`Illegal batch run transition: ${from} -> ${to}`);
  }
  return to;
}

export const isTerminalState = (state: BatchRunState): boolean =>
  ALLOWED_TRANSITIONS[state].length === 0;

export const formatPatientId = (index: number): string =>
  `PAT_${String(index).padStart(4, '0')}`;
