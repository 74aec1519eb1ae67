import type { ComplianceOutcomeKind, RunSummaryRecord } from '@shared/types';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface ItemResult {
  itemId: string;
  reference: string;
  status: 'COMPLETED' | 'FAILED';
  outcome?: ComplianceOutcomeKind;
  error?: string;
}

export interface RunResult {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  itemResults: ItemResult[];
}

export type RunSummary = RunSummaryRecord;

const TASK_OUTCOMES: ReadonlySet<ComplianceOutcomeKind> = new Set([
  'RequirementNotFound',
  'RequirementIndeterminate',
  'NoActivityRegistered',
  'InsufficientActivity',
]);

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

export function computeRunSummary(result: RunResult): RunSummary {
  const byOutcome: RunSummary['byOutcome'] = {};
  const errors: RunSummary['errors'] = [];
  let completed = 0;
  let failed = 0;
  let tasksRaised = 0;

  for (const item of result.itemResults) {
    if (item.status === 'FAILED') {
      failed += 1;
      errors.push({ reference: item.reference, error: item.error ?? 'Unknown error' });
      continue;
    }

    completed += 1;
    if (item.outcome) {
      byOutcome[item.outcome] = (byOutcome[item.outcome] ?? 0) + 1;
      if (TASK_OUTCOMES.has(item.outcome)) tasksRaised += 1;
    }
  }

  return {
    totalItems: result.itemResults.length,
    completed,
    failed,
    byOutcome,
    tasksRaised,
    errors,
  };
}
