import { DESCRIPTIONS } from '@shared/constants';
import type { RequirementResolution } from './requirement';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RemediationOutcome =
  | { kind: 'RequirementNotFound'; description: string }
  | { kind: 'RequirementIndeterminate'; description: string }
  | { kind: 'NoActivityRegistered'; description: string }
  | { kind: 'InsufficientActivity'; description: string };

export type ComplianceOutcome =
  | RemediationOutcome
  | { kind: 'Exempt' }
  | { kind: 'RequirementZero' }
  | { kind: 'Compliant' };

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/**
 * Compares the activity count with the quota. The two shortfall outcomes
 * carry different task texts even though the first is a special case of the
 * second.
 */
export function decideCompliance(requirement: number, activityCount: number): ComplianceOutcome {
  if (requirement > 0 && activityCount === 0) {
    return { kind: 'NoActivityRegistered', description: DESCRIPTIONS.NO_ACTIVITY };
  }
  if (activityCount < requirement) {
    return { kind: 'InsufficientActivity', description: DESCRIPTIONS.INSUFFICIENT_ACTIVITY };
  }
  return { kind: 'Compliant' };
}

export type StoppingResolution = Exclude<RequirementResolution, { kind: 'quota' }>;

/** Terminal outcome for a requirement that ends the audit before counting. */
export function outcomeForResolution(resolution: StoppingResolution): ComplianceOutcome {
  switch (resolution.kind) {
    case 'not_found':
      return { kind: 'RequirementNotFound', description: DESCRIPTIONS.REQUIREMENT_NOT_FOUND };
    case 'indeterminate':
      return {
        kind: 'RequirementIndeterminate',
        description: DESCRIPTIONS.REQUIREMENT_INDETERMINATE,
      };
    case 'zero':
      return { kind: 'RequirementZero' };
  }
}

export function raisesTask(outcome: ComplianceOutcome): outcome is RemediationOutcome {
  return 'description' in outcome;
}
