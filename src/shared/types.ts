import type { COMPLIANCE_OUTCOMES, TRACKING_KINDS, WORK_ITEM_STATUSES } from './constants';

export type WorkItemStatus = (typeof WORK_ITEM_STATUSES)[number];
export type ComplianceOutcomeKind = (typeof COMPLIANCE_OUTCOMES)[number];
export type TrackingKind = (typeof TRACKING_KINDS)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface RunSummaryRecord {
  totalItems: number;
  completed: number;
  failed: number;
  byOutcome: Partial<Record<ComplianceOutcomeKind, number>>;
  tasksRaised: number;
  errors: { reference: string; error: string }[];
}
