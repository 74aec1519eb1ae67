import type { TrackingKind, WorkItemStatus } from '@shared/types';
import type {
  Caseworker,
  Citizen,
  CitizenSearchFilter,
  CitizenSearchResult,
  CreateTaskInput,
  ExemptionStatus,
  JobLogEntry,
  JobSearchDefinition,
} from './records';

/** Momentum citizen directory. Lookups resolve to null when the record does not exist. */
export interface CitizenDirectory {
  getCitizen(cpr: string): Promise<Citizen | null>;
  searchCitizens(filters: readonly CitizenSearchFilter[]): Promise<CitizenSearchResult | null>;
  getExemptionStatus(citizen: Citizen): Promise<ExemptionStatus | null>;
  getJobSearchDefinition(citizen: Citizen): Promise<JobSearchDefinition | null>;
  getJobLog(citizen: Citizen): Promise<JobLogEntry[] | null>;
  findCaseworker(alias: string): Promise<Caseworker | null>;
  createTask(input: CreateTaskInput): Promise<void>;
}

export interface ReportSink {
  report(reportId: string, group: string, payload: Record<string, unknown>): Promise<void>;
}

export interface CompletionTracker {
  trackTask(processName: string): Promise<void>;
  trackPartialTask(processName: string): Promise<void>;
}

export interface TrackingEntry {
  processName: string;
  kind: TrackingKind;
}

export interface WorkItem {
  id: string;
  reference: string;
  data: Record<string, unknown>;
  status: WorkItemStatus;
  message: string | null;
  updatedAt: Date;
}

export interface WorkQueue {
  getItemsByReference(reference: string, status?: WorkItemStatus): Promise<WorkItem[]>;
  addItem(data: Record<string, unknown>, reference: string): Promise<WorkItem>;
  clearWorkqueue(status: WorkItemStatus): Promise<number>;
  /** Moves the oldest NEW item to IN_PROGRESS and returns it. */
  claimNext(): Promise<WorkItem | null>;
  complete(id: string): Promise<void>;
  fail(id: string, message: string): Promise<void>;
  get(id: string): Promise<WorkItem | null>;
  list(status?: WorkItemStatus): Promise<WorkItem[]>;
  /** Puts an item back to NEW and clears its failure message. */
  requeue(id: string): Promise<void>;
}
