import {
  DEFAULT_CASEWORKER_ALIAS,
  DESCRIPTIONS,
  JOBLOG_EXEMPTION,
  PROCESS_NAME,
  REPORT_GROUPS,
  REPORT_ID,
  TASK_ACTION_LABEL,
  TASK_DUE_IN_DAYS,
  TASK_TITLE,
} from '@shared/constants';
import { countDistinctActivities } from './activity';
import { computeAuditPeriod } from './audit-period';
import {
  decideCompliance,
  outcomeForResolution,
  raisesTask,
  type ComplianceOutcome,
  type RemediationOutcome,
} from './compliance';
import { WorkItemError, isTransientHttpError } from './errors';
import type { CitizenDirectory, CompletionTracker, ReportSink } from './ports';
import type { Citizen } from './records';
import { parseRequirement, type RequirementResolution } from './requirement';
import { withRetry, type RetryOptions } from './retry';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface MomentumServiceOptions {
  directory: CitizenDirectory;
  tracker: CompletionTracker;
  reporter: ReportSink;
  caseworkerAlias?: string;
  clock?: () => Date;
  exemptionRetry?: Partial<RetryOptions>;
}

export interface AuditResult {
  cpr: string;
  outcome: ComplianceOutcome;
  requirement?: number;
  activityCount?: number;
}

const EXEMPTION_RETRY: RetryOptions = {
  attempts: 10,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  isRetryable: isTransientHttpError,
};

const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

/**
 * Job-log compliance rules for one citizen at a time. Each public step
 * performs its own Momentum lookups and side effects (tasks, reports,
 * completion tracking); `auditCitizen` chains them with the short-circuits.
 */
export class MomentumService {
  private readonly directory: CitizenDirectory;
  private readonly tracker: CompletionTracker;
  private readonly reporter: ReportSink;
  private readonly caseworkerAlias: string;
  private readonly clock: () => Date;
  private readonly exemptionRetry: RetryOptions;

  constructor(options: MomentumServiceOptions) {
    this.directory = options.directory;
    this.tracker = options.tracker;
    this.reporter = options.reporter;
    this.caseworkerAlias = options.caseworkerAlias ?? DEFAULT_CASEWORKER_ALIAS;
    this.clock = options.clock ?? (() => new Date());
    this.exemptionRetry = { ...EXEMPTION_RETRY, ...options.exemptionRetry };
  }

  async createTask(citizen: Citizen, description: string): Promise<void> {
    const caseworker = await this.directory.findCaseworker(this.caseworkerAlias);
    if (!caseworker) {
      throw new WorkItemError(`Sagsbehandler '${this.caseworkerAlias}' ikke fundet i Momentum.`);
    }

    await this.directory.createTask({
      citizen,
      assignees: [caseworker],
      dueDate: new Date(this.clock().getTime() + TASK_DUE_IN_DAYS * DAY_MS),
      title: TASK_TITLE,
      description,
    });
  }

  async isExempt(citizen: Citizen): Promise<boolean> {
    const status = await withRetry(
      `exemption status ${citizen.id}`,
      () => this.directory.getExemptionStatus(citizen),
      this.exemptionRetry,
    );

    if (!status) {
      throw new WorkItemError(
        `Personvisitationstatus for borger med CPR ${citizen.cpr} ikke fundet i Momentum.`,
      );
    }

    if (!status.personExemptNames?.includes(JOBLOG_EXEMPTION)) {
      return false;
    }

    await this.report(REPORT_GROUPS.MANUAL, {
      Cpr: citizen.cpr,
      'Manuel beskrivelse': DESCRIPTIONS.EXEMPT,
    });
    await this.tracker.trackPartialTask(PROCESS_NAME);
    return true;
  }

  async resolveRequirement(citizen: Citizen): Promise<RequirementResolution> {
    const definition = await this.directory.getJobSearchDefinition(citizen);
    if (!definition) {
      throw new WorkItemError(
        `Jobsøgningsdefinition for borger med CPR ${citizen.cpr} ikke fundet i Momentum.`,
      );
    }

    const resolution = parseRequirement(definition.otherExpectations);
    if (resolution.kind === 'quota') {
      return resolution;
    }

    const outcome = outcomeForResolution(resolution);
    if (raisesTask(outcome)) {
      await this.remediate(citizen, outcome);
    } else {
      await this.tracker.trackPartialTask(PROCESS_NAME);
    }
    return resolution;
  }

  async countPriorMonthActivities(citizen: Citizen): Promise<number> {
    const jobLog = await this.directory.getJobLog(citizen);
    if (jobLog === null) {
      throw new WorkItemError(`Joblog for borger med CPR ${citizen.cpr} ikke fundet i Momentum.`);
    }

    return countDistinctActivities(jobLog, computeAuditPeriod(this.clock()));
  }

  async evaluate(
    citizen: Citizen,
    requirement: number,
    activityCount: number,
  ): Promise<ComplianceOutcome> {
    const outcome = decideCompliance(requirement, activityCount);
    if (raisesTask(outcome)) {
      await this.remediate(citizen, outcome);
    }
    return outcome;
  }

  async auditCitizen(citizen: Citizen): Promise<AuditResult> {
    if (await this.isExempt(citizen)) {
      return { cpr: citizen.cpr, outcome: { kind: 'Exempt' } };
    }

    const resolution = await this.resolveRequirement(citizen);
    if (resolution.kind !== 'quota') {
      return { cpr: citizen.cpr, outcome: outcomeForResolution(resolution) };
    }

    const activityCount = await this.countPriorMonthActivities(citizen);
    const outcome = await this.evaluate(citizen, resolution.quota, activityCount);
    return { cpr: citizen.cpr, outcome, requirement: resolution.quota, activityCount };
  }

  // -------------------------------------------------------------------------
  // Side effects
  // -------------------------------------------------------------------------

  private async remediate(citizen: Citizen, outcome: RemediationOutcome): Promise<void> {
    await this.createTask(citizen, outcome.description);
    await this.report(REPORT_GROUPS.HANDLED, {
      Cpr: citizen.cpr,
      'Udført': TASK_ACTION_LABEL,
      Beskrivelse: outcome.description,
    });
    await this.tracker.trackTask(PROCESS_NAME);
  }

  private async report(group: string, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.reporter.report(REPORT_ID, group, payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[REPORT] ${REPORT_ID}/${group} not delivered: ${message}`);
    }
  }
}
