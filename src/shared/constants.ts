export const API_PREFIX = '/api';

export const PROCESS_NAME = 'Kontrol af joblog';
export const REPORT_ID = 'kontrol_af_joblog';
export const TASK_TITLE = 'Kontrol af joblog';
export const DEFAULT_CASEWORKER_ALIAS = 'dorf';
export const TASK_DUE_IN_DAYS = 7;

export const JOBLOG_EXEMPTION = 'Brug af Joblog';

export const REPORT_GROUPS = {
  MANUAL: 'Manuel behandling',
  HANDLED: 'Behandlet',
} as const;

export const WORK_ITEM_STATUSES = [
  'NEW',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
] as const;

export const COMPLIANCE_OUTCOMES = [
  'Exempt',
  'RequirementNotFound',
  'RequirementIndeterminate',
  'RequirementZero',
  'NoActivityRegistered',
  'InsufficientActivity',
  'Compliant',
] as const;

export const TRACKING_KINDS = ['full', 'partial'] as const;

// Texts land verbatim in caseworker tasks and the audit report.
export const DESCRIPTIONS = {
  EXEMPT: 'Der skal ikke tjekkes mere, da borger er fritaget for brug af joblog.',
  REQUIREMENT_NOT_FOUND: "'Krav til jobsøgning' blev ikke fundet.",
  REQUIREMENT_INDETERMINATE:
    "Der mangler oplysninger om antallet af jobs i 'Krav til jobsøgning'.",
  NO_ACTIVITY: 'Der var ikke registreret nogen jobs i joblog.',
  INSUFFICIENT_ACTIVITY: 'Der er registreret for få job i joblog.',
} as const;

export const TASK_ACTION_LABEL = 'Opgave til sagsbehandler';

export const CITIZEN_SEARCH_FILTERS = [
  {
    customFilter: '',
    fieldName: 'targetGroupCode',
    values: ['INT-KP', '6.2'],
  },
  {
    customFilter: '',
    fieldName: 'primaryCaseworkerTeamId',
    values: [
      '',
      'b345ab13-e8b8-409f-b87b-6925268472de',
      '80180c8c-5863-40ae-a85b-e14d33597e6a',
      'c58e4d9f-af8e-4553-a3d0-c2b102cc33c2',
    ],
  },
  {
    customFilter: 'exclude',
    fieldName: 'absences',
    values: [null, null, null, null, '', 'ABSENCE_BARSEL', 'ABSENCE_FRITAGELSE_FOR_JOBLOG'],
  },
] as const;
