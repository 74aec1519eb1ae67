import { z } from 'zod';

// Momentum sends timestamps as ISO strings; in-process callers may hand over Dates.
const timestampSchema = z.union([z.string(), z.date()]).nullish();

export const citizenSchema = z.object({
  id: z.string(),
  cpr: z.string(),
  name: z.string().nullish(),
});

export const exemptionStatusSchema = z.object({
  personExemptNames: z.array(z.string()).nullish(),
});

export const jobSearchDefinitionSchema = z.object({
  otherExpectations: z.string().nullish(),
});

export const jobLogEntrySchema = z.object({
  title: z.string().nullish(),
  companyName: z.string().nullish(),
  companyPostCode: z.string().nullish(),
  companyTown: z.string().nullish(),
  distanceToCompanyInMeters: z.union([z.number(), z.string()]).nullish(),
  submissionDate: timestampSchema,
  updatedAt: timestampSchema,
});

export const jobLogSchema = z.array(jobLogEntrySchema);

export const caseworkerSchema = z.object({
  id: z.string(),
  initials: z.string().nullish(),
  name: z.string().nullish(),
});

export const citizenSearchResultSchema = z.object({
  data: z.array(z.object({ cpr: z.string() })),
  totalCount: z.number().optional(),
});

export type Citizen = z.infer<typeof citizenSchema>;
export type ExemptionStatus = z.infer<typeof exemptionStatusSchema>;
export type JobSearchDefinition = z.infer<typeof jobSearchDefinitionSchema>;
export type JobLogEntry = z.infer<typeof jobLogEntrySchema>;
export type Caseworker = z.infer<typeof caseworkerSchema>;
export type CitizenSearchResult = z.infer<typeof citizenSearchResultSchema>;

export interface CitizenSearchFilter {
  customFilter: string;
  fieldName: string;
  values: readonly (string | null)[];
}

export interface CreateTaskInput {
  citizen: Citizen;
  assignees: Caseworker[];
  dueDate: Date;
  title: string;
  description: string;
}
