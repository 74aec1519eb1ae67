import { isInPeriod, parseLogTimestamp, type AuditPeriod } from './audit-period';
import type { JobLogEntry } from './records';

export function isWithinPeriod(entry: JobLogEntry, period: AuditPeriod): boolean {
  return (
    isInPeriod(parseLogTimestamp(entry.submissionDate), period) &&
    isInPeriod(parseLogTimestamp(entry.updatedAt), period)
  );
}

/**
 * Natural key of an application. Caseworkers re-save entries, so the same
 * application shows up with fresh timestamps; those share a key.
 */
export function activityKey(entry: JobLogEntry): string {
  return [
    entry.title,
    entry.companyName,
    entry.companyPostCode,
    entry.companyTown,
    entry.distanceToCompanyInMeters,
  ]
    .map((part) => (part === null || part === undefined ? '' : String(part)))
    .join(' ');
}

/** Entries inside the period, one per key; the first occurrence wins. */
export function distinctActivities(entries: JobLogEntry[], period: AuditPeriod): JobLogEntry[] {
  const unique = new Map<string, JobLogEntry>();
  for (const entry of entries) {
    if (!isWithinPeriod(entry, period)) continue;
    const key = activityKey(entry);
    if (!unique.has(key)) {
      unique.set(key, entry);
    }
  }
  return Array.from(unique.values());
}

export function countDistinctActivities(entries: JobLogEntry[], period: AuditPeriod): number {
  return distinctActivities(entries, period).length;
}
