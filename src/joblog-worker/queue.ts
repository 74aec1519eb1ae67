import { startOfMonthUtc } from '@core/audit-period';
import type { CitizenDirectory, WorkQueue } from '@core/ports';
import { CITIZEN_SEARCH_FILTERS } from '@shared/constants';

export interface PopulateResult {
  found: number;
  added: number;
  skipped: number;
}

/**
 * Adds one work item per citizen in the target group, unless the citizen was
 * already audited (COMPLETED) this calendar month.
 */
export async function populateQueue(
  queue: WorkQueue,
  directory: CitizenDirectory,
  now: Date = new Date(),
): Promise<PopulateResult> {
  const result = await directory.searchCitizens(CITIZEN_SEARCH_FILTERS);
  if (!result || result.data.length === 0) {
    console.warn('[QUEUE] No citizens matched the search filters');
    return { found: 0, added: 0, skipped: 0 };
  }

  const monthStart = startOfMonthUtc(now).getTime();
  let added = 0;
  let skipped = 0;

  for (const { cpr } of result.data) {
    const reference = String(cpr);
    const completed = await queue.getItemsByReference(reference, 'COMPLETED');
    const auditedThisMonth = completed.some((item) => item.updatedAt.getTime() > monthStart);

    if (auditedThisMonth) {
      skipped += 1;
      continue;
    }

    await queue.addItem({ cpr }, reference);
    added += 1;
  }

  console.warn(`[QUEUE] ${result.data.length} citizens found, ${added} added, ${skipped} already audited`);
  return { found: result.data.length, added, skipped };
}
