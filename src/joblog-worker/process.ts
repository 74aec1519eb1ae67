import { randomUUID } from 'crypto';
import { WorkItemError } from '@core/errors';
import type { ItemResult, RunResult } from '@core/metrics';
import type { MomentumService } from '@core/momentum-service';
import type { CitizenDirectory, WorkItem, WorkQueue } from '@core/ports';

async function processItem(
  item: WorkItem,
  directory: CitizenDirectory,
  service: MomentumService,
): Promise<ItemResult> {
  const citizen = await directory.getCitizen(item.reference);
  if (!citizen) {
    throw new WorkItemError(`Borger med CPR ${item.reference} ikke fundet i Momentum.`);
  }

  const audit = await service.auditCitizen(citizen);
  return {
    itemId: item.id,
    reference: item.reference,
    status: 'COMPLETED',
    outcome: audit.outcome.kind,
  };
}

/**
 * Drains the queue one citizen at a time. A failing citizen is marked FAILED
 * for manual review and the loop moves on.
 */
export async function processWorkqueue(
  queue: WorkQueue,
  directory: CitizenDirectory,
  service: MomentumService,
): Promise<RunResult> {
  const runId = randomUUID();
  const startedAt = new Date();
  const itemResults: ItemResult[] = [];

  for (let item = await queue.claimNext(); item; item = await queue.claimNext()) {
    try {
      const result = await processItem(item, directory, service);
      await queue.complete(item.id);
      itemResults.push(result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof WorkItemError) {
        console.error(`[WORKER] Error processing item: ${JSON.stringify(item.data)}. Error: ${message}`);
      } else {
        console.error(`[WORKER] Unexpected failure for item ${item.id}:`, err);
      }
      try {
        await queue.fail(item.id, message);
      } catch (failErr) {
        // The item stays IN_PROGRESS for an operator to requeue.
        console.error(`[WORKER] Could not mark item ${item.id} as failed:`, failErr);
      }
      itemResults.push({ itemId: item.id, reference: item.reference, status: 'FAILED', error: message });
    }
  }

  return { runId, startedAt, finishedAt: new Date(), itemResults };
}
