import { MomentumService } from '@core/momentum-service';
import { computeRunSummary } from '@core/metrics';
import { db, pool } from '@db/connection';
import { DrizzleReportSink } from '@db/reports';
import { runs } from '@db/schema/runs';
import { DrizzleCompletionTracker } from '@db/tracking';
import { DrizzleWorkQueue } from '@db/work-queue';
import { MomentumClient } from '@momentum-client/client';
import { loadWorkerConfig } from './config';
import { runToCompletion } from './lifecycle';
import { processWorkqueue } from './process';
import { populateQueue } from './queue';

async function main(argv: string[]): Promise<void> {
  const config = loadWorkerConfig();
  const queue = new DrizzleWorkQueue(db);
  const momentum = new MomentumClient(config.momentum);

  if (argv.includes('--queue')) {
    const cleared = await queue.clearWorkqueue('NEW');
    console.warn(`[WORKER] Cleared ${cleared} NEW items`);
    await populateQueue(queue, momentum);
    return;
  }

  const service = new MomentumService({
    directory: momentum,
    tracker: new DrizzleCompletionTracker(db),
    reporter: new DrizzleReportSink(db),
    caseworkerAlias: config.caseworkerAlias,
  });

  const result = await processWorkqueue(queue, momentum, service);
  const summary = computeRunSummary(result);
  await db.insert(runs).values({
    id: result.runId,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    summary,
  });

  console.warn(
    `[WORKER] Run ${result.runId}: ${summary.completed} completed, ${summary.failed} failed, ${summary.tasksRaised} tasks raised`,
  );
}

runToCompletion(
  () => main(process.argv.slice(2)),
  () => pool.end(),
).then((code) => {
  process.exitCode = code;
});
