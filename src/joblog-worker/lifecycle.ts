/**
 * Runs the worker task, then closes its resources exactly once. Resolves to
 * the process exit code; never rejects.
 */
export async function runToCompletion(
  task: () => Promise<void>,
  close: () => Promise<void>,
): Promise<number> {
  let exitCode = 0;

  try {
    await task();
  } catch (err) {
    console.error('[WORKER] Fatal:', err);
    exitCode = 1;
  }

  try {
    await close();
  } catch (err) {
    console.error('[WORKER] Could not close the database pool:', err);
    exitCode = 1;
  }

  return exitCode;
}
