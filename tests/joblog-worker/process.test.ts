import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MomentumService } from '@core/momentum-service';
import { processWorkqueue } from '@worker/process';
import {
  FakeDirectory,
  FakeReportSink,
  FakeTracker,
  InMemoryWorkQueue,
  citizenFixture,
} from '../helpers/fakes';

const NOW = new Date('2026-10-18T09:30:00Z');

function setup(directory: FakeDirectory) {
  const tracker = new FakeTracker();
  const service = new MomentumService({
    directory,
    tracker,
    reporter: new FakeReportSink(),
    clock: () => NOW,
    exemptionRetry: { sleep: async () => {} },
  });
  return { service, tracker };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('processWorkqueue', () => {
  it('audits every queued citizen and completes the items', async () => {
    const directory = new FakeDirectory({
      'cpr-exempt': citizenFixture({ exemption: { personExemptNames: ['Brug af Joblog'] } }),
      'cpr-lazy': citizenFixture({ definition: { otherExpectations: '3 job' }, jobLog: [] }),
      'cpr-zero': citizenFixture({ definition: { otherExpectations: '0 job' } }),
    });
    const { service, tracker } = setup(directory);
    const queue = new InMemoryWorkQueue();
    for (const reference of ['cpr-exempt', 'cpr-lazy', 'cpr-zero']) {
      queue.seed({ reference });
    }

    const result = await processWorkqueue(queue, directory, service);

    expect(result.itemResults.map((r) => [r.reference, r.status, r.outcome])).toEqual([
      ['cpr-exempt', 'COMPLETED', 'Exempt'],
      ['cpr-lazy', 'COMPLETED', 'NoActivityRegistered'],
      ['cpr-zero', 'COMPLETED', 'RequirementZero'],
    ]);
    expect(queue.items.map((i) => i.status)).toEqual(['COMPLETED', 'COMPLETED', 'COMPLETED']);
    expect(tracker.entries.map((e) => e.kind)).toEqual(['partial', 'full', 'partial']);
    expect(directory.tasks).toHaveLength(1);
  });

  it('fails an unknown citizen and carries on with the next', async () => {
    const directory = new FakeDirectory({ 'cpr-known': citizenFixture() });
    const { service } = setup(directory);
    const queue = new InMemoryWorkQueue();
    const missing = queue.seed({ reference: 'cpr-missing' });
    queue.seed({ reference: 'cpr-known' });

    const result = await processWorkqueue(queue, directory, service);

    expect(await queue.get(missing.id)).toMatchObject({
      status: 'FAILED',
      message: 'Borger med CPR cpr-missing ikke fundet i Momentum.',
    });
    expect(result.itemResults.map((r) => r.status)).toEqual(['FAILED', 'COMPLETED']);
    expect(console.error).toHaveBeenCalledWith(
      '[WORKER] Error processing item: {"cpr":"cpr-missing"}. Error: Borger med CPR cpr-missing ikke fundet i Momentum.',
    );
  });

  it('fails items on unexpected errors without stopping the run', async () => {
    const directory = new FakeDirectory({
      'cpr-1': citizenFixture(),
      'cpr-2': citizenFixture({ exemption: { personExemptNames: ['Brug af Joblog'] } }),
    });
    directory.jobLogFailure = new Error('connection reset');
    const { service } = setup(directory);
    const queue = new InMemoryWorkQueue();
    queue.seed({ reference: 'cpr-1' });
    queue.seed({ reference: 'cpr-2' });

    const result = await processWorkqueue(queue, directory, service);

    expect(result.itemResults).toEqual([
      { itemId: queue.items[0].id, reference: 'cpr-1', status: 'FAILED', error: 'connection reset' },
      { itemId: queue.items[1].id, reference: 'cpr-2', status: 'COMPLETED', outcome: 'Exempt' },
    ]);
    expect(queue.items[0].message).toBe('connection reset');
  });

  it('keeps draining when an item cannot be marked as failed', async () => {
    const directory = new FakeDirectory({
      'cpr-2': citizenFixture({ exemption: { personExemptNames: ['Brug af Joblog'] } }),
    });
    const { service } = setup(directory);
    const queue = new InMemoryWorkQueue();
    queue.seed({ reference: 'cpr-missing' });
    queue.seed({ reference: 'cpr-2' });
    vi.spyOn(queue, 'fail').mockRejectedValueOnce(new Error('database unavailable'));

    const result = await processWorkqueue(queue, directory, service);

    expect(result.itemResults.map((r) => [r.reference, r.status])).toEqual([
      ['cpr-missing', 'FAILED'],
      ['cpr-2', 'COMPLETED'],
    ]);
    expect(queue.items.map((i) => i.status)).toEqual(['IN_PROGRESS', 'COMPLETED']);
  });

  it('returns an empty result for an empty queue', async () => {
    const directory = new FakeDirectory();
    const { service } = setup(directory);

    const result = await processWorkqueue(new InMemoryWorkQueue(), directory, service);

    expect(result.itemResults).toEqual([]);
    expect(result.runId).toBeTruthy();
  });
});
