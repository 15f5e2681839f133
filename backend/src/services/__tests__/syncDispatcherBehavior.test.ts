import assert from 'node:assert/strict';
import { createSyncDispatcher } from '../syncDispatcher.js';
import type { DispatcherConfig } from '../syncDispatcher.js';
import type { SyncOrchestrator } from '../syncOrchestrator.js';
import type { SyncTaskBackend } from '../queue.js';
import {
  MemoryStatusTracker,
  MemoryUserStore,
  RecordingLogger,
  finish,
  makeUser,
  test,
} from './support/memoryStores.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const queueConfig: DispatcherConfig = { backend: 'queue', staggerSeconds: 30, statusRetentionDays: 7 };
const inlineConfig: DispatcherConfig = { backend: 'inline', staggerSeconds: 30, statusRetentionDays: 7 };

const fiveUsers = () => new MemoryUserStore(['u1', 'u2', 'u3', 'u4', 'u5'].map((id) => makeUser(id)));

class RecordingBackend implements SyncTaskBackend {
  readonly calls: Array<{ userId: string; runAt: Date | undefined }> = [];

  constructor(private readonly failFor: string[] = []) {}

  async enqueueUserSync(userId: string, options: { runAt?: Date } = {}) {
    if (this.failFor.includes(userId)) {
      throw new Error('queue unavailable');
    }
    this.calls.push({ userId, runAt: options.runAt });
    return { id: `job-${this.calls.length}`, runAt: options.runAt ?? NOW };
  }
}

const recordingOrchestrator = () => {
  const runs: string[] = [];
  const orchestrator: SyncOrchestrator = {
    async runUserSync(userId) {
      runs.push(userId);
      return { userId, status: 'completed', emailsSynced: 1, labelsSynced: 0 };
    },
  };
  return { runs, orchestrator };
};

await test('staggers queued syncs thirty seconds apart', async () => {
  const backend = new RecordingBackend();
  const { orchestrator, runs } = recordingOrchestrator();
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses: new MemoryStatusTracker(),
    orchestrator,
    taskBackend: backend,
    config: queueConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });

  const summary = await dispatcher.scheduleAllActive();

  assert.deepEqual(summary.scheduled.map((outcome) => outcome.delaySeconds), [0, 30, 60, 90, 120]);
  assert.deepEqual(
    backend.calls.map((call) => call.runAt?.toISOString() ?? null),
    [
      null,
      '2026-03-01T12:00:30.000Z',
      '2026-03-01T12:01:00.000Z',
      '2026-03-01T12:01:30.000Z',
      '2026-03-01T12:02:00.000Z',
    ],
  );
  assert.deepEqual(summary.scheduled[1], {
    userId: 'u2',
    mode: 'queued',
    delaySeconds: 30,
    jobId: 'job-2',
    runAt: '2026-03-01T12:00:30.000Z',
  });
  assert.deepEqual(summary.failed, []);
  assert.deepEqual(runs, []);
});

await test('queued users read as pending until their sync starts', async () => {
  const statuses = new MemoryStatusTracker(() => NOW);
  await statuses.update('u2', 'completed', { emailsSynced: 8 });
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses,
    orchestrator: recordingOrchestrator().orchestrator,
    taskBackend: new RecordingBackend(['u3']),
    config: queueConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });

  await dispatcher.schedule('u1');
  await dispatcher.schedule('u2');
  await assert.rejects(dispatcher.schedule('u3'), /queue unavailable/);

  assert.deepEqual(await statuses.read('u1'), { userId: 'u1', status: 'pending', lastSync: null, emailsSynced: 0 });
  assert.equal((await statuses.read('u2')).status, 'completed');
  assert.deepEqual(await statuses.read('u3'), { userId: 'u3', status: 'never_synced' });
});

await test('an enqueue failure is recorded and the remaining users are still scheduled', async () => {
  const backend = new RecordingBackend(['u2']);
  const logger = new RecordingLogger();
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses: new MemoryStatusTracker(),
    orchestrator: recordingOrchestrator().orchestrator,
    taskBackend: backend,
    config: queueConfig,
    logger,
    now: () => NOW,
  });

  const summary = await dispatcher.scheduleAllActive();

  assert.deepEqual(summary.failed, [{ userId: 'u2', error: 'queue unavailable' }]);
  assert.deepEqual(backend.calls.map((call) => call.userId), ['u1', 'u3', 'u4', 'u5']);
  assert.deepEqual(summary.scheduled.map((outcome) => outcome.delaySeconds), [0, 60, 90, 120]);
  assert.deepEqual(logger.messages('error'), ['failed to schedule user sync']);
});

await test('skips inactive users and users without tokens', async () => {
  const backend = new RecordingBackend();
  const users = new MemoryUserStore([
    makeUser('u1'),
    makeUser('u2', { isActive: false }),
    makeUser('u3', { accessToken: null }),
    makeUser('u4'),
  ]);
  const dispatcher = createSyncDispatcher({
    users,
    statuses: new MemoryStatusTracker(),
    orchestrator: recordingOrchestrator().orchestrator,
    taskBackend: backend,
    config: queueConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });

  await dispatcher.scheduleAllActive();

  assert.deepEqual(backend.calls.map((call) => call.userId), ['u1', 'u4']);
});

await test('inline mode runs syncs in-process and ignores any backend', async () => {
  const backend = new RecordingBackend();
  const { orchestrator, runs } = recordingOrchestrator();
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses: new MemoryStatusTracker(),
    orchestrator,
    taskBackend: backend,
    config: inlineConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });

  const single = await dispatcher.schedule('u3', 45);
  assert.deepEqual(single, {
    userId: 'u3',
    mode: 'inline',
    delaySeconds: 45,
    result: { userId: 'u3', status: 'completed', emailsSynced: 1, labelsSynced: 0 },
  });

  const summary = await dispatcher.scheduleAllActive();
  assert.equal(dispatcher.mode, 'inline');
  assert.equal(summary.scheduled.length, 5);
  assert.deepEqual(runs, ['u3', 'u1', 'u2', 'u3', 'u4', 'u5']);
  assert.deepEqual(backend.calls, []);
});

await test('negative and fractional delays are normalized', async () => {
  const backend = new RecordingBackend();
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses: new MemoryStatusTracker(),
    orchestrator: recordingOrchestrator().orchestrator,
    taskBackend: backend,
    config: queueConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });

  const immediate = await dispatcher.schedule('u1', -5);
  const delayed = await dispatcher.schedule('u2', 10.9);

  assert.equal(immediate.delaySeconds, 0);
  assert.equal(immediate.mode === 'queued' ? immediate.runAt : 'inline', '2026-03-01T12:00:00.000Z');
  assert.equal(delayed.delaySeconds, 10);
  assert.equal(delayed.mode === 'queued' ? delayed.runAt : 'inline', '2026-03-01T12:00:10.000Z');
});

await test('queue mode requires a task backend', () => {
  assert.throws(
    () => createSyncDispatcher({
      users: fiveUsers(),
      statuses: new MemoryStatusTracker(),
      orchestrator: recordingOrchestrator().orchestrator,
      taskBackend: null,
      config: queueConfig,
      logger: new RecordingLogger(),
    }),
    /no task backend was provided/,
  );
});

await test('cleanup removes statuses older than the retention window', async () => {
  const statuses = new MemoryStatusTracker(() => NOW);
  const dispatcher = createSyncDispatcher({
    users: fiveUsers(),
    statuses,
    orchestrator: recordingOrchestrator().orchestrator,
    taskBackend: null,
    config: inlineConfig,
    logger: new RecordingLogger(),
    now: () => NOW,
  });
  statuses.records.set('old', {
    userId: 'old',
    status: 'completed',
    lastSync: '2026-02-19T12:00:00.000Z',
    emailsSynced: 3,
    errorMessage: null,
  });
  statuses.records.set('recent', {
    userId: 'recent',
    status: 'failed',
    lastSync: '2026-02-27T12:00:00.000Z',
    emailsSynced: 0,
    errorMessage: 'boom',
  });
  statuses.records.set('pending', {
    userId: 'pending',
    status: 'pending',
    lastSync: null,
    emailsSynced: 0,
    errorMessage: null,
  });

  const result = await dispatcher.cleanupOldSyncStatuses();

  assert.deepEqual(result, { deleted: 1, cutoff: '2026-02-22T12:00:00.000Z' });
  assert.deepEqual([...statuses.records.keys()], ['recent', 'pending']);

  const wider = await dispatcher.cleanupOldSyncStatuses(1);
  assert.deepEqual(wider, { deleted: 1, cutoff: '2026-02-28T12:00:00.000Z' });
  assert.deepEqual([...statuses.records.keys()], ['pending']);
});

finish();
