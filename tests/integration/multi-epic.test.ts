import { AuthOrConnectionFatalError, ConnectionError } from '../../src/lib/errors';
import { MultiEpicSync } from '../../src/lib/multi-epic';
import { RetryExecutor } from '../../src/lib/retry';
import { SessionStore } from '../../src/lib/session';
import { SyncOrchestrator } from '../../src/lib/sync-orchestrator';
import { MemoryDocumentStore, makeDocument, makeStory, makeTempDir, noSleep, removeTempDir } from '../helpers/fixtures';
import { InMemoryTracker } from '../helpers/in-memory-tracker';

describe('MultiEpicSync', () => {
  let dir: string;
  let tracker: InMemoryTracker;
  let orchestrator: SyncOrchestrator;

  beforeEach(() => {
    dir = makeTempDir();
    tracker = new InMemoryTracker({ prefix: 'PROJ-' });
    orchestrator = new SyncOrchestrator({
      tracker,
      sessions: new SessionStore(dir),
      retry: new RetryExecutor({ sleep: noSleep }),
      clock: () => new Date('2026-03-01T10:00:00Z'),
    });
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function jobs() {
    const first = makeDocument([makeStory()], 'PROJ-100');
    const second = makeDocument([makeStory({ id: 'US-101', title: 'Export invoices' })], 'PROJ-200');
    return [
      { document: first, documentStore: new MemoryDocumentStore(first) },
      { document: second, documentStore: new MemoryDocumentStore(second) },
    ];
  }

  it('should sync every epic and report in job order', async () => {
    const epics = jobs();

    const results = await new MultiEpicSync(orchestrator, 2).runAll(epics, { execute: true });

    expect(results.map((result) => [result.epicKey, result.status])).toEqual([
      ['PROJ-100', 'fulfilled'],
      ['PROJ-200', 'fulfilled'],
    ]);
    expect(epics[1].documentStore.current.stories[0].remoteKey).toMatch(/^PROJ-[12]$/);
  });

  it('should keep going when one epic fails', async () => {
    tracker.fail('fetchEpicChildren', () => new ConnectionError('tracker unreachable'), { key: 'PROJ-100' });

    const results = await new MultiEpicSync(orchestrator, 1).runAll(jobs(), { execute: true });

    const [failed, succeeded] = results;
    expect(failed.status).toBe('rejected');
    expect(failed.status === 'rejected' && failed.error).toBeInstanceOf(AuthOrConnectionFatalError);
    expect(failed.status === 'rejected' && failed.error.message).toBe(
      'fetch children of PROJ-100: tracker unreachable'
    );
    expect(succeeded.status === 'fulfilled' && succeeded.report.totals.created).toBe(1);
    expect(tracker.peek('PROJ-1').summary).toBe('Export invoices');
  });

  it('should not start epics after cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await new MultiEpicSync(orchestrator, 2).runAll(jobs(), { execute: true, signal: controller.signal });

    expect(results.map((result) => result.status === 'rejected' && result.error.message)).toEqual([
      'Cancelled before start',
      'Cancelled before start',
    ]);
    expect(tracker.calls).toEqual([]);
  });

  it('should reject a concurrency below one', () => {
    expect(() => new MultiEpicSync(orchestrator, 0)).toThrow(
      new RangeError('Concurrency must be a positive integer, got 0')
    );
  });
});
