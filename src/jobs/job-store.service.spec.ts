import { JobStoreService } from './job-store.service';

const HOUR = 60 * 60 * 1000;

describe('JobStoreService', () => {
  let now: number;
  let nextId: number;
  let store: JobStoreService;

  beforeEach(() => {
    now = 1_700_000_000_000;
    nextId = 0;
    store = new JobStoreService({
      retentionMs: HOUR,
      clock: () => now,
      generateId: () => `job-${++nextId}`,
    });
  });

  it('creates pending jobs', () => {
    const id = store.create('https://example.com');

    expect(id).toBe('job-1');
    expect(store.get(id)).toEqual({
      id: 'job-1',
      url: 'https://example.com',
      status: 'pending',
      createdAt: now,
      startedAt: null,
      finishedAt: null,
      chunksIngested: null,
      failed: [],
      error: null,
    });
  });

  it('generates 32-character hex ids by default', () => {
    const defaultStore = new JobStoreService({ retentionMs: HOUR });
    const id = defaultStore.create('https://example.com');

    expect(id).toMatch(/^[0-9a-f]{32}$/);
  });

  it('walks a job through running to done with 42 chunks', () => {
    const id = store.create('https://example.com');

    now += 10;
    expect(store.update(id, { status: 'running' })).toBe(true);
    expect(store.get(id)?.status).toBe('running');
    expect(store.get(id)?.startedAt).toBe(now);

    now += 500;
    expect(
      store.update(id, { status: 'done', chunksIngested: 42, failed: [] }),
    ).toBe(true);
    expect(store.get(id)).toMatchObject({
      status: 'done',
      chunksIngested: 42,
      failed: [],
      error: null,
      finishedAt: now,
    });
  });

  it('records errors with any partial failures', () => {
    const id = store.create('https://example.com');
    store.update(id, { status: 'running' });
    store.update(id, {
      status: 'error',
      error: 'ingest collaborator unavailable: connect ECONNREFUSED',
      failed: ['https://example.com/a: 404'],
    });

    expect(store.get(id)).toMatchObject({
      status: 'error',
      chunksIngested: null,
      error: 'ingest collaborator unavailable: connect ECONNREFUSED',
      failed: ['https://example.com/a: 404'],
    });
  });

  it('returns the same record on repeated reads', () => {
    const id = store.create('https://example.com');
    store.update(id, { status: 'running' });

    const first = store.get(id);
    const second = store.get(id);

    expect(second).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('never leaves a terminal state', () => {
    const id = store.create('https://example.com');
    store.update(id, { status: 'running' });
    store.update(id, { status: 'done', chunksIngested: 3, failed: [] });
    const terminal = store.get(id);

    expect(store.update(id, { status: 'running' })).toBe(false);
    expect(store.update(id, { status: 'error', error: 'late' })).toBe(false);
    expect(
      store.update(id, { status: 'done', chunksIngested: 99, failed: [] }),
    ).toBe(false);
    expect(store.get(id)).toBe(terminal);
  });

  it('refuses to skip the running state', () => {
    const id = store.create('https://example.com');

    expect(
      store.update(id, { status: 'done', chunksIngested: 1, failed: [] }),
    ).toBe(false);
    expect(store.update(id, { status: 'error', error: 'boom' })).toBe(false);
    expect(store.get(id)?.status).toBe('pending');
  });

  it('ignores updates for unknown jobs', () => {
    expect(store.update('missing', { status: 'running' })).toBe(false);
    expect(store.get('missing')).toBeNull();
  });

  it('hides a finished job once the retention window has passed', () => {
    const id = store.create('https://example.com');
    store.update(id, { status: 'running' });
    store.update(id, { status: 'done', chunksIngested: 1, failed: [] });

    now += HOUR;
    expect(store.get(id)?.status).toBe('done');

    now += 1;
    expect(store.get(id)).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('sweeps only expired terminal jobs', () => {
    const pending = store.create('https://example.com/pending');
    const running = store.create('https://example.com/running');
    store.update(running, { status: 'running' });
    const done = store.create('https://example.com/done');
    store.update(done, { status: 'running' });
    store.update(done, { status: 'done', chunksIngested: 2, failed: [] });

    now += 30 * 60 * 1000;
    const recent = store.create('https://example.com/recent');
    store.update(recent, { status: 'running' });
    store.update(recent, { status: 'error', error: 'boom' });

    expect(store.sweep(now + HOUR - 1)).toBe(1);
    expect(store.size()).toBe(3);
    expect(store.get(pending)?.status).toBe('pending');
    expect(store.get(running)?.status).toBe('running');
    expect(store.get(recent)?.status).toBe('error');

    expect(store.sweep(now + 10 * HOUR)).toBe(1);
    expect(store.get(pending)).not.toBeNull();
    expect(store.get(running)).not.toBeNull();
  });
});
