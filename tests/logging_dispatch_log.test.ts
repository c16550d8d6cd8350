/**
 * JSONL dispatch log
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DispatchLog } from '../src/logging/dispatch-log.js';
import { formatDispatchEntry } from '../src/logging/format.js';
import { CommandBus } from '../src/commands/bus.js';
import { JobProcessor } from '../src/commands/worker.js';
import { InMemoryQueueSink } from '../src/backends/queue/memory.js';
import { ChargeAccount, LocalOnly, resetFlaky } from './fixtures/commands.js';
import { silenceConsole } from './helpers.js';

let dir: string;

function readEntries(file: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

beforeAll(() => silenceConsole());

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-log-'));
  resetFlaky();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('DispatchLog', () => {
  it('is disabled without a path', () => {
    const log = new DispatchLog();
    expect(log.enabled).toBe(false);
    log.write({ event: 'command_run', command: 'Nothing' });
  });

  it('creates missing directories', async () => {
    const file = path.join(dir, 'nested', 'dispatch.jsonl');
    const log = new DispatchLog(file);
    expect(log.enabled).toBe(true);
    log.write({ event: 'command_run', command: 'LocalOnly', args: 2, durMs: 0 });
    await log.close();

    const [entry] = readEntries(file);
    expect(entry).toEqual({
      ts: expect.any(String),
      event: 'command_run',
      command: 'LocalOnly',
      args: 2,
      durMs: 0
    });
  });

  it('records runs, dispatches and job outcomes', async () => {
    const file = path.join(dir, 'dispatch.jsonl');
    const log = new DispatchLog(file);
    const queue = new InMemoryQueueSink();
    const bus = new CommandBus({ queue, log });
    const processor = new JobProcessor({ log });
    await processor.listen(queue, ['billing']);

    bus.run(LocalOnly, 1, 2);
    const ref = await bus.dispatch(ChargeAccount, 'acct-1');
    await queue.drain();
    await log.close();

    const entries = readEntries(file);
    expect(entries.map(e => e.event)).toEqual([
      'command_run',
      'command_dispatched',
      'job_started',
      'job_failed',
      'job_started',
      'job_completed'
    ]);
    expect(entries[1]).toMatchObject({ command: 'ChargeAccount', queue: 'billing', jobId: ref.jobId, args: 1 });
    expect(entries[3]).toMatchObject({ command: 'ChargeAccount', attempt: 1, error: 'declined acct-1' });
    expect(entries[5]).toMatchObject({ command: 'ChargeAccount', attempt: 2, jobId: ref.jobId });
  });
});

describe('formatDispatchEntry', () => {
  it('renders one entry per line', () => {
    const line = JSON.stringify({
      ts: '2024-06-15T14:05:09.123Z',
      event: 'job_failed',
      command: 'ChargeAccount',
      queue: 'billing',
      jobId: 'mem-1',
      attempt: 1,
      durMs: 3,
      error: 'declined acct-1'
    });
    expect(formatDispatchEntry(line, false)).toBe(
      '14:05:09.123 job_failed         ChargeAccount queue=billing jobId=mem-1 attempt=1 durMs=3 error="declined acct-1"'
    );
  });

  it('leaves other lines alone', () => {
    expect(formatDispatchEntry('not json', false)).toBe('not json');
    expect(formatDispatchEntry('[1,2]', false)).toBe('[1,2]');
  });
});
