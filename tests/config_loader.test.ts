/**
 * Configuration from YAML and TESSERA_* variables
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, ConfigLoader, DEFAULT_CONFIG, loadConfig, mergeConfig } from '../src/config/loader.js';
import { thrown } from './helpers.js';

let dir: string;

function writeConfig(content: string): string {
  const file = path.join(dir, 'tessera.yaml');
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('reads the repository config by default', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('layers the file over the defaults', () => {
    const file = writeConfig(
      ['version: tessera/v1', 'queue:', '  defaultQueue: jobs', '  attempts: 5', 'codec:', '  name: msgpack'].join('\n')
    );
    expect(loadConfig({ TESSERA_CONFIG: file })).toEqual({
      version: 'tessera/v1',
      queue: { backend: 'memory', prefix: 'tessera', defaultQueue: 'jobs', attempts: 5, backoffMs: 1000 },
      codec: { name: 'msgpack', maxDecodedSize: 10485760, maxDepth: 32 },
      log: {}
    });
  });

  it('lets variables override the file', () => {
    const file = writeConfig('queue:\n  attempts: 5\n');
    const config = loadConfig({
      TESSERA_CONFIG: file,
      TESSERA_QUEUE_ATTEMPTS: '7',
      TESSERA_QUEUE_BACKEND: 'bullmq',
      TESSERA_REDIS_URL: 'redis://localhost:6379',
      TESSERA_DISPATCH_LOG: path.join(dir, 'dispatch.jsonl')
    });
    expect(config.queue).toMatchObject({ attempts: 7, backend: 'bullmq', redisUrl: 'redis://localhost:6379' });
    expect(config.log.path).toBe(path.join(dir, 'dispatch.jsonl'));
  });

  it('accepts an empty file', () => {
    expect(loadConfig({ TESSERA_CONFIG: writeConfig('') })).toEqual(DEFAULT_CONFIG);
  });

  it('fails on a missing explicit file', () => {
    const file = path.join(dir, 'absent.yaml');
    const err = thrown(() => loadConfig({ TESSERA_CONFIG: file }));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ message: `${file}: config file not found` });
  });

  it('fails on an unknown version', () => {
    const file = writeConfig('version: other/v2\n');
    expect(thrown(() => loadConfig({ TESSERA_CONFIG: file }))).toMatchObject({
      message: `${file}: unsupported config version: other/v2`
    });
  });

  it('fails on invalid variables', () => {
    expect(thrown(() => loadConfig({ TESSERA_CONFIG: writeConfig(''), TESSERA_CODEC_MAX_DEPTH: 'deep' }))).toMatchObject({
      message: 'environment: codec.maxDepth must be a positive number'
    });
  });

  it('needs a redis URL for bullmq', () => {
    expect(thrown(() => loadConfig({ TESSERA_CONFIG: writeConfig(''), TESSERA_QUEUE_BACKEND: 'bullmq' }))).toMatchObject({
      message: 'queue.redisUrl is required for the bullmq backend'
    });
  });
});

describe('ConfigLoader.validate', () => {
  const loader = new ConfigLoader();

  it.each([
    [{ queue: { backend: 'kafka' } }, 'test: queue.backend must be one of memory, bullmq'],
    [{ queue: { attempts: 0 } }, 'test: queue.attempts must be a positive number'],
    [{ queue: { prefix: '' } }, 'test: queue.prefix must be a non-empty string'],
    [{ codec: [] }, 'test: codec must be a mapping'],
    [['queue'], 'test: config must be a mapping']
  ])('rejects %j', (raw, message) => {
    expect(thrown(() => loader.validate(raw, 'test'))).toMatchObject({ message });
  });

  it('treats empty sections as absent', () => {
    expect(loader.validate({ queue: null, log: null })).toEqual({ version: 'tessera/v1' });
  });
});

describe('mergeConfig', () => {
  it('applies later layers last', () => {
    const config = mergeConfig({ queue: { attempts: 2 } }, { queue: { attempts: 9, prefix: 'ops' } });
    expect(config.queue).toMatchObject({ attempts: 9, prefix: 'ops', defaultQueue: 'default' });
  });
});
