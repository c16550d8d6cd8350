import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { QueueBackend, TesseraConfig, TesseraConfigFile } from './types.js';

export const CONFIG_VERSION = 'tessera/v1';

const BACKENDS: QueueBackend[] = ['memory', 'bullmq'];

export class ConfigError extends Error {
  constructor(message: string, public source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: TesseraConfig = {
  version: CONFIG_VERSION,
  queue: {
    backend: 'memory',
    prefix: 'tessera',
    defaultQueue: 'default',
    attempts: 3,
    backoffMs: 1000
  },
  codec: {
    name: 'json',
    maxDecodedSize: 10485760,
    maxDepth: 32
  },
  log: {}
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBackend(value: unknown): value is QueueBackend {
  return BACKENDS.some(backend => backend === value);
}

export class ConfigLoader {
  load(file: string): TesseraConfigFile {
    const content = fs.readFileSync(file, 'utf8');
    let parsed: unknown;
    try {
      parsed = YAML.parse(content);
    } catch (err) {
      throw new ConfigError(`invalid YAML (${err instanceof Error ? err.message : String(err)})`, file);
    }
    return this.validate(parsed ?? {}, file);
  }

  validate(raw: unknown, source?: string): TesseraConfigFile {
    if (!isSection(raw)) {
      throw new ConfigError('config must be a mapping', source);
    }
    if (raw.version !== undefined && raw.version !== CONFIG_VERSION) {
      throw new ConfigError(`unsupported config version: ${String(raw.version)}`, source);
    }

    const config: TesseraConfigFile = { version: CONFIG_VERSION };

    if (raw.queue != null) {
      const queue = this.section(raw.queue, 'queue', source);
      config.queue = {};
      if (queue.backend !== undefined) {
        if (!isBackend(queue.backend)) {
          throw new ConfigError(`queue.backend must be one of ${BACKENDS.join(', ')}`, source);
        }
        config.queue.backend = queue.backend;
      }
      if (queue.redisUrl !== undefined) config.queue.redisUrl = this.string(queue.redisUrl, 'queue.redisUrl', source);
      if (queue.prefix !== undefined) config.queue.prefix = this.string(queue.prefix, 'queue.prefix', source);
      if (queue.defaultQueue !== undefined) {
        config.queue.defaultQueue = this.string(queue.defaultQueue, 'queue.defaultQueue', source);
      }
      if (queue.attempts !== undefined) config.queue.attempts = this.positive(queue.attempts, 'queue.attempts', source);
      if (queue.backoffMs !== undefined) config.queue.backoffMs = this.positive(queue.backoffMs, 'queue.backoffMs', source);
    }

    if (raw.codec != null) {
      const codec = this.section(raw.codec, 'codec', source);
      config.codec = {};
      if (codec.name !== undefined) config.codec.name = this.string(codec.name, 'codec.name', source);
      if (codec.maxDecodedSize !== undefined) {
        config.codec.maxDecodedSize = this.positive(codec.maxDecodedSize, 'codec.maxDecodedSize', source);
      }
      if (codec.maxDepth !== undefined) config.codec.maxDepth = this.positive(codec.maxDepth, 'codec.maxDepth', source);
    }

    if (raw.log != null) {
      const log = this.section(raw.log, 'log', source);
      config.log = {};
      if (log.path !== undefined) config.log.path = this.string(log.path, 'log.path', source);
    }

    return config;
  }

  private section(value: unknown, name: string, source?: string): Section {
    if (!isSection(value)) throw new ConfigError(`${name} must be a mapping`, source);
    return value;
  }

  private string(value: unknown, name: string, source?: string): string {
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`${name} must be a non-empty string`, source);
    }
    return value;
  }

  private positive(value: unknown, name: string, source?: string): number {
    const n = typeof value === 'string' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isFinite(n) || n <= 0) {
      throw new ConfigError(`${name} must be a positive number`, source);
    }
    return n;
  }
}

// TESSERA_* variables override the file
function fromEnv(env: NodeJS.ProcessEnv): TesseraConfigFile {
  const loader = new ConfigLoader();
  const queue: Section = {};
  const codec: Section = {};
  const log: Section = {};
  if (env.TESSERA_QUEUE_BACKEND) queue.backend = env.TESSERA_QUEUE_BACKEND;
  if (env.TESSERA_REDIS_URL) queue.redisUrl = env.TESSERA_REDIS_URL;
  if (env.TESSERA_QUEUE_PREFIX) queue.prefix = env.TESSERA_QUEUE_PREFIX;
  if (env.TESSERA_DEFAULT_QUEUE) queue.defaultQueue = env.TESSERA_DEFAULT_QUEUE;
  if (env.TESSERA_QUEUE_ATTEMPTS) queue.attempts = env.TESSERA_QUEUE_ATTEMPTS;
  if (env.TESSERA_QUEUE_BACKOFF_MS) queue.backoffMs = env.TESSERA_QUEUE_BACKOFF_MS;
  if (env.TESSERA_CODEC) codec.name = env.TESSERA_CODEC;
  if (env.TESSERA_CODEC_MAX_DECODED_SIZE) codec.maxDecodedSize = env.TESSERA_CODEC_MAX_DECODED_SIZE;
  if (env.TESSERA_CODEC_MAX_DEPTH) codec.maxDepth = env.TESSERA_CODEC_MAX_DEPTH;
  if (env.TESSERA_DISPATCH_LOG) log.path = env.TESSERA_DISPATCH_LOG;
  return loader.validate({ queue, codec, log }, 'environment');
}

export function mergeConfig(...layers: TesseraConfigFile[]): TesseraConfig {
  const config: TesseraConfig = {
    version: CONFIG_VERSION,
    queue: { ...DEFAULT_CONFIG.queue },
    codec: { ...DEFAULT_CONFIG.codec },
    log: { ...DEFAULT_CONFIG.log }
  };
  for (const layer of layers) {
    Object.assign(config.queue, layer.queue);
    Object.assign(config.codec, layer.codec);
    Object.assign(config.log, layer.log);
  }
  if (config.queue.backend === 'bullmq' && !config.queue.redisUrl) {
    throw new ConfigError('queue.redisUrl is required for the bullmq backend');
  }
  return config;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TesseraConfig {
  const file = env.TESSERA_CONFIG || path.join(process.cwd(), 'config', 'tessera.yaml');
  const layers: TesseraConfigFile[] = [];
  if (fs.existsSync(file)) {
    layers.push(new ConfigLoader().load(file));
  } else if (env.TESSERA_CONFIG) {
    throw new ConfigError('config file not found', file);
  }
  layers.push(fromEnv(env));
  return mergeConfig(...layers);
}
