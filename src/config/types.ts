// Configuration file format: config/tessera.yaml (version "tessera/v1")

export type QueueBackend = 'memory' | 'bullmq';

export interface QueueConfig {
  backend: QueueBackend;
  redisUrl?: string;
  prefix: string;
  defaultQueue: string;
  attempts: number;
  backoffMs: number;
}

export interface CodecConfig {
  name: string; // 'json' | 'msgpack'
  maxDecodedSize: number;
  maxDepth: number;
}

export interface LogConfig {
  path?: string; // JSONL dispatch log; disabled when unset
}

export interface TesseraConfig {
  version: string;
  queue: QueueConfig;
  codec: CodecConfig;
  log: LogConfig;
}

// Shape accepted from YAML before defaults are applied
export interface TesseraConfigFile {
  version?: string;
  queue?: Partial<QueueConfig>;
  codec?: Partial<CodecConfig>;
  log?: Partial<LogConfig>;
}
