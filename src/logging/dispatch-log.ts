import * as fs from 'fs';
import * as path from 'path';

export type DispatchEvent =
  | 'command_run'
  | 'command_dispatched'
  | 'job_started'
  | 'job_completed'
  | 'job_failed';

// Structured dispatch log entry, one JSON object per line
export interface DispatchLogEntry {
  ts: string;
  event: DispatchEvent;
  command: string;
  queue?: string;
  jobId?: string;
  args?: number;
  attempt?: number;
  durMs?: number;
  error?: string;
}

export class DispatchLog {
  private stream: fs.WriteStream | null = null;

  constructor(private logPath?: string) {
    if (logPath) this.open(logPath);
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  private open(logPath: string) {
    try {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
      this.stream = fs.createWriteStream(logPath, { flags: 'a' });
      this.stream.on('error', (err) => {
        console.error(`[Dispatch] Log stream error: ${err.message}`);
        this.stream = null;
      });
      console.log(`[Dispatch] JSONL logging enabled: ${logPath}`);
    } catch (err) {
      console.error(`[Dispatch] Failed to initialize log stream: ${err instanceof Error ? err.message : String(err)}`);
      this.stream = null;
    }
  }

  write(entry: Omit<DispatchLogEntry, 'ts'>) {
    if (!this.stream) return;
    try {
      this.stream.write(JSON.stringify({ ts: new Date().toISOString(), ...entry }) + '\n');
    } catch (err) {
      console.error(`[Dispatch] Failed to write log entry: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }

  get path(): string | undefined {
    return this.logPath;
  }
}
