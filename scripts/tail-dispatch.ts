#!/usr/bin/env node
import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { formatDispatchEntry } from '../src/logging/format.js';

function tailFile(path: string) {
  if (!existsSync(path)) {
    console.error(`File not found: ${path}`);
    process.exit(1);
  }

  const tail = spawn('tail', ['-f', path]);

  tail.stdout.on('data', (data: Buffer) => {
    const lines = data.toString().split('\n').filter(l => l.trim());
    for (const line of lines) {
      console.log(formatDispatchEntry(line));
    }
  });

  tail.stderr.on('data', (data: Buffer) => {
    console.error(`tail error: ${data.toString()}`);
  });

  tail.on('close', (code) => {
    process.exit(code || 0);
  });

  process.on('SIGINT', () => {
    tail.kill();
    process.exit(0);
  });
}

const args = process.argv.slice(2);
const filePath = args[0] || process.env.TESSERA_DISPATCH_LOG;

if (!filePath) {
  console.error('Usage: tail-dispatch.ts <path-to-jsonl-file>');
  console.error('   or: TESSERA_DISPATCH_LOG=/path/to/file.jsonl tail-dispatch.ts');
  process.exit(1);
}

console.log(`Tailing dispatch log: ${filePath}\n`);
tailFile(filePath);
