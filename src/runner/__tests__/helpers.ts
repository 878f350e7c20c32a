import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import type { Logger } from '../../logging/index.js';
import type { SpawnFn } from '../orchestrator.js';
import type { OutputStream } from '../tee.js';

export class MemoryOutput implements OutputStream {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array, callback?: (err?: Error | null) => void): boolean {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
    callback?.(null);
    return true;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

export class FakeProcess extends EventEmitter {
  readonly stderr = new PassThrough();
}

export interface FakeRun {
  stderr?: string[];
  code?: number | null;
  signal?: NodeJS.Signals | null;
  /** Emitted instead of running, like a missing executable. */
  spawnError?: Error;
  /** Destroys stderr with this error after writing `stderr`. */
  readError?: Error;
}

export interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/** Spawn stand-in that replays scripted runs in order. */
export function fakeSpawn(runs: FakeRun[]): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args: [...args], options });
    const run = runs[calls.length - 1] ?? {};
    const proc = new FakeProcess();
    setImmediate(() => {
      if (run.spawnError) {
        proc.emit('error', run.spawnError);
        proc.stderr.destroy();
        return;
      }
      for (const chunk of run.stderr ?? []) proc.stderr.write(chunk);
      if (run.readError) proc.stderr.destroy(run.readError);
      else proc.stderr.end();
      setImmediate(() => proc.emit('close', run.code === undefined ? 0 : run.code, run.signal ?? null));
    });
    return proc;
  };
  return { spawn, calls };
}

export function recordingLogger(): { logger: Logger; events: string[] } {
  const events: string[] = [];
  const record = (event: string): void => {
    events.push(event);
  };
  return {
    events,
    logger: {
      info: record,
      warn: record,
      error: record,
      fatal: record,
      flush: async () => undefined,
    },
  };
}
