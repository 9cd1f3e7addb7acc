/**
 * Runs collaborator scripts as child processes, capturing stdout, stderr,
 * exit code and timing.
 *
 * The interpreter is chosen from the script's extension; anything else is
 * executed directly. A timeout kills the whole process group so that
 * long-polling children started by the script go with it.
 */

import { spawn } from 'node:child_process';
import { extname } from 'node:path';

/** Map script extensions to interpreters. */
const INTERPRETERS: Record<string, string> = {
  '.sh': 'bash',
  '.js': 'node',
  '.mjs': 'node',
  '.py': 'python3',
};

/** Output kept per stream when the invocation sets no limit. */
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface ScriptInvocation {
  scriptPath: string;
  args: string[];
  cwd: string;
  /** Extra variables merged over the parent environment. */
  env?: Record<string, string>;
  timeoutMs: number;
  /** Bytes kept per stream; older output is dropped first. */
  maxOutputBytes?: number;
}

export interface ScriptResult {
  exitCode: number;
  /** The last `maxOutputBytes` of stdout. */
  stdout: string;
  /** The last `maxOutputBytes` of stderr. */
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

/** Holds the last `limit` bytes written to a stream. */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit) {
      const head = this.chunks[0];
      if (!head) break;
      const excess = this.size - this.limit;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

function killTree(pid: number | undefined, kill: () => void): void {
  if (pid === undefined || process.platform === 'win32') {
    kill();
    return;
  }
  try {
    process.kill(-pid, 'SIGTERM');
  } catch {
    // Group already gone
    kill();
  }
}

/**
 * Run a script to completion.
 *
 * Never rejects: spawn failures resolve with exit code -1 and the error
 * message appended to stderr.
 */
export async function runScript(invocation: ScriptInvocation): Promise<ScriptResult> {
  const interpreter = INTERPRETERS[extname(invocation.scriptPath)];
  const command = interpreter ?? invocation.scriptPath;
  const args = interpreter ? [invocation.scriptPath, ...invocation.args] : invocation.args;
  const limit = invocation.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

  const startTime = Date.now();
  const stdout = new OutputTail(limit);
  const stderr = new OutputTail(limit);
  let timedOut = false;

  return new Promise<ScriptResult>((resolve) => {
    let settled = false;
    const settle = (exitCode: number, extraStderr = ''): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: stdout.toString(),
        stderr: stderr.toString() + extraStderr,
        durationMs: Date.now() - startTime,
        timedOut,
      });
    };

    const child = spawn(command, args, {
      cwd: invocation.cwd,
      env: { ...process.env, ...invocation.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child.pid, () => child.kill('SIGTERM'));
    }, invocation.timeoutMs);

    child.on('close', (code: number | null) => settle(code ?? -1));
    child.on('error', (err: Error) => settle(-1, err.message));
  });
}
