import { spawn, type ChildProcess } from 'child_process';
import { errorMessage } from './errors.js';
import type { ExecutionFailure, ExecutionResult } from './types.js';

export interface Interpreter {
  command: string;
  args: string[];
}

// With no program arguments osascript reads the script from stdin.
export const OSASCRIPT: Interpreter = { command: 'osascript', args: [] };

export const FAILURE_MARKER = 'ERROR:';

export const DEFAULT_MAX_OUTPUT_BYTES = 50 * 1024 * 1024;

// How long to wait for the killed process to report its exit before returning anyway.
export const KILL_GRACE_MS = 1000;

// setTimeout fires after 1 ms when the delay exceeds a signed 32-bit int.
const MAX_TIMER_MS = 2 ** 31 - 1;

export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

export interface ExecuteOptions {
  timeoutSeconds: number;
  interpreter?: Interpreter;
  maxOutputBytes?: number;
  signal?: AbortSignal;
}

const AUTHORIZATION_HINT =
  'Automation access denied. Grant permission in System Settings > Privacy & Security > Automation';

/**
 * Return the message following a leading `ERROR:` marker, or undefined when
 * the text does not start with one.
 */
export function failureMarkerMessage(text: string): string | undefined {
  const trimmed = text.trimStart();
  if (!trimmed.startsWith(FAILURE_MARKER)) return undefined;
  const [line = ''] = trimmed.slice(FAILURE_MARKER.length).split(/\r?\n/, 1);
  return line.trim() || 'Script reported an error';
}

function describeExit(
  stderr: string,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  stdinError: Error | undefined
): string {
  const detail = stderr.trim();
  if (/not authorized/i.test(detail)) return AUTHORIZATION_HINT;
  if (detail) return detail;
  if (stdinError) return `Could not pass script to interpreter: ${stdinError.message}`;
  if (signal) return `Process terminated by ${signal}`;
  return `Process exited with code ${exitCode ?? 'unknown'}`;
}

function terminateProcessTree(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined || process.platform === 'win32') {
    child.kill('SIGKILL');
    return;
  }
  try {
    // Negative pid addresses the whole process group the detached child leads.
    process.kill(-pid, 'SIGKILL');
  } catch {
    child.kill('SIGKILL');
  }
}

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  /** Returns false once the limit is exceeded. */
  push(chunk: Buffer): boolean {
    this.size += chunk.length;
    if (this.size > this.limit) return false;
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Run a script through the interpreter, passing it on stdin. Always resolves;
 * spawn errors, non-zero exits, `ERROR:` output, timeouts and cancellation all
 * come back as an unsuccessful ExecutionResult. On timeout or cancellation the
 * child's whole process group is killed before the promise settles.
 */
export function executeScript(script: string, options: ExecuteOptions): Promise<ExecutionResult> {
  const {
    timeoutSeconds,
    interpreter = OSASCRIPT,
    maxOutputBytes = DEFAULT_MAX_OUTPUT_BYTES,
    signal,
  } = options;
  const started = Date.now();

  return new Promise<ExecutionResult>((resolve) => {
    const stdout = new OutputBuffer(maxOutputBytes);
    const stderr = new OutputBuffer(maxOutputBytes);

    let child: ChildProcess;
    try {
      child = spawn(interpreter.command, interpreter.args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });
    } catch (err: unknown) {
      resolve({
        stdout: '',
        stderr: '',
        exitCode: null,
        signal: null,
        elapsedMs: Date.now() - started,
        success: false,
        failure: { kind: 'process', message: errorMessage(err) },
      });
      return;
    }

    let settled = false;
    let stopReason: ExecutionFailure | undefined;
    let stdinError: Error | undefined;
    let graceTimer: NodeJS.Timeout | undefined;

    const finish = (
      exitCode: number | null,
      exitSignal: NodeJS.Signals | null,
      failure?: ExecutionFailure
    ): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (graceTimer) clearTimeout(graceTimer);
      signal?.removeEventListener('abort', onAbort);
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();

      const out = stdout.text();
      const err = stderr.text();
      const base = {
        stdout: out,
        stderr: err,
        exitCode,
        signal: exitSignal,
        elapsedMs: Date.now() - started,
      };

      const reported = stopReason ?? failure;
      if (reported) {
        resolve({ ...base, success: false, failure: reported });
        return;
      }
      const marker = failureMarkerMessage(out) ?? failureMarkerMessage(err);
      if (marker !== undefined) {
        resolve({ ...base, success: false, failure: { kind: 'process', message: marker } });
        return;
      }
      if (exitCode !== 0) {
        resolve({
          ...base,
          success: false,
          failure: { kind: 'process', message: describeExit(err, exitCode, exitSignal, stdinError) },
        });
        return;
      }
      resolve({ ...base, success: true });
    };

    const stop = (failure: ExecutionFailure): void => {
      if (settled || stopReason) return;
      stopReason = failure;
      terminateProcessTree(child);
      graceTimer = setTimeout(() => finish(null, 'SIGKILL'), KILL_GRACE_MS);
    };

    const onAbort = (): void => {
      stop({ kind: 'process', message: 'Script execution was cancelled' });
    };

    const timer = setTimeout(() => {
      stop({
        kind: 'timeout',
        message: `Script execution timed out after ${timeoutSeconds} seconds`,
      });
    }, Math.min(timeoutSeconds * 1000, MAX_TIMER_MS));

    const overflow = (): void => {
      stop({ kind: 'process', message: `Script output exceeded ${maxOutputBytes} bytes` });
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      if (!stdout.push(chunk)) overflow();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      if (!stderr.push(chunk)) overflow();
    });
    child.on('error', (err: Error) => finish(null, null, { kind: 'process', message: err.message }));
    child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) =>
      finish(code, exitSignal)
    );

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    // The interpreter may exit before reading everything (EPIPE).
    child.stdin?.on('error', (err: Error) => {
      stdinError = err;
    });
    child.stdin?.end(script);
  });
}
