import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { spawn } from 'child_process';
import { FAKE_PID, FakeChild } from './fake-child.js';
import {
  executeScript,
  failureMarkerMessage,
  KILL_GRACE_MS,
  MAX_TIMEOUT_SECONDS,
} from '../bridge/executor.js';

vi.mock('child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('child_process')>();
  return { ...actual, spawn: vi.fn() };
});

const mockSpawn = vi.mocked(spawn);

describe('failureMarkerMessage', () => {
  it('returns the first line after the marker', () => {
    expect(failureMarkerMessage('ERROR:Note not found\nmore detail')).toBe('Note not found');
  });

  it('ignores leading whitespace before the marker', () => {
    expect(failureMarkerMessage('\n  ERROR: list missing')).toBe('list missing');
  });

  it('falls back to a generic message for a bare marker', () => {
    expect(failureMarkerMessage('ERROR:')).toBe('Script reported an error');
  });

  it('returns undefined when the marker is not leading', () => {
    expect(failureMarkerMessage('all good, no ERROR: here')).toBeUndefined();
  });
});

describe('executeScript', () => {
  let child: FakeChild;
  let killSpy: MockInstance<typeof process.kill>;

  beforeEach(() => {
    vi.clearAllMocks();
    child = new FakeChild();
    mockSpawn.mockImplementation(() => child);
    killSpy = vi.spyOn(process, 'kill').mockImplementation(() => {
      child.exit(null, 'SIGKILL');
      return true;
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('successful runs', () => {
    it('passes the script on stdin and captures stdout', async () => {
      child.respond('hello\n');

      const result = await executeScript('return "hello"', { timeoutSeconds: 5 });

      expect(result.success).toBe(true);
      expect(result.stdout).toBe('hello\n');
      expect(result.exitCode).toBe(0);
      expect(result.failure).toBeUndefined();
      expect(child.script).toBe('return "hello"');
    });

    it('spawns osascript detached so the process group can be killed', async () => {
      child.respond('');

      await executeScript('return 1', { timeoutSeconds: 5 });

      expect(mockSpawn).toHaveBeenCalledWith(
        'osascript',
        [],
        expect.objectContaining({ detached: process.platform !== 'win32' })
      );
    });

    it('uses a configured interpreter', async () => {
      child.respond('');

      await executeScript('return 1', {
        timeoutSeconds: 5,
        interpreter: { command: '/opt/bin/osascript', args: ['-s', 's'] },
      });

      expect(mockSpawn).toHaveBeenCalledWith('/opt/bin/osascript', ['-s', 's'], expect.any(Object));
    });

    it('keeps stderr noise when the exit is clean', async () => {
      child.respond('42', { stderr: 'deprecation notice\n' });

      const result = await executeScript('return 42', { timeoutSeconds: 5 });

      expect(result.success).toBe(true);
      expect(result.stderr).toBe('deprecation notice\n');
    });
  });

  describe('process failures', () => {
    it('treats an ERROR: marker in stdout as a failure', async () => {
      child.respond('ERROR:Can not find list "Groceries"\n');

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(0);
      expect(result.failure).toEqual({
        kind: 'process',
        message: 'Can not find list "Groceries"',
      });
    });

    it('reports stderr for a non-zero exit', async () => {
      child.respond('', { stderr: '12:18: execution error: boom (-2741)\n', code: 1 });

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(1);
      expect(result.failure).toEqual({
        kind: 'process',
        message: '12:18: execution error: boom (-2741)',
      });
    });

    it('rewrites authorization failures into a permission hint', async () => {
      child.respond('', {
        stderr: 'execution error: Not authorized to send Apple events to Notes. (-1743)\n',
        code: 1,
      });

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.failure?.message).toBe(
        'Automation access denied. Grant permission in System Settings > Privacy & Security > Automation'
      );
    });

    it('names the exit code when stderr is empty', async () => {
      child.respond('', { code: 2 });

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.failure).toEqual({ kind: 'process', message: 'Process exited with code 2' });
    });

    it('turns a spawn exception into a failed result', async () => {
      mockSpawn.mockImplementation(() => {
        throw new Error('spawn EACCES');
      });

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.success).toBe(false);
      expect(result.failure).toEqual({ kind: 'process', message: 'spawn EACCES' });
    });

    it('turns a child error event into a failed result', async () => {
      setImmediate(() => child.emit('error', new Error('spawn osascript ENOENT')));

      const result = await executeScript('return 1', { timeoutSeconds: 5 });

      expect(result.failure).toEqual({ kind: 'process', message: 'spawn osascript ENOENT' });
    });

    it('stops the process when output exceeds the limit', async () => {
      child.respond('far too much output');

      const result = await executeScript('return 1', { timeoutSeconds: 5, maxOutputBytes: 4 });

      expect(result.success).toBe(false);
      expect(result.failure).toEqual({ kind: 'process', message: 'Script output exceeded 4 bytes' });
    });
  });

  describe('timeouts and cancellation', () => {
    it('kills the process group and reports a timeout', async () => {
      const result = await executeScript('delay 10', { timeoutSeconds: 0.05 });

      expect(result.success).toBe(false);
      expect(result.failure).toEqual({
        kind: 'timeout',
        message: 'Script execution timed out after 0.05 seconds',
      });
      expect(result.signal).toBe('SIGKILL');
      if (process.platform !== 'win32') {
        expect(killSpy).toHaveBeenCalledWith(-FAKE_PID, 'SIGKILL');
      }
    });

    it('does not fire early for a timeout beyond the timer range', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const controller = new AbortController();

      const pending = executeScript('delay 10', {
        timeoutSeconds: MAX_TIMEOUT_SECONDS + 1000,
        signal: controller.signal,
      });
      await vi.advanceTimersByTimeAsync(60_000);

      expect(killSpy).not.toHaveBeenCalled();
      controller.abort();
      const result = await pending;
      expect(result.failure).toEqual({ kind: 'process', message: 'Script execution was cancelled' });
    });

    it('returns within the grace period when the process never exits', async () => {
      killSpy.mockImplementation(() => true);
      const started = Date.now();

      const result = await executeScript('delay 10', { timeoutSeconds: 0.05 });

      expect(result.failure?.kind).toBe('timeout');
      expect(Date.now() - started).toBeLessThan(50 + KILL_GRACE_MS + 500);
    });

    it('falls back to killing the child when the group kill fails', async () => {
      killSpy.mockImplementation(() => {
        throw new Error('ESRCH');
      });

      const result = await executeScript('delay 10', { timeoutSeconds: 0.05 });

      expect(result.failure?.kind).toBe('timeout');
      expect(child.killSignals).toEqual(['SIGKILL']);
    });

    it('cancels when the signal aborts', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const result = await executeScript('delay 10', {
        timeoutSeconds: 5,
        signal: controller.signal,
      });

      expect(result.failure).toEqual({ kind: 'process', message: 'Script execution was cancelled' });
    });

    it('cancels immediately when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await executeScript('delay 10', {
        timeoutSeconds: 5,
        signal: controller.signal,
      });

      expect(result.failure).toEqual({ kind: 'process', message: 'Script execution was cancelled' });
    });
  });
});
