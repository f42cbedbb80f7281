import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_TIMEOUT_SECONDS, loadConfig } from '../config.js';
import { createLogger } from '../logger.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const { config, warnings } = loadConfig({});

    expect(config).toEqual({
      defaultTimeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
      interpreter: { command: 'osascript', args: [] },
      maxOutputBytes: 50 * 1024 * 1024,
      debug: false,
    });
    expect(warnings).toEqual([]);
  });

  it('reads overrides from the environment', () => {
    const { config } = loadConfig({
      MAC_AUTOMATION_TIMEOUT: '12.5',
      MAC_AUTOMATION_OSASCRIPT: '/usr/local/bin/osascript',
      MAC_AUTOMATION_MAX_OUTPUT_MB: '1',
      MAC_AUTOMATION_DEBUG: 'TRUE',
    });

    expect(config.defaultTimeoutSeconds).toBe(12.5);
    expect(config.interpreter.command).toBe('/usr/local/bin/osascript');
    expect(config.maxOutputBytes).toBe(1024 * 1024);
    expect(config.debug).toBe(true);
  });

  it('falls back with a warning on invalid numbers', () => {
    const { config, warnings } = loadConfig({ MAC_AUTOMATION_TIMEOUT: '-3' });

    expect(config.defaultTimeoutSeconds).toBe(30);
    expect(warnings).toEqual(['MAC_AUTOMATION_TIMEOUT="-3" is not a positive number; using 30']);
  });

  it('caps the timeout at the longest delay a timer can hold', () => {
    const { config, warnings } = loadConfig({ MAC_AUTOMATION_TIMEOUT: '3000000' });

    expect(config.defaultTimeoutSeconds).toBe(2_147_483);
    expect(warnings).toEqual(['MAC_AUTOMATION_TIMEOUT="3000000" exceeds 2147483; using 2147483']);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(loadConfig({}).config)).toBe(true);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes prefixed lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(false).warn('slow script');

    expect(spy).toHaveBeenCalledWith('[mac-automation] warn: slow script');
  });

  it('writes error lines as a single prefixed string', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(false).error('notes_get_note failed: note_id is required');

    expect(spy).toHaveBeenCalledWith(
      '[mac-automation] error: notes_get_note failed: note_id is required'
    );
  });

  it('drops debug lines unless enabled', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(false).debug('hidden');
    createLogger(true).debug('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[mac-automation] debug: shown');
  });
});
