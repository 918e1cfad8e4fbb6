import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, withLogContext } from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function lastLine(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await withLogContext({ runId: 'run_test123' }, async () => {
      logger.info('test_event', {
        phone: '+15551234567',
        recipient: '5551234567@vtext.com',
        password: 'test-password',
        body: 'this should not be stored in clear text',
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload: Record<string, unknown> = JSON.parse(lines[0]);

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.runId).toBe('run_test123');
    expect(payload.phone).toBe('***4567');
    expect(payload.recipient).toBe('***4567@vtext.com');
    expect(payload.password).toBe('[REDACTED]');
    expect(payload.body).toBe('[REDACTED_TEXT len=39]');
    expect(stdoutSpy).toHaveBeenCalled();
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_FILE = logFile;
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.warn('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('drops records below LOG_LEVEL and sends warnings to stderr', () => {
    process.env.NODE_ENV = 'production';
    process.env.LOG_LEVEL = 'warn';
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('quiet_event');
    logger.error('loud_event', { stage: 'reply' });

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(lastLine(stderrSpy)).toMatchObject({ level: 'error', event: 'loud_event', stage: 'reply' });
  });

  it('merges child context over the base context', () => {
    process.env.NODE_ENV = 'production';
    process.env.LOG_LEVEL = 'debug';
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createLogger({ domain: 'relay', stage: 'fetch' }).child({ stage: 'log' }).debug('child_event');

    expect(lastLine(stdoutSpy)).toMatchObject({ domain: 'relay', stage: 'log', event: 'child_event' });
  });
});
