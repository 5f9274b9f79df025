import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, initLogger, resetLogger } from '../logger.js';

let testDir: string;
let testLogPath: string;

function readEntries(): Record<string, unknown>[] {
	return readFileSync(testLogPath, 'utf-8')
		.trim()
		.split('\n')
		.map((line) => JSON.parse(line));
}

beforeEach(() => {
	testDir = mkdtempSync(join(tmpdir(), 'capgate-logger-'));
	testLogPath = join(testDir, 'logs', 'test.log');
	resetLogger();
});

afterEach(() => {
	vi.restoreAllMocks();
	rmSync(testDir, { recursive: true, force: true });
	resetLogger();
});

describe('createLogger', () => {
	it('writes structured entries to the log file', () => {
		initLogger({ level: 'debug', filePath: testLogPath, silent: true });

		createLogger('policy:engine').info('hello world', { key: 'value' });

		const [entry] = readEntries();
		expect(entry?.level).toBe('info');
		expect(entry?.module).toBe('policy:engine');
		expect(entry?.message).toBe('hello world');
		expect(entry?.key).toBe('value');
		expect(new Date(String(entry?.timestamp)).toISOString()).toBe(entry?.timestamp);
	});

	it('filters messages below the configured level', () => {
		initLogger({ level: 'warn', filePath: testLogPath, silent: true });

		const logger = createLogger('test-module');
		logger.debug('should not appear');
		logger.info('should not appear');
		logger.warn('should appear');
		logger.error('also appears');

		expect(readEntries().map((entry) => entry.message)).toEqual(['should appear', 'also appears']);
	});

	it('redacts secrets in messages and context', () => {
		initLogger({ level: 'info', filePath: testLogPath, silent: true });

		createLogger('sandbox:shell').info('ran BUILD_TOKEN=test-secret', {
			command: 'deploy --password=test-secret',
			nested: { header: 'Bearer test-secret' },
		});

		const [entry] = readEntries();
		expect(entry?.message).toBe('ran BUILD_TOKEN=[REDACTED]');
		expect(entry?.command).toBe('deploy --password=[REDACTED]');
		expect(entry?.nested).toEqual({ header: 'Bearer [REDACTED]' });
	});

	it('names child loggers after their parent', () => {
		initLogger({ level: 'info', filePath: testLogPath, silent: true });

		createLogger('runtime').child('branch').info('started');

		expect(readEntries()[0]?.module).toBe('runtime:branch');
	});

	it('reports an unwritable log file once and keeps going', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		// A directory cannot be appended to.
		initLogger({ level: 'info', filePath: testDir, silent: true });

		const logger = createLogger('test-module');
		logger.info('first');
		logger.info('second');

		expect(stderr).toHaveBeenCalledTimes(1);
		expect(String(stderr.mock.calls[0]?.[0])).toContain(`log file ${testDir} is not writable`);
	});

	it('pretty-prints to stderr unless silent', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		initLogger({ level: 'info' });

		createLogger('main').warn('careful', { root: 'docs' });

		expect(stderr).toHaveBeenCalledTimes(1);
		expect(String(stderr.mock.calls[0]?.[0])).toMatch(/\[WARN \] \[main\] careful \{"root":"docs"\}\n$/);
	});
});
