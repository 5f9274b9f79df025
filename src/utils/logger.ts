import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogLevel } from '../config/schema.js';
import { redactRecord, redactSecrets } from './secret-redaction.js';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogEntry {
	timestamp: string;
	level: LogLevel;
	module: string;
	message: string;
	[key: string]: unknown;
}

type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
	level: LogLevel;
	/** JSON lines are appended here when set */
	filePath?: string;
	/** Suppresses the stderr sink */
	silent?: boolean;
}

export interface Logger {
	debug: (message: string, context?: Record<string, unknown>) => void;
	info: (message: string, context?: Record<string, unknown>) => void;
	warn: (message: string, context?: Record<string, unknown>) => void;
	error: (message: string, context?: Record<string, unknown>) => void;
	child: (suffix: string) => Logger;
}

function stderrLine(entry: LogEntry): string {
	const { timestamp, level, module, message, ...context } = entry;
	const clock = timestamp.slice(timestamp.indexOf('T') + 1).replace('Z', '');
	const tail = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
	return `${clock} [${level.toUpperCase().padEnd(5)}] [${module}] ${message}${tail}`;
}

const stderrSink: LogSink = (entry) => {
	process.stderr.write(`${stderrLine(entry)}\n`);
};

/** Appends JSON lines; the first failure is reported on stderr and disables the sink */
function fileSink(filePath: string): LogSink {
	mkdirSync(dirname(filePath), { recursive: true });
	let broken = false;
	return (entry) => {
		if (broken) return;
		try {
			appendFileSync(filePath, `${JSON.stringify(entry)}\n`);
		} catch (err) {
			broken = true;
			process.stderr.write(
				`capgate: log file ${filePath} is not writable: ${err instanceof Error ? err.message : String(err)}\n`,
			);
		}
	};
}

let threshold = LEVELS.indexOf('info');
let sinks: LogSink[] = [stderrSink];

/**
 * Sets process-wide logger options. Call once at startup.
 */
export function initLogger(options: LoggerOptions): void {
	threshold = LEVELS.indexOf(options.level);
	sinks = [];
	if (options.filePath) sinks.push(fileSink(options.filePath));
	if (!options.silent) sinks.push(stderrSink);
}

/**
 * Creates a logger scoped to a module name such as `policy:gateway`.
 * Messages and context values are redacted before any sink sees them.
 */
export function createLogger(moduleName: string): Logger {
	const emit = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
		if (LEVELS.indexOf(level) < threshold) return;
		const entry: LogEntry = {
			...(context ? redactRecord(context) : {}),
			timestamp: new Date().toISOString(),
			level,
			module: moduleName,
			message: redactSecrets(message),
		};
		for (const sink of sinks) sink(entry);
	};

	return {
		debug: emit('debug'),
		info: emit('info'),
		warn: emit('warn'),
		error: emit('error'),
		child: (suffix) => createLogger(`${moduleName}:${suffix}`),
	};
}

/**
 * Back to info level on stderr only (for tests).
 */
export function resetLogger(): void {
	threshold = LEVELS.indexOf('info');
	sinks = [stderrSink];
}
