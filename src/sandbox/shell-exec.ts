import { spawn } from 'node:child_process';
import { ConfigurationError, WhitelistViolationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import type { FsSandbox } from './fs-sandbox.js';

const logger = createLogger('sandbox:shell');

/** Checked against the raw command string, before tokenizing or rule matching */
export const BLOCKED_METACHARACTERS: readonly string[] = ['|', '>', '<', ';', '&', '`', '$(', '${'];

export const DEFAULT_TIMEOUT_MS = 30_000;
export const MIN_TIMEOUT_MS = 1_000;
export const MAX_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 50 * 1024;
export const TRUNCATION_MARKER = '\n... (output truncated)';

export interface ShellRule {
	/** Command prefix, compared token by token: `git status` matches `git status -s` */
	pattern: string;
	/** When set, every non-flag argument after the pattern must resolve inside one of these roots */
	sandboxRoots?: readonly string[];
	approvalRequired?: boolean;
	/** Any of these tokens present forces approval */
	approvalRequiredIfArgs?: readonly string[];
}

export interface ShellDefault {
	approvalRequired?: boolean;
}

export interface WhitelistExecutorOptions {
	rules: readonly ShellRule[];
	/** Presence allows commands no rule matches */
	default?: ShellDefault;
	sandbox?: FsSandbox;
	timeoutMs?: number;
	maxOutputBytes?: number;
	workingDirectory?: string;
	env?: NodeJS.ProcessEnv;
}

export interface RuleMatch {
	/** argv to execute; sandbox path arguments are rewritten to absolute paths */
	argv: string[];
	approvalRequired: boolean;
	rule?: ShellRule;
	matchedDefault: boolean;
}

export type CommandAssessment =
	| { ok: true; match: RuleMatch }
	| { ok: false; error: WhitelistViolationError };

export interface ExecResult {
	stdout: string;
	stderr: string;
	exitCode: number;
	truncated: boolean;
	timedOut: boolean;
	durationMs: number;
}

export interface ExecOptions {
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface WhitelistExecutor {
	readonly rules: readonly ShellRule[];
	readonly hasDefault: boolean;
	checkMetacharacters(command: string): void;
	tokenize(command: string): string[];
	/** Full policy pipeline; throws WhitelistViolationError */
	match(command: string): RuleMatch;
	assess(command: string): CommandAssessment;
	run(command: string, options?: ExecOptions): Promise<ExecResult>;
	describePatterns(): string;
}

/**
 * POSIX-style word splitting: single quotes are literal, double quotes honour
 * backslash escapes, nothing is expanded.
 */
export function tokenizeCommand(input: string): string[] {
	const tokens: string[] = [];
	let current = '';
	let inToken = false;
	let inSingle = false;
	let inDouble = false;
	let escaping = false;

	for (const char of input) {
		if (inSingle) {
			if (char === "'") inSingle = false;
			else current += char;
			continue;
		}

		if (escaping) {
			current += char;
			escaping = false;
			continue;
		}

		if (inDouble) {
			if (char === '\\') escaping = true;
			else if (char === '"') inDouble = false;
			else current += char;
			continue;
		}

		if (char === '\\') {
			escaping = true;
			inToken = true;
		} else if (char === "'") {
			inSingle = true;
			inToken = true;
		} else if (char === '"') {
			inDouble = true;
			inToken = true;
		} else if (/\s/.test(char)) {
			if (inToken) {
				tokens.push(current);
				current = '';
				inToken = false;
			}
		} else {
			current += char;
			inToken = true;
		}
	}

	if (inSingle || inDouble) {
		throw new SyntaxError('No closing quotation');
	}
	if (escaping) {
		throw new SyntaxError('No escaped character');
	}
	if (inToken) tokens.push(current);

	return tokens;
}

function clampTimeout(timeoutMs: number): number {
	return Math.min(Math.max(Math.round(timeoutMs), MIN_TIMEOUT_MS), MAX_TIMEOUT_MS);
}

interface CompiledRule {
	rule: ShellRule;
	tokens: string[];
}

export function createWhitelistExecutor(options: WhitelistExecutorOptions): WhitelistExecutor {
	const { sandbox } = options;
	const defaultTimeout = clampTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
	const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

	const compiled: CompiledRule[] = options.rules.map((rule) => {
		let tokens: string[];
		try {
			tokens = tokenizeCommand(rule.pattern);
		} catch (err) {
			throw new ConfigurationError(
				`Shell rule pattern '${rule.pattern}' cannot be parsed: ${err instanceof Error ? err.message : String(err)}`,
			);
		}
		if (tokens.length === 0) {
			throw new ConfigurationError('Shell rule pattern must not be empty');
		}
		for (const rootName of rule.sandboxRoots ?? []) {
			if (!sandbox || !sandbox.roots.some((root) => root.name === rootName)) {
				throw new ConfigurationError(
					`Shell rule '${rule.pattern}' references unknown sandbox root '${rootName}'`,
				);
			}
		}
		return { rule, tokens };
	});

	const hasDefault = options.default !== undefined;

	function describePatterns(): string {
		const patterns = compiled.map((entry) => entry.rule.pattern);
		const listed = patterns.length > 0 ? patterns.join(', ') : '(none)';
		const fallback = hasDefault ? 'other commands fall back to the default rule' : 'no default rule';
		return `Allowed command patterns: ${listed} (${fallback})`;
	}

	function checkMetacharacters(command: string): void {
		for (const meta of BLOCKED_METACHARACTERS) {
			if (command.includes(meta)) {
				throw new WhitelistViolationError(
					'metacharacter',
					command,
					`Command contains blocked metacharacter '${meta}'. Shell metacharacters are not allowed; run a single command without pipes or redirects.`,
				);
			}
		}
	}

	function tokenize(command: string): string[] {
		try {
			return tokenizeCommand(command);
		} catch (err) {
			throw new WhitelistViolationError(
				'parse',
				command,
				`Cannot parse command: ${err instanceof Error ? err.message : String(err)}`,
			);
		}
	}

	/**
	 * Rewrites the non-flag arguments after the pattern to absolute sandbox
	 * paths. Undefined when any of them falls outside the rule's roots.
	 */
	function bindPathArgs(entry: CompiledRule, argv: string[]): string[] | undefined {
		const roots = entry.rule.sandboxRoots;
		if (!roots || roots.length === 0 || !sandbox) return argv;

		const bound = argv.slice(0, entry.tokens.length);
		for (const arg of argv.slice(entry.tokens.length)) {
			if (arg.startsWith('-')) {
				bound.push(arg);
				continue;
			}
			const resolved = sandbox.resolveWithin(arg, roots);
			if (resolved === undefined) return undefined;
			bound.push(resolved);
		}
		return bound;
	}

	function match(command: string): RuleMatch {
		checkMetacharacters(command);
		const argv = tokenize(command);
		if (argv.length === 0) {
			throw new WhitelistViolationError('empty', command, 'Empty command');
		}

		for (const entry of compiled) {
			if (argv.length < entry.tokens.length) continue;
			if (!entry.tokens.every((token, index) => argv[index] === token)) continue;

			const bound = bindPathArgs(entry, argv);
			if (!bound) {
				logger.debug('Rule skipped: path argument outside its roots', {
					pattern: entry.rule.pattern,
				});
				continue;
			}

			const forcing = entry.rule.approvalRequiredIfArgs ?? [];
			const forced = forcing.some((flag) => argv.includes(flag));
			return {
				argv: bound,
				approvalRequired: forced || (entry.rule.approvalRequired ?? true),
				rule: entry.rule,
				matchedDefault: false,
			};
		}

		if (options.default) {
			return {
				argv,
				approvalRequired: options.default.approvalRequired ?? true,
				matchedDefault: true,
			};
		}

		throw new WhitelistViolationError(
			'not_whitelisted',
			command,
			`Command not in whitelist (no matching rule and no default): ${redactSecrets(command)}\n${describePatterns()}`,
		);
	}

	function assess(command: string): CommandAssessment {
		try {
			return { ok: true, match: match(command) };
		} catch (err) {
			if (err instanceof WhitelistViolationError) {
				return { ok: false, error: err };
			}
			throw err;
		}
	}

	function withSandboxNote(stderr: string): string {
		if (!sandbox || !stderr.includes('Permission denied')) return stderr;
		const writable = sandbox.writableRoots();
		const listed = writable.length > 0 ? writable.join(', ') : '(none)';
		return `${stderr}\n\nNote: commands may only write inside writable sandbox roots: ${listed}`;
	}

	async function run(command: string, runOptions: ExecOptions = {}): Promise<ExecResult> {
		const matched = match(command);
		const timeoutMs = runOptions.timeoutMs ? clampTimeout(runOptions.timeoutMs) : defaultTimeout;
		const result = await spawnCapped(matched.argv, {
			cwd: options.workingDirectory ?? process.cwd(),
			env: options.env ?? process.env,
			timeoutMs,
			maxOutputBytes,
			signal: runOptions.signal,
		});

		logger.info('Shell command executed', {
			command: redactSecrets(command),
			exitCode: result.exitCode,
			timedOut: result.timedOut,
			durationMs: result.durationMs,
		});

		if (result.exitCode !== 0) {
			return { ...result, stderr: withSandboxNote(result.stderr) };
		}
		return result;
	}

	return {
		rules: options.rules,
		hasDefault,
		checkMetacharacters,
		tokenize,
		match,
		assess,
		run,
		describePatterns,
	};
}

interface SpawnOptions {
	cwd: string;
	env: NodeJS.ProcessEnv;
	timeoutMs: number;
	maxOutputBytes: number;
	signal?: AbortSignal;
}

interface CappedStream {
	chunks: Buffer[];
	bytes: number;
	truncated: boolean;
}

function appendCapped(stream: CappedStream, chunk: Buffer, maxBytes: number): void {
	const room = maxBytes - stream.bytes;
	if (room <= 0) {
		stream.truncated = true;
		return;
	}
	if (chunk.length > room) {
		stream.chunks.push(chunk.subarray(0, room));
		stream.bytes += room;
		stream.truncated = true;
		return;
	}
	stream.chunks.push(chunk);
	stream.bytes += chunk.length;
}

/** Drops a multi-byte sequence left incomplete by the byte cap */
function trimPartialChar(bytes: Buffer): Buffer {
	let start = bytes.length - 1;
	while (start > 0 && start > bytes.length - 4 && (bytes.readUInt8(start) & 0xc0) === 0x80) {
		start--;
	}
	if (start < 0) return bytes;
	const lead = bytes.readUInt8(start);
	const width = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
	return bytes.length - start < width ? bytes.subarray(0, start) : bytes;
}

function decode(stream: CappedStream): string {
	const joined = Buffer.concat(stream.chunks);
	const text = (stream.truncated ? trimPartialChar(joined) : joined).toString('utf-8');
	return stream.truncated ? `${text}${TRUNCATION_MARKER}` : text;
}

function errnoCode(err: unknown): string | undefined {
	if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
		return err.code;
	}
	return undefined;
}

/**
 * Runs argv without a shell. Exit codes, missing binaries (127) and
 * permission failures (126) come back as results.
 */
function spawnCapped(argv: string[], options: SpawnOptions): Promise<ExecResult> {
	const [file, ...args] = argv;
	const started = Date.now();

	return new Promise<ExecResult>((resolve) => {
		if (file === undefined) {
			resolve({
				stdout: '',
				stderr: 'Empty command',
				exitCode: 127,
				truncated: false,
				timedOut: false,
				durationMs: 0,
			});
			return;
		}

		const stdout: CappedStream = { chunks: [], bytes: 0, truncated: false };
		const stderr: CappedStream = { chunks: [], bytes: 0, truncated: false };
		let timedOut = false;
		let settled = false;

		const child = spawn(file, args, {
			cwd: options.cwd,
			env: options.env,
			shell: false,
			stdio: ['ignore', 'pipe', 'pipe'],
			signal: options.signal,
		});

		const settle = (result: Omit<ExecResult, 'durationMs'>) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			resolve({ ...result, durationMs: Date.now() - started });
		};

		const timer = setTimeout(() => {
			timedOut = true;
			child.kill('SIGKILL');
		}, options.timeoutMs);

		child.stdout.on('data', (chunk: Buffer) => appendCapped(stdout, chunk, options.maxOutputBytes));
		child.stderr.on('data', (chunk: Buffer) => appendCapped(stderr, chunk, options.maxOutputBytes));

		const failed = (exitCode: number, message: string) =>
			settle({ stdout: '', stderr: message, exitCode, truncated: false, timedOut: false });

		child.on('error', (err) => {
			const code = errnoCode(err);
			if (code === 'ENOENT') {
				failed(127, `Command not found: ${file}`);
				return;
			}
			if (code === 'EACCES') {
				failed(126, `Permission denied: ${file}`);
				return;
			}
			settle({
				stdout: decode(stdout),
				stderr: `Failed to run ${file}: ${err.message}`,
				exitCode: -1,
				truncated: stdout.truncated || stderr.truncated,
				timedOut,
			});
		});

		child.on('close', (code) => {
			if (timedOut) {
				settle({
					stdout: decode(stdout),
					stderr: `Command timed out after ${Math.round(options.timeoutMs / 1000)} seconds`,
					exitCode: -1,
					truncated: stdout.truncated || stderr.truncated,
					timedOut: true,
				});
				return;
			}
			settle({
				stdout: decode(stdout),
				stderr: decode(stderr),
				exitCode: code ?? -1,
				truncated: stdout.truncated || stderr.truncated,
				timedOut: false,
			});
		});
	});
}
