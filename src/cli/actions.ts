import type { Command } from 'commander';
import { isPermissionErrorValue } from '../actions/guarded.js';
import { SHELL_ACTION } from '../actions/shell-actions.js';
import type { Services } from '../bootstrap.js';
import { createScriptedExecutor } from '../runtime/executors.js';
import type { BranchSpec } from '../runtime/types.js';
import type { ReadResult, WriteResult } from '../sandbox/fs-sandbox.js';
import type { ExecResult } from '../sandbox/shell-exec.js';
import { isRecord } from '../utils/result.js';

const CLI_BRANCH = 'cli';

interface ActionCliOutput {
	write(value: string): void;
	writeError(value: string): void;
}

export interface ActionCliHandlers {
	evaluate(actionName: string, args: Record<string, unknown>): Promise<string>;
	read(path: string, options?: { maxChars?: number; offset?: number }): Promise<string>;
	write(path: string, content: string): Promise<string>;
	list(path?: string, pattern?: string): Promise<string>;
	exec(command: string, options?: { timeoutMs?: number }): Promise<string>;
	roots(): Promise<string>;
}

export interface ActionCliServices {
	services: Services;
	close?(): void;
}

interface RegisterActionCommandOptions {
	resolveServices(configPath?: string): Promise<ActionCliServices>;
}

function isReadResult(value: unknown): value is ReadResult {
	return isRecord(value) && typeof value.content === 'string' && typeof value.totalChars === 'number';
}

function isWriteResult(value: unknown): value is WriteResult {
	return isRecord(value) && typeof value.path === 'string' && typeof value.bytesWritten === 'number';
}

function isExecResult(value: unknown): value is ExecResult {
	return isRecord(value) && typeof value.stdout === 'string' && typeof value.exitCode === 'number';
}

function isStringList(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function unexpected(actionName: string, value: unknown): Error {
	return new Error(`Unexpected result from '${actionName}': ${JSON.stringify(value)}`);
}

export function createActionCliHandlers(services: Services): ActionCliHandlers {
	const { run, sandbox, shell } = services;

	/** One top-level call on the run, performing a single gated action */
	async function invokeGated(actionName: string, args: Record<string, unknown>): Promise<unknown> {
		const spec: BranchSpec = {
			name: CLI_BRANCH,
			instructions: `Run ${actionName} from the command line`,
			providers: [services.fsProvider, services.shellProvider],
			executor: createScriptedExecutor(({ actions }) => actions.invoke(actionName, args)),
		};
		const result = await run.call(spec, `${actionName} ${JSON.stringify(args)}`);
		if (isPermissionErrorValue(result.output)) {
			throw new Error(result.output.error);
		}
		return result.output;
	}

	return {
		async evaluate(actionName, args) {
			const set = run.resolve(services.branch(CLI_BRANCH, 'evaluate'));
			const provider = set.providerFor(actionName);
			const evaluation = run.engine.evaluate(
				{ name: actionName, args, branchId: CLI_BRANCH },
				provider?.inner,
			);
			const lines = [`Action: ${actionName}`, `Outcome: ${evaluation.outcome.status}`];
			if (evaluation.outcome.status === 'blocked') {
				lines.push(`Reason: ${evaluation.outcome.reason}`);
			}
			const capabilities = [...evaluation.capabilities].sort();
			lines.push(`Capabilities: ${capabilities.length > 0 ? capabilities.join(', ') : '(none)'}`);
			if (!provider) {
				lines.push('Provider: (none; run-level policy only)');
			} else {
				lines.push(`Provider: ${provider.id} (${provider.kind})`);
			}
			return lines.join('\n');
		},

		async read(path, options = {}) {
			const result = await invokeGated('read_file', { path, ...options });
			if (!isReadResult(result)) throw unexpected('read_file', result);
			if (!result.truncated) return result.content;
			const end = result.offset + result.charsRead;
			return `${result.content}\n[truncated: characters ${result.offset}-${end} of ${result.totalChars}; continue with --offset ${end}]`;
		},

		async write(path, content) {
			const result = await invokeGated('write_file', { path, content });
			if (!isWriteResult(result)) throw unexpected('write_file', result);
			return `Wrote ${result.charsWritten} characters (${result.bytesWritten} bytes) to ${result.path}`;
		},

		async list(path = '.', pattern) {
			const args: Record<string, unknown> = { path };
			if (pattern) args.pattern = pattern;
			const result = await invokeGated('list_files', args);
			if (!isStringList(result)) throw unexpected('list_files', result);
			return result.length > 0 ? result.join('\n') : '(no files)';
		},

		async exec(command, options = {}) {
			const args: Record<string, unknown> = { command };
			if (options.timeoutMs !== undefined) args.timeoutMs = options.timeoutMs;
			const result = await invokeGated(SHELL_ACTION, args);
			if (!isExecResult(result)) throw unexpected(SHELL_ACTION, result);
			const parts = [result.stdout.trimEnd()];
			if (result.stderr.trim()) parts.push(`[stderr]\n${result.stderr.trimEnd()}`);
			parts.push(`[exit ${result.exitCode}${result.timedOut ? ', timed out' : ''}]`);
			return parts.filter((part) => part.length > 0).join('\n');
		},

		async roots() {
			const readable = sandbox.readableRoots();
			const writable = sandbox.writableRoots();
			return [
				'Sandbox roots:',
				sandbox.describeRoots(),
				`Readable: ${readable.length > 0 ? readable.join(', ') : '(none)'}`,
				`Writable: ${writable.length > 0 ? writable.join(', ') : '(none)'}`,
				shell.describePatterns(),
			].join('\n');
		},
	};
}

function createActionCliOutput(): ActionCliOutput {
	return {
		write: (value) => process.stdout.write(`${value}\n`),
		writeError: (value) => process.stderr.write(`${value}\n`),
	};
}

function parseIntOption(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isFinite(parsed)) {
		throw new Error(`Expected an integer, got '${value}'`);
	}
	return parsed;
}

function parseArgsOption(value: string): Record<string, unknown> {
	const parsed: unknown = JSON.parse(value);
	if (!isRecord(parsed)) {
		throw new Error('--args must be a JSON object');
	}
	return parsed;
}

async function withHandlers(
	options: RegisterActionCommandOptions,
	configPath: string | undefined,
	run: (handlers: ActionCliHandlers) => Promise<string>,
): Promise<string> {
	const resolved = await options.resolveServices(configPath);
	try {
		return await run(createActionCliHandlers(resolved.services));
	} finally {
		resolved.close?.();
	}
}

export function registerActionCommands(
	program: Command,
	options: RegisterActionCommandOptions,
): void {
	const output = createActionCliOutput();

	const execute = async (
		configPath: string | undefined,
		run: (handlers: ActionCliHandlers) => Promise<string>,
	) => {
		try {
			output.write(await withHandlers(options, configPath, run));
		} catch (error) {
			output.writeError(`Error: ${error instanceof Error ? error.message : String(error)}`);
			process.exitCode = 1;
		}
	};

	program
		.command('evaluate')
		.argument('<action>', 'Action name, e.g. write_file')
		.option('-c, --config <path>', 'Path to config file')
		.option('--args <json>', 'Action arguments as a JSON object', parseArgsOption, {})
		.description('Show the policy outcome for an action without running it')
		.action(async (action: string, commandOptions: { config?: string; args: Record<string, unknown> }) =>
			execute(commandOptions.config, (handlers) => handlers.evaluate(action, commandOptions.args)),
		);

	const fs = program.command('fs').description('Sandboxed filesystem operations');

	fs.command('read')
		.argument('<path>', 'Sandbox path, e.g. docs/notes.md')
		.option('-c, --config <path>', 'Path to config file')
		.option('--max-chars <n>', 'Maximum characters to return', parseIntOption)
		.option('--offset <n>', 'Character offset', parseIntOption)
		.description('Read a file through the sandbox')
		.action(
			async (
				path: string,
				commandOptions: { config?: string; maxChars?: number; offset?: number },
			) =>
				execute(commandOptions.config, (handlers) =>
					handlers.read(path, { maxChars: commandOptions.maxChars, offset: commandOptions.offset }),
				),
		);

	fs.command('write')
		.argument('<path>', 'Sandbox path')
		.argument('<content>', 'Text to write')
		.option('-c, --config <path>', 'Path to config file')
		.description('Write a file through the sandbox')
		.action(async (path: string, content: string, commandOptions: { config?: string }) =>
			execute(commandOptions.config, (handlers) => handlers.write(path, content)),
		);

	fs.command('list')
		.argument('[path]', 'Sandbox directory, or . for every root', '.')
		.option('-c, --config <path>', 'Path to config file')
		.option('-p, --pattern <glob>', 'Glob relative to the listed directory')
		.description('List files through the sandbox')
		.action(async (path: string, commandOptions: { config?: string; pattern?: string }) =>
			execute(commandOptions.config, (handlers) => handlers.list(path, commandOptions.pattern)),
		);

	program
		.command('exec')
		.argument('<command>', 'Command line, quoted as one argument')
		.option('-c, --config <path>', 'Path to config file')
		.option('--timeout <ms>', 'Timeout in milliseconds', parseIntOption)
		.description('Run a whitelisted command without a shell')
		.action(async (command: string, commandOptions: { config?: string; timeout?: number }) =>
			execute(commandOptions.config, (handlers) =>
				handlers.exec(command, { timeoutMs: commandOptions.timeout }),
			),
		);

	program
		.command('roots')
		.option('-c, --config <path>', 'Path to config file')
		.description('Show sandbox roots and allowed command patterns')
		.action(async (commandOptions: { config?: string }) =>
			execute(commandOptions.config, (handlers) => handlers.roots()),
		);
}

export type { RegisterActionCommandOptions };
