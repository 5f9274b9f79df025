import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import type { ActionRequest } from '../../policy/types.js';
import type { BranchSpec } from '../../runtime/types.js';
import { createFsSandbox, type FsSandbox } from '../../sandbox/fs-sandbox.js';
import { createWhitelistExecutor } from '../../sandbox/shell-exec.js';
import {
	ConfigurationError,
	InvalidArgumentsError,
	SandboxViolationError,
	UnknownActionError,
	WhitelistViolationError,
} from '../../utils/errors.js';
import { createCustomActionProvider } from '../custom-actions.js';
import { createDelegateActionProvider, DELEGATE_CAPABILITY } from '../delegate-actions.js';
import { createFsActionProvider, FS_READ_CAPABILITY, FS_WRITE_CAPABILITY } from '../fs-actions.js';
import { createShellActionProvider, EXEC_CAPABILITY, EXEC_UNLISTED_CAPABILITY } from '../shell-actions.js';
import { createAction, type InvocationContext } from '../types.js';

const context: InvocationContext = { branchId: 'b-1', depth: 0 };

function request(name: string, args: Record<string, unknown> = {}): ActionRequest {
	return { name, args, branchId: 'b-1' };
}

describe('filesystem provider', () => {
	let base: string;
	let sandbox: FsSandbox;

	beforeEach(() => {
		base = mkdtempSync(join(tmpdir(), 'capgate-fsactions-'));
		mkdirSync(join(base, 'docs'));
		writeFileSync(join(base, 'docs', 'a.md'), 'alpha');
		sandbox = createFsSandbox({
			baseDir: base,
			roots: {
				docs: { path: 'docs', mode: 'ro' },
				out: { path: 'out', mode: 'rw' },
			},
		});
	});

	afterEach(() => {
		rmSync(base, { recursive: true, force: true });
	});

	it('exposes read, write and list actions', () => {
		const provider = createFsActionProvider({ sandbox });

		expect(provider.kind).toBe('filesystem');
		expect(provider.id).toBe('filesystem');
		expect(provider.listActions().map((action) => action.name)).toEqual([
			'read_file',
			'write_file',
			'list_files',
		]);
		expect(provider.listActions()[1]?.getDefinition().description).toContain('Writable: out/');
	});

	it('reports capabilities and root approval defaults', () => {
		const provider = createFsActionProvider({ sandbox });

		expect(provider.assess(request('read_file', { path: 'docs/a.md' }))).toEqual({
			capabilities: [FS_READ_CAPABILITY],
			violation: undefined,
			approvalRequired: false,
		});
		expect(provider.assess(request('write_file', { path: 'out/b.txt' }))).toEqual({
			capabilities: [FS_WRITE_CAPABILITY],
			violation: undefined,
			approvalRequired: true,
		});
		expect(provider.assess(request('list_files', { path: '.' })).approvalRequired).toBe(false);
		expect(provider.assess(request('other'))).toEqual({});
	});

	it('reports boundary violations before anything runs', () => {
		const provider = createFsActionProvider({ sandbox });

		const write = provider.assess(request('write_file', { path: 'docs/a.md' }));
		expect(write.violation).toBeInstanceOf(SandboxViolationError);
		expect(write.violation?.message).toBe(
			"Cannot write to 'docs/a.md': root 'docs' is read-only.\nWritable paths: out/",
		);

		const escape = provider.assess(request('read_file', { path: 'docs/../../etc/passwd' }));
		expect(escape.violation).toBeInstanceOf(SandboxViolationError);
		expect(provider.assess(request('read_file', { path: '/etc/passwd' })).approvalRequired).toBe(true);
	});

	it('invokes actions against the sandbox', async () => {
		const provider = createFsActionProvider({ sandbox });

		await provider.invoke('write_file', { path: 'out/b.txt', content: 'beta' }, context);

		expect(await provider.invoke('read_file', { path: 'out/b.txt' }, context)).toMatchObject({
			content: 'beta',
			truncated: false,
		});
		expect(await provider.invoke('list_files', {}, context)).toEqual(['docs/a.md', 'out/b.txt']);
	});

	it('validates arguments and names', async () => {
		const provider = createFsActionProvider({ sandbox });

		await expect(provider.invoke('read_file', { path: '' }, context)).rejects.toBeInstanceOf(
			InvalidArgumentsError,
		);
		await expect(provider.invoke('delete_file', {}, context)).rejects.toBeInstanceOf(
			UnknownActionError,
		);
	});
});

describe('shell provider', () => {
	it('labels whitelisted and default-matched commands differently', () => {
		const provider = createShellActionProvider({
			executor: createWhitelistExecutor({
				rules: [{ pattern: 'git status', approvalRequired: false }],
				default: {},
			}),
		});

		expect(provider.assess(request('shell', { command: 'git status' }))).toEqual({
			capabilities: [EXEC_CAPABILITY],
			approvalRequired: false,
			description: 'Execute: git status',
		});
		expect(provider.assess(request('shell', { command: 'git push' }))).toEqual({
			capabilities: [EXEC_UNLISTED_CAPABILITY],
			approvalRequired: true,
			description: 'Execute: git push',
		});
	});

	it('reports whitelist violations with a masked description', () => {
		const provider = createShellActionProvider({
			executor: createWhitelistExecutor({ rules: [{ pattern: 'echo' }] }),
		});

		const assessment = provider.assess(request('shell', { command: 'curl -H TOKEN=abc123 x' }));

		expect(assessment.violation).toBeInstanceOf(WhitelistViolationError);
		expect(assessment.description).toBe('Execute: curl -H TOKEN=[REDACTED] x');
		expect(assessment.capabilities).toBeUndefined();
	});

	it('runs the command', async () => {
		const provider = createShellActionProvider({
			executor: createWhitelistExecutor({ rules: [{ pattern: 'echo' }] }),
		});

		expect(await provider.invoke('shell', { command: 'echo ok' }, context)).toMatchObject({
			stdout: 'ok\n',
			exitCode: 0,
		});
	});
});

describe('delegate provider', () => {
	const researcher: BranchSpec = {
		name: 'researcher',
		description: 'Finds things out.',
		instructions: 'Research the question.',
		providers: [],
	};
	const writer: BranchSpec = { name: 'writer', instructions: 'Write.', providers: [] };

	it('exposes one action per target', () => {
		const provider = createDelegateActionProvider({ targets: [researcher, writer] });

		expect(provider.listActions().map((action) => action.getDefinition())).toEqual([
			{
				name: 'researcher',
				description: 'Finds things out.',
				parameters: {
					type: 'object',
					properties: { input: { type: 'string', description: "Prompt for 'researcher'" } },
					required: ['input'],
				},
			},
			{
				name: 'writer',
				description: "Delegate a task to the 'writer' branch.",
				parameters: {
					type: 'object',
					properties: { input: { type: 'string', description: "Prompt for 'writer'" } },
					required: ['input'],
				},
			},
		]);
	});

	it('does not require approval unless configured', () => {
		const open = createDelegateActionProvider({ targets: [researcher, writer] });
		const strict = createDelegateActionProvider({
			targets: [researcher, writer],
			callsRequireApproval: true,
			overrides: { writer: { requiresApproval: false } },
		});

		expect(open.assess(request('researcher', { input: 'why?' }))).toEqual({
			capabilities: [DELEGATE_CAPABILITY],
			approvalRequired: false,
			description: "Delegate to 'researcher': why?",
		});
		expect(strict.assess(request('researcher', { input: 'x' })).approvalRequired).toBe(true);
		expect(strict.assess(request('writer', { input: 'x' })).approvalRequired).toBe(false);
	});

	it('hands the target to the running branch', async () => {
		const provider = createDelegateActionProvider({ targets: [researcher] });
		const delegate = vi.fn(async () => 'found it');

		const result = await provider.invoke('researcher', { input: 'look' }, { ...context, delegate });

		expect(result).toBe('found it');
		expect(delegate).toHaveBeenCalledWith(researcher, 'look');
	});

	it('refuses to delegate outside a running branch', async () => {
		const provider = createDelegateActionProvider({ targets: [researcher] });

		await expect(provider.invoke('researcher', { input: 'x' }, context)).rejects.toBeInstanceOf(
			ConfigurationError,
		);
	});
});

describe('custom provider', () => {
	const add = createAction({
		name: 'add',
		description: 'Add two numbers',
		parameters: z.object({ a: z.number(), b: z.number() }),
		jsonSchema: { type: 'object' },
		async execute(params) {
			return params.a + params.b;
		},
	});

	it('runs user actions and forwards the assessment', async () => {
		const provider = createCustomActionProvider({
			id: 'math',
			actions: [add],
			assess: () => ({ capabilities: ['compute'], approvalRequired: false }),
		});

		expect(await provider.invoke('add', { a: 2, b: 3 }, context)).toBe(5);
		expect(provider.assess?.(request('add'))).toEqual({
			capabilities: ['compute'],
			approvalRequired: false,
		});
	});

	it('names the provider in unknown-action errors', async () => {
		const provider = createCustomActionProvider({ id: 'math', actions: [add] });

		await expect(provider.invoke('sub', {}, context)).rejects.toThrow(
			"Unknown action 'math:sub'. Available actions: add",
		);
	});

	it('rejects action names that do not start with a letter', () => {
		expect(() =>
			createAction({
				name: '1st',
				description: '',
				parameters: z.object({}),
				jsonSchema: {},
				execute: async () => undefined,
			}),
		).toThrow(InvalidArgumentsError);
	});
});
