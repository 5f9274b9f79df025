import { z } from 'zod';
import type { ActionAssessment, ActionPolicy, ActionRequest } from '../policy/types.js';
import {
	DEFAULT_LIST_PATTERN,
	DEFAULT_MAX_CHARS,
	type FsSandbox,
} from '../sandbox/fs-sandbox.js';
import { SandboxViolationError } from '../utils/errors.js';
import { createAction, type FsActionProvider, invokeFromList, stringArg } from './types.js';

export const FS_READ_CAPABILITY = 'filesystem.read';
export const FS_WRITE_CAPABILITY = 'filesystem.write';

const ReadFileParams = z.object({
	path: z.string().min(1),
	maxChars: z.number().int().positive().optional(),
	offset: z.number().int().nonnegative().optional(),
});

const WriteFileParams = z.object({
	path: z.string().min(1),
	content: z.string(),
});

const ListFilesParams = z.object({
	path: z.string().min(1).default('.'),
	pattern: z.string().min(1).default(DEFAULT_LIST_PATTERN),
});

export interface FsActionProviderOptions {
	sandbox: FsSandbox;
	id?: string;
	policy?: Readonly<Record<string, ActionPolicy>>;
}

export function createFsActionProvider(options: FsActionProviderOptions): FsActionProvider {
	const { sandbox } = options;
	const id = options.id ?? 'filesystem';
	const rootSummary = sandbox.describeRoots();

	const actions = [
		createAction({
			name: 'read_file',
			description: `Read a UTF-8 text file from a sandbox root. Paths look like "root/relative/path". Roots: ${rootSummary}`,
			parameters: ReadFileParams,
			jsonSchema: {
				type: 'object',
				properties: {
					path: { type: 'string', description: 'Sandbox path, e.g. "docs/notes.md"' },
					maxChars: {
						type: 'number',
						description: `Maximum characters to return (default ${DEFAULT_MAX_CHARS})`,
					},
					offset: { type: 'number', description: 'Character offset to start from (default 0)' },
				},
				required: ['path'],
			},
			async execute(params) {
				return sandbox.read(params.path, { maxChars: params.maxChars, offset: params.offset });
			},
		}),
		createAction({
			name: 'write_file',
			description: `Create or overwrite a UTF-8 text file in a writable sandbox root. Writable: ${sandbox.writableRoots().join(', ') || '(none)'}`,
			parameters: WriteFileParams,
			jsonSchema: {
				type: 'object',
				properties: {
					path: { type: 'string', description: 'Sandbox path, e.g. "out/report.md"' },
					content: { type: 'string', description: 'Text content to write' },
				},
				required: ['path', 'content'],
			},
			async execute(params) {
				return sandbox.write(params.path, params.content);
			},
		}),
		createAction({
			name: 'list_files',
			description: 'List files under a sandbox path matching a glob. Use "." for every root.',
			parameters: ListFilesParams,
			jsonSchema: {
				type: 'object',
				properties: {
					path: { type: 'string', description: 'Sandbox directory, or "." for all roots' },
					pattern: { type: 'string', description: `Glob pattern (default "${DEFAULT_LIST_PATTERN}")` },
				},
			},
			async execute(params) {
				return sandbox.list(params.path, params.pattern);
			},
		}),
	];

	function violationOf(run: () => unknown): SandboxViolationError | undefined {
		try {
			run();
			return undefined;
		} catch (err) {
			if (err instanceof SandboxViolationError) return err;
			throw err;
		}
	}

	function assess(request: ActionRequest): ActionAssessment {
		const path = stringArg(request.args, 'path') ?? '.';

		switch (request.name) {
			case 'read_file':
				return {
					capabilities: [FS_READ_CAPABILITY],
					violation: violationOf(() => sandbox.checkRead(path)),
					approvalRequired: sandbox.rootFor(path)?.readApproval ?? true,
				};
			case 'write_file':
				return {
					capabilities: [FS_WRITE_CAPABILITY],
					violation: violationOf(() => sandbox.checkWrite(path)),
					approvalRequired: sandbox.rootFor(path)?.writeApproval ?? true,
				};
			case 'list_files': {
				const all = path.trim() === '.' || path.trim() === '';
				const root = all ? undefined : sandbox.rootFor(path);
				const roots = all ? sandbox.roots : root ? [root] : [];
				return {
					capabilities: [FS_READ_CAPABILITY],
					violation: all ? undefined : violationOf(() => sandbox.locateDir(path)),
					approvalRequired: roots.length === 0 || roots.some((entry) => entry.readApproval),
				};
			}
			default:
				return {};
		}
	}

	return {
		kind: 'filesystem',
		id,
		sandbox,
		policy: options.policy,
		listActions: () => actions,
		invoke: (name, args, context) => invokeFromList(id, actions, name, args, context),
		assess,
	};
}
