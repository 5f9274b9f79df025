import { z } from 'zod';
import type { ActionAssessment, ActionPolicy, ActionRequest } from '../policy/types.js';
import { MAX_TIMEOUT_MS, type WhitelistExecutor } from '../sandbox/shell-exec.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { createAction, invokeFromList, type ShellActionProvider, stringArg } from './types.js';

export const SHELL_ACTION = 'shell';
export const EXEC_CAPABILITY = 'process.exec';
export const EXEC_UNLISTED_CAPABILITY = 'process.exec.unlisted';

const DESCRIPTION_MAX = 80;

const ShellParams = z.object({
	command: z.string().min(1),
	timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

export interface ShellActionProviderOptions {
	executor: WhitelistExecutor;
	id?: string;
	policy?: Readonly<Record<string, ActionPolicy>>;
}

function describeCommand(command: string): string {
	const shown =
		command.length > DESCRIPTION_MAX ? `${command.slice(0, DESCRIPTION_MAX - 3)}...` : command;
	return `Execute: ${redactSecrets(shown)}`;
}

export function createShellActionProvider(options: ShellActionProviderOptions): ShellActionProvider {
	const { executor } = options;
	const id = options.id ?? 'shell';

	const actions = [
		createAction({
			name: SHELL_ACTION,
			description: `Run one whitelisted command without a shell. Pipes, redirects and chaining are rejected. ${executor.describePatterns()}`,
			parameters: ShellParams,
			jsonSchema: {
				type: 'object',
				properties: {
					command: { type: 'string', description: 'Command line, e.g. "git status"' },
					timeoutMs: {
						type: 'number',
						description: `Timeout in milliseconds (clamped to 1000..${MAX_TIMEOUT_MS})`,
					},
				},
				required: ['command'],
			},
			async execute(params, context) {
				return executor.run(params.command, {
					timeoutMs: params.timeoutMs,
					signal: context.signal,
				});
			},
		}),
	];

	function assess(request: ActionRequest): ActionAssessment {
		if (request.name !== SHELL_ACTION) return {};
		const command = stringArg(request.args, 'command') ?? '';
		const assessment = executor.assess(command);
		if (!assessment.ok) {
			return { violation: assessment.error, description: describeCommand(command) };
		}
		const { match } = assessment;
		return {
			capabilities: [match.matchedDefault ? EXEC_UNLISTED_CAPABILITY : EXEC_CAPABILITY],
			approvalRequired: match.approvalRequired,
			description: describeCommand(command),
		};
	}

	return {
		kind: 'shell',
		id,
		executor,
		policy: options.policy,
		listActions: () => actions,
		invoke: (name, args, context) => invokeFromList(id, actions, name, args, context),
		assess,
	};
}
