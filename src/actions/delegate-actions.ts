import { z } from 'zod';
import type { ActionAssessment, ActionPolicy, ActionRequest } from '../policy/types.js';
import type { BranchSpec } from '../runtime/types.js';
import { ConfigurationError } from '../utils/errors.js';
import {
	type Action,
	createAction,
	type DelegateActionProvider,
	invokeFromList,
	stringArg,
} from './types.js';

export const DELEGATE_CAPABILITY = 'branch.delegate';

const DelegateParams = z.object({
	input: z.string(),
});

export interface DelegationApproval {
	/** Default for every target */
	callsRequireApproval?: boolean;
	/** Per-target override keyed by branch name */
	overrides?: Readonly<Record<string, { requiresApproval: boolean }>>;
}

export interface DelegateActionProviderOptions extends DelegationApproval {
	targets: readonly BranchSpec[];
	id?: string;
	policy?: Readonly<Record<string, ActionPolicy>>;
}

/**
 * Exposes each target branch as an action named after it. Invoking one runs
 * the target as a child branch of the caller.
 */
export function createDelegateActionProvider(
	options: DelegateActionProviderOptions,
): DelegateActionProvider {
	const id = options.id ?? 'delegate';
	const overrides = options.overrides ?? {};

	const actions: Action[] = options.targets.map((target) =>
		createAction({
			name: target.name,
			description: target.description ?? `Delegate a task to the '${target.name}' branch.`,
			parameters: DelegateParams,
			jsonSchema: {
				type: 'object',
				properties: {
					input: { type: 'string', description: `Prompt for '${target.name}'` },
				},
				required: ['input'],
			},
			async execute(params, context) {
				if (!context.delegate) {
					throw new ConfigurationError(
						`Cannot delegate to '${target.name}' outside a running branch`,
					);
				}
				return context.delegate(target, params.input);
			},
		}),
	);

	const targetNames = new Set(options.targets.map((target) => target.name));

	function assess(request: ActionRequest): ActionAssessment {
		if (!targetNames.has(request.name)) return {};
		const override = Object.hasOwn(overrides, request.name) ? overrides[request.name] : undefined;
		const input = stringArg(request.args, 'input') ?? '';
		const preview = input.length > 60 ? `${input.slice(0, 57)}...` : input;
		return {
			capabilities: [DELEGATE_CAPABILITY],
			approvalRequired: override?.requiresApproval ?? options.callsRequireApproval ?? false,
			description: `Delegate to '${request.name}': ${preview}`,
		};
	}

	return {
		kind: 'delegate',
		id,
		targets: options.targets,
		policy: options.policy,
		listActions: () => actions,
		invoke: (name, args, context) => invokeFromList(id, actions, name, args, context),
		assess,
	};
}
