import type { ActionAssessment, ActionPolicy, ActionRequest } from '../policy/types.js';
import { type Action, type CustomActionProvider, invokeFromList } from './types.js';

export interface CustomActionProviderOptions {
	id: string;
	actions: readonly Action[];
	/** Self-reported capabilities and defaults for this provider's requests */
	assess?(request: ActionRequest): ActionAssessment;
	policy?: Readonly<Record<string, ActionPolicy>>;
}

/**
 * Wraps user-defined actions built with `createAction`.
 */
export function createCustomActionProvider(options: CustomActionProviderOptions): CustomActionProvider {
	const { id, actions } = options;
	return {
		kind: 'custom',
		id,
		policy: options.policy,
		listActions: () => actions,
		invoke: (name, args, context) => invokeFromList(id, actions, name, args, context),
		assess: options.assess,
	};
}
