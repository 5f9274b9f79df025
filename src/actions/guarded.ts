import { type ApprovalGateway, describeRequest } from '../policy/approval.js';
import type { PolicyEngine } from '../policy/engine.js';
import type { ActionArgs, ActionRequest } from '../policy/types.js';
import { PolicyDeniedError, UnknownActionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Action, ActionProvider, InvocationContext, ProviderKind } from './types.js';

const logger = createLogger('actions:guard');

export interface Guard {
	engine: PolicyEngine;
	gateway: ApprovalGateway;
	/** Return denials as PermissionErrorValue instead of throwing */
	returnPermissionErrors: boolean;
}

export interface PermissionErrorValue {
	error: string;
	actionName: string;
	errorType: 'permission';
}

export function isPermissionErrorValue(value: unknown): value is PermissionErrorValue {
	return (
		typeof value === 'object' &&
		value !== null &&
		'errorType' in value &&
		value.errorType === 'permission'
	);
}

/**
 * A provider with every invocation routed through policy evaluation and, when
 * needed, the approval gateway.
 */
export interface GuardedProvider {
	readonly kind: ProviderKind;
	readonly id: string;
	readonly inner: ActionProvider;
	listActions(): readonly Action[];
	invoke(name: string, rawArgs: unknown, context: InvocationContext): Promise<unknown>;
}

export function createGuardedProvider(inner: ActionProvider, guard: Guard): GuardedProvider {
	const actionsByName = new Map(inner.listActions().map((action) => [action.name, action]));

	async function authorize(request: ActionRequest, context: InvocationContext): Promise<void> {
		const { outcome, assessment, capabilities } = guard.engine.evaluate(request, inner);

		switch (outcome.status) {
			case 'pre_approved':
				return;
			case 'blocked':
				logger.warn('Action blocked', {
					action: request.name,
					branchId: request.branchId,
					reason: outcome.reason,
				});
				// Boundary violations keep their own error type.
				if (assessment.violation) throw assessment.violation;
				throw new PolicyDeniedError('blocked', request.name, outcome.reason);
			case 'needs_approval': {
				const decision = await guard.gateway.request(request, {
					description: assessment.description ?? describeRequest(request, capabilities),
					signal: context.signal,
				});
				if (!decision.approved) {
					throw new PolicyDeniedError(
						'rejected',
						request.name,
						'Rejected by approver',
						decision.note,
					);
				}
				return;
			}
		}
	}

	async function invoke(name: string, rawArgs: unknown, context: InvocationContext): Promise<unknown> {
		const action = actionsByName.get(name);
		if (!action) {
			throw new UnknownActionError(name, [...actionsByName.keys()]);
		}
		const args: ActionArgs = action.parse(rawArgs);
		const request: ActionRequest = { name, args, branchId: context.branchId };

		try {
			await authorize(request, context);
		} catch (err) {
			if (guard.returnPermissionErrors && err instanceof PolicyDeniedError) {
				return {
					error: err.message,
					actionName: name,
					errorType: 'permission',
				} satisfies PermissionErrorValue;
			}
			throw err;
		}

		return inner.invoke(name, args, context);
	}

	return {
		kind: inner.kind,
		id: inner.id,
		inner,
		listActions: () => inner.listActions(),
		invoke,
	};
}
