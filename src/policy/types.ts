import type { CapgateError } from '../utils/errors.js';

export type ActionArgs = Record<string, unknown>;

/** One attempt by a branch to invoke a named action */
export interface ActionRequest {
	name: string;
	args: ActionArgs;
	branchId: string;
}

/** Opaque capability labels, e.g. `filesystem.write` or `process.exec.unlisted` */
export type CapabilitySet = ReadonlySet<string>;

export type ApprovalOutcome =
	| { status: 'blocked'; reason: string }
	| { status: 'pre_approved' }
	| { status: 'needs_approval' };

export type RememberScope = 'none' | 'session';

export interface ApprovalDecision {
	approved: boolean;
	remember: RememberScope;
	note?: string;
}

export type CapabilityRule = 'blocked' | 'needs_approval' | 'pre_approved';

export type LabelList = string | readonly string[];

/** Explicit per-action entry; always wins over capability rules */
export interface ActionPolicy {
	preApproved?: boolean;
	blocked?: boolean;
	blockReason?: string;
	capabilities?: LabelList;
}

export interface PolicyConfig {
	actions: Readonly<Record<string, ActionPolicy>>;
	capabilityRules: Readonly<Record<string, CapabilityRule>>;
	/** Rule for labels missing from `capabilityRules`. Unset: such labels do not decide. */
	capabilityDefault?: CapabilityRule;
	/** Static action name → labels map */
	capabilityMap: Readonly<Record<string, LabelList>>;
}

export type ApprovalMode = 'interactive' | 'approve_all' | 'reject_all';

/**
 * What a provider reports about a request before it runs.
 */
export interface ActionAssessment {
	capabilities?: readonly string[];
	/**
	 * Boundary rejection (shell metacharacters, non-whitelisted command, path
	 * outside the sandbox). Dominates every approval signal.
	 */
	violation?: CapgateError;
	/** Provider default used when neither per-action policy nor capability rules decide */
	approvalRequired?: boolean;
	/** Human-readable description for the approval prompt */
	description?: string;
}

/**
 * Anything that can describe its own requests to the policy layer.
 * Action providers implement this.
 */
export interface AssessmentSource {
	assess?(request: ActionRequest): ActionAssessment;
	/** Provider-scoped per-action policy, overriding the run-level entry of the same name */
	readonly policy?: Readonly<Record<string, ActionPolicy>>;
}

export function emptyPolicyConfig(): PolicyConfig {
	return { actions: {}, capabilityRules: {}, capabilityMap: {} };
}
