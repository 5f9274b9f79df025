import { createLogger } from '../utils/logger.js';
import { type CapabilityResolver, createCapabilityResolver } from './capabilities.js';
import type {
	ActionAssessment,
	ActionPolicy,
	ActionRequest,
	ApprovalOutcome,
	AssessmentSource,
	CapabilityRule,
	CapabilitySet,
	PolicyConfig,
} from './types.js';

const logger = createLogger('policy:engine');

export const DEFAULT_BLOCK_REASON = 'Blocked by approval policy';

function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
	return Object.hasOwn(record, key) ? record[key] : undefined;
}

export interface OutcomeInputs {
	actionPolicy?: ActionPolicy;
	capabilities: CapabilitySet;
	capabilityRules: Readonly<Record<string, CapabilityRule>>;
	capabilityDefault?: CapabilityRule;
	assessment?: ActionAssessment;
}

function ruleFor(label: string, inputs: OutcomeInputs): CapabilityRule | undefined {
	return ownEntry(inputs.capabilityRules, label) ?? inputs.capabilityDefault;
}

/**
 * Precedence, first match wins:
 *   1. per-action blocked
 *   2. boundary violation reported by the provider
 *   3. per-action pre-approved
 *   4. capability rules: blocked > needs_approval > pre_approved
 *   5. provider default
 *   6. needs approval
 */
export function decideOutcome(inputs: OutcomeInputs): ApprovalOutcome {
	const { actionPolicy, assessment } = inputs;

	if (actionPolicy?.blocked) {
		return { status: 'blocked', reason: actionPolicy.blockReason ?? DEFAULT_BLOCK_REASON };
	}
	if (assessment?.violation) {
		return { status: 'blocked', reason: assessment.violation.message };
	}
	if (actionPolicy?.preApproved) {
		return { status: 'pre_approved' };
	}

	if (inputs.capabilities.size > 0) {
		const labels = [...inputs.capabilities].sort();
		const blocked = labels.find((label) => ruleFor(label, inputs) === 'blocked');
		if (blocked !== undefined) {
			return { status: 'blocked', reason: `Capability blocked: ${blocked}` };
		}
		if (labels.some((label) => ruleFor(label, inputs) === 'needs_approval')) {
			return { status: 'needs_approval' };
		}
		if (labels.some((label) => ruleFor(label, inputs) === 'pre_approved')) {
			return { status: 'pre_approved' };
		}
	}

	if (assessment?.approvalRequired === false) {
		return { status: 'pre_approved' };
	}
	return { status: 'needs_approval' };
}

export interface PolicyEvaluation {
	outcome: ApprovalOutcome;
	capabilities: CapabilitySet;
	assessment: ActionAssessment;
	actionPolicy?: ActionPolicy;
}

export interface PolicyEngine {
	readonly config: PolicyConfig;
	evaluate(request: ActionRequest, source?: AssessmentSource): PolicyEvaluation;
	/** Provider-scoped entry first, then the run-level entry */
	actionPolicyFor(name: string, source?: AssessmentSource): ActionPolicy | undefined;
}

export interface PolicyEngineOptions {
	config: PolicyConfig;
	resolver?: CapabilityResolver;
}

export function createPolicyEngine(options: PolicyEngineOptions): PolicyEngine {
	const { config } = options;
	const resolver =
		options.resolver ?? createCapabilityResolver({ capabilityMap: config.capabilityMap });

	function actionPolicyFor(name: string, source?: AssessmentSource): ActionPolicy | undefined {
		const scoped = source?.policy ? ownEntry(source.policy, name) : undefined;
		return scoped ?? ownEntry(config.actions, name);
	}

	function evaluate(request: ActionRequest, source?: AssessmentSource): PolicyEvaluation {
		const actionPolicy = actionPolicyFor(request.name, source);
		const assessment = source?.assess?.(request) ?? {};
		const capabilities = resolver.resolve(request, { actionPolicy, assessment });

		const outcome = decideOutcome({
			actionPolicy,
			capabilities,
			capabilityRules: config.capabilityRules,
			capabilityDefault: config.capabilityDefault,
			assessment,
		});

		logger.debug('Policy evaluated', {
			action: request.name,
			branchId: request.branchId,
			capabilities: [...capabilities],
			outcome: outcome.status,
		});

		return { outcome, capabilities, assessment, actionPolicy };
	}

	return { config, evaluate, actionPolicyFor };
}
