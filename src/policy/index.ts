export {
	type ApprovalGateway,
	type ApprovalGatewayOptions,
	type ApprovalSession,
	createApprovalGateway,
	createApprovalSession,
	type DecideFn,
	DEFAULT_APPROVAL_TIMEOUT_MS,
	describeRequest,
	REJECT_ALL_NOTE,
} from './approval.js';
export { approvalCacheKey, canonicalJson } from './canonical.js';
export { type CapabilityResolver, createCapabilityResolver, toLabelList } from './capabilities.js';
export {
	createPolicyEngine,
	DEFAULT_BLOCK_REASON,
	decideOutcome,
	type PolicyEngine,
	type PolicyEvaluation,
} from './engine.js';
export type {
	ActionArgs,
	ActionAssessment,
	ActionPolicy,
	ActionRequest,
	ApprovalDecision,
	ApprovalMode,
	ApprovalOutcome,
	AssessmentSource,
	CapabilityRule,
	CapabilitySet,
	PolicyConfig,
	RememberScope,
} from './types.js';
export { emptyPolicyConfig } from './types.js';
