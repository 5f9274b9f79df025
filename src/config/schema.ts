import { z } from 'zod';

const CapabilityRuleSchema = z.enum(['blocked', 'needs_approval', 'pre_approved']);

const StringOrList = z
	.union([z.string().min(1), z.array(z.string().min(1))])
	.transform((value) => (typeof value === 'string' ? [value] : value));

const ActionPolicySchema = z.object({
	preApproved: z.boolean().optional(),
	blocked: z.boolean().optional(),
	blockReason: z.string().optional(),
	capabilities: StringOrList.optional(),
});

const ApprovalSchema = z.object({
	mode: z.enum(['interactive', 'approve_all', 'reject_all']).default('interactive'),
	timeoutMs: z.number().int().positive().default(300_000),
	returnPermissionErrors: z.boolean().default(false),
});

const PolicySchema = z.object({
	actions: z.record(ActionPolicySchema).default({}),
	capabilityRules: z.record(CapabilityRuleSchema).default({}),
	capabilityDefault: CapabilityRuleSchema.optional(),
	capabilityMap: z.record(StringOrList).default({}),
});

const DelegationOverrideSchema = z.object({
	requiresApproval: z.boolean(),
});

const DelegationSchema = z.object({
	maxDepth: z.number().int().nonnegative().default(5),
	callsRequireApproval: z.boolean().default(false),
	overrides: z.record(DelegationOverrideSchema).default({}),
});

const SandboxRootSchema = z.object({
	path: z.string().min(1),
	mode: z.enum(['ro', 'rw']).default('ro'),
	suffixes: z.array(z.string().min(1)).optional(),
	maxBytes: z.number().int().positive().default(2_000_000),
	readApproval: z.boolean().default(false),
	writeApproval: z.boolean().default(true),
});

const SandboxSchema = z.object({
	baseDir: z.string().optional(),
	roots: z.record(SandboxRootSchema).default({}),
});

const ShellRuleSchema = z.object({
	pattern: z.string().min(1),
	sandboxRoots: z.array(z.string().min(1)).optional(),
	approvalRequired: z.boolean().default(true),
	approvalRequiredIfArgs: z.array(z.string().min(1)).optional(),
});

const ShellSchema = z.object({
	rules: z.array(ShellRuleSchema).default([]),
	default: z
		.object({
			approvalRequired: z.boolean().default(true),
		})
		.optional(),
	timeoutMs: z.number().int().positive().default(30_000),
	maxOutputBytes: z.number().int().positive().default(50 * 1024),
	workingDirectory: z.string().optional(),
});

const LoggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	file: z.string().optional(),
});

export const ConfigSchema = z.object({
	version: z.number().int().default(1),
	approval: ApprovalSchema.default({}),
	policy: PolicySchema.default({}),
	delegation: DelegationSchema.default({}),
	sandbox: SandboxSchema.default({}),
	shell: ShellSchema.default({}),
	logging: LoggingSchema.default({}),
});

export type CapgateConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Config maps whose keys are user-chosen identifiers (action names, capability
 * labels, root names, branch names). The loader keeps these keys verbatim.
 */
export const VERBATIM_KEY_MAPS: ReadonlySet<string> = new Set([
	'policy.actions',
	'policy.capabilityRules',
	'policy.capabilityMap',
	'sandbox.roots',
	'delegation.overrides',
]);
