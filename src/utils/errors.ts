/**
 * Error hierarchy for capgate.
 *
 * Every error carries a stable `code` so callers (including automated task
 * executors) can branch on the failure kind. Messages include the
 * remediation context a caller needs to retry with a valid request.
 */

export type CapgateErrorCode =
	| 'POLICY_DENIED'
	| 'SANDBOX_VIOLATION'
	| 'SANDBOX_FILE_NOT_FOUND'
	| 'WHITELIST_VIOLATION'
	| 'DEPTH_EXCEEDED'
	| 'CONFIGURATION_ERROR'
	| 'UNKNOWN_ACTION'
	| 'INVALID_ARGUMENTS';

export class CapgateError extends Error {
	public readonly code: CapgateErrorCode;

	constructor(message: string, code: CapgateErrorCode) {
		super(message);
		this.name = 'CapgateError';
		this.code = code;
		Error.captureStackTrace?.(this, this.constructor);
	}
}

export type PolicyDenialKind = 'blocked' | 'rejected';

/**
 * An action was blocked by policy, or a human/automated approver rejected it.
 */
export class PolicyDeniedError extends CapgateError {
	public readonly kind: PolicyDenialKind;
	public readonly actionName: string;
	public readonly reason: string;
	public readonly note?: string;

	constructor(kind: PolicyDenialKind, actionName: string, reason: string, note?: string) {
		const suffix = note ? ` (${note})` : '';
		super(`Permission denied for '${actionName}': ${reason}${suffix}`, 'POLICY_DENIED');
		this.name = 'PolicyDeniedError';
		this.kind = kind;
		this.actionName = actionName;
		this.reason = reason;
		this.note = note;
	}
}

export type SandboxViolation =
	| 'not_in_sandbox'
	| 'path_escape'
	| 'read_only'
	| 'suffix_not_allowed'
	| 'too_large';

export class SandboxViolationError extends CapgateError {
	public readonly violation: SandboxViolation;
	public readonly path: string;

	constructor(violation: SandboxViolation, path: string, message: string) {
		super(message, 'SANDBOX_VIOLATION');
		this.name = 'SandboxViolationError';
		this.violation = violation;
		this.path = path;
	}
}

export class SandboxFileNotFoundError extends CapgateError {
	public readonly path: string;

	constructor(path: string, message?: string) {
		super(message ?? `File not found: ${path}`, 'SANDBOX_FILE_NOT_FOUND');
		this.name = 'SandboxFileNotFoundError';
		this.path = path;
	}
}

export type WhitelistViolation = 'metacharacter' | 'parse' | 'empty' | 'not_whitelisted';

export class WhitelistViolationError extends CapgateError {
	public readonly violation: WhitelistViolation;
	public readonly command: string;

	constructor(violation: WhitelistViolation, command: string, message: string) {
		super(message, 'WHITELIST_VIOLATION');
		this.name = 'WhitelistViolationError';
		this.violation = violation;
		this.command = command;
	}
}

export interface DepthExceededDetails {
	depth: number;
	maxDepth: number;
	caller: string;
	attempted: string;
	branchId: string;
}

/**
 * Delegation would create a branch deeper than the configured limit.
 * Fatal to the delegating branch; a parent may catch it.
 */
export class DepthExceededError extends CapgateError {
	public readonly depth: number;
	public readonly maxDepth: number;
	public readonly caller: string;
	public readonly attempted: string;
	public readonly branchId: string;

	constructor(details: DepthExceededDetails) {
		super(
			`max_depth exceeded (depth=${details.depth}, max_depth=${details.maxDepth}, caller=${details.caller}, attempted=${details.attempted})`,
			'DEPTH_EXCEEDED',
		);
		this.name = 'DepthExceededError';
		this.depth = details.depth;
		this.maxDepth = details.maxDepth;
		this.caller = details.caller;
		this.attempted = details.attempted;
		this.branchId = details.branchId;
	}
}

export class ConfigurationError extends CapgateError {
	constructor(message: string) {
		super(message, 'CONFIGURATION_ERROR');
		this.name = 'ConfigurationError';
	}
}

export class UnknownActionError extends CapgateError {
	public readonly actionName: string;

	constructor(actionName: string, available: readonly string[]) {
		const listed = available.length > 0 ? available.join(', ') : '(none)';
		super(`Unknown action '${actionName}'. Available actions: ${listed}`, 'UNKNOWN_ACTION');
		this.name = 'UnknownActionError';
		this.actionName = actionName;
	}
}

export class InvalidArgumentsError extends CapgateError {
	public readonly actionName: string;

	constructor(actionName: string, details: string) {
		super(`Invalid arguments for '${actionName}': ${details}`, 'INVALID_ARGUMENTS');
		this.name = 'InvalidArgumentsError';
		this.actionName = actionName;
	}
}

export function isCapgateError(err: unknown): err is CapgateError {
	return err instanceof CapgateError;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
