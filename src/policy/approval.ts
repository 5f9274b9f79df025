import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { approvalCacheKey } from './canonical.js';
import type {
	ActionRequest,
	ApprovalDecision,
	ApprovalMode,
	CapabilitySet,
} from './types.js';

const logger = createLogger('policy:gateway');

export const DEFAULT_APPROVAL_TIMEOUT_MS = 300_000;
export const REJECT_ALL_NOTE = 'Rejected: approval mode is reject_all';

/**
 * External decision function. May suspend; receives a signal that aborts when
 * the gateway gives up waiting.
 */
export type DecideFn = (
	request: ActionRequest,
	description: string,
	signal: AbortSignal,
) => ApprovalDecision | Promise<ApprovalDecision>;

/**
 * Run-scoped decision cache. One per run, passed down the call tree.
 */
export interface ApprovalSession {
	get(key: string): ApprovalDecision | undefined;
	set(key: string, decision: ApprovalDecision): void;
	readonly size: number;
	clear(): void;
}

export function createApprovalSession(): ApprovalSession {
	const decisions = new Map<string, ApprovalDecision>();
	return {
		get: (key) => decisions.get(key),
		// Concurrent siblings may race on one key; the last decision to resolve wins.
		set: (key, decision) => {
			decisions.set(key, decision);
		},
		get size() {
			return decisions.size;
		},
		clear: () => decisions.clear(),
	};
}

function formatArgValue(value: unknown): string {
	if (typeof value === 'string') {
		const shown = value.length > 120 ? `${value.slice(0, 117)}...` : value;
		return `'${shown}'`;
	}
	return JSON.stringify(value) ?? String(value);
}

/**
 * `name(k='v', n=1) [caps: a, b]`, with secrets masked.
 */
export function describeRequest(request: ActionRequest, capabilities?: CapabilitySet): string {
	const args = Object.entries(request.args)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatArgValue(value)}`)
		.join(', ');
	const caps =
		capabilities && capabilities.size > 0 ? ` [caps: ${[...capabilities].sort().join(', ')}]` : '';
	return redactSecrets(`${request.name}(${args})${caps}`);
}

export interface ApprovalGatewayOptions {
	mode: ApprovalMode;
	decide?: DecideFn;
	session?: ApprovalSession;
	timeoutMs?: number;
}

export interface ApprovalRequestOptions {
	description?: string;
	signal?: AbortSignal;
}

export interface ApprovalGateway {
	readonly mode: ApprovalMode;
	readonly session: ApprovalSession;
	/** Only called for NeedsApproval outcomes */
	request(request: ActionRequest, options?: ApprovalRequestOptions): Promise<ApprovalDecision>;
}

function waitForDecision(
	decide: DecideFn,
	request: ActionRequest,
	description: string,
	timeoutMs: number,
	callerSignal?: AbortSignal,
): Promise<ApprovalDecision> {
	const controller = new AbortController();

	return new Promise<ApprovalDecision>((resolve, reject) => {
		let settled = false;
		const finish = (fn: () => void) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			callerSignal?.removeEventListener('abort', onAbort);
			fn();
		};

		const timer = setTimeout(() => {
			controller.abort();
			finish(() =>
				resolve({
					approved: false,
					remember: 'none',
					note: `Approval timed out after ${timeoutMs}ms`,
				}),
			);
		}, timeoutMs);

		const onAbort = () => {
			controller.abort();
			finish(() => resolve({ approved: false, remember: 'none', note: 'Approval cancelled' }));
		};
		if (callerSignal?.aborted) {
			onAbort();
			return;
		}
		callerSignal?.addEventListener('abort', onAbort, { once: true });

		void Promise.resolve()
			.then(() => decide(request, description, controller.signal))
			.then(
				(decision) => finish(() => resolve(decision)),
				(err: unknown) => finish(() => reject(err)),
			);
	});
}

export function createApprovalGateway(options: ApprovalGatewayOptions): ApprovalGateway {
	const { mode, decide } = options;
	const session = options.session ?? createApprovalSession();
	const timeoutMs = options.timeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;

	if (mode === 'interactive' && !decide) {
		throw new ConfigurationError(
			'Approval mode is interactive but no decision function is registered. Provide one, or use approve_all / reject_all.',
		);
	}
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		throw new ConfigurationError(`Approval timeout must be a positive number of ms, got ${timeoutMs}`);
	}

	async function request(
		actionRequest: ActionRequest,
		requestOptions: ApprovalRequestOptions = {},
	): Promise<ApprovalDecision> {
		if (mode === 'approve_all') {
			return { approved: true, remember: 'none' };
		}
		if (mode === 'reject_all') {
			logger.info('Approval rejected by mode', { action: actionRequest.name });
			return { approved: false, remember: 'none', note: REJECT_ALL_NOTE };
		}
		if (!decide) {
			throw new ConfigurationError('No approval decision function registered');
		}

		const key = approvalCacheKey(actionRequest.name, actionRequest.args);
		const cached = session.get(key);
		if (cached) {
			logger.debug('Approval served from session cache', { action: actionRequest.name });
			return cached;
		}

		const description = requestOptions.description ?? describeRequest(actionRequest);
		const decision = await waitForDecision(
			decide,
			actionRequest,
			description,
			timeoutMs,
			requestOptions.signal,
		);

		if (decision.remember === 'session') {
			session.set(key, decision);
		}

		logger.info(decision.approved ? 'Action approved' : 'Action denied', {
			action: actionRequest.name,
			branchId: actionRequest.branchId,
			remember: decision.remember,
			note: decision.note,
		});

		return decision;
	}

	return { mode, session, request };
}
