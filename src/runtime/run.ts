import { type ActionRegistry, type ActionSet, createActionRegistry } from '../actions/registry.js';
import {
	type ApprovalGateway,
	type ApprovalSession,
	createApprovalGateway,
	createApprovalSession,
	type DecideFn,
} from '../policy/approval.js';
import { createPolicyEngine, type PolicyEngine } from '../policy/engine.js';
import { type ApprovalMode, emptyPolicyConfig, type PolicyConfig } from '../policy/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { createCallContext } from './branch.js';
import { type CallConfig, createCallConfig, createRootFrame } from './call.js';
import type { EventSink } from './events.js';
import type { MessageLog, UsageSink } from './telemetry.js';
import type { BranchSpec, TaskExecutionResult, TaskExecutor, TaskMessage } from './types.js';

const logger = createLogger('runtime:run');

export interface RunOptions {
	policy?: PolicyConfig;
	approval?: {
		mode: ApprovalMode;
		decide?: DecideFn;
		timeoutMs?: number;
		returnPermissionErrors?: boolean;
	};
	maxDepth?: number;
	onEvent?: EventSink;
	/** Used by any branch whose spec names no executor */
	executor?: TaskExecutor;
}

export interface CallOptions {
	signal?: AbortSignal;
}

/**
 * One run: a single approval session, one pair of telemetry sinks and the
 * depth-0 conversation carried across sequential top-level calls.
 */
export interface Run {
	readonly config: CallConfig;
	readonly session: ApprovalSession;
	readonly gateway: ApprovalGateway;
	readonly engine: PolicyEngine;
	readonly registry: ActionRegistry;
	readonly usage: UsageSink;
	readonly messageLog: MessageLog;
	/** Top-level calls run one at a time in submission order */
	call(spec: BranchSpec, prompt: string, options?: CallOptions): Promise<TaskExecutionResult>;
	/** A fresh resolution pass for `spec` */
	resolve(spec: BranchSpec): ActionSet;
	history(): readonly TaskMessage[];
	clearHistory(): void;
}

export function createRun(options: RunOptions = {}): Run {
	const approval = options.approval ?? { mode: 'interactive' };
	const session = createApprovalSession();
	const gateway = createApprovalGateway({
		mode: approval.mode,
		decide: approval.decide,
		session,
		timeoutMs: approval.timeoutMs,
	});
	const engine = createPolicyEngine({ config: options.policy ?? emptyPolicyConfig() });
	const registry = createActionRegistry({
		engine,
		gateway,
		returnPermissionErrors: approval.returnPermissionErrors ?? false,
	});
	const config = createCallConfig({
		registry,
		maxDepth: options.maxDepth,
		onEvent: options.onEvent,
		defaultExecutor: options.executor,
	});

	let history: TaskMessage[] = [];
	let tail: Promise<unknown> = Promise.resolve();

	async function execute(
		spec: BranchSpec,
		prompt: string,
		callOptions: CallOptions,
	): Promise<TaskExecutionResult> {
		const executor = spec.executor ?? config.defaultExecutor;
		if (!executor) {
			throw new ConfigurationError(`No task executor configured for branch '${spec.name}'`);
		}

		const frame = createRootFrame({
			invocationName: spec.name,
			instructions: spec.instructions,
			actions: registry.resolve(spec),
			executor,
			prompt,
			history,
		});
		const result = await createCallContext(config, frame, { signal: callOptions.signal }).run();
		history = frame.messages;
		return result;
	}

	function call(
		spec: BranchSpec,
		prompt: string,
		callOptions: CallOptions = {},
	): Promise<TaskExecutionResult> {
		logger.debug('Top-level call queued', { branch: spec.name });
		const next = tail.then(
			() => execute(spec, prompt, callOptions),
			() => execute(spec, prompt, callOptions),
		);
		tail = next.then(
			() => undefined,
			() => undefined,
		);
		return next;
	}

	return {
		config,
		session,
		gateway,
		engine,
		registry,
		usage: config.usage,
		messageLog: config.messageLog,
		call,
		resolve: (spec) => registry.resolve(spec),
		history: () => [...history],
		clearHistory() {
			history = [];
		},
	};
}
