import { v4 as uuidv4 } from 'uuid';
import type { InvocationContext } from '../actions/types.js';
import { ConfigurationError, DepthExceededError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { type CallConfig, type CallFrame, forkFrame } from './call.js';
import { type BranchState, emitEvent } from './events.js';
import type {
	ActionCall,
	ActionsHandle,
	BranchSpec,
	TaskExecutionResult,
	TaskMessage,
	UsageRecord,
} from './types.js';

const logger = createLogger('runtime:branch');

export interface CallContextOptions {
	signal?: AbortSignal;
}

/**
 * Drives one branch: its state machine, its ordered action handle and its
 * delegation to child branches.
 */
export interface CallContext {
	readonly frame: CallFrame;
	readonly actions: ActionsHandle;
	/** Executes the branch once; a second call throws */
	run(): Promise<TaskExecutionResult>;
	delegate(target: BranchSpec, input: string): Promise<unknown>;
	recordUsage(usage: UsageRecord): void;
	logMessages(messages: readonly TaskMessage[]): void;
}

export function createCallContext(
	config: CallConfig,
	frame: CallFrame,
	options: CallContextOptions = {},
): CallContext {
	const { signal } = options;
	// Set when this branch itself crossed maxDepth; the branch fails even if
	// the executor catches the error.
	let fatal: DepthExceededError | undefined;
	let tail: Promise<unknown> = Promise.resolve();

	function setState(state: BranchState, error?: string): void {
		frame.state = state;
		emitEvent(config.onEvent, {
			type: 'branch_state',
			branchId: frame.branchId,
			parentId: frame.parentId,
			depth: frame.depth,
			invocationName: frame.invocationName,
			state,
			error,
		});
	}

	/** Admits work in request order; failures reach the caller through the returned promise */
	function enqueue<T>(task: () => Promise<T>): Promise<T> {
		const next = tail.then(task, task);
		tail = next.then(
			() => undefined,
			() => undefined,
		);
		return next;
	}

	const invocationContext: InvocationContext = {
		branchId: frame.branchId,
		depth: frame.depth,
		signal,
		delegate: (target, input) => delegate(target, input),
	};

	async function callAction(name: string, args: Record<string, unknown>): Promise<unknown> {
		const callId = uuidv4();
		emitEvent(config.onEvent, {
			type: 'action_call_start',
			branchId: frame.branchId,
			depth: frame.depth,
			callId,
			actionName: name,
			args,
		});
		try {
			const result = await frame.actions.invoke(name, args, invocationContext);
			emitEvent(config.onEvent, {
				type: 'action_call_result',
				branchId: frame.branchId,
				depth: frame.depth,
				callId,
				actionName: name,
				ok: true,
				result,
			});
			return result;
		} catch (err) {
			emitEvent(config.onEvent, {
				type: 'action_call_result',
				branchId: frame.branchId,
				depth: frame.depth,
				callId,
				actionName: name,
				ok: false,
				error: errorMessage(err),
			});
			throw err;
		}
	}

	const actions: ActionsHandle = {
		definitions: () => frame.actions.definitions(),
		invoke: (name, args) => enqueue(() => callAction(name, args)),
		invokeAll: (calls: readonly ActionCall[]) =>
			enqueue(async () => {
				const settled = await Promise.allSettled(
					calls.map((call) => callAction(call.name, call.args)),
				);
				const values: unknown[] = [];
				for (const outcome of settled) {
					if (outcome.status === 'rejected') throw outcome.reason;
					values.push(outcome.value);
				}
				return values;
			}),
	};

	function recordUsage(usage: UsageRecord): void {
		config.usage.record({
			...usage,
			branchId: frame.branchId,
			depth: frame.depth,
			invocationName: frame.invocationName,
		});
	}

	function logMessages(messages: readonly TaskMessage[]): void {
		if (messages.length === 0) return;
		config.messageLog.append(
			{ branchId: frame.branchId, invocationName: frame.invocationName, depth: frame.depth },
			messages,
		);
	}

	async function delegate(target: BranchSpec, input: string): Promise<unknown> {
		if (frame.depth >= config.maxDepth) {
			const error = new DepthExceededError({
				depth: frame.depth,
				maxDepth: config.maxDepth,
				caller: frame.invocationName,
				attempted: target.name,
				branchId: frame.branchId,
			});
			fatal ??= error;
			logger.warn('Delegation depth exceeded', {
				branchId: frame.branchId,
				depth: frame.depth,
				maxDepth: config.maxDepth,
				attempted: target.name,
			});
			throw error;
		}

		const executor = target.executor ?? config.defaultExecutor;
		if (!executor) {
			throw new ConfigurationError(`No task executor configured for branch '${target.name}'`);
		}

		const child = forkFrame(frame, {
			invocationName: target.name,
			instructions: target.instructions,
			actions: frame.actions.childSet(target),
			executor,
			prompt: input,
		});
		const result = await createCallContext(config, child, { signal }).run();
		return result.output;
	}

	async function run(): Promise<TaskExecutionResult> {
		if (frame.state !== 'created') {
			throw new ConfigurationError(
				`Branch '${frame.invocationName}' (${frame.branchId}) has already run`,
			);
		}

		const history = [...frame.messages];
		setState('running');
		logger.info('Branch started', {
			branchId: frame.branchId,
			parentId: frame.parentId,
			depth: frame.depth,
			invocation: frame.invocationName,
		});

		try {
			const result = await frame.executor.execute({
				instructions: frame.instructions,
				prompt: frame.prompt,
				actions,
				history,
				context: {
					branchId: frame.branchId,
					parentId: frame.parentId,
					depth: frame.depth,
					invocationName: frame.invocationName,
					signal,
					recordUsage,
				},
			});
			if (fatal) throw fatal;

			frame.messages = [...result.messages];
			logMessages(result.messages.slice(history.length));
			setState('completed');
			emitEvent(config.onEvent, {
				type: 'final_result',
				branchId: frame.branchId,
				depth: frame.depth,
				invocationName: frame.invocationName,
				output: result.output,
			});
			logger.info('Branch completed', { branchId: frame.branchId, depth: frame.depth });
			return result;
		} catch (err) {
			const error = fatal ?? err;
			const state: BranchState = fatal ? 'depth_exceeded' : 'failed';
			setState(state, errorMessage(error));
			logger.warn('Branch ended with error', {
				branchId: frame.branchId,
				depth: frame.depth,
				state,
				error: errorMessage(error),
			});
			throw error;
		}
	}

	return { frame, actions, run, delegate, recordUsage, logMessages };
}
