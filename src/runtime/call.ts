import { v4 as uuidv4 } from 'uuid';
import type { ActionRegistry, ActionSet } from '../actions/registry.js';
import { ConfigurationError } from '../utils/errors.js';
import type { BranchState, EventSink } from './events.js';
import { createMessageLog, createUsageSink, type MessageLog, type UsageSink } from './telemetry.js';
import type { TaskExecutor, TaskMessage } from './types.js';

export const DEFAULT_MAX_DEPTH = 5;

/**
 * Shared read-only across a whole call tree.
 */
export interface CallConfig {
	readonly maxDepth: number;
	readonly onEvent?: EventSink;
	readonly usage: UsageSink;
	readonly messageLog: MessageLog;
	readonly registry: ActionRegistry;
	/** Used by branches whose spec names no executor */
	readonly defaultExecutor?: TaskExecutor;
}

export interface CallConfigOptions {
	registry: ActionRegistry;
	maxDepth?: number;
	onEvent?: EventSink;
	usage?: UsageSink;
	messageLog?: MessageLog;
	defaultExecutor?: TaskExecutor;
}

export function createCallConfig(options: CallConfigOptions): CallConfig {
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	if (!Number.isInteger(maxDepth) || maxDepth < 0) {
		throw new ConfigurationError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
	}
	return Object.freeze({
		maxDepth,
		onEvent: options.onEvent,
		usage: options.usage ?? createUsageSink(),
		messageLog: options.messageLog ?? createMessageLog(),
		registry: options.registry,
		defaultExecutor: options.defaultExecutor,
	});
}

/**
 * Per-branch state. Owned and mutated only by the branch that holds it.
 */
export interface CallFrame {
	readonly branchId: string;
	readonly parentId?: string;
	readonly depth: number;
	readonly invocationName: string;
	readonly instructions: string;
	readonly actions: ActionSet;
	readonly executor: TaskExecutor;
	prompt: string;
	messages: TaskMessage[];
	state: BranchState;
}

export interface RootFrameOptions {
	invocationName: string;
	instructions: string;
	actions: ActionSet;
	executor: TaskExecutor;
	prompt: string;
	history?: readonly TaskMessage[];
}

export function createRootFrame(options: RootFrameOptions): CallFrame {
	return {
		branchId: uuidv4(),
		depth: 0,
		invocationName: options.invocationName,
		instructions: options.instructions,
		actions: options.actions,
		executor: options.executor,
		prompt: options.prompt,
		messages: [...(options.history ?? [])],
		state: 'created',
	};
}

export interface ForkOptions {
	invocationName: string;
	instructions: string;
	actions: ActionSet;
	executor: TaskExecutor;
	prompt: string;
}

/** Child frame one level deeper with an empty history */
export function forkFrame(parent: CallFrame, options: ForkOptions): CallFrame {
	return {
		branchId: uuidv4(),
		parentId: parent.branchId,
		depth: parent.depth + 1,
		invocationName: options.invocationName,
		instructions: options.instructions,
		actions: options.actions,
		executor: options.executor,
		prompt: options.prompt,
		messages: [],
		state: 'created',
	};
}
