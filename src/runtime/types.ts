import type { ActionDefinition, ActionProvider } from '../actions/types.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'action';

export interface TaskMessage {
	role: MessageRole;
	content: string;
	/** Action name for `action` messages */
	name?: string;
}

export interface UsageRecord {
	model?: string;
	inputTokens: number;
	outputTokens: number;
	requests?: number;
}

export interface ActionCall {
	name: string;
	args: Record<string, unknown>;
}

/**
 * What a task executor sees of its branch's actions. Calls made through
 * `invoke` run one at a time in request order; `invokeAll` runs a batch
 * concurrently and resolves once every member has settled.
 */
export interface ActionsHandle {
	definitions(): ActionDefinition[];
	invoke(name: string, args: Record<string, unknown>): Promise<unknown>;
	invokeAll(calls: readonly ActionCall[]): Promise<unknown[]>;
}

export interface TaskContext {
	branchId: string;
	parentId?: string;
	depth: number;
	invocationName: string;
	signal?: AbortSignal;
	recordUsage(usage: UsageRecord): void;
}

export interface TaskExecutionInput {
	instructions: string;
	prompt: string;
	actions: ActionsHandle;
	/** Prior conversation; empty for every delegated branch */
	history: readonly TaskMessage[];
	context: TaskContext;
}

export interface TaskExecutionResult {
	output: unknown;
	/** Full updated history, including `history` from the input */
	messages: TaskMessage[];
}

/**
 * Pluggable model loop. May drive any number of action calls before returning.
 */
export interface TaskExecutor {
	execute(input: TaskExecutionInput): Promise<TaskExecutionResult>;
}

/**
 * A branch definition: what runs, with which providers.
 */
export interface BranchSpec {
	name: string;
	description?: string;
	instructions: string;
	providers: readonly ActionProvider[];
	/** Falls back to the run's default executor */
	executor?: TaskExecutor;
}
