export { type CallContext, type CallContextOptions, createCallContext } from './branch.js';
export {
	type CallConfig,
	type CallConfigOptions,
	type CallFrame,
	createCallConfig,
	createRootFrame,
	DEFAULT_MAX_DEPTH,
	type ForkOptions,
	forkFrame,
	type RootFrameOptions,
} from './call.js';
export { type BranchState, type EventSink, emitEvent, type RuntimeEvent } from './events.js';
export { createScriptedExecutor, type TaskScript } from './executors.js';
export { type CallOptions, createRun, type Run, type RunOptions } from './run.js';
export {
	createMessageLog,
	createUsageSink,
	type MessageLog,
	type MessageLogEntry,
	type UsageEntry,
	type UsageSink,
	type UsageTotals,
} from './telemetry.js';
export type {
	ActionCall,
	ActionsHandle,
	BranchSpec,
	MessageRole,
	TaskContext,
	TaskExecutionInput,
	TaskExecutionResult,
	TaskExecutor,
	TaskMessage,
	UsageRecord,
} from './types.js';
