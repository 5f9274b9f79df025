import { createLogger } from '../utils/logger.js';

const logger = createLogger('runtime:events');

export type BranchState = 'created' | 'running' | 'completed' | 'failed' | 'depth_exceeded';

interface EventBase {
	branchId: string;
	depth: number;
}

export type RuntimeEvent =
	| (EventBase & {
			type: 'branch_state';
			parentId?: string;
			invocationName: string;
			state: BranchState;
			error?: string;
	  })
	| (EventBase & {
			type: 'action_call_start';
			callId: string;
			actionName: string;
			args: Record<string, unknown>;
	  })
	| (EventBase & {
			type: 'action_call_result';
			callId: string;
			actionName: string;
			ok: boolean;
			result?: unknown;
			error?: string;
	  })
	| (EventBase & {
			type: 'final_result';
			invocationName: string;
			output: unknown;
	  });

export type EventSink = (event: RuntimeEvent) => void;

/**
 * Delivers an event to an optional sink. Sink failures are logged and never
 * affect the run.
 */
export function emitEvent(sink: EventSink | undefined, event: RuntimeEvent): void {
	if (!sink) return;
	try {
		sink(event);
	} catch (err) {
		logger.warn('Event sink threw', {
			type: event.type,
			branchId: event.branchId,
			error: err instanceof Error ? err.message : String(err),
		});
	}
}
