import { errorMessage } from '../utils/errors.js';
import type {
	ActionCall,
	ActionsHandle,
	TaskExecutionInput,
	TaskExecutor,
	TaskMessage,
} from './types.js';

export type TaskScript = (input: TaskExecutionInput) => Promise<unknown>;

function renderContent(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value === undefined) return '';
	return JSON.stringify(value) ?? String(value);
}

/**
 * An executor driven by a function instead of a model. The prompt, every
 * action call made through `input.actions` and the script's return value are
 * appended to the branch history as user, action and assistant messages.
 */
export function createScriptedExecutor(script: TaskScript): TaskExecutor {
	return {
		async execute(input) {
			const messages: TaskMessage[] = [...input.history, { role: 'user', content: input.prompt }];

			const record = (name: string, content: string) => {
				messages.push({ role: 'action', name, content });
			};
			const track = async (call: ActionCall, pending: Promise<unknown>): Promise<unknown> => {
				try {
					const result = await pending;
					record(call.name, renderContent(result));
					return result;
				} catch (err) {
					record(call.name, `Error: ${errorMessage(err)}`);
					throw err;
				}
			};

			const actions: ActionsHandle = {
				definitions: () => input.actions.definitions(),
				invoke: (name, args) => track({ name, args }, input.actions.invoke(name, args)),
				async invokeAll(calls) {
					try {
						const results = await input.actions.invokeAll(calls);
						calls.forEach((call, index) => record(call.name, renderContent(results[index])));
						return results;
					} catch (err) {
						record(calls.map((call) => call.name).join(','), `Error: ${errorMessage(err)}`);
						throw err;
					}
				},
			};

			const output = await script({ ...input, actions });
			messages.push({ role: 'assistant', content: renderContent(output) });
			return { output, messages };
		},
	};
}
