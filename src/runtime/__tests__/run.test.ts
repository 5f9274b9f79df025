import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createCustomActionProvider } from '../../actions/custom-actions.js';
import { createDelegateActionProvider } from '../../actions/delegate-actions.js';
import { createAction } from '../../actions/types.js';
import type { DecideFn } from '../../policy/approval.js';
import { ConfigurationError, PolicyDeniedError } from '../../utils/errors.js';
import { createScriptedExecutor } from '../executors.js';
import { createRun } from '../run.js';
import type { BranchSpec } from '../types.js';

const noteAction = createAction({
	name: 'note',
	description: 'Store a note',
	parameters: z.object({ text: z.string() }),
	jsonSchema: { type: 'object' },
	execute: async (params) => `noted ${params.text}`,
});

/** `note` always needs approval */
const notes = createCustomActionProvider({
	id: 'notes',
	actions: [noteAction],
	assess: () => ({ capabilities: ['notes.write'], approvalRequired: true }),
});

function deferred() {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}

describe('createRun', () => {
	it('carries the top-level conversation across calls', async () => {
		const run = createRun({
			approval: { mode: 'approve_all' },
			executor: createScriptedExecutor(async ({ prompt, history }) => `${prompt} (${history.length})`),
		});
		const spec: BranchSpec = { name: 'chat', instructions: '', providers: [] };

		await run.call(spec, 'one');
		const second = await run.call(spec, 'two');

		expect(second.output).toBe('two (2)');
		expect(run.history()).toEqual([
			{ role: 'user', content: 'one' },
			{ role: 'assistant', content: 'one (0)' },
			{ role: 'user', content: 'two' },
			{ role: 'assistant', content: 'two (2)' },
		]);

		run.clearHistory();
		expect(run.history()).toEqual([]);
		expect((await run.call(spec, 'three')).output).toBe('three (0)');
	});

	it('keeps the history unchanged when a call fails', async () => {
		let fail = false;
		const run = createRun({
			approval: { mode: 'approve_all' },
			executor: createScriptedExecutor(async ({ prompt }) => {
				if (fail) throw new Error('model unavailable');
				return prompt;
			}),
		});
		const spec: BranchSpec = { name: 'chat', instructions: '', providers: [] };

		await run.call(spec, 'one');
		fail = true;
		await expect(run.call(spec, 'two')).rejects.toThrow('model unavailable');

		expect(run.history()).toHaveLength(2);
	});

	it('runs top-level calls one at a time in submission order', async () => {
		const gate = deferred();
		const order: string[] = [];
		const run = createRun({
			approval: { mode: 'approve_all' },
			executor: createScriptedExecutor(async ({ prompt }) => {
				order.push(`start:${prompt}`);
				if (prompt === 'first') await gate.promise;
				order.push(`end:${prompt}`);
				return prompt;
			}),
		});
		const spec: BranchSpec = { name: 'chat', instructions: '', providers: [] };

		const first = run.call(spec, 'first');
		const second = run.call(spec, 'second');
		await vi.waitFor(() => expect(order).toEqual(['start:first']));
		gate.resolve();
		await Promise.all([first, second]);

		expect(order).toEqual(['start:first', 'end:first', 'start:second', 'end:second']);
	});

	it('requires an executor for every branch', async () => {
		const run = createRun({ approval: { mode: 'approve_all' } });

		await expect(run.call({ name: 'bare', instructions: '', providers: [] }, 'go')).rejects.toThrow(
			ConfigurationError,
		);
		await expect(run.call({ name: 'bare', instructions: '', providers: [] }, 'go')).rejects.toThrow(
			"No task executor configured for branch 'bare'",
		);
	});

	it('needs a decision function for interactive approval', () => {
		expect(() => createRun()).toThrow(ConfigurationError);
	});

	it('shares one approval session across the whole call tree', async () => {
		const decide = vi.fn<DecideFn>().mockResolvedValue({ approved: true, remember: 'session' });
		const worker: BranchSpec = {
			name: 'worker',
			instructions: '',
			providers: [notes],
		};
		const main: BranchSpec = {
			name: 'main',
			instructions: '',
			providers: [notes, createDelegateActionProvider({ targets: [worker] })],
		};
		const run = createRun({
			approval: { mode: 'interactive', decide },
			executor: createScriptedExecutor(async ({ actions, context }) => {
				const noted = await actions.invoke('note', { text: 'same' });
				if (context.depth === 0) await actions.invoke('worker', { input: 'go' });
				return noted;
			}),
		});

		expect((await run.call(main, 'start')).output).toBe('noted same');
		expect(decide).toHaveBeenCalledTimes(1);
		expect(run.session.size).toBe(1);
	});

	it('surfaces rejections as errors by default', async () => {
		const run = createRun({
			approval: { mode: 'reject_all' },
			executor: createScriptedExecutor(async ({ actions }) => actions.invoke('note', { text: 'x' })),
		});

		await expect(run.call({ name: 'main', instructions: '', providers: [notes] }, 'go')).rejects.toBeInstanceOf(
			PolicyDeniedError,
		);
	});

	it('returns rejections as values when configured', async () => {
		const run = createRun({
			approval: { mode: 'reject_all', returnPermissionErrors: true },
			executor: createScriptedExecutor(async ({ actions }) => actions.invoke('note', { text: 'x' })),
		});

		const result = await run.call({ name: 'main', instructions: '', providers: [notes] }, 'go');

		expect(result.output).toEqual({
			error: "Permission denied for 'note': Rejected by approver (Rejected: approval mode is reject_all)",
			actionName: 'note',
			errorType: 'permission',
		});
	});

	it('applies the run policy to every branch', async () => {
		const worker: BranchSpec = { name: 'worker', instructions: '', providers: [notes] };
		const main: BranchSpec = {
			name: 'main',
			instructions: '',
			providers: [createDelegateActionProvider({ targets: [worker] })],
		};
		const run = createRun({
			approval: { mode: 'approve_all' },
			policy: {
				actions: {},
				capabilityRules: { 'notes.write': 'blocked' },
				capabilityMap: {},
			},
			executor: createScriptedExecutor(async ({ actions, context }) =>
				context.depth === 0
					? actions.invoke('worker', { input: 'go' })
					: actions.invoke('note', { text: 'x' }),
			),
		});

		await expect(run.call(main, 'start')).rejects.toThrow(
			"Permission denied for 'note': Capability blocked: notes.write",
		);
	});

	it('aggregates usage from every depth into one sink', async () => {
		const worker: BranchSpec = { name: 'worker', instructions: '', providers: [] };
		const main: BranchSpec = {
			name: 'main',
			instructions: '',
			providers: [createDelegateActionProvider({ targets: [worker] })],
		};
		const run = createRun({
			approval: { mode: 'approve_all' },
			executor: createScriptedExecutor(async ({ actions, context }) => {
				context.recordUsage({ inputTokens: 10 * (context.depth + 1), outputTokens: 1 });
				if (context.depth === 0) {
					await actions.invokeAll([
						{ name: 'worker', args: { input: 'a' } },
						{ name: 'worker', args: { input: 'b' } },
					]);
				}
				return 'done';
			}),
		});

		await run.call(main, 'start');

		expect(run.usage.totals()).toEqual({
			inputTokens: 50,
			outputTokens: 3,
			requests: 3,
			byInvocation: {
				main: { inputTokens: 10, outputTokens: 1, requests: 1 },
				worker: { inputTokens: 40, outputTokens: 2, requests: 2 },
			},
		});
		expect(new Set(run.messageLog.entries().map((entry) => entry.depth))).toEqual(new Set([0, 1]));
	});
});
