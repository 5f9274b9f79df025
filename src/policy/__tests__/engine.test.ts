import { describe, expect, it } from 'vitest';
import { SandboxViolationError } from '../../utils/errors.js';
import { createPolicyEngine, DEFAULT_BLOCK_REASON, decideOutcome } from '../engine.js';
import type { ActionRequest, AssessmentSource, PolicyConfig } from '../types.js';

function request(name: string, args: Record<string, unknown> = {}): ActionRequest {
	return { name, args, branchId: 'b-1' };
}

function policy(partial: Partial<PolicyConfig> = {}): PolicyConfig {
	return { actions: {}, capabilityRules: {}, capabilityMap: {}, ...partial };
}

describe('decideOutcome', () => {
	it('blocks per-action blocked entries regardless of capabilities', () => {
		const outcome = decideOutcome({
			actionPolicy: { blocked: true, preApproved: true },
			capabilities: new Set(['safe']),
			capabilityRules: { safe: 'pre_approved' },
		});
		expect(outcome).toEqual({ status: 'blocked', reason: DEFAULT_BLOCK_REASON });
	});

	it('uses the configured block reason', () => {
		const outcome = decideOutcome({
			actionPolicy: { blocked: true, blockReason: 'Too dangerous' },
			capabilities: new Set(),
			capabilityRules: {},
		});
		expect(outcome).toEqual({ status: 'blocked', reason: 'Too dangerous' });
	});

	it('lets a boundary violation win over pre-approval', () => {
		const violation = new SandboxViolationError('path_escape', '../x', 'escapes');
		const outcome = decideOutcome({
			actionPolicy: { preApproved: true },
			capabilities: new Set(),
			capabilityRules: {},
			assessment: { violation },
		});
		expect(outcome).toEqual({ status: 'blocked', reason: 'escapes' });
	});

	it('pre-approves explicit entries before capability rules', () => {
		const outcome = decideOutcome({
			actionPolicy: { preApproved: true },
			capabilities: new Set(['process.exec']),
			capabilityRules: { 'process.exec': 'blocked' },
		});
		expect(outcome).toEqual({ status: 'pre_approved' });
	});

	it('blocks when any capability is blocked, even next to a pre-approved one', () => {
		const outcome = decideOutcome({
			capabilities: new Set(['filesystem.read', 'process.exec']),
			capabilityRules: { 'filesystem.read': 'pre_approved', 'process.exec': 'blocked' },
		});
		expect(outcome).toEqual({ status: 'blocked', reason: 'Capability blocked: process.exec' });
	});

	it('prefers needs_approval over pre_approved among capabilities', () => {
		const outcome = decideOutcome({
			capabilities: new Set(['a', 'b']),
			capabilityRules: { a: 'pre_approved', b: 'needs_approval' },
			assessment: { approvalRequired: false },
		});
		expect(outcome).toEqual({ status: 'needs_approval' });
	});

	it('applies the capability default to unlisted labels', () => {
		const outcome = decideOutcome({
			capabilities: new Set(['unlisted']),
			capabilityRules: {},
			capabilityDefault: 'blocked',
		});
		expect(outcome).toEqual({ status: 'blocked', reason: 'Capability blocked: unlisted' });
	});

	it('falls through to the provider default when no rule decides', () => {
		expect(
			decideOutcome({
				capabilities: new Set(['unlisted']),
				capabilityRules: {},
				assessment: { approvalRequired: false },
			}),
		).toEqual({ status: 'pre_approved' });
		expect(
			decideOutcome({
				capabilities: new Set(['unlisted']),
				capabilityRules: {},
				assessment: { approvalRequired: true },
			}),
		).toEqual({ status: 'needs_approval' });
	});

	it('needs approval when nothing decides', () => {
		expect(decideOutcome({ capabilities: new Set(), capabilityRules: {} })).toEqual({
			status: 'needs_approval',
		});
	});
});

describe('createPolicyEngine', () => {
	it('needs approval for a mapped write capability', () => {
		const engine = createPolicyEngine({
			config: policy({
				actions: { writeTool: {} },
				capabilityRules: { 'filesystem.write': 'needs_approval' },
				capabilityMap: { writeTool: 'filesystem.write' },
			}),
		});

		const evaluation = engine.evaluate(request('writeTool'));

		expect(evaluation.outcome).toEqual({ status: 'needs_approval' });
		expect([...evaluation.capabilities]).toEqual(['filesystem.write']);
	});

	it('merges provider self-reported capabilities', () => {
		const engine = createPolicyEngine({
			config: policy({ capabilityRules: { 'process.exec.unlisted': 'blocked' } }),
		});
		const source: AssessmentSource = {
			assess: () => ({ capabilities: ['process.exec.unlisted'], approvalRequired: false }),
		};

		expect(engine.evaluate(request('shell'), source).outcome).toEqual({
			status: 'blocked',
			reason: 'Capability blocked: process.exec.unlisted',
		});
	});

	it('lets a provider-scoped entry override the run-level entry', () => {
		const engine = createPolicyEngine({
			config: policy({ actions: { read_file: { blocked: true } } }),
		});
		const source: AssessmentSource = { policy: { read_file: { preApproved: true } } };

		expect(engine.actionPolicyFor('read_file', source)).toEqual({ preApproved: true });
		expect(engine.evaluate(request('read_file'), source).outcome).toEqual({ status: 'pre_approved' });
		expect(engine.evaluate(request('read_file')).outcome.status).toBe('blocked');
	});

	it('does not treat inherited object keys as policy entries', () => {
		const engine = createPolicyEngine({ config: policy() });
		expect(engine.actionPolicyFor('toString')).toBeUndefined();
	});
});
