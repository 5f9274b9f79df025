import { describe, expect, it } from 'vitest';
import { createCapabilityResolver, toLabelList } from '../capabilities.js';
import type { ActionRequest } from '../types.js';

const request: ActionRequest = { name: 'write_file', args: { path: 'out/a.txt' }, branchId: 'b-1' };

describe('capability resolver', () => {
	it('returns an empty set when nothing is declared', () => {
		const resolver = createCapabilityResolver();
		expect([...resolver.resolve(request)]).toEqual([]);
	});

	it('merges the static map, per-action declarations and the provider self-report', () => {
		const resolver = createCapabilityResolver({
			capabilityMap: { write_file: 'audit.write' },
		});

		const labels = resolver.resolve(request, {
			actionPolicy: { capabilities: ['filesystem.write', 'audit.write'] },
			assessment: { capabilities: ['filesystem.write', 'out.touch'] },
		});

		expect([...labels].sort()).toEqual(['audit.write', 'filesystem.write', 'out.touch']);
	});

	it('ignores map entries for other actions and empty labels', () => {
		const resolver = createCapabilityResolver({
			capabilityMap: { shell: ['process.exec'] },
		});

		const labels = resolver.resolve(request, { actionPolicy: { capabilities: '' } });
		expect(labels.size).toBe(0);
	});

	it('does not mutate its inputs', () => {
		const declared = ['filesystem.write'];
		const resolver = createCapabilityResolver({ capabilityMap: { write_file: declared } });

		const labels = resolver.resolve(request, { assessment: { capabilities: ['extra'] } });

		expect(declared).toEqual(['filesystem.write']);
		expect(labels.has('extra')).toBe(true);
	});
});

describe('toLabelList', () => {
	it('accepts a string, a list or nothing', () => {
		expect(toLabelList('a')).toEqual(['a']);
		expect(toLabelList(['a', 'b'])).toEqual(['a', 'b']);
		expect(toLabelList(undefined)).toEqual([]);
	});
});
