import type {
	ActionAssessment,
	ActionPolicy,
	ActionRequest,
	CapabilitySet,
	LabelList,
} from './types.js';

export function toLabelList(value: LabelList | undefined): readonly string[] {
	if (value === undefined) return [];
	return typeof value === 'string' ? [value] : value;
}

export interface CapabilityResolver {
	/**
	 * Merges the static map entry, the per-action declaration and the provider's
	 * self-report. Never mutates its inputs.
	 */
	resolve(
		request: ActionRequest,
		sources?: { actionPolicy?: ActionPolicy; assessment?: ActionAssessment },
	): CapabilitySet;
}

export interface CapabilityResolverOptions {
	capabilityMap?: Readonly<Record<string, LabelList>>;
}

export function createCapabilityResolver(options: CapabilityResolverOptions = {}): CapabilityResolver {
	const staticMap = options.capabilityMap ?? {};

	return {
		resolve(request, sources = {}) {
			const labels = new Set<string>();
			const add = (list: readonly string[]) => {
				for (const label of list) {
					if (label.length > 0) labels.add(label);
				}
			};

			add(toLabelList(staticMap[request.name]));
			add(toLabelList(sources.actionPolicy?.capabilities));
			add(sources.assessment?.capabilities ?? []);

			return labels;
		},
	};
}
