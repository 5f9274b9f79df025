import type { BranchSpec } from '../runtime/types.js';
import { ConfigurationError, UnknownActionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { createGuardedProvider, type Guard, type GuardedProvider } from './guarded.js';
import type { ActionDefinition, ActionProvider, InvocationContext } from './types.js';

const logger = createLogger('actions:registry');

/**
 * The gated actions available to one branch.
 */
export interface ActionSet {
	readonly branchName: string;
	definitions(): ActionDefinition[];
	names(): string[];
	has(name: string): boolean;
	providerFor(name: string): GuardedProvider | undefined;
	invoke(name: string, args: unknown, context: InvocationContext): Promise<unknown>;
	/** The set resolved for a delegate target in the same resolution pass */
	childSet(target: BranchSpec): ActionSet;
}

export interface ActionRegistry {
	readonly guard: Guard;
	/**
	 * One resolution pass: wraps every provider reachable from `spec`, including
	 * through delegate targets, exactly once.
	 */
	resolve(spec: BranchSpec): ActionSet;
}

export function createActionRegistry(guard: Guard): ActionRegistry {
	function resolve(rootSpec: BranchSpec): ActionSet {
		const wrapped = new Map<ActionProvider, GuardedProvider>();
		const sets = new Map<BranchSpec, ActionSet>();

		function createSet(spec: BranchSpec, byName: Map<string, GuardedProvider>): ActionSet {
			return {
				branchName: spec.name,
				definitions: () =>
					[...byName.entries()].flatMap(([name, provider]) =>
						provider
							.listActions()
							.filter((action) => action.name === name)
							.map((action) => action.getDefinition()),
					),
				names: () => [...byName.keys()],
				has: (name) => byName.has(name),
				providerFor: (name) => byName.get(name),
				async invoke(name, args, context) {
					const provider = byName.get(name);
					if (!provider) {
						throw new UnknownActionError(name, [...byName.keys()]);
					}
					return provider.invoke(name, args, context);
				},
				childSet(target) {
					const child = sets.get(target);
					if (!child) {
						throw new ConfigurationError(
							`Branch '${target.name}' is not a delegate target reachable from '${spec.name}'`,
						);
					}
					return child;
				},
			};
		}

		function wrap(provider: ActionProvider): GuardedProvider {
			const existing = wrapped.get(provider);
			if (existing) return existing;

			const guarded = createGuardedProvider(provider, guard);
			// Registered before recursing so cycles terminate.
			wrapped.set(provider, guarded);
			if (provider.kind === 'delegate') {
				for (const target of provider.targets) {
					resolveSpec(target);
				}
			}
			return guarded;
		}

		function resolveSpec(spec: BranchSpec): ActionSet {
			const existing = sets.get(spec);
			if (existing) return existing;

			const byName = new Map<string, GuardedProvider>();
			const set = createSet(spec, byName);
			sets.set(spec, set);

			for (const provider of spec.providers) {
				const guarded = wrap(provider);
				for (const action of guarded.listActions()) {
					const prior = byName.get(action.name);
					if (prior === guarded) continue;
					if (prior) {
						throw new ConfigurationError(
							`Action name conflict in branch '${spec.name}': '${action.name}' is provided by both '${prior.id}' and '${guarded.id}'`,
						);
					}
					byName.set(action.name, guarded);
				}
			}
			return set;
		}

		const root = resolveSpec(rootSpec);
		logger.debug('Action sets resolved', {
			branch: rootSpec.name,
			branches: sets.size,
			providers: wrapped.size,
		});
		return root;
	}

	return { guard, resolve };
}
