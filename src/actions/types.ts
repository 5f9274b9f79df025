import type { z } from 'zod';
import type {
	ActionArgs,
	ActionAssessment,
	ActionPolicy,
	ActionRequest,
	AssessmentSource,
} from '../policy/types.js';
import type { BranchSpec } from '../runtime/types.js';
import type { FsSandbox } from '../sandbox/fs-sandbox.js';
import type { WhitelistExecutor } from '../sandbox/shell-exec.js';
import { InvalidArgumentsError, UnknownActionError } from '../utils/errors.js';

/** Model-facing description of an action */
export interface ActionDefinition {
	name: string;
	description: string;
	parameters: Record<string, unknown>;
}

/**
 * Supplied by the runtime for each invocation.
 */
export interface InvocationContext {
	branchId: string;
	depth: number;
	signal?: AbortSignal;
	/** Runs a delegate target as a child branch; absent outside a running branch */
	delegate?(target: BranchSpec, input: string): Promise<unknown>;
}

export interface Action {
	readonly name: string;
	readonly description: string;
	readonly jsonSchema: Record<string, unknown>;
	/** Validates raw arguments; throws InvalidArgumentsError */
	parse(rawArgs: unknown): ActionArgs;
	invoke(rawArgs: unknown, context: InvocationContext): Promise<unknown>;
	getDefinition(): ActionDefinition;
}

type ArgsSchema = z.ZodType<ActionArgs, z.ZodTypeDef, unknown>;

interface CreateActionArgs<TSchema extends ArgsSchema> {
	name: string;
	description: string;
	parameters: TSchema;
	jsonSchema: Record<string, unknown>;
	execute(params: z.infer<TSchema>, context: InvocationContext): Promise<unknown>;
}

const ACTION_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

export function formatZodIssues(issues: z.ZodIssue[]): string {
	return issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
			return `${path}: ${issue.message}`;
		})
		.join('; ');
}

export function createAction<TSchema extends ArgsSchema>(args: CreateActionArgs<TSchema>): Action {
	if (!ACTION_NAME_PATTERN.test(args.name)) {
		throw new InvalidArgumentsError(args.name, 'action names must start with a letter');
	}

	function parseTyped(rawArgs: unknown): z.infer<TSchema> {
		const parsed = args.parameters.safeParse(rawArgs ?? {});
		if (!parsed.success) {
			throw new InvalidArgumentsError(args.name, formatZodIssues(parsed.error.issues));
		}
		return parsed.data;
	}

	return {
		name: args.name,
		description: args.description,
		jsonSchema: args.jsonSchema,
		parse: parseTyped,
		invoke: async (rawArgs, context) => args.execute(parseTyped(rawArgs), context),
		getDefinition: () => ({
			name: args.name,
			description: args.description,
			parameters: args.jsonSchema,
		}),
	};
}

interface ProviderBase extends AssessmentSource {
	/** Stable identifier used in logs and conflict messages */
	readonly id: string;
	readonly policy?: Readonly<Record<string, ActionPolicy>>;
	listActions(): readonly Action[];
	invoke(name: string, args: ActionArgs, context: InvocationContext): Promise<unknown>;
	assess?(request: ActionRequest): ActionAssessment;
}

export interface FsActionProvider extends ProviderBase {
	readonly kind: 'filesystem';
	readonly sandbox: FsSandbox;
	assess(request: ActionRequest): ActionAssessment;
}

export interface ShellActionProvider extends ProviderBase {
	readonly kind: 'shell';
	readonly executor: WhitelistExecutor;
	assess(request: ActionRequest): ActionAssessment;
}

export interface DelegateActionProvider extends ProviderBase {
	readonly kind: 'delegate';
	readonly targets: readonly BranchSpec[];
	assess(request: ActionRequest): ActionAssessment;
}

export interface CustomActionProvider extends ProviderBase {
	readonly kind: 'custom';
}

/** Closed set of provider kinds behind one interface */
export type ActionProvider =
	| FsActionProvider
	| ShellActionProvider
	| DelegateActionProvider
	| CustomActionProvider;

export type ProviderKind = ActionProvider['kind'];

/**
 * Looks an action up by name and runs it. Shared by every provider kind.
 */
export function invokeFromList(
	providerId: string,
	actions: readonly Action[],
	name: string,
	args: ActionArgs,
	context: InvocationContext,
): Promise<unknown> {
	const action = actions.find((candidate) => candidate.name === name);
	if (!action) {
		return Promise.reject(
			new UnknownActionError(
				`${providerId}:${name}`,
				actions.map((candidate) => candidate.name),
			),
		);
	}
	return action.invoke(args, context);
}

export function stringArg(args: ActionArgs, key: string): string | undefined {
	const value = args[key];
	return typeof value === 'string' ? value : undefined;
}
