import { createDelegateActionProvider } from './actions/delegate-actions.js';
import { createFsActionProvider } from './actions/fs-actions.js';
import { createShellActionProvider } from './actions/shell-actions.js';
import type {
	DelegateActionProvider,
	FsActionProvider,
	ShellActionProvider,
} from './actions/types.js';
import type { CapgateConfig } from './config/schema.js';
import type { DecideFn } from './policy/approval.js';
import type { PolicyConfig } from './policy/types.js';
import type { EventSink } from './runtime/events.js';
import { createRun, type Run } from './runtime/run.js';
import type { BranchSpec, TaskExecutor } from './runtime/types.js';
import { createFsSandbox, type FsSandbox } from './sandbox/fs-sandbox.js';
import { createWhitelistExecutor, type WhitelistExecutor } from './sandbox/shell-exec.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('bootstrap');

export interface ServiceOptions {
	decide?: DecideFn;
	onEvent?: EventSink;
	executor?: TaskExecutor;
}

/**
 * Everything a run needs, built from one validated configuration.
 */
export interface Services {
	config: CapgateConfig;
	sandbox: FsSandbox;
	shell: WhitelistExecutor;
	fsProvider: FsActionProvider;
	shellProvider: ShellActionProvider;
	run: Run;
	/** Delegate provider using the configured approval defaults and overrides */
	delegateTo(targets: readonly BranchSpec[]): DelegateActionProvider;
	/** A branch exposing the filesystem and shell providers */
	branch(name: string, instructions: string): BranchSpec;
}

export function toPolicyConfig(config: CapgateConfig): PolicyConfig {
	return {
		actions: config.policy.actions,
		capabilityRules: config.policy.capabilityRules,
		capabilityDefault: config.policy.capabilityDefault,
		capabilityMap: config.policy.capabilityMap,
	};
}

export function createServices(config: CapgateConfig, options: ServiceOptions = {}): Services {
	const sandbox = createFsSandbox({
		roots: config.sandbox.roots,
		baseDir: config.sandbox.baseDir,
	});
	const shell = createWhitelistExecutor({
		rules: config.shell.rules,
		default: config.shell.default,
		sandbox,
		timeoutMs: config.shell.timeoutMs,
		maxOutputBytes: config.shell.maxOutputBytes,
		workingDirectory: config.shell.workingDirectory,
	});
	const fsProvider = createFsActionProvider({ sandbox });
	const shellProvider = createShellActionProvider({ executor: shell });

	const run = createRun({
		policy: toPolicyConfig(config),
		approval: {
			mode: config.approval.mode,
			decide: options.decide,
			timeoutMs: config.approval.timeoutMs,
			returnPermissionErrors: config.approval.returnPermissionErrors,
		},
		maxDepth: config.delegation.maxDepth,
		onEvent: options.onEvent,
		executor: options.executor,
	});

	logger.debug('Services created', {
		roots: sandbox.roots.map((root) => root.name),
		shellRules: config.shell.rules.length,
		approvalMode: config.approval.mode,
	});

	return {
		config,
		sandbox,
		shell,
		fsProvider,
		shellProvider,
		run,
		delegateTo: (targets) =>
			createDelegateActionProvider({
				targets,
				callsRequireApproval: config.delegation.callsRequireApproval,
				overrides: config.delegation.overrides,
			}),
		branch: (name, instructions) => ({
			name,
			instructions,
			providers: [fsProvider, shellProvider],
		}),
	};
}
