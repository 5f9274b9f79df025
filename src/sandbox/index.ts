export {
	createFsSandbox,
	DEFAULT_LIST_PATTERN,
	DEFAULT_MAX_BYTES,
	DEFAULT_MAX_CHARS,
	type FsSandbox,
	type FsSandboxOptions,
	type ReadOptions,
	type ReadResult,
	type RootMode,
	type SandboxLocation,
	type SandboxRoot,
	type SandboxRootConfig,
	type WriteResult,
} from './fs-sandbox.js';
export {
	BLOCKED_METACHARACTERS,
	type CommandAssessment,
	createWhitelistExecutor,
	DEFAULT_MAX_OUTPUT_BYTES,
	DEFAULT_TIMEOUT_MS,
	type ExecOptions,
	type ExecResult,
	MAX_TIMEOUT_MS,
	MIN_TIMEOUT_MS,
	type RuleMatch,
	type ShellDefault,
	type ShellRule,
	tokenizeCommand,
	TRUNCATION_MARKER,
	type WhitelistExecutor,
	type WhitelistExecutorOptions,
} from './shell-exec.js';
