export {
	createCustomActionProvider,
	type CustomActionProviderOptions,
} from './custom-actions.js';
export {
	createDelegateActionProvider,
	DELEGATE_CAPABILITY,
	type DelegateActionProviderOptions,
	type DelegationApproval,
} from './delegate-actions.js';
export {
	createFsActionProvider,
	FS_READ_CAPABILITY,
	FS_WRITE_CAPABILITY,
	type FsActionProviderOptions,
} from './fs-actions.js';
export {
	createGuardedProvider,
	type Guard,
	type GuardedProvider,
	isPermissionErrorValue,
	type PermissionErrorValue,
} from './guarded.js';
export { type ActionRegistry, type ActionSet, createActionRegistry } from './registry.js';
export {
	createShellActionProvider,
	EXEC_CAPABILITY,
	EXEC_UNLISTED_CAPABILITY,
	SHELL_ACTION,
	type ShellActionProviderOptions,
} from './shell-actions.js';
export {
	type Action,
	type ActionDefinition,
	type ActionProvider,
	createAction,
	type CustomActionProvider,
	type DelegateActionProvider,
	type FsActionProvider,
	formatZodIssues,
	type InvocationContext,
	type ProviderKind,
	type ShellActionProvider,
} from './types.js';
