export * from './actions/index.js';
export { createServices, type ServiceOptions, type Services, toPolicyConfig } from './bootstrap.js';
export * from './config/index.js';
export * from './policy/index.js';
export * from './runtime/index.js';
export * from './sandbox/index.js';
export {
	CapgateError,
	ConfigurationError,
	DepthExceededError,
	errorMessage,
	InvalidArgumentsError,
	isCapgateError,
	PolicyDeniedError,
	SandboxFileNotFoundError,
	SandboxViolationError,
	UnknownActionError,
	WhitelistViolationError,
} from './utils/errors.js';
export { createLogger, initLogger, type Logger, type LoggerOptions, resetLogger } from './utils/logger.js';
export type { Result } from './utils/result.js';
export { redactSecrets, redactSecretsInValue } from './utils/secret-redaction.js';
