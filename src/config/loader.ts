import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isRecord, type Result } from '../utils/result.js';
import { getDefaultConfigPath } from './defaults.js';
import { type CapgateConfig, ConfigSchema, VERBATIM_KEY_MAPS } from './schema.js';

/**
 * Replaces `${ENV_VAR}` references in string leaves. Unset variables become ''.
 */
function resolveEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => process.env[varName] ?? '');
	}
	if (Array.isArray(value)) {
		return value.map(resolveEnvVars);
	}
	if (isRecord(value)) {
		const result: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			result[key] = resolveEnvVars(item);
		}
		return result;
	}
	return value;
}

function snakeToCamel(str: string): string {
	return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Converts snake_case YAML keys to camelCase, except the keys of maps listed in
 * VERBATIM_KEY_MAPS whose keys are identifiers (e.g. action `read_file`).
 */
function convertKeys(value: unknown, path: string): unknown {
	if (Array.isArray(value)) {
		return value.map((item) => convertKeys(item, `${path}[]`));
	}
	if (!isRecord(value)) {
		return value;
	}

	const verbatim = VERBATIM_KEY_MAPS.has(path);
	const result: Record<string, unknown> = {};
	for (const [key, item] of Object.entries(value)) {
		if (verbatim) {
			// Children of an identifier map are schema objects again.
			result[key] = convertKeys(item, `${path}.*`);
			continue;
		}
		const camel = snakeToCamel(key);
		result[camel] = convertKeys(item, path ? `${path}.${camel}` : camel);
	}
	return result;
}

function readYaml(path: string): Result<Record<string, unknown>> {
	try {
		const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
		if (parsed === null || parsed === undefined) {
			return { ok: true, value: {} };
		}
		if (!isRecord(parsed)) {
			return { ok: false, error: new Error(`Config at ${path} must be a YAML mapping`) };
		}
		return { ok: true, value: parsed };
	} catch (err) {
		return {
			ok: false,
			error: new Error(
				`Failed to parse config at ${path}: ${err instanceof Error ? err.message : String(err)}`,
			),
		};
	}
}

/**
 * Validates an already-parsed (camelCase) config object.
 */
export function parseConfig(raw: unknown): Result<CapgateConfig> {
	const result = ConfigSchema.safeParse(resolveEnvVars(raw));
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
		);
		return { ok: false, error: new Error(`Invalid configuration:\n${issues.join('\n')}`) };
	}
	return { ok: true, value: result.data };
}

/**
 * Loads and validates the capgate configuration from YAML. A missing file
 * yields the defaults. Relative sandbox roots resolve against the config
 * file's directory unless `sandbox.base_dir` says otherwise.
 */
export function loadConfig(configPath?: string): Result<CapgateConfig> {
	const path = resolve(configPath ?? getDefaultConfigPath());

	let raw: Record<string, unknown> = {};
	if (existsSync(path)) {
		const read = readYaml(path);
		if (!read.ok) return read;
		raw = read.value;
	}

	const converted = convertKeys(raw, '');
	const parsed = parseConfig(converted);
	if (!parsed.ok) return parsed;

	const config = parsed.value;
	const baseDir = config.sandbox.baseDir
		? resolve(dirname(path), config.sandbox.baseDir)
		: existsSync(path)
			? dirname(path)
			: process.cwd();

	return { ok: true, value: { ...config, sandbox: { ...config.sandbox, baseDir } } };
}

let current: CapgateConfig | null = null;

/**
 * Loads the config and keeps it for `getConfig()`. CLI entry points only;
 * runtime objects receive their config explicitly.
 */
export function initConfig(configPath?: string): Result<CapgateConfig> {
	const result = loadConfig(configPath);
	if (result.ok) {
		current = result.value;
	}
	return result;
}

export function getConfig(): CapgateConfig {
	if (current === null) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return current;
}

/**
 * Resets config (for testing).
 */
export function resetConfig(): void {
	current = null;
}
