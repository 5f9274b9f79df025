import {
	type Dirent,
	lstatSync,
	mkdirSync,
	readdirSync,
	readFileSync,
	realpathSync,
	statSync,
	writeFileSync,
} from 'node:fs';
import path from 'node:path';
import micromatch from 'micromatch';
import {
	ConfigurationError,
	SandboxFileNotFoundError,
	SandboxViolationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sandbox:fs');

export const DEFAULT_MAX_BYTES = 2_000_000;
export const DEFAULT_MAX_CHARS = 20_000;
export const DEFAULT_LIST_PATTERN = '**/*';

export type RootMode = 'ro' | 'rw';

export interface SandboxRootConfig {
	path: string;
	mode: RootMode;
	suffixes?: readonly string[];
	maxBytes?: number;
	readApproval?: boolean;
	writeApproval?: boolean;
}

export interface SandboxRoot {
	name: string;
	/** Absolute, symlink-free root directory */
	root: string;
	mode: RootMode;
	/** Lower-case, dot-prefixed; undefined allows every suffix */
	suffixes?: readonly string[];
	maxBytes: number;
	readApproval: boolean;
	writeApproval: boolean;
}

export interface SandboxLocation {
	root: SandboxRoot;
	/** Root-relative, `/`-separated */
	relative: string;
	absolute: string;
}

export interface ReadOptions {
	maxChars?: number;
	offset?: number;
}

export interface ReadResult {
	content: string;
	truncated: boolean;
	totalChars: number;
	offset: number;
	charsRead: number;
}

export interface WriteResult {
	path: string;
	charsWritten: number;
	bytesWritten: number;
}

export interface FsSandboxOptions {
	roots: Readonly<Record<string, SandboxRootConfig>>;
	/** Base for relative root paths. Defaults to process.cwd(). */
	baseDir?: string;
	/** Create missing root directories at setup. Defaults to true. */
	createRoots?: boolean;
}

export interface FsSandbox {
	readonly roots: readonly SandboxRoot[];
	readableRoots(): string[];
	writableRoots(): string[];
	describeRoots(): string;
	/** Absolute path for a `root/rel` or `root:rel` spec; must be a strict descendant of its root */
	resolve(pathSpec: string): string;
	locate(pathSpec: string): SandboxLocation;
	/** Locates a directory for listing; the root itself is allowed */
	locateDir(pathSpec: string): SandboxLocation;
	/** Path and suffix checks of `read`, without touching the file */
	checkRead(pathSpec: string): SandboxLocation;
	/** Path, mode and suffix checks of `write`, without touching the file */
	checkWrite(pathSpec: string): SandboxLocation;
	rootFor(pathSpec: string): SandboxRoot | undefined;
	/** Resolves an argument the way the shell executor does: inside one of `rootNames` or undefined */
	resolveWithin(pathSpec: string, rootNames: readonly string[]): string | undefined;
	read(pathSpec: string, options?: ReadOptions): ReadResult;
	write(pathSpec: string, content: string): WriteResult;
	list(pathSpec?: string, pattern?: string): string[];
}

const ROOT_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

function normalizeSuffix(suffix: string): string {
	const lower = suffix.toLowerCase();
	return lower.startsWith('.') ? lower : `.${lower}`;
}

function isDescendant(parent: string, child: string): boolean {
	const rel = path.relative(parent, child);
	return rel.length > 0 && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

function isWithin(parent: string, child: string): boolean {
	return parent === child || isDescendant(parent, child);
}

function existsNoFollow(target: string): boolean {
	try {
		lstatSync(target);
		return true;
	} catch {
		return false;
	}
}

/**
 * Realpath of the deepest existing ancestor with the missing tail re-attached.
 * Dangling symlinks make realpathSync throw, which callers treat as an escape.
 */
function realpathAllowingMissing(target: string): string {
	const missing: string[] = [];
	let existing = target;
	while (!existsNoFollow(existing)) {
		const parent = path.dirname(existing);
		if (parent === existing) break;
		missing.unshift(path.basename(existing));
		existing = parent;
	}
	return path.join(realpathSync(existing), ...missing);
}

function splitSpec(pathSpec: string): { rootName: string; rest: string } {
	const slash = pathSpec.indexOf('/');
	const colon = pathSpec.indexOf(':');
	const candidates = [slash, colon].filter((index) => index >= 0);
	if (candidates.length === 0) {
		return { rootName: pathSpec, rest: '' };
	}
	const cut = Math.min(...candidates);
	return { rootName: pathSpec.slice(0, cut), rest: pathSpec.slice(cut + 1) };
}

function buildRoot(name: string, config: SandboxRootConfig, baseDir: string, create: boolean): SandboxRoot {
	if (!ROOT_NAME_PATTERN.test(name)) {
		throw new ConfigurationError(
			`Invalid sandbox root name '${name}': use letters, digits, '.', '_' or '-'`,
		);
	}
	const absolute = path.resolve(baseDir, config.path);
	if (create) {
		mkdirSync(absolute, { recursive: true });
	}

	let real: string;
	try {
		real = realpathSync(absolute);
	} catch (err) {
		throw new ConfigurationError(
			`Sandbox root '${name}' does not exist: ${absolute} (${err instanceof Error ? err.message : String(err)})`,
		);
	}
	if (!statSync(real).isDirectory()) {
		throw new ConfigurationError(`Sandbox root '${name}' is not a directory: ${real}`);
	}

	return {
		name,
		root: real,
		mode: config.mode,
		suffixes: config.suffixes?.map(normalizeSuffix),
		maxBytes: config.maxBytes ?? DEFAULT_MAX_BYTES,
		readApproval: config.readApproval ?? false,
		writeApproval: config.writeApproval ?? true,
	};
}

function walkFiles(base: string, root: string, pattern: string, rootName: string): string[] {
	const results: string[] = [];
	const queue: string[] = [base];

	while (queue.length > 0) {
		const current = queue.shift();
		if (current === undefined) continue;

		let entries: Dirent[];
		try {
			entries = readdirSync(current, { withFileTypes: true });
		} catch (err) {
			logger.warn('Skipping unreadable directory', {
				path: current,
				error: err instanceof Error ? err.message : String(err),
			});
			continue;
		}

		for (const entry of entries) {
			// Never follow symlinks while walking.
			if (entry.isSymbolicLink()) continue;

			const fullPath = path.join(current, entry.name);
			if (entry.isDirectory()) {
				queue.push(fullPath);
				continue;
			}
			if (!entry.isFile()) continue;

			const fromBase = path.relative(base, fullPath).split(path.sep).join('/');
			if (micromatch.isMatch(fromBase, pattern, { dot: true })) {
				const fromRoot = path.relative(root, fullPath).split(path.sep).join('/');
				results.push(`${rootName}/${fromRoot}`);
			}
		}
	}

	return results;
}

export function createFsSandbox(options: FsSandboxOptions): FsSandbox {
	const baseDir = path.resolve(options.baseDir ?? process.cwd());
	const create = options.createRoots ?? true;
	const roots = Object.entries(options.roots).map(([name, config]) =>
		buildRoot(name, config, baseDir, create),
	);
	const byName = new Map(roots.map((root) => [root.name, root]));

	const readableRoots = () => roots.map((root) => `${root.name}/`);
	const writableRoots = () =>
		roots.filter((root) => root.mode === 'rw').map((root) => `${root.name}/`);

	function describeRoots(): string {
		if (roots.length === 0) return '(no sandbox roots configured)';
		return roots
			.map((root) => {
				const suffixes = root.suffixes ? `, suffixes: ${root.suffixes.join(' ')}` : '';
				return `${root.name}/ (${root.mode}${suffixes})`;
			})
			.join(', ');
	}

	function listOrNone(list: string[]): string {
		return list.length > 0 ? list.join(', ') : '(none)';
	}

	function notInSandbox(pathSpec: string, detail = 'path is outside sandbox'): SandboxViolationError {
		logger.warn('Sandbox path rejected', { path: pathSpec, reason: detail });
		return new SandboxViolationError(
			'not_in_sandbox',
			pathSpec,
			`Cannot access '${pathSpec}': ${detail}.\nReadable paths: ${listOrNone(readableRoots())}`,
		);
	}

	function escape(pathSpec: string, root: SandboxRoot): SandboxViolationError {
		logger.warn('Sandbox escape rejected', { path: pathSpec, root: root.name });
		return new SandboxViolationError(
			'path_escape',
			pathSpec,
			`Cannot access '${pathSpec}': path escapes sandbox root '${root.name}'.\nReadable paths: ${listOrNone(readableRoots())}`,
		);
	}

	/**
	 * Locates a spec. `allowRoot` admits the root directory itself (listing only).
	 */
	function locateSpec(pathSpec: string, allowRoot: boolean): SandboxLocation {
		if (pathSpec.includes('\0')) {
			throw notInSandbox(pathSpec, 'path contains a NUL byte');
		}
		if (path.isAbsolute(pathSpec) || /^[A-Za-z]:[\\/]/.test(pathSpec)) {
			throw notInSandbox(pathSpec, 'absolute paths are not allowed');
		}
		if (pathSpec.startsWith('~')) {
			throw notInSandbox(pathSpec, 'home-relative paths are not allowed');
		}

		const { rootName, rest } = splitSpec(pathSpec.trim());
		const root = byName.get(rootName);
		if (!root) {
			throw notInSandbox(pathSpec, `unknown sandbox root '${rootName}'`);
		}

		const absolute = path.resolve(root.root, rest);
		const inside = allowRoot ? isWithin(root.root, absolute) : isDescendant(root.root, absolute);
		if (!inside) {
			throw escape(pathSpec, root);
		}

		let real: string;
		try {
			real = realpathAllowingMissing(absolute);
		} catch {
			throw escape(pathSpec, root);
		}
		const realInside = allowRoot ? isWithin(root.root, real) : isDescendant(root.root, real);
		if (!realInside) {
			throw escape(pathSpec, root);
		}

		const relative = path.relative(root.root, real).split(path.sep).join('/');
		return { root, relative, absolute: real };
	}

	function checkSuffix(pathSpec: string, location: SandboxLocation): void {
		const { suffixes } = location.root;
		if (!suffixes) return;
		const ext = path.extname(location.relative).toLowerCase();
		if (!suffixes.includes(ext)) {
			logger.warn('Sandbox suffix rejected', { path: pathSpec, suffix: ext });
			throw new SandboxViolationError(
				'suffix_not_allowed',
				pathSpec,
				`Cannot access '${pathSpec}': suffix '${ext || '(none)'}' is not allowed in root '${location.root.name}'.\nAllowed suffixes: ${suffixes.join(', ')}`,
			);
		}
	}

	function tooLarge(pathSpec: string, size: number, root: SandboxRoot, verb: string): SandboxViolationError {
		return new SandboxViolationError(
			'too_large',
			pathSpec,
			`Cannot ${verb} '${pathSpec}': ${size} bytes exceeds the limit of root '${root.name}'.\nMaximum allowed: ${root.maxBytes} bytes`,
		);
	}

	function read(pathSpec: string, readOptions: ReadOptions = {}): ReadResult {
		const maxChars = readOptions.maxChars ?? DEFAULT_MAX_CHARS;
		const offset = readOptions.offset ?? 0;
		if (!Number.isInteger(maxChars) || maxChars <= 0) {
			throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
		}
		if (!Number.isInteger(offset) || offset < 0) {
			throw new RangeError(`offset must be a non-negative integer, got ${offset}`);
		}

		const location = checkRead(pathSpec);

		let size: number;
		try {
			const stats = statSync(location.absolute);
			if (!stats.isFile()) {
				throw new SandboxFileNotFoundError(pathSpec, `Not a file: ${pathSpec}`);
			}
			size = stats.size;
		} catch (err) {
			if (err instanceof SandboxFileNotFoundError) throw err;
			throw new SandboxFileNotFoundError(pathSpec);
		}
		if (size > location.root.maxBytes) {
			throw tooLarge(pathSpec, size, location.root, 'read');
		}

		// Offsets and lengths count code points.
		const chars = Array.from(readFileSync(location.absolute, 'utf-8'));
		const page = chars.slice(offset, offset + maxChars);
		return {
			content: page.join(''),
			truncated: offset + page.length < chars.length,
			totalChars: chars.length,
			offset,
			charsRead: page.length,
		};
	}

	function checkRead(pathSpec: string): SandboxLocation {
		const location = locateSpec(pathSpec, false);
		checkSuffix(pathSpec, location);
		return location;
	}

	function checkWrite(pathSpec: string): SandboxLocation {
		const location = locateSpec(pathSpec, false);
		const { root } = location;
		if (root.mode !== 'rw') {
			logger.warn('Write to read-only root rejected', { path: pathSpec, root: root.name });
			throw new SandboxViolationError(
				'read_only',
				pathSpec,
				`Cannot write to '${pathSpec}': root '${root.name}' is read-only.\nWritable paths: ${listOrNone(writableRoots())}`,
			);
		}
		checkSuffix(pathSpec, location);
		return location;
	}

	function write(pathSpec: string, content: string): WriteResult {
		const location = checkWrite(pathSpec);
		const { root } = location;

		const bytes = Buffer.byteLength(content, 'utf-8');
		if (bytes > root.maxBytes) {
			throw tooLarge(pathSpec, bytes, root, 'write');
		}

		mkdirSync(path.dirname(location.absolute), { recursive: true });
		writeFileSync(location.absolute, content, 'utf-8');
		logger.debug('File written', { path: pathSpec, bytes });

		return {
			path: `${root.name}/${location.relative}`,
			charsWritten: Array.from(content).length,
			bytesWritten: bytes,
		};
	}

	function list(pathSpec = '.', pattern = DEFAULT_LIST_PATTERN): string[] {
		const spec = pathSpec.trim();
		const targets: SandboxLocation[] =
			spec === '' || spec === '.'
				? roots.map((root) => ({ root, relative: '', absolute: root.root }))
				: [locateSpec(spec, true)];

		const results: string[] = [];
		for (const target of targets) {
			let isDir = false;
			try {
				isDir = statSync(target.absolute).isDirectory();
			} catch {
				isDir = false;
			}
			if (!isDir) {
				throw new SandboxFileNotFoundError(spec, `Directory not found: ${spec}`);
			}
			results.push(...walkFiles(target.absolute, target.root.root, pattern, target.root.name));
		}
		return results.sort();
	}

	function rootFor(pathSpec: string): SandboxRoot | undefined {
		return byName.get(splitSpec(pathSpec.trim()).rootName);
	}

	function resolveWithin(pathSpec: string, rootNames: readonly string[]): string | undefined {
		const root = rootFor(pathSpec);
		if (!root || !rootNames.includes(root.name)) return undefined;
		try {
			return locateSpec(pathSpec, true).absolute;
		} catch (err) {
			if (err instanceof SandboxViolationError) return undefined;
			throw err;
		}
	}

	return {
		roots,
		readableRoots,
		writableRoots,
		describeRoots,
		resolve: (pathSpec) => locateSpec(pathSpec, false).absolute,
		locate: (pathSpec) => locateSpec(pathSpec, false),
		locateDir: (pathSpec) => locateSpec(pathSpec, true),
		checkRead,
		checkWrite,
		rootFor,
		resolveWithin,
		read,
		write,
		list,
	};
}
