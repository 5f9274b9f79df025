import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createServices } from '../../bootstrap.js';
import { loadConfig } from '../../config/loader.js';
import type { DecideFn } from '../../policy/approval.js';
import { WhitelistViolationError } from '../../utils/errors.js';
import { createActionCliHandlers } from '../actions.js';

const tempRoots: string[] = [];

function createTempRoot(prefix: string): string {
	const root = mkdtempSync(join(tmpdir(), prefix));
	tempRoots.push(root);
	return root;
}

function configYaml(mode: string, returnPermissionErrors = false): string {
	return `approval:
  mode: ${mode}
  return_permission_errors: ${returnPermissionErrors}
policy:
  capability_map:
    deploy: ops.deploy
  capability_rules:
    ops.deploy: blocked
sandbox:
  roots:
    docs:
      path: docs
      mode: ro
    out:
      path: out
      mode: rw
shell:
  rules:
    - pattern: echo
      approval_required: false
    - pattern: cat
      sandbox_roots: [docs]
`;
}

function setup(mode: string, options: { decide?: DecideFn; returnPermissionErrors?: boolean } = {}) {
	const root = createTempRoot('capgate-cli-');
	mkdirSync(join(root, 'docs'));
	writeFileSync(join(root, 'docs', 'guide.md'), '# Guide\n');
	const configPath = join(root, 'capgate.yaml');
	writeFileSync(configPath, configYaml(mode, options.returnPermissionErrors));

	const loaded = loadConfig(configPath);
	if (!loaded.ok) throw loaded.error;
	const services = createServices(loaded.value, { decide: options.decide });
	return { root, services, handlers: createActionCliHandlers(services) };
}

afterEach(() => {
	while (tempRoots.length > 0) {
		const root = tempRoots.pop();
		if (root) {
			rmSync(root, { recursive: true, force: true });
		}
	}
});

describe('action CLI handlers', () => {
	it('describes roots and command patterns', async () => {
		const { handlers } = setup('approve_all');

		expect(await handlers.roots()).toBe(
			[
				'Sandbox roots:',
				'docs/ (ro), out/ (rw)',
				'Readable: docs/, out/',
				'Writable: out/',
				'Allowed command patterns: echo, cat (no default rule)',
			].join('\n'),
		);
	});

	it('writes, reads and lists through the sandbox', async () => {
		const { handlers } = setup('approve_all');

		expect(await handlers.write('out/a.txt', 'hello')).toBe('Wrote 5 characters (5 bytes) to out/a.txt');
		expect(await handlers.read('out/a.txt')).toBe('hello');
		expect(await handlers.read('out/a.txt', { maxChars: 2 })).toBe(
			'he\n[truncated: characters 0-2 of 5; continue with --offset 2]',
		);
		expect(await handlers.list()).toBe('docs/guide.md\nout/a.txt');
		expect(await handlers.list('out', '*.md')).toBe('(no files)');
	});

	it('runs whitelisted commands', async () => {
		const { handlers } = setup('approve_all');

		expect(await handlers.exec('echo hi')).toBe('hi\n[exit 0]');
		expect(await handlers.exec('cat docs/guide.md')).toBe('# Guide\n[exit 0]');
		await expect(handlers.exec('echo hi | cat')).rejects.toBeInstanceOf(WhitelistViolationError);
		await expect(handlers.exec('ls')).rejects.toThrow(
			'Command not in whitelist (no matching rule and no default): ls',
		);
	});

	it('fails rejected actions with the approver note', async () => {
		const { handlers } = setup('reject_all');

		await expect(handlers.write('out/a.txt', 'x')).rejects.toThrow(
			"Permission denied for 'write_file': Rejected by approver (Rejected: approval mode is reject_all)",
		);
	});

	it('turns permission values into failures too', async () => {
		const { handlers } = setup('reject_all', { returnPermissionErrors: true });

		await expect(handlers.write('out/a.txt', 'x')).rejects.toThrow(
			"Permission denied for 'write_file': Rejected by approver (Rejected: approval mode is reject_all)",
		);
	});

	it('asks the decision function in interactive mode', async () => {
		const decide = vi.fn<DecideFn>().mockResolvedValue({ approved: true, remember: 'none' });
		const { handlers } = setup('interactive', { decide });

		await handlers.write('out/a.txt', 'x');
		await handlers.read('out/a.txt');

		// Reads from docs/ and out/ need no approval by default; writes do.
		expect(decide).toHaveBeenCalledTimes(1);
		expect(decide.mock.calls[0]?.[1]).toBe("write_file(path='out/a.txt', content='x') [caps: filesystem.write]");
	});

	it('evaluates actions without running them', async () => {
		const decide = vi.fn<DecideFn>();
		const { handlers } = setup('interactive', { decide });

		expect(await handlers.evaluate('write_file', { path: 'out/a.txt', content: 'x' })).toBe(
			[
				'Action: write_file',
				'Outcome: needs_approval',
				'Capabilities: filesystem.write',
				'Provider: filesystem (filesystem)',
			].join('\n'),
		);
		expect(await handlers.evaluate('write_file', { path: 'docs/x.md', content: 'x' })).toBe(
			[
				'Action: write_file',
				'Outcome: blocked',
				"Reason: Cannot write to 'docs/x.md': root 'docs' is read-only.\nWritable paths: out/",
				'Capabilities: filesystem.write',
				'Provider: filesystem (filesystem)',
			].join('\n'),
		);
		expect(await handlers.evaluate('deploy', {})).toBe(
			[
				'Action: deploy',
				'Outcome: blocked',
				'Reason: Capability blocked: ops.deploy',
				'Capabilities: ops.deploy',
				'Provider: (none; run-level policy only)',
			].join('\n'),
		);
		expect(decide).not.toHaveBeenCalled();
	});
});
