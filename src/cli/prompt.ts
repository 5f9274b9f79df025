import { createInterface } from 'node:readline/promises';
import type { DecideFn } from '../policy/approval.js';
import type { ApprovalDecision } from '../policy/types.js';

const CHOICES = '[y] once  [a] always this session  [n] deny  [d] deny this session';

export function parseApprovalAnswer(answer: string): ApprovalDecision {
	switch (answer.trim().toLowerCase()) {
		case 'y':
		case 'yes':
			return { approved: true, remember: 'none' };
		case 'a':
		case 'always':
			return { approved: true, remember: 'session' };
		case 'd':
			return { approved: false, remember: 'session', note: 'Denied for this session' };
		default:
			return { approved: false, remember: 'none', note: 'Denied by user' };
	}
}

interface TerminalDecideOptions {
	input?: NodeJS.ReadableStream;
	output?: NodeJS.WritableStream;
}

/**
 * Asks on the terminal. Anything but an explicit yes is a denial.
 */
export function createTerminalDecide(options: TerminalDecideOptions = {}): DecideFn {
	const input = options.input ?? process.stdin;
	const output = options.output ?? process.stderr;

	return async (_request, description, signal) => {
		const rl = createInterface({ input, output });
		try {
			const answer = await rl.question(`\nApproval required: ${description}\n${CHOICES}\n> `, {
				signal,
			});
			return parseApprovalAnswer(answer);
		} finally {
			rl.close();
		}
	};
}
