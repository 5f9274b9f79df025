import { v4 as uuidv4 } from 'uuid';
import type { TaskMessage, UsageRecord } from './types.js';

/** A usage record stamped with the branch that produced it */
export interface UsageEntry extends UsageRecord {
	id: string;
	timestamp: Date;
	branchId: string;
	depth: number;
	invocationName: string;
}

export interface UsageTotals {
	inputTokens: number;
	outputTokens: number;
	requests: number;
	byInvocation: Record<string, { inputTokens: number; outputTokens: number; requests: number }>;
}

/**
 * Run-scoped usage collector, shared by reference across every branch.
 */
export interface UsageSink {
	record(entry: Omit<UsageEntry, 'id' | 'timestamp'>): UsageEntry;
	entries(): readonly UsageEntry[];
	totals(): UsageTotals;
}

export interface MessageLogEntry {
	branchId: string;
	invocationName: string;
	depth: number;
	message: TaskMessage;
}

/**
 * Run-scoped log of every message any branch produced, in arrival order.
 */
export interface MessageLog {
	append(
		meta: { branchId: string; invocationName: string; depth: number },
		messages: readonly TaskMessage[],
	): void;
	entries(): readonly MessageLogEntry[];
	forBranch(branchId: string): MessageLogEntry[];
}

export function createUsageSink(clock: () => Date = () => new Date()): UsageSink {
	const records: UsageEntry[] = [];

	return {
		record(entry) {
			const stored: UsageEntry = { ...entry, id: uuidv4(), timestamp: clock() };
			records.push(stored);
			return stored;
		},
		entries: () => [...records],
		totals() {
			const totals: UsageTotals = { inputTokens: 0, outputTokens: 0, requests: 0, byInvocation: {} };
			for (const record of records) {
				const requests = record.requests ?? 1;
				totals.inputTokens += record.inputTokens;
				totals.outputTokens += record.outputTokens;
				totals.requests += requests;

				const bucket = totals.byInvocation[record.invocationName] ?? {
					inputTokens: 0,
					outputTokens: 0,
					requests: 0,
				};
				bucket.inputTokens += record.inputTokens;
				bucket.outputTokens += record.outputTokens;
				bucket.requests += requests;
				totals.byInvocation[record.invocationName] = bucket;
			}
			return totals;
		},
	};
}

export function createMessageLog(): MessageLog {
	const log: MessageLogEntry[] = [];

	return {
		append(meta, messages) {
			for (const message of messages) {
				log.push({ ...meta, message });
			}
		},
		entries: () => [...log],
		forBranch: (branchId) => log.filter((entry) => entry.branchId === branchId),
	};
}
