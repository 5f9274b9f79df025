import { isRecord } from '../utils/result.js';

function canonicalize(value: unknown, seen: Set<object>): unknown {
	if (typeof value === 'bigint') return value.toString();
	if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
		return null;
	}
	if (value instanceof Date) return value.toISOString();
	if (value === null || typeof value !== 'object') return value;

	if (seen.has(value)) {
		throw new TypeError('Cannot canonicalize a circular structure');
	}
	seen.add(value);
	try {
		if (Array.isArray(value)) {
			return value.map((item) => canonicalize(item, seen));
		}
		if (value instanceof Map) {
			return canonicalize(Object.fromEntries(value), seen);
		}
		if (value instanceof Set) {
			return [...value].map((item) => canonicalize(item, seen));
		}
		if (!isRecord(value)) return String(value);

		const result: Record<string, unknown> = {};
		for (const key of Object.keys(value).sort()) {
			const item = value[key];
			// Absent and undefined keys encode the same way.
			if (item === undefined) continue;
			result[key] = canonicalize(item, seen);
		}
		return result;
	} finally {
		seen.delete(value);
	}
}

/**
 * JSON with object keys sorted at every level, so argument maps that differ
 * only in key order encode identically.
 */
export function canonicalJson(value: unknown): string {
	return JSON.stringify(canonicalize(value, new Set())) ?? 'null';
}

/**
 * Session cache key: action name plus canonical arguments. The approval
 * description is not part of the key.
 */
export function approvalCacheKey(name: string, args: Record<string, unknown>): string {
	return `${name}\u0000${canonicalJson(args)}`;
}
