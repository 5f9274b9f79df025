/** Result type for fallible operations */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}
