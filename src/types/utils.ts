/**
 * Core type utilities for ragsql.
 * These types replace 'any' usage and provide strict type safety.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 * Replaces 'any' for data that must be serializable.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Outcome of a multi-step setup sequence.
 * Failures carry a machine-readable reason next to the human message.
 */
export type Result<T, R extends string = string> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly reason: R; readonly message: string };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
	return { ok: true, value };
}

export function failure<R extends string>(
	reason: R,
	message: string
): { readonly ok: false; readonly reason: R; readonly message: string } {
	return { ok: false, reason, message };
}

/**
 * Convert a driver value into something JSON can carry.
 * Dates become ISO strings, bigints become numbers when they fit and strings otherwise,
 * buffers become base64.
 */
export function toJsonValue(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'boolean') return value;
	if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
	if (typeof value === 'bigint') {
		return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
			? Number(value)
			: value.toString();
	}
	if (value instanceof Date) return value.toISOString();
	if (Buffer.isBuffer(value)) return value.toString('base64');
	if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
	if (typeof value === 'object') return toJsonObject(value);
	return String(value);
}

/**
 * Convert a driver row into a JSON object, keeping column order.
 */
export function toJsonObject(row: object): JsonObject {
	const result: JsonObject = {};
	for (const [key, value] of Object.entries(row)) {
		result[key] = toJsonValue(value);
	}
	return result;
}

/**
 * Round to a fixed number of decimals for display and statistics.
 */
export function roundTo(value: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}
