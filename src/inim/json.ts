// src/inim/json.ts
// Narrowing helpers for the loosely-typed JSON INIM Cloud returns.
// The cloud mixes numbers, numeric strings and 0/1 flags for the same fields.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(record: JsonRecord, ...keys: string[]): number | null {
	for (const key of keys) {
		const raw = record[key];
		if (typeof raw === 'number' && Number.isFinite(raw)) {
			return raw;
		}
		if (typeof raw === 'string' && raw.trim() !== '') {
			const parsed = Number(raw.trim());
			if (Number.isFinite(parsed)) {
				return parsed;
			}
		}
	}
	return null;
}

export function readString(record: JsonRecord, ...keys: string[]): string | null {
	for (const key of keys) {
		const raw = record[key];
		if (typeof raw === 'string') {
			return raw;
		}
		if (typeof raw === 'number' && Number.isFinite(raw)) {
			return String(raw);
		}
	}
	return null;
}

/** Truthy flag: `true`, any positive number, or a positive numeric string. */
export function readFlag(record: JsonRecord, ...keys: string[]): boolean {
	for (const key of keys) {
		const raw = record[key];
		if (typeof raw === 'boolean') {
			return raw;
		}
		if (raw !== undefined && raw !== null) {
			const n = typeof raw === 'number' ? raw : Number(raw);
			return Number.isFinite(n) && n > 0;
		}
	}
	return false;
}

export function readNullableFlag(record: JsonRecord, ...keys: string[]): boolean | null {
	for (const key of keys) {
		if (record[key] !== undefined && record[key] !== null) {
			return readFlag(record, key);
		}
	}
	return null;
}

export function readArray(record: JsonRecord, key: string): unknown[] {
	const raw = record[key];
	return Array.isArray(raw) ? raw : [];
}
