/**
 * Generic configuration sanitizer helpers shared across config modules.
 */

export function sanitizeNumber(value: unknown, fallback: number, min: number): number {
	if (typeof value !== 'number' || Number.isNaN(value) || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.max(min, Math.floor(value));
}

export function sanitizeEnum<T extends string | number>(value: unknown, allowed: readonly T[], fallback: T): T {
	return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function sanitizeOptionalString(value: unknown): string | undefined {
	if (typeof value !== 'string') {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

/** Parses an integer environment value, `undefined` when absent or malformed. */
export function parseEnvInteger(raw: string | undefined): number | undefined {
	const trimmed = raw?.trim();
	if (!trimmed || !/^-?\d+$/.test(trimmed)) {
		return undefined;
	}
	return Number.parseInt(trimmed, 10);
}
