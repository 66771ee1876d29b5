import type { ArchiveData } from "./types";

export const encoder = new TextEncoder();

// Member names and header fields must be valid UTF-8; fail instead of substituting U+FFFD.
export const decoder = new TextDecoder("utf-8", { fatal: true });

const DECIMAL_INTEGER = /^-?\d+$/;

/**
 * Wraps archive data in a `Uint8Array` without copying.
 */
export function toUint8Array(data: ArchiveData): Uint8Array {
	if (data instanceof Uint8Array) return data;
	if (data instanceof ArrayBuffer) return new Uint8Array(data);

	throw new TypeError("Unsupported archive data type.");
}

/**
 * Parses a space-padded decimal field. Returns `null` for anything that is not
 * an optionally negative run of ASCII digits.
 */
export function parseDecimal(text: string): number | null {
	const trimmed = text.trim();
	if (!DECIMAL_INTEGER.test(trimmed)) return null;

	const value = Number.parseInt(trimmed, 10);
	return Number.isSafeInteger(value) ? value : null;
}

/**
 * Compares two byte sequences for equality.
 */
export function bytesEqual(
	a: ArrayLike<number>,
	b: ArrayLike<number>,
): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}
