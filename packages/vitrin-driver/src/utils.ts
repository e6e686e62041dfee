import { isRecord } from './protocol.js';

/**
 * Redacts sensitive values from a protocol message before it is traced.
 * Handles both direct key matches and { name, value } pairs such as
 * cookies and headers.
 */

// 'auth' matches 'authorization', 'cookie' matches 'set-cookie', etc.
const SENSITIVE_REGEX = /(?:cookie|password|token|secret|session|auth)/i;
const REDACTED_VALUE = '[REDACTED]';
const TRACE_LIMIT = 500;

/**
 * Recursively redacts sensitive fields from an object.
 * Copy-on-write: untouched branches are returned as-is.
 */
export function sanitize(obj: unknown): unknown {
	if (obj === null || typeof obj !== 'object') {
		return obj;
	}

	if (Array.isArray(obj)) {
		let copy: unknown[] | null = null;
		for (let i = 0; i < obj.length; i++) {
			const val: unknown = obj[i];
			const sanitized = sanitize(val);
			if (sanitized !== val) {
				if (!copy) {
					copy = obj.slice(0, i);
				}
				copy.push(sanitized);
			} else if (copy) {
				copy.push(val);
			}
		}
		return copy || obj;
	}

	if (!isRecord(obj)) return obj;

	let copy: Record<string, unknown> | null = null;
	const name = obj.name;
	const isSensitiveName = typeof name === 'string' && SENSITIVE_REGEX.test(name);

	for (const key of Object.keys(obj)) {
		const value = obj[key];
		let newValue = value;

		if (Array.isArray(value)) {
			// Arrays named 'cookies' are walked, not blanked
			newValue = sanitize(value);
		} else if (SENSITIVE_REGEX.test(key)) {
			// sessionId on flat-mode messages is routing, not a secret
			newValue = key === 'sessionId' ? value : REDACTED_VALUE;
		} else if (isSensitiveName && key === 'value') {
			newValue = isRecord(value) && 'value' in value ? { ...value, value: REDACTED_VALUE } : REDACTED_VALUE;
		} else {
			newValue = sanitize(value);
		}

		if (newValue !== value) {
			if (!copy) {
				copy = { ...obj };
			}
			copy[key] = newValue;
		}
	}

	return copy || obj;
}

/**
 * One trace line for a raw protocol frame: sanitized, truncated.
 * Frames that are not JSON are traced as-is.
 */
export function formatTrace(direction: 'send' | 'receive', raw: string): string {
	const prefix = direction === 'send' ? '>>> SEND' : '<<< RECV';
	let data: string;
	try {
		data = JSON.stringify(sanitize(JSON.parse(raw)));
	} catch {
		data = raw;
	}
	return `${prefix}: ${data.slice(0, TRACE_LIMIT)}`;
}
