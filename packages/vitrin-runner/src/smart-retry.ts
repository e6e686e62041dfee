// ============================================================================
// Vitrin Runner - Smart Retry
// Decides whether a failed test is worth running again.
//
// - element, timeout and network failures are retryable (the storefront
//   was slow, a banner moved, a node re-rendered)
// - assertion, script, configuration and unrecognised failures are not
//
// Errors are matched by name and message: the runner does not import
// vitrin, so instanceof is unavailable.
// ============================================================================

export type FailureCategory =
	| 'element'
	| 'actionability'
	| 'timeout'
	| 'network'
	| 'assertion'
	| 'script'
	| 'config'
	| 'unknown';

export interface FailureClassification {
	category: FailureCategory;
	retryable: boolean;
	description: string;
}

/** Driver error codes, as they lead a DriverError message: "[code] ..." */
const DRIVER_CODE = /^\[([a-z ]+)\]/;

const RETRYABLE_DRIVER_CODES: Record<string, FailureCategory> = {
	'no such element': 'element',
	'stale element reference': 'element',
	'element click intercepted': 'actionability',
	'element not interactable': 'actionability',
	timeout: 'timeout',
	'no such window': 'element',
};

const ASSERTION_NAMES = new Set(['AssertionError', 'AssertionError [ERR_ASSERTION]', 'ERR_ASSERTION']);

const SCRIPT_ERROR_NAMES = new Set(['SyntaxError', 'ReferenceError', 'TypeError', 'RangeError']);

const NETWORK_PATTERNS = ['econnrefused', 'econnreset', 'enotfound', 'socket hang up', 'fetch failed', 'network'];

/**
 * Classify an error and determine if retrying is worthwhile.
 *
 * ```ts
 * classifyFailure(new TimeoutError(...)).retryable;    // true
 * classifyFailure(new AssertionError('...')).retryable; // false
 * ```
 */
export function classifyFailure(error: unknown): FailureClassification {
	if (!(error instanceof Error)) {
		return { category: 'unknown', retryable: false, description: 'Non-Error thrown' };
	}

	const { name } = error;
	const msg = error.message.toLowerCase();

	// --- Not retryable ---

	if (ASSERTION_NAMES.has(name) || error.constructor.name === 'AssertionError') {
		return { category: 'assertion', retryable: false, description: 'Assertion failed' };
	}

	if (SCRIPT_ERROR_NAMES.has(name)) {
		return { category: 'script', retryable: false, description: `${name} in test code` };
	}

	if (name === 'ConfigError') {
		return { category: 'config', retryable: false, description: 'Invalid configuration' };
	}

	if (name === 'DriverError') {
		const code = DRIVER_CODE.exec(msg)?.[1];
		if (code === 'invalid selector' || code === 'javascript error') {
			return { category: 'script', retryable: false, description: `Driver reported ${code}` };
		}
		const category = code === undefined ? undefined : RETRYABLE_DRIVER_CODES[code];
		if (category) {
			return { category, retryable: true, description: `Driver reported ${code}` };
		}
	}

	// --- Retryable ---

	if (name === 'ElementNotFoundError') {
		return { category: 'element', retryable: true, description: 'Element not found; the page may still be loading' };
	}

	if (name === 'ElementNotActionableError') {
		return {
			category: 'actionability',
			retryable: true,
			description: 'Element not actionable; a popup may have covered it',
		};
	}

	if (name === 'TimeoutError' || msg.includes('timed out') || msg.includes('timeout')) {
		return { category: 'timeout', retryable: true, description: 'Timed out; the storefront may be slow' };
	}

	if (NETWORK_PATTERNS.some((pattern) => msg.includes(pattern))) {
		return { category: 'network', retryable: true, description: 'Network failure' };
	}

	return { category: 'unknown', retryable: false, description: 'Unknown error' };
}
