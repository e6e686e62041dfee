// ============================================================================
// Vitrin - CLI flags
// ============================================================================

import { SUPPORTED_BROWSERS } from 'vitrin-driver';
import type { VitrinConfig } from './config.js';
import { ConfigError } from './errors.js';

export const VERSION = '1.0.0';

export interface CLIFlags {
	/** Positional arguments: test files to run */
	files: string[];
	headed?: boolean;
	headless?: boolean;
	browser?: string;
	workers?: number;
	timeout?: number;
	retries?: number;
	grep?: string;
	bail?: boolean;
	debug?: boolean;
}

/**
 * Parse the arguments after `vitrin test`.
 *
 * ```ts
 * parseFlags(['e2e/search.e2e.ts', '--workers', '2', '--headless']);
 * // { files: ['e2e/search.e2e.ts'], workers: 2, headless: true }
 * ```
 */
export function parseFlags(args: string[]): CLIFlags {
	const flags: CLIFlags = { files: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		const value = () => {
			const next = args[++i];
			if (next === undefined || next.startsWith('--')) {
				throw new ConfigError(arg, 'expected a value');
			}
			return next;
		};

		switch (arg) {
			case '--headed':
				flags.headed = true;
				break;
			case '--headless':
				flags.headless = true;
				break;
			case '--debug':
				flags.debug = true;
				break;
			case '--bail':
				flags.bail = true;
				break;
			case '--browser':
				flags.browser = value();
				break;
			case '--workers':
				flags.workers = parseInteger(arg, value());
				break;
			case '--timeout':
				flags.timeout = parseInteger(arg, value());
				break;
			case '--retries':
				flags.retries = parseInteger(arg, value());
				break;
			case '--grep':
			case '-g':
				flags.grep = value();
				break;
			default:
				if (arg.startsWith('-')) throw new ConfigError(arg, 'unknown option');
				flags.files.push(arg);
		}
	}

	return flags;
}

/**
 * Apply command-line overrides on top of the resolved config. The flags win
 * over both the config file and the environment; CI still forces headless.
 */
export function applyFlags(config: VitrinConfig, flags: CLIFlags): VitrinConfig {
	const next: VitrinConfig = { ...config };

	if (flags.headed) next.headless = false;
	if (flags.headless) next.headless = true;
	if (next.ci) next.headless = true;

	if (flags.browser !== undefined) {
		const name = flags.browser.trim().toLowerCase();
		const browser = SUPPORTED_BROWSERS.find((b) => b === name);
		if (!browser) {
			throw new ConfigError('--browser', `unsupported browser "${flags.browser}". Supported: ${SUPPORTED_BROWSERS.join(', ')}`);
		}
		next.browser = browser;
	}

	if (flags.workers !== undefined) {
		if (flags.workers < 1) throw new ConfigError('--workers', `expected a positive integer, got ${flags.workers}`);
		next.workers = flags.workers;
	}
	if (flags.retries !== undefined) {
		if (flags.retries < 0) throw new ConfigError('--retries', `expected a non-negative integer, got ${flags.retries}`);
		next.retries = flags.retries;
	}
	if (flags.timeout !== undefined) {
		if (flags.timeout <= 0) throw new ConfigError('--timeout', `expected a positive number of ms, got ${flags.timeout}`);
		next.timeout = flags.timeout;
	}
	if (flags.debug) {
		next.debug = true;
		next.logLevel = 'debug';
	}

	return next;
}

function parseInteger(flag: string, raw: string): number {
	const value = Number(raw);
	if (!Number.isInteger(value)) {
		throw new ConfigError(flag, `expected an integer, got "${raw}"`);
	}
	return value;
}

export const HELP = `
  vitrin v${VERSION} -- storefront UI tests

  Usage:
    vitrin test [files...] [options]

  Options:
    --browser <name>    Browser to use: ${SUPPORTED_BROWSERS.join(', ')} (default: chrome)
    --headed            Show the browser window
    --headless          Run without a window (forced in CI)
    --workers <n>       Parallel workers, one browser each (default: 3)
    --timeout <ms>      Per-test timeout in milliseconds (default: 120000)
    --retries <n>       Retry element, timeout and network failures n times (default: 1)
    --grep <text>       Only run tests whose full title contains text
    --bail              Stop after the first failure
    --debug             Debug logging and protocol traces
    -h, --help          Show this help message
    -v, --version       Show version

  Examples:
    vitrin test                              # Every e2e suite
    vitrin test e2e/search.e2e.ts            # One file
    vitrin test --headed --workers 1 --grep "laptop"
    VITRIN_BROWSER=edge vitrin test --bail
`;
