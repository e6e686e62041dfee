// ============================================================================
// Vitrin - Configuration
// Works against the live storefront with zero config. Override only what
// you need in vitrin.config.ts, or per run through the environment.
// ============================================================================

import { type BrowserName, DEFAULT_USER_AGENT, SUPPORTED_BROWSERS } from 'vitrin-driver';
import { ConfigError } from './errors.js';
import { type LogLevel, isLogLevel } from './logger.js';
import type { Timeouts } from './timeouts.js';

/** Full configuration with all options */
export interface VitrinConfig {
	/** Which browser to use (default: 'chrome') */
	browser: BrowserName;
	/** Run in headless mode (default: false; forced on in CI mode) */
	headless: boolean;
	/** Storefront root every journey starts from */
	baseURL: string;
	/** Start the browser window maximized (headed mode only, default: true) */
	maximized: boolean;
	/** Window size when not maximized, and in headless mode (default: 1920x1080) */
	viewport: { width: number; height: number };
	/** Per-test timeout in ms, hooks included (default: 120000) */
	timeout: number;
	/** How many times to retry a retryable failure (default: 1) */
	retries: number;
	/** Parallel workers, one browser each (default: 3) */
	workers: number;
	/** Take screenshots: 'always', 'on-failure', or 'never' (default: 'on-failure') */
	screenshot: 'always' | 'on-failure' | 'never';
	/** Where JSON run reports are written (default: './reports') */
	reportDir: string;
	/** Where screenshots are written (default: './screenshots') */
	screenshotDir: string;
	/** Keyword the smoke suites search for by default (default: 'laptop') */
	searchKeyword: string;
	/** CI mode: headless, no colours (default: from the CI env var) */
	ci: boolean;
	/** Minimum level printed by the logger (default: 'info') */
	logLevel: LogLevel;
	/** Print every protocol frame, with secrets redacted (default: false) */
	debug: boolean;
	/** Test file pattern (default: '**\/*.e2e.{ts,js,mts,mjs}') */
	testMatch: string;
	/** Custom browser executable path */
	executablePath?: string;
	/** Browser UI and Accept-Language locale (default: 'tr-TR') */
	locale: string;
	/** User agent the browser presents */
	userAgent: string;
	/** Overrides for individual wait and pause budgets */
	timeouts: Partial<Timeouts>;
}

/** Users provide a partial config -- everything has defaults */
export type UserConfig = Partial<VitrinConfig>;

const DEFAULTS: VitrinConfig = {
	browser: 'chrome',
	headless: false,
	baseURL: 'https://www.trendyol.com/',
	maximized: true,
	viewport: { width: 1920, height: 1080 },
	timeout: 120_000,
	retries: 1,
	workers: 3,
	screenshot: 'on-failure',
	reportDir: './reports',
	screenshotDir: './screenshots',
	searchKeyword: 'laptop',
	ci: false,
	logLevel: 'info',
	debug: false,
	testMatch: '**/*.e2e.{ts,js,mts,mjs}',
	locale: 'tr-TR',
	userAgent: DEFAULT_USER_AGENT,
	timeouts: {},
};

/**
 * Define your vitrin config with full type safety and IntelliSense.
 * This function is optional -- it's just a type helper for your IDE.
 *
 * ```ts
 * // vitrin.config.ts
 * import { defineConfig } from 'vitrin';
 *
 * export default defineConfig({
 *   browser: 'edge',
 *   workers: 2,
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Resolve user config: defaults, then the config file, then the
 * environment. Rejects values the browser or runner cannot use.
 */
export function resolveConfig(userConfig: UserConfig = {}, env: NodeJS.ProcessEnv = process.env): VitrinConfig {
	const merged: VitrinConfig = {
		...DEFAULTS,
		...userConfig,
		viewport: userConfig.viewport ?? DEFAULTS.viewport,
		timeouts: { ...DEFAULTS.timeouts, ...userConfig.timeouts },
		ci: userConfig.ci ?? isTruthy(env.CI),
	};

	const config = applyEnvOverrides(merged, env);
	if (config.ci) config.headless = true;

	validate(config);
	return config;
}

/**
 * Environment overrides, for switching a run without editing the config:
 *
 * - `VITRIN_BROWSER`   chrome | edge
 * - `VITRIN_HEADLESS`  true | false
 * - `VITRIN_BASE_URL`  storefront root
 * - `VITRIN_WORKERS`   integer
 * - `VITRIN_LOG_LEVEL` debug | info | warn | error | silent
 */
export function applyEnvOverrides(config: VitrinConfig, env: NodeJS.ProcessEnv): VitrinConfig {
	const next = { ...config };

	const browser = env.VITRIN_BROWSER?.trim().toLowerCase();
	if (browser) {
		const match = SUPPORTED_BROWSERS.find((b) => b === browser);
		if (!match) {
			throw new ConfigError('VITRIN_BROWSER', `unsupported browser "${browser}". Supported: ${SUPPORTED_BROWSERS.join(', ')}`);
		}
		next.browser = match;
	}

	if (env.VITRIN_HEADLESS !== undefined && env.VITRIN_HEADLESS !== '') {
		next.headless = isTruthy(env.VITRIN_HEADLESS);
	}

	if (env.VITRIN_BASE_URL) {
		next.baseURL = env.VITRIN_BASE_URL;
	}

	if (env.VITRIN_WORKERS) {
		next.workers = Number(env.VITRIN_WORKERS.trim());
	}

	const level = env.VITRIN_LOG_LEVEL?.trim().toLowerCase();
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError('VITRIN_LOG_LEVEL', `unknown level "${level}"`);
		}
		next.logLevel = level;
	}

	return next;
}

function validate(config: VitrinConfig): void {
	if (!SUPPORTED_BROWSERS.includes(config.browser)) {
		throw new ConfigError('browser', `unsupported browser "${String(config.browser)}". Supported: ${SUPPORTED_BROWSERS.join(', ')}`);
	}
	if (!/^https?:\/\//.test(config.baseURL)) {
		throw new ConfigError('baseURL', `expected an http(s) URL, got "${config.baseURL}"`);
	}
	if (!Number.isInteger(config.workers) || config.workers < 1) {
		throw new ConfigError('workers', `expected a positive integer, got ${config.workers}`);
	}
	if (!Number.isInteger(config.retries) || config.retries < 0) {
		throw new ConfigError('retries', `expected a non-negative integer, got ${config.retries}`);
	}
	if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
		throw new ConfigError('timeout', `expected a positive number of ms, got ${config.timeout}`);
	}
	for (const [key, value] of Object.entries(config.timeouts)) {
		if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
			throw new ConfigError(`timeouts.${key}`, `expected a non-negative number, got ${String(value)}`);
		}
	}
}

function isTruthy(value: string | undefined): boolean {
	if (!value) return false;
	return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}
