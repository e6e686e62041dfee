// ============================================================================
// Vitrin Driver - Browser Launcher
// Finds and launches a Chromium-family browser (Chrome, Edge) with the
// DevTools endpoint enabled, on Windows, Mac and Linux.
// ============================================================================

import { type ChildProcess, spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DriverError } from './types.js';

/** Supported browser names */
export type BrowserName = 'chrome' | 'edge';

export const SUPPORTED_BROWSERS: readonly BrowserName[] = ['chrome', 'edge'];

/** Desktop user agent presented to the storefront, which serves a degraded page to headless UAs */
export const DEFAULT_USER_AGENT =
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

/** Options for launching a browser */
export interface LaunchOptions {
	/** Which browser to launch (default: 'chrome') */
	browser?: BrowserName;
	/** Run in headless mode (default: false) */
	headless?: boolean;
	/** Custom browser executable path */
	executablePath?: string;
	/** Extra args to pass to the browser process */
	args?: string[];
	/** Start the window maximized (default: true). Ignored when headless. */
	maximized?: boolean;
	/** Window size used when not maximized, and always in headless mode */
	windowSize?: { width: number; height: number };
	/** UI and Accept-Language locale (default: 'tr-TR') */
	locale?: string;
	/** User agent override (default: DEFAULT_USER_AGENT) */
	userAgent?: string;
	/** Timeout for browser startup in ms (default: 30000) */
	timeout?: number;
}

/** Result of launching a browser */
export interface LaunchResult {
	/** The browser-level DevTools WebSocket URL */
	wsEndpoint: string;
	process: ChildProcess;
	/** Path to the temporary user data directory */
	userDataDir: string;
	/** Kill the process and remove the temp profile */
	close: () => Promise<void>;
}

/**
 * Launch a browser and return its DevTools WebSocket endpoint.
 *
 * ```ts
 * const { wsEndpoint, close } = await launchBrowser({ browser: 'chrome', headless: true });
 * // connect to wsEndpoint...
 * await close();
 * ```
 */
export async function launchBrowser(options: LaunchOptions = {}): Promise<LaunchResult> {
	const { browser = 'chrome', timeout = 30_000 } = options;

	// Fresh profile per launch: no cookies, no stored consent
	const userDataDir = await mkdtemp(join(tmpdir(), `vitrin-${browser}-`));

	const executablePath = options.executablePath ?? findBrowser(browser);
	if (!executablePath) {
		await removeProfile(userDataDir);
		throw new DriverError(
			'session not created',
			`Could not find ${browser} on your system. Install ${browser} or set executablePath in vitrin.config.ts.`,
		);
	}

	const args = buildChromiumArgs({
		headless: options.headless ?? false,
		userDataDir,
		maximized: options.maximized ?? true,
		windowSize: options.windowSize,
		locale: options.locale ?? 'tr-TR',
		userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
		extraArgs: options.args,
	});

	const proc = spawn(executablePath, args, {
		stdio: ['pipe', 'pipe', 'pipe'],
		detached: false,
	});

	try {
		const wsEndpoint = await waitForWSEndpoint(proc, browser, timeout);

		const close = async () => {
			if (proc.exitCode === null && !proc.killed) {
				proc.kill('SIGTERM');
				// 3s to exit gracefully, then force kill
				await new Promise<void>((resolve) => {
					const forceTimer = setTimeout(() => {
						if (proc.exitCode === null) proc.kill('SIGKILL');
						resolve();
					}, 3000);
					proc.on('exit', () => {
						clearTimeout(forceTimer);
						resolve();
					});
				});
			}
			await removeProfile(userDataDir);
		};

		return { wsEndpoint, process: proc, userDataDir, close };
	} catch (err) {
		proc.kill('SIGKILL');
		await removeProfile(userDataDir);
		throw err;
	}
}

async function removeProfile(dir: string): Promise<void> {
	try {
		await rm(dir, { recursive: true, force: true });
	} catch (err) {
		// A locked profile on Windows is left for the OS temp cleaner
		console.warn(`[vitrin] Could not remove browser profile ${dir}: ${err instanceof Error ? err.message : String(err)}`);
	}
}

// ---------------------------------------------------------------------------
// Browser discovery - finds where the browser is installed
// ---------------------------------------------------------------------------

export function findBrowser(browser: BrowserName, platform: string = process.platform): string | null {
	for (const p of getBrowserPaths(browser, platform)) {
		if (existsSync(p)) return p;
	}
	return null;
}

function getBrowserPaths(browser: BrowserName, platform: string): string[] {
	return browser === 'edge' ? getEdgePaths(platform) : getChromePaths(platform);
}

function getChromePaths(platform: string): string[] {
	switch (platform) {
		case 'win32':
			return [
				'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
				'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
				`${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
			];
		case 'darwin':
			return [
				'/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
				`${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
			];
		case 'linux':
			return [
				'/usr/bin/google-chrome',
				'/usr/bin/google-chrome-stable',
				'/usr/bin/chromium',
				'/usr/bin/chromium-browser',
				'/snap/bin/chromium',
			];
		default:
			return [];
	}
}

function getEdgePaths(platform: string): string[] {
	switch (platform) {
		case 'win32':
			return [
				'C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe',
				'C:\\Program Files\\Microsoft\\Edge\\Application\\msedge.exe',
				`${process.env.LOCALAPPDATA}\\Microsoft\\Edge\\Application\\msedge.exe`,
			];
		case 'darwin':
			return ['/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge'];
		case 'linux':
			return ['/usr/bin/microsoft-edge', '/usr/bin/microsoft-edge-stable'];
		default:
			return [];
	}
}

// ---------------------------------------------------------------------------
// Browser args - construct the right CLI flags
// ---------------------------------------------------------------------------

export interface BuildArgsOptions {
	headless: boolean;
	userDataDir: string;
	maximized?: boolean;
	windowSize?: { width: number; height: number };
	locale?: string;
	userAgent?: string;
	extraArgs?: string[];
}

export function buildChromiumArgs(options: BuildArgsOptions): string[] {
	const args = [
		'--remote-debugging-port=0', // 0 = auto-pick a free port
		`--user-data-dir=${options.userDataDir}`,

		// Stability flags
		'--no-first-run',
		'--no-default-browser-check',
		'--no-sandbox',
		'--disable-gpu',
		'--disable-background-networking',
		'--disable-background-timer-throttling',
		'--disable-backgrounding-occluded-windows',
		'--disable-breakpad',
		'--disable-component-update',
		'--disable-default-apps',
		'--disable-dev-shm-usage',
		'--disable-extensions',
		'--disable-hang-monitor',
		'--disable-popup-blocking',
		'--disable-prompt-on-repost',
		'--disable-renderer-backgrounding',
		'--disable-sync',
		'--disable-translate',
		'--metrics-recording-only',
		'--password-store=basic',
		'--use-mock-keychain',

		// Storefront behaviour: Turkish content, no permission prompts,
		// no navigator.webdriver banner
		'--disable-notifications',
		'--disable-blink-features=AutomationControlled',
	];

	if (options.locale) args.push(`--lang=${options.locale}`);
	if (options.userAgent) args.push(`--user-agent=${options.userAgent}`);

	const size = options.windowSize ?? { width: 1920, height: 1080 };
	if (options.headless) {
		args.unshift('--headless=new');
		args.push(`--window-size=${size.width},${size.height}`);
	} else if (options.maximized) {
		args.push('--start-maximized');
	} else {
		args.push(`--window-size=${size.width},${size.height}`);
	}

	if (options.extraArgs) {
		args.push(...options.extraArgs);
	}

	args.push('about:blank');
	return args;
}

// ---------------------------------------------------------------------------
// Wait for the browser to output its WebSocket endpoint
// ---------------------------------------------------------------------------

/** Chrome/Edge print "DevTools listening on ws://127.0.0.1:PORT/devtools/browser/GUID" */
export function parseDevToolsEndpoint(output: string): string | null {
	const match = output.match(/DevTools listening on (ws:\/\/\S+)/);
	return match?.[1] ?? null;
}

function waitForWSEndpoint(proc: ChildProcess, browser: BrowserName, timeout: number): Promise<string> {
	return new Promise<string>((resolve, reject) => {
		let stderr = '';

		const timer = setTimeout(() => {
			reject(
				new DriverError(
					'session not created',
					`Timed out after ${timeout}ms waiting for ${browser} to start.\nStderr output:\n${stderr}`,
				),
			);
		}, timeout);

		const onData = (data: Buffer) => {
			stderr += data.toString('utf-8');
			const endpoint = parseDevToolsEndpoint(stderr);
			if (endpoint) {
				clearTimeout(timer);
				proc.stderr?.off('data', onData);
				resolve(endpoint);
			}
		};

		proc.stderr?.on('data', onData);

		proc.on('exit', (code) => {
			clearTimeout(timer);
			reject(
				new DriverError(
					'session not created',
					`${browser} exited with code ${code} before the DevTools endpoint was ready.\nStderr:\n${stderr}`,
				),
			);
		});

		proc.on('error', (err) => {
			clearTimeout(timer);
			reject(new DriverError('session not created', `Failed to launch ${browser}: ${err.message}`));
		});
	});
}
