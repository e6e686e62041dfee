#!/usr/bin/env tsx
// ============================================================================
// Vitrin - CLI
//
// vitrin test                        # Run every e2e suite
// vitrin test e2e/search.e2e.ts      # Run one file
// vitrin --help                      # Show help
// ============================================================================

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { CdpBrowser } from 'vitrin-driver';
import { TestRunner } from 'vitrin-runner';
import { HELP, VERSION, applyFlags, parseFlags } from './cli-options.js';
import { type UserConfig, type VitrinConfig, resolveConfig } from './config.js';
import { errorMessage } from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { type TestCase, planRun, runTest, testRegistry } from './test.js';
import { resolveTimeouts } from './timeouts.js';

async function main(): Promise<void> {
	const args = process.argv.slice(2);

	if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
		console.log(HELP);
		return;
	}

	if (args.includes('--version') || args.includes('-v')) {
		console.log(`vitrin v${VERSION}`);
		return;
	}

	const [command, ...rest] = args;
	if (command === 'test') {
		await runTests(rest);
		return;
	}

	console.error(`Unknown command: ${command}`);
	console.error('Run "vitrin --help" for usage information.');
	process.exit(1);
}

// ---------------------------------------------------------------------------
// Test Command
// ---------------------------------------------------------------------------

async function runTests(args: string[]): Promise<void> {
	const flags = parseFlags(args);
	const config = applyFlags(resolveConfig(await loadConfig()), flags);
	const log = createLogger('vitrin', { level: config.logLevel, color: config.ci ? false : undefined });

	log.info(`Browser: ${config.browser} | Base URL: ${config.baseURL} | Headless: ${config.headless}`);
	log.debug(`Workers: ${config.workers} | Retries: ${config.retries} | Timeout: ${config.timeout}ms`);

	const runner = new TestRunner({
		config,
		files: flags.files.length > 0 ? flags.files : undefined,
		grep: flags.grep,
		bail: flags.bail,
		color: config.ci ? false : undefined,
	});

	// One browser per worker; every test gets its own context in it
	const browsers = new Map<string, CdpBrowser>();

	const loadFile = async (file: string): Promise<TestCase[]> => {
		const startIdx = testRegistry.length;
		if (file.endsWith('.ts') || file.endsWith('.mts')) {
			await ensureTypeScriptLoader(log);
		}
		await import(pathToFileURL(file).href);
		const registered = testRegistry.slice(startIdx);
		for (const testCase of registered) testCase.file = file;
		return registered;
	};

	const exitCode = await runner.run(
		loadFile,
		(testCase, worker, attempt) => {
			const browser = browsers.get(worker.id);
			if (!browser) throw new Error(`Worker ${worker.id} has no browser`);
			return runTest(testCase, () => browser.newDriver(), config, log, attempt);
		},
		async (worker) => {
			const browser = await launch(config, worker.browser);
			browsers.set(worker.id, browser);
			log.debug(`Worker ${worker.id} started ${worker.browser}`);
			return { close: () => browser.close() };
		},
		planRun,
	);

	process.exit(exitCode);
}

function launch(config: VitrinConfig, browser: VitrinConfig['browser']): Promise<CdpBrowser> {
	return CdpBrowser.launch({
		browser,
		headless: config.headless,
		executablePath: config.executablePath,
		maximized: config.maximized,
		windowSize: config.viewport,
		locale: config.locale,
		userAgent: config.userAgent,
		debug: config.debug,
		pageLoadTimeout: resolveTimeouts(config.timeouts).pageLoad,
	});
}

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

const CONFIG_FILES = ['vitrin.config.ts', 'vitrin.config.mts', 'vitrin.config.js', 'vitrin.config.mjs'];

async function loadConfig(cwd: string = process.cwd()): Promise<UserConfig | undefined> {
	for (const name of CONFIG_FILES) {
		const configPath = resolve(cwd, name);
		if (!existsSync(configPath)) continue;

		if (name.endsWith('.ts') || name.endsWith('.mts')) {
			await ensureTypeScriptLoader();
		}
		const mod: unknown = await import(pathToFileURL(configPath).href);
		const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
		if (!isUserConfig(exported)) {
			throw new Error(`${name} must export a config object (export default defineConfig({ ... }))`);
		}
		return exported;
	}

	return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

/** Only the shape; resolveConfig checks the values */
function isUserConfig(value: unknown): value is UserConfig {
	return isRecord(value) && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// TypeScript Loader
// ---------------------------------------------------------------------------

let tsLoaderRegistered = false;

/**
 * Register tsx so that vitrin.config.ts and .e2e.ts files can be imported.
 * Nothing to do when the CLI already runs under tsx or another loader.
 */
async function ensureTypeScriptLoader(log?: Logger): Promise<void> {
	if (tsLoaderRegistered) return;

	const execArgs = process.execArgv.join(' ');
	if (execArgs.includes('tsx') || execArgs.includes('loader') || execArgs.includes('--import')) {
		tsLoaderRegistered = true;
		return;
	}

	const { register } = await import('tsx/esm/api');
	register();
	tsLoaderRegistered = true;
	log?.debug('Registered the tsx loader');
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
	console.error(`Fatal error: ${errorMessage(err)}`);
	process.exit(1);
});
