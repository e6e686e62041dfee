// ============================================================================
// Vitrin - Test Function
// The test authoring API. Every test gets a fresh browser session and the
// storefront entry points as fixtures.
//
// import { test, expect } from 'vitrin';
//
// test('search shows results', async ({ site }) => {
//   const results = await site.search('laptop');
//   expect(await results.areProductsDisplayed()).toBeTruthy();
//   expect(await results.getSearchKeyword()).toContain('laptop');
// });
// ============================================================================

import type { BrowserDriver } from 'vitrin-driver';
import { classifyFailure } from 'vitrin-runner';
import type { VitrinConfig } from './config.js';
import { createPageContext } from './context.js';
import { TimeoutError } from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { captureScreenshot } from './screenshot.js';
import { Storefront } from './storefront.js';
import type { TabManager } from './tabs.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fixtures available in every test */
export interface TestFixtures {
	/** The test's own browser session. Quit after the test. */
	driver: BrowserDriver;
	/** Storefront entry points: home, search, cart, product, category */
	site: Storefront;
	tabs: TabManager;
	config: VitrinConfig;
	log: Logger;
}

export type TestBody = (fixtures: TestFixtures) => Promise<void>;

/** A single test case, registered by test() */
export interface TestCase {
	title: string;
	fn: TestBody;
	options: TestOptions;
	/** File this test was defined in */
	file?: string;
	/** Suite/describe path (e.g., ['Search', 'keywords']) */
	suitePath: string[];
	skip: boolean;
	only: boolean;
}

/** Options for individual tests */
export interface TestOptions {
	/** Override timeout for this specific test */
	timeout?: number;
	/** Number of retries for this specific test */
	retries?: number;
	/** Labels carried into the JSON report (e.g., ['smoke', 'regression']) */
	tags?: string[];
}

/** Result of running a single test */
export interface TestResult {
	title: string;
	suitePath: string[];
	status: 'passed' | 'failed' | 'skipped';
	duration: number;
	error?: Error;
	/** Path to screenshot file (if one was captured) */
	screenshotPath?: string;
}

/** Starts a fresh browser session for one test */
export type DriverFactory = () => Promise<BrowserDriver>;

/** Internal test registry -- the runner reads from here */
export const testRegistry: TestCase[] = [];

/** Current suite stack for describe() nesting */
const suiteStack: string[] = [];

/** beforeAll runs by hook key, shared by tests that start while one is in flight */
const beforeAllRuns = new Map<string, Promise<void>>();
/** Tests each afterAll hook still waits for, by hook key */
const afterAllPending = new Map<string, Set<TestCase>>();
const executedAfterAllHooks = new Set<string>();
/** Tests this run will execute; every registered test that is not skipped when unset */
let plannedTests: TestCase[] | undefined;

// ---------------------------------------------------------------------------
// test() -- the main API
// ---------------------------------------------------------------------------

/**
 * Define a storefront test.
 *
 * ```ts
 * test('telefon has plenty of results', { tags: ['smoke'], retries: 2 }, async ({ site }) => {
 *   const results = await site.search('telefon');
 *   expect(await results.getProductCount()).toBeGreaterThan(100);
 * });
 * ```
 */
export function test(title: string, fn: TestBody): void;
export function test(title: string, options: TestOptions, fn: TestBody): void;
export function test(title: string, fnOrOptions: TestBody | TestOptions, maybeFn?: TestBody): void {
	register(title, fnOrOptions, maybeFn, { skip: false, only: false });
}

/**
 * Register a test that is reported as skipped and never run.
 */
test.skip = function skipTest(title: string, fnOrOptions: TestBody | TestOptions, maybeFn?: TestBody): void {
	register(title, fnOrOptions, maybeFn, { skip: true, only: false });
};

/**
 * Only run this test (and other `only` tests).
 */
test.only = function onlyTest(title: string, fnOrOptions: TestBody | TestOptions, maybeFn?: TestBody): void {
	register(title, fnOrOptions, maybeFn, { skip: false, only: true });
};

function register(
	title: string,
	fnOrOptions: TestBody | TestOptions,
	maybeFn: TestBody | undefined,
	flags: { skip: boolean; only: boolean },
): void {
	const fn = typeof fnOrOptions === 'function' ? fnOrOptions : maybeFn;
	if (!fn) {
		throw new TypeError(`test('${title}') needs a test function`);
	}

	testRegistry.push({
		title,
		fn,
		options: typeof fnOrOptions === 'function' ? {} : fnOrOptions,
		suitePath: [...suiteStack],
		...flags,
	});
}

// ---------------------------------------------------------------------------
// describe() -- grouping tests
// ---------------------------------------------------------------------------

/**
 * Group related tests together.
 *
 * ```ts
 * describe('Search', () => {
 *   test('laptop', async ({ site }) => { ... });
 *   test('çanta', async ({ site }) => { ... });
 * });
 * ```
 */
export function describe(title: string, fn: () => void): void {
	suiteStack.push(title);
	try {
		fn();
	} finally {
		suiteStack.pop();
	}
}

/** Skip every test in a describe block */
describe.skip = function skipDescribe(title: string, fn: () => void): void {
	const start = testRegistry.length;
	describe(title, fn);
	for (const testCase of testRegistry.slice(start)) {
		testCase.skip = true;
	}
};

/** Only run tests in this describe block */
describe.only = function onlyDescribe(title: string, fn: () => void): void {
	const start = testRegistry.length;
	describe(title, fn);
	for (const testCase of testRegistry.slice(start)) {
		testCase.only = true;
	}
};

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

/** Before/after hooks for a describe block */
export type HookFn = (fixtures: TestFixtures) => Promise<void>;

interface RegisteredHook {
	fn: HookFn;
	suitePath: string[];
}

const hooks: Record<'beforeAll' | 'afterAll' | 'beforeEach' | 'afterEach', RegisteredHook[]> = {
	beforeAll: [],
	afterAll: [],
	beforeEach: [],
	afterEach: [],
};

/**
 * Run once, before the first test of the current describe block, with that
 * test's fixtures.
 */
export function beforeAll(fn: HookFn): void {
	hooks.beforeAll.push({ fn, suitePath: [...suiteStack] });
}

/**
 * Run once, after every planned test of the current describe block has
 * finished (passed, or failed with no retry left), with the fixtures of the
 * test that finished last.
 */
export function afterAll(fn: HookFn): void {
	hooks.afterAll.push({ fn, suitePath: [...suiteStack] });
}

export function beforeEach(fn: HookFn): void {
	hooks.beforeEach.push({ fn, suitePath: [...suiteStack] });
}

export function afterEach(fn: HookFn): void {
	hooks.afterEach.push({ fn, suitePath: [...suiteStack] });
}

/** Registered hooks, by kind */
export function getHooks(): Readonly<typeof hooks> {
	return { ...hooks };
}

// ---------------------------------------------------------------------------
// Internal: Run a single test with fixtures
// ---------------------------------------------------------------------------

/** Where a run stands with the retries of the test it executes */
export interface RunAttempt {
	/** Further attempts the runner may make if this one fails retryably */
	retriesLeft: number;
}

/**
 * Tell the hooks which tests this run will execute, after grep, `only` and
 * skips are applied. afterAll hooks wait for these tests only.
 */
export function planRun(tests: TestCase[]): void {
	plannedTests = [...tests];
	afterAllPending.clear();
}

/**
 * Execute a single test case in its own browser session:
 *
 * 1. start a driver and open the storefront's base URL
 * 2. run beforeAll (once per suite), beforeEach, the body and afterEach
 *    under the test's timeout
 * 3. on its final attempt, run the afterAll hooks of suites it finishes
 * 4. capture a screenshot on failure (or always, if configured)
 * 5. quit the driver, whatever happened
 */
export async function runTest(
	testCase: TestCase,
	driverFactory: DriverFactory,
	config: VitrinConfig,
	log: Logger = createLogger('vitrin', { level: config.logLevel }),
	attempt: RunAttempt = { retriesLeft: 0 },
): Promise<TestResult> {
	const startTime = Date.now();
	const base = { title: testCase.title, suitePath: testCase.suitePath };

	if (testCase.skip) {
		return { ...base, status: 'skipped', duration: 0 };
	}

	const testLog = log.child('Test');
	const name = [...testCase.suitePath, testCase.title].join(' - ');
	const timeout = testCase.options.timeout ?? config.timeout;
	let driver: BrowserDriver | undefined;
	let fixtures: TestFixtures | undefined;
	let error: Error | undefined;

	try {
		try {
			driver = await driverFactory();
			const ctx = createPageContext(driver, config, log);
			const session: TestFixtures = {
				driver,
				site: new Storefront(ctx),
				tabs: ctx.tabs,
				config,
				log: log.child(testCase.title),
			};
			fixtures = session;

			await withTimeout(
				async () => {
					await session.driver.navigate(ctx.urls.base);
					await runBeforeAllHooks(testCase, session);
					await runHooks('beforeEach', testCase, session);
					await testCase.fn(session);
					await runHooks('afterEach', testCase, session);
				},
				timeout,
				`test '${name}'`,
			);
		} catch (err) {
			error = toError(err);
		}

		if (isFinalAttempt(error, attempt)) {
			const hookError = await finishSuites(testCase, fixtures, timeout, testLog);
			if (hookError) {
				if (error) testLog.error(`afterAll failed after: ${name}`, hookError);
				error ??= hookError;
			}
		}

		let screenshotPath: string | undefined;
		const wantScreenshot = config.screenshot === 'always' || (error !== undefined && config.screenshot === 'on-failure');
		if (driver && wantScreenshot) {
			screenshotPath = (await captureScreenshot(driver, name, config.screenshotDir, testLog)) ?? undefined;
		}

		const duration = Date.now() - startTime;
		if (error) {
			testLog.error(`Test failed: ${name}`, error);
			return { ...base, status: 'failed', duration, error, screenshotPath };
		}
		testLog.info(`Test passed: ${name}`);
		return { ...base, status: 'passed', duration, screenshotPath };
	} finally {
		if (driver) {
			await driver.quit().catch((err: unknown) => testLog.warn('Could not quit the browser session', err));
		}
	}
}

/** A failure the runner will retry does not finish the test yet */
function isFinalAttempt(error: Error | undefined, attempt: RunAttempt): boolean {
	return error === undefined || attempt.retriesLeft <= 0 || !classifyFailure(error).retryable;
}

/**
 * Count this test as finished for every suite around it, and run the
 * afterAll hooks of suites with no planned test left. Every hook runs, and
 * the first error among them is returned.
 */
async function finishSuites(
	testCase: TestCase,
	fixtures: TestFixtures | undefined,
	timeout: number,
	testLog: Logger,
): Promise<Error | undefined> {
	let firstError: Error | undefined;

	for (const [index, hook] of hooks.afterAll.entries()) {
		if (!isHookApplicable(hook.suitePath, testCase.suitePath)) continue;
		const key = hookKey(hook, index);
		if (executedAfterAllHooks.has(key)) continue;

		let pending = afterAllPending.get(key);
		if (!pending) {
			const members = (plannedTests ?? testRegistry).filter(
				(t) => !t.skip && isHookApplicable(hook.suitePath, t.suitePath),
			);
			pending = new Set(members);
			afterAllPending.set(key, pending);
		}
		pending.delete(testCase);
		if (pending.size > 0) continue;

		executedAfterAllHooks.add(key);
		const suite = hook.suitePath.join(' - ') || 'all tests';
		if (!fixtures) {
			testLog.warn(`Skipping afterAll of ${suite}: no browser session`);
			continue;
		}
		const session = fixtures;
		try {
			await withTimeout(() => hook.fn(session), timeout, `afterAll of ${suite}`);
		} catch (err) {
			firstError ??= toError(err);
		}
	}

	return firstError;
}

/**
 * Reset all hooks and registries (for test isolation between files).
 */
export function resetTestState(): void {
	testRegistry.length = 0;
	for (const list of Object.values(hooks)) list.length = 0;
	beforeAllRuns.clear();
	afterAllPending.clear();
	executedAfterAllHooks.clear();
	plannedTests = undefined;
	suiteStack.length = 0;
}

/**
 * Run each applicable beforeAll once. A test that starts while the hook is
 * running waits for that same run; a run that failed is dropped, so the
 * next test tries again.
 */
async function runBeforeAllHooks(testCase: TestCase, fixtures: TestFixtures): Promise<void> {
	for (const [index, hook] of hooks.beforeAll.entries()) {
		if (!isHookApplicable(hook.suitePath, testCase.suitePath)) continue;
		const key = hookKey(hook, index);

		let run = beforeAllRuns.get(key);
		if (!run) {
			run = hook.fn(fixtures).catch((err: unknown) => {
				beforeAllRuns.delete(key);
				throw err;
			});
			beforeAllRuns.set(key, run);
		}
		await run;
	}
}

async function runHooks(kind: 'beforeEach' | 'afterEach', testCase: TestCase, fixtures: TestFixtures): Promise<void> {
	for (const hook of hooks[kind]) {
		if (!isHookApplicable(hook.suitePath, testCase.suitePath)) continue;
		await hook.fn(fixtures);
	}
}

function hookKey(hook: RegisteredHook, index: number): string {
	return `${hook.suitePath.join('>')}:${index}`;
}

/** Check if a hook applies to a test based on suite nesting */
export function isHookApplicable(hookSuitePath: string[], testSuitePath: string[]): boolean {
	if (hookSuitePath.length === 0) return true; // Global hook applies to all
	if (hookSuitePath.length > testSuitePath.length) return false;
	return hookSuitePath.every((s, i) => testSuitePath[i] === s);
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

async function withTimeout(work: () => Promise<void>, ms: number, target: string): Promise<void> {
	let timer: NodeJS.Timeout | undefined;
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new TimeoutError({ action: 'finish', target, message: `timed out after ${ms}ms.`, elapsed: ms }));
		}, ms);
	});
	try {
		await Promise.race([work(), expired]);
	} finally {
		clearTimeout(timer);
	}
}
