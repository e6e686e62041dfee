// ============================================================================
// Vitrin Runner - Test Runner
// Discovers test files, loads them, runs the tests on a pool of browser
// workers and reports the results.
//
// The runner does NOT import 'vitrin' to avoid circular deps.
// Loading, launching and executing are callbacks provided by the CLI.
// ============================================================================

import { type Stats, existsSync, readdirSync, statSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { EventBus, type WorkItem, type WorkItemResult, type WorkerInfo } from './event-bus.js';
import { ConsoleReporter, JsonReporter } from './reporter.js';
import { ResultAggregator } from './result-aggregator.js';
import type { RunSummary, RunnerOptions, TestResult } from './types.js';
import { type BrowserSpawner, type ItemAttempt, WorkerPool } from './worker-pool.js';

/** A registered test as the runner needs to see it */
export interface RunnableTest {
	title: string;
	suitePath: string[];
	skip: boolean;
	only: boolean;
	options: { timeout?: number; retries?: number; tags?: string[] };
}

/** Load a test file and return the tests it registered */
export type FileLoader<T extends RunnableTest> = (file: string) => Promise<T[]>;

/** Run one test on the browser of the given worker */
export type TestExecutor<T extends RunnableTest> = (test: T, worker: WorkerInfo, attempt: ItemAttempt) => Promise<TestResult>;

/** Told which tests will run, after grep, `only` and skips, before any starts */
export type RunPlanner<T extends RunnableTest> = (tests: T[]) => void;

/**
 * Used by the CLI:
 * ```ts
 * const runner = new TestRunner({ config, grep: 'laptop' });
 * const exitCode = await runner.run(loadFile, executeTest, spawnWorker, planRun);
 * ```
 */
export class TestRunner {
	/** Every runner event; subscribe before calling run() */
	readonly bus: EventBus;
	private readonly cwd: string;
	private readonly write: (line: string) => void;
	private readonly color: boolean;
	private lastSummary: RunSummary | undefined;

	constructor(private readonly options: RunnerOptions) {
		this.cwd = options.cwd ?? process.cwd();
		this.write = options.write ?? console.log;
		this.color = options.color ?? (options.write === undefined && process.stdout.isTTY === true);
		this.bus = new EventBus((event, err) => {
			this.write(`  Reporter for "${event}" failed: ${err instanceof Error ? err.message : String(err)}`);
		});
	}

	/** Summary of the last completed run */
	get summary(): RunSummary | undefined {
		return this.lastSummary;
	}

	/**
	 * Run all tests and return an exit code (0 = success, 1 = failure).
	 *
	 * @param loadFile - Load a test file (triggers test registration). Returns registered tests.
	 * @param executeTest - Execute a single test on a worker's browser.
	 * @param spawnWorker - Start the browser a worker owns.
	 * @param prepare - Receives the tests that will run, before the first starts.
	 */
	async run<T extends RunnableTest>(
		loadFile: FileLoader<T>,
		executeTest: TestExecutor<T>,
		spawnWorker: BrowserSpawner,
		prepare?: RunPlanner<T>,
	): Promise<number> {
		const startTime = Date.now();
		const { config } = this.options;

		const files = this.discoverFiles();
		if (files.length === 0) {
			this.write('\n  No test files found.\n');
			this.write(`  Test pattern: ${config.testMatch}\n`);
			return 0;
		}

		this.write(`\n  Vitrin - Running ${files.length} test file${files.length > 1 ? 's' : ''} on ${config.browser}\n`);

		const consoleReporter = new ConsoleReporter(this.write, this.color);
		consoleReporter.attach(this.bus);

		try {
			const results: WorkItemResult[] = [];
			const { runnable, tests } = await this.plan(files, loadFile, results);
			prepare?.([...tests.values()]);

			const workers = Math.min(config.workers, runnable.length);
			this.bus.emit('run:start', { browser: config.browser, totalItems: runnable.length, workers });

			if (runnable.length > 0) {
				results.push(...(await this.execute(runnable, tests, executeTest, spawnWorker, workers)));
			}

			const duration = Date.now() - startTime;
			this.bus.emit('run:end', { duration, results });

			const aggregated = new ResultAggregator().aggregate(results, duration);
			const reportPath = config.reportDir
				? await new JsonReporter(resolve(this.cwd, config.reportDir)).write(config, results, aggregated)
				: undefined;
			consoleReporter.printSummary(aggregated, reportPath);

			this.lastSummary = {
				total: aggregated.totals.tests,
				passed: aggregated.totals.passed,
				failed: aggregated.totals.failed,
				skipped: aggregated.totals.skipped,
				flaky: aggregated.totals.flaky,
				duration,
				results: results.map(toTestResult),
				reportPath,
			};
			return aggregated.totals.failed > 0 ? 1 : 0;
		} finally {
			consoleReporter.detach();
		}
	}

	// -----------------------------------------------------------------------
	// Planning
	// -----------------------------------------------------------------------

	/**
	 * Load every file and decide what runs. A file that fails to load counts
	 * as one failed test; skipped tests are reported without a browser.
	 */
	private async plan<T extends RunnableTest>(
		files: string[],
		loadFile: FileLoader<T>,
		results: WorkItemResult[],
	): Promise<{ runnable: WorkItem[]; tests: Map<string, T> }> {
		const loaded: Array<{ item: WorkItem; test: T }> = [];

		for (const file of files) {
			const relPath = relative(this.cwd, file);
			try {
				const tests = await loadFile(file);
				tests.forEach((test, index) => {
					loaded.push({
						test,
						item: {
							id: `${relPath}#${index}`,
							title: test.title,
							file: relPath,
							suitePath: test.suitePath,
							tags: test.options.tags,
							retries: test.options.retries,
						},
					});
				});
			} catch (err) {
				const result: WorkItemResult = {
					item: { id: `${relPath}#load`, title: `Failed to load: ${relPath}`, file: relPath, suitePath: [] },
					status: 'failed',
					duration: 0,
					error: err instanceof Error ? err : new Error(String(err)),
				};
				results.push(result);
				this.bus.emit('item:fail', result);
				this.bus.emit('item:end', result);
			}
		}

		const { grep } = this.options;
		const matching = grep
			? loaded.filter(({ item }) => [...item.suitePath, item.title].join(' > ').includes(grep))
			: loaded;
		const selected = matching.some(({ test }) => test.only) ? matching.filter(({ test }) => test.only) : matching;

		const runnable: WorkItem[] = [];
		const tests = new Map<string, T>();
		for (const { item, test } of selected) {
			if (test.skip) {
				const result: WorkItemResult = { item, status: 'skipped', duration: 0 };
				results.push(result);
				this.bus.emit('item:skip', result);
				this.bus.emit('item:end', result);
			} else {
				runnable.push(item);
				tests.set(item.id, test);
			}
		}

		return { runnable, tests };
	}

	// -----------------------------------------------------------------------
	// Execution
	// -----------------------------------------------------------------------

	private async execute<T extends RunnableTest>(
		items: WorkItem[],
		tests: Map<string, T>,
		executeTest: TestExecutor<T>,
		spawnWorker: BrowserSpawner,
		workers: number,
	): Promise<WorkItemResult[]> {
		const { config } = this.options;
		const pool = new WorkerPool(this.bus, {
			browser: config.browser,
			workers,
			maxRetries: config.retries,
			bail: this.options.bail ?? false,
		});

		try {
			await pool.spawn(spawnWorker);
			return await pool.execute(items, async (item, worker, attempt) => {
				const test = tests.get(item.id);
				if (!test) throw new Error(`No test registered for ${item.id}`);
				const result = await executeTest(test, worker, attempt);
				return {
					status: result.status,
					duration: result.duration,
					error: result.error,
					screenshotPath: result.screenshotPath,
				};
			});
		} finally {
			await pool.terminate();
		}
	}

	// -----------------------------------------------------------------------
	// File Discovery
	// -----------------------------------------------------------------------

	discoverFiles(): string[] {
		if (this.options.files && this.options.files.length > 0) {
			return this.options.files.map((f) => resolve(this.cwd, f)).filter((f) => existsSync(f));
		}
		return this.findTestFiles(this.cwd);
	}

	/**
	 * Find files matching a pattern of the form `**\/*<suffix>.{ext,...}`,
	 * e.g. `**\/*.e2e.{ts,js}`.
	 */
	private findTestFiles(dir: string): string[] {
		const files: string[] = [];
		const pattern = this.options.config.testMatch;

		const extMatch = pattern.match(/\.\{([^}]+)\}$/);
		const extensions = extMatch?.[1]?.split(',').map((e) => e.trim()) ?? ['ts', 'js'];

		const suffixMatch = pattern.match(/\*(\.[^{*]+)\./);
		const suffix = suffixMatch?.[1] ?? '.e2e';

		this.walkDir(dir, files, extensions, suffix);
		return files.sort();
	}

	private walkDir(dir: string, results: string[], extensions: string[], suffix: string): void {
		const skip = new Set(['node_modules', 'dist', '.git', 'coverage', 'reports', 'screenshots']);

		let entries: string[];
		try {
			entries = readdirSync(dir);
		} catch {
			return;
		}

		for (const entry of entries) {
			if (skip.has(entry)) continue;

			const fullPath = join(dir, entry);
			let stat: Stats;
			try {
				stat = statSync(fullPath);
			} catch {
				continue;
			}

			if (stat.isDirectory()) {
				this.walkDir(fullPath, results, extensions, suffix);
			} else if (stat.isFile() && extensions.some((ext) => entry.endsWith(`${suffix}.${ext}`))) {
				results.push(fullPath);
			}
		}
	}
}

function toTestResult(result: WorkItemResult): TestResult {
	return {
		title: result.item.title,
		suitePath: result.item.suitePath,
		status: result.status,
		duration: result.duration,
		error: result.error,
		screenshotPath: result.screenshotPath,
		retries: result.retries,
	};
}
