// ============================================================================
// Vitrin Runner - Types
// ============================================================================

/** Browsers a worker can drive */
export type BrowserName = 'chrome' | 'edge';

/** The slice of vitrin's resolved config the runner reads */
export interface RunnerConfig {
	browser: BrowserName;
	/** Parallel workers, one browser each */
	workers: number;
	/** Retries for a retryable failure, unless a test sets its own */
	retries: number;
	testMatch: string;
	/** Directory for the JSON run report. Empty string disables the report. */
	reportDir: string;
	baseURL: string;
	headless: boolean;
	timeout: number;
	screenshot: 'always' | 'on-failure' | 'never';
}

/** Options for the test runner */
export interface RunnerOptions {
	/** Resolved config */
	config: RunnerConfig;
	/** Specific files to run (overrides testMatch) */
	files?: string[];
	/** Filter tests by a substring of their full title */
	grep?: string;
	/** Stop after first failure */
	bail?: boolean;
	/** Where discovery starts and paths are shown relative to (default: process.cwd()) */
	cwd?: string;
	/** Console output (default: console.log) */
	write?: (line: string) => void;
	/** ANSI colours in console output (default: on when writing to a terminal) */
	color?: boolean;
}

/** Result of a single test execution */
export interface TestResult {
	title: string;
	suitePath: string[];
	status: 'passed' | 'failed' | 'skipped';
	duration: number;
	error?: Error;
	/** Set when a screenshot was captured for this test */
	screenshotPath?: string;
	retries?: number;
}

/** Summary of a full test run */
export interface RunSummary {
	total: number;
	passed: number;
	failed: number;
	skipped: number;
	/** Passed only after one or more retries */
	flaky: number;
	duration: number;
	results: TestResult[];
	/** Path of the JSON report, when one was written */
	reportPath?: string;
}
