// ============================================================================
// Vitrin Runner - Result Aggregator
// Turns the flat list of results into what the reporters print: totals,
// flaky tests (passed after a retry), the slowest journeys and timing stats.
// ============================================================================

import type { WorkItemResult } from './event-bus.js';

export interface TimingStats {
	min: number;
	max: number;
	avg: number;
	median: number;
	p95: number;
	total: number;
}

export interface AggregatedSummary {
	totals: {
		tests: number;
		passed: number;
		failed: number;
		skipped: number;
		flaky: number;
	};
	/** Over tests that ran (skipped ones excluded) */
	timing: TimingStats;
	/** Total wall-clock time */
	totalDuration: number;
	flakyTests: string[];
	slowestTests: Array<{ title: string; duration: number }>;
	failedTests: Array<{ title: string; error?: string; screenshotPath?: string }>;
}

/**
 * ```ts
 * const summary = new ResultAggregator().aggregate(results, Date.now() - start);
 * console.log(`${summary.totals.passed} passed, ${summary.flakyTests.length} flaky`);
 * ```
 */
export class ResultAggregator {
	constructor(private readonly slowestCount = 5) {}

	aggregate(results: WorkItemResult[], totalDuration: number): AggregatedSummary {
		const ran = results.filter((r) => r.status !== 'skipped');
		const flaky = results.filter((r) => r.status === 'passed' && (r.retries ?? 0) > 0);

		return {
			totals: {
				tests: results.length,
				passed: results.filter((r) => r.status === 'passed').length,
				failed: results.filter((r) => r.status === 'failed').length,
				skipped: results.length - ran.length,
				flaky: flaky.length,
			},
			timing: computeTimingStats(ran.map((r) => r.duration)),
			totalDuration,
			flakyTests: flaky.map((r) => fullTitle(r)),
			slowestTests: [...ran]
				.sort((a, b) => b.duration - a.duration)
				.slice(0, this.slowestCount)
				.map((r) => ({ title: fullTitle(r), duration: r.duration })),
			failedTests: results
				.filter((r) => r.status === 'failed')
				.map((r) => ({ title: fullTitle(r), error: r.error?.message, screenshotPath: r.screenshotPath })),
		};
	}
}

/**
 * Timing statistics over a list of durations. All zeros when empty.
 */
export function computeTimingStats(durations: number[]): TimingStats {
	const sorted = [...durations].sort((a, b) => a - b);
	const at = (index: number) => sorted[Math.min(index, sorted.length - 1)] ?? 0;
	const total = sorted.reduce((sum, d) => sum + d, 0);

	return {
		min: at(0),
		max: at(sorted.length - 1),
		avg: sorted.length === 0 ? 0 : Math.round(total / sorted.length),
		median: at(Math.floor(sorted.length / 2)),
		p95: at(Math.floor(sorted.length * 0.95)),
		total,
	};
}

/** "Suite > Nested > title" */
export function fullTitle(result: Pick<WorkItemResult, 'item'>): string {
	return [...result.item.suitePath, result.item.title].join(' > ');
}

/** 1234 → "1.23s" */
export function formatSeconds(ms: number): string {
	return `${(ms / 1000).toFixed(2)}s`;
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const minutes = Math.floor(ms / 60_000);
	const seconds = ((ms % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}
