import { describe, expect, it } from 'vitest';
import type { WorkItemResult } from './event-bus.js';
import { ResultAggregator, computeTimingStats, formatDuration, formatSeconds, fullTitle } from './result-aggregator.js';

function result(
	title: string,
	status: WorkItemResult['status'],
	duration: number,
	extra: Partial<WorkItemResult> = {},
): WorkItemResult {
	return { item: { id: title, title, file: 'search.e2e.ts', suitePath: ['Search'] }, status, duration, ...extra };
}

describe('ResultAggregator', () => {
	it('should count outcomes and list flaky, slow and failed tests', () => {
		const summary = new ResultAggregator(2).aggregate(
			[
				result('laptop', 'passed', 300),
				result('telefon', 'passed', 900, { retries: 1 }),
				result('çanta', 'failed', 600, { error: new Error('no results'), screenshotPath: 'screenshots/canta.png' }),
				result('empty', 'skipped', 0),
			],
			2500,
		);

		expect(summary.totals).toEqual({ tests: 4, passed: 2, failed: 1, skipped: 1, flaky: 1 });
		expect(summary.totalDuration).toBe(2500);
		expect(summary.flakyTests).toEqual(['Search > telefon']);
		expect(summary.slowestTests).toEqual([
			{ title: 'Search > telefon', duration: 900 },
			{ title: 'Search > çanta', duration: 600 },
		]);
		expect(summary.failedTests).toEqual([
			{ title: 'Search > çanta', error: 'no results', screenshotPath: 'screenshots/canta.png' },
		]);
		expect(summary.timing).toEqual({ min: 300, max: 900, avg: 600, median: 600, p95: 900, total: 1800 });
	});
});

describe('computeTimingStats', () => {
	it('should be all zeros without durations', () => {
		expect(computeTimingStats([])).toEqual({ min: 0, max: 0, avg: 0, median: 0, p95: 0, total: 0 });
	});

	it('should round the average', () => {
		expect(computeTimingStats([1, 2]).avg).toBe(2);
		expect(computeTimingStats([1, 2]).median).toBe(2);
	});
});

describe('formatting', () => {
	it('should join the suite path and title', () => {
		expect(fullTitle(result('laptop', 'passed', 1))).toBe('Search > laptop');
	});

	it('should print durations', () => {
		expect(formatSeconds(12_410)).toBe('12.41s');
		expect(formatDuration(850)).toBe('850ms');
		expect(formatDuration(12_400)).toBe('12.4s');
		expect(formatDuration(95_000)).toBe('1m 35.0s');
	});
});
