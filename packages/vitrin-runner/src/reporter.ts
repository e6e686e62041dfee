// ============================================================================
// Vitrin Runner - Reporters
//
// Console: a line as each test starts and ends, then the run summary.
//
//   TEST: Search > laptop shows results - STARTING
//     ✓ Search > laptop shows results (12.41s)
//
// JSON: <reportDir>/vitrin-report_<yyyy-MM-dd_HH-mm-ss>.json with the
// configuration, every result and the summary.
// ============================================================================

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EventBus, WorkItemResult } from './event-bus.js';
import {
	type AggregatedSummary,
	formatDuration,
	formatSeconds,
	fullTitle,
} from './result-aggregator.js';
import type { RunnerConfig } from './types.js';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

type Colour = typeof GREEN | typeof RED | typeof YELLOW;

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

export class ConsoleReporter {
	private readonly unsubscribe: Array<() => void> = [];

	/** `color` adds ANSI colour codes; leave it off for CI logs and pipes */
	constructor(
		private readonly write: (line: string) => void = console.log,
		private readonly color = false,
	) {}

	private paint(colour: Colour, text: string): string {
		return this.color ? `${colour}${text}${RESET}` : text;
	}

	/** Start printing item events from the bus */
	attach(bus: EventBus): void {
		this.unsubscribe.push(
			bus.on('item:start', ({ item }) => this.write(`TEST: ${fullTitle({ item })} - STARTING`)),
			bus.on('item:retry', ({ item, attempt, maxRetries, error }) => {
				const reason = error ? `: ${firstLine(error.message)}` : '';
				this.write(`  ${this.paint(YELLOW, '↻')} Retrying ${fullTitle({ item })} (attempt ${attempt}/${maxRetries})${reason}`);
			}),
			bus.on('item:end', (result) => this.printResult(result)),
		);
	}

	detach(): void {
		for (const off of this.unsubscribe.splice(0)) off();
	}

	printResult(result: WorkItemResult): void {
		const title = fullTitle(result);
		const retries = result.retries ? ` [retries: ${result.retries}]` : '';

		switch (result.status) {
			case 'passed':
				this.write(`  ${this.paint(GREEN, '✓')} ${title} (${formatSeconds(result.duration)})${retries}`);
				break;
			case 'skipped':
				this.write(`  ${this.paint(YELLOW, '-')} ${title} (skipped)`);
				break;
			case 'failed':
				this.write(`  ${this.paint(RED, '✗')} ${title} (${formatSeconds(result.duration)})${retries}`);
				if (result.error) {
					for (const line of result.error.message.split('\n')) {
						this.write(`      ${line}`);
					}
				}
				if (result.screenshotPath) {
					this.write(`      Screenshot: ${result.screenshotPath}`);
				}
				break;
		}
	}

	printSummary(summary: AggregatedSummary, reportPath?: string): void {
		const { totals, timing } = summary;

		this.write('');
		this.write('  ─────────────────────────────────────');

		const parts: string[] = [];
		if (totals.passed > 0) parts.push(this.paint(GREEN, `${totals.passed} passed`));
		if (totals.failed > 0) parts.push(this.paint(RED, `${totals.failed} failed`));
		if (totals.skipped > 0) parts.push(this.paint(YELLOW, `${totals.skipped} skipped`));
		this.write(`  Tests:    ${parts.join(', ')} (${totals.tests} total)`);

		if (summary.flakyTests.length > 0) {
			this.write(`  Flaky:    ${this.paint(YELLOW, String(summary.flakyTests.length))}`);
			for (const title of summary.flakyTests) this.write(`            ${title}`);
		}

		if (summary.slowestTests.length > 0) {
			this.write('  Slowest:');
			for (const slow of summary.slowestTests) {
				this.write(`            ${formatSeconds(slow.duration).padStart(8)}  ${slow.title}`);
			}
		}

		this.write(
			`  Timing:   avg ${formatDuration(timing.avg)} · p95 ${formatDuration(timing.p95)} · max ${formatDuration(timing.max)}`,
		);
		this.write(`  Duration: ${formatDuration(summary.totalDuration)}`);
		if (reportPath) this.write(`  Report:   ${reportPath}`);
		this.write('');

		if (totals.failed > 0) {
			this.write(`  ${this.paint(RED, 'Some tests failed.')}`);
		} else if (totals.tests === 0) {
			this.write('  No tests were run.');
		} else {
			this.write(`  ${this.paint(GREEN, 'All tests passed!')}`);
		}
		this.write('');
	}
}

function firstLine(message: string): string {
	return message.split('\n', 1)[0] ?? '';
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export interface JsonReport {
	generatedAt: string;
	configuration: RunnerConfig;
	results: Array<{
		title: string;
		suitePath: string[];
		file: string;
		tags: string[];
		status: WorkItemResult['status'];
		duration: number;
		retries: number;
		error?: { name: string; message: string; stack?: string };
		screenshotPath?: string;
	}>;
	summary: AggregatedSummary;
}

export class JsonReporter {
	constructor(private readonly reportDir: string) {}

	/** Write the report and return its path */
	async write(
		config: RunnerConfig,
		results: WorkItemResult[],
		summary: AggregatedSummary,
		now: Date = new Date(),
	): Promise<string> {
		const report = buildJsonReport(config, results, summary, now);
		const filePath = join(this.reportDir, `vitrin-report_${reportTimestamp(now)}.json`);
		await mkdir(this.reportDir, { recursive: true });
		await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
		return filePath;
	}
}

export function buildJsonReport(
	config: RunnerConfig,
	results: WorkItemResult[],
	summary: AggregatedSummary,
	now: Date,
): JsonReport {
	return {
		generatedAt: now.toISOString(),
		configuration: config,
		results: results.map((r) => ({
			title: r.item.title,
			suitePath: r.item.suitePath,
			file: r.item.file,
			tags: r.item.tags ?? [],
			status: r.status,
			duration: r.duration,
			retries: r.retries ?? 0,
			error: r.error ? { name: r.error.name, message: r.error.message, stack: r.error.stack } : undefined,
			screenshotPath: r.screenshotPath,
		})),
		summary,
	};
}

/** Local time as yyyy-MM-dd_HH-mm-ss */
export function reportTimestamp(date: Date): string {
	const pad = (value: number) => String(value).padStart(2, '0');
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	return `${day}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}
