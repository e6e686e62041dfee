// ============================================================================
// Vitrin Runner - Public API
// Test discovery, parallel execution on browser workers, and reporting.
// ============================================================================

export { TestRunner } from './runner.js';
export type { RunnableTest, FileLoader, TestExecutor, RunPlanner } from './runner.js';
export type { BrowserName, RunnerConfig, RunnerOptions, TestResult, RunSummary } from './types.js';

export { EventBus } from './event-bus.js';
export type {
	WorkerInfo,
	WorkItem,
	WorkItemResult,
	RunnerEvents,
	RunnerEventName,
	EventListener,
	ListenerErrorHandler,
} from './event-bus.js';

export { WorkerPool } from './worker-pool.js';
export type {
	Worker,
	WorkerState,
	BrowserSpawner,
	WorkItemExecutor,
	ItemAttempt,
	WorkerPoolConfig,
} from './worker-pool.js';

export {
	ResultAggregator,
	computeTimingStats,
	formatDuration,
	formatSeconds,
	fullTitle,
} from './result-aggregator.js';
export type { TimingStats, AggregatedSummary } from './result-aggregator.js';

export { ConsoleReporter, JsonReporter, buildJsonReport, reportTimestamp } from './reporter.js';
export type { JsonReport } from './reporter.js';

// Smart retry: failure classification
export { classifyFailure } from './smart-retry.js';
export type { FailureCategory, FailureClassification } from './smart-retry.js';
