// ============================================================================
// Vitrin Runner - Worker Pool
// N workers, each owning one browser. Workers pull tests off a shared queue
// until it is empty, so a slow journey never holds up the others.
// ============================================================================

import type { EventBus, WorkItem, WorkItemResult, WorkerInfo } from './event-bus.js';
import { classifyFailure } from './smart-retry.js';
import type { BrowserName } from './types.js';

// ---------------------------------------------------------------------------
// Worker State
// ---------------------------------------------------------------------------

export type WorkerState = 'idle' | 'busy' | 'starting' | 'error' | 'terminated';

export interface Worker {
	info: WorkerInfo;
	state: WorkerState;
	/** The work item currently being executed (if busy) */
	currentItem: WorkItem | null;
	completedCount: number;
	/** Closes the worker's browser; set once the spawn succeeded */
	cleanup: (() => Promise<void>) | null;
}

// ---------------------------------------------------------------------------
// Callbacks
// ---------------------------------------------------------------------------

/**
 * Start the browser a worker owns. The launch itself lives with the caller
 * (the CLI) so the runner never depends on the driver package.
 */
export type BrowserSpawner = (worker: WorkerInfo) => Promise<{
	close: () => Promise<void>;
}>;

/** Where an item stands with its retries */
export interface ItemAttempt {
	/** Further runs the pool may make if this one fails retryably */
	retriesLeft: number;
}

/** Run one work item on one worker */
export type WorkItemExecutor = (
	item: WorkItem,
	worker: WorkerInfo,
	attempt: ItemAttempt,
) => Promise<{ status: 'passed' | 'failed' | 'skipped'; duration: number; error?: Error; screenshotPath?: string }>;

// ---------------------------------------------------------------------------
// Pool Configuration
// ---------------------------------------------------------------------------

export interface WorkerPoolConfig {
	browser: BrowserName;
	workers: number;
	/** Retries per work item when the item sets none (default: 0) */
	maxRetries: number;
	/** Stop handing out work after the first failure (default: false) */
	bail: boolean;
	/** Timeout for starting a browser in ms (default: 30000) */
	spawnTimeout: number;
}

const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
	browser: 'chrome',
	workers: 1,
	maxRetries: 0,
	bail: false,
	spawnTimeout: 30_000,
};

// ---------------------------------------------------------------------------
// WorkerPool
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const pool = new WorkerPool(bus, { browser: 'chrome', workers: 3, maxRetries: 1 });
 *
 * await pool.spawn(async (worker) => {
 *   const browser = await CdpBrowser.launch({ browser: worker.browser });
 *   return { close: () => browser.close() };
 * });
 *
 * const results = await pool.execute(items, async (item, worker) => {
 *   // run the test...
 *   return { status: 'passed', duration: 120 };
 * });
 *
 * await pool.terminate();
 * ```
 */
export class WorkerPool {
	private readonly config: WorkerPoolConfig;
	private readonly workers: Worker[] = [];
	/** Closes of browsers that started after their spawn timed out */
	private readonly lateCloses: Promise<void>[] = [];
	private bailed = false;

	constructor(
		private readonly bus: EventBus,
		config?: Partial<WorkerPoolConfig>,
	) {
		this.config = { ...DEFAULT_POOL_CONFIG, ...config };
	}

	getWorkers(): ReadonlyArray<Readonly<Worker>> {
		return this.workers;
	}

	get size(): number {
		return this.workers.length;
	}

	/** True once a failure stopped the pool under `bail` */
	get hasBailed(): boolean {
		return this.bailed;
	}

	// -----------------------------------------------------------------------
	// Spawn
	// -----------------------------------------------------------------------

	/**
	 * Create the workers and start their browsers in parallel. Waits for
	 * every spawn to settle, then rejects with the first spawn error; browsers
	 * that did start are left for terminate(). A browser that starts after its
	 * spawn timed out is closed.
	 */
	async spawn(spawner: BrowserSpawner): Promise<void> {
		const { browser } = this.config;
		for (let i = 0; i < this.config.workers; i++) {
			const info: WorkerInfo = { id: `${browser}-${i}`, browser, index: i };
			this.workers.push({ info, state: 'starting', currentItem: null, completedCount: 0, cleanup: null });
			this.bus.emit('worker:spawn', info);
		}

		const settled = await Promise.allSettled(
			this.workers.map(async (worker) => {
				try {
					const result = await this.withTimeout(
						spawner(worker.info),
						this.config.spawnTimeout,
						`Worker ${worker.info.id} spawn timed out after ${this.config.spawnTimeout}ms`,
						(late) => this.closeLate(worker, late.close),
					);
					worker.cleanup = result.close;
					worker.state = 'idle';
					this.bus.emit('worker:ready', worker.info);
				} catch (err) {
					worker.state = 'error';
					const error = err instanceof Error ? err : new Error(String(err));
					this.bus.emit('worker:error', { worker: worker.info, error });
					throw error;
				}
			}),
		);

		for (const outcome of settled) {
			if (outcome.status === 'rejected') throw outcome.reason;
		}
	}

	private closeLate(worker: Worker, close: () => Promise<void>): void {
		this.lateCloses.push(
			close().catch((err: unknown) => {
				const error = err instanceof Error ? err : new Error(String(err));
				this.bus.emit('worker:error', { worker: worker.info, error });
			}),
		);
	}

	// -----------------------------------------------------------------------
	// Execute
	// -----------------------------------------------------------------------

	/**
	 * Run every item on the idle workers. Results come back in completion order.
	 */
	async execute(items: WorkItem[], executor: WorkItemExecutor): Promise<WorkItemResult[]> {
		if (items.length === 0) return [];

		const activeWorkers = this.workers.filter((w) => w.state === 'idle');
		if (activeWorkers.length === 0) {
			throw new Error('No active workers available. Did you call spawn() first?');
		}

		const results: WorkItemResult[] = [];
		const queue = [...items];
		await Promise.all(activeWorkers.map((worker) => this.workerLoop(worker, queue, results, executor)));
		return results;
	}

	// -----------------------------------------------------------------------
	// Worker loop
	// -----------------------------------------------------------------------

	private async workerLoop(
		worker: Worker,
		queue: WorkItem[],
		results: WorkItemResult[],
		executor: WorkItemExecutor,
	): Promise<void> {
		while (!this.bailed) {
			const item = queue.shift();
			if (!item) break;

			worker.state = 'busy';
			worker.currentItem = item;
			this.bus.emit('item:start', { item, worker: worker.info });

			const result = await this.runWithRetries(item, worker.info, executor);

			results.push(result);
			worker.completedCount++;
			worker.currentItem = null;
			worker.state = 'idle';

			switch (result.status) {
				case 'passed':
					this.bus.emit('item:pass', result);
					break;
				case 'failed':
					this.bus.emit('item:fail', result);
					break;
				case 'skipped':
					this.bus.emit('item:skip', result);
					break;
			}
			this.bus.emit('item:end', result);

			if (result.status === 'failed' && this.config.bail) {
				this.bailed = true;
			}
		}
	}

	/**
	 * Run an item, then re-run it while it keeps failing for a retryable
	 * reason and the budget lasts. Deterministic failures are not retried.
	 */
	private async runWithRetries(
		item: WorkItem,
		worker: WorkerInfo,
		executor: WorkItemExecutor,
	): Promise<WorkItemResult> {
		const maxRetries = item.retries ?? this.config.maxRetries;
		let result = await this.runOnce(item, worker, executor, { retriesLeft: maxRetries });

		for (let attempt = 1; attempt <= maxRetries; attempt++) {
			if (result.status !== 'failed' || !classifyFailure(result.error).retryable) break;
			this.bus.emit('item:retry', { item, worker, attempt, maxRetries, error: result.error });
			const retriesLeft = maxRetries - attempt;
			result = { ...(await this.runOnce(item, worker, executor, { retriesLeft })), retries: attempt };
		}

		return result;
	}

	private async runOnce(
		item: WorkItem,
		worker: WorkerInfo,
		executor: WorkItemExecutor,
		attempt: ItemAttempt,
	): Promise<WorkItemResult> {
		try {
			const outcome = await executor(item, worker, attempt);
			return {
				item,
				worker,
				status: outcome.status,
				duration: outcome.duration,
				error: outcome.error,
				screenshotPath: outcome.screenshotPath,
			};
		} catch (err) {
			const error = err instanceof Error ? err : new Error(String(err));
			return { item, worker, status: 'failed', duration: 0, error };
		}
	}

	// -----------------------------------------------------------------------
	// Terminate
	// -----------------------------------------------------------------------

	/**
	 * Close every worker's browser. A browser that fails to close is reported
	 * on `worker:error` and does not stop the others from closing. Also waits
	 * for browsers that started late to finish closing.
	 */
	async terminate(): Promise<void> {
		await Promise.all(this.lateCloses.splice(0));
		await Promise.all(
			this.workers.map(async (worker) => {
				if (worker.state === 'terminated') return;
				if (worker.cleanup) {
					try {
						await worker.cleanup();
					} catch (err) {
						const error = err instanceof Error ? err : new Error(String(err));
						this.bus.emit('worker:error', { worker: worker.info, error });
					}
				}
				worker.state = 'terminated';
				worker.cleanup = null;
				this.bus.emit('worker:done', worker.info);
			}),
		);
	}

	// -----------------------------------------------------------------------
	// Utilities
	// -----------------------------------------------------------------------

	/** `discard` receives a value that arrives after the timeout fired */
	private withTimeout<T>(promise: Promise<T>, ms: number, message: string, discard?: (late: T) => void): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			let timedOut = false;
			const timer = setTimeout(() => {
				timedOut = true;
				reject(new Error(message));
			}, ms);

			promise.then(
				(value) => {
					clearTimeout(timer);
					if (timedOut) discard?.(value);
					else resolve(value);
				},
				(err: unknown) => {
					clearTimeout(timer);
					reject(err);
				},
			);
		});
	}
}
