// ============================================================================
// Vitrin Runner - EventBus
// Type-safe events for the execution engine. The console reporter and
// anything else that wants progress plug into these.
// ============================================================================

import type { BrowserName } from './types.js';

// ---------------------------------------------------------------------------
// Event Payloads
// ---------------------------------------------------------------------------

/** Identifies a single worker instance */
export interface WorkerInfo {
	/** Unique worker ID (e.g. "chrome-0", "chrome-2") */
	id: string;
	browser: BrowserName;
	/** 0-based index within the pool */
	index: number;
}

/** A test, as the pool sees it */
export interface WorkItem {
	/** Unique item ID */
	id: string;
	title: string;
	/** Source file path */
	file: string;
	tags?: string[];
	/** Suite hierarchy path */
	suitePath: string[];
	/** Retry budget for this item; the pool's default when unset */
	retries?: number;
}

/** Result of executing a single work item */
export interface WorkItemResult {
	item: WorkItem;
	/** Which worker ran it. Unset for tests skipped before scheduling. */
	worker?: WorkerInfo;
	status: 'passed' | 'failed' | 'skipped';
	/** Duration in milliseconds */
	duration: number;
	error?: Error;
	screenshotPath?: string;
	/** Number of retry attempts used */
	retries?: number;
}

// ---------------------------------------------------------------------------
// Event Map
// ---------------------------------------------------------------------------

export interface RunnerEvents {
	'run:start': { browser: BrowserName; totalItems: number; workers: number };
	'run:end': { duration: number; results: WorkItemResult[] };

	'worker:spawn': WorkerInfo;
	'worker:ready': WorkerInfo;
	'worker:error': { worker: WorkerInfo; error: Error };
	'worker:done': WorkerInfo;

	'item:start': { item: WorkItem; worker: WorkerInfo };
	'item:pass': WorkItemResult;
	'item:fail': WorkItemResult;
	'item:skip': WorkItemResult;
	'item:retry': { item: WorkItem; worker: WorkerInfo; attempt: number; maxRetries: number; error?: Error };
	'item:end': WorkItemResult;
}

export type RunnerEventName = keyof RunnerEvents;

export type EventListener<K extends RunnerEventName> = (payload: RunnerEvents[K]) => void;

/** Called when a listener throws; the emit carries on with the next listener */
export type ListenerErrorHandler = (event: RunnerEventName, error: unknown) => void;

type ListenerMap = { [K in RunnerEventName]: Set<EventListener<K>> };

function emptyListenerMap(): ListenerMap {
	return {
		'run:start': new Set(),
		'run:end': new Set(),
		'worker:spawn': new Set(),
		'worker:ready': new Set(),
		'worker:error': new Set(),
		'worker:done': new Set(),
		'item:start': new Set(),
		'item:pass': new Set(),
		'item:fail': new Set(),
		'item:skip': new Set(),
		'item:retry': new Set(),
		'item:end': new Set(),
	};
}

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous event bus. Listeners see events in emission order.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('item:pass', ({ item, duration }) => { ... });
 * bus.on('run:end', ({ results }) => { ... });
 * ```
 */
export class EventBus {
	private listeners: ListenerMap = emptyListenerMap();
	private history: Array<{ event: RunnerEventName; timestamp: number }> = [];
	private recordHistory = false;

	constructor(private readonly onListenerError: ListenerErrorHandler = reportListenerError) {}

	/**
	 * Register a listener for an event.
	 * Returns an unsubscribe function.
	 */
	on<K extends RunnerEventName>(event: K, listener: EventListener<K>): () => void {
		const set = this.listeners[event];
		set.add(listener);
		return () => {
			set.delete(listener);
		};
	}

	/**
	 * Register a one-time listener. Removed after the first call.
	 */
	once<K extends RunnerEventName>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners for one event, or for every event.
	 */
	off(event?: RunnerEventName): void {
		if (event) {
			this.listeners[event].clear();
		} else {
			this.listeners = emptyListenerMap();
		}
	}

	emit<K extends RunnerEventName>(event: K, payload: RunnerEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, timestamp: Date.now() });
		}

		for (const listener of [...this.listeners[event]]) {
			try {
				listener(payload);
			} catch (err) {
				// A broken reporter must not stop the run
				this.onListenerError(event, err);
			}
		}
	}

	listenerCount(event?: RunnerEventName): number {
		if (event) return this.listeners[event].size;
		let total = 0;
		for (const set of Object.values(this.listeners)) {
			total += set.size;
		}
		return total;
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/** Event names in emission order, while history is enabled */
	getHistory(): RunnerEventName[] {
		return this.history.map((h) => h.event);
	}

	clearHistory(): void {
		this.history = [];
	}
}

function reportListenerError(event: RunnerEventName, error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	console.error(`[vitrin] Listener for "${event}" failed: ${message}`);
}
