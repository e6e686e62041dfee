// ============================================================================
// Vitrin - Explicit Waits
// Every wait is a bounded poll. No journey sleeps for a fixed time unless it
// says so with hardWait(), and that logs a warning.
//
// A locator is re-queried on every poll, so a re-render between polls is
// harmless. An element handle is checked as-is: once it goes stale the wait
// gives up at once and leaves re-resolving to the caller's retry.
// ============================================================================

import type { BrowserDriver, DriverElement } from 'vitrin-driver';
import {
	type ElementState,
	ElementNotActionableError,
	ElementNotFoundError,
	type NotActionableReason,
	TimeoutError,
	errorMessage,
	isDriverError,
} from './errors.js';
import { type Locator, type Target, describeLocator, isElement, toSelector } from './locator.js';
import type { Logger } from './logger.js';
import { AJAX_IDLE, READY_STATE } from './scripts.js';
import type { Timeouts } from './timeouts.js';

export interface WaitOptions {
	/** Max time to wait in ms */
	timeout: number;
	/** How often to poll in ms (default: 100) */
	interval?: number;
	/** Errors for which polling stops and the error propagates. Others are retried. */
	rethrow?: (err: unknown) => boolean;
}

/**
 * Poll a condition until it returns something other than `null` or `false`.
 * This is the foundation of every wait below.
 *
 * The condition always runs at least once, even with a zero timeout.
 *
 * @param description - What we're waiting for (for error messages)
 * @param fn - The function to poll
 */
export async function waitFor<T>(
	description: string,
	fn: () => Promise<T | null | false>,
	options: WaitOptions,
): Promise<T> {
	const { timeout, interval = 100, rethrow } = options;
	const startTime = Date.now();

	let lastError: unknown;

	for (;;) {
		try {
			const result = await fn();
			if (result !== null && result !== false) {
				return result;
			}
		} catch (err) {
			if (rethrow?.(err)) throw err;
			lastError = err;
		}

		const elapsed = Date.now() - startTime;
		if (elapsed >= timeout) {
			const detail = lastError !== undefined ? ` Last error: ${errorMessage(lastError)}` : '';
			throw new TimeoutError({
				action: 'wait for',
				target: description,
				message: `timed out.${detail}`,
				elapsed,
				cause: lastError,
			});
		}
		await sleep(Math.min(interval, timeout - elapsed));
	}
}

/**
 * Simple sleep utility.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

const isStale = (err: unknown) => isDriverError(err, 'stale element reference');

/**
 * Waits bound to one driver session.
 *
 * ```ts
 * const card = await wait.untilVisible('a.product-card');
 * const gone = await wait.untilInvisible('.gender-modal-section', 5_000);
 * ```
 */
export class Waiter {
	constructor(
		private readonly driver: BrowserDriver,
		private readonly timeouts: Timeouts,
		private readonly log: Logger,
	) {}

	/** The element, once it is present and displayed */
	untilVisible(target: Target, timeout = this.timeouts.elementVisible): Promise<DriverElement> {
		return this.untilReady('wait for visibility of', target, timeout, false);
	}

	/** The element, once it is displayed and enabled */
	untilClickable(target: Target, timeout = this.timeouts.elementClickable): Promise<DriverElement> {
		return this.untilReady('wait for clickability of', target, timeout, true);
	}

	/** The first match, once one is attached. Visible or not. */
	async untilPresent(locator: Locator, timeout = this.timeouts.elementVisible): Promise<DriverElement> {
		const description = describeLocator(locator);
		try {
			return await waitFor(description, () => this.first(locator), this.options(timeout));
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			throw new ElementNotFoundError({ action: 'wait for presence of', target: description, elapsed: err.elapsed, cause: err });
		}
	}

	/** Every match, once there is at least one and all are displayed */
	async untilAllVisible(locator: Locator, timeout = this.timeouts.elementVisible): Promise<DriverElement[]> {
		const description = describeLocator(locator);
		let matches = 0;
		try {
			return await waitFor(
				description,
				async () => {
					const elements = await this.driver.findElements(toSelector(locator));
					matches = elements.length;
					if (elements.length === 0) return null;
					for (const element of elements) {
						if (!(await element.isDisplayed())) return null;
					}
					return elements;
				},
				this.options(timeout),
			);
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			const action = 'wait for visibility of all';
			if (matches === 0) {
				throw new ElementNotFoundError({ action, target: description, elapsed: err.elapsed, cause: err });
			}
			throw new ElementNotActionableError({
				action,
				target: description,
				reason: 'not-visible',
				elementState: { found: true, visible: false, matches },
				elapsed: err.elapsed,
				cause: err,
			});
		}
	}

	/**
	 * Wait until the first match is gone or hidden.
	 * Returns false (and warns) when it is still shown at the deadline.
	 */
	async untilInvisible(locator: Locator, timeout = this.timeouts.elementInvisible): Promise<boolean> {
		const description = describeLocator(locator);
		try {
			await waitFor(description, async () => !(await this.isShown(locator)) || null, this.options(timeout));
			return true;
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			this.log.warn(`Element still visible after ${timeout}ms: ${description}`);
			return false;
		}
	}

	/** Whether the first match's text came to contain `text` in time */
	async untilTextPresent(locator: Locator, text: string, timeout = this.timeouts.elementVisible): Promise<boolean> {
		const description = describeLocator(locator);
		try {
			await waitFor(
				`text "${text}" in ${description}`,
				async () => {
					const element = await this.first(locator);
					return element !== null && (await element.getText()).includes(text);
				},
				this.options(timeout),
			);
			return true;
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			this.log.warn(`Text "${text}" did not appear in ${description} within ${timeout}ms`);
			return false;
		}
	}

	/** Wait for document.readyState to be 'complete'. Never throws on timeout. */
	async forPageLoad(timeout = this.timeouts.pageLoad): Promise<void> {
		try {
			await waitFor(
				'page load',
				async () => (await this.driver.executeScript(READY_STATE)) === 'complete',
				this.options(timeout),
			);
			this.log.debug('Page loaded');
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			this.log.warn(`Page did not finish loading within ${timeout}ms`);
		}
	}

	/**
	 * Wait until jQuery reports no request in flight. Pages without jQuery
	 * pass at once, and a page that rejects the check is not waited on.
	 */
	async forAjax(timeout = this.timeouts.ajax): Promise<void> {
		try {
			await waitFor(
				'AJAX requests to finish',
				async () => (await this.driver.executeScript(AJAX_IDLE)) === true,
				{ ...this.options(timeout), rethrow: (err) => isDriverError(err, 'javascript error') },
			);
		} catch (err) {
			if (err instanceof TimeoutError) {
				this.log.warn(`AJAX requests still pending after ${timeout}ms`);
				return;
			}
			this.log.debug(`AJAX check skipped: ${errorMessage(err)}`);
		}
	}

	/** A custom condition. Logs and rethrows on timeout. */
	async until<T>(
		description: string,
		condition: (driver: BrowserDriver) => Promise<T | null | false>,
		timeout = this.timeouts.explicit,
	): Promise<T> {
		try {
			return await waitFor(description, () => condition(this.driver), this.options(timeout));
		} catch (err) {
			this.log.error(`Condition not met: ${description}`, err);
			throw err;
		}
	}

	/**
	 * Poll with a custom interval. Missing and stale elements are retried;
	 * any other error ends the wait.
	 */
	fluent<T>(
		description: string,
		fn: () => Promise<T | null | false>,
		options: { timeout?: number; interval?: number } = {},
	): Promise<T> {
		return waitFor(description, fn, {
			timeout: options.timeout ?? this.timeouts.explicit,
			interval: options.interval ?? this.timeouts.pollingInterval,
			rethrow: (err) => !isDriverError(err, 'no such element') && !isStale(err),
		});
	}

	/** Fixed sleep. Prefer any of the waits above. */
	async hardWait(ms: number): Promise<void> {
		this.log.warn(`Hard wait of ${ms}ms`);
		await sleep(ms);
	}

	microPause(): Promise<void> {
		return sleep(this.timeouts.microPause);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private options(timeout: number): WaitOptions {
		return { timeout, interval: this.timeouts.pollingInterval };
	}

	private async first(target: Target): Promise<DriverElement | null> {
		if (isElement(target)) return target;
		const elements = await this.driver.findElements(toSelector(target));
		return elements[0] ?? null;
	}

	private async isShown(locator: Locator): Promise<boolean> {
		try {
			const element = await this.first(locator);
			return element !== null && (await element.isDisplayed());
		} catch (err) {
			if (isStale(err)) return false;
			throw err;
		}
	}

	private async untilReady(
		action: string,
		target: Target,
		timeout: number,
		needEnabled: boolean,
	): Promise<DriverElement> {
		const description = describeLocator(target);
		let state: ElementState = { found: false };
		let reason: NotActionableReason = 'not-visible';

		try {
			return await waitFor(
				description,
				async () => {
					const element = await this.first(target);
					if (!element) {
						state = { found: false };
						return null;
					}
					try {
						if (!(await element.isDisplayed())) {
							state = { found: true, visible: false };
							reason = 'not-visible';
							return null;
						}
						if (needEnabled && !(await element.isEnabled())) {
							const text = (await element.getText()).trim();
							state = { found: true, visible: true, enabled: false, ...(text ? { textPreview: text.slice(0, 50) } : {}) };
							reason = 'disabled';
							return null;
						}
					} catch (err) {
						// A handle we were given cannot recover; a locator is looked up again
						if (isElement(target) || !isStale(err)) throw err;
						state = { found: true };
						reason = 'detached';
						return null;
					}
					return element;
				},
				{ ...this.options(timeout), rethrow: (err) => isElement(target) && isStale(err) },
			);
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			if (!state.found) {
				throw new ElementNotFoundError({ action, target: description, elapsed: err.elapsed, cause: err });
			}
			throw new ElementNotActionableError({
				action,
				target: description,
				reason,
				elementState: state,
				elapsed: err.elapsed,
				cause: err,
			});
		}
	}
}
