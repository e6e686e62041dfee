// ============================================================================
// Vitrin - Tabs
// Product cards open their detail page in a new tab. Handles are listed in
// opening order, so the first is where the session started and the last is
// the newest.
// ============================================================================

import type { BrowserDriver } from 'vitrin-driver';
import type { Logger } from './logger.js';
import type { Timeouts } from './timeouts.js';
import { TimeoutError } from './errors.js';
import { type Waiter, waitFor } from './wait.js';

export class TabManager {
	constructor(
		private readonly driver: BrowserDriver,
		private readonly wait: Waiter,
		private readonly timeouts: Timeouts,
		private readonly log: Logger,
	) {}

	/** Open tabs; 0 when the session cannot be asked */
	async count(): Promise<number> {
		try {
			return (await this.driver.getWindowHandles()).length;
		} catch (err) {
			this.log.error('Could not count tabs', err);
			return 0;
		}
	}

	/** Handle of the current tab; '' when the session cannot be asked */
	async currentHandle(): Promise<string> {
		try {
			return await this.driver.getWindowHandle();
		} catch (err) {
			this.log.error('Could not read the current tab handle', err);
			return '';
		}
	}

	/** Whether more than `originalCount` tabs were open before the deadline */
	async waitForNewTab(originalCount: number, timeout = this.timeouts.newTab): Promise<boolean> {
		try {
			await waitFor(
				'a new tab to open',
				async () => (await this.driver.getWindowHandles()).length > originalCount,
				{ timeout, interval: this.timeouts.pollingInterval },
			);
			return true;
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			this.log.warn(`No new tab opened within ${timeout}ms`);
			return false;
		}
	}

	/** Switch to the newest tab. False when only one tab is open. */
	async switchToNewTab(): Promise<boolean> {
		try {
			const handles = await this.driver.getWindowHandles();
			const newest = handles[handles.length - 1];
			if (handles.length < 2 || newest === undefined) {
				this.log.warn('No new tab to switch to');
				return false;
			}
			return await this.switchTo(newest);
		} catch (err) {
			this.log.error('Could not switch to the new tab', err);
			return false;
		}
	}

	/** Switch to the newest tab that is not `originalHandle` */
	async switchToNewTabFrom(originalHandle: string): Promise<boolean> {
		try {
			const others = (await this.driver.getWindowHandles()).filter((handle) => handle !== originalHandle);
			const newest = others[others.length - 1];
			if (newest === undefined) {
				this.log.warn(`No tab other than ${originalHandle} is open`);
				return false;
			}
			return await this.switchTo(newest);
		} catch (err) {
			this.log.error('Could not switch to the new tab', err);
			return false;
		}
	}

	/** Back to the tab the session started with */
	async switchToOriginalTab(): Promise<boolean> {
		try {
			const [first] = await this.driver.getWindowHandles();
			if (first === undefined) return false;
			await this.driver.switchToWindow(first);
			this.log.info('Switched to the original tab');
			return true;
		} catch (err) {
			this.log.error('Could not switch to the original tab', err);
			return false;
		}
	}

	async closeCurrentAndReturn(): Promise<boolean> {
		try {
			await this.driver.closeWindow();
			this.log.info('Closed the current tab');
		} catch (err) {
			this.log.error('Could not close the current tab', err);
			return false;
		}
		return this.switchToOriginalTab();
	}

	/** Close every tab except `keepHandle`, and end up on it */
	async closeOthers(keepHandle: string): Promise<boolean> {
		try {
			const handles = await this.driver.getWindowHandles();
			for (const handle of handles) {
				if (handle === keepHandle) continue;
				await this.driver.switchToWindow(handle);
				await this.driver.closeWindow();
			}
			await this.driver.switchToWindow(keepHandle);
			this.log.info(`Closed ${handles.length - 1} other tab(s)`);
			return true;
		} catch (err) {
			this.log.error('Could not close the other tabs', err);
			return false;
		}
	}

	private async switchTo(handle: string): Promise<boolean> {
		await this.driver.switchToWindow(handle);
		await this.wait.forPageLoad();
		this.log.info(`Switched to tab ${handle}`);
		return true;
	}
}
