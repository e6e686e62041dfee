// ============================================================================
// Vitrin - Safe Interactions
// Clicks and typing that survive the storefront's habits: overlays that
// intercept clicks for a moment, and lists that re-render under the cursor.
//
// safeClick: wait clickable → scroll into view → click
//   intercepted → retry, and on the last attempt click through script
//   stale       → retry, and on the last attempt give up
// ============================================================================

import type { BrowserDriver, DriverElement } from 'vitrin-driver';
import { VitrinError, isDriverError } from './errors.js';
import { type Locator, type Target, describeLocator, isElement, toSelector } from './locator.js';
import type { Logger } from './logger.js';
import {
	CLICK,
	SCROLL_INTO_VIEW,
	SCROLL_TO_BOTTOM,
	SCROLL_TO_TOP,
	SELECT_BY_INDEX,
	SELECT_BY_TEXT,
	SELECT_BY_VALUE,
} from './scripts.js';
import type { Timeouts } from './timeouts.js';
import { type Waiter, sleep } from './wait.js';

export class Interactions {
	constructor(
		private readonly driver: BrowserDriver,
		private readonly wait: Waiter,
		private readonly timeouts: Timeouts,
		private readonly log: Logger,
	) {}

	// -----------------------------------------------------------------------
	// Click and type
	// -----------------------------------------------------------------------

	/**
	 * Click with retries. Falls back to a script click when every attempt
	 * was intercepted by something covering the element.
	 */
	async safeClick(target: Target): Promise<void> {
		const description = describeLocator(target);
		const attempts = Math.max(1, this.timeouts.retryAttempts);

		for (let attempt = 1; attempt <= attempts; attempt++) {
			const last = attempt === attempts;
			try {
				const element = await this.wait.untilClickable(target);
				await this.scrollIntoView(element);
				await element.click();
				this.log.debug(`Clicked ${description}`);
				return;
			} catch (err) {
				if (isDriverError(err, 'element click intercepted')) {
					this.log.warn(`Click intercepted on ${description} (attempt ${attempt}/${attempts})`);
					if (last) {
						this.log.warn(`Falling back to script click on ${description}`);
						await this.clickViaScript(target);
						return;
					}
				} else if (isDriverError(err, 'stale element reference')) {
					this.log.warn(`Stale element ${description} (attempt ${attempt}/${attempts})`);
					if (last) throw err;
				} else {
					throw err;
				}
				await sleep(this.timeouts.retryDelay);
			}
		}
	}

	/** Clear the field and type into it, retrying on staleness */
	async safeType(target: Target, text: string): Promise<void> {
		const description = describeLocator(target);
		const attempts = Math.max(1, this.timeouts.retryAttempts);

		for (let attempt = 1; attempt <= attempts; attempt++) {
			try {
				const element = await this.wait.untilVisible(target);
				await element.clear();
				await element.sendKeys(text);
				this.log.debug(`Typed "${text}" into ${description}`);
				return;
			} catch (err) {
				if (!isDriverError(err, 'stale element reference') || attempt === attempts) throw err;
				this.log.warn(`Stale element ${description} (attempt ${attempt}/${attempts})`);
				await sleep(this.timeouts.retryDelay);
			}
		}
	}

	/** Click through script, bypassing hit-testing */
	async clickViaScript(target: Target): Promise<void> {
		const element = await this.resolve(target);
		await this.driver.executeScript(CLICK, element);
		this.log.debug(`Clicked ${describeLocator(target)} via script`);
	}

	async hover(target: Target): Promise<void> {
		const element = await this.wait.untilVisible(target);
		await element.hover();
		await sleep(this.timeouts.hoverSettle);
	}

	async doubleClick(target: Target): Promise<void> {
		const element = await this.wait.untilClickable(target);
		await element.doubleClick();
	}

	async rightClick(target: Target): Promise<void> {
		const element = await this.wait.untilClickable(target);
		await element.contextClick();
	}

	// -----------------------------------------------------------------------
	// Reads. These never throw.
	// -----------------------------------------------------------------------

	/** Trimmed visible text, falling back to textContent. '' on any failure. */
	async safeGetText(target: Target): Promise<string> {
		try {
			const element = await this.wait.untilVisible(target);
			let text = await element.getText();
			if (!text.trim()) {
				text = (await element.getProperty('textContent')) ?? '';
			}
			return text.trim();
		} catch (err) {
			this.log.warn(`Could not read text of ${describeLocator(target)}`, err);
			return '';
		}
	}

	/** Attribute value, '' when absent */
	async getAttribute(target: Target, name: string): Promise<string> {
		try {
			const element = await this.resolve(target);
			return (await element.getAttribute(name)) ?? '';
		} catch (err) {
			this.log.debug(`Could not read attribute "${name}" of ${describeLocator(target)}: ${String(err)}`);
			return '';
		}
	}

	isDisplayed(target: Target): Promise<boolean> {
		return this.check(target, (element) => element.isDisplayed());
	}

	isEnabled(target: Target): Promise<boolean> {
		return this.check(target, (element) => element.isEnabled());
	}

	isSelected(target: Target): Promise<boolean> {
		return this.check(target, (element) => element.isSelected());
	}

	// -----------------------------------------------------------------------
	// Scrolling
	// -----------------------------------------------------------------------

	/** Scroll the element to the middle of the viewport */
	async scrollTo(target: Target): Promise<void> {
		try {
			await this.scrollIntoView(await this.resolve(target));
		} catch (err) {
			this.log.warn(`Could not scroll to ${describeLocator(target)}`, err);
		}
	}

	/** Scroll to the bottom and give lazy content time to arrive */
	async scrollToBottom(): Promise<void> {
		try {
			await this.driver.executeScript(SCROLL_TO_BOTTOM);
			await sleep(this.timeouts.lazyLoadSettle);
		} catch (err) {
			this.log.warn('Could not scroll to the bottom of the page', err);
		}
	}

	async scrollToTop(): Promise<void> {
		try {
			await this.driver.executeScript(SCROLL_TO_TOP);
		} catch (err) {
			this.log.warn('Could not scroll to the top of the page', err);
		}
	}

	// -----------------------------------------------------------------------
	// <select>
	// -----------------------------------------------------------------------

	selectByText(target: Target, text: string): Promise<void> {
		return this.select(target, SELECT_BY_TEXT, text, `text "${text}"`);
	}

	selectByValue(target: Target, value: string): Promise<void> {
		return this.select(target, SELECT_BY_VALUE, value, `value "${value}"`);
	}

	selectByIndex(target: Target, index: number): Promise<void> {
		return this.select(target, SELECT_BY_INDEX, index, `index ${index}`);
	}

	// -----------------------------------------------------------------------
	// Lookup without waiting
	// -----------------------------------------------------------------------

	async find(locator: Locator): Promise<DriverElement | null> {
		const elements = await this.driver.findElements(toSelector(locator));
		return elements[0] ?? null;
	}

	findAll(locator: Locator): Promise<DriverElement[]> {
		return this.driver.findElements(toSelector(locator));
	}

	/** Number of matches; 0 on any failure */
	async count(locator: Locator): Promise<number> {
		try {
			return (await this.findAll(locator)).length;
		} catch (err) {
			this.log.debug(`Could not count ${describeLocator(locator)}: ${String(err)}`);
			return 0;
		}
	}

	async isPresent(locator: Locator): Promise<boolean> {
		return (await this.count(locator)) > 0;
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async scrollIntoView(element: DriverElement): Promise<void> {
		await this.driver.executeScript(SCROLL_INTO_VIEW, element);
		await sleep(this.timeouts.scrollSettle);
	}

	private resolve(target: Target): Promise<DriverElement> {
		return isElement(target) ? Promise.resolve(target) : this.wait.untilPresent(target);
	}

	private async check(target: Target, probe: (element: DriverElement) => Promise<boolean>): Promise<boolean> {
		try {
			const element = isElement(target) ? target : await this.find(target);
			return element !== null && (await probe(element));
		} catch {
			return false;
		}
	}

	private async select(target: Target, script: string, wanted: string | number, label: string): Promise<void> {
		const element = await this.wait.untilVisible(target);
		const selected = await this.driver.executeScript(script, element, wanted);
		if (selected !== true) {
			throw new VitrinError({
				action: 'select option in',
				target: describeLocator(target),
				message: `no option with ${label}.`,
			});
		}
		this.log.debug(`Selected ${label} in ${describeLocator(target)}`);
	}
}
