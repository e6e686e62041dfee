// ============================================================================
// Vitrin - Popups
// The storefront greets new sessions with a gender picker and, a few
// seconds later, a cookie consent banner. Both cover the page. Dismissing
// them is best effort: a popup that never shows up must not fail a journey.
// ============================================================================

import type { Locator } from './locator.js';
import type { Interactions } from './interactions.js';
import type { Logger } from './logger.js';
import type { Timeouts } from './timeouts.js';
import { type Waiter, sleep } from './wait.js';

export const POPUP_LOCATORS = {
	genderPopup: '.gender-modal-section',
	genderPopupClose: '.modal-section-close',
	cookieBanner: '#onetrust-banner-sdk',
	acceptCookies: '#onetrust-accept-btn-handler',
	rejectCookies: '#onetrust-reject-all-handler',
} as const satisfies Record<string, Locator>;

export class PopupManager {
	constructor(
		private readonly act: Interactions,
		private readonly wait: Waiter,
		private readonly timeouts: Timeouts,
		private readonly log: Logger,
	) {}

	async closeGenderPopup(): Promise<void> {
		try {
			await sleep(this.timeouts.genderPopupDelay);
			if (!(await this.act.isPresent(POPUP_LOCATORS.genderPopup))) {
				this.log.debug('No gender popup');
				return;
			}
			await this.act.safeClick(POPUP_LOCATORS.genderPopupClose);
			await this.wait.untilInvisible(POPUP_LOCATORS.genderPopup, this.timeouts.popupDismiss);
			this.log.info('Gender popup closed');
		} catch (err) {
			this.log.warn('Could not close the gender popup', err);
		}
	}

	acceptCookies(): Promise<void> {
		return this.answerCookieBanner(POPUP_LOCATORS.acceptCookies, 'accepted');
	}

	rejectCookies(): Promise<void> {
		return this.answerCookieBanner(POPUP_LOCATORS.rejectCookies, 'rejected');
	}

	/** Gender picker first, then the late consent banner */
	async handleAll(): Promise<void> {
		await this.closeGenderPopup();
		await sleep(this.timeouts.cookieBannerDelay);
		await this.acceptCookies();
	}

	private async answerCookieBanner(button: Locator, outcome: string): Promise<void> {
		try {
			if (!(await this.act.isPresent(POPUP_LOCATORS.cookieBanner))) {
				this.log.debug('No cookie banner');
				return;
			}
			const element = await this.wait.untilClickable(button, this.timeouts.popupDismiss);
			await element.click();
			await this.wait.untilInvisible(POPUP_LOCATORS.cookieBanner, this.timeouts.popupDismiss);
			this.log.info(`Cookies ${outcome}`);
		} catch (err) {
			this.log.warn('Could not answer the cookie banner', err);
		}
	}
}
