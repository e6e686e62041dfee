// ============================================================================
// Vitrin - Base Page
// Shared plumbing for every page object: popups, tabs, navigation.
//
// Pages are created through their static open(ctx), which runs the page's
// load sequence before handing the object back:
//
//   const home = await HomePage.open(ctx);
//   const results = await home.searchFor('laptop');
// ============================================================================

import type { BrowserDriver } from 'vitrin-driver';
import type { PageContext } from '../context.js';
import type { Interactions } from '../interactions.js';
import type { Logger } from '../logger.js';
import type { Timeouts } from '../timeouts.js';
import type { Waiter } from '../wait.js';

export abstract class BasePage {
	protected readonly driver: BrowserDriver;
	protected readonly wait: Waiter;
	protected readonly act: Interactions;
	protected readonly timeouts: Timeouts;
	protected readonly log: Logger;

	protected constructor(
		protected readonly ctx: PageContext,
		name: string,
	) {
		this.driver = ctx.driver;
		this.wait = ctx.wait;
		this.act = ctx.act;
		this.timeouts = ctx.timeouts;
		this.log = ctx.log.child(name);
	}

	// -----------------------------------------------------------------------
	// Popups
	// -----------------------------------------------------------------------

	async handlePopups(): Promise<void> {
		this.log.info('Handling popups');
		await this.ctx.popups.handleAll();
	}

	closeGenderPopup(): Promise<void> {
		return this.ctx.popups.closeGenderPopup();
	}

	acceptCookies(): Promise<void> {
		return this.ctx.popups.acceptCookies();
	}

	rejectCookies(): Promise<void> {
		return this.ctx.popups.rejectCookies();
	}

	// -----------------------------------------------------------------------
	// Tabs
	// -----------------------------------------------------------------------

	switchToNewTab(): Promise<boolean> {
		return this.ctx.tabs.switchToNewTab();
	}

	switchToOriginalTab(): Promise<boolean> {
		return this.ctx.tabs.switchToOriginalTab();
	}

	closeCurrentTabAndSwitchToOriginal(): Promise<boolean> {
		return this.ctx.tabs.closeCurrentAndReturn();
	}

	getTabCount(): Promise<number> {
		return this.ctx.tabs.count();
	}

	// -----------------------------------------------------------------------
	// Navigation
	// -----------------------------------------------------------------------

	getCurrentUrl(): Promise<string> {
		return this.driver.getCurrentUrl();
	}

	getPageTitle(): Promise<string> {
		return this.driver.getTitle();
	}

	async navigateTo(url: string): Promise<void> {
		this.log.info(`Navigating to ${url}`);
		await this.driver.navigate(url);
		await this.wait.forPageLoad();
	}

	async refreshPage(): Promise<void> {
		this.log.info('Refreshing page');
		await this.driver.refresh();
		await this.wait.forPageLoad();
	}

	async navigateBack(): Promise<void> {
		this.log.info('Navigating back');
		await this.driver.back();
		await this.wait.forPageLoad();
	}

	async navigateForward(): Promise<void> {
		this.log.info('Navigating forward');
		await this.driver.forward();
		await this.wait.forPageLoad();
	}

	scrollToTop(): Promise<void> {
		return this.act.scrollToTop();
	}

	scrollToBottom(): Promise<void> {
		return this.act.scrollToBottom();
	}

	// -----------------------------------------------------------------------
	// For subclasses
	// -----------------------------------------------------------------------

	/** Warn when the current URL lacks `fragment`. Never throws. */
	protected async expectUrlContains(fragment: string): Promise<void> {
		try {
			const url = await this.getCurrentUrl();
			if (!url.includes(fragment)) {
				this.log.warn(`Unexpected URL ${url}: expected it to contain "${fragment}"`);
			}
		} catch (err) {
			this.log.warn('Could not read the current URL', err);
		}
	}
}
