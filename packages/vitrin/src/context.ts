import type { BrowserDriver } from 'vitrin-driver';
import type { VitrinConfig } from './config.js';
import { Interactions } from './interactions.js';
import { type Logger, createLogger } from './logger.js';
import { PopupManager } from './popups.js';
import { TabManager } from './tabs.js';
import { type Timeouts, resolveTimeouts } from './timeouts.js';
import { type SiteUrls, createSiteUrls } from './urls.js';
import { Waiter } from './wait.js';

/** Everything a page object needs, built once per driver session */
export interface PageContext {
	driver: BrowserDriver;
	config: VitrinConfig;
	timeouts: Timeouts;
	log: Logger;
	wait: Waiter;
	act: Interactions;
	popups: PopupManager;
	tabs: TabManager;
	urls: SiteUrls;
}

export function createPageContext(
	driver: BrowserDriver,
	config: VitrinConfig,
	log: Logger = createLogger('vitrin', { level: config.logLevel }),
): PageContext {
	const timeouts = resolveTimeouts(config.timeouts);
	const wait = new Waiter(driver, timeouts, log.child('Wait'));
	const act = new Interactions(driver, wait, timeouts, log.child('Interactions'));

	return {
		driver,
		config,
		timeouts,
		log,
		wait,
		act,
		popups: new PopupManager(act, wait, timeouts, log.child('Popups')),
		tabs: new TabManager(driver, wait, timeouts, log.child('Tabs')),
		urls: createSiteUrls(config.baseURL),
	};
}
