import { type UserConfig, type VitrinConfig, resolveConfig } from '../config.js';
import { type PageContext, createPageContext } from '../context.js';
import { type Logger, MemorySink, createLogger } from '../logger.js';
import type { Timeouts } from '../timeouts.js';
import { FakeDriver } from './fake-driver.js';

export const TEST_BASE_URL = 'https://shop.test/';

/** Waits short enough that a test which times out still finishes quickly */
export const FAST_TIMEOUTS: Partial<Timeouts> = {
	explicit: 50,
	short: 50,
	medium: 50,
	long: 50,
	extraLong: 50,
	pageLoad: 50,
	ajax: 50,
	script: 50,
	elementVisible: 50,
	elementClickable: 50,
	elementInvisible: 50,
	staleElement: 50,
	productImageLoad: 50,
	searchResultsLoad: 50,
	cartUpdate: 50,
	filterApplication: 50,
	checkoutLoad: 50,
	modalAppear: 50,
	promoOverlay: 50,
	searchBoxVisible: 50,
	scrollLoad: 30,
	newTab: 50,
	genderPopupDelay: 0,
	cookieBannerDelay: 0,
	popupDismiss: 50,
	pollingInterval: 5,
	retryAttempts: 3,
	retryDelay: 0,
	microPause: 0,
	scrollSettle: 0,
	lazyLoadSettle: 0,
	hoverSettle: 0,
	cartSettle: 0,
	removeSettle: 0,
};

/** Config for unit tests: fake storefront URL, fast timeouts, no screenshots */
export function testConfig(overrides: UserConfig = {}): VitrinConfig {
	return resolveConfig(
		{
			baseURL: TEST_BASE_URL,
			screenshot: 'never',
			...overrides,
			timeouts: { ...FAST_TIMEOUTS, ...overrides.timeouts },
		},
		{},
	);
}

export interface TestContext {
	driver: FakeDriver;
	ctx: PageContext;
	sink: MemorySink;
	log: Logger;
}

/** A page context over a fresh FakeDriver, logging into memory */
export function testContext(overrides: UserConfig = {}, driver = new FakeDriver()): TestContext {
	const sink = new MemorySink();
	const log = createLogger('vitrin', { level: 'debug', sink });
	const ctx = createPageContext(driver, testConfig(overrides), log);
	return { driver, ctx, sink, log };
}
