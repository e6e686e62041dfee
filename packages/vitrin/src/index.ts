// ============================================================================
// Vitrin - Public API
// Page objects, waits and safe interactions for storefront UI tests.
//
// import { test, expect, defineConfig } from 'vitrin';
//
// test('çanta search shows results', async ({ site }) => {
//   const results = await site.search('çanta');
//   expect(await results.areProductsDisplayed()).toBeTruthy();
// });
// ============================================================================

// Core test API
export {
	test,
	describe,
	beforeAll,
	afterAll,
	beforeEach,
	afterEach,
	getHooks,
	testRegistry,
	runTest,
	planRun,
	resetTestState,
} from './test.js';
export type {
	TestFixtures,
	TestCase,
	TestOptions,
	TestResult,
	TestBody,
	HookFn,
	DriverFactory,
	RunAttempt,
} from './test.js';

// Assertions
export { expect, ValueAssertions, AssertionError } from './expect.js';

// Configuration
export { defineConfig, resolveConfig, applyEnvOverrides } from './config.js';
export type { VitrinConfig, UserConfig } from './config.js';
export { DEFAULT_TIMEOUTS, resolveTimeouts } from './timeouts.js';
export type { Timeouts } from './timeouts.js';
export { createSiteUrls } from './urls.js';
export type { SiteUrls } from './urls.js';

// Logging & errors
export { createLogger, MemorySink, LOG_LEVELS, isLogLevel } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';
export {
	VitrinError,
	ElementNotFoundError,
	ElementNotActionableError,
	TimeoutError,
	ConfigError,
	DriverError,
	isDriverError,
	formatElementState,
	errorMessage,
} from './errors.js';
export type { ElementState, NotActionableReason, DriverErrorCode } from './errors.js';

// Reliability layer
export { Waiter, waitFor, sleep } from './wait.js';
export type { WaitOptions } from './wait.js';
export { Interactions } from './interactions.js';
export { PopupManager, POPUP_LOCATORS } from './popups.js';
export { TabManager } from './tabs.js';
export { byTextContains, describeLocator, isElement, toSelector, xpathLiteral } from './locator.js';
export type { Locator, Target } from './locator.js';

// Page objects
export { createPageContext } from './context.js';
export type { PageContext } from './context.js';
export { Storefront } from './storefront.js';
export type { CategoryName } from './storefront.js';
export { BasePage } from './pages/base-page.js';
export { HomePage, HOME_LOCATORS, categoryLink } from './pages/home-page.js';
export { SearchResultsPage, SEARCH_LOCATORS } from './pages/search-results-page.js';
export { ProductDetailPage, PRODUCT_LOCATORS } from './pages/product-detail-page.js';
export { CartPage, CART_LOCATORS } from './pages/cart-page.js';

// Locale text
export {
	containsTurkishCharacters,
	toUpperCaseTurkish,
	toLowerCaseTurkish,
	normalizeToAscii,
	equalsIgnoreCaseTurkish,
	containsIgnoreCaseTurkish,
	fuzzyEqualsTurkish,
	cleanWhitespace,
	isValidTurkishText,
	startsWithTurkishCharacter,
	getTurkishCharacterCount,
	replaceTurkishChars,
	formatTurkishCurrency,
	parseTurkishNumber,
} from './turkish-text.js';

// Screenshots
export {
	captureScreenshot,
	captureScreenshotBuffer,
	captureScreenshotBase64,
	safeFileName,
	fileTimestamp,
} from './screenshot.js';

// Driver capability (for custom drivers / scripting)
export type { BrowserDriver, DriverElement, Selector, ScriptArg } from 'vitrin-driver';
