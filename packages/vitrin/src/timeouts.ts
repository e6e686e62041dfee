// ============================================================================
// Vitrin - Timeouts
// Every wait, pause and retry budget in one place, in milliseconds.
// Config can override any of them; unit tests shrink them to near zero.
// ============================================================================

export interface Timeouts {
	// General waits
	explicit: number;
	short: number;
	medium: number;
	long: number;
	extraLong: number;

	// Page
	pageLoad: number;
	ajax: number;
	script: number;

	// Elements
	elementVisible: number;
	elementClickable: number;
	elementInvisible: number;
	staleElement: number;

	// Storefront
	productImageLoad: number;
	searchResultsLoad: number;
	cartUpdate: number;
	filterApplication: number;
	checkoutLoad: number;
	modalAppear: number;
	promoOverlay: number;
	searchBoxVisible: number;
	/** How long one infinite-scroll step waits for new cards */
	scrollLoad: number;
	/** How long to wait for a product link to open its tab */
	newTab: number;

	// Popups
	/** The gender picker appears a moment after the first paint */
	genderPopupDelay: number;
	/** The consent banner is injected late */
	cookieBannerDelay: number;
	popupDismiss: number;

	// Retry and settle
	pollingInterval: number;
	retryAttempts: number;
	retryDelay: number;
	microPause: number;
	scrollSettle: number;
	lazyLoadSettle: number;
	hoverSettle: number;
	cartSettle: number;
	removeSettle: number;
}

export const DEFAULT_TIMEOUTS: Readonly<Timeouts> = {
	explicit: 20_000,
	short: 5_000,
	medium: 15_000,
	long: 30_000,
	extraLong: 60_000,

	pageLoad: 30_000,
	ajax: 20_000,
	script: 30_000,

	elementVisible: 15_000,
	elementClickable: 15_000,
	elementInvisible: 10_000,
	staleElement: 10_000,

	productImageLoad: 10_000,
	searchResultsLoad: 15_000,
	cartUpdate: 10_000,
	filterApplication: 15_000,
	checkoutLoad: 20_000,
	modalAppear: 5_000,
	promoOverlay: 8_000,
	searchBoxVisible: 3_000,
	scrollLoad: 3_000,
	newTab: 10_000,

	genderPopupDelay: 2_000,
	cookieBannerDelay: 5_000,
	popupDismiss: 5_000,

	pollingInterval: 500,
	retryAttempts: 3,
	retryDelay: 1_000,
	microPause: 200,
	scrollSettle: 500,
	lazyLoadSettle: 1_000,
	hoverSettle: 500,
	cartSettle: 1_000,
	removeSettle: 1_500,
};

export function resolveTimeouts(overrides: Partial<Timeouts> = {}): Timeouts {
	return { ...DEFAULT_TIMEOUTS, ...overrides };
}
