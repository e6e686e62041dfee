// ============================================================================
// Vitrin - Search Results Page
// The product grid for a keyword. Cards load lazily as the page scrolls,
// and clicking a card opens its detail page in a new tab.
// ============================================================================

import type { DriverElement } from 'vitrin-driver';
import type { PageContext } from '../context.js';
import { TimeoutError, VitrinError } from '../errors.js';
import { type Locator, describeLocator, toSelector } from '../locator.js';
import { parseTurkishNumber } from '../turkish-text.js';
import { waitFor } from '../wait.js';
import { BasePage } from './base-page.js';

export const SEARCH_LOCATORS = {
	title: "h1[data-testid='title']",
	resultCount: "span[data-testid='result-count-info']",
	productCard: 'a.product-card',
	productCardImage: 'a.product-card img',
	productBrand: '.product-brand',
	productName: '.product-name',
	productPrice: '.discounted-price',
	priceMinInput: "input[data-testid='price-range-input-min']",
	priceMaxInput: "input[data-testid='price-range-input-max']",
	priceSearchButton: "button[data-testid='price-range-button']",
	priceFilterHeader: "section[data-aggregationtype='Price'] button.expand-collapse-button",
	priceFilterContainer: "section[data-aggregationtype='Price'] .aggregation-container",
	sortDropdown: 'button.select-box',
	noResultsBanner: '.did-you-mean .information-banner',
	emptyResult: '.empty-result',
} as const satisfies Record<string, Locator>;

const SCROLLS_TO_REACH_PRODUCT = 3;

export class SearchResultsPage extends BasePage {
	private constructor(ctx: PageContext) {
		super(ctx, 'SearchResultsPage');
	}

	/** Wrap the results the driver is showing */
	static async open(ctx: PageContext): Promise<SearchResultsPage> {
		const page = new SearchResultsPage(ctx);
		await page.wait.forPageLoad();
		await page.wait.forAjax();
		await page.waitForProducts();
		await page.verify();
		return page;
	}

	/** Go straight to the results for `keyword`, skipping the search box */
	static async visit(ctx: PageContext, keyword: string): Promise<SearchResultsPage> {
		const url = ctx.urls.search(keyword);
		ctx.log.info(`Opening search results: ${url}`);
		await ctx.driver.navigate(url);
		return SearchResultsPage.open(ctx);
	}

	private async verify(): Promise<void> {
		this.log.info('Verifying search results page');
		await this.expectUrlContains('/sr');
		try {
			await this.wait.untilVisible(SEARCH_LOCATORS.title);
			const cards = await this.act.count(SEARCH_LOCATORS.productCard);
			if (cards === 0) this.log.warn('No products visible on search results page');
			else this.log.info(`Search results page verified: ${cards} products visible`);
		} catch (err) {
			this.log.error('Search results page verification failed', err);
		}
	}

	/** First card visible, and its image has a source */
	private async waitForProducts(): Promise<void> {
		const timeout = this.timeouts.searchResultsLoad;
		try {
			await this.wait.untilVisible(SEARCH_LOCATORS.productCard, timeout);
			await waitFor(
				'product images',
				async () => {
					const image = await this.act.find(SEARCH_LOCATORS.productCardImage);
					return image !== null && Boolean(await image.getAttribute('src'));
				},
				{ timeout, interval: this.timeouts.pollingInterval },
			);
			this.log.debug('Products loaded');
		} catch (err) {
			this.log.warn('Products not fully loaded within timeout, continuing', err);
		}
	}

	// -----------------------------------------------------------------------
	// Listing
	// -----------------------------------------------------------------------

	/** Total hits from the count banner: "67049+ Ürün" → 67049. 0 when unreadable. */
	async getProductCount(): Promise<number> {
		try {
			await this.wait.untilVisible(SEARCH_LOCATORS.resultCount);
			const text = await this.act.safeGetText(SEARCH_LOCATORS.resultCount);
			const digits = text.replace(/\D/g, '');
			if (!digits) {
				this.log.warn(`Unable to parse product count from: '${text}'`);
				return 0;
			}
			const count = Number.parseInt(digits, 10);
			this.log.info(`Product count: ${count}`);
			return count;
		} catch (err) {
			this.log.error('Could not read the product count', err);
			return 0;
		}
	}

	/** Cards loaded so far; grows as the page scrolls */
	async getVisibleProductCount(): Promise<number> {
		const count = await this.act.count(SEARCH_LOCATORS.productCard);
		this.log.info(`Visible product count: ${count}`);
		return count;
	}

	/** The keyword as the page title shows it */
	getSearchKeyword(): Promise<string> {
		return this.act.safeGetText(SEARCH_LOCATORS.title);
	}

	areProductsDisplayed(): Promise<boolean> {
		return this.act.isPresent(SEARCH_LOCATORS.productCard);
	}

	/** The "did you mean" banner, or the empty state */
	async isNoResultsMessageDisplayed(): Promise<boolean> {
		if (await this.act.isPresent(SEARCH_LOCATORS.noResultsBanner)) {
			this.log.info('No results banner detected');
			return true;
		}
		if (await this.act.isPresent(SEARCH_LOCATORS.emptyResult)) {
			this.log.info('Empty result detected');
			return true;
		}
		return false;
	}

	isSortDropdownDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(SEARCH_LOCATORS.sortDropdown);
	}

	// -----------------------------------------------------------------------
	// Selection. The product opens in a new tab.
	// -----------------------------------------------------------------------

	clickFirstProduct(): Promise<void> {
		return this.clickProductByIndex(0);
	}

	async clickProductByIndex(index: number): Promise<void> {
		this.log.info(`Clicking product at index: ${index}`);
		const cards = await this.act.findAll(SEARCH_LOCATORS.productCard);
		const card = index >= 0 ? cards[index] : undefined;
		if (card === undefined) {
			const message = `Product index ${index} out of bounds. Available products: ${cards.length}`;
			this.log.error(message);
			throw new RangeError(message);
		}

		try {
			await this.act.scrollTo(card);
			await this.act.safeClick(card);
			await this.wait.microPause();
		} catch (err) {
			this.log.error(`Error clicking product at index: ${index}`, err);
			throw new VitrinError({
				action: 'click product',
				target: `#${index}`,
				message: `Failed to click product at index: ${index}`,
				cause: err,
			});
		}
	}

	// -----------------------------------------------------------------------
	// Card contents. '' for an index with no card.
	// -----------------------------------------------------------------------

	/** Brand and name together: "Samsung Galaxy A16 128 Gb" */
	async getProductNameByIndex(index: number): Promise<string> {
		const card = await this.cardAt(index);
		if (!card) return '';
		const brand = await this.cardText(card, SEARCH_LOCATORS.productBrand);
		const name = await this.cardText(card, SEARCH_LOCATORS.productName);
		return `${brand} ${name}`.trim();
	}

	async getProductBrandByIndex(index: number): Promise<string> {
		const card = await this.cardAt(index);
		return card ? this.cardText(card, SEARCH_LOCATORS.productBrand) : '';
	}

	/** Price as printed, e.g. "140.000 TL" */
	async getProductPriceByIndex(index: number): Promise<string> {
		const card = await this.cardAt(index);
		return card ? this.cardText(card, SEARCH_LOCATORS.productPrice) : '';
	}

	async getProductPriceAsNumberByIndex(index: number): Promise<number> {
		return parseTurkishNumber(await this.getProductPriceByIndex(index));
	}

	// -----------------------------------------------------------------------
	// Price filter
	// -----------------------------------------------------------------------

	/** Open the collapsed price section. Does nothing when already open. */
	async expandPriceFilter(): Promise<void> {
		try {
			const container = await this.act.find(SEARCH_LOCATORS.priceFilterContainer);
			if (container === null || (await container.getAttribute('hidden')) === null) {
				this.log.debug('Price filter already expanded');
				return;
			}
			await this.act.safeClick(SEARCH_LOCATORS.priceFilterHeader);
			await this.wait.microPause();
			await this.wait.microPause();
			this.log.info('Price filter expanded');
		} catch (err) {
			this.log.warn('Could not expand the price filter', err);
		}
	}

	applyPriceFilter(minPrice: number, maxPrice: number): Promise<void> {
		return this.filterByPrice('price filter', minPrice, maxPrice);
	}

	applyMinPriceFilter(minPrice: number): Promise<void> {
		return this.filterByPrice('min price filter', minPrice, undefined);
	}

	applyMaxPriceFilter(maxPrice: number): Promise<void> {
		return this.filterByPrice('max price filter', undefined, maxPrice);
	}

	// -----------------------------------------------------------------------
	// Infinite scroll
	// -----------------------------------------------------------------------

	/** Scroll to the bottom `times` times, waiting briefly for new cards after each */
	async scrollToLoadMoreProducts(times: number): Promise<void> {
		this.log.info(`Scrolling to load more products (${times} times)`);
		for (let i = 1; i <= times; i++) {
			const before = await this.act.count(SEARCH_LOCATORS.productCard);
			await this.act.scrollToBottom();
			try {
				await waitFor(
					'more product cards',
					async () => (await this.act.count(SEARCH_LOCATORS.productCard)) > before,
					{ timeout: this.timeouts.scrollLoad, interval: this.timeouts.pollingInterval },
				);
			} catch (err) {
				if (!(err instanceof TimeoutError)) throw err;
				this.log.debug(`No new products after scroll ${i} (may be at the end)`);
			}
		}
		this.log.info(`Visible products after scrolling: ${await this.act.count(SEARCH_LOCATORS.productCard)}`);
	}

	async scrollToProduct(index: number): Promise<void> {
		const cards = await this.act.findAll(SEARCH_LOCATORS.productCard);
		const card = cards[index];
		if (card) {
			await this.act.scrollTo(card);
			return;
		}
		this.log.warn(`Product index ${index} not loaded yet (${cards.length} loaded). Scrolling to load more.`);
		await this.scrollToLoadMoreProducts(SCROLLS_TO_REACH_PRODUCT);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async cardAt(index: number): Promise<DriverElement | null> {
		try {
			const cards = await this.act.findAll(SEARCH_LOCATORS.productCard);
			const card = index >= 0 ? cards[index] : undefined;
			if (card === undefined) {
				this.log.error(`Invalid product index: ${index}. Available: ${cards.length}`);
				return null;
			}
			return card;
		} catch (err) {
			this.log.error(`Could not read product cards for index ${index}`, err);
			return null;
		}
	}

	private async cardText(card: DriverElement, locator: Locator): Promise<string> {
		try {
			const [element] = await card.findElements(toSelector(locator));
			return element ? await this.act.safeGetText(element) : '';
		} catch (err) {
			this.log.debug(`No ${describeLocator(locator)} in card: ${String(err)}`);
			return '';
		}
	}

	private async filterByPrice(label: string, min: number | undefined, max: number | undefined): Promise<void> {
		this.log.info(`Applying ${label}: ${min ?? '-'} TL - ${max ?? '-'} TL`);
		try {
			await this.expandPriceFilter();
			if (min !== undefined) {
				await this.wait.untilVisible(SEARCH_LOCATORS.priceMinInput);
				await this.act.safeType(SEARCH_LOCATORS.priceMinInput, String(min));
			}
			if (max !== undefined) {
				await this.wait.untilVisible(SEARCH_LOCATORS.priceMaxInput);
				await this.act.safeType(SEARCH_LOCATORS.priceMaxInput, String(max));
			}
			await this.act.safeClick(SEARCH_LOCATORS.priceSearchButton);
			await this.wait.forPageLoad();
			await this.wait.forAjax();
			await this.waitForProducts();
			this.log.info(`${label} applied`);
		} catch (err) {
			this.log.error(`Error applying ${label}`, err);
			throw new VitrinError({
				action: 'apply',
				target: label,
				message: `Failed to apply ${label}`,
				cause: err,
			});
		}
	}
}
