import { describe, expect, it } from 'vitest';
import { FakeStorefront } from '../testing/fake-storefront.js';
import { TEST_BASE_URL, testContext } from '../testing/fixtures.js';
import { SearchResultsPage } from './search-results-page.js';

async function search(keyword: string) {
	const context = testContext();
	const store = new FakeStorefront(context.driver, TEST_BASE_URL);
	const results = await SearchResultsPage.visit(context.ctx, keyword);
	return { ...context, store, results };
}

describe('SearchResultsPage', () => {
	it('should open the results for a keyword by URL', async () => {
		const { driver, results } = await search('laptop');

		expect(driver.navigations).toEqual(['https://shop.test/sr?q=laptop']);
		expect(await results.getSearchKeyword()).toBe('laptop');
		expect(await results.areProductsDisplayed()).toBe(true);
		expect(await results.isSortDropdownDisplayed()).toBe(true);
		expect(await results.isNoResultsMessageDisplayed()).toBe(false);
	});

	it('should read the total from the count banner', async () => {
		const { results } = await search('laptop');
		expect(await results.getProductCount()).toBe(6);
		expect(await results.getVisibleProductCount()).toBe(4);
	});

	it('should read a card by index', async () => {
		const { results } = await search('laptop');

		expect(await results.getProductNameByIndex(0)).toBe('Lenovo IdeaPad Slim 3 Laptop');
		expect(await results.getProductBrandByIndex(1)).toBe('Apple');
		expect(await results.getProductPriceByIndex(1)).toBe('41.499,90 TL');
		expect(await results.getProductPriceAsNumberByIndex(1)).toBe(41499.9);
	});

	it('should return empty values for a card that is not loaded', async () => {
		const { results, sink } = await search('laptop');

		expect(await results.getProductNameByIndex(10)).toBe('');
		expect(await results.getProductPriceByIndex(-1)).toBe('');
		expect(sink.messages()).toContain('ERROR SearchResultsPage  Invalid product index: 10. Available: 4');
	});

	it('should open a clicked product in a new tab', async () => {
		const { driver, results } = await search('laptop');

		await results.clickProductByIndex(1);
		expect(await results.getTabCount()).toBe(2);
		expect(driver.windows[1]?.url).toBe('https://shop.test/apple/macbook-air-m2-p-1002');
		expect(await driver.getWindowHandle()).toBe('window-1');
	});

	it('should reject a product index out of range', async () => {
		const { results } = await search('laptop');
		await expect(results.clickProductByIndex(9)).rejects.toThrow(
			new RangeError('Product index 9 out of bounds. Available products: 4'),
		);
	});

	it('should load more cards when scrolled to the bottom', async () => {
		const { driver, results, sink } = await search('laptop');

		await results.scrollToLoadMoreProducts(2);
		expect(await results.getVisibleProductCount()).toBe(6);
		expect(driver.scrollsToBottom).toBe(2);
		expect(sink.messages()).toContain('DEBUG SearchResultsPage  No new products after scroll 2 (may be at the end)');
	});

	it('should scroll to load a product that is not there yet', async () => {
		const { results } = await search('laptop');

		await results.scrollToProduct(5);
		expect(await results.getProductNameByIndex(5)).toBe('Dell Inspiron 3520 Laptop');
	});

	it('should show the empty state for a keyword with no products', async () => {
		const { results } = await search('xyzqwv');

		expect(await results.isNoResultsMessageDisplayed()).toBe(true);
		expect(await results.areProductsDisplayed()).toBe(false);
		expect(await results.getProductCount()).toBe(0);
	});

	it('should match keywords regardless of Turkish diacritics', async () => {
		const { results } = await search('canta');
		expect(await results.getProductNameByIndex(0)).toBe('Mango Deri Omuz Çantası');
	});

	it('should filter by a price range', async () => {
		const { driver, results } = await search('laptop');

		await results.applyPriceFilter(15000, 20000);
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/sr?q=laptop&prc=15000-20000');
		expect(await results.getVisibleProductCount()).toBe(2);
		expect(await results.getProductPriceAsNumberByIndex(0)).toBe(18750);
		expect(await results.getProductPriceAsNumberByIndex(1)).toBe(15299);
	});

	it('should filter by a minimum or a maximum price alone', async () => {
		const { driver, results } = await search('laptop');

		await results.applyMinPriceFilter(30000);
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/sr?q=laptop&prc=30000-');
		expect(await results.getVisibleProductCount()).toBe(2);

		await results.applyMaxPriceFilter(16000);
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/sr?q=laptop&prc=-16000');
		expect(await results.getProductBrandByIndex(0)).toBe('MSI');
	});

	it('should leave an expanded price filter open', async () => {
		const { results, sink } = await search('laptop');

		await results.expandPriceFilter();
		await results.expandPriceFilter();
		expect(sink.messages().filter((line) => line === 'INFO  SearchResultsPage  Price filter expanded')).toHaveLength(1);
		expect(sink.messages()).toContain('DEBUG SearchResultsPage  Price filter already expanded');
	});
});
