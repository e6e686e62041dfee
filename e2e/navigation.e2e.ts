import { describe, expect, test } from 'vitrin';

describe('Navigation', () => {
	test('first product opens in a new tab', { tags: ['smoke'] }, async ({ site, tabs }) => {
		const results = await site.search('laptop');
		await results.clickFirstProduct();

		expect(await tabs.switchToNewTab(), 'switched to the product tab').toBeTruthy();
		const product = await site.currentProduct();
		expect(await product.isProductDetailPageLoaded(), 'detail page loaded').toBeTruthy();
	});

	test('product detail shows title, brand, price and the cart button', async ({ site, tabs }) => {
		const results = await site.search('laptop');
		await results.clickFirstProduct();
		await tabs.switchToNewTab();
		const product = await site.currentProduct();

		expect(await product.getProductTitle(), 'title').not.toBe('');
		expect(await product.getProductBrand(), 'brand').not.toBe('');
		expect(await product.getProductPrice(), 'price').toContain('TL');
		expect(await product.isAddToCartButtonDisplayed(), 'add to cart button').toBeTruthy();
	});

	test('three product tabs are opened and cleaned up', async ({ site, tabs }) => {
		const results = await site.search('laptop');
		const original = await tabs.currentHandle();

		for (let index = 0; index < 3; index++) {
			await results.clickProductByIndex(index);
		}
		expect(await tabs.count(), 'open tabs').toBeGreaterThanOrEqual(4);

		expect(await tabs.closeOthers(original), 'closed the product tabs').toBeTruthy();
		expect(await tabs.count(), 'open tabs').toBe(1);
	});

	test('returning to the results keeps the loaded cards', async ({ site, tabs }) => {
		const results = await site.search('laptop');
		const before = await results.getVisibleProductCount();
		await results.clickFirstProduct();
		await tabs.switchToNewTab();
		const product = await site.currentProduct();

		await product.closeAndReturnToSearchResults();
		expect(await results.getVisibleProductCount(), 'visible cards').toBe(before);
	});

	test('infinite scroll loads more products', async ({ site }) => {
		const results = await site.search('laptop');
		const before = await results.getVisibleProductCount();
		await results.scrollToLoadMoreProducts(3);
		expect(await results.getVisibleProductCount(), 'visible cards').toBeGreaterThan(before);
	});
});
