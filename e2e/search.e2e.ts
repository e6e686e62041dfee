import { describe, expect, test } from 'vitrin';

describe('Search', () => {
	test('laptop shows results', { tags: ['smoke'] }, async ({ site, config }) => {
		const results = await site.search(config.searchKeyword);
		expect(await results.areProductsDisplayed(), 'products displayed').toBeTruthy();
		expect(await results.getSearchKeyword(), 'keyword in the page title').toContain(config.searchKeyword);
	});

	test('çanta shows results with Turkish characters', async ({ site }) => {
		const results = await site.search('çanta');
		expect(await results.areProductsDisplayed(), 'products displayed').toBeTruthy();
		expect(await results.getSearchKeyword(), 'keyword in the page title').toContain('çanta');
	});

	test('apple macbook shows results for a two-word query', async ({ site }) => {
		const results = await site.search('apple macbook');
		expect(await results.areProductsDisplayed(), 'products displayed').toBeTruthy();
		expect((await results.getSearchKeyword()).toLowerCase(), 'keyword in the page title').toContain('macbook');
	});

	test('telefon has more than a hundred results', async ({ site }) => {
		const results = await site.search('telefon');
		expect(await results.getProductCount(), 'product count').toBeGreaterThan(100);
	});

	test('samsung results are branded', async ({ site }) => {
		const results = await site.search('samsung');
		const name = await results.getProductNameByIndex(0);
		expect(name.toLowerCase(), 'first product name').toContain('samsung');
	});

	test('laptop loads one page of cards', async ({ site }) => {
		const results = await site.search('laptop');
		const visible = await results.getVisibleProductCount();
		expect(visible, 'visible cards').toBeGreaterThanOrEqual(20);
		expect(visible, 'visible cards').toBeLessThanOrEqual(30);
	});

	test('elektronik has more than a thousand results', async ({ site }) => {
		const results = await site.search('elektronik');
		expect(await results.getProductCount(), 'product count').toBeGreaterThan(1000);
	});

	test('mouse keeps the keyword', async ({ site }) => {
		const results = await site.search('mouse');
		expect(await results.getSearchKeyword(), 'keyword in the page title').toContain('mouse');
	});

	test('a long query stays on the results page', async ({ site }) => {
		const results = await site.search('kablosuz bluetooth kulaklık gürültü engelleme');
		expect(await results.getCurrentUrl(), 'url').toContain('/sr');
	});

	test('a nonsense query finds little or nothing', { retries: 0 }, async ({ site }) => {
		const results = await site.search('qxzvwplk');
		if (!(await results.isNoResultsMessageDisplayed())) {
			expect(await results.getVisibleProductCount(), 'visible cards').toBeLessThan(10);
		}
	});
});
