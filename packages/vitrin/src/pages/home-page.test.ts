import { describe, expect, it } from 'vitest';
import { POPUP_LOCATORS } from '../popups.js';
import { CATEGORY_NAMES, FakeStorefront } from '../testing/fake-storefront.js';
import { TEST_BASE_URL, testContext } from '../testing/fixtures.js';
import { HomePage } from './home-page.js';

async function openHome() {
	const context = testContext();
	const store = new FakeStorefront(context.driver, TEST_BASE_URL);
	await context.driver.navigate(TEST_BASE_URL);
	const home = await HomePage.open(context.ctx);
	return { ...context, store, home };
}

describe('HomePage', () => {
	it('should dismiss the popups and verify the page on open', async () => {
		const { driver, home, sink } = await openHome();

		expect(driver.dom.get(POPUP_LOCATORS.genderPopup)).toEqual([]);
		expect(driver.dom.get(POPUP_LOCATORS.cookieBanner)).toEqual([]);
		expect(await home.isHomePageLoaded()).toBe(true);
		expect(sink.messages()).toContain('INFO  HomePage  Homepage verified');
	});

	it('should search through the search box', async () => {
		const { driver, home } = await openHome();

		const results = await home.searchFor('laptop');
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/sr?q=laptop');
		expect(await results.getSearchKeyword()).toBe('laptop');
		expect(await results.getVisibleProductCount()).toBe(4);
	});

	it('should type and submit a search in two steps', async () => {
		const { driver, home } = await openHome();

		await home.typeInSearchBox('çanta');
		await home.clickSearchIcon();
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/sr?q=%C3%A7anta');
	});

	it('should read the search box placeholder', async () => {
		const { home } = await openHome();
		expect(await home.getSearchBoxPlaceholder()).toBe('Aradığınız ürün, kategori veya markayı yazınız');
	});

	it('should list the category names that have a label', async () => {
		const { home } = await openHome();
		expect(await home.getAllCategoryNames()).toEqual(CATEGORY_NAMES);
	});

	it('should open a category by name', async () => {
		const { driver, home } = await openHome();

		expect(await home.isCategoryDisplayed('Elektronik')).toBe(true);
		expect(await home.isCategoryDisplayed('Otomotiv')).toBe(false);
		await home.clickCategory('Elektronik');
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/butik/liste/elektronik');
	});

	it('should show the header links', async () => {
		const { home } = await openHome();

		expect(await home.isLogoDisplayed()).toBe(true);
		expect(await home.isLoginButtonDisplayed()).toBe(true);
		expect(await home.isCartIconDisplayed()).toBe(true);
		expect(await home.isFavoritesIconDisplayed()).toBe(true);
	});

	it('should follow the header links', async () => {
		const { driver, home } = await openHome();

		await home.clickLogin();
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/giris');

		await driver.navigate(TEST_BASE_URL);
		await home.clickFavorites();
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/Hesabim/Favoriler');
	});

	it('should open the cart from the header', async () => {
		const { home } = await openHome();

		const cart = await home.clickCart();
		expect(await cart.isCartPageLoaded()).toBe(true);
		expect(await cart.isCartEmpty()).toBe(true);
	});

	it('should navigate back and forward', async () => {
		const { driver, home } = await openHome();

		await home.clickLogin();
		await home.navigateBack();
		expect(await driver.getCurrentUrl()).toBe(TEST_BASE_URL);
		await home.navigateForward();
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/giris');
		expect(await home.getPageTitle()).toBe('giris');
	});
});
