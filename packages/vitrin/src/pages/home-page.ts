import type { PageContext } from '../context.js';
import { type Locator, byTextContains, xpathLiteral } from '../locator.js';
import { BasePage } from './base-page.js';
import { CartPage } from './cart-page.js';
import { SearchResultsPage } from './search-results-page.js';

export const HOME_LOCATORS = {
	searchBox: "input[data-testid='suggestion']",
	searchIcon: "i[data-testid='search-icon']",
	logo: 'a.logo',
	login: byTextContains('p', 'Giriş Yap'),
	cart: byTextContains('p', 'Sepetim'),
	favorites: byTextContains('p', 'Favorilerim'),
	categoryHeaders: 'a.category-header',
} as const satisfies Record<string, Locator>;

/** The category header link labelled `name` */
export function categoryLink(name: string): Locator {
	return { xpath: `//a[@class='category-header' and contains(text(),${xpathLiteral(name)})]` };
}

/**
 * The storefront landing page. Opening it dismisses the popups that greet a
 * fresh session.
 */
export class HomePage extends BasePage {
	private constructor(ctx: PageContext) {
		super(ctx, 'HomePage');
	}

	/** Wrap the page the driver is on. Navigate there first. */
	static async open(ctx: PageContext): Promise<HomePage> {
		const page = new HomePage(ctx);
		await page.wait.forPageLoad();
		await page.handlePopups();
		await page.verify();
		return page;
	}

	private async verify(): Promise<void> {
		this.log.info('Verifying homepage');
		await this.expectUrlContains(siteHost(this.ctx.config.baseURL));
		try {
			await this.wait.untilVisible(HOME_LOCATORS.logo);
			await this.wait.untilVisible(HOME_LOCATORS.searchBox);
			this.log.info('Homepage verified');
		} catch (err) {
			this.log.warn('Homepage verification failed', err);
		}
	}

	async isHomePageLoaded(): Promise<boolean> {
		return (await this.isLogoDisplayed()) && (await this.isSearchBoxDisplayed());
	}

	// -----------------------------------------------------------------------
	// Search
	// -----------------------------------------------------------------------

	async searchFor(keyword: string): Promise<SearchResultsPage> {
		this.log.info(`Searching for: '${keyword}'`);
		const searchBox = await this.wait.untilVisible(HOME_LOCATORS.searchBox, this.timeouts.searchBoxVisible);
		await searchBox.clear();
		await searchBox.sendKeys(keyword);
		await this.act.clickViaScript(HOME_LOCATORS.searchIcon);
		await this.wait.forPageLoad();
		return SearchResultsPage.open(this.ctx);
	}

	async typeInSearchBox(keyword: string): Promise<void> {
		this.log.info(`Typing in search box: '${keyword}'`);
		await this.act.safeType(HOME_LOCATORS.searchBox, keyword);
	}

	async clickSearchIcon(): Promise<void> {
		this.log.info('Clicking search icon');
		await this.act.clickViaScript(HOME_LOCATORS.searchIcon);
		await this.wait.forPageLoad();
	}

	getSearchBoxPlaceholder(): Promise<string> {
		return this.act.getAttribute(HOME_LOCATORS.searchBox, 'placeholder');
	}

	isSearchBoxDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(HOME_LOCATORS.searchBox);
	}

	// -----------------------------------------------------------------------
	// Categories
	// -----------------------------------------------------------------------

	async clickCategory(name: string): Promise<void> {
		this.log.info(`Clicking category: '${name}'`);
		const link = categoryLink(name);
		await this.wait.untilClickable(link);
		await this.act.safeClick(link);
		await this.wait.forPageLoad();
		await this.wait.forAjax();
	}

	isCategoryDisplayed(name: string): Promise<boolean> {
		return this.act.isDisplayed(categoryLink(name));
	}

	/** Non-empty names of the category headers */
	async getAllCategoryNames(): Promise<string[]> {
		try {
			const names: string[] = [];
			for (const header of await this.act.findAll(HOME_LOCATORS.categoryHeaders)) {
				const name = (await header.getText()).trim();
				if (name) names.push(name);
			}
			this.log.info(`Found ${names.length} categories`);
			return names;
		} catch (err) {
			this.log.warn('Could not read category names', err);
			return [];
		}
	}

	// -----------------------------------------------------------------------
	// Header
	// -----------------------------------------------------------------------

	async clickLogin(): Promise<void> {
		this.log.info('Clicking login button');
		await this.act.safeClick(HOME_LOCATORS.login);
		await this.wait.forPageLoad();
	}

	async clickCart(): Promise<CartPage> {
		this.log.info('Clicking cart icon');
		await this.act.safeClick(HOME_LOCATORS.cart);
		await this.wait.forPageLoad();
		return CartPage.open(this.ctx);
	}

	async clickFavorites(): Promise<void> {
		this.log.info('Clicking favorites icon');
		await this.act.safeClick(HOME_LOCATORS.favorites);
		await this.wait.forPageLoad();
	}

	async clickLogo(): Promise<void> {
		this.log.info('Clicking logo');
		await this.act.safeClick(HOME_LOCATORS.logo);
		await this.wait.forPageLoad();
	}

	isLogoDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(HOME_LOCATORS.logo);
	}

	isLoginButtonDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(HOME_LOCATORS.login);
	}

	isCartIconDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(HOME_LOCATORS.cart);
	}

	isFavoritesIconDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(HOME_LOCATORS.favorites);
	}
}

/** "https://www.trendyol.com/" → "trendyol.com" */
function siteHost(baseURL: string): string {
	return new URL(baseURL).hostname.replace(/^www\./, '');
}
