import type { PageContext } from './context.js';
import { CartPage } from './pages/cart-page.js';
import { HomePage } from './pages/home-page.js';
import { ProductDetailPage } from './pages/product-detail-page.js';
import { SearchResultsPage } from './pages/search-results-page.js';
import type { SiteUrls } from './urls.js';

export type CategoryName = keyof SiteUrls['categories'];

/**
 * Entry points into the storefront, handed to every test as `site`.
 *
 * ```ts
 * test('search shows results', async ({ site }) => {
 *   const results = await site.search('laptop');
 *   expect(await results.areProductsDisplayed()).toBeTruthy();
 * });
 * ```
 */
export class Storefront {
	constructor(readonly ctx: PageContext) {}

	async openHome(): Promise<HomePage> {
		await this.ctx.driver.navigate(this.ctx.urls.base);
		return HomePage.open(this.ctx);
	}

	/** Results for `keyword`, by URL rather than through the search box */
	search(keyword: string): Promise<SearchResultsPage> {
		return SearchResultsPage.visit(this.ctx, keyword);
	}

	async openCart(): Promise<CartPage> {
		await this.ctx.driver.navigate(this.ctx.urls.cart);
		return CartPage.open(this.ctx);
	}

	/** A product by its path, e.g. "apple/macbook-air-p-123456" */
	async openProduct(slug: string): Promise<ProductDetailPage> {
		await this.ctx.driver.navigate(this.ctx.urls.product(slug));
		return ProductDetailPage.open(this.ctx);
	}

	/** The product detail page already showing in the current tab, e.g. after a card click */
	currentProduct(): Promise<ProductDetailPage> {
		return ProductDetailPage.open(this.ctx);
	}

	async openCategory(name: CategoryName): Promise<void> {
		await this.ctx.driver.navigate(this.ctx.urls.categories[name]);
		await this.ctx.wait.forPageLoad();
		await this.ctx.wait.forAjax();
	}
}
