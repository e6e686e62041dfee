import type { PageContext } from '../context.js';
import type { Locator } from '../locator.js';
import { parseTurkishNumber } from '../turkish-text.js';
import { sleep } from '../wait.js';
import { BasePage } from './base-page.js';
import { CartPage } from './cart-page.js';

export const PRODUCT_LOCATORS = {
	title: "h1[data-testid='product-title']",
	brand: "h1[data-testid='product-title'] strong",
	price: '.price-view .discounted',
	image: "img[data-testid='image']",
	addToCartButton: "button[data-testid='add-to-cart-button']",
} as const satisfies Record<string, Locator>;

const ADDED_TO_CART = 'Sepete Eklendi';
const OUT_OF_STOCK = 'Tükendi';

/**
 * A single product. Usually reached through a search result card, which
 * opens it in a new tab: switch to that tab before calling open().
 */
export class ProductDetailPage extends BasePage {
	private constructor(ctx: PageContext) {
		super(ctx, 'ProductDetailPage');
	}

	static async open(ctx: PageContext): Promise<ProductDetailPage> {
		const page = new ProductDetailPage(ctx);
		await page.wait.forPageLoad();
		await page.wait.forAjax();
		await page.waitForDetails();
		await page.verify();
		return page;
	}

	private async waitForDetails(): Promise<void> {
		try {
			await this.wait.untilVisible(PRODUCT_LOCATORS.title);
			await this.wait.untilVisible(PRODUCT_LOCATORS.price);
			await this.wait.untilVisible(PRODUCT_LOCATORS.image, this.timeouts.productImageLoad);
			this.log.debug('Product details loaded');
		} catch (err) {
			this.log.warn('Product details not fully loaded within timeout', err);
		}
	}

	private async verify(): Promise<void> {
		this.log.info('Verifying product detail page');
		await this.expectUrlContains('/p-');
		try {
			await this.wait.untilVisible(PRODUCT_LOCATORS.title);
			await this.wait.untilVisible(PRODUCT_LOCATORS.addToCartButton);
			this.log.info('Product detail page verified');
		} catch (err) {
			this.log.warn('Product detail page verification failed', err);
		}
	}

	async isProductDetailPageLoaded(): Promise<boolean> {
		return (await this.act.isDisplayed(PRODUCT_LOCATORS.title)) && (await this.isAddToCartButtonDisplayed());
	}

	// -----------------------------------------------------------------------
	// Product information
	// -----------------------------------------------------------------------

	async getProductTitle(): Promise<string> {
		const title = await this.act.safeGetText(PRODUCT_LOCATORS.title);
		this.log.info(`Product title: '${title}'`);
		return title;
	}

	getProductBrand(): Promise<string> {
		return this.act.safeGetText(PRODUCT_LOCATORS.brand);
	}

	/** Price as printed, e.g. "140.000 TL" */
	async getProductPrice(): Promise<string> {
		const price = await this.act.safeGetText(PRODUCT_LOCATORS.price);
		this.log.info(`Product price: '${price}'`);
		return price;
	}

	async getProductPriceAsNumber(): Promise<number> {
		return parseTurkishNumber(await this.getProductPrice());
	}

	isProductImageDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(PRODUCT_LOCATORS.image);
	}

	getProductImageUrl(): Promise<string> {
		return this.act.getAttribute(PRODUCT_LOCATORS.image, 'src');
	}

	// -----------------------------------------------------------------------
	// Cart
	// -----------------------------------------------------------------------

	async addToCart(): Promise<void> {
		this.log.info('Adding product to cart');
		await this.wait.untilClickable(PRODUCT_LOCATORS.addToCartButton);
		await this.act.scrollTo(PRODUCT_LOCATORS.addToCartButton);
		await this.act.safeClick(PRODUCT_LOCATORS.addToCartButton);
		await this.wait.forAjax();
		// The button label changes once the cart has taken the item
		await sleep(this.timeouts.cartSettle);
		this.log.info('Product added to cart');
	}

	isAddToCartButtonEnabled(): Promise<boolean> {
		return this.act.isEnabled(PRODUCT_LOCATORS.addToCartButton);
	}

	isAddToCartButtonDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(PRODUCT_LOCATORS.addToCartButton);
	}

	getAddToCartButtonText(): Promise<string> {
		return this.act.safeGetText(PRODUCT_LOCATORS.addToCartButton);
	}

	async isProductAddedToCart(): Promise<boolean> {
		return (await this.getAddToCartButtonText()).includes(ADDED_TO_CART);
	}

	async isProductOutOfStock(): Promise<boolean> {
		if ((await this.getAddToCartButtonText()).includes(OUT_OF_STOCK)) return true;
		return !(await this.isAddToCartButtonEnabled());
	}

	// -----------------------------------------------------------------------
	// Navigation
	// -----------------------------------------------------------------------

	async goToCart(): Promise<CartPage> {
		this.log.info('Navigating to cart page');
		await this.driver.navigate(this.ctx.urls.cart);
		return CartPage.open(this.ctx);
	}

	/** Close this tab and go back to the results tab it was opened from */
	async closeAndReturnToSearchResults(): Promise<void> {
		this.log.info('Closing product tab and returning to search results');
		if (!(await this.closeCurrentTabAndSwitchToOriginal())) {
			this.log.warn('Could not return to the search results tab');
		}
	}
}
