import type { DriverElement } from 'vitrin-driver';
import type { PageContext } from '../context.js';
import type { Locator } from '../locator.js';
import { parseTurkishNumber } from '../turkish-text.js';
import { sleep } from '../wait.js';
import { BasePage } from './base-page.js';

export const CART_LOCATORS = {
	items: '.merchant-item-container',
	productNames: '.product-name',
	productBrands: '.product-brand-name',
	productPrices: '.basket-product-price-text',
	quantityInputs: "input[data-testid='quantity-selector']",
	increaseButtons: "button[data-testid='quantity-button-increment']",
	decreaseButtons: "button[data-testid='quantity-button-decrement']",
	removeButtons: '.remove-item-container',
	total: '.order-total .price',
	subtotal: "[data-testid='basket-summary-subtotal-value']",
	cargo: "[data-testid='basket-summary-cargo-value']",
	checkoutButton: "button[data-testid='checkout-button']",
	emptyMessage: '.empty-basket-container p',
} as const satisfies Record<string, Locator>;

/**
 * The basket. Rows are addressed by their 0-based position; removing a row
 * shifts the ones after it up.
 */
export class CartPage extends BasePage {
	private constructor(ctx: PageContext) {
		super(ctx, 'CartPage');
	}

	static async open(ctx: PageContext): Promise<CartPage> {
		const page = new CartPage(ctx);
		await page.wait.forPageLoad();
		await page.wait.forAjax();
		await sleep(page.timeouts.cartSettle);
		await page.verify();
		return page;
	}

	private async verify(): Promise<void> {
		this.log.info('Verifying cart page');
		await this.expectUrlContains('/sepet');
		const items = await this.act.count(CART_LOCATORS.items);
		if (items > 0) this.log.info(`Cart page verified: ${items} items in cart`);
		else if (await this.act.isDisplayed(CART_LOCATORS.emptyMessage)) this.log.info('Cart page verified: cart is empty');
		else this.log.warn('Cart page state unclear');
	}

	async isCartPageLoaded(): Promise<boolean> {
		try {
			return (await this.getCurrentUrl()).includes('/sepet');
		} catch {
			return false;
		}
	}

	// -----------------------------------------------------------------------
	// State
	// -----------------------------------------------------------------------

	/** No rows, or the empty-basket message. Assumes empty when unsure. */
	async isCartEmpty(): Promise<boolean> {
		try {
			const items = await this.act.findAll(CART_LOCATORS.items);
			return items.length === 0 || (await this.act.isDisplayed(CART_LOCATORS.emptyMessage));
		} catch (err) {
			this.log.error('Could not tell whether the cart is empty', err);
			return true;
		}
	}

	async getItemCount(): Promise<number> {
		const count = await this.act.count(CART_LOCATORS.items);
		this.log.info(`Cart item count: ${count}`);
		return count;
	}

	async getEmptyCartMessage(): Promise<string> {
		if (!(await this.act.isDisplayed(CART_LOCATORS.emptyMessage))) return '';
		return this.act.safeGetText(CART_LOCATORS.emptyMessage);
	}

	// -----------------------------------------------------------------------
	// Rows. '' or 0 for an index with no row.
	// -----------------------------------------------------------------------

	getProductNameByIndex(index: number): Promise<string> {
		return this.textAt(CART_LOCATORS.productNames, index);
	}

	getProductBrandByIndex(index: number): Promise<string> {
		return this.textAt(CART_LOCATORS.productBrands, index);
	}

	getProductPriceByIndex(index: number): Promise<string> {
		return this.textAt(CART_LOCATORS.productPrices, index);
	}

	async getProductPriceAsNumberByIndex(index: number): Promise<number> {
		return parseTurkishNumber(await this.getProductPriceByIndex(index));
	}

	async getProductQuantityByIndex(index: number): Promise<number> {
		try {
			const input = await this.nth(CART_LOCATORS.quantityInputs, index);
			if (!input) return 0;
			const quantity = Number.parseInt(await this.act.getAttribute(input, 'value'), 10);
			return Number.isNaN(quantity) ? 0 : quantity;
		} catch (err) {
			this.log.error(`Could not read the quantity at index: ${index}`, err);
			return 0;
		}
	}

	// -----------------------------------------------------------------------
	// Quantity
	// -----------------------------------------------------------------------

	async increaseQuantityByIndex(index: number): Promise<void> {
		this.log.info(`Increasing quantity for product at index: ${index}`);
		const button = await this.requireNth(CART_LOCATORS.increaseButtons, index);
		const before = await this.getProductQuantityByIndex(index);
		await this.act.safeClick(button);
		await this.afterCartUpdate(this.timeouts.cartSettle);
		this.log.info(`Quantity increased from ${before} to ${await this.getProductQuantityByIndex(index)}`);
	}

	/** Never goes below 1; use removeProductByIndex for that */
	async decreaseQuantityByIndex(index: number): Promise<void> {
		this.log.info(`Decreasing quantity for product at index: ${index}`);
		const button = await this.requireNth(CART_LOCATORS.decreaseButtons, index);
		const before = await this.getProductQuantityByIndex(index);
		if (before <= 1) {
			this.log.warn(`Cannot decrease quantity below 1. Current: ${before}`);
			return;
		}
		await this.act.safeClick(button);
		await this.afterCartUpdate(this.timeouts.cartSettle);
		this.log.info(`Quantity decreased from ${before} to ${await this.getProductQuantityByIndex(index)}`);
	}

	/** Step the quantity one click at a time until it reaches `target` */
	async setQuantityByIndex(index: number, target: number): Promise<void> {
		this.log.info(`Setting quantity to ${target} for product at index: ${index}`);
		const current = await this.getProductQuantityByIndex(index);
		if (current === target) {
			this.log.info(`Quantity already at target: ${target}`);
			return;
		}
		const step = current < target ? () => this.increaseQuantityByIndex(index) : () => this.decreaseQuantityByIndex(index);
		for (let i = 0; i < Math.abs(target - current); i++) {
			await step();
		}
	}

	// -----------------------------------------------------------------------
	// Removal
	// -----------------------------------------------------------------------

	async removeProductByIndex(index: number): Promise<void> {
		this.log.info(`Removing product from cart at index: ${index}`);
		const button = await this.requireNth(CART_LOCATORS.removeButtons, index);
		await this.act.safeClick(button);
		await this.afterCartUpdate(this.timeouts.removeSettle);
		this.log.info(`Product removed from cart at index: ${index}`);
	}

	removeFirstProduct(): Promise<void> {
		return this.removeProductByIndex(0);
	}

	async removeAllProducts(): Promise<void> {
		const count = await this.getItemCount();
		this.log.info(`Removing all ${count} products from cart`);
		for (let i = 0; i < count; i++) {
			await this.removeProductByIndex(0);
		}
	}

	// -----------------------------------------------------------------------
	// Totals
	// -----------------------------------------------------------------------

	getSubtotal(): Promise<string> {
		return this.act.safeGetText(CART_LOCATORS.subtotal);
	}

	async getSubtotalAsNumber(): Promise<number> {
		return parseTurkishNumber(await this.getSubtotal());
	}

	getCargoPrice(): Promise<string> {
		return this.act.safeGetText(CART_LOCATORS.cargo);
	}

	async getCargoPriceAsNumber(): Promise<number> {
		return parseTurkishNumber(await this.getCargoPrice());
	}

	async getCartTotal(): Promise<string> {
		const total = await this.act.safeGetText(CART_LOCATORS.total);
		this.log.info(`Cart total: '${total}'`);
		return total;
	}

	async getCartTotalAsNumber(): Promise<number> {
		return parseTurkishNumber(await this.getCartTotal());
	}

	// -----------------------------------------------------------------------
	// Checkout
	// -----------------------------------------------------------------------

	async proceedToCheckout(): Promise<void> {
		this.log.info('Proceeding to checkout');
		await this.wait.untilClickable(CART_LOCATORS.checkoutButton);
		await this.act.safeClick(CART_LOCATORS.checkoutButton);
		await this.wait.forPageLoad();
	}

	isCheckoutButtonEnabled(): Promise<boolean> {
		return this.act.isEnabled(CART_LOCATORS.checkoutButton);
	}

	isCheckoutButtonDisplayed(): Promise<boolean> {
		return this.act.isDisplayed(CART_LOCATORS.checkoutButton);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async nth(locator: Locator, index: number): Promise<DriverElement | null> {
		const elements = await this.act.findAll(locator);
		const element = index >= 0 ? elements[index] : undefined;
		if (element === undefined) {
			this.log.error(`Invalid product index: ${index}`);
			return null;
		}
		return element;
	}

	private async requireNth(locator: Locator, index: number): Promise<DriverElement> {
		const element = await this.nth(locator, index);
		if (!element) throw new RangeError(`Product index out of bounds: ${index}`);
		return element;
	}

	private async textAt(locator: Locator, index: number): Promise<string> {
		try {
			const element = await this.nth(locator, index);
			return element ? await this.act.safeGetText(element) : '';
		} catch (err) {
			this.log.error(`Could not read row ${index}`, err);
			return '';
		}
	}

	private async afterCartUpdate(settle: number): Promise<void> {
		await this.wait.forAjax();
		await sleep(settle);
	}
}
