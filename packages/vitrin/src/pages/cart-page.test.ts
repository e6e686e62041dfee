import { describe, expect, it } from 'vitest';
import { Storefront } from '../storefront.js';
import { FAKE_PRODUCTS, type FakeProduct, FakeStorefront } from '../testing/fake-storefront.js';
import { TEST_BASE_URL, testContext } from '../testing/fixtures.js';

function product(slug: string): FakeProduct {
	const found = FAKE_PRODUCTS.find((p) => p.slug === slug);
	if (!found) throw new Error(`No fake product ${slug}`);
	return found;
}

async function openCart(lines: Array<[slug: string, quantity: number]> = []) {
	const context = testContext();
	const store = new FakeStorefront(context.driver, TEST_BASE_URL);
	for (const [slug, quantity] of lines) store.addToCart(product(slug), quantity);
	const cart = await new Storefront(context.ctx).openCart();
	return { ...context, store, cart };
}

const LENOVO = 'lenovo/ideapad-slim-3-p-1001';
const SAMSUNG = 'samsung/galaxy-a16-p-1007';

describe('CartPage', () => {
	it('should show an empty cart', async () => {
		const { cart, sink } = await openCart();

		expect(await cart.isCartPageLoaded()).toBe(true);
		expect(await cart.isCartEmpty()).toBe(true);
		expect(await cart.getItemCount()).toBe(0);
		expect(await cart.getEmptyCartMessage()).toBe('Sepetinde ürün bulunmamaktadır.');
		expect(await cart.isCheckoutButtonDisplayed()).toBe(false);
		expect(sink.messages()).toContain('INFO  CartPage  Cart page verified: cart is empty');
	});

	it('should list the rows', async () => {
		const { cart } = await openCart([
			[LENOVO, 1],
			[SAMSUNG, 2],
		]);

		expect(await cart.isCartEmpty()).toBe(false);
		expect(await cart.getEmptyCartMessage()).toBe('');
		expect(await cart.getItemCount()).toBe(2);
		expect(await cart.getProductNameByIndex(1)).toBe('Galaxy A16 128 Gb Telefon');
		expect(await cart.getProductBrandByIndex(0)).toBe('Lenovo');
		expect(await cart.getProductPriceByIndex(1)).toBe('8.499 TL');
		expect(await cart.getProductPriceAsNumberByIndex(0)).toBe(24999);
		expect(await cart.getProductQuantityByIndex(1)).toBe(2);
	});

	it('should return empty values for a row that does not exist', async () => {
		const { cart } = await openCart([[LENOVO, 1]]);

		expect(await cart.getProductNameByIndex(3)).toBe('');
		expect(await cart.getProductQuantityByIndex(3)).toBe(0);
	});

	it('should read the totals', async () => {
		const { cart } = await openCart([
			[LENOVO, 1],
			[SAMSUNG, 2],
		]);

		expect(await cart.getSubtotal()).toBe('41.997,00 TL');
		expect(await cart.getSubtotalAsNumber()).toBe(41997);
		expect(await cart.getCartTotalAsNumber()).toBe(41997);
		expect(await cart.getCargoPrice()).toBe('Ücretsiz');
		expect(await cart.getCargoPriceAsNumber()).toBe(0);
	});

	it('should step quantities up and down', async () => {
		const { cart } = await openCart([
			[LENOVO, 1],
			[SAMSUNG, 2],
		]);

		await cart.increaseQuantityByIndex(0);
		expect(await cart.getProductQuantityByIndex(0)).toBe(2);
		await cart.decreaseQuantityByIndex(1);
		expect(await cart.getProductQuantityByIndex(1)).toBe(1);
	});

	it('should not decrease a quantity below 1', async () => {
		const { cart, store, sink } = await openCart([[LENOVO, 1]]);

		await cart.decreaseQuantityByIndex(0);
		expect(store.cart[0]?.quantity).toBe(1);
		expect(sink.messages()).toContain('WARN  CartPage  Cannot decrease quantity below 1. Current: 1');
	});

	it('should set a quantity one step at a time', async () => {
		const { cart, store } = await openCart([[LENOVO, 4]]);

		await cart.setQuantityByIndex(0, 2);
		expect(await cart.getProductQuantityByIndex(0)).toBe(2);
		await cart.setQuantityByIndex(0, 5);
		expect(store.cart[0]?.quantity).toBe(5);
	});

	it('should remove rows', async () => {
		const { cart } = await openCart([
			[LENOVO, 1],
			[SAMSUNG, 2],
		]);

		await cart.removeFirstProduct();
		expect(await cart.getItemCount()).toBe(1);
		expect(await cart.getProductBrandByIndex(0)).toBe('Samsung');

		await cart.removeAllProducts();
		expect(await cart.isCartEmpty()).toBe(true);
	});

	it('should reject an action on a row that does not exist', async () => {
		const { cart } = await openCart([[LENOVO, 1]]);
		await expect(cart.increaseQuantityByIndex(5)).rejects.toThrow(new RangeError('Product index out of bounds: 5'));
	});

	it('should proceed to checkout', async () => {
		const { cart, driver } = await openCart([[LENOVO, 1]]);

		expect(await cart.isCheckoutButtonEnabled()).toBe(true);
		await cart.proceedToCheckout();
		expect(await driver.getCurrentUrl()).toBe('https://shop.test/odeme');
	});
});
