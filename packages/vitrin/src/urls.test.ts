import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMEOUTS, resolveTimeouts } from './timeouts.js';
import { createSiteUrls } from './urls.js';

describe('createSiteUrls', () => {
	it('should build absolute addresses from the base URL', () => {
		const urls = createSiteUrls('https://www.trendyol.com/');
		expect(urls.base).toBe('https://www.trendyol.com/');
		expect(urls.cart).toBe('https://www.trendyol.com/sepet');
		expect(urls.login).toBe('https://www.trendyol.com/giris');
		expect(urls.myFavorites).toBe('https://www.trendyol.com/Hesabim/Favoriler');
		expect(urls.categories.electronics).toBe('https://www.trendyol.com/butik/liste/5/elektronik');
	});

	it('should add a missing trailing slash', () => {
		expect(createSiteUrls('https://shop.test').cart).toBe('https://shop.test/sepet');
	});

	it('should build search URLs with spaces escaped', () => {
		const urls = createSiteUrls('https://shop.test/');
		expect(urls.search('laptop')).toBe('https://shop.test/sr?q=laptop');
		expect(urls.search('kadın çanta')).toBe('https://shop.test/sr?q=kadın%20çanta');
	});

	it('should build product URLs from a path with or without a leading slash', () => {
		const urls = createSiteUrls('https://shop.test/');
		expect(urls.product('apple/macbook-air-p-1')).toBe('https://shop.test/apple/macbook-air-p-1');
		expect(urls.product('/apple/macbook-air-p-1')).toBe('https://shop.test/apple/macbook-air-p-1');
	});
});

describe('resolveTimeouts', () => {
	it('should fill in defaults around overrides', () => {
		const timeouts = resolveTimeouts({ pageLoad: 1_000 });
		expect(timeouts.pageLoad).toBe(1_000);
		expect(timeouts.elementVisible).toBe(DEFAULT_TIMEOUTS.elementVisible);
		expect(resolveTimeouts()).toEqual(DEFAULT_TIMEOUTS);
	});
});
