import { describe, expect, it } from 'vitest';
import { POPUP_LOCATORS } from './popups.js';
import type { FakeDriver } from './testing/fake-driver.js';
import { testContext } from './testing/fixtures.js';

function showGenderPopup(driver: FakeDriver) {
	driver.dom.add(POPUP_LOCATORS.genderPopup);
	return driver.dom.add(POPUP_LOCATORS.genderPopupClose, {
		onClick: () => driver.dom.remove(POPUP_LOCATORS.genderPopup),
	});
}

function showCookieBanner(driver: FakeDriver) {
	driver.dom.add(POPUP_LOCATORS.cookieBanner);
	const hide = () => driver.dom.remove(POPUP_LOCATORS.cookieBanner);
	return {
		accept: driver.dom.add(POPUP_LOCATORS.acceptCookies, { onClick: hide }),
		reject: driver.dom.add(POPUP_LOCATORS.rejectCookies, { onClick: hide }),
	};
}

describe('PopupManager', () => {
	it('should close the gender popup', async () => {
		const { driver, ctx, sink } = testContext();
		const close = showGenderPopup(driver);

		await ctx.popups.closeGenderPopup();
		expect(close.clicks).toBe(1);
		expect(driver.dom.get(POPUP_LOCATORS.genderPopup)).toEqual([]);
		expect(sink.messages()).toContain('INFO  Popups  Gender popup closed');
	});

	it('should carry on when there is no gender popup', async () => {
		const { ctx, sink } = testContext();
		await ctx.popups.closeGenderPopup();
		expect(sink.messages()).toContain('DEBUG Popups  No gender popup');
	});

	it('should not fail when the popup has no close button', async () => {
		const { driver, ctx, sink } = testContext();
		driver.dom.add(POPUP_LOCATORS.genderPopup);

		await ctx.popups.closeGenderPopup();
		expect(sink.messages().some((line) => line.startsWith('WARN  Popups  Could not close the gender popup: '))).toBe(true);
	});

	it('should accept cookies', async () => {
		const { driver, ctx, sink } = testContext();
		const { accept, reject } = showCookieBanner(driver);

		await ctx.popups.acceptCookies();
		expect(accept.clicks).toBe(1);
		expect(reject.clicks).toBe(0);
		expect(sink.messages()).toContain('INFO  Popups  Cookies accepted');
	});

	it('should reject cookies', async () => {
		const { driver, ctx, sink } = testContext();
		const { accept, reject } = showCookieBanner(driver);

		await ctx.popups.rejectCookies();
		expect(reject.clicks).toBe(1);
		expect(accept.clicks).toBe(0);
		expect(sink.messages()).toContain('INFO  Popups  Cookies rejected');
	});

	it('should carry on when there is no cookie banner', async () => {
		const { ctx, sink } = testContext();
		await ctx.popups.acceptCookies();
		expect(sink.messages()).toContain('DEBUG Popups  No cookie banner');
	});

	it('should handle the gender popup, then the cookie banner', async () => {
		const { driver, ctx } = testContext();
		const close = showGenderPopup(driver);
		const { accept } = showCookieBanner(driver);

		await ctx.popups.handleAll();
		expect(close.clicks).toBe(1);
		expect(accept.clicks).toBe(1);
		expect(driver.dom.get(POPUP_LOCATORS.cookieBanner)).toEqual([]);
	});
});
