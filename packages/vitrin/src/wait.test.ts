import { describe, expect, it } from 'vitest';
import { DriverError, ElementNotActionableError, ElementNotFoundError, TimeoutError } from './errors.js';
import { FakeElement } from './testing/fake-driver.js';
import { testContext } from './testing/fixtures.js';
import { waitFor } from './wait.js';

describe('waitFor', () => {
	it('should return the first value that is not null or false', async () => {
		let calls = 0;
		const value = await waitFor(
			'third call',
			async () => {
				calls++;
				return calls === 3 ? 'ready' : null;
			},
			{ timeout: 1_000, interval: 1 },
		);
		expect(value).toBe('ready');
		expect(calls).toBe(3);
	});

	it('should run the condition once even with a zero timeout', async () => {
		let calls = 0;
		const value = await waitFor(
			'immediate',
			async () => {
				calls++;
				return 42;
			},
			{ timeout: 0 },
		);
		expect(value).toBe(42);
		expect(calls).toBe(1);
	});

	it('should time out with the last error in the message', async () => {
		const wait = waitFor(
			'the basket',
			async () => {
				throw new Error('basket not rendered');
			},
			{ timeout: 20, interval: 5 },
		);
		await expect(wait).rejects.toBeInstanceOf(TimeoutError);
		await expect(wait).rejects.toThrow(/Could not wait for 'the basket'\n— timed out\. Last error: basket not rendered/);
	});

	it('should propagate errors the rethrow filter selects', async () => {
		const fatal = new DriverError('invalid selector', 'bad css');
		const wait = waitFor(
			'anything',
			async () => {
				throw fatal;
			},
			{ timeout: 1_000, interval: 1, rethrow: (err) => err === fatal },
		);
		await expect(wait).rejects.toBe(fatal);
	});
});

describe('Waiter', () => {
	it('should return an element once it is displayed', async () => {
		const { driver, ctx } = testContext();
		const card = driver.dom.add('a.product-card', { displayed: false });
		setTimeout(() => {
			card.displayed = true;
		}, 10);

		expect(await ctx.wait.untilVisible('a.product-card')).toBe(card);
	});

	it('should report a missing element as not found', async () => {
		const { ctx } = testContext();
		const wait = ctx.wait.untilVisible('.nowhere');
		await expect(wait).rejects.toBeInstanceOf(ElementNotFoundError);
		await expect(wait).rejects.toThrow("Could not wait for visibility of '.nowhere'");
	});

	it('should report a hidden element as not visible', async () => {
		const { driver, ctx } = testContext();
		driver.dom.add('.modal', { displayed: false });

		const error = await ctx.wait.untilVisible('.modal').catch((err: unknown) => err);
		expect(error).toBeInstanceOf(ElementNotActionableError);
		if (!(error instanceof ElementNotActionableError)) return;
		expect(error.reason).toBe('not-visible');
		expect(error.elementState).toEqual({ found: true, visible: false });
	});

	it('should report a disabled element as not clickable', async () => {
		const { driver, ctx } = testContext();
		driver.dom.add('button.checkout', { enabled: false });

		const error = await ctx.wait.untilClickable('button.checkout').catch((err: unknown) => err);
		expect(error).toBeInstanceOf(ElementNotActionableError);
		if (!(error instanceof ElementNotActionableError)) return;
		expect(error.reason).toBe('disabled');
		expect(error.elementState).toEqual({ found: true, visible: true, enabled: false });
	});

	it('should show the text of a disabled element', async () => {
		const { driver, ctx } = testContext();
		driver.dom.add('button.add-to-basket', { enabled: false, text: 'Tükendi' });

		const error = await ctx.wait.untilClickable('button.add-to-basket').catch((err: unknown) => err);
		expect(error).toBeInstanceOf(ElementNotActionableError);
		if (!(error instanceof ElementNotActionableError)) return;
		expect(error.elementState).toEqual({ found: true, visible: true, enabled: false, textPreview: 'Tükendi' });
		expect(error.message).toContain('  Text: "Tükendi"');
	});

	it('should report a match that keeps going stale as detached', async () => {
		const { driver, ctx } = testContext();
		const button = driver.dom.add('button.checkout', {});
		button.stale = true;

		const error = await ctx.wait.untilClickable('button.checkout').catch((err: unknown) => err);
		expect(error).toBeInstanceOf(ElementNotActionableError);
		if (!(error instanceof ElementNotActionableError)) return;
		expect(error.reason).toBe('detached');
		expect(error.message).toContain('the element was found but is no longer attached to the DOM.');
	});

	it('should give up at once on a stale element handle', async () => {
		const { ctx } = testContext({ timeouts: { elementClickable: 10_000 } });
		const element = new FakeElement();
		element.stale = true;

		const started = Date.now();
		await expect(ctx.wait.untilClickable(element)).rejects.toThrow('[stale element reference]');
		expect(Date.now() - started).toBeLessThan(5_000);
	});

	it('should re-query a locator whose element went stale', async () => {
		const { driver, ctx } = testContext();
		const old = new FakeElement();
		old.stale = true;
		driver.dom.set('.price', [old]);
		const fresh = new FakeElement({ text: '899 TL' });
		setTimeout(() => driver.dom.set('.price', [fresh]), 10);

		expect(await ctx.wait.untilVisible('.price')).toBe(fresh);
	});

	it('should find a present element whether or not it is displayed', async () => {
		const { driver, ctx } = testContext();
		const hidden = driver.dom.add('input.hidden', { displayed: false });
		expect(await ctx.wait.untilPresent('input.hidden')).toBe(hidden);
		await expect(ctx.wait.untilPresent('input.absent')).rejects.toBeInstanceOf(ElementNotFoundError);
	});

	it('should wait for every match to be displayed', async () => {
		const { driver, ctx } = testContext();
		const first = driver.dom.add('.row');
		const second = driver.dom.add('.row', { displayed: false });
		setTimeout(() => {
			second.displayed = true;
		}, 10);

		expect(await ctx.wait.untilAllVisible('.row')).toEqual([first, second]);
	});

	it('should resolve true once an element disappears', async () => {
		const { driver, ctx } = testContext();
		driver.dom.add('.gender-modal-section');
		setTimeout(() => driver.dom.remove('.gender-modal-section'), 10);

		expect(await ctx.wait.untilInvisible('.gender-modal-section')).toBe(true);
	});

	it('should resolve false and warn when an element stays visible', async () => {
		const { driver, ctx, sink } = testContext();
		driver.dom.add('.gender-modal-section');

		expect(await ctx.wait.untilInvisible('.gender-modal-section')).toBe(false);
		expect(sink.messages()).toContain('WARN  Wait  Element still visible after 50ms: .gender-modal-section');
	});

	it('should tell whether text appeared in time', async () => {
		const { driver, ctx } = testContext();
		const button = driver.dom.add('button.add', { text: 'Sepete Ekle' });
		setTimeout(() => {
			button.text = 'Sepete Eklendi';
		}, 10);

		expect(await ctx.wait.untilTextPresent('button.add', 'Eklendi')).toBe(true);
		expect(await ctx.wait.untilTextPresent('button.add', 'Tükendi')).toBe(false);
	});

	it('should not throw when the page never finishes loading', async () => {
		const { driver, ctx, sink } = testContext();
		driver.window().readyState = 'loading';

		await ctx.wait.forPageLoad();
		expect(sink.messages()).toContain('WARN  Wait  Page did not finish loading within 50ms');
	});

	it('should wait for AJAX to go idle', async () => {
		const { driver, ctx, sink } = testContext();
		const window = driver.window();
		window.ajaxIdle = false;
		setTimeout(() => {
			window.ajaxIdle = true;
		}, 10);

		await ctx.wait.forAjax();
		expect(sink.messages().some((line) => line.includes('AJAX'))).toBe(false);
	});

	it('should skip the AJAX check when the page rejects the script', async () => {
		const { driver, ctx, sink } = testContext();
		driver.ajaxError = new DriverError('javascript error', 'jQuery is broken');

		await ctx.wait.forAjax();
		expect(sink.messages()).toContain('DEBUG Wait  AJAX check skipped: [javascript error] jQuery is broken');
	});

	it('should log and rethrow when a custom condition is not met', async () => {
		const { ctx, sink } = testContext();
		await expect(ctx.wait.until('three tabs', async () => false)).rejects.toBeInstanceOf(TimeoutError);
		expect(sink.messages().some((line) => line.startsWith('ERROR Wait  Condition not met: three tabs: '))).toBe(true);
	});

	it('should stop a fluent wait on errors other than missing or stale elements', async () => {
		const { ctx } = testContext();
		const fatal = new DriverError('no such window', 'gone');
		let calls = 0;
		const wait = ctx.wait.fluent('window', async () => {
			calls++;
			if (calls === 1) throw new DriverError('no such element', 'not yet');
			throw fatal;
		});
		await expect(wait).rejects.toBe(fatal);
		expect(calls).toBe(2);
	});
});
