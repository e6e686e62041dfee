// ============================================================================
// Vitrin - In-memory driver for unit tests
// A tiny DOM: each window keeps a map from selector text to the elements it
// matches. Page scripts are recognised by their exact source and simulated.
//
//   const driver = new FakeDriver();
//   driver.dom.set('a.product-card', [new FakeElement({ text: 'Laptop' })]);
// ============================================================================

import { type BrowserDriver, DriverError, type DriverElement, type ScriptArg, type Selector } from 'vitrin-driver';
import type { Locator } from '../locator.js';
import {
	AJAX_IDLE,
	CLICK,
	READY_STATE,
	SCROLL_INTO_VIEW,
	SCROLL_TO_BOTTOM,
	SCROLL_TO_TOP,
	SELECT_BY_INDEX,
	SELECT_BY_TEXT,
	SELECT_BY_VALUE,
} from '../scripts.js';

export interface FakeOption {
	text: string;
	value: string;
}

export interface FakeElementInit {
	text?: string;
	/** textContent when it differs from the rendered text */
	textContent?: string;
	attributes?: Record<string, string>;
	displayed?: boolean;
	enabled?: boolean;
	selected?: boolean;
	/** Options of a <select> */
	options?: FakeOption[];
	/** Descendants, by selector text */
	children?: Record<string, FakeElement[]>;
	/** Runs on every successful click, real or scripted */
	onClick?: (element: FakeElement) => void | Promise<void>;
}

function selectorKey(selector: Locator): string {
	if (typeof selector === 'string') return selector;
	return 'css' in selector ? selector.css : selector.xpath;
}

export class FakeElement implements DriverElement {
	text: string;
	textContent: string | undefined;
	displayed: boolean;
	enabled: boolean;
	selected: boolean;
	readonly attributes: Map<string, string>;
	readonly options: FakeOption[];
	selectedIndex = -1;
	onClick: ((element: FakeElement) => void | Promise<void>) | undefined;

	/** Every call fails as stale once set */
	stale = false;
	/** How many upcoming clicks an overlay swallows */
	interceptClicks = 0;

	clicks = 0;
	scriptClicks = 0;
	doubleClicks = 0;
	contextClicks = 0;
	hovers = 0;
	scrolledIntoView = 0;

	private readonly children = new Map<string, FakeElement[]>();

	constructor(init: FakeElementInit = {}) {
		this.text = init.text ?? '';
		this.textContent = init.textContent;
		this.displayed = init.displayed ?? true;
		this.enabled = init.enabled ?? true;
		this.selected = init.selected ?? false;
		this.attributes = new Map(Object.entries(init.attributes ?? {}));
		this.options = init.options ?? [];
		this.onClick = init.onClick;
		for (const [key, elements] of Object.entries(init.children ?? {})) {
			this.children.set(key, elements);
		}
	}

	/** Current value of an input */
	get value(): string {
		return this.attributes.get('value') ?? '';
	}

	async click(): Promise<void> {
		this.ensureAttached();
		if (this.interceptClicks > 0) {
			this.interceptClicks--;
			throw new DriverError('element click intercepted', 'Other element would receive the click');
		}
		this.clicks++;
		await this.onClick?.(this);
	}

	/** What a script click does: no hit-testing, so overlays do not matter */
	async scriptClick(): Promise<void> {
		this.ensureAttached();
		this.scriptClicks++;
		await this.onClick?.(this);
	}

	async doubleClick(): Promise<void> {
		this.ensureAttached();
		this.doubleClicks++;
	}

	async contextClick(): Promise<void> {
		this.ensureAttached();
		this.contextClicks++;
	}

	async hover(): Promise<void> {
		this.ensureAttached();
		this.hovers++;
	}

	async clear(): Promise<void> {
		this.ensureAttached();
		this.attributes.set('value', '');
	}

	async sendKeys(text: string): Promise<void> {
		this.ensureAttached();
		this.attributes.set('value', this.value + text);
	}

	async getText(): Promise<string> {
		this.ensureAttached();
		return this.displayed ? this.text : '';
	}

	async getProperty(name: string): Promise<string | null> {
		this.ensureAttached();
		if (name === 'textContent') return this.textContent ?? this.text;
		if (name === 'value') return this.value;
		return null;
	}

	async getAttribute(name: string): Promise<string | null> {
		this.ensureAttached();
		return this.attributes.get(name) ?? null;
	}

	async isDisplayed(): Promise<boolean> {
		this.ensureAttached();
		return this.displayed;
	}

	async isEnabled(): Promise<boolean> {
		this.ensureAttached();
		return this.enabled;
	}

	async isSelected(): Promise<boolean> {
		this.ensureAttached();
		return this.selected;
	}

	async findElements(selector: Selector): Promise<DriverElement[]> {
		this.ensureAttached();
		return [...(this.children.get(selectorKey(selector)) ?? [])];
	}

	/** Pick the first option `matches` accepts; false when none does */
	select(matches: (option: FakeOption, index: number) => boolean): boolean {
		this.ensureAttached();
		const index = this.options.findIndex(matches);
		if (index < 0) return false;
		this.selectedIndex = index;
		return true;
	}

	private ensureAttached(): void {
		if (this.stale) {
			throw new DriverError('stale element reference', 'element is not attached to the page document');
		}
	}
}

/** The elements one window shows */
export class FakeDom {
	private readonly elements = new Map<string, FakeElement[]>();

	set(locator: Locator, elements: FakeElement[]): this {
		this.elements.set(selectorKey(locator), elements);
		return this;
	}

	/** Add one element and return it */
	add(locator: Locator, init: FakeElementInit = {}): FakeElement {
		const element = new FakeElement(init);
		const key = selectorKey(locator);
		this.elements.set(key, [...(this.elements.get(key) ?? []), element]);
		return element;
	}

	get(locator: Locator): FakeElement[] {
		return this.elements.get(selectorKey(locator)) ?? [];
	}

	/** Detach the matches; handles to them go stale */
	remove(locator: Locator): void {
		const key = selectorKey(locator);
		for (const element of this.elements.get(key) ?? []) element.stale = true;
		this.elements.delete(key);
	}

	/** Detach everything, as a page load does */
	clear(): void {
		for (const elements of this.elements.values()) {
			for (const element of elements) element.stale = true;
		}
		this.elements.clear();
	}
}

export interface FakeWindow {
	readonly handle: string;
	url: string;
	title: string;
	readyState: string;
	ajaxIdle: boolean;
	readonly dom: FakeDom;
	/** Called once per scroll to the bottom, to load more content */
	onScrollToBottom?: (window: FakeWindow) => void;
}

/**
 * In-memory BrowserDriver. Windows are opened with {@link openWindow};
 * `navigate` hands the new URL to {@link onNavigate} so a test can lay out
 * the page it expects.
 */
export class FakeDriver implements BrowserDriver {
	readonly windows: FakeWindow[] = [];
	private current: string;
	private nextHandle = 1;
	private readonly history: string[] = [];
	private historyIndex = -1;

	/** Every URL navigated to, in order */
	readonly navigations: string[] = [];
	refreshes = 0;
	quits = 0;
	scrollsToBottom = 0;
	scrollsToTop = 0;
	screenshotData: Buffer = Buffer.from('fake-png');
	/** Thrown by screenshot() when set */
	screenshotError: Error | undefined;
	/** Thrown by executeScript(AJAX_IDLE) when set */
	ajaxError: Error | undefined;
	/** Thrown by quit() when set */
	quitError: Error | undefined;
	onNavigate: ((url: string, window: FakeWindow) => void) | undefined;

	constructor(url = 'about:blank') {
		this.current = this.openWindow(url).handle;
	}

	/** The current window's DOM */
	get dom(): FakeDom {
		return this.window().dom;
	}

	/** The current window; throws when it has been closed */
	window(): FakeWindow {
		const window = this.windows.find((w) => w.handle === this.current);
		if (!window) throw new DriverError('no such window', `window ${this.current} was closed`);
		return window;
	}

	/** Open a window without switching to it, as a link with target=_blank does */
	openWindow(url: string, title = ''): FakeWindow {
		const window: FakeWindow = {
			handle: `window-${this.nextHandle++}`,
			url,
			title,
			readyState: 'complete',
			ajaxIdle: true,
			dom: new FakeDom(),
		};
		this.windows.push(window);
		return window;
	}

	async navigate(url: string): Promise<void> {
		const window = this.window();
		this.navigations.push(url);
		this.history.splice(this.historyIndex + 1);
		this.history.push(url);
		this.historyIndex = this.history.length - 1;
		this.load(window, url);
	}

	async getCurrentUrl(): Promise<string> {
		return this.window().url;
	}

	async getTitle(): Promise<string> {
		return this.window().title;
	}

	async refresh(): Promise<void> {
		this.window();
		this.refreshes++;
	}

	async back(): Promise<void> {
		const window = this.window();
		const url = this.history[this.historyIndex - 1];
		if (url === undefined) return;
		this.historyIndex--;
		this.load(window, url);
	}

	async forward(): Promise<void> {
		const window = this.window();
		const url = this.history[this.historyIndex + 1];
		if (url === undefined) return;
		this.historyIndex++;
		this.load(window, url);
	}

	async findElements(selector: Selector): Promise<DriverElement[]> {
		return [...this.window().dom.get(selector)];
	}

	async executeScript(functionDeclaration: string, ...args: ScriptArg[]): Promise<unknown> {
		const window = this.window();
		const [first, second] = args;

		switch (functionDeclaration) {
			case READY_STATE:
				return window.readyState;
			case AJAX_IDLE:
				if (this.ajaxError) throw this.ajaxError;
				return window.ajaxIdle;
			case SCROLL_TO_BOTTOM:
				this.scrollsToBottom++;
				window.onScrollToBottom?.(window);
				return null;
			case SCROLL_TO_TOP:
				this.scrollsToTop++;
				return null;
			case CLICK:
				await fakeElement(first).scriptClick();
				return null;
			case SCROLL_INTO_VIEW:
				fakeElement(first).scrolledIntoView++;
				return null;
			case SELECT_BY_TEXT:
				return fakeElement(first).select((o) => o.text.trim() === second);
			case SELECT_BY_VALUE:
				return fakeElement(first).select((o) => o.value === second);
			case SELECT_BY_INDEX:
				return fakeElement(first).select((_, i) => i === second);
			default:
				throw new DriverError('javascript error', 'script not supported by the fake driver');
		}
	}

	async getWindowHandles(): Promise<string[]> {
		return this.windows.map((w) => w.handle);
	}

	async getWindowHandle(): Promise<string> {
		return this.window().handle;
	}

	async switchToWindow(handle: string): Promise<void> {
		if (!this.windows.some((w) => w.handle === handle)) {
			throw new DriverError('no such window', `no window with handle ${handle}`);
		}
		this.current = handle;
	}

	async closeWindow(): Promise<void> {
		const index = this.windows.findIndex((w) => w.handle === this.current);
		if (index < 0) throw new DriverError('no such window', `window ${this.current} was closed`);
		this.windows.splice(index, 1);
	}

	async screenshot(): Promise<Buffer> {
		if (this.screenshotError) throw this.screenshotError;
		return this.screenshotData;
	}

	async quit(): Promise<void> {
		this.quits++;
		if (this.quitError) throw this.quitError;
	}

	private load(window: FakeWindow, url: string): void {
		window.url = url;
		window.onScrollToBottom = undefined;
		window.dom.clear();
		this.onNavigate?.(url, window);
	}
}

function fakeElement(arg: ScriptArg | undefined): FakeElement {
	if (arg instanceof FakeElement) return arg;
	throw new DriverError('javascript error', 'expected an element argument');
}
