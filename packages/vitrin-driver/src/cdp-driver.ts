// ============================================================================
// Vitrin Driver - DevTools Protocol driver
// BrowserDriver over one browser-level WebSocket. Each driver owns an
// isolated browser context (own cookies and storage) and tracks the tabs
// opened inside it as window handles.
// ============================================================================

import {
	ATTRIBUTE,
	CLEAR,
	FOCUS_END,
	IS_DISPLAYED,
	IS_ENABLED,
	IS_SELECTED,
	POINTER_TARGET,
	PROPERTY,
	QUERY_ALL,
	STALE_MARKER,
	TEXT,
} from './element-scripts.js';
import { type LaunchOptions, type LaunchResult, launchBrowser } from './launcher.js';
import {
	type CdpEvent,
	type RemoteObject,
	isRecord,
	readExceptionDetails,
	readNumber,
	readRecord,
	readRemoteObject,
	readString,
} from './protocol.js';
import { type CdpChannel, ProtocolError, Transport, type TransportOptions } from './transport.js';
import {
	type BrowserDriver,
	type DriverElement,
	DriverError,
	type ScriptArg,
	type Selector,
	isDriverError,
} from './types.js';
import { formatTrace } from './utils.js';

/** Per-driver settings */
export interface CdpDriverOptions {
	/** Max time navigate/refresh/back/forward wait for the page (default: 30000) */
	pageLoadTimeout?: number;
	/** Size of tabs the driver opens itself; the browser default when omitted */
	windowSize?: { width: number; height: number };
}

/** Options for CdpBrowser.launch */
export interface BrowserLaunchOptions extends LaunchOptions, CdpDriverOptions {
	/** Print every protocol frame, with secrets redacted */
	debug?: boolean;
	/** Transport options (timeouts, debugging hooks) */
	transport?: TransportOptions;
}

type MouseButton = 'left' | 'right';

const STALE_PROTOCOL_MESSAGES = [
	'Could not find object with given id',
	'Cannot find context with specified id',
	'Session with given id not found',
	'Execution context was destroyed',
];

const MISSING_WINDOW_MESSAGES = ['No target with given id', 'No session with given id'];

/**
 * A launched browser. Hands out isolated drivers, one per test.
 *
 * ```ts
 * const browser = await CdpBrowser.launch({ browser: 'chrome', headless: true });
 * const driver = await browser.newDriver();
 * await driver.navigate('https://www.trendyol.com/');
 * await driver.quit();
 * await browser.close();
 * ```
 */
export class CdpBrowser {
	private constructor(
		private readonly transport: Transport,
		private readonly launchResult: LaunchResult | null,
		private readonly driverOptions: CdpDriverOptions,
	) {}

	static async launch(options: BrowserLaunchOptions = {}): Promise<CdpBrowser> {
		const launchResult = await launchBrowser(options);
		try {
			return await CdpBrowser.attach(launchResult.wsEndpoint, options, launchResult);
		} catch (err) {
			await launchResult.close();
			throw err;
		}
	}

	/** Connect to an already-running browser, e.g. one started by a CI service */
	static async connect(wsEndpoint: string, options: BrowserLaunchOptions = {}): Promise<CdpBrowser> {
		return CdpBrowser.attach(wsEndpoint, options, null);
	}

	private static async attach(
		wsEndpoint: string,
		options: BrowserLaunchOptions,
		launchResult: LaunchResult | null,
	): Promise<CdpBrowser> {
		const transportOptions: TransportOptions = {
			timeout: options.timeout ?? 30_000,
			...options.transport,
		};
		if (options.debug) {
			transportOptions.onRawMessage = (dir, data) => {
				console.log(formatTrace(dir, data));
			};
		}

		const transport = new Transport(transportOptions);
		await transport.connect(wsEndpoint);
		await transport.send('Target.setDiscoverTargets', { discover: true });

		return new CdpBrowser(transport, launchResult, {
			pageLoadTimeout: options.pageLoadTimeout,
			windowSize: options.headless ? options.windowSize : undefined,
		});
	}

	/** A fresh browser context with one blank tab */
	async newDriver(): Promise<CdpDriver> {
		return CdpDriver.create(this.transport, this.driverOptions);
	}

	get isConnected(): boolean {
		return this.transport.isConnected;
	}

	/** Close the connection, kill the browser, clean up */
	async close(): Promise<void> {
		try {
			await this.transport.close();
		} finally {
			await this.launchResult?.close();
		}
	}
}

/** Resolves when the next load event for a session fires; cancel() resolves it early */
interface PendingLoad {
	done: Promise<void>;
	cancel: () => void;
}

export class CdpDriver implements BrowserDriver {
	private readonly handles: string[] = [];
	/** targetId -> flat-mode sessionId */
	private readonly sessions = new Map<string, string>();
	private readonly unsubscribers: Array<() => void> = [];
	private readonly pageLoadTimeout: number;
	private current = '';

	private constructor(
		private readonly channel: CdpChannel,
		private readonly browserContextId: string,
		options: CdpDriverOptions,
	) {
		this.pageLoadTimeout = options.pageLoadTimeout ?? 30_000;

		this.unsubscribers.push(
			channel.on('Target.targetCreated', (event) => this.onTargetCreated(event)),
			channel.on('Target.targetDestroyed', (event) => {
				const targetId = readString(event.params, 'targetId');
				if (targetId) this.forget(targetId);
			}),
			channel.on('Target.detachedFromTarget', (event) => {
				const targetId = readString(event.params, 'targetId');
				if (targetId) this.sessions.delete(targetId);
			}),
		);
	}

	static async create(channel: CdpChannel, options: CdpDriverOptions = {}): Promise<CdpDriver> {
		const { browserContextId } = await channel.send('Target.createBrowserContext', { disposeOnDetach: true });
		if (typeof browserContextId !== 'string') {
			throw new DriverError('session not created', 'Browser did not return a browser context id');
		}

		const driver = new CdpDriver(channel, browserContextId, options);
		const params: Record<string, unknown> = { url: 'about:blank', browserContextId };
		if (options.windowSize) {
			params.width = options.windowSize.width;
			params.height = options.windowSize.height;
		}
		const { targetId } = await channel.send('Target.createTarget', params);
		if (typeof targetId !== 'string') {
			throw new DriverError('session not created', 'Browser did not return a target id');
		}

		driver.track(targetId);
		driver.current = targetId;
		return driver;
	}

	// -----------------------------------------------------------------------
	// Navigation
	// -----------------------------------------------------------------------

	async navigate(url: string): Promise<void> {
		const sessionId = await this.session();
		const load = this.expectLoad(sessionId);
		let result: Record<string, unknown>;
		try {
			result = await this.send('Page.navigate', { url }, sessionId);
		} catch (err) {
			load.cancel();
			throw err;
		}

		const errorText = readString(result, 'errorText');
		if (errorText) {
			load.cancel();
			throw new DriverError('unknown error', `Navigation to ${url} failed: ${errorText}`);
		}
		// No loaderId: same-document navigation, no load event follows
		if (readString(result, 'loaderId') === undefined) {
			load.cancel();
			return;
		}
		await load.done;
	}

	async getCurrentUrl(): Promise<string> {
		return String(await this.evaluateValue('location.href'));
	}

	async getTitle(): Promise<string> {
		return String(await this.evaluateValue('document.title'));
	}

	async refresh(): Promise<void> {
		const sessionId = await this.session();
		const load = this.expectLoad(sessionId);
		try {
			await this.send('Page.reload', {}, sessionId);
		} catch (err) {
			load.cancel();
			throw err;
		}
		await load.done;
	}

	async back(): Promise<void> {
		await this.traverseHistory(-1);
	}

	async forward(): Promise<void> {
		await this.traverseHistory(1);
	}

	// -----------------------------------------------------------------------
	// Elements and scripts
	// -----------------------------------------------------------------------

	async findElements(selector: Selector): Promise<DriverElement[]> {
		const sessionId = await this.session();
		const globalId = await this.globalObjectId(sessionId);
		return this.queryAll(sessionId, globalId, selector);
	}

	async executeScript(functionDeclaration: string, ...args: ScriptArg[]): Promise<unknown> {
		const sessionId = await this.session();
		const globalId = await this.globalObjectId(sessionId);
		return this.callFunction(sessionId, globalId, functionDeclaration, args);
	}

	/** @internal element lookup below a node or the document */
	async queryAll(sessionId: string, objectId: string, selector: Selector): Promise<CdpElement[]> {
		const isXpath = 'xpath' in selector;
		const query = 'xpath' in selector ? selector.xpath : selector.css;

		const result = await this.send(
			'Runtime.callFunctionOn',
			{
				functionDeclaration: QUERY_ALL,
				objectId,
				arguments: [{ value: query }, { value: isXpath }],
				returnByValue: false,
			},
			sessionId,
		);

		const exception = readExceptionDetails(result.exceptionDetails);
		if (exception) {
			const description = exception.exception?.description ?? exception.text;
			if (description.includes(STALE_MARKER)) {
				throw new DriverError('stale element reference', 'Element is no longer attached to the DOM');
			}
			if (description.startsWith('SyntaxError')) {
				throw new DriverError('invalid selector', `Invalid selector ${JSON.stringify(query)}: ${description.split('\n')[0]}`);
			}
			throw new DriverError('javascript error', description);
		}

		const array = readRemoteObject(result.result);
		if (!array?.objectId) return [];

		const props = await this.send('Runtime.getProperties', { objectId: array.objectId, ownProperties: true }, sessionId);
		const entries: unknown[] = Array.isArray(props.result) ? props.result : [];
		const indexed: Array<{ index: number; objectId: string }> = [];
		for (const entry of entries) {
			if (!isRecord(entry)) continue;
			const name = readString(entry, 'name');
			const value = readRemoteObject(entry.value);
			if (name === undefined || !/^\d+$/.test(name) || !value?.objectId) continue;
			indexed.push({ index: Number(name), objectId: value.objectId });
		}
		await this.send('Runtime.releaseObject', { objectId: array.objectId }, sessionId);

		indexed.sort((a, b) => a.index - b.index);
		return indexed.map((item) => new CdpElement(this, sessionId, item.objectId));
	}

	/** @internal call a function with `this` bound to a remote object, result by value */
	async callFunction(
		sessionId: string,
		objectId: string,
		functionDeclaration: string,
		args: ScriptArg[],
	): Promise<unknown> {
		const result = await this.send(
			'Runtime.callFunctionOn',
			{
				functionDeclaration,
				objectId,
				arguments: args.map((arg) => this.toCallArgument(arg, sessionId)),
				returnByValue: true,
				awaitPromise: true,
			},
			sessionId,
		);

		const exception = readExceptionDetails(result.exceptionDetails);
		if (exception) {
			const description = exception.exception?.description ?? exception.text;
			if (description.includes(STALE_MARKER)) {
				throw new DriverError('stale element reference', 'Element is no longer attached to the DOM');
			}
			throw new DriverError('javascript error', description);
		}
		return readRemoteObject(result.result)?.value;
	}

	/** @internal pointer interaction on an element: scroll, hit-test, dispatch */
	async pointer(element: CdpElement, action: 'click' | 'double' | 'context' | 'hover'): Promise<void> {
		const target = await this.callFunction(element.sessionId, element.objectId, POINTER_TARGET, [action !== 'hover']);
		if (!isRecord(target)) {
			throw new DriverError('unknown error', 'Could not compute element position');
		}

		const status = readString(target, 'status');
		if (status === 'not-interactable') {
			throw new DriverError('element not interactable', 'Element has no size or is hidden');
		}
		if (status === 'intercepted') {
			const by = readString(target, 'by') ?? 'another element';
			throw new DriverError('element click intercepted', `Element click intercepted: <${by}> would receive the click`);
		}

		const x = readNumber(target, 'x') ?? 0;
		const y = readNumber(target, 'y') ?? 0;
		const sessionId = element.sessionId;

		await this.send('Input.dispatchMouseEvent', { type: 'mouseMoved', x, y }, sessionId);
		if (action === 'hover') return;

		const button: MouseButton = action === 'context' ? 'right' : 'left';
		await this.mouseClick(sessionId, x, y, button, 1);
		if (action === 'double') {
			await this.mouseClick(sessionId, x, y, button, 2);
		}
	}

	/** @internal focus the element and insert text at the caret */
	async type(element: CdpElement, text: string): Promise<void> {
		await this.callFunction(element.sessionId, element.objectId, FOCUS_END, []);
		await this.send('Input.insertText', { text }, element.sessionId);
	}

	// -----------------------------------------------------------------------
	// Windows
	// -----------------------------------------------------------------------

	async getWindowHandles(): Promise<string[]> {
		return [...this.handles];
	}

	async getWindowHandle(): Promise<string> {
		this.assertWindow(this.current);
		return this.current;
	}

	async switchToWindow(handle: string): Promise<void> {
		this.assertWindow(handle);
		await this.session(handle);
		await this.send('Target.activateTarget', { targetId: handle });
		this.current = handle;
	}

	async closeWindow(): Promise<void> {
		const targetId = this.current;
		this.assertWindow(targetId);
		await this.send('Target.closeTarget', { targetId });
		this.forget(targetId);
	}

	async screenshot(): Promise<Buffer> {
		const sessionId = await this.session();
		const result = await this.send('Page.captureScreenshot', { format: 'png' }, sessionId);
		const data = readString(result, 'data');
		if (data === undefined) {
			throw new DriverError('unknown error', 'Browser returned no screenshot data');
		}
		return Buffer.from(data, 'base64');
	}

	async quit(): Promise<void> {
		for (const unsubscribe of this.unsubscribers) unsubscribe();
		this.unsubscribers.length = 0;
		this.handles.length = 0;
		this.sessions.clear();
		await this.send('Target.disposeBrowserContext', { browserContextId: this.browserContextId });
	}

	// -----------------------------------------------------------------------
	// Private
	// -----------------------------------------------------------------------

	private onTargetCreated(event: CdpEvent): void {
		const info = readRecord(event.params, 'targetInfo');
		if (!info) return;
		if (readString(info, 'type') !== 'page') return;
		if (readString(info, 'browserContextId') !== this.browserContextId) return;
		const targetId = readString(info, 'targetId');
		if (targetId) this.track(targetId);
	}

	private track(targetId: string): void {
		if (!this.handles.includes(targetId)) this.handles.push(targetId);
	}

	private forget(targetId: string): void {
		const index = this.handles.indexOf(targetId);
		if (index !== -1) this.handles.splice(index, 1);
		this.sessions.delete(targetId);
	}

	private assertWindow(handle: string): void {
		if (!this.handles.includes(handle)) {
			throw new DriverError('no such window', `No window with handle ${handle}`);
		}
	}

	/** Attach to a tab on first use; flat mode routes its commands by sessionId */
	private async session(targetId: string = this.current): Promise<string> {
		this.assertWindow(targetId);
		const existing = this.sessions.get(targetId);
		if (existing) return existing;

		const { sessionId } = await this.send('Target.attachToTarget', { targetId, flatten: true });
		if (typeof sessionId !== 'string') {
			throw new DriverError('no such window', `Could not attach to window ${targetId}`);
		}
		this.sessions.set(targetId, sessionId);
		await this.send('Page.enable', {}, sessionId);
		return sessionId;
	}

	private async globalObjectId(sessionId: string): Promise<string> {
		const result = await this.send('Runtime.evaluate', { expression: 'globalThis', returnByValue: false }, sessionId);
		const global = readRemoteObject(result.result);
		if (!global?.objectId) {
			throw new DriverError('javascript error', 'Page has no global object');
		}
		return global.objectId;
	}

	private async evaluateValue(expression: string): Promise<unknown> {
		const sessionId = await this.session();
		const result = await this.send('Runtime.evaluate', { expression, returnByValue: true }, sessionId);
		const exception = readExceptionDetails(result.exceptionDetails);
		if (exception) {
			throw new DriverError('javascript error', exception.exception?.description ?? exception.text);
		}
		const remote: RemoteObject | undefined = readRemoteObject(result.result);
		return remote?.value;
	}

	private toCallArgument(arg: ScriptArg, sessionId: string): Record<string, unknown> {
		if (arg === null || typeof arg !== 'object') return { value: arg };
		if (!(arg instanceof CdpElement)) {
			throw new DriverError('unknown error', 'Element handle does not belong to this driver');
		}
		if (arg.sessionId !== sessionId) {
			throw new DriverError('stale element reference', 'Element belongs to another window');
		}
		return { objectId: arg.objectId };
	}

	private async mouseClick(sessionId: string, x: number, y: number, button: MouseButton, clickCount: number): Promise<void> {
		await this.send('Input.dispatchMouseEvent', { type: 'mousePressed', x, y, button, clickCount }, sessionId);
		await this.send('Input.dispatchMouseEvent', { type: 'mouseReleased', x, y, button, clickCount }, sessionId);
	}

	private expectLoad(sessionId: string): PendingLoad {
		let cancel = () => {};
		const done = new Promise<void>((resolve, reject) => {
			const timer = setTimeout(() => {
				off();
				reject(new DriverError('timeout', `Page did not finish loading within ${this.pageLoadTimeout}ms`));
			}, this.pageLoadTimeout);

			const off = this.channel.on('Page.loadEventFired', (event) => {
				if (event.sessionId !== sessionId) return;
				clearTimeout(timer);
				off();
				resolve();
			});

			cancel = () => {
				clearTimeout(timer);
				off();
				resolve();
			};
		});
		return { done, cancel };
	}

	/** History entries may be same-document, so wait on the URL rather than a load event */
	private async traverseHistory(delta: -1 | 1): Promise<void> {
		const sessionId = await this.session();
		const history = await this.send('Page.getNavigationHistory', {}, sessionId);
		const currentIndex = readNumber(history, 'currentIndex') ?? 0;
		const entries: unknown[] = Array.isArray(history.entries) ? history.entries : [];
		const entry: unknown = entries[currentIndex + delta];
		if (!isRecord(entry)) return;

		const entryId = readNumber(entry, 'id');
		const url = readString(entry, 'url');
		if (entryId === undefined) return;

		await this.send('Page.navigateToHistoryEntry', { entryId }, sessionId);

		const deadline = Date.now() + this.pageLoadTimeout;
		while (Date.now() < deadline) {
			try {
				const state = await this.evaluateValue('[location.href, document.readyState]');
				if (Array.isArray(state) && (url === undefined || state[0] === url) && state[1] === 'complete') return;
			} catch (err) {
				// The old document's context disappears mid-navigation
				if (!isDriverError(err, 'javascript error') && !isDriverError(err, 'stale element reference')) throw err;
			}
			await new Promise((r) => setTimeout(r, 100));
		}
		throw new DriverError('timeout', `History navigation did not finish within ${this.pageLoadTimeout}ms`);
	}

	private async send(method: string, params: Record<string, unknown>, sessionId?: string): Promise<Record<string, unknown>> {
		try {
			return await this.channel.send(method, params, sessionId);
		} catch (err) {
			throw this.translate(err);
		}
	}

	/** Map protocol errors about vanished objects and tabs onto driver error codes */
	private translate(err: unknown): unknown {
		if (!(err instanceof ProtocolError)) return err;
		const message = err.protocolMessage;
		if (STALE_PROTOCOL_MESSAGES.some((m) => message.includes(m))) {
			return new DriverError('stale element reference', `${err.method}: ${message}`);
		}
		if (MISSING_WINDOW_MESSAGES.some((m) => message.includes(m))) {
			return new DriverError('no such window', `${err.method}: ${message}`);
		}
		return err;
	}
}

/** A node handle bound to the tab session it was found in */
export class CdpElement implements DriverElement {
	constructor(
		private readonly driver: CdpDriver,
		readonly sessionId: string,
		readonly objectId: string,
	) {}

	click(): Promise<void> {
		return this.driver.pointer(this, 'click');
	}

	doubleClick(): Promise<void> {
		return this.driver.pointer(this, 'double');
	}

	contextClick(): Promise<void> {
		return this.driver.pointer(this, 'context');
	}

	hover(): Promise<void> {
		return this.driver.pointer(this, 'hover');
	}

	async clear(): Promise<void> {
		await this.call(CLEAR);
	}

	sendKeys(text: string): Promise<void> {
		return this.driver.type(this, text);
	}

	async getText(): Promise<string> {
		const text = await this.call(TEXT);
		return typeof text === 'string' ? text : '';
	}

	async getProperty(name: string): Promise<string | null> {
		const value = await this.call(PROPERTY, name);
		return typeof value === 'string' ? value : null;
	}

	async getAttribute(name: string): Promise<string | null> {
		const value = await this.call(ATTRIBUTE, name);
		return typeof value === 'string' ? value : null;
	}

	async isDisplayed(): Promise<boolean> {
		return (await this.call(IS_DISPLAYED)) === true;
	}

	async isEnabled(): Promise<boolean> {
		return (await this.call(IS_ENABLED)) === true;
	}

	async isSelected(): Promise<boolean> {
		return (await this.call(IS_SELECTED)) === true;
	}

	findElements(selector: Selector): Promise<DriverElement[]> {
		return this.driver.queryAll(this.sessionId, this.objectId, selector);
	}

	private call(functionDeclaration: string, ...args: ScriptArg[]): Promise<unknown> {
		return this.driver.callFunction(this.sessionId, this.objectId, functionDeclaration, args);
	}
}
