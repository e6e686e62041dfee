// ============================================================================
// Vitrin Driver - Public Types
// The browser-control capability the page objects are written against.
// Anything that can satisfy BrowserDriver can run a vitrin suite.
// ============================================================================

/** How to look an element up: a CSS selector or an XPath expression */
export type Selector = { css: string } | { xpath: string };

/** Values that can cross into a page script as arguments */
export type ScriptArg = string | number | boolean | null | DriverElement;

/**
 * A handle to one DOM node.
 *
 * Every operation fails with `DriverError('stale element reference')` once
 * the node has been detached from its document.
 */
export interface DriverElement {
	click(): Promise<void>;
	doubleClick(): Promise<void>;
	contextClick(): Promise<void>;
	hover(): Promise<void>;
	/** Empty an input or textarea */
	clear(): Promise<void>;
	sendKeys(text: string): Promise<void>;
	/** Rendered text (`innerText`) */
	getText(): Promise<string>;
	/** A DOM property, stringified. `null` when undefined or null. */
	getProperty(name: string): Promise<string | null>;
	/** An HTML attribute. `null` when the attribute is absent. */
	getAttribute(name: string): Promise<string | null>;
	isDisplayed(): Promise<boolean>;
	isEnabled(): Promise<boolean>;
	isSelected(): Promise<boolean>;
	/** Descendants matching the selector */
	findElements(selector: Selector): Promise<DriverElement[]>;
}

/**
 * Remote control over one isolated browser session.
 *
 * Window handles are opaque strings, listed in the order the windows were
 * opened. The first handle is the window the session started with.
 */
export interface BrowserDriver {
	navigate(url: string): Promise<void>;
	getCurrentUrl(): Promise<string>;
	getTitle(): Promise<string>;
	refresh(): Promise<void>;
	back(): Promise<void>;
	forward(): Promise<void>;

	findElements(selector: Selector): Promise<DriverElement[]>;

	/**
	 * Call a function declaration in the page with the given arguments.
	 * Elements passed as arguments arrive as DOM nodes; the return value is
	 * serialized by value.
	 *
	 * ```ts
	 * const state = await driver.executeScript('function () { return document.readyState; }');
	 * ```
	 */
	executeScript(functionDeclaration: string, ...args: ScriptArg[]): Promise<unknown>;

	getWindowHandles(): Promise<string[]>;
	getWindowHandle(): Promise<string>;
	switchToWindow(handle: string): Promise<void>;
	/** Close the current window. The driver stays on the closed handle until switched. */
	closeWindow(): Promise<void>;

	/** PNG screenshot of the current viewport */
	screenshot(): Promise<Buffer>;

	/** End the session and release every window it opened */
	quit(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Failure categories a driver reports */
export type DriverErrorCode =
	| 'no such element'
	| 'stale element reference'
	| 'element click intercepted'
	| 'element not interactable'
	| 'invalid selector'
	| 'no such window'
	| 'javascript error'
	| 'timeout'
	| 'session not created'
	| 'unknown error';

/** Error raised by a driver when a command fails */
export class DriverError extends Error {
	constructor(
		public readonly code: DriverErrorCode,
		message: string,
	) {
		super(`[${code}] ${message}`);
		this.name = 'DriverError';
	}
}

/** Narrow an unknown error to a DriverError, optionally of a given code */
export function isDriverError(err: unknown, code?: DriverErrorCode): err is DriverError {
	return err instanceof DriverError && (code === undefined || err.code === code);
}
