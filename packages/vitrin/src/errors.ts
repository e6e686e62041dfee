// ============================================================================
// Vitrin - Rich Error System
// When an interaction fails, say what was attempted, on what, what the
// element looked like at the time, and what to check next.
//
// Instead of: "Timed out after 15000ms"
// We say:     "Could not wait for visibility of 'a.product-card' — the element
//              was found but is not visible.
//              Hint: a popup or the cookie banner may still cover the page."
// ============================================================================

export { DriverError, isDriverError, type DriverErrorCode } from 'vitrin-driver';

/** Element state snapshot at the time of failure */
export interface ElementState {
	/** Whether the element was found in the DOM */
	found: boolean;
	visible?: boolean;
	enabled?: boolean;
	/** Text content preview */
	textPreview?: string;
	/** How many elements matched the locator */
	matches?: number;
}

/** Why a found element could not be used */
export type NotActionableReason = 'not-visible' | 'disabled' | 'detached';

/**
 * Base error class for all vitrin errors.
 */
export class VitrinError extends Error {
	override readonly name: string = 'VitrinError';

	/** What action was being performed */
	readonly action: string;
	/** What target was being acted on */
	readonly target: string;
	/** Element state at the time of failure */
	readonly elementState?: ElementState;
	/** Hint for how to fix the issue */
	readonly hint?: string;
	/** How long we waited before giving up (ms) */
	readonly elapsed?: number;

	constructor(options: {
		action: string;
		target: string;
		message: string;
		elementState?: ElementState;
		hint?: string;
		elapsed?: number;
		cause?: unknown;
	}) {
		const parts: string[] = [];
		parts.push(`Could not ${options.action} '${options.target}'`);
		parts.push(`— ${options.message}`);

		if (options.elementState) {
			parts.push('');
			parts.push(formatElementState(options.elementState));
		}

		if (options.hint) {
			parts.push('');
			parts.push(`Hint: ${options.hint}`);
		}

		if (options.elapsed !== undefined) {
			parts.push(`(waited ${options.elapsed}ms)`);
		}

		super(parts.join('\n'));
		this.action = options.action;
		this.target = options.target;
		this.elementState = options.elementState;
		this.hint = options.hint;
		this.elapsed = options.elapsed;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * Error thrown when no element matches a locator in time.
 */
export class ElementNotFoundError extends VitrinError {
	override readonly name = 'ElementNotFoundError';

	constructor(options: { action: string; target: string; elapsed?: number; cause?: unknown }) {
		super({
			action: options.action,
			target: options.target,
			message: 'no matching element found on the page.',
			elementState: { found: false },
			hint: 'Check that the locator still matches the live page and that no popup is covering it.',
			elapsed: options.elapsed,
			cause: options.cause,
		});
	}
}

/**
 * Error thrown when an element is found but not usable.
 */
export class ElementNotActionableError extends VitrinError {
	override readonly name = 'ElementNotActionableError';
	readonly reason: NotActionableReason;

	constructor(options: {
		action: string;
		target: string;
		reason: NotActionableReason;
		elementState: ElementState;
		elapsed?: number;
		cause?: unknown;
	}) {
		const messages: Record<NotActionableReason, string> = {
			'not-visible': 'the element was found but is not visible.',
			disabled: 'the element was found but is disabled.',
			detached: 'the element was found but is no longer attached to the DOM.',
		};

		const hints: Record<NotActionableReason, string> = {
			'not-visible': 'A popup or the cookie banner may still cover the page, or the content is lazy-loaded.',
			disabled: 'Wait for the page to finish updating, or check whether a prerequisite step is missing.',
			detached: 'The page re-rendered while waiting. Re-query the element instead of reusing the handle.',
		};

		super({
			action: options.action,
			target: options.target,
			message: messages[options.reason],
			elementState: options.elementState,
			hint: hints[options.reason],
			elapsed: options.elapsed,
			cause: options.cause,
		});

		this.reason = options.reason;
	}
}

/**
 * Error thrown when a wait runs out of time.
 */
export class TimeoutError extends VitrinError {
	override readonly name = 'TimeoutError';
}

/**
 * Error thrown for an invalid configuration value.
 */
export class ConfigError extends Error {
	override readonly name = 'ConfigError';

	constructor(
		readonly key: string,
		message: string,
	) {
		super(`Invalid config "${key}": ${message}`);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function formatElementState(state: ElementState): string {
	if (!state.found) return 'Element state: NOT FOUND in DOM';

	const lines: string[] = ['Element state:'];
	if (state.matches !== undefined) lines.push(`  Matches: ${state.matches}`);
	if (state.textPreview) lines.push(`  Text: "${state.textPreview}"`);
	if (state.visible !== undefined) lines.push(`  Visible: ${state.visible}`);
	if (state.enabled !== undefined) lines.push(`  Enabled: ${state.enabled}`);
	return lines.join('\n');
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
