// ============================================================================
// Vitrin - Locators
// Page objects describe elements with a plain CSS string, or an explicit
// { css } / { xpath } when the intent should be obvious:
//
//   'a.product-card'
//   { xpath: "//p[contains(text(),'Sepetim')]" }
// ============================================================================

import type { DriverElement, Selector } from 'vitrin-driver';

/** A way to find elements. Bare strings are CSS selectors. */
export type Locator = string | Selector;

/** What interactions accept: something to find, or something already found */
export type Target = Locator | DriverElement;

export function isElement(target: Target): target is DriverElement {
	return typeof target === 'object' && 'click' in target;
}

export function toSelector(locator: Locator): Selector {
	return typeof locator === 'string' ? { css: locator } : locator;
}

/** Human-readable form for logs and error messages */
export function describeLocator(target: Target): string {
	if (typeof target === 'string') return target;
	if (isElement(target)) return '<element>';
	return 'css' in target ? target.css : target.xpath;
}

/** XPath for a `tag` element whose own text contains `text` */
export function byTextContains(tag: string, text: string): Locator {
	return { xpath: `//${tag}[contains(text(),${xpathLiteral(text)})]` };
}

/**
 * Quote `text` as an XPath 1.0 string literal. XPath has no escape
 * character, so text holding both quote kinds is split into concat().
 */
export function xpathLiteral(text: string): string {
	if (!text.includes("'")) return `'${text}'`;
	if (!text.includes('"')) return `"${text}"`;
	const parts = text.split("'").map((part) => `'${part}'`);
	return `concat(${parts.join(`,"'",`)})`;
}
