// ============================================================================
// Vitrin - Page scripts
// Function declarations evaluated in the page through
// BrowserDriver.executeScript. Elements arrive as DOM nodes.
// ============================================================================

/** Script click. Ignores overlays, so use it only as a fallback. */
export const CLICK = `function (el) {
	el.click();
}`;

export const SCROLL_INTO_VIEW = `function (el) {
	el.scrollIntoView({ behavior: 'smooth', block: 'center' });
}`;

export const SCROLL_TO_BOTTOM = `function () {
	window.scrollTo(0, document.body.scrollHeight);
}`;

export const SCROLL_TO_TOP = `function () {
	window.scrollTo(0, 0);
}`;

export const READY_STATE = `function () {
	return document.readyState;
}`;

/** True when no jQuery request is in flight, or the page has no jQuery */
export const AJAX_IDLE = `function () {
	return typeof window.jQuery !== 'undefined' ? window.jQuery.active == 0 : true;
}`;

// Option selection reports whether a matching option existed

const SELECT_OPTION = (match: string) => `function (el, wanted) {
	const options = Array.from(el.options || []);
	const index = options.findIndex(${match});
	if (index < 0) return false;
	el.selectedIndex = index;
	el.dispatchEvent(new Event('input', { bubbles: true }));
	el.dispatchEvent(new Event('change', { bubbles: true }));
	return true;
}`;

export const SELECT_BY_TEXT = SELECT_OPTION('(o) => o.text.trim() === wanted');
export const SELECT_BY_VALUE = SELECT_OPTION('(o) => o.value === wanted');
export const SELECT_BY_INDEX = SELECT_OPTION('(o, i) => i === wanted');
