// ============================================================================
// Vitrin Driver - In-page functions
// Function declarations called on element handles through
// Runtime.callFunctionOn. `this` is the element. Each one fails with the
// stale marker first when the node has left its document.
// ============================================================================

/** Thrown in-page for a detached node; mapped to 'stale element reference' */
export const STALE_MARKER = 'vitrin:stale-element';

const ensureAttached = `if (!this.isConnected) throw new Error('${STALE_MARKER}');`;

/** Query below the receiver; the receiver is globalThis for document-level lookups */
export const QUERY_ALL = `function (query, isXpath) {
	const root = this === globalThis ? document : this;
	if (root !== document && !root.isConnected) throw new Error('${STALE_MARKER}');
	if (isXpath) {
		const snapshot = document.evaluate(query, root, null, XPathResult.ORDERED_NODE_SNAPSHOT_TYPE, null);
		const found = [];
		for (let i = 0; i < snapshot.snapshotLength; i++) found.push(snapshot.snapshotItem(i));
		return found;
	}
	return Array.from(root.querySelectorAll(query));
}`;

/**
 * Scroll the element to the centre of the viewport and report the point a
 * pointer would hit, or why it cannot.
 * Result: { status: 'ok', x, y } | { status: 'not-interactable' } | { status: 'intercepted', by }
 */
export const POINTER_TARGET = `function (checkHit) {
	${ensureAttached}
	this.scrollIntoView({ block: 'center', inline: 'center', behavior: 'instant' });
	const rect = this.getBoundingClientRect();
	const style = getComputedStyle(this);
	if (rect.width === 0 || rect.height === 0 || style.visibility === 'hidden' || style.display === 'none') {
		return { status: 'not-interactable' };
	}
	const x = rect.left + rect.width / 2;
	const y = rect.top + rect.height / 2;
	if (checkHit) {
		const hit = document.elementFromPoint(x, y);
		if (hit && hit !== this && !this.contains(hit)) {
			const classes = typeof hit.className === 'string' && hit.className.trim()
				? '.' + hit.className.trim().split(/\\s+/).join('.')
				: '';
			return { status: 'intercepted', by: hit.tagName.toLowerCase() + (hit.id ? '#' + hit.id : '') + classes };
		}
	}
	return { status: 'ok', x, y };
}`;

export const FOCUS_END = `function () {
	${ensureAttached}
	this.focus();
	if (typeof this.value === 'string' && typeof this.setSelectionRange === 'function') {
		try { this.setSelectionRange(this.value.length, this.value.length); } catch (e) { return false; }
	}
	return true;
}`;

/** Frameworks track input state through the native setter, so assigning .value is not enough */
export const CLEAR = `function () {
	${ensureAttached}
	const proto = this.tagName === 'TEXTAREA' ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
	const nativeSetter = Object.getOwnPropertyDescriptor(proto, 'value')?.set;
	if (nativeSetter && (this instanceof HTMLInputElement || this instanceof HTMLTextAreaElement)) {
		nativeSetter.call(this, '');
	} else if (this.isContentEditable) {
		this.textContent = '';
	} else {
		this.value = '';
	}
	this.dispatchEvent(new Event('input', { bubbles: true }));
	this.dispatchEvent(new Event('change', { bubbles: true }));
}`;

export const TEXT = `function () {
	${ensureAttached}
	return typeof this.innerText === 'string' ? this.innerText : (this.textContent ?? '');
}`;

export const PROPERTY = `function (name) {
	${ensureAttached}
	const value = this[name];
	return value === undefined || value === null ? null : String(value);
}`;

export const ATTRIBUTE = `function (name) {
	${ensureAttached}
	return this.getAttribute(name);
}`;

export const IS_DISPLAYED = `function () {
	${ensureAttached}
	const style = getComputedStyle(this);
	if (style.display === 'none' || style.visibility === 'hidden' || style.visibility === 'collapse') return false;
	if (Number(style.opacity) === 0) return false;
	const rect = this.getBoundingClientRect();
	if (rect.width === 0 && rect.height === 0) return false;
	return typeof this.checkVisibility === 'function' ? this.checkVisibility() : true;
}`;

export const IS_ENABLED = `function () {
	${ensureAttached}
	return !this.matches(':disabled');
}`;

export const IS_SELECTED = `function () {
	${ensureAttached}
	return this.checked === true || this.selected === true;
}`;
