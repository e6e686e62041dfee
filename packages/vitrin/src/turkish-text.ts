// ============================================================================
// Vitrin - Turkish text
// Case rules, diacritic folding and price parsing for Turkish storefront
// content. Turkish has a dotted and a dotless i, so the default case
// mapping is wrong: "istanbul".toUpperCase() is "ISTANBUL", not "İSTANBUL".
// ============================================================================

import { createLogger } from './logger.js';

const log = createLogger('TurkishText');

const LOCALE = 'tr-TR';
const TURKISH_CHARS = 'çğıöşüÇĞİÖŞÜ';

const TO_ASCII: Readonly<Record<string, string>> = {
	ç: 'c',
	Ç: 'C',
	ğ: 'g',
	Ğ: 'G',
	ı: 'i',
	İ: 'I',
	ö: 'o',
	Ö: 'O',
	ş: 's',
	Ş: 'S',
	ü: 'u',
	Ü: 'U',
};

const VALID_TEXT = /^[a-zA-ZçÇğĞıİöÖşŞüÜ0-9\s]+$/;

const currencyFormat = new Intl.NumberFormat(LOCALE, { minimumFractionDigits: 2, maximumFractionDigits: 2 });

function isTurkishChar(char: string): boolean {
	return TURKISH_CHARS.includes(char);
}

export function containsTurkishCharacters(text: string | null | undefined): boolean {
	if (!text) return false;
	return [...text].some(isTurkishChar);
}

/** "istanbul" → "İSTANBUL", "ılık" → "ILIK" */
export function toUpperCaseTurkish(text: string): string {
	return text ? text.toLocaleUpperCase(LOCALE) : text;
}

/** "İSTANBUL" → "istanbul", "ILIK" → "ılık" */
export function toLowerCaseTurkish(text: string): string {
	return text ? text.toLocaleLowerCase(LOCALE) : text;
}

/**
 * Fold Turkish letters to ASCII and strip every other combining mark.
 * Lossy: compare with it, never display it.
 *
 * ```ts
 * normalizeToAscii('Çiçek Mağazası'); // 'Cicek Magazasi'
 * normalizeToAscii('café');           // 'cafe'
 * ```
 */
export function normalizeToAscii(text: string): string {
	if (!text) return text;
	const folded = [...text].map((char) => TO_ASCII[char] ?? char).join('');
	return folded.normalize('NFD').replace(/\p{M}/gu, '');
}

export function equalsIgnoreCaseTurkish(a: string | null | undefined, b: string | null | undefined): boolean {
	if (a == null && b == null) return true;
	if (a == null || b == null) return false;
	return toLowerCaseTurkish(a) === toLowerCaseTurkish(b);
}

export function containsIgnoreCaseTurkish(text: string | null | undefined, substring: string | null | undefined): boolean {
	if (text == null || substring == null) return false;
	return toLowerCaseTurkish(text).includes(toLowerCaseTurkish(substring));
}

/** Equal after lower-casing and ASCII folding: "Cicek" matches "ÇİÇEK" */
export function fuzzyEqualsTurkish(a: string | null | undefined, b: string | null | undefined): boolean {
	if (a == null && b == null) return true;
	if (a == null || b == null) return false;
	return normalizeToAscii(toLowerCaseTurkish(a)) === normalizeToAscii(toLowerCaseTurkish(b));
}

/** Trim and collapse whitespace runs to a single space */
export function cleanWhitespace(text: string): string;
export function cleanWhitespace(text: null | undefined): null | undefined;
export function cleanWhitespace(text: string | null | undefined): string | null | undefined {
	if (text == null) return text;
	return text.trim().replace(/\s+/g, ' ');
}

/** Letters (Turkish included), digits and whitespace only */
export function isValidTurkishText(text: string | null | undefined): boolean {
	if (!text) return false;
	return VALID_TEXT.test(text);
}

export function startsWithTurkishCharacter(text: string | null | undefined): boolean {
	if (!text) return false;
	const first = [...text][0];
	return first !== undefined && isTurkishChar(first);
}

export function getTurkishCharacterCount(text: string | null | undefined): number {
	if (!text) return 0;
	return [...text].filter(isTurkishChar).length;
}

/** For slugs and file names: "Çiçek Mağazası" → "Cicek Magazasi" */
export function replaceTurkishChars(text: string): string {
	return normalizeToAscii(text);
}

/** 1234.56 → "1.234,56 TL" */
export function formatTurkishCurrency(amount: number): string {
	return `${currencyFormat.format(amount)} TL`;
}

/**
 * Parse a price as the storefront prints it.
 * Returns 0 for empty or unparsable input.
 *
 * ```ts
 * parseTurkishNumber('1.234,56 TL'); // 1234.56
 * parseTurkishNumber('₺899');        // 899
 * ```
 */
export function parseTurkishNumber(formatted: string | null | undefined): number {
	if (!formatted) return 0;

	const cleaned = formatted
		.replace(/TL/g, '')
		.replace(/₺/g, '')
		.replace(/[\s ]/g, '')
		.replace(/\./g, '')
		.replace(/,/g, '.');

	const value = cleaned === '' ? Number.NaN : Number(cleaned);
	if (!Number.isFinite(value)) {
		log.error(`Could not parse Turkish number: '${formatted}'`);
		return 0;
	}
	return value;
}
