import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BrowserDriver } from 'vitrin-driver';
import { type Logger, createLogger } from './logger.js';
import { replaceTurkishChars } from './turkish-text.js';

const defaultLog = createLogger('Screenshot');

/**
 * Save a PNG of the current viewport as `<name>_<yyyy-MM-dd_HH-mm-ss-SSS>.png`.
 * Returns the file path, or null when the capture or the write failed.
 */
export async function captureScreenshot(
	driver: BrowserDriver,
	name: string,
	dir: string,
	log: Logger = defaultLog,
): Promise<string | null> {
	const filePath = join(dir, `${safeFileName(name)}_${fileTimestamp(new Date())}.png`);
	try {
		await mkdir(dir, { recursive: true });
		await writeFile(filePath, await driver.screenshot());
		log.info(`Screenshot saved: ${filePath}`);
		return filePath;
	} catch (err) {
		log.error(`Failed to capture screenshot for: ${name}`, err);
		return null;
	}
}

export async function captureScreenshotBuffer(driver: BrowserDriver, log: Logger = defaultLog): Promise<Buffer | null> {
	try {
		return await driver.screenshot();
	} catch (err) {
		log.error('Failed to capture screenshot', err);
		return null;
	}
}

export async function captureScreenshotBase64(driver: BrowserDriver, log: Logger = defaultLog): Promise<string | null> {
	const buffer = await captureScreenshotBuffer(driver, log);
	return buffer ? buffer.toString('base64') : null;
}

/** "Arama › çanta sonuçları" → "Arama_canta_sonuclari" */
export function safeFileName(name: string): string {
	return replaceTurkishChars(name)
		.replace(/[^a-zA-Z0-9_-]/g, '_')
		.replace(/_+/g, '_')
		.replace(/^_|_$/g, '')
		.slice(0, 200);
}

/** Local time as yyyy-MM-dd_HH-mm-ss-SSS */
export function fileTimestamp(date: Date): string {
	const pad = (value: number, width = 2) => String(value).padStart(width, '0');
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
	return `${day}_${time}-${pad(date.getMilliseconds(), 3)}`;
}
