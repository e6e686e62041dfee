import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemorySink, createLogger } from './logger.js';
import {
	captureScreenshot,
	captureScreenshotBase64,
	captureScreenshotBuffer,
	fileTimestamp,
	safeFileName,
} from './screenshot.js';
import { FakeDriver } from './testing/fake-driver.js';

describe('safeFileName', () => {
	it('should fold Turkish letters and replace everything else', () => {
		expect(safeFileName('Arama › çanta sonuçları')).toBe('Arama_canta_sonuclari');
		expect(safeFileName('Search - laptop (1/2)')).toBe('Search_-_laptop_1_2');
	});

	it('should cap the length', () => {
		expect(safeFileName('a'.repeat(300))).toHaveLength(200);
	});
});

describe('fileTimestamp', () => {
	it('should format local time with milliseconds', () => {
		expect(fileTimestamp(new Date(2024, 0, 5, 9, 3, 7, 45))).toBe('2024-01-05_09-03-07-045');
	});
});

describe('capture', () => {
	let dir: string;
	const sink = new MemorySink();
	const log = createLogger('Screenshot', { sink });

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'vitrin-shots-'));
		sink.lines.length = 0;
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('should write a PNG named after the test', async () => {
		const driver = new FakeDriver();
		const nested = join(dir, 'failures');

		const path = await captureScreenshot(driver, 'Sepet testi', nested, log);
		expect(path).toMatch(/failures[\\/]Sepet_testi_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}-\d{3}\.png$/);
		if (path === null) return;
		expect(await readFile(path, 'utf8')).toBe('fake-png');
		expect(sink.messages()).toEqual([`INFO  Screenshot  Screenshot saved: ${path}`]);
	});

	it('should return null when the browser cannot take one', async () => {
		const driver = new FakeDriver();
		driver.screenshotError = new Error('session closed');

		expect(await captureScreenshot(driver, 'broken', dir, log)).toBeNull();
		expect(sink.messages()).toEqual(['ERROR Screenshot  Failed to capture screenshot for: broken: session closed']);
	});

	it('should hand back the image as a buffer or base64', async () => {
		const driver = new FakeDriver();

		expect((await captureScreenshotBuffer(driver, log))?.toString()).toBe('fake-png');
		expect(await captureScreenshotBase64(driver, log)).toBe('ZmFrZS1wbmc=');

		driver.screenshotError = new Error('session closed');
		expect(await captureScreenshotBuffer(driver, log)).toBeNull();
		expect(await captureScreenshotBase64(driver, log)).toBeNull();
	});
});
