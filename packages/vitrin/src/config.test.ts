import { describe, expect, it } from 'vitest';
import { applyEnvOverrides, defineConfig, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveConfig', () => {
	it('should work against the live storefront with no config at all', () => {
		const config = resolveConfig({}, {});
		expect(config.browser).toBe('chrome');
		expect(config.baseURL).toBe('https://www.trendyol.com/');
		expect(config.headless).toBe(false);
		expect(config.workers).toBe(3);
		expect(config.retries).toBe(1);
		expect(config.timeout).toBe(120_000);
		expect(config.screenshot).toBe('on-failure');
		expect(config.locale).toBe('tr-TR');
		expect(config.viewport).toEqual({ width: 1920, height: 1080 });
		expect(config.ci).toBe(false);
	});

	it('should let the config file override defaults', () => {
		const config = resolveConfig(defineConfig({ browser: 'edge', workers: 2, timeouts: { pageLoad: 5_000 } }), {});
		expect(config.browser).toBe('edge');
		expect(config.workers).toBe(2);
		expect(config.timeouts).toEqual({ pageLoad: 5_000 });
	});

	it('should force headless in CI', () => {
		expect(resolveConfig({ headless: false }, { CI: 'true' })).toMatchObject({ ci: true, headless: true });
		expect(resolveConfig({ headless: false }, { CI: '0' })).toMatchObject({ ci: false, headless: false });
	});

	it('should let the environment win over the config file', () => {
		const config = resolveConfig(
			{ browser: 'chrome', workers: 4 },
			{
				VITRIN_BROWSER: 'Edge',
				VITRIN_HEADLESS: 'yes',
				VITRIN_BASE_URL: 'https://staging.shop.test/',
				VITRIN_WORKERS: '1',
				VITRIN_LOG_LEVEL: 'debug',
			},
		);
		expect(config).toMatchObject({
			browser: 'edge',
			headless: true,
			baseURL: 'https://staging.shop.test/',
			workers: 1,
			logLevel: 'debug',
		});
	});

	it('should reject values the browser or runner cannot use', () => {
		expect(() => resolveConfig({}, { VITRIN_BROWSER: 'firefox' })).toThrow(
			new ConfigError('VITRIN_BROWSER', 'unsupported browser "firefox". Supported: chrome, edge'),
		);
		expect(() => resolveConfig({ baseURL: 'shop.test' }, {})).toThrow('Invalid config "baseURL"');
		expect(() => resolveConfig({ workers: 0 }, {})).toThrow('Invalid config "workers": expected a positive integer, got 0');
		expect(() => resolveConfig({ retries: -1 }, {})).toThrow('Invalid config "retries"');
		expect(() => resolveConfig({ timeout: 0 }, {})).toThrow('Invalid config "timeout"');
		expect(() => resolveConfig({ timeouts: { ajax: -5 } }, {})).toThrow('Invalid config "timeouts.ajax"');
		expect(() => resolveConfig({}, { VITRIN_WORKERS: 'many' })).toThrow('Invalid config "workers"');
		expect(() => resolveConfig({}, { VITRIN_LOG_LEVEL: 'loud' })).toThrow('Invalid config "VITRIN_LOG_LEVEL"');
	});

	it('should reject numbers with trailing junk or no finite value', () => {
		expect(() => resolveConfig({}, { VITRIN_WORKERS: '3abc' })).toThrow(
			new ConfigError('workers', 'expected a positive integer, got NaN'),
		);
		expect(() => resolveConfig({}, { VITRIN_WORKERS: '1.5' })).toThrow('Invalid config "workers"');
		expect(resolveConfig({}, { VITRIN_WORKERS: ' 2 ' }).workers).toBe(2);
		expect(() => resolveConfig({ timeout: Number.NaN }, {})).toThrow('Invalid config "timeout"');
		expect(() => resolveConfig({ timeout: Number.POSITIVE_INFINITY }, {})).toThrow('Invalid config "timeout"');
		expect(() => resolveConfig({ timeouts: { ajax: Number.NaN } }, {})).toThrow(
			new ConfigError('timeouts.ajax', 'expected a non-negative number, got NaN'),
		);
	});
});

describe('applyEnvOverrides', () => {
	it('should leave the config alone when nothing is set', () => {
		const config = resolveConfig({}, {});
		expect(applyEnvOverrides(config, {})).toEqual(config);
	});

	it('should treat an empty VITRIN_HEADLESS as unset', () => {
		const config = resolveConfig({ headless: true }, {});
		expect(applyEnvOverrides(config, { VITRIN_HEADLESS: '' }).headless).toBe(true);
		expect(applyEnvOverrides(config, { VITRIN_HEADLESS: 'false' }).headless).toBe(false);
	});
});
