import { defineConfig } from 'vitrin';

export default defineConfig({
	browser: 'chrome',
	baseURL: 'https://www.trendyol.com/',
	workers: 3,
	retries: 1,
	screenshot: 'on-failure',
	searchKeyword: 'laptop',
});
