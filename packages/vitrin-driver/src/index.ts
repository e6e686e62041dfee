// ============================================================================
// Vitrin Driver - Public API
// The driver capability vitrin's page objects run on, and a Chrome/Edge
// implementation of it over the DevTools Protocol.
// ============================================================================

export {
	CdpBrowser,
	CdpDriver,
	CdpElement,
	type BrowserLaunchOptions,
	type CdpDriverOptions,
} from './cdp-driver.js';
export {
	Transport,
	ProtocolError,
	type CdpChannel,
	type TransportOptions,
	type EventHandler,
} from './transport.js';
export {
	launchBrowser,
	buildChromiumArgs,
	findBrowser,
	parseDevToolsEndpoint,
	DEFAULT_USER_AGENT,
	SUPPORTED_BROWSERS,
	type BrowserName,
	type LaunchOptions,
	type LaunchResult,
} from './launcher.js';
export type { CdpEvent, CdpCommand, CdpResponse } from './protocol.js';
export { sanitize, formatTrace } from './utils.js';
export {
	DriverError,
	isDriverError,
	type BrowserDriver,
	type DriverElement,
	type DriverErrorCode,
	type ScriptArg,
	type Selector,
} from './types.js';
