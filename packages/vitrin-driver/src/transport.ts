// ============================================================================
// Vitrin Driver - WebSocket Transport
// Low-level DevTools Protocol transport: one WebSocket to the browser
// endpoint, commands correlated to responses by id, events fanned out to
// subscribers. Tab-level commands travel over the same socket, tagged with
// the sessionId returned by Target.attachToTarget (flat mode).
// ============================================================================

import { type RawData, WebSocket } from 'ws';
import { type CdpCommand, type CdpEvent, parseMessage } from './protocol.js';
import { DriverError } from './types.js';

/** Callback for events pushed by the browser */
export type EventHandler = (event: CdpEvent) => void;

/** Options for creating a transport connection */
export interface TransportOptions {
	/** Connection and per-command timeout in milliseconds (default: 30000) */
	timeout?: number;
	/** Called when the connection drops unexpectedly */
	onDisconnect?: (reason: string) => void;
	/** Called for every raw message (useful for debugging/tracing) */
	onRawMessage?: (direction: 'send' | 'receive', data: string) => void;
}

/** A protocol error returned by the browser for one command */
export class ProtocolError extends DriverError {
	constructor(
		public readonly method: string,
		public readonly protocolCode: number,
		public readonly protocolMessage: string,
	) {
		super('unknown error', `${method}: ${protocolMessage} (${protocolCode})`);
		this.name = 'ProtocolError';
	}
}

function decode(data: RawData): string {
	if (Buffer.isBuffer(data)) return data.toString('utf-8');
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
	return Buffer.from(data).toString('utf-8');
}

/** Tracks a pending command waiting for its response */
interface PendingCommand {
	method: string;
	resolve: (result: Record<string, unknown>) => void;
	reject: (error: DriverError) => void;
	timer: ReturnType<typeof setTimeout>;
}

/**
 * The subset of the transport the driver depends on.
 * Unit tests substitute a scripted channel for it.
 */
export interface CdpChannel {
	send(method: string, params?: Record<string, unknown>, sessionId?: string): Promise<Record<string, unknown>>;
	on(eventName: string, handler: EventHandler): () => void;
	waitForEvent(
		eventName: string,
		predicate?: (event: CdpEvent) => boolean,
		timeout?: number,
	): Promise<CdpEvent>;
}

/**
 * Transport manages communication with a browser's DevTools endpoint.
 *
 * It handles:
 * - Connecting to the browser-level WebSocket endpoint
 * - Sending commands and correlating responses by ID
 * - Dispatching events to registered handlers
 * - Timeout management for commands
 * - Clean shutdown
 */
export class Transport implements CdpChannel {
	private ws: WebSocket | null = null;
	private nextId = 1;
	private pending = new Map<number, PendingCommand>();
	private eventHandlers = new Map<string, Set<EventHandler>>();
	private connected = false;
	private readonly timeout: number;
	private readonly onDisconnect?: (reason: string) => void;
	private readonly onRawMessage?: (direction: 'send' | 'receive', data: string) => void;

	constructor(options: TransportOptions = {}) {
		this.timeout = options.timeout ?? 30_000;
		this.onDisconnect = options.onDisconnect;
		this.onRawMessage = options.onRawMessage;
	}

	/**
	 * Connect to a DevTools WebSocket endpoint.
	 *
	 * @param url - e.g. "ws://127.0.0.1:9222/devtools/browser/<id>"
	 */
	async connect(url: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const timer = setTimeout(() => {
				reject(new DriverError('session not created', `Connection to ${url} timed out after ${this.timeout}ms`));
			}, this.timeout);

			// The browser sends large screenshot frames
			this.ws = new WebSocket(url, { perMessageDeflate: false, maxPayload: 256 * 1024 * 1024 });

			this.ws.on('open', () => {
				clearTimeout(timer);
				this.connected = true;
				resolve();
			});

			this.ws.on('message', (data: RawData) => {
				const raw = decode(data);
				this.onRawMessage?.('receive', raw);
				this.handleMessage(raw);
			});

			this.ws.on('error', (err: Error) => {
				clearTimeout(timer);
				if (!this.connected) {
					reject(new DriverError('session not created', `WebSocket error: ${err.message}`));
				}
			});

			this.ws.on('close', (code: number, reason: Buffer) => {
				clearTimeout(timer);
				const wasConnected = this.connected;
				this.connected = false;

				for (const [id, cmd] of this.pending) {
					cmd.reject(new DriverError('unknown error', `Connection closed while waiting for command ${id} (${cmd.method})`));
					clearTimeout(cmd.timer);
				}
				this.pending.clear();

				if (wasConnected) {
					this.onDisconnect?.(reason.toString('utf-8') || `code ${code}`);
				} else {
					reject(new DriverError('session not created', `WebSocket closed before connection established (code: ${code})`));
				}
			});
		});
	}

	/**
	 * Send a command and wait for its response.
	 *
	 * @param method - e.g. "Runtime.evaluate"
	 * @param sessionId - the attached tab session, omitted for browser-level commands
	 */
	async send(
		method: string,
		params: Record<string, unknown> = {},
		sessionId?: string,
	): Promise<Record<string, unknown>> {
		if (!this.connected || !this.ws) {
			throw new DriverError('session not created', 'Not connected to browser');
		}

		const id = this.nextId++;
		const command: CdpCommand = sessionId ? { id, method, params, sessionId } : { id, method, params };
		const raw = JSON.stringify(command);
		const ws = this.ws;

		return new Promise<Record<string, unknown>>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.pending.delete(id);
				reject(new DriverError('timeout', `Command "${method}" timed out after ${this.timeout}ms`));
			}, this.timeout);

			this.pending.set(id, { method, resolve, reject, timer });

			this.onRawMessage?.('send', raw);
			ws.send(raw);
		});
	}

	/**
	 * Subscribe to a protocol event.
	 *
	 * @param eventName - e.g. "Target.targetCreated"
	 * @returns Unsubscribe function
	 */
	on(eventName: string, handler: EventHandler): () => void {
		let handlers = this.eventHandlers.get(eventName);
		if (!handlers) {
			handlers = new Set();
			this.eventHandlers.set(eventName, handlers);
		}
		handlers.add(handler);

		return () => {
			this.eventHandlers.get(eventName)?.delete(handler);
		};
	}

	/**
	 * Wait for a specific event to occur (one-time).
	 *
	 * @param predicate - Optional filter function
	 * @param timeout - Max wait time in ms (default: the transport timeout)
	 */
	async waitForEvent(
		eventName: string,
		predicate?: (event: CdpEvent) => boolean,
		timeout?: number,
	): Promise<CdpEvent> {
		const waitTimeout = timeout ?? this.timeout;

		return new Promise<CdpEvent>((resolve, reject) => {
			const timer = setTimeout(() => {
				unsubscribe();
				reject(new DriverError('timeout', `Timed out waiting for event "${eventName}" after ${waitTimeout}ms`));
			}, waitTimeout);

			const unsubscribe = this.on(eventName, (event) => {
				if (!predicate || predicate(event)) {
					clearTimeout(timer);
					unsubscribe();
					resolve(event);
				}
			});
		});
	}

	/** Whether the transport is currently connected */
	get isConnected(): boolean {
		return this.connected;
	}

	/**
	 * Close the connection gracefully.
	 */
	async close(): Promise<void> {
		for (const [, cmd] of this.pending) {
			clearTimeout(cmd.timer);
			cmd.reject(new DriverError('unknown error', 'Transport closed'));
		}
		this.pending.clear();
		this.connected = false;

		const ws = this.ws;
		if (!ws) return;

		return new Promise<void>((resolve) => {
			if (ws.readyState === WebSocket.CLOSED) {
				resolve();
				return;
			}
			ws.on('close', () => {
				resolve();
			});
			ws.close();
		});
	}

	// -----------------------------------------------------------------------
	// Private
	// -----------------------------------------------------------------------

	private handleMessage(raw: string): void {
		const msg = parseMessage(raw);
		// Malformed frame -- ignore
		if (!msg) return;

		if (!('id' in msg)) {
			this.eventHandlers.get(msg.method)?.forEach((h) => h(msg));
			return;
		}

		const pending = this.pending.get(msg.id);
		// Orphaned response -- ignore
		if (!pending) return;

		this.pending.delete(msg.id);
		clearTimeout(pending.timer);

		if ('error' in msg) {
			pending.reject(new ProtocolError(pending.method, msg.error.code, msg.error.message));
		} else {
			pending.resolve(msg.result);
		}
	}
}
