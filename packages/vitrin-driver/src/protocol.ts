// ============================================================================
// Vitrin Driver - DevTools Protocol message shapes
// Only the slice of the protocol the driver speaks, plus readers that
// turn untyped JSON into these shapes without trusting it.
// ============================================================================

/** Command sent to the browser */
export interface CdpCommand {
	id: number;
	method: string;
	params: Record<string, unknown>;
	/** Target session for flattened (per-tab) commands */
	sessionId?: string;
}

/** Event pushed by the browser */
export interface CdpEvent {
	method: string;
	params: Record<string, unknown>;
	sessionId?: string;
}

/** Protocol-level error carried by a response */
export interface CdpErrorPayload {
	code: number;
	message: string;
	data?: string;
}

export type CdpResponse =
	| { id: number; result: Record<string, unknown>; sessionId?: string }
	| { id: number; error: CdpErrorPayload; sessionId?: string };

export type CdpMessage = CdpResponse | CdpEvent;

/** Runtime.RemoteObject, the fields we read */
export interface RemoteObject {
	type: string;
	subtype?: string;
	value?: unknown;
	objectId?: string;
	description?: string;
}

/** Runtime.ExceptionDetails, the fields we read */
export interface ExceptionDetails {
	text: string;
	exception?: RemoteObject;
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string | undefined {
	const value = record[key];
	return typeof value === 'string' ? value : undefined;
}

export function readNumber(record: Record<string, unknown>, key: string): number | undefined {
	const value = record[key];
	return typeof value === 'number' ? value : undefined;
}

export function readRecord(
	record: Record<string, unknown>,
	key: string,
): Record<string, unknown> | undefined {
	const value = record[key];
	return isRecord(value) ? value : undefined;
}

/** Parse one frame off the wire. Returns null for anything that is not a protocol message. */
export function parseMessage(raw: string): CdpMessage | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	if (!isRecord(parsed)) return null;

	const sessionId = readString(parsed, 'sessionId');
	const id = readNumber(parsed, 'id');

	if (id !== undefined) {
		const error = readRecord(parsed, 'error');
		if (error) {
			return {
				id,
				sessionId,
				error: {
					code: readNumber(error, 'code') ?? 0,
					message: readString(error, 'message') ?? 'Unknown protocol error',
					data: readString(error, 'data'),
				},
			};
		}
		return { id, sessionId, result: readRecord(parsed, 'result') ?? {} };
	}

	const method = readString(parsed, 'method');
	if (method === undefined) return null;
	return { method, sessionId, params: readRecord(parsed, 'params') ?? {} };
}

export function readRemoteObject(value: unknown): RemoteObject | undefined {
	if (!isRecord(value)) return undefined;
	const type = readString(value, 'type');
	if (type === undefined) return undefined;
	return {
		type,
		subtype: readString(value, 'subtype'),
		value: value.value,
		objectId: readString(value, 'objectId'),
		description: readString(value, 'description'),
	};
}

export function readExceptionDetails(value: unknown): ExceptionDetails | undefined {
	if (!isRecord(value)) return undefined;
	return {
		text: readString(value, 'text') ?? 'Uncaught',
		exception: readRemoteObject(value.exception),
	};
}
