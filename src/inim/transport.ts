// src/inim/transport.ts
// Thin HTTPS wrapper around api.inimcloud.com.
//
// Every INIM Cloud call is a GET whose JSON request is URL-encoded into the
// `req` query parameter. The response is an envelope { Status, ErrMsg, Data };
// Status 0 means success. This layer knows nothing about tokens: it only
// executes one request and classifies whatever went wrong.

import {
	AuthError,
	NetworkError,
	RateLimitError,
	ServerError,
} from './errors.js';
import { isRecord, readNumber, readString } from './json.js';
import { consoleLogger, type InimLogger } from './logger.js';

export const API_BASE_URL = 'https://api.inimcloud.com/';

export const API_HEADERS: Readonly<Record<string, string>> = {
	Accept: '*/*',
	'Accept-Language': 'it-it',
	'Accept-Encoding': 'identity',
	'User-Agent': 'Inim Home/5 CFNetwork/1329 Darwin/21.3.0',
};

// Cloud status codes meaning "token expired / invalid".
export const AUTH_STATUS_CODES: ReadonlySet<number> = new Set([18, 19, 20]);

export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export interface InimRequest {
	Node: string;
	Name: string;
	ClientIP: string;
	Method: string;
	Token: string;
	ClientId: string;
	Context?: string | null;
	Params: Record<string, unknown>;
}

export interface SendOptions {
	signal?: AbortSignal;
}

export interface InimTransport {
	/** Executes one request and resolves with the envelope's `Data`. */
	send(request: InimRequest, options?: SendOptions): Promise<unknown>;
}

export interface HttpTransportOptions {
	baseUrl?: string;
	timeoutMs?: number;
	logger?: InimLogger;
}

export function buildRequestUrl(baseUrl: string, request: InimRequest): string {
	return `${baseUrl}?req=${encodeURIComponent(JSON.stringify(request))}`;
}

function parseRetryAfter(value: string | null): number | null {
	if (!value) {
		return null;
	}
	const seconds = Number(value);
	if (Number.isFinite(seconds) && seconds >= 0) {
		return seconds * 1000;
	}
	const date = Date.parse(value);
	return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

/**
 * Interpret a decoded body as an INIM envelope. Exported so the fake
 * transports in tests classify exactly like the real one.
 */
export function unwrapEnvelope(method: string, body: unknown): unknown {
	if (!isRecord(body)) {
		throw new ServerError(`INIM ${method} returned a non-object payload`);
	}
	const status = readNumber(body, 'Status');

	if (status === 0) {
		return body.Data ?? null;
	}

	const errMsg = readString(body, 'ErrMsg') || 'Unknown error';

	if (status !== null && AUTH_STATUS_CODES.has(status)) {
		throw new AuthError(`INIM ${method} rejected token: ${errMsg}`, { apiStatus: status });
	}

	throw new ServerError(`INIM ${method} failed: ${errMsg}`, { apiStatus: status ?? -1 });
}

export class HttpTransport implements InimTransport {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly log: InimLogger;

	constructor(options: HttpTransportOptions = {}) {
		this.baseUrl = options.baseUrl ?? API_BASE_URL;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.log = options.logger ?? consoleLogger('inim-http');
	}

	public async send(request: InimRequest, options: SendOptions = {}): Promise<unknown> {
		const method = request.Method;
		const url = buildRequestUrl(this.baseUrl, request);

		// Log only the method name, never credentials or tokens.
		this.log.debug('INIM request: %s', method);

		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);

		const external = options.signal;
		// The timer or the caller may abort while the headers or the body are in flight.
		const abortError = (): NetworkError | null => {
			if (timedOut) {
				return new NetworkError(`INIM ${method} timed out after ${this.timeoutMs}ms`, { timedOut: true });
			}
			if (external?.aborted) {
				return new NetworkError(`INIM ${method} cancelled`, { cancelled: true });
			}
			return null;
		};
		const onExternalAbort = (): void => controller.abort();
		if (external) {
			if (external.aborted) {
				controller.abort();
			} else {
				external.addEventListener('abort', onExternalAbort, { once: true });
			}
		}

		try {
			let res: Response;
			try {
				res = await fetch(url, {
					method: 'GET',
					headers: { ...API_HEADERS },
					signal: controller.signal,
				});
			} catch (err) {
				throw abortError() ?? new NetworkError(
					`INIM ${method} connection error: ${err instanceof Error ? err.message : String(err)}`,
				);
			}

			if (res.status === 401 || res.status === 403) {
				throw new AuthError(`INIM ${method} returned HTTP ${res.status}`, { httpStatus: res.status });
			}
			if (res.status === 429) {
				throw new RateLimitError(
					`INIM ${method} rate limited`,
					parseRetryAfter(res.headers.get('retry-after')),
				);
			}
			if (!res.ok) {
				const text = await res.text().catch(() => '');
				this.log.error('INIM %s failed: HTTP %d %s %s', method, res.status, res.statusText, text);
				throw new ServerError(`INIM ${method} failed with HTTP ${res.status}`, { httpStatus: res.status });
			}

			let body: unknown;
			try {
				body = await res.json();
			} catch {
				throw abortError() ?? new ServerError(`INIM ${method} returned non-JSON payload`, { httpStatus: res.status });
			}

			const data = unwrapEnvelope(method, body);
			this.log.debug('INIM response: %s ok', method);
			return data;
		} finally {
			clearTimeout(timer);
			external?.removeEventListener('abort', onExternalAbort);
		}
	}
}
