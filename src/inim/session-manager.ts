// src/inim/session-manager.ts
// Owns the INIM Cloud bearer token: login, expiry tracking, single-flight
// re-login and the "authorized request" primitive every cloud call goes through.

import { randomUUID } from 'node:crypto';

import {
	AuthError,
	InvalidCredentialsError,
	ServerError,
	toInimError,
} from './errors.js';
import { isRecord, readNumber, readString } from './json.js';
import { consoleLogger, type InimLogger } from './logger.js';
import type { InimRequest, InimTransport } from './transport.js';

export const METHOD_REGISTER_CLIENT = 'RegisterClient';

// Nominal token lifetime when the cloud omits TTL.
export const DEFAULT_TOKEN_TTL_SECONDS = 86_400;

export interface InimCredentials {
	readonly email: string;
	readonly password: string;
	/** Panel PIN, required by area and zone commands. */
	readonly userCode?: string;
}

export interface Session {
	readonly accessToken: string;
	/** Absolute expiry, epoch ms. */
	readonly expiresAt: number;
	readonly obtainedAt: number;
}

export type AuthorizedOperation<T> = (token: string, clientId: string) => Promise<T>;

export interface SessionManagerOptions {
	clientId?: string;
	clientName?: string;
	/** Treat the token as expired this long before the cloud says it is. */
	refreshMarginMs?: number;
	/** Attempts for a login that keeps failing with ServerError. */
	maxLoginAttempts?: number;
	loginRetryDelayMs?: number;
	maxLoginRetryDelayMs?: number;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	logger?: InimLogger;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

export class SessionManager {
	private readonly transport: InimTransport;
	private readonly credentials: InimCredentials;
	private readonly log: InimLogger;
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly refreshMarginMs: number;
	private readonly maxLoginAttempts: number;
	private readonly loginRetryDelayMs: number;
	private readonly maxLoginRetryDelayMs: number;
	private readonly clientName: string;

	public readonly clientId: string;

	private session: Session | null = null;

	// The single in-flight login. Every caller that needs a token while it is
	// pending awaits this same promise and sees the same token or failure.
	private loginInFlight: Promise<Session> | null = null;

	constructor(
		transport: InimTransport,
		credentials: InimCredentials,
		options: SessionManagerOptions = {},
	) {
		this.transport = transport;
		this.credentials = Object.freeze({ ...credentials });
		this.log = options.logger ?? consoleLogger('inim-session');
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? defaultSleep;
		this.refreshMarginMs = options.refreshMarginMs ?? 60_000;
		this.maxLoginAttempts = Math.max(1, options.maxLoginAttempts ?? 3);
		this.loginRetryDelayMs = options.loginRetryDelayMs ?? 2_000;
		this.maxLoginRetryDelayMs = options.maxLoginRetryDelayMs ?? 30_000;
		this.clientName = options.clientName ?? 'Homebridge';
		this.clientId = options.clientId ?? `homebridge-${randomUUID()}`;
	}

	public get isAuthenticated(): boolean {
		return this.session !== null;
	}

	public getSession(): Session | null {
		return this.session;
	}

	/**
	 * Log in, or join the login already in progress.
	 */
	public login(): Promise<Session> {
		if (this.loginInFlight) {
			return this.loginInFlight;
		}

		const flight = this.performLogin().finally(() => {
			if (this.loginInFlight === flight) {
				this.loginInFlight = null;
			}
		});
		this.loginInFlight = flight;
		return flight;
	}

	/**
	 * Drop the current token. With `rejectedToken`, only drop it if it is still
	 * the current one, so a late 401 cannot discard a token obtained after it.
	 */
	public invalidate(rejectedToken?: string): void {
		if (!this.session) {
			return;
		}
		if (rejectedToken === undefined || this.session.accessToken === rejectedToken) {
			this.log.debug('INIM session invalidated.');
			this.session = null;
		}
	}

	/**
	 * Run `op` with a valid token, logging in first when needed. If the cloud
	 * rejects a token that looked valid, re-login and retry exactly once.
	 */
	public async authorizedRequest<T>(op: AuthorizedOperation<T>): Promise<T> {
		const token = await this.acquireToken();
		try {
			return await op(token, this.clientId);
		} catch (err) {
			if (!(err instanceof AuthError)) {
				throw err;
			}

			this.log.warn('INIM token rejected before its expiry; re-authenticating and retrying once.');
			this.invalidate(token);

			const fresh = await this.acquireToken();
			return await op(fresh, this.clientId);
		}
	}

	private acquireToken(): Promise<string> {
		const current = this.session;
		if (current && this.now() < current.expiresAt - this.refreshMarginMs) {
			return Promise.resolve(current.accessToken);
		}
		return this.login().then((session) => session.accessToken);
	}

	private async performLogin(): Promise<Session> {
		this.session = null;
		let delayMs = this.loginRetryDelayMs;

		for (let attempt = 1; ; attempt += 1) {
			try {
				const session = await this.registerClient();
				this.session = session;
				this.log.info(
					'INIM Cloud login successful; token valid until %s',
					new Date(session.expiresAt).toISOString(),
				);
				return session;
			} catch (err) {
				const failure = this.classifyLoginFailure(err);

				if (failure instanceof ServerError && attempt < this.maxLoginAttempts) {
					this.log.warn(
						'INIM Cloud login attempt %d/%d failed (%s); retrying in %dms',
						attempt,
						this.maxLoginAttempts,
						failure.message,
						delayMs,
					);
					await this.sleep(delayMs);
					delayMs = Math.min(delayMs * 2, this.maxLoginRetryDelayMs);
					continue;
				}

				this.log.error('INIM Cloud login failed: %s', failure.message);
				throw failure;
			}
		}
	}

	private async registerClient(): Promise<Session> {
		const clientInfo = JSON.stringify({
			name: 'homebridge-inim-cloud',
			version: '1.0.0',
			device: 'Homebridge',
			brand: 'Homebridge',
			platform: process.platform,
		});

		const request: InimRequest = {
			Node: '',
			Name: '',
			ClientIP: '',
			Method: METHOD_REGISTER_CLIENT,
			ClientId: '',
			Token: '',
			Params: {
				Username: this.credentials.email,
				Password: this.credentials.password,
				ClientId: this.clientId,
				ClientName: this.clientName,
				ClientInfo: clientInfo,
				Role: '1',
				Brand: '0',
			},
		};

		const data = await this.transport.send(request);
		const token = isRecord(data) ? readString(data, 'Token') : null;
		if (!token) {
			throw new InvalidCredentialsError('INIM Cloud login returned no token');
		}

		const ttlSeconds = (isRecord(data) ? readNumber(data, 'TTL') : null) ?? DEFAULT_TOKEN_TTL_SECONDS;
		const obtainedAt = this.now();
		return {
			accessToken: token,
			obtainedAt,
			expiresAt: obtainedAt + ttlSeconds * 1000,
		};
	}

	// A login rejected by the cloud itself (or with 401/403) means bad credentials.
	// An envelope without a Status is malformed, not a rejection.
	private classifyLoginFailure(err: unknown): Error {
		if (err instanceof AuthError) {
			return new InvalidCredentialsError(err.message, err.context);
		}
		if (err instanceof ServerError && err.apiStatus !== null && err.apiStatus >= 0) {
			return new InvalidCredentialsError(err.message, { apiStatus: err.apiStatus });
		}
		return toInimError(err);
	}
}
