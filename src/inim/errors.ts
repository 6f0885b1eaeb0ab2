// src/inim/errors.ts
// Error taxonomy shared by the transport, session, client, coordinator and dispatcher.

export type InimErrorKind =
	| 'invalid_credentials'
	| 'auth'
	| 'network'
	| 'rate_limit'
	| 'server'
	| 'precondition'
	| 'validation';

/**
 * Base class for every failure the engine reports.
 *
 * `kind` is what callers switch on; `retryable` tells the poll loop whether
 * backing off and trying again can help.
 */
export class InimError extends Error {
	public readonly kind: InimErrorKind;
	public readonly retryable: boolean;
	public readonly context?: Record<string, unknown>;

	constructor(
		message: string,
		kind: InimErrorKind,
		retryable: boolean,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.name = 'InimError';
		this.kind = kind;
		this.retryable = retryable;
		this.context = context;

		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Wrong email/password. Terminal: the user has to fix the configuration. */
export class InvalidCredentialsError extends InimError {
	constructor(message = 'INIM Cloud rejected the account credentials', context?: Record<string, unknown>) {
		super(message, 'invalid_credentials', false, context);
		this.name = 'InvalidCredentialsError';
	}
}

/** The bearer token was rejected (expired, revoked or skewed). Recovered by re-login. */
export class AuthError extends InimError {
	constructor(message = 'INIM Cloud rejected the access token', context?: Record<string, unknown>) {
		super(message, 'auth', true, context);
		this.name = 'AuthError';
	}
}

export class NetworkError extends InimError {
	public readonly timedOut: boolean;
	public readonly cancelled: boolean;

	constructor(
		message: string,
		options: { timedOut?: boolean; cancelled?: boolean; context?: Record<string, unknown> } = {},
	) {
		super(message, 'network', true, options.context);
		this.name = 'NetworkError';
		this.timedOut = options.timedOut ?? false;
		this.cancelled = options.cancelled ?? false;
	}
}

export class RateLimitError extends InimError {
	public readonly retryAfterMs: number | null;

	constructor(message: string, retryAfterMs: number | null, context?: Record<string, unknown>) {
		super(message, 'rate_limit', true, context);
		this.name = 'RateLimitError';
		this.retryAfterMs = retryAfterMs;
	}
}

/**
 * HTTP 5xx, an unreadable body, or a cloud envelope with a non-zero Status.
 * `apiStatus` is only set in the last case.
 */
export class ServerError extends InimError {
	public readonly httpStatus: number | null;
	public readonly apiStatus: number | null;

	constructor(
		message: string,
		options: { httpStatus?: number; apiStatus?: number; context?: Record<string, unknown> } = {},
	) {
		super(message, 'server', true, options.context);
		this.name = 'ServerError';
		this.httpStatus = options.httpStatus ?? null;
		this.apiStatus = options.apiStatus ?? null;
	}
}

/** A command cannot be sent as configured (e.g. no user code). Never retried. */
export class PreconditionFailedError extends InimError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'precondition', false, context);
		this.name = 'PreconditionFailedError';
	}
}

/** A command names something the last snapshot does not know about. */
export class ValidationError extends InimError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'validation', false, context);
		this.name = 'ValidationError';
	}
}

export function isInimError(err: unknown): err is InimError {
	return err instanceof InimError;
}

/**
 * Normalise anything thrown into the taxonomy. Foreign errors are treated as
 * server-side trouble so the poll loop keeps retrying them.
 */
export function toInimError(err: unknown): InimError {
	if (err instanceof InimError) {
		return err;
	}
	const message = err instanceof Error ? err.message : String(err);
	return new ServerError(`Unexpected error: ${message}`);
}

export function describeError(err: unknown): string {
	if (err instanceof InimError) {
		return `${err.name}: ${err.message}`;
	}
	return err instanceof Error ? err.message : String(err);
}
