// src/inim/poll-coordinator.ts
// Single background polling loop for one panel: Idle -> Polling -> (Idle | Backoff).
//
// At most one fetch is ever in flight. Interval ticks that land while a poll
// is running or while backing off are skipped, so results reach the
// reconciler strictly in snapshot order.

import {
	InvalidCredentialsError,
	RateLimitError,
	describeError,
	toInimError,
	type InimError,
} from './errors.js';
import type { SnapshotSource } from './inim-client.js';
import { consoleLogger, type InimLogger } from './logger.js';
import type { DeviceView, Reconciler, StateChange } from './reconciler.js';
import type { ScenarioRoleResolver } from './scenario-roles.js';
import type { DeviceSnapshot } from './snapshot.js';

export type PollState = 'idle' | 'polling' | 'backoff' | 'stopped';

export interface PollStatus {
	readonly state: PollState;
	readonly consecutiveFailures: number;
	/** Delay before the next attempt while in backoff, else null. */
	readonly backoffMs: number | null;
	readonly lastError: InimError | null;
}

export type StateChangeHandler = (changes: readonly StateChange[], view: DeviceView) => void;
export type AvailabilityHandler = (available: boolean, error: InimError | null, retryInMs: number | null) => void;
export type ReauthHandler = (error: InvalidCredentialsError) => void;

export const DEFAULT_POLL_INTERVAL_MS = 30_000;
export const DEFAULT_BASE_BACKOFF_MS = 5_000;
export const DEFAULT_MAX_BACKOFF_MS = 300_000;

export interface PollCoordinatorOptions {
	/** Panel to poll; null picks the first panel on the account. */
	deviceId?: number | null;
	intervalMs?: number;
	baseBackoffMs?: number;
	maxBackoffMs?: number;
	roles?: ScenarioRoleResolver;
	logger?: InimLogger;
}

/** min(base * 2^(failures-1), max) */
export function computeBackoffDelay(failures: number, baseMs: number, maxMs: number): number {
	const exponent = Math.max(0, failures - 1);
	return Math.min(baseMs * 2 ** exponent, maxMs);
}

export class PollCoordinator {
	private readonly source: SnapshotSource;
	private readonly reconciler: Reconciler;
	private readonly roles: ScenarioRoleResolver | null;
	private readonly log: InimLogger;
	private readonly intervalMs: number;
	private readonly baseBackoffMs: number;
	private readonly maxBackoffMs: number;
	private deviceId: number | null;

	private state: PollState = 'stopped';
	private consecutiveFailures = 0;
	private backoffMs: number | null = null;
	private lastError: InimError | null = null;

	private intervalTimer: NodeJS.Timeout | null = null;
	private backoffTimer: NodeJS.Timeout | null = null;
	private inFlight: AbortController | null = null;
	// Set by forcePoll while a poll runs: poll once more as soon as it lands.
	private followUpQueued = false;

	// Bumped by stop(); a poll that finishes under an older generation is discarded.
	private generation = 0;

	private readonly stateChangeHandlers: StateChangeHandler[] = [];
	private readonly availabilityHandlers: AvailabilityHandler[] = [];
	private readonly reauthHandlers: ReauthHandler[] = [];

	constructor(source: SnapshotSource, reconciler: Reconciler, options: PollCoordinatorOptions = {}) {
		this.source = source;
		this.reconciler = reconciler;
		this.roles = options.roles ?? null;
		this.log = options.logger ?? consoleLogger('inim-poll');
		this.deviceId = options.deviceId ?? null;
		this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.baseBackoffMs = options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
		this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
	}

	public onStateChanges(handler: StateChangeHandler): void {
		this.stateChangeHandlers.push(handler);
	}

	public onAvailabilityChange(handler: AvailabilityHandler): void {
		this.availabilityHandlers.push(handler);
	}

	public onReauthRequired(handler: ReauthHandler): void {
		this.reauthHandlers.push(handler);
	}

	public getStatus(): PollStatus {
		return {
			state: this.state,
			consecutiveFailures: this.consecutiveFailures,
			backoffMs: this.backoffMs,
			lastError: this.lastError,
		};
	}

	/** Panel actually being polled (resolved from the first snapshot when not configured). */
	public getDeviceId(): number | null {
		return this.deviceId;
	}

	/** Start the interval and poll once right away. No-op when already running. */
	public start(): void {
		if (this.state !== 'stopped') {
			return;
		}
		this.state = 'idle';
		this.consecutiveFailures = 0;
		this.backoffMs = null;
		this.lastError = null;

		this.log.info('INIM polling started (every %ds).', Math.round(this.intervalMs / 1000));
		this.intervalTimer = setInterval(() => this.tick(), this.intervalMs);
		void this.runPoll();
	}

	/**
	 * Poll now if idle and resolve true once it is done. While a poll is
	 * running, one follow-up poll is queued behind it and false is returned.
	 * Backing off or stopped: false, nothing queued.
	 */
	public async forcePoll(): Promise<boolean> {
		if (this.state === 'polling') {
			this.log.debug('INIM forcePoll queued behind the running poll.');
			this.followUpQueued = true;
			return false;
		}
		if (this.state !== 'idle') {
			this.log.debug('INIM forcePoll skipped; coordinator is %s.', this.state);
			return false;
		}
		await this.runPoll();
		return true;
	}

	/** Stop the loop, cancel the in-flight request and drop its result. */
	public stop(): void {
		if (this.state === 'stopped') {
			return;
		}
		this.state = 'stopped';
		this.generation += 1;
		this.followUpQueued = false;
		this.clearTimers();
		this.inFlight?.abort();
		this.inFlight = null;
		this.log.info('INIM polling stopped.');
	}

	private tick(): void {
		if (this.state !== 'idle') {
			this.log.debug('INIM poll tick skipped; coordinator is %s.', this.state);
			return;
		}
		void this.runPoll();
	}

	// Never rejects: every failure is routed to handleFailure.
	private async runPoll(): Promise<void> {
		const generation = this.generation;
		const controller = new AbortController();
		this.state = 'polling';
		this.inFlight = controller;
		const ticket = this.reconciler.beginFetch();

		let snapshot: DeviceSnapshot;
		try {
			snapshot = await this.source.fetchSnapshot(this.deviceId, { signal: controller.signal });
		} catch (err) {
			if (generation !== this.generation) {
				return;
			}
			this.inFlight = null;
			this.handleFailure(toInimError(err));
			return;
		}

		if (generation !== this.generation) {
			this.log.debug('INIM poll result dropped after stop().');
			return;
		}
		this.inFlight = null;
		this.handleSuccess(snapshot, ticket);

		if (this.followUpQueued && this.getStatus().state === 'idle') {
			this.followUpQueued = false;
			await this.runPoll();
		}
	}

	private handleSuccess(snapshot: DeviceSnapshot, ticket: number): void {
		const recovering = this.consecutiveFailures > 0;
		this.consecutiveFailures = 0;
		this.backoffMs = null;
		this.lastError = null;

		if (this.deviceId === null) {
			this.deviceId = snapshot.deviceId;
			this.log.info('INIM: using panel %d (%s).', snapshot.deviceId, snapshot.name);
		}

		if (this.roles && !this.roles.resolved) {
			const resolution = this.roles.resolve(snapshot);
			for (const problem of resolution.problems) {
				this.log.warn('INIM scenario roles: %s', problem);
			}
			this.log.debug(
				'INIM scenario roles: disarm=%s armAway=%s armHome=%s',
				resolution.roles.disarm,
				resolution.roles.armAway,
				resolution.roles.armHome,
			);
		}

		const changes = this.reconciler.ingest(snapshot, ticket);
		this.state = 'idle';

		if (recovering) {
			this.log.info('INIM Cloud reachable again.');
			this.emitAvailability(true, null, null);
		}

		const view = this.reconciler.getView();
		if (view && changes.length > 0) {
			this.emitStateChanges(changes, view);
		}
	}

	private handleFailure(error: InimError): void {
		this.lastError = error;
		// The backoff retry doubles as the follow-up.
		this.followUpQueued = false;

		if (error instanceof InvalidCredentialsError) {
			this.log.error('INIM Cloud rejected the credentials; polling stopped until they are updated.');
			this.state = 'stopped';
			this.generation += 1;
			this.clearTimers();
			this.reconciler.markStale();
			this.emitAvailability(false, error, null);
			for (const handler of this.reauthHandlers) {
				this.safely(() => handler(error));
			}
			return;
		}

		this.consecutiveFailures += 1;
		let delay = computeBackoffDelay(this.consecutiveFailures, this.baseBackoffMs, this.maxBackoffMs);
		if (error instanceof RateLimitError && error.retryAfterMs !== null) {
			delay = Math.min(Math.max(delay, error.retryAfterMs), this.maxBackoffMs);
		}
		this.backoffMs = delay;
		this.state = 'backoff';

		this.log.warn(
			'INIM poll failed (%s); attempt %d, retrying in %dms.',
			describeError(error),
			this.consecutiveFailures,
			delay,
		);

		this.reconciler.markStale();
		this.emitAvailability(false, error, delay);

		this.backoffTimer = setTimeout(() => {
			this.backoffTimer = null;
			if (this.state === 'backoff') {
				void this.runPoll();
			}
		}, delay);
	}

	private emitStateChanges(changes: readonly StateChange[], view: DeviceView): void {
		for (const handler of this.stateChangeHandlers) {
			this.safely(() => handler(changes, view));
		}
	}

	private emitAvailability(available: boolean, error: InimError | null, retryInMs: number | null): void {
		for (const handler of this.availabilityHandlers) {
			this.safely(() => handler(available, error, retryInMs));
		}
	}

	// A throwing subscriber must not wedge the loop in 'polling'.
	private safely(fn: () => void): void {
		try {
			fn();
		} catch (err) {
			this.log.error('INIM state handler threw: %s', describeError(err));
		}
	}

	private clearTimers(): void {
		if (this.intervalTimer) {
			clearInterval(this.intervalTimer);
			this.intervalTimer = null;
		}
		if (this.backoffTimer) {
			clearTimeout(this.backoffTimer);
			this.backoffTimer = null;
		}
	}
}
