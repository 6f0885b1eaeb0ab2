// src/inim/engine.ts
// InimAccount holds what every panel of one login shares: transport -> session
// -> client. InimEngine is the sync engine for one panel on top of it:
// reconciler, scenario roles, poll coordinator and command dispatcher.

import { CommandDispatcher, type CommandIntent, type CommandResult } from './command-dispatcher.js';
import { ValidationError } from './errors.js';
import { InimClient } from './inim-client.js';
import { consoleLogger, type InimLogger } from './logger.js';
import { derivePanelState, type PanelState } from './panel-state.js';
import type { InimPlatformConfig } from './platform-config.js';
import {
	PollCoordinator,
	type AvailabilityHandler,
	type PollStatus,
	type ReauthHandler,
	type StateChangeHandler,
} from './poll-coordinator.js';
import { Reconciler, type DeviceView } from './reconciler.js';
import { ScenarioRoleResolver, type ScenarioRoleMap } from './scenario-roles.js';
import { SessionManager } from './session-manager.js';
import { HttpTransport, type InimTransport } from './transport.js';

export interface InimAccountOptions {
	config: InimPlatformConfig;
	logger?: InimLogger;
	/** Defaults to an HttpTransport against the public cloud. */
	transport?: InimTransport;
	clientId?: string;
	now?: () => number;
}

export class InimAccount {
	public readonly session: SessionManager;
	public readonly client: InimClient;

	private readonly configuredDeviceId: number | null;
	private readonly log: InimLogger;

	constructor(options: InimAccountOptions) {
		const { config } = options;
		this.log = options.logger ?? consoleLogger('inim');
		this.configuredDeviceId = config.deviceId;

		const transport = options.transport ?? new HttpTransport({
			timeoutMs: config.requestTimeoutSeconds * 1000,
			logger: this.log,
		});

		this.session = new SessionManager(transport, config.credentials, {
			clientId: options.clientId,
			now: options.now,
			logger: this.log,
		});
		this.client = new InimClient(this.session, transport, this.log);
	}

	/**
	 * Ids of the panels to synchronise: the configured `deviceId` alone
	 * (no request), else every panel on the account.
	 */
	public async discoverPanels(): Promise<number[]> {
		if (this.configuredDeviceId !== null) {
			return [this.configuredDeviceId];
		}

		const devices = await this.client.listDevices();
		if (devices.length === 0) {
			throw new ValidationError('No INIM panel found on this account');
		}
		for (const device of devices) {
			this.log.info('INIM: found panel %d (%s).', device.deviceId, device.name);
		}
		return devices.map((device) => device.deviceId);
	}
}

export interface InimEngineOptions extends InimAccountOptions {
	/** Share one login between the engines of several panels. */
	account?: InimAccount;
	/** Panel to poll; defaults to the configured one, else the first on the account. */
	deviceId?: number | null;
	baseBackoffMs?: number;
	maxBackoffMs?: number;
}

export class InimEngine {
	public readonly account: InimAccount;
	public readonly session: SessionManager;
	public readonly client: InimClient;
	public readonly reconciler: Reconciler;
	public readonly roles: ScenarioRoleResolver;
	public readonly coordinator: PollCoordinator;
	public readonly dispatcher: CommandDispatcher;

	private readonly log: InimLogger;

	constructor(options: InimEngineOptions) {
		const { config } = options;
		this.log = options.logger ?? consoleLogger('inim');

		this.account = options.account ?? new InimAccount({ ...options, logger: this.log });
		this.session = this.account.session;
		this.client = this.account.client;
		this.reconciler = new Reconciler(options.now);
		this.roles = new ScenarioRoleResolver(config.scenarioOverrides);
		this.coordinator = new PollCoordinator(this.client, this.reconciler, {
			deviceId: options.deviceId === undefined ? config.deviceId : options.deviceId,
			intervalMs: config.scanIntervalSeconds * 1000,
			baseBackoffMs: options.baseBackoffMs,
			maxBackoffMs: options.maxBackoffMs,
			roles: this.roles,
			logger: this.log,
		});
		this.dispatcher = new CommandDispatcher(this.client, this.reconciler, this.coordinator, {
			userCode: config.credentials.userCode,
			logger: this.log,
		});
	}

	public start(): void {
		this.coordinator.start();
	}

	public stop(): void {
		this.coordinator.stop();
	}

	/** Panel being polled; null until the first snapshot when none was given. */
	public get deviceId(): number | null {
		return this.coordinator.getDeviceId();
	}

	public getView(): DeviceView | null {
		return this.reconciler.getView();
	}

	public getStatus(): PollStatus {
		return this.coordinator.getStatus();
	}

	public getScenarioRoles(): ScenarioRoleMap | null {
		return this.roles.resolved?.roles ?? null;
	}

	public getPanelState(): PanelState | null {
		const view = this.reconciler.getView();
		return view ? derivePanelState(view, this.getScenarioRoles()) : null;
	}

	public get canSendPinCommands(): boolean {
		return this.dispatcher.hasUserCode;
	}

	public dispatch(intent: CommandIntent): Promise<CommandResult> {
		return this.dispatcher.dispatch(intent);
	}

	public onStateChanges(handler: StateChangeHandler): void {
		this.coordinator.onStateChanges(handler);
	}

	public onAvailabilityChange(handler: AvailabilityHandler): void {
		this.coordinator.onAvailabilityChange(handler);
	}

	public onReauthRequired(handler: ReauthHandler): void {
		this.coordinator.onReauthRequired(handler);
	}
}
