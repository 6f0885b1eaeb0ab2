// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { InimAccount, InimEngine } from './inim/engine.js';
import { InvalidCredentialsError, describeError, toInimError, type InimError } from './inim/errors.js';
import type { InimLogger } from './inim/logger.js';
import { parseInimPlatformConfig, type InimPlatformConfig } from './inim/platform-config.js';
import { DEFAULT_BASE_BACKOFF_MS, DEFAULT_MAX_BACKOFF_MS, computeBackoffDelay } from './inim/poll-coordinator.js';
import type { DeviceView, StateChange } from './inim/reconciler.js';
import {
	isGenericAreaName,
	type InimAccessoryEnv,
	type InimAccessoryHandle,
} from './inim/inim-accessory-helpers.js';
import {
	PANEL_ACCESSORY_KEY,
	areaAccessoryKey,
	configureInimAreaAccessory,
	configureInimPanelAccessory,
} from './inim/inim-panel-accessory.js';
import { configureInimZoneAccessory, zoneAccessoryKey } from './inim/inim-zone-accessory.js';
import { configureInimScenarioAccessory, scenarioAccessoryKey } from './inim/inim-scenario-accessory.js';

const toInimLogger = (log: Logger): InimLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

// One synchronised panel: its engine and the accessories configured for it.
interface PanelBinding {
	readonly deviceId: number;
	readonly engine: InimEngine;
	readonly env: InimAccessoryEnv;
	// Configured accessories by entity key ('panel', 'area:3', 'zone:12', ...).
	readonly handles: Map<string, InimAccessoryHandle>;
}

interface DesiredAccessory {
	key: string;
	name: string;
	configure(accessory: PlatformAccessory, view: DeviceView): InimAccessoryHandle;
}

export class InimCloudPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly settings: InimPlatformConfig | null;
	private readonly account: InimAccount | null;
	private readonly panels = new Map<number, PanelBinding>();

	private launchTimer: NodeJS.Timeout | null = null;
	private shuttingDown = false;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;

		const parsed = parseInimPlatformConfig(config);
		for (const warning of parsed.warnings) {
			this.log.warn('INIM config: %s', warning);
		}
		this.settings = parsed.config;

		if (!this.settings) {
			this.account = null;
			this.log.error('INIM: platform disabled until the configuration is fixed.');
			return;
		}

		// One login shared by the engines of every panel on the account.
		this.account = new InimAccount({
			config: this.settings,
			logger: toInimLogger(this.log),
		});

		this.log.info(this.settings.name, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			this.launch(1);
		});
		this.api.on('shutdown', () => {
			this.shuttingDown = true;
			if (this.launchTimer) {
				clearTimeout(this.launchTimer);
				this.launchTimer = null;
			}
			for (const panel of this.panels.values()) {
				panel.engine.stop();
			}
		});
	}

	// Find the panels to synchronise, retrying with backoff until the cloud answers.
	private launch(attempt: number): void {
		const account = this.account;
		if (!account || this.shuttingDown) {
			return;
		}

		account.discoverPanels()
			.then((deviceIds) => this.startPanels(deviceIds))
			.catch((err: unknown) => {
				const error = toInimError(err);
				if (error instanceof InvalidCredentialsError) {
					this.log.error(
						'INIM: %s. Update "email"/"password" in config.json and restart Homebridge.',
						error.message,
					);
					return;
				}
				if (this.shuttingDown) {
					return;
				}

				const delay = computeBackoffDelay(attempt, DEFAULT_BASE_BACKOFF_MS, DEFAULT_MAX_BACKOFF_MS);
				this.log.warn(
					'INIM: panel discovery failed (%s); retrying in %ds.',
					describeError(error),
					Math.round(delay / 1000),
				);
				this.launchTimer = setTimeout(() => {
					this.launchTimer = null;
					this.launch(attempt + 1);
				}, delay);
			});
	}

	private startPanels(deviceIds: readonly number[]): void {
		const account = this.account;
		const settings = this.settings;
		if (!account || !settings || this.shuttingDown) {
			return;
		}

		const gone = this.accessories.filter(acc => !deviceIds.includes(Number(acc.context.deviceId)));
		if (gone.length > 0) {
			for (const accessory of gone) {
				this.log.info('INIM: removing accessory %s; its panel is no longer on the account.', accessory.displayName);
				this.accessories.splice(this.accessories.indexOf(accessory), 1);
			}
			this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, gone);
		}

		for (const deviceId of deviceIds) {
			if (this.panels.has(deviceId)) {
				continue;
			}
			const panel = this.bindPanel(account, settings, deviceId);
			this.panels.set(deviceId, panel);
			panel.engine.start();
		}
	}

	private bindPanel(account: InimAccount, settings: InimPlatformConfig, deviceId: number): PanelBinding {
		const engine = new InimEngine({
			config: settings,
			account,
			deviceId,
			logger: toInimLogger(this.log),
		});
		const handles = new Map<string, InimAccessoryHandle>();

		const env: InimAccessoryEnv = {
			log: this.log,
			api: this.api,
			engine,
			exposeBypassSwitches: settings.exposeBypassSwitches,
			publishChanges: (changes) => {
				const view = engine.getView();
				if (view) {
					this.refreshTouched(panel, changes, view);
				}
			},
		};
		const panel: PanelBinding = { deviceId, engine, env, handles };

		engine.onStateChanges((changes, view) => {
			this.syncAccessories(panel, view);
			this.refreshTouched(panel, changes, view);
		});
		engine.onAvailabilityChange((available, error, retryInMs) => {
			this.handleAvailability(panel, available, error, retryInMs);
		});
		engine.onReauthRequired((error) => {
			this.log.error(
				'INIM: %s. Update "email"/"password" in config.json and restart Homebridge.',
				error.message,
			);
		});

		return panel;
	}

	private refreshTouched(panel: PanelBinding, changes: readonly StateChange[], view: DeviceView): void {
		const touched = new Set(changes.map((change) => change.entityId));
		for (const handle of panel.handles.values()) {
			for (const id of touched) {
				if (handle.watches(id)) {
					handle.refresh(view);
					break;
				}
			}
		}
	}

	// Every accessory of the panel is refreshed: stale views push "No Response",
	// a fresh one after recovery restores the values.
	private handleAvailability(
		panel: PanelBinding,
		available: boolean,
		error: InimError | null,
		retryInMs: number | null,
	): void {
		const reason = error ? describeError(error) : 'unknown error';
		if (available) {
			this.log.info('INIM: panel %d available again.', panel.deviceId);
		} else if (retryInMs === null) {
			this.log.warn('INIM: panel %d unavailable (%s).', panel.deviceId, reason);
		} else {
			this.log.warn(
				'INIM: panel %d unavailable (%s); retrying in %ds.',
				panel.deviceId,
				reason,
				Math.round(retryInMs / 1000),
			);
		}

		const view = panel.engine.getView();
		if (!view) {
			return;
		}
		for (const handle of panel.handles.values()) {
			handle.refresh(view);
		}
	}

	private desiredAccessories(view: DeviceView, env: InimAccessoryEnv, settings: InimPlatformConfig): DesiredAccessory[] {
		const snapshot = view.snapshot;
		const desired: DesiredAccessory[] = [{
			key: PANEL_ACCESSORY_KEY,
			name: snapshot.name,
			configure: (accessory, current) => configureInimPanelAccessory(env, accessory, current),
		}];

		for (const area of snapshot.areas) {
			if (isGenericAreaName(area.name)) {
				continue;
			}
			desired.push({
				key: areaAccessoryKey(area.id),
				name: area.name,
				configure: (accessory, current) => configureInimAreaAccessory(env, accessory, current, area.id),
			});
		}

		for (const zone of snapshot.zones) {
			if (!zone.visible) {
				continue;
			}
			const deviceClass = env.engine.reconciler.deviceClassOf(zone);
			desired.push({
				key: zoneAccessoryKey(zone.id),
				name: zone.name,
				configure: (accessory, current) => configureInimZoneAccessory(env, accessory, current, zone, deviceClass),
			});
		}

		if (settings.exposeScenarioSwitches) {
			for (const scenario of snapshot.scenarios) {
				desired.push({
					key: scenarioAccessoryKey(scenario.id),
					name: `Scenario ${scenario.name}`,
					configure: (accessory, current) => configureInimScenarioAccessory(env, accessory, current, scenario),
				});
			}
		}

		return desired;
	}

	/**
	 * Register accessories for entities of the panel seen for the first time
	 * and unregister those whose entity is gone.
	 */
	private syncAccessories(panel: PanelBinding, view: DeviceView): void {
		const settings = this.settings;
		if (!settings) {
			return;
		}

		const { env, handles } = panel;
		const desired = this.desiredAccessories(view, env, settings);
		const wantedUuids = new Set<string>();
		const wantedKeys = new Set<string>();

		for (const entry of desired) {
			const uuidSeed = `inim-${view.snapshot.deviceId}-${entry.key}`;
			const uuid = this.api.hap.uuid.generate(uuidSeed);
			wantedUuids.add(uuid);
			wantedKeys.add(entry.key);

			if (handles.has(entry.key)) {
				continue;
			}

			let accessory = this.accessories.find(acc => acc.UUID === uuid);
			if (accessory) {
				this.log.info('INIM: using cached accessory for %s (%s)', entry.name, uuidSeed);
			} else {
				this.log.info('INIM: registering new accessory for %s (%s)', entry.name, uuidSeed);
				accessory = new this.api.platformAccessory(entry.name, uuid);
				this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
				this.accessories.push(accessory);
			}

			accessory.context.deviceId = panel.deviceId;
			accessory.context.entityKey = entry.key;
			handles.set(entry.key, entry.configure(accessory, view));
		}

		for (const key of [...handles.keys()]) {
			if (!wantedKeys.has(key)) {
				handles.delete(key);
			}
		}

		const stale = this.accessories.filter(acc =>
			Number(acc.context.deviceId) === panel.deviceId && !wantedUuids.has(acc.UUID));
		if (stale.length > 0) {
			for (const accessory of stale) {
				this.log.info('INIM: removing accessory %s; its entity is gone.', accessory.displayName);
				this.accessories.splice(this.accessories.indexOf(accessory), 1);
			}
			this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
		}
	}
}
