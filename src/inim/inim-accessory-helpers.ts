// src/inim/inim-accessory-helpers.ts
import type {
	API,
	Characteristic,
	CharacteristicValue,
	Logger,
	PlatformAccessory,
	Service,
	WithUUID,
} from 'homebridge';

import type { CommandIntent } from './command-dispatcher.js';
import type { InimEngine } from './engine.js';
import type { DeviceView, StateChange } from './reconciler.js';
import type { DeviceSnapshot } from './snapshot.js';

// Minimal runtime "env" that accessory modules need from the platform
export interface InimAccessoryEnv {
	log: Logger;
	api: API;
	engine: InimEngine;
	exposeBypassSwitches: boolean;
	/** Push optimistic changes of a successful command to the affected accessories. */
	publishChanges(changes: readonly StateChange[]): void;
}

/**
 * What the platform keeps per configured accessory: which entities it shows
 * and how to push a new view into its characteristics.
 */
export interface InimAccessoryHandle {
	readonly key: string;
	watches(entityId: string): boolean;
	refresh(view: DeviceView): void;
}

type CharacteristicType = WithUUID<new () => Characteristic>;

// Cloud default names carry no information; such areas are not exposed.
const GENERIC_AREA_NAME = /^area\s*\d+$/i;

export function isGenericAreaName(name: string): boolean {
	return GENERIC_AREA_NAME.test(name.trim());
}

export function communicationFailure(api: API): Error {
	return new api.hap.HapStatusError(api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
}

/**
 * The view an onGet handler may answer from. No view yet, or a stale one,
 * makes HomeKit show "No Response" while the cached values stay untouched.
 */
export function requireFreshView(env: InimAccessoryEnv): DeviceView {
	const view = env.engine.getView();
	if (!view || view.stale) {
		throw communicationFailure(env.api);
	}
	return view;
}

/**
 * Push one characteristic value, or the "No Response" status while the view
 * is stale.
 */
export function pushValue(
	env: InimAccessoryEnv,
	service: Service,
	characteristic: CharacteristicType,
	view: DeviceView,
	value: CharacteristicValue,
): void {
	if (view.stale) {
		service.updateCharacteristic(characteristic, communicationFailure(env.api));
		return;
	}
	service.updateCharacteristic(characteristic, value);
}

/** Dispatch from an onSet handler; a failed command becomes a HAP error. */
export async function runCommand(env: InimAccessoryEnv, intent: CommandIntent, label: string): Promise<void> {
	const result = await env.engine.dispatch(intent);
	if (!result.ok) {
		env.log.warn('INIM: %s failed (%s): %s', label, result.error.kind, result.error.message);
		throw communicationFailure(env.api);
	}
	env.log.info('INIM: %s sent', label);
	env.publishChanges(result.changes);
}

/**
 * Populate the standard Accessory Information service with panel metadata.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	snapshot: DeviceSnapshot,
	name: string,
	serialSuffix: string,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const serialBase = snapshot.serialNumber ?? String(snapshot.deviceId);

	infoService
		.updateCharacteristic(Characteristic.Name, name)
		.updateCharacteristic(Characteristic.Manufacturer, 'INIM Electronics')
		.updateCharacteristic(Characteristic.Model, snapshot.model || 'INIM Panel')
		.updateCharacteristic(Characteristic.SerialNumber, serialSuffix ? `${serialBase}-${serialSuffix}` : serialBase);

	if (snapshot.firmware !== '.') {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, snapshot.firmware);
	}
}

/** Get the service of a type (and subtype), adding it when missing. */
export function ensureService(
	accessory: PlatformAccessory,
	serviceType: WithUUID<typeof Service> & (new (displayName?: string, subtype?: string) => Service),
	name: string,
	subtype?: string,
): Service {
	const existing = subtype === undefined
		? accessory.getService(serviceType)
		: accessory.getServiceById(serviceType, subtype);
	return existing ?? accessory.addService(serviceType, name, subtype);
}

/** Drop a service left over from a previous configuration of the accessory. */
export function removeServiceIfPresent(
	env: InimAccessoryEnv,
	accessory: PlatformAccessory,
	serviceType: WithUUID<typeof Service>,
	subtype?: string,
): void {
	const stale = subtype === undefined
		? accessory.getService(serviceType)
		: accessory.getServiceById(serviceType, subtype);
	if (stale) {
		env.log.info('INIM: removing stale %s service from %s', stale.displayName, accessory.displayName);
		accessory.removeService(stale);
	}
}
