// src/inim/inim-zone-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import {
	applyAccessoryInformation,
	ensureService,
	pushValue,
	removeServiceIfPresent,
	requireFreshView,
	runCommand,
	type InimAccessoryEnv,
	type InimAccessoryHandle,
} from './inim-accessory-helpers.js';
import { entityId, type DeviceView } from './reconciler.js';
import { findZone, type Zone } from './snapshot.js';
import type { ZoneDeviceClass } from './zone-classifier.js';

const BYPASS_SUBTYPE = 'bypass';

export function zoneAccessoryKey(zoneId: number): string {
	return entityId('zone', zoneId);
}

/**
 * One sensor per zone: MotionSensor for motion detectors, ContactSensor for
 * everything else, plus an optional Switch whose On means "bypassed".
 */
export function configureInimZoneAccessory(
	env: InimAccessoryEnv,
	accessory: PlatformAccessory,
	view: DeviceView,
	zone: Zone,
	deviceClass: ZoneDeviceClass,
): InimAccessoryHandle {
	const { Service, Characteristic } = env.api.hap;
	const zoneId = zone.id;
	const name = zone.name;
	const isMotion = deviceClass === 'motion';

	applyAccessoryInformation(env.api, accessory, view.snapshot, name, `Z${zoneId}`);

	// The device class is fixed per zone id, but a cached accessory may come
	// from an older plugin version that picked the other sensor type.
	removeServiceIfPresent(env, accessory, isMotion ? Service.ContactSensor : Service.MotionSensor);
	const sensor = isMotion
		? ensureService(accessory, Service.MotionSensor, name)
		: ensureService(accessory, Service.ContactSensor, name);

	const zoneIn = (current: DeviceView): Zone => {
		const found = findZone(current.snapshot, zoneId);
		if (!found) {
			throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.RESOURCE_DOES_NOT_EXIST);
		}
		return found;
	};

	const contactValue = (z: Zone): number => z.open
		? Characteristic.ContactSensorState.CONTACT_NOT_DETECTED
		: Characteristic.ContactSensorState.CONTACT_DETECTED;

	const tamperValue = (z: Zone): number => z.tamperMemory
		? Characteristic.StatusTampered.TAMPERED
		: Characteristic.StatusTampered.NOT_TAMPERED;

	if (isMotion) {
		sensor
			.getCharacteristic(Characteristic.MotionDetected)
			.onGet(() => zoneIn(requireFreshView(env)).open);
	} else {
		sensor
			.getCharacteristic(Characteristic.ContactSensorState)
			.onGet(() => contactValue(zoneIn(requireFreshView(env))));
	}

	sensor
		.getCharacteristic(Characteristic.StatusTampered)
		.onGet(() => tamperValue(zoneIn(requireFreshView(env))));

	sensor
		.getCharacteristic(Characteristic.StatusActive)
		.onGet(() => !zoneIn(requireFreshView(env)).bypassed);

	const bypassSwitch = env.exposeBypassSwitches
		? ensureService(accessory, Service.Switch, `${name} Bypass`, BYPASS_SUBTYPE)
		: null;
	if (bypassSwitch) {
		bypassSwitch
			.getCharacteristic(Characteristic.On)
			.onGet(() => zoneIn(requireFreshView(env)).bypassed)
			.onSet(async (value) => {
				const bypass = value === true || value === 1;
				await runCommand(
					env,
					{ kind: 'bypassZone', zoneId, bypass },
					`${bypass ? 'bypass' : 'reinstate'} ${name}`,
				);
			});
	} else {
		removeServiceIfPresent(env, accessory, Service.Switch, BYPASS_SUBTYPE);
	}

	const key = zoneAccessoryKey(zoneId);
	return {
		key,
		watches: (id) => id === key,
		refresh: (current) => {
			const found = findZone(current.snapshot, zoneId);
			if (!found) {
				return;
			}
			if (isMotion) {
				pushValue(env, sensor, Characteristic.MotionDetected, current, found.open);
			} else {
				pushValue(env, sensor, Characteristic.ContactSensorState, current, contactValue(found));
			}
			pushValue(env, sensor, Characteristic.StatusTampered, current, tamperValue(found));
			pushValue(env, sensor, Characteristic.StatusActive, current, !found.bypassed);
			if (bypassSwitch) {
				pushValue(env, bypassSwitch, Characteristic.On, current, found.bypassed);
			}
		},
	};
}
