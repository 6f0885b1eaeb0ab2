// src/inim/inim-panel-accessory.ts
// SecuritySystem accessories: the whole panel (scenario driven) and one per named area.
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import {
	applyAccessoryInformation,
	ensureService,
	pushValue,
	requireFreshView,
	runCommand,
	type InimAccessoryEnv,
	type InimAccessoryHandle,
} from './inim-accessory-helpers.js';
import {
	deriveAreaState,
	derivePanelState,
	panelIntentFor,
	type AreaArmingState,
	type PanelState,
	type PanelTarget,
} from './panel-state.js';
import { CENTRAL_ENTITY_ID, entityId, type DeviceView } from './reconciler.js';
import { findArea } from './snapshot.js';

export const PANEL_ACCESSORY_KEY = 'panel';

export function areaAccessoryKey(areaId: number): string {
	return entityId('area', areaId);
}

export function configureInimPanelAccessory(
	env: InimAccessoryEnv,
	accessory: PlatformAccessory,
	view: DeviceView,
): InimAccessoryHandle {
	const { Service, Characteristic } = env.api.hap;
	const Current = Characteristic.SecuritySystemCurrentState;
	const Target = Characteristic.SecuritySystemTargetState;
	const name = view.snapshot.name;

	const service = ensureService(accessory, Service.SecuritySystem, name);
	applyAccessoryInformation(env.api, accessory, view.snapshot, name, '');

	const toCurrent = (state: PanelState): number => {
		switch (state) {
		case 'triggered':
			return Current.ALARM_TRIGGERED;
		case 'away':
			return Current.AWAY_ARM;
		case 'home':
			return Current.STAY_ARM;
		case 'disarmed':
			return Current.DISARMED;
		}
	};

	const toTarget = (state: PanelState, fallback: number): number => {
		switch (state) {
		case 'triggered':
			return fallback;
		case 'away':
			return Target.AWAY_ARM;
		case 'home':
			return Target.STAY_ARM;
		case 'disarmed':
			return Target.DISARM;
		}
	};

	const fromTarget = (value: CharacteristicValue): PanelTarget | null => {
		switch (value) {
		case Target.DISARM:
			return 'disarm';
		case Target.AWAY_ARM:
			return 'away';
		case Target.STAY_ARM:
		case Target.NIGHT_ARM:
			return 'home';
		default:
			return null;
		}
	};

	const stateOf = (current: DeviceView): PanelState =>
		derivePanelState(current, env.engine.getScenarioRoles());

	let target = toTarget(stateOf(view), Target.DISARM);

	service.getCharacteristic(Target).setProps({
		validValues: [Target.STAY_ARM, Target.AWAY_ARM, Target.NIGHT_ARM, Target.DISARM],
	});

	service
		.getCharacteristic(Current)
		.onGet(() => toCurrent(stateOf(requireFreshView(env))));

	service
		.getCharacteristic(Target)
		.onGet(() => {
			requireFreshView(env);
			return target;
		})
		.onSet(async (value) => {
			const wanted = fromTarget(value);
			if (wanted === null) {
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
			}

			const intent = panelIntentFor(wanted, env.engine.getScenarioRoles());
			if (!intent) {
				env.log.warn('INIM: no arm-home scenario known; set "armHomeScenario" in the plugin config.');
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
			}

			await runCommand(env, intent, `${name} -> ${wanted}`);
			if (typeof value === 'number') {
				target = value;
			}
		});

	service
		.getCharacteristic(Characteristic.StatusFault)
		.onGet(() => requireFreshView(env).snapshot.faults > 0
			? Characteristic.StatusFault.GENERAL_FAULT
			: Characteristic.StatusFault.NO_FAULT);

	service
		.getCharacteristic(Characteristic.StatusTampered)
		.onGet(() => requireFreshView(env).snapshot.areas.some((a) => a.tamper)
			? Characteristic.StatusTampered.TAMPERED
			: Characteristic.StatusTampered.NOT_TAMPERED);

	return {
		key: PANEL_ACCESSORY_KEY,
		watches: (id) => id === CENTRAL_ENTITY_ID || id.startsWith('area:'),
		refresh: (current) => {
			const state = stateOf(current);
			target = toTarget(state, target);
			pushValue(env, service, Current, current, toCurrent(state));
			pushValue(env, service, Target, current, target);
			pushValue(env, service, Characteristic.StatusFault, current, current.snapshot.faults > 0
				? Characteristic.StatusFault.GENERAL_FAULT
				: Characteristic.StatusFault.NO_FAULT);
			pushValue(env, service, Characteristic.StatusTampered, current, current.snapshot.areas.some((a) => a.tamper)
				? Characteristic.StatusTampered.TAMPERED
				: Characteristic.StatusTampered.NOT_TAMPERED);
		},
	};
}

export function configureInimAreaAccessory(
	env: InimAccessoryEnv,
	accessory: PlatformAccessory,
	view: DeviceView,
	areaId: number,
): InimAccessoryHandle {
	const { Service, Characteristic } = env.api.hap;
	const Current = Characteristic.SecuritySystemCurrentState;
	const Target = Characteristic.SecuritySystemTargetState;
	const area = findArea(view.snapshot, areaId);
	const name = area?.name ?? accessory.displayName;

	const service = ensureService(accessory, Service.SecuritySystem, name);
	applyAccessoryInformation(env.api, accessory, view.snapshot, name, `A${areaId}`);

	const toCurrent = (state: AreaArmingState): number => {
		switch (state) {
		case 'triggered':
			return Current.ALARM_TRIGGERED;
		case 'armed':
			return Current.AWAY_ARM;
		case 'partial':
			return Current.STAY_ARM;
		case 'disarmed':
			return Current.DISARMED;
		}
	};

	const toTarget = (state: AreaArmingState): number =>
		state === 'disarmed' ? Target.DISARM : Target.AWAY_ARM;

	// Area gone from the snapshot: answer "No Response" until the platform removes it.
	const stateIn = (current: DeviceView): AreaArmingState => {
		const found = findArea(current.snapshot, areaId);
		if (!found) {
			throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.RESOURCE_DOES_NOT_EXIST);
		}
		return deriveAreaState(found);
	};

	service.getCharacteristic(Target).setProps({
		validValues: [Target.AWAY_ARM, Target.DISARM],
	});

	service
		.getCharacteristic(Current)
		.onGet(() => toCurrent(stateIn(requireFreshView(env))));

	service
		.getCharacteristic(Target)
		.onGet(() => toTarget(stateIn(requireFreshView(env))))
		.onSet(async (value) => {
			const arm = value !== Target.DISARM;
			await runCommand(
				env,
				arm ? { kind: 'armArea', areaId } : { kind: 'disarmArea', areaId },
				`${arm ? 'arm' : 'disarm'} ${name}`,
			);
		});

	const key = areaAccessoryKey(areaId);
	return {
		key,
		watches: (id) => id === key,
		refresh: (current) => {
			const found = findArea(current.snapshot, areaId);
			if (!found) {
				return;
			}
			const state = deriveAreaState(found);
			pushValue(env, service, Current, current, toCurrent(state));
			pushValue(env, service, Target, current, toTarget(state));
		},
	};
}
