// src/inim/inim-scenario-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import {
	applyAccessoryInformation,
	ensureService,
	runCommand,
	type InimAccessoryEnv,
	type InimAccessoryHandle,
} from './inim-accessory-helpers.js';
import { entityId, type DeviceView } from './reconciler.js';
import type { Scenario } from './snapshot.js';

// How long the stateless switch stays On after a tap.
const RESET_DELAY_MS = 1_000;

export function scenarioAccessoryKey(scenarioId: number): string {
	return entityId('scenario', scenarioId);
}

/**
 * Stateless Switch: turning it on activates the scenario, then it flips back off.
 */
export function configureInimScenarioAccessory(
	env: InimAccessoryEnv,
	accessory: PlatformAccessory,
	view: DeviceView,
	scenario: Scenario,
): InimAccessoryHandle {
	const { Service, Characteristic } = env.api.hap;
	const scenarioId = scenario.id;
	const name = `Scenario ${scenario.name}`;

	applyAccessoryInformation(env.api, accessory, view.snapshot, name, `S${scenarioId}`);
	const service = ensureService(accessory, Service.Switch, name);

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => false)
		.onSet(async (value) => {
			if (value !== true && value !== 1) {
				return;
			}
			await runCommand(env, { kind: 'activateScenario', scenarioId }, `activate ${name}`);
			setTimeout(() => {
				service.updateCharacteristic(Characteristic.On, false);
			}, RESET_DELAY_MS);
		});

	const key = scenarioAccessoryKey(scenarioId);
	return {
		key,
		watches: () => false,
		refresh: () => undefined,
	};
}
