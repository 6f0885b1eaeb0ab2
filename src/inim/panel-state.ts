// src/inim/panel-state.ts
// Arming state of the whole panel and of single areas, as shown to the user.

import type { CommandIntent } from './command-dispatcher.js';
import type { DeviceView } from './reconciler.js';
import type { ScenarioRoleMap } from './scenario-roles.js';
import type { Area, DeviceSnapshot } from './snapshot.js';

export type PanelState = 'disarmed' | 'home' | 'away' | 'triggered';
export type AreaArmingState = 'disarmed' | 'partial' | 'armed' | 'triggered';
export type PanelTarget = 'disarm' | 'home' | 'away';

export function deriveAreaState(area: Area): AreaArmingState {
	if (area.alarm) {
		return 'triggered';
	}
	switch (area.status) {
	case 'armed':
		return 'armed';
	case 'armed_partial':
		return 'partial';
	case 'disarmed':
		return 'disarmed';
	}
}

function fromAreas(snapshot: DeviceSnapshot): PanelState {
	const armed = snapshot.areas.filter((area) => area.status !== 'disarmed').length;
	if (armed === 0) {
		return 'disarmed';
	}
	return armed === snapshot.areas.length ? 'away' : 'home';
}

/**
 * Any area in alarm wins. Otherwise the active scenario decides through its
 * role; a scenario with no role falls back to "away if anything is armed".
 *
 * While area commands are pending confirmation the active scenario has not
 * moved yet, so the (optimistic) area statuses decide instead.
 */
export function derivePanelState(view: DeviceView, roles: ScenarioRoleMap | null): PanelState {
	const snapshot = view.snapshot;

	if (snapshot.areas.some((area) => area.alarm)) {
		return 'triggered';
	}

	if (view.pending.some((patch) => patch.target === 'area')) {
		return fromAreas(snapshot);
	}

	const active = snapshot.activeScenarioId;
	if (roles && active !== null) {
		if (active === roles.disarm) {
			return 'disarmed';
		}
		if (active === roles.armAway) {
			return 'away';
		}
		if (active === roles.armHome) {
			return 'home';
		}
	}

	return snapshot.areas.some((area) => area.status !== 'disarmed') ? 'away' : 'disarmed';
}

/**
 * Command for a main-panel target. Mapped scenarios are preferred; without
 * them away/disarm fall back to arming or disarming every area. Home has no
 * fallback, so null is returned when no arm-home scenario is known.
 */
export function panelIntentFor(target: PanelTarget, roles: ScenarioRoleMap | null): CommandIntent | null {
	switch (target) {
	case 'disarm': {
		const id = roles?.disarm ?? null;
		return id === null ? { kind: 'disarmAll' } : { kind: 'activateScenario', scenarioId: id };
	}
	case 'away': {
		const id = roles?.armAway ?? null;
		return id === null ? { kind: 'armAll' } : { kind: 'activateScenario', scenarioId: id };
	}
	case 'home': {
		const id = roles?.armHome ?? null;
		return id === null ? null : { kind: 'activateScenario', scenarioId: id };
	}
	}
}
