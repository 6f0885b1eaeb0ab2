// src/inim/scenario-roles.ts
// Decide which panel scenarios mean "disarm", "arm away" and "arm home".
//
// Each role has an ordered list of detectors. A detector either picks a
// scenario, finds nothing (the next detector runs) or declares the situation
// ambiguous, which stops evaluation for that role and leaves it unmapped.

import type { DeviceSnapshot, Scenario } from './snapshot.js';

export type ScenarioRole = 'disarm' | 'armAway' | 'armHome';

export const SCENARIO_ROLES: readonly ScenarioRole[] = ['disarm', 'armAway', 'armHome'];

export type DetectorResult =
	| { readonly kind: 'match'; readonly scenarioId: number }
	| { readonly kind: 'none' }
	| { readonly kind: 'ambiguous'; readonly reason: string };

export interface DetectionContext {
	readonly scenarios: readonly Scenario[];
	/** Every area the panel knows about. */
	readonly areaIds: readonly number[];
	/** Scenario ids already given to another role. */
	readonly taken: ReadonlySet<number>;
}

export interface ScenarioDetector {
	readonly name: string;
	detect(ctx: DetectionContext): DetectorResult;
}

export type ScenarioRoleMap = Readonly<Record<ScenarioRole, number | null>>;

export interface ScenarioRoleOverrides {
	disarm?: number;
	armAway?: number;
	armHome?: number;
}

export interface ScenarioRoleResolution {
	readonly roles: ScenarioRoleMap;
	/** Configuration problems to surface to the user. */
	readonly problems: readonly string[];
	/** How each mapped role was decided ('configured' or a detector name). */
	readonly sources: Readonly<Partial<Record<ScenarioRole, string>>>;
}

export const DISARM_KEYWORDS: readonly string[] = ['SPENTO', 'DISINSERITO', 'OFF', 'DISARM'];
export const ARM_AWAY_KEYWORDS: readonly string[] = ['TOTALE', 'TOTAL', 'AWAY', 'INSERITO'];

const NONE: DetectorResult = { kind: 'none' };

export function keywordDetector(name: string, keywords: readonly string[]): ScenarioDetector {
	const wanted = new Set(keywords.map((k) => k.toUpperCase()));
	return {
		name,
		detect(ctx) {
			const hit = ctx.scenarios.find(
				(s) => !ctx.taken.has(s.id) && wanted.has(s.name.trim().toUpperCase()),
			);
			return hit ? { kind: 'match', scenarioId: hit.id } : NONE;
		},
	};
}

/**
 * Pick the single untaken scenario with the best score. A tie for the best
 * score is ambiguous.
 */
function extremeDetector(
	name: string,
	score: (scenario: Scenario) => number,
	describe: string,
): ScenarioDetector {
	return {
		name,
		detect(ctx) {
			const candidates = ctx.scenarios.filter((s) => !ctx.taken.has(s.id));
			if (candidates.length === 0) {
				return NONE;
			}
			const best = Math.max(...candidates.map(score));
			const winners = candidates.filter((s) => score(s) === best);
			if (winners.length > 1) {
				return {
					kind: 'ambiguous',
					reason: `${winners.length} scenarios (${winners.map((s) => s.name).join(', ')}) ${describe}`,
				};
			}
			return { kind: 'match', scenarioId: winners[0].id };
		},
	};
}

export const fewestArmedAreasDetector = extremeDetector(
	'fewest-armed-areas',
	(s) => -s.areaIds.length,
	'arm the same, smallest number of areas',
);

export const mostArmedAreasDetector = extremeDetector(
	'most-armed-areas',
	(s) => s.areaIds.length,
	'arm the same, largest number of areas',
);

/** First untaken scenario that arms some, but not all, of the panel's areas. */
export const partialArmDetector: ScenarioDetector = {
	name: 'partial-arm',
	detect(ctx) {
		const universe = new Set(ctx.areaIds);
		const hit = ctx.scenarios.find((s) => {
			if (ctx.taken.has(s.id) || s.areaIds.length === 0) {
				return false;
			}
			const armed = new Set(s.areaIds);
			return armed.size < universe.size && [...armed].every((id) => universe.has(id));
		});
		return hit ? { kind: 'match', scenarioId: hit.id } : NONE;
	},
};

export const DEFAULT_DETECTORS: Readonly<Record<ScenarioRole, readonly ScenarioDetector[]>> = {
	disarm: [keywordDetector('disarm-keyword', DISARM_KEYWORDS), fewestArmedAreasDetector],
	armAway: [keywordDetector('arm-away-keyword', ARM_AWAY_KEYWORDS), mostArmedAreasDetector],
	armHome: [partialArmDetector],
};

const ROLE_LABELS: Readonly<Record<ScenarioRole, string>> = {
	disarm: 'disarm',
	armAway: 'arm away',
	armHome: 'arm home',
};

function areaUniverse(snapshot: DeviceSnapshot): number[] {
	if (snapshot.areas.length > 0) {
		return snapshot.areas.map((a) => a.id);
	}
	const ids = new Set<number>();
	for (const scenario of snapshot.scenarios) {
		for (const id of scenario.areaIds) {
			ids.add(id);
		}
	}
	return [...ids];
}

/**
 * Map roles to scenario ids. Roles are decided in the order disarm, arm away,
 * arm home; a scenario taken by one role is invisible to the later ones.
 */
export function detectScenarioRoles(
	snapshot: DeviceSnapshot,
	overrides: ScenarioRoleOverrides = {},
	detectors: Readonly<Record<ScenarioRole, readonly ScenarioDetector[]>> = DEFAULT_DETECTORS,
): ScenarioRoleResolution {
	const roles: Record<ScenarioRole, number | null> = { disarm: null, armAway: null, armHome: null };
	const sources: Partial<Record<ScenarioRole, string>> = {};
	const problems: string[] = [];
	const taken = new Set<number>();
	const known = new Set(snapshot.scenarios.map((s) => s.id));

	// Configured ids first, so detection never hands them to another role.
	for (const role of SCENARIO_ROLES) {
		const configured = overrides[role];
		if (configured === undefined) {
			continue;
		}
		if (!known.has(configured)) {
			problems.push(`Configured ${ROLE_LABELS[role]} scenario ${configured} does not exist on the panel`);
			continue;
		}
		roles[role] = configured;
		sources[role] = 'configured';
		taken.add(configured);
	}

	const areaIds = areaUniverse(snapshot);

	for (const role of SCENARIO_ROLES) {
		if (overrides[role] !== undefined) {
			continue;
		}
		for (const detector of detectors[role]) {
			const result = detector.detect({ scenarios: snapshot.scenarios, areaIds, taken });
			if (result.kind === 'none') {
				continue;
			}
			if (result.kind === 'ambiguous') {
				problems.push(`Cannot detect the ${ROLE_LABELS[role]} scenario: ${result.reason}; configure it explicitly`);
				break;
			}
			roles[role] = result.scenarioId;
			sources[role] = detector.name;
			taken.add(result.scenarioId);
			break;
		}
	}

	return {
		roles: Object.freeze(roles),
		problems: Object.freeze(problems),
		sources: Object.freeze(sources),
	};
}

/**
 * Resolves roles once, from the first snapshot it sees, and keeps that answer
 * for the life of the engine so a transient change in the scenario list
 * cannot make roles flap.
 */
export class ScenarioRoleResolver {
	private readonly overrides: ScenarioRoleOverrides;
	private readonly detectors: Readonly<Record<ScenarioRole, readonly ScenarioDetector[]>>;
	private resolution: ScenarioRoleResolution | null = null;

	constructor(
		overrides: ScenarioRoleOverrides = {},
		detectors: Readonly<Record<ScenarioRole, readonly ScenarioDetector[]>> = DEFAULT_DETECTORS,
	) {
		this.overrides = { ...overrides };
		this.detectors = detectors;
	}

	public get resolved(): ScenarioRoleResolution | null {
		return this.resolution;
	}

	/** Returns the cached resolution, computing it from `snapshot` the first time. */
	public resolve(snapshot: DeviceSnapshot): ScenarioRoleResolution {
		if (!this.resolution) {
			this.resolution = detectScenarioRoles(snapshot, this.overrides, this.detectors);
		}
		return this.resolution;
	}

	/** Which role, if any, a scenario id plays. */
	public roleOf(scenarioId: number | null): ScenarioRole | null {
		if (scenarioId === null || !this.resolution) {
			return null;
		}
		for (const role of SCENARIO_ROLES) {
			if (this.resolution.roles[role] === scenarioId) {
				return role;
			}
		}
		return null;
	}
}
