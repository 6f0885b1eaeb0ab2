// src/inim/platform-config.ts
// Reads the InimCloud platform block of config.json into typed options.

import type { InimCredentials } from './session-manager.js';
import type { ScenarioRoleOverrides } from './scenario-roles.js';

export const MIN_SCAN_INTERVAL_SECONDS = 10;
export const MAX_SCAN_INTERVAL_SECONDS = 300;
export const DEFAULT_SCAN_INTERVAL_SECONDS = 30;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 15;

export interface InimPlatformConfig {
	readonly name: string;
	readonly credentials: InimCredentials;
	readonly deviceId: number | null;
	readonly scanIntervalSeconds: number;
	readonly requestTimeoutSeconds: number;
	readonly scenarioOverrides: ScenarioRoleOverrides;
	readonly exposeBypassSwitches: boolean;
	readonly exposeScenarioSwitches: boolean;
}

export interface ParsedPlatformConfig {
	/** null when the block is unusable (missing credentials). */
	readonly config: InimPlatformConfig | null;
	readonly warnings: readonly string[];
}

function readText(raw: Record<string, unknown>, key: string): string | undefined {
	const value = raw[key];
	if (typeof value !== 'string') {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

// Accepts numbers and numeric strings ("3" from a text field).
function readInteger(raw: Record<string, unknown>, key: string, warnings: string[]): number | undefined {
	const value = raw[key];
	if (value === undefined || value === null || value === '') {
		return undefined;
	}
	const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
	if (!Number.isInteger(parsed)) {
		warnings.push(`"${key}" must be a whole number; ignoring ${JSON.stringify(value)}`);
		return undefined;
	}
	return parsed;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
	const value = raw[key];
	return typeof value === 'boolean' ? value : fallback;
}

export function parseInimPlatformConfig(raw: Record<string, unknown>): ParsedPlatformConfig {
	const warnings: string[] = [];

	const email = readText(raw, 'email') ?? readText(raw, 'username');
	// Not trimmed.
	const password = typeof raw.password === 'string' ? raw.password : '';

	if (!email || !password) {
		warnings.push('INIM Cloud "email" and "password" are required; the platform stays idle.');
		return { config: null, warnings };
	}

	let scanInterval = readInteger(raw, 'scanInterval', warnings) ?? DEFAULT_SCAN_INTERVAL_SECONDS;
	if (scanInterval < MIN_SCAN_INTERVAL_SECONDS || scanInterval > MAX_SCAN_INTERVAL_SECONDS) {
		const clamped = Math.min(MAX_SCAN_INTERVAL_SECONDS, Math.max(MIN_SCAN_INTERVAL_SECONDS, scanInterval));
		warnings.push(
			`"scanInterval" ${scanInterval}s is outside ${MIN_SCAN_INTERVAL_SECONDS}-${MAX_SCAN_INTERVAL_SECONDS}s; using ${clamped}s`,
		);
		scanInterval = clamped;
	}

	let requestTimeout = readInteger(raw, 'requestTimeout', warnings) ?? DEFAULT_REQUEST_TIMEOUT_SECONDS;
	if (requestTimeout < 1) {
		warnings.push(`"requestTimeout" must be at least 1s; using ${DEFAULT_REQUEST_TIMEOUT_SECONDS}s`);
		requestTimeout = DEFAULT_REQUEST_TIMEOUT_SECONDS;
	}

	const scenarioOverrides: ScenarioRoleOverrides = {};
	const armAway = readInteger(raw, 'armAwayScenario', warnings);
	if (armAway !== undefined) {
		scenarioOverrides.armAway = armAway;
	}
	const armHome = readInteger(raw, 'armHomeScenario', warnings);
	if (armHome !== undefined) {
		scenarioOverrides.armHome = armHome;
	}
	const disarm = readInteger(raw, 'disarmScenario', warnings);
	if (disarm !== undefined) {
		scenarioOverrides.disarm = disarm;
	}

	const userCode = readText(raw, 'userCode');
	const credentials: InimCredentials = userCode === undefined
		? { email, password }
		: { email, password, userCode };

	return {
		config: {
			name: readText(raw, 'name') ?? 'INIM Cloud',
			credentials,
			deviceId: readInteger(raw, 'deviceId', warnings) ?? null,
			scanIntervalSeconds: scanInterval,
			requestTimeoutSeconds: requestTimeout,
			scenarioOverrides,
			exposeBypassSwitches: readBoolean(raw, 'exposeBypassSwitches', true),
			exposeScenarioSwitches: readBoolean(raw, 'exposeScenarioSwitches', false),
		},
		warnings,
	};
}
