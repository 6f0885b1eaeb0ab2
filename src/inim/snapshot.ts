// src/inim/snapshot.ts
// Typed, immutable view of one panel as returned by GetDevicesExtended.

import {
	isRecord,
	readArray,
	readFlag,
	readNullableFlag,
	readNumber,
	readString,
	type JsonRecord,
} from './json.js';

export type AreaStatus = 'disarmed' | 'armed' | 'armed_partial';

export interface Area {
	readonly id: number;
	readonly name: string;
	readonly status: AreaStatus;
	readonly alarm: boolean;
	readonly alarmMemory: boolean;
	readonly tamper: boolean;
	readonly tamperMemory: boolean;
	readonly autoInsert: boolean;
}

export interface Zone {
	readonly id: number;
	readonly name: string;
	readonly areaIds: readonly number[];
	readonly open: boolean;
	readonly alarmMemory: boolean;
	readonly tamperMemory: boolean;
	readonly bypassed: boolean;
	readonly outputOn: boolean;
	readonly type: number | null;
	/** Zones with Visibility 0 are reconciled but not exposed to the host. */
	readonly visible: boolean;
}

export interface Peripheral {
	readonly id: number;
	readonly name: string;
	readonly voltage: number | null;
	readonly kind: string;
}

export interface GsmModule {
	readonly operator: string | null;
	readonly signalStrength: number | null;
	readonly imei: string | null;
	readonly is4g: boolean | null;
	readonly hasGprs: boolean | null;
	readonly batteryCharge: number | null;
}

export interface Scenario {
	readonly id: number;
	readonly name: string;
	/** Areas this scenario arms when activated. */
	readonly areaIds: readonly number[];
}

export interface DeviceSnapshot {
	readonly deviceId: number;
	readonly name: string;
	readonly serialNumber: string | null;
	readonly model: string;
	readonly firmware: string;
	readonly voltage: number | null;
	readonly faults: number;
	readonly activeScenarioId: number | null;
	readonly networkStatus: number | null;
	readonly areas: readonly Area[];
	readonly zones: readonly Zone[];
	readonly peripherals: readonly Peripheral[];
	readonly gsm: GsmModule | null;
	readonly scenarios: readonly Scenario[];
	readonly receivedAt: number;
}

// Wire `Armed` value for a disarmed area.
export const AREA_ARMED_DISARMED = 4;

const ARMED_STATUS_MAP: Readonly<Record<number, AreaStatus>> = {
	1: 'armed',
	2: 'armed_partial',
	3: 'armed_partial',
	4: 'disarmed',
};

// Wire zone `Status`: 1 = closed, 2 = open.
const ZONE_STATUS_CLOSED = 1;

export const DEFAULT_DEVICE_NAME = 'INIM Alarm';

function deepFreeze<T>(value: T): T {
	if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

function readIdList(raw: unknown): number[] {
	if (!Array.isArray(raw)) {
		return [];
	}
	const ids: number[] = [];
	for (const item of raw) {
		if (typeof item === 'number' && Number.isFinite(item)) {
			ids.push(item);
		} else if (isRecord(item)) {
			const id = readNumber(item, 'AreaId', 'Id');
			const armed = readNumber(item, 'Armed');
			if (id !== null && armed !== AREA_ARMED_DISARMED) {
				ids.push(id);
			}
		} else if (typeof item === 'string' && item.trim() !== '' && Number.isFinite(Number(item))) {
			ids.push(Number(item));
		}
	}
	return ids;
}

function parseArea(raw: JsonRecord): Area | null {
	const id = readNumber(raw, 'AreaId');
	if (id === null) {
		return null;
	}
	const armed = readNumber(raw, 'Armed') ?? AREA_ARMED_DISARMED;
	return {
		id,
		name: readString(raw, 'Name') ?? `Area ${id}`,
		status: ARMED_STATUS_MAP[armed] ?? 'disarmed',
		alarm: readFlag(raw, 'Alarm'),
		alarmMemory: readFlag(raw, 'AlarmMemory'),
		tamper: readFlag(raw, 'Tamper'),
		tamperMemory: readFlag(raw, 'TamperMemory'),
		autoInsert: readFlag(raw, 'AutoInsert'),
	};
}

function parseZone(raw: JsonRecord): Zone | null {
	const id = readNumber(raw, 'ZoneId');
	if (id === null) {
		return null;
	}
	const status = readNumber(raw, 'Status') ?? ZONE_STATUS_CLOSED;
	return {
		id,
		name: readString(raw, 'Name') ?? `Zone ${id}`,
		areaIds: readIdList(raw.Areas),
		open: status - 1 > 0,
		alarmMemory: readFlag(raw, 'AlarmMemory'),
		tamperMemory: readFlag(raw, 'TamperMemory'),
		bypassed: readFlag(raw, 'Bypassed', 'Bypass'),
		outputOn: readFlag(raw, 'OutputOn'),
		type: readNumber(raw, 'Type'),
		visible: (readNumber(raw, 'Visibility') ?? 1) !== 0,
	};
}

function parsePeripheral(raw: JsonRecord): Peripheral | null {
	const id = readNumber(raw, 'PeripheralId', 'Id', 'Address');
	if (id === null) {
		return null;
	}
	const voltage = readNumber(raw, 'Voltage');
	return {
		id,
		name: readString(raw, 'Name') ?? `Peripheral ${id}`,
		voltage: voltage !== null && voltage > 0 ? voltage : null,
		kind: readString(raw, 'Type', 'Kind') ?? 'unknown',
	};
}

function parseGsm(raw: unknown): GsmModule | null {
	if (!isRecord(raw)) {
		return null;
	}
	return {
		operator: readString(raw, 'Operator'),
		signalStrength: readNumber(raw, 'SignalStrength', 'Signal'),
		imei: readString(raw, 'IMEI', 'Imei'),
		is4g: readNullableFlag(raw, 'Is4G', 'LTE'),
		hasGprs: readNullableFlag(raw, 'GPRS', 'Gprs'),
		batteryCharge: readNumber(raw, 'BatteryCharge', 'Battery'),
	};
}

function parseScenario(raw: JsonRecord): Scenario | null {
	const id = readNumber(raw, 'ScenarioId');
	if (id === null) {
		return null;
	}
	return {
		id,
		name: readString(raw, 'Name') ?? `Scenario ${id}`,
		areaIds: readIdList(raw.Areas),
	};
}

function parseList<T>(record: JsonRecord, key: string, parse: (raw: JsonRecord) => T | null): T[] {
	const out: T[] = [];
	for (const item of readArray(record, key)) {
		if (isRecord(item)) {
			const parsed = parse(item);
			if (parsed !== null) {
				out.push(parsed);
			}
		}
	}
	return out;
}

/**
 * Turn one raw device object from GetDevicesExtended into a frozen snapshot.
 * Returns null when the object has no DeviceId.
 */
export function parseDeviceSnapshot(raw: unknown, receivedAt: number = Date.now()): DeviceSnapshot | null {
	if (!isRecord(raw)) {
		return null;
	}
	const deviceId = readNumber(raw, 'DeviceId');
	if (deviceId === null) {
		return null;
	}

	const model = `${readString(raw, 'ModelFamily') ?? ''} ${readString(raw, 'ModelNumber') ?? ''}`.trim();
	const firmware = `${readString(raw, 'FirmwareVersionMajor') ?? ''}.${readString(raw, 'FirmwareVersionMinor') ?? ''}`;

	const snapshot: DeviceSnapshot = {
		deviceId,
		name: readString(raw, 'Name') || DEFAULT_DEVICE_NAME,
		serialNumber: readString(raw, 'SerialNumber'),
		model,
		firmware,
		voltage: readNumber(raw, 'Voltage'),
		faults: readNumber(raw, 'Faults') ?? 0,
		activeScenarioId: readNumber(raw, 'ActiveScenario'),
		networkStatus: readNumber(raw, 'NetworkStatus'),
		areas: parseList(raw, 'Areas', parseArea),
		zones: parseList(raw, 'Zones', parseZone),
		peripherals: parseList(raw, 'Peripherals', parsePeripheral),
		gsm: parseGsm(raw.GSM ?? raw.Gsm),
		scenarios: parseList(raw, 'Scenarios', parseScenario),
		receivedAt,
	};

	return deepFreeze(snapshot);
}

/** Parse the `Data` of a GetDevicesExtended response into snapshots. */
export function parseDevicesResponse(data: unknown, receivedAt: number = Date.now()): DeviceSnapshot[] {
	if (!isRecord(data)) {
		return [];
	}
	const out: DeviceSnapshot[] = [];
	for (const raw of readArray(data, 'Devices')) {
		const snapshot = parseDeviceSnapshot(raw, receivedAt);
		if (snapshot) {
			out.push(snapshot);
		}
	}
	return out;
}

export function findArea(snapshot: DeviceSnapshot, areaId: number): Area | undefined {
	return snapshot.areas.find((area) => area.id === areaId);
}

export function findZone(snapshot: DeviceSnapshot, zoneId: number): Zone | undefined {
	return snapshot.zones.find((zone) => zone.id === zoneId);
}

export function findScenario(snapshot: DeviceSnapshot, scenarioId: number): Scenario | undefined {
	return snapshot.scenarios.find((scenario) => scenario.id === scenarioId);
}
