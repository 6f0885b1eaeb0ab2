// src/inim/inim-client.ts
// Typed INIM Cloud operations on top of SessionManager + transport.

import { PreconditionFailedError, ValidationError } from './errors.js';
import { consoleLogger, type InimLogger } from './logger.js';
import type { SessionManager } from './session-manager.js';
import { parseDevicesResponse, type DeviceSnapshot } from './snapshot.js';
import type { InimRequest, InimTransport, SendOptions } from './transport.js';

export const METHOD_GET_DEVICES = 'GetDevicesExtended';
export const METHOD_INSERT_AREAS = 'InsertAreas';
export const METHOD_INSERT_ZONE = 'InsertZone';
export const METHOD_ACTIVATE_SCENARIO = 'ActivateScenario';
export const METHOD_REQUEST_POLL = 'RequestPoll';

// Bitmask asking GetDevicesExtended for areas, zones, scenarios, peripherals and GSM.
export const DEVICES_INFO_MASK = '16908287';

export const AREA_MODE_ARM = 0;
export const AREA_MODE_DISARM = 3;
export const ZONE_MODE_BYPASS = 3;
export const ZONE_MODE_REINSTATE = 0;

// RequestPoll type asking the central unit to push its intrusion state.
const REQUEST_POLL_TYPE = 5;

type Envelope = Partial<Pick<InimRequest, 'Node' | 'Name' | 'Context'>>;

// Node/Name the INIM mobile app sends with device calls.
const APP_ENVELOPE: Envelope = { Node: 'inimhome', Name: 'it.inim.inimutenti' };

export type ArmingTarget = 'armed' | 'disarmed';

/** What the poll coordinator needs from the client. */
export interface SnapshotSource {
	fetchSnapshot(deviceId: number | null, options?: SendOptions): Promise<DeviceSnapshot>;
}

/** What the command dispatcher needs from the client. */
export interface CommandSink {
	setAreaState(deviceId: number, areaId: number, target: ArmingTarget, code: string | undefined): Promise<void>;
	setAllAreasState(
		deviceId: number,
		areaIds: readonly number[],
		target: ArmingTarget,
		code: string | undefined,
	): Promise<void>;
	setZoneBypass(deviceId: number, zoneId: number, bypass: boolean, code: string | undefined): Promise<void>;
	activateScenario(deviceId: number, scenarioId: number): Promise<void>;
	requestPoll(deviceId: number): Promise<void>;
}

function requireCode(code: string | undefined, action: string): string {
	if (code === undefined || code.trim() === '') {
		throw new PreconditionFailedError(`A user code is required to ${action}; set "userCode" in the plugin config`);
	}
	return code;
}

export class InimClient implements SnapshotSource, CommandSink {
	private readonly session: SessionManager;
	private readonly transport: InimTransport;
	private readonly log: InimLogger;

	constructor(session: SessionManager, transport: InimTransport, logger?: InimLogger) {
		this.session = session;
		this.transport = transport;
		this.log = logger ?? consoleLogger('inim-client');
	}

	public async login(): Promise<void> {
		await this.session.login();
	}

	/** Every panel on the account. */
	public async listDevices(options: SendOptions = {}): Promise<DeviceSnapshot[]> {
		const data = await this.call(
			METHOD_GET_DEVICES,
			{ Info: DEVICES_INFO_MASK },
			{ ...APP_ENVELOPE, Context: null },
			options,
		);
		return parseDevicesResponse(data, Date.now());
	}

	/**
	 * Snapshot of one panel. With no `deviceId` the first panel on the account
	 * is used.
	 */
	public async fetchSnapshot(deviceId: number | null, options: SendOptions = {}): Promise<DeviceSnapshot> {
		const devices = await this.listDevices(options);
		const device = deviceId === null
			? devices[0]
			: devices.find((d) => d.deviceId === deviceId);

		if (!device) {
			throw new ValidationError(
				deviceId === null
					? 'No INIM panel found on this account'
					: `INIM panel ${deviceId} not found on this account`,
				{ deviceId },
			);
		}
		return device;
	}

	public async setAreaState(
		deviceId: number,
		areaId: number,
		target: ArmingTarget,
		code: string | undefined,
	): Promise<void> {
		await this.setAllAreasState(deviceId, [areaId], target, code);
	}

	public async setAllAreasState(
		deviceId: number,
		areaIds: readonly number[],
		target: ArmingTarget,
		code: string | undefined,
	): Promise<void> {
		const pin = requireCode(code, target === 'armed' ? 'arm areas' : 'disarm areas');
		this.log.info('INIM: %s areas %s on panel %d', target === 'armed' ? 'arming' : 'disarming', areaIds.join(','), deviceId);
		await this.call(METHOD_INSERT_AREAS, {
			AreaIds: [...areaIds],
			Mode: target === 'armed' ? AREA_MODE_ARM : AREA_MODE_DISARM,
			DeviceId: String(deviceId),
			Code: pin,
		}, APP_ENVELOPE);
	}

	public async setZoneBypass(
		deviceId: number,
		zoneId: number,
		bypass: boolean,
		code: string | undefined,
	): Promise<void> {
		const pin = requireCode(code, bypass ? 'bypass zones' : 'reinstate zones');
		this.log.info('INIM: %s zone %d on panel %d', bypass ? 'bypassing' : 'reinstating', zoneId, deviceId);
		await this.call(METHOD_INSERT_ZONE, {
			ZoneId: zoneId,
			Mode: bypass ? ZONE_MODE_BYPASS : ZONE_MODE_REINSTATE,
			DeviceId: String(deviceId),
			Code: pin,
			Value: 0,
		}, APP_ENVELOPE);
	}

	public async activateScenario(deviceId: number, scenarioId: number): Promise<void> {
		this.log.info('INIM: activating scenario %d on panel %d', scenarioId, deviceId);
		await this.call(METHOD_ACTIVATE_SCENARIO, { ScenarioId: scenarioId, DeviceId: deviceId }, {
			...APP_ENVELOPE,
			Context: null,
		});
	}

	/** Ask the central unit to refresh what the cloud knows about it. */
	public async requestPoll(deviceId: number): Promise<void> {
		await this.call(
			METHOD_REQUEST_POLL,
			{ DeviceId: deviceId, Type: REQUEST_POLL_TYPE },
			{ Node: '', Name: 'Homebridge', Context: 'intrusion' },
		);
	}

	private call(
		method: string,
		params: Record<string, unknown>,
		envelope: Envelope,
		options: SendOptions = {},
	): Promise<unknown> {
		return this.session.authorizedRequest((token, clientId) => {
			const request: InimRequest = {
				Node: envelope.Node ?? '',
				Name: envelope.Name ?? '',
				ClientIP: '',
				Method: method,
				Token: token,
				ClientId: clientId,
				Params: params,
			};
			if (envelope.Context !== undefined) {
				request.Context = envelope.Context;
			}
			return this.transport.send(request, options);
		});
	}
}
