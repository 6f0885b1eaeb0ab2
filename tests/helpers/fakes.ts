import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import type { InimLogger } from '../../src/inim/logger.js';
import type { Area, DeviceSnapshot, Scenario, Zone } from '../../src/inim/snapshot.js';
import {
	unwrapEnvelope,
	type InimRequest,
	type InimTransport,
	type SendOptions,
} from '../../src/inim/transport.js';

export type MockLogger = { [K in keyof InimLogger]: jest.Mock };

export function mockLogger(): MockLogger {
	return {
		debug: jest.fn(),
		info: jest.fn(),
		warn: jest.fn(),
		error: jest.fn(),
	};
}

export function loadFixture(name: string): unknown {
	const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'fixtures', name), 'utf8'));
	return parsed;
}

export function ok(data: unknown): Record<string, unknown> {
	return { Status: 0, ErrMsg: null, Data: data };
}

export function apiFailure(status: number, errMsg: string): Record<string, unknown> {
	return { Status: status, ErrMsg: errMsg, Data: null };
}

type Responder = (request: InimRequest, options: SendOptions) => unknown;

/**
 * In-process stand-in for the HTTPS transport. Responders return the raw
 * envelope (or throw); classification goes through the real unwrapEnvelope.
 */
export class FakeTransport implements InimTransport {
	public readonly requests: InimRequest[] = [];
	private readonly defaults = new Map<string, Responder>();
	private readonly queued = new Map<string, Responder[]>();

	/** Answer every call to `method`. */
	public on(method: string, responder: Responder): this {
		this.defaults.set(method, responder);
		return this;
	}

	/** Answer the next call to `method`, before any default. */
	public once(method: string, responder: Responder): this {
		const queue = this.queued.get(method) ?? [];
		queue.push(responder);
		this.queued.set(method, queue);
		return this;
	}

	public countOf(method: string): number {
		return this.requests.filter((r) => r.Method === method).length;
	}

	public lastOf(method: string): InimRequest | undefined {
		return this.requests.filter((r) => r.Method === method).pop();
	}

	public async send(request: InimRequest, options: SendOptions = {}): Promise<unknown> {
		this.requests.push(request);
		const responder = this.queued.get(request.Method)?.shift() ?? this.defaults.get(request.Method);
		if (!responder) {
			throw new Error(`No fake response for ${request.Method}`);
		}
		const body = await responder(request, options);
		return unwrapEnvelope(request.Method, body);
	}
}

/** Transport whose RegisterClient hands out token-1, token-2, ... */
export function loginTransport(ttlSeconds = 86_400): FakeTransport {
	let issued = 0;
	return new FakeTransport().on('RegisterClient', () => {
		issued += 1;
		return ok({ Token: `token-${issued}`, TTL: ttlSeconds });
	});
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve(value: T): void;
	reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (reason: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

export function makeArea(id: number, overrides: Partial<Area> = {}): Area {
	return {
		id,
		name: `Zona giorno ${id}`,
		status: 'disarmed',
		alarm: false,
		alarmMemory: false,
		tamper: false,
		tamperMemory: false,
		autoInsert: false,
		...overrides,
	};
}

export function makeZone(id: number, overrides: Partial<Zone> = {}): Zone {
	return {
		id,
		name: `Porta ${id}`,
		areaIds: [1],
		open: false,
		alarmMemory: false,
		tamperMemory: false,
		bypassed: false,
		outputOn: false,
		type: null,
		visible: true,
		...overrides,
	};
}

export function makeScenario(id: number, name: string, areaIds: number[]): Scenario {
	return { id, name, areaIds };
}

export function makeSnapshot(overrides: Partial<DeviceSnapshot> = {}): DeviceSnapshot {
	return {
		deviceId: 4242,
		name: 'Casa Test',
		serialNumber: 'TEST0001',
		model: 'SmartLiving 1050',
		firmware: '6.7',
		voltage: 13.6,
		faults: 0,
		activeScenarioId: null,
		networkStatus: 1,
		areas: [makeArea(1), makeArea(2)],
		zones: [makeZone(1), makeZone(2, { name: 'PIR Corridoio' })],
		peripherals: [],
		gsm: null,
		scenarios: [],
		receivedAt: 0,
		...overrides,
	};
}
