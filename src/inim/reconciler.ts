// src/inim/reconciler.ts
// Turns successive device snapshots into per-field state changes and owns the
// optimistic overlay commands put on top of the last authoritative snapshot.
//
// Only the poll coordinator's execution context writes here. Readers get an
// immutable DeviceView that is swapped by reference on every update.

import type { AreaStatus, DeviceSnapshot, Zone } from './snapshot.js';
import { classifyZone, type ZoneDeviceClass } from './zone-classifier.js';

export type EntityKind = 'central' | 'gsm' | 'area' | 'zone' | 'peripheral' | 'scenario';

export type StateValue = string | number | boolean | null;

export interface EntityState {
	readonly entityId: string;
	readonly kind: EntityKind;
	/** Cloud id of the area/zone/peripheral/scenario; null for central and gsm. */
	readonly sourceId: number | null;
	readonly fields: Readonly<Record<string, StateValue>>;
}

export interface StateChange {
	readonly entityId: string;
	readonly kind: EntityKind;
	readonly field: string;
	/** undefined when the entity is observed for the first time. */
	readonly previous: StateValue | undefined;
	/** undefined when the entity disappeared from the snapshot. */
	readonly value: StateValue | undefined;
}

export type OptimisticPatch =
	| { readonly target: 'area'; readonly areaId: number; readonly status: AreaStatus }
	| { readonly target: 'zone'; readonly zoneId: number; readonly bypassed: boolean }
	| { readonly target: 'central'; readonly activeScenarioId: number };

export interface DeviceView {
	/** Increments on every published view. */
	readonly version: number;
	/** Last authoritative snapshot with the optimistic overlay applied. */
	readonly snapshot: DeviceSnapshot;
	/** Last snapshot exactly as the cloud reported it. */
	readonly authoritative: DeviceSnapshot;
	readonly entities: ReadonlyMap<string, EntityState>;
	/** True while polling fails; values are last-known, not fresh. */
	readonly stale: boolean;
	readonly updatedAt: number;
	readonly pending: readonly OptimisticPatch[];
}

export const CENTRAL_ENTITY_ID = 'central';
export const GSM_ENTITY_ID = 'gsm';

export function entityId(kind: 'area' | 'zone' | 'peripheral' | 'scenario', id: number): string {
	return `${kind}:${id}`;
}

function entity(
	kind: EntityKind,
	id: string,
	sourceId: number | null,
	fields: Record<string, StateValue>,
): EntityState {
	return Object.freeze({ entityId: id, kind, sourceId, fields: Object.freeze(fields) });
}

/**
 * Compare two entity maps field by field. A null `previous` means first
 * observation: every field of every entity is reported.
 */
export function diffEntities(
	previous: ReadonlyMap<string, EntityState> | null,
	next: ReadonlyMap<string, EntityState>,
): StateChange[] {
	const changes: StateChange[] = [];

	for (const [id, state] of next) {
		const before = previous?.get(id);
		for (const [field, value] of Object.entries(state.fields)) {
			const prior = before ? before.fields[field] : undefined;
			if (before === undefined || !Object.is(prior, value)) {
				changes.push({ entityId: id, kind: state.kind, field, previous: prior, value });
			}
		}
	}

	if (previous) {
		for (const [id, state] of previous) {
			if (next.has(id)) {
				continue;
			}
			for (const [field, value] of Object.entries(state.fields)) {
				changes.push({ entityId: id, kind: state.kind, field, previous: value, value: undefined });
			}
		}
	}

	return changes;
}

function applyPatch(snapshot: DeviceSnapshot, patch: OptimisticPatch): DeviceSnapshot {
	switch (patch.target) {
	case 'area':
		return {
			...snapshot,
			areas: snapshot.areas.map((area) =>
				area.id === patch.areaId ? { ...area, status: patch.status } : area),
		};
	case 'zone':
		return {
			...snapshot,
			zones: snapshot.zones.map((zone) =>
				zone.id === patch.zoneId ? { ...zone, bypassed: patch.bypassed } : zone),
		};
	case 'central':
		return { ...snapshot, activeScenarioId: patch.activeScenarioId };
	}
}

function patchTargetExists(snapshot: DeviceSnapshot, patch: OptimisticPatch): boolean {
	switch (patch.target) {
	case 'area':
		return snapshot.areas.some((area) => area.id === patch.areaId);
	case 'zone':
		return snapshot.zones.some((zone) => zone.id === patch.zoneId);
	case 'central':
		return true;
	}
}

export class Reconciler {
	// Zone id -> device class, fixed at first observation so renames upstream
	// never change the accessory type the host created.
	private readonly deviceClasses = new Map<number, ZoneDeviceClass>();
	// Each patch remembers the newest fetch that had started when it was applied.
	private overlay: Array<{ readonly patch: OptimisticPatch; readonly fetch: number }> = [];
	private fetchCount = 0;
	private view: DeviceView | null = null;
	private version = 0;
	private readonly now: () => number;

	constructor(now: () => number = Date.now) {
		this.now = now;
	}

	public getView(): DeviceView | null {
		return this.view;
	}

	public deviceClassOf(zone: Zone): ZoneDeviceClass {
		let deviceClass = this.deviceClasses.get(zone.id);
		if (deviceClass === undefined) {
			deviceClass = classifyZone(zone.name);
			this.deviceClasses.set(zone.id, deviceClass);
		}
		return deviceClass;
	}

	/**
	 * Flatten a snapshot into addressable entities with their externally
	 * observable fields.
	 */
	public project(snapshot: DeviceSnapshot): Map<string, EntityState> {
		const entities = new Map<string, EntityState>();

		entities.set(CENTRAL_ENTITY_ID, entity('central', CENTRAL_ENTITY_ID, null, {
			name: snapshot.name,
			model: snapshot.model,
			firmware: snapshot.firmware,
			serialNumber: snapshot.serialNumber,
			voltage: snapshot.voltage,
			faults: snapshot.faults,
			activeScenarioId: snapshot.activeScenarioId,
			networkStatus: snapshot.networkStatus,
		}));

		if (snapshot.gsm) {
			const gsm = snapshot.gsm;
			entities.set(GSM_ENTITY_ID, entity('gsm', GSM_ENTITY_ID, null, {
				operator: gsm.operator,
				signalStrength: gsm.signalStrength,
				imei: gsm.imei,
				is4g: gsm.is4g,
				hasGprs: gsm.hasGprs,
				batteryCharge: gsm.batteryCharge,
			}));
		}

		for (const area of snapshot.areas) {
			const id = entityId('area', area.id);
			entities.set(id, entity('area', id, area.id, {
				name: area.name,
				status: area.status,
				alarm: area.alarm,
				alarmMemory: area.alarmMemory,
				tamper: area.tamper,
				tamperMemory: area.tamperMemory,
				autoInsert: area.autoInsert,
			}));
		}

		for (const zone of snapshot.zones) {
			const id = entityId('zone', zone.id);
			entities.set(id, entity('zone', id, zone.id, {
				name: zone.name,
				open: zone.open,
				alarmMemory: zone.alarmMemory,
				tamperMemory: zone.tamperMemory,
				bypassed: zone.bypassed,
				outputOn: zone.outputOn,
				visible: zone.visible,
				deviceClass: this.deviceClassOf(zone),
			}));
		}

		for (const peripheral of snapshot.peripherals) {
			const id = entityId('peripheral', peripheral.id);
			entities.set(id, entity('peripheral', id, peripheral.id, {
				name: peripheral.name,
				voltage: peripheral.voltage,
				kind: peripheral.kind,
			}));
		}

		for (const scenario of snapshot.scenarios) {
			const id = entityId('scenario', scenario.id);
			entities.set(id, entity('scenario', id, scenario.id, { name: scenario.name }));
		}

		return entities;
	}

	/**
	 * Changes between two snapshots. With no `previous` (first poll) every
	 * field is reported; reconciling a snapshot against itself yields none.
	 */
	public reconcile(previous: DeviceSnapshot | null, next: DeviceSnapshot): StateChange[] {
		return diffEntities(previous ? this.project(previous) : null, this.project(next));
	}

	/**
	 * Mark the start of a snapshot fetch. Pass the returned ticket to
	 * `ingest` so patches applied while that fetch was in flight survive it.
	 */
	public beginFetch(): number {
		this.fetchCount += 1;
		return this.fetchCount;
	}

	/**
	 * Accept a new authoritative snapshot. The diff is taken against what the
	 * host currently sees, overlay included. Patches applied before fetch `ticket`
	 * started are dropped: the cloud's value wins. Without a ticket the whole
	 * overlay is dropped.
	 */
	public ingest(next: DeviceSnapshot, ticket?: number): StateChange[] {
		const since = ticket ?? Number.POSITIVE_INFINITY;
		this.overlay = this.overlay.filter((entry) => entry.fetch >= since && patchTargetExists(next, entry.patch));

		const effective = this.effective(next);
		const entities = this.project(effective);
		const changes = diffEntities(this.view ? this.view.entities : null, entities);

		this.publish(effective, next, entities, false);
		return changes;
	}

	/**
	 * Put provisional values on top of the current view. Patches whose target
	 * is not in the snapshot are ignored.
	 */
	public applyOptimistic(patches: readonly OptimisticPatch[]): StateChange[] {
		const current = this.view;
		if (!current) {
			return [];
		}

		const accepted = patches.filter((patch) => patchTargetExists(current.authoritative, patch));
		if (accepted.length === 0) {
			return [];
		}

		this.overlay = [...this.overlay, ...accepted.map((patch) => ({ patch, fetch: this.fetchCount }))];
		const effective = this.effective(current.authoritative);
		const entities = this.project(effective);
		const changes = diffEntities(current.entities, entities);

		this.publish(effective, current.authoritative, entities, current.stale);
		return changes;
	}

	/** Keep every value but flag the view as not fresh. */
	public markStale(): DeviceView | null {
		const current = this.view;
		if (!current || current.stale) {
			return current;
		}
		this.publish(current.snapshot, current.authoritative, current.entities, true);
		return this.view;
	}

	private effective(authoritative: DeviceSnapshot): DeviceSnapshot {
		return this.overlay.reduce((snapshot, entry) => applyPatch(snapshot, entry.patch), authoritative);
	}

	private publish(
		snapshot: DeviceSnapshot,
		authoritative: DeviceSnapshot,
		entities: ReadonlyMap<string, EntityState>,
		stale: boolean,
	): void {
		this.version += 1;
		this.view = Object.freeze({
			version: this.version,
			snapshot: snapshot === authoritative ? snapshot : Object.freeze(snapshot),
			authoritative,
			entities,
			stale,
			updatedAt: this.now(),
			pending: Object.freeze(this.overlay.map((entry) => entry.patch)),
		});
	}
}
