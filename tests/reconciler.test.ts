import { Reconciler, diffEntities, entityId } from '../src/inim/reconciler.js';
import { makeArea, makeSnapshot, makeZone } from './helpers/fakes.js';

describe('Reconciler', () => {
	let reconciler: Reconciler;

	beforeEach(() => {
		reconciler = new Reconciler(() => 123);
	});

	describe('reconcile', () => {
		it('reports every field on first observation', () => {
			const changes = reconciler.reconcile(null, makeSnapshot());

			// central 8 + 2 areas x 7 + 2 zones x 8
			expect(changes).toHaveLength(38);
			expect(changes[0]).toEqual({
				entityId: 'central',
				kind: 'central',
				field: 'name',
				previous: undefined,
				value: 'Casa Test',
			});
			expect(changes.every((c) => c.previous === undefined)).toBe(true);
		});

		it('reports nothing for identical snapshots', () => {
			const snapshot = makeSnapshot();
			expect(reconciler.reconcile(snapshot, snapshot)).toEqual([]);
			expect(reconciler.reconcile(snapshot, makeSnapshot({ receivedAt: 99 }))).toEqual([]);
		});

		it('reports exactly the changed field', () => {
			const next = makeSnapshot({ areas: [makeArea(1, { status: 'armed' }), makeArea(2)] });

			expect(reconciler.reconcile(makeSnapshot(), next)).toEqual([{
				entityId: 'area:1',
				kind: 'area',
				field: 'status',
				previous: 'disarmed',
				value: 'armed',
			}]);
		});

		it('reports removed entities with an undefined value', () => {
			const next = makeSnapshot({ zones: [makeZone(1)] });

			const changes = reconciler.reconcile(makeSnapshot(), next);

			expect(changes).toHaveLength(8);
			expect(changes.every((c) => c.entityId === 'zone:2' && c.value === undefined)).toBe(true);
			expect(changes.find((c) => c.field === 'name')?.previous).toBe('PIR Corridoio');
		});

		it('reports added entities with an undefined previous value', () => {
			const next = makeSnapshot({ peripherals: [{ id: 5, name: 'Espansione', voltage: 12.9, kind: 'expansion' }] });

			expect(reconciler.reconcile(makeSnapshot(), next)).toEqual([
				{ entityId: 'peripheral:5', kind: 'peripheral', field: 'name', previous: undefined, value: 'Espansione' },
				{ entityId: 'peripheral:5', kind: 'peripheral', field: 'voltage', previous: undefined, value: 12.9 },
				{ entityId: 'peripheral:5', kind: 'peripheral', field: 'kind', previous: undefined, value: 'expansion' },
			]);
		});
	});

	describe('project', () => {
		it('includes the GSM module when present', () => {
			const entities = reconciler.project(makeSnapshot({
				gsm: { operator: 'TestNet', signalStrength: 3, imei: null, is4g: false, hasGprs: null, batteryCharge: null },
			}));

			expect(entities.get('gsm')?.fields).toEqual({
				operator: 'TestNet',
				signalStrength: 3,
				imei: null,
				is4g: false,
				hasGprs: null,
				batteryCharge: null,
			});
		});

		it('keeps the device class a zone was first classified with', () => {
			reconciler.project(makeSnapshot());
			const renamed = makeSnapshot({ zones: [makeZone(1), makeZone(2, { name: 'Porta Garage' })] });

			expect(reconciler.project(renamed).get(entityId('zone', 2))?.fields.deviceClass).toBe('motion');
		});
	});

	describe('ingest', () => {
		it('publishes a fresh view', () => {
			const changes = reconciler.ingest(makeSnapshot());
			const view = reconciler.getView();

			expect(changes).toHaveLength(38);
			expect(view).toMatchObject({ version: 1, stale: false, updatedAt: 123, pending: [] });
			expect(view?.snapshot).toBe(view?.authoritative);
		});

		it('diffs against the previous view', () => {
			reconciler.ingest(makeSnapshot());

			const changes = reconciler.ingest(makeSnapshot({ activeScenarioId: 3 }));

			expect(changes).toEqual([{
				entityId: 'central', kind: 'central', field: 'activeScenarioId', previous: null, value: 3,
			}]);
		});
	});

	describe('applyOptimistic', () => {
		it('does nothing before the first snapshot', () => {
			expect(reconciler.applyOptimistic([{ target: 'area', areaId: 1, status: 'armed' }])).toEqual([]);
			expect(reconciler.getView()).toBeNull();
		});

		it('overlays provisional values without touching the authoritative snapshot', () => {
			reconciler.ingest(makeSnapshot());

			const changes = reconciler.applyOptimistic([{ target: 'zone', zoneId: 2, bypassed: true }]);
			const view = reconciler.getView();

			expect(changes).toEqual([{
				entityId: 'zone:2', kind: 'zone', field: 'bypassed', previous: false, value: true,
			}]);
			expect(view?.version).toBe(2);
			expect(view?.snapshot.zones[1].bypassed).toBe(true);
			expect(view?.authoritative.zones[1].bypassed).toBe(false);
			expect(view?.pending).toEqual([{ target: 'zone', zoneId: 2, bypassed: true }]);
		});

		it('ignores patches for unknown targets', () => {
			reconciler.ingest(makeSnapshot());

			expect(reconciler.applyOptimistic([{ target: 'area', areaId: 9, status: 'armed' }])).toEqual([]);
			expect(reconciler.getView()?.version).toBe(1);
		});

		it('is replaced by the next authoritative snapshot', () => {
			reconciler.ingest(makeSnapshot());
			reconciler.applyOptimistic([{ target: 'area', areaId: 1, status: 'armed' }]);

			const changes = reconciler.ingest(makeSnapshot());

			expect(changes).toEqual([{
				entityId: 'area:1', kind: 'area', field: 'status', previous: 'armed', value: 'disarmed',
			}]);
			expect(reconciler.getView()?.pending).toEqual([]);
		});

		it('emits nothing when the cloud confirms the provisional value', () => {
			reconciler.ingest(makeSnapshot());
			reconciler.applyOptimistic([{ target: 'central', activeScenarioId: 1 }]);

			expect(reconciler.ingest(makeSnapshot({ activeScenarioId: 1 }))).toEqual([]);
		});

		it('survives a snapshot whose fetch was already running when it was applied', () => {
			reconciler.ingest(makeSnapshot(), reconciler.beginFetch());
			const running = reconciler.beginFetch();
			reconciler.applyOptimistic([{ target: 'area', areaId: 1, status: 'armed' }]);

			expect(reconciler.ingest(makeSnapshot(), running)).toEqual([]);
			expect(reconciler.getView()?.snapshot.areas[0].status).toBe('armed');
			expect(reconciler.getView()?.authoritative.areas[0].status).toBe('disarmed');
			expect(reconciler.getView()?.pending).toEqual([{ target: 'area', areaId: 1, status: 'armed' }]);

			const confirming = reconciler.beginFetch();
			const armed = makeSnapshot({ areas: [makeArea(1, { status: 'armed' }), makeArea(2)] });
			expect(reconciler.ingest(armed, confirming)).toEqual([]);
			expect(reconciler.getView()?.pending).toEqual([]);
		});

		it('is dropped by a snapshot fetched after it was applied', () => {
			reconciler.ingest(makeSnapshot(), reconciler.beginFetch());
			reconciler.applyOptimistic([{ target: 'area', areaId: 1, status: 'armed' }]);

			const changes = reconciler.ingest(makeSnapshot(), reconciler.beginFetch());

			expect(changes).toEqual([{
				entityId: 'area:1', kind: 'area', field: 'status', previous: 'armed', value: 'disarmed',
			}]);
			expect(reconciler.getView()?.pending).toEqual([]);
		});

		it('keeps the view stale', () => {
			reconciler.ingest(makeSnapshot());
			reconciler.markStale();

			reconciler.applyOptimistic([{ target: 'area', areaId: 2, status: 'armed' }]);

			expect(reconciler.getView()?.stale).toBe(true);
		});
	});

	describe('markStale', () => {
		it('returns null before the first snapshot', () => {
			expect(reconciler.markStale()).toBeNull();
		});

		it('flags the view once and keeps its values', () => {
			reconciler.ingest(makeSnapshot({ activeScenarioId: 2 }));

			const stale = reconciler.markStale();

			expect(stale?.stale).toBe(true);
			expect(stale?.version).toBe(2);
			expect(stale?.snapshot.activeScenarioId).toBe(2);
			expect(reconciler.markStale()).toBe(stale);
		});

		it('is cleared by the next snapshot', () => {
			reconciler.ingest(makeSnapshot());
			reconciler.markStale();
			reconciler.ingest(makeSnapshot());

			expect(reconciler.getView()?.stale).toBe(false);
		});
	});
});

describe('diffEntities', () => {
	it('treats a null previous map as first observation', () => {
		const next = new Reconciler().project(makeSnapshot({ areas: [], zones: [] }));
		expect(diffEntities(null, next).map((c) => c.field)).toEqual([
			'name', 'model', 'firmware', 'serialNumber', 'voltage', 'faults', 'activeScenarioId', 'networkStatus',
		]);
	});
});
