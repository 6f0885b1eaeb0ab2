import {
	CommandDispatcher,
	describeIntent,
	type CommandIntent,
	type ConfirmationPoller,
} from '../src/inim/command-dispatcher.js';
import {
	NetworkError,
	PreconditionFailedError,
	ServerError,
	ValidationError,
} from '../src/inim/errors.js';
import type { ArmingTarget, CommandSink, SnapshotSource } from '../src/inim/inim-client.js';
import { PollCoordinator } from '../src/inim/poll-coordinator.js';
import { Reconciler } from '../src/inim/reconciler.js';
import type { DeviceSnapshot } from '../src/inim/snapshot.js';
import type { SendOptions } from '../src/inim/transport.js';
import {
	deferred,
	makeArea,
	makeScenario,
	makeSnapshot,
	mockLogger,
	type MockLogger,
} from './helpers/fakes.js';

interface FakeSink extends CommandSink {
	setAreaState: jest.Mock<Promise<void>, [number, number, ArmingTarget, string | undefined]>;
	setAllAreasState: jest.Mock<Promise<void>, [number, readonly number[], ArmingTarget, string | undefined]>;
	setZoneBypass: jest.Mock<Promise<void>, [number, number, boolean, string | undefined]>;
	activateScenario: jest.Mock<Promise<void>, [number, number]>;
	requestPoll: jest.Mock<Promise<void>, [number]>;
}

function fakeSink(): FakeSink {
	return {
		setAreaState: jest.fn<Promise<void>, [number, number, ArmingTarget, string | undefined]>(async () => undefined),
		setAllAreasState: jest.fn<Promise<void>, [number, readonly number[], ArmingTarget, string | undefined]>(
			async () => undefined,
		),
		setZoneBypass: jest.fn<Promise<void>, [number, number, boolean, string | undefined]>(async () => undefined),
		activateScenario: jest.fn<Promise<void>, [number, number]>(async () => undefined),
		requestPoll: jest.fn<Promise<void>, [number]>(async () => undefined),
	};
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('describeIntent', () => {
	it('labels commands for logs and errors', () => {
		expect(describeIntent({ kind: 'bypassZone', zoneId: 3, bypass: false })).toBe('reinstate zone 3');
		expect(describeIntent({ kind: 'armAll' })).toBe('arm all areas');
	});
});

describe('CommandDispatcher', () => {
	let sink: FakeSink;
	let reconciler: Reconciler;
	let poller: { forcePoll: jest.Mock<Promise<boolean>, []> };
	let logger: MockLogger;

	function makeDispatcher(userCode?: string, confirmation: ConfirmationPoller = poller): CommandDispatcher {
		return new CommandDispatcher(sink, reconciler, confirmation, { userCode, logger });
	}

	beforeEach(() => {
		sink = fakeSink();
		reconciler = new Reconciler();
		reconciler.ingest(makeSnapshot({ scenarios: [makeScenario(1, 'TOTALE', [1, 2])] }));
		poller = { forcePoll: jest.fn(async () => true) };
		logger = mockLogger();
	});

	it('refuses a bypass without a user code and sends nothing', async () => {
		const dispatcher = makeDispatcher();

		const result = await dispatcher.dispatch({ kind: 'bypassZone', zoneId: 2, bypass: true });

		expect(result.ok).toBe(false);
		expect(!result.ok && result.error).toBeInstanceOf(PreconditionFailedError);
		expect(!result.ok && result.error.message).toBe('Cannot bypass zone 2: no user code configured');
		expect(sink.setZoneBypass).not.toHaveBeenCalled();
		expect(sink.requestPoll).not.toHaveBeenCalled();
		expect(reconciler.getView()?.version).toBe(1);
	});

	it('treats a blank user code as missing', () => {
		expect(makeDispatcher('   ').hasUserCode).toBe(false);
		expect(makeDispatcher('1234').hasUserCode).toBe(true);
	});

	it('activates scenarios without a user code', async () => {
		const dispatcher = makeDispatcher();

		const result = await dispatcher.dispatch({ kind: 'activateScenario', scenarioId: 1 });

		expect(result).toEqual({
			ok: true,
			changes: [{ entityId: 'central', kind: 'central', field: 'activeScenarioId', previous: null, value: 1 }],
		});
		expect(sink.activateScenario).toHaveBeenCalledWith(4242, 1);
		expect(sink.requestPoll).toHaveBeenCalledWith(4242);
		expect(poller.forcePoll).toHaveBeenCalledTimes(1);
	});

	it('fails before the first snapshot', async () => {
		reconciler = new Reconciler();
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch({ kind: 'armArea', areaId: 1 });

		expect(!result.ok && result.error).toBeInstanceOf(ValidationError);
		expect(!result.ok && result.error.message).toBe('Cannot arm area 1: panel state not loaded yet');
		expect(sink.setAreaState).not.toHaveBeenCalled();
	});

	const unknownTargets: Array<[CommandIntent, string]> = [
		[{ kind: 'armArea', areaId: 5 }, 'Unknown area 5'],
		[{ kind: 'bypassZone', zoneId: 9, bypass: true }, 'Unknown zone 9'],
		[{ kind: 'activateScenario', scenarioId: 4 }, 'Unknown scenario 4'],
	];

	it.each(unknownTargets)('rejects %p for an unknown target', async (intent, message) => {
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch(intent);

		expect(!result.ok && result.error).toBeInstanceOf(ValidationError);
		expect(!result.ok && result.error.message).toBe(message);
		expect(sink.setAreaState).not.toHaveBeenCalled();
		expect(sink.setZoneBypass).not.toHaveBeenCalled();
		expect(sink.activateScenario).not.toHaveBeenCalled();
	});

	it('arms every area with the user code', async () => {
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch({ kind: 'armAll' });

		expect(sink.setAllAreasState).toHaveBeenCalledWith(4242, [1, 2], 'armed', '1234');
		expect(result.ok && result.changes.map((c) => [c.entityId, c.value])).toEqual([
			['area:1', 'armed'],
			['area:2', 'armed'],
		]);
	});

	it('bypasses a zone optimistically', async () => {
		const dispatcher = makeDispatcher('1234');

		await dispatcher.dispatch({ kind: 'bypassZone', zoneId: 2, bypass: true });

		expect(sink.setZoneBypass).toHaveBeenCalledWith(4242, 2, true, '1234');
		expect(reconciler.getView()?.snapshot.zones[1].bypassed).toBe(true);
	});

	it('applies no overlay when the cloud rejects the command', async () => {
		sink.setAreaState.mockRejectedValueOnce(new ServerError('INIM InsertAreas failed: Wrong code', { apiStatus: 5 }));
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch({ kind: 'armArea', areaId: 1 });

		expect(!result.ok && result.error.message).toBe('INIM InsertAreas failed: Wrong code');
		expect(reconciler.getView()?.version).toBe(1);
		expect(poller.forcePoll).not.toHaveBeenCalled();
	});

	it('classifies unexpected failures', async () => {
		sink.setAreaState.mockRejectedValueOnce(new TypeError('boom'));
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch({ kind: 'disarmArea', areaId: 2 });

		expect(!result.ok && result.error).toBeInstanceOf(ServerError);
		expect(!result.ok && result.error.message).toBe('Unexpected error: boom');
	});

	it('logs a failed confirmation request without failing the command', async () => {
		sink.requestPoll.mockRejectedValueOnce(new NetworkError('down'));
		const dispatcher = makeDispatcher('1234');

		const result = await dispatcher.dispatch({ kind: 'disarmArea', areaId: 1 });
		await flush();

		expect(result.ok).toBe(true);
		expect(logger.warn).toHaveBeenCalledWith('INIM RequestPoll failed: %s', 'NetworkError: down');
	});

	describe('with the poll loop', () => {
		let fetchSnapshot: jest.Mock<Promise<DeviceSnapshot>, [number | null, SendOptions | undefined]>;
		let coordinator: PollCoordinator;

		beforeEach(async () => {
			jest.useFakeTimers();
			reconciler = new Reconciler();
			fetchSnapshot = jest.fn<Promise<DeviceSnapshot>, [number | null, SendOptions | undefined]>();
			fetchSnapshot.mockResolvedValue(makeSnapshot({ areas: [makeArea(5)] }));
			const source: SnapshotSource = { fetchSnapshot };
			coordinator = new PollCoordinator(source, reconciler, { intervalMs: 30_000, logger });
			coordinator.start();
			await jest.advanceTimersByTimeAsync(0);
		});

		afterEach(() => {
			coordinator.stop();
			jest.useRealTimers();
		});

		it('shows the optimistic value until a contradicting poll replaces it', async () => {
			const confirmation = deferred<DeviceSnapshot>();
			fetchSnapshot.mockReturnValueOnce(confirmation.promise);
			const onChanges = jest.fn();
			coordinator.onStateChanges(onChanges);
			const dispatcher = makeDispatcher('1234', coordinator);

			const result = await dispatcher.dispatch({ kind: 'armArea', areaId: 5 });

			expect(result).toEqual({
				ok: true,
				changes: [{ entityId: 'area:5', kind: 'area', field: 'status', previous: 'disarmed', value: 'armed' }],
			});
			expect(sink.setAreaState).toHaveBeenCalledWith(4242, 5, 'armed', '1234');
			expect(fetchSnapshot).toHaveBeenCalledTimes(2);
			expect(reconciler.getView()?.snapshot.areas[0].status).toBe('armed');

			confirmation.resolve(makeSnapshot({ areas: [makeArea(5)] }));
			await jest.advanceTimersByTimeAsync(0);

			expect(reconciler.getView()?.snapshot.areas[0].status).toBe('disarmed');
			expect(reconciler.getView()?.pending).toEqual([]);
			expect(onChanges).toHaveBeenCalledWith(
				[{ entityId: 'area:5', kind: 'area', field: 'status', previous: 'armed', value: 'disarmed' }],
				reconciler.getView(),
			);
		});

		it('keeps the command result when a poll started before the command lands late', async () => {
			const interval = deferred<DeviceSnapshot>();
			fetchSnapshot.mockReturnValueOnce(interval.promise);
			await jest.advanceTimersByTimeAsync(30_000);
			expect(fetchSnapshot).toHaveBeenCalledTimes(2);

			fetchSnapshot.mockResolvedValue(makeSnapshot({ areas: [makeArea(5, { status: 'armed' })] }));
			const onChanges = jest.fn();
			coordinator.onStateChanges(onChanges);
			const dispatcher = makeDispatcher('1234', coordinator);

			const result = await dispatcher.dispatch({ kind: 'armArea', areaId: 5 });
			expect(result.ok).toBe(true);
			expect(reconciler.getView()?.snapshot.areas[0].status).toBe('armed');

			interval.resolve(makeSnapshot({ areas: [makeArea(5)] }));
			await jest.advanceTimersByTimeAsync(0);

			expect(fetchSnapshot).toHaveBeenCalledTimes(3);
			expect(reconciler.getView()?.snapshot.areas[0].status).toBe('armed');
			expect(reconciler.getView()?.authoritative.areas[0].status).toBe('armed');
			expect(reconciler.getView()?.pending).toEqual([]);
			expect(onChanges).not.toHaveBeenCalled();
		});
	});
});
