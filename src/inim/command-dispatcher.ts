// src/inim/command-dispatcher.ts
// Validates and sends user commands, applies the optimistic overlay and asks
// for a confirming poll.

import {
	PreconditionFailedError,
	ValidationError,
	describeError,
	toInimError,
	type InimError,
} from './errors.js';
import type { ArmingTarget, CommandSink } from './inim-client.js';
import { consoleLogger, type InimLogger } from './logger.js';
import type { OptimisticPatch, Reconciler, StateChange } from './reconciler.js';
import { findArea, findScenario, findZone, type DeviceSnapshot } from './snapshot.js';

export type CommandIntent =
	| { readonly kind: 'armArea'; readonly areaId: number }
	| { readonly kind: 'disarmArea'; readonly areaId: number }
	| { readonly kind: 'armAll' }
	| { readonly kind: 'disarmAll' }
	| { readonly kind: 'bypassZone'; readonly zoneId: number; readonly bypass: boolean }
	| { readonly kind: 'activateScenario'; readonly scenarioId: number };

export type CommandResult =
	| { readonly ok: true; readonly changes: readonly StateChange[] }
	| { readonly ok: false; readonly error: InimError };

/** The slice of the poll coordinator a command needs. */
export interface ConfirmationPoller {
	forcePoll(): Promise<boolean>;
}

export interface CommandDispatcherOptions {
	userCode?: string;
	logger?: InimLogger;
}

function requiresUserCode(intent: CommandIntent): boolean {
	return intent.kind !== 'activateScenario';
}

export function describeIntent(intent: CommandIntent): string {
	switch (intent.kind) {
	case 'armArea':
		return `arm area ${intent.areaId}`;
	case 'disarmArea':
		return `disarm area ${intent.areaId}`;
	case 'armAll':
		return 'arm all areas';
	case 'disarmAll':
		return 'disarm all areas';
	case 'bypassZone':
		return `${intent.bypass ? 'bypass' : 'reinstate'} zone ${intent.zoneId}`;
	case 'activateScenario':
		return `activate scenario ${intent.scenarioId}`;
	}
}

export class CommandDispatcher {
	private readonly client: CommandSink;
	private readonly reconciler: Reconciler;
	private readonly poller: ConfirmationPoller;
	private readonly userCode: string | undefined;
	private readonly log: InimLogger;

	constructor(
		client: CommandSink,
		reconciler: Reconciler,
		poller: ConfirmationPoller,
		options: CommandDispatcherOptions = {},
	) {
		this.client = client;
		this.reconciler = reconciler;
		this.poller = poller;
		const code = options.userCode?.trim();
		this.userCode = code ? code : undefined;
		this.log = options.logger ?? consoleLogger('inim-command');
	}

	public get hasUserCode(): boolean {
		return this.userCode !== undefined;
	}

	/**
	 * Send one command. Never throws: failures come back classified, and no
	 * optimistic value is applied for them.
	 */
	public async dispatch(intent: CommandIntent): Promise<CommandResult> {
		const label = describeIntent(intent);
		try {
			if (requiresUserCode(intent) && this.userCode === undefined) {
				throw new PreconditionFailedError(
					`Cannot ${label}: no user code configured`,
					{ intent: intent.kind },
				);
			}

			const view = this.reconciler.getView();
			if (!view) {
				throw new ValidationError(`Cannot ${label}: panel state not loaded yet`, { intent: intent.kind });
			}

			const snapshot = view.authoritative;
			const patches = this.planPatches(intent, snapshot);

			await this.send(intent, snapshot);
			this.log.info('INIM command sent: %s', label);

			const changes = this.reconciler.applyOptimistic(patches);
			this.confirm(snapshot.deviceId);
			return { ok: true, changes };
		} catch (err) {
			const error = toInimError(err);
			this.log.warn('INIM command failed (%s): %s', label, describeError(error));
			return { ok: false, error };
		}
	}

	// Also validates that every target exists in the last snapshot.
	private planPatches(intent: CommandIntent, snapshot: DeviceSnapshot): OptimisticPatch[] {
		switch (intent.kind) {
		case 'armArea':
		case 'disarmArea':
			if (!findArea(snapshot, intent.areaId)) {
				throw new ValidationError(`Unknown area ${intent.areaId}`, { areaId: intent.areaId });
			}
			return [{
				target: 'area',
				areaId: intent.areaId,
				status: intent.kind === 'armArea' ? 'armed' : 'disarmed',
			}];
		case 'armAll':
		case 'disarmAll':
			if (snapshot.areas.length === 0) {
				throw new ValidationError('The panel reports no areas');
			}
			return snapshot.areas.map((area): OptimisticPatch => ({
				target: 'area',
				areaId: area.id,
				status: intent.kind === 'armAll' ? 'armed' : 'disarmed',
			}));
		case 'bypassZone':
			if (!findZone(snapshot, intent.zoneId)) {
				throw new ValidationError(`Unknown zone ${intent.zoneId}`, { zoneId: intent.zoneId });
			}
			return [{ target: 'zone', zoneId: intent.zoneId, bypassed: intent.bypass }];
		case 'activateScenario':
			if (!findScenario(snapshot, intent.scenarioId)) {
				throw new ValidationError(`Unknown scenario ${intent.scenarioId}`, { scenarioId: intent.scenarioId });
			}
			return [{ target: 'central', activeScenarioId: intent.scenarioId }];
		}
	}

	private async send(intent: CommandIntent, snapshot: DeviceSnapshot): Promise<void> {
		const deviceId = snapshot.deviceId;
		switch (intent.kind) {
		case 'armArea':
		case 'disarmArea': {
			const target: ArmingTarget = intent.kind === 'armArea' ? 'armed' : 'disarmed';
			await this.client.setAreaState(deviceId, intent.areaId, target, this.userCode);
			return;
		}
		case 'armAll':
		case 'disarmAll': {
			const target: ArmingTarget = intent.kind === 'armAll' ? 'armed' : 'disarmed';
			await this.client.setAllAreasState(deviceId, snapshot.areas.map((a) => a.id), target, this.userCode);
			return;
		}
		case 'bypassZone':
			await this.client.setZoneBypass(deviceId, intent.zoneId, intent.bypass, this.userCode);
			return;
		case 'activateScenario':
			await this.client.activateScenario(deviceId, intent.scenarioId);
			return;
		}
	}

	// A failed RequestPoll only delays confirmation to the next regular poll.
	private confirm(deviceId: number): void {
		this.client.requestPoll(deviceId).catch((err: unknown) => {
			this.log.warn('INIM RequestPoll failed: %s', describeError(err));
		});
		this.poller.forcePoll().catch((err: unknown) => {
			this.log.warn('INIM confirmation poll failed: %s', describeError(err));
		});
	}
}
