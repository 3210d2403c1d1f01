import type { Logging } from 'homebridge';

import { CommandInProgressError } from './errors';
import type { Installation } from './capabilities';

export enum RequestCode {
    ARM = 'ARM1',
    ARM_DAY = 'ARMDAY1',
    ARM_NIGHT = 'ARMNIGHT1',
    ARM_PERI = 'PERI1',
    ARM_TOTAL_PERI = 'ARM1PERI1',
    DISARM = 'DARM1',
    DISARM_TOTAL_PERI = 'DARM1DARMPERI',
}

// only valid on installations with exterior sensors
export const PERIMETRAL_REQUESTS: ReadonlySet<RequestCode> = new Set([
    RequestCode.ARM_PERI,
    RequestCode.ARM_TOTAL_PERI,
    RequestCode.DISARM_TOTAL_PERI,
]);

export function isDisarm(request: RequestCode): boolean {
    return request === RequestCode.DISARM || request === RequestCode.DISARM_TOTAL_PERI;
}

export function isRequestCode(value: string): value is RequestCode {
    return Object.values<string>(RequestCode).includes(value);
}

export enum ProtomResponse {
    disarmed = 'D',
    total = 'T',
    night = 'Q',
    day = 'P',
    perimeter = 'E',
    dayAndPerimeter = 'B',
    nightAndPerimeter = 'C',
    totalAndPerimeter = 'A',
}

export enum HKArmState {
    STAY_ARM = 0,
    AWAY_ARM = 1,
    NIGHT_ARM = 2,
    DISARM = 3,
    ALARM_TRIGGERED = 4,
}

export function isHKArmState(value: unknown): value is HKArmState {
    return typeof value === 'number' && HKArmState[value] !== undefined;
}

export function convertProtomResponseToHK(code: string): HKArmState | undefined {
    switch (code) {
        case ProtomResponse.disarmed: return HKArmState.DISARM;
        case ProtomResponse.total:
        case ProtomResponse.totalAndPerimeter: return HKArmState.AWAY_ARM;
        case ProtomResponse.night:
        case ProtomResponse.nightAndPerimeter: return HKArmState.NIGHT_ARM;
        case ProtomResponse.day:
        case ProtomResponse.dayAndPerimeter:
        case ProtomResponse.perimeter: return HKArmState.STAY_ARM;
        default: return undefined;
    }
}

export function convertHKArmStateToRequest(state: HKArmState, perimetral: boolean): RequestCode | undefined {
    switch (state) {
        case HKArmState.DISARM: return perimetral ? RequestCode.DISARM_TOTAL_PERI : RequestCode.DISARM;
        case HKArmState.AWAY_ARM: return perimetral ? RequestCode.ARM_TOTAL_PERI : RequestCode.ARM;
        case HKArmState.STAY_ARM: return RequestCode.ARM_DAY;
        case HKArmState.NIGHT_ARM: return RequestCode.ARM_NIGHT;
        default: return undefined;
    }
}

/**
 * Panel state as last read from the backend.
 */
export interface PanelStatus {
    readonly protomResponse: string;
    readonly message: string;
    readonly updatedAt: string;
}

/**
 * An arm/disarm request the backend accepted. `referenceId` is what every status poll echoes back.
 */
export interface Command {
    readonly id: string;
    readonly request: RequestCode;
    readonly installation: Installation;
    readonly panel: string;
    readonly currentStatus: string;
    readonly referenceId: string;
    readonly forceArmingRemoteId?: string;
    readonly issuedAt: number;
}

/**
 * Tracks which installations have a command between issue and a terminal poll state.
 */
export class InFlightCommands {
    private readonly log: Logging;
    private readonly commands = new Map<string, string>();

    constructor(log: Logging) {
        this.log = log;
    }

    isBusy(installation: string): boolean {
        return this.commands.has(installation);
    }

    isCurrent(installation: string, id: string): boolean {
        return this.commands.get(installation) === id;
    }

    reserve(installation: string, id: string, supersede = false) {
        const previous = this.commands.get(installation);
        if (previous !== undefined) {
            if (!supersede) {
                throw new CommandInProgressError(installation);
            }
            this.log.info(`[reserve] command ${previous} on ${installation} superseded by ${id}`);
        }
        this.commands.set(installation, id);
    }

    release(installation: string, id: string) {
        if (this.isCurrent(installation, id)) {
            this.commands.delete(installation);
        }
    }
}
