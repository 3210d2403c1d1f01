import type { Logging } from 'homebridge';
import { v4 as uuidv4 } from 'uuid';

import type { Device, Installation } from './capabilities';
import { InFlightCommands, isDisarm, PERIMETRAL_REQUESTS, type Command, type PanelStatus, RequestCode } from './commands';
import { CapabilityError, DispatchError, SecuritasError } from './errors';
import {
    airQuality,
    armPanel,
    armStatus,
    checkAlarm,
    checkAlarmStatus,
    disarmPanel,
    disarmStatus,
    generalStatus,
    sentinel,
    type ReferenceReply,
    type StatusReply,
} from './operations';
import type { Session, SessionManager } from './session';
import type { GraphQLTransport, RequestContext } from './transport';

export interface SentinelReading {
    readonly alias: string;
    readonly zone: string;
    readonly temperature: number;
    readonly humidity: number;
    readonly airQuality: string;
    readonly readAt: number;
}

export interface AirQualityReading {
    readonly zone: string;
    readonly value: number;
    readonly message: string;
    readonly readAt: number;
}

export interface IssueOptions {
    // last known protom response of the panel
    currentStatus?: string;
    // replace the command in flight instead of failing
    supersede?: boolean;
}

export class CommandDispatcher {
    private readonly log: Logging;
    private readonly transport: GraphQLTransport;
    private readonly sessions: SessionManager;
    private readonly inFlight: InFlightCommands;
    private readonly now: () => number;

    constructor(log: Logging, transport: GraphQLTransport, sessions: SessionManager, inFlight: InFlightCommands, now: () => number = Date.now) {
        this.log = log;
        this.transport = transport;
        this.sessions = sessions;
        this.inFlight = inFlight;
        this.now = now;
    }

    async issueCommand(session: Session, installation: Installation, request: RequestCode, options: IssueOptions = {}): Promise<Command> {
        if (PERIMETRAL_REQUESTS.has(request) && !installation.perimetral) {
            throw new CapabilityError(installation.number, request, 'the installation has no perimetral alarm');
        }

        const id = uuidv4();
        this.inFlight.reserve(installation.number, id, options.supersede ?? false);

        const currentStatus = options.currentStatus ?? '';
        try {
            const referenceId = await this.send(session, installation, request, currentStatus);
            return {
                id,
                request,
                installation,
                panel: installation.panel,
                currentStatus,
                referenceId,
                issuedAt: this.now(),
            };
        } catch (err) {
            this.inFlight.release(installation.number, id);
            throw err;
        }
    }

    /**
     * Sends `command` again, overriding the condition the backend reported under `forceReferenceId`.
     */
    async forceCommand(session: Session, command: Command, forceReferenceId: string, signal?: AbortSignal): Promise<Command> {
        this.log.info(`[forceCommand] forcing ${command.request} on ${command.installation.number}`);
        const referenceId = await this.send(session, command.installation, command.request, command.currentStatus, forceReferenceId, signal);
        return { ...command, referenceId, forceArmingRemoteId: forceReferenceId, issuedAt: this.now() };
    }

    async checkCommandStatus(session: Session, command: Command, counter: number, signal?: AbortSignal): Promise<StatusReply> {
        const operation = isDisarm(command.request) ? disarmStatus : armStatus;
        const reply = await this.transport.execute(operation, {
            request: command.request,
            numinst: command.installation.number,
            panel: command.panel,
            currentStatus: command.currentStatus,
            referenceId: command.referenceId,
            counter,
            forceArmingRemoteId: command.forceArmingRemoteId,
        }, this.context(session, command.installation, signal));

        this.log.debug(`[checkCommandStatus] ${command.referenceId} #${counter} returned [${reply.res}]`);
        return reply;
    }

    isCurrent(command: Command): boolean {
        return this.inFlight.isCurrent(command.installation.number, command.id);
    }

    isBusy(installation: Installation): boolean {
        return this.inFlight.isBusy(installation.number);
    }

    release(command: Command) {
        this.inFlight.release(command.installation.number, command.id);
    }

    /**
     * Single read of the status the backend last stored, without asking the panel.
     */
    async queryLastKnownStatus(session: Session, installation: Installation): Promise<PanelStatus> {
        const reply = await this.transport.execute(generalStatus, { numinst: installation.number }, this.context(session, installation));
        this.log.debug(`[queryLastKnownStatus] ${installation.number} is [${reply.status}]`);

        return {
            protomResponse: reply.status ?? '',
            message: '',
            updatedAt: reply.timestampUpdate ?? '',
        };
    }

    /**
     * Asks the backend to query the physical panel. The answer is polled with checkAlarmStatus.
     */
    async checkAlarm(session: Session, installation: Installation): Promise<string> {
        let reply: ReferenceReply;
        try {
            reply = await this.transport.execute(checkAlarm, { numinst: installation.number, panel: installation.panel }, this.context(session, installation));
        } catch (err) {
            if (err instanceof SecuritasError) {
                throw new DispatchError(`CheckAlarm failed: ${err.message}`, { cause: err });
            }
            throw err;
        }

        if (reply.res !== 'OK' || !reply.referenceId) {
            throw new DispatchError(`CheckAlarm rejected: ${reply.msg ?? reply.res}`);
        }
        return reply.referenceId;
    }

    async checkAlarmStatus(session: Session, installation: Installation, referenceId: string, counter: number, signal?: AbortSignal): Promise<StatusReply> {
        return this.transport.execute(checkAlarmStatus, {
            numinst: installation.number,
            panel: installation.panel,
            referenceId,
            counter,
        }, this.context(session, installation, signal));
    }

    async readSentinel(session: Session, installation: Installation, device: Device): Promise<SentinelReading> {
        const reply = await this.transport.execute(sentinel, { numinst: installation.number, zone: device.zone }, this.context(session, installation));
        const [first] = reply;
        const { ddi } = first;

        return {
            alias: ddi.alias,
            zone: device.zone,
            temperature: ddi.status.temperature,
            humidity: ddi.status.humidity,
            airQuality: ddi.status.airQualityMsg ?? '',
            readAt: this.now(),
        };
    }

    async readAirQuality(session: Session, installation: Installation, device: Device): Promise<AirQualityReading> {
        const reply = await this.transport.execute(airQuality, { numinst: installation.number, zone: device.zone }, this.context(session, installation));

        return {
            zone: device.zone,
            value: reply.graphData.status.current,
            message: reply.graphData.status.currentMsg ?? '',
            readAt: this.now(),
        };
    }

    private async send(session: Session, installation: Installation, request: RequestCode, currentStatus: string, forceArmingRemoteId?: string, signal?: AbortSignal): Promise<string> {
        const operation = isDisarm(request) ? disarmPanel : armPanel;

        this.log.info(`[${operation.name}] sending ${request} to ${installation.number}`);

        let reply: ReferenceReply;
        try {
            reply = await this.transport.execute(operation, {
                request,
                numinst: installation.number,
                panel: installation.panel,
                currentStatus,
                forceArmingRemoteId,
            }, this.context(session, installation, signal));
        } catch (err) {
            if (err instanceof SecuritasError) {
                throw new DispatchError(`${operation.name} failed: ${err.message}`, { cause: err });
            }
            throw err;
        }

        if (reply.res !== 'OK' || !reply.referenceId) {
            throw new DispatchError(`${operation.name} rejected: ${reply.msg ?? reply.res}`);
        }

        this.log.info(`[${operation.name}] accepted with reference [${reply.referenceId}]`);
        return reply.referenceId;
    }

    private context(session: Session, installation: Installation, signal?: AbortSignal): RequestContext {
        return {
            auth: this.sessions.authHeader(session),
            installation: {
                number: installation.number,
                panel: installation.panel,
                capabilities: installation.capabilities,
            },
            signal,
        };
    }
}
