import type { Logging } from 'homebridge';

import { CapabilityResolver, type Device, type Installation } from './capabilities';
import {
    convertHKArmStateToRequest,
    HKArmState,
    InFlightCommands,
    type PanelStatus,
    type RequestCode,
} from './commands';
import type { AlarmConfig } from './config';
import { CommandDispatcher, type AirQualityReading, type SentinelReading } from './dispatcher';
import { apiUrlFor } from './domains';
import { AuthError, CapabilityError, DispatchError, InvalidCodeError, ResolutionError, SecuritasError } from './errors';
import { createDefaultRegistry, type DeviceIdentity, type OperationRegistry, type OperationTemplate, type Variables } from './operations';
import { CommandPoller, type CommandOutcome, type PollPolicy, type Sleep } from './poller';
import { createDeviceIdentity, SessionManager, type AuthChallenge, type LoginResult, type Session } from './session';
import { createGotSender, GraphQLTransport, type HttpSender } from './transport';

export interface ClientOptions {
    send?: HttpSender;
    sleep?: Sleep;
    now?: () => number;
    registry?: OperationRegistry;
}

export interface CommandOptions {
    // local PIN, checked against the configured code
    code?: string;
    signal?: AbortSignal;
    supersede?: boolean;
    force?: boolean;
}

function identityFrom(config: AlarmConfig): DeviceIdentity {
    if (config.deviceId && config.uuid && config.idDeviceIndigitall) {
        return { deviceId: config.deviceId, uuid: config.uuid, idDeviceIndigitall: config.idDeviceIndigitall };
    }
    return createDeviceIdentity();
}

export class SecuritasClient {
    private readonly log: Logging;
    private readonly config: AlarmConfig;
    private readonly now: () => number;

    readonly device: DeviceIdentity;
    readonly transport: GraphQLTransport;
    readonly sessions: SessionManager;
    readonly resolver: CapabilityResolver;
    readonly dispatcher: CommandDispatcher;
    readonly poller: CommandPoller;
    readonly registry: OperationRegistry;

    private readonly installations = new Map<string, Installation>();
    private readonly lastStatus = new Map<string, PanelStatus>();

    constructor(log: Logging, config: AlarmConfig, options: ClientOptions = {}) {
        this.log = log;
        this.config = config;
        this.now = options.now ?? Date.now;
        this.device = identityFrom(config);
        this.registry = options.registry ?? createDefaultRegistry();

        this.transport = new GraphQLTransport(log, {
            url: apiUrlFor(config.country),
            send: options.send ?? createGotSender(log),
        });
        this.sessions = new SessionManager(log, this.transport, { device: this.device, now: this.now });
        this.resolver = new CapabilityResolver(log, this.transport, this.sessions, {
            uuid: this.device.uuid,
            perimetral: config.periAlarm,
            now: this.now,
        });
        this.dispatcher = new CommandDispatcher(log, this.transport, this.sessions, new InFlightCommands(log), this.now);

        const policy: Partial<PollPolicy> = {
            intervalMs: config.pollInterval * 1000,
            maxAttempts: config.maxPollAttempts,
            budgetMs: config.pollBudget === undefined ? undefined : config.pollBudget * 1000,
            force: config.forceArming,
        };
        this.poller = new CommandPoller(log, this.dispatcher, policy, options.sleep, this.now);
    }

    async login(): Promise<LoginResult> {
        const result = await this.sessions.login(this.config.username, this.config.password, this.config.country);
        if (result.kind === 'challenge' && !this.config.useOtp) {
            throw new AuthError('The backend requires OTP device authorization but useOtp is disabled');
        }
        return result;
    }

    async sendOtp(challenge: AuthChallenge, phoneId: number): Promise<void> {
        await this.sessions.sendOtp(challenge, phoneId);
    }

    async submitOtp(challenge: AuthChallenge, code: string): Promise<Session> {
        return this.sessions.submitOtp(challenge, code);
    }

    async logout(): Promise<void> {
        const session = this.sessions.session;
        if (session) {
            await this.sessions.logout(session);
        }
        this.installations.clear();
    }

    async listInstallations(): Promise<Installation[]> {
        const installations = await this.withSession(session => this.resolver.resolveInstallations(session));

        this.installations.clear();
        for (const installation of installations) {
            this.installations.set(installation.number, installation);
        }
        return installations;
    }

    /**
     * The configured installation (or the first one) with a valid capabilities token.
     */
    async installation(number: string | undefined = this.config.installation): Promise<Installation> {
        if (this.installations.size === 0) {
            await this.listInstallations();
        }

        const cached = number === undefined
            ? [...this.installations.values()][0]
            : this.installations.get(number);
        if (!cached) {
            throw new ResolutionError(number === undefined ? 'The account has no installations' : `Installation ${number} not found`);
        }

        const installation = await this.withSession(session => this.resolver.ensureCapabilities(session, cached));
        this.installations.set(installation.number, installation);
        return installation;
    }

    checkCode(code?: string) {
        if (this.config.code !== undefined && code !== this.config.code) {
            throw new InvalidCodeError();
        }
    }

    async sendCommand(request: RequestCode, options: CommandOptions = {}): Promise<CommandOutcome> {
        this.checkCode(options.code);

        const installation = await this.installation();
        const session = await this.session();
        const command = await this.dispatcher.issueCommand(session, installation, request, {
            currentStatus: this.lastStatus.get(installation.number)?.protomResponse,
            supersede: options.supersede,
        });

        const outcome = await this.poller.run(session, command, {
            signal: options.signal,
            policy: options.force === undefined ? undefined : { force: options.force },
        });

        if (outcome.kind === 'CONFIRMED') {
            this.lastStatus.set(installation.number, {
                protomResponse: outcome.protomResponse,
                message: outcome.message,
                updatedAt: new Date(this.now()).toISOString(),
            });
        }
        return outcome;
    }

    async armSystem(state: HKArmState, options: CommandOptions = {}): Promise<CommandOutcome> {
        const installation = await this.installation();
        const request = convertHKArmStateToRequest(state, installation.perimetral);
        if (request === undefined) {
            throw new CapabilityError(installation.number, HKArmState[state], 'not a target state');
        }

        this.log.info(`[armSystem] changing system state [${request}]`);
        return this.sendCommand(request, options);
    }

    /**
     * Current panel status. With checkAlarmPanel the physical panel is queried, otherwise the stored status is read.
     */
    async getStatus(options: { signal?: AbortSignal } = {}): Promise<PanelStatus> {
        const installation = await this.installation();

        const status = await this.withSession(async session => {
            if (this.config.checkAlarmPanel) {
                const verified = await this.verifyPanel(session, installation, options.signal);
                if (verified) {
                    return verified;
                }
            }
            return this.dispatcher.queryLastKnownStatus(session, installation);
        });

        this.log.info(`[getStatus] got status [${status.protomResponse}]`);
        this.lastStatus.set(installation.number, status);
        return status;
    }

    lastKnownStatus(number: string): PanelStatus | undefined {
        return this.lastStatus.get(number);
    }

    async readSentinels(): Promise<SentinelReading[]> {
        const installation = await this.installation();
        return this.withSession(async session => {
            const readings: SentinelReading[] = [];
            for (const device of installation.devices) {
                readings.push(await this.dispatcher.readSentinel(session, installation, device));
            }
            return readings;
        });
    }

    async readAirQuality(device: Device): Promise<AirQualityReading> {
        const installation = await this.installation();
        return this.withSession(session => this.dispatcher.readAirQuality(session, installation, device));
    }

    registerOperation<I, R>(template: OperationTemplate<I, R>) {
        this.registry.register(template);
    }

    /**
     * Sends a registered operation by name and returns its unvalidated `data` field.
     */
    async execute(name: string, variables: Variables, installation?: Installation): Promise<unknown> {
        const operation = this.registry.get(name);
        if (!operation) {
            throw new SecuritasError(`Unknown operation ${name}`);
        }

        return this.withSession(session => this.transport.executeRaw(operation, variables, {
            auth: this.sessions.authHeader(session),
            installation: installation && {
                number: installation.number,
                panel: installation.panel,
                capabilities: installation.capabilities,
            },
        }));
    }

    private async verifyPanel(session: Session, installation: Installation, signal?: AbortSignal): Promise<PanelStatus | undefined> {
        try {
            const outcome = await this.poller.verifyPanel(session, installation, { signal });
            if (outcome.kind === 'CONFIRMED') {
                return outcome.status;
            }
            this.log.warn(`[getStatus] panel check ended ${outcome.kind}, using the stored status`);
        } catch (err) {
            if (!(err instanceof DispatchError)) {
                throw err;
            }
            this.log.warn(`[getStatus] ${err.message}, using the stored status`);
        }
        return undefined;
    }

    private async session(): Promise<Session> {
        const current = this.sessions.session;
        if (current) {
            try {
                return await this.sessions.ensureValid(current);
            } catch (err) {
                if (!(err instanceof AuthError)) {
                    throw err;
                }
                this.log.warn(`[session] ${err.message}, logging in again`);
            }
        }

        const result = await this.login();
        if (result.kind === 'challenge') {
            throw new AuthError('Device authorization required, run the login helper to answer the OTP challenge');
        }
        return result;
    }

    /**
     * Runs `fn` with a valid session, once more with a new login when the backend rejects the session.
     */
    private async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
        const session = await this.session();
        try {
            return await fn(session);
        } catch (err) {
            if (!(err instanceof AuthError)) {
                throw err;
            }
            this.log.warn(`[withSession] ${err.message}, retrying with a new session`);
            this.sessions.invalidate(session);
            return fn(await this.session());
        }
    }
}
