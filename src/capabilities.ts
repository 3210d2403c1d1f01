import type { Logging } from 'homebridge';
import jwt from 'jsonwebtoken';

import { sentinelServiceName } from './domains';
import { ApiError, MalformedResponseError, ResolutionError } from './errors';
import {
    installationList,
    installationRecordSchema,
    services,
    servicesReplySchema,
    type InstallationRecord,
    type ServiceRecord,
} from './operations';
import type { Session, SessionManager } from './session';
import { TOKEN_CONFIG } from './settings';
import type { GraphQLTransport } from './transport';

export interface ServiceAttribute {
    readonly name: string;
    readonly value: string;
    readonly active: boolean;
}

export interface Service {
    readonly id: number;
    readonly idService: number;
    readonly active: boolean;
    readonly visible: boolean;
    readonly request: string;
    readonly description: string;
    readonly attributes: readonly ServiceAttribute[];
}

/**
 * Auxiliary device attached to an installation. Readings are fetched separately.
 */
export interface Device {
    readonly kind: 'sentinel';
    readonly serviceId: number;
    readonly zone: string;
    readonly description: string;
}

export interface Installation {
    readonly number: string;
    readonly alias: string;
    readonly panel: string;
    readonly type: string;
    readonly name: string;
    readonly surname: string;
    readonly address: string;
    readonly city: string;
    readonly postcode: string;
    readonly province: string;
    readonly email: string;
    readonly phone: string;
    readonly country: string;
    readonly perimetral: boolean;
    readonly services: readonly Service[];
    readonly devices: readonly Device[];
    readonly capabilities: string;
    readonly capabilitiesExpiresAt: number;
}

// active service that arms the exterior zone
const PERIMETRAL_SERVICE = 'PERI';

export interface CapabilityResolverOptions {
    uuid: string;
    // forces perimetral support on every installation
    perimetral?: boolean;
    now?: () => number;
}

export class CapabilityResolver {
    private readonly log: Logging;
    private readonly transport: GraphQLTransport;
    private readonly sessions: SessionManager;
    private readonly uuid: string;
    private readonly perimetral: boolean;
    private readonly now: () => number;

    constructor(log: Logging, transport: GraphQLTransport, sessions: SessionManager, options: CapabilityResolverOptions) {
        this.log = log;
        this.transport = transport;
        this.sessions = sessions;
        this.uuid = options.uuid;
        this.perimetral = options.perimetral ?? false;
        this.now = options.now ?? Date.now;
    }

    async resolveInstallations(session: Session): Promise<Installation[]> {
        let reply: { installations: unknown[] };
        try {
            reply = await this.transport.execute(installationList, {}, { auth: this.sessions.authHeader(session) });
        } catch (err) {
            if (err instanceof ApiError || err instanceof MalformedResponseError) {
                throw new ResolutionError(`Could not list installations: ${err.message}`, { cause: err });
            }
            throw err;
        }

        const records = reply.installations.map(item => {
            const parsed = installationRecordSchema.safeParse(item);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                throw new ResolutionError(`Incomplete installation record: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
            }
            return parsed.data;
        });

        const result: Installation[] = [];
        for (const record of records) {
            result.push(await this.resolveInstallation(session, record));
        }

        this.log.info(`[resolveInstallations] found ${result.length} installation(s)`);
        return result;
    }

    /**
     * Returns `installation` while its capabilities token is valid, otherwise a copy with fresh services and token.
     */
    async ensureCapabilities(session: Session, installation: Installation): Promise<Installation> {
        if (installation.capabilities && this.now() + TOKEN_CONFIG.EXPIRY_MARGIN < installation.capabilitiesExpiresAt) {
            return installation;
        }

        this.log.debug(`[ensureCapabilities] capabilities token of ${installation.number} expired, getting a new one`);
        const details = await this.readServices(session, installation.number, installation.panel);
        return { ...installation, ...details };
    }

    private async resolveInstallation(session: Session, record: InstallationRecord): Promise<Installation> {
        const details = await this.readServices(session, record.numinst, record.panel);

        return {
            number: record.numinst,
            alias: record.alias,
            panel: record.panel,
            type: record.type,
            name: record.name ?? '',
            surname: record.surname ?? '',
            address: record.address ?? '',
            city: record.city ?? '',
            postcode: record.postcode ?? '',
            province: record.province ?? '',
            email: record.email ?? '',
            phone: record.phone ?? '',
            country: session.country,
            ...details,
        };
    }

    private async readServices(session: Session, number: string, panel: string) {
        let raw: unknown;
        try {
            raw = await this.transport.execute(services, { numinst: number, uuid: this.uuid }, {
                auth: this.sessions.authHeader(session),
                installation: { number, panel },
            });
        } catch (err) {
            if (err instanceof ApiError || err instanceof MalformedResponseError) {
                throw new ResolutionError(`Could not read services: ${err.message}`, { installation: number, cause: err });
            }
            throw err;
        }

        const parsed = servicesReplySchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new ResolutionError(`Malformed services: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`, { installation: number });
        }

        const { installation } = parsed.data;
        const serviceList = installation.services.map(toService);
        const sentinelName = sentinelServiceName(session.language);

        const devices = installation.services
            .filter(service => service.active && service.request === sentinelName)
            .map(service => toSentinel(number, service));

        const perimetral = this.perimetral
            || serviceList.some(service => service.active && service.request === PERIMETRAL_SERVICE);

        return {
            perimetral,
            services: serviceList,
            devices,
            capabilities: installation.capabilities,
            capabilitiesExpiresAt: this.capabilitiesExpiry(number, installation.capabilities),
        };
    }

    private capabilitiesExpiry(number: string, token: string): number {
        const payload = jwt.decode(token);
        if (payload === null) {
            throw new ResolutionError('Capabilities token is not a JWT', { installation: number });
        }

        return typeof payload === 'object' && typeof payload.exp === 'number'
            ? payload.exp * 1000
            : this.now() + TOKEN_CONFIG.FALLBACK_TTL;
    }
}

function toService(record: ServiceRecord): Service {
    return {
        id: record.id,
        idService: record.idService,
        active: record.active,
        visible: record.visible,
        request: record.request,
        description: record.description ?? '',
        attributes: (record.attributes?.attributes ?? []).map(attribute => ({
            name: attribute.name,
            value: attribute.value,
            active: attribute.active ?? false,
        })),
    };
}

function toSentinel(installation: string, record: ServiceRecord): Device {
    const zone = record.attributes?.attributes?.[0]?.value;
    if (!zone) {
        throw new ResolutionError(`Sentinel service ${record.id} has no zone`, { installation });
    }

    return {
        kind: 'sentinel',
        serviceId: record.id,
        zone,
        description: record.description ?? '',
    };
}
