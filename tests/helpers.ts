import { Logger } from 'homebridge/lib/logger';
import jwt from 'jsonwebtoken';

import type { Installation } from '../src/capabilities';
import type { DeviceIdentity } from '../src/operations';
import type { HttpReply, HttpRequest, HttpSender } from '../src/transport';

export const log = Logger.withPrefix('test');

export const API_URL = 'https://customers.example.test/owa-api/graphql';

export const DEVICE: DeviceIdentity = {
    deviceId: 'test-device-id',
    uuid: 'test-uuid-0001',
    idDeviceIndigitall: 'test-indigitall-id',
};

export const START = Date.UTC(2024, 0, 15, 10, 0, 0);

export class Clock {
    current = START;

    readonly now = () => this.current;

    advance(ms: number) {
        this.current += ms;
    }
}

/**
 * Token signed with a placeholder secret. The client only reads its exp claim.
 */
export function token(expiresAtMs: number, claims: Record<string, string> = {}): string {
    return jwt.sign({ ...claims, exp: Math.floor(expiresAtMs / 1000) }, 'test-secret');
}

export function data(field: string, value: unknown): HttpReply {
    return { statusCode: 200, body: { data: { [field]: value } } };
}

export function graphqlError(message: string, errorData?: unknown, replyData: unknown = null): HttpReply {
    return { statusCode: 200, body: { errors: [{ message, data: errorData }], data: replyData } };
}

export type Reply = HttpReply | ((request: HttpRequest) => HttpReply);

/**
 * In-process stand-in for the GraphQL endpoint. Replies are queued per operation name; the last one repeats.
 */
export class FakeBackend {
    readonly requests: HttpRequest[] = [];
    private readonly replies = new Map<string, Reply[]>();

    on(operation: string, ...replies: Reply[]): this {
        this.replies.set(operation, replies);
        return this;
    }

    calls(operation: string): HttpRequest[] {
        return this.requests.filter(request => request.body.operationName === operation);
    }

    readonly send: HttpSender = async request => {
        this.requests.push(request);

        const queue = this.replies.get(request.body.operationName);
        if (!queue || queue.length === 0) {
            throw new Error(`Unexpected operation ${request.body.operationName}`);
        }

        const reply = queue.length > 1 ? queue.shift() : queue[0];
        if (reply === undefined) {
            throw new Error(`Unexpected operation ${request.body.operationName}`);
        }
        return typeof reply === 'function' ? reply(request) : reply;
    };
}

export function loginOk(hash: string, refreshToken: string | null = 'test-refresh-token'): HttpReply {
    return data('xSLoginToken', {
        res: 'OK',
        msg: '',
        hash,
        refreshToken,
        legals: false,
        changePassword: false,
        needDeviceAuthorization: false,
        mainUser: true,
    });
}

export function statusReply(res: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { res, msg: null, status: null, protomResponse: null, protomResponseDate: null, numinst: null, requestId: null, error: null, ...extra };
}

export const INSTALLATION_RECORD = {
    numinst: '1234567',
    alias: 'Home',
    panel: 'SDVFAST',
    type: 'PLUS',
    name: 'Test',
    surname: 'User',
    address: 'Main Street 1',
    city: 'Madrid',
    postcode: '28001',
    province: 'Madrid',
    email: 'user@example.com',
    phone: '600000000',
};

export function serviceRecord(id: number, request: string, options: { active?: boolean; zone?: string; description?: string } = {}) {
    return {
        id,
        idService: id + 10,
        active: options.active ?? true,
        visible: true,
        isPremium: false,
        request,
        description: options.description ?? request,
        attributes: options.zone === undefined
            ? null
            : { name: 'attributes', attributes: [{ name: 'zone', value: options.zone, active: true }] },
    };
}

export function servicesReply(capabilities: string, services: unknown[]) {
    return data('xSSrv', {
        res: 'OK',
        msg: null,
        language: 'es',
        installation: {
            numinst: INSTALLATION_RECORD.numinst,
            panel: INSTALLATION_RECORD.panel,
            capabilities,
            services,
        },
    });
}

export function installation(overrides: Partial<Installation> = {}): Installation {
    return {
        number: '12345',
        alias: 'Home',
        panel: 'SDVFAST',
        type: 'PLUS',
        name: '',
        surname: '',
        address: '',
        city: '',
        postcode: '',
        province: '',
        email: '',
        phone: '',
        country: 'ES',
        perimetral: false,
        services: [],
        devices: [],
        capabilities: 'test-capabilities',
        capabilitiesExpiresAt: START + 3600 * 1000,
        ...overrides,
    };
}
