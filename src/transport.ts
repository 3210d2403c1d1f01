import { randomBytes } from 'crypto';
import { default as got, RequestError } from 'got';
import type { Logging } from 'homebridge';

import { ApiError, AuthError, MalformedResponseError, TransportError, type GraphQLErrorItem } from './errors';
import type { AnyOperation, OperationTemplate, Variables } from './operations';
import { DEVICE_PROFILE, HTTP_TIMEOUT, USER_AGENT } from './settings';

export type GraphQLBody = {
    operationName: string;
    variables: Variables;
    query: string;
};

export interface HttpRequest {
    url: string;
    headers: Record<string, string>;
    body: GraphQLBody;
    signal?: AbortSignal;
}

export interface HttpReply {
    statusCode: number;
    body: unknown;
}

/**
 * Sends one request. Rejects with TransportError when no reply was received.
 */
export type HttpSender = (request: HttpRequest) => Promise<HttpReply>;

/**
 * Value of the `auth` header.
 */
export interface AuthHeader {
    loginTimestamp: number;
    user: string;
    id: string;
    country: string;
    lang: string;
    callby: string;
    hash: string;
    refreshToken?: string;
}

/**
 * Value of the `security` header sent while answering an OTP challenge.
 */
export interface SecurityHeader {
    token: string;
    type: 'OTP';
    otpHash: string;
}

export interface InstallationHeaders {
    number: string;
    panel: string;
    capabilities?: string;
}

export interface RequestContext {
    auth?: AuthHeader;
    security?: SecurityHeader;
    installation?: InstallationHeaders;
    signal?: AbortSignal;
}

const EXPIRED_SESSION_MESSAGES = [
    'Invalid session. Please, try again later.',
    'Invalid token: Expired',
];

export function createGotSender(log: Logging, timeout: number = HTTP_TIMEOUT): HttpSender {
    const client = got.extend({
        method: 'POST',
        throwHttpErrors: false,
        retry: 0,
        timeout,
        hooks: {
            beforeRequest: [
                options => {
                    log.debug(`beforeRequest to ${options.url} [${options.headers['x-apollo-operation-name']}]`);
                }
            ]
        }
    });

    return async ({ url, headers, body, signal }) => {
        const request = client<unknown>(url, { headers, json: body, responseType: 'json' });
        const cancel = () => request.cancel();
        signal?.addEventListener('abort', cancel, { once: true });

        try {
            const response = await request;
            return { statusCode: response.statusCode, body: response.body };
        } catch (err) {
            if (err instanceof RequestError) {
                throw new TransportError(`${err.name} on ${body.operationName}: ${err.message}`, {
                    statusCode: err.response?.statusCode,
                    cause: err,
                });
            }
            throw new TransportError(`Request ${body.operationName} failed: ${err}`, { cause: err });
        } finally {
            signal?.removeEventListener('abort', cancel);
        }
    };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrors(value: unknown): GraphQLErrorItem[] {
    if (!Array.isArray(value)) {
        return [];
    }

    return value.map(item => {
        if (isRecord(item)) {
            return { message: typeof item.message === 'string' ? item.message : 'Unknown error', data: item.data };
        }
        return { message: String(item) };
    });
}

export interface TransportOptions {
    url: string;
    send: HttpSender;
}

/**
 * Signs and sends GraphQL operations to one country endpoint.
 */
export class GraphQLTransport {
    private readonly log: Logging;
    private readonly url: string;
    private readonly send: HttpSender;
    private readonly operationId = randomBytes(64).toString('hex');

    constructor(log: Logging, options: TransportOptions) {
        this.log = log;
        this.url = options.url;
        this.send = options.send;
    }

    async execute<I, R>(operation: OperationTemplate<I, R>, input: I, context: RequestContext = {}): Promise<R> {
        const data = await this.executeRaw(operation, operation.variables(input), context);
        const parsed = operation.schema.safeParse(data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new MalformedResponseError(operation.name, issue ? `${issue.path.join('.') || operation.field}: ${issue.message}` : 'invalid');
        }
        return parsed.data;
    }

    /**
     * Sends an operation with already built variables and returns `data[field]` unvalidated.
     */
    async executeRaw(operation: AnyOperation, variables: Variables, context: RequestContext = {}): Promise<unknown> {
        const headers = this.headersFor(operation.name, context);
        const body: GraphQLBody = { operationName: operation.name, variables, query: operation.query };

        this.log.debug(`[${operation.name}] sending request`);
        const reply = await this.send({ url: this.url, headers, body, signal: context.signal });
        this.log.debug(`[${operation.name}] status [${reply.statusCode}]`);

        if (reply.statusCode === 401 || reply.statusCode === 403) {
            throw new AuthError(`Session rejected by the server (${reply.statusCode}) on ${operation.name}`);
        }

        if (reply.statusCode >= 500) {
            throw new TransportError(`Server error ${reply.statusCode} on ${operation.name}`, { statusCode: reply.statusCode });
        }

        if (!isRecord(reply.body)) {
            throw new TransportError(`Response to ${operation.name} is not a JSON object`, { statusCode: reply.statusCode });
        }

        const errors = readErrors(reply.body.errors);
        const first = errors[0];
        if (first) {
            if (EXPIRED_SESSION_MESSAGES.includes(first.message)) {
                throw new AuthError(first.message);
            }
            throw new ApiError(first.message, errors, reply.body.data);
        }

        if (reply.statusCode >= 400) {
            throw new TransportError(`HTTP ${reply.statusCode} on ${operation.name}`, { statusCode: reply.statusCode });
        }

        const data = reply.body.data;
        if (!isRecord(data)) {
            throw new MalformedResponseError(operation.name, 'missing data');
        }

        return data[operation.field];
    }

    private headersFor(operation: string, context: RequestContext): Record<string, string> {
        const headers: Record<string, string> = {
            'app': JSON.stringify({ appVersion: DEVICE_PROFILE.version, origin: 'native' }),
            'User-Agent': USER_AGENT,
            'X-APOLLO-OPERATION-ID': this.operationId,
            'X-APOLLO-OPERATION-NAME': operation,
            'extension': '{"mode":"full"}',
        };

        if (context.installation) {
            headers.numinst = context.installation.number;
            headers.panel = context.installation.panel;
            if (context.installation.capabilities) {
                headers['X-Capabilities'] = context.installation.capabilities;
            }
        }

        if (context.auth) {
            headers.auth = JSON.stringify(context.auth);
        }

        if (context.security) {
            headers.security = JSON.stringify(context.security);
        }

        return headers;
    }
}
