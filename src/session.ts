import { Mutex } from 'async-mutex';
import { randomBytes } from 'crypto';
import type { Logging } from 'homebridge';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { languageFor } from './domains';
import { ApiError, AuthError, MalformedResponseError } from './errors';
import { login, logout, refreshLogin, sendOtp, validateDevice, type AuthReply, type DeviceIdentity } from './operations';
import { DEVICE_PROFILE, TOKEN_CONFIG } from './settings';
import { isRecord, type AuthHeader, type GraphQLTransport } from './transport';

export interface Session {
    readonly kind: 'session';
    readonly username: string;
    readonly country: string;
    readonly language: string;
    readonly token: string;
    readonly refreshToken: string;
    readonly loginTimestamp: number;
    readonly expiresAt: number;
}

export interface OtpPhone {
    readonly id: number;
    readonly phone: string;
}

/**
 * Second factor requested by the backend. The code is sent to one of `phones` and answered with submitOtp.
 */
export interface AuthChallenge {
    readonly kind: 'challenge';
    readonly username: string;
    readonly password: string;
    readonly country: string;
    readonly otpHash: string;
    readonly phones: readonly OtpPhone[];
    readonly expiresAt: number;
}

export type LoginResult = Session | AuthChallenge;

const otpChallengeSchema = z.object({
    'auth-otp-hash': z.string().min(1),
    'auth-phones': z.array(z.object({
        id: z.coerce.number(),
        phone: z.string(),
    })),
});

/**
 * A fresh identity for this client, to be stored with the credentials. The backend remembers which identities
 * passed an OTP challenge.
 */
export function createDeviceIdentity(): DeviceIdentity {
    return {
        deviceId: `${randomBytes(16).toString('base64url')}:APA91b${randomBytes(101).toString('base64url').slice(0, 134)}`,
        uuid: uuidv4().replace(/-/g, '').slice(0, 16),
        idDeviceIndigitall: uuidv4(),
    };
}

export function requestId(user: string, at: Date): string {
    const stamp = [
        at.getFullYear(),
        at.getMonth() + 1,
        at.getDate(),
        at.getHours(),
        at.getMinutes(),
        at.getMilliseconds(),
    ].join('');
    return `OWA_______________${user}_______________${stamp}`;
}

function needsDeviceAuthorization(data: unknown): boolean {
    return isRecord(data) && isRecord(data.xSLoginToken) && data.xSLoginToken.needDeviceAuthorization === true;
}

export interface SessionManagerOptions {
    device: DeviceIdentity;
    now?: () => number;
}

export class SessionManager {
    private readonly log: Logging;
    private readonly transport: GraphQLTransport;
    private readonly device: DeviceIdentity;
    private readonly now: () => number;
    private readonly refreshLock = new Mutex();

    private current?: Session;

    constructor(log: Logging, transport: GraphQLTransport, options: SessionManagerOptions) {
        this.log = log;
        this.transport = transport;
        this.device = options.device;
        this.now = options.now ?? Date.now;
    }

    get session(): Session | undefined {
        return this.current;
    }

    async login(username: string, password: string, country: string): Promise<LoginResult> {
        const upper = country.toUpperCase();
        const issuedAt = this.now();

        let reply: AuthReply;
        try {
            reply = await this.transport.execute(login, {
                user: username,
                password,
                id: requestId(username, new Date(issuedAt)),
                country: upper,
                lang: languageFor(upper),
                device: this.device,
            });
        } catch (err) {
            if (err instanceof ApiError) {
                if (needsDeviceAuthorization(err.data)) {
                    return this.requestChallenge(username, password, upper);
                }
                throw new AuthError(`Login rejected: ${err.message}`, { cause: err });
            }
            throw err;
        }

        if (reply.needDeviceAuthorization) {
            return this.requestChallenge(username, password, upper);
        }

        if (reply.res !== 'OK' || !reply.hash) {
            throw new AuthError(`Login rejected: ${reply.msg ?? reply.res}`);
        }

        const session = this.createSession(username, upper, reply.hash, reply.refreshToken ?? '', issuedAt);
        this.current = session;
        this.log.info(`[login] logged in as ${username}, token valid until ${new Date(session.expiresAt).toISOString()}`);
        return session;
    }

    async sendOtp(challenge: AuthChallenge, phoneId: number): Promise<void> {
        this.assertChallengeAlive(challenge);

        if (!challenge.phones.some(phone => phone.id === phoneId)) {
            throw new AuthError(`Phone ${phoneId} is not part of the challenge`);
        }

        try {
            const reply = await this.transport.execute(sendOtp, { recordId: phoneId, otpHash: challenge.otpHash }, {
                auth: this.anonymousAuth(challenge.username, challenge.country),
            });
            if (reply.res !== 'OK') {
                throw new AuthError(`Could not send the OTP code: ${reply.msg ?? reply.res}`);
            }
        } catch (err) {
            if (err instanceof ApiError) {
                throw new AuthError(`Could not send the OTP code: ${err.message}`, { cause: err });
            }
            throw err;
        }

        this.log.info(`[sendOtp] code sent to phone ${phoneId}`);
    }

    async submitOtp(challenge: AuthChallenge, code: string): Promise<Session> {
        this.assertChallengeAlive(challenge);

        let reply: AuthReply;
        try {
            reply = await this.transport.execute(validateDevice, { device: this.device }, {
                auth: this.anonymousAuth(challenge.username, challenge.country),
                security: { token: code, type: 'OTP', otpHash: challenge.otpHash },
            });
        } catch (err) {
            if (err instanceof ApiError) {
                throw new AuthError(`OTP code rejected: ${err.message}`, { cause: err });
            }
            throw err;
        }

        if (reply.res !== 'OK') {
            throw new AuthError(`OTP code rejected: ${reply.msg ?? reply.res}`);
        }

        this.log.info(`[submitOtp] device validated for ${challenge.username}`);

        const result = await this.login(challenge.username, challenge.password, challenge.country);
        if (result.kind === 'challenge') {
            throw new AuthError('The backend still requires device authorization');
        }
        return result;
    }

    /**
     * Returns `session` while it is valid, otherwise the renewed session. Concurrent callers share one refresh.
     */
    async ensureValid(session: Session): Promise<Session> {
        if (this.isFresh(session)) {
            return session;
        }

        return this.refreshLock.runExclusive(async () => {
            const current = this.current;
            if (current && current.token !== session.token && this.isFresh(current)) {
                return current;
            }
            return this.refresh(session);
        });
    }

    async logout(session: Session): Promise<void> {
        try {
            await this.transport.execute(logout, {}, { auth: this.authHeader(session) });
            this.log.info(`[logout] logged out ${session.username}`);
        } finally {
            this.invalidate(session);
        }
    }

    /**
     * Drops `session` when the backend stopped accepting it.
     */
    invalidate(session: Session) {
        if (this.current?.token === session.token) {
            this.current = undefined;
        }
    }

    authHeader(session: Session): AuthHeader {
        return {
            loginTimestamp: session.loginTimestamp,
            user: session.username,
            id: requestId(session.username, new Date(this.now())),
            country: session.country,
            lang: session.language,
            callby: DEVICE_PROFILE.callby,
            hash: session.token,
        };
    }

    isFresh(session: Session): boolean {
        return this.now() + TOKEN_CONFIG.EXPIRY_MARGIN < session.expiresAt;
    }

    private async refresh(session: Session): Promise<Session> {
        if (!session.refreshToken) {
            this.invalidate(session);
            throw new AuthError('Session expired and no refresh token is available');
        }

        this.log.debug(`[refresh] renewing session for ${session.username}`);

        const issuedAt = this.now();
        let reply: AuthReply;
        try {
            reply = await this.transport.execute(refreshLogin, {
                refreshToken: session.refreshToken,
                id: requestId(session.username, new Date(issuedAt)),
                country: session.country,
                lang: session.language,
                device: this.device,
            }, {
                auth: this.anonymousAuth(session.username, session.country),
            });
        } catch (err) {
            if (err instanceof ApiError || err instanceof AuthError) {
                this.invalidate(session);
                throw new AuthError(`Session refresh rejected: ${err.message}`, { cause: err });
            }
            throw err;
        }

        if (reply.res !== 'OK' || !reply.hash) {
            this.invalidate(session);
            throw new AuthError(`Session refresh rejected: ${reply.msg ?? reply.res}`);
        }

        const renewed = this.createSession(session.username, session.country, reply.hash, reply.refreshToken ?? session.refreshToken, issuedAt);
        this.current = renewed;
        this.log.info(`[refresh] session renewed until ${new Date(renewed.expiresAt).toISOString()}`);
        return renewed;
    }

    private async requestChallenge(username: string, password: string, country: string): Promise<LoginResult> {
        this.log.info(`[login] device authorization required for ${username}`);

        try {
            await this.transport.execute(validateDevice, { device: this.device }, {
                auth: this.anonymousAuth(username, country),
            });
        } catch (err) {
            if (!(err instanceof ApiError)) {
                throw err;
            }

            // the challenge comes back inside the error payload
            const parsed = otpChallengeSchema.safeParse(err.errors[0]?.data);
            if (!parsed.success) {
                throw new AuthError(`Device validation failed: ${err.message}`, { cause: err });
            }

            return {
                kind: 'challenge',
                username,
                password,
                country,
                otpHash: parsed.data['auth-otp-hash'],
                phones: parsed.data['auth-phones'],
                expiresAt: this.now() + TOKEN_CONFIG.OTP_CHALLENGE_TTL,
            };
        }

        throw new AuthError('The backend requires device authorization but issued no challenge');
    }

    private assertChallengeAlive(challenge: AuthChallenge) {
        if (this.now() >= challenge.expiresAt) {
            throw new AuthError('The OTP challenge has expired, log in again');
        }
    }

    private anonymousAuth(username: string, country: string): AuthHeader {
        return {
            loginTimestamp: this.now(),
            user: username,
            id: requestId(username, new Date(this.now())),
            country,
            lang: languageFor(country),
            callby: DEVICE_PROFILE.callby,
            hash: '',
            refreshToken: '',
        };
    }

    private createSession(username: string, country: string, token: string, refreshToken: string, issuedAt: number): Session {
        const payload = jwt.decode(token);
        if (payload === null) {
            throw new MalformedResponseError(login.name, 'authentication token is not a JWT');
        }

        const expiresAt = typeof payload === 'object' && typeof payload.exp === 'number'
            ? payload.exp * 1000
            : issuedAt + TOKEN_CONFIG.FALLBACK_TTL;

        const session: Session = {
            kind: 'session',
            username,
            country,
            language: languageFor(country),
            token,
            refreshToken,
            loginTimestamp: issuedAt,
            expiresAt,
        };
        return Object.freeze(session);
    }
}
