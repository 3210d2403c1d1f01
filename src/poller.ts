import type { Logging } from 'homebridge';
import { setTimeout as delay } from 'timers/promises';

import type { Installation } from './capabilities';
import { isDisarm, type Command, type PanelStatus } from './commands';
import type { CommandDispatcher } from './dispatcher';
import { ApiError, CommandAbortedError, DispatchError, MalformedResponseError, TransportError } from './errors';
import type { CommandErrorInfo, StatusReply } from './operations';
import type { Session } from './session';
import { POLLING_CONFIG } from './settings';

export interface PollPolicy {
    intervalMs: number;
    // total status checks across a forced re-issue
    maxAttempts: number;
    // wall clock limit, unlimited when omitted
    budgetMs?: number;
    // re-issue once when the backend offers to force a blocked command
    force: boolean;
}

export const DEFAULT_POLL_POLICY: PollPolicy = {
    intervalMs: POLLING_CONFIG.INTERVAL,
    maxAttempts: POLLING_CONFIG.MAX_ATTEMPTS,
    force: false,
};

interface Progress {
    readonly command: Command;
    // last counter sent for command.referenceId
    readonly counter: number;
    readonly attempts: number;
    readonly forced: boolean;
}

export type PollState =
    | Progress & { readonly kind: 'ISSUED' }
    | Progress & { readonly kind: 'POLLING'; readonly last?: StatusReply }
    | Progress & { readonly kind: 'FORCING'; readonly error: CommandErrorInfo; readonly forceReferenceId: string }
    | Progress & { readonly kind: 'CONFIRMED'; readonly status: string; readonly protomResponse: string; readonly message: string }
    | Progress & { readonly kind: 'FAILED'; readonly reason: string; readonly error?: CommandErrorInfo }
    | Progress & { readonly kind: 'TIMEOUT' };

export type CommandOutcome = Extract<PollState, { kind: 'CONFIRMED' | 'FAILED' | 'TIMEOUT' }>;

export type PanelCheckOutcome =
    | { readonly kind: 'CONFIRMED'; readonly status: PanelStatus; readonly attempts: number }
    | { readonly kind: 'FAILED'; readonly reason: string; readonly attempts: number }
    | { readonly kind: 'TIMEOUT'; readonly attempts: number };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

export function isTerminal(state: PollState): state is CommandOutcome {
    return state.kind === 'CONFIRMED' || state.kind === 'FAILED' || state.kind === 'TIMEOUT';
}

export type Verdict = 'WAIT' | 'OK' | 'KO';

export function verdictOf(reply: StatusReply): Verdict {
    if (reply.res === 'OK') {
        return 'OK';
    }
    if (reply.res === 'WAIT' && !reply.error) {
        return 'WAIT';
    }
    return 'KO';
}

/**
 * Next state after `reply` answered poll number `progress.counter`.
 */
export function interpretReply(progress: Progress, reply: StatusReply, policy: PollPolicy): PollState {
    switch (verdictOf(reply)) {
        case 'WAIT':
            return { ...progress, kind: 'POLLING', last: reply };
        case 'OK':
            return {
                ...progress,
                kind: 'CONFIRMED',
                status: reply.status ?? '',
                protomResponse: reply.protomResponse ?? '',
                message: reply.msg ?? '',
            };
        case 'KO': {
            const error = reply.error ?? undefined;
            // xSDisarmPanel takes no forceArmingRemoteId
            if (error?.allowForcing && policy.force && !progress.forced && !isDisarm(progress.command.request)) {
                return {
                    ...progress,
                    kind: 'FORCING',
                    error,
                    forceReferenceId: error.referenceId ?? progress.command.referenceId,
                };
            }
            return { ...progress, kind: 'FAILED', reason: reply.msg ?? `Command ended with ${reply.res}`, error };
        }
    }
}

export interface PollOptions {
    signal?: AbortSignal;
    policy?: Partial<PollPolicy>;
}

/**
 * Drives commands to a terminal state by polling their status one request at a time.
 */
export class CommandPoller {
    private readonly log: Logging;
    private readonly dispatcher: CommandDispatcher;
    private readonly policy: PollPolicy;
    private readonly sleep: Sleep;
    private readonly now: () => number;

    constructor(log: Logging, dispatcher: CommandDispatcher, policy: Partial<PollPolicy> = {}, sleep: Sleep = defaultSleep, now: () => number = Date.now) {
        this.log = log;
        this.dispatcher = dispatcher;
        this.policy = { ...DEFAULT_POLL_POLICY, ...policy };
        this.sleep = sleep;
        this.now = now;
    }

    async run(session: Session, command: Command, options: PollOptions = {}): Promise<CommandOutcome> {
        const policy = { ...this.policy, ...options.policy };
        const startedAt = this.now();

        let state: PollState = { kind: 'ISSUED', command, counter: 0, attempts: 0, forced: false };
        try {
            for (;;) {
                if (isTerminal(state)) {
                    this.log.info(`[run] ${command.request} on ${command.installation.number} ended ${state.kind} after ${state.attempts} poll(s)`);
                    return state;
                }
                state = await this.step(session, state, policy, startedAt, options.signal);
            }
        } finally {
            this.dispatcher.release(command);
        }
    }

    /**
     * Asks the physical panel for its state and polls until it answers.
     */
    async verifyPanel(session: Session, installation: Installation, options: PollOptions = {}): Promise<PanelCheckOutcome> {
        const policy = { ...this.policy, ...options.policy };
        const maxAttempts = Math.max(1, Math.floor(POLLING_CONFIG.CHECK_ALARM_TIMEOUT / Math.max(1000, policy.intervalMs)));
        const referenceId = await this.dispatcher.checkAlarm(session, installation);

        for (let counter = 1; counter <= maxAttempts; counter++) {
            await this.wait(policy.intervalMs, referenceId, options.signal);

            let reply: StatusReply;
            try {
                reply = await this.dispatcher.checkAlarmStatus(session, installation, referenceId, counter, options.signal);
            } catch (err) {
                this.retryOrThrow(err, referenceId, counter, options.signal);
                continue;
            }

            switch (verdictOf(reply)) {
                case 'WAIT':
                    continue;
                case 'OK':
                    return {
                        kind: 'CONFIRMED',
                        attempts: counter,
                        status: {
                            protomResponse: reply.protomResponse ?? '',
                            message: reply.msg ?? '',
                            updatedAt: reply.protomResponseDate ?? '',
                        },
                    };
                case 'KO':
                    return { kind: 'FAILED', attempts: counter, reason: reply.msg ?? `Check ended with ${reply.res}` };
            }
        }

        return { kind: 'TIMEOUT', attempts: maxAttempts };
    }

    private async step(session: Session, state: PollState, policy: PollPolicy, startedAt: number, signal?: AbortSignal): Promise<PollState> {
        switch (state.kind) {
            case 'ISSUED':
            case 'POLLING': {
                const progress: Progress = { command: state.command, counter: state.counter, attempts: state.attempts, forced: state.forced };
                const remaining = this.remainingBudget(policy, startedAt);
                if (progress.attempts >= policy.maxAttempts || remaining <= 0) {
                    return { ...progress, kind: 'TIMEOUT' };
                }

                const { command } = progress;
                await this.wait(Math.min(policy.intervalMs, remaining), command.referenceId, signal);
                this.assertCurrent(command);
                if (this.remainingBudget(policy, startedAt) <= 0) {
                    return { ...progress, kind: 'TIMEOUT' };
                }

                const sent: Progress = { ...progress, counter: progress.counter + 1, attempts: progress.attempts + 1 };
                let reply: StatusReply;
                try {
                    reply = await this.dispatcher.checkCommandStatus(session, command, sent.counter, signal);
                } catch (err) {
                    this.retryOrThrow(err, command.referenceId, sent.counter, signal);
                    return { ...sent, kind: 'POLLING' };
                }

                const next = interpretReply(sent, reply, policy);
                if (next.kind === 'FAILED') {
                    this.log.warn(`[run] ${command.referenceId} failed: ${next.reason}`);
                }
                return next;
            }
            case 'FORCING': {
                if (signal?.aborted) {
                    throw new CommandAbortedError(state.command.referenceId, 'aborted by caller');
                }
                this.assertCurrent(state.command);

                try {
                    const command = await this.dispatcher.forceCommand(session, state.command, state.forceReferenceId, signal);
                    return { kind: 'ISSUED', command, counter: 0, attempts: state.attempts, forced: true };
                } catch (err) {
                    if (err instanceof DispatchError) {
                        return { ...state, kind: 'FAILED', forced: true, reason: err.message, error: state.error };
                    }
                    throw err;
                }
            }
            default:
                return state;
        }
    }

    private remainingBudget(policy: PollPolicy, startedAt: number): number {
        return policy.budgetMs === undefined ? Infinity : policy.budgetMs - (this.now() - startedAt);
    }

    private assertCurrent(command: Command) {
        if (!this.dispatcher.isCurrent(command)) {
            throw new CommandAbortedError(command.referenceId, 'superseded by a newer command');
        }
    }

    private async wait(ms: number, referenceId: string, signal?: AbortSignal) {
        if (signal?.aborted) {
            throw new CommandAbortedError(referenceId, 'aborted by caller');
        }

        try {
            await this.sleep(ms, signal);
        } catch (err) {
            if (signal?.aborted) {
                throw new CommandAbortedError(referenceId, 'aborted by caller');
            }
            throw err;
        }
    }

    /**
     * Transient failures count as a spent attempt, anything else ends the poll loop.
     */
    private retryOrThrow(err: unknown, referenceId: string, counter: number, signal?: AbortSignal) {
        if (signal?.aborted) {
            throw new CommandAbortedError(referenceId, 'aborted by caller');
        }

        if (err instanceof TransportError || err instanceof MalformedResponseError || err instanceof ApiError) {
            this.log.warn(`[poll] ${referenceId} #${counter} failed, retrying: ${err.message}`);
            return;
        }

        throw err;
    }
}
