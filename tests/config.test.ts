import { describe, expect, it } from 'vitest';

import { parseConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('parseConfig', () => {
    it('applies defaults', () => {
        expect(parseConfig({ accessory: 'SecuritasAlarm', username: 'user@example.com', password: 'test-password' })).toEqual({
            name: 'Alarm',
            username: 'user@example.com',
            password: 'test-password',
            country: 'ES',
            checkAlarmPanel: true,
            useOtp: true,
            periAlarm: false,
            forceArming: false,
            scanInterval: 120,
            pollInterval: 2,
            maxPollAttempts: 30,
        });
    });

    it('normalizes country and codes', () => {
        const config = parseConfig({ username: 'u', password: 'p', country: 'it', code: 1234, installation: 7654321, pollBudget: '90' });

        expect(config.country).toBe('IT');
        expect(config.code).toBe('1234');
        expect(config.installation).toBe('7654321');
        expect(config.pollBudget).toBe(90);
    });

    it('rejects a missing password', () => {
        expect(() => parseConfig({ username: 'user@example.com' })).toThrow(ConfigError);
        expect(() => parseConfig({ username: 'user@example.com' })).toThrow('Invalid configuration (password: Required)');
    });

    it('rejects a non positive interval', () => {
        expect(() => parseConfig({ username: 'u', password: 'p', scanInterval: 0 })).toThrow(/scanInterval/);
    });
});
