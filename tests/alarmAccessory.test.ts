import { HomebridgeAPI } from 'homebridge/lib/api';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SecuritasAlarmAccessory } from '../src/alarmAccessory';
import { HKArmState } from '../src/commands';
import { PLATFORM_NAME } from '../src/settings';
import {
    Clock,
    data,
    DEVICE,
    FakeBackend,
    INSTALLATION_RECORD,
    log,
    loginOk,
    serviceRecord,
    servicesReply,
    START,
    token,
} from './helpers';

const DAY = 24 * 3600 * 1000;

describe('SecuritasAlarmAccessory', () => {
    let clock: Clock;
    let backend: FakeBackend;
    let api: HomebridgeAPI;

    const accessory = () => new SecuritasAlarmAccessory(log, {
        accessory: PLATFORM_NAME,
        name: 'Alarm',
        username: 'user@example.com',
        password: 'test-password',
        checkAlarmPanel: false,
        scanInterval: 60,
        ...DEVICE,
    }, api, { send: backend.send, now: clock.now });

    const currentState = (subject: SecuritasAlarmAccessory) => subject.getServices()[1]
        .getCharacteristic(api.hap.Characteristic.SecuritySystemCurrentState).value;

    beforeEach(() => {
        clock = new Clock();
        api = new HomebridgeAPI();
        backend = new FakeBackend()
            .on('mkLoginToken', loginOk(token(START + DAY)))
            .on('mkInstallationList', data('xSInstallations', { installations: [INSTALLATION_RECORD] }))
            .on('Srv', servicesReply(token(START + DAY), [serviceRecord(1, 'EST')]))
            .on('Status', data('xSStatus', { status: 'T', timestampUpdate: '2024-01-15 09:00:00', exceptions: null }));
    });

    afterEach(() => {
        api.signalShutdown();
        vi.useRealTimers();
    });

    it('keeps refreshing after a failed launch', async () => {
        vi.useFakeTimers();
        backend.on('mkLoginToken', { statusCode: 503, body: 'unavailable' }, loginOk(token(START + DAY)));
        const subject = accessory();

        api.signalFinished();
        await vi.waitFor(() => expect(backend.calls('mkLoginToken')).toHaveLength(1));
        expect(backend.calls('Status')).toHaveLength(0);

        await vi.advanceTimersByTimeAsync(60 * 1000);
        await vi.waitFor(() => expect(backend.calls('Status')).toHaveLength(1));

        expect(backend.calls('mkLoginToken')).toHaveLength(2);
        expect(currentState(subject)).toBe(HKArmState.AWAY_ARM);
    });

    it('reports the state read from the backend', async () => {
        const callback = vi.fn();

        await accessory().getCurrentState(callback);

        expect(callback).toHaveBeenCalledWith(null, HKArmState.AWAY_ARM);
    });

    it('reports an error instead of a state it does not know', async () => {
        backend.on('Status', data('xSStatus', { status: 'X', timestampUpdate: null, exceptions: null }));
        const subject = accessory();
        const current = vi.fn();
        const target = vi.fn();

        await subject.getCurrentState(current);
        await subject.getTargetState(target);

        expect(current).toHaveBeenCalledWith(new Error('The panel state is unknown'));
        expect(target).toHaveBeenCalledWith(new Error('The panel state is unknown'));
        expect(current).toHaveBeenCalledTimes(1);
    });
});
