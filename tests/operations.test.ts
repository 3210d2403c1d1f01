import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { SecuritasError } from '../src/errors';
import { armPanel, checkAlarmStatus, createDefaultRegistry, defineOperation, login } from '../src/operations';

describe('operations', () => {
    it('registers every known operation by name', () => {
        expect(createDefaultRegistry().names()).toEqual([
            'mkLoginToken',
            'mkValidateDevice',
            'mkSendOTP',
            'RefreshLogin',
            'Logout',
            'mkInstallationList',
            'Srv',
            'CheckAlarm',
            'CheckAlarmStatus',
            'Status',
            'xSArmPanel',
            'ArmStatus',
            'xSDisarmPanel',
            'DisarmStatus',
            'Sentinel',
            'AirQualityGraph',
        ]);
    });

    it('accepts new operations and refuses duplicates', () => {
        const registry = createDefaultRegistry();
        const cameras = defineOperation({
            name: 'mkGetCameras',
            field: 'xSGetCameras',
            query: 'query mkGetCameras($numinst: String!) { xSGetCameras(numinst: $numinst) { res } }',
            variables: (input: { numinst: string }) => ({ ...input }),
            schema: z.object({ res: z.string() }),
        });

        registry.register(cameras);

        expect(registry.get('mkGetCameras')).toBe(cameras);
        expect(registry.get('mkUnknown')).toBeUndefined();
        expect(() => registry.register(login)).toThrow(SecuritasError);
        expect(() => registry.register(login)).toThrow('Operation mkLoginToken is already registered');
    });

    it('sends forceArmingRemoteId only when forcing', () => {
        const input = { request: 'ARM1', numinst: '12345', panel: 'SDVFAST', currentStatus: 'D' };

        expect(armPanel.variables(input)).toEqual(input);
        expect(armPanel.variables({ ...input, forceArmingRemoteId: 'OWP_EXC' })).toEqual({ ...input, forceArmingRemoteId: 'OWP_EXC' });
    });

    it('asks the panel check for service 11', () => {
        expect(checkAlarmStatus.variables({ numinst: '12345', panel: 'SDVFAST', referenceId: 'CHK_1', counter: 3 })).toEqual({
            numinst: '12345',
            panel: 'SDVFAST',
            referenceId: 'CHK_1',
            idService: '11',
            counter: 3,
        });
    });
});
