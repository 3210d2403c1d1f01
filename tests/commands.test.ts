import { describe, expect, it } from 'vitest';

import {
    convertHKArmStateToRequest,
    convertProtomResponseToHK,
    HKArmState,
    InFlightCommands,
    isHKArmState,
    isRequestCode,
    RequestCode,
} from '../src/commands';
import { CommandInProgressError } from '../src/errors';
import { log } from './helpers';

describe('commands', () => {
    it.each([
        ['D', HKArmState.DISARM],
        ['T', HKArmState.AWAY_ARM],
        ['A', HKArmState.AWAY_ARM],
        ['Q', HKArmState.NIGHT_ARM],
        ['C', HKArmState.NIGHT_ARM],
        ['P', HKArmState.STAY_ARM],
        ['B', HKArmState.STAY_ARM],
        ['E', HKArmState.STAY_ARM],
    ])('maps protom response %s to %i', (code, state) => {
        expect(convertProtomResponseToHK(code)).toBe(state);
    });

    it('ignores unknown protom responses', () => {
        expect(convertProtomResponseToHK('')).toBeUndefined();
        expect(convertProtomResponseToHK('X')).toBeUndefined();
    });

    it('picks perimetral requests for perimetral installations', () => {
        expect(convertHKArmStateToRequest(HKArmState.AWAY_ARM, false)).toBe(RequestCode.ARM);
        expect(convertHKArmStateToRequest(HKArmState.AWAY_ARM, true)).toBe(RequestCode.ARM_TOTAL_PERI);
        expect(convertHKArmStateToRequest(HKArmState.DISARM, false)).toBe(RequestCode.DISARM);
        expect(convertHKArmStateToRequest(HKArmState.DISARM, true)).toBe(RequestCode.DISARM_TOTAL_PERI);
        expect(convertHKArmStateToRequest(HKArmState.STAY_ARM, true)).toBe(RequestCode.ARM_DAY);
        expect(convertHKArmStateToRequest(HKArmState.NIGHT_ARM, true)).toBe(RequestCode.ARM_NIGHT);
        expect(convertHKArmStateToRequest(HKArmState.ALARM_TRIGGERED, false)).toBeUndefined();
    });

    it('validates raw values', () => {
        expect(isRequestCode('ARMNIGHT1')).toBe(true);
        expect(isRequestCode('ARM2')).toBe(false);
        expect(isHKArmState(3)).toBe(true);
        expect(isHKArmState(9)).toBe(false);
        expect(isHKArmState('3')).toBe(false);
    });

    describe('InFlightCommands', () => {
        it('guards one command per installation', () => {
            const inFlight = new InFlightCommands(log);

            inFlight.reserve('12345', 'first');
            inFlight.reserve('67890', 'other');

            expect(() => inFlight.reserve('12345', 'second')).toThrow(CommandInProgressError);
            expect(inFlight.isCurrent('12345', 'first')).toBe(true);
        });

        it('ignores a release by a superseded command', () => {
            const inFlight = new InFlightCommands(log);

            inFlight.reserve('12345', 'first');
            inFlight.reserve('12345', 'second', true);
            inFlight.release('12345', 'first');

            expect(inFlight.isCurrent('12345', 'second')).toBe(true);
            inFlight.release('12345', 'second');
            expect(inFlight.isBusy('12345')).toBe(false);
        });
    });
});
