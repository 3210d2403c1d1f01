import type { API } from 'homebridge';

import { SecuritasAlarmAccessory } from './alarmAccessory';
import { PLATFORM_NAME } from './settings';

/**
 * This method registers the accessory with Homebridge
 */
export = (api: API) => {
  api.registerAccessory(PLATFORM_NAME, SecuritasAlarmAccessory);
};
