/**
 * This is the name of the accessory that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'SecuritasAlarm';

/**
 * This must match the name of your plugin as defined the package.json
 */
export const PLUGIN_NAME = 'homebridge-securitas-alarm';

/**
 * Identity the mobile app reports to the backend.
 */
export const DEVICE_PROFILE = {
    brand: 'samsung',
    name: 'SM-S901U',
    osVersion: '12',
    version: '10.102.0',
    type: '',
    resolution: '',
    callby: 'OWA_10',
};

export const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/102.0.5005.124 Safari/537.36 Edg/102.0.1245.41';

/**
 * Polling Configuration
 */
export const POLLING_CONFIG = {
    INTERVAL: 2000, // 2 seconds between status checks
    MAX_ATTEMPTS: 30,
    CHECK_ALARM_TIMEOUT: 10000, // panel verification gives up after 10 seconds
    SCAN_INTERVAL: 120, // seconds between background refreshes
};

/**
 * Token Configuration
 */
export const TOKEN_CONFIG = {
    // tokens are renewed this long before their exp claim
    EXPIRY_MARGIN: 60 * 1000,
    // used when a token carries no exp claim
    FALLBACK_TTL: 5 * 60 * 1000,
    OTP_CHALLENGE_TTL: 5 * 60 * 1000,
};

export const HTTP_TIMEOUT = 30000;
