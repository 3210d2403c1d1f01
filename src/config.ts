import { z } from 'zod';

import { ConfigError } from './errors';
import { POLLING_CONFIG } from './settings';

const seconds = z.coerce.number().positive();

export const configSchema = z.object({
    name: z.string().default('Alarm'),
    username: z.string().min(1),
    password: z.string().min(1),
    country: z.string().length(2).transform(country => country.toUpperCase()).default('ES'),
    // local PIN, never sent to the backend
    code: z.union([z.string(), z.number()]).transform(String).optional(),
    checkAlarmPanel: z.boolean().default(true),
    useOtp: z.boolean().default(true),
    periAlarm: z.boolean().default(false),
    forceArming: z.boolean().default(false),
    scanInterval: seconds.default(POLLING_CONFIG.SCAN_INTERVAL),
    pollInterval: seconds.default(POLLING_CONFIG.INTERVAL / 1000),
    maxPollAttempts: z.coerce.number().int().positive().default(POLLING_CONFIG.MAX_ATTEMPTS),
    pollBudget: seconds.optional(),
    installation: z.union([z.string(), z.number()]).transform(String).optional(),
    deviceId: z.string().min(1).optional(),
    uuid: z.string().min(1).optional(),
    idDeviceIndigitall: z.string().min(1).optional(),
});

export type AlarmConfig = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): AlarmConfig {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration (${details.join('; ')})`);
    }
    return parsed.data;
}
