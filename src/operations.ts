import { z } from 'zod';

import { SecuritasError } from './errors';
import { DEVICE_PROFILE } from './settings';

export type Variables = Record<string, string | number | boolean | null>;

/**
 * A named GraphQL operation: what to send and what comes back under `data[field]`.
 */
export interface OperationTemplate<I, R> {
    readonly name: string;
    readonly field: string;
    readonly query: string;
    readonly variables: (input: I) => Variables;
    readonly schema: z.ZodType<R, z.ZodTypeDef, unknown>;
}

export type AnyOperation = OperationTemplate<never, unknown>;

export interface DeviceIdentity {
    deviceId: string;
    uuid: string;
    idDeviceIndigitall: string;
}

type NoInput = Record<string, never>;

export function defineOperation<I, R>(template: OperationTemplate<I, R>): OperationTemplate<I, R> {
    return template;
}

const text = z.union([z.string(), z.number()]).transform(String);

export const authReplySchema = z.object({
    res: z.string(),
    msg: z.string().nullish(),
    hash: z.string().nullish(),
    refreshToken: z.string().nullish(),
    legals: z.boolean().nullish(),
    changePassword: z.boolean().nullish(),
    needDeviceAuthorization: z.boolean().nullish(),
    mainUser: z.boolean().nullish(),
});

export type AuthReply = z.infer<typeof authReplySchema>;

const resultSchema = z.object({
    res: z.string(),
    msg: z.string().nullish(),
});

export const referenceReplySchema = resultSchema.extend({
    referenceId: z.string().nullish(),
});

export type ReferenceReply = z.infer<typeof referenceReplySchema>;

export const commandErrorSchema = z.object({
    code: text.nullish(),
    type: z.string().nullish(),
    allowForcing: z.boolean().nullish(),
    exceptionsNumber: z.number().nullish(),
    referenceId: z.string().nullish(),
});

export type CommandErrorInfo = z.infer<typeof commandErrorSchema>;

export const statusReplySchema = resultSchema.extend({
    status: text.nullish(),
    numinst: text.nullish(),
    protomResponse: z.string().nullish(),
    protomResponseDate: z.string().nullish(),
    requestId: z.string().nullish(),
    error: commandErrorSchema.nullish(),
});

export type StatusReply = z.infer<typeof statusReplySchema>;

export const installationRecordSchema = z.object({
    numinst: text,
    alias: z.string(),
    panel: z.string().min(1),
    type: z.string(),
    name: z.string().nullish(),
    surname: z.string().nullish(),
    address: z.string().nullish(),
    city: z.string().nullish(),
    postcode: text.nullish(),
    province: z.string().nullish(),
    email: z.string().nullish(),
    phone: z.string().nullish(),
});

export type InstallationRecord = z.infer<typeof installationRecordSchema>;

export const serviceRecordSchema = z.object({
    id: z.coerce.number(),
    idService: z.coerce.number(),
    active: z.boolean(),
    visible: z.boolean(),
    isPremium: z.boolean().nullish(),
    request: z.string(),
    description: z.string().nullish(),
    attributes: z.object({
        name: z.string().nullish(),
        attributes: z.array(z.object({
            name: z.string(),
            value: text,
            active: z.boolean().nullish(),
        })).nullish(),
    }).nullish(),
});

export type ServiceRecord = z.infer<typeof serviceRecordSchema>;

export const servicesReplySchema = resultSchema.extend({
    language: z.string().nullish(),
    installation: z.object({
        numinst: text.nullish(),
        panel: z.string().nullish(),
        capabilities: z.string().min(1),
        services: z.array(serviceRecordSchema),
    }),
});

export const generalStatusSchema = z.object({
    status: z.string().nullish(),
    timestampUpdate: z.string().nullish(),
    exceptions: z.array(z.object({
        status: z.string().nullish(),
        deviceType: z.string().nullish(),
        alias: z.string().nullish(),
    })).nullish(),
});

export type GeneralStatus = z.infer<typeof generalStatusSchema>;

export const sentinelReplySchema = z.array(z.object({
    res: z.string().nullish(),
    msg: z.string().nullish(),
    ddi: z.object({
        zone: text.nullish(),
        alias: z.string(),
        status: z.object({
            airQuality: text.nullish(),
            airQualityMsg: z.string().nullish(),
            humidity: z.coerce.number(),
            temperature: z.coerce.number(),
        }),
    }),
})).min(1);

export const airQualityReplySchema = resultSchema.extend({
    graphData: z.object({
        status: z.object({
            current: z.coerce.number(),
            currentMsg: z.string().nullish(),
        }),
    }),
});

const deviceVariables = (device: DeviceIdentity): Variables => ({
    idDevice: device.deviceId,
    idDeviceIndigitall: device.idDeviceIndigitall,
    deviceType: DEVICE_PROFILE.type,
    deviceVersion: DEVICE_PROFILE.version,
    deviceResolution: DEVICE_PROFILE.resolution,
    deviceName: DEVICE_PROFILE.name,
    deviceBrand: DEVICE_PROFILE.brand,
    deviceOsVersion: DEVICE_PROFILE.osVersion,
    uuid: device.uuid,
});

export interface LoginInput {
    user: string;
    password: string;
    id: string;
    country: string;
    lang: string;
    device: DeviceIdentity;
}

export const login = defineOperation({
    name: 'mkLoginToken',
    field: 'xSLoginToken',
    query: `mutation mkLoginToken($user: String!, $password: String!, $id: String!, $country: String!, $lang: String!, $callby: String!, $idDevice: String!, $idDeviceIndigitall: String!, $deviceType: String!, $deviceVersion: String!, $deviceResolution: String!, $deviceName: String!, $deviceBrand: String!, $deviceOsVersion: String!, $uuid: String!) {
  xSLoginToken(user: $user, password: $password, country: $country, lang: $lang, callby: $callby, id: $id, idDevice: $idDevice, idDeviceIndigitall: $idDeviceIndigitall, deviceType: $deviceType, deviceVersion: $deviceVersion, deviceResolution: $deviceResolution, deviceName: $deviceName, deviceBrand: $deviceBrand, deviceOsVersion: $deviceOsVersion, uuid: $uuid) {
    __typename
    res
    msg
    hash
    refreshToken
    legals
    changePassword
    needDeviceAuthorization
    mainUser
  }
}
`,
    variables: (input: LoginInput) => ({
        user: input.user,
        password: input.password,
        id: input.id,
        country: input.country,
        callby: DEVICE_PROFILE.callby,
        lang: input.lang,
        ...deviceVariables(input.device),
    }),
    schema: authReplySchema,
});

export const validateDevice = defineOperation({
    name: 'mkValidateDevice',
    field: 'xSValidateDevice',
    query: `mutation mkValidateDevice($idDevice: String, $idDeviceIndigitall: String, $uuid: String, $deviceName: String, $deviceBrand: String, $deviceOsVersion: String, $deviceVersion: String) {
  xSValidateDevice(idDevice: $idDevice, idDeviceIndigitall: $idDeviceIndigitall, uuid: $uuid, deviceName: $deviceName, deviceBrand: $deviceBrand, deviceOsVersion: $deviceOsVersion, deviceVersion: $deviceVersion) {
    res
    msg
    hash
    refreshToken
    legals
  }
}
`,
    variables: (input: { device: DeviceIdentity }) => ({
        idDevice: input.device.deviceId,
        idDeviceIndigitall: input.device.idDeviceIndigitall,
        uuid: input.device.uuid,
        deviceName: DEVICE_PROFILE.name,
        deviceBrand: DEVICE_PROFILE.brand,
        deviceOsVersion: DEVICE_PROFILE.osVersion,
        deviceVersion: DEVICE_PROFILE.version,
    }),
    schema: authReplySchema,
});

export const sendOtp = defineOperation({
    name: 'mkSendOTP',
    field: 'xSSendOtp',
    query: `mutation mkSendOTP($recordId: Int!, $otpHash: String!) {
  xSSendOtp(recordId: $recordId, otpHash: $otpHash) {
    res
    msg
  }
}
`,
    variables: (input: { recordId: number; otpHash: string }) => ({ ...input }),
    schema: resultSchema,
});

export interface RefreshInput {
    refreshToken: string;
    id: string;
    country: string;
    lang: string;
    device: DeviceIdentity;
}

export const refreshLogin = defineOperation({
    name: 'RefreshLogin',
    field: 'xSRefreshLogin',
    query: `mutation RefreshLogin($refreshToken: String!, $id: String!, $country: String!, $lang: String!, $callby: String!, $idDevice: String!, $idDeviceIndigitall: String!, $deviceType: String!, $deviceVersion: String!, $deviceResolution: String!, $deviceName: String!, $deviceBrand: String!, $deviceOsVersion: String!, $uuid: String!) {
  xSRefreshLogin(refreshToken: $refreshToken, id: $id, country: $country, lang: $lang, callby: $callby, idDevice: $idDevice, idDeviceIndigitall: $idDeviceIndigitall, deviceType: $deviceType, deviceVersion: $deviceVersion, deviceResolution: $deviceResolution, deviceName: $deviceName, deviceBrand: $deviceBrand, deviceOsVersion: $deviceOsVersion, uuid: $uuid) {
    __typename
    res
    msg
    hash
    refreshToken
    legals
    changePassword
    needDeviceAuthorization
    mainUser
  }
}
`,
    variables: (input: RefreshInput) => ({
        refreshToken: input.refreshToken,
        id: input.id,
        country: input.country,
        lang: input.lang,
        callby: DEVICE_PROFILE.callby,
        ...deviceVariables(input.device),
    }),
    schema: authReplySchema,
});

export const logout = defineOperation({
    name: 'Logout',
    field: 'xSLogout',
    query: `mutation Logout {
  xSLogout
}
`,
    variables: (_input: NoInput) => ({}),
    schema: z.unknown(),
});

export const installationList = defineOperation({
    name: 'mkInstallationList',
    field: 'xSInstallations',
    query: `query mkInstallationList {
  xSInstallations {
    installations {
      numinst
      alias
      panel
      type
      name
      surname
      address
      city
      postcode
      province
      email
      phone
    }
  }
}
`,
    variables: (_input: NoInput) => ({}),
    schema: z.object({ installations: z.array(z.unknown()) }),
});

export const services = defineOperation({
    name: 'Srv',
    field: 'xSSrv',
    query: `query Srv($numinst: String!, $uuid: String) {
  xSSrv(numinst: $numinst, uuid: $uuid) {
    res
    msg
    language
    installation {
      id
      numinst
      alias
      status
      panel
      services {
        id
        idService
        active
        visible
        isPremium
        request
        description
        attributes {
          name
          attributes {
            name
            value
            active
          }
        }
      }
      capabilities
    }
  }
}
`,
    variables: (input: { numinst: string; uuid: string }) => ({ ...input }),
    // validated per installation by the capability resolver
    schema: z.unknown(),
});

export const checkAlarm = defineOperation({
    name: 'CheckAlarm',
    field: 'xSCheckAlarm',
    query: `query CheckAlarm($numinst: String!, $panel: String!) {
  xSCheckAlarm(numinst: $numinst, panel: $panel) {
    res
    msg
    referenceId
  }
}
`,
    variables: (input: { numinst: string; panel: string }) => ({ ...input }),
    schema: referenceReplySchema,
});

export interface PollInput {
    numinst: string;
    panel: string;
    referenceId: string;
    counter: number;
}

export const checkAlarmStatus = defineOperation({
    name: 'CheckAlarmStatus',
    field: 'xSCheckAlarmStatus',
    query: `query CheckAlarmStatus($numinst: String!, $idService: String!, $panel: String!, $referenceId: String!) {
  xSCheckAlarmStatus(numinst: $numinst, idService: $idService, panel: $panel, referenceId: $referenceId) {
    res
    msg
    status
    numinst
    protomResponse
    protomResponseDate
  }
}
`,
    variables: (input: PollInput) => ({
        numinst: input.numinst,
        panel: input.panel,
        referenceId: input.referenceId,
        idService: '11',
        counter: input.counter,
    }),
    schema: statusReplySchema,
});

export const generalStatus = defineOperation({
    name: 'Status',
    field: 'xSStatus',
    query: `query Status($numinst: String!) {
  xSStatus(numinst: $numinst) {
    status
    timestampUpdate
    exceptions {
      status
      deviceType
      alias
    }
  }
}
`,
    variables: (input: { numinst: string }) => ({ ...input }),
    schema: generalStatusSchema,
});

export interface PanelInput {
    request: string;
    numinst: string;
    panel: string;
    currentStatus: string;
    forceArmingRemoteId?: string;
}

export type CommandPollInput = PanelInput & PollInput;

const panelVariables = (input: PanelInput): Variables => {
    const variables: Variables = {
        request: input.request,
        numinst: input.numinst,
        panel: input.panel,
        currentStatus: input.currentStatus,
    };
    if (input.forceArmingRemoteId !== undefined) {
        variables.forceArmingRemoteId = input.forceArmingRemoteId;
    }
    return variables;
};

export const armPanel = defineOperation({
    name: 'xSArmPanel',
    field: 'xSArmPanel',
    query: `mutation xSArmPanel($numinst: String!, $request: ArmCodeRequest!, $panel: String!, $currentStatus: String, $forceArmingRemoteId: String) {
  xSArmPanel(numinst: $numinst, request: $request, panel: $panel, currentStatus: $currentStatus, forceArmingRemoteId: $forceArmingRemoteId) {
    res
    msg
    referenceId
  }
}
`,
    variables: panelVariables,
    schema: referenceReplySchema,
});

export const armStatus = defineOperation({
    name: 'ArmStatus',
    field: 'xSArmStatus',
    query: `query ArmStatus($numinst: String!, $request: ArmCodeRequest, $panel: String!, $referenceId: String!, $counter: Int!, $forceArmingRemoteId: String) {
  xSArmStatus(numinst: $numinst, panel: $panel, referenceId: $referenceId, counter: $counter, request: $request, forceArmingRemoteId: $forceArmingRemoteId) {
    res
    msg
    status
    protomResponse
    protomResponseDate
    numinst
    requestId
    error {
      code
      type
      allowForcing
      exceptionsNumber
      referenceId
    }
  }
}
`,
    variables: (input: CommandPollInput) => ({
        ...panelVariables(input),
        referenceId: input.referenceId,
        counter: input.counter,
    }),
    schema: statusReplySchema,
});

export const disarmPanel = defineOperation({
    name: 'xSDisarmPanel',
    field: 'xSDisarmPanel',
    query: `mutation xSDisarmPanel($numinst: String!, $request: DisarmCodeRequest!, $panel: String!) {
  xSDisarmPanel(numinst: $numinst, request: $request, panel: $panel) {
    res
    msg
    referenceId
  }
}
`,
    variables: panelVariables,
    schema: referenceReplySchema,
});

export const disarmStatus = defineOperation({
    name: 'DisarmStatus',
    field: 'xSDisarmStatus',
    query: `query DisarmStatus($numinst: String!, $panel: String!, $referenceId: String!, $counter: Int!, $request: DisarmCodeRequest) {
  xSDisarmStatus(numinst: $numinst, panel: $panel, referenceId: $referenceId, counter: $counter, request: $request) {
    res
    msg
    status
    protomResponse
    protomResponseDate
    numinst
    requestId
    error {
      code
      type
      allowForcing
      exceptionsNumber
      referenceId
    }
  }
}
`,
    variables: (input: CommandPollInput) => ({
        ...panelVariables(input),
        referenceId: input.referenceId,
        counter: input.counter,
    }),
    schema: statusReplySchema,
});

export const sentinel = defineOperation({
    name: 'Sentinel',
    field: 'xSAllConfort',
    query: `query Sentinel($numinst: String!, $zone: String!) {
  xSAllConfort(numinst: $numinst, zone: $zone) {
    res
    msg
    ddi {
      zone
      alias
      status {
        airQuality
        airQualityMsg
        humidity
        temperature
      }
    }
  }
}
`,
    variables: (input: { numinst: string; zone: string }) => ({ ...input }),
    schema: sentinelReplySchema,
});

export const airQuality = defineOperation({
    name: 'AirQualityGraph',
    field: 'xSAirQ',
    query: `query AirQualityGraph($numinst: String!, $zone: String!) {
  xSAirQ(numinst: $numinst, zone: $zone) {
    res
    msg
    graphData {
      status {
        current
        currentMsg
      }
    }
  }
}
`,
    variables: (input: { numinst: string; zone: string }) => ({ ...input }),
    schema: airQualityReplySchema,
});

/**
 * Operations looked up by name. The vendor adds operations over time, so new ones are registered rather than
 * wired into call sites.
 */
export class OperationRegistry {
    private readonly templates = new Map<string, AnyOperation>();

    register<I, R>(template: OperationTemplate<I, R>): this {
        if (this.templates.has(template.name)) {
            throw new SecuritasError(`Operation ${template.name} is already registered`);
        }
        this.templates.set(template.name, template);
        return this;
    }

    get(name: string): AnyOperation | undefined {
        return this.templates.get(name);
    }

    names(): string[] {
        return [...this.templates.keys()];
    }
}

export function createDefaultRegistry(): OperationRegistry {
    return new OperationRegistry()
        .register(login)
        .register(validateDevice)
        .register(sendOtp)
        .register(refreshLogin)
        .register(logout)
        .register(installationList)
        .register(services)
        .register(checkAlarm)
        .register(checkAlarmStatus)
        .register(generalStatus)
        .register(armPanel)
        .register(armStatus)
        .register(disarmPanel)
        .register(disarmStatus)
        .register(sentinel)
        .register(airQuality);
}
