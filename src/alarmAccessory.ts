import type {
  AccessoryConfig,
  AccessoryPlugin,
  API,
  CharacteristicGetCallback,
  CharacteristicSetCallback,
  CharacteristicValue,
  Logging,
  Service,
} from "homebridge";

import { SecuritasClient, type ClientOptions } from "./client";
import { convertProtomResponseToHK, HKArmState, isHKArmState } from "./commands";
import { parseConfig, type AlarmConfig } from "./config";
import { CommandAbortedError } from "./errors";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class SecuritasAlarmAccessory implements AccessoryPlugin {
  private readonly log: Logging;
  private readonly api: API;
  private readonly name: string;
  private readonly config: AlarmConfig;

  private readonly securityService: Service;
  private readonly informationService: Service;

  private readonly client: SecuritasClient;
  private readonly shutdown = new AbortController();
  private timer?: NodeJS.Timeout;

  private targetState?: HKArmState;
  private currentState?: HKArmState;

  constructor(log: Logging, config: AccessoryConfig, api: API, options: ClientOptions = {}) {
    this.log = log;
    this.api = api;
    this.config = parseConfig(config);
    this.name = this.config.name;

    this.client = new SecuritasClient(log, this.config, options);

    this.securityService = new api.hap.Service.SecuritySystem(this.name);

    // set accessory information
    this.informationService = new api.hap.Service.AccessoryInformation()
      .setCharacteristic(api.hap.Characteristic.Manufacturer, "Securitas Direct")
      .setCharacteristic(api.hap.Characteristic.Model, "Alarm panel")
      .setCharacteristic(api.hap.Characteristic.SerialNumber, this.config.installation ?? "default")
      .setCharacteristic(api.hap.Characteristic.Name, this.name);

    this.securityService
      .getCharacteristic(api.hap.Characteristic.SecuritySystemCurrentState)
      .on("get", this.getCurrentState.bind(this));

    this.securityService
      .getCharacteristic(api.hap.Characteristic.SecuritySystemTargetState)
      .on("get", this.getTargetState.bind(this))
      .on("set", this.setTargetState.bind(this));

    api.on("didFinishLaunching", () => {
      // each tick logs in again when the launch failed
      this.timer = setInterval(() => {
        this.refresh().catch(err => this.log.error(`[refresh] ${toError(err).message}`));
      }, this.config.scanInterval * 1000);

      this.start().catch(err => this.log.error(`[start] ${toError(err).message}`));
    });

    api.on("shutdown", () => {
      clearInterval(this.timer);
      this.shutdown.abort();
    });

    this.log.debug(`Alarm accessory init complete`);
  }

  getServices(): Service[] {
    return [this.informationService, this.securityService];
  }

  private async start() {
    const result = await this.client.login();
    if (result.kind === "challenge") {
      this.log.error("[start] this device must be authorized with an OTP code. Run `npm run login` and copy the printed identity into the accessory config.");
      return;
    }

    const installation = await this.client.installation();
    this.log.info(`[start] using installation ${installation.number} (${installation.alias}, panel ${installation.panel})`);
    this.informationService.updateCharacteristic(this.api.hap.Characteristic.SerialNumber, installation.number);

    await this.refresh();
  }

  private async refresh(): Promise<HKArmState | undefined> {
    const status = await this.client.getStatus({ signal: this.shutdown.signal });
    const converted = convertProtomResponseToHK(status.protomResponse);
    this.log.debug(`AUTO-POLLING state and got ${status.protomResponse}`);

    if (converted !== undefined && converted !== this.currentState) {
      this.updateCurrentState(converted);
    }
    return converted;
  }

  private updateCurrentState(state: HKArmState) {
    this.currentState = state;
    this.securityService.updateCharacteristic(this.api.hap.Characteristic.SecuritySystemCurrentState, state);

    if (state !== HKArmState.ALARM_TRIGGERED) {
      this.targetState = state;
      this.securityService.updateCharacteristic(this.api.hap.Characteristic.SecuritySystemTargetState, state);
    }
  }

  async getCurrentState(callback: CharacteristicGetCallback) {
    try {
      if (this.currentState === undefined) {
        this.currentState = await this.refresh();
      }

      if (this.currentState === undefined) {
        throw new Error("The panel state is unknown");
      }

      this.log.info("Get current state ->", this.currentState);
      callback(null, this.currentState);
    } catch (err) {
      callback(toError(err));
    }
  }

  async getTargetState(callback: CharacteristicGetCallback) {
    try {
      if (this.targetState === undefined) {
        this.targetState = await this.refresh();
      }

      if (this.targetState === undefined) {
        throw new Error("The panel state is unknown");
      }

      this.log.info("Get Characteristic TargetState ->", this.targetState);
      callback(null, this.targetState);
    } catch (err) {
      callback(toError(err));
    }
  }

  /**
   * Handle "SET" requests from HomeKit. The callback returns once the panel confirmed the new state.
   */
  async setTargetState(value: CharacteristicValue, callback: CharacteristicSetCallback) {
    try {
      if (!isHKArmState(value)) {
        throw new Error(`Unsupported target state ${value}`);
      }

      this.log.info("Set Characteristic TargetState -> ", this.targetState, value);

      if (this.targetState === value && this.currentState === value) {
        callback(null);
        return;
      }

      this.targetState = value;
      const outcome = await this.client.armSystem(value, {
        code: this.config.code,
        signal: this.shutdown.signal,
        supersede: true,
      });
      this.log.info(`Set target state done [${outcome.kind}]`);

      if (outcome.kind !== "CONFIRMED") {
        throw new Error(outcome.kind === "FAILED" ? outcome.reason : "The panel did not confirm the command in time");
      }

      this.updateCurrentState(convertProtomResponseToHK(outcome.protomResponse) ?? value);
      callback(null);
    } catch (err) {
      if (err instanceof CommandAbortedError) {
        this.log.info(`[setTargetState] ${err.message}`);
      } else {
        this.log.error(`[setTargetState] ${toError(err).message}`);
      }
      callback(toError(err));
    }
  }
}
