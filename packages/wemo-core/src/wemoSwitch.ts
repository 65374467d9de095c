// פעולות מתג (Switch / Insight / Light Switch) מעל שירות basicevent
import { config } from './config';
import { ControlFault, MalformedResponse, TransportError, errorMessage } from './errors';
import { createModuleLogger } from './logger';
import { createControlCommand, sendControlCommand } from './upnpSoapClient';
import { BASIC_EVENT_SERVICE, WEMO_PORTS, WemoBinaryState } from './types';
import type { ControlOptions, WemoDevice, WemoEvent } from './types';
import { retry } from './utils';
import type { RetryOptions } from './utils';
import { fetchDeviceAtAddress } from './wemoDiscovery';

const logger = createModuleLogger('WemoSwitch');

/**
 * @hebrew מפענח ערך BinaryState. ב-Insight הערך נראה כמו "8|1700000000|..." ורק המקטע הראשון רלוונטי.
 * @returns undefined לערך לא מוכר.
 */
export function parseBinaryState(value: string): WemoBinaryState | undefined {
  const head = value.split('|')[0].trim();
  switch (head) {
    case '0': return WemoBinaryState.Off;
    case '1': return WemoBinaryState.On;
    case '8': return WemoBinaryState.OnWithoutLoad;
    default: return undefined;
  }
}

/** מצב המתג מתוך אירוע, אם האירוע נושא BinaryState. */
export function binaryStateFromEvent(event: WemoEvent): WemoBinaryState | undefined {
  const value = event.properties.BinaryState;
  return value === undefined ? undefined : parseBinaryState(value);
}

export function isOn(state: WemoBinaryState): boolean {
  return state !== WemoBinaryState.Off;
}

export type SwitchRetryOptions = Omit<RetryOptions, 'shouldRetry'>;

/**
 * @hebrew עטיפה נוחה לשליטה במתג WeMo. פעולות ה-WithRetry חוזרות רק על כשלי רשת, לא על Fault.
 */
export class WemoSwitch {
  readonly device: WemoDevice;
  private readonly controlOptions: ControlOptions;

  constructor(device: WemoDevice, controlOptions: ControlOptions = {}) {
    if (!device.serviceType.includes(':basicevent:')) {
      logger.warn(`${device.friendlyName || device.udn} exposes ${device.serviceType || 'an unknown service'}, not basicevent; switch actions may fault`);
    }
    this.device = device;
    this.controlOptions = controlOptions;
  }

  /**
   * @hebrew מאתר מתג לפי כתובת IP בלבד (סורק את פורטי WeMo).
   */
  static async fromAddress(host: string, ports: readonly number[] = WEMO_PORTS, controlOptions: ControlOptions = {}): Promise<WemoSwitch> {
    return new WemoSwitch(await fetchDeviceAtAddress(host, ports), controlOptions);
  }

  async getBinaryState(): Promise<WemoBinaryState> {
    const result = await sendControlCommand(this.device, createControlCommand('GetBinaryState', {}, BASIC_EVENT_SERVICE), this.controlOptions);
    const raw = result.BinaryState;
    const state = raw === undefined ? undefined : parseBinaryState(raw);
    if (state === undefined) {
      throw new MalformedResponse(`GetBinaryState returned an unrecognized value: ${String(raw)}`);
    }
    return state;
  }

  /**
   * @hebrew קובע מצב. התקן שכבר נמצא במצב המבוקש מחזיר לפעמים Fault "Error" (קוד -1),
   * ולכן Fault כזה מאומת מול המצב בפועל.
   */
  async setBinaryState(state: WemoBinaryState.On | WemoBinaryState.Off): Promise<void> {
    try {
      await sendControlCommand(this.device, createControlCommand('SetBinaryState', { BinaryState: state }, BASIC_EVENT_SERVICE), this.controlOptions);
    } catch (error: unknown) {
      if (!(error instanceof ControlFault)) throw error;
      let current: WemoBinaryState;
      try {
        current = await this.getBinaryState();
      } catch (checkError: unknown) {
        logger.debug(`Could not read state after fault from ${this.device.friendlyName}: ${errorMessage(checkError)}`);
        throw error;
      }
      if (isOn(current) !== (state === WemoBinaryState.On)) throw error;
      logger.debug(`${this.device.friendlyName} was already ${state === WemoBinaryState.On ? 'on' : 'off'}`);
    }
    logger.info(`${this.device.friendlyName || this.device.udn} turned ${state === WemoBinaryState.On ? 'on' : 'off'}`);
  }

  turnOn(): Promise<void> {
    return this.setBinaryState(WemoBinaryState.On);
  }

  turnOff(): Promise<void> {
    return this.setBinaryState(WemoBinaryState.Off);
  }

  /**
   * @returns המצב החדש.
   */
  async toggle(): Promise<WemoBinaryState.On | WemoBinaryState.Off> {
    const next = isOn(await this.getBinaryState()) ? WemoBinaryState.Off : WemoBinaryState.On;
    await this.setBinaryState(next);
    return next;
  }

  getBinaryStateWithRetry(options: SwitchRetryOptions = {}): Promise<WemoBinaryState> {
    return retry(() => this.getBinaryState(), this.retryOptions(options));
  }

  turnOnWithRetry(options: SwitchRetryOptions = {}): Promise<void> {
    return retry(() => this.turnOn(), this.retryOptions(options));
  }

  turnOffWithRetry(options: SwitchRetryOptions = {}): Promise<void> {
    return retry(() => this.turnOff(), this.retryOptions(options));
  }

  private retryOptions(options: SwitchRetryOptions): RetryOptions {
    return {
      retries: config.control.retries,
      delayMs: config.control.retryDelayMs,
      logger,
      ...options,
      shouldRetry: isTransportFailure,
    };
  }
}

function isTransportFailure(error: Error): boolean {
  return error instanceof TransportError;
}
