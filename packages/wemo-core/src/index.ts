// --- גילוי ---
export { discover, fetchDeviceAtAddress } from './wemoDiscovery';
export { parseDeviceDescription } from './deviceDescriptionParser';
export { buildMSearchMessage } from './ssdpSocketManager';

// --- בקרה ---
export {
  buildSoapEnvelope,
  createControlCommand,
  parseSoapResponse,
  sendControlCommand,
  UNKNOWN_FAULT_CODE,
} from './upnpSoapClient';
export { WemoSwitch, binaryStateFromEvent, isOn, parseBinaryState } from './wemoSwitch';
export type { SwitchRetryOptions } from './wemoSwitch';

// --- אירועים ---
export { WemoEventingSubsystem } from './eventingSubsystem';
export type { EventSubscribeOptions, WemoEventingSubsystemOptions } from './eventingSubsystem';
export { SubscriptionRegistry } from './subscriptionRegistry';
export type { RemovalReason, RenewOptions, SubscriptionRegistryOptions } from './subscriptionRegistry';
export { RenewalScheduler } from './renewalScheduler';
export type { RenewalOutcome, RenewalState } from './renewalScheduler';
export { CallbackListener } from './callbackListener';
export type { HandlerLookup } from './callbackListener';
export { HttpEventingClient, parseTimeoutHeader } from './eventingClient';
export { parseEventBody } from './eventParser';

// --- משותף ---
export * from './errors';
export * from './types';
export { config, loadConfig } from './config';
export type { WemoConfig } from './config';
export { createModuleLogger } from './logger';
export { retry, delay } from './utils';
