import * as os from 'node:os';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('networkUtils');

const APIPA_ADDRESS_v4 = '169.254.';
const WILDCARD_ADDRESSES = new Set(['0.0.0.0', '::', '']);

export interface NetworkInterface {
  name: string;
  address: string;
}

/**
 * @hebrew מאתרת ממשקי IPv4 רלוונטיים: לא פנימיים ולא link-local (APIPA).
 * @param allNetworkInterfaces - כמו הערך של os.networkInterfaces().
 */
export function findRelevantNetworkInterfaces(
  allNetworkInterfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): NetworkInterface[] {
  const relevantInterfaces: NetworkInterface[] = [];

  for (const [interfaceName, interfaceDetails] of Object.entries(allNetworkInterfaces)) {
    if (!interfaceDetails) continue;

    for (const iface of interfaceDetails) {
      if (iface.internal || iface.address.startsWith(APIPA_ADDRESS_v4)) continue;
      if (iface.family !== 'IPv4') continue;

      relevantInterfaces.push({ name: interfaceName, address: iface.address });
      logger.trace(`Found relevant IPv4 interface: ${interfaceName} - ${iface.address}`);
    }
  }

  return relevantInterfaces;
}

/**
 * @hebrew קובעת את הכתובת שתפורסם להתקנים ככתובת ה-callback.
 * כתובת קשירה שאינה wildcard מנצחת; אחרת הממשק הרלוונטי הראשון; אחרת loopback.
 */
export function resolveAdvertiseAddress(
  bindAddress: string,
  advertiseAddress?: string,
  allNetworkInterfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>
): string {
  if (advertiseAddress) {
    return advertiseAddress;
  }
  if (!WILDCARD_ADDRESSES.has(bindAddress)) {
    return bindAddress;
  }
  const [first] = findRelevantNetworkInterfaces(allNetworkInterfaces);
  if (first) {
    return first.address;
  }
  logger.warn('No non-internal IPv4 interface found; advertising 127.0.0.1. Devices on the network will not reach the callback listener.');
  return '127.0.0.1';
}
