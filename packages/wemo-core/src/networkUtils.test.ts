import { describe, it, expect } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import { findRelevantNetworkInterfaces, resolveAdvertiseAddress } from './networkUtils';

const interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = {
  lo: [
    { address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' },
  ],
  eth0: [
    { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '02:00:00:00:00:01', internal: false, cidr: 'fe80::1/64', scopeid: 2 },
    { address: '192.168.1.10', netmask: '255.255.255.0', family: 'IPv4', mac: '02:00:00:00:00:01', internal: false, cidr: '192.168.1.10/24' },
  ],
  wlan0: [
    { address: '169.254.10.20', netmask: '255.255.0.0', family: 'IPv4', mac: '02:00:00:00:00:02', internal: false, cidr: '169.254.10.20/16' },
  ],
};

describe('findRelevantNetworkInterfaces', () => {
  it('מחזיר רק ממשקי IPv4 חיצוניים שאינם link-local', () => {
    expect(findRelevantNetworkInterfaces(interfaces)).toEqual([{ name: 'eth0', address: '192.168.1.10' }]);
  });
});

describe('resolveAdvertiseAddress', () => {
  it('כתובת פרסום מפורשת גוברת', () => {
    expect(resolveAdvertiseAddress('0.0.0.0', '10.0.0.5', interfaces)).toBe('10.0.0.5');
  });

  it('כתובת קשירה שאינה wildcard מפורסמת כפי שהיא', () => {
    expect(resolveAdvertiseAddress('192.168.1.77', '', interfaces)).toBe('192.168.1.77');
  });

  it('בקשירה ל-wildcard משתמש בממשק הרלוונטי הראשון', () => {
    expect(resolveAdvertiseAddress('0.0.0.0', undefined, interfaces)).toBe('192.168.1.10');
  });

  it('נופל ל-127.0.0.1 כשאין ממשק רלוונטי', () => {
    expect(resolveAdvertiseAddress('::', undefined, {})).toBe('127.0.0.1');
  });
});
