import { describe, it, expect } from 'vitest';
import { getLocalIp } from '../net/network.js';

describe('getLocalIp', () => {
  it('picks the first external IPv4 address', () => {
    const ip = getLocalIp({
      lo: [{ address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }],
      wlan0: [
        { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '02:00:00:00:00:01', internal: false, cidr: 'fe80::1/64', scopeid: 3 },
        { address: '192.168.1.50', netmask: '255.255.255.0', family: 'IPv4', mac: '02:00:00:00:00:01', internal: false, cidr: '192.168.1.50/24' }
      ]
    });
    expect(ip).toBe('192.168.1.50');
  });

  it('falls back to loopback', () => {
    expect(getLocalIp({})).toBe('127.0.0.1');
  });
});
