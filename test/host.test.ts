/**
 * Tests for container address detection
 */

import { describe, it, expect } from 'vitest';
import { detectContainerAddress } from '../src/core/host.js';

describe('detectContainerAddress', () => {
  it('should return the first external IPv4 address', () => {
    const address = detectContainerAddress({
      lo: [
        { address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' },
      ],
      eth0: [
        { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '02:42:0a:00:0b:05', internal: false, cidr: 'fe80::1/64', scopeid: 2 },
        { address: '10.0.11.5', netmask: '255.255.255.0', family: 'IPv4', mac: '02:42:0a:00:0b:05', internal: false, cidr: '10.0.11.5/24' },
      ],
    });

    expect(address).toBe('10.0.11.5');
  });

  it('should return undefined with only loopback interfaces', () => {
    expect(
      detectContainerAddress({
        lo: [
          { address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' },
        ],
      })
    ).toBeUndefined();
  });
});
