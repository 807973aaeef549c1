/**
 * Container address detection
 */

import { networkInterfaces } from 'node:os';

type InterfaceMap = ReturnType<typeof networkInterfaces>;

/**
 * First non-internal IPv4 address of the container, like `hostname -i`
 */
export function detectContainerAddress(interfaces: InterfaceMap = networkInterfaces()): string | undefined {
  for (const name of Object.keys(interfaces).sort()) {
    for (const entry of interfaces[name] ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        return entry.address;
      }
    }
  }
  return undefined;
}
