import * as os from 'os';

type Interfaces = ReturnType<typeof os.networkInterfaces>;

/**
 * First non-internal IPv4 address of this machine, for the URL other devices open.
 * Falls back to loopback when the host has no LAN address.
 */
export function getLocalAddress(interfaces: Interfaces = os.networkInterfaces()): string {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) return address.address;
    }
  }
  return '127.0.0.1';
}
