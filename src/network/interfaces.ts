import os from 'os';

export type InterfaceTable = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export class InterfaceResolutionError extends Error {
  constructor(message: string, public interfaceName?: string) {
    super(message);
    this.name = 'InterfaceResolutionError';
  }
}

function isIPv4(info: os.NetworkInterfaceInfo): boolean {
  return info.family === 'IPv4';
}

function pickIPv4(name: string, addresses: os.NetworkInterfaceInfo[]): string {
  const ipv4 = addresses.filter(isIPv4);
  const preferred = ipv4.find((info) => !info.internal) ?? ipv4[0];
  if (!preferred) {
    throw new InterfaceResolutionError(
      `no IPv4 address found for interface ${name}`,
      name,
    );
  }
  return preferred.address;
}

/**
 * Resolve the IPv4 address of a named interface. On Windows, where adapter
 * names are long and user-facing, a case-insensitive partial match is
 * accepted when no exact name exists.
 */
export function getIPv4ForInterface(
  name: string,
  table: InterfaceTable = os.networkInterfaces(),
  platform: NodeJS.Platform = process.platform,
): string {
  const exact = table[name];
  if (exact) {
    return pickIPv4(name, exact);
  }

  if (platform === 'win32') {
    const wanted = name.toLowerCase();
    for (const [candidate, addresses] of Object.entries(table)) {
      const lower = candidate.toLowerCase();
      if (!addresses || !(lower.includes(wanted) || wanted.includes(lower))) {
        continue;
      }
      if (addresses.some(isIPv4)) {
        return pickIPv4(candidate, addresses);
      }
    }
    throw new InterfaceResolutionError(
      `interface not found: ${name} (tried exact match and partial matching)`,
      name,
    );
  }

  throw new InterfaceResolutionError(`interface not found: ${name}`, name);
}

/**
 * Find the interface that owns an address. For 127.0.0.1 the platform's
 * loopback names are tried before the address scan.
 */
export function findInterfaceByAddress(
  address: string,
  table: InterfaceTable = os.networkInterfaces(),
  loopbackNames: readonly string[] = [],
): string {
  if (address === '127.0.0.1') {
    const loopback = loopbackNames.find((name) => table[name] !== undefined);
    if (loopback) {
      return loopback;
    }
  }

  for (const [name, addresses] of Object.entries(table)) {
    if (addresses?.some((info) => info.address === address)) {
      return name;
    }
  }

  throw new InterfaceResolutionError(`interface not found for IP ${address}`);
}
