/**
 * Platform-dependent socket behavior, resolved once at startup so the packet
 * path never branches on the operating system.
 */
export interface SocketStrategy {
  platform: NodeJS.Platform;
  /** Share port 1900 with other SSDP listeners on the host */
  reuseAddr: boolean;
  /** Names tried first when the configured address is 127.0.0.1 */
  loopbackNames: readonly string[];
}

const LOOPBACK_NAMES: Partial<Record<NodeJS.Platform, readonly string[]>> = {
  linux: ['lo'],
  darwin: ['lo0'],
  freebsd: ['lo0'],
  openbsd: ['lo0'],
  win32: ['Loopback Pseudo-Interface 1'],
};

const ALL_LOOPBACK_NAMES = ['lo', 'lo0', 'Loopback Pseudo-Interface 1'] as const;

export function resolveSocketStrategy(
  platform: NodeJS.Platform = process.platform,
): SocketStrategy {
  return Object.freeze({
    platform,
    // Windows treats SO_REUSEADDR as permission to steal the port
    reuseAddr: platform !== 'win32',
    loopbackNames: LOOPBACK_NAMES[platform] ?? ALL_LOOPBACK_NAMES,
  });
}
