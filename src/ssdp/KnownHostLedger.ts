/**
 * Remembers which (address, service type) pairs have been seen. Entries are
 * never evicted.
 */
export class KnownHostLedger {
  private readonly seen = new Set<string>();

  static key(remoteIp: string, serviceType: string): string {
    return `${remoteIp}_${serviceType}`;
  }

  /**
   * Returns true only the first time a pair is marked. Check and mark happen
   * in one synchronous step, so no other event can run in between.
   */
  markSeen(remoteIp: string, serviceType: string): boolean {
    const key = KnownHostLedger.key(remoteIp, serviceType);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    return true;
  }

  has(remoteIp: string, serviceType: string): boolean {
    return this.seen.has(KnownHostLedger.key(remoteIp, serviceType));
  }

  get size(): number {
    return this.seen.size;
  }
}
