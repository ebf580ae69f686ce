import { describe, it, expect, beforeEach } from '@jest/globals';
import { EventLog } from '../src/utils/logger/EventLog.js';
import { formatUtcTimestamp } from '../src/utils/logger/LogSink.js';
import { MemoryLogSink } from './helpers/memoryLogSink.js';

describe('EventLog', () => {
  let sink: MemoryLogSink;
  let log: EventLog;

  beforeEach(() => {
    sink = new MemoryLogSink();
    log = new EventLog(sink);
  });

  it('prefixes messages with the tag of their kind', () => {
    log.event('INFO', 'started');
    log.event('NOTE', 'noted');
    log.event('WARN', 'careful');
    log.event('MSEARCH', 'New Host 10.0.0.9, Service Type: ssdp:all');
    log.event('ASSET', 'Serving asset: /assets/a.css');

    expect(sink.lines).toEqual([
      '[*] started',
      '[+] noted',
      '[!] careful',
      '[M-SEARCH]     New Host 10.0.0.9, Service Type: ssdp:all',
      '[ASSET] Serving asset: /assets/a.css',
    ]);
  });

  it('logs request summaries over two aligned lines', () => {
    log.request('PHISH_HOOKED', {
      ip: '10.0.0.9',
      userAgent: 'Mozilla/5.0',
      method: 'GET',
      path: '/present.html',
    });

    expect(sink.lines).toEqual([
      '[PHISH HOOKED] Host: 10.0.0.9, User-Agent: Mozilla/5.0',
      '               GET /present.html',
    ]);
  });

  it('writes raw lines untouched', () => {
    log.raw('########');

    expect(sink.lines).toEqual(['########']);
  });
});

describe('formatUtcTimestamp', () => {
  it('formats in UTC to the second', () => {
    expect(formatUtcTimestamp(new Date('2024-01-02T15:04:05.678Z'))).toBe(
      '2024-01-02 15:04:05 UTC',
    );
  });
});
