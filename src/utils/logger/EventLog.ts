import type { LogSink } from './LogSink.js';

export type EventKind =
  | 'INFO'
  | 'NOTE'
  | 'WARN'
  | 'MSEARCH'
  | 'XML_REQUEST'
  | 'PHISH_HOOKED'
  | 'CREDS_GIVEN'
  | 'XXE'
  | 'EXFILTRATION'
  | 'DETECTION'
  | 'ASSET';

export const EVENT_TAGS: Record<EventKind, string> = {
  INFO: '[*] ',
  NOTE: '[+] ',
  WARN: '[!] ',
  MSEARCH: '[M-SEARCH]     ',
  XML_REQUEST: '[XML REQUEST]  ',
  PHISH_HOOKED: '[PHISH HOOKED] ',
  CREDS_GIVEN: '[CREDS GIVEN]  ',
  XXE: '[XXE VULN!!!!] ',
  EXFILTRATION: '[EXFILTRATION] ',
  DETECTION: '[DETECTION]    ',
  ASSET: '[ASSET] ',
};

/** Continuation lines line up under the tagged message */
export const CONTINUATION = ' '.repeat(15);

export interface RequestSummary {
  ip: string;
  userAgent: string;
  method: string;
  path: string;
}

/**
 * Tagged event lines over a shared sink. One instance is built at startup and
 * handed to the responder and the router.
 */
export class EventLog {
  constructor(private readonly sink: LogSink) {}

  event(kind: EventKind, message: string): void {
    this.sink.record(`${EVENT_TAGS[kind]}${message}`);
  }

  raw(line: string): void {
    this.sink.record(line);
  }

  continuation(message: string): void {
    this.sink.record(`${CONTINUATION}${message}`);
  }

  request(kind: EventKind, request: RequestSummary): void {
    this.event(kind, `Host: ${request.ip}, User-Agent: ${request.userAgent}`);
    this.continuation(`${request.method} ${request.path}`);
  }
}
