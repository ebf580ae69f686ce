export const SSDP_PORT = 1900;
export const SSDP_MULTICAST_ADDRESS = '239.255.255.250';

const SEARCH_MARKER = 'M-SEARCH';
const ST_HEADER = /\r\nST:(.*?)\r\n/i;

/**
 * `segment(:segment)+`, each segment drawn from letters, digits and `._-`
 */
export const VALID_SERVICE_TYPE = /^[A-Za-z0-9._-]+(?::[A-Za-z0-9._-]+)+$/;

export type SearchRequest =
  | { kind: 'ignored' }
  | { kind: 'invalid'; serviceType: string }
  | { kind: 'valid'; serviceType: string };

/**
 * Classify a datagram. Payloads that are not M-SEARCH requests, or carry no
 * ST header, are ignored.
 */
export function parseSearchRequest(payload: string): SearchRequest {
  if (!payload.includes(SEARCH_MARKER)) {
    return { kind: 'ignored' };
  }

  const match = ST_HEADER.exec(payload);
  if (!match) {
    return { kind: 'ignored' };
  }

  const serviceType = match[1].trim();
  if (!VALID_SERVICE_TYPE.test(serviceType)) {
    return { kind: 'invalid', serviceType };
  }
  return { kind: 'valid', serviceType };
}

export interface SearchReplyFields {
  location: string;
  sessionUsn: string;
  serviceType: string;
  date: Date;
}

export function buildSearchReply({
  location,
  sessionUsn,
  serviceType,
  date,
}: SearchReplyFields): string {
  const headers = [
    'HTTP/1.1 200 OK',
    'CACHE-CONTROL: max-age=1800',
    `DATE: ${date.toUTCString()}`,
    'EXT:',
    `LOCATION: ${location}`,
    'OPT: "http://schemas.upnp.org/upnp/1/0/"; ns=01',
    `01-NLS: ${sessionUsn}`,
    'SERVER: UPnP/1.0',
    `ST: ${serviceType}`,
    `USN: ${sessionUsn}::${serviceType}`,
    'BOOTID.UPNP.ORG: 0',
    'CONFIGID.UPNP.ORG: 1',
  ];
  return `${headers.join('\r\n')}\r\n\r\n\r\n`;
}
