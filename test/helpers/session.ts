import path from 'path';
import {
  createSessionIdentity,
  type SessionIdentity,
  type SessionIdentityInit,
} from '../../src/session/sessionIdentity.js';

export const FIXTURE_TEMPLATES = path.resolve(__dirname, '../fixtures/templates');
export const TEST_USN = 'uuid:0f8e2d3c-1a2b-4c5d-8e9f-a0b1c2d3e4f5';

export function testSession(overrides: Partial<SessionIdentityInit> = {}): SessionIdentity {
  return createSessionIdentity({
    localIp: '10.0.0.5',
    localPort: 8888,
    smbServer: '10.0.0.5',
    redirectUrl: '',
    analyzeOnly: false,
    auth: { enabled: false, realm: 'Microsoft Corporation' },
    templateDir: path.join(FIXTURE_TEMPLATES, 'office365'),
    sessionUsn: TEST_USN,
    ...overrides,
  });
}

export function searchRequest(serviceType: string): string {
  return [
    'M-SEARCH * HTTP/1.1',
    'HOST: 239.255.255.250:1900',
    'MAN: "ssdp:discover"',
    'MX: 3',
    `ST: ${serviceType}`,
    '',
    '',
  ].join('\r\n');
}
