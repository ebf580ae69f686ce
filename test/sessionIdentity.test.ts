import { describe, it, expect } from '@jest/globals';
import {
  createSessionIdentity,
  deviceDescriptorUrl,
  generateSessionUsn,
} from '../src/session/sessionIdentity.js';

const USN_FORMAT = /^uuid:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const init = {
  localIp: '192.168.1.20',
  localPort: 8888,
  smbServer: '192.168.1.30',
  redirectUrl: '',
  analyzeOnly: false,
  auth: { enabled: true, realm: 'Corp Files' },
  templateDir: 'templates/office365',
};

describe('session identity', () => {
  it('mints a lowercase uuid session identifier', () => {
    const usn = generateSessionUsn();

    expect(usn).toMatch(USN_FORMAT);
    expect(generateSessionUsn()).not.toBe(usn);
  });

  it('keeps an explicit identifier', () => {
    const session = createSessionIdentity({
      ...init,
      sessionUsn: 'uuid:00000000-0000-4000-8000-000000000000',
    });

    expect(session.sessionUsn).toBe('uuid:00000000-0000-4000-8000-000000000000');
  });

  it('is frozen, including the auth settings', () => {
    const session = createSessionIdentity(init);

    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.auth)).toBe(true);
    expect(session.sessionUsn).toMatch(USN_FORMAT);
  });

  it('does not share the caller auth object', () => {
    const auth = { enabled: false, realm: 'Corp Files' };
    const session = createSessionIdentity({ ...init, auth });
    auth.enabled = true;

    expect(session.auth.enabled).toBe(false);
  });

  it('builds the device descriptor URL', () => {
    expect(deviceDescriptorUrl(createSessionIdentity(init))).toBe(
      'http://192.168.1.20:8888/ssdp/device-desc.xml',
    );
  });
});
