import { randomUUID } from 'crypto';

export interface AuthSettings {
  readonly enabled: boolean;
  readonly realm: string;
}

/**
 * Values computed once at startup and shared, read-only, by the SSDP
 * responder, the HTTP router and the template engine.
 */
export interface SessionIdentity {
  readonly localIp: string;
  readonly localPort: number;
  readonly smbServer: string;
  readonly redirectUrl: string;
  /** `uuid:xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx` */
  readonly sessionUsn: string;
  readonly analyzeOnly: boolean;
  readonly auth: AuthSettings;
  readonly templateDir: string;
}

export type SessionIdentityInit = Omit<SessionIdentity, 'sessionUsn' | 'auth'> & {
  sessionUsn?: string;
  auth: AuthSettings;
};

export function generateSessionUsn(): string {
  return `uuid:${randomUUID()}`;
}

export function createSessionIdentity(init: SessionIdentityInit): SessionIdentity {
  return Object.freeze({
    localIp: init.localIp,
    localPort: init.localPort,
    smbServer: init.smbServer,
    redirectUrl: init.redirectUrl,
    sessionUsn: init.sessionUsn ?? generateSessionUsn(),
    analyzeOnly: init.analyzeOnly,
    auth: Object.freeze({ enabled: init.auth.enabled, realm: init.auth.realm }),
    templateDir: init.templateDir,
  });
}

export function deviceDescriptorUrl(session: SessionIdentity): string {
  return `http://${session.localIp}:${session.localPort}/ssdp/device-desc.xml`;
}
