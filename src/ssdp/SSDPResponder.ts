import dgram from 'dgram';
import { EventEmitter } from 'events';
import {
  findInterfaceByAddress,
  type InterfaceTable,
} from '../network/interfaces.js';
import {
  deviceDescriptorUrl,
  type SessionIdentity,
} from '../session/sessionIdentity.js';
import type { EventLog } from '../utils/logger/EventLog.js';
import { KnownHostLedger } from './KnownHostLedger.js';
import {
  SSDP_MULTICAST_ADDRESS,
  SSDP_PORT,
  buildSearchReply,
  parseSearchRequest,
} from './messages.js';
import { resolveSocketStrategy, type SocketStrategy } from './socketStrategy.js';

export interface RemoteEndpoint {
  address: string;
  port: number;
}

/**
 * The parts of a dgram socket the responder relies on.
 */
export interface DatagramSocket {
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteEndpoint) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  bind(port: number, address: string, callback: () => void): void;
  addMembership(multicastAddress: string, multicastInterface: string): void;
  send(
    msg: Buffer,
    port: number,
    address: string,
    callback: (error: Error | null) => void,
  ): void;
  close(): void;
}

export type SocketFactory = (strategy: SocketStrategy) => DatagramSocket;

export const createUdpSocket: SocketFactory = (strategy) =>
  dgram.createSocket({ type: 'udp4', reuseAddr: strategy.reuseAddr });

export class ResponderStartupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ResponderStartupError';
  }
}

export type SearchOutcome = 'ignored' | 'detection' | 'answered' | 'observed';

export interface SSDPResponderOptions {
  session: SessionIdentity;
  log: EventLog;
  strategy?: SocketStrategy;
  createSocket?: SocketFactory;
  interfaces?: InterfaceTable;
  now?: () => Date;
}

type ResponderState = 'idle' | 'starting' | 'listening' | 'closed';

/**
 * Answers SSDP M-SEARCH requests with the location of the spoofed device
 * descriptor. Emits `fatal` when the socket fails after startup.
 */
export class SSDPResponder extends EventEmitter {
  readonly ledger = new KnownHostLedger();
  private readonly session: SessionIdentity;
  private readonly log: EventLog;
  private readonly strategy: SocketStrategy;
  private readonly createSocket: SocketFactory;
  private readonly interfaces?: InterfaceTable;
  private readonly now: () => Date;
  private socket?: DatagramSocket;
  private state: ResponderState = 'idle';

  constructor(options: SSDPResponderOptions) {
    super();
    this.session = options.session;
    this.log = options.log;
    this.strategy = options.strategy ?? resolveSocketStrategy();
    this.createSocket = options.createSocket ?? createUdpSocket;
    this.interfaces = options.interfaces;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Bind port 1900 on all interfaces and join the SSDP group on the interface
   * owning the session address. Any failure rejects with ResponderStartupError.
   */
  async start(): Promise<string> {
    if (this.state !== 'idle') {
      throw new ResponderStartupError(`responder cannot start while ${this.state}`);
    }

    let interfaceName: string;
    try {
      interfaceName = findInterfaceByAddress(
        this.session.localIp,
        this.interfaces,
        this.strategy.loopbackNames,
      );
    } catch (error) {
      throw new ResponderStartupError(
        `failed to get interface for IP ${this.session.localIp}`,
        error,
      );
    }

    this.state = 'starting';
    const socket = this.createSocket(this.strategy);
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      socket.on('error', (err) => {
        if (this.state === 'starting') {
          this.state = 'closed';
          socket.close();
          reject(new ResponderStartupError(`failed to bind SSDP socket: ${err.message}`, err));
          return;
        }
        this.handleSocketError(err);
      });

      socket.on('message', (msg, rinfo) => {
        try {
          this.handleDatagram(msg, rinfo);
        } catch (error) {
          this.handleSocketError(error instanceof Error ? error : new Error(String(error)));
        }
      });

      socket.bind(SSDP_PORT, '0.0.0.0', () => {
        try {
          socket.addMembership(SSDP_MULTICAST_ADDRESS, this.session.localIp);
        } catch (error) {
          this.state = 'closed';
          socket.close();
          const detail = error instanceof Error ? error.message : String(error);
          reject(
            new ResponderStartupError(
              `failed to join multicast group on interface ${interfaceName}: ${detail}`,
              error,
            ),
          );
          return;
        }
        this.state = 'listening';
        resolve();
      });
    });

    this.log.event(
      'INFO',
      `SSDP listener bound to interface ${interfaceName} (${this.session.localIp}) on port ${SSDP_PORT}`,
    );
    return interfaceName;
  }

  /**
   * Process one datagram: detect odd search targets, log first sightings and
   * reply unless running analyze-only.
   */
  handleDatagram(payload: Buffer, remote: RemoteEndpoint): SearchOutcome {
    const request = parseSearchRequest(payload.toString('utf8'));

    switch (request.kind) {
      case 'ignored':
        return 'ignored';

      case 'invalid':
        this.log.event(
          'DETECTION',
          `Odd ST (${request.serviceType}) from ${remote.address}. Possible detection tool!`,
        );
        return 'detection';

      case 'valid': {
        const { serviceType } = request;
        if (this.ledger.markSeen(remote.address, serviceType)) {
          this.log.event(
            'MSEARCH',
            `New Host ${remote.address}, Service Type: ${serviceType}`,
          );
        }

        if (this.session.analyzeOnly) {
          return 'observed';
        }

        this.sendReply(remote, serviceType);
        return 'answered';
      }
    }
  }

  buildReply(serviceType: string): string {
    return buildSearchReply({
      location: deviceDescriptorUrl(this.session),
      sessionUsn: this.session.sessionUsn,
      serviceType,
      date: this.now(),
    });
  }

  stop(): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.socket?.close();
    this.socket = undefined;
  }

  get listening(): boolean {
    return this.state === 'listening';
  }

  private sendReply(remote: RemoteEndpoint, serviceType: string): void {
    const socket = this.socket;
    if (!socket || this.state !== 'listening') {
      return;
    }

    const reply = Buffer.from(this.buildReply(serviceType), 'utf8');
    socket.send(reply, remote.port, remote.address, (error) => {
      if (error) {
        this.log.event(
          'WARN',
          `Error sending SSDP response to ${remote.address}: ${error.message}`,
        );
      }
    });
  }

  private handleSocketError(err: Error): void {
    if (this.state === 'closed') {
      return;
    }
    this.stop();
    this.emit('fatal', err);
  }
}
