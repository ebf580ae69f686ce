import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { InterfaceTable } from '../src/network/interfaces.js';
import { SSDPResponder, ResponderStartupError } from '../src/ssdp/SSDPResponder.js';
import { resolveSocketStrategy } from '../src/ssdp/socketStrategy.js';
import { EventLog } from '../src/utils/logger/EventLog.js';
import type { SessionIdentity } from '../src/session/sessionIdentity.js';
import { FakeSocket } from './helpers/fakeSocket.js';
import { MemoryLogSink } from './helpers/memoryLogSink.js';
import { searchRequest, testSession, TEST_USN } from './helpers/session.js';

const interfaces: InterfaceTable = {
  lo: [
    {
      address: '127.0.0.1',
      netmask: '255.0.0.0',
      family: 'IPv4',
      mac: '00:00:00:00:00:00',
      internal: true,
      cidr: '127.0.0.1/8',
    },
  ],
  eth0: [
    {
      address: '10.0.0.5',
      netmask: '255.255.255.0',
      family: 'IPv4',
      mac: '02:42:ac:11:00:02',
      internal: false,
      cidr: '10.0.0.5/24',
    },
  ],
};

const FIXED_DATE = new Date(Date.UTC(2024, 0, 2, 15, 4, 5));

describe('SSDPResponder', () => {
  let sink: MemoryLogSink;
  let socket: FakeSocket;

  const createResponder = (session: SessionIdentity = testSession()) =>
    new SSDPResponder({
      session,
      log: new EventLog(sink),
      strategy: resolveSocketStrategy('linux'),
      createSocket: () => socket,
      interfaces,
      now: () => FIXED_DATE,
    });

  beforeEach(() => {
    sink = new MemoryLogSink();
    socket = new FakeSocket();
  });

  describe('start', () => {
    it('binds port 1900 on all interfaces and joins the group on the session address', async () => {
      const responder = createResponder();

      await expect(responder.start()).resolves.toBe('eth0');

      expect(socket.bound).toEqual({ port: 1900, address: '0.0.0.0' });
      expect(socket.memberships).toEqual([{ group: '239.255.255.250', iface: '10.0.0.5' }]);
      expect(responder.listening).toBe(true);
      expect(sink.lines).toEqual([
        '[*] SSDP listener bound to interface eth0 (10.0.0.5) on port 1900',
      ]);
    });

    it('prefers the platform loopback name for 127.0.0.1', async () => {
      const responder = createResponder(testSession({ localIp: '127.0.0.1' }));
      await expect(responder.start()).resolves.toBe('lo');
    });

    it('fails when no interface owns the address', async () => {
      const responder = createResponder(testSession({ localIp: '192.168.50.1' }));
      await expect(responder.start()).rejects.toThrow(
        'failed to get interface for IP 192.168.50.1',
      );
    });

    it('fails when the socket cannot bind', async () => {
      socket.bindError = new Error('EADDRINUSE');
      const responder = createResponder();

      await expect(responder.start()).rejects.toBeInstanceOf(ResponderStartupError);
      expect(socket.closed).toBe(true);
    });

    it('fails when the multicast group cannot be joined', async () => {
      socket.membershipError = new Error('EADDRNOTAVAIL');
      const responder = createResponder();

      await expect(responder.start()).rejects.toThrow(
        'failed to join multicast group on interface eth0: EADDRNOTAVAIL',
      );
      expect(socket.closed).toBe(true);
    });

    it('emits fatal and closes on a socket error after startup', async () => {
      const responder = createResponder();
      await responder.start();
      const onFatal = jest.fn();
      responder.on('fatal', onFatal);

      const failure = new Error('socket read failed');
      socket.emit('error', failure);

      expect(onFatal).toHaveBeenCalledWith(failure);
      expect(socket.closed).toBe(true);
      expect(responder.listening).toBe(false);
    });
  });

  describe('handleDatagram', () => {
    it('answers a valid search with the session location and echoed service type', async () => {
      const responder = createResponder();
      await responder.start();

      socket.receive(searchRequest('ssdp:rootdevice'), '10.0.0.9', 41234);

      expect(socket.sent).toHaveLength(1);
      const [reply] = socket.sent;
      expect(reply.address).toBe('10.0.0.9');
      expect(reply.port).toBe(41234);
      const lines = reply.text.split('\r\n');
      expect(lines).toContain('LOCATION: http://10.0.0.5:8888/ssdp/device-desc.xml');
      expect(lines).toContain('ST: ssdp:rootdevice');
      expect(lines).toContain(`USN: ${TEST_USN}::ssdp:rootdevice`);
      expect(lines).toContain('DATE: Tue, 02 Jan 2024 15:04:05 GMT');
    });

    it('logs a new host only once per address and service type', async () => {
      const responder = createResponder();
      await responder.start();

      socket.receive(searchRequest('ssdp:all'), '10.0.0.9');
      socket.receive(searchRequest('ssdp:all'), '10.0.0.9');
      socket.receive(searchRequest('upnp:rootdevice'), '10.0.0.9');
      socket.receive(searchRequest('ssdp:all'), '10.0.0.10');

      expect(sink.matching('New Host')).toEqual([
        '[M-SEARCH]     New Host 10.0.0.9, Service Type: ssdp:all',
        '[M-SEARCH]     New Host 10.0.0.9, Service Type: upnp:rootdevice',
        '[M-SEARCH]     New Host 10.0.0.10, Service Type: ssdp:all',
      ]);
      expect(socket.sent).toHaveLength(4);
      expect(responder.ledger.size).toBe(3);
    });

    it('logs odd service types as detection tools and never replies', async () => {
      const responder = createResponder();
      await responder.start();

      expect(responder.handleDatagram(Buffer.from(searchRequest('rootdevice')), {
        address: '10.0.0.9',
        port: 1900,
      })).toBe('detection');

      expect(socket.sent).toHaveLength(0);
      expect(sink.lines).toContain(
        '[DETECTION]    Odd ST (rootdevice) from 10.0.0.9. Possible detection tool!',
      );
      expect(responder.ledger.size).toBe(0);
    });

    it('ignores traffic that is not an M-SEARCH', async () => {
      const responder = createResponder();
      await responder.start();

      const outcome = responder.handleDatagram(
        Buffer.from('NOTIFY * HTTP/1.1\r\nNT: upnp:rootdevice\r\n\r\n'),
        { address: '10.0.0.9', port: 1900 },
      );

      expect(outcome).toBe('ignored');
      expect(sink.lines).toHaveLength(1);
    });

    it('observes but never replies in analyze-only mode', async () => {
      const responder = createResponder(testSession({ analyzeOnly: true }));
      await responder.start();

      socket.receive(searchRequest('ssdp:rootdevice'), '10.0.0.9');
      socket.receive(searchRequest('bogus'), '10.0.0.9');

      expect(socket.sent).toHaveLength(0);
      expect(sink.lines).toContain('[M-SEARCH]     New Host 10.0.0.9, Service Type: ssdp:rootdevice');
      expect(sink.lines).toContain(
        '[DETECTION]    Odd ST (bogus) from 10.0.0.9. Possible detection tool!',
      );
    });

    it('logs send failures without stopping', async () => {
      const responder = createResponder();
      await responder.start();
      socket.sendError = new Error('EHOSTUNREACH');

      socket.receive(searchRequest('ssdp:all'), '10.0.0.9');

      expect(sink.lines).toContain(
        '[!] Error sending SSDP response to 10.0.0.9: EHOSTUNREACH',
      );
      expect(responder.listening).toBe(true);
    });
  });

  it('stop closes the socket once', async () => {
    const responder = createResponder();
    await responder.start();

    responder.stop();
    responder.stop();

    expect(socket.closed).toBe(true);
    expect(responder.listening).toBe(false);
  });
});
