import { createSocket } from 'dgram';
import type { Socket, SocketType } from 'dgram';
import { isIPv6 } from 'net';
import { TransportError } from '../errors.js';
import { debugLog } from '../utils/debug-log.js';
import type {
  DatagramEndpoint,
  DatagramSender,
  RemoteAddress,
  SenderFactory,
  EndpointFactory,
} from './datagram-transport.js';

function socketTypeFor(host: string): SocketType {
  return isIPv6(host) ? 'udp6' : 'udp4';
}

function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    try {
      socket.close(() => {
        resolve();
      });
    } catch (error) {
      // ERR_SOCKET_DGRAM_NOT_RUNNING: already closed
      debugLog('UDP', 'Socket already closed', {
        reason: error instanceof Error ? error.message : String(error),
      });
      resolve();
    }
  });
}

export class UdpSender implements DatagramSender {
  private readonly socket: Socket;
  private readonly target: RemoteAddress;
  private closing?: Promise<void>;

  constructor(target: RemoteAddress) {
    this.target = target;
    this.socket = createSocket(socketTypeFor(target.host));
    this.socket.on('error', (error) => {
      debugLog('UDP', 'Sender socket error', { message: error.message });
    });
    // Reporting must never keep a finished worker alive.
    this.socket.unref();
  }

  send(payload: Uint8Array, onError: (error: TransportError) => void): void {
    if (this.closing) return;
    try {
      this.socket.send(payload, this.target.port, this.target.host, (error) => {
        if (error) onError(TransportError.fromSocketError(error, 'send'));
      });
    } catch (error) {
      onError(TransportError.fromSocketError(error, 'send'));
    }
  }

  close(): Promise<void> {
    this.closing ??= closeSocket(this.socket);
    return this.closing;
  }
}

export class UdpEndpoint implements DatagramEndpoint {
  private socket?: Socket;
  private handler?: (payload: Buffer, remote: RemoteAddress) => void;
  private closing?: Promise<void>;

  bind(host: string): Promise<RemoteAddress> {
    const socket = createSocket(socketTypeFor(host));
    this.socket = socket;
    socket.on('message', (msg, rinfo) => {
      this.handler?.(msg, { host: rinfo.address, port: rinfo.port });
    });
    return new Promise((resolve, reject) => {
      const onBindError = (error: Error) => {
        reject(TransportError.fromSocketError(error, 'bind'));
      };
      socket.once('error', onBindError);
      socket.bind({ address: host, port: 0 }, () => {
        socket.off('error', onBindError);
        socket.on('error', (error) => {
          debugLog('UDP', 'Endpoint socket error', { message: error.message });
        });
        const info = socket.address();
        resolve({ host: info.address, port: info.port });
      });
    });
  }

  onDatagram(handler: (payload: Buffer, remote: RemoteAddress) => void): void {
    this.handler = handler;
  }

  close(): Promise<void> {
    if (!this.socket) return Promise.resolve();
    this.closing ??= closeSocket(this.socket);
    return this.closing;
  }
}

export const createUdpSender: SenderFactory = (target) => new UdpSender(target);
export const createUdpEndpoint: EndpointFactory = () => new UdpEndpoint();
