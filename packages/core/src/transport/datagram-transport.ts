import type { TransportError } from '../errors.js';

export interface RemoteAddress {
  host: string;
  port: number;
}

/** Outbound, connectionless channel from one worker to the aggregator. */
export interface DatagramSender {
  /** Fire and forget. Failures are reported through `onError`, never thrown. */
  send(payload: Uint8Array, onError: (error: TransportError) => void): void;
  close(): Promise<void>;
}

/** Inbound endpoint owned by the aggregator. */
export interface DatagramEndpoint {
  bind(host: string): Promise<RemoteAddress>;
  onDatagram(handler: (payload: Buffer, remote: RemoteAddress) => void): void;
  close(): Promise<void>;
}

export type SenderFactory = (target: RemoteAddress) => DatagramSender;
export type EndpointFactory = () => DatagramEndpoint;
