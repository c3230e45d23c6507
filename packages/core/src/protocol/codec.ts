import { ParloopError, ErrorCode, ProtocolError } from '../errors.js';
import { MAX_WIRE_VALUE } from '../sampling/step-size.js';

/**
 * Progress datagrams are a fixed record of two unsigned 32-bit big-endian integers:
 * `[workerId, value]`. A value of 0 registers the worker; anything above is its
 * cumulative local iteration count.
 */
export const MESSAGE_BYTE_LENGTH = 8;

export type MessageKind = 'registration' | 'update';

export interface ProgressMessage {
  workerId: number;
  kind: MessageKind;
  value: number;
}

function isWireValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_WIRE_VALUE;
}

export function registrationMessage(workerId: number): ProgressMessage {
  return { workerId, kind: 'registration', value: 0 };
}

export function updateMessage(workerId: number, value: number): ProgressMessage {
  return { workerId, kind: 'update', value };
}

export function encodeMessage(message: ProgressMessage): Buffer {
  if (!isWireValue(message.workerId) || !isWireValue(message.value)) {
    throw new ParloopError(
      `Message fields out of range: workerId=${String(message.workerId)} value=${String(message.value)}`,
      ErrorCode.INPUT_INVALID,
      'Progress messages carry unsigned 32-bit integers only',
      { workerId: message.workerId, value: message.value }
    );
  }
  if ((message.kind === 'registration') !== (message.value === 0)) {
    throw new ParloopError(
      `Message kind ${message.kind} cannot carry value ${String(message.value)}`,
      ErrorCode.INPUT_INVALID,
      'Registrations carry 0 and updates carry a positive count',
      { kind: message.kind, value: message.value }
    );
  }
  const buffer = Buffer.alloc(MESSAGE_BYTE_LENGTH);
  buffer.writeUInt32BE(message.workerId, 0);
  buffer.writeUInt32BE(message.value, 4);
  return buffer;
}

export function decodeMessage(data: Uint8Array): ProgressMessage {
  if (data.byteLength !== MESSAGE_BYTE_LENGTH) {
    throw new ProtocolError(
      `expected ${String(MESSAGE_BYTE_LENGTH)} bytes, received ${String(data.byteLength)}`,
      data.byteLength
    );
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const workerId = view.getUint32(0, false);
  const value = view.getUint32(4, false);
  return value === 0 ? registrationMessage(workerId) : updateMessage(workerId, value);
}
