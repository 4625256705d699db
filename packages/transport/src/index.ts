export type { Transport, TransportOptions } from './types.js';
export { TcpTransport } from './tcp-transport.js';
export { UdpTransport } from './udp-transport.js';
export { createTransport } from './create-transport.js';
export { ReceiveQueue } from './receive-queue.js';
export { formatAddress, resolveAddress, type ResolvedAddress } from './address.js';
export {
  TCP_MAGIC_1,
  TCP_MAGIC_2,
  WRAPPER_HEADER_SIZE,
  RAW_FRAMING,
  WRAPPED_FRAMING,
  createFraming,
  wrapFrame,
  unwrapFrame,
  hasWrapperMagic,
  type FrameCodec,
  type UnwrappedFrame,
} from './framing.js';
