import { pack, unpack } from 'msgpackr';
import { Codec } from './types.js';

export const msgpackCodec: Codec = {
  name: 'msgpack',
  encode(obj: unknown): Uint8Array {
    return pack(obj);
  },
  decode(buf: Uint8Array | string): unknown {
    const b = typeof buf === 'string' ? Buffer.from(buf, 'binary') : Buffer.from(buf);
    return unpack(b);
  }
};
