import { Codec } from './types.js';

export const jsonCodec: Codec = {
  name: 'json',
  encode(obj: unknown): Uint8Array {
    const s = JSON.stringify(obj);
    return Buffer.from(s, 'utf8');
  },
  decode(buf: Uint8Array | string): unknown {
    const s = typeof buf === 'string' ? buf : Buffer.from(buf).toString('utf8');
    return JSON.parse(s);
  }
};
