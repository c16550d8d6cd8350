// Serialization applied to queue messages by backends that persist bytes
export interface Codec {
  name: string; // 'json' | 'msgpack'
  encode(obj: unknown): Uint8Array;
  decode(buf: Uint8Array | string): unknown;
}
