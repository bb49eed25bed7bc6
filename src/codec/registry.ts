import type { WireCodec } from './types.js';
import { h1Codec, h1LenientCodec } from './h1.js';

const codecs = new Map<string, WireCodec>();

// 'auto' picks the default strategy
const ALIASES: Record<string, string> = { auto: 'h1' };

export function registerCodec(codec: WireCodec) {
  codecs.set(codec.name, codec);
}

export function getCodecByName(name?: string | null): WireCodec | undefined {
  if (!name) return undefined;
  const key = name.toLowerCase();
  return codecs.get(ALIASES[key] ?? key);
}

export function listCodecs(): WireCodec[] {
  return Array.from(codecs.values());
}

export function resolveCodec(name: string): WireCodec {
  const codec = getCodecByName(name);
  if (!codec) {
    const known = ['auto', ...codecs.keys()].join(', ');
    throw new Error(`Unknown wire codec '${name}' (known: ${known})`);
  }
  return codec;
}

// Bootstrap defaults
registerCodec(h1Codec);
registerCodec(h1LenientCodec);
