// Growable byte queue: bytes are appended at `end` and consumed from `start`.
export type DynBuf = {
  data: Buffer;
  start: number;
  end: number;
};

export function bufCreate(): DynBuf {
  return { data: Buffer.alloc(0), start: 0, end: 0 };
}

export function bufSize(buf: DynBuf): number {
  return buf.end - buf.start;
}

export function bufView(buf: DynBuf): Buffer {
  return buf.data.subarray(buf.start, buf.end);
}

export function bufPush(buf: DynBuf, data: Buffer): void {
  const size = bufSize(buf);
  const newLen = size + data.length;

  if (buf.end + data.length > buf.data.length) {
    if (newLen <= buf.data.length) {
      // enough room once the consumed prefix is dropped
      buf.data.copyWithin(0, buf.start, buf.end);
    } else {
      let cap = Math.max(buf.data.length, 32);
      while (cap < newLen) cap *= 2;
      const grown = Buffer.alloc(cap);
      buf.data.copy(grown, 0, buf.start, buf.end);
      buf.data = grown;
    }
    buf.start = 0;
    buf.end = size;
  }

  data.copy(buf.data, buf.end);
  buf.end += data.length;
}

export function bufPop(buf: DynBuf, len: number): void {
  buf.start += Math.min(len, bufSize(buf));
  if (buf.start === buf.end) {
    buf.start = 0;
    buf.end = 0;
  }
}

/** Copy `len` bytes off the front; the copy stays valid after later pushes. */
export function bufTake(buf: DynBuf, len: number): Buffer {
  const out = Buffer.from(buf.data.subarray(buf.start, buf.start + len));
  bufPop(buf, len);
  return out;
}
