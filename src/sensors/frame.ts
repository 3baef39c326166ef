import { PNG } from 'pngjs';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function readFrameAsGrayscale(pngBuffer: Buffer): GrayscaleFrame {
  const image = PNG.sync.read(pngBuffer);
  const { width, height, data } = image;
  const pixels = width * height;
  const grayscale = new Uint8Array(pixels);

  for (let i = 0; i < pixels; i += 1) {
    const offset = i * 4;
    // Rec. 601 luma
    grayscale[i] = Math.round(0.299 * data[offset] + 0.587 * data[offset + 1] + 0.114 * data[offset + 2]);
  }

  return { width, height, data: grayscale };
}

export function averageLuminance(frame: GrayscaleFrame): number {
  const { data } = frame;
  if (data.length === 0) {
    return 0;
  }

  let total = 0;
  for (let i = 0; i < data.length; i += 1) {
    total += data[i];
  }
  return total / data.length;
}

/**
 * Cuts one complete PNG (signature through IEND) off the front of `buffer`.
 * Returns null until the whole image has arrived.
 */
export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}

export type ExtractResult = {
  frames: Buffer[];
  remainder: Buffer;
  overflowed: boolean;
};

export function extractFrames(buffer: Buffer, maxBufferBytes: number): ExtractResult {
  let working = buffer;
  const frames: Buffer[] = [];
  let overflowed = false;

  while (true) {
    const pngStart = working.indexOf(PNG_SIGNATURE);

    if (pngStart === -1) {
      if (working.length > maxBufferBytes) {
        overflowed = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    if (pngStart > 0) {
      working = working.subarray(pngStart);
    }

    const frame = slicePng(working);
    if (!frame) {
      if (working.length > maxBufferBytes) {
        overflowed = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    frames.push(frame.png);
    working = frame.remainder;
  }

  return { frames, remainder: working, overflowed };
}
