/**
 * Marker segment handling for baseline/progressive JPEG files.
 *
 * A JPEG starts with SOI (FF D8) followed by marker segments, each laid out as
 * [FF xx][length: uint16 BE, counts itself][payload]. Once SOS (FF DA) is
 * reached the entropy coded data follows, and anything after it (including an
 * appended video) is opaque to us. Only the segments before SOS are parsed.
 */

export const SOI = 0xd8;
export const EOI = 0xd9;
export const SOS = 0xda;
export const APP0 = 0xe0;
export const APP1 = 0xe1;

export const XMP_SIGNATURE = Buffer.from("http://ns.adobe.com/xap/1.0/\0", "latin1");
export const EXIF_SIGNATURE = Buffer.from("Exif\0\0", "latin1");

// Length field is 16 bits and includes its own two bytes.
export const MAX_SEGMENT_PAYLOAD = 0xffff - 2;

export interface JpegSegment {
  marker: number;
  // Position of the FF marker byte in the file.
  offset: number;
  payload: Buffer;
}

export interface JpegHeader {
  segments: JpegSegment[];
  // Position of the SOS marker, or of EOI / EOF when no scan exists.
  bodyOffset: number;
}

export type ByteReader = (position: number, length: number) => Promise<Buffer>;

export class JpegFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JpegFormatError";
  }
}

function isStandalone(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

/**
 * Walks the marker segments from SOI up to the start of scan.
 */
export async function readJpegHeader(read: ByteReader): Promise<JpegHeader> {
  const soi = await read(0, 2);
  if (soi.length < 2 || soi[0] !== 0xff || soi[1] !== SOI) {
    throw new JpegFormatError("Missing JPEG start-of-image marker");
  }

  const segments: JpegSegment[] = [];
  let position = 2;

  for (;;) {
    const head = await read(position, 2);
    if (head.length < 2) {
      return { segments, bodyOffset: position };
    }
    if (head[0] !== 0xff) {
      throw new JpegFormatError(`Expected a marker at byte ${position}`);
    }

    const marker = head[1];
    if (marker === 0xff) {
      // Fill byte before the real marker.
      position += 1;
      continue;
    }
    if (marker === SOS || marker === EOI) {
      return { segments, bodyOffset: position };
    }
    if (isStandalone(marker)) {
      position += 2;
      continue;
    }

    const lengthBytes = await read(position + 2, 2);
    if (lengthBytes.length < 2) {
      throw new JpegFormatError(`Truncated segment at byte ${position}`);
    }
    const length = lengthBytes.readUInt16BE(0);
    if (length < 2) {
      throw new JpegFormatError(`Invalid segment length ${length} at byte ${position}`);
    }
    const payload = await read(position + 4, length - 2);
    if (payload.length < length - 2) {
      throw new JpegFormatError(`Truncated segment at byte ${position}`);
    }

    segments.push({ marker, offset: position, payload });
    position += 2 + length;
  }
}

export function bufferReader(buffer: Buffer): ByteReader {
  return async (position, length) => buffer.subarray(position, position + length);
}

export function hasSignature(segment: JpegSegment, signature: Buffer): boolean {
  return (
    segment.marker === APP1 &&
    segment.payload.length >= signature.length &&
    segment.payload.subarray(0, signature.length).equals(signature)
  );
}

export function isXmpSegment(segment: JpegSegment): boolean {
  return hasSignature(segment, XMP_SIGNATURE);
}

export function isExifSegment(segment: JpegSegment): boolean {
  return hasSignature(segment, EXIF_SIGNATURE);
}

/**
 * Index at which a new APP1 segment goes: after the JFIF APP0 and any Exif
 * APP1 segments that open the file, so readers still find those first.
 */
export function appInsertionIndex(segments: JpegSegment[]): number {
  let index = 0;
  while (
    index < segments.length &&
    (segments[index].marker === APP0 || isExifSegment(segments[index]))
  ) {
    index++;
  }
  return index;
}

export function encodeSegment(marker: number, payload: Buffer): Buffer {
  if (payload.length > MAX_SEGMENT_PAYLOAD) {
    throw new RangeError(
      `Segment payload of ${payload.length} bytes exceeds ${MAX_SEGMENT_PAYLOAD}`,
    );
  }
  const head = Buffer.alloc(4);
  head[0] = 0xff;
  head[1] = marker;
  head.writeUInt16BE(payload.length + 2, 2);
  return Buffer.concat([head, payload]);
}

/**
 * Serializes SOI plus the given segments. Callers append the bytes from
 * `bodyOffset` onward to obtain a complete file.
 */
export function encodeHeader(segments: JpegSegment[]): Buffer {
  return Buffer.concat([
    Buffer.from([0xff, SOI]),
    ...segments.map((segment) => encodeSegment(segment.marker, segment.payload)),
  ]);
}

/**
 * Returns a copy of an in-memory JPEG with one APP1 segment inserted at the
 * conventional position.
 */
export async function insertApp1Segment(jpeg: Buffer, payload: Buffer): Promise<Buffer> {
  const header = await readJpegHeader(bufferReader(jpeg));
  const segments = [...header.segments];
  segments.splice(appInsertionIndex(segments), 0, {
    marker: APP1,
    offset: -1,
    payload,
  });
  return Buffer.concat([encodeHeader(segments), jpeg.subarray(header.bodyOffset)]);
}
