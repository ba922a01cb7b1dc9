import { EXIF_SIGNATURE } from "../jpeg/jpeg-segments";

/*
 * HEIC files are ISO BMFF: a sequence of boxes laid out as
 * [size: uint32 BE][type: 4 chars][payload], with size == 1 meaning a 64-bit
 * size follows the type and size == 0 meaning "to the end of the parent".
 * Exif lives in an item declared by meta/iinf/infe (type "Exif") whose bytes
 * are located through meta/iloc.
 */

interface Box {
  type: string;
  start: number;
  // First byte after the header.
  contentStart: number;
  end: number;
}

interface ItemLocation {
  constructionMethod: number;
  baseOffset: number;
  extents: { offset: number; length: number }[];
}

function* boxes(buffer: Buffer, start: number, end: number): Generator<Box> {
  let position = start;
  while (position + 8 <= end) {
    let size = buffer.readUInt32BE(position);
    const type = buffer.toString("latin1", position + 4, position + 8);
    let headerSize = 8;

    if (size === 1) {
      if (position + 16 > end) return;
      size = Number(buffer.readBigUInt64BE(position + 8));
      headerSize = 16;
    } else if (size === 0) {
      size = end - position;
    }
    if (size < headerSize || position + size > end) return;

    yield { type, start: position, contentStart: position + headerSize, end: position + size };
    position += size;
  }
}

function findBox(buffer: Buffer, start: number, end: number, type: string): Box | undefined {
  for (const box of boxes(buffer, start, end)) {
    if (box.type === type) return box;
  }
  return undefined;
}

function readSized(buffer: Buffer, position: number, size: number): number {
  switch (size) {
    case 0:
      return 0;
    case 4:
      return buffer.readUInt32BE(position);
    case 8:
      return Number(buffer.readBigUInt64BE(position));
    default:
      throw new Error(`Unsupported iloc field size ${size}`);
  }
}

function findExifItemId(buffer: Buffer, iinf: Box): number | null {
  const version = buffer[iinf.contentStart];
  const entriesStart = iinf.contentStart + 4 + (version === 0 ? 2 : 4);

  for (const infe of boxes(buffer, entriesStart, iinf.end)) {
    if (infe.type !== "infe") continue;
    const infeVersion = buffer[infe.contentStart];
    if (infeVersion < 2) continue;

    let position = infe.contentStart + 4;
    const itemId = infeVersion === 2 ? buffer.readUInt16BE(position) : buffer.readUInt32BE(position);
    position += (infeVersion === 2 ? 2 : 4) + 2;
    if (buffer.toString("latin1", position, position + 4) === "Exif") {
      return itemId;
    }
  }
  return null;
}

function findItemLocation(buffer: Buffer, iloc: Box, itemId: number): ItemLocation | null {
  const version = buffer[iloc.contentStart];
  let position = iloc.contentStart + 4;

  const offsetSize = buffer[position] >> 4;
  const lengthSize = buffer[position] & 0x0f;
  const baseOffsetSize = buffer[position + 1] >> 4;
  const indexSize = version === 1 || version === 2 ? buffer[position + 1] & 0x0f : 0;
  position += 2;

  const itemCount = version < 2 ? buffer.readUInt16BE(position) : buffer.readUInt32BE(position);
  position += version < 2 ? 2 : 4;

  for (let i = 0; i < itemCount; i++) {
    const id = version < 2 ? buffer.readUInt16BE(position) : buffer.readUInt32BE(position);
    position += version < 2 ? 2 : 4;

    let constructionMethod = 0;
    if (version === 1 || version === 2) {
      constructionMethod = buffer.readUInt16BE(position) & 0x0f;
      position += 2;
    }
    position += 2; // data_reference_index

    const baseOffset = readSized(buffer, position, baseOffsetSize);
    position += baseOffsetSize;

    const extentCount = buffer.readUInt16BE(position);
    position += 2;

    const extents: ItemLocation["extents"] = [];
    for (let e = 0; e < extentCount; e++) {
      position += indexSize;
      const offset = readSized(buffer, position, offsetSize);
      position += offsetSize;
      const length = readSized(buffer, position, lengthSize);
      position += lengthSize;
      extents.push({ offset, length });
    }

    if (id === itemId) {
      return { constructionMethod, baseOffset, extents };
    }
  }
  return null;
}

/**
 * Pulls the Exif block out of a HEIC file and returns it as a JPEG APP1
 * payload ("Exif\0\0" followed by the TIFF structure), or null when the file
 * carries no Exif item.
 */
export function extractHeicExif(buffer: Buffer): Buffer | null {
  const meta = findBox(buffer, 0, buffer.length, "meta");
  if (!meta) return null;

  // meta is a full box: skip version and flags.
  const childrenStart = meta.contentStart + 4;
  const iinf = findBox(buffer, childrenStart, meta.end, "iinf");
  const iloc = findBox(buffer, childrenStart, meta.end, "iloc");
  if (!iinf || !iloc) return null;

  const itemId = findExifItemId(buffer, iinf);
  if (itemId === null) return null;

  const location = findItemLocation(buffer, iloc, itemId);
  if (!location) return null;

  let dataStart = 0;
  if (location.constructionMethod === 1) {
    const idat = findBox(buffer, childrenStart, meta.end, "idat");
    if (!idat) return null;
    dataStart = idat.contentStart;
  } else if (location.constructionMethod !== 0) {
    return null;
  }

  const data = Buffer.concat(
    location.extents.map(({ offset, length }) => {
      const start = dataStart + location.baseOffset + offset;
      return buffer.subarray(start, start + length);
    }),
  );
  if (data.length < 4) return null;

  const tiffStart = 4 + data.readUInt32BE(0);
  const tiff = data.subarray(tiffStart);
  const byteOrder = tiff.toString("latin1", 0, 2);
  if (byteOrder !== "II" && byteOrder !== "MM") return null;

  return Buffer.concat([EXIF_SIGNATURE, tiff]);
}
