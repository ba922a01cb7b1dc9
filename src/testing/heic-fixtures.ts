/*
 * Builds just enough of an ISO BMFF HEIC container to carry items: ftyp,
 * meta (hdlr, iinf, iloc) and an mdat holding the item bytes.
 */

interface FixtureItem {
  id: number;
  type: string;
  data: Buffer;
}

function box(type: string, ...parts: Buffer[]): Buffer {
  const payload = Buffer.concat(parts);
  const head = Buffer.alloc(8);
  head.writeUInt32BE(8 + payload.length, 0);
  head.write(type, 4, "latin1");
  return Buffer.concat([head, payload]);
}

function fullBox(type: string, version: number, ...parts: Buffer[]): Buffer {
  return box(type, Buffer.from([version, 0, 0, 0]), ...parts);
}

function infe(item: FixtureItem): Buffer {
  const body = Buffer.alloc(9);
  body.writeUInt16BE(item.id, 0);
  body.write(item.type, 4, "latin1");
  return fullBox("infe", 2, body);
}

function iloc(items: FixtureItem[], offsets: number[]): Buffer {
  const count = Buffer.alloc(2);
  count.writeUInt16BE(items.length, 0);
  const entries = items.map((item, index) => {
    const entry = Buffer.alloc(14);
    entry.writeUInt16BE(item.id, 0);
    entry.writeUInt16BE(1, 4); // one extent
    entry.writeUInt32BE(offsets[index], 6);
    entry.writeUInt32BE(item.data.length, 10);
    return entry;
  });
  // offset_size = 4, length_size = 4, base_offset_size = 0
  return fullBox("iloc", 0, Buffer.from([0x44, 0x00]), count, ...entries);
}

function meta(items: FixtureItem[], offsets: number[]): Buffer {
  const count = Buffer.alloc(2);
  count.writeUInt16BE(items.length, 0);
  return fullBox(
    "meta",
    0,
    fullBox("hdlr", 0, Buffer.alloc(4), Buffer.from("pict", "latin1"), Buffer.alloc(13)),
    fullBox("iinf", 0, count, ...items.map(infe)),
    iloc(items, offsets),
  );
}

/**
 * Wraps TIFF bytes the way HEIC stores Exif: a 4-byte offset to the TIFF
 * header, then "Exif\0\0", then the TIFF structure.
 */
export function heicExifItem(tiff: Buffer, withPrefix = true): Buffer {
  const prefix = withPrefix ? Buffer.from("Exif\0\0", "latin1") : Buffer.alloc(0);
  const offset = Buffer.alloc(4);
  offset.writeUInt32BE(prefix.length, 0);
  return Buffer.concat([offset, prefix, tiff]);
}

export function fakeHeic(exifItem: Buffer | null): Buffer {
  const items: FixtureItem[] = [{ id: 1, type: "hvc1", data: Buffer.from("coded-image-bytes") }];
  if (exifItem) {
    items.push({ id: 2, type: "Exif", data: exifItem });
  }

  const ftyp = box("ftyp", Buffer.from("heic\0\0\0\0mif1heic", "latin1"));
  // iloc has a fixed size, so a draft tells where mdat's payload will start.
  const draft = meta(items, items.map(() => 0));
  let position = ftyp.length + draft.length + 8;
  const offsets = items.map((item) => {
    const offset = position;
    position += item.data.length;
    return offset;
  });

  return Buffer.concat([ftyp, meta(items, offsets), box("mdat", ...items.map((item) => item.data))]);
}

export const SAMPLE_TIFF = Buffer.from([0x4d, 0x4d, 0x00, 0x2a, 0x00, 0x00, 0x00, 0x08, 0x00, 0x00]);
