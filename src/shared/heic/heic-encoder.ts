import convert from "heic-convert";

export const HEIC_ENCODER = Symbol("HEIC_ENCODER");

/**
 * Decodes a HEIC image and re-encodes it as JPEG.
 */
export type HeicEncoder = (heic: Buffer) => Promise<Buffer>;

export const encodeHeicAsJpeg: HeicEncoder = async (heic) => {
  const output = await convert({ buffer: heic, format: "JPEG", quality: 1 });
  return Buffer.from(new Uint8Array(output));
};
