import { Logger } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { promises as fsPromises } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { MetadataWriterService } from "./metadata-writer.service";
import { MetadataWriteError } from "../shared/errors/motion-photo.errors";
import { APP1, bufferReader, isXmpSegment, readJpegHeader, XMP_SIGNATURE } from "../shared/jpeg/jpeg-segments";
import { listXmpKeys } from "../shared/xmp/xmp-packet";
import {
  FAKE_JPEG_APP0_END,
  fakeJpeg,
  fakeVideo,
  makeTempDir,
  removeTempDir,
  writeFixture,
} from "../testing/media-fixtures";

function gcameraJpeg(attributes: string): Buffer {
  const xml =
    '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
    `<rdf:Description rdf:about="" xmlns:GCamera="http://ns.google.com/photos/1.0/camera/" ${attributes}/>` +
    "</rdf:RDF></x:xmpmeta>";
  return fakeJpeg(1024, [{ marker: APP1, payload: Buffer.concat([XMP_SIGNATURE, Buffer.from(xml, "utf8")]) }]);
}

async function xmpOf(filePath: string): Promise<string> {
  const file = await fs.readFile(filePath);
  const header = await readJpegHeader(bufferReader(file));
  const segment = header.segments.find(isXmpSegment);
  if (!segment) {
    throw new Error(`${filePath} has no XMP segment`);
  }
  return segment.payload.subarray(XMP_SIGNATURE.length).toString("utf8");
}

describe("MetadataWriterService", () => {
  let dir: string;
  let writer: MetadataWriterService;

  beforeEach(async () => {
    dir = await makeTempDir();
    const moduleRef = await Test.createTestingModule({
      providers: [MetadataWriterService],
    }).compile();
    writer = moduleRef.get(MetadataWriterService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("adds an XMP segment without touching image or clip bytes", async () => {
    const photo = fakeJpeg(512);
    const video = fakeVideo(4000);
    const muxed = await writeFixture(dir, "img.jpg", Buffer.concat([photo, video]));

    const metadata = await writer.writeOffset(muxed, 4000);

    expect(metadata).toEqual({
      microVideo: 1,
      microVideoVersion: 1,
      microVideoOffset: 4000,
      presentationTimestampUs: 1_500_000,
    });

    const output = await fs.readFile(muxed);
    const segmentLength = output.length - photo.length - video.length;
    const segment = output.subarray(FAKE_JPEG_APP0_END, FAKE_JPEG_APP0_END + segmentLength);
    expect([segment[0], segment[1]]).toEqual([0xff, APP1]);
    expect(segment.subarray(4, 4 + XMP_SIGNATURE.length).equals(XMP_SIGNATURE)).toBe(true);

    const withoutSegment = Buffer.concat([
      output.subarray(0, FAKE_JPEG_APP0_END),
      output.subarray(FAKE_JPEG_APP0_END + segmentLength),
    ]);
    expect(withoutSegment.equals(Buffer.concat([photo, video]))).toBe(true);
    expect(output.subarray(output.length - 4000).equals(video)).toBe(true);

    const xml = await xmpOf(muxed);
    expect(xml).toContain('GCamera:MicroVideo="1"');
    expect(xml).toContain('GCamera:MicroVideoVersion="1"');
    expect(xml).toContain('GCamera:MicroVideoOffset="4000"');
    expect(xml).toContain('GCamera:MicroVideoPresentationTimestampUs="1500000"');
    expect(await writer.readOffset(muxed)).toEqual(metadata);
  });

  it("produces the same file when run twice", async () => {
    const muxed = await writeFixture(dir, "img.jpg", Buffer.concat([fakeJpeg(512), fakeVideo(900)]));

    await writer.writeOffset(muxed, 900);
    const once = await fs.readFile(muxed);
    await writer.writeOffset(muxed, 900);
    const twice = await fs.readFile(muxed);

    expect(twice.equals(once)).toBe(true);
    const xml = await xmpOf(muxed);
    expect(xml.match(/xmlns:GCamera=/g)).toHaveLength(1);
    expect(xml.match(/GCamera:MicroVideoOffset=/g)).toHaveLength(1);
  });

  it("keeps existing XMP properties and replaces stale GCamera values", async () => {
    const warn = jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
    const existing =
      '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
      '<rdf:Description rdf:about="" xmlns:xmp="http://ns.adobe.com/xap/1.0/" xmp:CreatorTool="TestCam" ' +
      'xmlns:GCamera="http://ns.google.com/photos/1.0/camera/">' +
      "<GCamera:MicroVideoOffset>42</GCamera:MicroVideoOffset>" +
      "</rdf:Description></rdf:RDF></x:xmpmeta>";
    const photo = fakeJpeg(2048, [
      { marker: APP1, payload: Buffer.concat([XMP_SIGNATURE, Buffer.from(existing, "utf8")]) },
    ]);
    const video = fakeVideo(3000);
    const muxed = await writeFixture(dir, "img.jpg", Buffer.concat([photo, video]));

    await writer.writeOffset(muxed, 3000);

    const xml = await xmpOf(muxed);
    expect(listXmpKeys(xml)).toEqual([
      "xmp:CreatorTool",
      "GCamera:MicroVideo",
      "GCamera:MicroVideoVersion",
      "GCamera:MicroVideoOffset",
      "GCamera:MicroVideoPresentationTimestampUs",
    ]);
    expect(await writer.readOffset(muxed)).toMatchObject({ microVideoOffset: 3000 });
    expect(warn).toHaveBeenCalledWith(`The GCamera namespace already exists in ${muxed}.`);

    const output = await fs.readFile(muxed);
    expect(output.subarray(output.length - 3000).equals(video)).toBe(true);
    const header = await readJpegHeader(bufferReader(output));
    expect(header.segments.filter(isXmpSegment)).toHaveLength(1);
  });

  it("leaves a file it cannot parse untouched", async () => {
    const original = Buffer.from("definitely not a jpeg");
    const target = await writeFixture(dir, "bad.jpg", original);

    await expect(writer.writeOffset(target, 5)).rejects.toBeInstanceOf(MetadataWriteError);
    expect((await fs.readFile(target)).equals(original)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(["bad.jpg"]);
  });

  it("keeps the original file when replacing it fails", async () => {
    const original = Buffer.concat([fakeJpeg(512), fakeVideo(700)]);
    const target = await writeFixture(dir, "img.jpg", original);
    jest.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);
    const rename = jest
      .spyOn(fsPromises, "rename")
      .mockRejectedValueOnce(new Error("EXDEV: cross-device link not permitted"));

    await expect(writer.writeOffset(target, 700)).rejects.toThrow(
      `Failed to write motion photo metadata to ${target}: EXDEV: cross-device link not permitted`,
    );

    expect(rename).toHaveBeenCalledTimes(1);
    const [tempPath] = rename.mock.calls[0];
    expect(path.basename(String(tempPath))).toMatch(/^\.img\.jpg\.[0-9a-f-]{36}\.tmp$/);
    expect((await fs.readFile(target)).equals(original)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(["img.jpg"]);
  });

  it("reads back the version written in the file", async () => {
    const target = await writeFixture(
      dir,
      "v2.jpg",
      gcameraJpeg('GCamera:MicroVideo="1" GCamera:MicroVideoVersion="2" GCamera:MicroVideoOffset="77"'),
    );

    expect(await writer.readOffset(target)).toEqual({
      microVideo: 1,
      microVideoVersion: 2,
      microVideoOffset: 77,
      presentationTimestampUs: 1_500_000,
    });
  });

  it("reads nothing back when the offset is not a whole number", async () => {
    const malformed = await writeFixture(
      dir,
      "bad-offset.jpg",
      gcameraJpeg('GCamera:MicroVideo="1" GCamera:MicroVideoVersion="1" GCamera:MicroVideoOffset="12abc"'),
    );
    const noVersion = await writeFixture(
      dir,
      "no-version.jpg",
      gcameraJpeg('GCamera:MicroVideo="1" GCamera:MicroVideoOffset="12"'),
    );

    expect(await writer.readOffset(malformed)).toBeNull();
    expect(await writer.readOffset(noVersion)).toBeNull();
  });

  it("rejects a negative offset", async () => {
    const target = await writeFixture(dir, "img.jpg", fakeJpeg());
    await expect(writer.writeOffset(target, -1)).rejects.toThrow(
      `Failed to write motion photo metadata to ${target}: invalid offset -1`,
    );
  });

  it("reads nothing back from a plain JPEG", async () => {
    const target = await writeFixture(dir, "plain.jpg", fakeJpeg());
    expect(await writer.readOffset(target)).toBeNull();
    expect(await fs.readdir(path.dirname(target))).toEqual(["plain.jpg"]);
  });
});
