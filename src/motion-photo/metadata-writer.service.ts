import { Injectable, Logger } from "@nestjs/common";
import { createReadStream, createWriteStream } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { pipeline } from "stream/promises";
import { v4 as uuidv4 } from "uuid";
import {
  errorMessage,
  MetadataNamespaceAlreadyRegisteredError,
  MetadataWriteError,
} from "../shared/errors/motion-photo.errors";
import {
  APP1,
  appInsertionIndex,
  ByteReader,
  encodeHeader,
  isXmpSegment,
  JpegHeader,
  readJpegHeader,
  XMP_SIGNATURE,
} from "../shared/jpeg/jpeg-segments";
import {
  createXmpPacket,
  GCAMERA_NAMESPACE,
  GCAMERA_PREFIX,
  listXmpKeys,
  readXmpProperties,
  registerNamespace,
  setXmpProperties,
} from "../shared/xmp/xmp-packet";
import { OffsetMetadata, PRESENTATION_TIMESTAMP_US } from "../types/motionPhoto";

interface XmpLocation {
  header: JpegHeader;
  index: number;
  xml: string | null;
}

@Injectable()
export class MetadataWriterService {
  private readonly logger = new Logger(MetadataWriterService.name);

  /**
   * Records where the clip starts in a muxed file. The offset counts bytes
   * back from the end of the file, which is what motion photo readers seek by.
   *
   * The file is rewritten through a temporary sibling that replaces it once
   * complete, so a failure leaves the original untouched. Image data and the
   * appended clip are copied verbatim; only the XMP segment changes.
   */
  async writeOffset(outputPath: string, offsetBytes: number): Promise<OffsetMetadata> {
    if (!Number.isSafeInteger(offsetBytes) || offsetBytes < 0) {
      throw new MetadataWriteError(outputPath, `invalid offset ${offsetBytes}`);
    }

    const metadata: OffsetMetadata = {
      microVideo: 1,
      microVideoVersion: 1,
      microVideoOffset: offsetBytes,
      presentationTimestampUs: PRESENTATION_TIMESTAMP_US,
    };
    const tempPath = path.join(
      path.dirname(outputPath),
      `.${path.basename(outputPath)}.${uuidv4()}.tmp`,
    );

    try {
      this.logger.log("Reading existing metadata from file.");
      const { header, index, xml } = await this.locateXmp(outputPath);

      const keys = xml ? listXmpKeys(xml) : [];
      this.logger.log(`Found XMP keys: ${JSON.stringify(keys)}`);
      if (keys.length > 0) {
        this.logger.warn("Found existing XMP keys. They *may* be affected after this process.");
      }

      const payload = Buffer.concat([
        XMP_SIGNATURE,
        Buffer.from(this.applyOffset(xml ?? createXmpPacket(), metadata, outputPath), "utf8"),
      ]);
      const segments = [...header.segments];
      const segment = { marker: APP1, offset: -1, payload };
      if (index === -1) {
        segments.splice(appInsertionIndex(segments), 0, segment);
      } else {
        segments[index] = segment;
      }
      const head = encodeHeader(segments);

      await pipeline(
        async function* () {
          yield head;
          yield* createReadStream(outputPath, { start: header.bodyOffset });
        },
        createWriteStream(tempPath, { flags: "wx" }),
      );
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((err) =>
        this.logger.warn(`Failed to delete temp file ${tempPath}: ${errorMessage(err)}`),
      );
      this.logger.error(`Metadata write failed for ${outputPath}: ${errorMessage(error)}`);
      throw error instanceof MetadataWriteError
        ? error
        : new MetadataWriteError(outputPath, errorMessage(error));
    }

    this.logger.log(`Wrote MicroVideoOffset=${offsetBytes} to ${outputPath}`);
    return metadata;
  }

  /**
   * Reads the motion photo fields back, or null when the file has none or
   * they do not hold whole numbers.
   */
  async readOffset(filePath: string): Promise<OffsetMetadata | null> {
    const { xml } = await this.locateXmp(filePath);
    if (!xml) return null;

    const properties = readXmpProperties(xml, GCAMERA_PREFIX);
    const version = parseXmpInteger(properties.MicroVideoVersion);
    const offset = parseXmpInteger(properties.MicroVideoOffset);
    const timestamp =
      properties.MicroVideoPresentationTimestampUs === undefined
        ? PRESENTATION_TIMESTAMP_US
        : parseXmpInteger(properties.MicroVideoPresentationTimestampUs);
    if (properties.MicroVideo !== "1" || version === null || offset === null || timestamp === null) {
      return null;
    }
    return {
      microVideo: 1,
      microVideoVersion: version,
      microVideoOffset: offset,
      presentationTimestampUs: timestamp,
    };
  }

  private applyOffset(xml: string, metadata: OffsetMetadata, outputPath: string): string {
    let packet = xml;
    try {
      packet = registerNamespace(packet, GCAMERA_PREFIX, GCAMERA_NAMESPACE);
    } catch (error) {
      if (!(error instanceof MetadataNamespaceAlreadyRegisteredError)) {
        throw error;
      }
      this.logger.warn(`The ${GCAMERA_PREFIX} namespace already exists in ${outputPath}.`);
    }

    return setXmpProperties(packet, GCAMERA_PREFIX, {
      MicroVideo: metadata.microVideo,
      MicroVideoVersion: metadata.microVideoVersion,
      MicroVideoOffset: metadata.microVideoOffset,
      MicroVideoPresentationTimestampUs: metadata.presentationTimestampUs,
    });
  }

  private async locateXmp(filePath: string): Promise<XmpLocation> {
    const handle = await fs.open(filePath, "r");
    try {
      const read: ByteReader = async (position, length) => {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, position);
        return buffer.subarray(0, bytesRead);
      };
      const header = await readJpegHeader(read);
      const index = header.segments.findIndex(isXmpSegment);
      const xml =
        index === -1
          ? null
          : header.segments[index].payload.subarray(XMP_SIGNATURE.length).toString("utf8");
      return { header, index, xml };
    } finally {
      await handle.close();
    }
  }
}

function parseXmpInteger(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
}
