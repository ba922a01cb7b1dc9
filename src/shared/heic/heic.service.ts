import { Inject, Injectable, Logger } from "@nestjs/common";
import * as fs from "fs/promises";
import * as path from "path";
import { StorageService } from "../storage/storage.service";
import { CodecConversionError, errorMessage } from "../errors/motion-photo.errors";
import { insertApp1Segment } from "../jpeg/jpeg-segments";
import { extractHeicExif } from "./heic-exif";
import { HEIC_ENCODER, HeicEncoder } from "./heic-encoder";

@Injectable()
export class HeicService {
  private readonly logger = new Logger(HeicService.name);

  constructor(
    private readonly storageService: StorageService,
    @Inject(HEIC_ENCODER) private readonly encode: HeicEncoder,
  ) {}

  /**
   * Path of the JPEG written beside a HEIC source.
   */
  jpegPathFor(heicPath: string): string {
    return `${heicPath.slice(0, -path.extname(heicPath).length)}.jpg`;
  }

  /**
   * Decodes a HEIC image and writes it beside the source as a maximum-quality
   * JPEG, carrying over the Exif block.
   * @returns The path of the new JPEG.
   */
  async toJpeg(heicPath: string): Promise<string> {
    const jpegPath = this.jpegPathFor(heicPath);
    this.logger.log(`Converting ${heicPath} to ${jpegPath}`);

    if (await this.storageService.exists(jpegPath)) {
      throw new CodecConversionError(heicPath, `${jpegPath} already exists`);
    }

    try {
      const input = await fs.readFile(heicPath);
      let jpeg = await this.encode(input);

      const exif = extractHeicExif(input);
      if (exif) {
        jpeg = await this.withExif(jpeg, exif, heicPath);
      } else {
        this.logger.warn(`No Exif metadata found in ${heicPath}`);
      }

      await fs.writeFile(jpegPath, jpeg, { flag: "wx" });
    } catch (error) {
      throw new CodecConversionError(heicPath, errorMessage(error));
    }

    this.logger.log(`Converted ${heicPath}`);
    return jpegPath;
  }

  private async withExif(jpeg: Buffer, exif: Buffer, heicPath: string): Promise<Buffer> {
    try {
      return await insertApp1Segment(jpeg, exif);
    } catch (error) {
      if (error instanceof RangeError) {
        this.logger.warn(`Exif block of ${heicPath} does not fit in one JPEG segment; dropped`);
        return jpeg;
      }
      throw error;
    }
  }
}
