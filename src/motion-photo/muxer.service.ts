import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { StorageService } from "../shared/storage/storage.service";
import {
  InputNotFoundError,
  OutputCollisionError,
} from "../shared/errors/motion-photo.errors";
import { MuxedFile } from "../types/motionPhoto";

@Injectable()
export class MuxerService {
  private readonly logger = new Logger(MuxerService.name);

  constructor(private readonly storageService: StorageService) {}

  /**
   * Outputs land flat in the output directory under the photo's file name.
   */
  outputPathFor(photoPath: string, outputDir: string): string {
    return path.join(outputDir, path.basename(photoPath));
  }

  /**
   * Writes the photo followed immediately by the clip into a new file. Both
   * inputs are streamed, so memory use does not grow with the clip size. An
   * existing file at the output path is overwritten.
   */
  async merge(photoPath: string, videoPath: string, outputDir: string): Promise<MuxedFile> {
    this.logger.log(`Merging ${photoPath} and ${videoPath}.`);

    const outputPath = this.outputPathFor(photoPath, outputDir);
    if (path.resolve(outputPath) === path.resolve(photoPath)) {
      throw new OutputCollisionError(outputPath, "would overwrite its own source photo");
    }

    const photoByteLength = await this.storageService.sizeOf(photoPath);
    if (photoByteLength === null) {
      throw new InputNotFoundError("Photo", photoPath);
    }
    const videoByteLength = await this.storageService.sizeOf(videoPath);
    if (videoByteLength === null) {
      throw new InputNotFoundError("Video", videoPath);
    }

    await this.storageService.ensureDirectory(outputDir);
    const totalByteLength = await this.storageService.concatenate([photoPath, videoPath], outputPath);

    if (totalByteLength !== photoByteLength + videoByteLength) {
      throw new Error(
        `Merged ${outputPath} is ${totalByteLength} bytes, expected ${photoByteLength + videoByteLength}; inputs changed during the copy`,
      );
    }

    this.logger.log("Merged photo and video.");
    return { outputPath, photoByteLength, videoByteLength, totalByteLength };
  }
}
