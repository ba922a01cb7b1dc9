import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { StorageService } from "../shared/storage/storage.service";
import {
  DirectoryError,
  InputNotFoundError,
} from "../shared/errors/motion-photo.errors";
import {
  MediaPair,
  PHOTO_EXTENSIONS,
  VIDEO_SIBLING_EXTENSIONS,
} from "../types/motionPhoto";

@Injectable()
export class PairFinderService {
  private readonly logger = new Logger(PairFinderService.name);

  constructor(private readonly storageService: StorageService) {}

  async assertDirectory(dir: string): Promise<void> {
    if (!(await this.storageService.exists(dir))) {
      throw new InputNotFoundError("Directory", dir);
    }
    if (!(await this.storageService.isDirectory(dir))) {
      throw new DirectoryError(dir);
    }
  }

  /**
   * Finds the companion clip of a photo: a sibling with the same base name,
   * probing .mov, .mp4, .MOV, .MP4 in that order.
   */
  async matchingVideo(photoPath: string): Promise<string | null> {
    const base = photoPath.slice(0, photoPath.length - path.extname(photoPath).length);
    for (const ext of VIDEO_SIBLING_EXTENSIONS) {
      const videoPath = `${base}${ext}`;
      if (await this.storageService.isFile(videoPath)) {
        return videoPath;
      }
    }
    return null;
  }

  /**
   * Lists photo/clip candidates under a directory, in traversal order. Photos
   * without a companion clip are left out.
   */
  async findPairs(rootDir: string, recursive: boolean): Promise<MediaPair[]> {
    await this.assertDirectory(rootDir);
    this.logger.log(`Processing dir: ${rootDir}`);

    const pairs: MediaPair[] = [];
    await this.scan(rootDir, recursive, pairs);

    this.logger.log(`Found ${pairs.length} pairs.`);
    if (pairs.length > 0) {
      const sample = pairs.slice(0, 10).map((pair) => `${pair.photoPath} + ${pair.videoPath}`);
      this.logger.debug(`First pairs: ${sample.join(", ")}`);
    }
    return pairs;
  }

  private async scan(dir: string, recursive: boolean, pairs: MediaPair[]): Promise<void> {
    const entries = await this.storageService.listDirectory(dir);
    const subdirectories: string[] = [];

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        subdirectories.push(fullPath);
        continue;
      }
      const isFile =
        entry.isFile() || (entry.isSymbolicLink() && (await this.storageService.isFile(fullPath)));
      if (!isFile || !this.storageService.hasExtension(fullPath, PHOTO_EXTENSIONS)) {
        continue;
      }

      const videoPath = await this.matchingVideo(fullPath);
      if (videoPath) {
        pairs.push({ photoPath: fullPath, videoPath });
      } else {
        this.logger.verbose(`No clip found for ${fullPath}`);
      }
    }

    if (recursive) {
      for (const subdirectory of subdirectories) {
        await this.scan(subdirectory, recursive, pairs);
      }
    }
  }
}
