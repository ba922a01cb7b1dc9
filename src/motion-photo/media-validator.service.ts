import { Injectable, Logger } from "@nestjs/common";
import { StorageService } from "../shared/storage/storage.service";
import {
  InputNotFoundError,
  InvalidExtensionError,
  MotionPhotoError,
} from "../shared/errors/motion-photo.errors";
import { JPEG_EXTENSIONS, MediaPair, VIDEO_EXTENSIONS } from "../types/motionPhoto";

export type ValidationResult = { valid: true } | { valid: false; error: MotionPhotoError };

/**
 * Checks a pair before muxing. Only existence and file extensions are looked
 * at; file signatures are not inspected.
 */
@Injectable()
export class MediaValidatorService {
  private readonly logger = new Logger(MediaValidatorService.name);

  constructor(private readonly storageService: StorageService) {}

  async validate(pair: MediaPair): Promise<ValidationResult> {
    const error = await this.firstFailure(pair);
    if (error) {
      this.logger.error(error.message);
      return { valid: false, error };
    }
    return { valid: true };
  }

  private async firstFailure({ photoPath, videoPath }: MediaPair): Promise<MotionPhotoError | null> {
    if (!(await this.storageService.exists(photoPath))) {
      return new InputNotFoundError("Photo", photoPath);
    }
    if (!(await this.storageService.exists(videoPath))) {
      return new InputNotFoundError("Video", videoPath);
    }
    if (!this.storageService.hasExtension(photoPath, JPEG_EXTENSIONS)) {
      return new InvalidExtensionError(photoPath, JPEG_EXTENSIONS);
    }
    if (!this.storageService.hasExtension(videoPath, VIDEO_EXTENSIONS)) {
      return new InvalidExtensionError(videoPath, VIDEO_EXTENSIONS);
    }
    return null;
  }
}
