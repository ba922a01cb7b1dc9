import { registerAs } from "@nestjs/config";
import { MAX_VIDEO_BYTES } from "../types/motionPhoto";

export interface MotionPhotoConfig {
  sourceDir?: string;
  outputDir?: string;
  recursive: boolean;
  convertAll: boolean;
  copyUnmatched: boolean;
  deleteAfterMux: boolean;
  maxVideoBytes: number;
}

export function parseBoolean(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "y", "on"].includes(value.trim().toLowerCase());
}

export function parseByteCount(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const bytes = Number(value);
  if (!Number.isSafeInteger(bytes) || bytes < 0) {
    throw new Error(`Invalid byte count: ${value}`);
  }
  return bytes;
}

export default registerAs(
  "motionPhoto",
  (): MotionPhotoConfig => ({
    sourceDir: process.env.MOTION_PHOTO_SOURCE_DIR || undefined,
    outputDir: process.env.MOTION_PHOTO_OUTPUT_DIR || undefined,
    recursive: parseBoolean(process.env.MOTION_PHOTO_RECURSIVE),
    convertAll: parseBoolean(process.env.MOTION_PHOTO_CONVERT_ALL),
    copyUnmatched: parseBoolean(process.env.MOTION_PHOTO_COPY_UNMATCHED),
    deleteAfterMux: parseBoolean(process.env.MOTION_PHOTO_DELETE_AFTER_MUX),
    maxVideoBytes: parseByteCount(process.env.MOTION_PHOTO_MAX_VIDEO_BYTES, MAX_VIDEO_BYTES),
  }),
);
