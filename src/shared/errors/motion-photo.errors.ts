import { ConversionReport } from "../../types/conversion";

export type MotionPhotoErrorCode =
  | "INPUT_NOT_FOUND"
  | "INVALID_EXTENSION"
  | "SIZE_GATE_SKIP"
  | "OUTPUT_COLLISION"
  | "CODEC_CONVERSION_FAILURE"
  | "METADATA_NAMESPACE_ALREADY_REGISTERED"
  | "METADATA_WRITE_FAILURE"
  | "NOT_A_DIRECTORY"
  | "DIRECTORY_CREATE_FAILURE"
  | "RUN_ABORTED";

export abstract class MotionPhotoError extends Error {
  abstract readonly code: MotionPhotoErrorCode;

  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends MotionPhotoError {
  readonly code = "INPUT_NOT_FOUND";

  constructor(kind: "Photo" | "Video" | "Directory", path: string) {
    super(`${kind} does not exist: ${path}`, path);
  }
}

export class InvalidExtensionError extends MotionPhotoError {
  readonly code = "INVALID_EXTENSION";

  constructor(path: string, expected: readonly string[]) {
    super(`Unsupported file type (expected ${expected.join(", ")}): ${path}`, path);
  }
}

export class SizeGateSkipError extends MotionPhotoError {
  readonly code = "SIZE_GATE_SKIP";

  constructor(photoPath: string, videoPath: string, videoBytes: number | null, limit: number) {
    super(
      videoBytes === null
        ? `Skipping ${photoPath}: video ${videoPath} is missing`
        : `Skipping ${photoPath}: video ${videoPath} is ${videoBytes} bytes (limit ${limit})`,
      photoPath,
    );
  }
}

export class OutputCollisionError extends MotionPhotoError {
  readonly code = "OUTPUT_COLLISION";

  constructor(outputPath: string, reason: string) {
    super(`Output ${outputPath} ${reason}`, outputPath);
  }
}

export class CodecConversionError extends MotionPhotoError {
  readonly code = "CODEC_CONVERSION_FAILURE";

  constructor(path: string, reason: string) {
    super(`Failed to convert ${path} to JPEG: ${reason}`, path);
  }
}

export class MetadataNamespaceAlreadyRegisteredError extends MotionPhotoError {
  readonly code = "METADATA_NAMESPACE_ALREADY_REGISTERED";

  constructor(prefix: string, path?: string) {
    super(`XMP namespace ${prefix} is already registered`, path);
  }
}

export class MetadataWriteError extends MotionPhotoError {
  readonly code = "METADATA_WRITE_FAILURE";

  constructor(path: string, reason: string) {
    super(`Failed to write motion photo metadata to ${path}: ${reason}`, path);
  }
}

export class DirectoryError extends MotionPhotoError {
  readonly code = "NOT_A_DIRECTORY";

  constructor(path: string) {
    super(`Path is not a directory: ${path}`, path);
  }
}

export class DirectoryCreateError extends MotionPhotoError {
  readonly code = "DIRECTORY_CREATE_FAILURE";

  constructor(path: string, reason: string) {
    super(`Cannot create output directory ${path}: ${reason}`, path);
  }
}

/**
 * Carries what the run finished before it stopped, so callers can still
 * account for the pairs that were muxed.
 */
export class RunAbortedError extends MotionPhotoError {
  readonly code = "RUN_ABORTED";

  constructor(
    remaining: number,
    public readonly report: ConversionReport,
  ) {
    super(`Run aborted with ${remaining} pair(s) left unprocessed`);
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string") return message;
  }
  return String(error);
}
