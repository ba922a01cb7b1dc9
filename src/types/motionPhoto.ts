export const PHOTO_EXTENSIONS = [".jpg", ".jpeg", ".heic"] as const;
export const JPEG_EXTENSIONS = [".jpg", ".jpeg"] as const;
export const VIDEO_EXTENSIONS = [".mov", ".mp4"] as const;

// Probe order when looking for a photo's companion clip.
export const VIDEO_SIBLING_EXTENSIONS = [".mov", ".mp4", ".MOV", ".MP4"] as const;

// 10 MiB. A clip of exactly this size still passes the gate.
export const MAX_VIDEO_BYTES = 10 * 1024 * 1024;

// Live Photos put the key frame 1.5s into the clip.
export const PRESENTATION_TIMESTAMP_US = 1_500_000;

export interface MediaPair {
  readonly photoPath: string;
  readonly videoPath: string;
}

export interface MuxedFile {
  outputPath: string;
  photoByteLength: number;
  videoByteLength: number;
  totalByteLength: number;
}

export interface OffsetMetadata {
  microVideo: 1;
  microVideoVersion: number;
  microVideoOffset: number; // bytes from EOF back to the first video byte
  presentationTimestampUs: number;
}

export enum PairStage {
  DISCOVERY = "discovery",
  SIZE_GATE = "size-gate",
  COLLISION_CHECK = "collision-check",
  CODEC_CONVERSION = "codec-conversion",
  VALIDATION = "validation",
  MUX = "mux",
  METADATA = "metadata",
  DONE = "done",
}

export enum PairStatus {
  DONE = "done",
  REJECTED = "rejected",
  SKIPPED = "skipped",
  FAILED = "failed",
}

export interface PairOutcome {
  pair: MediaPair;
  status: PairStatus;
  // Stage the pair was in when it left the pipeline.
  stage: PairStage;
  reason?: string;
  output?: MuxedFile;
  metadata?: OffsetMetadata;
}
