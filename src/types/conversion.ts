import { MediaPair, PairOutcome } from "./motionPhoto";

export interface ConversionOptions {
  sourceDir: string;
  outputDir: string;
  recursive: boolean;
  // Bypasses the video size gate.
  convertAll: boolean;
  copyUnmatched: boolean;
  deleteAfterMux: boolean;
  maxVideoBytes?: number;
  signal?: AbortSignal;
}

export interface HousekeepingSummary {
  copied: string[];
  deleted: string[];
  failed: { path: string; reason: string }[];
}

export interface ConversionReport {
  pairs: MediaPair[];
  outcomes: PairOutcome[];
  processed: Set<string>;
  // JPEGs written beside their HEIC sources by the codec step.
  converted: Set<string>;
  processedCount: number;
  housekeeping?: HousekeepingSummary;
}
