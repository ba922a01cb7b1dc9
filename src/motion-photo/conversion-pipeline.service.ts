import { Inject, Injectable, Logger } from "@nestjs/common";
import { StorageService } from "../shared/storage/storage.service";
import { HeicService } from "../shared/heic/heic.service";
import {
  DirectoryCreateError,
  errorMessage,
  InputNotFoundError,
  InvalidExtensionError,
  OutputCollisionError,
  RunAbortedError,
  SizeGateSkipError,
} from "../shared/errors/motion-photo.errors";
import { ConversionOptions, ConversionReport, HousekeepingSummary } from "../types/conversion";
import {
  MAX_VIDEO_BYTES,
  MediaPair,
  PairOutcome,
  PairStage,
  PairStatus,
} from "../types/motionPhoto";
import { CONVERSION_REPORTER, ConversionReporter } from "./conversion-reporter";
import { HousekeepingService } from "./housekeeping.service";
import { MediaValidatorService } from "./media-validator.service";
import { MetadataWriterService } from "./metadata-writer.service";
import { MuxerService } from "./muxer.service";
import { PairFinderService } from "./pair-finder.service";

interface RunState {
  options: ConversionOptions;
  // Output path -> photo that produced it.
  written: Map<string, string>;
  converted: Set<string>;
}

@Injectable()
export class ConversionPipelineService {
  private readonly logger = new Logger(ConversionPipelineService.name);

  constructor(
    private readonly storageService: StorageService,
    private readonly pairFinderService: PairFinderService,
    private readonly mediaValidatorService: MediaValidatorService,
    private readonly muxerService: MuxerService,
    private readonly metadataWriterService: MetadataWriterService,
    private readonly heicService: HeicService,
    private readonly housekeepingService: HousekeepingService,
    @Inject(CONVERSION_REPORTER) private readonly reporter: ConversionReporter,
  ) {}

  /**
   * Turns every photo/clip pair under `sourceDir` into a motion photo in
   * `outputDir`, one pair at a time. A failing pair does not stop the run;
   * an unusable source or output directory does.
   */
  async run(options: ConversionOptions): Promise<ConversionReport> {
    await this.pairFinderService.assertDirectory(options.sourceDir);
    await this.storageService.ensureDirectory(options.outputDir);

    const pairs = await this.pairFinderService.findPairs(options.sourceDir, options.recursive);
    this.reporter.pairsDiscovered(options.sourceDir, pairs);

    const report: ConversionReport = {
      pairs,
      outcomes: [],
      processed: new Set<string>(),
      converted: new Set<string>(),
      processedCount: 0,
    };
    const state: RunState = { options, written: new Map(), converted: report.converted };

    if (options.signal?.aborted) {
      throw this.abort(report, pairs.length);
    }

    for (const [index, pair] of pairs.entries()) {
      const outcome = await this.processPair(pair, state);
      report.outcomes.push(outcome);
      this.reporter.pairFinished(outcome);

      if (outcome.status === PairStatus.DONE) {
        report.processed.add(pair.photoPath);
        report.processed.add(pair.videoPath);
        report.processedCount++;
      }

      // Housekeeping is skipped too: nothing is copied or deleted once stopped.
      if (options.signal?.aborted) {
        throw this.abort(report, pairs.length - index - 1);
      }
    }

    if (options.copyUnmatched || options.deleteAfterMux) {
      report.housekeeping = await this.cleanUp(report, options);
    }

    this.reporter.finished(report);
    return report;
  }

  private abort(report: ConversionReport, remaining: number): RunAbortedError {
    this.logger.warn(`Stopping with ${remaining} pair(s) left`);
    this.reporter.finished(report);
    return new RunAbortedError(remaining, report);
  }

  private async processPair(pair: MediaPair, state: RunState): Promise<PairOutcome> {
    const { options } = state;
    const isHeic = this.storageService.hasExtension(pair.photoPath, [".heic"]);
    let stage = PairStage.DISCOVERY;

    try {
      if (!options.convertAll) {
        stage = PairStage.SIZE_GATE;
        await this.checkVideoSize(pair, options.maxVideoBytes ?? MAX_VIDEO_BYTES);
      }

      stage = PairStage.COLLISION_CHECK;
      const plannedPhoto = isHeic ? this.heicService.jpegPathFor(pair.photoPath) : pair.photoPath;
      const outputPath = this.muxerService.outputPathFor(plannedPhoto, options.outputDir);
      const previous = state.written.get(outputPath);
      if (previous !== undefined) {
        throw new OutputCollisionError(outputPath, `was already written for ${previous} in this run`);
      }

      let photoPath = pair.photoPath;
      if (isHeic) {
        stage = PairStage.CODEC_CONVERSION;
        photoPath = await this.heicService.toJpeg(pair.photoPath);
        state.converted.add(photoPath);
      }

      stage = PairStage.VALIDATION;
      const validation = await this.mediaValidatorService.validate({
        photoPath,
        videoPath: pair.videoPath,
      });
      if (!validation.valid) {
        throw validation.error;
      }

      stage = PairStage.MUX;
      const output = await this.muxerService.merge(photoPath, pair.videoPath, options.outputDir);

      stage = PairStage.METADATA;
      const metadata = await this.metadataWriterService.writeOffset(
        output.outputPath,
        output.totalByteLength - output.photoByteLength,
      );

      state.written.set(output.outputPath, pair.photoPath);
      return { pair, status: PairStatus.DONE, stage: PairStage.DONE, output, metadata };
    } catch (error) {
      if (error instanceof DirectoryCreateError) {
        throw error;
      }
      return { pair, status: this.statusFor(error), stage, reason: errorMessage(error) };
    }
  }

  private async checkVideoSize(pair: MediaPair, limit: number): Promise<void> {
    const videoBytes = await this.storageService.sizeOf(pair.videoPath);
    if (videoBytes === null || videoBytes > limit) {
      throw new SizeGateSkipError(pair.photoPath, pair.videoPath, videoBytes, limit);
    }
  }

  private statusFor(error: unknown): PairStatus {
    if (error instanceof SizeGateSkipError) {
      return PairStatus.SKIPPED;
    }
    if (
      error instanceof InputNotFoundError ||
      error instanceof InvalidExtensionError ||
      error instanceof OutputCollisionError
    ) {
      return PairStatus.REJECTED;
    }
    return PairStatus.FAILED;
  }

  private async cleanUp(
    report: ConversionReport,
    options: ConversionOptions,
  ): Promise<HousekeepingSummary> {
    const summary: HousekeepingSummary = { copied: [], deleted: [], failed: [] };

    if (options.copyUnmatched) {
      const exclude = new Set([...report.processed, ...report.converted]);
      await this.housekeepingService.copyRemaining(
        options.sourceDir,
        options.outputDir,
        exclude,
        summary,
      );
    }
    if (options.deleteAfterMux) {
      this.logger.log(`Deleting ${report.processed.size + report.converted.size} consumed file(s)`);
      await this.housekeepingService.deleteFiles(
        [...report.processed, ...report.converted],
        summary,
      );
    }
    return summary;
  }
}
