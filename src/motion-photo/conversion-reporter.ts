import { Injectable, Logger } from "@nestjs/common";
import { ConversionReport } from "../types/conversion";
import { MediaPair, PairOutcome, PairStatus } from "../types/motionPhoto";

export const CONVERSION_REPORTER = Symbol("CONVERSION_REPORTER");

/**
 * Receives pipeline events. Swap the provider to collect outcomes elsewhere
 * than the log.
 */
export interface ConversionReporter {
  pairsDiscovered(sourceDir: string, pairs: MediaPair[]): void;
  pairFinished(outcome: PairOutcome): void;
  finished(report: ConversionReport): void;
}

@Injectable()
export class LoggerConversionReporter implements ConversionReporter {
  private readonly logger = new Logger("ConversionReport");

  pairsDiscovered(sourceDir: string, pairs: MediaPair[]): void {
    this.logger.log(`Discovered ${pairs.length} pair(s) in ${sourceDir}`);
  }

  pairFinished(outcome: PairOutcome): void {
    const { pair, status, stage, reason } = outcome;
    switch (status) {
      case PairStatus.DONE:
        this.logger.log(
          `Created ${outcome.output?.outputPath} (MicroVideoOffset=${outcome.metadata?.microVideoOffset})`,
        );
        break;
      case PairStatus.SKIPPED:
        this.logger.warn(`Skipped ${pair.photoPath} at ${stage}: ${reason}`);
        break;
      case PairStatus.REJECTED:
      case PairStatus.FAILED:
        this.logger.error(`${status === PairStatus.REJECTED ? "Rejected" : "Failed"} ${pair.photoPath} at ${stage}: ${reason}`);
        break;
    }
  }

  finished(report: ConversionReport): void {
    this.logger.log(`Processed ${report.processedCount} of ${report.pairs.length} pair(s)`);
  }
}
