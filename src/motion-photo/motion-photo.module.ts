import { Module } from "@nestjs/common";
import { CONVERSION_REPORTER, LoggerConversionReporter } from "./conversion-reporter";
import { ConversionPipelineService } from "./conversion-pipeline.service";
import { HousekeepingService } from "./housekeeping.service";
import { MediaValidatorService } from "./media-validator.service";
import { MetadataWriterService } from "./metadata-writer.service";
import { MuxerService } from "./muxer.service";
import { PairFinderService } from "./pair-finder.service";

@Module({
  providers: [
    PairFinderService,
    MediaValidatorService,
    MuxerService,
    MetadataWriterService,
    HousekeepingService,
    ConversionPipelineService,
    { provide: CONVERSION_REPORTER, useClass: LoggerConversionReporter },
  ],
  exports: [ConversionPipelineService, MetadataWriterService],
})
export class MotionPhotoModule {}
