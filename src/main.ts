#!/usr/bin/env node
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { resolveCliCommand, USAGE, UsageError } from "./config/cli-options";
import { MotionPhotoConfig } from "./config/motion-photo.config";
import { ConversionPipelineService } from "./motion-photo/conversion-pipeline.service";
import { errorMessage, RunAbortedError } from "./shared/errors/motion-photo.errors";

/**
 * Runs one conversion and resolves with the process exit code.
 */
export async function bootstrap(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = new Logger("MotionPhotoMuxer");
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ["log", "warn", "error"],
  });

  const controller = new AbortController();
  const onSignal = () => {
    logger.warn("Interrupted; stopping after the current pair");
    controller.abort();
  };
  process.once("SIGINT", onSignal);

  try {
    const config = app.get(ConfigService).getOrThrow<MotionPhotoConfig>("motionPhoto");
    const command = resolveCliCommand(config, argv);
    if (command.help) {
      console.log(USAGE);
      return 0;
    }

    const report = await app
      .get(ConversionPipelineService)
      .run({ ...command.options, signal: controller.signal });
    console.log(`${report.processedCount} pair(s) processed`);
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    if (error instanceof RunAbortedError) {
      console.log(`${error.report.processedCount} pair(s) processed`);
    }
    if (error instanceof UsageError) {
      console.error(USAGE);
    }
    return 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    await app.close();
  }
}

if (require.main === module) {
  bootstrap().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    },
  );
}
