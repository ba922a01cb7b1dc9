import { parseArgs } from "util";
import { errorMessage } from "../shared/errors/motion-photo.errors";
import { ConversionOptions } from "../types/conversion";
import { MotionPhotoConfig, parseByteCount } from "./motion-photo.config";

export const USAGE = `Usage: motion-photo-muxer <source-dir> <output-dir> [options]

Options:
  -r, --recursive         scan subdirectories of the source directory
  -a, --convert-all       ignore the video size limit
  -c, --copy-unmatched    copy unprocessed source files to the output directory
  -d, --delete-after-mux  delete photos and clips that were merged
      --max-video-bytes   size limit for clips (default 10485760)
  -h, --help              show this message`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand = { help: true } | { help: false; options: ConversionOptions };

/**
 * Merges command line arguments over the environment-backed config. Flags can
 * only switch a behaviour on; directories given on the command line win.
 */
export function resolveCliCommand(config: MotionPhotoConfig, argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
  const { values, positionals } = parsed;

  if (values.help === true) {
    return { help: true };
  }
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }

  const sourceDir = positionals[0] ?? config.sourceDir;
  const outputDir = positionals[1] ?? config.outputDir;
  if (!sourceDir) {
    throw new UsageError("A source directory is required");
  }
  if (!outputDir) {
    throw new UsageError("An output directory is required");
  }

  return {
    help: false,
    options: {
      sourceDir,
      outputDir,
      recursive: values.recursive === true || config.recursive,
      convertAll: values["convert-all"] === true || config.convertAll,
      copyUnmatched: values["copy-unmatched"] === true || config.copyUnmatched,
      deleteAfterMux: values["delete-after-mux"] === true || config.deleteAfterMux,
      maxVideoBytes: parseByteCount(values["max-video-bytes"], config.maxVideoBytes),
    },
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      recursive: { type: "boolean", short: "r", default: false },
      "convert-all": { type: "boolean", short: "a", default: false },
      "copy-unmatched": { type: "boolean", short: "c", default: false },
      "delete-after-mux": { type: "boolean", short: "d", default: false },
      "max-video-bytes": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}
