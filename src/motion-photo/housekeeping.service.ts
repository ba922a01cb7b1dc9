import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { StorageService } from "../shared/storage/storage.service";
import { errorMessage } from "../shared/errors/motion-photo.errors";
import { HousekeepingSummary } from "../types/conversion";

/**
 * Cleanup that follows a run: carrying untouched files over to the output
 * directory and removing inputs that were consumed.
 */
@Injectable()
export class HousekeepingService {
  private readonly logger = new Logger(HousekeepingService.name);

  constructor(private readonly storageService: StorageService) {}

  /**
   * Copies the top-level files of `sourceDir` that are not in `exclude` into
   * `outputDir`. Files already present in the output are left alone.
   */
  async copyRemaining(
    sourceDir: string,
    outputDir: string,
    exclude: ReadonlySet<string>,
    summary: HousekeepingSummary,
  ): Promise<void> {
    const entries = await this.storageService.listDirectory(sourceDir);
    const remaining = entries
      .filter((entry) => entry.isFile())
      .map((entry) => path.join(sourceDir, entry.name))
      .filter((file) => !exclude.has(file));

    this.logger.log(`Found ${remaining.length} remaining files that will be copied.`);
    if (remaining.length === 0) return;

    await this.storageService.ensureDirectory(outputDir);
    for (const file of remaining) {
      const destination = path.join(outputDir, path.basename(file));
      try {
        if (await this.storageService.copyFile(file, destination)) {
          summary.copied.push(file);
        } else {
          this.logger.warn(`Not copying ${file}: ${destination} already exists`);
        }
      } catch (error) {
        this.logger.error(`Error copying file '${file}': ${errorMessage(error)}`);
        summary.failed.push({ path: file, reason: errorMessage(error) });
      }
    }
  }

  async deleteFiles(files: Iterable<string>, summary: HousekeepingSummary): Promise<void> {
    for (const file of files) {
      try {
        await this.storageService.remove(file);
        this.logger.log(`Deleted file: ${file}`);
        summary.deleted.push(file);
      } catch (error) {
        this.logger.error(`Error deleting file '${file}': ${errorMessage(error)}`);
        summary.failed.push({ path: file, reason: errorMessage(error) });
      }
    }
  }
}
