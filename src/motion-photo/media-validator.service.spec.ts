import { Test } from "@nestjs/testing";
import * as path from "path";
import { MediaValidatorService } from "./media-validator.service";
import { StorageService } from "../shared/storage/storage.service";
import { InputNotFoundError, InvalidExtensionError } from "../shared/errors/motion-photo.errors";
import { fakeJpeg, fakeVideo, makeTempDir, removeTempDir, writeFixture } from "../testing/media-fixtures";

describe("MediaValidatorService", () => {
  let dir: string;
  let validator: MediaValidatorService;

  beforeEach(async () => {
    dir = await makeTempDir();
    const moduleRef = await Test.createTestingModule({
      providers: [MediaValidatorService, StorageService],
    }).compile();
    validator = moduleRef.get(MediaValidatorService);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("accepts a JPEG with a MOV or MP4 clip", async () => {
    const photo = await writeFixture(dir, "a.JPEG", fakeJpeg());
    const mov = await writeFixture(dir, "a.mov", fakeVideo(10));
    const mp4 = await writeFixture(dir, "a.MP4", fakeVideo(10));

    expect(await validator.validate({ photoPath: photo, videoPath: mov })).toEqual({ valid: true });
    expect(await validator.validate({ photoPath: photo, videoPath: mp4 })).toEqual({ valid: true });
  });

  it("reports a missing photo before anything else", async () => {
    const photo = path.join(dir, "missing.heic");
    const result = await validator.validate({ photoPath: photo, videoPath: path.join(dir, "missing.mov") });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBeInstanceOf(InputNotFoundError);
      expect(result.error.message).toBe(`Photo does not exist: ${photo}`);
    }
  });

  it("reports a missing video", async () => {
    const photo = await writeFixture(dir, "a.jpg", fakeJpeg());
    const video = path.join(dir, "a.mov");
    const result = await validator.validate({ photoPath: photo, videoPath: video });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.message).toBe(`Video does not exist: ${video}`);
    }
  });

  it("rejects a photo that is not a JPEG", async () => {
    const photo = await writeFixture(dir, "a.heic", Buffer.from("heic"));
    const video = await writeFixture(dir, "a.mov", fakeVideo(10));
    const result = await validator.validate({ photoPath: photo, videoPath: video });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBeInstanceOf(InvalidExtensionError);
      expect(result.error.path).toBe(photo);
    }
  });

  it("rejects a clip that is not MOV or MP4", async () => {
    const photo = await writeFixture(dir, "a.jpg", fakeJpeg());
    const video = await writeFixture(dir, "a.avi", fakeVideo(10));
    const result = await validator.validate({ photoPath: photo, videoPath: video });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.code).toBe("INVALID_EXTENSION");
      expect(result.error.path).toBe(video);
    }
  });
});
