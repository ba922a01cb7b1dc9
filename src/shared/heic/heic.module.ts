import { Module } from "@nestjs/common";
import { StorageModule } from "../storage/storage.module";
import { HeicService } from "./heic.service";
import { encodeHeicAsJpeg, HEIC_ENCODER } from "./heic-encoder";

@Module({
  imports: [StorageModule],
  providers: [HeicService, { provide: HEIC_ENCODER, useValue: encodeHeicAsJpeg }],
  exports: [HeicService],
})
export class HeicModule {}
