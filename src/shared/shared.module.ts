import { Global, Module } from "@nestjs/common";
import { StorageModule } from "./storage/storage.module";
import { HeicModule } from "./heic/heic.module";

@Global()
@Module({
  imports: [StorageModule, HeicModule],
  exports: [StorageModule, HeicModule],
})
export class SharedModule {}
