import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { SharedModule } from "./shared/shared.module";
import { MotionPhotoModule } from "./motion-photo/motion-photo.module";
import motionPhotoConfig from "./config/motion-photo.config";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [motionPhotoConfig] }),
    SharedModule,
    MotionPhotoModule,
  ],
})
export class AppModule {}
