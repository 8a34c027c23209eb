import { Global, Logger, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from './clock.js';
import { CAPTURE_PROVIDER } from './capture.provider.js';
import { ScreenshotCaptureProvider } from './screenshot-capture.provider.js';
import { INPUT_ACTUATOR } from './input-actuator.js';
import { XdotoolActuator } from './xdotool-actuator.js';
import { RecordingActuator } from './recording-actuator.js';
import { BotConfigService } from '../config/bot-config.service.js';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: CAPTURE_PROVIDER, useClass: ScreenshotCaptureProvider },
    {
      provide: INPUT_ACTUATOR,
      useFactory: (configService: BotConfigService) => {
        if (process.env.BOT_DRY_RUN === 'true') {
          new Logger('PlatformModule').warn('BOT_DRY_RUN enabled, inputs are recorded, not sent');
          return new RecordingActuator();
        }
        return new XdotoolActuator(configService);
      },
      inject: [BotConfigService],
    },
  ],
  exports: [CLOCK, CAPTURE_PROVIDER, INPUT_ACTUATOR],
})
export class PlatformModule {}
