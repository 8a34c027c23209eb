import { Injectable } from '@nestjs/common';
import screenshotDesktop from 'screenshot-desktop';
import type { GrayImage } from '../types/index.js';
import type { CaptureProvider } from './capture.provider.js';
import { decodeToGray } from './image-codec.js';

@Injectable()
export class ScreenshotCaptureProvider implements CaptureProvider {
  private readonly screen = process.env.BOT_CAPTURE_SCREEN || undefined;

  async capture(): Promise<GrayImage> {
    const image = await screenshotDesktop({ screen: this.screen, format: 'png' });
    return decodeToGray(image);
  }
}
