import { Injectable } from '@nestjs/common';
import { execFile } from 'child_process';
import type { BotKey } from '../types/index.js';
import { BotConfigService } from '../config/bot-config.service.js';
import type { InputActuator } from './input-actuator.js';

const XDOTOOL_BIN = process.env.BOT_XDOTOOL_BIN || 'xdotool';

const runXdotool = (args: string[]): Promise<void> =>
  new Promise((resolve, reject) => {
    execFile(XDOTOOL_BIN, args, { timeout: 5000 }, (error, _stdout, stderr) => {
      if (error) {
        reject(new Error(stderr.trim() || error.message));
        return;
      }
      resolve();
    });
  });

/**
 * X11 키 입력: 논리 키를 keyBindings로 keysym에 매핑한 뒤 xdotool로 전달.
 * 포커스된 창(게임 클라이언트)이 입력을 받는다.
 */
@Injectable()
export class XdotoolActuator implements InputActuator {
  constructor(private readonly configService: BotConfigService) {}

  press(key: BotKey): Promise<void> {
    return runXdotool(['key', this.keysym(key)]);
  }

  keyDown(key: BotKey): Promise<void> {
    return runXdotool(['keydown', this.keysym(key)]);
  }

  keyUp(key: BotKey): Promise<void> {
    return runXdotool(['keyup', this.keysym(key)]);
  }

  private keysym(key: BotKey): string {
    return this.configService.get().keyBindings[key];
  }
}
