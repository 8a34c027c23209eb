import { setTimeout as delay } from 'timers/promises';

export const CLOCK = Symbol('CLOCK');

/**
 * 봇의 모든 대기는 Clock을 거친다.
 * 운영에서는 실제 타이머, 테스트에서는 VirtualClock으로 대기 없이 시간만 누적한다.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await delay(ms);
  }
}

/** sleep 요청 시 즉시 가상 시간을 진행하고, 이벤트 루프에 한 번 양보한다 */
export class VirtualClock implements Clock {
  private elapsed = 0;
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(private readonly startAt: number = 0) {}

  now(): number {
    return this.startAt + this.elapsed;
  }

  get totalSlept(): number {
    return this.elapsed;
  }

  async sleep(ms: number): Promise<void> {
    this.elapsed += ms;
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
