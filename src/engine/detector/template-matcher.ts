import { setImmediate as yieldToLoop } from 'timers/promises';
import type { GrayImage } from '../../types/index.js';

export interface MatchResult {
  /** 탐색 범위 중 최대 상관계수, 정렬 불가 시 -Infinity */
  score: number;
  x: number;
  y: number;
}

/** 템플릿 좌상단 좌표 범위 (양끝 포함) */
export interface SearchWindow {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface ScanOptions {
  window?: SearchWindow;
  /** 상위 몇 개 후보를 돌려줄지 */
  keep?: number;
  /** 이 횟수의 곱셈-누적마다 이벤트 루프에 양보 */
  yieldEvery?: number;
}

export const NO_MATCH: MatchResult = { score: -Infinity, x: -1, y: -1 };

const EPSILON = 1e-9;
const DEFAULT_YIELD_EVERY = 2_000_000;

/** (w+1)x(h+1) 적분 영상: 합과 제곱합 */
function buildIntegrals(image: GrayImage): { sum: Float64Array; sqSum: Float64Array } {
  const { width, height, data } = image;
  const stride = width + 1;
  const sum = new Float64Array(stride * (height + 1));
  const sqSum = new Float64Array(stride * (height + 1));

  for (let y = 0; y < height; y += 1) {
    let rowSum = 0;
    let rowSq = 0;
    for (let x = 0; x < width; x += 1) {
      const v = data[y * width + x] ?? 0;
      rowSum += v;
      rowSq += v * v;
      const i = (y + 1) * stride + (x + 1);
      sum[i] = (sum[i - stride] ?? 0) + rowSum;
      sqSum[i] = (sqSum[i - stride] ?? 0) + rowSq;
    }
  }
  return { sum, sqSum };
}

function windowTotal(table: Float64Array, stride: number, x: number, y: number, w: number, h: number): number {
  const a = table[y * stride + x] ?? 0;
  const b = table[y * stride + x + w] ?? 0;
  const c = table[(y + h) * stride + x] ?? 0;
  const d = table[(y + h) * stride + x + w] ?? 0;
  return d - b - c + a;
}

/**
 * 정규화 상호상관 (CCOEFF_NORMED).
 *
 * R(x,y) = Σ T'(i,j)·I(x+i,y+j) / sqrt(Σ T'² · Σ (I - Ī_window)²),  T' = T - mean(T)
 *
 * 윈도우 분산은 적분 영상으로 O(1), 분자는 위치마다 템플릿 크기만큼.
 * 분산이 0인 템플릿/윈도우는 0점.
 */
class Correlator {
  readonly maxX: number;
  readonly maxY: number;
  readonly costPerPosition: number;
  private readonly centered: Float64Array;
  private readonly tNormSq: number;
  private readonly sum: Float64Array;
  private readonly sqSum: Float64Array;

  constructor(
    private readonly image: GrayImage,
    private readonly template: GrayImage,
  ) {
    const n = template.width * template.height;
    this.maxX = image.width - template.width;
    this.maxY = image.height - template.height;
    this.costPerPosition = n;

    let tMean = 0;
    for (let i = 0; i < n; i += 1) tMean += template.data[i] ?? 0;
    tMean /= n;

    this.centered = new Float64Array(n);
    let tNormSq = 0;
    for (let i = 0; i < n; i += 1) {
      const v = (template.data[i] ?? 0) - tMean;
      this.centered[i] = v;
      tNormSq += v * v;
    }
    this.tNormSq = tNormSq;

    const { sum, sqSum } = buildIntegrals(image);
    this.sum = sum;
    this.sqSum = sqSum;
  }

  scoreAt(x: number, y: number): number {
    const { image, template, centered } = this;
    const tw = template.width;
    const th = template.height;
    const iw = image.width;
    const stride = iw + 1;
    const n = this.costPerPosition;

    const wSum = windowTotal(this.sum, stride, x, y, tw, th);
    const wSq = windowTotal(this.sqSum, stride, x, y, tw, th);
    const wVar = Math.max(0, wSq - (wSum * wSum) / n);
    const denom = Math.sqrt(wVar * this.tNormSq);
    if (denom <= EPSILON) return 0;

    let num = 0;
    for (let j = 0; j < th; j += 1) {
      const rowBase = (y + j) * iw + x;
      const tBase = j * tw;
      for (let i = 0; i < tw; i += 1) {
        num += (centered[tBase + i] ?? 0) * (image.data[rowBase + i] ?? 0);
      }
    }
    return Math.max(-1, Math.min(1, num / denom));
  }
}

/** 점수 내림차순 상위 keep개 유지 */
function offer(top: MatchResult[], keep: number, candidate: MatchResult): void {
  if (top.length === keep && candidate.score <= (top[keep - 1]?.score ?? -Infinity)) return;
  let i = top.length;
  while (i > 0 && (top[i - 1]?.score ?? -Infinity) < candidate.score) i -= 1;
  top.splice(i, 0, candidate);
  if (top.length > keep) top.pop();
}

/**
 * 템플릿 매칭. 일정 연산량마다 이벤트 루프에 양보하므로
 * 전체 화면을 훑는 동안에도 HTTP 요청과 타이머가 처리된다.
 * 결과는 점수 내림차순, 정렬 불가면 빈 배열.
 */
export async function scanTemplate(
  image: GrayImage,
  template: GrayImage,
  options: ScanOptions = {},
): Promise<MatchResult[]> {
  const tw = template.width;
  const th = template.height;
  if (tw === 0 || th === 0 || tw > image.width || th > image.height) return [];

  const correlator = new Correlator(image, template);
  const window = options.window;
  const x0 = Math.max(0, window?.x0 ?? 0);
  const y0 = Math.max(0, window?.y0 ?? 0);
  const x1 = Math.min(correlator.maxX, window?.x1 ?? correlator.maxX);
  const y1 = Math.min(correlator.maxY, window?.y1 ?? correlator.maxY);
  const keep = Math.max(1, options.keep ?? 1);
  const yieldEvery = options.yieldEvery ?? DEFAULT_YIELD_EVERY;

  const top: MatchResult[] = [];
  let work = 0;
  for (let y = y0; y <= y1; y += 1) {
    for (let x = x0; x <= x1; x += 1) {
      offer(top, keep, { score: correlator.scoreAt(x, y), x, y });
    }
    work += (x1 - x0 + 1) * correlator.costPerPosition;
    if (work >= yieldEvery) {
      work = 0;
      await yieldToLoop();
    }
  }
  return top;
}

/** 전체 범위 최고점 하나 */
export async function matchTemplate(image: GrayImage, template: GrayImage): Promise<MatchResult> {
  const [best] = await scanTemplate(image, template);
  return best ?? NO_MATCH;
}
