import type { GrayImage } from '../../types/index.js';
import { NO_MATCH, matchTemplate, scanTemplate, type MatchResult } from './template-matcher.js';

/** 축소 후에도 템플릿 짧은 변이 이 이상 남아야 한다 */
export const MIN_COARSE_SIDE = 8;
export const MAX_COARSE_FACTOR = 4;
const COARSE_CANDIDATES = 5;

export type Downscale = (image: GrayImage, factor: number) => Promise<GrayImage>;

export function coarseFactor(template: GrayImage): number {
  const side = Math.min(template.width, template.height);
  return Math.max(1, Math.min(MAX_COARSE_FACTOR, Math.floor(side / MIN_COARSE_SIDE)));
}

function crop(image: GrayImage, x: number, y: number, width: number, height: number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let row = 0; row < height; row += 1) {
    const start = (y + row) * image.width + x;
    data.set(image.data.subarray(start, start + width), row * width);
  }
  return { width, height, data };
}

/**
 * 축소 영상에서 후보 몇 곳을 찾고, 원본 해상도에서 후보 주변 ±factor만 다시 훑는다.
 * 템플릿이 작아 축소할 수 없으면 원본 전체를 훑는다.
 */
export async function locateTemplate(
  image: GrayImage,
  template: GrayImage,
  downscale: Downscale,
): Promise<MatchResult> {
  const factor = coarseFactor(template);
  if (factor === 1) return matchTemplate(image, template);

  const [smallImage, smallTemplate] = await Promise.all([
    downscale(image, factor),
    downscale(template, factor),
  ]);
  const candidates = await scanTemplate(smallImage, smallTemplate, { keep: COARSE_CANDIDATES });
  if (candidates.length === 0) return matchTemplate(image, template);

  const maxX = image.width - template.width;
  const maxY = image.height - template.height;
  let best = NO_MATCH;

  for (const candidate of candidates) {
    const x0 = Math.max(0, Math.min(maxX, candidate.x * factor - factor));
    const y0 = Math.max(0, Math.min(maxY, candidate.y * factor - factor));
    const x1 = Math.min(maxX, candidate.x * factor + factor);
    const y1 = Math.min(maxY, candidate.y * factor + factor);
    if (x1 < x0 || y1 < y0) continue;

    const region = crop(image, x0, y0, x1 - x0 + template.width, y1 - y0 + template.height);
    const [refined] = await scanTemplate(region, template);
    if (refined && refined.score > best.score) {
      best = { score: refined.score, x: x0 + refined.x, y: y0 + refined.y };
    }
  }
  return best;
}
