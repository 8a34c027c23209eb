import type { GrayImage } from '../../types/index.js';
import { downscaleGray } from '../../platform/image-codec.js';
import { coarseFactor, locateTemplate, type Downscale } from './coarse-to-fine.js';

/** 고정 시드 잡음 배경 */
function noise(width: number, height: number, seed = 7): GrayImage {
  const data = new Uint8Array(width * height);
  let s = seed;
  for (let i = 0; i < data.length; i++) {
    s = (Math.imul(s, 1103515245) + 12345) >>> 0;
    data[i] = s >>> 24;
  }
  return { width, height, data };
}

/** 6px 블록 단위의 비주기 패턴 */
function blocks(width: number, height: number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const bx = Math.floor(x / 6);
      const by = Math.floor(y / 6);
      data[y * width + x] = ((bx * 7 + by * 13) % 5) * 50 + 20;
    }
  }
  return { width, height, data };
}

function paste(target: GrayImage, source: GrayImage, ox: number, oy: number): GrayImage {
  const data = Uint8Array.from(target.data);
  for (let y = 0; y < source.height; y++) {
    data.set(source.data.subarray(y * source.width, (y + 1) * source.width), (oy + y) * target.width + ox);
  }
  return { ...target, data };
}

describe('coarseFactor', () => {
  it('템플릿 짧은 변 기준, 1~4', () => {
    expect(coarseFactor(blocks(3, 3))).toBe(1);
    expect(coarseFactor(blocks(48, 15))).toBe(1);
    expect(coarseFactor(blocks(48, 24))).toBe(3);
    expect(coarseFactor(blocks(200, 120))).toBe(4);
  });
});

describe('locateTemplate', () => {
  const template = blocks(48, 24);

  it('축소 탐색 후 원본 해상도에서 정확한 위치를 찾는다', async () => {
    const screen = paste(noise(400, 300), template, 100, 151);
    const result = await locateTemplate(screen, template, downscaleGray);

    expect(result).toMatchObject({ x: 100, y: 151 });
    expect(result.score).toBeCloseTo(1, 6);
  });

  it('축소 배율로 다운스케일을 호출한다', async () => {
    const factors: number[] = [];
    const spy: Downscale = (image, factor) => {
      factors.push(factor);
      return downscaleGray(image, factor);
    };
    await locateTemplate(paste(noise(200, 120), template, 30, 60), template, spy);
    expect(factors).toEqual([3, 3]);
  });

  it('작은 템플릿은 축소 없이 전체 탐색', async () => {
    const small = blocks(12, 6);
    const spy = jest.fn<Promise<GrayImage>, [GrayImage, number]>();
    const result = await locateTemplate(paste(noise(60, 40), small, 20, 9), small, spy);

    expect(spy).not.toHaveBeenCalled();
    expect(result).toMatchObject({ x: 20, y: 9 });
  });

  it('템플릿이 화면보다 크면 -Infinity', async () => {
    const result = await locateTemplate(noise(40, 20), template, downscaleGray);
    expect(result.score).toBe(-Infinity);
  });
});
