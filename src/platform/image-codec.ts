import sharp from 'sharp';
import type { GrayImage } from '../types/index.js';

export type GrayEncoding = 'png' | 'jpeg';

/** 기준 비트맵으로 받는 확장자 (sharp 디코더 기준) */
export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'] as const;

/**
 * PNG/JPEG → 8-bit 회색조. 알파는 버린다.
 * 디코딩 실패 시 sharp 예외를 그대로 던진다.
 */
export async function decodeToGray(bytes: Buffer): Promise<GrayImage> {
  const { data, info } = await sharp(bytes)
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = info;
  if (channels === 1) {
    return { width, height, data: new Uint8Array(data) };
  }
  // 알파가 남아 있으면 채널 0(휘도)만 취한다
  const luma = new Uint8Array(width * height);
  for (let p = 0; p < luma.length; p += 1) {
    luma[p] = data[p * channels] ?? 0;
  }
  return { width, height, data: luma };
}

/** 회색조 이미지를 단일 채널 PNG/JPEG로: 테스트 픽스처와 캡처 덤프용 */
export function encodeGray(image: GrayImage, encoding: GrayEncoding = 'png'): Promise<Buffer> {
  const base = sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  });
  return encoding === 'png' ? base.png().toBuffer() : base.jpeg({ quality: 95 }).toBuffer();
}

/** 1/factor 크기로 축소 (가로세로 각각 내림) */
export async function downscaleGray(image: GrayImage, factor: number): Promise<GrayImage> {
  const width = Math.max(1, Math.floor(image.width / factor));
  const height = Math.max(1, Math.floor(image.height / factor));
  const { data, info } = await sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  })
    .resize(width, height, { fit: 'fill', kernel: 'cubic' })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data: new Uint8Array(data) };
}
