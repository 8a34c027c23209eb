import type { GrayImage } from '../types/index.js';

export const CAPTURE_PROVIDER = Symbol('CAPTURE_PROVIDER');

/** 화면 전체 스냅샷: 실패 시 예외 (Detector가 "미검출"로 흡수) */
export interface CaptureProvider {
  capture(): Promise<GrayImage>;
}
