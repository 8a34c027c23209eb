/** 8-bit luma 래스터 (row-major) */
export type GrayImage = {
  width: number;
  height: number;
  data: Uint8Array;
};
