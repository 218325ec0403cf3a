/** 1 inch = 72 PDF points */
const PT_PER_INCH = 72;

/** Raster pixels rendered at `dpi` -> PDF points */
export function pxToPt(px: number, dpi: number): number {
  return (px / dpi) * PT_PER_INCH;
}

/** 0-255 luminance threshold -> ImageMagick percentage */
export function thresholdToPercent(threshold: number): string {
  return `${Math.round((threshold / 255) * 10000) / 100}%`;
}
