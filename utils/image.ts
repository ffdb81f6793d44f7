/**
 * 画布相关的小工具
 */

export const PREVIEW_MAX_WIDTH = 480;
export const PREVIEW_MAX_HEIGHT = 640;

/**
 * 等比缩放到 maxW × maxH 以内（小图会被放大到贴边）
 */
export function fitContain(sw: number, sh: number, maxW: number, maxH: number): { w: number; h: number } {
  if (sw <= 0 || sh <= 0) return { w: 0, h: 0 };
  const r = Math.min(maxW / sw, maxH / sh);
  return { w: Math.round(sw * r), h: Math.round(sh * r) };
}

export function loadImage(url: string): Promise<HTMLImageElement> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error('Could not read this image'));
    img.src = url;
  });
}

export function canvasToBlob(canvas: HTMLCanvasElement, type: string, quality?: number): Promise<Blob> {
  return new Promise((resolve, reject) => {
    canvas.toBlob(blob => {
      if (blob) resolve(blob);
      else reject(new Error('Failed to encode image'));
    }, type, quality);
  });
}

/**
 * 把指针坐标换算成画布像素坐标（画布可能被 CSS 缩放显示）
 */
export function toCanvasPoint(
  clientX: number,
  clientY: number,
  rect: { left: number; top: number; width: number; height: number },
  canvasWidth: number,
  canvasHeight: number
): { x: number; y: number } {
  const scaleX = rect.width > 0 ? canvasWidth / rect.width : 1;
  const scaleY = rect.height > 0 ? canvasHeight / rect.height : 1;
  return {
    x: (clientX - rect.left) * scaleX,
    y: (clientY - rect.top) * scaleY,
  };
}
