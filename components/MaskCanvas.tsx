import React, { forwardRef, useCallback, useEffect, useImperativeHandle, useRef } from 'react';
import { PREVIEW_MAX_HEIGHT, PREVIEW_MAX_WIDTH, canvasToBlob, fitContain, toCanvasPoint } from '../utils/image';

export const MASK_COLOR = 'rgba(255, 0, 0, 0.6)';
export const PHOTO_JPEG_QUALITY = 0.92;

export interface MaskCanvasHandle {
  /** 原图按画布尺寸导出的 JPEG，不含蒙版 */
  toPhotoBlob: () => Promise<Blob>;
  /** 没有涂抹时返回 null */
  toMaskBlob: () => Promise<Blob | null>;
  clearMask: () => void;
  hasMask: () => boolean;
}

interface MaskCanvasProps {
  photo: HTMLImageElement;
  maskEnabled: boolean;
  brushSize: number;
  onMaskChange?: (hasMask: boolean) => void;
}

function createLayer(width: number, height: number): HTMLCanvasElement {
  const layer = document.createElement('canvas');
  layer.width = width;
  layer.height = height;
  return layer;
}

const MaskCanvas = forwardRef<MaskCanvasHandle, MaskCanvasProps>(({ photo, maskEnabled, brushSize, onMaskChange }, ref) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const maskLayerRef = useRef<HTMLCanvasElement | null>(null);
  const strokesRef = useRef(0);
  const drawingRef = useRef(false);

  const redraw = useCallback(() => {
    const canvas = canvasRef.current;
    const ctx = canvas?.getContext('2d');
    if (!canvas || !ctx) return;
    ctx.clearRect(0, 0, canvas.width, canvas.height);
    ctx.drawImage(photo, 0, 0, canvas.width, canvas.height);
    if (maskLayerRef.current) {
      ctx.drawImage(maskLayerRef.current, 0, 0);
    }
  }, [photo]);

  // 换图时重置画布尺寸和蒙版
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const { w, h } = fitContain(photo.naturalWidth, photo.naturalHeight, PREVIEW_MAX_WIDTH, PREVIEW_MAX_HEIGHT);
    canvas.width = w;
    canvas.height = h;
    maskLayerRef.current = createLayer(w, h);
    strokesRef.current = 0;
    onMaskChange?.(false);
    redraw();
  }, [photo, redraw, onMaskChange]);

  const paint = (event: React.PointerEvent<HTMLCanvasElement>) => {
    const canvas = canvasRef.current;
    const layer = maskLayerRef.current;
    const ctx = layer?.getContext('2d');
    if (!canvas || !layer || !ctx) return;

    const { x, y } = toCanvasPoint(event.clientX, event.clientY, canvas.getBoundingClientRect(), canvas.width, canvas.height);
    ctx.fillStyle = MASK_COLOR;
    ctx.beginPath();
    ctx.arc(x, y, brushSize, 0, Math.PI * 2);
    ctx.fill();

    strokesRef.current += 1;
    if (strokesRef.current === 1) onMaskChange?.(true);
    redraw();
  };

  const handlePointerDown = (event: React.PointerEvent<HTMLCanvasElement>) => {
    if (!maskEnabled) return;
    drawingRef.current = true;
    event.currentTarget.setPointerCapture?.(event.pointerId);
    paint(event);
  };

  const handlePointerMove = (event: React.PointerEvent<HTMLCanvasElement>) => {
    if (maskEnabled && drawingRef.current) paint(event);
  };

  const stopDrawing = () => {
    drawingRef.current = false;
  };

  useImperativeHandle(ref, () => ({
    toPhotoBlob: async () => {
      const canvas = canvasRef.current;
      if (!canvas) throw new Error('Preview is not ready');
      const out = createLayer(canvas.width, canvas.height);
      const ctx = out.getContext('2d');
      if (!ctx) throw new Error('Canvas is not supported in this browser');
      ctx.drawImage(photo, 0, 0, out.width, out.height);
      return canvasToBlob(out, 'image/jpeg', PHOTO_JPEG_QUALITY);
    },
    toMaskBlob: async () => {
      const layer = maskLayerRef.current;
      if (!layer || strokesRef.current === 0) return null;
      return canvasToBlob(layer, 'image/png');
    },
    clearMask: () => {
      const layer = maskLayerRef.current;
      layer?.getContext('2d')?.clearRect(0, 0, layer.width, layer.height);
      strokesRef.current = 0;
      onMaskChange?.(false);
      redraw();
    },
    hasMask: () => strokesRef.current > 0,
  }), [photo, redraw, onMaskChange]);

  return (
    <canvas
      ref={canvasRef}
      className={`tryon-canvas${maskEnabled ? ' is-painting' : ''}`}
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={stopDrawing}
      onPointerLeave={stopDrawing}
      onPointerCancel={stopDrawing}
    />
  );
});

MaskCanvas.displayName = 'MaskCanvas';

export default MaskCanvas;
