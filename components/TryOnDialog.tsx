import React, { useCallback, useEffect, useRef, useState, useSyncExternalStore } from 'react';
import { Brush, Eraser, Loader2, ShoppingBag, Sparkles, Trash2, Upload, X } from 'lucide-react';
import MaskCanvas, { type MaskCanvasHandle } from './MaskCanvas';
import ResultView from './ResultView';
import type { BasketStore } from '../services/basketStore';
import { resolveGarmentUrl, submitTryOn, validatePhotoFile } from '../services/tryOnService';
import { inferCategoryFromUrl } from '../shared/category';
import { loadImage } from '../utils/image';
import type { BasketItem, Category, TryOnOutcome, WidgetConfig } from '../types';

export const ADDED_FLASH_MS = 2000;

interface TryOnDialogProps {
  config: WidgetConfig;
  basket: BasketStore;
  onClose: () => void;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function currentGarment(config: WidgetConfig): BasketItem {
  return {
    url: config.garmentUrl,
    name: config.garmentName || 'This item',
    price: config.garmentPrice,
  };
}

const TryOnDialog: React.FC<TryOnDialogProps> = ({ config, basket, onClose }) => {
  const basketItems = useSyncExternalStore(
    useCallback((listener: () => void) => basket.subscribe(listener), [basket]),
    () => basket.items
  );

  const [photo, setPhoto] = useState<HTMLImageElement | null>(null);
  const [maskEnabled, setMaskEnabled] = useState(false);
  const [hasMask, setHasMask] = useState(false);
  const [brushSize, setBrushSize] = useState(config.brushSize);
  const [isLoading, setIsLoading] = useState(false);
  const [progress, setProgress] = useState('');
  const [error, setError] = useState('');
  const [results, setResults] = useState<TryOnOutcome[]>([]);
  const [justAdded, setJustAdded] = useState(false);

  const maskRef = useRef<MaskCanvasHandle>(null);
  const objectUrlRef = useRef<string | null>(null);
  const abortRef = useRef<AbortController | null>(null);

  useEffect(() => setBrushSize(config.brushSize), [config.brushSize]);

  // 关闭时释放本地预览地址并取消进行中的请求
  useEffect(() => () => {
    if (objectUrlRef.current) URL.revokeObjectURL(objectUrlRef.current);
    objectUrlRef.current = null;
    abortRef.current?.abort();
  }, []);

  useEffect(() => {
    const onKeyDown = (event: KeyboardEvent) => {
      if (event.key === 'Escape') onClose();
    };
    document.addEventListener('keydown', onKeyDown);
    return () => document.removeEventListener('keydown', onKeyDown);
  }, [onClose]);

  useEffect(() => {
    if (!justAdded) return;
    const timer = setTimeout(() => setJustAdded(false), ADDED_FLASH_MS);
    return () => clearTimeout(timer);
  }, [justAdded]);

  const handleFileChange = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;
    setError('');
    try {
      validatePhotoFile(file, config.maxUploadBytes);
      const url = URL.createObjectURL(file);
      if (objectUrlRef.current) URL.revokeObjectURL(objectUrlRef.current);
      objectUrlRef.current = url;
      const img = await loadImage(url);
      setResults([]);
      setProgress('');
      setPhoto(img);
    } catch (err) {
      setError(errorText(err));
    }
  };

  const categoryFor = (item: BasketItem): Category => {
    if (item.url === config.garmentUrl && config.category) return config.category;
    return inferCategoryFromUrl(item.url);
  };

  // 按顺序逐件生成，遇到第一个失败就停止
  const runTryOn = async (items: BasketItem[]) => {
    const canvas = maskRef.current;
    if (!canvas || !photo || items.length === 0 || isLoading) return;

    const controller = new AbortController();
    abortRef.current = controller;
    setIsLoading(true);
    setError('');
    setResults([]);

    try {
      setProgress('Uploading…');
      const person = await canvas.toPhotoBlob();
      const mask = await canvas.toMaskBlob();
      const outcomes: TryOnOutcome[] = [];

      for (let i = 0; i < items.length; i++) {
        const item = items[i];
        if (items.length > 1) setProgress(`Processing item ${i + 1} of ${items.length}…`);
        const result = await submitTryOn(
          config.apiEndpoint,
          {
            person,
            mask,
            garmentUrl: resolveGarmentUrl(item.url, document.baseURI),
            category: categoryFor(item),
            promptExtra: config.promptExtra,
          },
          {
            signal: controller.signal,
            onSent: items.length === 1 ? () => setProgress('Generating…') : undefined,
          }
        );
        outcomes.push({ imageUrl: result.imageUrl, item });
      }

      setResults(outcomes);
      setProgress('Done.');
    } catch (err) {
      if (controller.signal.aborted) return;
      console.error('[TryOn Dialog] Generation failed', err);
      setProgress('');
      setError(errorText(err));
    } finally {
      if (abortRef.current === controller) abortRef.current = null;
      setIsLoading(false);
    }
  };

  const handleAddToBasket = () => {
    basket.add(currentGarment(config));
    setJustAdded(true);
  };

  const handleClearMask = () => maskRef.current?.clearMask();

  return (
    <div
      className="tryon-backdrop"
      data-testid="tryon-backdrop"
      onClick={e => {
        if (e.target === e.currentTarget) onClose();
      }}
    >
      <div className="tryon-dialog" role="dialog" aria-modal="true" aria-label="Virtual try-on">
        <header className="tryon-header">
          <h2>{config.garmentName || 'Virtual try-on'}</h2>
          {basketItems.length > 0 ? (
            <span className="tryon-basket-count">
              <ShoppingBag size={14} /> Basket ({basketItems.length})
            </span>
          ) : null}
          <button type="button" className="tryon-icon-button" aria-label="Close" onClick={onClose}>
            <X size={18} />
          </button>
        </header>

        <div className="tryon-body">
          <section className="tryon-column">
            <label className="tryon-upload">
              <Upload size={16} />
              <span>{photo ? 'Choose another photo' : 'Upload a photo of yourself'}</span>
              <input
                type="file"
                accept="image/*"
                aria-label="Your photo"
                onChange={e => {
                  void handleFileChange(e);
                }}
              />
            </label>

            {photo ? (
              <MaskCanvas
                ref={maskRef}
                photo={photo}
                maskEnabled={maskEnabled}
                brushSize={brushSize}
                onMaskChange={setHasMask}
              />
            ) : (
              <div className="tryon-placeholder">No photo yet</div>
            )}

            <div className="tryon-toolbar">
              <label className="tryon-toggle">
                <input
                  type="checkbox"
                  checked={maskEnabled}
                  disabled={!photo}
                  onChange={e => setMaskEnabled(e.target.checked)}
                />
                <Brush size={14} /> Mask clothing area
              </label>
              <label className="tryon-brush">
                Brush
                <input
                  type="range"
                  min={5}
                  max={60}
                  value={brushSize}
                  disabled={!maskEnabled}
                  onChange={e => setBrushSize(Number(e.target.value))}
                />
              </label>
              <button type="button" className="tryon-secondary" disabled={!hasMask} onClick={handleClearMask}>
                <Eraser size={14} /> Clear mask
              </button>
            </div>
          </section>

          <section className="tryon-column">
            <ResultView garment={currentGarment(config)} results={results} isLoading={isLoading} progress={progress} />
            {progress && !isLoading ? <p className="tryon-progress">{progress}</p> : null}
            {error ? (
              <p className="tryon-error" role="alert">
                {error}
              </p>
            ) : null}
          </section>
        </div>

        <footer className="tryon-footer">
          <button
            type="button"
            className="tryon-primary"
            disabled={!photo || isLoading}
            onClick={() => {
              void runTryOn([currentGarment(config)]);
            }}
          >
            {isLoading ? <Loader2 size={14} className="tryon-spin" /> : <Sparkles size={14} />}
            Generate
          </button>
          <button type="button" className="tryon-secondary" onClick={handleAddToBasket}>
            {justAdded ? 'Added ✓' : 'Add to basket'}
          </button>
          {basketItems.length > 0 ? (
            <button
              type="button"
              className="tryon-secondary"
              disabled={!photo || isLoading}
              onClick={() => {
                void runTryOn([...basketItems]);
              }}
            >
              Try all items in basket ({basketItems.length})
            </button>
          ) : null}
        </footer>

        {basketItems.length > 0 ? (
          <ul className="tryon-basket">
            {basketItems.map(item => (
              <li key={item.url}>
                <span>{item.name}</span>
                {item.price ? <span className="tryon-price">{item.price}</span> : null}
                <button
                  type="button"
                  className="tryon-icon-button"
                  aria-label={`Remove ${item.name}`}
                  onClick={() => basket.remove(item.url)}
                >
                  <Trash2 size={14} />
                </button>
              </li>
            ))}
          </ul>
        ) : null}
      </div>
    </div>
  );
};

export default TryOnDialog;
