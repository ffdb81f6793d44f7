import React from 'react';
import { createRoot, type Root } from 'react-dom/client';
import TryOnDialog from './components/TryOnDialog';
import { BasketStore } from './services/basketStore';
import { isCategory } from './shared/category';
import { WIDGET_STYLES } from './styles';
import type { WidgetConfig } from './types';

export const DEFAULT_API_ENDPOINT = '/api/tryon';
export const DEFAULT_BUTTON_TEXT = 'Try on';
export const DEFAULT_BRUSH_SIZE = 24;
export const MIN_BRUSH_SIZE = 5;
export const MAX_BRUSH_SIZE = 60;
export const DEFAULT_MAX_UPLOAD_MB = 10;

const OBSERVED_ATTRIBUTES = [
  'garment-url',
  'api-endpoint',
  'text',
  'garment-name',
  'garment-price',
  'category',
  'prompt-extra',
  'brush-size',
  'max-upload-mb',
];

function readNumber(raw: string | null, fallback: number): number {
  if (raw === null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

/**
 * 从元素属性读取配置，缺省值在这里统一补齐
 */
export function readWidgetConfig(el: Element): WidgetConfig {
  const attr = (name: string) => el.getAttribute(name)?.trim() ?? '';
  const category = attr('category').toLowerCase();
  const brush = readNumber(el.getAttribute('brush-size'), DEFAULT_BRUSH_SIZE);
  const maxMb = readNumber(el.getAttribute('max-upload-mb'), DEFAULT_MAX_UPLOAD_MB);

  return {
    garmentUrl: attr('garment-url'),
    apiEndpoint: attr('api-endpoint') || DEFAULT_API_ENDPOINT,
    text: attr('text') || DEFAULT_BUTTON_TEXT,
    garmentName: attr('garment-name'),
    garmentPrice: attr('garment-price'),
    category: isCategory(category) ? category : undefined,
    promptExtra: attr('prompt-extra') || undefined,
    brushSize: Math.min(MAX_BRUSH_SIZE, Math.max(MIN_BRUSH_SIZE, Math.round(brush))),
    maxUploadBytes: Math.round((maxMb > 0 ? maxMb : DEFAULT_MAX_UPLOAD_MB) * 1024 * 1024),
  };
}

/**
 * <tryon-button garment-url="..."></tryon-button>
 * 按钮本身是普通 DOM，弹窗打开时才挂载 React
 */
export class TryOnButton extends HTMLElement {
  static get observedAttributes(): string[] {
    return OBSERVED_ATTRIBUTES;
  }

  private readonly trigger: HTMLButtonElement;
  private readonly mount: HTMLDivElement;
  private root: Root | null = null;
  private injectedBasket: BasketStore | null = null;
  private ownBasket: BasketStore | null = null;
  private currentConfig: WidgetConfig;

  constructor() {
    super();
    const shadow = this.attachShadow({ mode: 'open' });

    const style = document.createElement('style');
    style.textContent = WIDGET_STYLES;

    this.trigger = document.createElement('button');
    this.trigger.type = 'button';
    this.trigger.className = 'tryon-trigger';
    this.trigger.setAttribute('part', 'button');
    this.trigger.addEventListener('click', () => this.open());

    this.mount = document.createElement('div');
    shadow.append(style, this.trigger, this.mount);

    this.currentConfig = readWidgetConfig(this);
    this.refresh();
  }

  get config(): WidgetConfig {
    return this.currentConfig;
  }

  get isOpen(): boolean {
    return this.root !== null;
  }

  /**
   * 多个按钮共享同一个购物篮时由页面注入；未注入则每个按钮各自一份
   */
  get basket(): BasketStore {
    if (this.injectedBasket) return this.injectedBasket;
    this.ownBasket ??= new BasketStore();
    return this.ownBasket;
  }

  set basket(store: BasketStore) {
    this.injectedBasket = store;
    this.refresh();
  }

  connectedCallback(): void {
    this.refresh();
  }

  disconnectedCallback(): void {
    this.close();
  }

  attributeChangedCallback(): void {
    this.refresh();
  }

  /**
   * 重新读取属性并同步按钮状态；弹窗打开时一并刷新
   */
  refresh(): void {
    this.currentConfig = readWidgetConfig(this);
    const { garmentUrl, text } = this.currentConfig;
    this.trigger.textContent = text;
    this.trigger.disabled = !garmentUrl;
    if (garmentUrl) {
      this.trigger.removeAttribute('title');
    } else {
      this.trigger.title = 'Missing garment-url';
    }
    if (this.root) this.renderDialog();
  }

  open(): void {
    if (!this.currentConfig.garmentUrl || this.root) return;
    this.root = createRoot(this.mount);
    this.renderDialog();
  }

  close(): void {
    const root = this.root;
    if (!root) return;
    this.root = null;
    root.unmount();
  }

  private readonly handleClose = (): void => this.close();

  private renderDialog(): void {
    this.root?.render(
      <TryOnDialog config={this.currentConfig} basket={this.basket} onClose={this.handleClose} />
    );
  }
}

export const TAG_NAME = 'tryon-button';

export function defineTryOnButton(registry: CustomElementRegistry = customElements): void {
  if (!registry.get(TAG_NAME)) {
    registry.define(TAG_NAME, TryOnButton);
  }
}

defineTryOnButton();

export { BasketStore };
