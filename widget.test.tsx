// @vitest-environment jsdom
import { act } from 'react';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { BasketStore, TryOnButton, readWidgetConfig } from './widget';

beforeAll(() => {
  Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);
});

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  act(() => {
    document.body.replaceChildren();
  });
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

function mountButton(attrs: Record<string, string> = {}): TryOnButton {
  const el = document.createElement('tryon-button');
  if (!(el instanceof TryOnButton)) throw new Error('tryon-button is not registered');
  for (const [name, value] of Object.entries(attrs)) {
    el.setAttribute(name, value);
  }
  document.body.append(el);
  return el;
}

function shadowOf(el: TryOnButton): ShadowRoot {
  if (!el.shadowRoot) throw new Error('no shadow root');
  return el.shadowRoot;
}

function triggerOf(el: TryOnButton): HTMLButtonElement {
  const button = shadowOf(el).querySelector('[part="button"]');
  if (!(button instanceof HTMLButtonElement)) throw new Error('trigger not found');
  return button;
}

function buttonByText(el: TryOnButton, text: string): HTMLButtonElement {
  const match = Array.from(shadowOf(el).querySelectorAll('button')).find(b => b.textContent?.trim() === text);
  if (!match) throw new Error(`button "${text}" not found`);
  return match;
}

function buttonByLabel(el: TryOnButton, label: string): HTMLButtonElement {
  const match = shadowOf(el).querySelector(`button[aria-label="${label}"]`);
  if (!(match instanceof HTMLButtonElement)) throw new Error(`button [${label}] not found`);
  return match;
}

function dialogOf(el: TryOnButton): Element | null {
  return shadowOf(el).querySelector('[role="dialog"]');
}

function openDialog(el: TryOnButton): void {
  act(() => {
    triggerOf(el).click();
  });
}

const JACKET = {
  'garment-url': 'https://shop.test/img/rain-jacket.jpg',
  'garment-name': 'Rain Jacket',
  'garment-price': '€89',
};

describe('readWidgetConfig', () => {
  it('fills in defaults', () => {
    const el = document.createElement('div');

    expect(readWidgetConfig(el)).toEqual({
      garmentUrl: '',
      apiEndpoint: '/api/tryon',
      text: 'Try on',
      garmentName: '',
      garmentPrice: '',
      category: undefined,
      promptExtra: undefined,
      brushSize: 24,
      maxUploadBytes: 10 * 1024 * 1024,
    });
  });

  it('clamps the brush size', () => {
    const el = document.createElement('div');

    el.setAttribute('brush-size', '100');
    expect(readWidgetConfig(el).brushSize).toBe(60);
    el.setAttribute('brush-size', '1');
    expect(readWidgetConfig(el).brushSize).toBe(5);
    el.setAttribute('brush-size', 'wide');
    expect(readWidgetConfig(el).brushSize).toBe(24);
  });

  it('accepts known categories case-insensitively', () => {
    const el = document.createElement('div');

    el.setAttribute('category', 'Dress');
    expect(readWidgetConfig(el).category).toBe('dress');
    el.setAttribute('category', 'hat');
    expect(readWidgetConfig(el).category).toBeUndefined();
  });

  it('reads the upload limit in megabytes', () => {
    const el = document.createElement('div');
    el.setAttribute('max-upload-mb', '2');

    expect(readWidgetConfig(el).maxUploadBytes).toBe(2 * 1024 * 1024);
  });
});

describe('<tryon-button>', () => {
  it('is disabled until a garment url is set', () => {
    const el = mountButton();
    const trigger = triggerOf(el);

    expect(trigger.textContent).toBe('Try on');
    expect(trigger.disabled).toBe(true);
    expect(trigger.title).toBe('Missing garment-url');

    el.setAttribute('garment-url', 'shirt-blue.jpg');

    expect(trigger.disabled).toBe(false);
    expect(trigger.hasAttribute('title')).toBe(false);
  });

  it('picks up attribute changes', () => {
    const el = mountButton(JACKET);

    el.setAttribute('text', 'Virtual fitting');

    expect(triggerOf(el).textContent).toBe('Virtual fitting');
    expect(el.config.garmentName).toBe('Rain Jacket');
  });

  it('does not open without a garment url', () => {
    const el = mountButton();

    act(() => el.open());

    expect(dialogOf(el)).toBeNull();
  });

  it('opens the dialog without any network traffic', () => {
    const el = mountButton(JACKET);

    openDialog(el);

    expect(el.isOpen).toBe(true);
    expect(dialogOf(el)?.querySelector('h2')?.textContent).toBe('Rain Jacket');
    expect(buttonByText(el, 'Generate').disabled).toBe(true);
    expect(shadowOf(el).querySelector('.tryon-basket-count')).toBeNull();
    expect(shadowOf(el).querySelector('.tryon-result-image')?.getAttribute('src')).toBe('https://shop.test/img/rain-jacket.jpg');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('closes on Escape', () => {
    const el = mountButton(JACKET);
    openDialog(el);

    act(() => {
      document.dispatchEvent(new KeyboardEvent('keydown', { key: 'Escape' }));
    });

    expect(dialogOf(el)).toBeNull();
    expect(el.isOpen).toBe(false);
  });

  it('closes on a backdrop click but not on a click inside', () => {
    const el = mountButton(JACKET);
    openDialog(el);

    act(() => {
      dialogOf(el)?.querySelector('h2')?.dispatchEvent(new MouseEvent('click', { bubbles: true }));
    });
    expect(dialogOf(el)).not.toBeNull();

    act(() => {
      shadowOf(el).querySelector('.tryon-backdrop')?.dispatchEvent(new MouseEvent('click', { bubbles: true }));
    });
    expect(dialogOf(el)).toBeNull();
  });

  it('closes from the close button', () => {
    const el = mountButton(JACKET);
    openDialog(el);

    act(() => {
      buttonByLabel(el, 'Close').click();
    });

    expect(dialogOf(el)).toBeNull();
  });

  it('closes when removed from the page', () => {
    const el = mountButton(JACKET);
    openDialog(el);

    act(() => {
      el.remove();
    });

    expect(el.isOpen).toBe(false);
  });

  it('re-renders an open dialog on attribute change', () => {
    const el = mountButton(JACKET);
    openDialog(el);

    act(() => {
      el.setAttribute('garment-name', 'Wool Coat');
    });

    expect(dialogOf(el)?.querySelector('h2')?.textContent).toBe('Wool Coat');
  });

  it('shows an error for a file that is not an image', async () => {
    const el = mountButton(JACKET);
    openDialog(el);
    const input = shadowOf(el).querySelector('input[type="file"]');
    if (!(input instanceof HTMLInputElement)) throw new Error('file input not found');
    Object.defineProperty(input, 'files', {
      value: [new File(['hello'], 'notes.txt', { type: 'text/plain' })],
    });

    await act(async () => {
      input.dispatchEvent(new Event('change', { bubbles: true }));
    });

    expect(shadowOf(el).querySelector('[role="alert"]')?.textContent).toBe('Please choose an image file');
    expect(buttonByText(el, 'Generate').disabled).toBe(true);
  });
});

describe('basket', () => {
  it('gives each button its own basket unless one is injected', () => {
    const a = mountButton(JACKET);
    const b = mountButton(JACKET);

    expect(a.basket).not.toBe(b.basket);

    const shared = new BasketStore();
    a.basket = shared;
    b.basket = shared;

    expect(a.basket).toBe(shared);
    expect(b.basket).toBe(shared);
  });

  it('adds the current garment and flashes a confirmation', () => {
    vi.useFakeTimers();
    const basket = new BasketStore();
    const el = mountButton(JACKET);
    el.basket = basket;
    openDialog(el);

    act(() => {
      buttonByText(el, 'Add to basket').click();
    });

    expect(basket.items).toEqual([{ url: 'https://shop.test/img/rain-jacket.jpg', name: 'Rain Jacket', price: '€89' }]);
    expect(buttonByText(el, 'Added ✓')).toBeDefined();
    expect(shadowOf(el).querySelector('.tryon-basket-count')?.textContent?.trim()).toBe('Basket (1)');
    expect(buttonByText(el, 'Try all items in basket (1)').disabled).toBe(true);

    act(() => {
      vi.advanceTimersByTime(2000);
    });

    expect(buttonByText(el, 'Add to basket')).toBeDefined();
  });

  it('follows changes made by other buttons sharing the basket', () => {
    const basket = new BasketStore();
    const el = mountButton(JACKET);
    el.basket = basket;
    openDialog(el);

    act(() => {
      basket.add({ url: 'https://shop.test/img/slim-jeans.jpg', name: 'Slim Jeans', price: '€59' });
    });

    expect(shadowOf(el).querySelector('.tryon-basket-count')?.textContent?.trim()).toBe('Basket (1)');
    expect(shadowOf(el).querySelector('.tryon-basket li')?.textContent).toContain('Slim Jeans');
  });

  it('removes items from the dialog', () => {
    const basket = new BasketStore();
    basket.add({ url: 'https://shop.test/img/slim-jeans.jpg', name: 'Slim Jeans', price: '€59' });
    const el = mountButton(JACKET);
    el.basket = basket;
    openDialog(el);

    act(() => {
      buttonByLabel(el, 'Remove Slim Jeans').click();
    });

    expect(basket.items).toEqual([]);
    expect(shadowOf(el).querySelector('.tryon-basket')).toBeNull();
    expect(shadowOf(el).querySelector('.tryon-basket-count')).toBeNull();
  });
});

describe('generating a try-on', () => {
  const canvasProto = HTMLCanvasElement.prototype;
  const originalGetContext = Object.getOwnPropertyDescriptor(canvasProto, 'getContext');
  const originalToBlob = Object.getOwnPropertyDescriptor(canvasProto, 'toBlob');
  const originalCreateObjectURL = Object.getOwnPropertyDescriptor(URL, 'createObjectURL');
  const originalRevokeObjectURL = Object.getOwnPropertyDescriptor(URL, 'revokeObjectURL');

  const context2d = {
    fillStyle: '',
    clearRect: vi.fn(),
    drawImage: vi.fn(),
    beginPath: vi.fn(),
    arc: vi.fn(),
    fill: vi.fn(),
  };
  const createObjectURL = vi.fn<(blob: Blob) => string>();
  const revokeObjectURL = vi.fn<(url: string) => void>();
  let heldBlobs: Array<() => void> = [];
  let holdBlobs = false;

  // 假的 Image：设置 src 后立即触发 onload
  class LoadedImage {
    onload: (() => void) | null = null;
    onerror: (() => void) | null = null;
    naturalWidth = 800;
    naturalHeight = 1200;

    set src(_value: string) {
      queueMicrotask(() => this.onload?.());
    }
  }

  function restore(target: object, key: string, descriptor: PropertyDescriptor | undefined): void {
    if (descriptor) {
      Object.defineProperty(target, key, descriptor);
    } else {
      Reflect.deleteProperty(target, key);
    }
  }

  beforeEach(() => {
    heldBlobs = [];
    holdBlobs = false;
    let objectUrlCount = 0;
    createObjectURL.mockReset().mockImplementation(() => `blob:photo-${++objectUrlCount}`);
    revokeObjectURL.mockReset();

    Object.defineProperty(canvasProto, 'getContext', { configurable: true, writable: true, value: () => context2d });
    Object.defineProperty(canvasProto, 'toBlob', {
      configurable: true,
      writable: true,
      value: (callback: (blob: Blob | null) => void, type?: string) => {
        const emit = () => callback(new Blob(['encoded'], { type: type ?? 'image/png' }));
        if (holdBlobs) heldBlobs.push(emit);
        else emit();
      },
    });
    Object.defineProperty(URL, 'createObjectURL', { configurable: true, writable: true, value: createObjectURL });
    Object.defineProperty(URL, 'revokeObjectURL', { configurable: true, writable: true, value: revokeObjectURL });
    vi.stubGlobal('Image', LoadedImage);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    // 先卸载弹窗，卸载时还会用到上面替换的 URL 方法
    act(() => {
      document.body.replaceChildren();
    });
    restore(canvasProto, 'getContext', originalGetContext);
    restore(canvasProto, 'toBlob', originalToBlob);
    restore(URL, 'createObjectURL', originalCreateObjectURL);
    restore(URL, 'revokeObjectURL', originalRevokeObjectURL);
    vi.restoreAllMocks();
  });

  async function settle(): Promise<void> {
    await act(async () => {
      await new Promise(resolve => setTimeout(resolve, 0));
    });
  }

  function deferredResponse(): { promise: Promise<Response>; resolve: (response: Response) => void } {
    let resolve: (response: Response) => void = () => undefined;
    const promise = new Promise<Response>(r => {
      resolve = r;
    });
    return { promise, resolve };
  }

  function okResponse(imageUrl: string): Response {
    return new Response(JSON.stringify({ imageUrl }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  function progressOf(el: TryOnButton): string | null | undefined {
    return shadowOf(el).querySelector('.tryon-result-empty .tryon-muted, .tryon-progress')?.textContent;
  }

  function sentForm(call: number): FormData {
    const body = fetchMock.mock.calls[call]?.[1]?.body;
    if (!(body instanceof FormData)) throw new Error(`request ${call} had no form body`);
    return body;
  }

  async function choosePhoto(el: TryOnButton, name = 'me.jpg'): Promise<void> {
    const input = shadowOf(el).querySelector('input[type="file"]');
    if (!(input instanceof HTMLInputElement)) throw new Error('file input not found');
    Object.defineProperty(input, 'files', {
      configurable: true,
      value: [new File(['jpeg-bytes'], name, { type: 'image/jpeg' })],
    });
    await act(async () => {
      input.dispatchEvent(new Event('change', { bubbles: true }));
    });
    await settle();
  }

  async function openWithPhoto(attrs: Record<string, string> = JACKET): Promise<TryOnButton> {
    const el = mountButton(attrs);
    openDialog(el);
    await choosePhoto(el);
    return el;
  }

  it('fits the photo into the preview canvas', async () => {
    const el = await openWithPhoto();

    const canvas = shadowOf(el).querySelector('canvas');
    expect(canvas?.width).toBe(427);
    expect(canvas?.height).toBe(640);
    expect(buttonByText(el, 'Generate').disabled).toBe(false);
  });

  it('walks through Uploading, Generating and Done and shows the result', async () => {
    holdBlobs = true;
    const reply = deferredResponse();
    fetchMock.mockReturnValueOnce(reply.promise);
    const el = await openWithPhoto();

    act(() => {
      buttonByText(el, 'Generate').click();
    });
    await settle();
    expect(progressOf(el)).toBe('Uploading…');
    expect(fetchMock).not.toHaveBeenCalled();

    await act(async () => {
      heldBlobs.splice(0).forEach(emit => emit());
    });
    await settle();
    expect(progressOf(el)).toBe('Generating…');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await act(async () => {
      reply.resolve(okResponse('http://proxy.test/tmp/0123456789abcdef.jpg'));
    });
    await settle();

    expect(progressOf(el)).toBe('Done.');
    const images = shadowOf(el).querySelectorAll('.tryon-result-image');
    expect(images).toHaveLength(1);
    expect(images[0].getAttribute('src')).toBe('http://proxy.test/tmp/0123456789abcdef.jpg');

    const [url] = fetchMock.mock.calls[0];
    expect(url).toBe('/api/tryon');
    const form = sentForm(0);
    expect(form.get('garmentUrl')).toBe('https://shop.test/img/rain-jacket.jpg');
    expect(form.get('category')).toBe('outerwear');
    expect(form.get('person')).toBeInstanceOf(Blob);
    expect(form.get('mask')).toBeNull();
  });

  it('clears the progress and shows the status line on failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>bad gateway</html>', { status: 502, statusText: 'Bad Gateway' }));
    const el = await openWithPhoto();

    act(() => {
      buttonByText(el, 'Generate').click();
    });
    await settle();

    expect(shadowOf(el).querySelector('[role="alert"]')?.textContent).toBe('502 Bad Gateway');
    expect(progressOf(el)).toBeUndefined();
    expect(shadowOf(el).querySelector('.tryon-result-image')?.getAttribute('src')).toBe('https://shop.test/img/rain-jacket.jpg');
    expect(buttonByText(el, 'Generate').disabled).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('shows a network error message', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('Failed to fetch'));
    const el = await openWithPhoto();

    act(() => {
      buttonByText(el, 'Generate').click();
    });
    await settle();

    expect(shadowOf(el).querySelector('[role="alert"]')?.textContent).toBe('Failed to fetch');
  });

  it('sends a mask only after the user paints one', async () => {
    fetchMock.mockResolvedValueOnce(okResponse('http://proxy.test/tmp/aaaaaaaaaaaaaaaa.jpg'));
    const el = await openWithPhoto();
    const toggle = shadowOf(el).querySelector('.tryon-toggle input');
    const canvas = shadowOf(el).querySelector('canvas');
    if (!(toggle instanceof HTMLInputElement) || !canvas) throw new Error('mask controls not found');
    Object.defineProperty(canvas, 'setPointerCapture', { configurable: true, value: vi.fn() });
    expect(buttonByText(el, 'Clear mask').disabled).toBe(true);

    act(() => {
      toggle.click();
    });
    act(() => {
      canvas.dispatchEvent(new MouseEvent('pointerdown', { bubbles: true, clientX: 40, clientY: 50 }));
      canvas.dispatchEvent(new MouseEvent('pointerup', { bubbles: true }));
    });

    expect(context2d.arc).toHaveBeenCalledWith(40, 50, 24, 0, Math.PI * 2);
    expect(buttonByText(el, 'Clear mask').disabled).toBe(false);

    act(() => {
      buttonByText(el, 'Generate').click();
    });
    await settle();

    const mask = sentForm(0).get('mask');
    expect(mask).toBeInstanceOf(Blob);
    expect(mask instanceof Blob ? mask.type : '').toBe('image/png');
  });

  it('tries each basket item in turn', async () => {
    const first = deferredResponse();
    const second = deferredResponse();
    fetchMock.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const basket = new BasketStore();
    basket.add({ url: 'https://shop.test/img/rain-jacket.jpg', name: 'Rain Jacket', price: '€89' });
    basket.add({ url: 'https://shop.test/img/slim-jeans.jpg', name: 'Slim Jeans', price: '€59' });
    const el = mountButton(JACKET);
    el.basket = basket;
    openDialog(el);
    await choosePhoto(el);

    act(() => {
      buttonByText(el, 'Try all items in basket (2)').click();
    });
    await settle();
    expect(progressOf(el)).toBe('Processing item 1 of 2…');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await act(async () => {
      first.resolve(okResponse('http://proxy.test/tmp/1111111111111111.jpg'));
    });
    await settle();
    expect(progressOf(el)).toBe('Processing item 2 of 2…');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sentForm(1).get('garmentUrl')).toBe('https://shop.test/img/slim-jeans.jpg');
    expect(sentForm(1).get('category')).toBe('bottom');

    await act(async () => {
      second.resolve(okResponse('http://proxy.test/tmp/2222222222222222.jpg'));
    });
    await settle();

    expect(progressOf(el)).toBe('Done.');
    const cells = Array.from(shadowOf(el).querySelectorAll('.tryon-result-grid img')).map(img => [
      img.getAttribute('alt'),
      img.getAttribute('src'),
    ]);
    expect(cells).toEqual([
      ['Try-on result: Rain Jacket', 'http://proxy.test/tmp/1111111111111111.jpg'],
      ['Try-on result: Slim Jeans', 'http://proxy.test/tmp/2222222222222222.jpg'],
    ]);
  });

  it('stops the basket run at the first failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 502, statusText: 'Bad Gateway' }));
    const basket = new BasketStore();
    basket.add({ url: 'https://shop.test/img/rain-jacket.jpg', name: 'Rain Jacket', price: '€89' });
    basket.add({ url: 'https://shop.test/img/slim-jeans.jpg', name: 'Slim Jeans', price: '€59' });
    const el = mountButton(JACKET);
    el.basket = basket;
    openDialog(el);
    await choosePhoto(el);

    act(() => {
      buttonByText(el, 'Try all items in basket (2)').click();
    });
    await settle();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(shadowOf(el).querySelector('[role="alert"]')?.textContent).toBe('502 Bad Gateway');
    expect(shadowOf(el).querySelector('.tryon-result-grid')).toBeNull();
  });

  it('revokes the photo url when a new photo replaces it and when the dialog closes', async () => {
    const el = await openWithPhoto();
    expect(createObjectURL).toHaveBeenCalledTimes(1);
    expect(revokeObjectURL).not.toHaveBeenCalled();

    await choosePhoto(el, 'second.jpg');
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:photo-1');

    act(() => {
      document.dispatchEvent(new KeyboardEvent('keydown', { key: 'Escape' }));
    });

    expect(el.isOpen).toBe(false);
    expect(revokeObjectURL.mock.calls).toEqual([['blob:photo-1'], ['blob:photo-2']]);
  });
});
