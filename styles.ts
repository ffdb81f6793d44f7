/**
 * Shadow DOM 内的样式，宿主页面通过 CSS 变量定制
 */
export const WIDGET_STYLES = `
:host {
  display: inline-block;
  --_accent: var(--tryon-accent, #ec4899);
  --_accent-contrast: var(--tryon-accent-contrast, #ffffff);
  --_radius: var(--tryon-radius, 10px);
  --_font: var(--tryon-font, system-ui, -apple-system, "Segoe UI", sans-serif);
  --_backdrop: var(--tryon-backdrop, rgba(17, 24, 39, 0.55));
  font-family: var(--_font);
}
button { font: inherit; cursor: pointer; }
button:disabled { cursor: not-allowed; opacity: 0.5; }
.tryon-trigger, .tryon-primary {
  display: inline-flex; align-items: center; gap: 6px;
  padding: 8px 16px; border: 0; border-radius: var(--_radius);
  background: var(--_accent); color: var(--_accent-contrast); font-weight: 600;
}
.tryon-secondary {
  display: inline-flex; align-items: center; gap: 6px;
  padding: 8px 14px; border: 1px solid #e5e7eb; border-radius: var(--_radius);
  background: #fff; color: #374151;
}
.tryon-icon-button { border: 0; background: transparent; color: #6b7280; padding: 4px; }
.tryon-backdrop {
  position: fixed; inset: 0; z-index: 2147483000;
  display: flex; align-items: center; justify-content: center;
  background: var(--_backdrop);
}
.tryon-dialog {
  width: min(1040px, calc(100vw - 32px)); max-height: calc(100vh - 32px); overflow: auto;
  background: #fff; color: #111827; border-radius: calc(var(--_radius) * 1.6);
  box-shadow: 0 20px 50px rgba(0, 0, 0, 0.25); padding: 20px;
}
.tryon-header { display: flex; align-items: center; gap: 12px; }
.tryon-header h2 { flex: 1; margin: 0; font-size: 18px; }
.tryon-basket-count { display: inline-flex; align-items: center; gap: 4px; font-size: 13px; color: #6b7280; }
.tryon-body { display: grid; grid-template-columns: repeat(auto-fit, minmax(300px, 1fr)); gap: 20px; margin-top: 16px; }
.tryon-column { display: flex; flex-direction: column; gap: 12px; min-width: 0; }
.tryon-upload {
  display: flex; align-items: center; gap: 8px; padding: 12px;
  border: 2px dashed #f9a8d4; border-radius: var(--_radius); color: #be185d; cursor: pointer;
}
.tryon-upload input { display: none; }
.tryon-placeholder, .tryon-result-empty {
  display: flex; flex-direction: column; align-items: center; justify-content: center; gap: 8px;
  min-height: 320px; background: #f9fafb; border-radius: var(--_radius); color: #9ca3af;
}
.tryon-canvas { max-width: 100%; border-radius: var(--_radius); touch-action: none; align-self: center; }
.tryon-canvas.is-painting { cursor: crosshair; }
.tryon-toolbar { display: flex; flex-wrap: wrap; align-items: center; gap: 12px; font-size: 13px; }
.tryon-toggle, .tryon-brush { display: inline-flex; align-items: center; gap: 6px; }
.tryon-result { display: flex; flex-direction: column; gap: 8px; }
.tryon-result-image { width: 100%; border-radius: var(--_radius); }
.tryon-result-grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(140px, 1fr)); gap: 12px; }
.tryon-result-cell { margin: 0; }
.tryon-result-cell img { width: 100%; border-radius: var(--_radius); }
.tryon-result-cell figcaption { font-size: 12px; margin-top: 4px; }
.tryon-link { display: inline-flex; align-items: center; gap: 4px; font-size: 13px; color: var(--_accent); }
.tryon-muted, .tryon-progress { font-size: 13px; color: #6b7280; margin: 0; }
.tryon-error { font-size: 13px; color: #b91c1c; background: #fef2f2; padding: 8px 12px; border-radius: var(--_radius); margin: 0; }
.tryon-price { color: #6b7280; }
.tryon-footer { display: flex; flex-wrap: wrap; gap: 10px; margin-top: 16px; }
.tryon-basket { list-style: none; margin: 12px 0 0; padding: 0; display: flex; flex-direction: column; gap: 6px; font-size: 13px; }
.tryon-basket li { display: flex; align-items: center; gap: 8px; }
.tryon-basket li span:first-child { flex: 1; }
.tryon-spinner {
  width: 40px; height: 40px; border-radius: 50%;
  border: 4px solid #fbcfe8; border-top-color: var(--_accent);
  animation: tryon-rotate 0.9s linear infinite;
}
.tryon-spin { animation: tryon-rotate 0.9s linear infinite; }
@keyframes tryon-rotate { to { transform: rotate(360deg); } }
`;
