/**
 * Prompt 构建工具
 * 生成 nano-banana/edit 使用的换装指令
 */

import type { Category } from '../../../shared/category.js';

export interface TryOnPromptOptions {
  category?: Category;
  promptExtra?: string;
  hasMask?: boolean;
}

export function buildTryOnPrompt(options: TryOnPromptOptions): string {
  const { category, promptExtra, hasMask } = options;

  let prompt =
    `Replace the person's current ${category ?? 'clothes'} with the garment shown in the second image. ` +
    "Preserve the person's identity, face, hairstyle, skin tone, body shape, pose and background. " +
    'Make the fit realistic and natural with correct lighting and fabric drape. Keep hands and accessories intact. ' +
    'Avoid changing facial features.';

  if (hasMask) {
    prompt += '\nThe third image is a mask: only change the area painted in red, keep everything else unchanged.';
  }

  const extra = promptExtra?.trim();
  if (extra) {
    prompt += `\nExtra style guidance: ${extra}`;
  }

  return prompt;
}
