/**
 * src/modules/captcha/captcha-challenge.ts
 *
 * WHY:
 * - A challenge is the answer text plus an SVG picture of it.
 * - svg-captcha draws every glyph as a <path> outline from an embedded font,
 *   so the answer never appears in the markup.
 *
 * RULES:
 * - Pure apart from randomness; no I/O.
 * - The default alphabet leaves out glyphs that read alike once distorted
 *   (0/o, 1/l/i, 9/q).
 */

import { create } from 'svg-captcha';
import type { CaptchaImageOptions, CaptchaTextOptions } from './captcha.types';

export const DEFAULT_CAPTCHA_TEXT_OPTIONS: CaptchaTextOptions = {
  length: 5,
  chars: 'abcde2345678gfynmnpwx',
};

export const DEFAULT_CAPTCHA_IMAGE_OPTIONS: CaptchaImageOptions = {
  width: 150,
  height: 50,
};

const NOISE_LINES = 3;

export type CaptchaChallenge = {
  text: string;
  svg: string;
};

export function createCaptchaChallenge(
  text: CaptchaTextOptions = DEFAULT_CAPTCHA_TEXT_OPTIONS,
  image: CaptchaImageOptions = DEFAULT_CAPTCHA_IMAGE_OPTIONS,
): CaptchaChallenge {
  if (text.length < 1) throw new RangeError('Captcha length must be at least 1');
  if (text.chars.length === 0) throw new RangeError('Captcha alphabet must not be empty');

  const captcha = create({
    size: text.length,
    charPreset: text.chars,
    width: image.width,
    height: image.height,
    noise: NOISE_LINES,
    background: '#f4f4f4',
  });

  return { text: captcha.text, svg: captcha.data };
}
