/**
 * src/modules/captcha/captcha.types.ts
 */

import { z } from 'zod';
import type { RequestContext } from '../../shared/http/request-context';

/** Values kept in the captcha cache: the text, and its issue time in epoch ms. */
export const CaptchaCacheValueSchema = z.union([z.string(), z.number()]);
export type CaptchaCacheValue = z.infer<typeof CaptchaCacheValueSchema>;

/** The slice of the request the resolver needs. */
export type CaptchaRequest = Pick<RequestContext, 'captchaScope'>;

/** What the authentication layer hands over: the captcha the user typed. */
export type CaptchaAuthenticationToken = {
  captcha: string | null | undefined;
};

/** Key names as a captcha producer publishes them. */
export type CaptchaKeyConfig = {
  sessionKey?: string | null;
  sessionDate?: string | null;
};

export interface CaptchaResolver {
  init(config: CaptchaKeyConfig): void;
  init(
    captchaStoreKey: string | null | undefined,
    captchaDateStoreKey: string | null | undefined,
    captchaTimeout: number,
  ): void;

  validateToken(request: CaptchaRequest, token: CaptchaAuthenticationToken): Promise<boolean>;
  validate(request: CaptchaRequest, captchaText: string | null | undefined): Promise<boolean>;
  setCaptcha(
    request: CaptchaRequest,
    captchaText: string | null | undefined,
    captchaDate?: Date | number | null,
  ): Promise<void>;
}

export type CaptchaImageOptions = {
  width: number;
  height: number;
};

export type CaptchaTextOptions = {
  length: number;
  chars: string;
};
