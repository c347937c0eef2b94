import { describe, it, expect } from 'vitest';
import { parseCookies } from '../../../../src/shared/http/cookies';
import { parseCaptchaScope } from '../../../../src/shared/http/request-context';

const SCOPE = 'AbCdEfGhIjKlMnOp_-12';

describe('parseCookies', () => {
  it('splits pairs and trims whitespace', () => {
    expect(parseCookies('a=1;  b = two ; broken; c=x=y')).toEqual({ a: '1', b: 'two', c: 'x=y' });
  });

  it('returns an empty object without a header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });
});

describe('parseCaptchaScope', () => {
  it('reads the cid cookie', () => {
    expect(parseCaptchaScope(`theme=dark; cid=${SCOPE}`)).toBe(SCOPE);
  });

  it('rejects values that are too short or carry foreign characters', () => {
    expect(parseCaptchaScope('cid=short')).toBeNull();
    expect(parseCaptchaScope('cid=AbCdEfGhIjKlMnOp:injected')).toBeNull();
  });

  it('returns null when the cookie is absent', () => {
    expect(parseCaptchaScope('theme=dark')).toBeNull();
    expect(parseCaptchaScope(undefined)).toBeNull();
  });
});
