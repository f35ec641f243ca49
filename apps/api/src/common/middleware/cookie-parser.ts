// apps/api/src/common/middleware/cookie-parser.ts
import type { RequestHandler } from 'express';

type CookieParserOptions = {
  decode?(value: string): string;
};

const DEFAULT_DECODE = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const SPLIT_COOKIE = /; */;

export const parseCookies = (
  header: string | undefined,
  decode: (value: string) => string = DEFAULT_DECODE,
): Record<string, string> => {
  if (!header) return {};

  return header
    .split(SPLIT_COOKIE)
    .reduce<Record<string, string>>((acc, part) => {
      const [rawKey, ...rawValue] = part.split('=');
      if (!rawKey) return acc;
      const key = decode(rawKey.trim());
      const value =
        rawValue.length > 0 ? decode(rawValue.join('=').trim()) : '';
      acc[key] = value;
      return acc;
    }, {});
};

export const cookieParser = (options?: CookieParserOptions): RequestHandler => {
  const decode = options?.decode ?? DEFAULT_DECODE;
  return (req, _res, next) => {
    req.cookies = parseCookies(req.headers.cookie, decode);
    next();
  };
};
