// API Middleware: Express request channel
// Binds the transport-neutral RequestChannel to one Express request/response pair

import type { Request, Response, CookieOptions } from 'express';
import type { RequestChannel } from '@/domain/identity/types.js';

export interface ExpressChannelOptions {
  secureCookies: boolean;
}

const URL_BASE = 'http://channel.invalid';

export class ExpressRequestChannel implements RequestChannel {
  private cleanedUrl: string | null = null;

  constructor(
    private req: Request,
    private res: Response,
    private options: ExpressChannelOptions = { secureCookies: false }
  ) {}

  getQueryParam(name: string): string | undefined {
    const value = this.req.query[name];
    if (typeof value === 'string') return value || undefined;
    if (Array.isArray(value)) {
      const first = value[0];
      return typeof first === 'string' && first ? first : undefined;
    }
    return undefined;
  }

  /**
   * Express cannot rewrite the address bar; the cleaned URL is recorded and the
   * auth middleware redirects a GET to it once resolution is done.
   */
  stripQueryParam(name: string): void {
    const url = new URL(this.cleanedUrl ?? this.req.originalUrl, URL_BASE);
    if (!url.searchParams.has(name)) return;

    url.searchParams.delete(name);
    this.cleanedUrl = `${url.pathname}${url.search}${url.hash}`;
  }

  /** Path and query without the stripped parameters, or null if nothing was stripped */
  get strippedUrl(): string | null {
    return this.cleanedUrl;
  }

  getCookie(name: string): string | undefined {
    const cookies: Record<string, unknown> = this.req.cookies ?? {};
    const value = cookies[name];
    return typeof value === 'string' && value ? value : undefined;
  }

  setCookie(name: string, value: string, maxAgeMs: number): void {
    this.res.cookie(name, value, { ...this.cookieOptions(), maxAge: maxAgeMs });
  }

  clearCookie(name: string): void {
    this.res.clearCookie(name, this.cookieOptions());
  }

  private cookieOptions(): CookieOptions {
    return {
      httpOnly: true,
      secure: this.options.secureCookies,
      sameSite: 'lax',
      path: '/',
    };
  }
}
