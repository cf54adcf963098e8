/**
 * Playwright 기반 Browser Session 구현체
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리 (세션 단위)
 * 2. 자격 증명 쿠키 주입
 * 3. 네비게이션 + 본문/스크립트 평가
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright";

import type {
  BrowserSessionOptions,
  IBrowserSession,
  IBrowserSessionFactory,
  NavigateOptions,
  PageSnapshot,
} from "./IBrowserSession";
import type { CredentialCookie } from "@/core/domain/CredentialBundle";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { logger } from "@/config/logger";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

const WEBDRIVER_PATCH =
  "Object.defineProperty(navigator, 'webdriver', { get: () => false });";

type PlaywrightCookie = Parameters<BrowserContext["addCookies"]>[0][number];

/**
 * 자격 증명 쿠키 → Playwright 쿠키
 * domain이 없으면 cookieUrl 기준으로 설정
 */
export function toPlaywrightCookies(
  cookies: readonly CredentialCookie[],
  cookieUrl?: string,
): PlaywrightCookie[] {
  const converted: PlaywrightCookie[] = [];
  for (const cookie of cookies) {
    const base: PlaywrightCookie = {
      name: cookie.name,
      value: cookie.value,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    };
    if (cookie.expires !== undefined && cookie.expires > 0) {
      base.expires = cookie.expires;
    }

    if (cookie.domain) {
      converted.push({ ...base, domain: cookie.domain, path: cookie.path ?? "/" });
    } else if (cookieUrl) {
      converted.push({ ...base, url: cookieUrl });
    } else {
      logger.warn({ cookie: cookie.name }, "domain/url 없는 쿠키 건너뜀");
    }
  }
  return converted;
}

/**
 * 단일 세션 (browser + context + page 1개)
 */
export class PlaywrightBrowserSession implements IBrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {}

  async navigate(
    url: string,
    options: NavigateOptions = {},
  ): Promise<PageSnapshot> {
    const response = await this.page.goto(url, {
      waitUntil: options.waitUntil ?? "domcontentloaded",
      timeout: this.navigationTimeoutMs,
    });

    if (options.settleMs && options.settleMs > 0) {
      await this.page.waitForTimeout(options.settleMs);
    }

    const page = this.page;
    return {
      status: response ? response.status() : null,
      url: page.url(),
      body: () => page.content(),
      evaluate: (script: string) => page.evaluate<unknown>(script),
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

/**
 * 세션 팩토리
 * 세션마다 브라우저를 새로 띄움 (변환은 드물고 짧음)
 */
export class PlaywrightBrowserSessionFactory implements IBrowserSessionFactory {
  constructor(private readonly headless: boolean = true) {}

  async open(options: BrowserSessionOptions): Promise<IBrowserSession> {
    const browser = await chromium.launch({
      headless: this.headless,
      args: BROWSER_ARGS.DEFAULT,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.context.userAgent,
        locale: options.context.locale,
        timezoneId: options.context.timezoneId,
        viewport: options.context.viewport,
      });

      // Anti-detection 설정
      await context.addInitScript(WEBDRIVER_PATCH);

      if (options.cookies && options.cookies.length > 0) {
        await context.addCookies(
          toPlaywrightCookies(options.cookies, options.cookieUrl),
        );
      }

      const page = await context.newPage();
      logger.debug(
        { headless: this.headless, cookies: options.cookies?.length ?? 0 },
        "브라우저 세션 생성",
      );

      return new PlaywrightBrowserSession(
        browser,
        context,
        page,
        options.navigationTimeoutMs,
      );
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
