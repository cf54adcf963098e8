/**
 * Mercado Livre CSRF 토큰 제공자
 *
 * - 자격 증명 쿠키를 넣은 브라우저로 페이지 방문 → meta[name=csrf-token] 읽기
 * - 페이지별 실패는 로그 후 다음 페이지 시도
 * - 토큰은 획득에 사용한 번들에 묶어 캐시 (번들이 바뀌면 재획득)
 * - 동시 요청은 Mutex로 직렬화 (번들당 획득 1회)
 */

import { Mutex } from "async-mutex";

import type { Logger } from "@/config/logger";
import type { CredentialBundle } from "@/core/domain/CredentialBundle";
import type { MercadoLivreConfig } from "@/core/domain/MarketplaceConfig";
import { ConversionError, errorMessage } from "@/core/errors/AffiliateErrors";
import type { IBrowserSessionFactory } from "@/scrapers/controllers/IBrowserSession";
import { withBrowserSession } from "@/scrapers/controllers/BrowserSessionScope";
import { previewToken } from "@/utils/LoggerContext";

/**
 * meta 태그 content 읽기 스크립트
 */
export function csrfMetaScript(metaName: string): string {
  return `document.querySelector('meta[name=${JSON.stringify(metaName)}]')?.content ?? null`;
}

interface CachedToken {
  bundle: CredentialBundle;
  token: string;
}

export class CsrfTokenProvider {
  private cached: CachedToken | null = null;
  private readonly mutex = new Mutex();

  constructor(
    private readonly config: MercadoLivreConfig,
    private readonly browserFactory: IBrowserSessionFactory,
  ) {}

  /**
   * 같은 번들로 획득한 토큰이 있으면 재사용, 없으면 새로 획득
   */
  async getToken(bundle: CredentialBundle, log: Logger): Promise<string> {
    const cached = this.cachedFor(bundle);
    if (cached) {
      return cached;
    }

    return this.mutex.runExclusive(async () => {
      const current = this.cachedFor(bundle);
      if (current) {
        return current;
      }
      const token = await this.acquire(bundle, log);
      this.cached = { bundle, token };
      return token;
    });
  }

  /**
   * 캐시 초기화 (자격 증명 재로드, 401/403 응답 시)
   */
  invalidate(): void {
    this.cached = null;
  }

  private cachedFor(bundle: CredentialBundle): string | null {
    const { cached } = this;
    return cached && cached.bundle === bundle ? cached.token : null;
  }

  private async acquire(bundle: CredentialBundle, log: Logger): Promise<string> {
    const { csrf } = this.config;

    return withBrowserSession(
      this.browserFactory,
      {
        context: this.config.browser,
        cookies: bundle.cookies,
        cookieUrl: this.config.credentials.cookieUrl,
        navigationTimeoutMs: this.config.timeouts.navigationMs,
      },
      async (session) => {
        for (const pageUrl of csrf.pages) {
          try {
            const page = await session.navigate(pageUrl, {
              waitUntil: "load",
              settleMs: csrf.settleMs,
            });
            const value = await page.evaluate(csrfMetaScript(csrf.metaName));

            if (typeof value === "string" && value.length > 0) {
              log.info(
                { page: pageUrl, token: previewToken(value) },
                "CSRF 토큰 획득",
              );
              return value;
            }
            log.warn({ page: pageUrl }, "CSRF 토큰 없음, 다음 페이지 시도");
          } catch (error) {
            log.warn(
              { page: pageUrl, error: errorMessage(error) },
              "CSRF 페이지 접근 실패, 다음 페이지 시도",
            );
          }
        }

        log.error("CSRF 토큰을 찾지 못함 (쿠키 만료/세션 무효/페이지 구조 변경 가능)");
        throw new ConversionError(
          "CSRF token not found on any Mercado Livre page",
          { marketplace: "mercadolivre" },
        );
      },
    );
  }
}
