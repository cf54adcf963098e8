/**
 * Mercado Livre 제휴 링크 → 실제 상품 링크 추출
 *
 * 대상:
 * - 긴 형식: https://www.mercadolivre.com.br/social/{user}?...
 * - 짧은 형식: https://mercadolivre.com/sec/{code}
 * - matt_tool= 쿼리 포함 링크
 *
 * 페이지의 a/button 요소를 수집한 뒤 순서대로 전략 적용:
 * 1. 상품 href 마커를 포함한 링크
 * 2. "Ir para produto" 등 버튼/링크 주변의 상품 링크
 * 3. 상품 ID 패턴과 일치하는 아무 링크
 */

import { z } from "zod";

import type { Logger } from "@/config/logger";
import type { MercadoLivreConfig } from "@/core/domain/MarketplaceConfig";
import { ConversionError } from "@/core/errors/AffiliateErrors";
import type { IBrowserSessionFactory } from "@/scrapers/controllers/IBrowserSession";
import { withBrowserSession } from "@/scrapers/controllers/BrowserSessionScope";
import { previewLink } from "@/utils/LoggerContext";

/**
 * 페이지에서 수집한 링크 후보
 */
export const PageLinkSchema = z.object({
  tag: z.string(),
  href: z.string(),
  text: z.string(),
  /** 가장 가까운 a 요소 (자기 자신 또는 형제) href */
  closestHref: z.string(),
});

export type PageLink = z.infer<typeof PageLinkSchema>;

const PageLinksSchema = z.array(PageLinkSchema);

/**
 * 문서 순서대로 a/button 요소 수집 (페이지 컨텍스트에서 평가)
 */
export const COLLECT_LINKS_SCRIPT = `(() => Array.from(document.querySelectorAll("a, button")).map((el) => {
  const isAnchor = el.tagName === "A";
  const closest = el.closest("a") || (el.parentElement ? el.parentElement.querySelector("a") : null);
  return {
    tag: el.tagName,
    href: isAnchor ? (el.href || "") : "",
    text: (el.textContent || "").trim(),
    closestHref: closest ? (closest.href || "") : "",
  };
}))()`;

export interface UnwrapRules {
  hrefMarkers: readonly string[];
  buttonLabels: readonly string[];
  productMarker: string;
  productIdPattern: RegExp;
}

/**
 * 수집된 링크에서 상품 링크 선택 (순수 함수)
 * @returns 상품 링크 (없으면 null)
 */
export function pickProductLink(
  links: readonly PageLink[],
  rules: UnwrapRules,
): string | null {
  const anchors = links.filter((link) => link.tag.toUpperCase() === "A");

  // 1. href 마커
  for (const marker of rules.hrefMarkers) {
    const found = anchors.find((link) => link.href.includes(marker));
    if (found && found.href.includes(rules.productMarker)) {
      return found.href;
    }
  }

  // 2. 버튼 라벨 (라벨별 첫 번째 요소만 확인)
  for (const label of rules.buttonLabels) {
    const button = links.find((link) => link.text.includes(label));
    if (!button) {
      continue;
    }
    if (button.closestHref.includes(rules.productMarker)) {
      return button.closestHref;
    }
    if (
      button.tag.toUpperCase() === "A" &&
      button.href.includes(rules.productMarker)
    ) {
      return button.href;
    }
  }

  // 3. 상품 ID 패턴
  const byPattern = anchors.find(
    (link) => link.href !== "" && rules.productIdPattern.test(link.href),
  );
  return byPattern ? byPattern.href : null;
}

export class AffiliateLinkUnwrapper {
  private readonly rules: UnwrapRules;

  constructor(
    private readonly config: MercadoLivreConfig,
    private readonly browserFactory: IBrowserSessionFactory,
  ) {
    this.rules = {
      hrefMarkers: config.unwrap.hrefMarkers,
      buttonLabels: config.unwrap.buttonLabels,
      productMarker: config.unwrap.productMarker,
      productIdPattern: new RegExp(config.unwrap.productIdPattern),
    };
  }

  /**
   * 제휴 링크 여부 (경로/쿼리 마커 포함)
   */
  isAffiliateLink(url: string): boolean {
    const { pathMarkers, queryMarkers } = this.config.unwrap;
    return [...pathMarkers, ...queryMarkers].some((marker) =>
      url.includes(marker),
    );
  }

  /**
   * 제휴 페이지 방문 → 상품 링크 추출
   * @throws ConversionError 상품 링크를 찾지 못한 경우 (페이지 앞부분 포함)
   */
  async unwrap(affiliateUrl: string, log: Logger): Promise<string> {
    log.info({ url: previewLink(affiliateUrl) }, "제휴 링크 감지, 상품 링크 추출 시작");

    return withBrowserSession(
      this.browserFactory,
      {
        context: this.config.browser,
        navigationTimeoutMs: this.config.timeouts.navigationMs,
      },
      async (session) => {
        const page = await session.navigate(affiliateUrl, {
          waitUntil: "networkidle",
          settleMs: this.config.unwrap.settleMs,
        });

        const parsed = PageLinksSchema.safeParse(
          await page.evaluate(COLLECT_LINKS_SCRIPT),
        );
        const links = parsed.success ? parsed.data : [];
        const productLink = pickProductLink(links, this.rules);

        if (!productLink) {
          const snippet = (await page.body()).slice(
            0,
            this.config.unwrap.diagnosticSnippetLength,
          );
          log.error(
            { url: affiliateUrl, candidates: links.length, snippet },
            "제휴 페이지에서 상품 링크를 찾지 못함",
          );
          throw new ConversionError(
            `Could not extract product link from affiliate page: ${affiliateUrl}\n${snippet}`,
            { marketplace: "mercadolivre" },
          );
        }

        log.info({ productLink: previewLink(productLink) }, "상품 링크 추출 완료");
        return productLink;
      },
    );
  }
}
