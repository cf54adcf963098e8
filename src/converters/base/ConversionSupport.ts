/**
 * 컨버터 공통 헬퍼
 *
 * 상속 대신 조합으로 사용:
 * - URL 형식 검사
 * - 마켓플레이스 일치 검사
 * - 호출 1건당 로그 레코드 1개 기록
 */

import { v7 as uuidv7 } from "uuid";
import type { AffiliateLink } from "@/core/domain/AffiliateLink";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import type {
  ConversionLogStatus,
  IConversionLogger,
} from "@/core/interfaces/IConversionLogger";
import {
  InvalidLinkError,
  errorMessage,
} from "@/core/errors/AffiliateErrors";
import { MarketplaceDetector } from "@/services/MarketplaceDetector";

/**
 * http(s) + (호스트명 | localhost | IPv4) + 선택 포트 + 선택 경로
 */
export const URL_SHAPE_PATTERN =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;

export function isWellFormedUrl(url: string): boolean {
  return URL_SHAPE_PATTERN.test(url);
}

/**
 * URL 형식 + 마켓플레이스 일치 검사
 * @throws InvalidLinkError
 */
export function assertConvertibleLink(
  url: string,
  marketplace: MarketplaceId,
): void {
  if (!isWellFormedUrl(url)) {
    throw new InvalidLinkError(`Malformed URL: ${url}`, { marketplace });
  }
  if (MarketplaceDetector.detect(url) !== marketplace) {
    throw new InvalidLinkError(`Not a ${marketplace} URL: ${url}`, {
      marketplace,
    });
  }
}

/**
 * 변환 중 수집되는 부가 정보 (로그 레코드에 포함)
 */
export interface ConversionTrace {
  readonly conversionId: string;
  productId: string | null;
}

/**
 * 변환 실행 + 결과 로그 1건 기록
 *
 * - 성공: status success
 * - 소프트 폴백: status fallback + 사유
 * - throw: status error + 메시지 (에러는 그대로 전파)
 */
export async function convertWithLogging(
  conversionLogger: IConversionLogger,
  marketplace: MarketplaceId,
  originalLink: string,
  work: (trace: ConversionTrace) => Promise<AffiliateLink>,
): Promise<AffiliateLink> {
  const trace: ConversionTrace = { conversionId: uuidv7(), productId: null };
  const startedAt = Date.now();

  const record = (
    status: ConversionLogStatus,
    convertedLink: string | null,
    error: string | null,
  ): void => {
    conversionLogger.logConversion({
      marketplace,
      originalLink,
      convertedLink,
      status,
      error,
      conversionId: trace.conversionId,
      productId: trace.productId,
      durationMs: Date.now() - startedAt,
    });
  };

  let link: AffiliateLink;
  try {
    link = await work(trace);
  } catch (error) {
    record("error", null, errorMessage(error));
    throw error;
  }

  if (link.fallbackReason !== null) {
    record("fallback", null, link.fallbackReason);
  } else {
    record("success", link.url, null);
  }
  return link;
}
