/**
 * 제휴 링크 / 변환 결과 도메인 모델
 */

import type { MarketplaceId } from "@/core/domain/MarketplaceId";

/**
 * 컨버터가 반환하는 제휴 링크
 *
 * fallbackReason이 있으면 컨버터가 소프트 폴백으로 원본 링크를 돌려준 것
 */
export interface AffiliateLink {
  readonly url: string;
  readonly marketplace: MarketplaceId;
  readonly fallbackReason: string | null;
}

export type ConversionStatus = "success" | "fallback";

/**
 * Manager가 호출자에게 반환하는 최종 결과
 *
 * - link는 항상 비어 있지 않음 (실패 시 원본 링크)
 * - error는 status가 fallback일 때만 존재
 */
export type ConversionResult =
  | {
      link: string;
      status: "success";
      marketplace: string;
      error: null;
    }
  | {
      link: string;
      status: "fallback";
      marketplace: string;
      error: string;
    };

export function convertedLink(
  url: string,
  marketplace: MarketplaceId,
): AffiliateLink {
  return { url, marketplace, fallbackReason: null };
}

export function fallbackLink(
  originalUrl: string,
  marketplace: MarketplaceId,
  reason: string,
): AffiliateLink {
  return { url: originalUrl, marketplace, fallbackReason: reason };
}

export function successResult(
  link: string,
  marketplace: string,
): ConversionResult {
  return { link, status: "success", marketplace, error: null };
}

export function fallbackResult(
  originalLink: string,
  marketplace: string,
  error: string,
): ConversionResult {
  return { link: originalLink, status: "fallback", marketplace, error };
}
