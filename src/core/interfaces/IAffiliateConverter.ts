/**
 * 제휴 링크 컨버터 공통 인터페이스
 * Strategy Pattern의 핵심 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 마켓플레이스 1개의 링크 변환만 담당
 * - OCP: 새 마켓플레이스 추가 시 구현체 + 레지스트리 등록만 필요
 * - LSP: 모든 구현체는 이 인터페이스로 대체 가능
 * - DIP: AffiliateManager는 이 추상화에만 의존
 */

import type { AffiliateLink } from "@/core/domain/AffiliateLink";
import type { CredentialBundle } from "@/core/domain/CredentialBundle";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";

export interface IAffiliateConverter {
  /** 담당 마켓플레이스 */
  readonly marketplace: MarketplaceId;

  /**
   * 원본 상품 링크 → 제휴 링크 변환
   *
   * - 형식 오류 / 다른 마켓플레이스 URL: InvalidLinkError
   * - 정책상 폴백 대상 실패: fallbackReason이 채워진 원본 링크 반환
   * - 그 외: AffiliateConversionError 하위 타입 throw
   */
  convertLink(originalLink: string): Promise<AffiliateLink>;

  /**
   * 자격 증명 로드
   * 필수인데 없으면 CredentialsMissingError, 선택이면 빈 번들
   */
  loadCredentials(): Promise<CredentialBundle>;

  /**
   * 자격 증명 유효 여부
   * 자격 증명이 필요 없거나, 존재하고 만료되지 않았으며 필수 항목을 갖추면 true
   */
  validateCredentials(): Promise<boolean>;
}
