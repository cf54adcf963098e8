/**
 * Browser Session Interface
 *
 * 변환 작업 1건 동안만 유지되는 브라우저 세션 추상화
 *
 * SOLID 원칙:
 * - ISP: 컨버터가 쓰는 기능만 노출 (이동, 본문, 스크립트 평가)
 * - DIP: 컨버터는 Playwright가 아닌 이 인터페이스에 의존 (테스트에서 가짜 세션 주입)
 */

import type { BrowserContextConfig } from "@/core/domain/MarketplaceConfig";
import type { CredentialCookie } from "@/core/domain/CredentialBundle";

/**
 * 세션 생성 옵션
 */
export interface BrowserSessionOptions {
  /** 브라우저 컨텍스트 (UA, locale, timezone, viewport) */
  context: BrowserContextConfig;
  /** 컨텍스트에 미리 넣을 쿠키 */
  cookies?: readonly CredentialCookie[];
  /** domain이 없는 쿠키에 사용할 URL */
  cookieUrl?: string;
  /** 네비게이션 타임아웃 (ms) */
  navigationTimeoutMs: number;
}

/**
 * 네비게이션 옵션
 */
export interface NavigateOptions {
  waitUntil?: "load" | "domcontentloaded" | "networkidle" | "commit";
  /** 이동 후 추가 대기 (ms) */
  settleMs?: number;
}

/**
 * 이동한 페이지 스냅샷
 */
export interface PageSnapshot {
  /** 메인 문서 응답 상태 (응답 없음: null) */
  status: number | null;
  /** 리다이렉트 후 최종 URL */
  url: string;
  /** 현재 문서 HTML */
  body(): Promise<string>;
  /** 페이지 컨텍스트에서 스크립트(식) 평가 */
  evaluate(script: string): Promise<unknown>;
}

export interface IBrowserSession {
  navigate(url: string, options?: NavigateOptions): Promise<PageSnapshot>;
  close(): Promise<void>;
}

export interface IBrowserSessionFactory {
  open(options: BrowserSessionOptions): Promise<IBrowserSession>;
}
