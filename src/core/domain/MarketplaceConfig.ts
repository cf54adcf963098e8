/**
 * MarketplaceConfig - 마켓플레이스 YAML 설정 스키마
 *
 * config/marketplaces/{marketplace}.yaml 구조 정의
 */

import { z } from "zod";
import { BROWSER_CONFIG } from "@/config/constants";

/**
 * 자격 증명(쿠키) 요구사항
 */
export const CredentialRequirementSchema = z.object({
  /** true면 쿠키 파일이 없을 때 CredentialsMissing */
  mandatory: z.boolean(),
  requiredCookies: z.array(z.string()).default([]),
  /** exp 클레임을 읽을 JWT 쿠키 이름 */
  jwtCookie: z.string().optional(),
  /** domain 없는 쿠키를 브라우저에 넣을 때 사용할 URL */
  cookieUrl: z.string().url().optional(),
});

export type CredentialRequirement = z.infer<typeof CredentialRequirementSchema>;

/**
 * 브라우저 컨텍스트 설정
 */
export const BrowserContextSchema = z.object({
  userAgent: z.string().default(BROWSER_CONFIG.DEFAULT_USER_AGENT),
  locale: z.string().default(BROWSER_CONFIG.DEFAULT_LOCALE),
  timezoneId: z.string().default(BROWSER_CONFIG.DEFAULT_TIMEZONE),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default(BROWSER_CONFIG.DEFAULT_VIEWPORT),
});

export type BrowserContextConfig = z.infer<typeof BrowserContextSchema>;

/**
 * 타임아웃 설정 (ms)
 */
export const TimeoutSchema = z.object({
  navigationMs: z.number().int().positive().default(15000),
  apiMs: z.number().int().positive().default(15000),
});

export type TimeoutConfig = z.infer<typeof TimeoutSchema>;

/**
 * Amazon (고정 파라미터 방식)
 */
export const AmazonConfigSchema = z.object({
  marketplace: z.literal("amazon"),
  displayName: z.string(),
  kind: z.literal("fixed_parameter"),
  canonicalHost: z.string(),
  productIdPatterns: z.array(z.string()).min(1),
  credentials: CredentialRequirementSchema,
  browser: BrowserContextSchema.default({}),
  validation: z.object({
    captchaMarkers: z.array(z.string()).min(1),
  }),
  timeouts: TimeoutSchema.default({}),
});

export type AmazonConfig = z.infer<typeof AmazonConfigSchema>;

/**
 * Mercado Livre (세션 스크래핑 방식)
 */
export const MercadoLivreConfigSchema = z.object({
  marketplace: z.literal("mercadolivre"),
  displayName: z.string(),
  kind: z.literal("session_scraping"),
  api: z.object({
    endpoint: z.string().url(),
    origin: z.string().url(),
    referer: z.string().url(),
    responseField: z.string(),
  }),
  credentials: CredentialRequirementSchema,
  csrf: z.object({
    metaName: z.string(),
    headerName: z.string(),
    pages: z.array(z.string().url()).min(1),
    settleMs: z.number().int().nonnegative().default(2000),
  }),
  unwrap: z.object({
    pathMarkers: z.array(z.string()),
    queryMarkers: z.array(z.string()),
    hrefMarkers: z.array(z.string()).min(1),
    buttonLabels: z.array(z.string()),
    /** 상품 링크 판정 문자열 */
    productMarker: z.string().default("MLB"),
    productIdPattern: z.string(),
    settleMs: z.number().int().nonnegative().default(2000),
    diagnosticSnippetLength: z.number().int().positive().default(1000),
  }),
  browser: BrowserContextSchema.default({}),
  timeouts: TimeoutSchema.default({}),
});

export type MercadoLivreConfig = z.infer<typeof MercadoLivreConfigSchema>;

/**
 * Shopee (서명 API 방식)
 */
export const ShopeeConfigSchema = z.object({
  marketplace: z.literal("shopee"),
  displayName: z.string(),
  kind: z.literal("signed_api"),
  api: z.object({
    endpoint: z.string().url(),
    subIdSlots: z.number().int().min(1).max(5).default(5),
  }),
  credentials: CredentialRequirementSchema,
  timeouts: TimeoutSchema.default({}),
});

export type ShopeeConfig = z.infer<typeof ShopeeConfigSchema>;
