/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 마켓플레이스별 엔드포인트/셀렉터는 config/marketplaces/*.yaml 참고
 */

import path from "path";

/**
 * 마켓플레이스 설정 파일 디렉터리
 * 환경변수: MARKETPLACE_CONFIG_DIR
 * 기본값: <프로젝트 루트>/config/marketplaces (src/ 기준, dist 실행 시 환경변수로 지정)
 */
export const MARKETPLACE_CONFIG_DIR =
  process.env.MARKETPLACE_CONFIG_DIR ||
  path.resolve(__dirname, "..", "..", "config", "marketplaces");

/**
 * 제휴 변환 설정 (환경변수 스냅샷)
 */
export interface AffiliateSettings {
  /** Amazon Associate Tag (예: promo-20) */
  amazonAssociateTag: string;
  /** Amazon 쿠키 파일 (선택) */
  amazonCookieFile: string;
  /** 변환 후 상품 존재 여부 브라우저 검증 (advisory) */
  amazonValidateProducts: boolean;
  /** Mercado Livre 쿠키 파일 (필수) */
  mercadoLivreCookieFile: string;
  /** Mercado Livre 제휴 태그 */
  mercadoLivreTag: string;
  /** Shopee Open API App ID */
  shopeeAppId: string;
  /** Shopee Open API Secret */
  shopeeAppSecret: string;
  /** Shopee subIds[0] 기본값 */
  shopeeSubId: string;
  /** 브라우저 headless 여부 */
  browserHeadless: boolean;
}

/**
 * 환경변수에서 제휴 설정 읽기
 * @param env 환경변수 (테스트에서 주입 가능)
 */
export function readAffiliateSettings(
  env: NodeJS.ProcessEnv = process.env,
): AffiliateSettings {
  return {
    amazonAssociateTag: env.AMAZON_ASSOCIATE_TAG || "",
    amazonCookieFile: env.AMAZON_COOKIE_FILE || "sessions/amazon_cookies.json",
    amazonValidateProducts: env.AMAZON_VALIDATE_PRODUCTS === "true",
    mercadoLivreCookieFile: env.ML_COOKIE_FILE || "sessions/ml_cookies.json",
    mercadoLivreTag: env.ML_AFFILIATE_TAG || "",
    shopeeAppId: env.SHOPEE_APP_ID || "",
    shopeeAppSecret: env.SHOPEE_APP_SECRET || "",
    shopeeSubId: env.SHOPEE_SUB_ID || "stories",
    browserHeadless: env.BROWSER_HEADLESS !== "false",
  };
}

/**
 * 브라우저 기본값
 */
export const BROWSER_CONFIG = {
  /** 기본 User-Agent (YAML 미지정 시) */
  DEFAULT_USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  DEFAULT_VIEWPORT: { width: 1920, height: 1080 },
  DEFAULT_LOCALE: "pt-BR",
  DEFAULT_TIMEZONE: "America/Sao_Paulo",
} as const;

/**
 * 로그 스니펫 길이
 */
export const LOG_CONFIG = {
  /** 로그에 남기는 링크 최대 길이 */
  LINK_PREVIEW_LENGTH: 80,
  /** CSRF 토큰 미리보기 길이 */
  TOKEN_PREVIEW_LENGTH: 8,
} as const;
