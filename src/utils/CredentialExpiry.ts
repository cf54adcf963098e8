/**
 * 자격 증명 만료 판정 유틸리티
 *
 * - 번들 expires_at / 쿠키 expires(Unix seconds) 검사
 * - JWT exp 클레임 디코딩 (서명 검증 없음, 만료 힌트 용도로만 사용)
 */

import type {
  CredentialBundle,
  CredentialCookie,
} from "@/core/domain/CredentialBundle";
import { getUnixSeconds } from "@/utils/timestamp";

/**
 * 세션 쿠키 여부 (expires 없음 또는 0 이하)
 */
export function isSessionCookie(cookie: CredentialCookie): boolean {
  return cookie.expires === undefined || cookie.expires <= 0;
}

/**
 * 쿠키 만료 여부
 * 세션 쿠키는 시간으로 만료되지 않음
 */
export function isCookieExpired(
  cookie: CredentialCookie,
  nowSeconds: number = getUnixSeconds(),
): boolean {
  const expires = cookie.expires;
  if (expires === undefined || expires <= 0) {
    return false;
  }
  return nowSeconds >= expires;
}

/**
 * 번들 만료 여부 (expires_at 또는 쿠키 중 하나라도 만료)
 */
export function isBundleExpired(
  bundle: CredentialBundle,
  now: Date = new Date(),
): boolean {
  if (bundle.expiresAt && now.getTime() >= bundle.expiresAt.getTime()) {
    return true;
  }
  const nowSeconds = getUnixSeconds(now.getTime());
  return bundle.cookies.some((cookie) => isCookieExpired(cookie, nowSeconds));
}

/**
 * 누락된 필수 쿠키 이름 목록
 */
export function findMissingCookies(
  bundle: CredentialBundle,
  requiredCookies: readonly string[],
): string[] {
  const present = new Set(bundle.cookies.map((cookie) => cookie.name));
  return requiredCookies.filter((name) => !present.has(name));
}

/**
 * JWT payload의 exp 클레임 (Unix seconds)
 *
 * 형식 오류, 디코딩 실패, exp 없음: null
 */
export function decodeJwtExpiry(token: string): number | null {
  const parts = token.split(".");
  if (parts.length < 2 || !parts[1]) {
    return null;
  }

  // base64url → base64 + 4의 배수로 패딩
  let payload = parts[1].replace(/-/g, "+").replace(/_/g, "/");
  payload += "=".repeat((4 - (payload.length % 4)) % 4);

  try {
    const decoded: unknown = JSON.parse(
      Buffer.from(payload, "base64").toString("utf8"),
    );
    if (
      typeof decoded === "object" &&
      decoded !== null &&
      "exp" in decoded &&
      typeof decoded.exp === "number" &&
      Number.isFinite(decoded.exp)
    ) {
      return decoded.exp;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * JWT 만료 힌트 기준 유효 여부
 * exp를 읽을 수 없으면 무효로 간주
 */
export function isJwtUsable(
  token: string,
  nowSeconds: number = getUnixSeconds(),
): boolean {
  const exp = decodeJwtExpiry(token);
  return exp !== null && nowSeconds < exp;
}
