/**
 * CredentialBundle - 마켓플레이스 자격 증명 (쿠키 + 발급/만료 정보)
 *
 * 쿠키 파일(JSON) 스키마와 도메인 타입 정의
 * 번들은 통째로 교체되며 내부 값을 수정하지 않음
 */

import { z } from "zod";

/**
 * 쿠키 파일 항목 스키마 (Playwright context.cookies() 형식 호환)
 */
export const CredentialCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  /** Unix seconds, 0 이하는 세션 쿠키 */
  expires: z.number().optional(),
  domain: z.string().optional(),
  path: z.string().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(["Strict", "Lax", "None"]).optional(),
});

export type CredentialCookie = z.infer<typeof CredentialCookieSchema>;

/**
 * 쿠키 파일 스키마
 *
 * 알려지지 않은 최상위 필드는 marketplaceMeta로 보존
 */
export const CredentialFileSchema = z
  .object({
    cookies: z.array(CredentialCookieSchema),
    expires_at: z.string().optional(),
    generated_at: z.string().optional(),
  })
  .passthrough();

export type CredentialFile = z.infer<typeof CredentialFileSchema>;

export interface CredentialBundle {
  readonly cookies: readonly CredentialCookie[];
  readonly issuedAt: Date | null;
  readonly expiresAt: Date | null;
  readonly marketplaceMeta: Readonly<Record<string, unknown>>;
}

export function emptyCredentialBundle(
  marketplaceMeta: Record<string, unknown> = {},
): CredentialBundle {
  return { cookies: [], issuedAt: null, expiresAt: null, marketplaceMeta };
}

/**
 * ISO-8601 문자열 파싱
 * 타임존 표기가 없으면 UTC로 간주
 */
export function parseIsoTimestamp(value: string | undefined): Date | null {
  if (!value) {
    return null;
  }
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(value);
  const parsed = Date.parse(hasZone ? value : `${value}Z`);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * 파일 내용 → 번들 변환
 */
export function toCredentialBundle(file: CredentialFile): CredentialBundle {
  const { cookies, expires_at, generated_at, ...marketplaceMeta } = file;
  return {
    cookies,
    issuedAt: parseIsoTimestamp(generated_at),
    expiresAt: parseIsoTimestamp(expires_at),
    marketplaceMeta,
  };
}

/**
 * 이름 → 쿠키 조회 (중복 시 마지막 항목)
 */
export function findCookie(
  bundle: CredentialBundle,
  name: string,
): CredentialCookie | undefined {
  let found: CredentialCookie | undefined;
  for (const cookie of bundle.cookies) {
    if (cookie.name === name) {
      found = cookie;
    }
  }
  return found;
}
