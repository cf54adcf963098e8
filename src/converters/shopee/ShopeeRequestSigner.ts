/**
 * Shopee Affiliate Open API 요청 서명
 *
 * signature = SHA256(AppId + Timestamp + Payload + Secret) (hex)
 * Authorization: SHA256 Credential={AppId}, Signature={signature}, Timestamp={Timestamp}
 *
 * Payload는 실제 전송 본문과 바이트 단위로 같아야 함 (compact JSON)
 */

import { createHash } from "node:crypto";

const sha256Hex = (value: string): string =>
  createHash("sha256").update(value, "utf8").digest("hex");

export interface ShopeeCredentials {
  appId: string;
  appSecret: string;
}

export interface SignedRequest {
  body: string;
  timestamp: number;
  signature: string;
  authorization: string;
}

export function computeSignature(
  credentials: ShopeeCredentials,
  timestamp: number,
  body: string,
): string {
  return sha256Hex(
    `${credentials.appId}${timestamp}${body}${credentials.appSecret}`,
  );
}

export function buildAuthorizationHeader(
  appId: string,
  signature: string,
  timestamp: number,
): string {
  return `SHA256 Credential=${appId}, Signature=${signature}, Timestamp=${timestamp}`;
}

/**
 * GraphQL 쿼리 → 서명된 요청
 */
export function signGraphQLRequest(
  credentials: ShopeeCredentials,
  query: string,
  timestamp: number,
): SignedRequest {
  const body = JSON.stringify({ query });
  const signature = computeSignature(credentials, timestamp, body);
  return {
    body,
    timestamp,
    signature,
    authorization: buildAuthorizationHeader(
      credentials.appId,
      signature,
      timestamp,
    ),
  };
}
