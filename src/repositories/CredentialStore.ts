/**
 * 파일 기반 자격 증명 저장소
 *
 * 쿠키 JSON 파일(생성 스크립트/브라우저 export 결과)을 읽어 CredentialBundle로 변환
 */

import * as fs from "fs/promises";
import { ZodError } from "zod";

import type { ICredentialStore } from "@/core/interfaces/ICredentialStore";
import {
  CredentialBundle,
  CredentialFileSchema,
  emptyCredentialBundle,
  toCredentialBundle,
} from "@/core/domain/CredentialBundle";
import {
  CredentialsMissingError,
  InvalidSessionError,
} from "@/core/errors/AffiliateErrors";
import { logger } from "@/config/logger";

// fs 에러는 다른 realm에서 생성될 수 있어 instanceof Error 대신 code로 판별
function isFileNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class CredentialStore implements ICredentialStore {
  constructor(private readonly marketplace?: string) {}

  async load(filePath: string, mandatory: boolean): Promise<CredentialBundle> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (!isFileNotFound(error)) {
        throw error;
      }
      if (mandatory) {
        throw new CredentialsMissingError(
          `Credential file not found: ${filePath}`,
          { marketplace: this.marketplace, cause: error },
        );
      }
      logger.debug(
        { marketplace: this.marketplace, filePath },
        "선택 자격 증명 파일 없음, 빈 번들 사용",
      );
      return emptyCredentialBundle();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new InvalidSessionError(
        `Credential file is not valid JSON: ${filePath}`,
        { marketplace: this.marketplace, cause: error },
      );
    }

    const result = CredentialFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidSessionError(
        `Credential file has invalid structure: ${formatIssues(result.error)}`,
        { marketplace: this.marketplace, cause: result.error },
      );
    }

    const bundle = toCredentialBundle(result.data);
    logger.debug(
      {
        marketplace: this.marketplace,
        filePath,
        cookies: bundle.cookies.length,
        expiresAt: bundle.expiresAt?.toISOString() ?? null,
      },
      "자격 증명 로드 완료",
    );
    return bundle;
  }

  async getCredentialAge(filePath: string): Promise<number> {
    try {
      const stat = await fs.stat(filePath);
      // 파일시스템 시각이 Date.now()보다 미세하게 앞설 수 있음
      return Math.max(0, Date.now() - stat.mtimeMs);
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new CredentialsMissingError(
          `Credential file not found: ${filePath}`,
          { marketplace: this.marketplace, cause: error },
        );
      }
      throw error;
    }
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
