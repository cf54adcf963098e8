/**
 * 자격 증명 저장소 인터페이스
 *
 * SOLID 원칙:
 * - DIP: 컨버터는 파일 시스템이 아닌 이 추상화에 의존
 */

import type { CredentialBundle } from "@/core/domain/CredentialBundle";

export interface ICredentialStore {
  /**
   * 자격 증명 파일 로드
   * @param filePath 자격 증명 파일 경로
   * @param mandatory true면 파일이 없을 때 CredentialsMissingError, false면 빈 번들
   */
  load(filePath: string, mandatory: boolean): Promise<CredentialBundle>;

  /**
   * 파일 마지막 수정 이후 경과 시간 (ms)
   */
  getCredentialAge(filePath: string): Promise<number>;
}
