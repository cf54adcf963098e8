/**
 * 컨버터별 자격 증명 캐시
 *
 * - 첫 사용 시 지연 로드
 * - 동시 호출은 Mutex로 직렬화 (로드는 1회)
 * - 재로드 시 번들을 통째로 교체
 */

import { Mutex } from "async-mutex";
import type { CredentialBundle } from "@/core/domain/CredentialBundle";

export class CredentialCache {
  private bundle: CredentialBundle | null = null;
  private readonly mutex = new Mutex();
  private readonly reloadListeners: Array<() => void> = [];

  constructor(private readonly loader: () => Promise<CredentialBundle>) {}

  /**
   * 캐시된 번들 (없으면 로드)
   */
  async get(): Promise<CredentialBundle> {
    if (this.bundle) {
      return this.bundle;
    }
    return this.mutex.runExclusive(async () => {
      if (this.bundle) {
        return this.bundle;
      }
      return this.replace(await this.loader());
    });
  }

  /**
   * 파일에서 다시 읽어 교체
   */
  async reload(): Promise<CredentialBundle> {
    return this.mutex.runExclusive(async () =>
      this.replace(await this.loader()),
    );
  }

  /**
   * 현재 캐시 (로드하지 않음)
   */
  peek(): CredentialBundle | null {
    return this.bundle;
  }

  /**
   * 번들 교체 시 호출될 콜백 등록 (예: CSRF 캐시 초기화)
   */
  onReload(listener: () => void): void {
    this.reloadListeners.push(listener);
  }

  private replace(bundle: CredentialBundle): CredentialBundle {
    this.bundle = bundle;
    for (const listener of this.reloadListeners) {
      listener();
    }
    return bundle;
  }
}
