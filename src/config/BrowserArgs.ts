/**
 * Browser Launch Arguments
 *
 * 카테고리별 Chrome 플래그 조합
 * - 변환용 브라우저는 작업마다 띄우고 닫으므로 메모리 플래그 위주
 */

export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Stealth 플래그 (봇 탐지 우회)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (Docker 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 기본 조합 (Docker + Memory + Stealth)
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
};
