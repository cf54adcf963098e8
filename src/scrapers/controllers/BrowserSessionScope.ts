/**
 * 스코프 단위 브라우저 세션 사용
 *
 * 작업 성공/실패와 관계없이 세션은 반드시 닫힘
 */

import type {
  BrowserSessionOptions,
  IBrowserSession,
  IBrowserSessionFactory,
} from "./IBrowserSession";
import { logger } from "@/config/logger";

export async function withBrowserSession<T>(
  factory: IBrowserSessionFactory,
  options: BrowserSessionOptions,
  work: (session: IBrowserSession) => Promise<T>,
): Promise<T> {
  const session = await factory.open(options);
  try {
    return await work(session);
  } finally {
    try {
      await session.close();
    } catch (closeError) {
      // 작업 결과(또는 원래 에러)를 덮어쓰지 않음
      logger.warn(
        {
          error:
            closeError instanceof Error ? closeError.message : String(closeError),
        },
        "브라우저 세션 종료 실패",
      );
    }
  }
}
