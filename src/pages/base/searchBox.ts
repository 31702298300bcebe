/**
 * 검색창 제출
 *
 * clickable 대기 → 비우기 → 입력 → 제출
 * 어느 단계든 실패하면 SearchFailedError
 */

import type { Locator } from "@/core/domain/Locator";
import type { WaitOptions } from "@/core/domain/WaitCondition";
import { SearchFailedError } from "@/core/errors/AutomationError";
import type { Logger } from "@/config/logger";
import type { PageActions } from "./PageActions";

export async function submitSearch(
  actions: PageActions,
  logger: Logger,
  input: Locator,
  keyword: string,
  wait: WaitOptions,
): Promise<void> {
  try {
    const field = await actions.waiter.waitForClickable(input, wait);
    await field.clear();
    await field.type(keyword);
    await field.submit();
    logger.info({ keyword }, "검색 제출 완료");
  } catch (cause) {
    const snapshot = await actions.captureDiagnostics();
    const error = new SearchFailedError(keyword, { cause, snapshot });
    logger.error(error.toLogObject(), "검색 실패");
    throw error;
  }
}
