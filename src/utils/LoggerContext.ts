/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * 시나리오 / 페이지 단위 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * 시나리오 전용 로거 생성
 * @param unitId - 실행 단위 ID (cucumber testCaseStartedId)
 * @param scenario - 시나리오 이름
 */
export function createScenarioLogger(unitId: string, scenario: string): Logger {
  return logger.child({
    unit_id: unitId,
    scenario,
  });
}

/**
 * 페이지 모델 전용 로거 생성
 * @param parent - 상위 로거 (시나리오 로거 또는 기본 로거)
 * @param page - 페이지 모델 이름 (예: "HomePage")
 */
export function createPageLogger(parent: Logger, page: string): Logger {
  return parent.child({ page });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
