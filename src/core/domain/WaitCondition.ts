/**
 * Wait Condition 정의
 *
 * 폴링 대기 조건 종류 및 옵션
 */

/**
 * 대기 조건 종류
 * - visible: 렌더링 + 표시
 * - clickable: visible AND enabled (같은 폴링 샘플에서 판정)
 * - absent: 없음 / stale / 숨김
 * - textContains: 텍스트 포함
 */
export type WaitConditionKind =
  | "visible"
  | "clickable"
  | "absent"
  | "textContains";

/**
 * 대기 옵션
 */
export interface WaitOptions {
  /** 타임아웃 (ms) */
  timeoutMs?: number;
  /** 폴링 간격 (ms) */
  pollIntervalMs?: number;
  /** 로그용 라벨 */
  label?: string;
}

/**
 * Boolean 결과 대기 옵션 (absent / textContains)
 */
export interface BooleanWaitOptions extends WaitOptions {
  /** true면 타임아웃 시 false 대신 WaitTimeoutError */
  strict?: boolean;
}

/**
 * 해석된 대기 설정 (기본값 적용 후)
 */
export interface ResolvedWaitSettings {
  timeoutMs: number;
  pollIntervalMs: number;
}
