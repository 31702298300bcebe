/**
 * Automation Error Type Enum
 *
 * 목적:
 * - 페이지 상호작용 실패 원인 세분화
 * - 에러별 로깅 전략 차별화
 * - 재시도 여부 결정
 *
 * SOLID 원칙:
 * - SRP: 에러 타입 정의만 담당
 * - OCP: 새로운 에러 타입 추가 가능
 */

import type { WaitConditionKind } from "@/core/domain/WaitCondition";

/**
 * Automation 에러 타입
 */
export enum AutomationErrorType {
  /** 대기 조건이 타임아웃 내에 충족되지 않음 */
  WAIT_TIMEOUT = "WAIT_TIMEOUT",

  /** 조건을 만족한 요소가 액션을 거부함 (stale 등) */
  ACTION_FAILED = "ACTION_FAILED",

  /** 제목으로 찾는 요소 없음 */
  NOT_FOUND = "NOT_FOUND",

  /** 인덱스 범위 초과 */
  INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",

  /** 검색 실행 실패 */
  SEARCH_FAILED = "SEARCH_FAILED",

  /** 설정 오류 (지원하지 않는 브라우저, 설정 파일 읽기 실패) */
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
}

/**
 * 진단용 페이지 스냅샷
 */
export interface PageSnapshot {
  url: string;
  title: string;
}

/**
 * Automation Error 기본 클래스
 */
export class AutomationError extends Error {
  public readonly type: AutomationErrorType;
  public readonly retryable: boolean;
  public readonly errorCause?: unknown;
  public readonly snapshot?: PageSnapshot;

  constructor(
    type: AutomationErrorType,
    message: string,
    options?: {
      cause?: unknown;
      snapshot?: PageSnapshot;
    },
  ) {
    super(message);
    this.name = "AutomationError";
    this.type = type;
    this.retryable = AutomationError.isRetryable(type);
    this.errorCause = options?.cause;
    this.snapshot = options?.snapshot;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      retryable: this.retryable,
      snapshot: this.snapshot,
      stack: this.stack,
    };
  }

  /**
   * 재시도 가능 여부 판단
   * ACTION_FAILED만 1회 재시도 대상 (PageActions에서 처리)
   */
  static isRetryable(type: AutomationErrorType): boolean {
    switch (type) {
      case AutomationErrorType.ACTION_FAILED:
        return true;

      case AutomationErrorType.WAIT_TIMEOUT:
      case AutomationErrorType.NOT_FOUND:
      case AutomationErrorType.INDEX_OUT_OF_RANGE:
      case AutomationErrorType.SEARCH_FAILED:
      case AutomationErrorType.CONFIGURATION_ERROR:
        return false;

      default:
        return false;
    }
  }
}

/**
 * 대기 타임아웃
 */
export class WaitTimeoutError extends AutomationError {
  public readonly target: string;
  public readonly condition: WaitConditionKind;
  public readonly timeoutMs: number;

  constructor(
    target: string,
    condition: WaitConditionKind,
    timeoutMs: number,
    snapshot: PageSnapshot,
  ) {
    super(
      AutomationErrorType.WAIT_TIMEOUT,
      `TIMEOUT: '${target}' not ${condition} within ${timeoutMs}ms. Current URL: ${snapshot.url} | Title: ${snapshot.title}`,
      { snapshot },
    );
    this.name = "WaitTimeoutError";
    this.target = target;
    this.condition = condition;
    this.timeoutMs = timeoutMs;
  }

  toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      target: this.target,
      condition: this.condition,
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * 액션 실행 실패
 */
export type ActionKind = "click" | "type" | "readText" | "submit";

export class ActionFailedError extends AutomationError {
  public readonly target: string;
  public readonly action: ActionKind;
  public readonly attempts: number;

  constructor(
    target: string,
    action: ActionKind,
    attempts: number,
    options?: { cause?: unknown; snapshot?: PageSnapshot },
  ) {
    super(
      AutomationErrorType.ACTION_FAILED,
      `FAILED: Could not ${action} '${target}' after ${attempts} attempt(s). Error: ${describeCause(options?.cause)}`,
      options,
    );
    this.name = "ActionFailedError";
    this.target = target;
    this.action = action;
    this.attempts = attempts;
  }
}

/**
 * 제목으로 요소를 찾지 못함
 */
export class NotFoundError extends AutomationError {
  public readonly requested: string;
  public readonly available: readonly string[];

  constructor(
    requested: string,
    available: readonly string[],
    options?: { snapshot?: PageSnapshot },
  ) {
    super(
      AutomationErrorType.NOT_FOUND,
      `Not found: '${requested}'. Available titles: [${available.join(", ")}]`,
      options,
    );
    this.name = "NotFoundError";
    this.requested = requested;
    this.available = available;
  }
}

/**
 * 인덱스 범위 초과
 */
export class IndexOutOfRangeError extends AutomationError {
  public readonly index: number;
  public readonly count: number;

  constructor(
    index: number,
    count: number,
    options?: { snapshot?: PageSnapshot },
  ) {
    super(
      AutomationErrorType.INDEX_OUT_OF_RANGE,
      `INDEX OUT OF RANGE: Requested index ${index}, but only ${count} results available`,
      options,
    );
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.count = count;
  }
}

/**
 * 검색 실패
 */
export class SearchFailedError extends AutomationError {
  public readonly keyword: string;

  constructor(
    keyword: string,
    options?: { cause?: unknown; snapshot?: PageSnapshot },
  ) {
    super(
      AutomationErrorType.SEARCH_FAILED,
      `Could not perform search for: ${keyword}. Error: ${describeCause(options?.cause)}`,
      options,
    );
    this.name = "SearchFailedError";
    this.keyword = keyword;
  }
}

/**
 * 설정 오류
 */
export class ConfigurationError extends AutomationError {
  public readonly source?: string;

  constructor(message: string, options?: { source?: string; cause?: unknown }) {
    super(AutomationErrorType.CONFIGURATION_ERROR, message, {
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
    this.source = options?.source;
  }
}

/**
 * 원인 에러 메시지 추출
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return "unknown";
  }
  return String(cause);
}
