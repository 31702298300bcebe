/**
 * Suite 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 */

import * as path from "path";

/**
 * 대기 엔진 기본값
 */
export const WAIT_CONFIG = {
  /**
   * 기본 대기 타임아웃 (ms)
   * 환경변수: WAIT_TIMEOUT_MS
   * 기본값: 10000
   */
  DEFAULT_TIMEOUT_MS: Number(process.env.WAIT_TIMEOUT_MS) || 10000,

  /**
   * 기본 폴링 간격 (ms)
   * 환경변수: WAIT_POLL_INTERVAL_MS
   * 기본값: 500
   */
  POLL_INTERVAL_MS: Number(process.env.WAIT_POLL_INTERVAL_MS) || 500,

  /**
   * 페이지 로드 대기 타임아웃 (ms)
   */
  PAGE_LOAD_TIMEOUT_MS: 30000,

  /**
   * 하이라이트 유지 시간 (ms)
   */
  HIGHLIGHT_DURATION_MS: 500,
} as const;

/**
 * 페이지별 대기 설정
 */
export const PAGE_WAIT_CONFIG = {
  /** 검색 입력창 clickable 대기 */
  SEARCH_INPUT: { timeoutMs: 15000, pollIntervalMs: 300 },

  /** 문의 폼 입력 필드 visible 대기 */
  CONTACT_FIELD: { timeoutMs: 10000, pollIntervalMs: 500 },

  /** 문의 폼 제출 버튼 clickable 대기 */
  CONTACT_SUBMIT: { timeoutMs: 20000, pollIntervalMs: 500 },

  /** 결과 페이지에서 재검색 시 입력창 clickable 대기 */
  SEARCH_AGAIN_INPUT: { timeoutMs: 10000, pollIntervalMs: 300 },

  /** 검색 로딩 placeholder 사라짐 대기 */
  SEARCH_LOADING: { timeoutMs: 5000, pollIntervalMs: 200 },

  /** "no results" 메시지 텍스트 대기 */
  NO_RESULTS_TEXT: { timeoutMs: 5000, pollIntervalMs: 200 },
} as const;

/**
 * "검색 결과 없음" 판정 어휘 (대소문자 무시 부분 일치)
 */
export const NO_RESULTS_VOCABULARY = ["no", "nothing", "sorry"] as const;

/**
 * 진단 로그 문자열 길이 제한
 */
export const DESCRIBE_LIMITS = {
  CLASS_MAX: 30,
  TEXT_MAX: 20,
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /**
   * 기본 설정 파일
   * 환경변수: SUITE_CONFIG
   */
  DEFAULT_CONFIG_FILE: path.join(__dirname, "suite.yaml"),
} as const;
