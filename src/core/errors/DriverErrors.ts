/**
 * Driver 신호 에러
 *
 * 드라이버 어댑터가 요소 조회/조작 실패를 표현하는 에러
 * 대기 엔진은 이 두 에러만 일시적(재시도 대상)으로 취급
 */

/**
 * Locator와 일치하는 요소 없음
 */
export class NoSuchElementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoSuchElementError";
  }
}

/**
 * 요소가 DOM에서 분리됨 (re-render, navigation)
 */
export class StaleElementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StaleElementError";
  }
}

/**
 * 폴링 중 재시도해야 하는 조회 에러 여부
 */
export function isTransientLookupError(error: unknown): boolean {
  return (
    error instanceof NoSuchElementError || error instanceof StaleElementError
  );
}
