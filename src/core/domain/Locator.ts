/**
 * Locator 정의
 *
 * 목적:
 * - 요소 탐색 방법(strategy + selector)을 순수 값으로 표현
 * - 네비게이션 이후에도 재사용 가능 (특정 요소 인스턴스에 묶이지 않음)
 *
 * SOLID 원칙:
 * - SRP: 요소 탐색 기술자 정의만 담당
 */

/**
 * Locator 전략
 */
export type LocatorStrategy = "css" | "xpath";

/**
 * Locator
 */
export interface Locator {
  readonly strategy: LocatorStrategy;
  readonly selector: string;
  /** 로그용 이름 (예: "Site Title (h1.site-title)") */
  readonly name?: string;
}

/**
 * Locator 팩토리
 */
export const By = {
  css(selector: string, name?: string): Locator {
    return { strategy: "css", selector, name };
  },

  xpath(selector: string, name?: string): Locator {
    return { strategy: "xpath", selector, name };
  },
} as const;

/**
 * 로그용 Locator 설명
 * name이 없으면 "strategy=selector" 형식
 */
export function describeLocator(locator: Locator): string {
  return locator.name ?? `${locator.strategy}=${locator.selector}`;
}

/**
 * Locator 타입 가드
 * Element Handle과 구분하기 위해 사용
 */
export function isLocator(value: unknown): value is Locator {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "strategy" in value &&
    "selector" in value &&
    typeof value.selector === "string"
  );
}

/**
 * XPath 문자열 리터럴 생성
 *
 * 따옴표가 섞인 텍스트도 안전하게 표현:
 * - ' 없음 → 'text'
 * - " 없음 → "text"
 * - 둘 다 포함 → concat('...', "'", '...')
 */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }

  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}
