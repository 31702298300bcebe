/**
 * Element Handle Interface
 *
 * SOLID 원칙:
 * - ISP: 페이지 모델이 필요로 하는 요소 조작만 노출
 * - DIP: 페이지 계층은 구체 드라이버가 아닌 이 인터페이스에 의존
 *
 * 분리된(detached) 요소에 대한 모든 호출은 StaleElementError
 * 핸들은 한 번의 조작 동안만 사용하고 캐싱하지 않음
 */

import type { Locator } from "@/core/domain/Locator";

export interface IElementHandle {
  /** 소문자 태그명 */
  tagName(): Promise<string>;

  /** 속성 값 (없으면 null) */
  getAttribute(name: string): Promise<string | null>;

  /** 렌더링된 텍스트 */
  innerText(): Promise<string>;

  isDisplayed(): Promise<boolean>;

  isEnabled(): Promise<boolean>;

  click(): Promise<void>;

  /** 입력 값 비우기 */
  clear(): Promise<void>;

  /** 키 입력 */
  type(text: string): Promise<void>;

  /** 포함된 폼 제출 */
  submit(): Promise<void>;

  scrollIntoView(): Promise<void>;

  /** 속성 설정 (빈 문자열이면 속성 제거) */
  setAttribute(name: string, value: string): Promise<void>;

  /** 하위 요소 조회 (문서 순서) */
  findElements(locator: Locator): Promise<IElementHandle[]>;
}
