/**
 * Driver Session Interface
 *
 * SOLID 원칙:
 * - ISP: 브라우저 자동화 라이브러리 중 실제로 쓰는 부분만 노출
 * - DIP: 페이지/세션 계층은 이 인터페이스에만 의존
 */

import type { Locator } from "@/core/domain/Locator";
import type { SuiteConfig } from "@/core/domain/SuiteConfig";
import type { IElementHandle } from "./IElementHandle";

export interface IDriverSession {
  /** 세션 식별자 (로그용) */
  readonly id: string;

  navigate(url: string): Promise<void>;

  currentUrl(): Promise<string>;

  title(): Promise<string>;

  /** document.readyState */
  readyState(): Promise<string>;

  /** 문서 순서대로 일치 요소 조회 (없으면 빈 배열) */
  findElements(locator: Locator): Promise<IElementHandle[]>;

  /** 현재 뷰포트 PNG */
  screenshot(): Promise<Buffer>;

  /** 페이지 HTML */
  pageSource(): Promise<string>;

  close(): Promise<void>;
}

/**
 * 세션 생성 함수
 */
export type DriverSessionFactory = (
  config: SuiteConfig,
) => Promise<IDriverSession>;
