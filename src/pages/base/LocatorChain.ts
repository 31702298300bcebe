/**
 * Fallback Locator Chain
 *
 * SOLID 원칙:
 * - SRP: 순서가 있는 조회 전략 목록 실행만 담당
 * - OCP: 전략 추가는 step 추가로 처리
 *
 * 첫 번째로 비어있지 않은 결과를 낸 단계가 채택됨
 * 조회 중 NoSuchElement / Stale 에러는 빈 결과로 취급
 */

import { isTransientLookupError } from "@/core/errors/DriverErrors";
import { logger as defaultLogger, Logger } from "@/config/logger";

/**
 * 체인 단계
 */
export interface ChainStep<T> {
  name: string;
  run: () => Promise<T[]>;
}

/**
 * 체인 실행 결과
 */
export interface ChainResult<T> {
  /** 채택된 단계 이름 (모두 비었으면 null) */
  step: string | null;
  items: T[];
}

export class LocatorChain<T> {
  private readonly steps: ChainStep<T>[] = [];

  constructor(
    private readonly name: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * 단계 추가 (추가 순서 = 시도 순서)
   */
  step(name: string, run: () => Promise<T[]>): this {
    this.steps.push({ name, run });
    return this;
  }

  async run(): Promise<ChainResult<T>> {
    for (const { name, run } of this.steps) {
      let items: T[];
      try {
        items = await run();
      } catch (error) {
        if (!isTransientLookupError(error)) {
          throw error;
        }
        this.logger.debug(
          { chain: this.name, step: name, error },
          "체인 단계 조회 실패 - 다음 단계",
        );
        continue;
      }

      if (items.length > 0) {
        this.logger.debug(
          { chain: this.name, step: name, count: items.length },
          "체인 단계 채택",
        );
        return { step: name, items };
      }
    }

    this.logger.debug({ chain: this.name }, "모든 체인 단계 결과 없음");
    return { step: null, items: [] };
  }
}
