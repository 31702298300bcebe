/**
 * Scenario Lifecycle State Machine
 *
 * Idle → SessionStarting → Ready → {Navigating | Searching | Clicking | ReadingState} → Ready
 * 닫히지 않은 모든 상태 → TearingDown → Closed
 *
 * 액션 실패 시 상태는 그대로 두고 teardown으로 진행
 */

import { logger as defaultLogger, Logger } from "@/config/logger";

export enum ScenarioState {
  Idle = "Idle",
  SessionStarting = "SessionStarting",
  Ready = "Ready",
  Navigating = "Navigating",
  Searching = "Searching",
  Clicking = "Clicking",
  ReadingState = "ReadingState",
  TearingDown = "TearingDown",
  Closed = "Closed",
}

/**
 * 액션 상태 (Ready에서 진입, 성공 시 Ready 복귀)
 */
export type ActionState =
  | ScenarioState.Navigating
  | ScenarioState.Searching
  | ScenarioState.Clicking
  | ScenarioState.ReadingState;

const ACTION_STATES: readonly ScenarioState[] = [
  ScenarioState.Navigating,
  ScenarioState.Searching,
  ScenarioState.Clicking,
  ScenarioState.ReadingState,
];

/**
 * 허용 전이 (TearingDown 진입은 별도 규칙)
 */
const TRANSITIONS: Record<ScenarioState, readonly ScenarioState[]> = {
  [ScenarioState.Idle]: [ScenarioState.SessionStarting],
  [ScenarioState.SessionStarting]: [ScenarioState.Ready],
  [ScenarioState.Ready]: ACTION_STATES,
  [ScenarioState.Navigating]: [ScenarioState.Ready],
  [ScenarioState.Searching]: [ScenarioState.Ready],
  [ScenarioState.Clicking]: [ScenarioState.Ready],
  [ScenarioState.ReadingState]: [ScenarioState.Ready],
  [ScenarioState.TearingDown]: [ScenarioState.Closed],
  [ScenarioState.Closed]: [],
};

/**
 * 허용되지 않은 상태 전이
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: ScenarioState,
    public readonly to: ScenarioState,
  ) {
    super(`Invalid scenario transition: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class ScenarioLifecycle {
  private current: ScenarioState = ScenarioState.Idle;
  private teardown: Promise<void> | null = null;

  constructor(
    readonly unitId: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  get state(): ScenarioState {
    return this.current;
  }

  canTransition(to: ScenarioState): boolean {
    if (to === ScenarioState.TearingDown) {
      return (
        this.current !== ScenarioState.Closed &&
        this.current !== ScenarioState.TearingDown
      );
    }
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ScenarioState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.logger.debug({ from: this.current, to }, "시나리오 상태 전이");
    this.current = to;
  }

  /**
   * 세션 시작: Idle → SessionStarting → Ready
   */
  async start<T>(fn: () => Promise<T>): Promise<T> {
    this.transition(ScenarioState.SessionStarting);
    const result = await fn();
    this.transition(ScenarioState.Ready);
    return result;
  }

  /**
   * 액션 실행: Ready → action → Ready
   * 실패 시 상태 유지 (teardown 대상)
   */
  async perform<T>(state: ActionState, fn: () => Promise<T>): Promise<T> {
    this.transition(state);
    const result = await fn();
    this.transition(ScenarioState.Ready);
    return result;
  }

  /**
   * 정리: 최대 1회 실행, 예외 없음
   * 두 번째 호출은 첫 번째 정리 완료를 기다림
   */
  tearDown(fn: () => Promise<void>): Promise<void> {
    if (this.teardown) {
      return this.teardown;
    }
    if (this.current === ScenarioState.Closed) {
      return Promise.resolve();
    }

    this.transition(ScenarioState.TearingDown);
    this.teardown = Promise.resolve()
      .then(fn)
      .catch((error: unknown) => {
        this.logger.warn(
          { unitId: this.unitId, error },
          "시나리오 정리 실패 - 무시",
        );
      })
      .finally(() => {
        this.current = ScenarioState.Closed;
      });
    return this.teardown;
  }
}
