/**
 * Driver Session Manager
 *
 * SOLID 원칙:
 * - SRP: 실행 단위별 세션 생성/해제만 담당
 * - DIP: DriverSessionFactory 주입
 *
 * 규칙:
 * - 실행 단위당 세션 최대 1개, 공유 없음
 * - 최초 요청 시 생성 (동시 요청은 같은 생성 Promise 공유)
 * - 생성 실패는 캐싱하지 않음
 * - 해제는 세션당 1회, 종료 에러는 로그만 남김
 */

import type { SuiteConfig } from "@/core/domain/SuiteConfig";
import type {
  DriverSessionFactory,
  IDriverSession,
} from "@/core/interfaces/IDriverSession";
import { logger as defaultLogger, Logger } from "@/config/logger";

export class SessionManager {
  private readonly sessions = new Map<string, Promise<IDriverSession>>();

  constructor(
    private readonly factory: DriverSessionFactory,
    private readonly config: SuiteConfig,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * 실행 단위 세션 조회 (없으면 생성)
   */
  getSession(unitId: string): Promise<IDriverSession> {
    const existing = this.sessions.get(unitId);
    if (existing) {
      return existing;
    }

    const creation = this.create(unitId);
    this.sessions.set(unitId, creation);

    // 실패한 생성은 캐싱하지 않음 (다음 요청에서 재시도)
    void creation.catch(() => {
      if (this.sessions.get(unitId) === creation) {
        this.sessions.delete(unitId);
      }
    });
    return creation;
  }

  hasSession(unitId: string): boolean {
    return this.sessions.has(unitId);
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  /**
   * 세션 해제
   * 항목을 먼저 제거해 중복 해제 방지
   */
  async releaseSession(unitId: string): Promise<void> {
    const pending = this.sessions.get(unitId);
    if (!pending) {
      return;
    }
    this.sessions.delete(unitId);

    let session: IDriverSession;
    try {
      session = await pending;
    } catch {
      // 생성 실패한 세션은 create()에서 이미 로깅됨
      return;
    }

    try {
      await session.close();
      this.logger.info({ unitId, sessionId: session.id }, "세션 종료");
    } catch (error) {
      this.logger.warn(
        { unitId, sessionId: session.id, error },
        "세션 종료 실패 - 무시",
      );
    }
  }

  /**
   * 범위 세션: 종료 경로와 무관하게 해제
   */
  async withSession<T>(
    unitId: string,
    fn: (session: IDriverSession) => Promise<T>,
  ): Promise<T> {
    try {
      return await fn(await this.getSession(unitId));
    } finally {
      await this.releaseSession(unitId);
    }
  }

  /**
   * 모든 세션 해제
   */
  async releaseAll(): Promise<void> {
    await Promise.all(
      [...this.sessions.keys()].map((unitId) => this.releaseSession(unitId)),
    );
  }

  private async create(unitId: string): Promise<IDriverSession> {
    const started = Date.now();
    try {
      const session = await this.factory(this.config);
      this.logger.info(
        {
          unitId,
          sessionId: session.id,
          browser: this.config.browser,
          durationMs: Date.now() - started,
        },
        "세션 생성",
      );
      return session;
    } catch (error) {
      this.logger.error(
        { unitId, browser: this.config.browser, error },
        "세션 생성 실패",
      );
      throw error;
    }
  }
}
