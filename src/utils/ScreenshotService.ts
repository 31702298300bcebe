/**
 * Screenshot Service
 *
 * SOLID 원칙:
 * - SRP: 스크린샷 캡처/저장만 담당
 *
 * 실패 시나리오 진단용
 * 캡처 실패는 시나리오 결과에 영향을 주지 않음 (null 반환)
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { getDateStringWithDash, getFileTimeString } from "@/utils/timestamp";

/**
 * 캡처 결과
 */
export interface ScreenshotResult {
  image: Buffer;
  /** 저장 경로 (저장 실패 시 null) */
  filepath: string | null;
}

export class ScreenshotService {
  private outputDir: string;

  constructor(
    outputDir: string,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.outputDir = outputDir;
  }

  /**
   * 스크린샷 캡처 후 저장
   * 경로: outputDir/YYYY-MM-DD/{name}-HHmmss-SSS.png
   */
  async capture(
    session: IDriverSession | null,
    name: string,
  ): Promise<ScreenshotResult | null> {
    if (!session) {
      return null;
    }

    let image: Buffer;
    try {
      image = await session.screenshot();
    } catch (error) {
      this.logger.warn({ error, name }, "스크린샷 캡처 실패 - 무시");
      return null;
    }

    try {
      const dateDir = path.join(this.outputDir, getDateStringWithDash());
      await fs.mkdir(dateDir, { recursive: true });

      const filepath = path.join(
        dateDir,
        `${sanitizeFileName(name)}-${getFileTimeString()}.png`,
      );
      await fs.writeFile(filepath, image);

      this.logger.info({ filepath }, "스크린샷 저장 완료");
      return { image, filepath };
    } catch (error) {
      this.logger.warn({ error, name }, "스크린샷 저장 실패 - 무시");
      return { image, filepath: null };
    }
  }

  /**
   * 출력 디렉토리 변경
   */
  setOutputDir(outputDir: string): void {
    this.outputDir = outputDir;
  }

  /**
   * 현재 출력 디렉토리 조회
   */
  getOutputDir(): string {
    return this.outputDir;
  }
}

/**
 * 파일명으로 쓸 수 없는 문자 치환
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[^A-Za-z0-9가-힣._-]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return cleaned.length > 0 ? cleaned.slice(0, 80) : "screenshot";
}
