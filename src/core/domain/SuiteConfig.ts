/**
 * Suite 설정 스키마
 *
 * YAML 파일 + 환경변수 병합 결과를 Zod로 검증
 */

import { z } from "zod";

/**
 * 지원 브라우저
 */
export const SUPPORTED_BROWSERS = ["chrome", "firefox", "edge"] as const;

export const BrowserKindSchema = z.enum(SUPPORTED_BROWSERS);

export type BrowserKind = z.infer<typeof BrowserKindSchema>;

/**
 * Suite 설정 스키마
 */
export const SuiteConfigSchema = z.object({
  url: z.string().url(),
  browser: BrowserKindSchema,
  headless: z.boolean(),
  implicitWaitSeconds: z.number().int().nonnegative(),
  explicitWaitSeconds: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
  screenshotOnFailure: z.boolean(),
  screenshotDir: z.string().min(1),
});

export type SuiteConfig = z.infer<typeof SuiteConfigSchema>;
