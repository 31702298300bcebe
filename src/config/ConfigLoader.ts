/**
 * Suite 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: 설정 파일 로드 + 환경변수 병합 + 검증만 담당
 *
 * 우선순위: 환경변수 > YAML 파일
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import {
  SUPPORTED_BROWSERS,
  SuiteConfig,
  SuiteConfigSchema,
} from "@/core/domain/SuiteConfig";
import { ConfigurationError } from "@/core/errors/AutomationError";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

/**
 * 로드 옵션
 */
export interface LoadOptions {
  /** 설정 파일 경로 (기본: SUITE_CONFIG 또는 src/config/suite.yaml) */
  configPath?: string;
  /** 환경변수 (기본: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * 환경변수 → 설정 키 매핑
 */
const ENV_OVERRIDES = {
  SUITE_URL: { key: "url", kind: "string" },
  BROWSER: { key: "browser", kind: "string" },
  HEADLESS: { key: "headless", kind: "boolean" },
  IMPLICIT_WAIT: { key: "implicitWaitSeconds", kind: "number" },
  EXPLICIT_WAIT: { key: "explicitWaitSeconds", kind: "number" },
  POLL_INTERVAL_MS: { key: "pollIntervalMs", kind: "number" },
  SCREENSHOT_ON_FAILURE: { key: "screenshotOnFailure", kind: "boolean" },
  SCREENSHOT_DIR: { key: "screenshotDir", kind: "string" },
} as const satisfies Record<
  string,
  { key: keyof SuiteConfig; kind: "string" | "number" | "boolean" }
>;

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private configCache: Map<string, SuiteConfig> = new Map();

  private constructor() {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 설정 로드 (파일 경로별 캐싱)
   */
  load(options: LoadOptions = {}): SuiteConfig {
    const env = options.env ?? process.env;
    const configPath =
      options.configPath ?? env.SUITE_CONFIG ?? PATH_CONFIG.DEFAULT_CONFIG_FILE;

    const cached = this.configCache.get(configPath);
    if (cached) {
      return cached;
    }

    const fileValues = this.readFile(configPath);
    const merged = { ...fileValues, ...this.readEnv(env) };
    const config = this.validate(merged, configPath);

    this.configCache.set(configPath, config);
    logger.info(
      {
        configPath,
        url: config.url,
        browser: config.browser,
        headless: config.headless,
      },
      "Suite 설정 로드 완료",
    );

    return config;
  }

  /**
   * YAML 파일 읽기
   */
  private readFile(configPath: string): Record<string, unknown> {
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, {
        source: configPath,
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config file: ${configPath}`,
        { source: configPath, cause: error },
      );
    }

    // 빈 파일은 빈 객체로 취급 (환경변수만으로 구성 가능)
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigurationError(
        `Config file must contain a mapping: ${configPath}`,
        { source: configPath },
      );
    }
    return { ...parsed };
  }

  /**
   * 환경변수 오버라이드 수집
   */
  private readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    for (const [name, { key, kind }] of Object.entries(ENV_OVERRIDES)) {
      const raw = env[name];
      if (raw === undefined || raw.trim() === "") {
        continue;
      }
      overrides[key] = parseEnvValue(name, raw.trim(), kind);
    }

    return overrides;
  }

  /**
   * Zod 스키마 검증
   */
  private validate(
    values: Record<string, unknown>,
    source: string,
  ): SuiteConfig {
    const browser = values.browser;
    if (typeof browser === "string") {
      const normalized = browser.toLowerCase();
      if (!isSupportedBrowser(normalized)) {
        throw new ConfigurationError(
          `Unsupported browser: ${browser}. Supported browsers are: ${SUPPORTED_BROWSERS.join(", ")}`,
          { source },
        );
      }
      values = { ...values, browser: normalized };
    }

    const result = SuiteConfigSchema.safeParse(values);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`Invalid suite configuration: ${details}`, {
        source,
        cause: result.error,
      });
    }

    return result.data;
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}

function isSupportedBrowser(
  value: string,
): value is (typeof SUPPORTED_BROWSERS)[number] {
  return SUPPORTED_BROWSERS.some((browser) => browser === value);
}

/**
 * 환경변수 문자열 → 타입 변환
 */
function parseEnvValue(
  name: string,
  raw: string,
  kind: "string" | "number" | "boolean",
): string | number | boolean {
  switch (kind) {
    case "string":
      return raw;

    case "number": {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(
          `Environment variable ${name} must be a number: ${raw}`,
          { source: name },
        );
      }
      return value;
    }

    case "boolean": {
      const normalized = raw.toLowerCase();
      if (normalized === "true" || normalized === "1") return true;
      if (normalized === "false" || normalized === "0") return false;
      throw new ConfigurationError(
        `Environment variable ${name} must be true or false: ${raw}`,
        { source: name },
      );
    }
  }
}
