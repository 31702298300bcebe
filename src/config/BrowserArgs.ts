/**
 * Browser Launch Arguments
 *
 * SOLID 원칙:
 * - SRP: Browser 실행 인자 관리만 담당
 * - OCP: 카테고리별 확장 가능
 *
 * Chromium 계열(chrome, edge)에만 적용
 */

/**
 * Browser Arguments Categories
 */
export const BROWSER_ARGS = {
  /**
   * 안정성 플래그
   * - /dev/shm 사용 최소화 (CI 컨테이너)
   * - 첫 실행 설정 및 기본 앱 비활성화
   */
  STABILITY: [
    "--disable-dev-shm-usage",
    "--disable-extensions",
    "--disable-default-apps",
    "--no-first-run",
  ],

  /**
   * 알림 권한 프롬프트 비활성화
   */
  QUIET: ["--disable-notifications"],

  /**
   * Sandbox 플래그 (Docker/CI 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * headless 실행 조합 (CI)
   */
  get HEADLESS() {
    return [...this.SANDBOX, ...this.STABILITY, ...this.QUIET];
  },

  /**
   * 로컬 headed 실행 조합
   */
  get HEADED() {
    return [...this.STABILITY, ...this.QUIET, "--start-maximized"];
  },
} as const;
