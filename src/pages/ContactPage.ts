/**
 * ContactPage
 *
 * 문의 폼 페이지
 */

import { By, Locator } from "@/core/domain/Locator";
import type { ResolvedWaitSettings } from "@/core/domain/WaitCondition";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import { PAGE_WAIT_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { createPageLogger } from "@/utils/LoggerContext";
import { PageActions } from "./base/PageActions";

const NAME_SELECTOR =
  "input[name*='name'], input[id*='name'], input[placeholder*='name'], input[placeholder*='Name']";
const EMAIL_SELECTOR =
  "input[name*='email'], input[id*='email'], input[type='email'], input[placeholder*='email'], input[placeholder*='Email']";
const MESSAGE_SELECTOR =
  "textarea[name*='message'], textarea[id*='message'], textarea[placeholder*='message'], textarea[placeholder*='Message']";

/**
 * ContactPage Locators
 */
export const CONTACT_LOCATORS = {
  form: By.css(
    "form.contact-form, form.wpcf7-form, #contact-form",
    "Contact Form",
  ),
  nameField: By.css(NAME_SELECTOR, "Name Input Field"),
  emailField: By.css(EMAIL_SELECTOR, "Email Input Field"),
  messageField: By.css(MESSAGE_SELECTOR, "Message Textarea"),
  submitButton: By.xpath(
    "//button[.//strong[text()='Contact Me']]",
    "Submit Button",
  ),
  successMessage: By.css("#contact-form-success-header", "Success Message"),
  errorMessage: By.css(".contact-form__error.show-errors", "Error Message"),
} as const;

/** 필드 검증 실패 표시 class */
const VALIDATION_ERROR_CLASSES = ["wpcf7-not-valid", "error", "invalid"];

export interface ContactPageOptions {
  /** 문의 페이지 URL 판정 문자열 */
  urlSegment?: string;
  waitDefaults?: Partial<ResolvedWaitSettings>;
}

export class ContactPage extends PageActions {
  private readonly urlSegment: string;

  constructor(
    session: IDriverSession,
    logger: Logger = defaultLogger,
    options: ContactPageOptions = {},
  ) {
    super(
      session,
      createPageLogger(logger, "ContactPage"),
      options.waitDefaults,
    );
    this.urlSegment = options.urlSegment ?? "contact";
  }

  /**
   * URL에 문의 경로 포함 AND (폼 표시 OR 이름/이메일 필드 표시)
   */
  async isContactPageLoaded(): Promise<boolean> {
    try {
      await this.waitForPageLoad();

      const currentUrl = await this.getCurrentUrl();
      const isContactUrl = currentUrl.includes(this.urlSegment);
      const formPresent = await this.isDisplayed(CONTACT_LOCATORS.form);
      const namePresent = await this.isDisplayed(CONTACT_LOCATORS.nameField);
      const emailPresent = await this.isDisplayed(CONTACT_LOCATORS.emailField);

      const loaded =
        isContactUrl && (formPresent || (namePresent && emailPresent));
      const state = { currentUrl, formPresent, namePresent, emailPresent };

      if (loaded) {
        this.logger.info(state, "문의 페이지 로드 확인");
      } else {
        this.logger.warn(state, "문의 페이지 로드 미완료");
        await this.captureDiagnostics();
      }
      return loaded;
    } catch (error) {
      this.logger.error({ error }, "문의 페이지 로드 확인 실패");
      await this.captureDiagnostics();
      return false;
    }
  }

  async enterName(name: string): Promise<void> {
    await this.type(
      CONTACT_LOCATORS.nameField,
      name,
      PAGE_WAIT_CONFIG.CONTACT_FIELD,
    );
  }

  async enterEmail(email: string): Promise<void> {
    await this.type(
      CONTACT_LOCATORS.emailField,
      email,
      PAGE_WAIT_CONFIG.CONTACT_FIELD,
    );
  }

  async enterMessage(message: string): Promise<void> {
    await this.type(
      CONTACT_LOCATORS.messageField,
      message,
      PAGE_WAIT_CONFIG.CONTACT_FIELD,
    );
  }

  async submitForm(): Promise<void> {
    await this.click(
      CONTACT_LOCATORS.submitButton,
      PAGE_WAIT_CONFIG.CONTACT_SUBMIT,
    );
    this.logger.info("문의 폼 제출 완료");
  }

  async fillAndSubmitContactForm(
    name: string,
    email: string,
    message: string,
  ): Promise<void> {
    await this.enterName(name);
    await this.enterEmail(email);
    await this.enterMessage(message);
    await this.submitForm();
  }

  async isSuccessMessageDisplayed(): Promise<boolean> {
    return this.isDisplayed(CONTACT_LOCATORS.successMessage);
  }

  async isErrorMessageDisplayed(): Promise<boolean> {
    return this.isDisplayed(CONTACT_LOCATORS.errorMessage);
  }

  /**
   * 성공 메시지 (없으면 빈 문자열)
   */
  async getSuccessMessageText(): Promise<string> {
    return this.readTextOrEmpty(CONTACT_LOCATORS.successMessage);
  }

  /**
   * 에러 메시지 (없으면 빈 문자열)
   */
  async getErrorMessageText(): Promise<string> {
    return this.readTextOrEmpty(CONTACT_LOCATORS.errorMessage);
  }

  async isEmailValidationErrorDisplayed(): Promise<boolean> {
    return this.hasValidationError(CONTACT_LOCATORS.emailField);
  }

  async isMessageValidationErrorDisplayed(): Promise<boolean> {
    return this.hasValidationError(CONTACT_LOCATORS.messageField);
  }

  private async readTextOrEmpty(locator: Locator): Promise<string> {
    try {
      return await this.readText(locator);
    } catch (error) {
      this.logger.debug({ error }, "메시지 조회 실패");
      return "";
    }
  }

  /**
   * 필드 class에 검증 실패 표시 포함 여부 (즉시 확인)
   */
  private async hasValidationError(field: Locator): Promise<boolean> {
    try {
      const [element] = await this.findAll(field);
      if (!element) return false;

      const classes = (await element.getAttribute("class")) ?? "";
      const hasError = VALIDATION_ERROR_CLASSES.some((c) =>
        classes.includes(c),
      );
      this.logger.info({ field: field.name, hasError }, "필드 검증 상태");
      return hasError;
    } catch (error) {
      this.logger.debug({ error }, "필드 검증 상태 확인 실패");
      return false;
    }
  }
}
