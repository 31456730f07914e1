import { AppConfig, Credentials } from "../config";
import { findWithin, loadDocument, selectAll } from "../core/dom";
import { errorMessage } from "../core/errors";
import { sleep } from "../core/time";
import { Logger, MetricsRegistry } from "../observability";
import { BrowserPage } from "./browser";
import { OperatorConfirmation } from "./operator";

export interface SessionManagerDeps {
  config: AppConfig;
  page: BrowserPage;
  operator: OperatorConfirmation;
  logger: Logger;
  metrics: MetricsRegistry;
  sleepFn?: (ms: number) => Promise<void>;
}

interface LoginFormMatch {
  formSelector: string;
  formIndex: number;
  usernameSelector: string;
  passwordSelector: string;
  submitSelector: string;
}

const FALLBACK_FORM_SELECTORS = ["form", 'form[method="post"]'];
const LOGIN_URL_MARKERS = ["login", "auth"];

export const MANUAL_LOGIN_PROMPT = "Log in through the browser window, then press Enter to continue...";

function uniqueSelectors(selectors: readonly string[]): string[] {
  return [...new Set(selectors)];
}

export class SessionManager {
  private readonly config: AppConfig;
  private readonly page: BrowserPage;
  private readonly operator: OperatorConfirmation;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(deps: SessionManagerDeps) {
    this.config = deps.config;
    this.page = deps.page;
    this.operator = deps.operator;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.sleepFn = deps.sleepFn ?? sleep;
  }

  /** Walks the strategies in order; nothing is cached between calls. */
  async authenticate(): Promise<boolean> {
    this.metrics.incrementCounter("auth_attempts");
    try {
      await this.page.goto(this.config.baseUrl, this.config.requestTimeoutMs);
      await this.sleepFn(this.config.settleDelayMs);

      if (await this.isAuthenticated()) {
        this.logger.info("auth_already_authenticated", { address: this.page.url() });
        return true;
      }

      if (this.config.credentials) {
        const submitted = await this.submitLoginForm(this.config.credentials);
        if (submitted) {
          await this.sleepFn(this.config.loginSettleDelayMs);
          if (await this.isAuthenticated()) {
            this.logger.info("auth_form_login_ok", { address: this.page.url() });
            return true;
          }
          this.logger.warn("auth_form_login_not_confirmed", { address: this.page.url() });
        } else {
          this.logger.warn("auth_login_form_not_found", { address: this.page.url() });
        }
      }

      this.logger.info("auth_waiting_for_operator");
      await this.operator.waitForConfirmation(MANUAL_LOGIN_PROMPT);
      const authenticated = await this.isAuthenticated();
      if (authenticated) {
        this.logger.info("auth_manual_login_ok", { address: this.page.url() });
      } else {
        this.metrics.incrementCounter("auth_failures");
        this.logger.error("auth_failed", { address: this.page.url() });
      }
      return authenticated;
    } catch (error) {
      this.metrics.incrementCounter("auth_failures");
      this.logger.error("auth_error", { error: errorMessage(error) });
      return false;
    }
  }

  async isAuthenticated(): Promise<boolean> {
    const $ = loadDocument(await this.page.content());
    for (const indicator of this.config.selectors.authIndicators) {
      if (selectAll($, indicator).length > 0) {
        return true;
      }
    }

    const currentUrl = this.page.url().toLowerCase();
    return !LOGIN_URL_MARKERS.some((marker) => currentUrl.includes(marker));
  }

  private async submitLoginForm(credentials: Credentials): Promise<boolean> {
    const match = await this.findLoginForm();
    if (!match) {
      return false;
    }

    const within = { selector: match.formSelector, index: match.formIndex };
    this.logger.info("auth_login_form_found", { formSelector: match.formSelector, formIndex: match.formIndex });
    await this.page.fill({ selector: match.usernameSelector, within }, credentials.username);
    await this.page.fill({ selector: match.passwordSelector, within }, credentials.password);
    await this.page.click({ selector: match.submitSelector, within });
    return true;
  }

  private async findLoginForm(): Promise<LoginFormMatch | undefined> {
    const $ = loadDocument(await this.page.content());
    const { selectors } = this.config;
    const formSelectors = uniqueSelectors([...selectors.loginForm, ...FALLBACK_FORM_SELECTORS]);

    for (const formSelector of formSelectors) {
      const forms = selectAll($, formSelector);
      for (let formIndex = 0; formIndex < forms.length; formIndex += 1) {
        const form = forms.eq(formIndex);
        const usernameSelector = selectors.usernameField.find((selector) => findWithin(form, selector).length > 0);
        const passwordSelector = selectors.passwordField.find((selector) => findWithin(form, selector).length > 0);
        const submitSelector = selectors.submitButton.find((selector) => findWithin(form, selector).length > 0);

        if (usernameSelector && passwordSelector && submitSelector) {
          return { formSelector, formIndex, usernameSelector, passwordSelector, submitSelector };
        }
      }
    }

    return undefined;
  }
}
