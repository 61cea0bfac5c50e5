import fs from "fs";
import path from "path";
import { setTimeout as delay } from "timers/promises";
import type { AutomationPage, AutomationSession } from "../automation/session";
import { errorMessage } from "../core/errors";
import type { Logger } from "../logging";
import type { FillResult, FormFiller, JobContext, SubmitResult } from "../types/collaborators";
import type { Platform } from "../types/jobs";
import { applyUrl, PLATFORM_SELECTORS, profileValue, type PlatformSelectors, type ProfileField } from "./selectors";

export interface BrowserFormFillerOptions {
  openSession: () => Promise<AutomationSession>;
  logger: Logger;
  selectors?: Partial<Record<Platform, PlatformSelectors>>;
  confirmTimeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Fills application forms in a shared browser session. The page opened by `fill` is
 * kept only when `submitAfterFill` is set, so the following `submit` acts on the
 * reviewed form; any other fill closes its page before returning.
 */
export class BrowserFormFiller implements FormFiller {
  private readonly options: BrowserFormFillerOptions;
  private readonly selectors: Partial<Record<Platform, PlatformSelectors>>;
  private readonly pages = new Map<number, AutomationPage>();
  private session: AutomationSession | null = null;

  constructor(options: BrowserFormFillerOptions) {
    this.options = options;
    this.selectors = options.selectors ?? PLATFORM_SELECTORS;
  }

  async fill(platform: Platform, ctx: JobContext): Promise<FillResult> {
    const selectors = this.selectors[platform];
    if (!selectors) {
      return { ok: false, error: `no form selectors for platform '${platform}'` };
    }

    const jobId = ctx.job.id;
    await this.discardPage(jobId);
    if (ctx.signal?.aborted) {
      return { ok: false, error: "fill cancelled" };
    }
    const page = await this.openPage(jobId);
    if (ctx.signal?.aborted) {
      await this.discardPage(jobId);
      return { ok: false, error: "fill cancelled" };
    }
    const stopOnAbort = this.closeOnAbort(jobId, ctx.signal);
    try {
      await page.goto(applyUrl(ctx.job.url, selectors));
      if (selectors.applyButton && (await page.exists(selectors.applyButton))) {
        await page.click(selectors.applyButton);
      }
      await page.waitFor(selectors.form);

      const filledFields = await this.fillProfile(page, selectors, ctx);
      await this.uploadResume(page, selectors, ctx);
      const answered = await this.fillAnswers(page, ctx);
      this.options.logger.info(`Job #${jobId}: filled ${filledFields} profile field(s), ${answered} answer(s)`);

      const missing = (await page.listFields()).filter((field) => field.required && !field.filled && field.kind !== "file");
      const screenshotRef = await this.capture(page, ctx, "filled");
      if (missing.length > 0) {
        await this.discardPage(jobId);
        const labels = missing.map((field) => field.label.slice(0, 60)).join("; ");
        return { ok: false, screenshotRef, error: `required fields left empty: ${labels}` };
      }
      if (!ctx.submitAfterFill) {
        await this.discardPage(jobId);
      }
      return { ok: true, screenshotRef };
    } catch (error) {
      await this.discardPage(jobId);
      return { ok: false, error: errorMessage(error) };
    } finally {
      stopOnAbort();
    }
  }

  async submit(platform: Platform, ctx: JobContext): Promise<SubmitResult> {
    const selectors = this.selectors[platform];
    if (!selectors) {
      return { ok: false, error: `no form selectors for platform '${platform}'` };
    }

    const jobId = ctx.job.id;
    let page = this.pages.get(jobId);
    if (!page) {
      // No form open for this job: fill it again first.
      const refilled = await this.fill(platform, { ...ctx, submitAfterFill: true });
      page = this.pages.get(jobId);
      if (!refilled.ok || !page) {
        return { ok: false, screenshotRef: refilled.screenshotRef, error: refilled.error ?? "form could not be reopened" };
      }
    }

    const stopOnAbort = this.closeOnAbort(jobId, ctx.signal);
    try {
      if (!(await page.exists(selectors.submit))) {
        const screenshotRef = await this.capture(page, ctx, "no-submit");
        return { ok: false, screenshotRef, error: "submit button not found" };
      }
      await page.click(selectors.submit);
      const confirmed = await this.waitForConfirmation(page, selectors);
      const screenshotRef = await this.capture(page, ctx, confirmed ? "submitted" : "unconfirmed");
      if (!confirmed) {
        return { ok: false, screenshotRef, error: "no confirmation after submit" };
      }
      return { ok: true, screenshotRef };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    } finally {
      stopOnAbort();
      await this.discardPage(jobId);
    }
  }

  async close(): Promise<void> {
    for (const jobId of Array.from(this.pages.keys())) {
      await this.discardPage(jobId);
    }
    if (this.session) {
      const session = this.session;
      this.session = null;
      await session.close();
    }
  }

  private async openPage(jobId: number): Promise<AutomationPage> {
    if (!this.session) {
      this.session = await this.options.openSession();
    }
    const page = await this.session.newPage();
    this.pages.set(jobId, page);
    return page;
  }

  /** Closes the job's page when the signal aborts, failing whatever step is in flight. */
  private closeOnAbort(jobId: number, signal: AbortSignal | undefined): () => void {
    if (!signal) {
      return () => undefined;
    }
    const onAbort = (): void => {
      void this.discardPage(jobId);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    return () => signal.removeEventListener("abort", onAbort);
  }

  private async discardPage(jobId: number): Promise<void> {
    const page = this.pages.get(jobId);
    if (!page) {
      return;
    }
    this.pages.delete(jobId);
    try {
      await page.close();
    } catch (error) {
      this.options.logger.warn(`Job #${jobId}: closing page failed (${errorMessage(error)})`);
    }
  }

  private async fillProfile(page: AutomationPage, selectors: PlatformSelectors, ctx: JobContext): Promise<number> {
    let filled = 0;
    for (const [field, selector] of Object.entries(selectors.fields)) {
      if (!selector || !isProfileField(field)) {
        continue;
      }
      const value = profileValue(ctx.profile, field);
      if (!value || !(await page.exists(selector))) {
        continue;
      }
      await page.fill(selector, value);
      filled += 1;
    }
    return filled;
  }

  private async uploadResume(page: AutomationPage, selectors: PlatformSelectors, ctx: JobContext): Promise<void> {
    if (!ctx.resumePath) {
      this.options.logger.warn(`Job #${ctx.job.id}: no resume available to upload`);
      return;
    }
    if (!fs.existsSync(ctx.resumePath)) {
      throw new Error(`Resume file not found: ${ctx.resumePath}`);
    }
    if (await page.exists(selectors.resume)) {
      await page.uploadFile(selectors.resume, ctx.resumePath);
    }
  }

  private async fillAnswers(page: AutomationPage, ctx: JobContext): Promise<number> {
    let answered = 0;
    for (const [question, answer] of Object.entries(ctx.answers)) {
      if (await page.fillByLabel(question, answer)) {
        answered += 1;
      }
    }

    // Questions only visible on the page are resolved as they are found.
    const pending = (await page.listFields()).filter(
      (field) => !field.filled && (field.kind === "textarea" || (field.required && field.kind === "text"))
    );
    for (const field of pending) {
      if (Object.hasOwn(ctx.answers, field.label)) {
        continue;
      }
      const answer = await ctx.resolveQuestion(field.label);
      if (answer !== null && (await page.fillByLabel(field.label, answer))) {
        answered += 1;
      }
    }
    return answered;
  }

  private async waitForConfirmation(page: AutomationPage, selectors: PlatformSelectors): Promise<boolean> {
    const timeoutMs = this.options.confirmTimeoutMs ?? 15_000;
    const pollMs = this.options.pollIntervalMs ?? 500;
    const deadline = Date.now() + timeoutMs;
    do {
      for (const selector of selectors.confirmation) {
        if (await page.exists(selector)) {
          return true;
        }
      }
      await delay(pollMs);
    } while (Date.now() < deadline);
    return false;
  }

  private async capture(page: AutomationPage, ctx: JobContext, label: string): Promise<string> {
    fs.mkdirSync(ctx.screenshotDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const file = path.join(ctx.screenshotDir, `job-${ctx.job.id}-${label}-${stamp}.png`);
    await page.screenshot(file);
    return file;
  }
}

const PROFILE_FIELDS: readonly ProfileField[] = [
  "fullName",
  "firstName",
  "lastName",
  "email",
  "phone",
  "location",
  "linkedin",
  "github",
  "website",
];

function isProfileField(value: string): value is ProfileField {
  return PROFILE_FIELDS.some((field) => field === value);
}
