import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import type { AutomationPage, AutomationSession, FieldKind, PageField } from "./session";

export interface PlaywrightOptions {
  headless: boolean;
  slowMoMs: number;
  userDataDir?: string;
}

/**
 * playwright-core ships no browsers, so this drives an installed Chrome, or the binary
 * named by JOBPIPE_CHROME_PATH.
 */
export async function createPlaywrightSession(
  options: PlaywrightOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<AutomationSession> {
  const executablePath = env.JOBPIPE_CHROME_PATH;
  const launchOptions = {
    headless: options.headless,
    slowMo: options.slowMoMs,
    executablePath: executablePath && executablePath.length > 0 ? executablePath : undefined,
    channel: executablePath && executablePath.length > 0 ? undefined : "chrome",
    args: ["--disable-crashpad", "--disable-crash-reporter", "--no-crashpad"],
  };

  if (options.userDataDir) {
    const context = await chromium.launchPersistentContext(options.userDataDir, launchOptions);
    return new PlaywrightSession(context, null);
  }

  const browser = await chromium.launch(launchOptions);
  const context = await browser.newContext();
  return new PlaywrightSession(context, browser);
}

class PlaywrightSession implements AutomationSession {
  private readonly context: BrowserContext;
  private readonly browser: Browser | null;

  constructor(context: BrowserContext, browser: Browser | null) {
    this.context = context;
    this.browser = browser;
  }

  async newPage(): Promise<AutomationPage> {
    const page = await this.context.newPage();
    return new PlaywrightAutomationPage(page);
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser?.close();
  }
}

class PlaywrightAutomationPage implements AutomationPage {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: 30_000 });
  }

  url(): string {
    return this.page.url();
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().fill(value);
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click();
  }

  async uploadFile(selector: string, filePath: string): Promise<void> {
    await this.page.locator(selector).first().setInputFiles(filePath);
  }

  async waitFor(selector: string, timeoutMs = 10_000): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async fillByLabel(label: string, value: string): Promise<boolean> {
    const locator = this.page.getByLabel(label, { exact: false });
    if ((await locator.count()) === 0) {
      return false;
    }

    const target = locator.first();
    const tag = await target.evaluate((el) => el.tagName.toLowerCase());
    if (tag === "select") {
      await target.selectOption({ label: value }).catch(() => target.selectOption(value));
      return true;
    }
    await target.fill(value);
    return true;
  }

  async listFields(): Promise<PageField[]> {
    const raw = await this.page.evaluate(() => {
      const textOf = (el: Element | null): string => el?.textContent?.replace(/\s+/g, " ").trim() ?? "";
      const labelFor = (el: HTMLElement): string => {
        if (el.id) {
          const explicit = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
          if (explicit) return textOf(explicit);
        }
        const wrapping = el.closest("label");
        if (wrapping) return textOf(wrapping);
        return el.getAttribute("aria-label") ?? "";
      };

      const fields: Array<{ label: string; kind: string; required: boolean; filled: boolean }> = [];
      for (const el of Array.from(document.querySelectorAll("input, textarea, select"))) {
        if (!(el instanceof HTMLElement)) continue;
        let kind = "text";
        let filled = false;
        if (el instanceof HTMLTextAreaElement) {
          kind = "textarea";
          filled = el.value.trim().length > 0;
        } else if (el instanceof HTMLSelectElement) {
          kind = "select";
          filled = el.selectedIndex > 0;
        } else if (el instanceof HTMLInputElement) {
          const type = el.type.toLowerCase();
          if (type === "hidden" || type === "submit" || type === "button") continue;
          kind = type === "file" || type === "checkbox" || type === "radio" ? type : "text";
          filled = type === "checkbox" || type === "radio" ? el.checked : el.value.trim().length > 0;
        }
        const label = labelFor(el);
        if (!label) continue;
        fields.push({ label, kind, required: el.hasAttribute("required") || el.getAttribute("aria-required") === "true", filled });
      }
      return fields;
    });

    return raw.map((field) => ({ ...field, kind: toFieldKind(field.kind) }));
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

function toFieldKind(kind: string): FieldKind {
  switch (kind) {
    case "textarea":
    case "select":
    case "checkbox":
    case "radio":
    case "file":
      return kind;
    default:
      return "text";
  }
}
