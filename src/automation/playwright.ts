import { chromium, errors, Browser, BrowserContext, Page } from "playwright";
import {
  AutomationPage,
  AutomationSession,
  ButtonSnapshot,
  ElementMatch,
  FieldGroupSnapshot,
  FieldScanOptions,
  LinkSnapshot,
} from "./session";

export interface PlaywrightOptions {
  headless: boolean;
  slowMoMs: number;
  userDataDir?: string;
}

export async function createPlaywrightSession(options: PlaywrightOptions): Promise<AutomationSession> {
  const browserOverride = (process.env.APPLYGATE_BROWSER || "").toLowerCase();
  const useChromium = browserOverride === "chromium";
  const chromePath = useChromium ? process.env.APPLYGATE_CHROMIUM_PATH : process.env.APPLYGATE_CHROME_PATH;
  const launchOptions = {
    headless: options.userDataDir ? false : options.headless,
    slowMo: options.slowMoMs,
    executablePath: chromePath && chromePath.length > 0 ? chromePath : undefined,
    channel: options.userDataDir && !useChromium ? "chrome" : undefined,
    args: ["--disable-crashpad", "--disable-crash-reporter", "--start-maximized"],
  };

  if (options.userDataDir) {
    const context = await chromium.launchPersistentContext(options.userDataDir, {
      ...launchOptions,
      viewport: null,
    });
    return new PlaywrightPersistentSession(context);
  }

  const browser = await chromium.launch(launchOptions);
  const context = await browser.newContext({ viewport: null });
  return new PlaywrightAutomationSession(browser, context);
}

class PlaywrightAutomationSession implements AutomationSession {
  private browser: Browser;
  private context: BrowserContext;

  constructor(browser: Browser, context: BrowserContext) {
    this.browser = browser;
    this.context = context;
  }

  async newPage(): Promise<AutomationPage> {
    const page = await this.context.newPage();
    return new PlaywrightAutomationPage(page);
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

class PlaywrightPersistentSession implements AutomationSession {
  private context: BrowserContext;

  constructor(context: BrowserContext) {
    this.context = context;
  }

  async newPage(): Promise<AutomationPage> {
    const existing = this.context.pages()[0];
    const page = existing ?? (await this.context.newPage());
    return new PlaywrightAutomationPage(page);
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

class PlaywrightAutomationPage implements AutomationPage {
  private page: Page;
  private scanCounter = 0;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
    await this.page.waitForLoadState("networkidle", { timeout: 10000 }).catch((error: unknown) => {
      if (!(error instanceof errors.TimeoutError)) {
        throw error;
      }
    });
  }

  url(): string {
    return this.page.url();
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs, state: "visible" });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async findFirst(selectors: string[], textPattern?: RegExp): Promise<ElementMatch | null> {
    for (const selector of selectors) {
      const locator = this.page.locator(selector);
      const count = await locator.count();
      for (let index = 0; index < count; index += 1) {
        const candidate = locator.nth(index);
        if (!(await candidate.isVisible())) {
          continue;
        }
        const text = (await candidate.innerText()).trim();
        if (textPattern && !textPattern.test(text)) {
          continue;
        }
        const marker = this.nextMarker("target");
        await candidate.evaluate((el, value) => el.setAttribute("data-applygate-target", value), marker);
        return { selector: `[data-applygate-target="${marker}"]`, text };
      }
    }
    return null;
  }

  async textOf(selector: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return (await locator.innerText()).trim();
  }

  async attributeOf(selector: string, name: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return locator.getAttribute(name);
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click();
  }

  async clear(selector: string): Promise<void> {
    await this.page.locator(selector).first().fill("");
  }

  async typeCharacter(selector: string, character: string): Promise<void> {
    await this.page.locator(selector).first().pressSequentially(character);
  }

  async selectOption(selector: string, label: string): Promise<void> {
    await this.page.locator(selector).first().selectOption({ label });
  }

  async isChecked(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isChecked();
  }

  async readFieldGroups(options: FieldScanOptions): Promise<FieldGroupSnapshot[]> {
    const scanId = this.nextMarker("scan");
    return this.page.evaluate(
      ({ groupSelector, labelSelector, attachedFileSelector, scanId: scan }) => {
        const textOf = (el: Element | null | undefined): string => el?.textContent?.replace(/\s+/g, " ").trim() || "";
        const all = Array.from(document.querySelectorAll(groupSelector));
        const groups = all.filter((group) => !all.some((other) => other !== group && group.contains(other)));
        const placeholder = /^(select( an option)?|choose|--.*|)$/i;

        return groups.map((group, groupIndex) => {
          const label = textOf(group.querySelector(labelSelector));
          const elements = Array.from(group.querySelectorAll("input, textarea, select")).filter(
            (el) => (el.getAttribute("type") || "").toLowerCase() !== "hidden"
          );

          const controls = elements.map((el, controlIndex) => {
            const marker = `${scan}-${groupIndex}-${controlIndex}`;
            el.setAttribute("data-applygate-control", marker);
            const base = {
              ref: `[data-applygate-control="${marker}"]`,
              required: el.hasAttribute("required") || el.getAttribute("aria-required") === "true",
            };

            if (el instanceof HTMLSelectElement) {
              const selected = el.selectedOptions[0];
              const value = selected && el.value ? textOf(selected) : "";
              return {
                ...base,
                tag: "select" as const,
                inputType: "",
                value: placeholder.test(value) ? "" : value,
                checked: false,
                maxLength: null,
                label: "",
                options: Array.from(el.options)
                  .map((option) => textOf(option))
                  .filter((text) => !placeholder.test(text)),
              };
            }

            if (el instanceof HTMLTextAreaElement) {
              return {
                ...base,
                tag: "textarea" as const,
                inputType: "",
                value: el.value.trim(),
                checked: false,
                maxLength: el.maxLength > 0 ? el.maxLength : null,
                label: "",
                options: [],
              };
            }

            const input = el instanceof HTMLInputElement ? el : null;
            const inputType = (el.getAttribute("type") || "text").toLowerCase();
            const toggle = inputType === "radio" || inputType === "checkbox";
            const labels = input && input.labels ? Array.from(input.labels) : [];
            let value = input ? input.value.trim() : "";
            if (inputType === "file") {
              value = input && input.files && input.files.length > 0 ? input.files[0].name : "";
            }
            return {
              ...base,
              tag: "input" as const,
              inputType,
              value,
              checked: toggle && input ? input.checked : false,
              maxLength: input && input.maxLength > 0 ? input.maxLength : null,
              label: toggle ? (labels.length > 0 ? textOf(labels[0]) : textOf(el.parentElement)) : "",
              options: [],
            };
          });

          const first = elements[0];
          const identity = first ? first.id || first.getAttribute("name") || "" : "";
          return {
            key: identity ? `control:${identity}` : `label:${label}`,
            label,
            controls,
            attachedFile: attachedFileSelector ? textOf(group.querySelector(attachedFileSelector)) : "",
          };
        });
      },
      {
        groupSelector: options.groupSelector,
        labelSelector: options.labelSelector,
        attachedFileSelector: options.attachedFileSelector ?? "",
        scanId,
      }
    );
  }

  async readButtons(scopeSelector: string): Promise<ButtonSnapshot[]> {
    const scanId = this.nextMarker("buttons");
    return this.page.evaluate(
      ({ scope, scan }) => {
        const root = document.querySelector(scope) ?? document.body;
        const candidates = Array.from(root.querySelectorAll("button, [role='button'], input[type='submit']"));
        return candidates
          .filter((el): el is HTMLElement => el instanceof HTMLElement && el.getClientRects().length > 0)
          .map((el, index) => {
            const marker = `${scan}-${index}`;
            el.setAttribute("data-applygate-button", marker);
            const text =
              el instanceof HTMLInputElement ? el.value : el.textContent?.replace(/\s+/g, " ").trim() || "";
            return {
              ref: `[data-applygate-button="${marker}"]`,
              text,
              ariaLabel: el.getAttribute("aria-label") || "",
              disabled: el.hasAttribute("disabled") || el.getAttribute("aria-disabled") === "true",
            };
          });
      },
      { scope: scopeSelector, scan: scanId }
    );
  }

  async collectLinks(linkSelector: string, cardSelector: string): Promise<LinkSnapshot[]> {
    return this.page.evaluate(
      ({ links, card }) => {
        return Array.from(document.querySelectorAll(links)).map((anchor) => {
          const container = anchor.closest(card);
          return {
            href: anchor.getAttribute("href") || "",
            text: anchor.textContent?.replace(/\s+/g, " ").trim() || "",
            ariaLabel: anchor.getAttribute("aria-label") || "",
            cardText: container instanceof HTMLElement ? container.innerText : "",
          };
        });
      },
      { links: linkSelector, card: cardSelector }
    );
  }

  async scroll(containerSelector: string | null, steps: number): Promise<void> {
    for (let step = 0; step < steps; step += 1) {
      await this.page.evaluate((target) => {
        const container = target ? document.querySelector(target) : null;
        if (container) {
          container.scrollTop = container.scrollTop + 400;
        } else {
          window.scrollBy(0, 500);
        }
      }, containerSelector);
      await this.page.waitForTimeout(400);
    }
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async close(): Promise<void> {
    await this.page.close();
  }

  private nextMarker(prefix: string): string {
    this.scanCounter += 1;
    return `${prefix}${this.scanCounter}`;
  }
}
