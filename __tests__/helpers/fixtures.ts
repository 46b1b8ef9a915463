import { vi } from "vitest";
import { AutomationConfig, PacingConfig } from "../../src/config";
import { createPacingGovernor, PacingGovernor } from "../../src/automation/pacing";
import {
  AutomationPage,
  ButtonSnapshot,
  ControlSnapshot,
  ElementMatch,
  FieldGroupSnapshot,
  LinkSnapshot,
} from "../../src/automation/session";
import { SiteProfile } from "../../src/connectors/applicationDriver";
import { Logger } from "../../src/logging/logger";
import { Job } from "../../src/types/jobs";

export const ZERO_PACING: PacingConfig = {
  action: { minMs: 0, maxMs: 0 },
  hesitation: { minMs: 0, maxMs: 0, probability: 0 },
  keystroke: { minMs: 0, maxMs: 0 },
};

export function instantPacing(): PacingGovernor {
  return createPacingGovernor(ZERO_PACING, { random: () => 0.5, sleep: async () => {} });
}

export function testAutomation(overrides: Partial<AutomationConfig> = {}): AutomationConfig {
  return {
    maxFormPages: 10,
    surfaceTimeoutMs: 100,
    confirmationWaitMs: 100,
    screenshots: false,
    pacing: ZERO_PACING,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function testJob(overrides: Partial<Job> = {}): Job {
  return {
    platform: "linkedin",
    externalJobId: "4000000001",
    title: "Backend Engineer",
    company: "Example Corp",
    location: "Remote",
    url: "https://jobs.example.test/4000000001",
    ...overrides,
  };
}

export function control(overrides: Partial<ControlSnapshot> & Pick<ControlSnapshot, "ref">): ControlSnapshot {
  return {
    tag: "input",
    inputType: "text",
    value: "",
    checked: false,
    required: false,
    maxLength: null,
    label: "",
    options: [],
    ...overrides,
  };
}

export function group(key: string, label: string, controls: ControlSnapshot[], attachedFile = ""): FieldGroupSnapshot {
  return { key, label, controls, attachedFile };
}

export function button(ref: string, text: string, disabled = false): ButtonSnapshot {
  return { ref, text, ariaLabel: "", disabled };
}

export const TEST_PROFILE: SiteProfile = {
  platform: "linkedin",
  formScopeSelector: ".apply-form",
  groupSelector: ".field",
  labelSelector: "label",
  messageLabelPattern: /cover letter/i,
  entryPointSelectors: ["#apply"],
  surfaceSelector: ".apply-form",
  backSelectors: ["#back"],
  dismissSelectors: ["#dismiss"],
  discardSelectors: ["#discard"],
  successSelectors: ["#success"],
  errorSelectors: ["#error"],
  confirmationDismissSelectors: ["#close"],
  login: {
    url: "https://jobs.example.test/login",
    homeUrl: "https://jobs.example.test/feed",
    loginPathMarkers: ["/login"],
    authenticatedPathMarkers: [],
    loggedInSelectors: ["#account-menu"],
    loggedOutSelectors: ["#sign-in"],
  },
};

export interface FakeFormPage {
  groups: FieldGroupSnapshot[];
  buttons: ButtonSnapshot[];
}

export type Confirmation = "success" | "error" | "none";

/**
 * In-memory application surface keyed to TEST_PROFILE's selectors. Navigation
 * buttons with ref "next" or "review" advance a page, "submit" records the
 * submission and runs `onSubmitClick`; the last page repeats when the form runs out.
 */
export class FakeApplicationPage implements AutomationPage {
  pageIndex = 0;
  hasEntryPoint = true;
  surfaceOpens = true;
  confirmation: Confirmation = "success";
  validationText = "";
  submitClicked = false;
  loggedIn = true;
  currentUrl = "about:blank";
  onSubmitClick?: () => void;
  readonly visited: string[] = [];
  readonly clicks: string[] = [];
  readonly typed = new Map<string, string>();
  readonly selected = new Map<string, string>();
  readonly checked = new Set<string>();

  constructor(readonly pages: FakeFormPage[]) {}

  async goto(url: string): Promise<void> {
    this.visited.push(url);
    this.currentUrl = url;
  }

  url(): string {
    return this.currentUrl;
  }

  async waitFor(selector: string): Promise<boolean> {
    if (selector === TEST_PROFILE.surfaceSelector) {
      return this.surfaceOpens;
    }
    return this.confirmation !== "none";
  }

  async findFirst(selectors: string[]): Promise<ElementMatch | null> {
    const [selector] = selectors;
    switch (selector) {
      case "#apply":
        return this.hasEntryPoint ? { selector, text: "Easy Apply" } : null;
      case "#back":
        return this.pageIndex > 0 ? { selector, text: "Back" } : null;
      case "#dismiss":
        return { selector, text: "Dismiss" };
      case "#success":
        return this.confirmation === "success" ? { selector, text: "Application sent" } : null;
      case "#error":
        return this.confirmation === "error" ? { selector, text: this.validationText } : null;
      case "#account-menu":
        return this.loggedIn ? { selector, text: "Me" } : null;
      case "#sign-in":
        return this.loggedIn ? null : { selector, text: "Sign in" };
      default:
        return null;
    }
  }

  async textOf(): Promise<string | null> {
    return null;
  }

  async attributeOf(): Promise<string | null> {
    return null;
  }

  async click(selector: string): Promise<void> {
    this.clicks.push(selector);
    if (selector === "next" || selector === "review") {
      this.pageIndex = Math.min(this.pageIndex + 1, this.pages.length - 1);
    } else if (selector === "#back") {
      this.pageIndex -= 1;
    } else if (selector === "submit") {
      this.submitClicked = true;
      this.onSubmitClick?.();
    }
  }

  async clear(selector: string): Promise<void> {
    this.typed.set(selector, "");
  }

  async typeCharacter(selector: string, character: string): Promise<void> {
    this.typed.set(selector, `${this.typed.get(selector) ?? ""}${character}`);
  }

  async selectOption(selector: string, label: string): Promise<void> {
    this.selected.set(selector, label);
  }

  async isChecked(selector: string): Promise<boolean> {
    return this.checked.has(selector);
  }

  async readFieldGroups(): Promise<FieldGroupSnapshot[]> {
    return this.current().groups;
  }

  async readButtons(): Promise<ButtonSnapshot[]> {
    return this.current().buttons;
  }

  async collectLinks(): Promise<LinkSnapshot[]> {
    return [];
  }

  async scroll(): Promise<void> {}

  async screenshot(): Promise<void> {}

  async close(): Promise<void> {}

  private current(): FakeFormPage {
    return this.pages[this.pageIndex] ?? { groups: [], buttons: [] };
  }
}
