export interface AutomationSession {
  newPage(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export interface ElementMatch {
  /** Selector that addresses exactly the matched element for the current render. */
  selector: string;
  text: string;
}

export interface ControlSnapshot {
  ref: string;
  tag: "input" | "textarea" | "select";
  /** Lower-cased `type` attribute for inputs, empty for textarea and select. */
  inputType: string;
  value: string;
  checked: boolean;
  required: boolean;
  maxLength: number | null;
  /** Text of the label attached to a radio or checkbox. */
  label: string;
  options: string[];
}

export interface FieldGroupSnapshot {
  /** Identity of the group that survives re-renders (control id or name, else label text). */
  key: string;
  label: string;
  controls: ControlSnapshot[];
  /** Text of the site's "file already attached" marker inside the group, if any. */
  attachedFile: string;
}

export interface ButtonSnapshot {
  ref: string;
  text: string;
  ariaLabel: string;
  disabled: boolean;
}

export interface LinkSnapshot {
  href: string;
  text: string;
  ariaLabel: string;
  cardText: string;
}

export interface FieldScanOptions {
  groupSelector: string;
  labelSelector: string;
  attachedFileSelector?: string;
}

export interface AutomationPage {
  goto(url: string): Promise<void>;
  url(): string;
  /** Resolves false when nothing matching `selector` became visible within the timeout. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  findFirst(selectors: string[], textPattern?: RegExp): Promise<ElementMatch | null>;
  textOf(selector: string): Promise<string | null>;
  attributeOf(selector: string, name: string): Promise<string | null>;
  click(selector: string): Promise<void>;
  clear(selector: string): Promise<void>;
  typeCharacter(selector: string, character: string): Promise<void>;
  selectOption(selector: string, label: string): Promise<void>;
  isChecked(selector: string): Promise<boolean>;
  readFieldGroups(options: FieldScanOptions): Promise<FieldGroupSnapshot[]>;
  readButtons(scopeSelector: string): Promise<ButtonSnapshot[]>;
  collectLinks(linkSelector: string, cardSelector: string): Promise<LinkSnapshot[]>;
  scroll(containerSelector: string | null, steps: number): Promise<void>;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}
