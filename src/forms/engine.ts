import { PacingGovernor } from "../automation/pacing";
import { AutomationPage } from "../automation/session";
import { FormSurface, NavigationControl, NavigationPatterns } from "./inspector";

/** Where a site renders its application form and how its fields are grouped. */
export interface FormSelectors {
  /** Container of the form; navigation buttons are read from inside it. */
  formScopeSelector: string;
  groupSelector: string;
  labelSelector: string;
  attachedFileSelector?: string;
  messageLabelPattern?: RegExp;
  navigationPatterns?: NavigationPatterns;
}

export function createPageFormSurface(
  page: AutomationPage,
  selectors: FormSelectors,
  pacing: PacingGovernor
): FormSurface {
  return {
    readFields: () =>
      page.readFieldGroups({
        groupSelector: selectors.groupSelector,
        labelSelector: selectors.labelSelector,
        attachedFileSelector: selectors.attachedFileSelector,
      }),
    readButtons: () => page.readButtons(selectors.formScopeSelector),
    async advance(control: NavigationControl, signal?: AbortSignal): Promise<void> {
      await page.click(control.ref);
      await pacing.pause(signal);
    },
  };
}
