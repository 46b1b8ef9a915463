import { AutomationPage } from "../automation/session";

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const MIN_DESCRIPTION_LENGTH = 50;

export function extractEmail(text: string): string | undefined {
  const match = EMAIL_PATTERN.exec(text);
  return match ? match[0] : undefined;
}

/** First selector whose text is long enough to be a real description. */
export async function readDescription(page: AutomationPage, selectors: string[]): Promise<string | undefined> {
  for (const selector of selectors) {
    const text = await page.textOf(selector);
    if (text && text.length > MIN_DESCRIPTION_LENGTH) {
      return text;
    }
  }
  return undefined;
}

export function cardLines(cardText: string): string[] {
  return cardText
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function absoluteUrl(href: string, origin: string): string {
  if (href.startsWith("http")) {
    return href;
  }
  return `${origin}${href.startsWith("/") ? "" : "/"}${href}`;
}

export function parseMoney(text: string): number | undefined {
  const match = /\$\s*([\d,]+(?:\.\d+)?)/.exec(text);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1].replace(/,/g, ""));
  return Number.isFinite(value) ? value : undefined;
}

export function parseMoneyRange(text: string): { min?: number; max?: number } {
  const values = Array.from(text.matchAll(/\$\s*([\d,]+(?:\.\d+)?)/g))
    .map((match) => Number(match[1].replace(/,/g, "")))
    .filter((value) => Number.isFinite(value));
  if (values.length === 0) {
    return {};
  }
  return { min: values[0], max: values.length > 1 ? values[1] : values[0] };
}
