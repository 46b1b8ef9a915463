import { setTimeout as delay } from "timers/promises";
import { DelayRange, PacingConfig } from "../config";

export type RandomSource = () => number;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface PacingGovernor {
  /** Waits one human-like pause before the next interaction; resolves to the total milliseconds waited. */
  pause(signal?: AbortSignal, override?: DelayRange): Promise<number>;
  /** Types `text` one character at a time through `typeCharacter`, pausing between keystrokes. */
  typeText(text: string, typeCharacter: (character: string) => Promise<void>, signal?: AbortSignal): Promise<void>;
  /** Inclusive integer draw from a range. */
  draw(range: DelayRange): number;
}

export interface PacingOptions {
  random?: RandomSource;
  sleep?: SleepFn;
}

export function createPacingGovernor(config: PacingConfig, options: PacingOptions = {}): PacingGovernor {
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;

  const draw = (range: DelayRange): number => {
    const min = Math.min(range.minMs, range.maxMs);
    const max = Math.max(range.minMs, range.maxMs);
    return min + Math.floor(random() * (max - min + 1));
  };

  return {
    draw,

    async pause(signal?: AbortSignal, override?: DelayRange): Promise<number> {
      signal?.throwIfAborted();
      let total = draw(override ?? config.action);
      if (random() < config.hesitation.probability) {
        total += draw(config.hesitation);
      }
      await sleep(total, signal);
      return total;
    },

    async typeText(text, typeCharacter, signal) {
      for (const character of text) {
        signal?.throwIfAborted();
        await typeCharacter(character);
        await sleep(draw(config.keystroke), signal);
      }
    },
  };
}
