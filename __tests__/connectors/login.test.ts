import { describe, expect, it, vi } from "vitest";
import { createLoginFlow, LOGIN_POLL_MS, readLoginStatus } from "../../src/connectors/login";
import { FakeApplicationPage, silentLogger, TEST_PROFILE } from "../helpers/fixtures";

const HOME = "https://jobs.example.test/feed";
const LOGIN = "https://jobs.example.test/login";

describe("readLoginStatus", () => {
  it("needs a member control without a sign-in link", async () => {
    const page = new FakeApplicationPage([]);
    await page.goto(HOME);
    expect(await readLoginStatus(page, TEST_PROFILE.login)).toBe(true);

    page.loggedIn = false;
    expect(await readLoginStatus(page, TEST_PROFILE.login)).toBe(false);
  });

  it("treats the sign-in path as signed out", async () => {
    const page = new FakeApplicationPage([]);
    await page.goto(LOGIN);
    expect(await readLoginStatus(page, TEST_PROFILE.login)).toBe(false);
  });

  it("trusts a member-only path without the member control", async () => {
    const page = new FakeApplicationPage([]);
    page.findFirst = async () => null;
    await page.goto("https://jobs.example.test/inbox");

    const login = { ...TEST_PROFILE.login, authenticatedPathMarkers: ["/inbox"] };

    expect(await readLoginStatus(page, login)).toBe(true);
    expect(await readLoginStatus(page, TEST_PROFILE.login)).toBe(false);
  });
});

describe("createLoginFlow", () => {
  function flowFor(page: FakeApplicationPage | null, onSleep: (count: number) => void = () => {}) {
    let now = 0;
    let sleeps = 0;
    const sleep = vi.fn(async (ms: number) => {
      now += ms;
      sleeps += 1;
      onSleep(sleeps);
    });
    const flow = createLoginFlow({
      login: TEST_PROFILE.login,
      getPage: async () => page,
      logger: silentLogger(),
      sleep,
      now: () => now,
    });
    return { flow, sleep };
  }

  it("checks the member landing page", async () => {
    const page = new FakeApplicationPage([]);
    const { flow } = flowFor(page);

    expect(await flow.checkLoginStatus()).toBe(true);
    expect(page.visited).toEqual([HOME]);
  });

  it("reports signed out without a page", async () => {
    const { flow } = flowFor(null);
    expect(await flow.checkLoginStatus()).toBe(false);
    expect(await flow.login({ timeoutMs: 10000 })).toBe(false);
  });

  it("returns at once when already signed in", async () => {
    const page = new FakeApplicationPage([]);
    const { flow, sleep } = flowFor(page);
    const messages: string[] = [];

    expect(await flow.login({ timeoutMs: 10000, progress: (message) => messages.push(message) })).toBe(true);
    expect(page.visited).toEqual([HOME]);
    expect(sleep).not.toHaveBeenCalled();
    expect(messages).toEqual(["Already signed in"]);
  });

  it("polls until the user has signed in", async () => {
    const page = new FakeApplicationPage([]);
    page.loggedIn = false;
    const { flow, sleep } = flowFor(page, (count) => {
      if (count === 2) {
        page.loggedIn = true;
        page.currentUrl = HOME;
      }
    });
    const messages: string[] = [];

    const signedIn = await flow.login({ timeoutMs: 60000, progress: (message) => messages.push(message) });

    expect(signedIn).toBe(true);
    expect(page.visited).toEqual([HOME, LOGIN]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(LOGIN_POLL_MS, undefined);
    expect(messages).toEqual(["Sign in using the browser window (waiting up to 60s)", "Signed in"]);
  });

  it("gives up after the timeout", async () => {
    const page = new FakeApplicationPage([]);
    page.loggedIn = false;
    const { flow, sleep } = flowFor(page);

    expect(await flow.login({ timeoutMs: 10000 })).toBe(false);
    expect(sleep).toHaveBeenCalledTimes(4);
  });
});
