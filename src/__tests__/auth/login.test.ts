import { describe, it, expect, vi } from "vitest";
import { isPostLoginUrl, login } from "../../scraping/auth/login";
import { LoginFailedError } from "../../shared/errors/client.errors";
import type { StoredCookie } from "../../shared/types/shopee.types";
import { FakeLauncher, instantSleep } from "../helpers/fake-browser";

const SESSION_COOKIE: StoredCookie = { name: "SPC_EC", value: "test-session", domain: ".shopee.com.my" };

function fakeStore() {
  return { save: vi.fn((_cookies: StoredCookie[]) => "/tmp/shopee-cli/cookies.json") };
}

describe("isPostLoginUrl", () => {
  it("recognizes the pages Shopee redirects to after login", () => {
    expect(isPostLoginUrl("https://shopee.com.my/user/account/profile")).toBe(true);
    expect(isPostLoginUrl("https://shopee.com.my/?is_from_login=true")).toBe(true);
    expect(isPostLoginUrl("https://shopee.com.my/buyer/login?next=%2F")).toBe(false);
  });
});

describe("login", () => {
  it("saves cookies once the session cookie shows up", async () => {
    const launcher = new FakeLauncher();
    const store = fakeStore();
    let polls = 0;
    const sleep = vi.fn(async (_ms: number) => {
      polls++;
      if (polls === 3) launcher.handles[0].cookies = [SESSION_COOKIE];
    });

    const result = await login({ launcher, store, timeoutMs: 600000, pollMs: 2000, sleep });

    expect(launcher.modes).toEqual([{ visible: true }]);
    expect(launcher.events[1]).toBe("b1:goto https://shopee.com.my/buyer/login");
    expect(result).toEqual({ cookies: [SESSION_COOKIE], savedTo: "/tmp/shopee-cli/cookies.json" });
    expect(store.save).toHaveBeenCalledWith([SESSION_COOKIE]);
    expect(launcher.handles[0].closed).toBe(true);
    // three polls, then the settle delay
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000, 2000, 2000]);
  });

  it("detects login from the redirect URL", async () => {
    const launcher = new FakeLauncher();
    const store = fakeStore();
    const sleep = vi.fn(async (_ms: number) => {
      const handle = launcher.handles[0];
      handle.url = "https://shopee.com.my/?is_from_login=true";
      handle.cookies = [SESSION_COOKIE, { name: "SPC_U", value: "1" }];
    });

    const result = await login({ launcher, store, pollMs: 2000, sleep });

    expect(result.cookies).toHaveLength(2);
    expect(store.save).toHaveBeenCalledTimes(1);
  });

  it("fails without the session cookie even after a redirect", async () => {
    const launcher = new FakeLauncher();
    const store = fakeStore();
    const sleep = vi.fn(async (_ms: number) => {
      launcher.handles[0].url = "https://shopee.com.my/user/purchase";
    });

    await expect(login({ launcher, store, sleep })).rejects.toThrow("Login failed - session cookie not found.");
    expect(store.save).not.toHaveBeenCalled();
    expect(launcher.handles[0].closed).toBe(true);
  });

  it("fails when the browser window is closed", async () => {
    const launcher = new FakeLauncher();
    const sleep = vi.fn(async (_ms: number) => {
      launcher.handles[0].port.connected = false;
    });

    await expect(login({ launcher, store: fakeStore(), sleep })).rejects.toThrow(
      "Browser was closed before login completed."
    );
  });

  it("times out after timeout / poll checks", async () => {
    const launcher = new FakeLauncher();
    const sleep = instantSleep();

    const failure = login({ launcher, store: fakeStore(), timeoutMs: 10000, pollMs: 2000, sleep });

    await expect(failure).rejects.toBeInstanceOf(LoginFailedError);
    await expect(failure).rejects.toThrow("Timed out waiting for login.");
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(launcher.handles[0].closed).toBe(true);
  });
});
