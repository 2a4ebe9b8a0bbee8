import { describe, it, expect, vi } from "vitest";
import { ShopeeClient, type CaptchaSolver, type SessionStore } from "../../scraping/session/shopee.client";
import type { HumanPrompt } from "../../scraping/session/human-prompt";
import {
  AntiBotBlockedError,
  NoSessionError,
  SessionExpiredError,
} from "../../shared/errors/client.errors";
import type { SliderSolveResult } from "../../shared/types/captcha.types";
import type { FetchRequest, StoredCookie } from "../../shared/types/shopee.types";
import { FakeLauncher, instantSleep, type FakeHandlers } from "../helpers/fake-browser";

const HOME = "https://shopee.com.my";
const PRODUCT = "https://shopee.com.my/product/11/22";
const COOKIES: StoredCookie[] = [
  { name: "SPC_EC", value: "test-session", domain: ".shopee.com.my", path: "/" },
  { name: "SPC_U", value: "1", domain: ".shopee.com.my", path: "/" },
];
const VERIFY = async () => ({ heading: "Verify to continue", title: "Shopee" });

function store(cookies: StoredCookie[] | null): SessionStore {
  return { load: () => cookies, profileDir: () => "/tmp/shopee-cli-test/chrome-profile" };
}

function fakeSolver(solved: boolean) {
  const result: SliderSolveResult = { solved, attempts: solved ? 1 : 8, transitions: [] };
  return { solve: vi.fn<CaptchaSolver["solve"]>().mockResolvedValue(result) };
}

class FakePrompt implements HumanPrompt {
  waitForAcknowledgement = vi.fn(async (_message: string) => undefined);
}

async function open(options: {
  cookies?: StoredCookie[] | null;
  requireAuth?: boolean;
  handlers?: Partial<FakeHandlers>[];
  solver?: CaptchaSolver | null;
}) {
  const launcher = new FakeLauncher(options.handlers ?? []);
  const prompt = new FakePrompt();
  const sleep = instantSleep();
  const client = await ShopeeClient.open({
    requireAuth: options.requireAuth,
    cookieStore: store(options.cookies === undefined ? COOKIES : options.cookies),
    launcher,
    solver: options.solver === undefined ? null : options.solver,
    prompt,
    sleep,
  });
  return { client, launcher, prompt, sleep };
}

describe("ShopeeClient.open", () => {
  it("refuses to start without a saved session and launches nothing", async () => {
    const launcher = new FakeLauncher();

    await expect(
      ShopeeClient.open({ cookieStore: store(null), launcher, solver: null, sleep: instantSleep() })
    ).rejects.toBeInstanceOf(NoSessionError);
    expect(launcher.handles).toHaveLength(0);
  });

  it("opens an off-screen browser and injects saved cookies", async () => {
    const { launcher, sleep } = await open({});

    expect(launcher.events).toEqual([
      "launch b1 hidden",
      `b1:goto ${HOME}`,
      "b1:setCookies 2",
      `b1:goto ${HOME}`,
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 3000]);
  });

  it("browses without cookies when auth is not required", async () => {
    const { launcher } = await open({ cookies: null, requireAuth: false });

    expect(launcher.events).toEqual(["launch b1 hidden", `b1:goto ${HOME}`]);
  });

  it("closes the browser when priming fails", async () => {
    const launcher = new FakeLauncher();
    const failing = {
      launch: async (mode: { visible: boolean }) => {
        const handle = await launcher.launch(mode);
        handle.goto = async () => {
          throw new Error("net::ERR_NAME_NOT_RESOLVED");
        };
        return handle;
      },
    };

    await expect(
      ShopeeClient.open({ cookieStore: store(COOKIES), launcher: failing, solver: null, sleep: instantSleep() })
    ).rejects.toThrow("net::ERR_NAME_NOT_RESOLVED");
    expect(launcher.handles[0].closed).toBe(true);
  });
});

describe("ShopeeClient requests", () => {
  it("sends GET requests through the page with a query string", async () => {
    const fetch = vi.fn(async (_request: FetchRequest) => ({ status: 200, body: '{"error":0,"data":[]}' }));
    const { client } = await open({ handlers: [{ fetch }] });

    const data = await client.get("/order/get_all_order_and_checkout_list", { list_type: 4, limit: 5 });

    expect(data).toEqual({ error: 0, data: [] });
    expect(fetch).toHaveBeenCalledWith({
      url: "https://shopee.com.my/api/v4/order/get_all_order_and_checkout_list?list_type=4&limit=5",
      method: "GET",
    });
  });

  it("sends POST bodies as JSON", async () => {
    const fetch = vi.fn(async (_request: FetchRequest) => ({ status: 200, body: '{"error":0}' }));
    const { client } = await open({ handlers: [{ fetch }] });

    await client.post("/cart/add", { itemid: 22, quantity: 1 });

    expect(fetch).toHaveBeenCalledWith({
      url: "https://shopee.com.my/api/v4/cart/add",
      method: "POST",
      body: '{"itemid":22,"quantity":1}',
    });
  });

  it("throws SessionExpiredError on 401", async () => {
    const { client } = await open({ handlers: [{ fetch: async () => ({ status: 401, body: "" }) }] });
    await expect(client.get("/account/basic/get_account_info")).rejects.toBeInstanceOf(SessionExpiredError);
  });

  it("throws AntiBotBlockedError on the anti-bot code", async () => {
    const { client } = await open({
      handlers: [{ fetch: async () => ({ status: 200, body: '{"error":90309999}' }) }],
    });
    await expect(client.get("/search/search_items")).rejects.toBeInstanceOf(AntiBotBlockedError);
  });

  it("returns the body of other API errors", async () => {
    const { client } = await open({
      handlers: [{ fetch: async () => ({ status: 200, body: '{"error":4,"error_msg":"bad"}' }) }],
    });
    await expect(client.get("/order/list")).resolves.toEqual({ error: 4, error_msg: "bad" });
  });

  it("fails once the session is closed", async () => {
    const { client, launcher } = await open({});
    await client.close();
    await client.close();

    expect(launcher.handles[0].closed).toBe(true);
    await expect(client.get("/x")).rejects.toThrow("Browser session is closed");
  });
});

describe("ShopeeClient.navigate", () => {
  it("returns clear when no verification page is shown", async () => {
    const solver = fakeSolver(true);
    const { client } = await open({ solver });

    await expect(client.navigate(PRODUCT)).resolves.toBe("clear");
    expect(solver.solve).not.toHaveBeenCalled();
  });

  it("detects the verification page from the title when there is no heading", async () => {
    const solver = fakeSolver(true);
    const { client } = await open({
      solver,
      handlers: [{ readIndicator: async () => ({ heading: "", title: "Verify | Shopee" }) }],
    });

    await expect(client.navigate(PRODUCT)).resolves.toBe("auto-solved");
  });

  it("solves the CAPTCHA in place when the solver succeeds", async () => {
    const solver = fakeSolver(true);
    const { client, launcher, prompt } = await open({ solver, handlers: [{ readIndicator: VERIFY }] });

    await expect(client.navigate(PRODUCT)).resolves.toBe("auto-solved");
    expect(solver.solve).toHaveBeenCalledWith(launcher.handles[0].port);
    expect(launcher.handles).toHaveLength(1);
    expect(prompt.waitForAcknowledgement).not.toHaveBeenCalled();
  });

  it("hands over to a human in a visible browser when auto-solve fails", async () => {
    const solver = fakeSolver(false);
    const { client, launcher, prompt } = await open({ solver, handlers: [{ readIndicator: VERIFY }] });
    launcher.events.length = 0;

    await expect(client.navigate(PRODUCT)).resolves.toBe("human-solved");

    expect(launcher.events).toEqual([
      `b1:goto ${PRODUCT}`,
      "b1:close",
      "launch b2 visible",
      `b2:goto ${HOME}`,
      "b2:setCookies 2",
      `b2:goto ${HOME}`,
      `b2:goto ${PRODUCT}`,
      "b2:close",
      "launch b3 hidden",
      `b3:goto ${HOME}`,
      "b3:setCookies 2",
      `b3:goto ${HOME}`,
      `b3:goto ${PRODUCT}`,
    ]);
    expect(prompt.waitForAcknowledgement).toHaveBeenCalledTimes(1);
  });

  it("goes straight to a human without a solver", async () => {
    const { client, launcher, prompt } = await open({ solver: null, handlers: [{ readIndicator: VERIFY }] });

    await expect(client.navigate(PRODUCT)).resolves.toBe("human-solved");
    expect(prompt.waitForAcknowledgement).toHaveBeenCalledTimes(1);
    expect(launcher.modes).toEqual([{ visible: false }, { visible: true }, { visible: false }]);
  });

  it("keeps using the relaunched browser after a human solve", async () => {
    const { client, launcher } = await open({
      solver: null,
      handlers: [
        { readIndicator: VERIFY },
        {},
        { extractProductPage: async () => ({ name: "Desk Lamp", body: "" }) },
      ],
    });

    await client.navigate(PRODUCT);

    await expect(client.run("extractProductPage")).resolves.toEqual({ name: "Desk Lamp", body: "" });
    expect(launcher.handles[1].closed).toBe(true);
    expect(launcher.handles[2].closed).toBe(false);
  });

  it("closes the visible browser even if the prompt fails", async () => {
    const { client, launcher, prompt } = await open({ solver: null, handlers: [{ readIndicator: VERIFY }] });
    prompt.waitForAcknowledgement.mockRejectedValueOnce(new Error("stdin closed"));

    await expect(client.navigate(PRODUCT)).rejects.toThrow("stdin closed");
    expect(launcher.handles[1].closed).toBe(true);
  });
});
