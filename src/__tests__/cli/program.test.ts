import { describe, it, expect, vi } from "vitest";
import { createProgram, parseSort, type CliDeps } from "../../cli";
import { NoSessionError } from "../../shared/errors/client.errors";
import { FakeSession } from "../helpers/fake-session";

function setup(session = new FakeSession()) {
  const output: string[] = [];
  const deps: CliDeps = {
    openSession: vi.fn(async (_requireAuth: boolean) => session),
    login: vi.fn(async () => ({ cookies: [], savedTo: "/tmp/shopee-cli/cookies.json" })),
    clearSession: vi.fn(() => true),
    write: (text) => output.push(text),
  };
  const program = createProgram(deps);
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  }
  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });
  return { deps, output, session, run };
}

describe("shopee CLI", () => {
  it("logs in and reports where cookies went", async () => {
    const { deps, output, run } = setup();

    await run("login");

    expect(deps.login).toHaveBeenCalledTimes(1);
    expect(output).toEqual(["Login successful! Cookies saved to /tmp/shopee-cli/cookies.json"]);
  });

  it("logs out", async () => {
    const { output, run } = setup();
    await run("logout");
    expect(output).toEqual(["Logged out."]);
  });

  it("searches without requiring a login and closes the session", async () => {
    const session = new FakeSession({
      extractSearchCards: async () => [{ href: "/Lamp-i.1.2", texts: ["Lamp", "RM", "9.90", "Penang"] }],
    });
    const { deps, output, run } = setup(session);

    await run("search", "desk lamp", "-l", "5", "-s", "sales", "-p", "2");

    expect(deps.openSession).toHaveBeenCalledWith(false);
    expect(session.visited).toEqual(["https://shopee.com.my/search?keyword=desk+lamp&by=sales&page=1"]);
    expect(output[0].split("\n")[0]).toBe("Search: desk lamp");
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("rejects an unknown sort order", async () => {
    const { deps, run } = setup();
    await expect(run("search", "lamp", "-s", "newest")).rejects.toThrow();
    expect(deps.openSession).not.toHaveBeenCalled();
  });

  it("loads a product by shop_id.item_id", async () => {
    const session = new FakeSession({
      extractProductPage: async () => ({ name: "Lamp", body: "" }),
    });
    const { output, run } = setup(session);

    await run("product", "11.22");

    expect(session.visited).toEqual(["https://shopee.com.my/product/11/22"]);
    expect(output).toEqual(["Lamp"]);
  });

  it("reports a product page without a name as not found", async () => {
    const { output, run } = setup();
    await run("product", "https://shopee.com.my/product/11/22");
    expect(output).toEqual(["Product not found."]);
  });

  it("requires a login for orders and maps the status filter", async () => {
    const session = new FakeSession({}, { error: 0 });
    const { deps, output, run } = setup(session);

    await run("orders", "-s", "to ship", "-l", "3");

    expect(deps.openSession).toHaveBeenCalledWith(true);
    expect(session.get).toHaveBeenCalledWith("/order/get_all_order_and_checkout_list", {
      list_type: 2,
      limit: 3,
      offset: 0,
    });
    expect(output).toEqual(["No orders found."]);
  });

  it("lets client errors reach the caller", async () => {
    const { deps, run } = setup();
    vi.mocked(deps.openSession).mockRejectedValueOnce(new NoSessionError());

    await expect(run("orders")).rejects.toBeInstanceOf(NoSessionError);
  });

  it("closes the session when a command fails", async () => {
    const session = new FakeSession({
      extractProductPage: async () => {
        throw new Error("Target closed");
      },
    });
    const { run } = setup(session);

    await expect(run("product", "11.22")).rejects.toThrow("Target closed");
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});

describe("parseSort", () => {
  it("accepts the known orders only", () => {
    expect(parseSort("ctime")).toBe("ctime");
    expect(() => parseSort("oldest")).toThrow("Allowed choices are relevancy, sales, price, ctime.");
  });
});
