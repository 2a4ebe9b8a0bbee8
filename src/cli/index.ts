/**
 * CLI Program
 *
 * `shopee login | logout | search | product | orders`. Command results are
 * written to stdout; logs go to stderr.
 */
import { Command, InvalidArgumentError, Option } from "commander";
import config from "../config";
import { logger } from "../monitoring/logger";
import { CookieStore } from "../persistence/cookie.store";
import { login, type LoginResult } from "../scraping/auth/login";
import { PuppeteerLauncher } from "../scraping/browser/browser-launcher";
import { ShopeeClient, type PageSession } from "../scraping/session/shopee.client";
import { searchItems } from "../scraping/extractors/search.extractor";
import { getProduct, parseProductUrl } from "../scraping/extractors/product.extractor";
import {
  ORDER_STATUS_LABELS,
  getOrders,
  parseOrders,
  statusCodeForLabel,
} from "../scraping/extractors/order.extractor";
import { formatOrders, formatProduct, formatSearchResults } from "./formatters";
import type { SearchSort } from "../shared/types/shopee.types";

export interface Session extends PageSession {
  close(): Promise<void>;
}

export interface CliDeps {
  openSession(requireAuth: boolean): Promise<Session>;
  login(): Promise<LoginResult>;
  clearSession(): boolean;
  write(text: string): void;
}

const SORT_CHOICES: readonly SearchSort[] = ["relevancy", "sales", "price", "ctime"];

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseSort(value: string): SearchSort {
  const match = SORT_CHOICES.find((choice) => choice === value);
  if (!match) {
    throw new InvalidArgumentError(`Allowed choices are ${SORT_CHOICES.join(", ")}.`);
  }
  return match;
}

export function parseStatus(value: string): string {
  const labels = Object.values(ORDER_STATUS_LABELS);
  const match = labels.find((label) => label.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Allowed choices are ${labels.join(", ")}.`);
  }
  return match;
}

function defaultDeps(): CliDeps {
  const store = new CookieStore({ logger });
  return {
    openSession: (requireAuth) => ShopeeClient.open({ requireAuth, cookieStore: store, logger }),
    login: () =>
      login({
        launcher: new PuppeteerLauncher(store.profileDir(), logger),
        store,
        timeoutMs: config.loginTimeoutMs,
        logger,
      }),
    clearSession: () => store.clear(),
    write: (text) => process.stdout.write(`${text}\n`),
  };
}

async function withSession<T>(
  deps: CliDeps,
  requireAuth: boolean,
  action: (session: Session) => Promise<T>
): Promise<T> {
  const session = await deps.openSession(requireAuth);
  try {
    return await action(session);
  } finally {
    await session.close();
  }
}

export function createProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();

  program
    .name("shopee")
    .description("Shopee CLI - interact with Shopee Malaysia from the terminal.")
    .version("0.1.0");

  program
    .command("login")
    .description("Open a browser to log in to Shopee.")
    .action(async () => {
      const result = await deps.login();
      deps.write(`Login successful! Cookies saved to ${result.savedTo}`);
    });

  program
    .command("logout")
    .description("Delete the saved session.")
    .action(() => {
      deps.write(deps.clearSession() ? "Logged out." : "No saved session.");
    });

  program
    .command("search")
    .description("Search for products on Shopee.")
    .argument("<query>", "search keywords")
    .option("-l, --limit <n>", "number of results", parsePositiveInt, 20)
    .addOption(
      new Option("-s, --sort <by>", "sort order").argParser(parseSort).default("relevancy")
    )
    .option("-p, --page <n>", "page number", parsePositiveInt, 1)
    .action(async (query: string, opts: { limit: number; sort: SearchSort; page: number }) => {
      const items = await withSession(deps, false, (session) =>
        searchItems(session, { keyword: query, limit: opts.limit, sortBy: opts.sort, page: opts.page })
      );
      deps.write(formatSearchResults(query, items));
    });

  program
    .command("product")
    .description("Get product details from a Shopee URL or 'shop_id.item_id'.")
    .argument("<url-or-ids>", "product URL or shop_id.item_id")
    .action(async (urlOrIds: string) => {
      const ref = parseProductUrl(urlOrIds);
      if (!ref) {
        deps.write("Invalid product URL or ID format.\nUse a Shopee URL or 'shop_id.item_id' format.");
        process.exitCode = 1;
        return;
      }

      const product = await withSession(deps, false, (session) => getProduct(session, ref));
      deps.write(product.name ? formatProduct(product) : "Product not found.");
    });

  program
    .command("orders")
    .description("List your Shopee orders.")
    .option("-s, --status <label>", "filter by order status", parseStatus, "All")
    .option("-l, --limit <n>", "number of orders", parsePositiveInt, 20)
    .action(async (opts: { status: string; limit: number }) => {
      const listType = statusCodeForLabel(opts.status);
      const data = await withSession(deps, true, (session) =>
        getOrders(session, { listType, limit: opts.limit })
      );
      deps.write(formatOrders(parseOrders(data)));
    });

  return program;
}
