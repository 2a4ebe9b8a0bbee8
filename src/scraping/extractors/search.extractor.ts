/**
 * Search Extractor
 *
 * The search API needs anti-bot request signatures, so search goes
 * through the results page instead: navigate, read each result card's
 * text lines, and parse them.
 *
 * A card's lines typically look like:
 *   [name, "RM", price, discount?, promo?, rating, "1k+ sold", delivery, location, "Find Similar"]
 */
import type { PageSession } from "../session/shopee.client";
import { SHOPEE } from "../../config/constants";
import type { RawSearchCard, SearchItem, SearchSort } from "../../shared/types/shopee.types";

export interface SearchOptions {
  keyword: string;
  limit?: number;
  sortBy?: SearchSort;
  /** 1-based page number */
  page?: number;
}

const TRAILING_NOISE = new Set(["Find Similar", "Ad", "Sponsored"]);

export function buildSearchUrl(keyword: string, sortBy: SearchSort = "relevancy", page: number = 1): string {
  const params = new URLSearchParams({
    keyword,
    by: sortBy,
    // The site counts pages from 0
    page: String(page - 1),
  });
  return `${SHOPEE.SEARCH_URL}?${params.toString()}`;
}

export function parseSearchCard(card: RawSearchCard): SearchItem {
  const texts = card.texts;

  let price = 0;
  const currencyIndex = texts.indexOf("RM");
  if (currencyIndex >= 0 && currencyIndex + 1 < texts.length) {
    const parsed = parseFloat(texts[currencyIndex + 1].replace(/,/g, ""));
    if (!Number.isNaN(parsed)) price = parsed;
  }

  const sold = texts.find((text) => text.toLowerCase().includes("sold")) ?? "";
  const rating = texts.find((text) => /^\d\.\d$/.test(text)) ?? "";

  let location = "";
  for (let i = texts.length - 1; i >= 0; i--) {
    if (!TRAILING_NOISE.has(texts[i]) && !texts[i].startsWith("< ")) {
      location = texts[i];
      break;
    }
  }

  let shopId = 0;
  let itemId = 0;
  const ids = card.href.match(/-i\.(\d+)\.(\d+)/);
  if (ids) {
    shopId = parseInt(ids[1], 10);
    itemId = parseInt(ids[2], 10);
  }

  return {
    name: texts[0] ?? "",
    price,
    sold,
    rating,
    location,
    shopId,
    itemId,
    href: card.href,
  };
}

export async function searchItems(session: PageSession, options: SearchOptions): Promise<SearchItem[]> {
  const url = buildSearchUrl(options.keyword, options.sortBy, options.page);
  await session.navigate(url);

  const cards = await session.run("extractSearchCards");
  return cards.slice(0, options.limit ?? 20).map(parseSearchCard);
}
