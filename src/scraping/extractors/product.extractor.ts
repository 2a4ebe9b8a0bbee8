/**
 * Product Extractor
 *
 * The product detail API is signature-protected like search, so product
 * details come from the rendered page's text.
 */
import type { PageSession } from "../session/shopee.client";
import { SHOPEE } from "../../config/constants";
import type { ProductDetails, RawProductPage } from "../../shared/types/shopee.types";

export interface ProductRef {
  shopId: number;
  itemId: number;
}

const DESCRIPTION_MARKERS = ["Product Description\n", "PRODUCT DETAILS\n"];
const DESCRIPTION_END_MARKERS = ["RATINGS AND REVIEWS", "Ratings and Reviews", "From the same shop"];
const MAX_DESCRIPTION_LENGTH = 1000;
/** How far past "Sold" the price block is searched */
const PRICE_WINDOW = 300;

export function productUrl(ref: ProductRef): string {
  return `${SHOPEE.PRODUCT_URL}/${ref.shopId}/${ref.itemId}`;
}

/**
 * Shop and item ids from a product URL. Accepts
 * `/product/<shop>/<item>`, `...-i.<shop>.<item>` and a bare
 * `<shop>.<item>` (or anything ending in it).
 */
export function parseProductUrl(url: string): ProductRef | null {
  const patterns = [/\/product\/(\d+)\/(\d+)/, /-i\.(\d+)\.(\d+)/, /(?:^|\.)(\d+)\.(\d+)\/?$/];
  for (const pattern of patterns) {
    const match = url.match(pattern);
    if (match) {
      return { shopId: parseInt(match[1], 10), itemId: parseInt(match[2], 10) };
    }
  }
  return null;
}

function extractDescription(body: string): string {
  for (const marker of DESCRIPTION_MARKERS) {
    const start = body.indexOf(marker);
    if (start < 0) continue;

    let text = body.slice(start + marker.length);
    for (const endMarker of DESCRIPTION_END_MARKERS) {
      const end = text.indexOf(endMarker);
      if (end >= 0) {
        text = text.slice(0, end);
        break;
      }
    }
    return text.trim().slice(0, MAX_DESCRIPTION_LENGTH);
  }
  return "";
}

/**
 * Page text around the header reads like:
 *   "4.8\n1.6k\nRatings\n6k+ Sold\n...\nRM12.90\nRM19.90\n-35%"
 */
export function parseProductPage(raw: RawProductPage): ProductDetails {
  const { name, body } = raw;
  const details: ProductDetails = {
    name,
    price: "",
    originalPrice: "",
    discount: "",
    rating: "",
    ratingCount: "",
    sold: "",
    description: extractDescription(body),
  };

  const stats = body.match(/(\d\.\d)\n([\d.]+k?)\nRatings\n([\d.]+k?\+?) Sold/);
  if (stats) {
    details.rating = stats[1];
    details.ratingCount = stats[2];
    details.sold = stats[3];
  }

  const soldIndex = body.indexOf("Sold\n");
  if (soldIndex >= 0) {
    const section = body.slice(soldIndex, soldIndex + PRICE_WINDOW);
    const price = section.match(/\nRM([\d,.]+)/);
    if (price) details.price = price[1];
    const original = section.match(/\nRM[\d,.]+\nRM([\d,.]+)\n(-\d+%)/);
    if (original) {
      details.originalPrice = original[1];
      details.discount = original[2];
    }
  }

  return details;
}

export async function getProduct(session: PageSession, ref: ProductRef): Promise<ProductDetails> {
  await session.navigate(productUrl(ref));
  return parseProductPage(await session.run("extractProductPage"));
}
