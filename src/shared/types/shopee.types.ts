/**
 * Shopee-Specific Types
 *
 * Data structures for Shopee responses, scraped pages and session cookies.
 */

/** Cookie as persisted to disk and injected into the browser */
export interface StoredCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
}

/** In-page fetch request */
export interface FetchRequest {
  url: string;
  method: "GET" | "POST";
  /** JSON-encoded body for POST */
  body?: string;
}

export interface FetchResponse {
  status: number;
  body: string;
}

/** Top-level shape of every Shopee API response */
export interface ShopeeResponse {
  error?: number | null;
  error_msg?: string | null;
  [key: string]: unknown;
}

/** What the verification check reads from the page */
export interface PageIndicator {
  heading: string;
  title: string;
}

/** Raw search card read from the DOM */
export interface RawSearchCard {
  href: string;
  texts: string[];
}

export interface SearchItem {
  name: string;
  price: number;
  sold: string;
  rating: string;
  location: string;
  shopId: number;
  itemId: number;
  href: string;
}

export type SearchSort = "relevancy" | "sales" | "price" | "ctime";

/** Raw product page read from the DOM */
export interface RawProductPage {
  name: string;
  body: string;
}

export interface ProductDetails {
  name: string;
  price: string;
  originalPrice: string;
  discount: string;
  rating: string;
  ratingCount: string;
  sold: string;
  description: string;
}

export interface OrderItem {
  name: string;
  model: string;
  quantity: number;
  price: number;
  image: string;
}

export interface Order {
  orderId: string;
  status: string;
  shopName: string;
  items: OrderItem[];
}

/** How a navigation ended up, after any verification page was dealt with */
export type NavigationOutcome = "clear" | "auto-solved" | "human-solved";
