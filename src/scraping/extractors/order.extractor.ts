/**
 * Order Extractor
 *
 * Orders come from the authenticated order-list API. The response nests
 * orders as new_data.order_or_checkout_data[].order_list_detail, with the
 * shop and items on each info_card.order_list_cards[] entry.
 */
import type { PageSession } from "../session/shopee.client";
import type { Order, OrderItem, ShopeeResponse } from "../../shared/types/shopee.types";

/** list_type filter values accepted by the order list endpoint */
export const ORDER_STATUS_LABELS: Record<number, string> = {
  0: "All",
  1: "To Pay",
  2: "To Ship",
  3: "Shipping",
  4: "Completed",
  5: "Cancelled",
  6: "Return/Refund",
};

/** Item prices are sent in units of 1/100000 RM */
const PRICE_SCALE = 100000;

export interface OrderQuery {
  listType?: number;
  limit?: number;
  offset?: number;
}

/** list_type code for a status label (case-insensitive); 0 when unknown */
export function statusCodeForLabel(label: string): number {
  for (const [code, name] of Object.entries(ORDER_STATUS_LABELS)) {
    if (name.toLowerCase() === label.toLowerCase()) return Number(code);
  }
  return 0;
}

type Json = Record<string, unknown>;

function asRecord(value: unknown): Json {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function asRecords(value: unknown): Json[] {
  return Array.isArray(value) ? value.map(asRecord) : [];
}

function asString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

function asNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function parseItem(item: Json): OrderItem {
  return {
    name: asString(item.name),
    model: asString(item.model_name),
    quantity: asNumber(item.amount, 1),
    price: asNumber(item.order_price, 0) / PRICE_SCALE,
    image: asString(item.image),
  };
}

export function parseOrders(data: ShopeeResponse): Order[] {
  const entries = asRecords(asRecord(data.new_data).order_or_checkout_data);
  const orders: Order[] = [];

  for (const entry of entries) {
    const detail = asRecord(entry.order_list_detail);
    const status = asString(asRecord(asRecord(detail.status).status_label).text);
    const cards = asRecords(asRecord(detail.info_card).order_list_cards);

    for (const card of cards) {
      const groups = asRecords(asRecord(card.product_info).item_groups);
      orders.push({
        orderId: asString(card.order_id),
        status,
        shopName: asString(asRecord(card.shop_info).shop_name),
        items: groups.flatMap((group) => asRecords(group.items).map(parseItem)),
      });
    }
  }
  return orders;
}

export function getOrders(session: PageSession, query: OrderQuery = {}): Promise<ShopeeResponse> {
  return session.get("/order/get_all_order_and_checkout_list", {
    list_type: query.listType ?? 0,
    limit: query.limit ?? 20,
    offset: query.offset ?? 0,
  });
}
