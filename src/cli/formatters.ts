/**
 * Plain-text renderers for command output (stdout).
 */
import type { Order, ProductDetails, SearchItem } from "../shared/types/shopee.types";

const NAME_WIDTH = 50;
const DESCRIPTION_PREVIEW = 500;

function truncate(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text;
}

export function formatPrice(price: number): string {
  return price ? price.toFixed(2) : "-";
}

export function formatSearchResults(query: string, items: SearchItem[]): string {
  if (items.length === 0) return "No results found.";

  const header = ["#", "Product", "Price (RM)", "Sold", "Rating", "Location"];
  const rows = items.map((item, i) => [
    String(i + 1),
    truncate(item.name, NAME_WIDTH),
    formatPrice(item.price),
    item.sold,
    item.rating,
    item.location,
  ]);

  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map((row) => row[col].length))
  );
  const render = (cells: string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd();

  return [`Search: ${query}`, render(header), ...rows.map(render)].join("\n");
}

export function formatProduct(product: ProductDetails): string {
  const lines = [product.name];
  if (product.rating) lines.push(`Rating: ${product.rating} (${product.ratingCount} ratings)`);
  if (product.sold) lines.push(`Sold: ${product.sold}`);
  if (product.price) {
    let price = `Price: RM ${product.price}`;
    if (product.originalPrice) {
      price += `  (was RM ${product.originalPrice}, ${product.discount})`;
    }
    lines.push(price);
  }
  if (product.description) {
    lines.push("", product.description.slice(0, DESCRIPTION_PREVIEW));
  }
  return lines.join("\n");
}

export function formatOrders(orders: Order[]): string {
  if (orders.length === 0) return "No orders found.";

  const blocks = orders.map((order) => {
    const lines = [`${order.shopName} - ${order.status}`, `  Order: ${order.orderId}`];
    for (const item of order.items) {
      const model = item.model ? ` (${item.model})` : "";
      lines.push(`  - ${item.name}${model} x${item.quantity}  RM ${item.price.toFixed(2)}`);
    }
    return lines.join("\n");
  });
  return blocks.join("\n\n");
}
