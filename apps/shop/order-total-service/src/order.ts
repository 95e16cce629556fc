/** Order as it travels on the wire; field names match the JSON body. */
export type Order = {
  order_id: number;
  product_id: number;
  quantity: number;
  subtotal: number;
  shipping_address: string;
  shipping_zip: string;
  total: number;
};

const ORDER_FIELDS: ReadonlyArray<keyof Order> = [
  "order_id",
  "product_id",
  "quantity",
  "subtotal",
  "shipping_address",
  "shipping_zip",
  "total",
];

const MIN_INT = -(2 ** 31);
const MAX_INT = 2 ** 31 - 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isInt32(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= MIN_INT && value <= MAX_INT;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function intError(field: keyof Order, value: unknown): { error: string } {
  return typeof value === "number" && Number.isInteger(value)
    ? { error: `field "${field}" is out of range` }
    : { error: `field "${field}" must be an integer` };
}

/**
 * Validate a parsed request body at the boundary. Every field is required
 * and checked in declaration order; unknown fields are dropped.
 */
export function validateOrder(raw: unknown): { order: Order } | { error: string } {
  if (!isRecord(raw)) {
    return { error: "expected a JSON object" };
  }
  const missing = ORDER_FIELDS.find((field) => !(field in raw));
  if (missing !== undefined) {
    return { error: `missing field "${missing}"` };
  }

  const { order_id, product_id, quantity, subtotal, shipping_address, shipping_zip, total } = raw;
  if (!isInt32(order_id)) return intError("order_id", order_id);
  if (!isInt32(product_id)) return intError("product_id", product_id);
  if (!isInt32(quantity)) return intError("quantity", quantity);
  if (!isFiniteNumber(subtotal)) return { error: 'field "subtotal" must be a number' };
  if (typeof shipping_address !== "string") {
    return { error: 'field "shipping_address" must be a string' };
  }
  if (typeof shipping_zip !== "string") {
    return { error: 'field "shipping_zip" must be a string' };
  }
  if (!isFiniteNumber(total)) return { error: 'field "total" must be a number' };

  return {
    order: { order_id, product_id, quantity, subtotal, shipping_address, shipping_zip, total },
  };
}

/** total = subtotal * (1 + rate). Returns a new Order. */
export function computeTotal(order: Order, rate: number): Order {
  return { ...order, total: order.subtotal * (1 + rate) };
}
