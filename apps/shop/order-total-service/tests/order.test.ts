import { computeTotal, validateOrder, type Order } from "../src/order";

const ORDER: Order = {
  order_id: 1,
  product_id: 2,
  quantity: 3,
  subtotal: 100.0,
  shipping_address: "1 Main St",
  shipping_zip: "10001",
  total: 0.0,
};

describe("validateOrder", () => {
  it("accepts a complete order", () => {
    expect(validateOrder({ ...ORDER })).toEqual({ order: ORDER });
  });

  it("drops fields that are not part of an order", () => {
    expect(validateOrder({ ...ORDER, coupon: "SAVE10" })).toEqual({ order: ORDER });
  });

  it.each([null, [], "order", 42])("rejects %p as not an object", (raw) => {
    expect(validateOrder(raw)).toEqual({ error: "expected a JSON object" });
  });

  it("names the first missing field", () => {
    const { total: _total, shipping_zip: _zip, ...partial } = ORDER;
    expect(validateOrder(partial)).toEqual({ error: 'missing field "shipping_zip"' });
  });

  it("rejects non-integer ids and counts", () => {
    expect(validateOrder({ ...ORDER, quantity: 1.5 })).toEqual({
      error: 'field "quantity" must be an integer',
    });
    expect(validateOrder({ ...ORDER, order_id: "1" })).toEqual({
      error: 'field "order_id" must be an integer',
    });
  });

  it("rejects integers outside the 32-bit range", () => {
    expect(validateOrder({ ...ORDER, product_id: 2 ** 31 })).toEqual({
      error: 'field "product_id" is out of range',
    });
    expect(validateOrder({ ...ORDER, product_id: -(2 ** 31) })).toEqual({
      order: { ...ORDER, product_id: -2147483648 },
    });
  });

  it("accepts a whole-number float literal in an integer field", () => {
    const raw: unknown = JSON.parse(JSON.stringify(ORDER).replace('"order_id":1', '"order_id":1.0'));

    expect(validateOrder(raw)).toEqual({ order: ORDER });
  });

  it("requires numbers for subtotal and total", () => {
    expect(validateOrder({ ...ORDER, subtotal: "100.0" })).toEqual({
      error: 'field "subtotal" must be a number',
    });
    expect(validateOrder({ ...ORDER, total: null })).toEqual({
      error: 'field "total" must be a number',
    });
  });

  it("requires strings for the shipping fields", () => {
    expect(validateOrder({ ...ORDER, shipping_zip: 10001 })).toEqual({
      error: 'field "shipping_zip" must be a string',
    });
    expect(validateOrder({ ...ORDER, shipping_address: ["1 Main St"] })).toEqual({
      error: 'field "shipping_address" must be a string',
    });
  });
});

describe("computeTotal", () => {
  it("applies the rate to the subtotal", () => {
    expect(computeTotal(ORDER, 0.08).total).toBe(108);
  });

  it("ignores whatever total the caller sent", () => {
    expect(computeTotal({ ...ORDER, total: 999 }, 0).total).toBe(100);
  });

  it("stays within float tolerance for fractional amounts", () => {
    const { total } = computeTotal({ ...ORDER, subtotal: 59.99 }, 0.07);
    expect(total).toBeCloseTo(64.1893, 6);
  });

  it("does not modify the order it was given", () => {
    const order = { ...ORDER };
    const priced = computeTotal(order, 0.05);
    expect(order.total).toBe(0);
    expect(priced).not.toBe(order);
    expect(priced).toEqual({ ...ORDER, total: 105 });
  });
});
