import { describe, expect, it } from "vitest";

import { normalizePhone } from "./service.js";

describe("normalizePhone", () => {
  it("should prefix local numbers with the country code", () => {
    expect(normalizePhone("98765 43210", "+91")).toBe("+919876543210");
  });

  it("should drop trunk zeros", () => {
    expect(normalizePhone("09876-543210", "+91")).toBe("+919876543210");
  });

  it("should keep numbers that already carry a country code", () => {
    expect(normalizePhone(" +14155550100 ", "+91")).toBe("+14155550100");
  });
});
