import { describe, expect, it } from "vitest";

import { commissionSplit } from "./calc.js";

describe("commissionSplit", () => {
  it("should leave the deposit out of the commissionable base", () => {
    expect(commissionSplit(854, 500, 70)).toEqual({ base: 354, hostShare: 248, platformCommission: 106 });
  });

  it("should pay 80% on the premium tier", () => {
    expect(commissionSplit(1500, 500, 80)).toEqual({ base: 1000, hostShare: 800, platformCommission: 200 });
  });

  it("should default to the 70% tier", () => {
    expect(commissionSplit(1500, 500).hostShare).toBe(700);
  });

  it("should always add back up to the base", () => {
    const { base, hostShare, platformCommission } = commissionSplit(6825, 1500, 70);
    expect(hostShare).toBe(3728);
    expect(hostShare + platformCommission).toBe(base);
  });
});
