import { describe, it, expect } from "vitest";
import {
  ADOPTION_SCENARIOS,
  SCENARIOS,
  MIN_PRICE,
  MAX_PRICE,
  adoptionRate,
  computeRoi,
  simulatePricing,
  segmentAdoption,
  segmentAdoptionFor,
  priceSweep,
  formatAdoption,
  formatCurrency,
  formatRoi,
  isAdoptionScenario,
} from "./pricing-sim-engine";

describe("adoptionRate", () => {
  it.each(ADOPTION_SCENARIOS)("hits max at $0.99 and min at $20 for %s", (scenario) => {
    expect(adoptionRate(MIN_PRICE, scenario)).toBe(SCENARIOS[scenario].maxAdoption);
    expect(adoptionRate(MAX_PRICE, scenario)).toBe(SCENARIOS[scenario].minAdoption);
  });

  it.each(ADOPTION_SCENARIOS)("stays at or above min and never increases with price for %s", (scenario) => {
    const { minAdoption } = SCENARIOS[scenario];
    let previous = Infinity;
    for (let cents = 99; cents <= 2000; cents += 7) {
      const rate = adoptionRate(cents / 100, scenario);
      expect(rate).toBeGreaterThanOrEqual(minAdoption);
      expect(rate).toBeLessThanOrEqual(previous);
      previous = rate;
    }
  });

  it("floors prices above $20 at the scenario minimum", () => {
    expect(adoptionRate(35, "optimistic")).toBe(0.10);
  });

  it("interpolates linearly between the bounds", () => {
    expect(adoptionRate(5, "realistic")).toBeCloseTo(0.45 - 4.01 * 0.40 / 19.01, 12);
  });

  it("rejects invalid input", () => {
    expect(() => adoptionRate(Number.NaN, "realistic")).toThrow(RangeError);
    expect(() => adoptionRate(-1, "realistic")).toThrow(RangeError);
  });
});

describe("isAdoptionScenario", () => {
  it("recognises only the four presets", () => {
    expect(isAdoptionScenario("conservative")).toBe(true);
    expect(isAdoptionScenario("pessimistic")).toBe(false);
  });
});

describe("simulatePricing", () => {
  it("computes the realistic $5 point estimate for 5,000 customers", () => {
    const m = simulatePricing({ price: 5, scenario: "realistic", customerCount: 5000 });
    expect(m.addressableBase).toBe(250000);
    expect(m.adoptionRate).toBeCloseTo(0.36562, 5);
    expect(m.subscribers).toBe(91406);
    expect(m.revenue).toBe(457030);
    expect(m.cost).toBe(220663.5);
    expect(m.profit).toBe(236366.5);
    expect(m.roi).toBeCloseTo(107.116, 3);
  });

  it("keeps cost at the fixed amount when nobody subscribes", () => {
    const m = simulatePricing({ price: 20, scenario: "underwhelming", customerCount: 0 });
    expect(m.subscribers).toBe(0);
    expect(m.revenue).toBe(0);
    expect(m.cost).toBe(15000);
    expect(m.profit).toBe(-15000);
    expect(m.roi).toBe(-100);
  });

  it("returns zero ROI when economics yield no positive cost", () => {
    const m = simulatePricing(
      { price: 5, scenario: "realistic", customerCount: 0 },
      { marketMultiplier: 50, fixedMonthlyCost: 0, variableCostPerUser: 0 },
    );
    expect(m.cost).toBe(0);
    expect(m.roi).toBe(0);
  });
});

describe("computeRoi", () => {
  it("divides profit by cost as a percentage", () => {
    expect(computeRoi(50, 200)).toBe(25);
  });

  it("returns exactly 0 for zero or negative cost", () => {
    expect(computeRoi(100, 0)).toBe(0);
    expect(computeRoi(100, -5)).toBe(0);
  });
});

describe("segment adoption", () => {
  it("applies the per-segment factors", () => {
    expect(segmentAdoptionFor("Business User", 0.2)).toBeCloseTo(0.3, 12);
    expect(segmentAdoptionFor("Power User", 0.2)).toBeCloseTo(0.24, 12);
    expect(segmentAdoptionFor("Social Connector", 0.2)).toBeCloseTo(0.18, 12);
    expect(segmentAdoptionFor("Budget Conscious", 0.2)).toBeCloseTo(0.12, 12);
    expect(segmentAdoptionFor("Students", 0.2)).toBe(0.2);
  });

  it("caps every segment at 0.8 even for a scalar rate of 1", () => {
    expect(segmentAdoptionFor("Business User", 1)).toBe(0.8);
    expect(segmentAdoptionFor("Power User", 1)).toBe(0.8);
    expect(segmentAdoptionFor("Social Connector", 1)).toBe(0.8);
    expect(segmentAdoptionFor("Budget Conscious", 1)).toBe(0.6);
  });

  it("counts customers per present segment and sorts ascending", () => {
    const customers = [
      { customer_segment: "Business User" },
      { customer_segment: "Budget Conscious" },
      { customer_segment: "Business User" },
      { customer_segment: "Power User" },
    ];
    const result = segmentAdoption(customers, 0.4);
    expect(result.map(s => s.displayName)).toEqual(["Budget", "Power", "Business"]);
    expect(result.map(s => s.customers)).toEqual([1, 1, 2]);
    expect(result[2].adoption).toBeCloseTo(0.6, 12);
  });
});

describe("priceSweep", () => {
  it("covers 0.99 to 19.99 in 0.05 steps without rounding subscribers", () => {
    const sweep = priceSweep("realistic", 5000);
    expect(sweep).toHaveLength(381);
    expect(sweep[0].price).toBe(0.99);
    expect(sweep[1].price).toBe(1.04);
    expect(sweep[sweep.length - 1].price).toBe(19.99);
    expect(sweep[0].subscribers).toBe(250000 * 0.45);

    const at5 = sweep.find(p => p.price === 4.99);
    expect(at5).toBeDefined();
    expect(Number.isInteger(at5?.subscribers)).toBe(false);
  });

  it("keeps profit equal to revenue minus cost at every point", () => {
    for (const p of priceSweep("optimistic", 1000)) {
      expect(p.profit).toBeCloseTo(p.revenue - p.cost, 6);
      expect(p.cost).toBeCloseTo(15000 + p.subscribers * 2.25, 6);
    }
  });

  it("rejects a non-positive step", () => {
    expect(() => priceSweep("realistic", 10, undefined, 0)).toThrow(RangeError);
  });
});

describe("formatting", () => {
  it("formats the value boxes", () => {
    expect(formatAdoption(0.3656233561)).toBe("36.6% of base");
    expect(formatCurrency(457030)).toBe("$457,030");
    expect(formatCurrency(-15000)).toBe("-$15,000");
    expect(formatRoi(107.1162652636)).toBe("107.1%");
    expect(formatRoi(0)).toBe("0.0%");
  });
});
