import { describe, expect, it } from "vitest";
import { resolveCanonicalTest } from "../labNormalization";
import { parseReferenceTables } from "../referenceCatalog";

describe("labNormalization", () => {
  it("maps label variants to canonical keys", () => {
    const cases: Array<[string, string]> = [
      ["Hemoglobin", "hemoglobin"],
      ["Hb", "hemoglobin"],
      ["HAEMOGLOBIN", "hemoglobin"],
      ["Platelet count", "platelet"],
      ["Total Leukocyte Count (TLC)", "wbc"],
      ["Red Blood Cells", "rbc"],
      ["Fasting Glucose", "glucose"],
      ["Hematocrit", "pcv"]
    ];

    for (const [label, expected] of cases) {
      expect(resolveCanonicalTest({ label }).canonicalKey).toBe(expected);
    }
  });

  it("never lets a short alias claim a longer test name", () => {
    expect(resolveCanonicalTest({ label: "MCHC" }).canonicalKey).toBe("mchc");
    expect(resolveCanonicalTest({ label: "MCH" }).canonicalKey).toBe("mch");
    expect(resolveCanonicalTest({ label: "Mean Corpuscular Hemoglobin" }).canonicalKey).toBe("mch");
  });

  it("resolves to the test named first in the label", () => {
    expect(resolveCanonicalTest({ label: "MCH (Mean Corpuscular Hemoglobin)" })).toEqual({
      canonicalKey: "mch",
      confidence: 0.95,
      method: "alias",
      matchedAlias: "mch"
    });
    expect(resolveCanonicalTest({ label: "MCHC (Mean Corpuscular Hemoglobin Concentration)" }).canonicalKey).toBe(
      "mchc"
    );
    expect(resolveCanonicalTest({ label: "Mean Corpuscular Hemoglobin (MCH)" }).canonicalKey).toBe("mch");
    expect(resolveCanonicalTest({ label: "Mean Corpuscular Hemoglobin Concentration (MCHC)" }).canonicalKey).toBe(
      "mchc"
    );
    expect(resolveCanonicalTest({ label: "Neutrophils (WBC diff)" }).canonicalKey).toBe("neutrophils");
    expect(resolveCanonicalTest({ label: "Hemoglobin (Hb)" }).canonicalKey).toBe("hemoglobin");
  });

  it("reports the alias that matched with full alias confidence", () => {
    expect(resolveCanonicalTest({ label: "Platelet count" })).toEqual({
      canonicalKey: "platelet",
      confidence: 0.95,
      method: "alias",
      matchedAlias: "platelet"
    });
  });

  it("returns an unmatched resolution for unknown or empty labels", () => {
    const unmatched = { canonicalKey: null, confidence: 0.4, method: "unmatched" };

    expect(resolveCanonicalTest({ label: "Foobarase" })).toEqual(unmatched);
    expect(resolveCanonicalTest({ label: "" })).toEqual(unmatched);
    expect(resolveCanonicalTest({ label: "(:)" })).toEqual(unmatched);
  });

  it("matches against the tables it is given", () => {
    const tables = parseReferenceTables({
      tests: [{ key: "Ferritin", aliases: ["Serum Ferritin", "ferritin"] }]
    });

    expect(resolveCanonicalTest({ label: "Serum ferritin" }, tables)).toEqual({
      canonicalKey: "ferritin",
      confidence: 0.95,
      method: "alias",
      matchedAlias: "serum ferritin"
    });
    expect(resolveCanonicalTest({ label: "Hemoglobin" }, tables).canonicalKey).toBeNull();
  });
});
