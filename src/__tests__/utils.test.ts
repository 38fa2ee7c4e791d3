import { describe, expect, it } from "vitest";
import { baseFileName, cleanLabel, formatNumber, parseNumericToken, roundConfidence, toTitleCase } from "../utils";

describe("utils", () => {
  it("parseNumericToken accepts decimals, decimal commas and grouped counts", () => {
    expect(parseNumericToken("11.2")).toBe(11.2);
    expect(parseNumericToken("13,8")).toBe(13.8);
    expect(parseNumericToken("250,000")).toBe(250000);
    expect(parseNumericToken("(11.2)")).toBe(11.2);
    expect(parseNumericToken(":105,")).toBe(105);
  });

  it("parseNumericToken rejects tokens that are not a plain number", () => {
    expect(parseNumericToken("120/80")).toBeNull();
    expect(parseNumericToken("g/dL")).toBeNull();
    expect(parseNumericToken("12-16")).toBeNull();
    expect(parseNumericToken("11.2g")).toBeNull();
    expect(parseNumericToken("")).toBeNull();
    expect(parseNumericToken(":")).toBeNull();
  });

  it("formatNumber prints numbers without padding", () => {
    expect(formatNumber(12.0)).toBe("12");
    expect(formatNumber(4.5)).toBe("4.5");
    expect(formatNumber(150)).toBe("150");
  });

  it("roundConfidence clamps to [0, 1] with two decimals", () => {
    expect(roundConfidence(0.951)).toBe(0.95);
    expect(roundConfidence(1.4)).toBe(1);
    expect(roundConfidence(-0.2)).toBe(0);
  });

  it("cleanLabel trims separators around a label", () => {
    expect(cleanLabel("Hb: ")).toBe("Hb");
    expect(cleanLabel("Hb) ")).toBe("Hb");
    expect(cleanLabel("Platelet   count - ")).toBe("Platelet count");
    expect(cleanLabel("MCH (Mean Corpuscular Hemoglobin) ")).toBe("MCH (Mean Corpuscular Hemoglobin)");
    expect(cleanLabel("(Hb: (12-16) ")).toBe("Hb: (12-16)");
  });

  it("toTitleCase and baseFileName", () => {
    expect(toTitleCase("fEMALE")).toBe("Female");
    expect(baseFileName("/uploads/2024/report.pdf")).toBe("report.pdf");
    expect(baseFileName("C:\\scans\\cbc.png")).toBe("cbc.png");
    expect(baseFileName("  notes.txt ")).toBe("notes.txt");
  });
});
