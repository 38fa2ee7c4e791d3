import { describe, expect, it } from "vitest";
import { resolveLabMention } from "../rangeClassification";
import {
  assemblePatientRecord,
  createEditableCopy,
  renderLabHighlights,
  renderLabsAsText,
  serializePatientRecord
} from "../recordAssembly";
import type { AssembleRecordInput } from "../recordAssembly";

const buildInput = (overrides: Partial<AssembleRecordInput> = {}): AssembleRecordInput => ({
  fileName: "/uploads/2024/cbc-report.pdf",
  normalizedText: "Patient Name: Jane Doe\nHemoglobin 11.2 g/dL\nFerritin 85",
  patient: { name: "Jane Doe", age: 34, gender: "Female" },
  vitalSigns: { heart_rate: "72 bpm" },
  labs: [
    resolveLabMention({ label: "Hemoglobin", value: 11.2, unitHint: "g/dL" }),
    resolveLabMention({ label: "Ferritin", value: 85, unitHint: null })
  ],
  ...overrides
});

describe("recordAssembly", () => {
  it("assembles a frozen record with defaults", () => {
    const record = assemblePatientRecord(buildInput());

    expect(record.fileName).toBe("cbc-report.pdf");
    expect(record.language).toBe("unknown");
    expect(record.reportDate).toBeNull();
    expect(record.rawText).toBe("Patient Name: Jane Doe\nHemoglobin 11.2 g/dL\nFerritin 85");
    expect(record.labs.map((lab) => lab.testName)).toEqual(["Hemoglobin", "Ferritin"]);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.labs)).toBe(true);
    expect(Object.isFrozen(record.labs[0])).toBe(true);
    expect(Object.isFrozen(record.patient)).toBe(true);
  });

  it("keeps a provided language verbatim and the report date", () => {
    const record = assemblePatientRecord(buildInput({ language: "en-GB", reportDate: "2024-03-12" }));

    expect(record.language).toBe("en-GB");
    expect(record.reportDate).toBe("2024-03-12");
    expect(assemblePatientRecord(buildInput({ language: " pt " })).language).toBe(" pt ");
    expect(assemblePatientRecord(buildInput({ language: "" })).language).toBe("unknown");
    expect(assemblePatientRecord(buildInput({ language: null })).language).toBe("unknown");
  });

  it("does not share state with its input", () => {
    const input = buildInput();
    const record = assemblePatientRecord(input);
    input.patient.name = "Someone Else";

    expect(record.patient.name).toBe("Jane Doe");
  });

  it("renders labs as text lines", () => {
    const record = assemblePatientRecord(buildInput());

    expect(renderLabsAsText(record.labs)).toBe(
      [
        "- Hemoglobin: 11.2 g/dL (Normal: 12–16, Status: Low)",
        "- Ferritin: 85 Unknown (Normal: Not available, Status: Unknown)"
      ].join("\n")
    );
    expect(renderLabsAsText([])).toBe("No lab values were detected.");
  });

  it("renders highlight tags for each lab", () => {
    const record = assemblePatientRecord(
      buildInput({
        labs: [
          resolveLabMention({ label: "Hemoglobin", value: 11.2, unitHint: "g/dL" }),
          resolveLabMention({ label: "MCV", value: 90, unitHint: "fL" }),
          resolveLabMention({ label: "Ferritin", value: 85, unitHint: null })
        ]
      })
    );

    expect(renderLabHighlights(record.labs)).toBe(
      [
        "[!] Hemoglobin: 11.2 g/dL (Normal: 12–16, Status: Low)",
        "[OK] MCV: 90 fL (Normal: 80–100, Status: Normal)",
        "[?] Ferritin: 85 Unknown (Normal: Not available, Status: Unknown)"
      ].join("\n")
    );
  });

  it("serializes to the snake_case document shape", () => {
    const record = assemblePatientRecord(buildInput({ language: "en", reportDate: "2024-03-12" }));

    expect(serializePatientRecord(record)).toEqual({
      file_name: "cbc-report.pdf",
      language: "en",
      report_date: "2024-03-12",
      patient: { name: "Jane Doe", age: 34, gender: "Female" },
      vital_signs: { heart_rate: "72 bpm" },
      labs: [
        {
          test_name: "Hemoglobin",
          value: 11.2,
          unit: "g/dL",
          normal_range: "12–16",
          status: "Low",
          highlight: "warning",
          confidence: 0.95
        },
        {
          test_name: "Ferritin",
          value: 85,
          unit: "Unknown",
          normal_range: "Not available",
          status: "Unknown",
          highlight: "unknown",
          confidence: 0.4
        }
      ],
      raw_text: "Patient Name: Jane Doe\nHemoglobin 11.2 g/dL\nFerritin 85"
    });
  });

  it("creates a mutable copy that leaves the record untouched", () => {
    const record = assemblePatientRecord(buildInput());
    const copy = createEditableCopy(record);
    copy.labs[0].value = 12.5;
    copy.patient.age = 35;

    expect(Object.isFrozen(copy)).toBe(false);
    expect(record.labs[0].value).toBe(11.2);
    expect(record.patient.age).toBe(34);
    expect(serializePatientRecord(copy).labs[0].value).toBe(12.5);
  });
});
