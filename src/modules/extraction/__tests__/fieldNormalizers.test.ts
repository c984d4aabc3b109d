import { describe, expect, it } from "vitest";
import {
  coerceFieldValue,
  findDateTokens,
  monthsBetween,
  normalizeDate,
  parseLocaleNumber,
} from "../fieldNormalizers";
import type { FieldDefinition } from "../extraction.types";

function field(kind: FieldDefinition["kind"]): FieldDefinition {
  return { key: "value", label: "Value", kind, description: "test field" };
}

describe("normalizeDate", () => {
  it("accepts the supported date forms", () => {
    expect(normalizeDate("2023-07-15")).toBe("2023-07-15");
    expect(normalizeDate("14.02.2005")).toBe("2005-02-14");
    expect(normalizeDate("06/2021")).toBe("2021-06-01");
    expect(normalizeDate("Juni 2023")).toBe("2023-06-01");
    expect(normalizeDate("December 2020")).toBe("2020-12-01");
  });

  it("rejects impossible dates and free text", () => {
    expect(normalizeDate("31.02.2022")).toBeNull();
    expect(normalizeDate("2022-13-01")).toBeNull();
    expect(normalizeDate("sometime soon")).toBeNull();
  });
});

describe("findDateTokens", () => {
  it("returns unique normalized dates in order of appearance", () => {
    expect(findDateTokens("Start 01.03.2019, again 2019-03-01 and 31.08.2022")).toEqual([
      "2019-03-01",
      "2022-08-31",
    ]);
  });
});

describe("parseLocaleNumber", () => {
  it("reads decimal commas and the first number only", () => {
    expect(parseLocaleNumber("Note 2,3 (gut)")).toBe(2.3);
    expect(parseLocaleNumber("36 of 45")).toBe(36);
    expect(parseLocaleNumber("none")).toBeNull();
  });
});

describe("monthsBetween", () => {
  it("rounds elapsed days to whole months", () => {
    expect(monthsBetween("2020-01-01", "2021-01-01")).toBe(12);
    expect(monthsBetween("2019-03-01", "2022-08-31")).toBe(42);
  });

  it("returns null when the range runs backwards", () => {
    expect(monthsBetween("2022-01-01", "2021-01-01")).toBeNull();
  });
});

describe("coerceFieldValue", () => {
  it("coerces by field kind", () => {
    expect(coerceFieldValue(field("number"), " 1,7 ")).toBe(1.7);
    expect(coerceFieldValue(field("number"), Number.POSITIVE_INFINITY)).toBeNull();
    expect(coerceFieldValue(field("text"), 5)).toBe("5");
    expect(coerceFieldValue(field("text"), "   ")).toBeNull();
    expect(coerceFieldValue(field("date"), "14.02.2005")).toBe("2005-02-14");
    expect(coerceFieldValue(field("date"), 42)).toBeNull();
    expect(coerceFieldValue(field("text"), undefined)).toBeNull();
  });
});
