import { describe, it, expect } from "vitest";
import { applyDateOffset, formatDate, renderTemplate } from "../src/vault/index.ts";

// Wednesday, 31 January 2024, 09:05:07 local time
const NOW = new Date(2024, 0, 31, 9, 5, 7);

describe("renderTemplate", () => {
  it("substitutes variables and leaves unknown placeholders", () => {
    expect(renderTemplate("Hello {{name}}, it is {{unknown}}", { name: "Sam" }, NOW)).toBe(
      "Hello Sam, it is {{unknown}}"
    );
  });

  it("trims whitespace inside placeholders", () => {
    expect(renderTemplate("{{ name }}", { name: "Sam" }, NOW)).toBe("Sam");
  });

  it("renders the current date and time", () => {
    expect(renderTemplate("{{date}} {{time}}", {}, NOW)).toBe("2024-01-31 09:05");
  });

  it("lets variables shadow built-in placeholders", () => {
    expect(renderTemplate("{{date}}", { date: "custom" }, NOW)).toBe("custom");
  });

  it("formats dates with an optional offset", () => {
    expect(renderTemplate("{{date:dddd, MMMM D}}", {}, NOW)).toBe("Wednesday, January 31");
    expect(renderTemplate("{{date:YYYY-MM-DD|-7d}}", {}, NOW)).toBe("2024-01-24");
    expect(renderTemplate("{{date:YYYY-MM-DD|+1m}}", {}, NOW)).toBe("2024-02-29");
    expect(renderTemplate("{{date:YYYY-MM-DD|+1w-1d}}", {}, NOW)).toBe("2024-02-06");
  });

  it("keeps placeholders with an invalid offset", () => {
    expect(renderTemplate("{{date:YYYY|bogus}}", {}, NOW)).toBe("{{date:YYYY|bogus}}");
  });

  it("evaluates simple arithmetic", () => {
    expect(renderTemplate("{{2 + 3}} {{10 / 4}} {{7 % 3}} {{-2 * 3}}", {}, NOW)).toBe("5 2.5 1 -6");
  });

  it("keeps division by zero unresolved", () => {
    expect(renderTemplate("{{1 / 0}}", {}, NOW)).toBe("{{1 / 0}}");
  });

  it("does not expand placeholders inside substituted values", () => {
    expect(renderTemplate("{{a}}", { a: "{{b}}", b: "x" }, NOW)).toBe("{{b}}");
  });
});

describe("formatDate", () => {
  it("treats bracketed text as literal", () => {
    expect(formatDate(NOW, "[Week] ww, [day] DDD")).toBe("Week 05, day 31");
  });

  it("formats twelve-hour clocks", () => {
    expect(formatDate(new Date(2024, 0, 31, 15, 0), "h:mm A")).toBe("3:00 PM");
    expect(formatDate(new Date(2024, 0, 31, 0, 30), "hh:mm a")).toBe("12:30 am");
  });

  it("formats short names and two-digit years", () => {
    expect(formatDate(NOW, "ddd D MMM YY")).toBe("Wed 31 Jan 24");
  });
});

describe("applyDateOffset", () => {
  it("clamps month arithmetic to the end of the month", () => {
    const result = applyDateOffset(new Date(2024, 1, 29), "+1y");
    expect(result && formatDate(result, "YYYY-MM-DD")).toBe("2025-02-28");
  });

  it("returns the date unchanged for an empty offset", () => {
    expect(applyDateOffset(NOW, "")).toBe(NOW);
  });

  it("rejects malformed offsets", () => {
    expect(applyDateOffset(NOW, "+1x")).toBeUndefined();
  });
});
