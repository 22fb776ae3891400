import { describe, expect, it } from "vitest";
import { parseSince, parseStore, parseTimeout } from "./options";

describe("CLI option parsers", () => {
  it("accepts timeouts up to the longest timer delay", () => {
    expect(parseTimeout("600000")).toBe(600_000);
    expect(parseTimeout("2147483647")).toBe(2_147_483_647);
  });

  it("rejects timeouts that a timer cannot hold", () => {
    expect(() => parseTimeout("2147483648")).toThrow(
      "Expected at most 2147483647 milliseconds.",
    );
  });

  it("rejects non-positive or fractional timeouts", () => {
    expect(() => parseTimeout("0")).toThrow("Expected a positive number of milliseconds.");
    expect(() => parseTimeout("1.5")).toThrow("Expected a positive number of milliseconds.");
    expect(() => parseTimeout("soon")).toThrow("Expected a positive number of milliseconds.");
  });

  it("parses ISO timestamps and known stores", () => {
    expect(parseSince("2024-01-01T00:00:00Z")).toEqual(new Date("2024-01-01T00:00:00Z"));
    expect(() => parseSince("yesterday")).toThrow("Expected an ISO-8601 timestamp.");
    expect(parseStore("memory")).toBe("memory");
    expect(() => parseStore("sqlite")).toThrow("Expected one of: postgres, memory.");
  });
});
