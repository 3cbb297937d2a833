import { describe, expect, it } from "vitest";
import {
  addDaysUtc,
  datePathParts,
  formatValidityInstant,
  isMaxTimestamp,
  isMinTimestamp,
  MAX_TIMESTAMP_MS,
  MIN_TIMESTAMP_MS,
  maxTimestamp,
  minTimestamp,
  parseCompactDate,
  parseCompactTimestamp,
  parseValidityStart,
  parseValidityStop,
} from "../src/grammar/timestamps";

describe("parseCompactTimestamp", () => {
  it("parses YYYYMMDDTHHMMSS as UTC", () => {
    expect(parseCompactTimestamp("20210305T101530")?.toISOString()).toBe("2021-03-05T10:15:30.000Z");
    expect(parseCompactTimestamp("20200229T235959")?.toISOString()).toBe("2020-02-29T23:59:59.000Z");
  });

  it("keeps years below 100 literal", () => {
    expect(parseCompactTimestamp("00500101T000000")?.toISOString()).toBe("0050-01-01T00:00:00.000Z");
  });

  it("rejects impossible calendar values", () => {
    expect(parseCompactTimestamp("20190229T000000")).toBeNull();
    expect(parseCompactTimestamp("20210230T000000")).toBeNull();
    expect(parseCompactTimestamp("20211305T000000")).toBeNull();
    expect(parseCompactTimestamp("20210305T240000")).toBeNull();
    expect(parseCompactTimestamp("20210305T106000")).toBeNull();
    expect(parseCompactTimestamp("20210305T101560")).toBeNull();
    expect(parseCompactTimestamp("00000000T000000")).toBeNull();
  });

  it("rejects anything that is not the strict layout", () => {
    expect(parseCompactTimestamp("2021030T5101530")).toBeNull();
    expect(parseCompactTimestamp("20210305 101530")).toBeNull();
    expect(parseCompactTimestamp("20210305T10153")).toBeNull();
    expect(parseCompactTimestamp("TTTTTTTTTTTTTTT")).toBeNull();
  });
});

describe("parseCompactDate", () => {
  it("parses YYYYMMDD at midnight UTC", () => {
    expect(parseCompactDate("20200115")?.toISOString()).toBe("2020-01-15T00:00:00.000Z");
  });

  it("rejects invalid dates", () => {
    expect(parseCompactDate("20201332")).toBeNull();
    expect(parseCompactDate("2020011")).toBeNull();
  });
});

describe("validity sentinels", () => {
  it("maps the all-zero start to the minimum timestamp", () => {
    const start = parseValidityStart("00000000T000000");
    expect(start?.getTime()).toBe(MIN_TIMESTAMP_MS);
    expect(start?.toISOString()).toBe("0001-01-01T00:00:00.000Z");
    expect(start && isMinTimestamp(start)).toBe(true);
  });

  it("maps the all-nine stop to the maximum timestamp", () => {
    const stop = parseValidityStop("99999999T999999");
    expect(stop?.getTime()).toBe(MAX_TIMESTAMP_MS);
    expect(stop?.toISOString()).toBe("9999-12-31T23:59:59.999Z");
    expect(stop && isMaxTimestamp(stop)).toBe(true);
  });

  it("only accepts each sentinel on its own side", () => {
    expect(parseValidityStart("99999999T999999")).toBeNull();
    expect(parseValidityStop("00000000T000000")).toBeNull();
  });

  it("parses regular values strictly", () => {
    expect(parseValidityStart("20200101T000000")?.toISOString()).toBe("2020-01-01T00:00:00.000Z");
    expect(parseValidityStop("99999999T999998")).toBeNull();
  });
});

describe("date helpers", () => {
  it("adds whole days", () => {
    const start = new Date("2020-12-31T00:00:00.000Z");
    expect(addDaysUtc(start, 1).toISOString()).toBe("2021-01-01T00:00:00.000Z");
  });

  it("splits dates into zero-padded UTC parts", () => {
    expect(datePathParts(new Date("2021-03-05T23:59:59.000Z"))).toEqual({
      year: "2021",
      month: "03",
      day: "05",
    });
    expect(datePathParts(minTimestamp())).toEqual({ year: "0001", month: "01", day: "01" });
  });
});

describe("formatValidityInstant", () => {
  it("describes both open bounds as open", () => {
    expect(formatValidityInstant(minTimestamp())).toBe("open");
    expect(formatValidityInstant(maxTimestamp())).toBe("open");
  });

  it("prints bounded instants as ISO text", () => {
    expect(formatValidityInstant(new Date(Date.UTC(2019, 3, 15, 12)))).toBe("2019-04-15T12:00:00.000Z");
  });
});
