import { describe, expect, it } from "vitest";
import { FilenameGrammarError } from "../src/grammar/FilenameGrammarError";
import { createProductTypeRegistry } from "../src/registry/productTypeRegistry";

const NAME = "NISE_SSMISF18_20200115.HDFEOS";

describe("legacy snow/ice auxiliary classifier", () => {
  const classifier = createProductTypeRegistry().resolve("S5P_AUX_NISE__");
  if (!classifier) throw new Error("S5P_AUX_NISE__ missing from registry");

  it("identifies the upstream NISE naming", () => {
    expect(classifier.identify([NAME])).toBe(true);
    expect(classifier.identify([`/incoming/${NAME}`])).toBe(true);
    expect(classifier.identify(["NISE_SSMISF17_20200115.HDFEOS"])).toBe(false);
    expect(classifier.identify(["NISE_SSMISF18_20200115.hdfeos"])).toBe(false);
    expect(classifier.identify(["NISE_SSMISF18_2020011.HDFEOS"])).toBe(false);
    expect(classifier.identify(["S5P_OPER_AUX_NISE___20200115T000000_20200116T000000_20200115T000000.nc"])).toBe(false);
  });

  it("covers exactly one day starting at the file date", () => {
    const record = classifier.analyze([NAME]);
    expect(record.core.validityStart.toISOString()).toBe("2020-01-15T00:00:00.000Z");
    expect(record.core.validityStop.toISOString()).toBe("2020-01-16T00:00:00.000Z");
    expect(record.core.validityStop.getTime() - record.core.validityStart.getTime()).toBe(24 * 60 * 60 * 1000);
    expect(record.core.creationDate.toISOString()).toBe("2020-01-15T00:00:00.000Z");
  });

  it("fixes file class and file type", () => {
    const record = classifier.analyze([NAME]);
    expect(record.variant).toBe("legacy_aux");
    expect(record.core.productName).toBe("NISE_SSMISF18_20200115");
    expect(record.core.footprint).toBeNull();
    expect(record.s5p).toEqual({ fileClass: "OPER", fileType: "AUX_NISE__" });
    expect("orbit" in record.s5p).toBe(false);
  });

  it("shares the monthly auxiliary archive layout", () => {
    expect(classifier.archivePath(classifier.analyze([NAME]))).toBe("sentinel-5p/AUX_NISE__/2020/01");
  });

  it("rejects impossible dates that pass identify", () => {
    const name = "NISE_SSMISF18_20201332.HDFEOS";
    expect(classifier.identify([name])).toBe(true);
    expect(() => classifier.analyze([name])).toThrow(FilenameGrammarError);
    expect(() => classifier.analyze([name])).toThrow("Invalid date '20201332' in NISE_SSMISF18_20201332.HDFEOS.");
  });
});
