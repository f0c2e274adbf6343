import { describe, it, expect } from "@jest/globals";
import { ContractRegistry, identifyContract } from "@/lib/ingestion/contracts";
import { makeTable, series } from "./helpers";

describe("identifyContract", () => {
  const empty = makeTable(["date", "close"], [["2023-01-02", 1]]);

  it("uses a letters+4 digit code from the filename", () => {
    expect(identifyContract("cu2301.csv", empty)).toBe("cu2301");
    expect(identifyContract("CU2301_daily.csv", empty)).toBe("cu2301");
  });

  it("falls back to the first cell of a contract column", () => {
    const table = makeTable(["date", "合约代码", "close"], [
      ["2023-01-02", "RB2405", 1],
      ["2023-01-03", "RB2410", 2],
    ]);
    expect(identifyContract("rebar_2405.csv", table)).toBe("RB2405");
    const english = makeTable(["date", "Contract"], [["2023-01-02", "al-near"]]);
    expect(identifyContract("aluminium.csv", english)).toBe("al-near");
  });

  it("ignores non-text contract cells and uses the filename stem", () => {
    const table = makeTable(["date", "contract"], [["2023-01-02", 2405]]);
    expect(identifyContract("futures_data.csv", table)).toBe("futures_data");
    expect(identifyContract("futures_data.csv", empty)).toBe("futures_data");
  });
});

describe("ContractRegistry", () => {
  it("overwrites on id collision (last write wins)", () => {
    const registry = new ContractRegistry();
    const first = series(["2023-01-02"], [1]);
    const second = series(["2023-01-03"], [2]);
    expect(registry.set("cu2301", first)).toBe(false);
    expect(registry.set("cu2301", second)).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.toSeriesMap().get("cu2301")).toBe(second);
  });

  it("iterates in sorted id order", () => {
    const registry = new ContractRegistry();
    ["rb2405", "al2302", "cu2301"].forEach((id) => registry.set(id, series([], [])));
    expect(registry.ids()).toEqual(["al2302", "cu2301", "rb2405"]);
    expect([...registry.toSeriesMap().keys()]).toEqual(["al2302", "cu2301", "rb2405"]);
  });

  it("writes through to the map it wraps", () => {
    const records = new Map();
    new ContractRegistry(records).set("cu2301", series(["2023-01-02"], [1]));
    expect(records.has("cu2301")).toBe(true);
  });
});
