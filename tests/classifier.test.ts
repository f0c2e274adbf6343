import { describe, it, expect } from "@jest/globals";
import { classify, classifySignals, detectSignals } from "@/lib/ingestion/classifier";
import { makeTable, spreadDates } from "./helpers";

describe("classify", () => {
  it("treats an open-interest column as futures (cu2301: 80 rows over 120 days)", () => {
    const dates = spreadDates("2022-09-01", 80, 120);
    const table = makeTable(
      ["日期", "收盘价", "持仓量"],
      dates.map((d, i) => [d, 68000 + i, 150000 - i]),
      "cu2301.csv"
    );
    const signals = detectSignals(table);
    expect(signals).toEqual({
      hasOpenInterest: true,
      hasVolume: false,
      hasSpotPrice: false,
      rowCount: 80,
      spanDays: 120,
    });
    expect(classify(table)).toBe("futures");
  });

  it("treats a long date/close history as spot (400 rows over 1500 days)", () => {
    const dates = spreadDates("2019-01-01", 400, 1500);
    const table = makeTable(["date", "close"], dates.map((d, i) => [d, 50 + i]));
    expect(classify(table)).toBe("spot");
  });

  it("treats short-span volume without a spot column as futures", () => {
    const dates = spreadDates("2023-01-01", 50, 200);
    const table = makeTable(["date", "close", "volume"], dates.map((d) => [d, 10, 1000]));
    expect(classify(table)).toBe("futures");
  });

  it("prefers an explicit spot-price column over the volume rule", () => {
    const dates = spreadDates("2023-01-01", 50, 200);
    const table = makeTable(["date", "spot_price", "volume"], dates.map((d) => [d, 10, 1000]));
    expect(classify(table)).toBe("spot");
  });

  it("lets open interest win over a spot-price column", () => {
    const table = makeTable(["date", "spot_price", "oi"], [["2023-01-02", 10, 5]]);
    expect(classify(table)).toBe("futures");
  });

  it("classifies a long-running futures continuation series as spot (known limitation)", () => {
    const dates = spreadDates("2018-01-01", 150, 1200);
    const table = makeTable(["date", "close", "volume"], dates.map((d) => [d, 10, 1000]));
    expect(classify(table)).toBe("spot");
  });

  it("returns unknown when no rule applies", () => {
    const dates = spreadDates("2023-01-01", 50, 30);
    expect(classify(makeTable(["date", "close"], dates.map((d) => [d, 1])))).toBe("unknown");
    expect(classify(makeTable(["foo", "bar"], [["a", "b"]]))).toBe("unknown");
  });

  it("does not treat a long history with 100 rows or fewer as spot", () => {
    const dates = spreadDates("2015-01-01", 100, 2000);
    expect(classify(makeTable(["date", "close"], dates.map((d) => [d, 1])))).toBe("unknown");
  });

  it("is a pure function of the table shape", () => {
    const signals = {
      hasOpenInterest: false,
      hasVolume: true,
      hasSpotPrice: false,
      rowCount: 10,
      spanDays: 999,
    };
    expect(classifySignals(signals)).toBe("futures");
    expect(classifySignals({ ...signals })).toBe("futures");
    expect(classifySignals({ ...signals, spanDays: 1000 })).toBe("unknown");
  });
});
