import * as path from "path";
import { afterEach, beforeEach, describe, it, expect, jest } from "@jest/globals";
import { isDataFile, listCsvFiles, scanAndLoad } from "@/lib/ingestion/pipeline";
import { preprocessDirectory } from "@/lib/gateway";
import { createGatewayState } from "@/lib/types/canonical";
import { getPanelColumn } from "@/lib/panel/panelBuilder";
import { DirectoryNotFoundError, EmptyPanelError } from "@/lib/errors";
import { makeTempDir, writeFiles } from "./helpers";

const SAMPLE_FILES = {
  "cu2301.csv": "日期,收盘价,持仓量\n2023-01-03,100,10\n2023-01-04,101,11\n",
  "spot.csv": "date,现货价格\n2023-01-02,50\n2023-01-04,52\n",
  "notes.bak.csv": "date,现货价格\n2023-01-02,1\n",
  "bad.csv": "foo,bar\n1,2\n",
  "nested/rb2405.csv": "date,close,oi\n2023-01-05,3000,5\n",
};

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("isDataFile", () => {
  it("skips backup copies", () => {
    expect(isDataFile("cu2301.csv")).toBe(true);
    expect(isDataFile("CU2301.CSV")).toBe(true);
    expect(isDataFile("cu2301.bak.csv")).toBe(false);
    expect(isDataFile("cu2301~.csv")).toBe(false);
    expect(isDataFile("cu2301.xlsx")).toBe(false);
  });
});

describe("scanAndLoad", () => {
  it("loads spot and futures recursively and records failures", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, SAMPLE_FILES);
    const state = createGatewayState();

    const stats = await scanAndLoad(state, dir, { quiet: true });

    expect(stats).toEqual({
      files: 4,
      spot_count: 1,
      futures_count: 2,
      errors: [{ file: "bad.csv", code: "UNCLASSIFIABLE_FILE", message: "bad.csv: could not tell spot from futures" }],
    });
    expect(state.spot).toEqual({ date: ["2023-01-02", "2023-01-04"], price: [50, 52] });
    expect([...state.contracts.keys()].sort()).toEqual(["cu2301", "rb2405"]);
    expect(state.contracts.get("cu2301")?.series).toEqual({
      date: ["2023-01-03", "2023-01-04"],
      price: [100, 101],
      open_interest: [10, 11],
    });
    expect(state.quality?.futures.rb2405.total_records).toBe(1);
  });

  it("logs the loaded contract ids", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, SAMPLE_FILES);
    await scanAndLoad(createGatewayState(), dir);
    expect(console.log).toHaveBeenCalledWith("Contracts (2): cu2301, rb2405");
  });

  it("keeps an earlier spot series when a later spot file has no usable dates", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, {
      "a_spot.csv": "date,现货价格\n2023-01-02,50\n",
      "b_spot.csv": "date,现货价格\nsoon,51\n",
    });
    const state = createGatewayState();
    const stats = await scanAndLoad(state, dir, { quiet: true });

    expect(state.spot).toEqual({ date: ["2023-01-02"], price: [50] });
    expect(stats.spot_count).toBe(1);
    expect(stats.errors).toEqual([
      { file: "b_spot.csv", code: "MISSING_FIELD", message: 'b_spot: no parseable dates in column "date"' },
    ]);
  });

  it("stays in the top folder when not recursive", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, SAMPLE_FILES);
    expect(await listCsvFiles(dir, false)).toEqual(
      ["bad.csv", "cu2301.csv", "spot.csv"].map((f) => path.join(dir, f))
    );

    const state = createGatewayState();
    const stats = await scanAndLoad(state, dir, { recursive: false, quiet: true });
    expect(stats.files).toBe(3);
    expect([...state.contracts.keys()]).toEqual(["cu2301"]);
  });

  it("returns empty stats for a folder without CSV files", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, { "readme.txt": "not data" });
    const state = createGatewayState();
    expect(await scanAndLoad(state, dir, { quiet: true })).toEqual({
      files: 0,
      spot_count: 0,
      futures_count: 0,
      errors: [],
    });
    expect(state.quality?.spot).toBeNull();
  });

  it("throws for a missing directory", async () => {
    const dir = await makeTempDir();
    await expect(scanAndLoad(createGatewayState(), path.join(dir, "missing"))).rejects.toBeInstanceOf(
      DirectoryNotFoundError
    );
  });

  it("collects missing-field and unreadable files without stopping", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, {
      "cu2302.csv": "日期,持仓量\n2023-01-03,10\n",
      "empty.csv": "",
      "header.csv": "date,close\n",
    });
    const stats = await scanAndLoad(createGatewayState(), dir, { quiet: true });
    expect(stats.errors.map((e) => [e.file, e.code])).toEqual([
      ["cu2302.csv", "MISSING_FIELD"],
      ["empty.csv", "FILE_UNREADABLE"],
      ["header.csv", "FILE_UNREADABLE"],
    ]);
    expect(stats.futures_count).toBe(0);
  });

  it("keeps the last file when two derive the same contract id", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, {
      "a/cu2301.csv": "date,close,oi\n2023-01-03,1,5\n",
      "b/cu2301.csv": "date,close,oi\n2023-01-03,2,5\n",
    });
    const state = createGatewayState();
    const stats = await scanAndLoad(state, dir, { quiet: true });

    expect(stats.futures_count).toBe(2);
    expect(state.contracts.size).toBe(1);
    expect(state.contracts.get("cu2301")?.series.price).toEqual([2]);
    expect(console.warn).toHaveBeenCalledWith("  ! cu2301.csv: contract cu2301 already loaded, replacing it");
  });
});

describe("preprocessDirectory", () => {
  it("builds the aligned panel", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, SAMPLE_FILES);

    const { panel, snapshot, state } = await preprocessDirectory(dir, { quiet: true });

    expect(panel.dates).toEqual(["2023-01-03", "2023-01-04", "2023-01-05"]);
    expect(panel.columns.map((c) => c.name)).toEqual([
      "spot_price",
      "futures_cu2301",
      "basis_cu2301",
      "futures_rb2405",
      "basis_rb2405",
    ]);
    expect(getPanelColumn(panel, "spot_price")?.values).toEqual([50, 52, 52]);
    expect(getPanelColumn(panel, "basis_cu2301")?.values).toEqual([-50, -49, null]);
    expect(getPanelColumn(panel, "basis_rb2405")?.values).toEqual([null, null, -2948]);
    expect(state.quality?.spot?.total_records).toBe(3);
    expect(snapshot.stats.errors).toHaveLength(1);
    expect(Object.keys(snapshot.futures)).toEqual(["cu2301", "rb2405"]);
  });

  it("throws EmptyPanelError when nothing could be loaded", async () => {
    const empty = await makeTempDir();
    await expect(preprocessDirectory(empty, { quiet: true })).rejects.toBeInstanceOf(EmptyPanelError);

    const broken = await makeTempDir();
    await writeFiles(broken, { "bad.csv": "foo,bar\n1,2\n" });
    await expect(preprocessDirectory(broken, { quiet: true })).rejects.toBeInstanceOf(EmptyPanelError);
  });
});
