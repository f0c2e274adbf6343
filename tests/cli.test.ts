import * as path from "path";
import { afterEach, describe, it, expect } from "@jest/globals";
import { hasFlag, parseFlag, parsePreprocessArgs } from "@/scripts/_utils/cli";
import { loadEnvFiles } from "@/scripts/_loadEnv";
import { makeTempDir, writeFiles } from "./helpers";

describe("parseFlag", () => {
  it("reads --name=value and --name value", () => {
    const argv = ["--dir=./data", "--output", "out.json"];
    expect(parseFlag(argv, "dir")).toBe("./data");
    expect(parseFlag(argv, "output")).toBe("out.json");
    expect(parseFlag(argv, "missing")).toBeNull();
  });

  it("does not take the next flag as a value", () => {
    expect(parseFlag(["--output", "--no-recursive"], "output")).toBeNull();
    expect(hasFlag(["--output", "--no-recursive"], "no-recursive")).toBe(true);
  });
});

describe("parsePreprocessArgs", () => {
  const defaults = { dir: "data", output: "processed_data.json" };

  it("falls back to defaults", () => {
    expect(parsePreprocessArgs([], defaults)).toEqual({ dir: "data", output: "processed_data.json", recursive: true });
  });

  it("honors overrides", () => {
    expect(parsePreprocessArgs(["--dir", "raw", "--output=snap.json", "--no-recursive"], defaults)).toEqual({
      dir: "raw",
      output: "snap.json",
      recursive: false,
    });
  });
});

describe("loadEnvFiles", () => {
  afterEach(() => {
    delete process.env.BASIS_GATEWAY_TEST_VALUE;
  });

  it("loads existing files with earlier ones taking precedence", async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, {
      ".env.local": "BASIS_GATEWAY_TEST_VALUE=from-local\n",
      ".env": "BASIS_GATEWAY_TEST_VALUE=from-env\n",
    });
    expect(loadEnvFiles(dir)).toEqual([path.join(dir, ".env.local"), path.join(dir, ".env")]);
    expect(process.env.BASIS_GATEWAY_TEST_VALUE).toBe("from-local");
  });

  it("skips files that do not exist", async () => {
    const dir = await makeTempDir();
    expect(loadEnvFiles(dir)).toEqual([]);
  });
});
