import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { AxiosError, type AxiosAdapter } from "axios";
import { factorsByGroup, fetchFactorTable, loadFactorTable, parseFactorTable } from "../src/repo/factorsRepo.js";
import { FactorTableError } from "../src/errors.js";
import { http } from "../src/util/http.js";
import { exampleTableFile } from "./fixtures.js";

describe("loadFactorTable", () => {
  it("loads the bundled reference table", () => {
    const table = loadFactorTable();
    expect(table.version).toBe("2024.1");
    expect(table.factors.size).toBe(24);
    expect(table.groups.map((g) => g.id)).toEqual(["transportation", "home_energy", "hot_shower", "food", "digital"]);
    expect(table.factors.get("car_miles")?.kgCO2ePerUnit).toBe(0.404);
    expect(table.factors.get("electricity_kwh")?.kgCO2ePerUnit).toBe(0.433);
    expect(table.factors.get("emails_sent")?.kgCO2ePerUnit).toBe(0.00005);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.factors.get("car_miles"))).toBe(true);
  });

  it("strips a UTF-8 BOM", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "factors-"));
    const file = path.join(dir, "factors.json");
    fs.writeFileSync(file, "\uFEFF" + JSON.stringify(exampleTableFile()), "utf8");
    try {
      expect(loadFactorTable(file).version).toBe("test-1");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("fails on a missing file", () => {
    expect(() => loadFactorTable("/nonexistent/factors.json")).toThrow(/Cannot read emission factor table/);
  });

  it("fails on malformed JSON", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "factors-"));
    const file = path.join(dir, "factors.json");
    fs.writeFileSync(file, "{ not json", "utf8");
    try {
      expect(() => loadFactorTable(file)).toThrow(FactorTableError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("parseFactorTable", () => {
  it("rejects duplicate category keys", () => {
    const file = exampleTableFile();
    file.factors.push({ ...file.factors[0], label: "Car again" });
    expect(() => parseFactorTable(file)).toThrow('Duplicate emission factor "car_miles"');
  });

  it("rejects duplicate groups", () => {
    const file = exampleTableFile();
    file.groups.push({ ...file.groups[0] });
    expect(() => parseFactorTable(file)).toThrow('Duplicate factor group "transportation"');
  });

  it("rejects factors pointing at an unknown group", () => {
    const file = exampleTableFile();
    file.factors[1] = { ...file.factors[1], group: "spaceflight" };
    expect(() => parseFactorTable(file)).toThrow('Emission factor "electricity_kwh" references unknown group "spaceflight"');
  });

  it.each([0, -0.5])("rejects a factor of %s", (kg) => {
    const file = exampleTableFile();
    file.factors[0] = { ...file.factors[0], kgCO2ePerUnit: kg };
    expect(() => parseFactorTable(file)).toThrow(FactorTableError);
  });

  it("rejects keys that are not lower_snake_case", () => {
    const file = exampleTableFile();
    file.factors[0] = { ...file.factors[0], key: "Car-Miles" };
    expect(() => parseFactorTable(file)).toThrow(/factors\.0\.key: category keys are lower_snake_case/);
  });

  it("rejects non-object input", () => {
    expect(() => parseFactorTable([])).toThrow(/^Invalid emission factor table/);
  });
});

describe("factorsByGroup", () => {
  it("lists factors under their group in table order", () => {
    const grouped = factorsByGroup(parseFactorTable(exampleTableFile()));
    expect(grouped.map((g) => [g.id, g.factors.map((f) => f.key)])).toEqual([
      ["transportation", ["car_miles"]],
      ["home_energy", ["electricity_kwh"]],
    ]);
  });
});

const JSON_HEADERS = { "content-type": "application/json" };

describe("fetchFactorTable", () => {
  const original = http.defaults.adapter;
  afterEach(() => {
    http.defaults.adapter = original;
  });

  it("fetches and validates a remote table, retrying a reset connection", async () => {
    const urls: Array<string | undefined> = [];
    const adapter: AxiosAdapter = async (config) => {
      urls.push(config.url);
      if (urls.length === 1) throw new AxiosError("socket hang up", "ECONNRESET", config);
      return { data: exampleTableFile(), status: 200, statusText: "OK", headers: JSON_HEADERS, config };
    };
    http.defaults.adapter = adapter;

    const table = await fetchFactorTable("https://factors.test/emission-factors.json", { attempts: 3, backoffMs: 0 });
    expect(table.version).toBe("test-1");
    expect(urls).toEqual(["https://factors.test/emission-factors.json", "https://factors.test/emission-factors.json"]);
  });

  it("rejects an invalid remote table", async () => {
    const adapter: AxiosAdapter = async (config) => ({
      data: { version: "x" },
      status: 200,
      statusText: "OK",
      headers: JSON_HEADERS,
      config,
    });
    http.defaults.adapter = adapter;
    await expect(fetchFactorTable("https://factors.test/bad.json")).rejects.toBeInstanceOf(FactorTableError);
  });

  it("refuses a table served as something other than JSON", async () => {
    const adapter: AxiosAdapter = async (config) => ({
      data: "<html>maintenance</html>",
      status: 200,
      statusText: "OK",
      headers: { "content-type": "text/html; charset=utf-8" },
      config,
    });
    http.defaults.adapter = adapter;
    await expect(fetchFactorTable("https://factors.test/emission-factors.json")).rejects.toThrow(
      "Expected JSON from https://factors.test/emission-factors.json, got text/html; charset=utf-8",
    );
  });
});
