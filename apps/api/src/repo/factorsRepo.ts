import fs from "fs";
import { FactorTableFileSchema, type EmissionFactor, type FactorGroup, type FactorTable } from "../types.js";
import { FactorTableError } from "../errors.js";
import { FACTORS_FETCH } from "../config.js";
import { fetchJson, type FetchJsonOptions } from "../util/http.js";

export const DEFAULT_FACTORS_URL = new URL("../../data/emission-factors.json", import.meta.url);

export function parseFactorTable(raw: unknown): FactorTable {
  const parsed = FactorTableFileSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new FactorTableError(`Invalid emission factor table: ${msg}`);
  }
  const { version, source, groups, factors } = parsed.data;

  const groupIds = new Set<string>();
  for (const g of groups) {
    if (groupIds.has(g.id)) throw new FactorTableError(`Duplicate factor group "${g.id}"`);
    groupIds.add(g.id);
  }

  const byKey = new Map<string, EmissionFactor>();
  for (const f of factors) {
    if (byKey.has(f.key)) throw new FactorTableError(`Duplicate emission factor "${f.key}"`);
    if (!groupIds.has(f.group)) {
      throw new FactorTableError(`Emission factor "${f.key}" references unknown group "${f.group}"`);
    }
    byKey.set(f.key, Object.freeze({ ...f }));
  }

  return Object.freeze({
    version,
    source,
    groups: Object.freeze(groups.map((g) => Object.freeze({ ...g }))),
    factors: byKey,
  });
}

function readRawJson(path: string | URL): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(path, "utf8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new FactorTableError(`Cannot read emission factor table ${String(path)}: ${reason}`);
  }
  // Strip potential BOM from JSON files
  const sanitized = raw.replace(/^\uFEFF/, "");
  try {
    return JSON.parse(sanitized);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new FactorTableError(`Emission factor table ${String(path)} is not valid JSON: ${reason}`);
  }
}

export function loadFactorTable(path: string | URL = DEFAULT_FACTORS_URL): FactorTable {
  const table = parseFactorTable(readRawJson(path));
  console.log(`[factorsRepo] loaded factors v${table.version} (${table.factors.size} categories) from ${String(path)}`);
  return table;
}

export async function fetchFactorTable(
  url: string,
  opts: FetchJsonOptions = {
    attempts: FACTORS_FETCH.ATTEMPTS,
    backoffMs: FACTORS_FETCH.BACKOFF_MS,
    timeoutMs: FACTORS_FETCH.TIMEOUT_MS,
  },
): Promise<FactorTable> {
  const raw = await fetchJson(url, opts);
  const table = parseFactorTable(raw);
  console.log(`[factorsRepo] fetched factors v${table.version} (${table.factors.size} categories) from ${url}`);
  return table;
}

export type GroupWithFactors = FactorGroup & { factors: EmissionFactor[] };

export function factorsByGroup(table: FactorTable): GroupWithFactors[] {
  const all = [...table.factors.values()];
  return table.groups.map((g) => ({ ...g, factors: all.filter((f) => f.group === g.id) }));
}
