import { describe, it, expect } from "vitest";

import { reconcileCountries } from "../../../utils/reconcileCountries";

import type { CountryRecord, StoredCountry } from "../../../types/country";

function record(name: string, overrides: Partial<CountryRecord> = {}): CountryRecord {
  return {
    name,
    capital: null,
    region: "Europe",
    population: 100,
    currency_code: "EUR",
    exchange_rate: 0.9,
    estimated_gdp: 1000,
    flag_url: null,
    ...overrides,
  };
}

function stored(id: number, name: string, overrides: Partial<CountryRecord> = {}): StoredCountry {
  return {
    ...record(name, overrides),
    id,
    last_refreshed_at: new Date("2024-01-01T00:00:00Z"),
  };
}

describe("utils/reconcileCountries", () => {
  it("should insert everything into an empty store", () => {
    const incoming = [record("France"), record("Spain")];

    const { toInsert, toUpdate } = reconcileCountries([], incoming);

    expect(toInsert).toEqual(incoming);
    expect(toUpdate).toEqual([]);
  });

  it("should update matches and insert the rest", () => {
    const existing = [stored(7, "France"), stored(9, "Italy")];
    const incoming = [record("France", { population: 68 }), record("Spain")];

    const { toInsert, toUpdate } = reconcileCountries(existing, incoming);

    expect(toInsert.map((r) => r.name)).toEqual(["Spain"]);
    expect(toUpdate).toEqual([{ ...record("France", { population: 68 }), id: 7 }]);
  });

  it("should match names case-insensitively and keep the stored identity", () => {
    const existing = [stored(3, "Côte d'Ivoire"), stored(4, "Germany")];
    const incoming = [
      record("CÔTE D'IVOIRE", { capital: "Yamoussoukro" }),
      record("germany", { population: 83 }),
    ];

    const { toInsert, toUpdate } = reconcileCountries(existing, incoming);

    expect(toInsert).toEqual([]);
    expect(toUpdate.map((u) => [u.id, u.name])).toEqual([
      [3, "Côte d'Ivoire"],
      [4, "Germany"],
    ]);
    expect(toUpdate[0]?.capital).toBe("Yamoussoukro");
    expect(toUpdate[1]?.population).toBe(83);
  });

  it("should match names with dotted capitals to their folded form", () => {
    const existing = [stored(6, "İstanland")];

    const { toInsert, toUpdate } = reconcileCountries(existing, [record("i\u0307stanland")]);

    expect(toInsert).toEqual([]);
    expect(toUpdate.map((u) => [u.id, u.name])).toEqual([[6, "İstanland"]]);
  });

  it("should place every incoming record in exactly one bucket", () => {
    const existing = [stored(1, "Alpha"), stored(2, "Gamma")];
    const names = ["alpha", "Beta", "GAMMA", "Delta"];

    const { toInsert, toUpdate } = reconcileCountries(
      existing,
      names.map((n) => record(n))
    );

    const inserted = new Set(toInsert.map((r) => r.name.toLowerCase()));
    const updated = new Set(toUpdate.map((r) => r.name.toLowerCase()));
    for (const name of names) {
      const key = name.toLowerCase();
      expect(inserted.has(key) !== updated.has(key)).toBe(true);
      expect(updated.has(key)).toBe(key === "alpha" || key === "gamma");
    }
    expect(toInsert.length + toUpdate.length).toBe(names.length);
  });

  it("should collapse in-batch case collisions onto one insert, last wins", () => {
    const incoming = [
      record("Newland", { population: 1 }),
      record("Other"),
      record("NEWLAND", { population: 2 }),
    ];

    const { toInsert, toUpdate } = reconcileCountries([], incoming);

    expect(toInsert.map((r) => [r.name, r.population])).toEqual([
      ["NEWLAND", 2],
      ["Other", 100],
    ]);
    expect(toUpdate).toEqual([]);
  });

  it("should collapse in-batch case collisions onto one update, last wins", () => {
    const existing = [stored(5, "Oldland")];
    const incoming = [record("oldland", { population: 1 }), record("OLDLAND", { population: 2 })];

    const { toInsert, toUpdate } = reconcileCountries(existing, incoming);

    expect(toInsert).toEqual([]);
    expect(toUpdate).toEqual([{ ...record("Oldland", { population: 2 }), id: 5 }]);
  });

  it("should preserve incoming order within each bucket", () => {
    const existing = [stored(1, "B"), stored(2, "D")];
    const incoming = ["A", "B", "C", "D", "E"].map((n) => record(n));

    const { toInsert, toUpdate } = reconcileCountries(existing, incoming);

    expect(toInsert.map((r) => r.name)).toEqual(["A", "C", "E"]);
    expect(toUpdate.map((r) => r.name)).toEqual(["B", "D"]);
  });
});
