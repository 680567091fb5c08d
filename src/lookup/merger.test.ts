/**
 * Unit tests: merge order, deduplication and tolerance of failed or malformed input.
 */

import { describe, it, expect } from "vitest";
import { mergeResults, mergeShipments } from "./merger.js";
import type { RawResult } from "./types.js";
import { networkError } from "../domain/errors.js";
import { parseShipment } from "../otm/mapper.js";

interface Hit {
  id?: string;
  label: string;
}

const byId = (hit: Hit) => hit.id;

function page(...records: Hit[]): RawResult<Hit> {
  return { ok: true, value: { records, count: records.length, hasMore: false } };
}

function failed(): RawResult<Hit> {
  return { ok: false, error: networkError("connection reset") };
}

describe("mergeResults", () => {
  it("keeps the first record seen for each identifier, first result first", () => {
    const a = { id: "1", label: "A" };
    const b = { id: "2", label: "B" };
    const c = { id: "2", label: "C" };
    const d = { id: "3", label: "D" };

    expect(mergeResults([page(a, b), page(c, d)], byId)).toEqual([a, b, d]);
  });

  it("returns the original record references", () => {
    const a = { id: "1", label: "A" };
    const [merged] = mergeResults([page(a), page()], byId);
    expect(merged).toBe(a);
  });

  it("returns nothing for two empty results", () => {
    expect(mergeResults([page(), page()], byId)).toEqual([]);
  });

  it("drops duplicates within a single result", () => {
    const first = { id: "7", label: "first" };
    const again = { id: "7", label: "again" };
    expect(mergeResults([page(first, again), page()], byId)).toEqual([first]);
  });

  it("drops records without an identifier and keeps going", () => {
    const noId = { label: "no id" };
    const blank = { id: "", label: "blank" };
    const x = { id: "5", label: "X" };
    expect(mergeResults([page(noId, blank, x), page()], byId)).toEqual([x]);
  });

  it("does not let a dropped record claim an identifier", () => {
    const blank = { id: "", label: "blank" };
    const later = { id: "", label: "later" };
    const y = { id: "9", label: "Y" };
    expect(mergeResults([page(blank), page(later, y)], byId)).toEqual([y]);
  });

  it("uses the successful result when the other failed", () => {
    const x = { id: "5", label: "X" };
    expect(mergeResults([failed(), page(x)], byId)).toEqual([x]);
    expect(mergeResults([page(x), failed()], byId)).toEqual([x]);
  });

  it("never returns two records with the same identifier", () => {
    const first = page(
      { id: "1", label: "a" },
      { id: "2", label: "b" },
      { id: "1", label: "c" },
      { id: "4", label: "d" }
    );
    const second = page({ id: "4", label: "e" }, { id: "2", label: "f" }, { id: "5", label: "g" });
    const ids = mergeResults([first, second], byId).map((h) => h.id);
    expect(ids).toEqual(["1", "2", "4", "5"]);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("does not modify its input", () => {
    const records = [{ id: "1", label: "A" }, { id: "1", label: "B" }];
    const input = page(...records);
    mergeResults([input, page()], byId);
    expect(input.ok && input.value.records).toEqual(records);
  });
});

describe("mergeShipments", () => {
  it("deduplicates on shipmentXid and drops shipments without one", () => {
    const s1 = parseShipment({ shipmentXid: "SHP-1", shipmentName: "direct" });
    const s1Again = parseShipment({ shipmentXid: "SHP-1", shipmentName: "indirect" });
    const orphan = parseShipment({ shipmentName: "orphan" });
    const s2 = parseShipment({ shipmentXid: "SHP-2" });

    const merged = mergeShipments([
      { ok: true, value: { records: [s1, orphan], count: 2, hasMore: false } },
      { ok: true, value: { records: [s1Again, s2], count: 2, hasMore: false } },
    ]);
    expect(merged).toEqual([s1, s2]);
    expect(merged[0].shipmentName).toBe("direct");
  });
});
