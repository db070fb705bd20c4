import { describe, it, expect } from "@jest/globals";
import { AggregationService } from "../../src/services/aggregation-service";
import { makeRow } from "../helpers/fixtures";

const columns = ["VL", "CS", "POC", "OTHERS"];

describe("AggregationService", () => {
  const service = new AggregationService(columns);

  const rows = [
    makeRow({ contributor: "Alice", ticket: "YTCS-1", category: "VL", day: "2024-03-04" }),
    makeRow({ contributor: "Alice", ticket: "YTCS-2", category: "CS", day: "2024-03-04" }),
    makeRow({ contributor: "Alice", ticket: "YTCS-3", category: "VL", day: "2024-03-05" }),
    makeRow({ contributor: "Alice", ticket: "YTCS-4", category: "OTHERS", day: "2024-03-06" }),
    makeRow({ contributor: "Alice", ticket: "YTCS-5", category: "POC", day: "2024-03-06", status: "QA RELEASE" }),
    makeRow({ contributor: "Bob", ticket: "DS-1", category: "CS", day: "2024-03-04", project: "DS" }),
    makeRow({ contributor: "Bob", ticket: "DS-2", category: "CS", day: "2024-03-04", project: "DS", status: "DEV READY" }),
  ];

  it("counts tickets per contributor and category", () => {
    expect(service.countByCategory(rows)).toEqual([
      { contributor: "Alice", category: "CS", tickets: 1 },
      { contributor: "Alice", category: "OTHERS", tickets: 1 },
      { contributor: "Alice", category: "POC", tickets: 1 },
      { contributor: "Alice", category: "VL", tickets: 2 },
      { contributor: "Bob", category: "CS", tickets: 2 },
    ]);
  });

  it("counts distinct categories per day and flags switch days", () => {
    expect(service.computeDailyBreadth(rows)).toEqual([
      { contributor: "Alice", day: "2024-03-04", distinctCategories: 2, switched: 1 },
      { contributor: "Alice", day: "2024-03-05", distinctCategories: 1, switched: 0 },
      { contributor: "Alice", day: "2024-03-06", distinctCategories: 2, switched: 1 },
      { contributor: "Bob", day: "2024-03-04", distinctCategories: 1, switched: 0 },
    ]);
  });

  it("pivots into zero-filled columns with totals and switch days", () => {
    const { contributorSummary } = service.aggregate(rows);

    expect(contributorSummary).toEqual([
      {
        contributor: "Alice",
        counts: { VL: 2, CS: 1, POC: 1, OTHERS: 1 },
        total: 5,
        contextSwitchDays: 2,
      },
      {
        contributor: "Bob",
        counts: { VL: 0, CS: 2, POC: 0, OTHERS: 0 },
        total: 2,
        contextSwitchDays: 0,
      },
    ]);
  });

  it("keeps every display column even when no row uses it", () => {
    const { columns: resultColumns, contributorSummary } = service.aggregate([
      makeRow({ category: "OTHERS" }),
    ]);

    expect(resultColumns).toEqual(["VL", "CS", "POC", "OTHERS"]);
    expect(Object.keys(contributorSummary[0].counts)).toEqual(["VL", "CS", "POC", "OTHERS"]);
    expect(contributorSummary[0].counts).toEqual({ VL: 0, CS: 0, POC: 0, OTHERS: 1 });
  });

  it("does not count repeated tickets in one category as a switch", () => {
    const sameCategory = [
      makeRow({ ticket: "YTCS-1", category: "VL" }),
      makeRow({ ticket: "YTCS-2", category: "VL" }),
      makeRow({ ticket: "YTCS-3", category: "VL" }),
    ];

    expect(service.aggregate(sameCategory).contributorSummary[0].contextSwitchDays).toBe(0);
  });

  it("sorts statuses by count, then by name", () => {
    expect(service.countByStatus(rows)).toEqual([
      { status: "DONE", tickets: 5 },
      { status: "DEV READY", tickets: 1 },
      { status: "QA RELEASE", tickets: 1 },
    ]);
  });

  it("produces the same tables when run twice on the same rows", () => {
    expect(service.aggregate(rows)).toEqual(service.aggregate(rows));
  });

  it("produces empty tables for no rows", () => {
    expect(service.aggregate([])).toEqual({
      columns,
      categoryCounts: [],
      dailyBreadth: [],
      contributorSummary: [],
      statusDistribution: [],
    });
  });
});
