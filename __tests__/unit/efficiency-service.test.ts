import { describe, it, expect } from "@jest/globals";
import { EfficiencyService } from "../../src/services/efficiency-service";
import { makeRow } from "../helpers/fixtures";

const noLeave = new Map<string, number>();

describe("EfficiencyService", () => {
  const service = new EfficiencyService({
    throughputRules: { YTCS: 3, DS: 2 },
    periodDays: 5,
  });

  it("scores a full week of expected points at 100%", () => {
    const rows = [
      makeRow({ ticket: "YTCS-1", storyPoints: 8 }),
      makeRow({ ticket: "YTCS-2", storyPoints: 5 }),
      makeRow({ ticket: "YTCS-3", storyPoints: 2 }),
    ];

    expect(service.calculate(rows, noLeave)).toEqual({
      records: [
        {
          contributor: "Alice",
          project: "YTCS",
          completedPoints: 15,
          expectedPoints: 15,
          efficiency: 100,
          leaveDays: 0,
          workingDays: 5,
        },
      ],
      excluded: [],
      complete: true,
    });
  });

  it("reduces expected points by leave days", () => {
    const rows = [makeRow({ storyPoints: 6 })];
    const { records } = service.calculate(rows, new Map([["Alice", 2]]));

    expect(records[0]).toEqual({
      contributor: "Alice",
      project: "YTCS",
      completedPoints: 6,
      expectedPoints: 9,
      efficiency: 66.67,
      leaveDays: 2,
      workingDays: 3,
    });
  });

  it("scores zero expected points as 0% without work and 100% with work", () => {
    const leave = new Map([
      ["Bob", 5],
      ["Cara", 5],
    ]);
    const rows = [
      makeRow({ contributor: "Bob", ticket: "DS-1", project: "DS", storyPoints: 0 }),
      makeRow({ contributor: "Cara", ticket: "DS-2", project: "DS", storyPoints: 2 }),
    ];

    const { records } = service.calculate(rows, leave);

    expect(records.map(({ contributor, expectedPoints, workingDays, efficiency }) => ({
      contributor,
      expectedPoints,
      workingDays,
      efficiency,
    }))).toEqual([
      { contributor: "Bob", expectedPoints: 0, workingDays: 0, efficiency: 0 },
      { contributor: "Cara", expectedPoints: 0, workingDays: 0, efficiency: 100 },
    ]);
  });

  it("clamps working days at zero when leave exceeds the period", () => {
    const { records } = service.calculate(
      [makeRow({ storyPoints: 1 })],
      new Map([["Alice", 7]])
    );

    expect(records[0]).toMatchObject({ leaveDays: 7, workingDays: 0, expectedPoints: 0 });
  });

  it("excludes and reports projects without a throughput rule", () => {
    const rows = [
      makeRow({ ticket: "ABC123-1", project: "ABC", storyPoints: 4 }),
      makeRow({ ticket: "YTCS-9", storyPoints: 3 }),
    ];

    const report = service.calculate(rows, noLeave);

    expect(report.records.map((record) => record.project)).toEqual(["YTCS"]);
    expect(report.excluded).toEqual([
      {
        contributor: "Alice",
        project: "ABC",
        completedPoints: 4,
        reason: "No throughput rule configured for project ABC",
      },
    ]);
    expect(report.complete).toBe(false);
  });

  it("does not treat Unknown projects as having a default rule", () => {
    const report = service.calculate([makeRow({ project: "Unknown" })], noLeave);

    expect(report.records).toEqual([]);
    expect(report.excluded.map((group) => group.project)).toEqual(["Unknown"]);
  });

  it("groups points per contributor and project", () => {
    const rows = [
      makeRow({ contributor: "Bob", project: "DS", storyPoints: 3 }),
      makeRow({ contributor: "Alice", project: "DS", storyPoints: 1 }),
      makeRow({ contributor: "Alice", project: "YTCS", storyPoints: 2 }),
      makeRow({ contributor: "Alice", project: "DS", storyPoints: 4 }),
    ];

    const { records } = service.calculate(rows, noLeave);

    expect(records.map(({ contributor, project, completedPoints, efficiency }) => [
      contributor,
      project,
      completedPoints,
      efficiency,
    ])).toEqual([
      ["Alice", "DS", 5, 50],
      ["Alice", "YTCS", 2, 13.33],
      ["Bob", "DS", 3, 30],
    ]);
  });

  it("returns an empty, complete report for no rows", () => {
    expect(service.calculate([], noLeave)).toEqual({ records: [], excluded: [], complete: true });
  });
});
