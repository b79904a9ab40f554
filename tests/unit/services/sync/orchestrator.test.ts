import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  SyncOrchestrator,
  type SyncProgress,
} from "../../../../src/services/sync/orchestrator.js";
import {
  createSyncHarness,
  parentRecord,
  staffRecord,
  studentRecord,
  type SyncHarness,
} from "../../../helpers/sync.js";

import type { SnapshotProvider } from "../../../../src/services/backup.js";

const WALL = "2024-03-01T09:00:00.000Z";

class FakeSnapshots implements SnapshotProvider {
  taken = 0;

  async createSnapshot(): Promise<string | null> {
    this.taken++;
    return `snapshot-${String(this.taken)}.db`;
  }
}

describe("services/sync/orchestrator", () => {
  let harness: SyncHarness;
  let snapshots: FakeSnapshots;

  const orchestrator = () => {
    const deps = harness.deps();
    return new SyncOrchestrator(
      { ...deps, snapshots, cacheStats: () => deps.cache.stats() },
      28
    );
  };
  const directoryEndpoints = () =>
    harness.directory.fetch.calls
      .map((call) => new URL(call))
      .filter((url) => url.hostname === "directory.test")
      .map((url) => url.pathname.split("/").at(-1));

  beforeEach(async () => {
    harness = await createSyncHarness();
    snapshots = new FakeSnapshots();
    harness.directory.staff = [staffRecord(1), staffRecord(2)];
    harness.directory.classes = [
      { id: 12, name: "10-А", mentor_ids: [1] },
      { id: 13, name: "9-Б" },
    ];
    harness.directory.students.set(12, [studentRecord(7001, [parentRecord(8001)])]);
    harness.directory.students.set(13, [studentRecord(7002)]);
  });

  afterEach(async () => {
    await harness.close();
  });

  it("should run snapshot, staff, classes and students in order", async () => {
    const sync = orchestrator();
    const progress: SyncProgress[] = [];
    sync.setProgressCallback((event) => progress.push(event));

    const report = await sync.run();

    expect(report.snapshot).toBe("snapshot-1.db");
    expect(report.errors).toEqual([]);
    expect(report.staff).toMatchObject({ saved: 2, created: 2 });
    expect(report.classes).toMatchObject({ saved: 2, created: 2 });
    expect(report.staffLinks).toBe(1);
    expect(report.students).toMatchObject({ saved: 2, created: 2, pages: 2 });
    expect(report.parents).toMatchObject({ saved: 1, created: 1 });
    expect(report.orphanParentsDeactivated).toBe(0);
    expect(directoryEndpoints()).toEqual([
      "teacher_profiles",
      "class_units",
      "student_profiles",
      "student_profiles",
    ]);
    expect(progress).toEqual([
      { phase: "staff", current: 0, total: 1 },
      { phase: "staff", current: 1, total: 1 },
      { phase: "classes", current: 0, total: 1 },
      { phase: "classes", current: 1, total: 1 },
      { phase: "students", current: 0, total: 2, currentItem: "12" },
      { phase: "students", current: 1, total: 2, currentItem: "13" },
      { phase: "students", current: 2, total: 2 },
    ]);
  });

  it("should report the same counts when run twice", async () => {
    const sync = orchestrator();
    await sync.run({ backup: false });

    const report = await sync.run({ backup: false });

    expect(report.students).toMatchObject({ saved: 2, created: 0, unchanged: 2, duplicates: 0 });
    expect(report.parents).toMatchObject({ saved: 1, created: 0, unchanged: 1, duplicates: 0 });
    expect(report.errors).toEqual([]);
  });

  it("should skip students when the class list is unavailable", async () => {
    harness.directory.fail = (url) => url.pathname.endsWith("/class_units");

    const report = await orchestrator().run();

    expect(report.classes?.fetchFailed).toBe(true);
    expect(report.students).toBeNull();
    expect(report.parents).toBeNull();
    expect(report.errors).toEqual(["class list unavailable, students not synced"]);
    expect(harness.directory.callsTo("student_profiles")).toEqual([]);
  });

  it("should use stored classes when the class stage is skipped", async () => {
    for (const id of [13, 12]) {
      await harness.handle.db
        .insertInto("class_units")
        .values({ id, name: `Class_${String(id)}`, created_at: WALL, updated_at: WALL })
        .execute();
    }

    const report = await orchestrator().run({ staff: false, classes: false });

    expect(report.staff).toBeNull();
    expect(report.classes).toBeNull();
    expect(report.students).toMatchObject({ saved: 2 });
    expect(directoryEndpoints()).toEqual(["student_profiles", "student_profiles"]);
    expect(
      harness.directory
        .callsTo("student_profiles")
        .map((call) => new URL(call).searchParams.get("class_unit_ids"))
    ).toEqual(["12", "13"]);
  });

  it("should narrow the student stage to the requested classes", async () => {
    const report = await orchestrator().run({ backup: false, classIds: [13, 99] });

    expect(report.snapshot).toBeNull();
    expect(snapshots.taken).toBe(0);
    expect(report.students).toMatchObject({ saved: 1 });
    expect(
      harness.directory
        .callsTo("student_profiles")
        .map((call) => new URL(call).searchParams.get("class_unit_ids"))
    ).toEqual(["13"]);
  });

  it("should keep parents when a class fetch fails", async () => {
    await orchestrator().run({ backup: false });
    harness.directory.students.set(12, []);
    harness.directory.fail = (url) =>
      url.pathname.endsWith("/student_profiles") &&
      url.searchParams.get("class_unit_ids") === "13";

    const report = await orchestrator().run({ backup: false });

    expect(report.students?.fetchFailed).toBe(true);
    expect(report.orphanParentsDeactivated).toBe(0);
    const parent = await harness.handle.db
      .selectFrom("parents")
      .select("is_active")
      .where("person_id", "=", 8001)
      .executeTakeFirstOrThrow();
    expect(parent.is_active).toBe(1);
  });
});
