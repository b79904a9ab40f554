import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ClassSyncService, toClassFields } from "../../../../src/services/sync/classes.js";
import { createSyncHarness, type SyncHarness } from "../../../helpers/sync.js";

const WALL = "2024-03-01T09:00:00.000Z";

describe("services/sync/classes", () => {
  let harness: SyncHarness;
  const staffIds = new Map<number, number>();

  const runSync = () => new ClassSyncService(harness.deps()).sync();
  const links = async (classUnitId: number) =>
    (
      await harness.handle.db
        .selectFrom("class_staff")
        .select(["staff_id", "is_leader"])
        .where("class_unit_id", "=", classUnitId)
        .orderBy("staff_id")
        .execute()
    ).map((row) => [row.staff_id, row.is_leader]);

  beforeEach(async () => {
    harness = await createSyncHarness();
    staffIds.clear();
    for (const [personId, isActive] of [
      [1, 1],
      [2, 1],
      [3, 0],
    ] as const) {
      const inserted = await harness.handle.db
        .insertInto("staff")
        .values({
          person_id: personId,
          user_id: 100 + personId,
          is_active: isActive,
          created_at: WALL,
          updated_at: WALL,
        })
        .returning("id")
        .executeTakeFirstOrThrow();
      staffIds.set(personId, inserted.id);
    }

    harness.directory.classes = [
      { id: 12, name: "10-А", school_id: 28, class_level_id: 10, mentor_ids: [1, 3] },
      13,
      { id: 14, name: "5-Б", mentor_ids: null },
      { name: "no id" },
    ];
  });

  afterEach(async () => {
    await harness.close();
  });

  describe("toClassFields", () => {
    it("should derive parallel and literal from the name", () => {
      expect(toClassFields({ id: 1, name: "11-В", school_id: 28 })).toEqual({
        name: "11-В",
        school_id: 28,
        class_level_id: null,
        parallel: "11",
        literal: "В",
      });
    });

    it("should name unnamed classes after their id", () => {
      expect(toClassFields({ id: 7, name: null }).name).toBe("Class_7");
    });
  });

  describe("sync", () => {
    it("should save classes and link active mentors", async () => {
      const result = await runSync();

      expect(result.classIds).toEqual([12, 13, 14]);
      expect(result.staffLinks).toBe(1);
      expect(result.stats).toMatchObject({
        seen: 4,
        saved: 3,
        created: 3,
        invalid: 1,
        pages: 1,
        fetchFailed: false,
      });
      expect(harness.directory.callsTo("class_units")).toEqual([
        "https://directory.test/v1/class_units?with_home_based=true",
      ]);

      const rows = await harness.handle.db.selectFrom("class_units").selectAll().orderBy("id").execute();
      expect(rows).toEqual([
        {
          id: 12,
          school_id: 28,
          class_level_id: 10,
          name: "10-А",
          parallel: "10",
          literal: "А",
          created_at: WALL,
          updated_at: WALL,
        },
        {
          id: 13,
          school_id: null,
          class_level_id: null,
          name: "Class_13",
          parallel: null,
          literal: null,
          created_at: WALL,
          updated_at: WALL,
        },
        {
          id: 14,
          school_id: null,
          class_level_id: null,
          name: "5-Б",
          parallel: "5",
          literal: "Б",
          created_at: WALL,
          updated_at: WALL,
        },
      ]);
      expect(await links(12)).toEqual([[staffIds.get(1), 1]]);
    });

    it("should rebuild links only when mentor_ids is given", async () => {
      await runSync();
      await harness.handle.db
        .insertInto("class_staff")
        .values({ class_unit_id: 14, staff_id: staffIds.get(2) ?? 0, is_leader: 0, created_at: WALL })
        .execute();

      harness.directory.classes = [
        { id: 12, name: "10-А", school_id: 28, class_level_id: 10, mentor_ids: [2] },
        { id: 14, name: "5-Б" },
      ];
      const result = await runSync();

      expect(result.staffLinks).toBe(1);
      expect(await links(12)).toEqual([[staffIds.get(2), 1]]);
      expect(await links(14)).toEqual([[staffIds.get(2), 0]]);
    });

    it("should update renamed classes", async () => {
      await runSync();

      harness.clock.setWallTime(new Date("2024-03-02T09:00:00.000Z"));
      harness.directory.classes = [
        { id: 12, name: "10-Б", school_id: 28, class_level_id: 10 },
        13,
        { id: 14, name: "5-Б" },
      ];
      const result = await runSync();

      expect(result.stats).toMatchObject({ created: 0, updated: 1, unchanged: 2 });
      expect(
        await harness.handle.db
          .selectFrom("class_units")
          .select(["name", "literal", "updated_at"])
          .where("id", "=", 12)
          .executeTakeFirstOrThrow()
      ).toEqual({ name: "10-Б", literal: "Б", updated_at: "2024-03-02T09:00:00.000Z" });
    });

    it("should report a failed class list", async () => {
      harness.directory.fail = (url) => url.pathname.endsWith("/class_units");

      const result = await runSync();

      expect(result.stats.fetchFailed).toBe(true);
      expect(result.classIds).toEqual([]);
      expect(harness.directory.callsTo("class_units")).toHaveLength(3);
    });
  });
});
