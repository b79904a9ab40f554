import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  findProblematicStaff,
  getDirectoryStatistics,
  getStaffDetails,
  getStaffStatistics,
  inactiveReason,
  listInactiveStaff,
  searchStaff,
} from "../../../src/services/reports.js";
import { createTestDatabase } from "../../mocks/db.js";

import type { DatabaseHandle, NewStaff } from "../../../src/db/index.js";

type StaffSeed = Omit<NewStaff, "is_active" | "created_at" | "updated_at"> & {
  is_active?: number;
};

const WALL = "2024-03-01T09:00:00.000Z";
const NOW = new Date(WALL);

describe("services/reports", () => {
  let handle: DatabaseHandle;

  beforeEach(async () => {
    handle = await createTestDatabase();
    const { db } = handle;

    const staff: StaffSeed[] = [
      { person_id: 1, user_id: 101, type: "teacher", name: "Ivanov Ivan", last_name: "Ivanov", first_name: "Ivan", phone: "79990000001", email: "ivanov@school.test", external_id: "5" },
      { person_id: 2, user_id: 102, type: "admin", name: "Petrov Petr", last_name: "Petrov", first_name: "Petr" },
      { person_id: 3, user_id: 103, type: "teacher", name: "Smirnova Olga", last_name: "Smirnova", first_name: "Olga", email: "olga@school.test" },
      { person_id: 4, user_id: null, is_active: 0, deactivated_at: "2024-03-01T08:00:00.000Z" },
      { person_id: 5, user_id: 105, name: "Test_5", is_active: 0, deactivated_at: "2024-02-27T08:00:00.000Z" },
      { person_id: 6, user_id: 106, name: "Orlov Gleb", last_name: "Orlov", is_active: 0, deactivated_at: "2024-01-10T08:00:00.000Z" },
    ];
    for (const row of staff) {
      await db
        .insertInto("staff")
        .values({ is_active: 1, created_at: WALL, updated_at: WALL, ...row })
        .execute();
    }

    for (const [id, name] of [
      [12, "9-Б"],
      [11, "10-А"],
    ] as const) {
      await db
        .insertInto("class_units")
        .values({ id, name, created_at: WALL, updated_at: WALL })
        .execute();
    }

    const ivanov = await db
      .selectFrom("staff")
      .select("id")
      .where("person_id", "=", 1)
      .executeTakeFirstOrThrow();
    await db
      .insertInto("class_staff")
      .values([11, 12].map((classUnitId) => ({
        class_unit_id: classUnitId,
        staff_id: ivanov.id,
        is_leader: 1,
        created_at: WALL,
      })))
      .execute();

    await db
      .insertInto("students")
      .values([
        { person_id: 7001, class_unit_id: 11, is_active: 1, created_at: WALL, updated_at: WALL },
        { person_id: 7002, class_unit_id: 11, is_active: 0, created_at: WALL, updated_at: WALL },
      ])
      .execute();
    await db
      .insertInto("parents")
      .values({ person_id: 8001, is_active: 1, created_at: WALL, updated_at: WALL })
      .execute();
  });

  afterEach(async () => {
    await handle.close();
  });

  it("should count rows per table", async () => {
    expect(await getDirectoryStatistics(handle.db)).toEqual({
      classes: 2,
      studentsActive: 1,
      studentsTotal: 2,
      parentsActive: 1,
      parentsTotal: 1,
      staffActive: 3,
      staffTotal: 6,
    });
  });

  it("should summarize active staff", async () => {
    expect(await getStaffStatistics(handle.db)).toEqual({
      total: 6,
      active: 3,
      deactivated: 3,
      byType: { admin: 1, teacher: 2 },
      withPhone: 1,
      withEmail: 2,
      withExternalId: 1,
    });
  });

  it("should find problematic staff", async () => {
    expect(await findProblematicStaff(handle.db)).toEqual({
      noUserId: 1,
      noName: 1,
      noContacts: 4,
      examples: [{ person_id: 4, name: null }],
    });
  });

  describe("inactive staff", () => {
    it("should explain deactivations", () => {
      expect(inactiveReason({ user_id: null, name: "Ivanov Ivan" })).toBe("missing user_id");
      expect(inactiveReason({ user_id: 1, name: "Test_5" })).toBe("suspicious name");
      expect(inactiveReason({ user_id: 1, name: "Ivanov Ivan" })).toBe("absent from API");
    });

    it("should list the newest deactivations first", async () => {
      expect(await listInactiveStaff(handle.db, NOW, 2)).toEqual({
        total: 3,
        deactivatedToday: 1,
        deactivatedThisWeek: 2,
        noUserId: 1,
        suspiciousNames: 1,
        rows: [
          {
            personId: 4,
            name: null,
            deactivatedAt: "2024-03-01T08:00:00.000Z",
            reason: "missing user_id",
          },
          {
            personId: 5,
            name: "Test_5",
            deactivatedAt: "2024-02-27T08:00:00.000Z",
            reason: "suspicious name",
          },
        ],
      });
    });
  });

  describe("lookup", () => {
    it("should search active staff by name", async () => {
      expect((await searchStaff(handle.db, "ov")).map((s) => s.person_id)).toEqual([1, 2, 3]);
      expect((await searchStaff(handle.db, "PETR")).map((s) => s.person_id)).toEqual([2]);
      expect(await searchStaff(handle.db, "Orlov")).toEqual([]);
    });

    it("should show staff with their classes", async () => {
      const details = await getStaffDetails(handle.db, 1);

      expect(details?.staff.name).toBe("Ivanov Ivan");
      expect(details?.classes).toEqual(["10-А", "9-Б"]);
      expect(await getStaffDetails(handle.db, 4)).toBeNull();
    });
  });
});
