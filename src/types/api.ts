// Directory API payload schemas
// Remote records are validated here once; the sync services only see the
// static types below.

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const NullableString = Type.Union([Type.String(), Type.Null()]);
const NullableInteger = Type.Union([Type.Integer(), Type.Null()]);
const RemoteId = Type.Integer({ minimum: 1 });

// =====================
// Staff (GET /teacher_profiles)
// =====================

export const StaffUserSchema = Type.Object({
  last_name: Type.Optional(NullableString),
  first_name: Type.Optional(NullableString),
  middle_name: Type.Optional(NullableString),
  phone_number: Type.Optional(NullableString),
  email: Type.Optional(NullableString),
  email_ezd: Type.Optional(NullableString),
});

export const StaffRecordSchema = Type.Object({
  id: RemoteId,
  user_id: Type.Optional(NullableInteger),
  name: Type.Optional(NullableString),
  type: Type.Optional(NullableString),
  updated_at: Type.Optional(NullableString),
  user_integration_id: Type.Optional(
    Type.Union([Type.Integer(), Type.String(), Type.Null()])
  ),
  user: Type.Optional(Type.Union([StaffUserSchema, Type.Null()])),
});

export type StaffRecord = Static<typeof StaffRecordSchema>;
export type ValidStaffRecord = StaffRecord & { user_id: number };

// =====================
// Class Units (GET /class_units)
// =====================

export const ClassUnitRecordSchema = Type.Object({
  id: RemoteId,
  name: Type.Optional(NullableString),
  school_id: Type.Optional(NullableInteger),
  class_level_id: Type.Optional(NullableInteger),
  mentor_ids: Type.Optional(Type.Union([Type.Array(Type.Integer()), Type.Null()])),
});

export type ClassUnitRecord = Static<typeof ClassUnitRecordSchema>;

// =====================
// Students and Parents (GET /student_profiles)
// =====================

export const ParentRecordSchema = Type.Object({
  person_id: Type.Optional(NullableInteger),
  name: Type.Optional(NullableString),
  phone_number: Type.Optional(NullableString),
  email: Type.Optional(NullableString),
});

export type ParentRecord = Static<typeof ParentRecordSchema>;
export type ValidParentRecord = ParentRecord & { person_id: number };

export const StudentRecordSchema = Type.Object({
  person_id: Type.Optional(NullableInteger),
  user_name: Type.Optional(NullableString),
  name: Type.Optional(NullableString),
  last_name: Type.Optional(NullableString),
  first_name: Type.Optional(NullableString),
  middle_name: Type.Optional(NullableString),
  phone_number: Type.Optional(NullableString),
  email: Type.Optional(NullableString),
  email_ezd: Type.Optional(NullableString),
  // Parents are validated one by one so a bad parent never drops the student
  parents: Type.Optional(Type.Union([Type.Array(Type.Unknown()), Type.Null()])),
});

export type StudentRecord = Static<typeof StudentRecordSchema>;
export type ValidStudentRecord = StudentRecord & { person_id: number };

// =====================
// Identity Service
// =====================

export const IdentityLinkSchema = Type.Object({
  max_link: Type.Optional(NullableString),
});

// =====================
// Parsing
// =====================

export type ParsedRecord<T> =
  | { ok: true; record: T }
  | { ok: false; reason: "invalid" | "missing-required" };

function isPositive(value: number | null | undefined): value is number {
  return typeof value === "number" && value > 0;
}

function check<T extends TSchema>(
  schema: T,
  value: unknown
): value is Static<T> {
  return Value.Check(schema, value);
}

/**
 * Staff need both `id` and `user_id`; a record without `user_id` is
 * well-formed but not eligible for sync.
 */
export function parseStaffRecord(value: unknown): ParsedRecord<ValidStaffRecord> {
  if (!check(StaffRecordSchema, value)) {
    return { ok: false, reason: "invalid" };
  }
  const userId = value.user_id;
  if (!isPositive(userId)) {
    return { ok: false, reason: "missing-required" };
  }
  return { ok: true, record: { ...value, user_id: userId } };
}

export function parseStudentRecord(
  value: unknown
): ParsedRecord<ValidStudentRecord> {
  if (!check(StudentRecordSchema, value)) {
    return { ok: false, reason: "invalid" };
  }
  const personId = value.person_id;
  if (!isPositive(personId)) {
    return { ok: false, reason: "missing-required" };
  }
  return { ok: true, record: { ...value, person_id: personId } };
}

export function parseParentRecord(
  value: unknown
): ParsedRecord<ValidParentRecord> {
  if (!check(ParentRecordSchema, value)) {
    return { ok: false, reason: "invalid" };
  }
  const personId = value.person_id;
  if (!isPositive(personId)) {
    return { ok: false, reason: "missing-required" };
  }
  return { ok: true, record: { ...value, person_id: personId } };
}

/**
 * The class list endpoint sometimes returns bare ids instead of objects;
 * those become records named "Class_<id>".
 */
export function parseClassUnitRecord(value: unknown): ClassUnitRecord | null {
  if (typeof value === "number" || typeof value === "string") {
    const id = Number(value);
    return Number.isInteger(id) && id > 0 ? { id, name: `Class_${String(id)}` } : null;
  }
  return check(ClassUnitRecordSchema, value) ? value : null;
}

/**
 * Extract the link from the identity service's stage-one response.
 */
export function parseIdentityLink(value: unknown): string | null {
  if (!check(IdentityLinkSchema, value)) {
    return null;
  }
  const link = value.max_link;
  return typeof link === "string" && link.trim() !== "" ? link.trim() : null;
}
