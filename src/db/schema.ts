import type { Generated, Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// Table Types
// Timestamps are ISO-8601 text, booleans are SQLite 0/1.
// ============================================================================

export interface StaffTable {
  id: Generated<number>;
  person_id: number;
  user_id: number | null;
  name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  type: string | null;
  external_id: string | null;
  external_link: string | null;
  updated_at_api: string | null;
  is_active: number;
  deactivated_at: string | null;
  last_seen_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface ClassUnitsTable {
  // Remote id, reused as the local key
  id: number;
  school_id: number | null;
  class_level_id: number | null;
  name: string;
  parallel: string | null;
  literal: string | null;
  created_at: string;
  updated_at: string;
}

export interface StudentsTable {
  id: Generated<number>;
  person_id: number;
  user_name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  class_unit_id: number | null;
  external_id: string | null;
  external_link: string | null;
  is_active: number;
  deactivated_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface ParentsTable {
  id: Generated<number>;
  person_id: number;
  name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  external_id: string | null;
  external_link: string | null;
  is_active: number;
  deactivated_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface ClassStaffTable {
  id: Generated<number>;
  class_unit_id: number;
  staff_id: number;
  is_leader: number;
  subject: string | null;
  created_at: string;
}

export interface ParentStudentTable {
  id: Generated<number>;
  parent_id: number;
  student_id: number;
  relationship_type: string | null;
  created_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  staff: StaffTable;
  class_units: ClassUnitsTable;
  students: StudentsTable;
  parents: ParentsTable;
  class_staff: ClassStaffTable;
  parent_student: ParentStudentTable;
}

/** Tables whose rows carry person_id / is_active / deactivated_at */
export type PersonTable = "staff" | "students" | "parents";

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type Staff = Selectable<StaffTable>;
export type NewStaff = Insertable<StaffTable>;
export type StaffUpdate = Updateable<StaffTable>;

export type ClassUnit = Selectable<ClassUnitsTable>;
export type NewClassUnit = Insertable<ClassUnitsTable>;

export type Student = Selectable<StudentsTable>;
export type NewStudent = Insertable<StudentsTable>;
export type StudentUpdate = Updateable<StudentsTable>;

export type Parent = Selectable<ParentsTable>;
export type NewParent = Insertable<ParentsTable>;
export type ParentUpdate = Updateable<ParentsTable>;
