/**
 * Contact and name normalization for directory records.
 *
 * All functions accept `unknown` because remote payload fields are only
 * loosely typed; anything that is not a usable string yields `null`.
 */

export interface NameParts {
  lastName: string | null;
  firstName: string | null;
  middleName: string | null;
}

export interface ClassNameParts {
  parallel: string | null;
  literal: string | null;
}

// Test and service accounts the directory exposes alongside real staff
const SUSPICIOUS_NAME_PATTERNS = [
  /^Англ_\d+/,
  /^Нем_\d+/,
  /^Фр_\d+/,
  /^Мат_\d+/,
  /^Инф_\d+/,
  /^[A-Za-z]+_\d+/,
  /^\d+/,
  /^[А-Я]{3,5}$/,
];

const API_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * Canonicalize a phone number to 11 digits starting with 7.
 *
 * "8 (999) 123-45-67" and "9991234567" both become "79991234567".
 */
export function normalizePhone(value: unknown): string | null {
  if (typeof value !== "string" || value === "") {
    return null;
  }

  const digits = value.replaceAll(/\D/g, "");

  if (digits.length === 11 && digits.startsWith("8")) {
    return `7${digits.slice(1)}`;
  }
  if (digits.length === 10) {
    return `7${digits}`;
  }
  if (digits.length === 11 && digits.startsWith("7")) {
    return digits;
  }
  return null;
}

/**
 * Lowercase and trim an email; values without "@" are rejected.
 */
export function normalizeEmail(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const cleaned = value.trim().toLowerCase();
  return cleaned.includes("@") ? cleaned : null;
}

/**
 * Split "Last First Middle" on whitespace, keeping the source order.
 */
export function splitFullName(value: unknown): NameParts {
  if (typeof value !== "string") {
    return { lastName: null, firstName: null, middleName: null };
  }

  const parts = value.split(/\s+/).filter((part) => part !== "");

  return {
    lastName: parts[0] ?? null,
    firstName: parts[1] ?? null,
    middleName: parts[2] ?? null,
  };
}

/**
 * Whether a staff name looks like a placeholder or service account.
 * Missing names count as suspicious.
 */
export function isSuspiciousName(value: unknown): boolean {
  if (typeof value !== "string" || value === "") {
    return true;
  }
  return SUSPICIOUS_NAME_PATTERNS.some((pattern) => pattern.test(value));
}

/**
 * Parse a class name of the form "<parallel>-<literal>", e.g. "10-А".
 */
export function parseClassName(name: string): ClassNameParts {
  if (!name.includes("-")) {
    return { parallel: null, literal: null };
  }

  const [parallel, literal] = name.split("-");
  return {
    parallel: parallel ?? null,
    literal: literal ?? null,
  };
}

/**
 * Parse the directory's `updated_at` ("YYYY-MM-DD", "YYYY-MM-DD HH:MM:SS"
 * or "YYYY-MM-DDTHH:MM:SS") into "YYYY-MM-DDTHH:MM:SS".
 */
export function parseApiDate(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const match = API_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = "00", minute = "00", second = "00"] =
    match;
  const iso = `${String(year)}-${String(month)}-${String(day)}T${hour}:${minute}:${second}`;

  // Reject impossible calendar dates such as 2024-02-31
  const parsed = new Date(`${iso}Z`);
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.toISOString().slice(0, 19) !== iso
  ) {
    return null;
  }

  return iso;
}

/**
 * Treat empty strings as absent.
 */
export function nonEmpty(value: string | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}
