// Doctor Voice Onboarding - Profile persistence gateway
//
// finalize() hands the collected values to a ProfileGateway. The gateway owns
// the mapping from engine field names to the stored doctor record; the engine
// knows nothing about the storage schema.
//
// FileProfileGateway writes one directory per finalized session:
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
//     profile.json      doctor record in registration format
//     extraction.json   raw field values and confidence scores

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError } from "./errors.js";
import type { PlainFieldValue, ProfileReceipt, ProfileSubmission } from "./types.js";

export interface ProfileGateway {
  /**
   * Stores a doctor profile built from a finalized session.
   * Rejects with PersistenceError (or any error, which the engine wraps) on failure.
   */
  saveProfile(submission: ProfileSubmission): Promise<ProfileReceipt>;
}

// ─── Doctor profile mapping ─────────────────────────────────────────────────────

export interface DoctorProfile {
  title: string | null;
  firstName: string;
  lastName: string;
  email: string | null;
  phoneNumber: string | null;
  primarySpecialization: string;
  yearsOfExperience: number | null;
  medicalRegistrationNumber: string;
  languages: string[];
  onboardingSource: "voice";
  /** Collected fields the registration format has no column for. */
  additionalFields: Record<string, PlainFieldValue>;
  rawExtractionData: {
    voiceSessionId: string;
    language: string;
    collectedAt: string;
    confidenceScores: Record<string, number>;
  };
}

const MAPPED_FIELDS = new Set([
  "full_name",
  "email",
  "phone_number",
  "primary_specialization",
  "years_of_experience",
  "medical_registration_number",
  "languages",
]);

const TITLE_PREFIXES: Record<string, string> = {
  "dr.": "Dr.",
  dr: "Dr.",
  "doctor": "Dr.",
  "prof.": "Prof.",
  prof: "Prof.",
  professor: "Prof.",
};

/** Splits "Dr. Jane Mary Doe" into { title: "Dr.", firstName: "Jane", lastName: "Mary Doe" }. */
export function parseFullName(fullName: string): { title: string | null; firstName: string; lastName: string } {
  let parts = fullName.trim().split(/\s+/).filter((p) => p.length > 0);
  let title: string | null = null;

  const first = parts[0];
  if (first !== undefined) {
    const canonical = TITLE_PREFIXES[first.toLowerCase()];
    if (canonical !== undefined) {
      title = canonical;
      parts = parts.slice(1);
    }
  }

  const [firstName = "", ...rest] = parts;
  return { title, firstName, lastName: rest.join(" ") };
}

function textOf(value: PlainFieldValue | undefined): string | null {
  if (value === undefined) return null;
  if (Array.isArray(value)) return value.join(", ");
  return String(value);
}

function numberOf(value: PlainFieldValue | undefined): number | null {
  return typeof value === "number" ? value : null;
}

function listOf(value: PlainFieldValue | undefined): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return [...value];
  return [String(value)];
}

export function toDoctorProfile(submission: ProfileSubmission): DoctorProfile {
  const { values } = submission;
  const name = parseFullName(textOf(values.full_name) ?? "");

  const additionalFields: Record<string, PlainFieldValue> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!MAPPED_FIELDS.has(key)) additionalFields[key] = value;
  }

  return {
    title: name.title,
    firstName: name.firstName,
    lastName: name.lastName,
    email: textOf(values.email),
    phoneNumber: textOf(values.phone_number),
    primarySpecialization: textOf(values.primary_specialization) ?? "",
    yearsOfExperience: numberOf(values.years_of_experience),
    medicalRegistrationNumber: textOf(values.medical_registration_number) ?? "",
    languages: listOf(values.languages),
    onboardingSource: "voice",
    additionalFields,
    rawExtractionData: {
      voiceSessionId: submission.sessionId,
      language: submission.language,
      collectedAt: submission.collectedAt.toISOString(),
      confidenceScores: { ...submission.confidence },
    },
  };
}

// ─── File-backed gateway ────────────────────────────────────────────────────────

/**
 * Output directory name for a submission.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}` (UTC).
 */
export function buildDirectoryName(submission: ProfileSubmission): string {
  const date = submission.collectedAt;
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  const hours = String(date.getUTCHours()).padStart(2, "0");
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  const seconds = String(date.getUTCSeconds()).padStart(2, "0");

  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}_${submission.sessionId}`;
}

export class FileProfileGateway implements ProfileGateway {
  private readonly baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  async saveProfile(submission: ProfileSubmission): Promise<ProfileReceipt> {
    const dirName = buildDirectoryName(submission);
    const dirPath = join(this.baseDir, dirName);

    try {
      await mkdir(dirPath, { recursive: true });

      const profile = toDoctorProfile(submission);
      await writeFile(join(dirPath, "profile.json"), JSON.stringify(profile, null, 2), "utf-8");

      const extraction = {
        sessionId: submission.sessionId,
        values: submission.values,
        confidence: submission.confidence,
      };
      await writeFile(join(dirPath, "extraction.json"), JSON.stringify(extraction, null, 2), "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(`Failed to save profile for session ${submission.sessionId}: ${reason}`, { cause: err });
    }

    return { profileId: dirName, location: dirPath };
  }
}
