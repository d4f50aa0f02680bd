// Unit tests for the profile gateway and doctor profile mapping

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileProfileGateway, buildDirectoryName, parseFullName, toDoctorProfile } from "./profile-persistence.js";
import { PersistenceError } from "./errors.js";
import type { ProfileSubmission } from "./types.js";

function makeSubmission(overrides: Partial<ProfileSubmission> = {}): ProfileSubmission {
  return {
    sessionId: "session-42",
    language: "en",
    values: {
      full_name: "Dr. Asha Mary Rao",
      primary_specialization: "Cardiology",
      years_of_experience: 12,
      medical_registration_number: "MCI-12345",
      email: "asha.rao@example.com",
      phone_number: "+919800000000",
      languages: ["English", "Hindi"],
      clinic_city: "Pune",
    },
    confidence: { full_name: 0.95, years_of_experience: 0.8 },
    collectedAt: new Date("2025-03-01T09:05:07.000Z"),
    ...overrides,
  };
}

describe("parseFullName", () => {
  it("splits a title and keeps the remainder as last name", () => {
    expect(parseFullName("Dr. Asha Mary Rao")).toEqual({ title: "Dr.", firstName: "Asha", lastName: "Mary Rao" });
  });

  it("recognizes spoken titles without a period", () => {
    expect(parseFullName("doctor Asha Rao")).toEqual({ title: "Dr.", firstName: "Asha", lastName: "Rao" });
    expect(parseFullName("Professor Vikram Shah")).toEqual({ title: "Prof.", firstName: "Vikram", lastName: "Shah" });
  });

  it("handles single names and no title", () => {
    expect(parseFullName("  Asha  ")).toEqual({ title: null, firstName: "Asha", lastName: "" });
  });
});

describe("toDoctorProfile", () => {
  it("maps known fields and keeps the rest as additional fields", () => {
    const profile = toDoctorProfile(makeSubmission());

    expect(profile).toEqual({
      title: "Dr.",
      firstName: "Asha",
      lastName: "Mary Rao",
      email: "asha.rao@example.com",
      phoneNumber: "+919800000000",
      primarySpecialization: "Cardiology",
      yearsOfExperience: 12,
      medicalRegistrationNumber: "MCI-12345",
      languages: ["English", "Hindi"],
      onboardingSource: "voice",
      additionalFields: { clinic_city: "Pune" },
      rawExtractionData: {
        voiceSessionId: "session-42",
        language: "en",
        collectedAt: "2025-03-01T09:05:07.000Z",
        confidenceScores: { full_name: 0.95, years_of_experience: 0.8 },
      },
    });
  });

  it("leaves optional fields empty when they were not collected", () => {
    const profile = toDoctorProfile(makeSubmission({
      values: { full_name: "Asha Rao", primary_specialization: "Dermatology", medical_registration_number: "KMC-9" },
    }));

    expect(profile.email).toBeNull();
    expect(profile.phoneNumber).toBeNull();
    expect(profile.yearsOfExperience).toBeNull();
    expect(profile.languages).toEqual([]);
  });
});

describe("buildDirectoryName", () => {
  it("prefixes the session id with a UTC timestamp", () => {
    expect(buildDirectoryName(makeSubmission())).toBe("2025-03-01_09-05-07_session-42");
  });
});

describe("FileProfileGateway", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "profiles-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("writes profile.json and extraction.json into a per-session directory", async () => {
    const gateway = new FileProfileGateway(baseDir);

    const receipt = await gateway.saveProfile(makeSubmission());

    const dir = join(baseDir, "2025-03-01_09-05-07_session-42");
    expect(receipt).toEqual({ profileId: "2025-03-01_09-05-07_session-42", location: dir });

    const profile: unknown = JSON.parse(await readFile(join(dir, "profile.json"), "utf-8"));
    expect(profile).toMatchObject({ firstName: "Asha", onboardingSource: "voice" });

    const extraction: unknown = JSON.parse(await readFile(join(dir, "extraction.json"), "utf-8"));
    expect(extraction).toEqual({
      sessionId: "session-42",
      values: makeSubmission().values,
      confidence: { full_name: 0.95, years_of_experience: 0.8 },
    });
  });

  it("wraps filesystem failures in PersistenceError", async () => {
    // A regular file where the output directory should be makes mkdir fail.
    const blocker = join(baseDir, "not-a-dir");
    await writeFile(blocker, "x", "utf-8");
    const gateway = new FileProfileGateway(blocker);

    await expect(gateway.saveProfile(makeSubmission())).rejects.toThrow(PersistenceError);
  });
});
