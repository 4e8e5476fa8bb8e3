import { describe, it, expect } from "vitest";
import { OPEN_TO_OPPORTUNITIES } from "@shared/types/profiling";
import {
  createEntityExtractor,
  extractCurrentRole,
  extractExperienceLevel,
  extractTargetCompany,
  extractTargetRole,
} from "../profiling/entity-extractor";
import { getDefaultKeywordTables, parseKeywordTables } from "../profiling/keyword-tables";

const tables = getDefaultKeywordTables();

describe("extractCurrentRole", () => {
  it("recognises students before any role table", () => {
    expect(extractCurrentRole("I'm a student at BITS", tables)).toBe("Student");
    expect(extractCurrentRole("Still studying, final semester", tables)).toBe("Student");
  });

  it("maps role synonyms to a canonical label", () => {
    expect(extractCurrentRole("I work as a developer", tables)).toBe("Software Engineer");
    expect(extractCurrentRole("I'm a product manager at a startup", tables)).toBe("Product Manager");
    expect(extractCurrentRole("I do sales", tables)).toBe("Sales");
  });

  it("matches patterns as raw substrings", () => {
    // "development" contains "pm"
    expect(extractCurrentRole("I lead business development", tables)).toBe("Product Manager");
  });

  it("falls back to the trimmed answer", () => {
    expect(extractCurrentRole("  Chef  ", tables)).toBe("Chef");
  });
});

describe("extractExperienceLevel", () => {
  it("keeps academic answers verbatim", () => {
    expect(extractExperienceLevel(" third year at BITS Pilani ", tables)).toBe(
      "third year at BITS Pilani",
    );
    expect(extractExperienceLevel("Final semester at IIT Delhi", tables)).toBe(
      "Final semester at IIT Delhi",
    );
  });

  it("extracts years and months", () => {
    expect(extractExperienceLevel("I have 3 years of experience", tables)).toBe("3 year");
    expect(extractExperienceLevel("about 18 months", tables)).toBe("18 month");
  });

  it("maps fresher phrases to zero years", () => {
    expect(extractExperienceLevel("I'm a fresher", tables)).toBe("0 years");
    expect(extractExperienceLevel("no experience yet", tables)).toBe("0 years");
  });

  it("falls back to the trimmed answer", () => {
    expect(extractExperienceLevel("quite a while ", tables)).toBe("quite a while");
  });
});

describe("extractTargetRole", () => {
  it("maps target roles in table order", () => {
    expect(extractTargetRole("I want to be a backend developer", tables)).toBe("Software Engineer");
    expect(extractTargetRole("product designer", tables)).toBe("Product Manager");
  });

  it("lets the earlier entry win when two entries share a pattern", () => {
    expect(extractTargetRole("data scientist", tables)).toBe("Data Analyst");
  });

  it("falls back to the trimmed answer", () => {
    expect(extractTargetRole(" astronaut ", tables)).toBe("astronaut");
  });
});

describe("extractTargetCompany", () => {
  it("recognises known companies", () => {
    expect(extractTargetCompany("Google", tables)).toBe("Google");
    expect(extractTargetCompany("hoping for facebook", tables)).toBe("Meta");
  });

  it("picks the first company in table order", () => {
    expect(extractTargetCompany("maybe Swiggy or Flipkart", tables)).toBe("Flipkart");
  });

  it("treats indifference as open to opportunities", () => {
    expect(extractTargetCompany("  No Specific Company ", tables)).toBe(OPEN_TO_OPPORTUNITIES);
    expect(extractTargetCompany("Not sure yet", tables)).toBe(OPEN_TO_OPPORTUNITIES);
  });

  it("matches company names inside other words", () => {
    expect(extractTargetCompany("Coca Cola", tables)).toBe("Ola");
  });

  it("falls back to the trimmed answer", () => {
    expect(extractTargetCompany(" Stripe ", tables)).toBe("Stripe");
  });
});

describe("createEntityExtractor", () => {
  it("binds the extractors to the given tables", () => {
    const custom = parseKeywordTables({
      studentKeywords: ["pupil"],
      currentRoles: [{ label: "Pilot", patterns: ["PILOT"] }],
      academicYears: [],
      institutions: [],
      fresherPhrases: [],
      targetRoles: [{ label: "Captain", patterns: ["captain"] }],
      companyIndifference: ["whatever"],
      companies: [{ label: "Acme Air", patterns: ["acme"] }],
    });
    const extractor = createEntityExtractor(custom);

    expect(extractor.extractCurrentRole("I'm a pupil")).toBe("Student");
    expect(extractor.extractCurrentRole("airline pilot")).toBe("Pilot");
    expect(extractor.extractTargetRole("Captain, eventually")).toBe("Captain");
    expect(extractor.extractTargetCompany("acme please")).toBe("Acme Air");
    expect(extractor.extractTargetCompany("whatever works")).toBe(OPEN_TO_OPPORTUNITIES);
  });

  it("rejects malformed tables", () => {
    expect(() => parseKeywordTables({ studentKeywords: "student" })).toThrow(
      /Invalid profiling keyword tables/,
    );
  });
});
