import { describe, expect, it } from "vitest";
import {
  isValidTaskId,
  parseAnalyzeRequest,
  parseHistoryLimit,
  parseRegisterUserRequest,
  resolveAnalysisType,
  resolveQuery,
  resolveUserId,
  sanitizeText,
  validateUpload,
  type UploadedFile,
} from "../../api/validation";
import { ValidationError } from "../../trigger/errors";

function pdf(name = "report.pdf", content = "%PDF-1.4"): UploadedFile {
  const buffer = Buffer.from(content);
  return { originalname: name, size: buffer.length, buffer };
}

describe("sanitizeText", () => {
  it("strips control characters and the denylist, then trims", () => {
    expect(sanitizeText("  <b>What's\u0000 my \"iron\"?</b>\n", 100)).toBe(
      "bWhats my iron?/b"
    );
  });

  it("keeps tabs and newlines inside the text", () => {
    expect(sanitizeText("line one\n\tline two", 100)).toBe("line one\n\tline two");
  });

  it("truncates to the maximum length", () => {
    expect(sanitizeText("abcdef", 3)).toBe("abc");
  });
});

describe("resolveAnalysisType", () => {
  it("defaults a missing or blank type to summary", () => {
    expect(resolveAnalysisType(undefined)).toBe("summary");
    expect(resolveAnalysisType("   ")).toBe("summary");
  });

  it("accepts known types case-insensitively", () => {
    expect(resolveAnalysisType(" Nutrition ")).toBe("nutrition");
  });

  it("rejects unknown types", () => {
    expect(() => resolveAnalysisType("diagnosis")).toThrow(
      'Unsupported analysis_type "diagnosis". Expected one of: summary, nutrition, exercise, verification'
    );
  });
});

describe("resolveQuery", () => {
  it("falls back to the profile default when blank", () => {
    expect(resolveQuery("  ", "exercise")).toBe(
      "Suggest an exercise plan based on my blood test"
    );
    expect(resolveQuery("<>", "verification")).toBe(
      "Is this document a blood test report?"
    );
  });

  it("keeps a supplied query after sanitizing", () => {
    expect(resolveQuery("Is my cholesterol ok?", "summary")).toBe(
      "Is my cholesterol ok?"
    );
  });
});

describe("resolveUserId", () => {
  it("generates an anonymous id when none is given", () => {
    expect(resolveUserId(undefined)).toMatch(/^anon_[0-9a-f-]{36}$/);
    expect(resolveUserId("")).not.toBe(resolveUserId(""));
  });

  it("rejects ids with characters outside the allowed set", () => {
    expect(() => resolveUserId("user name")).toThrow(ValidationError);
  });

  it("accepts ids made of letters, digits and . _ @ -", () => {
    expect(resolveUserId("jane.doe@clinic-1")).toBe("jane.doe@clinic-1");
  });
});

describe("isValidTaskId", () => {
  it("accepts uuids and run ids", () => {
    expect(isValidTaskId("6f1c2a0e-5b1d-4c2b-9a55-0b9e1b8f3c11")).toBe(true);
    expect(isValidTaskId("run_cm4x9abc")).toBe(true);
  });

  it("rejects empty or malformed ids", () => {
    expect(isValidTaskId("")).toBe(false);
    expect(isValidTaskId("../etc/passwd")).toBe(false);
    expect(isValidTaskId("a".repeat(129))).toBe(false);
  });
});

describe("validateUpload", () => {
  it("requires a file", () => {
    expect(() => validateUpload(undefined)).toThrow(
      'A file upload is required (field "file")'
    );
  });

  it("rejects files that are not PDFs", () => {
    expect(() => validateUpload(pdf("notes.txt"))).toThrow(
      'Unsupported file type ".txt". Allowed: .pdf'
    );
  });

  it("rejects empty files", () => {
    expect(() => validateUpload(pdf("report.pdf", ""))).toThrow(
      "Uploaded file is empty"
    );
  });

  it("keeps only the base name of the upload", () => {
    expect(validateUpload(pdf("../../secret/Report.PDF")).fileName).toBe(
      "Report.PDF"
    );
  });
});

describe("parseAnalyzeRequest", () => {
  it("fills in defaults for an upload without form fields", () => {
    const input = parseAnalyzeRequest({}, pdf());

    expect(input.fileName).toBe("report.pdf");
    expect(input.analysisType).toBe("summary");
    expect(input.query).toBe("Summarise my blood test report");
    expect(input.userId.startsWith("anon_")).toBe(true);
  });

  it("rejects form fields of the wrong shape", () => {
    expect(() => parseAnalyzeRequest({ query: ["a", "b"] }, pdf())).toThrow(
      "Invalid form fields: query"
    );
  });
});

describe("parseRegisterUserRequest", () => {
  it("lower-cases the email", () => {
    expect(
      parseRegisterUserRequest({ user_id: "user-1", email: "User1@Example.com" })
    ).toEqual({ userId: "user-1", email: "user1@example.com" });
  });

  it("rejects an invalid email", () => {
    expect(() =>
      parseRegisterUserRequest({ user_id: "user-1", email: "not-an-email" })
    ).toThrow("Invalid user payload: email");
  });
});

describe("parseHistoryLimit", () => {
  it("reads a positive integer", () => {
    expect(parseHistoryLimit(undefined)).toBeUndefined();
    expect(parseHistoryLimit("20")).toBe(20);
  });

  it("rejects anything else", () => {
    expect(() => parseHistoryLimit("0")).toThrow("limit must be a positive integer");
    expect(() => parseHistoryLimit("2.5")).toThrow(ValidationError);
  });
});
