/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  BuildIndexInputSchema,
  ExplainQueryInputSchema,
  IndexStatusInputSchema,
  SearchFilesInputSchema,
} from "../../schemas.js";

describe("SearchFilesInputSchema", () => {
  it("should apply defaults", () => {
    expect(SearchFilesInputSchema.parse({ query: "report" })).toEqual({
      query: "report",
      limit: 100,
      nameOnly: false,
    });
  });

  it("should accept a drive, limit and name-only matching", () => {
    const input = SearchFilesInputSchema.parse({ query: "*.ts", drive: "home", limit: 5, nameOnly: true });
    expect(input).toEqual({ query: "*.ts", drive: "home", limit: 5, nameOnly: true });
  });

  it("should reject empty and oversized queries", () => {
    expect(() => SearchFilesInputSchema.parse({ query: "" })).toThrow(/query must be non-empty/);
    expect(() => SearchFilesInputSchema.parse({ query: "x".repeat(1001) })).toThrow(/cannot exceed 1000 characters/);
  });

  it("should enforce limit boundaries", () => {
    expect(() => SearchFilesInputSchema.parse({ query: "a", limit: 0 })).toThrow();
    expect(() => SearchFilesInputSchema.parse({ query: "a", limit: 1.5 })).toThrow();
    expect(() => SearchFilesInputSchema.parse({ query: "a", limit: 1001 })).toThrow(/limit cannot exceed 1000/);
    expect(SearchFilesInputSchema.parse({ query: "a", limit: 1000 }).limit).toBe(1000);
  });
});

describe("drive scope", () => {
  it("should accept drive ids and all", () => {
    expect(BuildIndexInputSchema.parse({ drive: "media" })).toEqual({ drive: "media" });
    expect(IndexStatusInputSchema.parse({ drive: "all" })).toEqual({ drive: "all" });
    expect(IndexStatusInputSchema.parse({})).toEqual({});
  });

  it("should reject path traversal and malformed ids", () => {
    expect(() => BuildIndexInputSchema.parse({ drive: "../etc" })).toThrow(/Invalid drive id/);
    expect(() => BuildIndexInputSchema.parse({ drive: "a b" })).toThrow(/Invalid drive id/);
    expect(() => BuildIndexInputSchema.parse({ drive: "" })).toThrow();
  });
});

describe("ExplainQueryInputSchema", () => {
  it("should accept any query up to the length limit", () => {
    expect(ExplainQueryInputSchema.parse({ query: "" })).toEqual({ query: "" });
    expect(() => ExplainQueryInputSchema.parse({})).toThrow();
  });
});
