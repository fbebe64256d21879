import { describe, expect, it } from "vitest";
import { z } from "zod";
import { HttpError, ValidationError, parseInput, zodErrorDetails } from "../errors.js";
import { createMediaSchema, mediaIdParamsSchema } from "../schemas.js";

describe("createMediaSchema", () => {
  it("trims text fields and strips unknown keys", () => {
    const parsed = createMediaSchema.parse({
      id: 99,
      title: "  OK Computer ",
      artist: "Radiohead",
      location: "Shelf B2",
      format: "CD"
    });

    expect(parsed).toEqual({ title: "OK Computer", artist: "Radiohead", location: "Shelf B2", format: "CD" });
  });

  it("reports every violation keyed by field", () => {
    const result = createMediaSchema.safeParse({ title: "   ", location: 7, format: "Cassette" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({
      title: ["title must not be empty"],
      artist: ["artist is required"],
      location: ["location must be a string"],
      format: ["Invalid format. Use one of: CD, Vinyl, Tape"]
    });
  });

  it("asks for a missing format", () => {
    const result = createMediaSchema.safeParse({ title: "A", artist: "B", location: "C" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({ format: ["format is required"] });
  });
});

describe("mediaIdParamsSchema", () => {
  it("converts decimal path segments to numbers", () => {
    expect(mediaIdParamsSchema.parse({ id: "12" })).toEqual({ id: 12 });
  });

  it.each(["abc", "0", "-3", "1.5", "0x10", "1e1", "007"])("rejects %s", (id) => {
    expect(mediaIdParamsSchema.safeParse({ id }).success).toBe(false);
  });
});

describe("parseInput", () => {
  const schema = z.object({ code: z.string().min(3, "too short").regex(/^x/, "must start with x") });

  it("returns parsed data on success", () => {
    expect(parseInput(schema, { code: "xyz" }, "body")).toEqual({ code: "xyz" });
  });

  it("throws a 400 ValidationError with grouped messages", () => {
    let caught: unknown;
    try {
      parseInput(schema, { code: "ab" }, "body");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toBeInstanceOf(HttpError);
    expect(caught).toMatchObject({
      status: 400,
      message: "Validation failed",
      details: { code: ["too short", "must start with x"] }
    });
  });

  it("keys root-level issues by the input source", () => {
    const result = schema.safeParse("nope");

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error, "query")).toEqual({ query: ["Expected object, received string"] });
  });
});
