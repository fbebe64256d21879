import { describe, expect, it } from "vitest";
import { buildOpenApiDocument } from "../openapi.js";

describe("buildOpenApiDocument", () => {
  const doc = buildOpenApiDocument();

  it("describes every media route", () => {
    expect(Object.keys(doc.paths)).toEqual(["/media", "/media/search", "/media/{id}"]);
    expect(Object.keys(doc.paths["/media"])).toEqual(["get", "post"]);
    expect(Object.keys(doc.paths["/media/{id}"])).toEqual(["get", "delete"]);
  });

  it("derives the create body from the validation schema", () => {
    const body = doc.paths["/media"].post.requestBody?.content["application/json"];

    expect(body?.schema).toMatchObject({
      type: "object",
      required: ["title", "artist", "location", "format"],
      properties: {
        title: { type: "string", minLength: 1, description: "Media title" },
        format: { type: "string", enum: ["CD", "Vinyl", "Tape"] }
      }
    });
    expect(body?.example).toEqual({
      title: "Dark Side of the Moon",
      artist: "Pink Floyd",
      location: "Shelf Rock",
      format: "Vinyl"
    });
  });

  it("documents the error responses of delete", () => {
    expect(Object.keys(doc.paths["/media/{id}"].delete.responses)).toEqual(["200", "400", "404", "500"]);
    expect(doc.paths["/media/{id}"].delete.parameters).toMatchObject([
      { name: "id", in: "path", required: true, schema: { type: "string", pattern: "^[1-9]\\d*$" } }
    ]);
  });

  it("requires the search query parameter", () => {
    expect(doc.paths["/media/search"].get.parameters).toMatchObject([
      { name: "query", in: "query", required: true, schema: { type: "string", minLength: 1 } }
    ]);
  });
});
