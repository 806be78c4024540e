import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  RESOURCE_PARTS,
  createResourcePartsMapping,
  loadResourceParts,
} from "../../src/youtube/resource-parts.js";

describe("createResourcePartsMapping", () => {
  it("keeps part order from the record", () => {
    const mapping = createResourcePartsMapping({
      video: ["snippet", "id"],
    });
    expect([...(mapping.get("video") ?? [])]).toEqual(["snippet", "id"]);
  });

  it("collapses duplicate parts", () => {
    const mapping = createResourcePartsMapping({ comment: ["id", "id"] });
    expect(mapping.get("comment")?.size).toBe(1);
  });

  it("builds the YouTube table", () => {
    const mapping = createResourcePartsMapping(RESOURCE_PARTS);
    expect(mapping.size).toBe(18);
    expect([...(mapping.get("commentThread") ?? [])]).toEqual([
      "id",
      "replies",
      "snippet",
    ]);
    expect(mapping.get("member")?.has("snippet")).toBe(true);
  });
});

describe("loadResourceParts", () => {
  it("builds a mapping from a valid table", () => {
    const mapping = loadResourceParts(JSON.parse('{"album":["id","tracks"]}'));
    expect([...mapping.keys()]).toEqual(["album"]);
    expect([...(mapping.get("album") ?? [])]).toEqual(["id", "tracks"]);
  });

  it("rejects a resource with no parts", () => {
    expect(() => loadResourceParts({ album: [] })).toThrow(ZodError);
  });

  it("rejects empty part names", () => {
    expect(() => loadResourceParts({ comment: ["id", ""] })).toThrow(ZodError);
  });

  it("rejects a non-object table", () => {
    expect(() => loadResourceParts(["id"])).toThrow(ZodError);
  });
});
