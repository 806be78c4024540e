import { describe, it, expect } from "vitest";
import {
  ErrorCode,
  ParamsValidator,
  createResourcePartsMapping,
  enfParts,
  isYouTubeParamsError,
} from "../src/index.js";

describe("package entry", () => {
  it("builds a validator from an injected table", () => {
    const validator = new ParamsValidator(
      createResourcePartsMapping({ caption: ["id", "snippet"] }),
    );
    expect(validator.enfParts("caption", undefined)).toBe("id,snippet");
  });

  it("throws errors the guard recognizes", () => {
    try {
      enfParts("caption", "id,statistics");
      expect.unreachable();
    } catch (error) {
      expect(isYouTubeParamsError(error)).toBe(true);
      if (isYouTubeParamsError(error)) {
        expect(error.code).toBe(ErrorCode.InvalidParams);
        expect(error.message).toBe(
          "Parts statistics for resource caption not support",
        );
      }
    }
  });
});
