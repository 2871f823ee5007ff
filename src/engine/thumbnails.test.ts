import { describe, it, expect } from "vitest";
import { validateThumbnailBlock } from "./thumbnails";
import { ConversionError } from "./errors";
import type { Block } from "../types";

function thumbnailBlock(lines: string[], start = 0): Block {
  return { type: "thumbnail", lines, start, delimited: true };
}

describe("validateThumbnailBlock", () => {
  it("lists every complete image", () => {
    const images = validateThumbnailBlock(
      thumbnailBlock(
        [
          "; THUMBNAIL_BLOCK_START",
          "; thumbnail begin 16x16 8",
          "; abcd",
          "; efgh",
          "; thumbnail end",
          "; thumbnail_JPG begin 32x24 4",
          "; wxyz",
          "; thumbnail_JPG end",
          "; THUMBNAIL_BLOCK_END",
        ],
        10,
      ),
    );
    expect(images).toEqual([
      { format: "PNG", width: 16, height: 16, length: 8, line: 12 },
      { format: "JPG", width: 32, height: 24, length: 4, line: 16 },
    ]);
  });

  it("accepts a block without images", () => {
    expect(
      validateThumbnailBlock(
        thumbnailBlock(["; THUMBNAIL_BLOCK_START", "; THUMBNAIL_BLOCK_END"]),
      ),
    ).toEqual([]);
  });

  it("rejects a payload shorter than declared", () => {
    const block = thumbnailBlock([
      "; THUMBNAIL_BLOCK_START",
      "; thumbnail begin 16x16 12",
      "; abcd",
      "; thumbnail end",
      "; THUMBNAIL_BLOCK_END",
    ]);
    expect(() => validateThumbnailBlock(block)).toThrow(
      new ConversionError(
        "truncated-thumbnail",
        "Thumbnail declares 12 bytes but carries 4",
        2,
      ),
    );
  });

  it("rejects an image that is never closed", () => {
    const block = thumbnailBlock([
      "; THUMBNAIL_BLOCK_START",
      "; thumbnail begin 16x16 4",
      "; abcd",
      "; THUMBNAIL_BLOCK_END",
    ]);
    expect(() => validateThumbnailBlock(block)).toThrow(
      "Thumbnail is never closed (line 2)",
    );
  });
});
