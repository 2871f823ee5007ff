/**
 * Thumbnail payload check
 * Each "; thumbnail begin WxH LEN" image must be closed inside its block and
 * carry exactly LEN base64 characters
 */

import { ConversionError } from "./errors";
import type { Block } from "../types";

const RX_IMAGE_BEGIN =
  /^\s*;\s*(?<tag>thumbnail(?:_[a-z]+)?)\s+begin\s+(?<width>\d+)x(?<height>\d+)\s+(?<length>\d+)\s*$/i;
const RX_IMAGE_END = /^\s*;\s*(?<tag>thumbnail(?:_[a-z]+)?)\s+end\s*$/i;

export interface ThumbnailImage {
  format: string; // "PNG", "JPG", "QOI"
  width: number;
  height: number;
  length: number; // Declared base64 length
  line: number; // 1-based line of the begin comment
}

/**
 * Validate every image in a thumbnail block
 * Throws ConversionError("truncated-thumbnail") on the first broken image
 */
export function validateThumbnailBlock(block: Block): ThumbnailImage[] {
  const images: ThumbnailImage[] = [];
  let open: { image: ThumbnailImage; tag: string; received: number } | null =
    null;

  for (const [offset, line] of block.lines.entries()) {
    const lineNumber = block.start + offset + 1;

    const begin = RX_IMAGE_BEGIN.exec(line)?.groups;
    if (begin) {
      if (open !== null) {
        throw new ConversionError(
          "truncated-thumbnail",
          `Thumbnail starting at line ${open.image.line} is never closed`,
          lineNumber,
        );
      }
      const tag = begin.tag.toLowerCase();
      open = {
        tag,
        received: 0,
        image: {
          format:
            tag === "thumbnail"
              ? "PNG"
              : tag.slice("thumbnail_".length).toUpperCase(),
          width: parseInt(begin.width, 10),
          height: parseInt(begin.height, 10),
          length: parseInt(begin.length, 10),
          line: lineNumber,
        },
      };
      continue;
    }

    if (open === null) continue;

    const end = RX_IMAGE_END.exec(line)?.groups;
    if (end && end.tag.toLowerCase() === open.tag) {
      if (open.received !== open.image.length) {
        throw new ConversionError(
          "truncated-thumbnail",
          `Thumbnail declares ${open.image.length} bytes but carries ${open.received}`,
          open.image.line,
        );
      }
      images.push(open.image);
      open = null;
      continue;
    }

    open.received += line.trim().replace(/^;+\s*/, "").length;
  }

  if (open !== null) {
    throw new ConversionError(
      "truncated-thumbnail",
      "Thumbnail is never closed",
      open.image.line,
    );
  }

  return images;
}
