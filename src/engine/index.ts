/**
 * Conversion engine exports
 */

export { ConversionError } from "./errors";
export type { ConversionErrorReason } from "./errors";
export { parseDocument, serializeDocument } from "./document";
export { classifyLines, isCanonicalOrder, reportBlocks } from "./classifier";
export { extractMetadata } from "./extractor";
export { injectSubroutines } from "./injector";
export { collectSections, reassemble } from "./reassembler";
export { validateThumbnailBlock } from "./thumbnails";
