export {
  Segmenter,
  SegmentSequence,
  segment,
  segmentTitle,
  DEFAULT_SEGMENTER_OPTIONS,
} from "./segmenter.js";
export type { ISegmenter, SegmenterOptions } from "./segmenter.js";
export { cleanText, splitSentences, splitLongUnit, isInformative } from "./clean.js";
export type { InformativeFilter } from "./clean.js";
