import { EmptyInputError } from "@vectorbridge/errors";
import type { SegmentRecord } from "@vectorbridge/types";
import {
  cleanText,
  splitSentences,
  splitLongUnit,
  isInformative,
  type InformativeFilter,
} from "./clean.js";

export interface SegmenterOptions {
  /** Upper bound on a segment's length in characters. */
  maxCharacters: number;
  /** Upper bound on sentence-like units per segment. */
  maxSentences: number;
  /** Drop short or mostly non-alphabetic units before packing. Off by default. */
  informative?: InformativeFilter;
}

export const DEFAULT_SEGMENTER_OPTIONS: SegmenterOptions = {
  maxCharacters: 1000,
  maxSentences: 3,
};

export interface ISegmenter {
  segment(raw: string): SegmentSequence;
}

/**
 * Ordered, non-empty segments of one document.
 *
 * Cleanup and sentence splitting happen once at construction; packing runs
 * again on every iteration and always yields the same sequence.
 */
export class SegmentSequence implements Iterable<string> {
  private readonly units: readonly string[];
  private readonly options: SegmenterOptions;

  constructor(units: readonly string[], options: SegmenterOptions) {
    this.units = units;
    this.options = options;
  }

  get unitCount(): number {
    return this.units.length;
  }

  *[Symbol.iterator](): Iterator<string> {
    const { maxCharacters, maxSentences } = this.options;
    let buffer: string[] = [];
    let length = 0;

    for (const unit of this.units) {
      const projected = buffer.length === 0 ? unit.length : length + 1 + unit.length;
      if (buffer.length > 0 && (buffer.length >= maxSentences || projected > maxCharacters)) {
        yield buffer.join(" ");
        buffer = [];
        length = 0;
      }
      length = buffer.length === 0 ? unit.length : length + 1 + unit.length;
      buffer.push(unit);
    }

    if (buffer.length > 0) {
      yield buffer.join(" ");
    }
  }

  toArray(): string[] {
    return [...this];
  }

  /**
   * Attach 0-based positions and `fileName|fileId|index` titles.
   */
  toRecords(fileName: string, fileId: string): SegmentRecord[] {
    return this.toArray().map((body, index) => ({
      index,
      title: segmentTitle(fileName, fileId, index),
      body,
    }));
  }
}

export function segmentTitle(fileName: string, fileId: string, index: number): string {
  return `${fileName}|${fileId}|${String(index)}`;
}

export class Segmenter implements ISegmenter {
  private readonly options: SegmenterOptions;

  constructor(options: Partial<SegmenterOptions> = {}) {
    this.options = { ...DEFAULT_SEGMENTER_OPTIONS, ...options };
    if (this.options.maxCharacters < 1 || this.options.maxSentences < 1) {
      throw new RangeError("Segment limits must be positive");
    }
  }

  /**
   * @throws EmptyInputError when nothing usable remains after cleanup.
   */
  segment(raw: string): SegmentSequence {
    const { maxCharacters, informative } = this.options;

    let units = splitSentences(cleanText(raw));
    if (informative) {
      units = units.filter((u) => isInformative(u, informative));
    }
    units = units.flatMap((u) => splitLongUnit(u, maxCharacters));

    if (units.length === 0) {
      throw new EmptyInputError();
    }
    return new SegmentSequence(units, this.options);
  }
}

export function segment(raw: string, options?: Partial<SegmenterOptions>): SegmentSequence {
  return new Segmenter(options).segment(raw);
}
