export interface SegmentRecord {
  /** 0-based position inside the file. */
  index: number;
  title: string;
  body: string;
}

export interface StoredSegment extends SegmentRecord {
  id: number;
  fileId: string;
  vector: number[];
}
