/** Facts reported to esa when asking for an upload policy. */
export interface FileMetadata {
  /** Sniffed MIME type, e.g. `image/png` or `text/plain; charset=utf-8`. */
  type: string;
  /** Base name of the source path, without directory components. */
  name: string;
  /** Byte length of `content`. */
  size: number;
}

export interface InspectedFile {
  metadata: FileMetadata;
  content: Buffer;
}
