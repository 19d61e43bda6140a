/** Media type string (e.g. "text/plain", "application/json"). */
export type MediaType = string;

/** File content referenced by URI. */
export interface FileWithUri {
  uri: string;
  name?: string;
  mediaType?: MediaType;
}

/** File content inlined as base64. */
export interface FileWithBytes {
  bytes: string;
  name?: string;
  mediaType?: MediaType;
}

/** Part containing plain text. */
export interface TextPart {
  text: string;
  metadata?: Record<string, unknown>;
}

/** Part carrying a file, by reference or inline. */
export interface FilePart {
  file: FileWithUri | FileWithBytes;
  metadata?: Record<string, unknown>;
}

/** Part containing structured JSON data. */
export interface DataPart {
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/**
 * Content unit within messages and artifacts. Exactly one of text, file, or data;
 * the populated field name is the discriminator.
 */
export type Part = TextPart | FilePart | DataPart;
