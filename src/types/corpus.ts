/**
 * Corpus Type Definitions
 *
 * Endpoint records as held in memory after validation. Everything here is
 * read-only: a corpus is replaced wholesale on reload, never edited.
 */

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "PATCH",
  "HEAD",
  "OPTIONS",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const PARAMETER_LOCATIONS = [
  "path",
  "query",
  "header",
  "body",
  "cookie",
] as const;

export type ParameterLocation = (typeof PARAMETER_LOCATIONS)[number];

export const PARAMETER_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "object",
  "file",
  "date",
  "datetime",
] as const;

export type ParameterType = (typeof PARAMETER_TYPES)[number];

export interface EndpointParameter {
  readonly name: string;
  readonly location: ParameterLocation;
  readonly type: ParameterType;
  readonly required: boolean;
  readonly description: string;
  readonly default?: string;
}

export interface EndpointRecord {
  readonly method: HttpMethod;
  readonly path: string;
  readonly name?: string;
  readonly description: string;
  readonly parameters: readonly EndpointParameter[];
  readonly example?: string;
  readonly tags: readonly string[];
  readonly category?: string;
}

export interface SkippedEntry {
  readonly index: number;
  readonly reason: string;
}

export interface CorpusMetadata {
  readonly source: string;
  readonly loadedAt: string;
  readonly sourceTimestamp?: string;
  readonly baseUrl?: string;
  readonly count: number;
  readonly skipped: number;
  readonly skippedEntries: readonly SkippedEntry[];
}

export interface Corpus {
  readonly records: readonly EndpointRecord[];
  readonly metadata: CorpusMetadata;
}

/**
 * Short human label for an endpoint, e.g. `POST /tickets`
 */
export function endpointLabel(record: EndpointRecord): string {
  return `${record.method} ${record.path}`;
}
