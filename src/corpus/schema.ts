/**
 * Corpus entry schemas
 *
 * Scraped entries arrive with loosely typed parameter descriptions. They are
 * narrowed here, once, into the closed `ParameterLocation` / `ParameterType`
 * sets so nothing downstream has to inspect raw shapes.
 */

import { z } from "zod";
import {
  type EndpointParameter,
  type EndpointRecord,
  HTTP_METHODS,
  type HttpMethod,
  type ParameterLocation,
  type ParameterType,
} from "../types/corpus.js";

const TYPE_ALIASES: Readonly<Record<string, ParameterType>> = {
  string: "string",
  str: "string",
  text: "string",
  email: "string",
  url: "string",
  uri: "string",
  uuid: "string",
  enum: "string",
  integer: "integer",
  int: "integer",
  int32: "integer",
  int64: "integer",
  long: "integer",
  number: "number",
  float: "number",
  double: "number",
  decimal: "number",
  numeric: "number",
  boolean: "boolean",
  bool: "boolean",
  array: "array",
  list: "array",
  object: "object",
  dict: "object",
  map: "object",
  hash: "object",
  json: "object",
  file: "file",
  binary: "file",
  attachment: "file",
  date: "date",
  datetime: "datetime",
  "date-time": "datetime",
  "date time": "datetime",
  timestamp: "datetime",
};

const LOCATION_ALIASES: Readonly<Record<string, ParameterLocation>> = {
  path: "path",
  query: "query",
  querystring: "query",
  header: "header",
  headers: "header",
  body: "body",
  form: "body",
  formdata: "body",
  cookie: "cookie",
};

const BODYLESS_METHODS: ReadonlySet<HttpMethod> = new Set([
  "GET",
  "DELETE",
  "HEAD",
  "OPTIONS",
]);

/**
 * Map a scraped type label onto the closed parameter type set
 */
export function normalizeParameterType(label: string): ParameterType | undefined {
  const key = label.trim().toLowerCase();
  if (key.startsWith("array") || key.endsWith("[]")) return "array";
  return TYPE_ALIASES[key];
}

export function normalizeParameterLocation(
  label: string
): ParameterLocation | undefined {
  return LOCATION_ALIASES[label.trim().toLowerCase().replace(/[\s_-]/g, "")];
}

/**
 * Where a parameter without an explicit location most likely lives
 */
export function inferParameterLocation(
  name: string,
  method: HttpMethod,
  path: string
): ParameterLocation {
  if (path.includes(`{${name}}`) || path.includes(`:${name}`)) return "path";
  return BODYLESS_METHODS.has(method) ? "query" : "body";
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const parameterTypeSchema = z.string().transform((label, ctx) => {
  const type = normalizeParameterType(label);
  if (!type) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unrecognised parameter type "${label}"`,
    });
    return z.NEVER;
  }
  return type;
});

const parameterLocationSchema = z.string().transform((label, ctx) => {
  const location = normalizeParameterLocation(label);
  if (!location) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unrecognised parameter location "${label}"`,
    });
    return z.NEVER;
  }
  return location;
});

const rawParameterSchema = z.object({
  name: z.string().trim().min(1, "parameter name must not be empty"),
  location: parameterLocationSchema.nullish(),
  type: parameterTypeSchema.nullish(),
  param_type: parameterTypeSchema.nullish(),
  required: z.boolean().nullish(),
  description: z.string().nullish(),
  default: z
    .union([z.string(), z.number(), z.boolean()])
    .nullish()
    .transform((value) =>
      value === null || value === undefined ? undefined : String(value)
    ),
});

export const endpointEntrySchema = z
  .object({
    method: z
      .string()
      .trim()
      .transform((method) => method.toUpperCase())
      .pipe(z.enum(HTTP_METHODS)),
    path: z.string().trim().min(1, "path must not be empty"),
    name: optionalText,
    description: z.string().nullish(),
    parameters: z.array(rawParameterSchema).nullish(),
    example: optionalText,
    curl_example: optionalText,
    tags: z.array(z.string()).nullish(),
    category: optionalText,
  })
  .transform((raw): EndpointRecord => {
    const parameters = (raw.parameters ?? []).map(
      (param): EndpointParameter => ({
        name: param.name,
        location:
          param.location ??
          inferParameterLocation(param.name, raw.method, raw.path),
        type: param.type ?? param.param_type ?? "string",
        required: param.required ?? false,
        description: param.description?.trim() ?? "",
        ...(param.default !== undefined && { default: param.default }),
      })
    );
    const example = raw.example ?? raw.curl_example;
    const tags = (raw.tags ?? [])
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);

    return {
      method: raw.method,
      path: raw.path,
      ...(raw.name !== undefined && { name: raw.name }),
      description: raw.description?.trim() ?? "",
      parameters,
      ...(example !== undefined && { example }),
      tags,
      ...(raw.category !== undefined && { category: raw.category }),
    };
  });

/**
 * Wrapper written by the documentation scraper
 */
export const scrapedDocumentationSchema = z.object({
  base_url: z.string().optional(),
  endpoints: z.array(z.unknown()),
  scraped_at: z.string().optional(),
});

export const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "entry"}: ${issue.message}`)
    .join("; ");
