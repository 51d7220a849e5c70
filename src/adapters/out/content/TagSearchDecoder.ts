import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { DecodeError } from "../../../domain/models/errors.ts";
import {
  referenceTypeSchema,
  resourceUrlSchema,
  type Section,
  type Tag,
  tagIdSchema,
  type TagSearchResult,
} from "../../../domain/models/tags.ts";

// Optional fields may be omitted or sent as null
const optionalString = z.string().nullish().transform((value) => value ?? undefined);
const optionalUrl = resourceUrlSchema.nullish().transform((value) => value ?? undefined);

const referenceSchema = z.object({
  id: z.string(),
  type: referenceTypeSchema,
});

const tagSchema = z.object({
  id: tagIdSchema,
  type: z.string(),
  sectionId: optionalString,
  sectionName: optionalString,
  webTitle: z.string(),
  webUrl: resourceUrlSchema,
  apiUrl: resourceUrlSchema,
  references: z.array(referenceSchema).nullish().transform((value) => value ?? undefined),
  bio: optionalString,
  bylineImageUrl: optionalUrl,
  bylineLargeImageUrl: optionalUrl,
});

const counter = z.number().int();

const tagSearchEnvelopeSchema = z.object({
  response: z.object({
    status: z.string(),
    total: counter,
    startIndex: counter,
    pageSize: counter,
    currentPage: counter,
    pages: counter,
    results: z.array(tagSchema),
  }),
});

type RawTag = z.infer<typeof tagSchema>;

/**
 * Combines the two section fields into one value. A tag that carries only
 * one of them is treated as having no section.
 */
export function combineSection(sectionId?: string, sectionName?: string): Section | undefined {
  if (sectionId === undefined || sectionName === undefined) {
    return undefined;
  }
  return { sectionId, name: sectionName };
}

function toTag(raw: RawTag): Tag {
  return {
    tagId: raw.id,
    tagType: raw.type,
    section: combineSection(raw.sectionId, raw.sectionName),
    webTitle: raw.webTitle,
    webUrl: raw.webUrl,
    apiUrl: raw.apiUrl,
    references: raw.references?.map((reference) => ({
      referenceType: reference.type,
      referenceId: reference.id,
    })),
    bio: raw.bio,
    bylineImageUrl: raw.bylineImageUrl,
    largeBylineImageUrl: raw.bylineLargeImageUrl,
  };
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e): DecodeError => ({
    type: "decode",
    message: "Response body is not valid JSON",
    issues: [e instanceof Error ? e.message : String(e)],
  }),
);

/**
 * Decodes a tag search response body. Any missing or mistyped required field
 * fails the whole response.
 */
export function decodeTagSearchResult(body: string): Result<TagSearchResult, DecodeError> {
  return parseJson(body).andThen((json) => {
    const parsed = tagSearchEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      return err<TagSearchResult, DecodeError>({
        type: "decode",
        message: "Response does not match the tag search schema",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }

    const { response } = parsed.data;
    return ok<TagSearchResult, DecodeError>({
      status: response.status,
      totalResults: response.total,
      startIndex: response.startIndex,
      pageSize: response.pageSize,
      currentPage: response.currentPage,
      pages: response.pages,
      results: response.results.map(toTag),
    });
  });
}
