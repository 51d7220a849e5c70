import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { QueryError } from "./errors.ts";

export const tagIdSchema = z.string().brand<"TagId">();
export const resourceUrlSchema = z.string().brand<"ResourceUrl">();
export const referenceTypeSchema = z.string().brand<"ReferenceType">();

export type TagId = z.infer<typeof tagIdSchema>;
export type ResourceUrl = z.infer<typeof resourceUrlSchema>;
export type ReferenceType = z.infer<typeof referenceTypeSchema>;

export function toTagId(value: string): TagId {
  return tagIdSchema.parse(value);
}

export function toResourceUrl(value: string): ResourceUrl {
  return resourceUrlSchema.parse(value);
}

export function toReferenceType(value: string): ReferenceType {
  return referenceTypeSchema.parse(value);
}

/**
 * Parameters for a tag search. Only the free-text term is supported for now.
 */
export interface TagSearchQuery {
  readonly q: string;
}

/**
 * Typed pointer from a tag to a resource in another category
 */
export interface Reference {
  readonly referenceType: ReferenceType;
  readonly referenceId: string;
}

/**
 * Content section a tag belongs to. Both fields are present or the section is absent.
 */
export interface Section {
  readonly sectionId: string;
  readonly name: string;
}

export interface Tag {
  readonly tagId: TagId;
  readonly tagType: string;
  readonly section?: Section;
  readonly webTitle: string;
  readonly webUrl: ResourceUrl;
  readonly apiUrl: ResourceUrl;
  readonly references?: ReadonlyArray<Reference>;
  readonly bio?: string;
  readonly bylineImageUrl?: ResourceUrl;
  readonly largeBylineImageUrl?: ResourceUrl;
}

/**
 * One page of tag search results
 */
export interface TagSearchResult {
  readonly status: string;
  readonly totalResults: number;
  readonly startIndex: number;
  readonly pageSize: number;
  readonly currentPage: number;
  readonly pages: number;
  readonly results: ReadonlyArray<Tag>;
}

const searchTermSchema = z.string().refine((term) => term.trim().length > 0, {
  message: "Search term must not be empty",
});

export function createTagSearchQuery(term: string): Result<TagSearchQuery, QueryError> {
  const parsed = searchTermSchema.safeParse(term);
  if (!parsed.success) {
    return err({
      type: "invalidQuery",
      message: "Invalid tag search query",
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  return ok({ q: parsed.data });
}
