/**
 * Search operation fields, including search result entries and references
 */

import type { FieldAccessor } from "../accessor.js";
import { FieldFormatError } from "../errors.js";
import { FIELDS } from "../fields.js";
import type { AuthorizedResultFields, IndexAccessResultFields } from "./result.js";
import { decodeAuthorizedResultFields, decodeIndexAccessResultFields } from "./result.js";

export interface SearchScope {
  readonly value: number;
  readonly name: string;
}

const SEARCH_SCOPES: readonly SearchScope[] = Object.freeze([
  Object.freeze({ value: 0, name: "baseObject" }),
  Object.freeze({ value: 1, name: "singleLevel" }),
  Object.freeze({ value: 2, name: "wholeSubtree" }),
  Object.freeze({ value: 3, name: "subordinateSubtree" }),
]);

/** Short names the server also logs for each scope */
const SCOPE_ALIASES: Record<string, number> = {
  base: 0,
  one: 1,
  onelevel: 1,
  sub: 2,
  subtree: 2,
  subordinates: 3,
  subordinatesubtree: 3,
};

export interface SearchRequestFields {
  readonly baseDN: string | null;
  readonly scope: SearchScope | null;
  readonly filter: string | null;
  readonly derefPolicy: string | null;
  readonly sizeLimit: number | null;
  readonly timeLimitSeconds: number | null;
  readonly typesOnly: boolean | null;
  /** Attributes requested for return, in request order */
  readonly requestedAttributes: readonly string[];
}

export interface SearchResultFields extends AuthorizedResultFields, IndexAccessResultFields {
  readonly entriesReturned: number | null;
  /** True when the search could not be fully processed through indexes */
  readonly unindexed: boolean | null;
}

/** A search result entry returned to the client */
export interface SearchEntryFields {
  readonly dn: string | null;
  readonly attributeNames: readonly string[];
  readonly responseControlOIDs: ReadonlySet<string>;
}

/** A search result reference returned to the client */
export interface SearchReferenceFields {
  readonly referralURLs: readonly string[];
  readonly responseControlOIDs: ReadonlySet<string>;
}

function scopeByName(name: string): SearchScope | null {
  const key = name.replace(/[\s_-]/g, "").toLowerCase();
  const known = SEARCH_SCOPES.find((scope) => scope.name.toLowerCase() === key);
  if (known) return known;
  const alias = SCOPE_ALIASES[key];
  return alias === undefined ? null : SEARCH_SCOPES[alias];
}

function decodeScope(accessor: FieldAccessor): SearchScope | null {
  const value = accessor.getInteger(FIELDS.scope);
  const name = accessor.getString(FIELDS.scopeName);

  if (value !== null) {
    const known = SEARCH_SCOPES.find((scope) => scope.value === value);
    if (known) return known;
    return Object.freeze({ value, name: name ?? `unknown scope ${value}` });
  }
  if (name === null) return null;

  const byName = scopeByName(name);
  if (!byName) {
    throw new FieldFormatError(accessor.qualify(FIELDS.scopeName.name), "search scope", `"${name}" is not recognized`);
  }
  return byName;
}

export function decodeSearchRequestFields(accessor: FieldAccessor): SearchRequestFields {
  return {
    baseDN: accessor.getString(FIELDS.baseDN),
    scope: decodeScope(accessor),
    filter: accessor.getString(FIELDS.filter),
    derefPolicy: accessor.getString(FIELDS.dereferenceAliases),
    sizeLimit: accessor.getInteger(FIELDS.requestedSizeLimit),
    timeLimitSeconds: accessor.getInteger(FIELDS.requestedTimeLimitSeconds),
    typesOnly: accessor.getBoolean(FIELDS.typesOnly),
    requestedAttributes: accessor.getStringList(FIELDS.requestedAttributes),
  };
}

export function decodeSearchResultFields(accessor: FieldAccessor): SearchResultFields {
  const indexed = accessor.getBoolean(FIELDS.isIndexed);
  return {
    ...decodeAuthorizedResultFields(accessor),
    ...decodeIndexAccessResultFields(accessor),
    entriesReturned: accessor.getLong(FIELDS.entriesReturned),
    unindexed: indexed === null ? null : !indexed,
  };
}

export function decodeSearchEntryFields(accessor: FieldAccessor): SearchEntryFields {
  return {
    dn: accessor.getString(FIELDS.dn),
    attributeNames: accessor.getStringList(FIELDS.attributes),
    responseControlOIDs: accessor.getStringSet(FIELDS.responseControlOIDs),
  };
}

export function decodeSearchReferenceFields(accessor: FieldAccessor): SearchReferenceFields {
  return {
    referralURLs: accessor.getStringList(FIELDS.referralURLs),
    responseControlOIDs: accessor.getStringSet(FIELDS.responseControlOIDs),
  };
}
