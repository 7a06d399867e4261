/**
 * Table-level entry point of the builder chain
 */

import { PostgrestBuilder } from "./builder";
import type { PostgrestFetch } from "./fetch";
import { PostgrestFilterBuilder } from "./filter-builder";
import { appendQueryParam, withBody, withHeader, withMethod } from "./request-state";
import type { InsertOptions, JsonObject, RequestBody, RequestState, UpsertOptions } from "./types";

const RETURN_REPRESENTATION = "return=representation";
const MERGE_DUPLICATES = "resolution=merge-duplicates";

/**
 * Remove whitespace outside double-quoted identifiers
 * @example cleanColumns(' a, "B C" ') // 'a,"B C"'
 */
export function cleanColumns(columns: string): string {
  let quoted = false;
  let cleaned = "";
  for (const char of columns) {
    if (/\s/.test(char) && !quoted) {
      continue;
    }
    if (char === '"') {
      quoted = !quoted;
    }
    cleaned += char;
  }
  return cleaned;
}

/**
 * Picks the table operation. Not executable by itself: call select, insert,
 * upsert, update or delete first.
 */
export class PostgrestQueryBuilder {
  constructor(
    private readonly fetch: PostgrestFetch,
    private readonly state: RequestState,
  ) {}

  get url(): string {
    return this.state.url;
  }

  /**
   * Select columns to return
   * @example select('*')
   * @example select('id, name, posts(title, content)')
   * @example select('id, "Display Name"')
   */
  select(columns: string = "*"): PostgrestFilterBuilder {
    const state = appendQueryParam(
      this.fetch,
      withMethod(this.state, "GET"),
      "select",
      cleanColumns(columns),
    );
    return new PostgrestFilterBuilder(this.fetch, state);
  }

  /**
   * Insert a single row or multiple rows, returning the inserted rows
   * @example insert({ name: 'Alice' })
   * @example insert({ id: 1, name: 'Alice' }, { upsert: true, onConflict: 'id' })
   */
  insert(values: RequestBody, options: InsertOptions = {}): PostgrestBuilder {
    let state = withHeader(
      withMethod(this.state, "POST"),
      "Prefer",
      options.upsert ? `${RETURN_REPRESENTATION},${MERGE_DUPLICATES}` : RETURN_REPRESENTATION,
    );
    if (options.onConflict !== undefined) {
      state = appendQueryParam(this.fetch, state, "on_conflict", options.onConflict);
    }
    return new PostgrestBuilder(this.fetch, withBody(state, values));
  }

  /**
   * Insert rows, merging those that conflict with existing ones
   * @param values - Row(s) to upsert
   * @param options - `onConflict` columns used as the conflict target
   */
  upsert(values: RequestBody, options: UpsertOptions = {}): PostgrestBuilder {
    return this.insert(values, { ...options, upsert: true });
  }

  /**
   * Update rows; narrow the affected rows with filters
   * @example update({ status: 'archived' }).eq('id', 5)
   */
  update(values: JsonObject): PostgrestFilterBuilder {
    const state = withHeader(withMethod(this.state, "PATCH"), "Prefer", RETURN_REPRESENTATION);
    return new PostgrestFilterBuilder(this.fetch, withBody(state, values));
  }

  /**
   * Delete rows; narrow the affected rows with filters
   * @example delete().in('status', ['spam', 'abuse'])
   */
  delete(): PostgrestFilterBuilder {
    const state = withHeader(withMethod(this.state, "DELETE"), "Prefer", RETURN_REPRESENTATION);
    return new PostgrestFilterBuilder(this.fetch, withBody(state, undefined));
  }
}
