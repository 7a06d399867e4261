/**
 * Filter stage: column filters and result transforms appended to the query string
 */

import { PostgrestBuilder } from "./builder";
import { appendQueryParam, withHeader } from "./request-state";
import type {
  FilterOperator,
  FilterValue,
  OrderOptions,
  RequestState,
  TextSearchOptions,
} from "./types";
import { wrapSync } from "./utils/error-handling";

const TEXT_SEARCH_OPERATORS = {
  plain: "plfts",
  phrase: "phfts",
  websearch: "wfts",
} as const satisfies Record<string, FilterOperator>;

/**
 * Format a value for the query string
 */
function formatValue(value: FilterValue): string {
  return value === null ? "null" : String(value);
}

/**
 * Serialize the operand of `cs`/`cd`: strings verbatim, string lists comma-joined,
 * anything else as JSON. Returns undefined when the value has no JSON form.
 */
function formatContainment(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return value.join(",");
  }
  const json = wrapSync((): string | undefined => JSON.stringify(value));
  return json.data ?? undefined;
}

export class PostgrestFilterBuilder extends PostgrestBuilder {
  private next(state: RequestState): PostgrestFilterBuilder {
    return new PostgrestFilterBuilder(this.fetch, state);
  }

  private append(name: string, value: string): PostgrestFilterBuilder {
    return this.next(appendQueryParam(this.fetch, this.state, name, value));
  }

  /**
   * Negate a filter condition
   * @example not('status', 'eq', 'deleted')
   * @example not('completed_at', 'is', null)
   */
  not(column: string, operator: FilterOperator, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `not.${operator}.${formatValue(value)}`);
  }

  /**
   * Match any of the given filters, written in PostgREST syntax
   * @example or('status.eq.active,status.eq.pending')
   */
  or(filters: string): PostgrestFilterBuilder {
    return this.append("or", `(${filters})`);
  }

  /**
   * Apply any operator, including ones without a dedicated method
   * @example filter('name', 'in', '("Han","Yoda")')
   */
  filter(column: string, operator: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `${operator}.${formatValue(value)}`);
  }

  /**
   * Match multiple columns with exact values, one `eq` per entry
   * @example match({ id: 1, status: 'active' })
   */
  match(conditions: Record<string, FilterValue>): PostgrestFilterBuilder {
    return Object.entries(conditions).reduce<PostgrestFilterBuilder>(
      (builder, [column, value]) => builder.eq(column, value),
      this.next(this.state),
    );
  }

  eq(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `eq.${formatValue(value)}`);
  }

  neq(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `neq.${formatValue(value)}`);
  }

  gt(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `gt.${formatValue(value)}`);
  }

  gte(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `gte.${formatValue(value)}`);
  }

  lt(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `lt.${formatValue(value)}`);
  }

  lte(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `lte.${formatValue(value)}`);
  }

  /**
   * Pattern matching (case-sensitive), `*` or `%` as wildcard
   */
  like(column: string, pattern: string): PostgrestFilterBuilder {
    return this.append(column, `like.${pattern}`);
  }

  /**
   * Pattern matching (case-insensitive)
   */
  ilike(column: string, pattern: string): PostgrestFilterBuilder {
    return this.append(column, `ilike.${pattern}`);
  }

  /**
   * Check for null, true, false or unknown
   */
  is(column: string, value: FilterValue): PostgrestFilterBuilder {
    return this.append(column, `is.${formatValue(value)}`);
  }

  in(column: string, values: readonly string[]): PostgrestFilterBuilder {
    return this.append(column, `in.${values.join(",")}`);
  }

  /**
   * Column contains every element of the value (arrays, ranges, JSONB)
   * @example contains('tags', ['news', 'sports'])
   * @example contains('metadata', { plan: 'pro' })
   */
  contains(column: string, value: unknown): PostgrestFilterBuilder {
    const operand = formatContainment(value);
    return operand === undefined ? this.next(this.state) : this.append(column, `cs.${operand}`);
  }

  /**
   * Every element of the column is contained in the value
   * @example containedBy('tags', ['news', 'sports', 'weather'])
   */
  containedBy(column: string, value: unknown): PostgrestFilterBuilder {
    const operand = formatContainment(value);
    return operand === undefined ? this.next(this.state) : this.append(column, `cd.${operand}`);
  }

  /**
   * Column and value have an element in common
   * @example overlaps('tags', '{news,sports}')
   */
  overlaps(column: string, value: string | readonly string[]): PostgrestFilterBuilder {
    const operand = typeof value === "string" ? value : `{${value.join(",")}}`;
    return this.append(column, `ov.${operand}`);
  }

  rangeLt(column: string, range: string): PostgrestFilterBuilder {
    return this.append(column, `sl.${range}`);
  }

  rangeGt(column: string, range: string): PostgrestFilterBuilder {
    return this.append(column, `sr.${range}`);
  }

  rangeGte(column: string, range: string): PostgrestFilterBuilder {
    return this.append(column, `nxl.${range}`);
  }

  rangeLte(column: string, range: string): PostgrestFilterBuilder {
    return this.append(column, `nxr.${range}`);
  }

  rangeAdjacent(column: string, range: string): PostgrestFilterBuilder {
    return this.append(column, `adj.${range}`);
  }

  /**
   * Full-text search on a tsvector column
   * @example textSearch('body', "'fat' & 'cat'")
   * @example textSearch('body', 'fat cat', { type: 'websearch', config: 'english' })
   */
  textSearch(column: string, query: string, options: TextSearchOptions = {}): PostgrestFilterBuilder {
    const operator = options.type ? TEXT_SEARCH_OPERATORS[options.type] : "fts";
    const config = options.config ? `(${options.config})` : "";
    return this.append(column, `${operator}${config}.${query}`);
  }

  /**
   * Order results; calling it again adds a secondary ordering
   */
  order(column: string, options: OrderOptions = {}): PostgrestFilterBuilder {
    const direction = options.ascending === false ? "desc" : "asc";
    const nulls =
      options.nullsFirst === undefined ? "" : options.nullsFirst ? ".nullsfirst" : ".nullslast";
    return this.append("order", `${column}.${direction}${nulls}`);
  }

  /**
   * Limit number of rows returned
   */
  limit(count: number): PostgrestFilterBuilder {
    return this.append("limit", String(count));
  }

  /**
   * Ask the server for a single object instead of an array; it errors unless exactly one row matches
   */
  single(): PostgrestFilterBuilder {
    return this.next(withHeader(this.state, "Accept", "application/vnd.pgrst.object+json"));
  }
}
