/**
 * Filter Builder Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PostgrestFetch } from "./fetch";
import { PostgrestFilterBuilder } from "./filter-builder";
import type { RequestState } from "./types";

const BASE_STATE: RequestState = {
  url: "http://localhost:3000/products?select=*",
  headers: {},
  method: "GET",
};

function param(builder: PostgrestFilterBuilder, name: string): string | null {
  return new URL(builder.url).searchParams.get(name);
}

describe("PostgrestFilterBuilder - comparison operators", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it.each([
    ["eq", "eq.active"],
    ["neq", "neq.active"],
    ["gt", "gt.active"],
    ["gte", "gte.active"],
    ["lt", "lt.active"],
    ["lte", "lte.active"],
    ["is", "is.active"],
  ] as const)("should filter with %s", (method, expected) => {
    expect(param(builder[method]("status", "active"), "status")).toBe(expected);
  });

  it("should format numbers, booleans and null", () => {
    const query = builder.eq("price", 29.99).eq("active", true).is("deleted_at", null);

    expect(param(query, "price")).toBe("eq.29.99");
    expect(param(query, "active")).toBe("eq.true");
    expect(param(query, "deleted_at")).toBe("is.null");
  });

  it("should filter with like and ilike", () => {
    const query = builder.like("name", "%Product%").ilike("email", "*@example.com");

    expect(param(query, "name")).toBe("like.%Product%");
    expect(param(query, "email")).toBe("ilike.*@example.com");
  });

  it("should filter with in", () => {
    expect(param(builder.in("category", ["books", "toys"]), "category")).toBe("in.books,toys");
  });

  it("should keep the select parameter first", () => {
    const query = builder.eq("id", 1);

    expect([...new URL(query.url).searchParams.keys()]).toEqual(["select", "id"]);
  });
});

describe("PostgrestFilterBuilder - logical operators", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it("should negate an operator", () => {
    expect(param(builder.not("status", "eq", "deleted"), "status")).toBe("not.eq.deleted");
    expect(param(builder.not("completed_at", "is", null), "completed_at")).toBe("not.is.null");
  });

  it("should wrap or filters in parentheses", () => {
    expect(param(builder.or("status.eq.active,status.eq.pending"), "or")).toBe(
      "(status.eq.active,status.eq.pending)",
    );
  });

  it("should apply a raw operator with filter", () => {
    expect(param(builder.filter("name", "in", '("Han","Yoda")'), "name")).toBe('in.("Han","Yoda")');
  });

  it("should expand match into eq filters", () => {
    const query = builder.match({ id: 1, status: "active" });

    expect(param(query, "id")).toBe("eq.1");
    expect(param(query, "status")).toBe("eq.active");
  });

  it("should return a new builder for an empty match", () => {
    const query = builder.match({});

    expect(query).not.toBe(builder);
    expect(query.url).toBe(BASE_STATE.url);
  });

  it("should append repeated filters instead of replacing them", () => {
    const query = builder.eq("tag", "sale").eq("tag", "sale");

    expect(new URL(query.url).searchParams.getAll("tag")).toEqual(["eq.sale", "eq.sale"]);
  });
});

describe("PostgrestFilterBuilder - containment", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it("should pass a string through", () => {
    expect(param(builder.contains("tags", "{news,sports}"), "tags")).toBe("cs.{news,sports}");
  });

  it("should join a string list", () => {
    expect(param(builder.contains("tags", ["news", "sports"]), "tags")).toBe("cs.news,sports");
  });

  it("should serialize other values as JSON", () => {
    expect(param(builder.contains("metadata", { plan: "pro" }), "metadata")).toBe('cs.{"plan":"pro"}');
    expect(param(builder.contains("scores", [1, 2]), "scores")).toBe("cs.[1,2]");
  });

  it("should do nothing for values without a JSON form", () => {
    const query = builder.contains("metadata", undefined).contains("size", 10n);

    expect(query).not.toBe(builder);
    expect(query.url).toBe(BASE_STATE.url);
  });

  it("should filter with containedBy", () => {
    expect(param(builder.containedBy("tags", ["a", "b", "c"]), "tags")).toBe("cd.a,b,c");
    expect(param(builder.containedBy("metadata", { a: 1 }), "metadata")).toBe('cd.{"a":1}');
  });

  it("should filter with overlaps", () => {
    expect(param(builder.overlaps("tags", ["news", "sports"]), "tags")).toBe("ov.{news,sports}");
    expect(param(builder.overlaps("period", "[2024-01-01,2024-02-01)"), "period")).toBe(
      "ov.[2024-01-01,2024-02-01)",
    );
  });
});

describe("PostgrestFilterBuilder - range operators", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it.each([
    ["rangeLt", "sl.[1,10)"],
    ["rangeGt", "sr.[1,10)"],
    ["rangeGte", "nxl.[1,10)"],
    ["rangeLte", "nxr.[1,10)"],
    ["rangeAdjacent", "adj.[1,10)"],
  ] as const)("should map %s to its operator", (method, expected) => {
    expect(param(builder[method]("during", "[1,10)"), "during")).toBe(expected);
  });
});

describe("PostgrestFilterBuilder - text search", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it("should use fts by default", () => {
    expect(param(builder.textSearch("body", "'fat' & 'cat'"), "body")).toBe("fts.'fat' & 'cat'");
  });

  it.each([
    ["plain", "plfts.fat cat"],
    ["phrase", "phfts.fat cat"],
    ["websearch", "wfts.fat cat"],
  ] as const)("should use the %s parser", (type, expected) => {
    expect(param(builder.textSearch("body", "fat cat", { type }), "body")).toBe(expected);
  });

  it("should add the configuration", () => {
    const query = builder.textSearch("body", "fat cat", { type: "websearch", config: "english" });

    expect(param(query, "body")).toBe("wfts(english).fat cat");
  });
});

describe("PostgrestFilterBuilder - transforms", () => {
  let builder: PostgrestFilterBuilder;

  beforeEach(() => {
    builder = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);
  });

  it("should order ascending by default", () => {
    expect(param(builder.order("created_at"), "order")).toBe("created_at.asc");
  });

  it("should order descending with nulls placement", () => {
    expect(param(builder.order("score", { ascending: false, nullsFirst: false }), "order")).toBe(
      "score.desc.nullslast",
    );
    expect(param(builder.order("score", { nullsFirst: true }), "order")).toBe("score.asc.nullsfirst");
  });

  it("should limit rows", () => {
    expect(param(builder.limit(10), "limit")).toBe("10");
  });

  it("should request a single object", () => {
    const query = builder.single();

    expect(query.headers).toEqual({ Accept: "application/vnd.pgrst.object+json" });
    expect(builder.headers).toEqual({});
  });
});

describe("PostgrestFilterBuilder - immutability", () => {
  it("should derive independent builders from a shared base", () => {
    const base = new PostgrestFilterBuilder(new PostgrestFetch(), BASE_STATE);

    const first = base.eq("id", 1);
    const second = base.eq("id", 2);

    expect(base.url).toBe("http://localhost:3000/products?select=*");
    expect(new URL(first.url).searchParams.getAll("id")).toEqual(["eq.1"]);
    expect(new URL(second.url).searchParams.getAll("id")).toEqual(["eq.2"]);
  });
});

describe("PostgrestFilterBuilder - malformed URL", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should leave the URL unchanged and log in debug mode", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const builder = new PostgrestFilterBuilder(new PostgrestFetch({ debug: true }), {
      url: "not a url",
      headers: {},
      method: "GET",
    });

    const query = builder.eq("id", 1);

    expect(query.url).toBe("not a url");
    expect(warn).toHaveBeenCalledWith("[postgrest] Dropped query parameter id: cannot parse not a url");
  });

  it("should stay quiet without debug", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const builder = new PostgrestFilterBuilder(new PostgrestFetch(), {
      url: "not a url",
      headers: {},
      method: "GET",
    });

    builder.eq("id", 1);

    expect(warn).not.toHaveBeenCalled();
  });
});
