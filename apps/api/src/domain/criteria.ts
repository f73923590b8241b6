import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { FilterCriteria, Region, ServerRecord } from "./types.js";

export const regionCountries: Record<Region, readonly string[]> = {
  europe: ["DE", "FR", "UK", "NL", "SE", "NO", "PL", "IT", "ES"],
  north_america: ["US", "CA"],
  oceania: ["AU", "NZ"]
};

export const filterCriteriaSchema = z
  .object({
    region: z.enum(["europe", "north_america", "oceania"]).optional(),
    countries: z
      .array(
        z
          .string()
          .trim()
          .regex(/^[A-Za-z]{2}$/, "country codes must be two letters")
      )
      .min(1)
      .optional(),
    serverType: z.enum(["official", "community", "private"]).optional(),
    search: z.string().trim().max(100).optional(),
    mods: z.boolean().optional()
  })
  .strict();

export type FilterCriteriaInput = z.input<typeof filterCriteriaSchema>;

/**
 * Validates raw criteria and returns the canonical form: upper-cased, de-duplicated
 * country codes, no empty search term, and no region when an explicit country set is present.
 */
export function parseFilterCriteria(input: unknown): FilterCriteria {
  const parsed = filterCriteriaSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "criteria"}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid filter criteria: ${message}`, parsed.error.issues);
  }

  const value = parsed.data;
  const criteria: FilterCriteria = {};

  if (value.countries) {
    criteria.countries = [...new Set(value.countries.map((code) => code.toUpperCase()))];
  } else if (value.region) {
    criteria.region = value.region;
  }

  if (value.serverType) {
    criteria.serverType = value.serverType;
  }

  if (value.search) {
    criteria.search = value.search;
  }

  if (value.mods !== undefined) {
    criteria.mods = value.mods;
  }

  return criteria;
}

export function resolveCountries(criteria: FilterCriteria): string[] | null {
  if (criteria.countries && criteria.countries.length > 0) {
    return criteria.countries;
  }

  if (criteria.region) {
    return [...regionCountries[criteria.region]];
  }

  return null;
}

/** Stable key for "equivalent criteria": a region and its expanded country list share a key. */
export function criteriaKey(criteria: FilterCriteria): string {
  const countries = resolveCountries(criteria);
  return JSON.stringify({
    countries: countries ? [...countries].sort() : null,
    serverType: criteria.serverType ?? null,
    search: criteria.search?.toLowerCase() ?? null,
    mods: criteria.mods ?? null
  });
}

/**
 * Logical catalog parameters. Keys are the catalog's own; the client wraps them
 * into its wire format.
 */
export function buildCatalogQuery(criteria: FilterCriteria): Record<string, string> {
  const params: Record<string, string> = {};

  const countries = resolveCountries(criteria);
  if (countries) {
    params["countries[]"] = countries.join(",");
  }

  if (criteria.serverType === "private") {
    params.private = "true";
  } else if (criteria.serverType === "official" || criteria.serverType === "community") {
    params.private = "false";
  }

  if (criteria.serverType === "official" || criteria.mods === false) {
    params.mods = "";
  }

  if (criteria.search) {
    params.search = criteria.search;
  }

  return params;
}

export function matchesCriteria(record: ServerRecord, criteria: FilterCriteria | undefined): boolean {
  if (!criteria) {
    return true;
  }

  const countries = resolveCountries(criteria);
  if (countries && !countries.includes(record.country.toUpperCase())) {
    return false;
  }

  if (criteria.serverType && record.sourceKind !== criteria.serverType) {
    return false;
  }

  if (criteria.mods !== undefined && record.modsPresent !== criteria.mods) {
    return false;
  }

  if (criteria.search) {
    const needle = criteria.search.toLowerCase();
    if (!record.name.toLowerCase().includes(needle) && !record.map.toLowerCase().includes(needle)) {
      return false;
    }
  }

  return true;
}
