import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import { buildCatalogQuery } from "../domain/criteria.js";
import { NetworkError } from "../domain/errors.js";
import { addressKey, type FilterCriteria, type ServerRecord, type SourceKind } from "../domain/types.js";
import { perspectiveFromKeywords } from "../lib/a2s.js";
import { fetchJsonWithRetry, type RetryOptions } from "../lib/http.js";

export interface CatalogSource {
  fetchCatalog(criteria: FilterCriteria, limit: number): Promise<ServerRecord[]>;
}

const MAX_PAGE_SIZE = 100;

const mapPatterns: Array<[string, string[]]> = [
  ["Chernarus", ["chernarus", "cherno"]],
  ["Livonia", ["livonia"]],
  ["Namalsk", ["namalsk"]],
  ["Sakhal", ["sakhal"]],
  ["Banov", ["banov"]],
  ["Esseker", ["esseker"]],
  ["Deer Isle", ["deer isle", "deerisle"]],
  ["Takistan", ["takistan"]],
  ["Alteria", ["alteria"]],
  ["Pripyat", ["pripyat"]],
  ["Valning", ["valning"]],
  ["Melkart", ["melkart"]],
  ["Rostow", ["rostow"]],
  ["Iztek", ["iztek"]],
  ["Swans Island", ["swans island", "swansisland"]]
];

const officialRegionTags = [" de ", " us ", " eu ", " uk ", " fr ", " au ", " ca "];
const communityMarkers = ["[", "]", "|", "★", "♦", "●", "~", "!"];
const communityKeywords = ["discord", "www", "http", "x10", "loot+", "rp", "roleplay", "clan"];
const privateKeywords = ["private", "whitelist", "closed"];

const attributesSchema = z.object({
  name: z.string().catch("Unknown Server"),
  ip: z.string().catch(""),
  port: z.number().int().catch(0),
  players: z.number().int().nonnegative().catch(0),
  maxPlayers: z.number().int().nonnegative().catch(0),
  country: z.string().nullable().catch(null),
  private: z.boolean().catch(false),
  details: z.record(z.string(), z.unknown()).catch({})
});

const pageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().optional(),
      attributes: z.unknown()
    })
  ),
  links: z
    .object({
      next: z.string().nullable().optional()
    })
    .optional()
});

export function detectMapFromName(serverName: string): string {
  const lower = serverName.toLowerCase();
  for (const [mapName, patterns] of mapPatterns) {
    if (patterns.some((pattern) => lower.includes(pattern))) {
      return mapName;
    }
  }
  return "Unknown";
}

export function classifySourceKind(name: string, modCount: number, isPrivate: boolean): SourceKind {
  const lower = name.toLowerCase();

  if (isPrivate || privateKeywords.some((keyword) => lower.includes(keyword))) {
    return "private";
  }

  const padded = ` ${lower} `;
  const looksOfficial =
    lower.includes("dayz") && (officialRegionTags.some((tag) => padded.includes(tag)) || lower.includes("official"));
  if (
    looksOfficial &&
    modCount === 0 &&
    !communityMarkers.some((marker) => lower.includes(marker)) &&
    !communityKeywords.some((keyword) => lower.includes(keyword))
  ) {
    return "official";
  }

  return "community";
}

function countMods(details: Record<string, unknown>): number {
  const ids = new Set<string>();

  const modIds = details.modIds;
  if (Array.isArray(modIds)) {
    for (const id of modIds) {
      if (typeof id === "string" || typeof id === "number") {
        ids.add(String(id));
      }
    }
  }

  const mods = details.mods;
  if (Array.isArray(mods)) {
    for (const mod of mods) {
      if (typeof mod === "string" || typeof mod === "number") {
        ids.add(String(mod));
      } else if (typeof mod === "object" && mod !== null && "id" in mod) {
        ids.add(String(mod.id));
      }
    }
  } else if (typeof mods === "string") {
    for (const id of mods.split(",").map((value) => value.trim()).filter(Boolean)) {
      ids.add(id);
    }
  }

  if (ids.size === 0 && details.modded === true) {
    return 1;
  }
  return ids.size;
}

export function parseCatalogEntry(attributes: unknown, fetchedAt: number): ServerRecord | null {
  const parsed = attributesSchema.safeParse(attributes);
  if (!parsed.success) {
    return null;
  }

  const entry = parsed.data;
  if (!entry.ip || entry.port < 1 || entry.port > 65535) {
    return null;
  }

  const details = entry.details;
  const queryPort =
    typeof details.queryPort === "number" && details.queryPort > 0 && details.queryPort <= 65535 ? details.queryPort : entry.port + 1;
  const map = typeof details.map === "string" && details.map.trim() ? details.map.trim() : detectMapFromName(entry.name);
  const modCount = countMods(details);
  const gameType = typeof details.gametype === "string" ? details.gametype : typeof details.keywords === "string" ? details.keywords : null;

  return {
    address: addressKey(entry.ip, entry.port),
    host: entry.ip,
    port: entry.port,
    queryPort,
    name: entry.name,
    map,
    country: entry.country?.toUpperCase() ?? "??",
    sourceKind: classifySourceKind(entry.name, modCount, entry.private),
    modsPresent: modCount > 0,
    perspective: perspectiveFromKeywords(gameType),
    playerCount: entry.players,
    maxPlayers: Math.max(entry.maxPlayers, entry.players),
    pingMs: null,
    lastSeenAt: fetchedAt,
    fetchedAt
  };
}

/** `countries[]` becomes `filter[countries][]`; `search` passes through unchanged. */
export function toWireParams(query: Record<string, string>): Array<[string, string]> {
  return Object.entries(query).map(([key, value]) => {
    if (key.startsWith("search") || key.startsWith("filter[")) {
      return [key, value];
    }
    const list = key.endsWith("[]");
    const name = list ? key.slice(0, -2) : key;
    return [`filter[${name}]${list ? "[]" : ""}`, value];
  });
}

export class CatalogClient implements CatalogSource {
  private readonly baseUrl: string;
  private readonly game: string;
  private readonly retry: RetryOptions;
  private readonly now: () => number;
  private readonly logger: FastifyBaseLogger | null;

  constructor(options: {
    baseUrl: string;
    game: string;
    retry?: RetryOptions;
    now?: () => number;
    logger?: FastifyBaseLogger;
  }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.game = options.game;
    this.retry = { attempts: 3, ...options.retry };
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  buildUrl(criteria: FilterCriteria, pageSize: number): string {
    const url = new URL(`${this.baseUrl}/servers`);
    url.searchParams.set("filter[game]", this.game);
    url.searchParams.set("filter[status]", "online");
    url.searchParams.set("page[size]", String(pageSize));
    url.searchParams.set("sort", "-players");

    for (const [key, value] of toWireParams(buildCatalogQuery(criteria))) {
      url.searchParams.set(key, value);
    }

    return url.toString();
  }

  async fetchCatalog(criteria: FilterCriteria, limit: number): Promise<ServerRecord[]> {
    const records: ServerRecord[] = [];
    const seen = new Set<string>();
    let nextUrl: string | null = null;
    let page = 0;

    while (records.length < limit) {
      const url = nextUrl ?? this.buildUrl(criteria, Math.min(MAX_PAGE_SIZE, limit - records.length));
      const payload = await fetchJsonWithRetry(url, this.retry);
      const parsed = pageSchema.safeParse(payload);
      if (!parsed.success) {
        throw new NetworkError(`Unexpected catalog payload from ${url}`);
      }

      page += 1;
      const fetchedAt = this.now();
      let accepted = 0;
      for (const item of parsed.data.data) {
        const record = parseCatalogEntry(item.attributes, fetchedAt);
        if (!record || seen.has(record.address) || records.length >= limit) {
          continue;
        }
        seen.add(record.address);
        records.push(record);
        accepted += 1;
      }

      this.logger?.debug({ page, accepted, total: records.length }, "catalog page fetched");

      nextUrl = parsed.data.links?.next ?? null;
      if (!nextUrl || parsed.data.data.length === 0) {
        break;
      }
    }

    return records;
  }
}
