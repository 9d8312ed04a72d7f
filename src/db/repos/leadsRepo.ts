/**
 * Leads repository
 *
 * Data access layer for leads, lead_keys and lead_phones tables.
 *
 * A lead row keeps the identity key it was inserted with. Every further key
 * that resolved to it (keys of merged partial records) is recorded in
 * lead_keys, so lookups by any of them find the same row.
 */

import { z } from "zod";
import type {
  Lead,
  LeadKeyRow,
  LeadRow,
  LeadStats,
  UpsertAction,
} from "@/types";
import { NICHES, SOURCE_IDS } from "@/types";
import type { StoredLead } from "@/interfaces";
import { getDb } from "../connection";

const phonesColumnSchema = z.array(z.string());
const sourcesColumnSchema = z.array(z.enum(SOURCE_IDS));
const socialColumnSchema = z.object({
  instagram: z.string().optional(),
  facebook: z.string().optional(),
  vk: z.string().optional(),
  telegram: z.string().optional(),
});
const categoryColumnSchema = z.enum([...NICHES, "unknown"]);
const sourceColumnSchema = z.enum([...SOURCE_IDS, "merged"]);

const LEAD_COLUMNS = `l.id, l.identity_key, l.name, l.category, l.address, l.city,
  l.district, l.phones, l.email, l.website, l.social, l.rating, l.review_count,
  l.lat, l.lon, l.source, l.sources, l.created_at, l.updated_at`;

/**
 * Map a leads row to the domain shape, validating the JSON columns
 *
 * @throws ZodError if a stored column does not match the lead model
 */
export function rowToStoredLead(row: LeadRow): StoredLead {
  const lead: StoredLead = {
    id: row.id,
    identityKey: row.identity_key,
    name: row.name,
    category: categoryColumnSchema.parse(row.category),
    address: row.address,
    city: row.city,
    district: row.district,
    phones: phonesColumnSchema.parse(JSON.parse(row.phones)),
    social: socialColumnSchema.parse(JSON.parse(row.social)),
    source: sourceColumnSchema.parse(row.source),
    sources: sourcesColumnSchema.parse(JSON.parse(row.sources)),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };

  if (row.email !== null) lead.email = row.email;
  if (row.website !== null) lead.website = row.website;
  if (row.rating !== null) lead.rating = row.rating;
  if (row.review_count !== null) lead.reviewCount = row.review_count;
  if (row.lat !== null && row.lon !== null) {
    lead.geo = { lat: row.lat, lon: row.lon };
  }

  return lead;
}

function leadColumnValues(lead: Lead) {
  return {
    name: lead.name,
    category: lead.category,
    address: lead.address,
    city: lead.city,
    district: lead.district,
    phones: JSON.stringify(lead.phones),
    email: lead.email ?? null,
    website: lead.website ?? null,
    social: JSON.stringify(lead.social),
    rating: lead.rating ?? null,
    review_count: lead.reviewCount ?? null,
    lat: lead.geo?.lat ?? null,
    lon: lead.geo?.lon ?? null,
    source: lead.source,
    sources: JSON.stringify(lead.sources),
    updated_at: lead.updatedAt,
  };
}

/**
 * Resolve a key (own identity key or alias) to a lead id
 */
function findLeadIdByKey(key: string): number | null {
  const row = getDb()
    .prepare<[string], Pick<LeadKeyRow, "lead_id">>(
      "SELECT lead_id FROM lead_keys WHERE key = ?",
    )
    .get(key);
  return row?.lead_id ?? null;
}

function replacePhones(leadId: number, phones: string[]): void {
  const db = getDb();
  db.prepare("DELETE FROM lead_phones WHERE lead_id = ?").run(leadId);
  const insert = db.prepare(
    "INSERT OR IGNORE INTO lead_phones (phone, lead_id) VALUES (?, ?)",
  );
  for (const phone of phones) {
    insert.run(phone, leadId);
  }
}

/**
 * Record keys for a lead. A key already owned by another lead stays with it.
 */
function addKeys(leadId: number, keys: string[]): void {
  const insert = getDb().prepare(
    "INSERT OR IGNORE INTO lead_keys (key, lead_id) VALUES (?, ?)",
  );
  for (const key of keys) {
    insert.run(key, leadId);
  }
}

/**
 * Insert or update the lead stored under `lead.identityKey` (or an alias of
 * it) in one transaction. An updated row keeps its identity key and
 * creation time.
 */
export function upsertLead(
  lead: Lead,
  aliasKeys: string[] = [],
): { id: number; action: UpsertAction } {
  const db = getDb();

  const transaction = db.transaction(() => {
    const values = leadColumnValues(lead);
    const existingId = findLeadIdByKey(lead.identityKey);

    let id: number;
    let action: UpsertAction;

    if (existingId !== null) {
      db.prepare(
        `
        UPDATE leads SET
          name = @name,
          category = @category,
          address = @address,
          city = @city,
          district = @district,
          phones = @phones,
          email = @email,
          website = @website,
          social = @social,
          rating = @rating,
          review_count = @review_count,
          lat = @lat,
          lon = @lon,
          source = @source,
          sources = @sources,
          updated_at = @updated_at
        WHERE id = @id
      `,
      ).run({ ...values, id: existingId });
      id = existingId;
      action = "updated";
    } else {
      const result = db
        .prepare(
          `
        INSERT INTO leads (
          identity_key, name, category, address, city, district, phones,
          email, website, social, rating, review_count, lat, lon, source,
          sources, created_at, updated_at
        ) VALUES (
          @identity_key, @name, @category, @address, @city, @district, @phones,
          @email, @website, @social, @rating, @review_count, @lat, @lon,
          @source, @sources, @updated_at, @updated_at
        )
      `,
        )
        .run({ ...values, identity_key: lead.identityKey });
      id = Number(result.lastInsertRowid);
      action = "inserted";
    }

    addKeys(id, [lead.identityKey, ...aliasKeys]);
    replacePhones(id, lead.phones);

    return { id, action };
  });

  return transaction();
}

export function getLeadByKey(key: string): StoredLead | null {
  const row = getDb()
    .prepare<[string], LeadRow>(
      `SELECT ${LEAD_COLUMNS}
       FROM leads l
       JOIN lead_keys k ON k.lead_id = l.id
       WHERE k.key = ?`,
    )
    .get(key);
  return row ? rowToStoredLead(row) : null;
}

export function leadKeyExists(key: string): boolean {
  return findLeadIdByKey(key) !== null;
}

/**
 * Leads carrying the canonical phone, oldest first
 */
export function findLeadsByPhone(phone: string): StoredLead[] {
  return getDb()
    .prepare<[string], LeadRow>(
      `SELECT ${LEAD_COLUMNS}
       FROM leads l
       JOIN lead_phones p ON p.lead_id = l.id
       WHERE p.phone = ?
       ORDER BY l.created_at ASC, l.id ASC`,
    )
    .all(phone)
    .map(rowToStoredLead);
}

export function findLeadsByCategory(category: string): StoredLead[] {
  return getDb()
    .prepare<[string], LeadRow>(
      `SELECT ${LEAD_COLUMNS}
       FROM leads l
       WHERE l.category = ?
       ORDER BY l.created_at ASC, l.id ASC`,
    )
    .all(category)
    .map(rowToStoredLead);
}

export function listLeads(): StoredLead[] {
  return getDb()
    .prepare<[], LeadRow>(
      `SELECT ${LEAD_COLUMNS}
       FROM leads l
       ORDER BY l.created_at ASC, l.id ASC`,
    )
    .all()
    .map(rowToStoredLead);
}

export function countLeads(): number {
  const row = getDb()
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM leads")
    .get();
  return row?.count ?? 0;
}

function countGroupedBy(column: "category" | "city" | "source") {
  const rows = getDb()
    .prepare<[], { value: string; count: number }>(
      `SELECT ${column} AS value, COUNT(*) AS count
       FROM leads
       GROUP BY ${column}
       ORDER BY ${column}`,
    )
    .all();

  const counts: Record<string, number> = {};
  for (const row of rows) {
    counts[row.value] = row.count;
  }
  return counts;
}

/**
 * Aggregate counts over the whole lead set
 */
export function getLeadStats(): LeadStats {
  const db = getDb();

  const coverage = db
    .prepare<
      [],
      {
        total: number;
        with_phone: number | null;
        with_email: number | null;
        with_website: number | null;
        with_instagram: number | null;
      }
    >(
      `SELECT
         COUNT(*) AS total,
         SUM(CASE WHEN phones <> '[]' THEN 1 ELSE 0 END) AS with_phone,
         SUM(CASE WHEN email IS NOT NULL THEN 1 ELSE 0 END) AS with_email,
         SUM(CASE WHEN website IS NOT NULL THEN 1 ELSE 0 END) AS with_website,
         SUM(CASE WHEN json_extract(social, '$.instagram') IS NOT NULL THEN 1 ELSE 0 END) AS with_instagram
       FROM leads`,
    )
    .get();

  return {
    total: coverage?.total ?? 0,
    byCategory: countGroupedBy("category"),
    bySource: countGroupedBy("source"),
    byCity: countGroupedBy("city"),
    withPhone: coverage?.with_phone ?? 0,
    withEmail: coverage?.with_email ?? 0,
    withWebsite: coverage?.with_website ?? 0,
    withInstagram: coverage?.with_instagram ?? 0,
  };
}
