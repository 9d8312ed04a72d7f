/**
 * Instagram source: hashtag page adapter
 *
 * Reads the data embedded in each niche hashtag page and keeps the post
 * owners whose username or caption mentions the requested city. Accounts
 * are de-duplicated by username within one fetch.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  CityRaw,
  FetchContext,
  FetchRequest,
  HttpRequestFn,
  InstagramRawListing,
  Niche,
  RawListing,
  SourceId,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { INSTAGRAM_BASE_URL, INSTAGRAM_CAPTION_MAX_LENGTH, SOURCE_TRUST } from "@/constants";
import { MalformedResponse } from "@/errors";
import { findCity } from "@/catalog/loader";
import { requestHtml } from "@/sources/shared/requests";
import { normalizeText } from "@/utils/text/textNormalization";
import { instagramSharedDataSchema, type InstagramPost } from "./schemas";

export interface InstagramSourceConfig {
  sessionId: string;
  catalog: CatalogRuntime;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

const SHARED_DATA_PATTERN = /window\._sharedData\s*=\s*(\{[\s\S]+?\});\s*<\/script>/;

/**
 * Extract the posts embedded in a hashtag page
 *
 * @throws {MalformedResponse} When the page carries no embedded data
 * @throws {SyntaxError} When the embedded data is not JSON
 * @throws {ZodError} When the data does not have the hashtag page shape
 */
export function extractHashtagPosts(html: string): InstagramPost[] {
  const match = SHARED_DATA_PATTERN.exec(html);
  if (!match) {
    throw new MalformedResponse("Hashtag page carries no embedded data", { sourceId: "instagram" });
  }
  const data = instagramSharedDataSchema.parse(JSON.parse(match[1]));
  return data.entry_data.TagPage[0].graphql.hashtag.edge_hashtag_to_media.edges.map((edge) => edge.node);
}

/**
 * Map one post to a raw listing about its owner
 */
export function mapInstagramPost(
  post: InstagramPost,
  hints: { category: Niche; city: string; fetchedAt: string },
): InstagramRawListing | null {
  const username = post.owner.username?.trim();
  if (!username) return null;

  const caption = post.edge_media_to_caption?.edges[0]?.node.text ?? "";

  return {
    source: "instagram",
    categoryHint: hints.category,
    cityHint: hints.city,
    fetchedAt: hints.fetchedAt,
    sourceRecordId: username,
    sourceUrl: `${INSTAGRAM_BASE_URL}/${username}/`,
    username,
    caption: caption.substring(0, INSTAGRAM_CAPTION_MAX_LENGTH),
    profileUrl: `${INSTAGRAM_BASE_URL}/${username}/`,
  };
}

function mentionsCity(listing: InstagramRawListing, city: CityRaw): boolean {
  const haystack = normalizeText(`${listing.username} ${listing.caption}`).replace(/[\s_]/g, "");
  return [city.name, ...city.aliases].some((alias) =>
    haystack.includes(normalizeText(alias).replace(/\s/g, "")),
  );
}

export class InstagramSource implements SourceAdapter {
  readonly id: SourceId = "instagram";
  readonly trust = SOURCE_TRUST.instagram;

  private readonly sessionId: string;
  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: InstagramSourceConfig) {
    this.sessionId = config.sessionId;
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city) return;

    const hashtags = this.catalog.providers.instagram.hashtags[request.category];
    const seen = new Set<string>();
    let yielded = 0;

    for (const hashtag of hashtags) {
      if (yielded >= request.limit) break;
      await context.throttle();

      const html = await requestHtml(this.httpRequest, {
        url: `${INSTAGRAM_BASE_URL}/explore/tags/${encodeURIComponent(hashtag.replace(/^#/, ""))}/`,
        headers: { Cookie: `sessionid=${this.sessionId}` },
        signal: context.signal,
      });

      const fetchedAt = this.now().toISOString();
      for (const post of extractHashtagPosts(html)) {
        if (yielded >= request.limit) break;

        const listing = mapInstagramPost(post, { category: request.category, city: city.name, fetchedAt });
        if (!listing || seen.has(listing.username.toLowerCase())) continue;
        seen.add(listing.username.toLowerCase());

        if (!mentionsCity(listing, city)) continue;

        yielded++;
        yield listing;
      }
    }
  }
}
