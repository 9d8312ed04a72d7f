/**
 * Social profile extraction
 *
 * Canonical values: instagram and telegram as "@handle", facebook and vk
 * as "facebook.com/<id>" / "vk.com/<id>". Handles are lowercased.
 */

import type { SocialLinks, SocialPlatform } from "@/types";

type SocialPattern = {
  platform: SocialPlatform;
  pattern: RegExp;
  format: (handle: string) => string;
};

const RESERVED_PATHS = new Set(["p", "explore", "reel", "reels", "stories", "share", "sharer", "groups", "pages", "joinchat", "s"]);

const SOCIAL_PATTERNS: SocialPattern[] = [
  {
    platform: "instagram",
    pattern: /(?:https?:\/\/)?(?:www\.)?instagram\.com\/([a-z0-9_.]{2,30})/gi,
    format: (handle) => `@${handle}`,
  },
  {
    platform: "facebook",
    pattern: /(?:https?:\/\/)?(?:www\.|m\.)?(?:facebook|fb)\.com\/([a-z0-9_.-]{2,50})/gi,
    format: (handle) => `facebook.com/${handle}`,
  },
  {
    platform: "vk",
    pattern: /(?:https?:\/\/)?(?:www\.|m\.)?vk\.com\/([a-z0-9_.]{2,50})/gi,
    format: (handle) => `vk.com/${handle}`,
  },
  {
    platform: "telegram",
    pattern: /(?:https?:\/\/)?(?:t|telegram)\.me\/([a-z0-9_]{3,32})/gi,
    format: (handle) => `@${handle}`,
  },
];

/** Bare "@handle" mentions are read as Instagram handles */
const MENTION_PATTERN = /(?:^|[^\w@.])@([a-z0-9_.]{2,30})/gi;

function cleanHandle(raw: string): string | undefined {
  const handle = raw.toLowerCase().replace(/\.+$/, "");
  if (handle.length < 2 || RESERVED_PATHS.has(handle)) {
    return undefined;
  }
  return handle;
}

/**
 * Normalize a single Instagram handle or profile URL to "@handle"
 *
 * @example
 * normalizeInstagramHandle("https://instagram.com/AutoService_Premium/") // "@autoservice_premium"
 * normalizeInstagramHandle("autoservice_premium") // "@autoservice_premium"
 */
export function normalizeInstagramHandle(raw: string): string | undefined {
  const fromUrl = extractSocialLinks(raw).instagram;
  if (fromUrl) return fromUrl;
  const bare = raw.trim().replace(/^@/, "");
  if (!/^[a-z0-9_.]{2,30}$/i.test(bare)) return undefined;
  const handle = cleanHandle(bare);
  return handle ? `@${handle}` : undefined;
}

/**
 * Extract social profiles from free text
 *
 * The first occurrence per platform wins. An "@handle" mention fills
 * instagram when no instagram.com link is present.
 */
export function extractSocialLinks(text: string | undefined): SocialLinks {
  const links: SocialLinks = {};
  if (!text) return links;

  for (const { platform, pattern, format } of SOCIAL_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const handle = cleanHandle(match[1]);
      if (handle) {
        links[platform] = format(handle);
        break;
      }
    }
  }

  if (!links.instagram) {
    for (const match of text.matchAll(MENTION_PATTERN)) {
      const handle = cleanHandle(match[1]);
      if (handle) {
        links.instagram = `@${handle}`;
        break;
      }
    }
  }

  return links;
}
