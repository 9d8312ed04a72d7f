/**
 * Source adapter registry
 */

import type { SourceAdapter } from "@/interfaces";
import type { AppConfig, CatalogRuntime, HttpRequestFn, SourceId } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { DealSource } from "./deal/dealSource";
import { EgrSource } from "./egr/egrSource";
import { InstagramSource } from "./instagram/instagramSource";
import { OnlinerSource } from "./onliner/onlinerSource";
import { TwoGisSource } from "./twogis/twoGisSource";
import { YandexMapsSource } from "./yandexMaps/yandexMapsSource";
import * as logger from "@/logger";

export { DealSource, EgrSource, InstagramSource, OnlinerSource, TwoGisSource, YandexMapsSource };

/**
 * Build one adapter per enabled source
 *
 * A source whose credential is missing is left out with a warning
 * (loadConfig already drops those from enabledSources).
 */
export function createSourceAdapters(
  config: Pick<AppConfig, "enabledSources" | "credentials">,
  catalog: CatalogRuntime,
  httpRequest: HttpRequestFn = defaultHttpRequest,
): SourceAdapter[] {
  const adapters: SourceAdapter[] = [];
  const { credentials } = config;

  const build = (sourceId: SourceId): SourceAdapter | null => {
    switch (sourceId) {
      case "twogis":
        return credentials.twogisApiKey
          ? new TwoGisSource({ apiKey: credentials.twogisApiKey, catalog, httpRequest })
          : null;
      case "yandex_maps":
        return credentials.yandexApiKey
          ? new YandexMapsSource({ apiKey: credentials.yandexApiKey, catalog, httpRequest })
          : null;
      case "egr":
        return new EgrSource({ catalog, httpRequest });
      case "onliner":
        return new OnlinerSource({ catalog, httpRequest });
      case "deal":
        return new DealSource({ catalog, httpRequest });
      case "instagram":
        return credentials.instagramSessionId
          ? new InstagramSource({ sessionId: credentials.instagramSessionId, catalog, httpRequest })
          : null;
    }
  };

  for (const sourceId of config.enabledSources) {
    const adapter = build(sourceId);
    if (adapter) {
      adapters.push(adapter);
    } else {
      logger.warn("Source adapter not created: credential missing", { sourceId });
    }
  }

  return adapters;
}
