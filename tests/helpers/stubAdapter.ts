/**
 * Scriptable source adapter for executor and orchestrator tests
 *
 * The handler decides per call what the fetch yields or throws, so tests
 * can script transient failures, hangs and cancellation.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  ClassifiedRawListing,
  FetchContext,
  FetchRequest,
  RawListing,
  SourceId,
  SourceTrust,
  TwoGisRawListing,
} from "@/types";
import { SOURCE_TRUST } from "@/constants";
import { OBSERVED_AT } from "./leadFactory";

export type StubHandler = (
  request: FetchRequest,
  context: FetchContext,
  call: number,
) => Promise<RawListing[]>;

export class StubAdapter implements SourceAdapter {
  readonly trust: SourceTrust;
  readonly requests: FetchRequest[] = [];

  constructor(
    readonly id: SourceId,
    private readonly handler: StubHandler,
  ) {
    this.trust = SOURCE_TRUST[id];
  }

  get calls(): number {
    return this.requests.length;
  }

  async *fetch(
    request: FetchRequest,
    context: FetchContext,
  ): AsyncIterable<RawListing> {
    this.requests.push(request);
    await context.throttle();
    yield* await this.handler(request, context, this.requests.length);
  }
}

/**
 * Resolves once the signal fires, then throws like an aborted request
 */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () =>
      reject(new DOMException("The operation was aborted", "AbortError"));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener("abort", fail, { once: true });
  });
}

export function twoGisListing(
  overrides: Partial<TwoGisRawListing> = {},
): TwoGisRawListing {
  return {
    source: "twogis",
    categoryHint: "auto_service",
    cityHint: "Минск",
    fetchedAt: OBSERVED_AT,
    name: "AutoService Premium",
    address: "ул. Кальварийская, 25",
    city: "Минск",
    contacts: [{ type: "phone", value: "+375291234567" }],
    rubrics: ["Автосервисы"],
    ...overrides,
  };
}

export function classifiedListing(
  overrides: Partial<ClassifiedRawListing> = {},
): ClassifiedRawListing {
  return {
    source: "onliner",
    categoryHint: "auto_service",
    cityHint: "Минск",
    fetchedAt: OBSERVED_AT,
    title: "Автосервис Премиум",
    description: "Ремонт любой сложности. +375 29 123-45-67",
    location: "Минск",
    ...overrides,
  };
}
