/**
 * LoggerAnalyticsSink unit tests (captured pino output)
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";
import { createListingRecord } from "@/core/domain/ListingRecord";
import { createSellerRecord } from "@/core/domain/SellerRecord";
import { LoggerAnalyticsSink } from "@/services/analytics/LoggerAnalyticsSink";

describe("LoggerAnalyticsSink", () => {
  let lines: unknown[];
  let sink: LoggerAnalyticsSink;

  beforeEach(() => {
    lines = [];
    const captured = pino(
      { level: "info" },
      {
        write(message: string) {
          lines.push(JSON.parse(message));
        },
      },
    );
    sink = new LoggerAnalyticsSink(captured);
  });

  it("records successful outcomes with item and seller fields", async () => {
    await sink.record(
      {
        kind: "listing",
        platform: "grailed",
        sourceUrl: "https://www.grailed.com/listings/1",
        elapsedMs: 320,
        success: true,
        listing: createListingRecord({
          price: 850,
          shippingCostOrigin: 20,
          buyable: true,
          title: "Raf Simons Bomber",
        }),
        seller: createSellerRecord({ reviewCount: 1234, averageRating: 4.8 }),
        sellerProfileUrl: "https://www.grailed.com/users/archive_dealer",
        servedFromCache: true,
      },
      { callerId: "42", username: "tester" },
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      msg: "Acquisition recorded",
      component: "analytics",
      analytics: true,
      caller_id: "42",
      username: "tester",
      url: "https://www.grailed.com/listings/1",
      platform: "grailed",
      kind: "listing",
      success: true,
      processing_time_ms: 320,
      served_from_cache: true,
      item_title: "Raf Simons Bomber",
      item_price: 850,
      shipping_cost: 20,
      seller_rating: 4.8,
      seller_reviews: 1234,
    });
  });

  it("records failures with the error kind and no item fields", async () => {
    await sink.record(
      {
        kind: "listing",
        platform: "unknown",
        sourceUrl: "https://example.org/item",
        elapsedMs: 2,
        success: false,
        error: "Unsupported platform",
        errorKind: "unsupported_platform",
        servedFromCache: false,
      },
      { callerId: "7" },
    );

    expect(lines[0]).toMatchObject({
      caller_id: "7",
      username: null,
      success: false,
      error_kind: "unsupported_platform",
      error: "Unsupported platform",
    });
    expect(lines[0]).not.toHaveProperty("item_price");
  });
});
