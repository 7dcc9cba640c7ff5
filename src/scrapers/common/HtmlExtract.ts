/**
 * cheerio helpers shared by the HTML scrapers
 */

import * as cheerio from "cheerio";
import type { FieldSelector } from "@/core/domain/PlatformScraperConfig";
import { PriceParser } from "@/scrapers/common/PriceParser";

export type HtmlDocument = cheerio.CheerioAPI;

export function loadHtml(html: string): HtmlDocument {
  return cheerio.load(html);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Value of the first selector that yields non-empty text
 */
export function readField(
  $: HtmlDocument,
  selectors: readonly FieldSelector[],
): string | null {
  for (const { selector, attr } of selectors) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const raw = attr ? element.attr(attr) : element.text();
    const value = raw?.replace(/\s+/g, " ").trim();
    if (value) return value;
  }
  return null;
}

/**
 * Text of every element matched by any selector, in selector order
 */
export function readAllTexts(
  $: HtmlDocument,
  selectors: readonly FieldSelector[],
): string[] {
  const texts: string[] = [];
  for (const { selector, attr } of selectors) {
    $(selector).each((_, node) => {
      const element = $(node);
      const raw = attr ? element.attr(attr) : element.text();
      const value = raw?.replace(/\s+/g, " ").trim();
      if (value) texts.push(value);
    });
  }
  return texts;
}

export function hasAny($: HtmlDocument, selectors: readonly FieldSelector[]): boolean {
  return selectors.some(({ selector }) => $(selector).length > 0);
}

/**
 * Parsed JSON of a <script> element, or null
 */
export function readScriptJson($: HtmlDocument, selector: string): unknown {
  const text = $(selector).first().text();
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function offerPrice(offers: unknown): number | null {
  if (Array.isArray(offers)) {
    for (const offer of offers) {
      const price = offerPrice(offer);
      if (price !== null) return price;
    }
    return null;
  }
  if (isRecord(offers)) {
    const raw = offers.price ?? offers.lowPrice;
    if (typeof raw === "number" || typeof raw === "string") {
      return PriceParser.parse(raw);
    }
  }
  return null;
}

/**
 * Price from schema.org JSON-LD offers (including @graph entries)
 */
export function jsonLdPrice($: HtmlDocument): number | null {
  const scripts = $("script[type='application/ld+json']").toArray();
  for (const script of scripts) {
    let data: unknown;
    try {
      data = JSON.parse($(script).text());
    } catch {
      continue;
    }

    const nodes = Array.isArray(data)
      ? data
      : isRecord(data) && Array.isArray(data["@graph"])
        ? data["@graph"]
        : [data];

    for (const node of nodes) {
      if (!isRecord(node)) continue;
      const price = offerPrice(node.offers);
      if (price !== null) return price;
    }
  }
  return null;
}
