/**
 * Cache payload codec
 *
 * Entries are stored as a versioned, namespace-tagged envelope:
 *   { v: 1, ns, writtenAt, ttlSeconds, payload }
 * Anything that does not parse back into the namespace's record shape is
 * reported as undecodable and treated by the store as a miss.
 */

import { z } from "zod";
import { AcquisitionSuccessSchema } from "@/core/domain/AcquisitionOutcome";
import { ExchangeRateSchema } from "@/core/domain/ExchangeRate";
import type {
  CacheNamespace,
  CacheRecordMap,
} from "@/core/interfaces/ICacheStore";

export const CACHE_SCHEMA_VERSION = 1;

const PAYLOAD_SCHEMAS: {
  [N in CacheNamespace]: z.ZodType<CacheRecordMap[N], z.ZodTypeDef, unknown>;
} = {
  listing: AcquisitionSuccessSchema,
  seller: AcquisitionSuccessSchema,
  rate: ExchangeRateSchema,
};

const EnvelopeSchema = z.object({
  v: z.literal(CACHE_SCHEMA_VERSION),
  ns: z.enum(["listing", "seller", "rate"]),
  writtenAt: z.number().int().nonnegative(),
  ttlSeconds: z.number().positive(),
  payload: z.unknown(),
});

export interface CacheEntry<N extends CacheNamespace> {
  namespace: N;
  writtenAt: number;
  ttlSeconds: number;
  record: CacheRecordMap[N];
}

export type DecodeResult<N extends CacheNamespace> =
  | { ok: true; entry: CacheEntry<N> }
  | { ok: false; reason: string };

export function encodeEntry<N extends CacheNamespace>(entry: CacheEntry<N>): string {
  return JSON.stringify({
    v: CACHE_SCHEMA_VERSION,
    ns: entry.namespace,
    writtenAt: entry.writtenAt,
    ttlSeconds: entry.ttlSeconds,
    payload: entry.record,
  });
}

export function decodeEntry<N extends CacheNamespace>(
  namespace: N,
  raw: string,
): DecodeResult<N> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "invalid JSON" };
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { ok: false, reason: "unrecognised envelope or schema version" };
  }
  if (envelope.data.ns !== namespace) {
    return {
      ok: false,
      reason: `namespace mismatch: expected ${namespace}, found ${envelope.data.ns}`,
    };
  }

  const payload = PAYLOAD_SCHEMAS[namespace].safeParse(envelope.data.payload);
  if (!payload.success) {
    return { ok: false, reason: `invalid ${namespace} payload` };
  }

  return {
    ok: true,
    entry: {
      namespace,
      writtenAt: envelope.data.writtenAt,
      ttlSeconds: envelope.data.ttlSeconds,
      record: payload.data,
    },
  };
}
