import { isRecord } from '../utils/tryParse.js';

/** Whether a field counts as "not provided". */
function isAbsent(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * Prepares a write payload for the wire.
 *
 * Top-level fields that are `null` or `undefined` are omitted instead of being
 * sent as `null`. A nested `customer` object additionally loses its `dv` field
 * when that is not provided; no other nested object is touched.
 * Non-object payloads are returned unchanged.
 */
export function preparePayload(payload: unknown): unknown {
  if (!isRecord(payload)) {
    return payload;
  }

  const prepared: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!isAbsent(value)) {
      prepared[key] = value;
    }
  }

  const customer = prepared.customer;
  if (isRecord(customer) && 'dv' in customer && isAbsent(customer.dv)) {
    const { dv: _dv, ...rest } = customer;
    prepared.customer = rest;
  }

  return prepared;
}
