/**
 * Zod schemas for serialized traces.
 * Used to re-read OTel-JSON traces handed back by collaborators.
 */

import { z } from 'zod';

import { invalidInput } from '../reliability/DomainError';
import type { OtelSpan, TraceStatus } from './Span';

const hex = (length: number) =>
  z.string().regex(new RegExp(`^[0-9a-f]{${length}}$`), `expected ${length} hex chars`);

const unixNano = z.string().regex(/^\d+$/, 'expected a decimal nanosecond timestamp');

const AttributesSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const OtelSpanSchema = z
  .object({
    traceId: hex(32),
    spanId: hex(16),
    parentSpanId: z.union([hex(16), z.literal('')]),
    operationName: z.string(),
    serviceName: z.string(),
    kind: z.enum(['SPAN_KIND_CLIENT', 'SPAN_KIND_SERVER', 'SPAN_KIND_INTERNAL']),
    startTimeUnixNano: unixNano,
    endTimeUnixNano: unixNano,
    durationNano: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
    status: z.object({
      code: z.enum(['STATUS_CODE_OK', 'STATUS_CODE_ERROR', 'STATUS_CODE_UNSET']),
      message: z.string(),
    }),
    attributes: AttributesSchema,
    events: z.array(
      z.object({
        name: z.string(),
        timeUnixNano: unixNano,
        attributes: AttributesSchema,
      }),
    ),
    links: z.array(
      z.object({
        traceId: hex(32),
        spanId: hex(16),
        attributes: AttributesSchema,
      }),
    ),
    resource: z.object({ attributes: AttributesSchema }),
  })
  .refine((s) => BigInt(s.startTimeUnixNano) <= BigInt(s.endTimeUnixNano), {
    message: 'endTimeUnixNano must be >= startTimeUnixNano',
  });

export const OtelTraceSchema = z.object({
  traceId: hex(32),
  status: z.enum(['OK', 'ERROR']),
  spanCount: z.number().int().nonnegative(),
  spans: z.array(OtelSpanSchema),
});

export type ParsedOtelTrace = {
  traceId: string;
  status: TraceStatus;
  spanCount: number;
  spans: OtelSpan[];
};

/**
 * Parses a serialized trace (as produced by `JSON.stringify(trace)`).
 * Every span must belong to the trace and `spanCount` must match.
 */
export function parseOtelTrace(json: string): ParsedOtelTrace {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw invalidInput('Trace is not valid JSON.', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = OtelTraceSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidInput('Trace does not match the OTel-JSON shape.', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const trace = parsed.data;
  const foreign = trace.spans.find((s) => s.traceId !== trace.traceId);
  if (foreign) {
    throw invalidInput('Span belongs to a different trace.', {
      spanId: foreign.spanId,
    });
  }
  if (trace.spans.length !== trace.spanCount) {
    throw invalidInput('spanCount does not match the number of spans.', {
      spanCount: trace.spanCount,
      spans: trace.spans.length,
    });
  }

  return {
    traceId: trace.traceId,
    status: trace.status,
    spanCount: trace.spanCount,
    spans: trace.spans,
  };
}
