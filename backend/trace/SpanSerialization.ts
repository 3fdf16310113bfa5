import type {
  AttributeValue,
  JaegerSpan,
  JaegerTag,
  JaegerTagType,
  OtelSpan,
  Span,
  SpanAttributes,
} from './Span';

export const JAEGER_ROOT_PARENT_ID = '0'.repeat(16);

const NS_PER_US = BigInt(1000);
const NS_PER_MS = BigInt(1_000_000);

export const round2 = (value: number): number => Math.round(value * 100) / 100;

/** Whole nanoseconds for a millisecond amount. */
export const msToNs = (ms: number): bigint => BigInt(Math.round(ms * 1e6));

export const nsToUs = (ns: bigint): number => Number(ns / NS_PER_US);

export const nsToIso = (ns: bigint): string =>
  new Date(Number(ns / NS_PER_MS)).toISOString();

export const jaegerTagType = (value: AttributeValue): JaegerTagType => {
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number')
    return Number.isInteger(value) ? 'int64' : 'float64';
  return 'string';
};

const toJaegerTags = (attributes: SpanAttributes): JaegerTag[] =>
  Object.entries(attributes).map(([key, value]) => ({
    key,
    type: jaegerTagType(value),
    value,
  }));

export function toOtelSpan(span: Span): OtelSpan {
  return {
    traceId: span.traceId,
    spanId: span.spanId,
    parentSpanId: span.parentSpanId ?? '',
    operationName: span.operationName,
    serviceName: span.serviceName,
    kind: `SPAN_KIND_${span.kind}`,
    startTimeUnixNano: span.startTimeUnixNano.toString(),
    endTimeUnixNano: span.endTimeUnixNano.toString(),
    durationNano: span.durationNs,
    durationMs: round2(span.durationNs / 1e6),
    status: {
      code: `STATUS_CODE_${span.statusCode}`,
      message: span.statusMessage,
    },
    attributes: { ...span.attributes },
    events: span.events.map((e) => ({
      name: e.name,
      timeUnixNano: e.timeUnixNano.toString(),
      attributes: { ...e.attributes },
    })),
    links: span.links.map((l) => ({
      traceId: l.traceId,
      spanId: l.spanId,
      attributes: { ...l.attributes },
    })),
    resource: { attributes: { ...span.resource } },
  };
}

export function toJaegerSpan(span: Span): JaegerSpan {
  return {
    traceID: span.traceId,
    spanID: span.spanId,
    parentSpanID: span.parentSpanId ?? JAEGER_ROOT_PARENT_ID,
    operationName: span.operationName,
    references: span.parentSpanId
      ? [
          {
            refType: 'CHILD_OF',
            traceID: span.traceId,
            spanID: span.parentSpanId,
          },
        ]
      : [],
    startTime: nsToUs(span.startTimeUnixNano),
    duration: Math.floor(span.durationNs / 1000),
    tags: toJaegerTags(span.attributes),
    logs: span.events.map((e) => ({
      timestamp: nsToUs(e.timeUnixNano),
      fields: toJaegerTags(e.attributes),
    })),
    process: {
      serviceName: span.serviceName,
      tags: toJaegerTags(span.resource),
    },
  };
}
