export type SpanKind = 'CLIENT' | 'SERVER' | 'INTERNAL';

export type SpanStatusCode = 'OK' | 'ERROR' | 'UNSET';

export type AttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, AttributeValue>;

export type SpanEvent = {
  name: string;
  timeUnixNano: bigint;
  attributes: SpanAttributes;
};

/** Link to a span in another trace (async or batch fan-in). */
export type SpanLink = {
  traceId: string;
  spanId: string;
  attributes: SpanAttributes;
};

/**
 * In-memory span. Timestamps are integer nanoseconds since the epoch.
 * Serialize with `toOtelSpan` / `toJaegerSpan` before handing out.
 */
export type Span = {
  traceId: string;
  spanId: string;
  parentSpanId: string | null;
  operationName: string;
  serviceName: string;
  serviceType: string;
  kind: SpanKind;
  startTimeUnixNano: bigint;
  endTimeUnixNano: bigint;
  durationNs: number;
  statusCode: SpanStatusCode;
  statusMessage: string;
  attributes: SpanAttributes;
  events: SpanEvent[];
  links: SpanLink[];
  resource: SpanAttributes;
};

// OTel-JSON

export type OtelSpanKind = `SPAN_KIND_${SpanKind}`;

export type OtelStatusCode = `STATUS_CODE_${SpanStatusCode}`;

export type OtelSpanEvent = {
  name: string;
  /** Decimal string, the OTLP/JSON encoding of a 64-bit integer. */
  timeUnixNano: string;
  attributes: SpanAttributes;
};

export type OtelSpanLink = {
  traceId: string;
  spanId: string;
  attributes: SpanAttributes;
};

export type OtelSpan = {
  traceId: string;
  spanId: string;
  /** Empty for the root span. */
  parentSpanId: string;
  operationName: string;
  serviceName: string;
  kind: OtelSpanKind;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  durationNano: number;
  durationMs: number;
  status: { code: OtelStatusCode; message: string };
  attributes: SpanAttributes;
  events: OtelSpanEvent[];
  links: OtelSpanLink[];
  resource: { attributes: SpanAttributes };
};

// Jaeger-JSON

export type JaegerTagType = 'bool' | 'int64' | 'float64' | 'string';

export type JaegerTag = {
  key: string;
  type: JaegerTagType;
  value: AttributeValue;
};

export type JaegerReference = {
  refType: 'CHILD_OF';
  traceID: string;
  spanID: string;
};

export type JaegerSpan = {
  traceID: string;
  spanID: string;
  /** Sixteen zeros for the root span. */
  parentSpanID: string;
  operationName: string;
  references: JaegerReference[];
  /** Microseconds since the epoch. */
  startTime: number;
  /** Microseconds. */
  duration: number;
  tags: JaegerTag[];
  logs: Array<{ timestamp: number; fields: JaegerTag[] }>;
  process: { serviceName: string; tags: JaegerTag[] };
};

// Trace

export type TraceStatus = 'OK' | 'ERROR';

export type TraceError = {
  step: number;
  fromService: string;
  toService: string;
  error: string;
};

/** One flow execution. Plain JSON; never mutated after it is returned. */
export type Trace = {
  traceId: string;
  executionId: string;
  flowId: string;
  flowName: string;
  environment: string;
  /** ISO-8601 */
  startTime: string;
  /** ISO-8601 */
  endTime: string;
  durationMs: number;
  status: TraceStatus;
  spanCount: number;
  error: TraceError | null;
  spans: OtelSpan[];
  spansJaeger: JaegerSpan[];
};
