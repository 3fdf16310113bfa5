import type { RandomSource } from '../random/SeededRandom';
import { invalidInput, notFound, unconfigured } from '../reliability/DomainError';
import { reportFailure, type FailureReport } from '../reliability/FailureHandling';
import { telemetry as defaultTelemetry, type Telemetry } from '../telemetry/Telemetry';
import {
  collectServices,
  lookupService,
  type FlowDefinition,
  type FlowDirectory,
  type FlowStep,
  type ServiceDescriptor,
  type ServiceDirectory,
} from './FlowDirectory';
import { composeHopTiming, INTER_HOP_GAP_MS, simulateLatency } from './LatencyModel';
import type { Span, SpanAttributes, SpanEvent, Trace, TraceError } from './Span';
import { msToNs, nsToIso, round2, toJaegerSpan, toOtelSpan } from './SpanSerialization';
import {
  EXCEPTION_TYPES,
  failureMessage,
  hostSlug,
  operationName,
} from './SpanVocabulary';

export const FLOW_ENGINE_SERVICE_NAME = 'archmap-flow-engine';
const SDK_NAME = 'archmap-synthetic';
const SDK_VERSION = '0.1.0';

export type ExecuteFlowRequest = {
  flow: FlowDefinition;
  steps: readonly FlowStep[];
  services: ServiceDirectory;
  environment?: string;
  injectFailure?: boolean;
  /** Hop index to fail at; a seeded random hop when omitted. */
  failureStep?: number;
};

export type ExecuteByIdOptions = Pick<
  ExecuteFlowRequest,
  'environment' | 'injectFailure' | 'failureStep'
>;

export type BatchExecution = {
  traces: Trace[];
  failures: FailureReport[];
};

export type TraceSynthesizerOptions = {
  random: RandomSource;
  /** Epoch milliseconds; read once per execution. */
  now?: () => number;
  /** Needed only by `executeByFlowId` / `executeAll`. */
  flows?: FlowDirectory;
  telemetry?: Telemetry;
};

type HopState =
  | { kind: 'running'; step: number }
  | { kind: 'failed'; step: number }
  | { kind: 'completed' };

type HopOutcome = {
  client: Span;
  server: Span;
  failed: boolean;
};

type ExecutionContext = {
  traceId: string;
  rootSpanId: string;
  environment: string;
};

const EMPTY_SERVICE: ServiceDescriptor = { name: '' };

const stepKey = (s: FlowStep) => s.stepNumber ?? 0;

/** 32 hex chars laid out as a version-4 UUID. */
const uuidFromHex = (h: string): string => {
  const variant = ((parseInt(h[16], 16) & 0x3) | 0x8).toString(16);
  return `${h.slice(0, 8)}-${h.slice(8, 12)}-4${h.slice(13, 16)}-${variant}${h.slice(17, 20)}-${h.slice(20, 32)}`;
};

const peerPortFor = (serviceType: string): number => {
  if (serviceType === 'rest') return 8080;
  if (serviceType === 'grpc') return 50051;
  return 9092;
};

/**
 * Synthesizes OpenTelemetry/Jaeger traces for flow executions.
 *
 * Each execution walks the hops in `stepNumber` order. Every hop yields a
 * CLIENT span on the caller (child of the root) and a SERVER span on the
 * callee (child of the CLIENT). The injected failure hop ends the walk; later
 * hops are not emitted.
 *
 * Determinism: every random draw, ids included, comes from `random`, and the
 * clock is read once per execution. Two synthesizers with the same seed and
 * clock produce identical traces for identical requests.
 */
export class TraceSynthesizer {
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly flows?: FlowDirectory;
  private readonly telemetry: Telemetry;
  private executions = 0;

  constructor(options: TraceSynthesizerOptions) {
    this.random = options.random;
    this.now = options.now ?? Date.now;
    this.flows = options.flows;
    this.telemetry = options.telemetry ?? defaultTelemetry;
  }

  get executionCount(): number {
    return this.executions;
  }

  execute(request: ExecuteFlowRequest): Trace {
    const steps = request.steps
      .slice()
      .sort((a, b) => stepKey(a) - stepKey(b));
    if (steps.length === 0) {
      throw invalidInput(`Flow ${request.flow.id} has no steps to execute.`, {
        flowId: request.flow.id,
      });
    }

    const failureStep = request.failureStep;
    if (
      failureStep !== undefined &&
      (!Number.isInteger(failureStep) || failureStep < 0 || failureStep >= steps.length)
    ) {
      throw invalidInput(`failureStep must be an integer in [0, ${steps.length - 1}].`, {
        flowId: request.flow.id,
        failureStep,
      });
    }

    this.executions += 1;
    const environment = request.environment ?? 'prod';
    const baseTimeNs = msToNs(Math.trunc(this.now()));

    const ctx: ExecutionContext = {
      traceId: this.random.hex(32),
      rootSpanId: this.random.hex(16),
      environment,
    };
    const executionId = uuidFromHex(this.random.hex(32));

    const failAt = request.injectFailure
      ? failureStep ?? this.random.intBetween(0, steps.length - 1)
      : null;

    const spans: Span[] = [];
    let cursorNs = baseTimeNs;
    let state: HopState = { kind: 'running', step: 0 };
    let error: TraceError | null = null;

    while (state.kind === 'running') {
      const i: number = state.step;
      const step = steps[i];
      const from = lookupService(request.services, step.fromServiceId) ?? EMPTY_SERVICE;
      const to = lookupService(request.services, step.toServiceId) ?? EMPTY_SERVICE;
      const fromName = from.name || `service-${i}`;
      const toName = to.name || `service-${i + 1}`;

      const hop = this.emitHop(ctx, {
        step,
        startNs: cursorNs,
        from: { ...from, name: fromName },
        to: { ...to, name: toName },
        fails: failAt === i,
      });
      spans.push(hop.client, hop.server);

      if (hop.failed) {
        error = {
          step: i,
          fromService: fromName,
          toService: toName,
          error: hop.server.statusMessage,
        };
        state = { kind: 'failed', step: i };
      } else if (i + 1 >= steps.length) {
        state = { kind: 'completed' };
      } else {
        cursorNs =
          hop.client.endTimeUnixNano +
          msToNs(this.random.uniform(INTER_HOP_GAP_MS.min, INTER_HOP_GAP_MS.max));
        state = { kind: 'running', step: i + 1 };
      }
    }

    const rootEndNs = spans.reduce(
      (max, s) => (s.endTimeUnixNano > max ? s.endTimeUnixNano : max),
      baseTimeNs,
    );
    const failed = state.kind === 'failed';
    const stepsCompleted = state.kind === 'failed' ? state.step : steps.length;

    const root: Span = {
      traceId: ctx.traceId,
      spanId: ctx.rootSpanId,
      parentSpanId: null,
      operationName: `FLOW ${request.flow.name || 'unknown'}`,
      serviceName: FLOW_ENGINE_SERVICE_NAME,
      serviceType: 'internal',
      kind: 'INTERNAL',
      startTimeUnixNano: baseTimeNs,
      endTimeUnixNano: rootEndNs,
      durationNs: Number(rootEndNs - baseTimeNs),
      statusCode: failed ? 'ERROR' : 'OK',
      statusMessage: '',
      attributes: {
        'flow.id': request.flow.id,
        'flow.name': request.flow.name,
        'flow.type': request.flow.flowType ?? '',
        'flow.steps_total': steps.length,
        'flow.steps_completed': stepsCompleted,
        'execution.id': executionId,
        'execution.environment': environment,
      },
      events: [],
      links: [],
      resource: {
        'service.name': FLOW_ENGINE_SERVICE_NAME,
        'service.version': SDK_VERSION,
        'deployment.environment': environment,
      },
    };

    const allSpans = [root, ...spans];
    const trace: Trace = {
      traceId: ctx.traceId,
      executionId,
      flowId: request.flow.id,
      flowName: request.flow.name,
      environment,
      startTime: nsToIso(baseTimeNs),
      endTime: nsToIso(rootEndNs),
      durationMs: round2(root.durationNs / 1e6),
      status: failed ? 'ERROR' : 'OK',
      spanCount: allSpans.length,
      error,
      spans: allSpans.map(toOtelSpan),
      spansJaeger: allSpans.map(toJaegerSpan),
    };

    this.telemetry.record({
      name: 'trace.executed',
      tags: {
        flowId: trace.flowId,
        status: trace.status,
        environment,
        failedStep: error ? error.step : null,
      },
      metrics: { spanCount: trace.spanCount, syntheticDurationMs: trace.durationMs },
    });

    return trace;
  }

  /** Looks the flow up in the configured FlowDirectory and executes it. */
  executeByFlowId(flowId: string, options: ExecuteByIdOptions = {}): Trace {
    const flows = this.requireFlows();

    const flow = flows.getFlow(flowId);
    if (!flow) throw notFound(`Flow not found: ${flowId}`, { flowId });

    const steps = flows.getSteps(flowId);
    return this.execute({
      ...options,
      flow,
      steps,
      services: collectServices(flows, steps),
    });
  }

  /**
   * Executes every flow in the directory. A flow that cannot be executed is
   * reported in `failures`; the rest of the batch still runs.
   */
  executeAll(options: ExecuteByIdOptions = {}): BatchExecution {
    const flows = this.requireFlows();
    const traces: Trace[] = [];
    const failures: FailureReport[] = [];

    for (const flow of flows.listFlows()) {
      try {
        traces.push(this.executeByFlowId(flow.id, options));
      } catch (err) {
        failures.push(
          reportFailure(err, {
            operation: `trace.executeAll:${flow.id}`,
            telemetry: this.telemetry,
          }),
        );
      }
    }

    return { traces, failures };
  }

  private requireFlows(): FlowDirectory {
    if (!this.flows) {
      throw unconfigured('TraceSynthesizer has no FlowDirectory configured.');
    }
    return this.flows;
  }

  private emitHop(
    ctx: ExecutionContext,
    hop: {
      step: FlowStep;
      startNs: bigint;
      from: ServiceDescriptor;
      to: ServiceDescriptor;
      fails: boolean;
    },
  ): HopOutcome {
    const { step, from, to, fails } = hop;
    const serviceType = to.serviceType ?? 'rest';

    const latencyMs = simulateLatency(this.random, serviceType, fails);
    const clientSpanId = this.random.hex(16);
    const clientEndNs = hop.startNs + msToNs(latencyMs);
    const operation = operationName(this.random, to.name, serviceType);

    const client: Span = {
      traceId: ctx.traceId,
      spanId: clientSpanId,
      parentSpanId: ctx.rootSpanId,
      operationName: operation,
      serviceName: from.name,
      serviceType,
      kind: 'CLIENT',
      startTimeUnixNano: hop.startNs,
      endTimeUnixNano: clientEndNs,
      durationNs: Number(clientEndNs - hop.startNs),
      statusCode: fails ? 'ERROR' : 'OK',
      statusMessage: fails ? `Error calling ${to.name}` : '',
      attributes: this.clientAttributes(to.name, serviceType, step, fails),
      events: [],
      links: [],
      resource: this.resourceFor(from, ctx.environment),
    };

    const timing = composeHopTiming(this.random, latencyMs);
    const serverStartNs = hop.startNs + msToNs(timing.networkDelayMs);
    const serverEndCandidateNs = serverStartNs + msToNs(timing.serverDurationMs);
    const serverEndNs = serverEndCandidateNs < clientEndNs ? serverEndCandidateNs : clientEndNs;

    const server: Span = {
      traceId: ctx.traceId,
      spanId: this.random.hex(16),
      parentSpanId: clientSpanId,
      operationName: operation,
      serviceName: to.name,
      serviceType,
      kind: 'SERVER',
      startTimeUnixNano: serverStartNs,
      endTimeUnixNano: serverEndNs,
      durationNs: Number(serverEndNs - serverStartNs),
      statusCode: fails ? 'ERROR' : 'OK',
      statusMessage: fails ? failureMessage(this.random, to.name) : '',
      attributes: this.serverAttributes(serviceType, step, fails),
      events: this.serverEvents(to.name, fails, serverStartNs),
      links: [],
      resource: this.resourceFor(to, ctx.environment),
    };

    return { client, server, failed: fails };
  }

  private clientAttributes(
    toName: string,
    serviceType: string,
    step: FlowStep,
    fails: boolean,
  ): SpanAttributes {
    const attrs: SpanAttributes = {
      'peer.service': toName,
      'net.peer.name': `${hostSlug(toName)}.internal`,
      'net.peer.port': peerPortFor(serviceType),
      'flow.step_number': step.stepNumber ?? 0,
    };

    if (serviceType === 'rest') {
      attrs['http.method'] = this.random.pick(['POST', 'GET', 'PUT']);
      attrs['http.status_code'] = fails ? this.random.pick([500, 502, 503, 504]) : 200;
      attrs['http.url'] = `http://${toName.toLowerCase()}.internal:8080/api/process`;
    } else if (serviceType === 'grpc') {
      attrs['rpc.system'] = 'grpc';
      attrs['rpc.service'] = `${toName}Service`;
      attrs['rpc.method'] = 'Process';
      attrs['rpc.grpc.status_code'] = fails ? 14 : 0;
    } else if (serviceType === 'event_driven') {
      attrs['messaging.system'] = 'kafka';
      attrs['messaging.destination'] = `${toName.toLowerCase()}.events`;
      attrs['messaging.operation'] = 'publish';
    }

    return attrs;
  }

  private serverAttributes(
    serviceType: string,
    step: FlowStep,
    fails: boolean,
  ): SpanAttributes {
    const attrs: SpanAttributes = {
      'flow.step_number': step.stepNumber ?? 0,
    };

    if (serviceType === 'rest') {
      attrs['http.method'] = 'POST';
      attrs['http.status_code'] = fails ? this.random.pick([500, 502, 503]) : 200;
      attrs['http.route'] = '/api/process';
      attrs['http.scheme'] = 'http';
    } else if (serviceType === 'grpc') {
      attrs['rpc.system'] = 'grpc';
      attrs['rpc.grpc.status_code'] = fails ? 14 : 0;
    }

    return attrs;
  }

  private resourceFor(service: ServiceDescriptor, environment: string): SpanAttributes {
    const host = `${hostSlug(service.name)}-${String(this.random.intBetween(1, 5)).padStart(2, '0')}`;
    return {
      'service.name': service.name,
      'service.version': service.apiVersion ?? 'v1',
      'service.namespace': 'archmap',
      'deployment.environment': environment,
      'host.name': host,
      'os.type': 'linux',
      'process.runtime.name': service.metadata?.language ?? 'node',
      'telemetry.sdk.name': SDK_NAME,
      'telemetry.sdk.version': SDK_VERSION,
    };
  }

  private serverEvents(serviceName: string, fails: boolean, startNs: bigint): SpanEvent[] {
    const events: SpanEvent[] = [
      {
        name: 'request.received',
        timeUnixNano: startNs + msToNs(0.1),
        attributes: { 'service.name': serviceName },
      },
    ];

    if (fails) {
      const slug = hostSlug(serviceName);
      events.push({
        name: 'exception',
        timeUnixNano: startNs + msToNs(this.random.uniform(5, 50)),
        attributes: {
          'exception.type': this.random.pick(EXCEPTION_TYPES),
          'exception.message': `Failed to process request in ${serviceName}`,
          'exception.stacktrace': `ServiceUnavailableError: upstream rejected request\n    at handle (${slug}/handler.ts:42:11)`,
        },
      });
    } else {
      events.push({
        name: 'request.processed',
        timeUnixNano: startNs + msToNs(this.random.uniform(2, 20)),
        attributes: { 'service.name': serviceName, status: 'ok' },
      });
    }

    return events;
  }
}
