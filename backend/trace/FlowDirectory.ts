import type { InMemoryEntityDirectory } from '../graph/EntityDirectory';

export type FlowDefinition = {
  id: string;
  name: string;
  flowType?: string;
};

/** One hop: `fromServiceId` calls `toServiceId`. */
export type FlowStep = {
  flowId?: string;
  /** Ordering key; steps without one sort first, ties keep input order. */
  stepNumber?: number;
  fromServiceId: string;
  toServiceId: string;
};

export type ServiceDescriptor = {
  name: string;
  serviceType?: string;
  apiVersion?: string;
  metadata?: Record<string, string>;
};

export type ServiceDirectory = Readonly<Record<string, ServiceDescriptor>>;

/**
 * Where by-id executions find their flow, hops and services.
 * Supplied by the flow-execution collaborator.
 */
export interface FlowDirectory {
  getFlow(flowId: string): FlowDefinition | null;
  listFlows(): FlowDefinition[];
  getSteps(flowId: string): FlowStep[];
  getService(serviceId: string): ServiceDescriptor | null;
}

/**
 * FlowDirectory over an entity directory (flows and services) plus a flat
 * list of steps tagged with their `flowId`.
 */
export class EntityFlowDirectory implements FlowDirectory {
  private readonly entities: InMemoryEntityDirectory;
  private readonly steps: readonly FlowStep[];

  constructor(args: { entities: InMemoryEntityDirectory; steps: readonly FlowStep[] }) {
    this.entities = args.entities;
    this.steps = args.steps;
  }

  getFlow(flowId: string): FlowDefinition | null {
    const flow = this.entities.getTyped('flow', flowId);
    return flow ? { id: flow.id, name: flow.name, flowType: flow.flowType } : null;
  }

  listFlows(): FlowDefinition[] {
    return this.entities
      .listByType('flow')
      .map((f) => ({ id: f.id, name: f.name, flowType: f.flowType }));
  }

  getSteps(flowId: string): FlowStep[] {
    return this.steps.filter((s) => s.flowId === flowId);
  }

  getService(serviceId: string): ServiceDescriptor | null {
    const svc = this.entities.getTyped('service', serviceId);
    if (!svc) return null;
    return {
      name: svc.name,
      serviceType: svc.serviceType,
      apiVersion: svc.apiVersion,
      metadata: svc.metadata,
    };
  }
}

/** Own-property lookup; a missing or inherited key is `null`. */
export const lookupService = (
  services: ServiceDirectory,
  id: string,
): ServiceDescriptor | null =>
  Object.prototype.hasOwnProperty.call(services, id) ? services[id] : null;

/** Service lookup for the services referenced by `steps`; unknown ids are left out. */
export const collectServices = (
  directory: FlowDirectory,
  steps: readonly FlowStep[],
): Record<string, ServiceDescriptor> => {
  const services = new Map<string, ServiceDescriptor>();
  for (const step of steps) {
    for (const id of [step.fromServiceId, step.toServiceId]) {
      if (!id || services.has(id)) continue;
      const svc = directory.getService(id);
      if (svc) services.set(id, svc);
    }
  }
  return Object.fromEntries(services);
};
