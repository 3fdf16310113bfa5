import type { EntityRef } from './DependencyEdge';

export type Criticality = 'low' | 'medium' | 'high' | 'critical';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export type ServiceType =
  | 'rest'
  | 'grpc'
  | 'event_driven'
  | 'graphql'
  | 'batch';

type EntityBase = {
  id: string;
  name: string;
  description?: string;
};

export type ProductEntity = EntityBase & {
  type: 'product';
  owner?: string;
};

export type PlatformEntity = EntityBase & {
  type: 'platform';
  category?: string;
};

export type ServiceEntity = EntityBase & {
  type: 'service';
  /** Free-form: unknown types fall back to the default latency band. */
  serviceType?: ServiceType | string;
  apiVersion?: string;
  platformId?: string;
  criticality?: Criticality;
  healthStatus?: HealthStatus;
  metadata?: Record<string, string>;
};

export type MicroserviceEntity = EntityBase & {
  type: 'microservice';
  serviceId?: string;
  language?: string;
};

export type FlowEntity = EntityBase & {
  type: 'flow';
  flowType?: string;
};

export type CapabilityEntity = EntityBase & {
  type: 'capability';
  capabilityType?: string;
};

export type DataStoreEntity = EntityBase & {
  type: 'datastore';
  storeType?: string;
  technology?: string;
};

export type Entity =
  | ProductEntity
  | PlatformEntity
  | ServiceEntity
  | MicroserviceEntity
  | FlowEntity
  | CapabilityEntity
  | DataStoreEntity;

export type EntityType = Entity['type'];

export type EntityOfType<T extends EntityType> = Extract<Entity, { type: T }>;

/**
 * Read-only entity lookup supplied by the CRUD layer.
 * A missing entity is `null`, never an error.
 */
export interface EntityLookup {
  get(type: string, id: string): Entity | null;
}

export const UNKNOWN_NAME = 'unknown';

export const nameOf = (lookup: EntityLookup, ref: EntityRef): string =>
  lookup.get(ref.type, ref.id)?.name ?? UNKNOWN_NAME;

/** Lookup that knows no entities; every name resolves to `unknown`. */
export const EMPTY_ENTITY_LOOKUP: EntityLookup = {
  get: () => null,
};

const keyOf = (type: string, id: string) => `${type}:${id}`;

export class InMemoryEntityDirectory implements EntityLookup {
  private readonly entities = new Map<string, Entity>();

  constructor(initial: readonly Entity[] = []) {
    for (const e of initial) this.put(e);
  }

  put(entity: Entity): void {
    this.entities.set(keyOf(entity.type, entity.id), entity);
  }

  remove(type: EntityType, id: string): boolean {
    return this.entities.delete(keyOf(type, id));
  }

  get(type: string, id: string): Entity | null {
    return this.entities.get(keyOf(type, id)) ?? null;
  }

  getTyped<T extends EntityType>(type: T, id: string): EntityOfType<T> | null {
    const found = this.get(type, id);
    return found && isEntityOfType(found, type) ? found : null;
  }

  listByType<T extends EntityType>(type: T): EntityOfType<T>[] {
    const out: EntityOfType<T>[] = [];
    for (const e of this.entities.values()) {
      if (isEntityOfType(e, type)) out.push(e);
    }
    return out;
  }
}

export const isEntityOfType = <T extends EntityType>(
  entity: Entity,
  type: T,
): entity is EntityOfType<T> => entity.type === type;
