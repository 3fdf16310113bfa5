import type { RandomSource } from '../random/SeededRandom';

export const OPERATION_PATTERNS: Readonly<Record<string, readonly string[]>> = {
  rest: [
    'POST /api/{service}/process',
    'GET /api/{service}/status',
    'PUT /api/{service}/update',
    'POST /api/{service}/validate',
    'GET /api/{service}/health',
  ],
  grpc: [
    '{service}.{Service}Service/Process',
    '{service}.{Service}Service/Get',
    '{service}.{Service}Service/Update',
    '{service}.{Service}Service/Validate',
  ],
  event_driven: [
    'PUBLISH {service}.event.processed',
    'CONSUME {service}.event.received',
    'PUBLISH {service}.event.completed',
  ],
  graphql: ['QUERY {service}.query', 'MUTATION {service}.mutate'],
  batch: ['BATCH {service}.process_batch', 'BATCH {service}.aggregate'],
};

const FAILURE_MESSAGES: ReadonlyArray<(service: string) => string> = [
  (s) => `Connection refused: ${s}:8080`,
  (s) => `Timeout after 30000ms calling ${s}`,
  (s) => `HTTP 503 Service Unavailable from ${s}`,
  (s) => `Circuit breaker OPEN for ${s}`,
  (s) => `HTTP 500 Internal Server Error from ${s}`,
  (s) => `gRPC UNAVAILABLE: ${s} not responding`,
  (s) => `Connection pool exhausted for ${s}`,
];

export const EXCEPTION_TYPES = [
  'ConnectionRefusedError',
  'TimeoutError',
  'ServiceUnavailableError',
  'CircuitBreakerOpenError',
] as const;

/** `PaymentService` → `payment`; empty → `default`. */
export const operationSlug = (serviceName: string): string => {
  const clean = serviceName
    .toLowerCase()
    .split('service')
    .join('')
    .split('-')
    .join('')
    .trim();
  return clean || 'default';
};

const capitalize = (value: string): string =>
  value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();

export const operationName = (
  random: RandomSource,
  serviceName: string,
  serviceType: string,
): string => {
  const patterns = OPERATION_PATTERNS[serviceType] ?? OPERATION_PATTERNS.rest;
  const pattern = random.pick(patterns);
  const slug = operationSlug(serviceName);
  return pattern
    .split('{service}')
    .join(slug)
    .split('{Service}')
    .join(capitalize(slug));
};

export const failureMessage = (random: RandomSource, serviceName: string): string =>
  random.pick(FAILURE_MESSAGES)(serviceName);

/** `Payment Gateway` → `payment-gateway` */
export const hostSlug = (serviceName: string): string =>
  serviceName.toLowerCase().split(' ').join('-');
