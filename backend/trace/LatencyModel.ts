import type { RandomSource } from '../random/SeededRandom';
import { round2 } from './SpanSerialization';

export type LatencyBand = { minMs: number; maxMs: number };

export const LATENCY_BANDS: Readonly<Record<string, LatencyBand>> = {
  rest: { minMs: 5, maxMs: 150 },
  grpc: { minMs: 1, maxMs: 50 },
  event_driven: { minMs: 10, maxMs: 500 },
  graphql: { minMs: 10, maxMs: 200 },
  batch: { minMs: 100, maxMs: 5000 },
};

export const DEFAULT_LATENCY_BAND: LatencyBand = { minMs: 5, maxMs: 100 };

/** Failing hops take [2, 10]x longer (timeouts, retries). */
export const ERROR_LATENCY_FACTOR = { min: 2, max: 10 } as const;

/** 5% of hops spike by [3, 8]x regardless of outcome. */
export const LATENCY_SPIKE = { probability: 0.05, min: 3, max: 8 } as const;

export const NETWORK_DELAY_MS = { min: 0.5, max: 5 } as const;

export const INTER_HOP_GAP_MS = { min: 0.1, max: 2 } as const;

export const MIN_SERVER_PROCESSING_MS = 1;

export const latencyBandFor = (serviceType: string): LatencyBand =>
  LATENCY_BANDS[serviceType] ?? DEFAULT_LATENCY_BAND;

/**
 * Hop latency in milliseconds, rounded to 2 decimals.
 *
 * Draw order is fixed (base, error factor, spike roll, spike factor) so a
 * seed always yields the same sequence.
 */
export function simulateLatency(
  random: RandomSource,
  serviceType: string,
  isError: boolean,
): number {
  const band = latencyBandFor(serviceType);
  let latency = random.uniform(band.minMs, band.maxMs);

  if (isError)
    latency *= random.uniform(ERROR_LATENCY_FACTOR.min, ERROR_LATENCY_FACTOR.max);

  if (random.nextFloat() < LATENCY_SPIKE.probability)
    latency *= random.uniform(LATENCY_SPIKE.min, LATENCY_SPIKE.max);

  return round2(latency);
}

export type HopTiming = {
  /** Client span: [0, latencyMs] relative to the hop start. */
  latencyMs: number;
  networkDelayMs: number;
  /** Server span: [networkDelayMs, networkDelayMs + serverDurationMs]. */
  serverDurationMs: number;
};

/**
 * Server timing nested in the client span: the request travels for
 * `networkDelay`, the response for the same again.
 *
 * The delay is capped at half the latency and the server span never ends
 * after `latencyMs`, so the 1ms processing floor only applies where it fits.
 */
export function composeHopTiming(random: RandomSource, latencyMs: number): HopTiming {
  const drawnDelayMs = random.uniform(NETWORK_DELAY_MS.min, NETWORK_DELAY_MS.max);
  const networkDelayMs = Math.min(drawnDelayMs, latencyMs / 2);
  const processingMs = Math.max(latencyMs - networkDelayMs * 2, MIN_SERVER_PROCESSING_MS);
  return {
    latencyMs,
    networkDelayMs,
    serverDurationMs: Math.min(processingMs, latencyMs - networkDelayMs),
  };
}
