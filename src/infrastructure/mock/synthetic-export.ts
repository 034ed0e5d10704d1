import { createHash } from 'node:crypto';
import type { EventType } from '../api/schemas.js';

/** Shape of one synthetic export. */
export interface ExportSpec {
  readonly minRows: number;
  readonly maxRows: number;
  readonly eventTypes: readonly EventType[];
  readonly downloads: number;
  readonly patientPool: readonly string[];
  readonly startTime: Date;
  readonly stepMs: number;
}

export interface DownloadMeta {
  readonly id: string;
  readonly rows: number;
  readonly eventTypes: readonly EventType[];
  readonly patients: readonly string[];
  readonly startMs: number;
  readonly endMs: number;
  readonly stepMs: number;
}

export interface ExportMeta {
  readonly id: string;
  /** Keyed by download id, in creation order. */
  readonly downloads: ReadonlyMap<string, DownloadMeta>;
}

type ValueRange = { mean: number; stddev: number; min: number; max: number };

const VALUE_RANGES: Record<EventType, ValueRange> = {
  heart_rate: { mean: 75, stddev: 15, min: 30, max: 200 },
  spo2: { mean: 97, stddev: 2, min: 70, max: 100 },
  bp_sys: { mean: 120, stddev: 20, min: 60, max: 250 },
  bp_dia: { mean: 80, stddev: 15, min: 30, max: 150 },
};

export const CSV_HEADER = 'patient_id,event_time,event_type,value\n';

const START = new Date('2025-08-26T00:00:00Z');

export const EXPORT_SPECS: Readonly<Record<string, ExportSpec>> = {
  demo: {
    minRows: 5_000,
    maxRows: 10_000,
    eventTypes: ['bp_sys', 'bp_dia'],
    downloads: 2,
    patientPool: ['P001', 'P002', 'P003', 'P004'],
    startTime: START,
    stepMs: 7_000,
  },
  small: {
    minRows: 500_000,
    maxRows: 1_000_000,
    eventTypes: ['heart_rate', 'spo2'],
    downloads: 10,
    patientPool: ['S001', 'S002', 'S003', 'S004', 'S005', 'S006'],
    startTime: START,
    stepMs: 3_000,
  },
  large: {
    minRows: 5_000_000,
    maxRows: 10_000_000,
    eventTypes: ['heart_rate', 'spo2', 'bp_sys', 'bp_dia'],
    downloads: 20,
    patientPool: Array.from({ length: 20 }, (_, i) => `L${String(i + 1).padStart(3, '0')}`),
    startTime: START,
    stepMs: 300,
  },
};

/**
 * Deterministic PRNG (mulberry32) seeded from the SHA-256 of `seed`.
 * Returns floats in [0, 1).
 */
export function seededRandom(seed: string): () => number {
  let state = createHash('sha256').update(seed).digest().readUInt32LE(0);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

/** UUID-v4-shaped id derived from the SHA-256 of `seed`. */
export function seededUuid4(seed: string): string {
  const bytes = createHash('sha256').update(seed).digest().subarray(0, 16);
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x40;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;
  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function randInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

function pick<T>(rng: () => number, items: readonly T[]): T {
  const item = items[Math.floor(rng() * items.length)];
  if (item === undefined) throw new Error('Cannot pick from an empty list');
  return item;
}

/** `k` distinct items in random order (partial Fisher-Yates). */
function sample<T>(rng: () => number, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const out: T[] = [];
  for (let i = 0; i < k && pool.length > 0; i++) {
    const j = Math.floor(rng() * pool.length);
    const [chosen] = pool.splice(j, 1);
    if (chosen !== undefined) out.push(chosen);
  }
  return out;
}

/** Integer from a normal distribution (Box-Muller), clamped to the range. */
function normalValue(rng: () => number, range: ValueRange): number {
  const u1 = 1 - rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  const value = Math.trunc(range.mean + z * range.stddev);
  return Math.max(range.min, Math.min(range.max, value));
}

/**
 * Builds the export registry. Downloads of one export get consecutive,
 * non-overlapping time windows: each ends where the next begins.
 */
export function buildExports(specs: Readonly<Record<string, ExportSpec>>): Map<string, ExportMeta> {
  const table = new Map<string, ExportMeta>();

  for (const [exportId, spec] of Object.entries(specs)) {
    const rng = seededRandom(exportId);
    const downloads = new Map<string, DownloadMeta>();
    let cursor = spec.startTime.getTime();

    for (let i = 0; i < spec.downloads; i++) {
      const id = seededUuid4(`${exportId}_${i}`);
      const rows = randInt(rng, spec.minRows, spec.maxRows);
      const k = Math.min(spec.patientPool.length, randInt(rng, 2, spec.patientPool.length));
      const endMs = cursor + rows * spec.stepMs;

      downloads.set(id, {
        id,
        rows,
        eventTypes: spec.eventTypes,
        patients: sample(rng, spec.patientPool, k),
        startMs: cursor,
        endMs,
        stepMs: spec.stepMs,
      });
      cursor = endMs;
    }

    table.set(exportId, { id: exportId, downloads });
  }

  return table;
}

/**
 * Yields the CSV of one download in chunks of roughly `chunkLimit`
 * characters. Rows are spaced by `stepMs` with jitter in [0, stepMs).
 * The same download always yields the same text.
 */
export function* generateCsv(meta: DownloadMeta, chunkLimit: number = 32 * 1024): Generator<string> {
  const rng = seededRandom(meta.id);
  yield CSV_HEADER;

  let buffer = '';
  for (let i = 0; i < meta.rows; i++) {
    const patientId = pick(rng, meta.patients);
    const time = new Date(meta.startMs + i * meta.stepMs + rng() * meta.stepMs);
    const eventType = pick(rng, meta.eventTypes);
    const value = normalValue(rng, VALUE_RANGES[eventType]);

    buffer += `${patientId},${time.toISOString()},${eventType},${value}\n`;
    if (buffer.length >= chunkLimit) {
      yield buffer;
      buffer = '';
    }
  }

  if (buffer !== '') yield buffer;
}
