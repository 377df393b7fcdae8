/**
 * Shared fixtures for clustering tests.
 *
 * Uses a seeded PRNG (mulberry32) for deterministic data generation.
 */

import {
  createCentroid,
  createRecord,
  type Centroid,
  type DataRecord,
} from '../../src/core/feature-vector.js';

/**
 * Mulberry32 seeded PRNG. Returns values in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** 1-D records whose identifiers are their values. */
export function oneDimensionalRecords(): DataRecord[] {
  return [6, 8, 18, 26, 13, 32, 24].map((v) => createRecord(String(v), { value: v }));
}

export function oneDimensionalCentroids(): Centroid[] {
  return [createCentroid({ value: 11 }), createCentroid({ value: 20 })];
}

/** Height/weight style 2-D records numbered from 1. */
export function twoDimensionalRecords(): DataRecord[] {
  const rows = [
    [185, 72],
    [170, 56],
    [168, 60],
    [179, 68],
    [182, 72],
    [188, 77],
  ];
  return rows.map(([x, y], i) => createRecord(String(i + 1), { X: x, Y: y }));
}

export function twoDimensionalCentroids(): Centroid[] {
  return [createCentroid({ X: 185, Y: 72 }), createCentroid({ X: 170, Y: 56 })];
}

/**
 * Uniform noise around a few 2-D centers.
 */
export function blobs(centers: Array<[number, number]>, perBlob: number, seed = 42): DataRecord[] {
  const rng = mulberry32(seed);
  const records: DataRecord[] = [];
  centers.forEach(([cx, cy], b) => {
    for (let i = 0; i < perBlob; i++) {
      records.push(
        createRecord(`b${b}-${i}`, { x: cx + (rng() - 0.5) * 4, y: cy + (rng() - 0.5) * 4 }),
      );
    }
  });
  return records;
}
