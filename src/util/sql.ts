// src/util/sql.ts
// What: SQL helpers for vectors.
// How: vectorToParam formats an array for ::vector casting.

export function vectorToParam(v: number[]): string {
  // Postgres vector literal: [0.1,0.2,...]
  return `[${v.join(',')}]`;
}
