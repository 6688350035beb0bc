/**
 * Weight arena utilities.
 *
 * One contiguous `Float64Array` backs every numeric buffer of a map: the input
 * weights, the N×N hidden weights and the three per-step activation vectors.
 * The slab is allocated once at construction; each step rewrites the views in
 * place so training performs no per-sample allocation.
 */

/**
 * Views into the shared slab. All views alias the same `ArrayBuffer`.
 *
 * Layout (offsets in elements):
 *  - `v`      : [0, N)
 *  - `w`      : [N, N + N*N)   row-major, `w[i * N + j]`
 *  - `hidden` : next N
 *  - `out`    : next N
 *  - `net`    : next N
 */
export interface WeightArena {
  readonly size: number;
  readonly slab: Float64Array;
  readonly v: Float64Array;
  readonly w: Float64Array;
  /** Per-row views of `w` (row `i` = `w[i * N .. i * N + N)`). */
  readonly rows: Float64Array[];
  readonly hidden: Float64Array;
  readonly out: Float64Array;
  readonly net: Float64Array;
}

/**
 * Allocate the slab for an `size`-dimensional map and carve its views.
 *
 * @param size Input vector length N.
 * @param initialWeight Starting value of every `v` and `w` entry.
 */
export function allocateArena(size: number, initialWeight: number): WeightArena {
  const square = size * size;
  const slab = new Float64Array(size + square + 3 * size);
  let offset = 0;
  const take = (length: number): Float64Array => {
    const view = slab.subarray(offset, offset + length);
    offset += length;
    return view;
  };
  const v = take(size);
  const w = take(square);
  const hidden = take(size);
  const out = take(size);
  const net = take(size);
  const rows: Float64Array[] = [];
  for (let i = 0; i < size; i++) rows.push(w.subarray(i * size, (i + 1) * size));
  const arena: WeightArena = { size, slab, v, w, rows, hidden, out, net };
  resetArena(arena, initialWeight);
  return arena;
}

/**
 * Restore the initial state: weights at `initialWeight`, activations zeroed.
 */
export function resetArena(arena: WeightArena, initialWeight: number): void {
  arena.slab.fill(0);
  arena.v.fill(initialWeight);
  arena.w.fill(initialWeight);
}

/** Copy the hidden weights out as a fresh N×N matrix. */
export function copyMatrix(arena: WeightArena): number[][] {
  return arena.rows.map((row) => Array.from(row));
}
