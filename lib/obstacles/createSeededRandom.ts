/** 32-bit LCG returning floats in [0, 1). The same seed gives the same sequence. */
export const createSeededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0 || 1
  return () => {
    state = (1664525 * state + 1013904223) >>> 0
    return state / 2 ** 32
  }
}
