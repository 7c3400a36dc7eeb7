export type NumberSummary = {
  count: number
  mean?: number
  median?: number
  p95?: number
  max?: number
}

const percentile = (sorted: number[], p: number): number | undefined => {
  if (sorted.length === 0) return undefined
  return sorted[Math.floor((p / 100) * (sorted.length - 1))]
}

export const summarizeNumbers = (numbers: number[]): NumberSummary => {
  const sorted = numbers.slice().sort((a, b) => a - b)
  return {
    count: sorted.length,
    mean:
      sorted.length === 0
        ? undefined
        : sorted.reduce((sum, n) => sum + n, 0) / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)],
    p95: percentile(sorted, 95),
    max: sorted[sorted.length - 1],
  }
}

export const formatSummary = (summary: NumberSummary, digits = 1): string => {
  const fmt = (n: number | undefined) => (n === undefined ? "-" : n.toFixed(digits))
  return `mean=${fmt(summary.mean)} median=${fmt(summary.median)} p95=${fmt(summary.p95)} max=${fmt(summary.max)}`
}
