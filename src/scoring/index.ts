/**
 * Confidence Scorer
 *
 * Per-source floors and caps applied on top of a strategy's raw confidence.
 */

interface ScoringRule {
  readonly prefix: string
  readonly apply: (confidence: number) => number
}

/**
 * Rules are matched by source prefix; every matching rule applies in order.
 */
const SCORING_RULES: readonly ScoringRule[] = [
  // Exact coordinates
  { prefix: 'coordinates', apply: (c) => Math.max(c, 0.95) },
  { prefix: 'flag', apply: (c) => Math.max(c, 0.85) },
  { prefix: 'llm_geocoding', apply: (c) => Math.max(c, 0.7) },
  // Centroids stand in for a whole country
  { prefix: 'country_centroid', apply: (c) => Math.min(c, 0.5) },
  { prefix: 'channel_fallback', apply: (c) => Math.min(c, 0.3) }
]

export interface Scoreable {
  readonly source: string
  readonly confidence: number
}

/**
 * Adjust confidence for the source that produced it, clamped to [0, 1].
 */
export function scoreConfidence(result: Scoreable): number {
  let confidence = result.confidence
  for (const rule of SCORING_RULES) {
    if (result.source.startsWith(rule.prefix)) {
      confidence = rule.apply(confidence)
    }
  }
  return Math.min(Math.max(confidence, 0), 1)
}
