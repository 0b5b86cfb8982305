export type ScorePrediction = {
  /** One similarity score per prompt, in prompt order. */
  rawScores: readonly number[];
  /** The provider's own normalization over the prompts it was given. */
  probabilities: readonly number[];
};

/**
 * Scores a frame against a batch of prompts. Implementations must return exactly
 * one raw score per prompt, in the order the prompts were given.
 */
export interface ScoreProvider<TFrame = Buffer> {
  predict(frame: TFrame, prompts: readonly string[], temperature: number): Promise<ScorePrediction>;
  describe?(): Record<string, unknown>;
  /**
   * Called before a new definition set is applied, with the prompts it will
   * score. Throws when any of them cannot be scored; the set is then rejected.
   */
  prepare?(prompts: readonly string[]): Promise<void> | void;
}
