import type { BoardEnvironment, StepResult } from "./environment.js";
import type { GameResult } from "./types.js";

export interface EpisodeSummary {
  steps: number;
  terminated: boolean;
  truncated: boolean;
  result: GameResult | null;
  moves: string[];
  finalFingerprint: string;
}

export interface SelfPlayOptions {
  seed?: number;
  onStep?: (step: StepResult, notation: string, stepNumber: number) => void;
}

/**
 * Plays one episode, sampling uniformly among the legal action indices with
 * the environment's own PRNG.
 */
export function playRandomEpisode(env: BoardEnvironment, options: SelfPlayOptions = {}): EpisodeSummary {
  let { info } = env.reset(options.seed);
  const moves: string[] = [];
  let terminated = false;
  let truncated = false;

  while (!terminated && !truncated && info.legalActionIndices.length > 0) {
    const action = env.rng.pick(info.legalActionIndices);
    const notation = env.actionIndexToMove(action).toNotation();
    const step = env.step(action);
    moves.push(notation);
    options.onStep?.(step, notation, moves.length);
    ({ terminated, truncated, info } = step);
  }

  return {
    steps: env.stepsTaken,
    terminated: env.board.isGameOver(),
    truncated,
    result: env.board.getResult(),
    moves,
    finalFingerprint: info.positionFingerprint,
  };
}
