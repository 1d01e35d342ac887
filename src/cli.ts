#!/usr/bin/env node
import { Command } from "commander";
import { z } from "zod";
import { GAME_TYPES, createEnvironment, parseGameType } from "./board-factory.js";
import { DEFAULT_MAX_STEPS } from "./config.js";
import { EngineError } from "./errors.js";
import { playRandomEpisode, type EpisodeSummary } from "./self-play.js";
import type { GameResult } from "./types.js";

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

const playOptionsSchema = z.object({
  game: z.string(),
  episodes: z.coerce.number().int().positive(),
  maxSteps: z.coerce.number().int().positive(),
  seed: z.coerce.number().int().optional(),
  render: z.boolean().default(false),
  json: z.boolean().default(false),
});

type PlayOptions = z.infer<typeof playOptionsSchema>;

const program = new Command();

function parsePlayOptions(raw: unknown): PlayOptions {
  const parsed = playOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliError(`Invalid --${issue?.path.join(".") ?? "option"}: ${issue?.message ?? "unknown problem"}.`);
  }
  return parsed.data;
}

function formatResult(result: GameResult | null, labelOf: (winner: GameResult["winner"]) => string): string {
  if (!result) {
    return "unfinished";
  }
  return `${result.terminationReason}, winner: ${labelOf(result.winner)} after ${result.plyCount} plies`;
}

function episodeSummaryText(index: number, summary: EpisodeSummary, labelOf: (winner: GameResult["winner"]) => string): string {
  const lines = [
    `Episode ${index + 1}`,
    `Steps: ${summary.steps}`,
    `Terminated: ${summary.terminated ? "yes" : "no"}`,
    `Truncated: ${summary.truncated ? "yes" : "no"}`,
    `Result: ${formatResult(summary.result, labelOf)}`,
    `Final position: ${summary.finalFingerprint}`,
  ];
  return lines.join("\n");
}

program
  .name("boardgym")
  .description("Chess and Xiangqi episodes for reinforcement-learning loops.");

program
  .command("games")
  .description("List the supported game types")
  .action(() => {
    console.log(GAME_TYPES.join("\n"));
  });

program
  .command("play")
  .description("Play random self-play episodes")
  .option("-g, --game <type>", `Game type (${GAME_TYPES.join(", ")})`, "chess")
  .option("-e, --episodes <n>", "Number of episodes", "1")
  .option("--max-steps <n>", "Steps before an episode is truncated", String(DEFAULT_MAX_STEPS))
  .option("--seed <n>", "Seed for reproducible episodes")
  .option("--render", "Print the board after every ply")
  .option("--json", "Print summaries as JSON")
  .action((rawOptions: unknown) => {
    const options = parsePlayOptions(rawOptions);
    const gameType = parseGameType(options.game);
    const env = createEnvironment(gameType, { maxSteps: options.maxSteps, seed: options.seed });
    const labelOf = (winner: GameResult["winner"]): string => (winner ? env.board.sideLabel(winner) : "none");
    const summaries: EpisodeSummary[] = [];

    for (let episode = 0; episode < options.episodes; episode += 1) {
      if (options.render && !options.json) {
        console.log(`===== Episode ${episode + 1} =====`);
        env.render("human");
      }
      const summary = playRandomEpisode(env, {
        seed: episode === 0 ? options.seed : undefined,
        onStep: (step, notation, stepNumber) => {
          if (options.render && !options.json) {
            console.log(`\nStep ${stepNumber}: ${notation} (reward ${step.reward})`);
            env.render("human");
          }
        },
      });
      summaries.push(summary);
      if (!options.json) {
        console.log(episodeSummaryText(episode, summary, labelOf));
      }
    }

    if (options.json) {
      console.log(JSON.stringify(summaries, null, 2));
    }
    env.close();
  });

async function runCli(): Promise<void> {
  await program.parseAsync(process.argv);
}

runCli().catch((error: unknown) => {
  if (error instanceof CliError || error instanceof EngineError) {
    console.error(`Error: ${error.message}`);
    process.exitCode = 1;
    return;
  }
  if (error instanceof Error) {
    console.error(`Unexpected error: ${error.message}`);
  } else {
    console.error("Unexpected error");
  }
  process.exitCode = 1;
});
