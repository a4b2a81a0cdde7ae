// Frame Pipeline - Command-line runner
// Parses arguments, wires the pipeline, runs it once and prints the summary.
// Returns the process exit code instead of exiting, so tests can drive it.

import type { FrameGenerator, FrameSink, OutputLocation, PipelineConfig } from "./types.js";
import { ConfigError, USAGE, parseCliArgs, resolveConfig } from "./config.js";
import { RandomFrameGenerator } from "./frame-generator.js";
import { FramePersistence } from "./frame-persistence.js";
import { LifecycleController } from "./lifecycle-controller.js";
import { formatReport } from "./report.js";
import { createStatsServer, type StatsServer } from "./stats-server.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Receives summary and usage lines. Defaults to console.log. */
  out?: (line: string) => void;
  /** Receives error lines. Defaults to console.error. */
  err?: (line: string) => void;
  /** Defaults to a RandomFrameGenerator sized from the config. */
  generator?: FrameGenerator;
  /** Defaults to a FramePersistence writing to the configured output directory. */
  persistence?: FrameSink & OutputLocation;
  /** Aborting ends the run early, like SIGINT. */
  signal?: AbortSignal;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const logger = deps.logger ?? createConsoleLogger();

  let config: PipelineConfig;
  try {
    if (parseCliArgs(argv).help) {
      out(USAGE);
      return 0;
    }
    config = resolveConfig(argv, deps.env ?? process.env);
  } catch (e) {
    if (e instanceof ConfigError) {
      err(`Error: ${e.message}`);
      err(USAGE);
      return 1;
    }
    throw e;
  }

  const persistence =
    deps.persistence ?? new FramePersistence(config.outputDir, { quality: config.jpegQuality });
  const generator =
    deps.generator ?? new RandomFrameGenerator({ width: config.frameWidth, height: config.frameHeight });

  let stats: StatsServer | null = null;
  const controller = new LifecycleController(config, {
    generator,
    sink: persistence,
    outputLocation: persistence,
    logger,
    onRateSample: (sample) => stats?.broadcastRateSample(sample),
    onStateChange: (state) => stats?.broadcastStateChange(state),
  });

  const abort = new AbortController();
  const requestStop = () => abort.abort();
  process.once("SIGINT", requestStop);
  deps.signal?.addEventListener("abort", requestStop, { once: true });

  try {
    if (config.statsPort !== null) {
      stats = createStatsServer({ source: controller, logger });
      await stats.listen(config.statsPort);
    }

    logger.info(
      `Generating frames at ${config.targetRate} fps for ${config.durationSeconds} seconds ` +
        `using ${config.workerCount} workers...`,
    );

    const report = await controller.run(abort.signal);
    for (const line of formatReport(report)) {
      out(line);
    }
    return 0;
  } catch (e) {
    err(`[FATAL] ${errorMessage(e)}`);
    return 1;
  } finally {
    process.removeListener("SIGINT", requestStop);
    deps.signal?.removeEventListener("abort", requestStop);
    await stats?.close();
  }
}
