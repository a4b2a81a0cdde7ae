// Frame Pipeline - Configuration
// Positional run parameters come from argv; tuning knobs come from flags,
// then environment (.env via dotenv), then defaults.

import type { PipelineConfig } from "./types.js";
import { MAX_QUEUE_SIZE } from "./frame-queue.js";
import { DEFAULT_FRAME_HEIGHT, DEFAULT_FRAME_WIDTH } from "./frame-generator.js";
import { DEFAULT_JPEG_QUALITY } from "./frame-persistence.js";

export const DEFAULT_MAX_WORKERS = 7;
export const DEFAULT_OUTPUT_DIR = "output";

export const USAGE = [
  "Usage: frame-pipeline <duration_seconds> <rate> <worker_count> [options]",
  "",
  "Options:",
  "  --output <dir>       Output directory (default: output)",
  "  --queue-size <n>     Queue capacity before dropping oldest frames (default: 200)",
  "  --width <n>          Frame width in pixels (default: 1920)",
  "  --height <n>         Frame height in pixels (default: 1280)",
  "  --quality <1-100>    JPEG quality (default: 85)",
  "  --stats-port <n>     Serve live stats over HTTP/WebSocket on this port",
  "  -h, --help           Show this message",
  "",
  "Example: frame-pipeline 300 50 7",
].join("\n");

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type CliArgs =
  | { help: true }
  | { help: false; positional: string[]; options: Partial<Record<OptionKey, string>> };

type OptionKey = "output" | "queueSize" | "width" | "height" | "quality" | "statsPort";

const OPTION_FLAGS: Record<string, OptionKey> = {
  "--output": "output",
  "--queue-size": "queueSize",
  "--width": "width",
  "--height": "height",
  "--quality": "quality",
  "--stats-port": "statsPort",
};

/** Split argv into positionals and known `--flag value` / `--flag=value` options. */
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const options: Partial<Record<OptionKey, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      return { help: true };
    }
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const key = OPTION_FLAGS[flag];
      if (!key) throw new ConfigError(`Unknown option: ${flag}`);
      let value: string | undefined;
      if (eq === -1) {
        value = argv[i + 1];
        i++;
      } else {
        value = arg.slice(eq + 1);
      }
      if (value === undefined || value === "") throw new ConfigError(`Missing value for ${flag}`);
      options[key] = value;
      continue;
    }
    positional.push(arg);
  }

  return { help: false, positional, options };
}

/** Strict positive-integer parse: the whole token must be decimal digits. */
export function parsePositiveInt(raw: string, name: string): number {
  const value = parseDigits(raw);
  if (value === null || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** Like parsePositiveInt, but admits 0 (stats port: let the OS choose). */
export function parseNonNegativeInt(raw: string, name: string): number {
  const value = parseDigits(raw);
  if (value === null) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseDigits(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export interface EnvConfig {
  outputDir?: string;
  maxQueueSize?: number;
  maxWorkers?: number;
  frameWidth?: number;
  frameHeight?: number;
  jpegQuality?: number;
  statsPort?: number;
}

/** Read optional overrides from the environment. Empty variables are ignored. */
export function loadEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const int = (key: string): number | undefined => {
    const raw = env[key];
    return raw ? parsePositiveInt(raw, key) : undefined;
  };
  return {
    outputDir: env.OUTPUT_DIR || undefined,
    maxQueueSize: int("MAX_QUEUE_SIZE"),
    maxWorkers: int("MAX_WORKERS"),
    frameWidth: int("FRAME_WIDTH"),
    frameHeight: int("FRAME_HEIGHT"),
    jpegQuality: int("JPEG_QUALITY"),
    statsPort: env.STATS_PORT ? parseNonNegativeInt(env.STATS_PORT, "STATS_PORT") : undefined,
  };
}

/**
 * Build a validated PipelineConfig from argv and environment.
 * @throws ConfigError on missing, malformed or out-of-range values.
 */
export function resolveConfig(argv: string[], env: NodeJS.ProcessEnv = {}): PipelineConfig {
  const args = parseCliArgs(argv);
  if (args.help) {
    throw new ConfigError("Help requested");
  }
  const { positional, options } = args;
  if (positional.length !== 3) {
    throw new ConfigError(
      `Expected 3 arguments (duration_seconds, rate, worker_count), got ${positional.length}`,
    );
  }

  const fromEnv = loadEnvConfig(env);
  const opt = (key: OptionKey, name: string): number | undefined => {
    const raw = options[key];
    return raw === undefined ? undefined : parsePositiveInt(raw, name);
  };

  const config: PipelineConfig = {
    durationSeconds: parsePositiveInt(positional[0] ?? "", "duration_seconds"),
    targetRate: parsePositiveInt(positional[1] ?? "", "rate"),
    workerCount: parsePositiveInt(positional[2] ?? "", "worker_count"),
    maxWorkers: fromEnv.maxWorkers ?? DEFAULT_MAX_WORKERS,
    maxQueueSize: opt("queueSize", "--queue-size") ?? fromEnv.maxQueueSize ?? MAX_QUEUE_SIZE,
    outputDir: options.output ?? fromEnv.outputDir ?? DEFAULT_OUTPUT_DIR,
    frameWidth: opt("width", "--width") ?? fromEnv.frameWidth ?? DEFAULT_FRAME_WIDTH,
    frameHeight: opt("height", "--height") ?? fromEnv.frameHeight ?? DEFAULT_FRAME_HEIGHT,
    jpegQuality: opt("quality", "--quality") ?? fromEnv.jpegQuality ?? DEFAULT_JPEG_QUALITY,
    statsPort:
      options.statsPort !== undefined
        ? parseNonNegativeInt(options.statsPort, "--stats-port")
        : fromEnv.statsPort ?? null,
  };

  validateConfig(config);
  return config;
}

/** Range checks shared by the CLI and the lifecycle controller. */
export function validateConfig(config: PipelineConfig): void {
  const positive: Array<[keyof PipelineConfig, number]> = [
    ["durationSeconds", config.durationSeconds],
    ["targetRate", config.targetRate],
    ["workerCount", config.workerCount],
    ["maxWorkers", config.maxWorkers],
    ["maxQueueSize", config.maxQueueSize],
    ["frameWidth", config.frameWidth],
    ["frameHeight", config.frameHeight],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (config.workerCount > config.maxWorkers) {
    throw new ConfigError(
      `worker_count ${config.workerCount} exceeds the maximum of ${config.maxWorkers}`,
    );
  }

  if (!Number.isInteger(config.jpegQuality) || config.jpegQuality < 1 || config.jpegQuality > 100) {
    throw new ConfigError(`jpegQuality must be an integer between 1 and 100, got ${config.jpegQuality}`);
  }

  if (config.statsPort !== null && (!Number.isInteger(config.statsPort) || config.statsPort < 0 || config.statsPort > 65535)) {
    throw new ConfigError(`statsPort must be an integer between 0 and 65535, got ${config.statsPort}`);
  }

  if (config.outputDir.trim() === "") {
    throw new ConfigError("outputDir must not be empty");
  }
}
