/**
 * ali command line program
 *
 * `ali [options] <words...>` prints the composed command on stdout.
 * Sub-commands: `explain <words...>` and `plugins`.
 *
 * All output goes through {@link CliIO} so the program runs in-process
 * in tests; the caller turns the returned code into the process exit code.
 *
 * @module cli/program
 */

import { createLogger, loadConfig } from "@ali/core";
import {
  type Engine,
  createEngine,
  getSearchPaths,
  type InvocationContext,
  isEngineError,
  loadRegistry,
} from "@ali/plugin";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import { Command, CommanderError } from "commander";

import { buildInvocationContext } from "./context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";
import {
  compositionJson,
  formatConfigError,
  formatEngineError,
  formatExplanation,
  formatPlugins,
  formatUsageError,
  formatVerbs,
} from "./format.js";
import { TokenizeError, tokenize } from "./tokenize.js";
import { version } from "./version.js";

// =============================================================================
// Types
// =============================================================================

export interface CliIO {
  /** Writes one line to standard output */
  stdout: (line: string) => void;
  /** Writes one line to standard error */
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Force colours on or off; detected from chalk and NO_COLOR when omitted */
  colors?: boolean;
  /** Overrides ~/.config/ali/config.toml */
  globalConfigPath?: string;
}

export interface GlobalOptions {
  pluginsDir: string[];
  json?: boolean;
  verbose?: boolean;
  listVerbs?: boolean;
  strict?: boolean;
}

interface Runtime {
  engine: Engine;
  context: InvocationContext;
}

// =============================================================================
// Helpers
// =============================================================================

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Sends multi-line text through a line writer one line at a time.
 */
function writeLines(write: (line: string) => void, text: string): void {
  for (const line of text.split("\n")) {
    write(line);
  }
}

function createPaint(io: CliIO): ChalkInstance {
  const colors = io.colors ?? (chalk.level > 0 && io.env.NO_COLOR === undefined);
  return new Chalk({ level: colors ? (chalk.level === 0 ? 1 : chalk.level) : 0 });
}

/**
 * A single word is treated as a whole command line: `ali "EDIT 'my notes.md'"`.
 */
export function wordsToTokens(words: readonly string[]): string[] {
  const [only] = words;
  if (words.length === 1 && only !== undefined) {
    return tokenize(only);
  }
  return [...words];
}

// =============================================================================
// Program
// =============================================================================

class AliCli {
  private readonly paint: ChalkInstance;

  constructor(private readonly io: CliIO) {
    this.paint = createPaint(io);
  }

  /**
   * Loads configuration and plugins. Reports failures itself and returns
   * undefined, which callers map to a usage exit code.
   */
  private async bootstrap(options: GlobalOptions): Promise<Runtime | undefined> {
    const configResult = loadConfig({
      cwd: this.io.cwd,
      env: this.io.env,
      globalConfigPath: this.io.globalConfigPath,
      overrides: options.strict ? { strict: true } : undefined,
    });
    if (!configResult.ok) {
      this.stderr(formatConfigError(configResult.error, this.paint));
      return undefined;
    }
    const config = configResult.value;

    const logger = createLogger({
      name: "ali",
      level: options.verbose ? "debug" : config.logLevel,
      json: config.logJson,
      colors: this.io.colors,
      timestamps: false,
      write: this.io.stderr,
    });

    const searchPaths = getSearchPaths({
      projectRoot: this.io.cwd,
      extra: [...options.pluginsDir, ...config.plugins.dirs],
      includeBuiltin: !config.plugins.skipBuiltin,
      env: this.io.env,
    });
    logger.debug("Plugin search paths", searchPaths);

    try {
      const registry = await loadRegistry(searchPaths, { disabled: config.plugins.disabled, logger });
      const engine = createEngine({
        registry,
        logger,
        strict: config.strict,
        maxPasses: config.template.maxPasses,
        maxServiceHops: config.template.maxServiceHops,
      });
      const context = buildInvocationContext(this.io.env, { caller: config.caller, cwd: this.io.cwd });
      return { engine, context };
    } catch (error) {
      if (isEngineError(error)) {
        this.stderr(formatEngineError(error, this.paint));
        return undefined;
      }
      throw error;
    }
  }

  private tokens(words: readonly string[]): string[] | undefined {
    try {
      return wordsToTokens(words);
    } catch (error) {
      if (error instanceof TokenizeError) {
        this.stderr(formatUsageError(error.message, this.paint));
        return undefined;
      }
      throw error;
    }
  }

  private stdout(text: string): void {
    writeLines(this.io.stdout, text);
  }

  private stderr(text: string): void {
    writeLines(this.io.stderr, text);
  }

  private printJson(value: unknown): void {
    this.stdout(JSON.stringify(value, null, 2));
  }

  async compose(words: readonly string[], options: GlobalOptions): Promise<ExitCode> {
    const runtime = await this.bootstrap(options);
    if (!runtime) {
      return EXIT_CODES.USAGE_ERROR;
    }

    if (options.listVerbs) {
      const verbs = runtime.engine.registry.verbs();
      if (options.json) {
        this.printJson(verbs);
      } else {
        this.stdout(formatVerbs(verbs, this.paint));
      }
      return EXIT_CODES.SUCCESS;
    }

    const tokens = this.tokens(words);
    if (!tokens) {
      return EXIT_CODES.USAGE_ERROR;
    }

    const result = runtime.engine.compose(tokens, runtime.context);
    if (options.json) {
      this.printJson(result.ok ? compositionJson(result.value) : { ok: false, error: result.error.toJSON() });
      return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
    }
    if (!result.ok) {
      this.stderr(formatEngineError(result.error, this.paint));
      return EXIT_CODES.ERROR;
    }

    this.stdout(result.value.output);
    return EXIT_CODES.SUCCESS;
  }

  async explain(words: readonly string[], options: GlobalOptions): Promise<ExitCode> {
    const runtime = await this.bootstrap(options);
    if (!runtime) {
      return EXIT_CODES.USAGE_ERROR;
    }
    const tokens = this.tokens(words);
    if (!tokens) {
      return EXIT_CODES.USAGE_ERROR;
    }

    const explanation = runtime.engine.explain(tokens, runtime.context);
    if (options.json) {
      this.printJson({ ...explanation, error: explanation.error?.toJSON() });
    } else {
      this.stdout(formatExplanation(explanation, this.paint));
    }
    return explanation.error ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS;
  }

  async plugins(options: GlobalOptions): Promise<ExitCode> {
    const runtime = await this.bootstrap(options);
    if (!runtime) {
      return EXIT_CODES.USAGE_ERROR;
    }

    const summaries = runtime.engine.registry.plugins.map((plugin) => plugin.summary());
    if (options.json) {
      this.printJson(summaries);
    } else {
      this.stdout(formatPlugins(summaries, this.paint));
    }
    return EXIT_CODES.SUCCESS;
  }

  usageError(message: string): void {
    this.stderr(formatUsageError(message, this.paint));
  }
}

/**
 * Builds the commander program. `onExit` receives the code of whichever
 * action ran.
 */
export function createProgram(io: CliIO, onExit: (code: ExitCode) => void): Command {
  const cli = new AliCli(io);
  const program = new Command();

  program
    .name("ali")
    .description("Compose shell commands from short verb phrases")
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => writeLines(io.stdout, text.trimEnd()),
      writeErr: (text) => writeLines(io.stderr, text.trimEnd()),
      outputError: (text) => cli.usageError(text.replace(/^error: /, "").trimEnd()),
    })
    .argument("[words...]", "verb followed by its arguments")
    .option("--plugins-dir <dir>", "additional plugin directory (repeatable)", collect, [])
    .option("--json", "print structured output")
    .option("-v, --verbose", "log routing stages to stderr")
    .option("--list-verbs", "list available verbs")
    .option("--strict", "treat unrecognized tokens as errors")
    .action(async (words: string[], options: GlobalOptions) => {
      onExit(await cli.compose(words, options));
    });

  program
    .command("explain")
    .description("Show how the words are routed and expanded")
    .argument("<words...>", "verb followed by its arguments")
    .action(async (words: string[], _options: unknown, command: Command) => {
      onExit(await cli.explain(words, command.optsWithGlobals<GlobalOptions>()));
    });

  program
    .command("plugins")
    .description("List loaded plugins")
    .action(async (_options: unknown, command: Command) => {
      onExit(await cli.plugins(command.optsWithGlobals<GlobalOptions>()));
    });

  return program;
}

/**
 * Runs the CLI on user arguments (without the node and script paths).
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }

  return exitCode;
}
