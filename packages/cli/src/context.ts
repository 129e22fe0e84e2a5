import {
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type Logger,
} from '@repoindex/shared';
import { ConfigLoader, IndexingEngine } from '@repoindex/core';
import { OutputRenderer } from './output/renderer';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  yes?: boolean;
  nonInteractive?: boolean;
};

export type EngineFactory = (config: Config, options: GlobalOptions) => IndexingEngine;

export interface CliOptions {
  /** Base for `.repoindex.yaml` and relative storage paths. Default: process.cwd() */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  engineFactory?: EngineFactory;
}

export function createLogger(config: Config, options: GlobalOptions): Logger {
  if (config.logging.jsonlPath) {
    return new JsonlLogger(config.logging.jsonlPath);
  }
  return new ConsoleLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    // events on stdout would corrupt --json output
    events: Boolean(options.verbose) && !options.json,
  });
}

const defaultEngineFactory: EngineFactory = (config, options) =>
  new IndexingEngine({ config, logger: createLogger(config, options) });

/**
 * What a command needs from the surrounding program: global flags, output
 * and an engine opened for the duration of the command.
 */
export class CliContext {
  exitCode = 0;

  constructor(
    private readonly readGlobals: () => GlobalOptions,
    private readonly options: CliOptions = {},
  ) {}

  get globals(): GlobalOptions {
    return this.readGlobals();
  }

  get env(): NodeJS.ProcessEnv {
    return this.options.env ?? process.env;
  }

  renderer(): OutputRenderer {
    return new OutputRenderer(Boolean(this.globals.json));
  }

  loadConfig(): Config {
    return ConfigLoader.load({
      configPath: this.globals.config,
      cwd: this.options.cwd ?? process.cwd(),
      env: this.env,
    });
  }

  /** Runs `fn` against an initialized engine and always closes it. */
  async withEngine<T>(fn: (engine: IndexingEngine) => Promise<T>): Promise<T> {
    const factory = this.options.engineFactory ?? defaultEngineFactory;
    const engine = factory(this.loadConfig(), this.globals);
    await engine.init();
    try {
      return await fn(engine);
    } finally {
      await engine.close();
    }
  }
}
