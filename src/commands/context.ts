import {
  DEFAULT_CONFIG_PATH,
  createConsoleLogger,
  createPipelineServices,
  loadDeploymentConfig,
  resolveRegion,
  type ConnectManagerConfig,
  type LoadedDeploymentConfig,
  type Logger,
  type PipelineServices,
} from "../../extensions/connect-datatables/src/index.js";

export type CommonCommandOptions = {
  /** Deployment config file (default: config/data_tables_config.json) */
  config?: string;
  region?: string;
  json?: boolean;
  verbose?: boolean;
};

export type CommandDeps = {
  createServices?: (config: ConnectManagerConfig) => PipelineServices;
  logger?: Logger;
  /** Cancels the run like an interrupt */
  signal?: AbortSignal;
};

export type CommandContext = {
  loaded: LoadedDeploymentConfig;
  region: string;
  logger: Logger;
  services: PipelineServices;
};

export async function loadCommandContext(opts: CommonCommandOptions, deps: CommandDeps = {}): Promise<CommandContext> {
  const loaded = await loadDeploymentConfig(opts.config ?? DEFAULT_CONFIG_PATH);
  const region = resolveRegion(opts.region, loaded.config);
  const logger = deps.logger ?? createConsoleLogger({ verbose: opts.verbose });
  const createServices = deps.createServices ?? createPipelineServices;

  logger.debug(`Using instance ${loaded.config.instanceARN} in ${region}`);
  return {
    loaded,
    region,
    logger,
    services: createServices({ instanceArn: loaded.config.instanceARN, region, logger }),
  };
}
