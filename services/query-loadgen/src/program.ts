import { Command } from 'commander';

import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { runLoadgen, validateLoadgenConfig } from './server';

type ProgramOptions = {
  config?: string;
  validate?: boolean;
  logLevel?: string;
};

export interface ProgramDeps {
  env?: Record<string, string | undefined>;
  run?: (service: ServiceConfig, configPath: string) => Promise<void>;
  validate?: (configPath: string) => Promise<string[]>;
  print?: (line: string) => void;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? runLoadgen;
  const validate = deps.validate ?? validateLoadgenConfig;
  const print = deps.print ?? ((line: string) => console.log(line));

  const program = new Command();
  program
    .name('tracebench-loadgen')
    .description('Generate rate-limited TraceQL search load against a Tempo endpoint')
    .option('-c, --config <path>', 'path to the YAML configuration (defaults to $CONFIG_FILE)')
    .option('--validate', 'validate the configuration, print the plan and exit')
    .option('--log-level <level>', 'override LOADGEN_LOG_LEVEL')
    .action(async (options: ProgramOptions) => {
      const env = { ...(deps.env ?? process.env) };
      if (options.logLevel) {
        env.LOADGEN_LOG_LEVEL = options.logLevel;
      }
      const service = loadServiceConfig(env);
      const configPath = options.config ?? service.configFile;

      if (options.validate) {
        const summary = await validate(configPath);
        print(`Configuration ${configPath} is valid`);
        for (const line of summary) {
          print(line);
        }
        return;
      }
      await run(service, configPath);
    });

  return program;
}
